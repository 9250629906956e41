/**
 * Spot Price Fetcher - retrieves the current price of an asset
 */

import { RateLimitedClient } from '../adapters/http/rate-limited-client';
import { Asset } from '../types/asset';
import { SpotSample } from '../types/market-data';
import { PriceProviderAdapter } from '../types/price-provider';
import { Clock, systemClock } from '../utils/clock';
import { MalformedResponseError } from './payload-validator';

export class SpotPriceFetcher {
  constructor(
    private readonly client: RateLimitedClient,
    private readonly adapter: PriceProviderAdapter,
    private readonly clock: Clock = systemClock
  ) {}

  get providerId(): string {
    return this.adapter.providerId;
  }

  /**
   * Whether the asset has an identifier for this provider
   */
  supports(asset: Asset): boolean {
    return this.adapter.resolveCoinId(asset) !== undefined;
  }

  /**
   * Fetch one price sample. The observation time is the provider's quote
   * time when it reports one, else the fetch time, truncated to the second.
   *
   * @throws MalformedResponseError when the price is missing, zero, negative or not finite
   */
  async fetchSpot(asset: Asset, signal?: AbortSignal): Promise<SpotSample> {
    const request = this.adapter.buildSpotRequest(asset);
    const response = await this.client.fetch(request, signal);
    const raw = this.adapter.parseSpot(asset, response.data);

    if (!Number.isFinite(raw.price) || raw.price <= 0) {
      throw new MalformedResponseError(
        `Invalid spot price for ${asset.assetId}: ${raw.price}`,
        this.adapter.providerId
      );
    }

    const observedAtMs = raw.observedAtMs !== undefined && Number.isFinite(raw.observedAtMs)
      ? raw.observedAtMs
      : this.clock.now();

    return {
      assetId: asset.assetId,
      observedAt: new Date(Math.floor(observedAtMs / 1000) * 1000).toISOString(),
      price: raw.price,
      providerId: this.adapter.providerId
    };
  }
}
