/**
 * Base Price Adapter - common request and payload helpers for price adapters
 *
 * Adapters turn a provider's native payload into RawCandle / RawSpotPrice
 * values. They do not judge the numbers: OHLC consistency and positivity
 * are checked by the fetchers so a bad candle can be dropped on its own.
 */

import { Asset } from '../../types/asset';
import { RawCandle, RawSpotPrice } from '../../types/market-data';
import { HttpRequest, PriceProviderAdapter, ProviderId } from '../../types/price-provider';
import { MalformedResponseError } from '../../services/payload-validator';

/**
 * Configuration for a price adapter
 */
export interface PriceAdapterConfig {
  apiEndpoint?: string;
  timeoutMs?: number;
}

/**
 * Abstract base class for price adapters
 */
export abstract class BasePriceAdapter implements PriceProviderAdapter {
  abstract readonly providerId: ProviderId;

  protected readonly apiEndpoint: string;
  protected readonly timeoutMs?: number;

  constructor(config: PriceAdapterConfig, defaultEndpoint: string) {
    this.apiEndpoint = config.apiEndpoint || defaultEndpoint;
    this.timeoutMs = config.timeoutMs;
  }

  resolveCoinId(asset: Asset): string | undefined {
    return asset.providerIds[this.providerId];
  }

  /**
   * Headers carrying the API key for this provider
   */
  abstract authHeaders(apiKey: string): Record<string, string>;

  abstract buildOHLCRequest(asset: Asset, windowStart: Date, windowEnd: Date): HttpRequest;
  abstract parseOHLC(asset: Asset, payload: unknown, windowStart: Date, windowEnd: Date): RawCandle[];
  abstract buildSpotRequest(asset: Asset): HttpRequest;
  abstract parseSpot(asset: Asset, payload: unknown): RawSpotPrice;

  protected requireCoinId(asset: Asset): string {
    const coinId = this.resolveCoinId(asset);
    if (!coinId) {
      throw new Error(`Asset '${asset.assetId}' has no ${this.providerId} identifier`);
    }
    return coinId;
  }

  protected get(path: string, params: Record<string, string>): HttpRequest {
    return {
      method: 'GET',
      endpoint: this.apiEndpoint,
      path,
      params,
      timeoutMs: this.timeoutMs
    };
  }

  /**
   * Convert a payload value to a number; anything unusable becomes NaN so
   * the fetcher rejects the candle
   */
  protected toNumber(value: number | string | null | undefined): number {
    if (typeof value === 'number') {
      return value;
    }
    if (typeof value === 'string' && value.trim().length > 0) {
      return Number(value);
    }
    return NaN;
  }

  protected toTimestampMs(value: string | number): number {
    return typeof value === 'number' ? value : Date.parse(value);
  }

  protected malformed(message: string): MalformedResponseError {
    return new MalformedResponseError(message, this.providerId);
  }
}
