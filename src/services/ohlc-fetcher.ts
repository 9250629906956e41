/**
 * OHLC Fetcher - retrieves and validates candle windows for an asset
 *
 * Candles that break the OHLC invariant (0 < low <= open, close <= high) or
 * fall outside the requested window are dropped one by one and reported as
 * data-quality events. Only a window with no valid candle left fails.
 */

import { RateLimitedClient } from '../adapters/http/rate-limited-client';
import { Asset } from '../types/asset';
import { Candle, RawCandle } from '../types/market-data';
import { PriceProviderAdapter } from '../types/price-provider';
import { logCollectorEvent } from '../utils/log';
import { MalformedResponseError } from './payload-validator';

export type CandleRejectionReason = 'NON_FINITE' | 'NON_POSITIVE' | 'OHLC_INCONSISTENT' | 'OUTSIDE_WINDOW';

/**
 * Check a raw candle against the OHLC invariant
 *
 * @returns The reason the candle is unusable, or null when it is valid
 */
export function checkRawCandle(raw: RawCandle): Exclude<CandleRejectionReason, 'OUTSIDE_WINDOW'> | null {
  const values = [raw.timestampMs, raw.open, raw.high, raw.low, raw.close];
  if (values.some((v) => !Number.isFinite(v))) {
    return 'NON_FINITE';
  }
  if (raw.open <= 0 || raw.high <= 0 || raw.low <= 0 || raw.close <= 0) {
    return 'NON_POSITIVE';
  }
  if (
    raw.low > raw.high ||
    raw.open < raw.low || raw.open > raw.high ||
    raw.close < raw.low || raw.close > raw.high
  ) {
    return 'OHLC_INCONSISTENT';
  }
  return null;
}

export class OHLCFetcher {
  constructor(
    private readonly client: RateLimitedClient,
    private readonly adapter: PriceProviderAdapter
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
   * Fetch candles with bucket start in [windowStart, windowEnd), ascending,
   * one per bucket (a repeated bucket keeps its last occurrence)
   *
   * @throws MalformedResponseError when the payload is unusable or no valid candle remains
   */
  async fetchCandles(
    asset: Asset,
    windowStart: Date,
    windowEnd: Date,
    signal?: AbortSignal
  ): Promise<Candle[]> {
    const request = this.adapter.buildOHLCRequest(asset, windowStart, windowEnd);
    const response = await this.client.fetch(request, signal);
    const rawCandles = this.adapter.parseOHLC(asset, response.data, windowStart, windowEnd);

    const startMs = windowStart.getTime();
    const endMs = windowEnd.getTime();
    const byBucket = new Map<number, Candle>();
    const rejected: Record<CandleRejectionReason, number> = {
      NON_FINITE: 0,
      NON_POSITIVE: 0,
      OHLC_INCONSISTENT: 0,
      OUTSIDE_WINDOW: 0
    };

    for (const raw of rawCandles) {
      const reason = checkRawCandle(raw);
      if (reason) {
        rejected[reason]++;
        logCollectorEvent('WARN', 'DATA_QUALITY', {
          providerId: this.adapter.providerId,
          assetId: asset.assetId,
          reason,
          candle: raw
        });
        continue;
      }

      if (raw.timestampMs < startMs || raw.timestampMs >= endMs) {
        rejected.OUTSIDE_WINDOW++;
        continue;
      }

      byBucket.set(raw.timestampMs, {
        assetId: asset.assetId,
        bucketStart: new Date(raw.timestampMs).toISOString(),
        open: raw.open,
        high: raw.high,
        low: raw.low,
        close: raw.close
      });
    }

    if (byBucket.size === 0) {
      throw new MalformedResponseError(
        `No valid candles for ${asset.assetId} between ${windowStart.toISOString()} and ${windowEnd.toISOString()} ` +
          `(received ${rawCandles.length}, rejected ${JSON.stringify(rejected)})`,
        this.adapter.providerId
      );
    }

    return Array.from(byBucket.entries())
      .sort(([a], [b]) => a - b)
      .map(([, candle]) => candle);
  }
}
