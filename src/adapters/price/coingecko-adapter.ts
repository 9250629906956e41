/**
 * CoinGecko Price Adapter
 *
 * - OHLC from GET /coins/{id}/ohlc, whose `days` parameter only accepts a
 *   fixed set of look-back lengths; candle size follows from it
 *   (1-2 days: 30 minutes, 3-30 days: 4 hours, beyond: 4 days). Each row is
 *   stamped with its close time and is shifted back one candle on parsing.
 * - Spot price from GET /simple/price
 */

import { ValidateFunction } from 'ajv';
import { Asset } from '../../types/asset';
import { RawCandle, RawSpotPrice } from '../../types/market-data';
import { HttpRequest } from '../../types/price-provider';
import { payloadValidator } from '../../services/payload-validator';
import {
  CoinGeckoOHLCOutput,
  CoinGeckoOHLCSchema,
  CoinGeckoSimplePriceEntryOutput,
  CoinGeckoSimplePriceEntrySchema
} from '../../schemas/coingecko';
import { BasePriceAdapter, PriceAdapterConfig } from './base-price-adapter';
import { isRecord } from '../../utils/errors';

export const COINGECKO_DEFAULT_ENDPOINT = 'https://pro-api.coingecko.com/api/v3';
export const COINGECKO_PUBLIC_ENDPOINT = 'https://api.coingecko.com/api/v3';

/**
 * Look-back lengths (in days) the OHLC endpoint accepts
 */
export const COINGECKO_OHLC_DAYS = [1, 7, 14, 30, 90, 180, 365] as const;

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

const validateOHLC: ValidateFunction<CoinGeckoOHLCOutput> =
  payloadValidator.compile(CoinGeckoOHLCSchema);
const validateSimplePrice: ValidateFunction<CoinGeckoSimplePriceEntryOutput> =
  payloadValidator.compile(CoinGeckoSimplePriceEntrySchema);

export class CoinGeckoAdapter extends BasePriceAdapter {
  readonly providerId = 'COINGECKO' as const;

  constructor(config: PriceAdapterConfig = {}) {
    super(config, COINGECKO_DEFAULT_ENDPOINT);
  }

  /**
   * Pro keys only work against the pro host; any other endpoint (the public
   * API or a proxy in front of it) takes a demo key.
   */
  authHeaders(apiKey: string): Record<string, string> {
    const header = isProEndpoint(this.apiEndpoint) ? 'x-cg-pro-api-key' : 'x-cg-demo-api-key';
    return { [header]: apiKey };
  }

  buildOHLCRequest(asset: Asset, windowStart: Date, windowEnd: Date): HttpRequest {
    const coinId = this.requireCoinId(asset);
    const days = ohlcDaysFor(windowEnd.getTime() - windowStart.getTime());

    return this.get(`/coins/${encodeURIComponent(coinId)}/ohlc`, {
      vs_currency: 'usd',
      days: days.toString()
    });
  }

  parseOHLC(asset: Asset, payload: unknown, windowStart: Date, windowEnd: Date): RawCandle[] {
    const rows = payloadValidator.validate(
      validateOHLC,
      payload,
      this.providerId,
      `OHLC payload for ${asset.assetId}`
    );
    const candleMs = ohlcCandleMsFor(ohlcDaysFor(windowEnd.getTime() - windowStart.getTime()));

    return rows.map(([timestamp, open, high, low, close]) => ({
      timestampMs: this.toNumber(timestamp) - candleMs,
      open: this.toNumber(open),
      high: this.toNumber(high),
      low: this.toNumber(low),
      close: this.toNumber(close)
    }));
  }

  buildSpotRequest(asset: Asset): HttpRequest {
    return this.get('/simple/price', {
      ids: this.requireCoinId(asset),
      vs_currencies: 'usd',
      include_last_updated_at: 'true'
    });
  }

  parseSpot(asset: Asset, payload: unknown): RawSpotPrice {
    const coinId = this.requireCoinId(asset);

    if (!isRecord(payload) || !(coinId in payload)) {
      throw this.malformed(`Spot payload for ${asset.assetId} has no entry for '${coinId}'`);
    }

    const entry = payloadValidator.validate(
      validateSimplePrice,
      payload[coinId],
      this.providerId,
      `Spot payload for ${asset.assetId}`
    );

    return {
      price: entry.usd,
      observedAtMs: typeof entry.last_updated_at === 'number' ? entry.last_updated_at * 1000 : undefined
    };
  }
}

/**
 * Smallest accepted `days` value that covers the requested span
 */
export function ohlcDaysFor(spanMs: number): number {
  const daysNeeded = Math.max(1, Math.ceil(spanMs / DAY_MS));
  const match = COINGECKO_OHLC_DAYS.find((days) => days >= daysNeeded);
  return match ?? COINGECKO_OHLC_DAYS[COINGECKO_OHLC_DAYS.length - 1];
}

/**
 * Candle length the OHLC endpoint uses for a `days` value
 */
export function ohlcCandleMsFor(days: number): number {
  if (days <= 2) {
    return 30 * 60 * 1000;
  }
  if (days <= 30) {
    return 4 * HOUR_MS;
  }
  return 4 * DAY_MS;
}

function isProEndpoint(endpoint: string): boolean {
  try {
    return new URL(endpoint).hostname.startsWith('pro-api.');
  } catch {
    return false;
  }
}
