/**
 * CoinMarketCap Price Adapter
 *
 * - Spot price from GET /v2/cryptocurrency/quotes/latest
 * - Hourly OHLC from GET /v2/cryptocurrency/ohlcv/historical
 *
 * v2 endpoints key `data` by symbol and return an array of every coin
 * sharing that symbol; the first entry is the highest ranked one.
 */

import { ValidateFunction } from 'ajv';
import { Asset } from '../../types/asset';
import { RawCandle, RawSpotPrice } from '../../types/market-data';
import { HttpRequest } from '../../types/price-provider';
import { payloadValidator } from '../../services/payload-validator';
import {
  CoinMarketCapOHLCVEntryOutput,
  CoinMarketCapOHLCVEntrySchema,
  CoinMarketCapQuoteEntryOutput,
  CoinMarketCapQuoteEntrySchema
} from '../../schemas/coinmarketcap';
import { BasePriceAdapter, PriceAdapterConfig } from './base-price-adapter';
import { isRecord } from '../../utils/errors';

export const COINMARKETCAP_DEFAULT_ENDPOINT = 'https://pro-api.coinmarketcap.com';

const validateQuoteEntry: ValidateFunction<CoinMarketCapQuoteEntryOutput> =
  payloadValidator.compile(CoinMarketCapQuoteEntrySchema);
const validateOHLCVEntry: ValidateFunction<CoinMarketCapOHLCVEntryOutput> =
  payloadValidator.compile(CoinMarketCapOHLCVEntrySchema);

export class CoinMarketCapAdapter extends BasePriceAdapter {
  readonly providerId = 'COINMARKETCAP' as const;

  constructor(config: PriceAdapterConfig = {}) {
    super(config, COINMARKETCAP_DEFAULT_ENDPOINT);
  }

  authHeaders(apiKey: string): Record<string, string> {
    return { 'X-CMC_PRO_API_KEY': apiKey };
  }

  buildOHLCRequest(asset: Asset, windowStart: Date, windowEnd: Date): HttpRequest {
    return this.get('/v2/cryptocurrency/ohlcv/historical', {
      symbol: this.requireCoinId(asset),
      time_start: windowStart.toISOString(),
      time_end: windowEnd.toISOString(),
      time_period: 'hourly',
      interval: 'hourly',
      convert: 'USD'
    });
  }

  parseOHLC(asset: Asset, payload: unknown): RawCandle[] {
    const entry = payloadValidator.validate(
      validateOHLCVEntry,
      this.firstMatch(asset, payload),
      this.providerId,
      `OHLC payload for ${asset.assetId}`
    );

    return entry.quotes.map((q) => ({
      timestampMs: this.toTimestampMs(q.time_open),
      open: q.quote.USD.open,
      high: q.quote.USD.high,
      low: q.quote.USD.low,
      close: q.quote.USD.close
    }));
  }

  buildSpotRequest(asset: Asset): HttpRequest {
    return this.get('/v2/cryptocurrency/quotes/latest', {
      symbol: this.requireCoinId(asset),
      convert: 'USD'
    });
  }

  parseSpot(asset: Asset, payload: unknown): RawSpotPrice {
    const entry = payloadValidator.validate(
      validateQuoteEntry,
      this.firstMatch(asset, payload),
      this.providerId,
      `Spot payload for ${asset.assetId}`
    );

    const lastUpdated = entry.quote.USD.last_updated;
    const observedAtMs = typeof lastUpdated === 'string' ? this.toTimestampMs(lastUpdated) : NaN;

    return {
      price: entry.quote.USD.price,
      observedAtMs: isNaN(observedAtMs) ? undefined : observedAtMs
    };
  }

  /**
   * data[SYMBOL][0], failing closed when any level is missing
   */
  private firstMatch(asset: Asset, payload: unknown): unknown {
    const symbol = this.requireCoinId(asset);

    if (!isRecord(payload) || !isRecord(payload.data)) {
      throw this.malformed(`Payload for ${asset.assetId} has no data object`);
    }

    const matches = payload.data[symbol];
    if (!Array.isArray(matches) || matches.length === 0) {
      throw this.malformed(`Payload for ${asset.assetId} has no entry for '${symbol}'`);
    }

    return matches[0];
  }
}
