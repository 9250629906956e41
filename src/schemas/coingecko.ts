/**
 * JSON Schemas for CoinGecko payloads.
 * Only the fields the collector reads are required; anything else is ignored.
 */

import { JSONSchemaType } from 'ajv';

/**
 * GET /coins/{id}/ohlc
 * [[timestampMs, open, high, low, close], ...]
 * A null inside a row invalidates that row only.
 */
export type CoinGeckoOHLCOutput = (number | null)[][];

export const CoinGeckoOHLCSchema: JSONSchemaType<CoinGeckoOHLCOutput> = {
  type: 'array',
  items: {
    type: 'array',
    items: { type: 'number', nullable: true },
    minItems: 5
  }
};

/**
 * One coin entry of GET /simple/price
 */
export interface CoinGeckoSimplePriceEntryOutput {
  usd: number;
  last_updated_at?: number;
}

export const CoinGeckoSimplePriceEntrySchema: JSONSchemaType<CoinGeckoSimplePriceEntryOutput> = {
  type: 'object',
  required: ['usd'],
  properties: {
    usd: { type: 'number' },
    last_updated_at: { type: 'number', nullable: true }
  }
};
