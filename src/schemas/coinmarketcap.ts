/**
 * JSON Schemas for CoinMarketCap v2 payloads.
 * Both endpoints key `data` by symbol and hold an array of matching coins;
 * the first match is the one the collector reads.
 */

import { JSONSchemaType } from 'ajv';

export interface CoinMarketCapUsdQuoteOutput {
  price: number;
  last_updated?: string;
}

/**
 * One coin entry of GET /v2/cryptocurrency/quotes/latest
 */
export interface CoinMarketCapQuoteEntryOutput {
  symbol: string;
  quote: {
    USD: CoinMarketCapUsdQuoteOutput;
  };
}

export const CoinMarketCapQuoteEntrySchema: JSONSchemaType<CoinMarketCapQuoteEntryOutput> = {
  type: 'object',
  required: ['symbol', 'quote'],
  properties: {
    symbol: { type: 'string' },
    quote: {
      type: 'object',
      required: ['USD'],
      properties: {
        USD: {
          type: 'object',
          required: ['price'],
          properties: {
            price: { type: 'number' },
            last_updated: { type: 'string', nullable: true }
          }
        }
      }
    }
  }
};

export interface CoinMarketCapOHLCVQuoteOutput {
  time_open: string;
  quote: {
    USD: {
      open: number;
      high: number;
      low: number;
      close: number;
    };
  };
}

/**
 * One coin entry of GET /v2/cryptocurrency/ohlcv/historical
 */
export interface CoinMarketCapOHLCVEntryOutput {
  symbol: string;
  quotes: CoinMarketCapOHLCVQuoteOutput[];
}

export const CoinMarketCapOHLCVEntrySchema: JSONSchemaType<CoinMarketCapOHLCVEntryOutput> = {
  type: 'object',
  required: ['symbol', 'quotes'],
  properties: {
    symbol: { type: 'string' },
    quotes: {
      type: 'array',
      items: {
        type: 'object',
        required: ['time_open', 'quote'],
        properties: {
          time_open: { type: 'string' },
          quote: {
            type: 'object',
            required: ['USD'],
            properties: {
              USD: {
                type: 'object',
                required: ['open', 'high', 'low', 'close'],
                properties: {
                  open: { type: 'number' },
                  high: { type: 'number' },
                  low: { type: 'number' },
                  close: { type: 'number' }
                }
              }
            }
          }
        }
      }
    }
  }
};
