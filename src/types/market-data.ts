/**
 * Canonical market data records produced by the fetchers
 */

// One OHLC bucket. Invariant: 0 < low <= open, close <= high
export interface Candle {
  assetId: string;
  bucketStart: string;
  open: number;
  high: number;
  low: number;
  close: number;
}

export interface SpotSample {
  assetId: string;
  observedAt: string;
  price: number;
  providerId: string;
}

/**
 * A candle as an adapter reads it from a provider payload, before the
 * fetcher validates it
 */
export interface RawCandle {
  /** Start of the candle's bucket */
  timestampMs: number;
  open: number;
  high: number;
  low: number;
  close: number;
}

export interface RawSpotPrice {
  price: number;
  observedAtMs?: number;
}
