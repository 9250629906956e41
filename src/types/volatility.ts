/**
 * Volatility Types
 */

export interface VolatilityRecord {
  assetId: string;
  symbol: string;
  periodStart: string;
  periodEnd: string;
  volatility: number;          // Rogers-Satchell, >= 0
  mse: number;                 // mean squared error of closes against the peg, >= 0
  candleCount: number;
  open: number;                // first open of the window
  high: number;                // max high of the window
  low: number;                 // min low of the window
  close: number;               // last close of the window
  kurtosis: number | null;     // excess kurtosis of per-candle volatility
  providerId: string;
  computedAt: string;
}

export interface ComputeVolatilityOptions {
  periodStart?: string;
  periodEnd?: string;
  providerId?: string;
  computedAt?: string;
}
