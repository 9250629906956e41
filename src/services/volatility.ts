/**
 * Volatility Engine - window statistics for stablecoin candles
 *
 * Rogers-Satchell per candle:
 *   RS_i = ln(H/C)·ln(H/O) + ln(L/C)·ln(L/O)
 * Window volatility:
 *   sqrt((1/N) · Σ RS_i)
 * Deviation from peg:
 *   MSE = (1/N) · Σ (C_i − peg)²
 *
 * Pure and synchronous: the same candles always give the same numbers.
 */

import { Asset } from '../types/asset';
import { Candle } from '../types/market-data';
import { ComputeVolatilityOptions, VolatilityRecord } from '../types/volatility';
import { CollectorError } from '../utils/errors';

export class InsufficientDataError extends CollectorError {
  readonly kind = 'INSUFFICIENT_DATA' as const;

  constructor(assetId: string) {
    super(`No candles to compute volatility for ${assetId}`);
  }
}

export const VolatilityEngine = {
  /**
   * Rogers-Satchell variance term of one candle
   */
  rogersSatchellTerm(candle: Pick<Candle, 'open' | 'high' | 'low' | 'close'>): number {
    const { open, high, low, close } = candle;
    return Math.log(high / close) * Math.log(high / open) + Math.log(low / close) * Math.log(low / open);
  },

  /**
   * Rogers-Satchell volatility of a window. A negative mean term (float
   * cancellation on flat candles) is clamped to zero.
   */
  calculateRogersSatchell(candles: Candle[]): number {
    if (candles.length === 0) {
      return 0;
    }

    const sum = candles.reduce((acc, candle) => acc + this.rogersSatchellTerm(candle), 0);
    return Math.sqrt(Math.max(0, sum / candles.length));
  },

  /**
   * Mean squared error of closing prices against the peg
   */
  calculateMSE(candles: Candle[], peg: number): number {
    if (candles.length === 0) {
      return 0;
    }

    const sum = candles.reduce((acc, candle) => acc + Math.pow(candle.close - peg, 2), 0);
    return sum / candles.length;
  },

  /**
   * Bias-corrected sample excess kurtosis (Fisher)
   *
   * @returns null below four values or when the values do not vary
   */
  calculateExcessKurtosis(values: number[]): number | null {
    const n = values.length;
    if (n < 4) {
      return null;
    }

    const mean = values.reduce((acc, v) => acc + v, 0) / n;
    let m2 = 0;
    let m4 = 0;
    for (const v of values) {
      const d = v - mean;
      m2 += d * d;
      m4 += d * d * d * d;
    }

    if (m2 === 0) {
      return null;
    }

    const numerator = n * (n + 1) * (n - 1) * m4;
    const denominator = (n - 2) * (n - 3) * m2 * m2;
    const adjustment = (3 * Math.pow(n - 1, 2)) / ((n - 2) * (n - 3));
    return numerator / denominator - adjustment;
  },

  /**
   * Summarize a candle window into one VolatilityRecord
   *
   * periodStart is options.periodStart when given (the scheduler passes the
   * window start), otherwise the first candle's bucket. periodEnd likewise
   * falls back to the last candle's bucket.
   *
   * @param candles - Window ordered by bucketStart ascending
   * @throws InsufficientDataError when candles is empty
   */
  computeVolatility(asset: Asset, candles: Candle[], options: ComputeVolatilityOptions = {}): VolatilityRecord {
    if (candles.length === 0) {
      throw new InsufficientDataError(asset.assetId);
    }

    const first = candles[0];
    const last = candles[candles.length - 1];
    const perCandleVolatility = candles.map((c) => Math.sqrt(Math.max(0, this.rogersSatchellTerm(c))));

    return {
      assetId: asset.assetId,
      symbol: asset.symbol,
      periodStart: options.periodStart ?? first.bucketStart,
      periodEnd: options.periodEnd ?? last.bucketStart,
      volatility: this.calculateRogersSatchell(candles),
      mse: this.calculateMSE(candles, asset.peg),
      candleCount: candles.length,
      open: first.open,
      high: Math.max(...candles.map((c) => c.high)),
      low: Math.min(...candles.map((c) => c.low)),
      close: last.close,
      kurtosis: this.calculateExcessKurtosis(perCandleVolatility),
      providerId: options.providerId ?? 'UNKNOWN',
      computedAt: options.computedAt ?? new Date().toISOString()
    };
  }
};
