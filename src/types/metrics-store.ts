/**
 * Metrics Store interface
 *
 * Rows are unique per (assetId, timestamp) in each table; writes are upserts.
 */

import { SpotSample } from './market-data';
import { VolatilityRecord } from './volatility';

export interface MetricsStore {
  upsertVolatility(record: VolatilityRecord): Promise<void>;
  upsertSpot(sample: SpotSample): Promise<void>;

  getVolatility(assetId: string, periodStart: string): Promise<VolatilityRecord | null>;
  listVolatility(assetId: string, from: string, to: string): Promise<VolatilityRecord[]>;
  listSpot(assetId: string, from: string, to: string): Promise<SpotSample[]>;

  checkConnection(): Promise<void>;
}
