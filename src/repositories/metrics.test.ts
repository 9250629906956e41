import { createMetricsRepository } from './metrics';
import { createDynamoClients } from '../db/client';
import { TableNames } from '../db/tables';
import { PersistenceError } from '../db/access';
import { VolatilityRecord } from '../types/volatility';
import { SpotSample } from '../types/market-data';
import { failNext, itemCount, resetTables } from '../test/fake-dynamodb';

// In-process DynamoDB keyed like the real tables
jest.mock('../db/client', () => jest.requireActual('../test/fake-dynamodb'));

const repository = createMetricsRepository(createDynamoClients());

function volatilityRecord(overrides: Partial<VolatilityRecord> = {}): VolatilityRecord {
  return {
    assetId: 'usdc',
    symbol: 'USDC',
    periodStart: '2024-01-01T00:00:00.000Z',
    periodEnd: '2024-01-02T00:00:00.000Z',
    volatility: 0.0012,
    mse: 0.000004,
    candleCount: 24,
    open: 1.0001,
    high: 1.0012,
    low: 0.9991,
    close: 0.9999,
    kurtosis: 1.5,
    providerId: 'COINGECKO',
    computedAt: '2024-01-02T00:00:04.000Z',
    ...overrides
  };
}

function spotSample(observedAt: string, price = 1.0): SpotSample {
  return { assetId: 'usdc', observedAt, price, providerId: 'COINMARKETCAP' };
}

describe('MetricsRepository', () => {
  beforeEach(() => {
    resetTables();
  });

  describe('upsertVolatility', () => {
    it('stores a record readable by its key', async () => {
      const record = volatilityRecord();

      await repository.upsertVolatility(record);

      await expect(repository.getVolatility('usdc', record.periodStart)).resolves.toEqual(record);
    });

    it('keeps one row per (asset, period) holding the second write', async () => {
      await repository.upsertVolatility(volatilityRecord({ volatility: 0.001 }));
      await repository.upsertVolatility(volatilityRecord({ volatility: 0.002, candleCount: 23 }));

      expect(itemCount(TableNames.VOLATILITY)).toBe(1);
      const stored = await repository.getVolatility('usdc', '2024-01-01T00:00:00.000Z');
      expect(stored?.volatility).toBe(0.002);
      expect(stored?.candleCount).toBe(23);
    });

    it('keeps a null kurtosis', async () => {
      await repository.upsertVolatility(volatilityRecord({ kurtosis: null }));

      const stored = await repository.getVolatility('usdc', '2024-01-01T00:00:00.000Z');
      expect(stored?.kurtosis).toBeNull();
    });

    it('wraps store failures in PersistenceError', async () => {
      failNext('put', new Error('ProvisionedThroughputExceededException'));

      const error = await repository.upsertVolatility(volatilityRecord()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PersistenceError);
      expect(error).toMatchObject({ kind: 'PERSISTENCE', operation: 'PUT', tableName: TableNames.VOLATILITY });
    });
  });

  describe('getVolatility', () => {
    it('returns null for an unknown period', async () => {
      await expect(repository.getVolatility('usdc', '2030-01-01T00:00:00.000Z')).resolves.toBeNull();
    });
  });

  describe('listVolatility', () => {
    it('returns records of one asset within the range, oldest first, across pages', async () => {
      for (const day of ['03', '01', '02', '04']) {
        await repository.upsertVolatility(volatilityRecord({ periodStart: `2024-01-${day}T00:00:00.000Z` }));
      }
      await repository.upsertVolatility(volatilityRecord({ assetId: 'dai', symbol: 'DAI' }));

      const records = await repository.listVolatility(
        'usdc',
        '2024-01-01T00:00:00.000Z',
        '2024-01-03T00:00:00.000Z'
      );

      expect(records.map((r) => r.periodStart)).toEqual([
        '2024-01-01T00:00:00.000Z',
        '2024-01-02T00:00:00.000Z',
        '2024-01-03T00:00:00.000Z'
      ]);
    });
  });

  describe('spot samples', () => {
    it('upserts on (asset, observedAt) and lists a range', async () => {
      await repository.upsertSpot(spotSample('2024-01-01T12:00:00.000Z', 0.9998));
      await repository.upsertSpot(spotSample('2024-01-01T12:00:00.000Z', 0.9999));
      await repository.upsertSpot(spotSample('2024-01-01T12:05:00.000Z', 1.0001));

      const samples = await repository.listSpot(
        'usdc',
        '2024-01-01T00:00:00.000Z',
        '2024-01-02T00:00:00.000Z'
      );

      expect(itemCount(TableNames.SPOT_PRICES)).toBe(2);
      expect(samples).toEqual([
        spotSample('2024-01-01T12:00:00.000Z', 0.9999),
        spotSample('2024-01-01T12:05:00.000Z', 1.0001)
      ]);
    });

    it('wraps query failures in PersistenceError', async () => {
      failNext('query', new Error('socket hang up'));

      await expect(
        repository.listSpot('usdc', '2024-01-01T00:00:00.000Z', '2024-01-02T00:00:00.000Z')
      ).rejects.toThrow(`QUERY on ${TableNames.SPOT_PRICES} failed: socket hang up`);
    });
  });

  describe('checkConnection', () => {
    it('resolves when both tables are reachable', async () => {
      await expect(repository.checkConnection()).resolves.toBeUndefined();
    });

    it('fails with PersistenceError when a table cannot be described', async () => {
      failNext('describeTable', new Error('connect ECONNREFUSED 127.0.0.1:8000'));

      await expect(repository.checkConnection()).rejects.toBeInstanceOf(PersistenceError);
    });
  });
});
