import { OHLCFetcher, checkRawCandle } from './ohlc-fetcher';
import { MalformedResponseError } from './payload-validator';
import { TokenBucketRateLimiter } from './rate-limiter';
import { RateLimitedClient } from '../adapters/http/rate-limited-client';
import { CoinGeckoAdapter } from '../adapters/price/coingecko-adapter';
import { FakeClock } from '../test/fake-clock';
import { testAsset } from '../test/generators';

const HOUR_MS = 60 * 60 * 1000;
// A 4 hour window is served as 30 minute candles stamped with their close time
const CANDLE_MS = 30 * 60 * 1000;
const T0 = Date.UTC(2024, 0, 1, 0, 0, 0);
const WINDOW_START = new Date(T0);
const WINDOW_END = new Date(T0 + 4 * HOUR_MS);

function createFetcher(): OHLCFetcher {
  const clock = new FakeClock();
  const client = new RateLimitedClient({
    providerId: 'COINGECKO',
    limiter: new TokenBucketRateLimiter('COINGECKO', { minIntervalMs: 1, burst: 10 }, clock),
    retry: { maxAttempts: 1 },
    clock
  });
  return new OHLCFetcher(client, new CoinGeckoAdapter({ apiEndpoint: 'https://api.test' }));
}

describe('checkRawCandle', () => {
  const valid = { timestampMs: T0, open: 1, high: 1.002, low: 0.998, close: 1.001 };

  it('accepts a consistent candle', () => {
    expect(checkRawCandle(valid)).toBeNull();
  });

  it('names the broken rule', () => {
    expect(checkRawCandle({ ...valid, close: NaN })).toBe('NON_FINITE');
    expect(checkRawCandle({ ...valid, low: -0.5 })).toBe('NON_POSITIVE');
    expect(checkRawCandle({ ...valid, high: 0.997 })).toBe('OHLC_INCONSISTENT');
    expect(checkRawCandle({ ...valid, open: 1.003 })).toBe('OHLC_INCONSISTENT');
    expect(checkRawCandle({ ...valid, close: 0.997 })).toBe('OHLC_INCONSISTENT');
  });
});

describe('OHLCFetcher', () => {
  let warnSpy: jest.SpyInstance;
  let fetchSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function respondWith(rows: unknown): void {
    fetchSpy.mockImplementation(async () => new Response(JSON.stringify(rows), { status: 200 }));
  }

  it('returns valid in-window candles ascending with one candle per bucket', async () => {
    respondWith([
      [T0 + 2 * HOUR_MS + CANDLE_MS, 1.0, 1.001, 0.999, 1.0],
      [T0 + CANDLE_MS, 1.0, 1.002, 0.998, 1.001],
      [T0 + HOUR_MS + CANDLE_MS, 1.0, 0.999, 1.001, 1.0],
      [T0 - HOUR_MS + CANDLE_MS, 1.0, 1.001, 0.999, 1.0],
      [T0 + 4 * HOUR_MS + CANDLE_MS, 1.0, 1.001, 0.999, 1.0],
      [T0 + CANDLE_MS, 1.0, 1.002, 0.998, 0.999]
    ]);

    const candles = await createFetcher().fetchCandles(testAsset(), WINDOW_START, WINDOW_END);

    expect(candles).toEqual([
      { assetId: 'usdc', bucketStart: '2024-01-01T00:00:00.000Z', open: 1.0, high: 1.002, low: 0.998, close: 0.999 },
      { assetId: 'usdc', bucketStart: '2024-01-01T02:00:00.000Z', open: 1.0, high: 1.001, low: 0.999, close: 1.0 }
    ]);
  });

  it('keeps the candle closing at the window end and drops the one closing at its start', async () => {
    respondWith([
      [T0, 1.0, 1.001, 0.999, 1.0],
      [T0 + CANDLE_MS, 1.0, 1.002, 0.998, 1.001],
      [T0 + 4 * HOUR_MS, 1.0, 1.003, 0.997, 1.002]
    ]);

    const candles = await createFetcher().fetchCandles(testAsset(), WINDOW_START, WINDOW_END);

    expect(candles.map((c) => c.bucketStart)).toEqual(['2024-01-01T00:00:00.000Z', '2024-01-01T03:30:00.000Z']);
  });

  it('logs each rejected candle as a data-quality event', async () => {
    respondWith([
      [T0 + CANDLE_MS, 1.0, 1.002, 0.998, 1.001],
      [T0 + HOUR_MS + CANDLE_MS, 1.0, 0.999, 1.001, 1.0],
      [T0 + 2 * HOUR_MS + CANDLE_MS, 0, 1.001, 0.999, 1.0],
      [T0 + 3 * HOUR_MS + CANDLE_MS, null, 1.001, 0.999, 1.0]
    ]);

    await createFetcher().fetchCandles(testAsset(), WINDOW_START, WINDOW_END);

    const reasons = warnSpy.mock.calls
      .map((args: unknown[]) => JSON.parse(String(args[0])))
      .filter((entry: { event: string }) => entry.event === 'DATA_QUALITY')
      .map((entry: { reason: string }) => entry.reason);
    expect(reasons).toEqual(['OHLC_INCONSISTENT', 'NON_POSITIVE', 'NON_FINITE']);
  });

  it('fails when no valid candle is left in the window', async () => {
    respondWith([[T0 + HOUR_MS + CANDLE_MS, 1.0, 0.999, 1.001, 1.0]]);

    const error = await createFetcher()
      .fetchCandles(testAsset(), WINDOW_START, WINDOW_END)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MalformedResponseError);
    expect(error instanceof Error && error.message).toMatch(/^No valid candles for usdc between /);
  });

  it('fails closed on a payload of the wrong shape', async () => {
    respondWith({ error: 'coin not found' });

    await expect(createFetcher().fetchCandles(testAsset(), WINDOW_START, WINDOW_END)).rejects.toBeInstanceOf(
      MalformedResponseError
    );
  });

  it('reports whether an asset is mapped for the provider', () => {
    const fetcher = createFetcher();

    expect(fetcher.supports(testAsset())).toBe(true);
    expect(fetcher.supports(testAsset({ providerIds: { COINMARKETCAP: 'USDC' } }))).toBe(false);
  });
});
