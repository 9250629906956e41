/**
 * Collector Factory - wires adapters, clients, fetchers and the scheduler
 * from a validated configuration
 */

import { createPriceAdapter } from '../adapters/price';
import { RateLimitedClient } from '../adapters/http/rate-limited-client';
import { CollectorConfig, ConfigurationError } from '../config/collector-config';
import { createDynamoClients } from '../db/client';
import { createMetricsRepository } from '../repositories/metrics';
import { MetricsStore } from '../types/metrics-store';
import { PriceProviderAdapter, ProviderId } from '../types/price-provider';
import { Clock, systemClock } from '../utils/clock';
import { CollectorScheduler } from './collector-scheduler';
import { OHLCFetcher } from './ohlc-fetcher';
import { RateLimiterRegistry } from './rate-limiter';
import { SpotPriceFetcher } from './spot-price-fetcher';
import { VolatilityEngine } from './volatility';

export interface CollectorOverrides {
  store?: MetricsStore;
  clock?: Clock;
  random?: () => number;
}

export interface Collector {
  scheduler: CollectorScheduler;
  store: MetricsStore;
  rateLimiters: RateLimiterRegistry;
}

export function createCollector(config: CollectorConfig, overrides: CollectorOverrides = {}): Collector {
  const clock = overrides.clock ?? systemClock;
  const random = overrides.random ?? Math.random;
  const store =
    overrides.store ??
    createMetricsRepository(createDynamoClients({ endpoint: config.metricsDbUrl, region: config.awsRegion }));

  // One limiter per provider, shared when both pipelines use the same one
  const rateLimiters = new RateLimiterRegistry(config.rateLimit, clock);

  const clientFor = (adapter: PriceProviderAdapter): RateLimitedClient => {
    const apiKey = config.apiKeys[adapter.providerId];
    if (!apiKey) {
      throw new ConfigurationError([`No API key configured for ${adapter.providerId}`]);
    }

    return new RateLimitedClient({
      providerId: adapter.providerId,
      limiter: rateLimiters.forProvider(adapter.providerId),
      defaultHeaders: adapter.authHeaders(apiKey),
      timeoutMs: config.httpTimeoutMs,
      retry: config.retry,
      clock,
      random
    });
  };

  const adapterFor = (providerId: ProviderId): PriceProviderAdapter =>
    createPriceAdapter(providerId, {
      apiEndpoint: config.apiEndpoints[providerId],
      timeoutMs: config.httpTimeoutMs
    });

  const ohlcAdapter = adapterFor(config.priceProvider);
  const spotAdapter = adapterFor(config.spotPriceProvider);

  const scheduler = new CollectorScheduler({
    assets: config.assets,
    ohlcFetcher: new OHLCFetcher(clientFor(ohlcAdapter), ohlcAdapter),
    spotFetcher: new SpotPriceFetcher(clientFor(spotAdapter), spotAdapter, clock),
    engine: VolatilityEngine,
    store,
    config: config.schedule,
    clock,
    random
  });

  return { scheduler, store, rateLimiters };
}
