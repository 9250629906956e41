/**
 * Collector configuration
 *
 * Read from environment variables once at startup. Every problem found is
 * collected and reported together in one ConfigurationError.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as cron from 'node-cron';
import { Asset } from '../types/asset';
import { PROVIDER_IDS, ProviderId } from '../types/price-provider';
import { TrackedAssetsFileSchema } from '../schemas/tracked-assets';
import { PayloadValidator } from '../services/payload-validator';
import { CollectorError, errorMessageOf } from '../utils/errors';

export class ConfigurationError extends CollectorError {
  readonly kind = 'CONFIGURATION' as const;

  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
  }
}

export interface ScheduleConfig {
  volatilityCron: string;
  spotCron: string;
  volatilityWindowHours: number;
  maxConcurrency: number;
  shuffleAssets: boolean;
  runOnStart: boolean;
}

export interface CollectorConfig {
  priceProvider: ProviderId;
  spotPriceProvider: ProviderId;
  apiKeys: Partial<Record<ProviderId, string>>;
  apiEndpoints: Partial<Record<ProviderId, string>>;
  /** DynamoDB endpoint the metrics store talks to */
  metricsDbUrl: string;
  awsRegion: string;
  assets: Asset[];
  schedule: ScheduleConfig;
  rateLimit: {
    minIntervalMs: number;
    burst: number;
  };
  httpTimeoutMs: number;
  retry: {
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
  };
}

const API_KEY_VARS: Record<ProviderId, string> = {
  COINGECKO: 'COINGECKO_API_KEY',
  COINMARKETCAP: 'COINMARKETCAP_API_KEY'
};

const API_URL_VARS: Record<ProviderId, string> = {
  COINGECKO: 'COINGECKO_API_URL',
  COINMARKETCAP: 'COINMARKETCAP_API_URL'
};

const assetsValidator = new PayloadValidator();
const validateAssetsFile = assetsValidator.compile(TrackedAssetsFileSchema);

/**
 * Build and validate the collector configuration
 *
 * @throws ConfigurationError listing every invalid or missing variable
 */
export function loadCollectorConfig(env: NodeJS.ProcessEnv = process.env): CollectorConfig {
  const problems: string[] = [];

  const priceProvider = readProvider(env, 'PRICE_PROVIDER', 'COINGECKO', problems);
  const spotPriceProvider = readProvider(env, 'SPOT_PRICE_PROVIDER', 'COINMARKETCAP', problems);

  const apiKeys: Partial<Record<ProviderId, string>> = {};
  const apiEndpoints: Partial<Record<ProviderId, string>> = {};
  for (const providerId of new Set([priceProvider, spotPriceProvider])) {
    const apiKey = env[API_KEY_VARS[providerId]];
    if (apiKey) {
      apiKeys[providerId] = apiKey;
    } else {
      problems.push(`${API_KEY_VARS[providerId]} is required when ${providerId} is a configured provider`);
    }

    const apiUrl = env[API_URL_VARS[providerId]];
    if (apiUrl) {
      apiEndpoints[providerId] = apiUrl;
    }
  }

  const metricsDbUrl = env.METRICS_DB_URL || '';
  if (!metricsDbUrl) {
    problems.push('METRICS_DB_URL is required');
  }

  const volatilityCron = readCron(env, 'VOLATILITY_CRON', '0 * * * *', problems);
  const spotCron = readCron(env, 'SPOT_CRON', '*/5 * * * *', problems);

  const assetsFile = env.TRACKED_ASSETS_FILE || path.join(process.cwd(), 'config', 'assets.json');
  let assets: Asset[] = [];
  try {
    assets = loadTrackedAssets(assetsFile);
  } catch (error) {
    problems.push(`TRACKED_ASSETS_FILE (${assetsFile}): ${errorMessageOf(error)}`);
  }

  const config: CollectorConfig = {
    priceProvider,
    spotPriceProvider,
    apiKeys,
    apiEndpoints,
    metricsDbUrl,
    awsRegion: env.AWS_REGION || 'us-east-1',
    assets,
    schedule: {
      volatilityCron,
      spotCron,
      volatilityWindowHours: readInteger(env, 'VOLATILITY_WINDOW_HOURS', 24, 1, problems),
      maxConcurrency: readInteger(env, 'MAX_CONCURRENCY', 2, 1, problems),
      shuffleAssets: readBoolean(env, 'SHUFFLE_ASSETS', true, problems),
      runOnStart: readBoolean(env, 'RUN_ON_START', true, problems)
    },
    rateLimit: {
      minIntervalMs: readInteger(env, 'PROVIDER_MIN_INTERVAL_MS', 1000, 1, problems),
      burst: readInteger(env, 'PROVIDER_BURST', 1, 1, problems)
    },
    httpTimeoutMs: readInteger(env, 'HTTP_TIMEOUT_MS', 10000, 1, problems),
    retry: {
      maxAttempts: readInteger(env, 'RETRY_MAX_ATTEMPTS', 4, 1, problems),
      initialDelayMs: readInteger(env, 'RETRY_INITIAL_DELAY_MS', 1000, 0, problems),
      maxDelayMs: readInteger(env, 'RETRY_MAX_DELAY_MS', 60000, 0, problems)
    }
  };

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  return config;
}

/**
 * Read and validate the tracked asset list. Asset ids must be unique.
 */
export function loadTrackedAssets(filePath: string): Asset[] {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  return parseTrackedAssets(parsed);
}

export function parseTrackedAssets(payload: unknown): Asset[] {
  const file = assetsValidator.validate(validateAssetsFile, payload, 'CONFIG', 'tracked assets');

  const seen = new Set<string>();
  for (const asset of file.assets) {
    if (seen.has(asset.assetId)) {
      throw new Error(`duplicate assetId '${asset.assetId}'`);
    }
    seen.add(asset.assetId);
  }

  return file.assets;
}

function readProvider(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: ProviderId,
  problems: string[]
): ProviderId {
  const raw = env[name];
  if (!raw) {
    return defaultValue;
  }
  const providerId = PROVIDER_IDS.find((id) => id === raw.toUpperCase());
  if (!providerId) {
    problems.push(`${name} must be one of ${PROVIDER_IDS.join(', ')} (got '${raw}')`);
    return defaultValue;
  }
  return providerId;
}

function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
  min: number,
  problems: string[]
): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return defaultValue;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    problems.push(`${name} must be an integer >= ${min} (got '${raw}')`);
    return defaultValue;
  }
  return value;
}

function readBoolean(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: boolean,
  problems: string[]
): boolean {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return defaultValue;
  }
  switch (raw.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      problems.push(`${name} must be true or false (got '${raw}')`);
      return defaultValue;
  }
}

function readCron(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: string,
  problems: string[]
): string {
  const expression = env[name] || defaultValue;
  if (!cron.validate(expression)) {
    problems.push(`${name} is not a valid cron expression (got '${expression}')`);
  }
  return expression;
}
