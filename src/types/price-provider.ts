/**
 * Price Provider Adapter interface
 *
 * One adapter per upstream API. Adapters only build requests and read
 * payloads; transport, throttling and retry belong to the RateLimitedClient.
 */

import { Asset } from './asset';
import { RawCandle, RawSpotPrice } from './market-data';

export type ProviderId = 'COINGECKO' | 'COINMARKETCAP';

export const PROVIDER_IDS: readonly ProviderId[] = ['COINGECKO', 'COINMARKETCAP'];

export type HttpMethod = 'GET';

export interface HttpRequest {
  method: HttpMethod;
  endpoint: string;
  path: string;
  params?: Record<string, string>;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface HttpResponse<T> {
  data: T;
  status: number;
  headers: Record<string, string>;
  latencyMs: number;
  attempts: number;
}

export interface PriceProviderAdapter {
  readonly providerId: ProviderId;

  /** The provider's identifier for the asset, or undefined when unmapped */
  resolveCoinId(asset: Asset): string | undefined;

  /** Headers carrying the API key */
  authHeaders(apiKey: string): Record<string, string>;

  buildOHLCRequest(asset: Asset, windowStart: Date, windowEnd: Date): HttpRequest;
  /** The window is the one the request was built for */
  parseOHLC(asset: Asset, payload: unknown, windowStart: Date, windowEnd: Date): RawCandle[];

  buildSpotRequest(asset: Asset): HttpRequest;
  parseSpot(asset: Asset, payload: unknown): RawSpotPrice;
}
