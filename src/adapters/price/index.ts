/**
 * Price Adapters - exports all price adapter implementations
 */

import { PriceProviderAdapter, ProviderId } from '../../types/price-provider';
import { PriceAdapterConfig } from './base-price-adapter';
import { CoinGeckoAdapter } from './coingecko-adapter';
import { CoinMarketCapAdapter } from './coinmarketcap-adapter';

export { BasePriceAdapter, PriceAdapterConfig } from './base-price-adapter';
export { CoinGeckoAdapter } from './coingecko-adapter';
export { CoinMarketCapAdapter } from './coinmarketcap-adapter';

/**
 * Create the adapter for a configured provider
 */
export function createPriceAdapter(providerId: ProviderId, config: PriceAdapterConfig = {}): PriceProviderAdapter {
  switch (providerId) {
    case 'COINGECKO':
      return new CoinGeckoAdapter(config);
    case 'COINMARKETCAP':
      return new CoinMarketCapAdapter(config);
  }
}
