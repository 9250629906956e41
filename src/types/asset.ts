/**
 * Tracked Asset Types
 */

import { ProviderId } from './price-provider';

export interface Asset {
  assetId: string;
  symbol: string;
  name: string;
  peg: number;
  providerIds: Partial<Record<ProviderId, string>>;
}

// Shape of config/assets.json
export interface TrackedAssetsFile {
  assets: Asset[];
}
