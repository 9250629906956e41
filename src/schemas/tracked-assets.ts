/**
 * JSON Schema for config/assets.json
 */

import { JSONSchemaType } from 'ajv';
import { TrackedAssetsFile } from '../types/asset';

export const TrackedAssetsFileSchema: JSONSchemaType<TrackedAssetsFile> = {
  type: 'object',
  required: ['assets'],
  properties: {
    assets: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['assetId', 'symbol', 'name', 'peg', 'providerIds'],
        properties: {
          assetId: { type: 'string', minLength: 1 },
          symbol: { type: 'string', minLength: 1 },
          name: { type: 'string' },
          peg: { type: 'number', exclusiveMinimum: 0 },
          providerIds: {
            type: 'object',
            required: [],
            properties: {
              COINGECKO: { type: 'string', nullable: true, minLength: 1 },
              COINMARKETCAP: { type: 'string', nullable: true, minLength: 1 }
            },
            additionalProperties: false
          }
        }
      }
    }
  }
};
