/**
 * DynamoDB table configurations for collected metrics
 */

/**
 * Table name constants - use environment variables for flexibility across environments
 */
export const TableNames = {
  VOLATILITY: process.env.VOLATILITY_TABLE || 'stablecoin-volatility',
  SPOT_PRICES: process.env.SPOT_PRICES_TABLE || 'stablecoin-spot-prices'
} as const;

/**
 * Key schema definitions for each table.
 * The composite primary key is the uniqueness constraint: one row per
 * (asset, timestamp), so a put on the key is an upsert.
 */
export const KeySchemas = {
  /**
   * Volatility Table
   * - Partition Key: assetId
   * - Sort Key: periodStart (ISO-8601, sorts chronologically)
   */
  VOLATILITY: {
    partitionKey: 'assetId',
    sortKey: 'periodStart'
  },

  /**
   * Spot Prices Table
   * - Partition Key: assetId
   * - Sort Key: observedAt (ISO-8601)
   */
  SPOT_PRICES: {
    partitionKey: 'assetId',
    sortKey: 'observedAt'
  }
} as const;
