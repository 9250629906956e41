import { DynamoDB } from 'aws-sdk';
import { DynamoClients } from '../db/client';
import { TableNames, KeySchemas } from '../db/tables';
import { PersistenceError } from '../db/access';
import { MetricsStore } from '../types/metrics-store';
import { SpotSample } from '../types/market-data';
import { VolatilityRecord } from '../types/volatility';

type Item = DynamoDB.DocumentClient.AttributeMap;
type DocumentClient = DynamoDB.DocumentClient;

/**
 * Metrics Repository - persists volatility records and spot samples
 *
 * Both tables are keyed by (assetId, timestamp). `put` replaces the item with
 * the same key, so re-delivering a record overwrites it and never adds a row.
 */
export function createMetricsRepository({ documentClient, dynamoDb }: DynamoClients): MetricsStore {
  return {
    /**
     * Insert or replace the volatility record for (assetId, periodStart)
     */
    async upsertVolatility(record: VolatilityRecord): Promise<void> {
      await putItem(documentClient, TableNames.VOLATILITY, { ...record });
    },

    /**
     * Insert or replace the spot sample for (assetId, observedAt)
     */
    async upsertSpot(sample: SpotSample): Promise<void> {
      await putItem(documentClient, TableNames.SPOT_PRICES, { ...sample });
    },

    async getVolatility(assetId: string, periodStart: string): Promise<VolatilityRecord | null> {
      let result: DynamoDB.DocumentClient.GetItemOutput;
      try {
        result = await documentClient.get({
          TableName: TableNames.VOLATILITY,
          Key: {
            [KeySchemas.VOLATILITY.partitionKey]: assetId,
            [KeySchemas.VOLATILITY.sortKey]: periodStart
          }
        }).promise();
      } catch (error) {
        throw new PersistenceError('GET', TableNames.VOLATILITY, error);
      }

      return result.Item ? toVolatilityRecord(result.Item) : null;
    },

    /**
     * Volatility records with periodStart in [from, to], oldest first
     */
    async listVolatility(assetId: string, from: string, to: string): Promise<VolatilityRecord[]> {
      const items = await queryRange(
        documentClient,
        TableNames.VOLATILITY,
        KeySchemas.VOLATILITY.partitionKey,
        KeySchemas.VOLATILITY.sortKey,
        assetId,
        from,
        to
      );
      return items.map(toVolatilityRecord);
    },

    /**
     * Spot samples with observedAt in [from, to], oldest first
     */
    async listSpot(assetId: string, from: string, to: string): Promise<SpotSample[]> {
      const items = await queryRange(
        documentClient,
        TableNames.SPOT_PRICES,
        KeySchemas.SPOT_PRICES.partitionKey,
        KeySchemas.SPOT_PRICES.sortKey,
        assetId,
        from,
        to
      );
      return items.map(toSpotSample);
    },

    /**
     * Fails with PersistenceError unless both tables are reachable
     */
    async checkConnection(): Promise<void> {
      for (const tableName of [TableNames.VOLATILITY, TableNames.SPOT_PRICES]) {
        try {
          await dynamoDb.describeTable({ TableName: tableName }).promise();
        } catch (error) {
          throw new PersistenceError('DESCRIBE', tableName, error);
        }
      }
    }
  };
}

async function putItem(documentClient: DocumentClient, tableName: string, item: Item): Promise<void> {
  try {
    await documentClient.put({
      TableName: tableName,
      Item: item
    }).promise();
  } catch (error) {
    throw new PersistenceError('PUT', tableName, error);
  }
}

/**
 * Query one partition for a sort-key range, following pagination
 */
async function queryRange(
  documentClient: DocumentClient,
  tableName: string,
  partitionKey: string,
  sortKey: string,
  assetId: string,
  from: string,
  to: string
): Promise<Item[]> {
  const items: Item[] = [];
  let exclusiveStartKey: DynamoDB.DocumentClient.Key | undefined;

  do {
    const queryParams: DynamoDB.DocumentClient.QueryInput = {
      TableName: tableName,
      KeyConditionExpression: '#pk = :assetId AND #sk BETWEEN :from AND :to',
      ExpressionAttributeNames: {
        '#pk': partitionKey,
        '#sk': sortKey
      },
      ExpressionAttributeValues: {
        ':assetId': assetId,
        ':from': from,
        ':to': to
      },
      ScanIndexForward: true
    };

    if (exclusiveStartKey) {
      queryParams.ExclusiveStartKey = exclusiveStartKey;
    }

    let result: DynamoDB.DocumentClient.QueryOutput;
    try {
      result = await documentClient.query(queryParams).promise();
    } catch (error) {
      throw new PersistenceError('QUERY', tableName, error);
    }

    items.push(...(result.Items || []));
    exclusiveStartKey = result.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return items;
}

function readString(item: Item, field: string, tableName: string): string {
  const value: unknown = item[field];
  if (typeof value !== 'string') {
    throw new PersistenceError('READ_ITEM', tableName, new Error(`field '${field}' is not a string`));
  }
  return value;
}

function readNumber(item: Item, field: string, tableName: string): number {
  const value: unknown = item[field];
  if (typeof value !== 'number') {
    throw new PersistenceError('READ_ITEM', tableName, new Error(`field '${field}' is not a number`));
  }
  return value;
}

function toVolatilityRecord(item: Item): VolatilityRecord {
  const table = TableNames.VOLATILITY;
  const kurtosis: unknown = item.kurtosis;

  return {
    assetId: readString(item, 'assetId', table),
    symbol: readString(item, 'symbol', table),
    periodStart: readString(item, 'periodStart', table),
    periodEnd: readString(item, 'periodEnd', table),
    volatility: readNumber(item, 'volatility', table),
    mse: readNumber(item, 'mse', table),
    candleCount: readNumber(item, 'candleCount', table),
    open: readNumber(item, 'open', table),
    high: readNumber(item, 'high', table),
    low: readNumber(item, 'low', table),
    close: readNumber(item, 'close', table),
    kurtosis: typeof kurtosis === 'number' ? kurtosis : null,
    providerId: readString(item, 'providerId', table),
    computedAt: readString(item, 'computedAt', table)
  };
}

function toSpotSample(item: Item): SpotSample {
  const table = TableNames.SPOT_PRICES;

  return {
    assetId: readString(item, 'assetId', table),
    observedAt: readString(item, 'observedAt', table),
    price: readNumber(item, 'price', table),
    providerId: readString(item, 'providerId', table)
  };
}
