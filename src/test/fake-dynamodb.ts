/**
 * In-process stand-in for the DynamoDB clients built by db/client.
 * Tests install it with:
 *
 *   jest.mock('../db/client', () => jest.requireActual('../test/fake-dynamodb'));
 *
 * Items are keyed by the table's (partition, sort) key pair, so `put` on an
 * existing key replaces the item. Queries return at most `pageSize` items
 * per page with a LastEvaluatedKey, like the real service.
 */

import { KeySchemas, TableNames } from '../db/tables';

type Item = Record<string, unknown>;

interface KeyParams {
  TableName: string;
}

interface QueryParams extends KeyParams {
  ExpressionAttributeNames: Record<string, string>;
  ExpressionAttributeValues: Record<string, unknown>;
  ExclusiveStartKey?: Item;
}

const tables = new Map<string, Map<string, Item>>();
const failures = new Map<string, Error>();
let pageSize = 2;
let lastOptions: { endpoint?: string; region?: string } | undefined;

function keySchemaFor(tableName: string): { partitionKey: string; sortKey: string } {
  if (tableName === TableNames.VOLATILITY) return KeySchemas.VOLATILITY;
  if (tableName === TableNames.SPOT_PRICES) return KeySchemas.SPOT_PRICES;
  throw new Error(`ResourceNotFoundException: ${tableName}`);
}

function tableFor(tableName: string): Map<string, Item> {
  keySchemaFor(tableName);
  let table = tables.get(tableName);
  if (!table) {
    table = new Map();
    tables.set(tableName, table);
  }
  return table;
}

function keyOf(tableName: string, item: Item): string {
  const schema = keySchemaFor(tableName);
  return `${String(item[schema.partitionKey])}#${String(item[schema.sortKey])}`;
}

function request<T>(operation: string, run: () => T): { promise: () => Promise<T> } {
  return {
    promise: async () => {
      const failure = failures.get(operation);
      if (failure) {
        failures.delete(operation);
        throw failure;
      }
      return run();
    }
  };
}

export const documentClient = {
  put: (params: KeyParams & { Item: Item }) =>
    request('put', () => {
      tableFor(params.TableName).set(keyOf(params.TableName, params.Item), { ...params.Item });
      return {};
    }),

  get: (params: KeyParams & { Key: Item }) =>
    request('get', () => {
      const item = tableFor(params.TableName).get(keyOf(params.TableName, params.Key));
      return item ? { Item: { ...item } } : {};
    }),

  query: (params: QueryParams) =>
    request('query', () => {
      const pk = params.ExpressionAttributeNames['#pk'];
      const sk = params.ExpressionAttributeNames['#sk'];
      const assetId = params.ExpressionAttributeValues[':assetId'];
      const from = String(params.ExpressionAttributeValues[':from']);
      const to = String(params.ExpressionAttributeValues[':to']);

      const matching = Array.from(tableFor(params.TableName).values())
        .filter((item) => item[pk] === assetId && String(item[sk]) >= from && String(item[sk]) <= to)
        .sort((a, b) => String(a[sk]).localeCompare(String(b[sk])));

      const startAfter = params.ExclusiveStartKey ? String(params.ExclusiveStartKey[sk]) : undefined;
      const remaining = startAfter === undefined ? matching : matching.filter((item) => String(item[sk]) > startAfter);
      const page = remaining.slice(0, pageSize);
      const last = page[page.length - 1];

      return {
        Items: page.map((item) => ({ ...item })),
        ...(remaining.length > pageSize && last ? { LastEvaluatedKey: { [pk]: last[pk], [sk]: last[sk] } } : {})
      };
    })
};

export const dynamoDb = {
  describeTable: (params: KeyParams) =>
    request('describeTable', () => {
      keySchemaFor(params.TableName);
      return { Table: { TableName: params.TableName, TableStatus: 'ACTIVE' } };
    })
};

export function createDynamoClients(options: { endpoint?: string; region?: string } = {}) {
  lastOptions = { ...options };
  return { documentClient, dynamoDb };
}

/**
 * Options of the most recent createDynamoClients call
 */
export function lastClientOptions(): { endpoint?: string; region?: string } | undefined {
  return lastOptions;
}

export function resetTables(options: { pageSize?: number } = {}): void {
  tables.clear();
  failures.clear();
  lastOptions = undefined;
  pageSize = options.pageSize ?? 2;
}

/**
 * Make the next call of `operation` reject with `error`
 */
export function failNext(operation: 'put' | 'get' | 'query' | 'describeTable', error: Error): void {
  failures.set(operation, error);
}

export function itemCount(tableName: string): number {
  return tableFor(tableName).size;
}
