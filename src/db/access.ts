import { CollectorError, errorMessageOf } from '../utils/errors';

export type PersistenceOperation = 'PUT' | 'GET' | 'QUERY' | 'DESCRIBE' | 'READ_ITEM';

/**
 * Error thrown when the metrics store cannot be reached, rejects a write,
 * or returns a row that does not match the record shape
 */
export class PersistenceError extends CollectorError {
  readonly kind = 'PERSISTENCE' as const;

  constructor(
    public readonly operation: PersistenceOperation,
    public readonly tableName: string,
    originalError?: unknown
  ) {
    super(
      `${operation} on ${tableName} failed: ${errorMessageOf(originalError)}`,
      originalError
    );
  }
}
