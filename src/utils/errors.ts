import { CollectorErrorKind } from '../types/collector';

/**
 * Base class for every error the collector raises on purpose.
 * The kind is what tick summaries and log entries report.
 */
export abstract class CollectorError extends Error {
  abstract readonly kind: CollectorErrorKind;

  constructor(message: string, public readonly originalError?: unknown) {
    super(message);
    this.name = new.target.name;
  }
}

export function errorKindOf(error: unknown): CollectorErrorKind {
  return error instanceof CollectorError ? error.kind : 'UNKNOWN';
}

/**
 * Message of a thrown value. Errors raised by Node internals are not always
 * `instanceof Error` in this realm, so any object with a string message counts.
 */
export function errorMessageOf(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (isRecord(error) && typeof error.message === 'string') {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
