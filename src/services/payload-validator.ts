/**
 * Payload Validator Service
 * Validates provider payloads against JSON schemas before adapters read them.
 * Missing required fields fail closed; extra fields are ignored.
 */

import Ajv, { ErrorObject, JSONSchemaType, ValidateFunction } from 'ajv';
import { CollectorError } from '../utils/errors';

export interface SchemaValidationError {
  path: string;
  message: string;
  keyword: string;
}

/**
 * Provider payload is missing required fields, or yields no usable data
 */
export class MalformedResponseError extends CollectorError {
  readonly kind = 'MALFORMED_RESPONSE' as const;

  constructor(
    message: string,
    public readonly providerId: string,
    public readonly errors: SchemaValidationError[] = []
  ) {
    super(message);
  }
}

export class PayloadValidator {
  private ajv: Ajv;

  constructor() {
    this.ajv = new Ajv({ allErrors: true });
  }

  compile<T>(schema: JSONSchemaType<T>): ValidateFunction<T> {
    return this.ajv.compile(schema);
  }

  /**
   * Returns the payload typed by the schema, or throws MalformedResponseError
   * listing every violation with its path.
   */
  validate<T>(validateFn: ValidateFunction<T>, payload: unknown, providerId: string, context: string): T {
    if (validateFn(payload)) {
      return payload;
    }

    const errors = this.convertErrors(validateFn.errors);
    const summary = errors.map((e) => `${e.path} ${e.message}`).join('; ');
    throw new MalformedResponseError(`${context}: ${summary}`, providerId, errors);
  }

  /**
   * Converts AJV errors to our SchemaValidationError format
   */
  private convertErrors(errors: ErrorObject[] | null | undefined): SchemaValidationError[] {
    if (!errors) return [];

    return errors.map((error) => ({
      path: error.instancePath || '/',
      message: error.message || 'Unknown validation error',
      keyword: error.keyword
    }));
  }
}

// Shared instance: schemas compile once per process
export const payloadValidator = new PayloadValidator();
