export type PersistenceOp =
  | 'resolveSchema'
  | 'registerSchema'
  | 'validate'
  | 'validateFilters'
  | 'validateValues'
  | 'validateOrder'
  | 'validatePaging'
  | 'validateDepth'
  | 'idToInt'
  | 'missingValues'
  | 'dbQuery'
  | 'dbQueryRowScan';

export type PersistenceErrorKind = 'schema' | 'validation' | 'conversion' | 'missing-values' | 'query' | 'scan';

/**
 * Base class for every failure raised by the persistence controller.
 * `op` names the step that failed; the underlying error, if any, is `cause`.
 */
export abstract class PersistenceError extends Error {
  abstract readonly kind: PersistenceErrorKind;

  constructor(
    readonly op: PersistenceOp,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The schema of a record type cannot be derived or resolved */
export class SchemaError extends PersistenceError {
  readonly kind = 'schema';
}

/** A record, filter map or value map names unknown fields or carries wrong-typed values */
export class ValidationError extends PersistenceError {
  readonly kind = 'validation';

  constructor(
    op: PersistenceOp,
    readonly fields: readonly string[]
  ) {
    super(op, `Invalid fields: ${fields.join(', ')}`);
  }
}

/** An identity string is not a decimal integer */
export class ConversionError extends PersistenceError {
  readonly kind = 'conversion';
}

/** An update was requested with no values */
export class MissingValuesError extends PersistenceError {
  readonly kind = 'missing-values';

  constructor() {
    super('missingValues', 'Missing values for update');
  }
}

/** A statement failed to execute */
export class QueryError extends PersistenceError {
  readonly kind = 'query';
}

/** A result row could not be bound to a record */
export class ScanError extends PersistenceError {
  readonly kind = 'scan';
}

export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
