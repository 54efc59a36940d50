import {
  isFieldValue,
  recordType,
  type Constructors,
  type FieldValue,
  type Entity,
  type FilterMap,
  type RecordFactory,
  type RecordType,
  type ValueMap,
} from './model';
import type { DbClient } from './database';
import type { OrderBy, SqlGenerator } from './sqlGenerator';
import { SchemaCache } from './schemaCache';
import { Validator } from './validator';
import {
  bindRow,
  coerceStringMap,
  fieldValues,
  filterValues,
  identityValue,
  resetFields,
  scanInteger,
} from './fieldIntrospector';
import {
  ConversionError,
  MissingValuesError,
  PersistenceError,
  QueryError,
  SchemaError,
  ValidationError,
  describeError,
} from './errors';
import { createDefaultLogger, type StoreLogger } from './logger';

/** Cascading delete stops descending once this depth is reached */
export const MAX_CASCADE_DEPTH = 3;

/** Parent identities per cascade statement; PostgreSQL binds at most 65535 parameters */
export const DEFAULT_CASCADE_BATCH_SIZE = 1000;

export interface ControllerOptions {
  /** Shared schema registry; one is created from `tablePrefix` when omitted */
  readonly schemaCache?: SchemaCache;
  readonly tablePrefix?: string;
  readonly validator?: Validator;
  readonly logger?: StoreLogger;
  readonly cascadeBatchSize?: number;
}

export interface SaveOptions {
  /** Update by identity only, never insert */
  readonly noInsert?: boolean;
}

export interface DeleteOptions {
  /** Child record factories keyed by relation name; missing entries are not cascaded */
  readonly constructors?: Constructors;
}

export interface DeleteMultipleOptions {
  readonly filters?: FilterMap;
  readonly cascadeDeleteDepth?: number;
  readonly constructors?: Constructors;
}

export interface UpdateMultipleOptions {
  readonly filters?: FilterMap;
  /** Values arrive as strings and are converted to the field kinds first */
  readonly convertValuesFromString?: boolean;
}

export interface GetOptions<R extends Entity = Entity, T = unknown> {
  readonly order?: readonly OrderBy[];
  readonly limit?: number;
  readonly offset?: number;
  readonly filters?: FilterMap;
  /** Applied to every bound row; its result is returned in place of the record */
  readonly rowTransform?: (row: R) => T;
}

export interface GetCountOptions {
  readonly filters?: FilterMap;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Persistence controller: turns record values into parameterized statements
 * for any record type described with `defineRecordType`.
 */
export class Controller {
  private readonly _schemas: SchemaCache;
  private readonly _validator: Validator;
  private readonly _log: StoreLogger;
  private readonly _cascadeBatchSize: number;

  constructor(
    private readonly _client: DbClient,
    options: ControllerOptions = {}
  ) {
    this._schemas = options.schemaCache ?? new SchemaCache({ tablePrefix: options.tablePrefix });
    this._validator = options.validator ?? new Validator();
    this._log = options.logger ?? createDefaultLogger();
    this._cascadeBatchSize = options.cascadeBatchSize ?? DEFAULT_CASCADE_BATCH_SIZE;
    if (!Number.isSafeInteger(this._cascadeBatchSize) || this._cascadeBatchSize < 1 || this._cascadeBatchSize > 65535) {
      throw new Error(`cascadeBatchSize must be an integer between 1 and 65535, got ${this._cascadeBatchSize}`);
    }
  }

  get schemas(): SchemaCache {
    return this._schemas;
  }

  /**
   * Validate the record and write it. Identity 0 inserts and binds the
   * generated identity; otherwise upserts, or with `noInsert` updates by
   * identity (affecting no row when none exists).
   */
  async save(record: Entity, options: SaveOptions = {}): Promise<void> {
    const handle = this._resolve(record);
    this._validateIdentity(record);

    const { valid, invalidFields } = this._validator.validate(record);
    if (!valid) {
      throw new ValidationError('validate', invalidFields);
    }

    if (identityValue(record) !== 0) {
      if (options.noInsert) {
        await this._query(handle.updateByIdQuery(), [...fieldValues(record, false), identityValue(record)]);
      } else {
        await this._query(handle.upsertQuery(), fieldValues(record, true));
      }
      return;
    }

    const rows = await this._query(handle.insertQuery(), fieldValues(record, false));
    record.id = scanInteger('id', rows[0]?.[handle.identityColumn]);
  }

  /**
   * Load the row with the given identity into the record. When no row
   * exists the record is reset to zero values; that is not an error.
   */
  async load(record: Entity, id: string): Promise<void> {
    const idInt = INTEGER_PATTERN.test(id) ? Number(id) : NaN;
    if (!Number.isSafeInteger(idInt)) {
      throw new ConversionError('idToInt', `Error converting ${JSON.stringify(id)} to an integer identity`);
    }

    const handle = this._resolve(record);
    const rows = await this._query(handle.selectByIdQuery(), [idInt]);

    if (rows.length === 0) {
      resetFields(record);
      return;
    }
    bindRow(record, handle, rows[0]);
  }

  /**
   * Delete the record's row, zero the record, then cascade to its
   * relations. Identity 0 is a no-op.
   */
  async delete(record: Entity, options: DeleteOptions = {}): Promise<void> {
    const handle = this._resolve(record);
    this._validateIdentity(record);

    const id = identityValue(record);
    if (id === 0) {
      return;
    }

    const type = record[recordType];
    await this._query(handle.deleteByIdQuery(), [id]);
    resetFields(record);

    await this._cascadeAfterDelete(type, options.constructors ?? {}, [id], 0);
  }

  /**
   * Delete every row matching the filters (all rows without filters) and
   * cascade over the deleted identities while depth allows.
   */
  async deleteMultiple(factory: RecordFactory, options: DeleteMultipleOptions = {}): Promise<void> {
    const record = factory();
    const handle = this._resolve(record);
    this._validateFilters(record, options.filters);
    const depth = options.cascadeDeleteDepth ?? 0;
    if (!Number.isSafeInteger(depth) || depth < 0) {
      throw new ValidationError('validateDepth', ['cascadeDeleteDepth']);
    }

    const ids = await this._deleteReturningIds(handle, options.filters);

    if (depth < MAX_CASCADE_DEPTH) {
      await this._cascadeAfterDelete(record[recordType], options.constructors ?? {}, ids, depth);
    }
  }

  /**
   * Set `values` on every row matching the filters in a single statement.
   */
  async updateMultiple(factory: RecordFactory, values: Readonly<Record<string, unknown>>, options: UpdateMultipleOptions = {}): Promise<void> {
    const record = factory();
    const handle = this._resolve(record);

    if (Object.keys(values).length === 0) {
      throw new MissingValuesError();
    }

    const candidate = options.convertValuesFromString ? coerceStringMap(record, values) : values;
    if (Object.keys(candidate).length === 0) {
      throw new MissingValuesError();
    }

    const checked = this._validator.validate(record, candidate, 'values');
    if (!checked.valid) {
      throw new ValidationError('validateValues', checked.invalidFields);
    }
    const updates = this._asValueMap(candidate);
    this._validateFilters(record, options.filters);

    await this._query(
      handle.updateQuery(updates, options.filters),
      [...filterValues(handle, updates), ...filterValues(handle, options.filters)]
    );
  }

  /**
   * Select matching rows into fresh records from `factory`.
   */
  get<R extends Entity>(factory: RecordFactory<R>, options?: GetOptions<R, never>): Promise<R[]>;
  get<R extends Entity, T>(factory: RecordFactory<R>, options: GetOptions<R, T> & { readonly rowTransform: (row: R) => T }): Promise<T[]>;
  async get<R extends Entity, T>(factory: RecordFactory<R>, options: GetOptions<R, T> = {}): Promise<(R | T)[]> {
    const record = factory();
    const handle = this._resolve(record);
    this._validateFilters(record, options.filters);
    this._validateOrder(record, options.order);
    this._validatePaging(options.limit, options.offset);

    const rows = await this._query(handle.selectQuery(options), filterValues(handle, options.filters));

    const result: (R | T)[] = [];
    for (const row of rows) {
      const item = factory();
      bindRow(item, handle, row);
      result.push(options.rowTransform ? options.rowTransform(item) : item);
    }
    return result;
  }

  async getCount(factory: RecordFactory, options: GetCountOptions = {}): Promise<number> {
    const record = factory();
    const handle = this._resolve(record);
    this._validateFilters(record, options.filters);

    const rows = await this._query(handle.selectCountQuery(options.filters), filterValues(handle, options.filters));
    return scanInteger('count', rows[0]?.count);
  }

  /**
   * Register the record's schema handle, optionally derived from a parent
   * record's handle. See {@link SchemaCache.register}.
   */
  registerType(record: Entity, parent?: Entity, overwrite = false): void {
    this._schemas.register(record, parent, overwrite);
  }

  fieldNameForColumn(record: Entity, column: string): string | undefined {
    return this._resolve(record).fieldNameForColumn(column);
  }

  /**
   * Cascade from rows that are already gone. A failure here leaves the
   * database partially cascaded, so it is logged before being rethrown.
   */
  private async _cascadeAfterDelete(owner: RecordType, constructors: Constructors, parentIds: readonly number[], depth: number): Promise<void> {
    try {
      await this._cascadeDelete(owner, constructors, parentIds, depth);
    } catch (error) {
      this._log.error(
        { type: owner.name, parentIds, depth, err: error },
        'cascade delete failed after parent rows were removed; manual reconciliation needed'
      );
      throw error;
    }
  }

  /**
   * Delete children of `parentIds` through every relation with a registered
   * constructor, one level deeper each time, until MAX_CASCADE_DEPTH.
   * Not transactional: rows deleted before a failure stay deleted.
   */
  private async _cascadeDelete(owner: RecordType, constructors: Constructors, parentIds: readonly number[], depth: number): Promise<void> {
    if (parentIds.length === 0) return;

    for (const relation of owner.relations) {
      const factory = constructors[relation.name];
      if (!factory) continue;

      const child = factory();
      const handle = this._resolve(child);

      const childIds: number[] = [];
      for (let start = 0; start < parentIds.length; start += this._cascadeBatchSize) {
        const filters: FilterMap = { [relation.foreignKey]: parentIds.slice(start, start + this._cascadeBatchSize) };
        this._validateFilters(child, filters);
        for (const id of await this._deleteReturningIds(handle, filters)) {
          childIds.push(id);
        }
      }
      if (depth + 1 < MAX_CASCADE_DEPTH) {
        await this._cascadeDelete(child[recordType], constructors, childIds, depth + 1);
      }
    }
  }

  private async _deleteReturningIds(handle: SqlGenerator, filters: FilterMap | undefined): Promise<number[]> {
    const rows = await this._query(handle.deleteReturningIdsQuery(filters), filterValues(handle, filters));
    return rows.map(row => scanInteger('id', row[handle.identityColumn]));
  }

  private _resolve(record: Entity): SqlGenerator {
    try {
      return this._schemas.resolve(record);
    } catch (error) {
      if (error instanceof SchemaError) throw error;
      throw new SchemaError('resolveSchema', `Error resolving schema: ${describeError(error)}`, { cause: error });
    }
  }

  /** Identity must be a non-negative integer; 0 means unsaved. */
  private _validateIdentity(record: Entity): void {
    const id = identityValue(record);
    if (!Number.isSafeInteger(id) || id < 0) {
      throw new ValidationError('validate', ['id']);
    }
  }

  private _validateFilters(record: Entity, filters: FilterMap | undefined): void {
    if (!filters || Object.keys(filters).length === 0) return;
    const { valid, invalidFields } = this._validator.validate(record, filters, 'filters');
    if (!valid) {
      throw new ValidationError('validateFilters', invalidFields);
    }
  }

  private _validateOrder(record: Entity, order: readonly OrderBy[] | undefined): void {
    if (!order) return;
    const handle = this._resolve(record);
    const unknown = order.map(o => o.field).filter(field => handle.columnFor(field) === undefined);
    if (unknown.length > 0) {
      throw new ValidationError('validateOrder', unknown);
    }
  }

  private _validatePaging(limit: number | undefined, offset: number | undefined): void {
    const invalid: string[] = [];
    if (limit !== undefined && !(Number.isSafeInteger(limit) && limit >= 0)) invalid.push('limit');
    if (offset !== undefined && !(Number.isSafeInteger(offset) && offset >= 0)) invalid.push('offset');
    if (invalid.length > 0) {
      throw new ValidationError('validatePaging', invalid);
    }
  }

  /** Narrow a validated value candidate to the map the generator takes. */
  private _asValueMap(candidate: Readonly<Record<string, unknown>>): ValueMap {
    const values: Record<string, FieldValue> = {};
    for (const [key, value] of Object.entries(candidate)) {
      if (isFieldValue(value)) values[key] = value;
    }
    return values;
  }

  private async _query(sql: string, params: unknown[]): Promise<Record<string, unknown>[]> {
    this._log.debug({ sql, params }, 'executing statement');
    try {
      const result = await this._client.query<Record<string, unknown>>(sql, params);
      return result.rows;
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new QueryError('dbQuery', `Error executing DB query: ${describeError(error)}`, { cause: error });
    }
  }
}
