import { recordType, type Entity } from './model';
import { SqlGenerator } from './sqlGenerator';
import { SchemaError, describeError } from './errors';

export interface SchemaCacheOptions {
  /** Prepended to every derived table name */
  readonly tablePrefix?: string;
}

/**
 * One schema handle per record type, keyed by type name.
 *
 * Handles are created lazily on first use. Populating the cache once at
 * startup with `register` keeps it read-only afterwards.
 */
export class SchemaCache {
  private readonly _handles = new Map<string, SqlGenerator>();

  constructor(private readonly _options: SchemaCacheOptions = {}) { }

  get tablePrefix(): string {
    return this._options.tablePrefix ?? '';
  }

  get size(): number {
    return this._handles.size;
  }

  has(record: Entity): boolean {
    return this._handles.has(record[recordType].name);
  }

  /**
   * Return the cached handle for the record's type, building it if missing.
   */
  resolve(record: Entity): SqlGenerator {
    const handle = this._handles.get(record[recordType].name);
    if (handle) return handle;
    return this.register(record);
  }

  /**
   * Build and cache a handle. With `parent`, the handle shares the parent's
   * table and column names. Without `overwrite`, an existing entry is kept.
   */
  register(record: Entity, parent?: Entity, overwrite = false): SqlGenerator {
    const type = record[recordType];
    const existing = this._handles.get(type.name);
    if (existing && !overwrite) return existing;

    const source = parent ? this.resolve(parent) : undefined;

    let handle: SqlGenerator;
    try {
      handle = new SqlGenerator(type, { tablePrefix: this.tablePrefix, source });
    } catch (error) {
      throw new SchemaError('registerSchema', `Error getting SQL generator for ${type.name}: ${describeError(error)}`, { cause: error });
    }

    this._handles.set(type.name, handle);
    return handle;
  }

  /**
   * Reverse lookup from a database column to the record's field name.
   */
  fieldNameForColumn(record: Entity, column: string): string | undefined {
    return this.resolve(record).fieldNameForColumn(column);
  }
}
