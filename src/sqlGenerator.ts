import {
  FIELD_KINDS,
  isValueList,
  toSnakeCase,
  type FieldDescriptor,
  type FilterMap,
  type FilterValue,
  type RecordType,
  type RelationDescriptor,
} from './model';

/**
 * Escape a PostgreSQL identifier (table or column name).
 * Doubles any embedded double-quotes to prevent SQL injection.
 */
export function escapeIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export type OrderDirection = 'asc' | 'desc';

export interface OrderBy {
  readonly field: string;
  readonly direction?: OrderDirection;
}

export interface SelectOptions {
  readonly order?: readonly OrderBy[];
  /** Zero means no limit */
  readonly limit?: number;
  readonly offset?: number;
  readonly filters?: FilterMap;
}

export interface SqlGeneratorOptions {
  readonly tablePrefix?: string;
  /** Handle of a parent type whose table and column names are shared */
  readonly source?: SqlGenerator;
}

/**
 * Schema handle for one record type: owns the table and column naming and
 * produces parameterized PostgreSQL statements.
 *
 * Placeholders always follow the declared field order, so parameter lists
 * built in that order line up with the generated text.
 */
export class SqlGenerator {
  readonly table: string;
  readonly identityColumn: string;
  readonly fields: readonly FieldDescriptor[];
  readonly relations: readonly RelationDescriptor[];

  private readonly _columns = new Map<string, string>();
  private readonly _fieldsByColumn = new Map<string, string>();

  constructor(
    readonly recordType: RecordType,
    options: SqlGeneratorOptions = {}
  ) {
    const source = options.source;
    this.table = source
      ? source.table
      : `${options.tablePrefix ?? ''}${recordType.table ?? toSnakeCase(recordType.name)}`;
    this.identityColumn = source ? source.identityColumn : recordType.identityColumn;
    this.fields = recordType.fields;
    this.relations = recordType.relations;

    if (this.fields.length === 0) {
      throw new Error(`Record type ${recordType.name} has no data fields`);
    }

    this._fieldsByColumn.set(this.identityColumn, 'id');

    for (const field of this.fields) {
      if (!FIELD_KINDS.includes(field.kind)) {
        throw new Error(`Field ${recordType.name}.${field.name} has unsupported kind ${String(field.kind)}`);
      }
      if (field.name === 'id') {
        throw new Error(`Field ${recordType.name}.id is reserved for the identity`);
      }

      const column = source?._columns.get(field.name) ?? field.column ?? toSnakeCase(field.name);
      if (this._fieldsByColumn.has(column)) {
        throw new Error(`Column ${column} of ${recordType.name} is mapped more than once`);
      }
      this._columns.set(field.name, column);
      this._fieldsByColumn.set(column, field.name);
    }

    for (const relation of this.relations) {
      if (!relation.foreignKey) {
        throw new Error(`Relation ${recordType.name}.${relation.name} has no foreign key`);
      }
    }
  }

  hasField(name: string): boolean {
    return this._columns.has(name);
  }

  columnFor(fieldName: string): string | undefined {
    if (fieldName === 'id') return this.identityColumn;
    return this._columns.get(fieldName);
  }

  fieldNameForColumn(column: string): string | undefined {
    return this._fieldsByColumn.get(column);
  }

  /**
   * Filter entries that name data fields, in declared field order.
   */
  filterEntries(filters: FilterMap | undefined): [FieldDescriptor, FilterValue][] {
    if (!filters) return [];
    const entries: [FieldDescriptor, FilterValue][] = [];
    for (const field of this.fields) {
      if (Object.hasOwn(filters, field.name)) {
        entries.push([field, filters[field.name]]);
      }
    }
    return entries;
  }

  insertQuery(): string {
    const columns = this._dataColumns();
    const placeholders = columns.map((_, i) => `$${i + 1}`);
    return `INSERT INTO ${this._table()} (${columns.join(', ')}) VALUES (${placeholders.join(', ')}) RETURNING ${this._identity()}`;
  }

  /**
   * Insert with identity; on conflict, updates every data column.
   * Parameters: identity, then data fields.
   */
  upsertQuery(): string {
    const columns = [this._identity(), ...this._dataColumns()];
    const placeholders = columns.map((_, i) => `$${i + 1}`);
    const setClause = this._dataColumns().map(col => `${col} = EXCLUDED.${col}`).join(', ');
    return `INSERT INTO ${this._table()} (${columns.join(', ')}) VALUES (${placeholders.join(', ')}) ON CONFLICT (${this._identity()}) DO UPDATE SET ${setClause}`;
  }

  /** Parameters: data fields, then identity. */
  updateByIdQuery(): string {
    const columns = this._dataColumns();
    const setClause = columns.map((col, i) => `${col} = $${i + 1}`).join(', ');
    return `UPDATE ${this._table()} SET ${setClause} WHERE ${this._identity()} = $${columns.length + 1}`;
  }

  selectByIdQuery(): string {
    return `SELECT ${this._allColumns().join(', ')} FROM ${this._table()} WHERE ${this._identity()} = $1`;
  }

  selectQuery(options: SelectOptions = {}): string {
    const where = this._whereClause(options.filters, 0);
    const order: readonly OrderBy[] = options.order && options.order.length > 0 ? options.order : [{ field: 'id' }];
    const orderBy = order.flatMap(o => {
      const column = this.columnFor(o.field);
      return column === undefined ? [] : [`${escapeIdentifier(column)} ${o.direction === 'desc' ? 'DESC' : 'ASC'}`];
    });

    let sql = `SELECT ${this._allColumns().join(', ')} FROM ${this._table()}${where}`;
    if (orderBy.length > 0) sql += ` ORDER BY ${orderBy.join(', ')}`;
    if (options.limit !== undefined && options.limit > 0) sql += ` LIMIT ${Math.trunc(options.limit)}`;
    if (options.offset !== undefined && options.offset > 0) sql += ` OFFSET ${Math.trunc(options.offset)}`;
    return sql;
  }

  deleteByIdQuery(): string {
    return `DELETE FROM ${this._table()} WHERE ${this._identity()} = $1`;
  }

  deleteReturningIdsQuery(filters?: FilterMap): string {
    return `DELETE FROM ${this._table()}${this._whereClause(filters, 0)} RETURNING ${this._identity()}`;
  }

  /**
   * Parameters: values in declared field order, then filters.
   */
  updateQuery(values: FilterMap, filters?: FilterMap): string {
    const setEntries = this.filterEntries(values);
    const setClause = setEntries
      .map(([field], i) => `${escapeIdentifier(this._column(field))} = $${i + 1}`)
      .join(', ');
    return `UPDATE ${this._table()} SET ${setClause}${this._whereClause(filters, setEntries.length)}`;
  }

  selectCountQuery(filters?: FilterMap): string {
    return `SELECT COUNT(*) AS count FROM ${this._table()}${this._whereClause(filters, 0)}`;
  }

  private _whereClause(filters: FilterMap | undefined, paramOffset: number): string {
    const entries = this.filterEntries(filters);
    if (entries.length === 0) return '';

    let n = paramOffset;
    const conditions = entries.map(([field, value]) => {
      const column = escapeIdentifier(this._column(field));
      if (isValueList(value)) {
        if (value.length === 0) return 'FALSE';
        const placeholders = value.map(() => `$${++n}`);
        return `${column} IN (${placeholders.join(', ')})`;
      }
      return `${column} = $${++n}`;
    });

    return ` WHERE ${conditions.join(' AND ')}`;
  }

  private _column(field: FieldDescriptor): string {
    return this._columns.get(field.name) ?? toSnakeCase(field.name);
  }

  private _table(): string {
    return escapeIdentifier(this.table);
  }

  private _identity(): string {
    return escapeIdentifier(this.identityColumn);
  }

  private _dataColumns(): string[] {
    return this.fields.map(f => escapeIdentifier(this._column(f)));
  }

  private _allColumns(): string[] {
    return [this._identity(), ...this._dataColumns()];
  }
}
