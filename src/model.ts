/**
 * Core data model types for record-store.
 *
 * A record type is described once with `defineRecordType`; every record
 * instance points back to its description through the `recordType` symbol.
 */

// === Field Types ===

export type FieldKind = 'int64' | 'int' | 'string' | 'bool';

export type FieldValue = number | string | boolean;

export const FIELD_KINDS: readonly FieldKind[] = ['int64', 'int', 'string', 'bool'];

export interface FieldRules {
  readonly required?: boolean;
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly pattern?: string;
  readonly format?: 'email';
  readonly minimum?: number;
  readonly maximum?: number;
}

export interface FieldSpec<K extends FieldKind = FieldKind> {
  readonly kind: K;
  /** Database column; defaults to the snake_case field name */
  readonly column?: string;
  readonly rules?: FieldRules;
}

export interface FieldDescriptor extends FieldSpec {
  readonly name: string;
}

export interface RelationDescriptor {
  /** Key in the Constructors map passed to delete operations */
  readonly name: string;
  /** Data field on the child type that holds the parent's identity */
  readonly foreignKey: string;
}

// === Record Types ===

export interface RecordType {
  readonly name: string;
  readonly table?: string;
  readonly identityColumn: string;
  readonly fields: readonly FieldDescriptor[];
  readonly relations: readonly RelationDescriptor[];
}

export const recordType: unique symbol = Symbol('recordType');

export interface Entity {
  id: number;
  readonly [recordType]: RecordType;
}

export type RecordFactory<R extends Entity = Entity> = () => R;

export type Constructors = Readonly<Record<string, RecordFactory>>;

/** Data properties of a record: string keys other than `id` holding field values */
export type DataFieldName<T> = {
  [K in keyof T]: K extends 'id' ? never : K extends string ? (T[K] extends FieldValue ? K : never) : never;
}[keyof T];

type KindOf<V> = V extends string ? 'string' : V extends boolean ? 'bool' : V extends number ? 'int' | 'int64' : never;

export interface RecordTypeDefinition<T> {
  readonly name: string;
  readonly table?: string;
  readonly identityColumn?: string;
  readonly fields: { readonly [K in DataFieldName<T>]: FieldSpec<KindOf<T[K]>> } & Readonly<Record<string, FieldSpec>>;
  readonly relations?: Readonly<Record<string, { readonly foreignKey: string }>>;
}

/**
 * Describe a record type. The definition is checked against `T`, so every
 * data property must be listed with a kind matching its TypeScript type.
 */
export function defineRecordType<T extends Entity>(definition: RecordTypeDefinition<T>): RecordType {
  const fields: FieldDescriptor[] = Object.entries<FieldSpec>(definition.fields).map(([name, spec]) => ({
    name,
    ...spec,
  }));
  const relations = Object.entries(definition.relations ?? {}).map(([name, relation]) => ({
    name,
    foreignKey: relation.foreignKey,
  }));

  return {
    name: definition.name,
    table: definition.table,
    identityColumn: definition.identityColumn ?? 'id',
    fields,
    relations,
  };
}

// === Maps ===

export type FilterValue = FieldValue | readonly FieldValue[];

/** Field name to comparison value; arrays match any of their members */
export type FilterMap = Readonly<Record<string, FilterValue>>;

/** Field name to new value for a partial update */
export type ValueMap = Readonly<Record<string, FieldValue>>;

// === Helpers ===

export function isFieldValue(value: unknown): value is FieldValue {
  return typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean';
}

export function isValueList(value: FilterValue): value is readonly FieldValue[] {
  return Array.isArray(value);
}

export function zeroValue(kind: FieldKind): FieldValue {
  switch (kind) {
    case 'int64':
    case 'int':
      return 0;
    case 'string':
      return '';
    case 'bool':
      return false;
  }
}

/**
 * Convert a camelCase or PascalCase name to snake_case.
 * Acronyms stay together: `groupID` becomes `group_id`.
 */
export function toSnakeCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toLowerCase();
}
