import {
  isFieldValue,
  isValueList,
  recordType,
  zeroValue,
  type Entity,
  type FieldDescriptor,
  type FieldKind,
  type FieldValue,
  type FilterMap,
} from './model';
import type { SqlGenerator } from './sqlGenerator';
import { ScanError } from './errors';

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Read/write access to one field of a record.
 */
export interface FieldSlot {
  readonly name: string;
  readonly kind: FieldKind;
  get(): unknown;
  set(value: FieldValue): void;
}

function slot(record: Entity, name: string, kind: FieldKind): FieldSlot {
  return {
    name,
    kind,
    get: () => Reflect.get(record, name),
    set: (value) => {
      Reflect.set(record, name, value);
    },
  };
}

export function identitySlot(record: Entity): FieldSlot {
  return slot(record, 'id', 'int64');
}

export function identityValue(record: Entity): number {
  return record.id;
}

/**
 * Slots for the record's fields in declared column order; the identity comes
 * first when included.
 */
export function fieldSlots(record: Entity, includeIdentity: boolean): FieldSlot[] {
  const slots = record[recordType].fields.map(f => slot(record, f.name, f.kind));
  return includeIdentity ? [identitySlot(record), ...slots] : slots;
}

export function fieldValues(record: Entity, includeIdentity: boolean): unknown[] {
  return fieldSlots(record, includeIdentity).map(s => s.get());
}

/**
 * Data field values keyed by field name.
 */
export function dataValues(record: Entity): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const s of fieldSlots(record, false)) {
    values[s.name] = s.get();
  }
  return values;
}

/**
 * Filter values in the order the generator emits placeholders. Lists are
 * flattened, one parameter per member.
 */
export function filterValues(handle: SqlGenerator, filters: FilterMap | undefined): FieldValue[] {
  return handle.filterEntries(filters).flatMap(([, value]) => (isValueList(value) ? [...value] : [value]));
}

function parseInteger(value: string): number | undefined {
  if (!INTEGER_PATTERN.test(value)) return undefined;
  const n = Number(value);
  return Number.isSafeInteger(n) ? n : undefined;
}

/**
 * Convert string values to the kinds of the record's fields.
 *
 * Lossy: keys that are not fields, non-string values and integers that do
 * not parse are left out of the result. Booleans are `true` only for the
 * exact string "true".
 */
export function coerceStringMap(record: Entity, values: Readonly<Record<string, unknown>>): Record<string, FieldValue> {
  const fields = new Map(record[recordType].fields.map(f => [f.name, f]));
  const result: Record<string, FieldValue> = {};

  for (const [key, raw] of Object.entries(values)) {
    const field = fields.get(key);
    if (!field || typeof raw !== 'string') continue;

    switch (field.kind) {
      case 'int64':
      case 'int': {
        const n = parseInteger(raw);
        if (n !== undefined) result[key] = n;
        break;
      }
      case 'string':
        result[key] = raw;
        break;
      case 'bool':
        result[key] = raw === 'true';
        break;
    }
  }

  return result;
}

export function resetFields(record: Entity): void {
  identitySlot(record).set(0);
  for (const s of fieldSlots(record, false)) {
    s.set(zeroValue(s.kind));
  }
}

function scanError(name: string, kind: FieldKind, raw: unknown): ScanError {
  return new ScanError('dbQueryRowScan', `Cannot scan ${describeRaw(raw)} into ${kind} field ${name}`);
}

/**
 * Convert an integer returned by the driver. `pg` returns BIGINT columns as
 * text and PGlite may return bigint.
 */
export function scanInteger(name: string, raw: unknown, kind: FieldKind = 'int64'): number {
  if (typeof raw === 'number' && Number.isSafeInteger(raw)) return raw;
  if (typeof raw === 'bigint') {
    const n = Number(raw);
    if (Number.isSafeInteger(n)) return n;
  }
  if (typeof raw === 'string') {
    const n = parseInteger(raw);
    if (n !== undefined) return n;
  }
  throw scanError(name, kind, raw);
}

/**
 * Convert a value returned by the driver to the field's kind.
 */
export function convertScanned(field: Pick<FieldDescriptor, 'name' | 'kind'>, raw: unknown): FieldValue {
  switch (field.kind) {
    case 'int64':
    case 'int':
      if (raw === null || raw === undefined) break;
      return scanInteger(field.name, raw, field.kind);
    case 'string':
      if (typeof raw === 'string') return raw;
      if (typeof raw === 'number' || typeof raw === 'bigint') return String(raw);
      break;
    case 'bool':
      if (typeof raw === 'boolean') return raw;
      break;
  }
  throw scanError(field.name, field.kind, raw);
}

function describeRaw(raw: unknown): string {
  if (raw === null) return 'NULL';
  if (raw === undefined) return 'missing column';
  return isFieldValue(raw) ? `${typeof raw} ${JSON.stringify(raw)}` : typeof raw;
}

/**
 * Bind a result row, keyed by column name, into the record's identity and
 * data fields.
 */
export function bindRow(record: Entity, handle: SqlGenerator, row: Readonly<Record<string, unknown>>): void {
  const converted: [FieldSlot, FieldValue][] = [];
  for (const s of fieldSlots(record, true)) {
    const column = handle.columnFor(s.name);
    const raw = column === undefined ? undefined : row[column];
    converted.push([s, convertScanned(s, raw)]);
  }
  // a failed scan leaves the record untouched
  for (const [s, value] of converted) {
    s.set(value);
  }
}
