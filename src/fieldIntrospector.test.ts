import { describe, test, expect } from 'vitest';
import {
  bindRow,
  coerceStringMap,
  dataValues,
  fieldSlots,
  fieldValues,
  filterValues,
  resetFields,
  scanInteger,
} from './fieldIntrospector';
import { SqlGenerator } from './sqlGenerator';
import { ScanError } from './errors';
import { recordType } from './model';
import { Person } from './sampleModels';

function ann(): Person {
  return Object.assign(new Person(), {
    id: 7,
    name: 'Ann',
    email: 'ann@example.com',
    age: 31,
    active: true,
    groupId: 2,
  });
}

describe('fieldSlots', () => {
  test('lists the identity first when included', () => {
    const person = new Person();
    expect(fieldSlots(person, true).map(s => s.name)).toEqual(['id', 'name', 'email', 'age', 'active', 'groupId']);
    expect(fieldSlots(person, false).map(s => s.kind)).toEqual(['string', 'string', 'int', 'bool', 'int64']);
  });

  test('reads and writes through to the record', () => {
    const person = new Person();
    const [name] = fieldSlots(person, false);
    name.set('Bea');
    expect(person.name).toBe('Bea');
    expect(name.get()).toBe('Bea');
  });

  test('collects values in column order', () => {
    expect(fieldValues(ann(), true)).toEqual([7, 'Ann', 'ann@example.com', 31, true, 2]);
    expect(dataValues(ann())).toEqual({ name: 'Ann', email: 'ann@example.com', age: 31, active: true, groupId: 2 });
  });
});

describe('filterValues', () => {
  test('follows declared field order and flattens lists', () => {
    const handle = new SqlGenerator(new Person()[recordType]);
    expect(filterValues(handle, { groupId: [1, 2], name: 'A' })).toEqual(['A', 1, 2]);
    expect(filterValues(handle, undefined)).toEqual([]);
  });
});

describe('coerceStringMap', () => {
  test('converts to field kinds and drops unknown keys', () => {
    expect(coerceStringMap(new Person(), { age: '30', active: 'true', bogus: 'x' })).toEqual({ age: 30, active: true });
  });

  test('drops integers that do not parse and non-string values', () => {
    expect(coerceStringMap(new Person(), { age: '30x', groupId: '-12', name: 'Ann', email: 5 })).toEqual({
      groupId: -12,
      name: 'Ann',
    });
  });

  test('treats anything but "true" as false', () => {
    expect(coerceStringMap(new Person(), { active: 'TRUE' })).toEqual({ active: false });
  });
});

describe('resetFields', () => {
  test('zeroes the identity and every field', () => {
    const person = ann();
    resetFields(person);
    expect(person).toEqual(new Person());
  });
});

describe('bindRow', () => {
  const handle = new SqlGenerator(new Person()[recordType]);

  test('converts driver values by column name', () => {
    const person = new Person();
    bindRow(person, handle, { id: '7', name: 'Ann', email: 'ann@example.com', age: 31, active: true, group_id: 2n });
    expect(person).toEqual(ann());
  });

  test('leaves the record untouched when a column cannot be scanned', () => {
    const person = new Person();
    const row = { id: 7, name: 'Ann', email: 'ann@example.com', age: null, active: true, group_id: 2 };

    expect(() => bindRow(person, handle, row)).toThrow(ScanError);
    expect(() => bindRow(person, handle, row)).toThrow('Cannot scan NULL into int field age');
    expect(person).toEqual(new Person());
  });

  test('rejects a missing column', () => {
    expect(() => bindRow(new Person(), handle, { id: 1 })).toThrow('Cannot scan missing column into string field name');
  });
});

describe('scanInteger', () => {
  test('accepts numbers, bigints and decimal strings', () => {
    expect(scanInteger('count', 3)).toBe(3);
    expect(scanInteger('count', 12n)).toBe(12);
    expect(scanInteger('count', '-4')).toBe(-4);
  });

  test('rejects fractions and other values', () => {
    expect(() => scanInteger('count', 1.5)).toThrow('Cannot scan number 1.5 into int64 field count');
    expect(() => scanInteger('count', 'abc')).toThrow('Cannot scan string "abc" into int64 field count');
  });
});
