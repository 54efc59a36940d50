import { describe, test, expect } from 'vitest';
import { defineRecordType, isValueList, recordType, toSnakeCase, zeroValue, type Entity, type RecordType } from './model';
import { Group } from './sampleModels';

describe('toSnakeCase', () => {
  test('splits camel and Pascal case', () => {
    expect(toSnakeCase('groupId')).toBe('group_id');
    expect(toSnakeCase('PersonSummary')).toBe('person_summary');
    expect(toSnakeCase('name')).toBe('name');
  });

  test('keeps acronyms together', () => {
    expect(toSnakeCase('groupID')).toBe('group_id');
    expect(toSnakeCase('HTTPServer')).toBe('http_server');
  });
});

describe('defineRecordType', () => {
  test('lists fields and relations in declared order', () => {
    const type = new Group()[recordType];

    expect(type.name).toBe('Group');
    expect(type.identityColumn).toBe('id');
    expect(type.fields.map(f => f.name)).toEqual(['name', 'description']);
    expect(type.fields[0]).toEqual({ name: 'name', kind: 'string', rules: { required: true, maxLength: 50 } });
    expect(type.relations).toEqual([{ name: 'persons', foreignKey: 'groupId' }]);
  });

  test('keeps explicit table and identity column', () => {
    const ticketType = defineRecordType<Ticket>({
      name: 'Ticket',
      table: 'support_tickets',
      identityColumn: 'ticket_id',
      fields: { title: { kind: 'string', column: 'subject' } },
    });

    class Ticket implements Entity {
      readonly [recordType]: RecordType = ticketType;
      id = 0;
      title = '';
    }

    expect(new Ticket()[recordType]).toEqual({
      name: 'Ticket',
      table: 'support_tickets',
      identityColumn: 'ticket_id',
      fields: [{ name: 'title', kind: 'string', column: 'subject' }],
      relations: [],
    });
  });
});

describe('helpers', () => {
  test('zeroValue per kind', () => {
    expect(zeroValue('int64')).toBe(0);
    expect(zeroValue('int')).toBe(0);
    expect(zeroValue('string')).toBe('');
    expect(zeroValue('bool')).toBe(false);
  });

  test('isValueList distinguishes lists from scalars', () => {
    expect(isValueList([1, 2])).toBe(true);
    expect(isValueList('a')).toBe(false);
  });
});
