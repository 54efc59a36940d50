import { defineRecordType, recordType, type Constructors, type Entity, type RecordFactory, type RecordType } from './model';

const groupType = defineRecordType<Group>({
  name: 'Group',
  fields: {
    name: { kind: 'string', rules: { required: true, maxLength: 50 } },
    description: { kind: 'string', rules: { maxLength: 255 } },
  },
  relations: {
    persons: { foreignKey: 'groupId' },
  },
});

export class Group implements Entity {
  readonly [recordType]: RecordType = groupType;
  id = 0;
  name = '';
  description = '';
}

const personType = defineRecordType<Person>({
  name: 'Person',
  fields: {
    name: { kind: 'string', rules: { required: true, maxLength: 100 } },
    email: { kind: 'string', rules: { required: true, format: 'email' } },
    age: { kind: 'int', rules: { minimum: 0, maximum: 150 } },
    active: { kind: 'bool' },
    groupId: { kind: 'int64' },
  },
});

export class Person implements Entity {
  readonly [recordType]: RecordType = personType;
  id = 0;
  name = '';
  email = '';
  age = 0;
  active = false;
  groupId = 0;
}

/** Factories by the name used on the command line */
export const sampleTypes: Readonly<Record<string, RecordFactory>> = {
  group: () => new Group(),
  person: () => new Person(),
};

/** Deleting a group removes its persons */
export const sampleConstructors: Constructors = {
  persons: () => new Person(),
};
