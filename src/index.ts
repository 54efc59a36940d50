// Core data model
export type {
  FieldKind,
  FieldValue,
  FieldRules,
  FieldSpec,
  FieldDescriptor,
  RelationDescriptor,
  RecordType,
  RecordTypeDefinition,
  DataFieldName,
  Entity,
  RecordFactory,
  Constructors,
  FilterValue,
  FilterMap,
  ValueMap,
} from './model';

export { defineRecordType, recordType, zeroValue, toSnakeCase } from './model';

// Errors
export type { PersistenceOp, PersistenceErrorKind } from './errors';
export {
  PersistenceError,
  SchemaError,
  ValidationError,
  ConversionError,
  MissingValuesError,
  QueryError,
  ScanError,
  isPersistenceError,
} from './errors';

// Field access
export type { FieldSlot } from './fieldIntrospector';
export {
  fieldSlots,
  fieldValues,
  identitySlot,
  identityValue,
  coerceStringMap,
  resetFields,
  bindRow,
} from './fieldIntrospector';

// SQL generation
export type { OrderBy, OrderDirection, SelectOptions, SqlGeneratorOptions } from './sqlGenerator';
export { SqlGenerator, escapeIdentifier } from './sqlGenerator';

// Schema cache
export type { SchemaCacheOptions } from './schemaCache';
export { SchemaCache } from './schemaCache';

// Validation
export type { ValidationMode, ValidationResult } from './validator';
export { Validator, generateRecordSchema } from './validator';

// Database connection
export type { DbClient, Database } from './database';
export { openDatabase } from './database';

// Logging
export type { StoreLogger } from './logger';
export { createDefaultLogger } from './logger';

// Persistence controller
export type {
  ControllerOptions,
  SaveOptions,
  DeleteOptions,
  DeleteMultipleOptions,
  UpdateMultipleOptions,
  GetOptions,
  GetCountOptions,
} from './controller';
export { Controller, MAX_CASCADE_DEPTH, DEFAULT_CASCADE_BATCH_SIZE } from './controller';
