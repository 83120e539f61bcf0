import { loadTsv, parseTsv } from '../tsv/index.js';
import type { FieldValue, TsvRecord } from '../tsv/index.js';
import { ValidationError } from '../shared/errors.js';
import { ENTITY_SCHEMA } from './types.js';
import type { EntityField, EntityRecord } from './types.js';

function readNumber(row: TsvRecord, field: EntityField): number {
  const value: FieldValue | undefined = row[field];
  if (typeof value !== 'number') {
    throw new ValidationError(`Entity field "${field}" must be a number`, field);
  }
  return value;
}

function readString(row: TsvRecord, field: EntityField): string {
  const value: FieldValue | undefined = row[field];
  if (typeof value !== 'string') {
    throw new ValidationError(`Entity field "${field}" must be text`, field);
  }
  return value;
}

function readList(row: TsvRecord, field: EntityField): readonly string[] {
  const value: FieldValue | undefined = row[field];
  if (value === undefined || typeof value === 'string' || typeof value === 'number') {
    throw new ValidationError(`Entity field "${field}" must be a list`, field);
  }
  return Object.freeze([...value]);
}

export function toEntityRecord(row: TsvRecord): EntityRecord {
  return Object.freeze({
    eid: readNumber(row, 'eid'),
    first_name: readString(row, 'first_name'),
    last_name: readString(row, 'last_name'),
    age: readNumber(row, 'age'),
    country: readString(row, 'country'),
    zip_code: readString(row, 'zip_code'),
    emails: readList(row, 'emails'),
  });
}

export function parseEntities(content: string, source = '<entities>'): EntityRecord[] {
  return parseTsv(content, { schema: ENTITY_SCHEMA, source }).map(toEntityRecord);
}

/**
 * Load the entities file. Sample row:
 *
 *   eid  first_name  last_name  age  country  zip_code  emails
 *   1    John        Lee        22   US       91003     [jlee@yahoo.com,jl123@gmail.com]
 */
export function loadEntities(filePath: string): EntityRecord[] {
  return loadTsv(filePath, { schema: ENTITY_SCHEMA }).map(toEntityRecord);
}
