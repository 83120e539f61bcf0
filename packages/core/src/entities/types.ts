import type { TableSchema } from '../tsv/types.js';

export interface EntityRecord {
  readonly eid: number;
  readonly first_name: string;
  readonly last_name: string;
  readonly age: number;
  readonly country: string;
  readonly zip_code: string;
  readonly emails: readonly string[];
}

export type EntityField = keyof EntityRecord;

export const ENTITY_SCHEMA = {
  columns: {
    eid: 'integer',
    first_name: 'string',
    last_name: 'string',
    age: 'integer',
    country: 'string',
    zip_code: 'string',
    emails: 'list',
  },
} as const satisfies TableSchema & { columns: Record<EntityField, unknown> };
