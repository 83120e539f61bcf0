import { CohortDefinitionError } from '../shared/errors.js';
import { castField } from '../tsv/field-caster.js';
import { ENTITY_SCHEMA } from '../entities/types.js';
import type { EntityField } from '../entities/types.js';
import type { CohortRule, Condition, NumericRange } from './types.js';

const COHORT_KEY = 'cohort';

function isEntityField(name: string): name is EntityField {
  return Object.hasOwn(ENTITY_SCHEMA.columns, name);
}

function parseNumber(text: string, definition?: string): number {
  const value = castField(text.trim(), 'float');
  if (typeof value !== 'number') {
    throw new CohortDefinitionError(`"${text}" is not a number`, definition);
  }
  return value;
}

/**
 * Parse an interval such as `[10,50]`, `(15,45]` or `[18,65)`.
 */
export function parseRange(text: string, definition?: string): NumericRange {
  const trimmed = text.trim();
  const open = trimmed.charAt(0);
  const close = trimmed.charAt(trimmed.length - 1);

  if (open !== '[' && open !== '(') {
    throw new CohortDefinitionError(`${open} must be [ or ( only`, definition);
  }
  if (close !== ']' && close !== ')') {
    throw new CohortDefinitionError(`${close} must be ] or ) only`, definition);
  }

  const bounds = trimmed.slice(1, -1).split(',');
  if (bounds.length !== 2) {
    throw new CohortDefinitionError(`Range "${trimmed}" must have exactly two bounds`, definition);
  }

  const min = parseNumber(bounds[0], definition);
  const max = parseNumber(bounds[1], definition);
  if (min > max) {
    throw new CohortDefinitionError(`Range "${trimmed}" has its lower bound above its upper bound`, definition);
  }

  return { min, max, minInclusive: open === '[', maxInclusive: close === ']' };
}

export function rangeConditions(field: EntityField, range: NumericRange): Condition[] {
  return [
    { field, operator: range.minInclusive ? 'gte' : 'gt', value: range.min },
    { field, operator: range.maxInclusive ? 'lte' : 'lt', value: range.max },
  ];
}

function compileCriterion(field: EntityField, text: string, definition?: string): Condition[] {
  switch (ENTITY_SCHEMA.columns[field]) {
    case 'integer':
      return text.includes(',')
        ? rangeConditions(field, parseRange(text, definition))
        : [{ field, operator: 'eq', value: parseNumber(text, definition) }];

    case 'list':
      return [{ field, operator: 'email_domain', value: text }];

    case 'string':
      return [{ field, operator: 'eq', value: text }];
  }
}

/**
 * Build a cohort rule from field → predicate pairs. The `cohort` entry
 * carries the id; every other key must be an entity field.
 */
export function parseCohortCriteria(
  entries: Readonly<Record<string, string | number>>,
  definition?: string,
): CohortRule {
  const id = entries[COHORT_KEY];
  const cohort = id === undefined ? '' : String(id).trim();
  if (cohort === '') {
    throw new CohortDefinitionError('Cohort definition is missing a "cohort" id', definition);
  }
  if (/[\s:]/.test(cohort)) {
    throw new CohortDefinitionError(`Cohort id "${cohort}" must not contain whitespace or ":"`, definition);
  }

  const criteria: Record<string, string> = {};
  const conditions: Condition[] = [];

  for (const [key, raw] of Object.entries(entries)) {
    if (key === COHORT_KEY) continue;
    if (!isEntityField(key)) {
      throw new CohortDefinitionError(`Unknown cohort field "${key}"`, definition);
    }
    const text = String(raw).trim();
    if (text === '') {
      throw new CohortDefinitionError(`Cohort field "${key}" has an empty value`, definition);
    }
    criteria[key] = text;
    conditions.push(...compileCriterion(key, text, definition));
  }

  return Object.freeze({
    cohort,
    criteria: Object.freeze(criteria),
    conditions: Object.freeze(conditions),
  });
}

/**
 * Parse one TAB-delimited definition, e.g. `cohort:5\tlast_name:Jackson\tage:(18,26)`.
 */
export function parseCohortDefinition(definition: string): CohortRule {
  const entries: Record<string, string> = {};

  for (const pair of definition.split('\t')) {
    if (pair.trim() === '') continue;

    const separator = pair.indexOf(':');
    if (separator < 0) {
      throw new CohortDefinitionError(`Expected field:value, got "${pair.trim()}"`, definition);
    }
    const key = pair.slice(0, separator).trim();
    if (key === '') {
      throw new CohortDefinitionError(`Missing field name in "${pair.trim()}"`, definition);
    }
    if (Object.hasOwn(entries, key)) {
      throw new CohortDefinitionError(`Field "${key}" appears more than once`, definition);
    }
    entries[key] = pair.slice(separator + 1);
  }

  return parseCohortCriteria(entries, definition);
}

export function formatCohortDefinition(rule: CohortRule): string {
  return [
    `${COHORT_KEY}:${rule.cohort}`,
    ...Object.entries(rule.criteria).map(([field, text]) => `${field}:${text}`),
  ].join('\t');
}
