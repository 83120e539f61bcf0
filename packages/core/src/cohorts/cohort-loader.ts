import { existsSync, readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { load as parseYaml } from 'js-yaml';
import { CohortDefinitionError, SourceFileNotFoundError } from '../shared/errors.js';
import { withSpan } from '../observability/index.js';
import { parseTsv } from '../tsv/index.js';
import { parseCohortCriteria, parseCohortDefinition } from './cohort-parser.js';
import type { CohortRule } from './types.js';

const COHORT_TABLE_SCHEMA = { columns: { cohort: 'string' } } as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isKeyValueLine(line: string): boolean {
  return line
    .split('\t')
    .filter((field) => field.trim() !== '')
    .every((field) => field.includes(':'));
}

function withLocation(err: unknown, source: string, line: number): unknown {
  if (err instanceof CohortDefinitionError) {
    return new CohortDefinitionError(`${source}:${line}: ${err.message}`, err.definition);
  }
  return err;
}

/**
 * Parse a cohort table. Two layouts are accepted:
 *
 * - one `field:value` definition per line (no header), e.g.
 *   `cohort:1\tlast_name:Chen\tage:[10,50]\tcountry:US`
 * - a headered TSV with a `cohort` column, where an empty cell leaves that
 *   field unconstrained.
 */
export function parseCohortTable(content: string, source = '<cohorts>'): CohortRule[] {
  const lines = content
    .split('\n')
    .map((text, i) => ({ number: i + 1, text: text.replace(/\r$/, '') }))
    .filter((line) => line.text.trim() !== '');

  if (lines.length === 0) return [];

  if (isKeyValueLine(lines[0].text)) {
    return lines.map((line) => {
      try {
        return parseCohortDefinition(line.text);
      } catch (err) {
        throw withLocation(err, source, line.number);
      }
    });
  }

  const records = parseTsv(content, { schema: COHORT_TABLE_SCHEMA, inferTypes: false, source });
  return records.map((record, i) => {
    const entries: Record<string, string> = {};
    for (const [column, value] of Object.entries(record)) {
      if (typeof value === 'string' && value !== '') {
        entries[column] = value;
      }
    }
    try {
      return parseCohortCriteria(entries);
    } catch (err) {
      throw withLocation(err, source, lines[i + 1].number);
    }
  });
}

function readCohortEntries(parsed: unknown, filePath: string): Record<string, string | number>[] {
  if (!isRecord(parsed) || !Array.isArray(parsed.cohorts)) {
    throw new CohortDefinitionError(`Invalid cohort file ${filePath}: expected { cohorts: [...] }`);
  }

  return parsed.cohorts.map((item: unknown, i: number) => {
    if (!isRecord(item)) {
      throw new CohortDefinitionError(`Invalid cohort file ${filePath}: entry ${i} is not a mapping`);
    }
    const entries: Record<string, string | number> = {};
    for (const [key, value] of Object.entries(item)) {
      if (typeof value !== 'string' && typeof value !== 'number') {
        throw new CohortDefinitionError(
          `Invalid cohort file ${filePath}: entry ${i} field "${key}" must be a string or number`,
        );
      }
      entries[key] = value;
    }
    return entries;
  });
}

/**
 * Load cohorts from a `.tsv` table, or from a YAML / JSON file shaped
 * `{ cohorts: [{ cohort: '1', age: '[10,50]' }] }`.
 */
export function loadCohortsFromFile(filePath: string): CohortRule[] {
  return withSpan('cohorts.load', { 'file.path': filePath }, () => {
    if (!existsSync(filePath)) {
      throw new SourceFileNotFoundError(filePath);
    }
    const content = readFileSync(filePath, 'utf-8');
    const ext = extname(filePath).toLowerCase();

    if (ext !== '.yaml' && ext !== '.yml' && ext !== '.json') {
      return parseCohortTable(content, filePath);
    }

    const parsed: unknown = ext === '.json' ? JSON.parse(content) : parseYaml(content);
    return readCohortEntries(parsed, filePath).map((entries, i) => {
      try {
        return parseCohortCriteria(entries);
      } catch (err) {
        if (err instanceof CohortDefinitionError) {
          throw new CohortDefinitionError(`${filePath}: cohort entry ${i}: ${err.message}`);
        }
        throw err;
      }
    });
  });
}
