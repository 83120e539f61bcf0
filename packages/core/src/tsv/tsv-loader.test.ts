import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseTsv, loadTsv } from './tsv-loader.js';
import { SourceFileNotFoundError, TsvFormatError, TypeCastError } from '../shared/errors.js';
import type { TableSchema } from './types.js';

const SCHEMA: TableSchema = {
  columns: { id: 'integer', name: 'string', score: 'float' },
};

const THREE_ROWS = 'id\tname\tscore\n1\tAda\t9.5\n2\tGrace\t8\n3\tLin\t7.25\n';

describe('parseTsv', () => {
  it('should yield one record per non-header line, keyed by the header', () => {
    const records = parseTsv(THREE_ROWS, { schema: SCHEMA });

    expect(records).toHaveLength(3);
    for (const record of records) {
      expect(Object.keys(record)).toEqual(['id', 'name', 'score']);
    }
    expect(records[0]).toEqual({ id: 1, name: 'Ada', score: 9.5 });
    expect(records[2]).toEqual({ id: 3, name: 'Lin', score: 7.25 });
  });

  it('should preserve file order', () => {
    const records = parseTsv(THREE_ROWS, { schema: SCHEMA });
    expect(records.map((r) => r.name)).toEqual(['Ada', 'Grace', 'Lin']);
  });

  it('should return frozen records', () => {
    const [record] = parseTsv(THREE_ROWS, { schema: SCHEMA });
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('should skip blank lines and accept CRLF endings', () => {
    const records = parseTsv('id\tname\tscore\r\n\r\n1\tAda\t9.5\r\n\n', { schema: SCHEMA });
    expect(records).toEqual([{ id: 1, name: 'Ada', score: 9.5 }]);
  });

  it('should reject a row with fewer fields than the header', () => {
    const content = 'id\tname\tscore\n1\tAda\t9.5\n2\tGrace\n';
    expect(() => parseTsv(content, { schema: SCHEMA, source: 'people.tsv' })).toThrow(
      new TsvFormatError('expected 3 fields, found 2', 'people.tsv', 3),
    );
  });

  it('should reject a row with more fields than the header', () => {
    const content = 'id\tname\n1\tAda\textra\n';
    expect(() => parseTsv(content)).toThrow(TsvFormatError);
  });

  it('should report an uncastable value in a numeric column', () => {
    const content = 'id\tname\tscore\nx1\tAda\t9.5\n';
    try {
      parseTsv(content, { schema: SCHEMA, source: 'people.tsv' });
      expect.fail('expected a TypeCastError');
    } catch (err) {
      if (!(err instanceof TypeCastError)) throw err;
      expect(err.line).toBe(2);
      expect(err.column).toBe('id');
      expect(err.value).toBe('x1');
      expect(err.message).toBe('people.tsv:2: column "id" expected integer, got "x1"');
    }
  });

  it('should infer types for undeclared columns', () => {
    const records = parseTsv('a\tb\tc\td\n7\t0.5\t[p,q]\tUS\n');
    expect(records[0]).toEqual({ a: 7, b: 0.5, c: ['p', 'q'], d: 'US' });
  });

  it('should keep undeclared columns as text when inference is off', () => {
    const records = parseTsv('a\tage\n7\t[10,50]\n', { inferTypes: false });
    expect(records[0]).toEqual({ a: '7', age: '[10,50]' });
  });

  it('should reject an empty input', () => {
    expect(() => parseTsv('\n\n', { source: 'empty.tsv' })).toThrow('empty.tsv: missing header row');
  });

  it('should reject duplicate header columns', () => {
    expect(() => parseTsv('id\tid\n1\t2\n')).toThrow('duplicate column "id"');
  });

  it('should reject a header missing a declared column', () => {
    expect(() => parseTsv('id\tname\n1\tAda\n', { schema: SCHEMA })).toThrow('missing column(s) "score"');
  });
});

describe('loadTsv', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'tsv-loader-'));
    writeFileSync(join(dir, 'people.tsv'), THREE_ROWS);
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load the same records on every read', () => {
    const first = loadTsv(join(dir, 'people.tsv'), { schema: SCHEMA });
    const second = loadTsv(join(dir, 'people.tsv'), { schema: SCHEMA });

    expect(first).toHaveLength(3);
    expect(second).toEqual(first);
  });

  it('should name the file in format errors', () => {
    const path = join(dir, 'short.tsv');
    writeFileSync(path, 'id\tname\tscore\n1\tAda\n');
    expect(() => loadTsv(path, { schema: SCHEMA })).toThrow(`${path}:2: expected 3 fields, found 2`);
  });

  it('should fail on a missing file', () => {
    expect(() => loadTsv(join(dir, 'nope.tsv'))).toThrow(SourceFileNotFoundError);
  });
});
