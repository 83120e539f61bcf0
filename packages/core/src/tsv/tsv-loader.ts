import { existsSync, readFileSync } from 'node:fs';
import { SourceFileNotFoundError, TsvFormatError, TypeCastError } from '../shared/errors.js';
import { withSpan } from '../observability/index.js';
import { castField, inferField } from './field-caster.js';
import type { FieldValue, ParseTsvOptions, TsvRecord } from './types.js';

interface Line {
  number: number;
  text: string;
}

function splitLines(content: string): Line[] {
  return content
    .split('\n')
    .map((text, i) => ({ number: i + 1, text: text.endsWith('\r') ? text.slice(0, -1) : text }))
    .filter((line) => line.text.trim() !== '');
}

function readHeader(line: Line, source: string): string[] {
  const header = line.text.split('\t').map((name) => name.trim());
  const seen = new Set<string>();
  for (const name of header) {
    if (name === '') {
      throw new TsvFormatError('empty column name in header', source, line.number);
    }
    if (seen.has(name)) {
      throw new TsvFormatError(`duplicate column "${name}" in header`, source, line.number);
    }
    seen.add(name);
  }
  return header;
}

/**
 * Parse tab-separated content with a header row into records, in file order.
 */
export function parseTsv(content: string, options: ParseTsvOptions = {}): TsvRecord[] {
  const { schema, inferTypes = true, source = '<input>' } = options;
  const lines = splitLines(content);

  const [headerLine, ...rows] = lines;
  if (!headerLine) {
    throw new TsvFormatError('missing header row', source);
  }
  const header = readHeader(headerLine, source);

  if (schema) {
    const missing = Object.keys(schema.columns).filter((column) => !header.includes(column));
    if (missing.length > 0) {
      throw new TsvFormatError(
        `missing column(s) ${missing.map((c) => `"${c}"`).join(', ')}`,
        source,
        headerLine.number,
      );
    }
  }

  return rows.map((line) => {
    const cells = line.text.split('\t');
    if (cells.length !== header.length) {
      throw new TsvFormatError(
        `expected ${header.length} fields, found ${cells.length}`,
        source,
        line.number,
      );
    }

    const record: Record<string, FieldValue> = {};
    header.forEach((column, i) => {
      const raw = cells[i].trim();
      const declared = schema?.columns[column];
      if (declared) {
        const value = castField(raw, declared);
        if (value === undefined) {
          throw new TypeCastError(source, line.number, column, raw, declared);
        }
        record[column] = value;
      } else {
        record[column] = inferTypes ? inferField(raw) : raw;
      }
    });
    return Object.freeze(record);
  });
}

/**
 * Read and parse a tab-separated file.
 */
export function loadTsv(filePath: string, options: Omit<ParseTsvOptions, 'source'> = {}): TsvRecord[] {
  return withSpan('tsv.load', { 'file.path': filePath }, () => {
    if (!existsSync(filePath)) {
      throw new SourceFileNotFoundError(filePath);
    }
    const content = readFileSync(filePath, 'utf-8');
    return parseTsv(content, { ...options, source: filePath });
  });
}
