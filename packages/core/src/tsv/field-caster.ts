import type { ColumnType, FieldValue } from './types.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function isListLiteral(raw: string): boolean {
  return raw.length >= 2 && raw.startsWith('[') && raw.endsWith(']');
}

export function parseList(raw: string): string[] {
  return raw
    .slice(1, -1)
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

/**
 * Cast a raw cell to its declared type. Returns `undefined` when the text
 * does not fit the type.
 */
export function castField(raw: string, type: ColumnType): FieldValue | undefined {
  switch (type) {
    case 'integer': {
      if (!INTEGER_PATTERN.test(raw)) return undefined;
      const value = Number.parseInt(raw, 10);
      return Number.isSafeInteger(value) ? value : undefined;
    }

    case 'float': {
      if (!FLOAT_PATTERN.test(raw)) return undefined;
      const value = Number(raw);
      return Number.isFinite(value) ? value : undefined;
    }

    case 'list':
      return isListLiteral(raw) ? parseList(raw) : undefined;

    case 'string':
      return raw;

    default:
      return undefined;
  }
}

/**
 * Cast a cell from an undeclared column by its shape: integer, then float,
 * then list, otherwise text.
 */
export function inferField(raw: string): FieldValue {
  return castField(raw, 'integer') ?? castField(raw, 'float') ?? castField(raw, 'list') ?? raw;
}
