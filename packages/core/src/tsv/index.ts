export { parseTsv, loadTsv } from './tsv-loader.js';
export { castField, inferField, isListLiteral, parseList } from './field-caster.js';
export type { ColumnType, FieldValue, TsvRecord, TableSchema, ParseTsvOptions } from './types.js';
