export type ColumnType = 'integer' | 'float' | 'string' | 'list';

export type FieldValue = string | number | readonly string[];

export type TsvRecord = Readonly<Record<string, FieldValue>>;

export interface TableSchema {
  /** Declared column types; every declared column must appear in the header. */
  columns: Readonly<Record<string, ColumnType>>;
}

export interface ParseTsvOptions {
  schema?: TableSchema;
  /** Cast undeclared columns that look numeric or list-shaped. Defaults to true. */
  inferTypes?: boolean;
  /** Name used in error messages. */
  source?: string;
}
