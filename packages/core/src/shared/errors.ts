export class SourceFileNotFoundError extends Error {
  constructor(public readonly filePath: string) {
    super(`The file path, ${filePath}, does not exist`);
    this.name = 'SourceFileNotFoundError';
  }
}

export class TsvFormatError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly line?: number,
  ) {
    super(line === undefined ? `${source}: ${message}` : `${source}:${line}: ${message}`);
    this.name = 'TsvFormatError';
  }
}

export class TypeCastError extends Error {
  constructor(
    public readonly source: string,
    public readonly line: number,
    public readonly column: string,
    public readonly value: string,
    public readonly expectedType: string,
  ) {
    super(`${source}:${line}: column "${column}" expected ${expectedType}, got "${value}"`);
    this.name = 'TypeCastError';
  }
}

export class CohortDefinitionError extends Error {
  constructor(
    message: string,
    public readonly definition?: string,
  ) {
    super(message);
    this.name = 'CohortDefinitionError';
  }
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class EntityNotFoundError extends Error {
  constructor(public readonly entityId: number) {
    super(`Entity not found: eid ${entityId}`);
    this.name = 'EntityNotFoundError';
  }
}
