// Shared
export {
  SourceFileNotFoundError,
  TsvFormatError,
  TypeCastError,
  CohortDefinitionError,
  ValidationError,
  EntityNotFoundError,
} from './shared/errors.js';
export { createLogger, silentLogger } from './shared/logger.js';
export type { Logger, LoggerOptions } from './shared/logger.js';
export { loadConfig, ENTITY_FILENAME, ENTITY_COHORT_FILENAME } from './shared/config.js';
export type { MatcherConfig, LogLevel } from './shared/config.js';

// Loader
export { parseTsv, loadTsv, castField, inferField } from './tsv/index.js';
export type { ColumnType, FieldValue, TsvRecord, TableSchema, ParseTsvOptions } from './tsv/index.js';

// Entities
export { loadEntities, parseEntities, toEntityRecord, ENTITY_SCHEMA } from './entities/index.js';
export type { EntityRecord, EntityField } from './entities/index.js';

// Cohorts
export {
  CohortMatcher,
  evaluateCohort,
  evaluateCohorts,
  matchCohorts,
  firstMatchingCohort,
  evaluateCondition,
  parseCohortDefinition,
  parseCohortCriteria,
  parseRange,
  formatCohortDefinition,
  loadCohortsFromFile,
  parseCohortTable,
} from './cohorts/index.js';
export type {
  AddCohortOutcome,
  CohortMatcherOptions,
  CohortMatcherFiles,
  CohortRule,
  Condition,
  ConditionOperator,
  NumericRange,
  CohortTrace,
  CohortEvaluation,
} from './cohorts/index.js';

// Observability
export { withSpan } from './observability/index.js';
