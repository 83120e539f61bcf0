export { CohortMatcher } from './cohort-matcher.js';
export type { AddCohortOutcome, CohortMatcherOptions, CohortMatcherFiles } from './cohort-matcher.js';
export { evaluateCohort, evaluateCohorts, matchCohorts, firstMatchingCohort } from './cohort-engine.js';
export { evaluateCondition, emailDomain, normalizeDomain } from './condition-evaluator.js';
export {
  parseCohortDefinition,
  parseCohortCriteria,
  parseRange,
  rangeConditions,
  formatCohortDefinition,
} from './cohort-parser.js';
export { loadCohortsFromFile, parseCohortTable } from './cohort-loader.js';
export type {
  CohortRule,
  Condition,
  ConditionOperator,
  NumericRange,
  CohortTrace,
  CohortEvaluation,
} from './types.js';
