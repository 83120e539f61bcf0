import { evaluateCondition } from './condition-evaluator.js';
import type { EntityRecord, EntityField } from '../entities/types.js';
import type { CohortRule, CohortTrace, CohortEvaluation } from './types.js';

/**
 * Evaluate one cohort against an entity. A cohort matches when every
 * condition holds; a cohort without conditions matches everyone.
 */
export function evaluateCohort(rule: CohortRule, entity: EntityRecord): CohortTrace {
  const start = performance.now();

  const failedFields: EntityField[] = [];
  for (const condition of rule.conditions) {
    if (!evaluateCondition(condition, entity) && !failedFields.includes(condition.field)) {
      failedFields.push(condition.field);
    }
  }

  const evaluationMs = performance.now() - start;

  if (failedFields.length === 0) {
    return { cohort: rule.cohort, result: 'matched', evaluation_ms: evaluationMs };
  }
  return {
    cohort: rule.cohort,
    result: 'condition_false',
    failed_fields: failedFields,
    evaluation_ms: evaluationMs,
  };
}

/**
 * Evaluate every cohort in table order, keeping a trace per cohort.
 */
export function evaluateCohorts(entity: EntityRecord, cohorts: readonly CohortRule[]): CohortEvaluation {
  const traces = cohorts.map((rule) => evaluateCohort(rule, entity));
  return {
    eid: entity.eid,
    matched: traces.filter((t) => t.result === 'matched').map((t) => t.cohort),
    traces,
  };
}

function matches(rule: CohortRule, entity: EntityRecord): boolean {
  return rule.conditions.every((condition) => evaluateCondition(condition, entity));
}

/**
 * All cohort ids the entity satisfies, in table order.
 */
export function matchCohorts(entity: EntityRecord, cohorts: readonly CohortRule[]): string[] {
  return cohorts.filter((rule) => matches(rule, entity)).map((rule) => rule.cohort);
}

/**
 * The first cohort id the entity satisfies, or null.
 */
export function firstMatchingCohort(entity: EntityRecord, cohorts: readonly CohortRule[]): string | null {
  return cohorts.find((rule) => matches(rule, entity))?.cohort ?? null;
}
