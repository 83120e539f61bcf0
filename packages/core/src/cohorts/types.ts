import type { EntityField } from '../entities/types.js';

export type ConditionOperator = 'eq' | 'gt' | 'gte' | 'lt' | 'lte' | 'email_domain';

export interface Condition {
  field: EntityField;
  operator: ConditionOperator;
  value: string | number;
}

export interface CohortRule {
  cohort: string;
  /** Predicates as written, keyed by entity field (the `cohort` id excluded). */
  criteria: Readonly<Record<string, string>>;
  conditions: readonly Condition[];
}

export interface NumericRange {
  min: number;
  max: number;
  minInclusive: boolean;
  maxInclusive: boolean;
}

export interface CohortTrace {
  cohort: string;
  result: 'matched' | 'condition_false';
  failed_fields?: EntityField[];
  evaluation_ms: number;
}

export interface CohortEvaluation {
  eid: number;
  matched: string[];
  traces: CohortTrace[];
}
