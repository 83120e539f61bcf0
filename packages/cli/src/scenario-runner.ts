import { EntityNotFoundError, type CohortMatcher } from '@cohort-match/core';
import type { Scenario, ScenarioResult, ScenarioStep } from './types.js';

function show(value: unknown): string {
  return JSON.stringify(value);
}

function sameList(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((item, i) => item === b[i]);
}

/**
 * Run one step; returns a failure message, or null when the step passed.
 */
function runStep(matcher: CohortMatcher, step: ScenarioStep): string | null {
  switch (step.action) {
    case 'find_cohorts': {
      const actual = matcher.findEntityCohorts(step.eid);
      return sameList(actual, step.expect)
        ? null
        : `find_cohorts(${step.eid}): expected ${show(step.expect)}, got ${show(actual)}`;
    }

    case 'find_first_cohort': {
      const actual = matcher.findFirstEntityCohort(step.eid);
      return actual === step.expect
        ? null
        : `find_first_cohort(${step.eid}): expected ${show(step.expect)}, got ${show(actual)}`;
    }

    case 'add_cohort': {
      const actual = matcher.addEntityCohort(step.definition);
      return actual === step.expect
        ? null
        : `add_cohort(${show(step.definition)}): expected ${step.expect}, got ${actual}`;
    }

    case 'expect_not_found':
      try {
        matcher.getEntity(step.eid);
      } catch (err) {
        if (err instanceof EntityNotFoundError) return null;
        throw err;
      }
      return `expect_not_found(${step.eid}): entity exists`;
  }
}

export function runScenario(matcher: CohortMatcher, scenario: Scenario): ScenarioResult {
  const failures: string[] = [];
  for (const step of scenario.steps) {
    try {
      const failure = runStep(matcher, step);
      if (failure) failures.push(failure);
    } catch (err) {
      failures.push(`${step.action}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  return { name: scenario.name, passed: failures.length === 0, failures };
}

export function runScenarios(matcher: CohortMatcher, scenarios: readonly Scenario[]): ScenarioResult[] {
  return scenarios.map((scenario) => runScenario(matcher, scenario));
}
