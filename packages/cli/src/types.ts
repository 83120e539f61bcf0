export type ScenarioStep =
  | { action: 'find_cohorts'; eid: number; expect: string[] }
  | { action: 'find_first_cohort'; eid: number; expect: string | null }
  | { action: 'add_cohort'; definition: string; expect: boolean }
  | { action: 'expect_not_found'; eid: number };

export interface Scenario {
  name: string;
  steps: ScenarioStep[];
}

export interface ScenarioResult {
  name: string;
  passed: boolean;
  failures: string[];
}
