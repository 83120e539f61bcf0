import type { Scenario } from './types.js';

/**
 * Scenarios run in order against one matcher, so cohorts added by an
 * earlier scenario are visible to later ones. Expectations follow the
 * sample entities.tsv / entity_cohorts.tsv at the repository root.
 */
export const SCENARIOS: Scenario[] = [
  {
    name: 'entity 1 matches the name, e-mail domain and age cohorts',
    steps: [
      { action: 'find_cohorts', eid: 1, expect: ['3', '4', '6'] },
      { action: 'find_first_cohort', eid: 1, expect: '3' },
    ],
  },
  {
    name: 'entity 3 falls in the half-open age range with a hotmail address',
    steps: [{ action: 'find_cohorts', eid: 3, expect: ['2', '6'] }],
  },
  {
    name: 'entities outside every range match nothing',
    steps: [
      { action: 'find_cohorts', eid: 4, expect: [] },
      { action: 'find_cohorts', eid: 5, expect: [] },
      { action: 'find_first_cohort', eid: 4, expect: null },
    ],
  },
  {
    name: 'adding cohort 5 makes entity 6 eligible',
    steps: [
      { action: 'find_cohorts', eid: 6, expect: ['4', '6'] },
      { action: 'add_cohort', definition: 'cohort:5\tlast_name:Jackson\tage:(18,26)', expect: true },
      { action: 'find_cohorts', eid: 6, expect: ['4', '6', '5'] },
    ],
  },
  {
    name: 'overwriting cohort 5 moves entity 6 out of it',
    steps: [
      { action: 'add_cohort', definition: 'cohort:5\tlast_name:Jackson\tage:(19,26)', expect: true },
      { action: 'find_cohorts', eid: 6, expect: ['4', '6'] },
    ],
  },
  {
    name: 'unknown entities and malformed cohorts are rejected',
    steps: [
      { action: 'expect_not_found', eid: 99 },
      { action: 'add_cohort', definition: 'cohort:7\tage:{18,65]', expect: false },
      { action: 'find_cohorts', eid: 2, expect: ['1', '6'] },
    ],
  },
];
