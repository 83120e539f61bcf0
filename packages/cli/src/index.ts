#!/usr/bin/env tsx
/**
 * Loads entities.tsv and entity_cohorts.tsv from the working directory and
 * runs the built-in scenarios against them.
 *
 * Exit codes: 0 all scenarios passed, 1 a scenario failed, 2 startup failed.
 *
 * Environment:
 *   COHORT_MATCH_ENTITY_FILE   entities file (default entities.tsv)
 *   COHORT_MATCH_COHORT_FILE   cohorts file, .tsv / .yaml / .json (default entity_cohorts.tsv)
 *   LOG_LEVEL                  pino level for stderr logs (default info)
 */

import { CohortMatcher, createLogger, loadConfig } from '@cohort-match/core';
import { SCENARIOS } from './scenarios.js';
import { runScenarios } from './scenario-runner.js';
import { formatReport } from './report.js';

function main(): number {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, stderr: true });

  let matcher: CohortMatcher;
  try {
    matcher = CohortMatcher.fromFiles(config, { logger });
  } catch (err) {
    logger.fatal({ err }, 'Failed to load tables');
    return 2;
  }

  const results = runScenarios(matcher, SCENARIOS);
  process.stdout.write(formatReport(results, { color: process.stdout.isTTY === true }));

  const failed = results.filter((r) => !r.passed).length;
  if (failed > 0) {
    logger.error({ failed }, 'Scenarios failed');
    return 1;
  }
  return 0;
}

try {
  process.exitCode = main();
} catch (err) {
  console.error('cohort-match failed:', err);
  process.exitCode = 2;
}
