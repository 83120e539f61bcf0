import { resolve } from 'node:path';
import { ValidationError } from './errors.js';

export const ENTITY_FILENAME = 'entities.tsv';
export const ENTITY_COHORT_FILENAME = 'entity_cohorts.tsv';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface MatcherConfig {
  entityFile: string;
  cohortFile: string;
  logLevel: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Read configuration from the environment. Relative file paths resolve
 * against `cwd`.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): MatcherConfig {
  const logLevel = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new ValidationError(
      `Invalid LOG_LEVEL "${logLevel}" (expected one of ${LOG_LEVELS.join(', ')})`,
      'LOG_LEVEL',
    );
  }

  return {
    entityFile: resolve(cwd, env.COHORT_MATCH_ENTITY_FILE ?? ENTITY_FILENAME),
    cohortFile: resolve(cwd, env.COHORT_MATCH_COHORT_FILE ?? ENTITY_COHORT_FILENAME),
    logLevel,
  };
}
