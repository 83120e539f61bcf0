import { CohortDefinitionError, EntityNotFoundError, ValidationError } from '../shared/errors.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import { loadEntities } from '../entities/entity-loader.js';
import type { EntityRecord } from '../entities/types.js';
import { evaluateCohorts, firstMatchingCohort, matchCohorts } from './cohort-engine.js';
import { loadCohortsFromFile } from './cohort-loader.js';
import { formatCohortDefinition, parseCohortDefinition } from './cohort-parser.js';
import type { CohortEvaluation, CohortRule } from './types.js';

export type AddCohortOutcome = 'added' | 'replaced';

export interface CohortMatcherOptions {
  logger?: Logger;
}

export interface CohortMatcherFiles {
  entityFile: string;
  cohortFile: string;
}

/**
 * Holds the entity and cohort tables and answers which cohorts an entity
 * belongs to. The entity table is fixed; the cohort table only changes
 * through `addCohort` / `addEntityCohort`.
 */
export class CohortMatcher {
  private readonly entities = new Map<number, EntityRecord>();
  private readonly cohorts: CohortRule[] = [];
  private readonly logger: Logger;

  constructor(
    entities: readonly EntityRecord[],
    cohorts: readonly CohortRule[],
    options: CohortMatcherOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger();

    for (const entity of entities) {
      if (this.entities.has(entity.eid)) {
        throw new ValidationError(`Duplicate entity id ${entity.eid}`, 'eid', { eid: entity.eid });
      }
      this.entities.set(entity.eid, entity);
    }

    for (const rule of cohorts) {
      if (this.upsert(rule) === 'replaced') {
        this.logger.warn({ cohort: rule.cohort }, 'Duplicate cohort id, later definition wins');
      }
    }
  }

  static fromFiles(files: CohortMatcherFiles, options: CohortMatcherOptions = {}): CohortMatcher {
    const logger = options.logger ?? silentLogger();
    const entities = loadEntities(files.entityFile);
    const cohorts = loadCohortsFromFile(files.cohortFile);
    logger.info(
      {
        entity_file: files.entityFile,
        entities: entities.length,
        cohort_file: files.cohortFile,
        cohorts: cohorts.length,
      },
      'Tables loaded',
    );
    return new CohortMatcher(entities, cohorts, { logger });
  }

  get entityCount(): number {
    return this.entities.size;
  }

  get cohortCount(): number {
    return this.cohorts.length;
  }

  listEntities(): readonly EntityRecord[] {
    return [...this.entities.values()];
  }

  listCohorts(): readonly CohortRule[] {
    return [...this.cohorts];
  }

  getEntity(eid: number): EntityRecord {
    const entity = this.entities.get(eid);
    if (!entity) {
      throw new EntityNotFoundError(eid);
    }
    return entity;
  }

  /**
   * All cohort ids entity `eid` matches, in table order.
   */
  findEntityCohorts(eid: number): string[] {
    const matched = matchCohorts(this.getEntity(eid), this.cohorts);
    this.logger.debug({ eid, matched }, 'Entity cohorts resolved');
    return matched;
  }

  findFirstEntityCohort(eid: number): string | null {
    return firstMatchingCohort(this.getEntity(eid), this.cohorts);
  }

  explainEntityCohorts(eid: number): CohortEvaluation {
    return evaluateCohorts(this.getEntity(eid), this.cohorts);
  }

  /**
   * Append a cohort, or overwrite the rule of an existing cohort with the
   * same id in place.
   */
  addCohort(rule: CohortRule): AddCohortOutcome {
    const outcome = this.upsert(rule);
    this.logger.info(
      { cohort: rule.cohort, outcome, definition: formatCohortDefinition(rule) },
      'Cohort stored',
    );
    return outcome;
  }

  /**
   * Add or overwrite a cohort from its TAB-delimited definition, e.g.
   * `cohort:5\tlast_name:Jackson\tage:(18,26)`. Returns false when the
   * definition is malformed.
   */
  addEntityCohort(definition: string): boolean {
    let rule: CohortRule;
    try {
      rule = parseCohortDefinition(definition);
    } catch (err) {
      if (err instanceof CohortDefinitionError) {
        this.logger.warn({ definition, reason: err.message }, 'Cohort definition rejected');
        return false;
      }
      throw err;
    }
    this.addCohort(rule);
    return true;
  }

  private upsert(rule: CohortRule): AddCohortOutcome {
    const index = this.cohorts.findIndex((existing) => existing.cohort === rule.cohort);
    if (index >= 0) {
      this.cohorts[index] = rule;
      return 'replaced';
    }
    this.cohorts.push(rule);
    return 'added';
  }
}
