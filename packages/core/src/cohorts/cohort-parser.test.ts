import { describe, it, expect } from 'vitest';
import {
  parseCohortDefinition,
  parseCohortCriteria,
  parseRange,
  formatCohortDefinition,
} from './cohort-parser.js';
import { CohortDefinitionError } from '../shared/errors.js';

describe('parseRange', () => {
  it('should read closed bounds', () => {
    expect(parseRange('[10,50]')).toEqual({ min: 10, max: 50, minInclusive: true, maxInclusive: true });
  });

  it('should read open and half-open bounds', () => {
    expect(parseRange('(15,45]')).toEqual({ min: 15, max: 45, minInclusive: false, maxInclusive: true });
    expect(parseRange('[18, 65)')).toEqual({ min: 18, max: 65, minInclusive: true, maxInclusive: false });
  });

  it('should reject an unknown opening bracket', () => {
    expect(() => parseRange('{10,50]')).toThrow('{ must be [ or ( only');
  });

  it('should reject an unknown closing bracket', () => {
    expect(() => parseRange('[10,50}')).toThrow('} must be ] or ) only');
  });

  it('should reject non-numeric bounds', () => {
    expect(() => parseRange('[ten,50]')).toThrow('"ten" is not a number');
  });

  it('should reject a lower bound above the upper bound', () => {
    expect(() => parseRange('[50,10]')).toThrow(CohortDefinitionError);
  });

  it('should reject more than two bounds', () => {
    expect(() => parseRange('[1,2,3]')).toThrow('must have exactly two bounds');
  });
});

describe('parseCohortDefinition', () => {
  it('should compile each field by its entity column type', () => {
    const rule = parseCohortDefinition('cohort:2\tage:(15,45]\tcountry:CH\temails:hotmail.com');

    expect(rule.cohort).toBe('2');
    expect(rule.criteria).toEqual({ age: '(15,45]', country: 'CH', emails: 'hotmail.com' });
    expect(rule.conditions).toEqual([
      { field: 'age', operator: 'gt', value: 15 },
      { field: 'age', operator: 'lte', value: 45 },
      { field: 'country', operator: 'eq', value: 'CH' },
      { field: 'emails', operator: 'email_domain', value: 'hotmail.com' },
    ]);
  });

  it('should compile a plain number on a numeric field as equality', () => {
    const rule = parseCohortDefinition('cohort:9\teid:3');
    expect(rule.conditions).toEqual([{ field: 'eid', operator: 'eq', value: 3 }]);
  });

  it('should keep zip codes as text', () => {
    const rule = parseCohortDefinition('cohort:3\tfirst_name:John\tzip_code:01003');
    expect(rule.conditions).toEqual([
      { field: 'first_name', operator: 'eq', value: 'John' },
      { field: 'zip_code', operator: 'eq', value: '01003' },
    ]);
  });

  it('should accept a cohort with no criteria', () => {
    const rule = parseCohortDefinition('cohort:all');
    expect(rule.conditions).toEqual([]);
  });

  it('should trim whitespace and ignore empty pairs', () => {
    const rule = parseCohortDefinition(' cohort : 7 \t\tcountry: US \t');
    expect(rule.cohort).toBe('7');
    expect(rule.criteria).toEqual({ country: 'US' });
  });

  it('should reject space-delimited pairs read as one cohort id', () => {
    expect(() => parseCohortDefinition('cohort:5 last_name:Jackson age:(18,26)')).toThrow(
      'Cohort id "5 last_name:Jackson age:(18,26)" must not contain whitespace or ":"',
    );
  });

  it('should reject a colon inside the cohort id', () => {
    expect(() => parseCohortDefinition('cohort:a:b')).toThrow(CohortDefinitionError);
  });

  it('should keep colons inside field values', () => {
    const rule = parseCohortDefinition('cohort:1\tlast_name:a:b');
    expect(rule.criteria).toEqual({ last_name: 'a:b' });
  });

  it('should reject a definition without a cohort id', () => {
    expect(() => parseCohortDefinition('country:US')).toThrow('missing a "cohort" id');
  });

  it('should reject a pair without a colon', () => {
    expect(() => parseCohortDefinition('cohort:1\tcountry')).toThrow('Expected field:value, got "country"');
  });

  it('should reject an unknown field', () => {
    expect(() => parseCohortDefinition('cohort:1\theight:180')).toThrow('Unknown cohort field "height"');
  });

  it('should reject a repeated field', () => {
    expect(() => parseCohortDefinition('cohort:1\tcountry:US\tcountry:CH')).toThrow(
      'Field "country" appears more than once',
    );
  });

  it('should reject an empty value', () => {
    expect(() => parseCohortDefinition('cohort:1\tcountry:')).toThrow('Cohort field "country" has an empty value');
  });

  it('should carry the definition on the error', () => {
    try {
      parseCohortDefinition('cohort:1\tage:<18');
      expect.fail('expected a CohortDefinitionError');
    } catch (err) {
      if (!(err instanceof CohortDefinitionError)) throw err;
      expect(err.definition).toBe('cohort:1\tage:<18');
      expect(err.message).toBe('"<18" is not a number');
    }
  });
});

describe('parseCohortCriteria', () => {
  it('should accept numeric values', () => {
    const rule = parseCohortCriteria({ cohort: 4, age: 30 });
    expect(rule.cohort).toBe('4');
    expect(rule.conditions).toEqual([{ field: 'age', operator: 'eq', value: 30 }]);
  });
});

describe('formatCohortDefinition', () => {
  it('should write the cohort back in field:value form', () => {
    const definition = 'cohort:5\tlast_name:Jackson\tage:(18,26)';
    expect(formatCohortDefinition(parseCohortDefinition(definition))).toBe(definition);
  });
});
