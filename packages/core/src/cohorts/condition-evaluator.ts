import type { EntityRecord } from '../entities/types.js';
import type { Condition } from './types.js';

export function normalizeDomain(domain: string): string {
  return domain.trim().replace(/^@/, '').toLowerCase();
}

export function emailDomain(email: string): string | undefined {
  const at = email.lastIndexOf('@');
  if (at < 0 || at === email.length - 1) return undefined;
  return normalizeDomain(email.slice(at + 1));
}

export function evaluateCondition(condition: Condition, entity: EntityRecord): boolean {
  const value = entity[condition.field];

  switch (condition.operator) {
    case 'eq':
      return value === condition.value;

    case 'gt':
      return typeof value === 'number' && typeof condition.value === 'number' && value > condition.value;

    case 'lt':
      return typeof value === 'number' && typeof condition.value === 'number' && value < condition.value;

    case 'gte':
      return typeof value === 'number' && typeof condition.value === 'number' && value >= condition.value;

    case 'lte':
      return typeof value === 'number' && typeof condition.value === 'number' && value <= condition.value;

    case 'email_domain': {
      if (typeof value === 'string' || typeof value === 'number') return false;
      if (typeof condition.value !== 'string') return false;
      const domain = normalizeDomain(condition.value);
      return value.some((email) => emailDomain(email) === domain);
    }

    default:
      return false;
  }
}
