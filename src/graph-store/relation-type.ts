import { ValidationError } from '../utils/errors';

/**
 * Relationship types are interpolated into Cypher (they cannot be passed as
 * parameters), so only plain uppercase tokens are ever accepted.
 */
export const RELATION_TYPE_PATTERN = /^[A-Z][A-Z0-9_]*$/;

export function assertRelationType(predicate: string): string {
  if (!RELATION_TYPE_PATTERN.test(predicate)) {
    throw new ValidationError(`predicate must be an uppercase relation token: ${predicate}`, [
      { path: '/predicate', message: `must match ${RELATION_TYPE_PATTERN.source}` },
    ]);
  }
  return predicate;
}
