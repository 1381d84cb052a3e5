import { metrics } from '../metrics/metrics';
import { logger } from '../utils/logger';
import { ValidationError } from '../utils/errors';

const FORBIDDEN: ReadonlyArray<[string, RegExp]> = [
  ['CREATE', /\bCREATE\b/i],
  ['MERGE', /\bMERGE\b/i],
  ['DELETE', /\bDELETE\b/i],
  ['DETACH', /\bDETACH\b/i],
  ['SET', /\bSET\b/i],
  ['REMOVE', /\bREMOVE\b/i],
  ['DROP', /\bDROP\b/i],
  ['CALL', /\bCALL\b/i],
  ['LOAD CSV', /\bLOAD\s+CSV\b/i],
  ['FOREACH', /\bFOREACH\b/i],
  ['name:', /\bname\s*:/i],
  ['HAS_KNOWLEDGE', /\bHAS_KNOWLEDGE\b/i],
];

// Relationship patterns: -[...]- and <-[...]-
const REL_PATTERN = /-\s*\[([^\]]*)\]/g;

/**
 * Relationship types named inside one `[...]` pattern, e.g.
 * `r:USES|:INGESTS*1..2 {since: 1}` gives USES and INGESTS
 */
export function relationTypesIn(pattern: string): string[] {
  const withoutProps = pattern.replace(/\{[^}]*\}/g, '');
  const colon = withoutProps.indexOf(':');
  if (colon < 0) return [];

  const typeList = withoutProps.slice(colon + 1).split('*')[0] ?? '';
  return typeList
    .split('|')
    .map((type) => type.trim().replace(/^:/, '').replace(/`/g, '').trim())
    .filter((type) => type.length > 0);
}

/**
 * Read-only filter for model-written Cypher. Write clauses, procedure calls
 * and identity-leaking matches are refused outright, as is any relationship
 * type outside the allow-list.
 */
export class CypherGuard {
  constructor(private readonly allowedRelations: ReadonlySet<string>) {}

  check(query: string): void {
    for (const [token, pattern] of FORBIDDEN) {
      if (pattern.test(query)) {
        this.refuse(query, `forbidden token ${token}`);
      }
    }

    for (const match of query.matchAll(REL_PATTERN)) {
      for (const type of relationTypesIn(match[1] ?? '')) {
        if (!this.allowedRelations.has(type)) {
          this.refuse(query, `relationship type ${type} is not readable`);
        }
      }
    }
  }

  private refuse(query: string, reason: string): never {
    metrics.unsafeQueriesRejected.inc();
    logger.warn({ query, reason }, 'Unsafe query rejected');
    throw new ValidationError(`unsafe query: ${reason}`, [{ path: '/query', message: reason }]);
  }
}
