/**
 * Tests for the read-only query filter
 */
import { CypherGuard, relationTypesIn } from '../../src/agent/cypher-guard';
import { ValidationError } from '../../src/utils/errors';
import { TEST_POLICY } from '../helpers/fixtures';

describe('relationTypesIn', () => {
  it('reads a single type', () => {
    expect(relationTypesIn(':USES')).toEqual(['USES']);
  });

  it('reads alternatives, a variable and a length range', () => {
    expect(relationTypesIn('r:USES|INGESTS|:PRODUCES*1..2')).toEqual(['USES', 'INGESTS', 'PRODUCES']);
  });

  it('ignores property maps', () => {
    expect(relationTypesIn('r:USES {since: 2020}')).toEqual(['USES']);
  });

  it('returns nothing for an untyped pattern', () => {
    expect(relationTypesIn('r*1..2')).toEqual([]);
  });
});

describe('CypherGuard', () => {
  const guard = new CypherGuard(TEST_POLICY.allowedReadRelations);

  it.each([
    'MATCH (e:Entity {id:$id}) RETURN e',
    'MATCH (a:Entity {id:$id})-[:USES]->(b) RETURN b.id',
    'MATCH p=shortestPath((:Entity {id:$a})-[:USES|INGESTS|PRODUCES*..2]-(:Entity {id:$b})) RETURN p',
    'MATCH (a)<-[r:VERSION_OF]-(b) RETURN count(r) AS n',
    'MATCH (e:Entity) WHERE NOT (e)--() RETURN e LIMIT 10',
    'MATCH (n:Entity) RETURN n.id ORDER BY n.id SKIP 5 LIMIT 5',
  ])('accepts %s', (query) => {
    expect(() => guard.check(query)).not.toThrow();
  });

  it.each([
    ['CREATE (n:Entity {id:"x"})', 'CREATE'],
    ['MATCH (a),(b) MERGE (a)-[:USES]->(b)', 'MERGE'],
    ['MATCH (n) DETACH DELETE n', 'DELETE'],
    ['MATCH (n:Entity) SET n.flag = true', 'SET'],
    ['MATCH (n:Entity) REMOVE n.flag', 'REMOVE'],
    ['DROP CONSTRAINT entity_id', 'DROP'],
    ['CALL db.labels()', 'CALL'],
    ['load  csv from "file:///x" as row return row', 'LOAD CSV'],
    ['MATCH p=(a)-[*]-(b) FOREACH (n IN nodes(p) | n)', 'FOREACH'],
    ['MATCH (e:Entity {name: $n}) RETURN e', 'name:'],
    ['MATCH (u)-[:HAS_KNOWLEDGE]->(k) RETURN k', 'HAS_KNOWLEDGE'],
    ['match (n) delete n', 'DELETE'],
  ])('rejects %s (%s)', (query, token) => {
    expect(() => guard.check(query)).toThrow(`forbidden token ${token}`);
  });

  it('rejects relationship types outside the allow-list', () => {
    expect(() => guard.check('MATCH (a)-[:OWNS]->(b) RETURN b')).toThrow('relationship type OWNS is not readable');
  });

  it('rejects a disallowed type hidden among allowed ones', () => {
    expect(() => guard.check('MATCH (a)-[:USES|SECRET_OF*1..2]-(b) RETURN b')).toThrow(ValidationError);
  });

  it('does not treat list literals as relationship patterns', () => {
    expect(() => guard.check('MATCH (n:Entity) WHERE n.id IN ["a:b", "c"] RETURN n')).not.toThrow();
  });
});
