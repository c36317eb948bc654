// file: src/graph/cypher.spec.ts
import { int } from 'neo4j-driver';
import { describe, expect, it } from 'vitest';
import { InvalidRequestError } from '../errors';
import { compilePlan } from './cypher';
import { expandPlan, lookupPlan, shortestPathPlan } from './query_plan';

describe('compilePlan: lookup', () => {
  it('binds every value as a parameter', () => {
    const { text, params } = compilePlan(
      lookupPlan('search', {
        label: 'Topic',
        nameContains: 'os',
        where: [{ key: 'difficulty', value: 2, mode: 'text' }],
        limit: 10,
      }),
    );
    expect(text).toBe(
      [
        'MATCH (n:Topic)',
        'WHERE toLower(n.name) CONTAINS toLower($nameContains) AND toLower(toString(n.`difficulty`)) = toLower($p0)',
        'RETURN n AS node',
        'ORDER BY n.name, elementId(n)',
        'LIMIT $limit',
      ].join('\n'),
    );
    expect(params).toEqual({ limit: int(10), nameContains: 'os', p0: '2' });
  });

  it('omits WHERE without filters', () => {
    const { text } = compilePlan(lookupPlan('all', { limit: 5 }));
    expect(text).toBe('MATCH (n)\nRETURN n AS node\nORDER BY n.name, elementId(n)\nLIMIT $limit');
  });

  it('compiles exact predicates and excluded ids', () => {
    const { text, params } = compilePlan(
      lookupPlan('similar', {
        where: [{ key: 'difficulty', value: 3, mode: 'exact' }],
        excludeIds: ['4:abc:1'],
        limit: 500,
      }),
    );
    expect(text.split('\n')[1]).toBe('WHERE n.`difficulty` = $p0 AND NOT elementId(n) IN $excludeIds');
    expect(params).toEqual({ limit: int(500), p0: 3, excludeIds: ['4:abc:1'] });
  });

  it('orders levels by the order property', () => {
    const { text } = compilePlan(lookupPlan('levels', { label: 'Level', orderBy: 'order', limit: 500 }));
    expect(text.split('\n')[2]).toBe('ORDER BY n.`order`, n.name, elementId(n)');
  });

  it('keeps hostile names out of the query text', () => {
    const hostile = "x') DETACH DELETE n //";
    const { text, params } = compilePlan(lookupPlan('details:exact', { nameEquals: hostile, limit: 1 }));
    expect(text).not.toContain('DETACH');
    expect(params.nameEquals).toBe(hostile);
  });
});

describe('compilePlan: expand', () => {
  it('builds an undirected pattern without type filter', () => {
    const { text, params } = compilePlan(expandPlan('ctx', { anchorId: 'a1', direction: 'both', depth: 2 }));
    expect(text).toBe(
      [
        'MATCH (a) WHERE elementId(a) = $anchorId',
        'MATCH p = (a)-[*1..2]-(m)',
        'WHERE m <> a',
        'WITH m, p, last(relationships(p)) AS r',
        'RETURN DISTINCT m AS node, length(p) AS hops, type(r) AS relType, coalesce(r.weight, r.strength) AS weight',
      ].join('\n'),
    );
    expect(params).toEqual({ anchorId: 'a1' });
  });

  it('points incoming patterns at the anchor', () => {
    const { text } = compilePlan(
      expandPlan('pre', { anchorId: 'a1', direction: 'in', relTypes: ['PREREQUISITE_FOR'], depth: 1 }),
    );
    expect(text.split('\n')[1]).toBe('MATCH p = (a)<-[:PREREQUISITE_FOR*1..1]-(m)');
  });

  it('joins several types and a target label', () => {
    const { text } = compilePlan(
      expandPlan('sub', {
        anchorId: 'a1',
        direction: 'out',
        relTypes: ['USED_IN', 'HAS_SUBTOPIC'],
        targetLabel: 'Subtopic',
        depth: 1,
      }),
    );
    expect(text.split('\n')[1]).toBe('MATCH p = (a)-[:HAS_SUBTOPIC|USED_IN*1..1]->(m:Subtopic)');
  });

  it('re-checks the depth bound of a modified plan', () => {
    const plan = { ...expandPlan('x', { anchorId: 'a', direction: 'out', depth: 1 }), depth: 9 };
    expect(() => compilePlan(plan)).toThrow(InvalidRequestError);
  });
});

describe('compilePlan: shortestPath', () => {
  it('follows the relationship forward only', () => {
    const { text, params } = compilePlan(
      shortestPathPlan('path', { fromId: 's1', toId: 'e1', relType: 'PREREQUISITE_FOR', maxDepth: 3 }),
    );
    expect(text).toBe(
      [
        'MATCH (s) WHERE elementId(s) = $fromId',
        'MATCH (e) WHERE elementId(e) = $toId',
        'MATCH p = allShortestPaths((s)-[:PREREQUISITE_FOR*1..3]->(e))',
        'RETURN nodes(p) AS path',
      ].join('\n'),
    );
    expect(params).toEqual({ fromId: 's1', toId: 'e1' });
  });
});
