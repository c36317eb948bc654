// file: src/graph/cypher.ts
import { int } from 'neo4j-driver';
import type { Direction, ExpandPlan, LookupPlan, QueryPlan, ShortestPathPlan } from './query_plan';
import { assertBoundedInt, MAX_CONTEXT_DEPTH, MAX_PATH_DEPTH } from './query_plan';
import { assertNodeLabel, assertPropertyKey, assertRelationshipType } from './schema';

export type CompiledQuery = {
  text: string;
  params: Record<string, unknown>;
};

/* ===================== FRAGMENTY (tylko z allow-listy) ===================== */

function labelFragment(label: string | null): string {
  return label ? `:${assertNodeLabel(label)}` : '';
}

function propertyRef(variable: string, key: string): string {
  return `${variable}.\`${assertPropertyKey(key)}\``;
}

function relPattern(direction: Direction, relTypes: readonly string[], min: number, max: number): string {
  const types = relTypes.map(assertRelationshipType).join('|');
  const body = `[${types ? `:${types}` : ''}*${min}..${max}]`;
  if (direction === 'out') return `-${body}->`;
  if (direction === 'in') return `<-${body}-`;
  return `-${body}-`;
}

/* ================================ PLANY ================================ */

function compileLookup(plan: LookupPlan): CompiledQuery {
  const params: Record<string, unknown> = { limit: int(plan.limit) };
  const conditions: string[] = [];

  if (plan.nameContains !== null) {
    conditions.push('toLower(n.name) CONTAINS toLower($nameContains)');
    params.nameContains = plan.nameContains;
  }
  if (plan.nameEquals !== null) {
    conditions.push('toLower(n.name) = toLower($nameEquals)');
    params.nameEquals = plan.nameEquals;
  }
  plan.where.forEach((p, i) => {
    const ref = propertyRef('n', p.key);
    conditions.push(p.mode === 'text' ? `toLower(toString(${ref})) = toLower($p${i})` : `${ref} = $p${i}`);
    params[`p${i}`] = p.mode === 'text' ? String(p.value) : p.value;
  });
  if (plan.excludeIds.length) {
    conditions.push('NOT elementId(n) IN $excludeIds');
    params.excludeIds = [...plan.excludeIds];
  }

  const order =
    plan.orderBy === 'order' ? `${propertyRef('n', 'order')}, n.name, elementId(n)` : 'n.name, elementId(n)';

  const text = [
    `MATCH (n${labelFragment(plan.label)})`,
    conditions.length ? `WHERE ${conditions.join(' AND ')}` : '',
    'RETURN n AS node',
    `ORDER BY ${order}`,
    'LIMIT $limit',
  ]
    .filter(Boolean)
    .join('\n');

  return { text, params };
}

function compileExpand(plan: ExpandPlan): CompiledQuery {
  const depth = assertBoundedInt(plan.depth, 1, MAX_CONTEXT_DEPTH, 'depth');
  const text = [
    'MATCH (a) WHERE elementId(a) = $anchorId',
    `MATCH p = (a)${relPattern(plan.direction, plan.relTypes, 1, depth)}(m${labelFragment(plan.targetLabel)})`,
    'WHERE m <> a',
    'WITH m, p, last(relationships(p)) AS r',
    'RETURN DISTINCT m AS node, length(p) AS hops, type(r) AS relType, coalesce(r.weight, r.strength) AS weight',
  ].join('\n');

  return { text, params: { anchorId: plan.anchorId } };
}

function compileShortestPath(plan: ShortestPathPlan): CompiledQuery {
  const maxDepth = assertBoundedInt(plan.maxDepth, 1, MAX_PATH_DEPTH, 'maxDepth');
  const text = [
    'MATCH (s) WHERE elementId(s) = $fromId',
    'MATCH (e) WHERE elementId(e) = $toId',
    `MATCH p = allShortestPaths((s)${relPattern('out', [plan.relType], 1, maxDepth)}(e))`,
    'RETURN nodes(p) AS path',
  ].join('\n');

  return { text, params: { fromId: plan.fromId, toId: plan.toId } };
}

export function compilePlan(plan: QueryPlan): CompiledQuery {
  switch (plan.kind) {
    case 'lookup':
      return compileLookup(plan);
    case 'expand':
      return compileExpand(plan);
    case 'shortestPath':
      return compileShortestPath(plan);
  }
}
