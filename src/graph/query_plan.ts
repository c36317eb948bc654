// file: src/graph/query_plan.ts
import { InvalidRequestError } from '../errors';
import type { Scalar } from '../types/graph';
import {
  assertNodeLabel,
  assertPropertyKey,
  assertRelationshipType,
  type NodeLabel,
  type PropertyKey,
  type RelationshipType,
} from './schema';

export const MAX_LIMIT = 500;
export const MAX_CONTEXT_DEPTH = 4;
export const MAX_PATH_DEPTH = 10;

/**
 * `text`: porównanie bez wielkości liter na postaci tekstowej (np. "Easy" = "easy", "2" = 2),
 * `exact`: ścisła równość wartości.
 */
export type PropertyPredicate = Readonly<{
  key: PropertyKey;
  value: Scalar;
  mode: 'text' | 'exact';
}>;

export type Direction = 'out' | 'in' | 'both';

type PlanBase = Readonly<{
  id: string;
  timeoutMs: number | null;
}>;

/** Skan węzłów z predykatami (AND). Brak filtra = brak ograniczenia. */
export type LookupPlan = PlanBase &
  Readonly<{
    kind: 'lookup';
    label: NodeLabel | null;
    nameContains: string | null;
    nameEquals: string | null;
    where: readonly PropertyPredicate[];
    excludeIds: readonly string[];
    orderBy: 'name' | 'order';
    limit: number;
  }>;

/** Wielokrokowe rozwinięcie sąsiedztwa, zawsze z górnym limitem głębokości. */
export type ExpandPlan = PlanBase &
  Readonly<{
    kind: 'expand';
    anchorId: string;
    direction: Direction;
    relTypes: readonly RelationshipType[];
    targetLabel: NodeLabel | null;
    depth: number;
  }>;

export type ShortestPathPlan = PlanBase &
  Readonly<{
    kind: 'shortestPath';
    fromId: string;
    toId: string;
    relType: RelationshipType;
    maxDepth: number;
  }>;

export type QueryPlan = LookupPlan | ExpandPlan | ShortestPathPlan;

export function assertBoundedInt(value: number, min: number, max: number, what: string): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new InvalidRequestError(`${what} must be an integer between ${min} and ${max}, got ${value}`, {
      field: what,
      value,
      min,
      max,
    });
  }
  return value;
}

function cleanText(s: string | null | undefined): string | null {
  const t = (s ?? '').trim();
  return t ? t : null;
}

export type LookupOptions = {
  label?: string | null;
  nameContains?: string | null;
  nameEquals?: string | null;
  where?: Array<{ key: string; value: Scalar; mode?: 'text' | 'exact' }>;
  excludeIds?: string[];
  orderBy?: 'name' | 'order';
  limit: number;
  timeoutMs?: number;
};

export function lookupPlan(id: string, opts: LookupOptions): LookupPlan {
  const where = (opts.where ?? []).map(p =>
    Object.freeze({ key: assertPropertyKey(p.key), value: p.value, mode: p.mode ?? 'exact' }),
  );
  return Object.freeze({
    kind: 'lookup',
    id,
    timeoutMs: opts.timeoutMs ?? null,
    label: opts.label ? assertNodeLabel(opts.label) : null,
    nameContains: cleanText(opts.nameContains),
    nameEquals: cleanText(opts.nameEquals),
    where: Object.freeze(where),
    excludeIds: Object.freeze([...(opts.excludeIds ?? [])]),
    orderBy: opts.orderBy ?? 'name',
    limit: assertBoundedInt(opts.limit, 1, MAX_LIMIT, 'limit'),
  });
}

export type ExpandOptions = {
  anchorId: string;
  direction: Direction;
  relTypes?: string[];
  targetLabel?: string | null;
  depth: number;
  timeoutMs?: number;
};

export function expandPlan(id: string, opts: ExpandOptions): ExpandPlan {
  const relTypes = [...new Set((opts.relTypes ?? []).map(assertRelationshipType))].sort();
  return Object.freeze({
    kind: 'expand',
    id,
    timeoutMs: opts.timeoutMs ?? null,
    anchorId: opts.anchorId,
    direction: opts.direction,
    relTypes: Object.freeze(relTypes),
    targetLabel: opts.targetLabel ? assertNodeLabel(opts.targetLabel) : null,
    depth: assertBoundedInt(opts.depth, 1, MAX_CONTEXT_DEPTH, 'depth'),
  });
}

export type ShortestPathOptions = {
  fromId: string;
  toId: string;
  relType: string;
  maxDepth: number;
  timeoutMs?: number;
};

export function shortestPathPlan(id: string, opts: ShortestPathOptions): ShortestPathPlan {
  return Object.freeze({
    kind: 'shortestPath',
    id,
    timeoutMs: opts.timeoutMs ?? null,
    fromId: opts.fromId,
    toId: opts.toId,
    relType: assertRelationshipType(opts.relType),
    maxDepth: assertBoundedInt(opts.maxDepth, 1, MAX_PATH_DEPTH, 'maxDepth'),
  });
}
