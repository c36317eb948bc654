// file: src/retrieval/prerequisites.ts
import type { HopRow } from '../db/store';
import { compareNodes } from '../graph/ordering';
import { expandPlan, type Direction } from '../graph/query_plan';
import type { ConceptNode, DependentsResult, GraphNode, PrerequisitesResult } from '../types/graph';
import { resolveNode, toConceptNode, type RetrievalContext } from './resolve';

// waga malejąco, bez wagi na końcu, potem nazwa
function byWeight(a: HopRow, b: HopRow): number {
  if (a.weight !== b.weight) {
    if (a.weight === null) return 1;
    if (b.weight === null) return -1;
    return b.weight - a.weight;
  }
  return compareNodes(a.node, b.node);
}

/** Sąsiedzi po jednej krawędzi PREREQUISITE_FOR; przy krawędziach równoległych zostaje najcięższa. */
async function prerequisiteNeighbours(
  ctx: RetrievalContext,
  anchor: GraphNode,
  direction: Direction,
  planId: string,
): Promise<ConceptNode[]> {
  const rows = await ctx.store.run(
    expandPlan(planId, { anchorId: anchor.id, direction, relTypes: ['PREREQUISITE_FOR'], depth: 1 }),
  );

  const best = new Map<string, HopRow>();
  for (const row of rows) {
    if (row.node.id === anchor.id || row.hops !== 1) continue;
    const prev = best.get(row.node.id);
    if (!prev || byWeight(row, prev) < 0) best.set(row.node.id, row);
  }
  return [...best.values()].sort(byWeight).map(r => toConceptNode(r.node));
}

/** Co trzeba znać wcześniej: węzły z krawędzią PREREQUISITE_FOR wchodzącą do węzła. */
export async function getPrerequisites(ctx: RetrievalContext, name: string): Promise<PrerequisitesResult> {
  const node = await resolveNode(ctx, name, { planId: 'prerequisites.resolve' });
  if (!node) return { node: null, prerequisites: [], prerequisiteCount: 0 };

  const prerequisites = await prerequisiteNeighbours(ctx, node, 'in', 'prerequisites.expand');
  return { node: toConceptNode(node), prerequisites, prerequisiteCount: prerequisites.length };
}

/** Co węzeł odblokowuje: cele jego wychodzących krawędzi PREREQUISITE_FOR. */
export async function getDependents(ctx: RetrievalContext, name: string): Promise<DependentsResult> {
  const node = await resolveNode(ctx, name, { planId: 'dependents.resolve' });
  if (!node) return { node: null, dependents: [], dependentCount: 0 };

  const dependents = await prerequisiteNeighbours(ctx, node, 'out', 'dependents.expand');
  return { node: toConceptNode(node), dependents, dependentCount: dependents.length };
}
