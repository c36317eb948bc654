// file: src/retrieval/context.ts
import type { HopRow } from '../db/store';
import { compareNodes } from '../graph/ordering';
import { assertBoundedInt, expandPlan, MAX_CONTEXT_DEPTH } from '../graph/query_plan';
import type { RelationshipType } from '../graph/schema';
import type { ConceptNode, ContextResult, RelatedNodesResult, TopicWithSubtopics } from '../types/graph';
import { resolveNode, toConceptNode, type RetrievalContext } from './resolve';

export const DEFAULT_CONTEXT_DEPTH = 1;

/**
 * Zwija wiersze rozwinięcia do zbioru węzłów:
 * - każdy węzeł raz, z najmniejszą liczbą kroków,
 * - bez kotwicy i bez niczego poza limitem głębokości,
 * - typy relacji bez powtórzeń, posortowane.
 */
export function summarizeHops(
  rows: HopRow[],
  anchorId: string,
  depth: number,
): { nodes: ConceptNode[]; relationshipTypes: string[] } {
  const best = new Map<string, HopRow>();
  const types = new Set<string>();

  for (const row of rows) {
    if (row.node.id === anchorId || row.hops < 1 || row.hops > depth) continue;
    types.add(row.relType);
    const prev = best.get(row.node.id);
    if (!prev || row.hops < prev.hops) best.set(row.node.id, row);
  }

  const ordered = [...best.values()].sort((a, b) => a.hops - b.hops || compareNodes(a.node, b.node));
  return { nodes: ordered.map(r => toConceptNode(r.node)), relationshipTypes: [...types].sort() };
}

/** Sąsiedztwo węzła do `depth` kroków, po dowolnych relacjach, w obu kierunkach. */
export async function getContext(
  ctx: RetrievalContext,
  name: string,
  depth: number = DEFAULT_CONTEXT_DEPTH,
): Promise<ContextResult> {
  assertBoundedInt(depth, 1, MAX_CONTEXT_DEPTH, 'depth');

  const anchor = await resolveNode(ctx, name, { planId: 'context.resolve' });
  if (!anchor) return { node: null, connectedNodes: [], relationshipTypes: [] };

  const rows = await ctx.store.run(expandPlan('context.expand', { anchorId: anchor.id, direction: 'both', depth }));
  const { nodes, relationshipTypes } = summarizeHops(rows, anchor.id, depth);
  return { node: toConceptNode(anchor), connectedNodes: nodes, relationshipTypes };
}

export async function getRelatedNodes(
  ctx: RetrievalContext,
  name: string,
  relationshipType?: RelationshipType | null,
): Promise<RelatedNodesResult> {
  const anchor = await resolveNode(ctx, name, { planId: 'related.resolve' });
  if (!anchor) return { node: null, relatedNodes: [], relationshipTypes: [] };

  const rows = await ctx.store.run(
    expandPlan('related.expand', {
      anchorId: anchor.id,
      direction: 'both',
      relTypes: relationshipType ? [relationshipType] : [],
      depth: 1,
    }),
  );
  const { nodes, relationshipTypes } = summarizeHops(rows, anchor.id, 1);
  return { node: toConceptNode(anchor), relatedNodes: nodes, relationshipTypes };
}

export async function getTopicWithSubtopics(ctx: RetrievalContext, name: string): Promise<TopicWithSubtopics> {
  const topic = await resolveNode(ctx, name, { planId: 'topic.resolve', label: 'Topic' });
  if (!topic) return { topic: null, subtopics: [], subtopicCount: 0 };

  const rows = await ctx.store.run(
    expandPlan('topic.subtopics', {
      anchorId: topic.id,
      direction: 'out',
      relTypes: ['HAS_SUBTOPIC'],
      targetLabel: 'Subtopic',
      depth: 1,
    }),
  );
  const subtopics = summarizeHops(rows, topic.id, 1).nodes;
  return { topic: toConceptNode(topic), subtopics, subtopicCount: subtopics.length };
}
