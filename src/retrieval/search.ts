// file: src/retrieval/search.ts
import { lookupPlan, MAX_LIMIT } from '../graph/query_plan';
import type { NodeLabel } from '../graph/schema';
import type { ConceptNode, NodeDetails, SearchResult } from '../types/graph';
import { resolveNode, toConceptNode, type RetrievalContext } from './resolve';

export const DEFAULT_SEARCH_LIMIT = 10;

export type SearchParams = {
  name?: string | null;
  label?: NodeLabel | null;
  difficulty?: string | number | null;
  limit?: number;
};

/**
 * Wyszukiwanie po fragmencie nazwy, etykiecie i trudności (AND).
 * Porządek: nazwa rosnąco, potem id. Zero trafień to sukces z pustą listą.
 */
export async function search(ctx: RetrievalContext, params: SearchParams): Promise<SearchResult> {
  const difficulty = params.difficulty ?? '';
  const rows = await ctx.store.run(
    lookupPlan('search', {
      label: params.label,
      nameContains: params.name,
      where: difficulty === '' ? [] : [{ key: 'difficulty', value: difficulty, mode: 'text' }],
      limit: params.limit ?? DEFAULT_SEARCH_LIMIT,
    }),
  );
  const results = rows.map(r => toConceptNode(r.node));
  ctx.log.debug(`search → ${results.length} wyników`);
  return { count: results.length, results };
}

export async function getNodeDetails(ctx: RetrievalContext, name: string): Promise<NodeDetails> {
  const node = await resolveNode(ctx, name, { planId: 'details' });
  return { node: node ? toConceptNode(node) : null };
}

export async function getAllLevels(ctx: RetrievalContext): Promise<ConceptNode[]> {
  const rows = await ctx.store.run(lookupPlan('levels', { label: 'Level', orderBy: 'order', limit: MAX_LIMIT }));
  return rows.map(r => toConceptNode(r.node));
}
