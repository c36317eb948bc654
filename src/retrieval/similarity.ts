// file: src/retrieval/similarity.ts
import { lookupPlan, MAX_LIMIT } from '../graph/query_plan';
import type { PropertyValue, SimilarByDifficultyResult } from '../types/graph';
import { resolveNode, toConceptNode, type RetrievalContext } from './resolve';

/**
 * Inne węzły o dokładnie tej samej trudności. Węzeł źródłowy wykluczany
 * po identyfikatorze, nie po nazwie (nazwy się powtarzają).
 */
export async function similarByDifficulty(ctx: RetrievalContext, name: string): Promise<SimilarByDifficultyResult> {
  const node = await resolveNode(ctx, name, { planId: 'similar.resolve' });
  if (!node) return { node: null, difficultyLevel: null, similarNodes: [], similarCount: 0 };

  const difficulty: PropertyValue | undefined = node.properties.difficulty;
  if (difficulty === undefined || difficulty === null || Array.isArray(difficulty)) {
    return { node: toConceptNode(node), difficultyLevel: difficulty ?? null, similarNodes: [], similarCount: 0 };
  }

  const rows = await ctx.store.run(
    lookupPlan('similar.scan', {
      where: [{ key: 'difficulty', value: difficulty, mode: 'exact' }],
      excludeIds: [node.id],
      limit: MAX_LIMIT,
    }),
  );
  const similarNodes = rows.filter(r => r.node.id !== node.id).map(r => toConceptNode(r.node));
  return { node: toConceptNode(node), difficultyLevel: difficulty, similarNodes, similarCount: similarNodes.length };
}
