// file: src/retrieval/learning_path.ts
import type { PathRow } from '../db/store';
import { comparePaths } from '../graph/ordering';
import { assertBoundedInt, MAX_PATH_DEPTH, shortestPathPlan } from '../graph/query_plan';
import type { GraphNode, LearningPathResult } from '../types/graph';
import { resolveNode, toConceptNode, type RetrievalContext } from './resolve';

export const DEFAULT_PATH_DEPTH = 5;

export const PATH_MESSAGES = {
  found: 'Path found successfully',
  not_found: 'One or both nodes not found',
  no_path: 'No path found within depth limit',
} as const;

/**
 * Wybiera jedną ścieżkę spośród zwróconych najkrótszych:
 * odrzuca te, które nie łączą from→to albo łamią limit,
 * remis długości rozstrzyga porządek (nazwa, id) pozycja po pozycji.
 */
export function pickPath(rows: PathRow[], fromId: string, toId: string, maxDepth: number): GraphNode[] | null {
  const valid = rows
    .map(r => r.path)
    .filter(p => p.length >= 2 && p.length - 1 <= maxDepth && p[0].id === fromId && p[p.length - 1].id === toId);
  if (!valid.length) return null;

  const shortest = Math.min(...valid.map(p => p.length));
  const [best] = valid.filter(p => p.length === shortest).sort(comparePaths);
  return best;
}

/**
 * Najkrótsza ścieżka nauki po PREREQUISITE_FOR (start → end), dwie fazy:
 * 1) oba końce rozwiązywane niezależnie; brak któregoś → `not_found`, bez szukania,
 * 2) szukanie w limicie `maxDepth`; brak → `no_path` z wypełnionymi końcami.
 */
export async function getLearningPath(
  ctx: RetrievalContext,
  start: string,
  end: string,
  maxDepth: number = DEFAULT_PATH_DEPTH,
): Promise<LearningPathResult> {
  assertBoundedInt(maxDepth, 1, MAX_PATH_DEPTH, 'maxDepth');

  const [from, to] = await Promise.all([
    resolveNode(ctx, start, { planId: 'path.start' }),
    resolveNode(ctx, end, { planId: 'path.end' }),
  ]);

  if (!from || !to) {
    return {
      status: 'not_found',
      path: [],
      pathLength: 0,
      startNode: from ? toConceptNode(from) : null,
      endNode: to ? toConceptNode(to) : null,
      message: PATH_MESSAGES.not_found,
    };
  }

  const startNode = toConceptNode(from);
  const endNode = toConceptNode(to);

  if (from.id === to.id) {
    return { status: 'found', path: [startNode], pathLength: 0, startNode, endNode, message: PATH_MESSAGES.found };
  }

  ctx.log.debug(`path: ${startNode.name} → ${endNode.name} (maxDepth=${maxDepth})`);
  const rows = await ctx.store.run(
    shortestPathPlan('path.search', {
      fromId: from.id,
      toId: to.id,
      relType: 'PREREQUISITE_FOR',
      maxDepth,
      timeoutMs: ctx.pathTimeoutMs,
    }),
  );

  const best = pickPath(rows, from.id, to.id, maxDepth);
  if (!best) {
    return { status: 'no_path', path: [], pathLength: 0, startNode, endNode, message: PATH_MESSAGES.no_path };
  }

  const path = best.map(toConceptNode);
  return { status: 'found', path, pathLength: path.length - 1, startNode, endNode, message: PATH_MESSAGES.found };
}
