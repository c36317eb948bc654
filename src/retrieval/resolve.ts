// file: src/retrieval/resolve.ts
import type { NameResolution } from '../config/env';
import type { GraphStore } from '../db/store';
import { AmbiguousNameError } from '../errors';
import { nodeName } from '../graph/ordering';
import { lookupPlan } from '../graph/query_plan';
import type { NodeLabel } from '../graph/schema';
import type { ConceptNode, GraphNode } from '../types/graph';
import type { Logger } from '../util/log';

/** Wszystko, czego potrzebują operacje, bez stanu między wywołaniami. */
export type RetrievalContext = {
  store: GraphStore;
  nameResolution: NameResolution;
  pathTimeoutMs: number;
  log: Logger;
};

const AMBIGUITY_SAMPLE = 5;

// listy kopiowane: wynik nie może współdzielić tablic z magazynem
export function toConceptNode(node: GraphNode): ConceptNode {
  const record: ConceptNode = { name: nodeName(node), labels: [...node.labels] };
  for (const [key, v] of Object.entries(node.properties)) {
    if (key !== 'name' && key !== 'labels') record[key] = Array.isArray(v) ? [...v] : v;
  }
  return record;
}

/**
 * Rozwiązuje nazwę (częściową) do jednego węzła:
 * 1) dokładne dopasowanie bez wielkości liter wygrywa,
 * 2) inaczej pierwszy węzeł zawierający frazę (po nazwie, potem id),
 * 3) w trybie `strict` kilka częściowych trafień to błąd, nie zgadywanie.
 */
export async function resolveNode(
  ctx: RetrievalContext,
  name: string,
  opts: { planId: string; label?: NodeLabel },
): Promise<GraphNode | null> {
  const term = name.trim();
  if (!term) return null;

  const exact = await ctx.store.run(lookupPlan(`${opts.planId}:exact`, { label: opts.label, nameEquals: term, limit: 1 }));
  if (exact.length) return exact[0].node;

  const strict = ctx.nameResolution === 'strict';
  const partial = await ctx.store.run(
    lookupPlan(`${opts.planId}:partial`, { label: opts.label, nameContains: term, limit: strict ? AMBIGUITY_SAMPLE : 1 }),
  );
  if (!partial.length) return null;
  if (strict && partial.length > 1) {
    throw new AmbiguousNameError(term, partial.map(r => nodeName(r.node)));
  }
  return partial[0].node;
}
