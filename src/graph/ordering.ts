// file: src/graph/ordering.ts
import type { GraphNode } from '../types/graph';

function rawName(node: GraphNode): string | null {
  const name = node.properties.name;
  return typeof name === 'string' ? name : null;
}

export function nodeName(node: GraphNode): string {
  return rawName(node) ?? '';
}

// porządek jak w Cypherze: porównanie po kodach znaków, bez locale
function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Nazwa, potem identyfikator: stabilny porządek dla węzłów o tej samej nazwie.
 * Węzły bez nazwy na końcu, jak `ORDER BY n.name` w Neo4j.
 */
export function compareNodes(a: GraphNode, b: GraphNode): number {
  const na = rawName(a);
  const nb = rawName(b);
  if (na === null || nb === null) {
    if (na !== nb) return na === null ? 1 : -1;
    return compareText(a.id, b.id);
  }
  return compareText(na, nb) || compareText(a.id, b.id);
}

/** Właściwość `order` rosnąco (brak na końcu), potem jak `compareNodes`. */
export function compareByOrder(a: GraphNode, b: GraphNode): number {
  const oa = a.properties.order;
  const ob = b.properties.order;
  const na = typeof oa === 'number' ? oa : Number.POSITIVE_INFINITY;
  const nb = typeof ob === 'number' ? ob : Number.POSITIVE_INFINITY;
  if (na !== nb) return na < nb ? -1 : 1;
  return compareNodes(a, b);
}

/** Ścieżki porównywane pozycja po pozycji (nazwa, id); krótsza wygrywa przy wspólnym prefiksie. */
export function comparePaths(a: GraphNode[], b: GraphNode[]): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const c = compareNodes(a[i], b[i]);
    if (c) return c;
  }
  return a.length - b.length;
}
