// file: src/graph/traversal.ts
import type { Direction } from './query_plan';

export type Edge = {
  from: string;
  to: string;
  type: string;
  weight: number | null;
};

export type Adjacency = {
  out: Map<string, Edge[]>;
  in: Map<string, Edge[]>;
};

export type Hop = {
  nodeId: string;
  hops: number;
  relType: string;
  weight: number | null;
};

export function buildAdjacency(edges: Edge[]): Adjacency {
  const adj: Adjacency = { out: new Map(), in: new Map() };
  for (const e of edges) {
    const outs = adj.out.get(e.from) ?? [];
    outs.push(e);
    adj.out.set(e.from, outs);
    const ins = adj.in.get(e.to) ?? [];
    ins.push(e);
    adj.in.set(e.to, ins);
  }
  return adj;
}

/** Krawędzie incydentne z `id` w danym kierunku, razem z węzłem po drugiej stronie. */
function incident(adj: Adjacency, id: string, direction: Direction): Array<{ edge: Edge; other: string }> {
  const res: Array<{ edge: Edge; other: string }> = [];
  if (direction !== 'in') for (const e of adj.out.get(id) ?? []) res.push({ edge: e, other: e.to });
  if (direction !== 'out') for (const e of adj.in.get(id) ?? []) res.push({ edge: e, other: e.from });
  return res;
}

/**
 * BFS warstwami, maksymalnie `depth` kroków od kotwicy:
 * - każda przejrzana krawędź daje wiersz (jak ostatnia krawędź ścieżki w Cypherze),
 * - węzeł trafia do następnej warstwy tylko przy pierwszym odwiedzeniu,
 * - kotwica nigdy nie jest wynikiem.
 */
export function expandBounded(
  adj: Adjacency,
  anchorId: string,
  opts: {
    direction: Direction;
    relTypes: readonly string[];
    depth: number;
    accept?: (nodeId: string) => boolean;
    /** Wołane przed każdą warstwą; może przerwać przejście wyjątkiem. */
    checkpoint?: () => void;
  },
): Hop[] {
  const allowed = new Set(opts.relTypes);
  const visited = new Set<string>([anchorId]);
  const hops: Hop[] = [];
  let frontier = [anchorId];

  for (let level = 1; level <= opts.depth && frontier.length; level++) {
    opts.checkpoint?.();
    const next: string[] = [];
    for (const u of frontier) {
      for (const { edge, other } of incident(adj, u, opts.direction)) {
        if (allowed.size && !allowed.has(edge.type)) continue;
        if (other === anchorId) continue;
        if (!opts.accept || opts.accept(other)) {
          hops.push({ nodeId: other, hops: level, relType: edge.type, weight: edge.weight });
        }
        if (!visited.has(other)) {
          visited.add(other);
          next.push(other);
        }
      }
    }
    frontier = next;
  }

  return hops;
}

/**
 * Najkrótsza ścieżka (liczba krawędzi) wzdłuż `relType`, tylko w przód.
 * Sąsiedzi rozwijani w kolejności `compare`, więc przy remisie długości
 * wygrywa ścieżka leksykograficznie najmniejsza. `null` gdy brak w limicie.
 */
export function shortestPath(
  adj: Adjacency,
  fromId: string,
  toId: string,
  opts: {
    relType: string;
    maxDepth: number;
    compare: (a: string, b: string) => number;
    checkpoint?: () => void;
  },
): string[] | null {
  if (fromId === toId) return [fromId];

  const parent = new Map<string, string>();
  const visited = new Set<string>([fromId]);
  let frontier = [fromId];

  for (let level = 1; level <= opts.maxDepth && frontier.length; level++) {
    opts.checkpoint?.();
    const next: string[] = [];
    for (const u of frontier) {
      const targets = (adj.out.get(u) ?? [])
        .filter(e => e.type === opts.relType)
        .map(e => e.to)
        .sort(opts.compare);
      for (const v of targets) {
        if (visited.has(v)) continue;
        visited.add(v);
        parent.set(v, u);
        if (v === toId) return unwind(parent, fromId, toId);
        next.push(v);
      }
    }
    frontier = next;
  }

  return null;
}

function unwind(parent: Map<string, string>, fromId: string, toId: string): string[] {
  const path = [toId];
  let cur = toId;
  while (cur !== fromId) {
    const p = parent.get(cur);
    if (p === undefined) break;
    path.push(p);
    cur = p;
  }
  return path.reverse();
}
