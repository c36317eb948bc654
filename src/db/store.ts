// file: src/db/store.ts
import { QueryTimeoutError } from '../errors';
import type { ExpandPlan, LookupPlan, ShortestPathPlan } from '../graph/query_plan';
import type { GraphNode } from '../types/graph';

export type NodeRow = { node: GraphNode };

export type HopRow = {
  node: GraphNode;
  hops: number;
  relType: string;
  weight: number | null;
};

/** Jedna z najkrótszych ścieżek; wybór spośród remisów robi silnik. */
export type PathRow = { path: GraphNode[] };

/**
 * Adapter magazynu grafu. Połączenie żyje tyle co proces,
 * sesja tyle, co pojedyncze `run`.
 */
export interface GraphStore {
  connect(): Promise<void>;
  run(plan: LookupPlan): Promise<NodeRow[]>;
  run(plan: ExpandPlan): Promise<HopRow[]>;
  run(plan: ShortestPathPlan): Promise<PathRow[]>;
  close(): Promise<void>;
}

export type StoreOptions = {
  /** Domyślny limit czasu wywołania, gdy plan nie ma własnego. */
  queryTimeoutMs: number;
};

/** Ściga `work` z zegarem; po przekroczeniu rzuca `QueryTimeoutError`. */
export async function withTimeout<T>(work: Promise<T>, planId: string, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new QueryTimeoutError(planId, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
