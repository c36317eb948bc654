// file: src/db/memory_store.ts
import fs from 'node:fs';
import { QueryTimeoutError, StoreUnavailableError } from '../errors';
import type { ExpandPlan, LookupPlan, PropertyPredicate, QueryPlan, ShortestPathPlan } from '../graph/query_plan';
import { compareByOrder, compareNodes } from '../graph/ordering';
import { isRelationshipType } from '../graph/schema';
import { buildAdjacency, expandBounded, shortestPath, type Adjacency, type Edge } from '../graph/traversal';
import type { GraphNode, NodeProperties, PropertyValue, Scalar } from '../types/graph';
import { createLogger } from '../util/log';
import type { GraphStore, HopRow, NodeRow, PathRow, StoreOptions } from './store';

export type SnapshotRelationship = {
  from: string;
  to: string;
  type: string;
  weight?: number | null;
  strength?: number | null;
};

export type GraphSnapshot = {
  nodes: GraphNode[];
  relationships: SnapshotRelationship[];
};

function isObject(v: unknown): v is { [key: string]: unknown } {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isScalar(v: unknown): v is Scalar {
  return typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean';
}

function parseProperties(raw: unknown, where: string): NodeProperties {
  if (raw === undefined) return {};
  if (!isObject(raw)) throw new Error(`${where}: properties musi być obiektem`);
  const props: NodeProperties = {};
  for (const [key, v] of Object.entries(raw)) {
    if (v === null || isScalar(v)) props[key] = v;
    else if (Array.isArray(v) && v.every(isScalar)) props[key] = [...v];
    else throw new Error(`${where}: właściwość "${key}" nie jest skalarem ani listą skalarów`);
  }
  return props;
}

function optionalWeight(v: unknown, where: string): number | null {
  if (v === undefined || v === null) return null;
  if (typeof v !== 'number' || v < 0 || v > 1) throw new Error(`${where}: waga spoza [0,1]`);
  return v;
}

/**
 * Waliduje snapshot grafu:
 * - unikalne id i niepuste etykiety węzłów,
 * - relacje tylko między istniejącymi węzłami i tylko typów ze schematu.
 */
export function parseSnapshot(raw: unknown): GraphSnapshot {
  if (!isObject(raw) || !Array.isArray(raw.nodes) || !Array.isArray(raw.relationships)) {
    throw new Error('Nieprawidłowy snapshot: brak nodes/relationships');
  }

  const nodes: GraphNode[] = [];
  const ids = new Set<string>();
  raw.nodes.forEach((n: unknown, i: number) => {
    const where = `nodes[${i}]`;
    if (!isObject(n) || typeof n.id !== 'string' || !n.id) throw new Error(`${where}: brak id`);
    if (ids.has(n.id)) throw new Error(`${where}: zduplikowane id "${n.id}"`);
    const labels = Array.isArray(n.labels) ? n.labels.filter((l): l is string => typeof l === 'string') : [];
    if (!labels.length) throw new Error(`${where}: węzeł bez etykiet`);
    ids.add(n.id);
    nodes.push({ id: n.id, labels: [...labels].sort(), properties: parseProperties(n.properties, where) });
  });

  const relationships: SnapshotRelationship[] = [];
  raw.relationships.forEach((r: unknown, i: number) => {
    const where = `relationships[${i}]`;
    if (!isObject(r) || typeof r.from !== 'string' || typeof r.to !== 'string' || typeof r.type !== 'string') {
      throw new Error(`${where}: wymagane from/to/type`);
    }
    if (!ids.has(r.from) || !ids.has(r.to)) throw new Error(`${where}: krawędź do nieistniejącego węzła ${r.from} -> ${r.to}`);
    if (!isRelationshipType(r.type)) throw new Error(`${where}: nieznany typ relacji "${r.type}"`);
    relationships.push({
      from: r.from,
      to: r.to,
      type: r.type,
      weight: optionalWeight(r.weight, where),
      strength: optionalWeight(r.strength, where),
    });
  });

  return { nodes, relationships };
}

function matchesPredicate(value: PropertyValue | undefined, p: PropertyPredicate): boolean {
  if (value === undefined || value === null || Array.isArray(value)) return false;
  if (p.mode === 'text') return String(value).toLowerCase() === String(p.value).toLowerCase();
  return value === p.value;
}

type Indexed = { byId: Map<string, GraphNode>; nodes: GraphNode[]; adj: Adjacency };

/**
 * Magazyn w pamięci nad snapshotem JSON. Wykonuje te same plany co Neo4j,
 * z tą samą semantyką filtrów i porządku: tryb offline CLI i zaślepka testów.
 */
export class MemoryGraphStore implements GraphStore {
  private graph: Indexed | null = null;
  private readonly log = createLogger('kg:memory');

  constructor(
    private readonly source: { file: string } | { snapshot: GraphSnapshot },
    private readonly options: StoreOptions,
  ) {}

  async connect(): Promise<void> {
    if (this.graph) return;
    let snapshot: GraphSnapshot;
    try {
      snapshot = 'file' in this.source
        ? parseSnapshot(JSON.parse(fs.readFileSync(this.source.file, 'utf8')))
        : parseSnapshot(this.source.snapshot);
    } catch (e) {
      throw new StoreUnavailableError(
        `Cannot load graph snapshot: ${e instanceof Error ? e.message : String(e)}`,
        'file' in this.source ? { file: this.source.file } : {},
        { cause: e },
      );
    }

    const edges: Edge[] = snapshot.relationships.map(r => ({
      from: r.from,
      to: r.to,
      type: r.type,
      weight: r.weight ?? r.strength ?? null,
    }));
    this.graph = {
      byId: new Map(snapshot.nodes.map(n => [n.id, n])),
      nodes: snapshot.nodes,
      adj: buildAdjacency(edges),
    };
    this.log.info(`📦 snapshot loaded (nodes=${snapshot.nodes.length}, relationships=${edges.length})`);
  }

  run(plan: LookupPlan): Promise<NodeRow[]>;
  run(plan: ExpandPlan): Promise<HopRow[]>;
  run(plan: ShortestPathPlan): Promise<PathRow[]>;
  async run(plan: QueryPlan): Promise<NodeRow[] | HopRow[] | PathRow[]> {
    const graph = this.graph;
    if (!graph) throw new StoreUnavailableError('Memory store is not connected; call connect() first');
    const timeoutMs = plan.timeoutMs ?? this.options.queryTimeoutMs;
    // obliczenia synchroniczne: limit sprawdzany między warstwami przejścia
    const deadline = Date.now() + timeoutMs;
    const checkpoint = () => {
      if (Date.now() > deadline) throw new QueryTimeoutError(plan.id, timeoutMs);
    };

    switch (plan.kind) {
      case 'lookup':
        return this.lookup(graph, plan, checkpoint);
      case 'expand':
        return this.expand(graph, plan, checkpoint);
      case 'shortestPath':
        return this.shortest(graph, plan, checkpoint);
    }
  }

  private lookup(graph: Indexed, plan: LookupPlan, checkpoint: () => void): NodeRow[] {
    const contains = plan.nameContains?.toLowerCase() ?? null;
    const equals = plan.nameEquals?.toLowerCase() ?? null;
    const excluded = new Set(plan.excludeIds);

    const hits = graph.nodes.filter(n => {
      if (plan.label && !n.labels.includes(plan.label)) return false;
      if (excluded.has(n.id)) return false;
      const name = typeof n.properties.name === 'string' ? n.properties.name.toLowerCase() : null;
      if (contains !== null && (name === null || !name.includes(contains))) return false;
      if (equals !== null && name !== equals) return false;
      return plan.where.every(p => matchesPredicate(n.properties[p.key], p));
    });
    checkpoint();

    hits.sort(plan.orderBy === 'order' ? compareByOrder : compareNodes);
    return hits.slice(0, plan.limit).map(node => ({ node }));
  }

  private expand(graph: Indexed, plan: ExpandPlan, checkpoint: () => void): HopRow[] {
    const label = plan.targetLabel;
    const hops = expandBounded(graph.adj, plan.anchorId, {
      direction: plan.direction,
      relTypes: plan.relTypes,
      depth: plan.depth,
      accept: label ? id => graph.byId.get(id)?.labels.includes(label) ?? false : undefined,
      checkpoint,
    });
    const rows: HopRow[] = [];
    for (const h of hops) {
      const node = graph.byId.get(h.nodeId);
      if (node) rows.push({ node, hops: h.hops, relType: h.relType, weight: h.weight });
    }
    return rows;
  }

  private shortest(graph: Indexed, plan: ShortestPathPlan, checkpoint: () => void): PathRow[] {
    if (!graph.byId.has(plan.fromId) || !graph.byId.has(plan.toId)) return [];
    const byName = (a: string, b: string) => {
      const na = graph.byId.get(a);
      const nb = graph.byId.get(b);
      return na && nb ? compareNodes(na, nb) : 0;
    };
    const ids = shortestPath(graph.adj, plan.fromId, plan.toId, {
      relType: plan.relType,
      maxDepth: plan.maxDepth,
      compare: byName,
      checkpoint,
    });
    if (!ids) return [];
    const path: GraphNode[] = [];
    for (const id of ids) {
      const node = graph.byId.get(id);
      if (node) path.push(node);
    }
    return [{ path }];
  }

  async close(): Promise<void> {
    this.graph = null;
  }
}
