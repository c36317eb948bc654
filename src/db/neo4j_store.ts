// file: src/db/neo4j_store.ts
import neo4j, { isInt, isNode, Neo4jError, type Driver, type Record as Neo4jRecord } from 'neo4j-driver';
import { QueryExecutionError, QueryTimeoutError, StoreUnavailableError, truncateDiagnostic } from '../errors';
import { compilePlan } from '../graph/cypher';
import type { ExpandPlan, LookupPlan, QueryPlan, ShortestPathPlan } from '../graph/query_plan';
import type { GraphNode, NodeProperties, PropertyValue, Scalar } from '../types/graph';
import { createLogger } from '../util/log';
import { withTimeout, type GraphStore, type HopRow, type NodeRow, type PathRow, type StoreOptions } from './store';

export type Neo4jConfig = StoreOptions & {
  uri: string;
  username: string;
  password: string;
  database: string;
};

/* ---- konwersje wartości z drivera ---- */

function toScalar(v: unknown): Scalar {
  // poza zakresem 2^53 liczba straciłaby cyfry, zostaje tekst
  if (isInt(v)) return v.inSafeRange() ? v.toNumber() : v.toString();
  if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean') return v;
  return String(v); // daty, punkty itp.
}

function toPropertyValue(v: unknown): PropertyValue {
  if (v === null || v === undefined) return null;
  if (Array.isArray(v)) return v.map(toScalar);
  return toScalar(v);
}

function toNumberOrNull(v: unknown): number | null {
  if (isInt(v)) return v.inSafeRange() ? v.toNumber() : null;
  return typeof v === 'number' ? v : null;
}

export function toGraphNode(v: unknown, planId: string): GraphNode {
  if (!isNode(v)) throw new QueryExecutionError(planId, 'result row does not hold a node');
  const properties: NodeProperties = {};
  for (const [key, val] of Object.entries(v.properties)) properties[key] = toPropertyValue(val);
  return { id: v.elementId, labels: [...v.labels].sort(), properties };
}

function isServerTimeout(e: unknown): boolean {
  return e instanceof Neo4jError && e.code.includes('TransactionTimedOut');
}

export class Neo4jGraphStore implements GraphStore {
  private driver: Driver | null = null;
  private readonly log = createLogger('kg:neo4j');

  constructor(private readonly config: Neo4jConfig) {}

  async connect(): Promise<void> {
    if (this.driver) return;
    const driver = neo4j.driver(this.config.uri, neo4j.auth.basic(this.config.username, this.config.password));
    try {
      await driver.verifyConnectivity({ database: this.config.database });
    } catch (e) {
      await driver.close().catch((closeErr: unknown) => this.log.warn(`driver close after failed connect: ${String(closeErr)}`));
      this.log.error(`Neo4j unreachable at ${this.config.uri}`, e);
      throw new StoreUnavailableError(`Cannot reach Neo4j at ${this.config.uri}`, { uri: this.config.uri }, { cause: e });
    }
    this.driver = driver;
    this.log.info(`✅ Neo4j connected (${this.config.uri}, db=${this.config.database})`);
  }

  run(plan: LookupPlan): Promise<NodeRow[]>;
  run(plan: ExpandPlan): Promise<HopRow[]>;
  run(plan: ShortestPathPlan): Promise<PathRow[]>;
  async run(plan: QueryPlan): Promise<NodeRow[] | HopRow[] | PathRow[]> {
    const records = await this.execute(plan);
    switch (plan.kind) {
      case 'lookup':
        return records.map(r => ({ node: toGraphNode(r.get('node'), plan.id) }));
      case 'expand':
        return records.map(r => ({
          node: toGraphNode(r.get('node'), plan.id),
          hops: toNumberOrNull(r.get('hops')) ?? plan.depth,
          relType: String(r.get('relType')),
          weight: toNumberOrNull(r.get('weight')),
        }));
      case 'shortestPath':
        return records.map(r => {
          const raw: unknown = r.get('path');
          const nodes = Array.isArray(raw) ? raw : [];
          return { path: nodes.map(n => toGraphNode(n, plan.id)) };
        });
    }
  }

  private async execute(plan: QueryPlan): Promise<Neo4jRecord[]> {
    if (!this.driver) throw new StoreUnavailableError('Neo4j store is not connected; call connect() first');
    const { text, params } = compilePlan(plan);
    const timeoutMs = plan.timeoutMs ?? this.config.queryTimeoutMs;
    const session = this.driver.session({ database: this.config.database, defaultAccessMode: neo4j.session.READ });

    this.log.debug(`${plan.id}: ${truncateDiagnostic(text)}`);
    try {
      const work = session.run(text, params, { timeout: timeoutMs }).then(res => res.records);
      return await withTimeout(work, plan.id, timeoutMs);
    } catch (e) {
      if (e instanceof QueryTimeoutError) throw e;
      if (isServerTimeout(e)) throw new QueryTimeoutError(plan.id, timeoutMs);
      throw new QueryExecutionError(plan.id, truncateDiagnostic(text), e);
    } finally {
      await session.close().catch((closeErr: unknown) => this.log.warn(`session close failed: ${String(closeErr)}`));
    }
  }

  async close(): Promise<void> {
    if (!this.driver) return;
    const driver = this.driver;
    this.driver = null;
    await driver.close();
    this.log.info('Neo4j driver closed');
  }
}
