// file: src/retrieval/retriever.ts
import { Env, requireEnv, type NameResolution } from '../config/env';
import { Neo4jGraphStore, type Neo4jConfig } from '../db/neo4j_store';
import type { GraphStore } from '../db/store';
import {
  AmbiguousNameError,
  InvalidRequestError,
  isKnowledgeGraphError,
  QueryExecutionError,
  truncateDiagnostic,
} from '../errors';
import type { RelationshipType } from '../graph/schema';
import type {
  ConceptNode,
  ContextResult,
  DependentsResult,
  LearningPathResult,
  NodeDetails,
  PrerequisitesResult,
  RelatedNodesResult,
  SearchResult,
  SimilarByDifficultyResult,
  TopicWithSubtopics,
} from '../types/graph';
import { createLogger, type Logger } from '../util/log';
import { getContext, getRelatedNodes, getTopicWithSubtopics } from './context';
import { getLearningPath } from './learning_path';
import { getDependents, getPrerequisites } from './prerequisites';
import type { RetrievalContext } from './resolve';
import { getAllLevels, getNodeDetails, search, type SearchParams } from './search';
import { similarByDifficulty } from './similarity';

export type RetrieverOptions = {
  nameResolution?: NameResolution;
  pathTimeoutMs?: number;
  logger?: Logger;
};

/**
 * Publiczny zestaw operacji nad grafem wiedzy. Instancję tworzy się jawnie
 * i przekazuje konsumentom; `close()` zwalnia magazyn.
 *
 * Każda operacja: błąd jest logowany i rzucany dalej, nigdy nie zamieniamy
 * go na pusty wynik. Błędy spoza taksonomii stają się `QueryExecutionError`.
 */
export class KnowledgeGraphRetriever {
  private readonly ctx: RetrievalContext;
  private readonly log: Logger;

  constructor(
    private readonly store: GraphStore,
    options: RetrieverOptions = {},
  ) {
    this.log = options.logger ?? createLogger('kg:retriever');
    this.ctx = {
      store,
      nameResolution: options.nameResolution ?? Env.nameResolution,
      pathTimeoutMs: options.pathTimeoutMs ?? Env.pathTimeoutMs,
      log: this.log,
    };
  }

  /** Łączy się z Neo4j i weryfikuje połączenie; brak bazy = wyjątek od razu. */
  static async open(config: Neo4jConfig, options: RetrieverOptions = {}): Promise<KnowledgeGraphRetriever> {
    const store = new Neo4jGraphStore(config);
    await store.connect();
    return new KnowledgeGraphRetriever(store, options);
  }

  static async fromEnv(options: RetrieverOptions = {}): Promise<KnowledgeGraphRetriever> {
    return KnowledgeGraphRetriever.open(
      {
        uri: Env.neo4jUri,
        username: Env.neo4jUsername,
        password: requireEnv('neo4jPassword'),
        database: Env.neo4jDatabase,
        queryTimeoutMs: Env.queryTimeoutMs,
      },
      options,
    );
  }

  search(params: SearchParams): Promise<SearchResult> {
    return this.guard('search', () => search(this.ctx, params));
  }

  getNodeDetails(name: string): Promise<NodeDetails> {
    return this.guard('getNodeDetails', () => getNodeDetails(this.ctx, name));
  }

  getContext(name: string, depth?: number): Promise<ContextResult> {
    return this.guard('getContext', () => getContext(this.ctx, name, depth));
  }

  getRelatedNodes(name: string, relationshipType?: RelationshipType | null): Promise<RelatedNodesResult> {
    return this.guard('getRelatedNodes', () => getRelatedNodes(this.ctx, name, relationshipType));
  }

  getTopicWithSubtopics(name: string): Promise<TopicWithSubtopics> {
    return this.guard('getTopicWithSubtopics', () => getTopicWithSubtopics(this.ctx, name));
  }

  getPrerequisites(name: string): Promise<PrerequisitesResult> {
    return this.guard('getPrerequisites', () => getPrerequisites(this.ctx, name));
  }

  getDependents(name: string): Promise<DependentsResult> {
    return this.guard('getDependents', () => getDependents(this.ctx, name));
  }

  getLearningPath(start: string, end: string, maxDepth?: number): Promise<LearningPathResult> {
    return this.guard('getLearningPath', () => getLearningPath(this.ctx, start, end, maxDepth));
  }

  similarByDifficulty(name: string): Promise<SimilarByDifficultyResult> {
    return this.guard('similarByDifficulty', () => similarByDifficulty(this.ctx, name));
  }

  getAllLevels(): Promise<ConceptNode[]> {
    return this.guard('getAllLevels', () => getAllLevels(this.ctx));
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      if (e instanceof InvalidRequestError || e instanceof AmbiguousNameError) {
        this.log.warn(`${operation}: ${e.message}`);
        throw e;
      }
      this.log.error(`${operation} failed`, e);
      if (isKnowledgeGraphError(e)) throw e;
      throw new QueryExecutionError(operation, truncateDiagnostic(e instanceof Error ? e.message : String(e)), e);
    }
  }
}
