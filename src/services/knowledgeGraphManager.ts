import {
  ChangeEvent,
  ConflictReport,
  ConflictResolution,
  ContextSnapshot,
  DeleteNodeResult,
  FetchRemoteResult,
  GraphNode,
  GraphStorage,
  GraphWarning,
  KnowledgeGraph,
  KnowledgeGraphStats,
  LinkParams,
  LinkResult,
  Metadata,
  OutgoingLinkParams,
  Relation,
  RelationKey,
  SubgraphExport,
  TraverseOptions,
  TraverseResult,
  UpdateNodeParams,
} from '../types/index.js';
import { ActiveContext } from './activeContext.js';
import { ChangeListener, ChangeNotifier, SubscribeOptions } from './changeNotifier.js';
import { AppConfig } from './config.js';
import { ConflictResolutionResult, ConflictResolver } from './conflictResolver.js';
import { InvalidInputError, NotFoundError, RemoteUnavailableError } from './errors.js';
import { GraphStore, MoveNodeResult, validateLinkParams } from './graphStore.js';
import { LinkResolver } from './linkResolver.js';
import { Logger } from './logger.js';
import { FetcherFactory, RemoteFetchService } from './remoteFetchService.js';
import { createGraphStorage } from './storage/storageFactory.js';
import { TraversalEngine } from './traversalEngine.js';
import { parseUri } from './utils/uriUtils.js';
import { WorkspaceRegistry } from './workspaceRegistry.js';

export interface AddConceptParams {
  uri: string;
  name?: string | null;
  content?: string | null;
  metadata?: Metadata;
  /** Outgoing relations created alongside the concept */
  relations?: OutgoingLinkParams[];
}

export interface AddConceptResult {
  node: GraphNode;
  relations: Relation[];
  warnings: GraphWarning[];
}

export interface UnlinkResult {
  removed: boolean;
  relation: Relation | null;
}

export interface KnowledgeGraphComponents {
  store: GraphStore;
  context: ActiveContext;
  traversal: TraversalEngine;
  conflicts: ConflictResolver;
  remote: RemoteFetchService;
  notifier: ChangeNotifier;
  registry: WorkspaceRegistry;
}

export interface WiringOptions {
  logger: Logger;
  activeContextCap?: number;
  defaultMaxCost?: number;
  remoteFetchTimeoutMs?: number;
  notifierBufferSize?: number;
  createFetcher: FetcherFactory;
}

/**
 * Connects the graph components around one store
 */
export function wireComponents(
  storage: GraphStorage,
  registry: WorkspaceRegistry,
  options: WiringOptions,
): KnowledgeGraphComponents {
  const { logger } = options;
  const notifier = new ChangeNotifier(logger.child('notifier'), { bufferSize: options.notifierBufferSize });
  const store = new GraphStore(storage, {
    linkResolver: new LinkResolver(registry),
    logger: logger.child('store'),
    notifier,
  });
  const context = new ActiveContext(store, { cap: options.activeContextCap, notifier });
  const conflicts = new ConflictResolver(store, logger.child('conflicts'));
  const remote = new RemoteFetchService(registry, store, conflicts, {
    logger: logger.child('remote'),
    timeoutMs: options.remoteFetchTimeoutMs,
    createFetcher: options.createFetcher,
  });
  const traversal = new TraversalEngine(store, context, {
    logger: logger.child('traversal'),
    remote,
    defaultMaxCost: options.defaultMaxCost,
  });

  return { store, context, traversal, conflicts, remote, notifier, registry };
}

/**
 * Facade over the knowledge graph: every tool and HTTP route goes through here.
 * Edits keep the active context in step with the store.
 */
export class KnowledgeGraphManager {
  private readonly logger: Logger;
  private readonly store: GraphStore;
  private readonly context: ActiveContext;
  private readonly traversal: TraversalEngine;
  private readonly conflicts: ConflictResolver;
  private readonly remote: RemoteFetchService;
  private readonly notifier: ChangeNotifier;
  private readonly registry: WorkspaceRegistry;

  /**
   * Builds a manager from configuration and initializes its storage
   */
  static async create(
    config: AppConfig,
    logger: Logger,
    createFetcher: FetcherFactory
  ): Promise<KnowledgeGraphManager> {
    const storage = createGraphStorage(config.storage, logger.child('storage'));
    const registry = new WorkspaceRegistry(config.workspaces);
    const components = wireComponents(storage, registry, {
      logger,
      activeContextCap: config.activeContextCap,
      defaultMaxCost: config.defaultMaxCost,
      remoteFetchTimeoutMs: config.remoteFetchTimeoutMs,
      notifierBufferSize: config.notifierBufferSize,
      createFetcher,
    });

    try {
      await components.store.initialize();
    } catch (error) {
      logger.error('Failed to initialize graph storage', error);
      throw error;
    }

    logger.info('KnowledgeGraphManager initialized', {
      storage: config.storage.kind,
      workspaces: registry.list().map(entry => `${entry.workspaceId}:${entry.strategy}`),
      activeContextCap: components.context.cap
    });
    return new KnowledgeGraphManager(components, logger);
  }

  constructor(components: KnowledgeGraphComponents, logger: Logger) {
    this.logger = logger;
    this.store = components.store;
    this.context = components.context;
    this.traversal = components.traversal;
    this.conflicts = components.conflicts;
    this.remote = components.remote;
    this.notifier = components.notifier;
    this.registry = components.registry;
  }

  // ==========================================================================
  // TRAVERSAL
  // ==========================================================================

  async traverse(seedUri: string, options: TraverseOptions = {}): Promise<TraverseResult> {
    return this.traversal.traverse(seedUri, options);
  }

  async exportSubgraph(seedUri: string, maxCost?: number): Promise<SubgraphExport> {
    return this.traversal.exportSubgraph(seedUri, maxCost);
  }

  // ==========================================================================
  // NODES
  // ==========================================================================

  /**
   * Creates a concept and, optionally, relations leaving it. Every relation
   * is checked before the concept is written, so a bad one leaves nothing behind.
   */
  async addConcept(params: AddConceptParams): Promise<AddConceptResult> {
    for (const relation of params.relations ?? []) {
      validateLinkParams({ ...relation, sourceUri: params.uri });
    }

    const node = await this.store.createNode({
      uri: params.uri,
      nodeType: 'concept',
      name: params.name,
      content: params.content,
      metadata: params.metadata,
    });

    const relations: Relation[] = [];
    const warnings: GraphWarning[] = [];
    for (const relation of params.relations ?? []) {
      const result = await this.link({ ...relation, sourceUri: node.uri });
      relations.push(result.relation);
      warnings.push(...result.warnings);
    }

    await this.touchExisting([node.uri]);
    return { node, relations, warnings };
  }

  async getNode(uri: string): Promise<GraphNode> {
    const node = await this.store.getNode(uri);
    if (!node) {
      throw new NotFoundError(`Node '${uri}' not found`, { uri });
    }
    return node;
  }

  async updateConcept(uri: string, params: UpdateNodeParams): Promise<GraphNode> {
    const node = await this.store.updateNode(uri, params);
    this.context.touch(uri);
    return node;
  }

  async moveConcept(oldUri: string, newUri: string): Promise<MoveNodeResult> {
    const existing = await this.store.getNode(oldUri);
    if (existing && existing.nodeType !== 'concept') {
      throw new InvalidInputError(`'${oldUri}' is a ${existing.nodeType}; only concepts can be moved`, { uri: oldUri });
    }

    const result = await this.store.moveNode(oldUri, newUri);
    if (oldUri !== newUri) {
      if (!this.context.rename(oldUri, newUri)) {
        this.context.touch(newUri);
      }
      this.conflicts.forget(oldUri);
    }
    return result;
  }

  async deleteNode(uri: string): Promise<DeleteNodeResult> {
    const result = await this.store.deleteNode(uri);
    this.context.evict(uri);
    this.conflicts.forget(uri);
    return result;
  }

  // ==========================================================================
  // RELATIONS
  // ==========================================================================

  /**
   * Upserts a relation. Endpoints in fetchable workspaces are pulled in after
   * the relation is stored; a failed fetch becomes a warning.
   */
  async link(params: LinkParams): Promise<LinkResult> {
    const result = await this.store.link(params);
    const warnings = [...result.warnings];

    for (const uri of result.deferred) {
      const { scheme, workspaceId } = parseUri(uri);
      try {
        await this.remote.materialize(uri);
      } catch (error) {
        if (!(error instanceof RemoteUnavailableError)) {
          throw error;
        }
        warnings.push({ kind: 'remote_unavailable', uri, workspaceId, reason: error.message });
        continue;
      }

      if (!(await this.store.getNode(uri))) {
        warnings.push(scheme === 'concept'
          ? { kind: 'dangling_concept', uri, sourceUri: params.sourceUri }
          : { kind: 'missing_resource', uri, sourceUri: params.sourceUri });
      }
    }

    await this.touchExisting([params.targetUri, params.sourceUri]);
    return { ...result, warnings };
  }

  async unlink(key: RelationKey): Promise<UnlinkResult> {
    const relation = await this.store.unlink(key);
    await this.touchExisting([key.targetUri, key.sourceUri]);
    return { removed: relation !== null, relation };
  }

  async getRelations(uri: string): Promise<{ outgoing: Relation[]; incoming: Relation[] }> {
    const [outgoing, incoming] = await Promise.all([
      this.store.getOutgoing(uri),
      this.store.getIncoming(uri)
    ]);
    return { outgoing, incoming };
  }

  async readGraph(): Promise<KnowledgeGraph> {
    return this.store.listGraph();
  }

  // ==========================================================================
  // REMOTE WORKSPACES & CONFLICTS
  // ==========================================================================

  async fetchRemoteSubgraph(uri: string): Promise<FetchRemoteResult> {
    const { workspaceId } = parseUri(uri);
    if (!this.registry.requiresFetch(workspaceId)) {
      throw new InvalidInputError(`Workspace '${workspaceId}' is not registered for remote fetch`, { workspaceId });
    }
    return this.remote.materialize(uri);
  }

  listConflicts(): ConflictReport[] {
    return this.conflicts.list();
  }

  async resolveConflict(uri: string, resolution: ConflictResolution): Promise<ConflictResolutionResult> {
    const result = await this.conflicts.resolve(uri, resolution);
    await this.touchExisting([uri]);
    return result;
  }

  // ==========================================================================
  // ACTIVE CONTEXT
  // ==========================================================================

  async getActiveContext(): Promise<ContextSnapshot> {
    return this.context.snapshot();
  }

  async addToActiveContext(uri: string): Promise<{ uris: string[]; evicted: string[] }> {
    await this.getNode(uri);
    const evicted = this.context.touch(uri);
    return { uris: this.context.list(), evicted };
  }

  clearActiveContext(): { cleared: string[] } {
    return { cleared: this.context.clear() };
  }

  // ==========================================================================
  // OBSERVATION
  // ==========================================================================

  async getStats(): Promise<KnowledgeGraphStats> {
    const stats = await this.store.getStats();
    return {
      ...stats,
      activeContextSize: this.context.size,
      activeContextCap: this.context.cap,
      openConflicts: this.conflicts.size,
    };
  }

  subscribe(listener: ChangeListener, options?: SubscribeOptions): () => void {
    return this.notifier.subscribe(listener, options);
  }

  stream(): AsyncIterableIterator<ChangeEvent> {
    return this.notifier.stream();
  }

  async close(): Promise<void> {
    await this.remote.close();
    this.logger.info('KnowledgeGraphManager closed');
  }

  /**
   * Touches the URIs that exist, in order; the last one ends up most recent
   */
  private async touchExisting(uris: string[]): Promise<void> {
    const existing: string[] = [];
    for (const uri of new Set(uris)) {
      if (await this.store.getNode(uri)) {
        existing.push(uri);
      }
    }
    this.context.touchMany(existing);
  }
}
