import {
  FetchRemoteResult,
  GraphNode,
  GraphWarning,
  Relation,
  SubgraphExport,
  TraverseOptions,
  TraverseResult,
} from '../types/index.js';
import { ActiveContext } from './activeContext.js';
import { InvalidInputError, NotFoundError, RemoteUnavailableError } from './errors.js';
import { Logger } from './logger.js';
import { PriorityQueue } from './utils/priorityQueue.js';
import { sortRelations } from './utils/relationUtils.js';
import { parseUri, workspaceOf } from './utils/uriUtils.js';

export const DEFAULT_MAX_COST = 1.0;

// Absorbs float drift, e.g. 0.4 + 0.4 + 0.2 landing just above 1.0
const COST_EPSILON = 1e-9;

export interface TraversalGraphReader {
  getNode(uri: string): Promise<GraphNode | null>;
  /** Relations leaving `uri`, oldest first */
  getOutgoing(uri: string): Promise<Relation[]>;
}

/**
 * Writes another workspace's subgraph into the local store
 */
export interface RemoteMaterializer {
  requiresFetch(workspaceId: string): boolean;
  /** Rejects with RemoteUnavailableError when the workspace cannot be reached */
  materialize(uri: string): Promise<FetchRemoteResult>;
}

export interface ExpansionOptions {
  maxCost: number;
  /** Unbounded when omitted */
  contextSizeCap?: number;
  remote?: RemoteMaterializer;
}

export interface Expansion {
  nodes: GraphNode[];
  costs: Map<string, number>;
  edges: Relation[];
  warnings: GraphWarning[];
  truncated: boolean;
}

interface Frontier {
  uri: string;
  cost: number;
}

export function validateMaxCost(maxCost: number): void {
  if (!Number.isFinite(maxCost) || maxCost < 0) {
    throw new InvalidInputError(`maxCost must be a finite, non-negative number, got ${maxCost}`, { maxCost });
  }
}

/**
 * Cost-bounded shortest-path expansion from a seed node.
 *
 * Nodes are accepted in order of accumulated weight. Weight-0 targets of a
 * newly accepted node join it at the same cost before the queue moves on,
 * whatever the budget. Targets missing from the reader become warnings.
 */
export async function expandFrom(
  reader: TraversalGraphReader,
  seedUri: string,
  options: ExpansionOptions,
): Promise<Expansion> {
  validateMaxCost(options.maxCost);
  const cap = options.contextSizeCap ?? Number.POSITIVE_INFINITY;
  if (cap !== Number.POSITIVE_INFINITY && (!Number.isInteger(cap) || cap < 1)) {
    throw new InvalidInputError(`contextSizeCap must be a positive integer, got ${cap}`, { contextSizeCap: cap });
  }

  const remote = options.remote;
  const accepted = new Map<string, { node: GraphNode; cost: number }>();
  const tentative = new Map<string, { node: GraphNode; cost: number }>();
  const outgoingCache = new Map<string, Relation[]>();
  const resolved = new Map<string, GraphNode>();
  const fetchAttempted = new Set<string>();
  // First warning per URI; dropped again if a later fetch finds the node
  const missing = new Map<string, GraphWarning>();
  const queue = new PriorityQueue<Frontier>((a, b) => a.cost - b.cost);
  let truncated = false;

  const outgoingOf = async (uri: string): Promise<Relation[]> => {
    let relations = outgoingCache.get(uri);
    if (!relations) {
      relations = await reader.getOutgoing(uri);
      outgoingCache.set(uri, relations);
    }
    return relations;
  };

  const warnOnce = (warning: GraphWarning): void => {
    if (!missing.has(warning.uri)) {
      missing.set(warning.uri, warning);
    }
  };

  // Misses stay unresolved: the same URI reached later across a workspace boundary still gets its fetch
  const resolveTarget = async (uri: string, fromUri: string): Promise<GraphNode | null> => {
    const cached = resolved.get(uri);
    if (cached) {
      return cached;
    }

    let node = await reader.getNode(uri);
    const { scheme, workspaceId } = parseUri(uri);

    if (!node && remote && !fetchAttempted.has(uri) &&
      workspaceId !== workspaceOf(fromUri) && remote.requiresFetch(workspaceId)) {
      fetchAttempted.add(uri);
      try {
        await remote.materialize(uri);
        node = await reader.getNode(uri);
      } catch (error) {
        if (!(error instanceof RemoteUnavailableError)) {
          throw error;
        }
        warnOnce({ kind: 'remote_unavailable', uri, workspaceId, reason: error.message });
        return null;
      }
    }

    if (!node) {
      warnOnce(scheme === 'concept'
        ? { kind: 'dangling_concept', uri, sourceUri: fromUri }
        : { kind: 'missing_resource', uri, sourceUri: fromUri });
      return null;
    }
    missing.delete(uri);
    resolved.set(uri, node);
    return node;
  };

  const accept = async (node: GraphNode, cost: number): Promise<void> => {
    const batch = [node];
    accepted.set(node.uri, { node, cost });

    // Weight-0 closure
    for (let i = 0; i < batch.length; i++) {
      for (const relation of await outgoingOf(batch[i].uri)) {
        if (relation.weight !== 0 || accepted.has(relation.targetUri)) continue;
        const target = await resolveTarget(relation.targetUri, batch[i].uri);
        if (!target) continue;
        if (accepted.size >= cap) {
          truncated = true;
          break;
        }
        accepted.set(target.uri, { node: target, cost });
        batch.push(target);
      }
    }

    for (const member of batch) {
      for (const relation of await outgoingOf(member.uri)) {
        if (accepted.has(relation.targetUri)) continue;
        const newCost = cost + relation.weight;
        if (newCost > options.maxCost + COST_EPSILON) continue;
        const known = tentative.get(relation.targetUri);
        if (known && known.cost <= newCost) continue;
        const target = await resolveTarget(relation.targetUri, member.uri);
        if (!target) continue;
        tentative.set(target.uri, { node: target, cost: newCost });
        queue.push({ uri: target.uri, cost: newCost });
      }
    }
  };

  const seed = await reader.getNode(seedUri);
  if (!seed) {
    throw new NotFoundError(`Node '${seedUri}' not found`, { uri: seedUri });
  }
  tentative.set(seedUri, { node: seed, cost: 0 });
  queue.push({ uri: seedUri, cost: 0 });

  while (!queue.isEmpty()) {
    const next = queue.pop();
    if (!next || accepted.has(next.uri)) continue;
    const entry = tentative.get(next.uri);
    // Superseded by a cheaper path that is still queued
    if (!entry || entry.cost !== next.cost) continue;
    if (accepted.size >= cap) {
      truncated = true;
      break;
    }
    await accept(entry.node, entry.cost);
  }

  const nodes = [...accepted.values()].map(({ node }) => node);
  const costs = new Map([...accepted].map(([uri, { cost }]): [string, number] => [uri, cost]));
  const edges: Relation[] = [];
  for (const uri of accepted.keys()) {
    const outgoing = await outgoingOf(uri);
    edges.push(...outgoing.filter(relation => accepted.has(relation.targetUri)));
  }

  return { nodes, costs, edges: sortRelations(edges), warnings: [...missing.values()], truncated };
}

export interface TraversalEngineOptions {
  logger: Logger;
  remote?: RemoteMaterializer;
  defaultMaxCost?: number;
}

/**
 * Runs expansions against the graph store and keeps the active context in step
 */
export class TraversalEngine {
  private readonly logger: Logger;
  private readonly remote?: RemoteMaterializer;
  private readonly defaultMaxCost: number;

  constructor(
    private readonly reader: TraversalGraphReader,
    private readonly context: ActiveContext,
    options: TraversalEngineOptions,
  ) {
    this.logger = options.logger;
    this.remote = options.remote;
    this.defaultMaxCost = options.defaultMaxCost ?? DEFAULT_MAX_COST;
    validateMaxCost(this.defaultMaxCost);
  }

  async traverse(seedUri: string, options: TraverseOptions = {}): Promise<TraverseResult> {
    const { workspaceId } = parseUri(seedUri);
    const maxCost = options.maxCost ?? this.defaultMaxCost;
    const contextSizeCap = options.contextSizeCap ?? this.context.cap;

    if (this.remote?.requiresFetch(workspaceId) && !(await this.reader.getNode(seedUri))) {
      await this.materializeSeed(seedUri);
    }

    const expansion = await expandFrom(this.reader, seedUri, {
      maxCost,
      contextSizeCap,
      remote: this.remote,
    });

    // Farthest first, so the seed ends up most recently used
    this.context.touchMany(expansion.nodes.map(node => node.uri).reverse());

    this.logger.debug('Traversal complete', {
      seedUri,
      maxCost,
      accepted: expansion.nodes.length,
      edges: expansion.edges.length,
      warnings: expansion.warnings.length,
      truncated: expansion.truncated
    });

    return {
      seedUri,
      maxCost,
      nodes: expansion.nodes,
      costs: Object.fromEntries(expansion.costs),
      edges: expansion.edges,
      warnings: expansion.warnings,
      truncated: expansion.truncated,
    };
  }

  /**
   * Serializable subgraph around a seed, for handing to another server.
   * Never fetches and never touches the active context.
   */
  async exportSubgraph(seedUri: string, maxCost?: number): Promise<SubgraphExport> {
    parseUri(seedUri);
    const budget = maxCost ?? this.defaultMaxCost;
    const expansion = await expandFrom(this.reader, seedUri, { maxCost: budget });

    return {
      format: 'context-graph/subgraph',
      version: 1,
      seedUri,
      maxCost: budget,
      exportedAt: new Date().toISOString(),
      nodes: expansion.nodes,
      relations: expansion.edges,
    };
  }

  private async materializeSeed(seedUri: string): Promise<void> {
    if (!this.remote) {
      return;
    }
    try {
      await this.remote.materialize(seedUri);
    } catch (error) {
      if (!(error instanceof RemoteUnavailableError)) {
        throw error;
      }
      throw new NotFoundError(`Node '${seedUri}' not found and its workspace is unavailable`, {
        uri: seedUri,
        reason: error.message
      });
    }
  }
}
