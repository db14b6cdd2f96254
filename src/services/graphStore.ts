import {
  CreateNodeParams,
  DeleteNodeResult,
  GraphNode,
  GraphStorage,
  GraphWarning,
  ImportResult,
  KnowledgeGraph,
  KnowledgeGraphStats,
  LinkParams,
  LinkResult,
  Relation,
  RelationKey,
  Subgraph,
  UpdateNodeParams,
} from '../types/index.js';
import { ChangeNotifier } from './changeNotifier.js';
import {
  ConflictError,
  DuplicateUriError,
  InvalidInputError,
  NotFoundError,
} from './errors.js';
import { LinkResolver } from './linkResolver.js';
import { Logger } from './logger.js';
import { Clock, createMonotonicClock } from './utils/clock.js';
import { ReadWriteLock } from './utils/readWriteLock.js';
import {
  nodesDiverge,
  relationKey,
  sortRelations,
  toRelationKey,
} from './utils/relationUtils.js';
import { parseUri } from './utils/uriUtils.js';

export const DEFAULT_WEIGHT = 1.0;

export interface GraphStoreOptions {
  linkResolver: LinkResolver;
  logger: Logger;
  notifier?: ChangeNotifier;
  now?: Clock;
}

export interface MoveNodeResult {
  node: GraphNode;
  relationsRewritten: number;
}

function validateWeight(weight: number): void {
  if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
    throw new InvalidInputError(`Relation weight must be a number between 0 and 1, got ${weight}`, { weight });
  }
}

function validateRelationType(relationType: string): void {
  if (relationType.trim() === '') {
    throw new InvalidInputError('Relation type must not be empty');
  }
}

function rejectResourceFields(uri: string, name: string | null | undefined, content: string | null | undefined): void {
  if ((name !== undefined && name !== null) || (content !== undefined && content !== null)) {
    throw new InvalidInputError(`Resource '${uri}' cannot carry a name or content`, { uri });
  }
}

/**
 * Throws the error `link` would raise for these arguments, without touching the store
 */
export function validateLinkParams(params: LinkParams): void {
  parseUri(params.sourceUri);
  parseUri(params.targetUri);
  validateRelationType(params.relationType);
  validateWeight(params.weight ?? DEFAULT_WEIGHT);
}

/**
 * Structural check of a subgraph received from another workspace
 */
export function validateSubgraph(subgraph: Subgraph): void {
  for (const node of subgraph.nodes) {
    const { scheme } = parseUri(node.uri);
    if (node.nodeType !== scheme) {
      throw new InvalidInputError(
        `Node type '${node.nodeType}' does not match the URI scheme '${scheme}'`,
        { uri: node.uri }
      );
    }
    if (node.nodeType === 'resource') {
      rejectResourceFields(node.uri, node.name, node.content);
    }
  }
  for (const relation of subgraph.relations) {
    validateLinkParams(relation);
  }
}

/**
 * Source of truth for nodes and relations. Mutations are serialized behind
 * a write lock and committed to the storage backend one at a time; reads
 * share the lock so none observes a half-applied cascade or move.
 */
export class GraphStore {
  private readonly storage: GraphStorage;
  private readonly linkResolver: LinkResolver;
  private readonly logger: Logger;
  private readonly notifier?: ChangeNotifier;
  private readonly now: Clock;
  private readonly lock = new ReadWriteLock();

  constructor(storage: GraphStorage, options: GraphStoreOptions) {
    this.storage = storage;
    this.linkResolver = options.linkResolver;
    this.logger = options.logger;
    this.notifier = options.notifier;
    this.now = options.now ?? createMonotonicClock();
  }

  async initialize(): Promise<void> {
    await this.storage.initialize();
  }

  // ==========================================================================
  // MUTATIONS
  // ==========================================================================

  async createNode(params: CreateNodeParams): Promise<GraphNode> {
    const parsed = parseUri(params.uri);
    if (params.nodeType !== parsed.scheme) {
      throw new InvalidInputError(
        `Node type '${params.nodeType}' does not match the URI scheme '${parsed.scheme}'`,
        { uri: params.uri }
      );
    }
    if (params.nodeType === 'resource') {
      rejectResourceFields(params.uri, params.name, params.content);
    }

    return this.lock.write(async () => {
      if (await this.storage.getNode(params.uri)) {
        throw new DuplicateUriError(params.uri);
      }

      const timestamp = this.now();
      const node: GraphNode = {
        uri: params.uri,
        nodeType: params.nodeType,
        name: params.name ?? null,
        content: params.content ?? null,
        metadata: params.metadata ?? {},
        createdAt: timestamp,
        updatedAt: timestamp,
      };

      await this.storage.putNode(node);
      await this.storage.commit();

      this.logger.debug('Created node', { uri: node.uri });
      this.notifier?.emit({ type: 'node_added', payload: { node } });
      return node;
    });
  }

  /**
   * Supplied fields overwrite; metadata replaces the previous mapping
   */
  async updateNode(uri: string, params: UpdateNodeParams): Promise<GraphNode> {
    parseUri(uri);

    return this.lock.write(async () => {
      const previous = await this.storage.getNode(uri);
      if (!previous) {
        throw new NotFoundError(`Node '${uri}' not found`, { uri });
      }
      if (previous.nodeType === 'resource') {
        rejectResourceFields(uri, params.name, params.content);
      }

      const node: GraphNode = {
        ...previous,
        name: params.name !== undefined ? params.name : previous.name,
        content: params.content !== undefined ? params.content : previous.content,
        metadata: params.metadata ?? previous.metadata,
        updatedAt: this.now(),
      };

      await this.storage.putNode(node);
      await this.storage.commit();

      this.logger.debug('Updated node', { uri });
      this.notifier?.emit({ type: 'node_updated', payload: { node, previous } });
      return node;
    });
  }

  /**
   * Renames a node and rewrites every relation that references it
   */
  async moveNode(oldUri: string, newUri: string): Promise<MoveNodeResult> {
    parseUri(oldUri);
    const target = parseUri(newUri);

    return this.lock.write(async () => {
      const previous = await this.storage.getNode(oldUri);
      if (!previous) {
        throw new NotFoundError(`Node '${oldUri}' not found`, { uri: oldUri });
      }
      if (oldUri === newUri) {
        return { node: previous, relationsRewritten: 0 };
      }
      if (target.scheme !== previous.nodeType) {
        throw new InvalidInputError(
          `Cannot move a ${previous.nodeType} to a '${target.scheme}' URI`,
          { oldUri, newUri }
        );
      }
      if (await this.storage.getNode(newUri)) {
        throw new ConflictError(`URI '${newUri}' is already taken`, { oldUri, newUri });
      }

      const timestamp = this.now();
      const incident = await this.readIncident(oldUri);
      const rename = (uri: string): string => (uri === oldUri ? newUri : uri);

      for (const relation of incident) {
        await this.storage.deleteRelation(relation);
      }

      for (const relation of incident) {
        const rewritten: Relation = {
          ...relation,
          sourceUri: rename(relation.sourceUri),
          targetUri: rename(relation.targetUri),
          updatedAt: timestamp,
        };
        // A relation already on the rewritten triple is replaced; the older createdAt survives
        const existing = await this.storage.getRelation(rewritten);
        if (existing && existing.createdAt < rewritten.createdAt) {
          rewritten.createdAt = existing.createdAt;
        }
        await this.storage.putRelation(rewritten);
      }

      const node: GraphNode = { ...previous, uri: newUri, updatedAt: timestamp };
      await this.storage.deleteNode(oldUri);
      await this.storage.putNode(node);
      await this.storage.commit();

      this.logger.debug('Moved node', { oldUri, newUri, relationsRewritten: incident.length });
      this.notifier?.emit({
        type: 'node_moved',
        payload: { oldUri, newUri, node, relationsRewritten: incident.length }
      });
      return { node, relationsRewritten: incident.length };
    });
  }

  /**
   * Deletes a node and every relation incident to it. Relations still pointing
   * at an absent URI are removed too; `deleted` says whether a node existed.
   */
  async deleteNode(uri: string): Promise<DeleteNodeResult> {
    parseUri(uri);

    return this.lock.write(async () => {
      const node = await this.storage.getNode(uri);
      const removedRelations = await this.readIncident(uri);
      if (!node && removedRelations.length === 0) {
        return { deleted: false, removedRelations: [] };
      }

      for (const relation of removedRelations) {
        await this.storage.deleteRelation(relation);
      }
      if (node) {
        await this.storage.deleteNode(uri);
      }
      await this.storage.commit();

      this.logger.debug('Deleted node', { uri, existed: node !== null, removedRelations: removedRelations.length });
      if (node) {
        this.notifier?.emit({ type: 'node_removed', payload: { uri, node, relations: removedRelations } });
      } else {
        for (const relation of removedRelations) {
          this.notifier?.emit({ type: 'relation_removed', payload: { relation } });
        }
      }
      return { deleted: node !== null, removedRelations };
    });
  }

  /**
   * Upserts a relation after resolving both endpoints
   */
  async link(params: LinkParams): Promise<LinkResult> {
    validateLinkParams(params);
    const weight = params.weight ?? DEFAULT_WEIGHT;

    return this.lock.write(async () => {
      const warnings: GraphWarning[] = [];
      const deferred: string[] = [];
      const createdNodes: GraphNode[] = [];
      const timestamp = this.now();

      const endpoints = params.sourceUri === params.targetUri
        ? [params.sourceUri]
        : [params.sourceUri, params.targetUri];

      for (const uri of endpoints) {
        const resolution = this.linkResolver.resolve(uri, await this.storage.getNode(uri), params.sourceUri);
        switch (resolution.kind) {
          case 'exists':
            break;
          case 'create_resource': {
            const node: GraphNode = {
              uri,
              nodeType: 'resource',
              name: null,
              content: null,
              metadata: {},
              createdAt: timestamp,
              updatedAt: timestamp,
            };
            await this.storage.putNode(node);
            createdNodes.push(node);
            break;
          }
          case 'dangling_concept':
            warnings.push({ kind: 'dangling_concept', uri, sourceUri: params.sourceUri });
            break;
          case 'defer_remote':
            deferred.push(uri);
            break;
        }
      }

      const previous = await this.storage.getRelation(params);
      const relation: Relation = previous
        ? {
            ...previous,
            weight,
            metadata: params.metadata ?? previous.metadata,
            updatedAt: timestamp,
          }
        : {
            sourceUri: params.sourceUri,
            targetUri: params.targetUri,
            relationType: params.relationType,
            weight,
            metadata: params.metadata ?? {},
            createdAt: timestamp,
            updatedAt: timestamp,
          };

      await this.storage.putRelation(relation);
      await this.storage.commit();

      this.logger.debug(previous ? 'Updated relation' : 'Created relation', toRelationKey(relation));
      for (const node of createdNodes) {
        this.notifier?.emit({ type: 'node_added', payload: { node } });
      }
      if (previous) {
        this.notifier?.emit({ type: 'relation_updated', payload: { relation, previous } });
      } else {
        this.notifier?.emit({ type: 'relation_added', payload: { relation } });
      }

      return { relation, created: !previous, warnings, deferred };
    });
  }

  /**
   * Removes a relation; returns it, or null when there was none
   */
  async unlink(key: RelationKey): Promise<Relation | null> {
    parseUri(key.sourceUri);
    parseUri(key.targetUri);

    return this.lock.write(async () => {
      const relation = await this.storage.getRelation(key);
      if (!relation) {
        return null;
      }

      await this.storage.deleteRelation(key);
      await this.storage.commit();

      this.logger.debug('Removed relation', toRelationKey(key));
      this.notifier?.emit({ type: 'relation_removed', payload: { relation } });
      return relation;
    });
  }

  /**
   * Inserts nodes and relations pulled from another workspace. Known nodes
   * are never overwritten: those that differ are reported as divergent.
   */
  async importSubgraph(subgraph: Subgraph): Promise<ImportResult> {
    validateSubgraph(subgraph);

    return this.lock.write(async () => {
      const result: ImportResult = { imported: [], unchanged: [], divergent: [], relationsImported: 0 };
      const importedRelations: Relation[] = [];

      for (const remote of subgraph.nodes) {
        const local = await this.storage.getNode(remote.uri);
        if (!local) {
          await this.storage.putNode(remote);
          result.imported.push(remote);
        } else if (nodesDiverge(local, remote)) {
          result.divergent.push({ local, remote });
        } else {
          result.unchanged.push(remote.uri);
        }
      }

      for (const relation of subgraph.relations) {
        if (!(await this.storage.getRelation(relation))) {
          await this.storage.putRelation(relation);
          importedRelations.push(relation);
        }
      }
      result.relationsImported = importedRelations.length;

      await this.storage.commit();

      this.logger.info('Imported subgraph', {
        imported: result.imported.length,
        unchanged: result.unchanged.length,
        divergent: result.divergent.length,
        relationsImported: result.relationsImported
      });
      for (const node of result.imported) {
        this.notifier?.emit({ type: 'node_added', payload: { node } });
      }
      for (const relation of importedRelations) {
        this.notifier?.emit({ type: 'relation_added', payload: { relation } });
      }
      return result;
    });
  }

  // ==========================================================================
  // READS
  // ==========================================================================

  async getNode(uri: string): Promise<GraphNode | null> {
    parseUri(uri);
    return this.lock.read(() => this.storage.getNode(uri));
  }

  /**
   * Relations leaving `uri`, oldest first
   */
  async getOutgoing(uri: string): Promise<Relation[]> {
    parseUri(uri);
    return this.lock.read(async () => sortRelations(await this.storage.listRelations({ sourceUri: uri })));
  }

  /**
   * Relations arriving at `uri`, oldest first
   */
  async getIncoming(uri: string): Promise<Relation[]> {
    parseUri(uri);
    return this.lock.read(async () => sortRelations(await this.storage.listRelations({ targetUri: uri })));
  }

  /**
   * Relations whose endpoints are both in `uris`, oldest first
   */
  async getRelationsAmong(uris: Iterable<string>): Promise<Relation[]> {
    const members = new Set(uris);
    return this.lock.read(async () => {
      const relations: Relation[] = [];
      for (const uri of members) {
        const outgoing = await this.storage.listRelations({ sourceUri: uri });
        relations.push(...outgoing.filter(relation => members.has(relation.targetUri)));
      }
      return sortRelations(relations);
    });
  }

  async listGraph(): Promise<KnowledgeGraph> {
    return this.lock.read(async () => {
      const [nodes, relations] = await Promise.all([
        this.storage.listNodes(),
        this.storage.listRelations()
      ]);
      return { nodes, relations: sortRelations(relations) };
    });
  }

  async getStats(): Promise<KnowledgeGraphStats> {
    const { nodes, relations } = await this.listGraph();

    const nodeTypes: Record<string, number> = {};
    const workspaces: Record<string, number> = {};
    for (const node of nodes) {
      nodeTypes[node.nodeType] = (nodeTypes[node.nodeType] ?? 0) + 1;
      const { workspaceId } = parseUri(node.uri);
      workspaces[workspaceId] = (workspaces[workspaceId] ?? 0) + 1;
    }

    const relationTypes: Record<string, number> = {};
    for (const relation of relations) {
      relationTypes[relation.relationType] = (relationTypes[relation.relationType] ?? 0) + 1;
    }

    return {
      nodeCount: nodes.length,
      relationCount: relations.length,
      nodeTypes,
      relationTypes,
      workspaces,
    };
  }

  /**
   * Relations with `uri` at either end, each once. Caller holds the lock.
   */
  private async readIncident(uri: string): Promise<Relation[]> {
    const [outgoing, incoming] = await Promise.all([
      this.storage.listRelations({ sourceUri: uri }),
      this.storage.listRelations({ targetUri: uri })
    ]);
    const byKey = new Map<string, Relation>();
    for (const relation of [...outgoing, ...incoming]) {
      byKey.set(relationKey(relation), relation);
    }
    return sortRelations([...byKey.values()]);
  }
}
