/**
 * Storage and infrastructure types
 */

import { GraphNode, Relation, RelationKey } from './core.js';

export interface StorageConfig {
  accountName: string;
  connectionString?: string;
  tablePrefix: string;
}

export interface RelationQuery {
  sourceUri?: string;
  targetUri?: string;
}

/**
 * Row-level persistence used by GraphStore. Implementations do not enforce
 * graph invariants; GraphStore serializes every call that mutates.
 */
export interface GraphStorage {
  initialize(): Promise<void>;
  getNode(uri: string): Promise<GraphNode | null>;
  putNode(node: GraphNode): Promise<void>;
  deleteNode(uri: string): Promise<void>;
  listNodes(): Promise<GraphNode[]>;
  getRelation(key: RelationKey): Promise<Relation | null>;
  putRelation(relation: Relation): Promise<void>;
  deleteRelation(key: RelationKey): Promise<void>;
  listRelations(query?: RelationQuery): Promise<Relation[]>;
  /** Called once at the end of every GraphStore mutation */
  commit(): Promise<void>;
}
