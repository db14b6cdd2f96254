/**
 * Operation parameter and result types
 */

import { GraphNode, Metadata, Relation } from './core.js';
import { GraphWarning } from './warnings.js';

export interface CreateNodeParams {
  uri: string;
  nodeType: GraphNode['nodeType'];
  name?: string | null;
  content?: string | null;
  metadata?: Metadata;
}

export interface UpdateNodeParams {
  name?: string | null;
  content?: string | null;
  metadata?: Metadata;
}

export interface LinkParams {
  sourceUri: string;
  targetUri: string;
  relationType: string;
  weight?: number;
  metadata?: Metadata;
}

export type OutgoingLinkParams = Omit<LinkParams, 'sourceUri'>;

export interface LinkResult {
  relation: Relation;
  created: boolean;
  warnings: GraphWarning[];
  /** Endpoints left for the remote-fetch path */
  deferred: string[];
}

export interface DeleteNodeResult {
  deleted: boolean;
  removedRelations: Relation[];
}

export interface TraverseOptions {
  maxCost?: number;
  contextSizeCap?: number;
}

export interface TraverseResult {
  seedUri: string;
  maxCost: number;
  nodes: GraphNode[];
  costs: Record<string, number>;
  edges: Relation[];
  warnings: GraphWarning[];
  truncated: boolean;
}

export interface SubgraphExport {
  format: 'context-graph/subgraph';
  version: 1;
  seedUri: string;
  maxCost: number;
  exportedAt: string;
  nodes: GraphNode[];
  relations: Relation[];
}

export interface DivergentNode {
  local: GraphNode;
  remote: GraphNode;
}

export interface ImportResult {
  imported: GraphNode[];
  unchanged: string[];
  divergent: DivergentNode[];
  relationsImported: number;
}

export interface ConflictReport {
  uri: string;
  local: GraphNode;
  remote: GraphNode;
  detectedAt: string;
}

export type ConflictResolution =
  | 'local'
  | 'remote'
  | { merged: UpdateNodeParams };

export interface FetchRemoteResult {
  workspaceId: string;
  imported: GraphNode[];
  conflicts: ConflictReport[];
  relationsImported: number;
}

export interface ContextSnapshot {
  cap: number;
  uris: string[];
  nodes: GraphNode[];
  relations: Relation[];
  missing: string[];
}
