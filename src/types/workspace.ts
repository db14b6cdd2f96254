/**
 * Workspace registry types
 */

import { GraphNode, Relation } from './core.js';

export interface LocalStoreWorkspace {
  workspaceId: string;
  strategy: 'local-store';
}

export interface LocalRemoteWorkspace {
  workspaceId: string;
  strategy: 'local-remote';
  filePath?: string;
  connectionString?: string;
  tablePrefix?: string;
}

export interface NetworkRemoteWorkspace {
  workspaceId: string;
  strategy: 'network-remote';
  endpoint: string;
  apiKey?: string;
}

export type WorkspaceEntry = LocalStoreWorkspace | LocalRemoteWorkspace | NetworkRemoteWorkspace;

export type WorkspaceStrategy = WorkspaceEntry['strategy'];

export interface Subgraph {
  nodes: GraphNode[];
  relations: Relation[];
}

/**
 * Capability that pulls a subgraph around a URI from another workspace
 */
export interface RemoteSubgraphFetcher {
  fetchSubgraph(uri: string, signal?: AbortSignal): Promise<Subgraph>;
  close?(): Promise<void>;
}
