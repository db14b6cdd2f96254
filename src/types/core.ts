/**
 * Core domain types for the knowledge graph
 */

export type NodeType = 'concept' | 'resource';

export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | MetadataValue[]
  | { [key: string]: MetadataValue };

export type Metadata = Record<string, MetadataValue>;

export interface GraphNode {
  uri: string;
  nodeType: NodeType;
  name: string | null;     // concepts only
  content: string | null;  // concepts only
  metadata: Metadata;
  createdAt: string;
  updatedAt: string;
}

export interface Relation {
  sourceUri: string;
  targetUri: string;
  relationType: string;
  weight: number;          // traversal cost, 0-1
  metadata: Metadata;
  createdAt: string;
  updatedAt: string;
}

export interface RelationKey {
  sourceUri: string;
  targetUri: string;
  relationType: string;
}

export interface KnowledgeGraph {
  nodes: GraphNode[];
  relations: Relation[];
}

export interface ParsedUri {
  scheme: NodeType;
  workspaceId: string;
  path: string;
}
