import { TableEntity } from '@azure/data-tables';
import { z } from 'zod';
import { GraphNode, Metadata, Relation, RelationKey } from '../../types/index.js';
import { metadataSchema, nodeTypeSchema, weightSchema } from './schemas.js';
import { relationKeyString, workspaceOf } from './uriUtils.js';

export interface NodeRow {
  uri: string;
  nodeType: string;
  name?: string;
  content?: string;
  metadata: string;
  createdAt: string;
  updatedAt: string;
}

export interface RelationRow {
  sourceUri: string;
  targetUri: string;
  relationType: string;
  weight: number;
  metadata: string;
  createdAt: string;
  updatedAt: string;
}

const nodeRowSchema = z.object({
  uri: z.string(),
  nodeType: nodeTypeSchema,
  name: z.string().nullish(),
  content: z.string().nullish(),
  metadata: z.string().nullish(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const relationRowSchema = z.object({
  sourceUri: z.string(),
  targetUri: z.string(),
  relationType: z.string(),
  weight: weightSchema,
  metadata: z.string().nullish(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

/**
 * Table keys cannot hold '/', '\\', '#' or '?', all of which URIs may carry
 */
export function encodeRowKey(value: string): string {
  return Buffer.from(value, 'utf8').toString('base64url');
}

export function nodeRowKey(uri: string): string {
  return encodeRowKey(uri);
}

export function relationRowKey(key: RelationKey): string {
  return encodeRowKey(relationKeyString(key.sourceUri, key.targetUri, key.relationType));
}

function parseMetadata(raw: string | null | undefined): Metadata {
  return raw ? metadataSchema.parse(JSON.parse(raw)) : {};
}

/**
 * Transformations between domain objects and Azure Table rows.
 * Nodes are partitioned by their own workspace, relations by the source's.
 */
export class TransformationUtils {
  static nodeToTableEntity(node: GraphNode): TableEntity<NodeRow> {
    return {
      partitionKey: workspaceOf(node.uri),
      rowKey: nodeRowKey(node.uri),
      uri: node.uri,
      nodeType: node.nodeType,
      // Table storage drops null properties; absent means null on the way back
      ...(node.name !== null ? { name: node.name } : {}),
      ...(node.content !== null ? { content: node.content } : {}),
      metadata: JSON.stringify(node.metadata),
      createdAt: node.createdAt,
      updatedAt: node.updatedAt,
    };
  }

  static relationToTableEntity(relation: Relation): TableEntity<RelationRow> {
    return {
      partitionKey: workspaceOf(relation.sourceUri),
      rowKey: relationRowKey(relation),
      sourceUri: relation.sourceUri,
      targetUri: relation.targetUri,
      relationType: relation.relationType,
      weight: relation.weight,
      metadata: JSON.stringify(relation.metadata),
      createdAt: relation.createdAt,
      updatedAt: relation.updatedAt,
    };
  }

  static tableEntityToNode(tableEntity: unknown): GraphNode {
    const row = nodeRowSchema.parse(tableEntity);
    return {
      uri: row.uri,
      nodeType: row.nodeType,
      name: row.name ?? null,
      content: row.content ?? null,
      metadata: parseMetadata(row.metadata),
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
  }

  static tableEntityToRelation(tableEntity: unknown): Relation {
    const row = relationRowSchema.parse(tableEntity);
    return {
      sourceUri: row.sourceUri,
      targetUri: row.targetUri,
      relationType: row.relationType,
      weight: row.weight,
      metadata: parseMetadata(row.metadata),
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
  }
}
