import { z } from 'zod';
import { KnowledgeGraphError, errorMessage } from '../errors.js';
import { metadataSchema } from './schemas.js';

export const SERVER_NAME = 'context-graph-server';
export const SERVER_VERSION = '1.0.0';

const uri = (description: string) => z.string().min(1).describe(description);
const maxCost = z.number().describe('Cost budget for the expansion (default 1.0)').optional();
const weight = z.number().min(0).max(1).describe('Traversal cost of the relation, 0-1 (default 1.0)').optional();
const metadata = metadataSchema.describe('Open key/value metadata').optional();
const nullableText = (description: string) => z.string().nullable().describe(description).optional();

export const traverseArgsSchema = z.object({
  seedUri: uri('URI to expand from, e.g. concept://workspace/topic'),
  maxCost,
});

export const addConceptArgsSchema = z.object({
  uri: uri('concept://<workspace-id>/<path> of the new concept'),
  name: nullableText('Display name'),
  content: nullableText('Free-text content'),
  metadata,
  relations: z.array(z.object({
    targetUri: uri('Target node URI'),
    relationType: z.string().min(1).describe('Relation type'),
    weight,
    metadata,
  })).describe('Outgoing relations created with the concept').optional(),
});

export const nodeArgsSchema = z.object({
  uri: uri('Node URI'),
});

export const updateConceptArgsSchema = z.object({
  uri: uri('URI of the node to update'),
  name: nullableText('New display name'),
  content: nullableText('New content'),
  metadata: metadataSchema.describe('Replaces the existing metadata').optional(),
});

export const moveConceptArgsSchema = z.object({
  oldUri: uri('Current concept URI'),
  newUri: uri('URI to move the concept to'),
});

export const linkArgsSchema = z.object({
  sourceUri: uri('Source node URI'),
  targetUri: uri('Target node URI'),
  relationType: z.string().min(1).describe('Relation type'),
  weight,
  metadata,
});

export const unlinkArgsSchema = z.object({
  sourceUri: uri('Source node URI'),
  targetUri: uri('Target node URI'),
  relationType: z.string().min(1).describe('Relation type'),
});

export const exportSubgraphArgsSchema = z.object({
  seedUri: uri('URI to export around'),
  maxCost,
});

export const resolveConflictArgsSchema = z.object({
  uri: uri('URI of the conflicted node'),
  resolution: z.union([
    z.enum(['local', 'remote']),
    z.object({
      merged: z.object({
        name: z.string().nullable().optional(),
        content: z.string().nullable().optional(),
        metadata: metadataSchema.optional(),
      }),
    }),
  ]).describe("'local' keeps the local node, 'remote' takes the fetched one, { merged } writes a replacement"),
});

export const emptyArgsSchema = z.object({});

export type TraverseArgs = z.infer<typeof traverseArgsSchema>;
export type AddConceptArgs = z.infer<typeof addConceptArgsSchema>;
export type NodeArgs = z.infer<typeof nodeArgsSchema>;
export type UpdateConceptArgs = z.infer<typeof updateConceptArgsSchema>;
export type MoveConceptArgs = z.infer<typeof moveConceptArgsSchema>;
export type LinkArgs = z.infer<typeof linkArgsSchema>;
export type UnlinkArgs = z.infer<typeof unlinkArgsSchema>;
export type ExportSubgraphArgs = z.infer<typeof exportSubgraphArgsSchema>;
export type ResolveConflictArgs = z.infer<typeof resolveConflictArgsSchema>;
export type EmptyArgs = z.infer<typeof emptyArgsSchema>;

/**
 * Formats error responses consistently
 */
export function formatErrorResponse(message: string, error?: unknown): string {
  const code = error instanceof KnowledgeGraphError ? error.code : 'INTERNAL_ERROR';
  const details = error instanceof KnowledgeGraphError ? error.details : undefined;
  return JSON.stringify({
    error: error === undefined ? message : `${message}: ${errorMessage(error)}`,
    code,
    details
  }, null, 2);
}

/**
 * Formats success responses consistently
 */
export function formatSuccessResponse(data: unknown): string {
  return JSON.stringify(data, null, 2);
}
