import { z } from 'zod';
import { GraphNode, Metadata, MetadataValue, Relation } from '../../types/index.js';

export const metadataValueSchema: z.ZodType<MetadataValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(metadataValueSchema),
    z.record(metadataValueSchema),
  ])
);

export const metadataSchema: z.ZodType<Metadata> = z.record(metadataValueSchema);

export const nodeTypeSchema = z.enum(['concept', 'resource']);

export const graphNodeSchema: z.ZodType<GraphNode> = z.object({
  uri: z.string().min(1),
  nodeType: nodeTypeSchema,
  name: z.string().nullable(),
  content: z.string().nullable(),
  metadata: metadataSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const weightSchema = z.number().min(0).max(1);

export const relationSchema: z.ZodType<Relation> = z.object({
  sourceUri: z.string().min(1),
  targetUri: z.string().min(1),
  relationType: z.string().min(1),
  weight: weightSchema,
  metadata: metadataSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const subgraphSchema = z.object({
  nodes: z.array(graphNodeSchema),
  relations: z.array(relationSchema),
});

export const workspaceEntrySchema = z.discriminatedUnion('strategy', [
  z.object({
    workspaceId: z.string().min(1),
    strategy: z.literal('local-store'),
  }),
  z.object({
    workspaceId: z.string().min(1),
    strategy: z.literal('local-remote'),
    filePath: z.string().min(1).optional(),
    connectionString: z.string().min(1).optional(),
    tablePrefix: z.string().regex(/^[A-Za-z][A-Za-z0-9]*$/).optional(),
  }),
  z.object({
    workspaceId: z.string().min(1),
    strategy: z.literal('network-remote'),
    endpoint: z.string().url(),
    apiKey: z.string().min(1).optional(),
  }),
]).superRefine((entry, ctx) => {
  if (entry.strategy === 'local-remote' && Boolean(entry.filePath) === Boolean(entry.connectionString)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'local-remote workspaces need exactly one of filePath or connectionString',
      path: ['filePath'],
    });
  }
});
