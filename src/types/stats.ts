/**
 * Statistics types for knowledge graph metrics
 */

export interface KnowledgeGraphStats {
  nodeCount: number;
  relationCount: number;
  nodeTypes: Record<string, number>;
  relationTypes: Record<string, number>;
  workspaces: Record<string, number>;
  activeContextSize?: number;
  activeContextCap?: number;
  openConflicts?: number;
}
