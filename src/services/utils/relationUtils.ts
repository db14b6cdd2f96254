import { isDeepStrictEqual } from 'node:util';
import { GraphNode, Relation, RelationKey } from '../../types/index.js';
import { relationKeyString } from './uriUtils.js';

/**
 * Orders relations by creation time; the triple breaks ties so the order is total
 */
export function compareRelations(a: Relation, b: Relation): number {
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  return relationKey(a).localeCompare(relationKey(b));
}

export function sortRelations(relations: Relation[]): Relation[] {
  return [...relations].sort(compareRelations);
}

export function relationKey(relation: RelationKey): string {
  return relationKeyString(relation.sourceUri, relation.targetUri, relation.relationType);
}

export function toRelationKey(relation: RelationKey): RelationKey {
  return {
    sourceUri: relation.sourceUri,
    targetUri: relation.targetUri,
    relationType: relation.relationType,
  };
}

/**
 * True when two versions of a node disagree on curated data; timestamps are ignored
 */
export function nodesDiverge(a: GraphNode, b: GraphNode): boolean {
  return a.name !== b.name ||
    a.content !== b.content ||
    !isDeepStrictEqual(a.metadata, b.metadata);
}
