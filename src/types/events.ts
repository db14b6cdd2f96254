/**
 * Change events fanned out to observers (visualization, audit)
 */

import { GraphNode, Relation } from './core.js';

export interface ChangeEventPayloads {
  node_added: { node: GraphNode };
  node_updated: { node: GraphNode; previous: GraphNode };
  node_moved: { oldUri: string; newUri: string; node: GraphNode; relationsRewritten: number };
  node_removed: { uri: string; node: GraphNode; relations: Relation[] };
  relation_added: { relation: Relation };
  relation_updated: { relation: Relation; previous: Relation };
  relation_removed: { relation: Relation };
  context_updated: { touched: string[]; evicted: string[]; cleared: boolean };
}

export type ChangeEventType = keyof ChangeEventPayloads;

export type ChangeEvent = {
  [K in ChangeEventType]: {
    sequence: number;
    type: K;
    timestamp: string;
    payload: ChangeEventPayloads[K];
  };
}[ChangeEventType];

export type ChangeEventInit = {
  [K in ChangeEventType]: { type: K; payload: ChangeEventPayloads[K] };
}[ChangeEventType];
