import { GraphNode } from '../types/index.js';
import { parseUri } from './utils/uriUtils.js';
import { WorkspaceRegistry } from './workspaceRegistry.js';

export type LinkResolution =
  | { kind: 'exists'; node: GraphNode }
  | { kind: 'create_resource' }
  | { kind: 'dangling_concept' }
  | { kind: 'defer_remote'; workspaceId: string };

/**
 * Decides what happens to a relation endpoint. Pure: the caller performs
 * whatever creation or fetch the outcome asks for.
 */
export class LinkResolver {
  constructor(private readonly registry: WorkspaceRegistry) {}

  resolve(endpointUri: string, existing: GraphNode | null, sourceUri: string): LinkResolution {
    if (existing) {
      return { kind: 'exists', node: existing };
    }

    const endpoint = parseUri(endpointUri);
    const sourceWorkspace = parseUri(sourceUri).workspaceId;

    if (endpoint.workspaceId !== sourceWorkspace && this.registry.requiresFetch(endpoint.workspaceId)) {
      return { kind: 'defer_remote', workspaceId: endpoint.workspaceId };
    }

    return endpoint.scheme === 'resource'
      ? { kind: 'create_resource' }
      : { kind: 'dangling_concept' };
  }
}
