import type { ReadResourceResult } from "@modelcontextprotocol/sdk/types.js";
import { KnowledgeGraphError } from '../errors.js';
import { HandlerDeps } from './baseMcpHandler.js';

// `+` lets the path keep its slashes
export const CONCEPT_RESOURCE_TEMPLATE = 'concept://{workspace}/{+path}';

/**
 * Markdown view of a concept for `concept://` resource reads.
 * Unknown or malformed URIs reject, and the SDK turns that into a protocol error.
 */
export async function readConceptResource(uri: string, deps: HandlerDeps): Promise<ReadResourceResult> {
  try {
    const node = await deps.manager.getNode(uri);
    return {
      contents: [{
        uri,
        mimeType: 'text/markdown',
        text: `# Concept: ${node.name ?? uri}\n\n${node.content ?? ''}`
      }]
    };
  } catch (error) {
    if (error instanceof KnowledgeGraphError) {
      deps.logger.warn('Failed to read concept resource', { uri, code: error.code });
    } else {
      deps.logger.error('Failed to read concept resource', error);
    }
    throw error;
  }
}
