import { NodeType, ParsedUri } from '../../types/index.js';
import { InvalidUriError } from '../errors.js';

const URI_PATTERN = /^([a-z][a-z0-9+.-]*):\/\/([^/]*)\/(.*)$/;
const NODE_SCHEMES: ReadonlySet<string> = new Set<NodeType>(['concept', 'resource']);

function isNodeType(scheme: string): scheme is NodeType {
  return NODE_SCHEMES.has(scheme);
}

/**
 * Splits `<scheme>://<workspace-id>/<path>` into its parts
 */
export function parseUri(uri: string): ParsedUri {
  const match = URI_PATTERN.exec(uri);
  if (!match) {
    throw new InvalidUriError(uri, 'expected <scheme>://<workspace-id>/<path>');
  }

  const [, scheme, workspaceId, path] = match;
  if (!isNodeType(scheme)) {
    throw new InvalidUriError(uri, `scheme must be 'concept' or 'resource', got '${scheme}'`);
  }
  if (!workspaceId) {
    throw new InvalidUriError(uri, 'workspace id is empty');
  }
  if (!path) {
    throw new InvalidUriError(uri, 'path is empty');
  }

  return { scheme, workspaceId, path };
}

export function workspaceOf(uri: string): string {
  return parseUri(uri).workspaceId;
}

/**
 * Stable key for a relation triple; parts are URI-encoded so '|' cannot collide
 */
export function relationKeyString(sourceUri: string, targetUri: string, relationType: string): string {
  return [sourceUri, targetUri, relationType].map(encodeURIComponent).join('|');
}
