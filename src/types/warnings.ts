/**
 * Non-fatal conditions returned alongside successful results
 */

export interface DanglingConceptWarning {
  kind: 'dangling_concept';
  uri: string;
  sourceUri: string;
}

export interface MissingResourceWarning {
  kind: 'missing_resource';
  uri: string;
  sourceUri: string;
}

export interface RemoteUnavailableWarning {
  kind: 'remote_unavailable';
  uri: string;
  workspaceId: string;
  reason: string;
}

export type GraphWarning =
  | DanglingConceptWarning
  | MissingResourceWarning
  | RemoteUnavailableWarning;
