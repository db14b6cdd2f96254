export class KnowledgeGraphError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'KnowledgeGraphError';
  }
}

export class NotFoundError extends KnowledgeGraphError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, details);
    this.name = 'NotFoundError';
  }
}

export class DuplicateUriError extends KnowledgeGraphError {
  constructor(uri: string) {
    super('DUPLICATE_URI', `URI '${uri}' already exists`, { uri });
    this.name = 'DuplicateUriError';
  }
}

export class ConflictError extends KnowledgeGraphError {
  constructor(message = 'Conflict', details?: Record<string, unknown>) {
    super('CONFLICT', message, details);
    this.name = 'ConflictError';
  }
}

export class InvalidUriError extends KnowledgeGraphError {
  constructor(uri: string, reason: string) {
    super('INVALID_URI', `Invalid URI '${uri}': ${reason}`, { uri });
    this.name = 'InvalidUriError';
  }
}

export class InvalidInputError extends KnowledgeGraphError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, details);
    this.name = 'InvalidInputError';
  }
}

export class RemoteUnavailableError extends KnowledgeGraphError {
  constructor(workspaceId: string, reason: string, details?: Record<string, unknown>) {
    super('REMOTE_UNAVAILABLE', `Workspace '${workspaceId}' is unavailable: ${reason}`, { workspaceId, reason, ...details });
    this.name = 'RemoteUnavailableError';
  }
}

export class ConfigurationError extends KnowledgeGraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, details);
    this.name = 'ConfigurationError';
  }
}

const HTTP_STATUS_BY_CODE: Record<string, number> = {
  NOT_FOUND: 404,
  DUPLICATE_URI: 409,
  CONFLICT: 409,
  INVALID_URI: 400,
  INVALID_INPUT: 400,
  REMOTE_UNAVAILABLE: 503,
};

export function httpStatusFor(error: unknown): number {
  if (error instanceof KnowledgeGraphError) {
    return HTTP_STATUS_BY_CODE[error.code] ?? 500;
  }
  return 500;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
