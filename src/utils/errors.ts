export class KeelError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'KeelError';
  }
}

export class ConfigurationError extends KeelError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

/**
 * The backend could not be reached or answered with a transient failure.
 * The orchestrator retries these with backoff.
 */
export class TransportError extends KeelError {
  constructor(message: string, public status?: number) {
    super(message, 'TRANSPORT_ERROR');
    this.name = 'TransportError';
  }
}

/**
 * The backend answered, but the reply (or the rejection) cannot be used.
 * Never retried.
 */
export class ProtocolError extends KeelError {
  constructor(message: string, public status?: number) {
    super(message, 'PROTOCOL_ERROR');
    this.name = 'ProtocolError';
  }
}

export class WorkspaceError extends KeelError {
  constructor(message: string) {
    super(message, 'WORKSPACE_ERROR');
    this.name = 'WorkspaceError';
  }
}

export class PathViolationError extends KeelError {
  constructor(public requestedPath: string, public workspaceRoot: string) {
    super(`Path "${requestedPath}" resolves outside the workspace ${workspaceRoot}`, 'PATH_VIOLATION');
    this.name = 'PathViolationError';
  }
}

export class MemoryError extends KeelError {
  constructor(message: string, public filePath?: string) {
    super(message, 'MEMORY_ERROR');
    this.name = 'MemoryError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
