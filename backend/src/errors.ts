export type OrchestratorErrorCode =
  | 'OVERLOADED'
  | 'NOT_FOUND'
  | 'INVALID_STATE'
  | 'INVALID_ARGUMENT'
  | 'ALREADY_EXISTS'
  | 'RESOURCE_EXHAUSTED'
  | 'LAUNCH_FAILED'
  | 'WORKSPACE_ROOT_UNAVAILABLE';

export abstract class OrchestratorError extends Error {
  abstract readonly code: OrchestratorErrorCode;
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/** Admission rejected. Transient: the caller should retry later. */
export class OverloadedError extends OrchestratorError {
  readonly code = 'OVERLOADED';
  readonly status = 429;
  constructor(message = 'Orchestrator is at capacity; retry later') {
    super(message);
  }
}

export class NotFoundError extends OrchestratorError {
  readonly code = 'NOT_FOUND';
  readonly status = 404;
  constructor(sessionId: string) {
    super(`Session ${sessionId} not found`);
  }
}

export class InvalidStateError extends OrchestratorError {
  readonly code = 'INVALID_STATE';
  readonly status = 409;
  constructor(message: string) {
    super(message);
  }
}

export class InvalidArgumentError extends OrchestratorError {
  readonly code = 'INVALID_ARGUMENT';
  readonly status = 400;
  constructor(message: string) {
    super(message);
  }
}

export class AlreadyExistsError extends OrchestratorError {
  readonly code = 'ALREADY_EXISTS';
  readonly status = 409;
  constructor(path: string) {
    super(`Workspace already exists: ${path}`);
  }
}

export class ResourceExhaustedError extends OrchestratorError {
  readonly code = 'RESOURCE_EXHAUSTED';
  readonly status = 507;
  constructor(message: string) {
    super(message);
  }
}

export class LaunchFailedError extends OrchestratorError {
  readonly code = 'LAUNCH_FAILED';
  readonly status = 500;
  constructor(message: string) {
    super(message);
  }
}

/**
 * The workspace root cannot be created or written at startup. Fatal: the
 * server must not accept any session.
 */
export class WorkspaceRootUnavailableError extends OrchestratorError {
  readonly code = 'WORKSPACE_ROOT_UNAVAILABLE';
  readonly status = 503;
  constructor(root: string, cause: string) {
    super(`Workspace root ${root} is unavailable: ${cause}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
