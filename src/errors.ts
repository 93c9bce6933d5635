/**
 * Error taxonomy surfaced by sessions, the store and the API collaborators.
 * Every error carries a stable code and whether retrying the call can help.
 */

export type ErrorCode =
  | 'TRANSIENT_API_ERROR'
  | 'PERMANENT_API_ERROR'
  | 'BUDGET_EXCEEDED'
  | 'EMBEDDING_UNAVAILABLE'
  | 'SESSION_BUSY'
  | 'SESSION_ARCHIVED'
  | 'SESSION_NOT_FOUND'
  | 'CORRUPT_STATE'
  | 'REQUEST_CANCELLED'
  | 'INVALID_PARAMETERS';

export class AssistantError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode,
    readonly retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure, timeout or rate limit. */
export class TransientApiError extends AssistantError {
  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, 'TRANSIENT_API_ERROR', true, options);
  }
}

/** Invalid key, unknown model, malformed request. */
export class PermanentApiError extends AssistantError {
  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, 'PERMANENT_API_ERROR', false, options);
  }
}

export class BudgetExceededError extends AssistantError {
  constructor(readonly requiredTokens: number, readonly availableTokens: number) {
    super(
      `System directive and message need ${requiredTokens} tokens but only ${availableTokens} are available`,
      'BUDGET_EXCEEDED',
      false
    );
  }
}

export class EmbeddingUnavailableError extends AssistantError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'EMBEDDING_UNAVAILABLE', true, options);
  }
}

export class SessionBusyError extends AssistantError {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} already has a request in flight`, 'SESSION_BUSY', true);
  }
}

export class SessionArchivedError extends AssistantError {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} is archived`, 'SESSION_ARCHIVED', false);
  }
}

export class SessionNotFoundError extends AssistantError {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} not found`, 'SESSION_NOT_FOUND', false);
  }
}

export class CorruptStateError extends AssistantError {
  constructor(readonly sessionId: string, detail: string, options?: { cause?: unknown }) {
    super(`Stored state for session ${sessionId} is corrupt: ${detail}`, 'CORRUPT_STATE', false, options);
  }
}

export class RequestCancelledError extends AssistantError {
  constructor(options?: { cause?: unknown }) {
    super('Request cancelled', 'REQUEST_CANCELLED', true, options);
  }
}

export class InvalidParametersError extends AssistantError {
  constructor(detail: string) {
    super(`Invalid model parameters: ${detail}`, 'INVALID_PARAMETERS', false);
  }
}
