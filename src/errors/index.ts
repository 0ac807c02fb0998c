/**
 * Structured error types for fork orchestration.
 *
 * Thrown errors extend ForkError and carry a ForkErrorCode. A fork that fails
 * is reported through its ForkResult instead of an error.
 */

// -----------------------------------------------------------------------------
// Error Codes
// -----------------------------------------------------------------------------

export type ForkErrorCode =
  | 'INVALID_ARGUMENT' // Bad fork count, prompt or work directory
  | 'SECURITY_VIOLATION' // Tool call rejected by the security policy
  | 'TOOL_EXECUTION_ERROR' // Tool call could not be parsed or run
  | 'CANCELLED' // Run aborted by signal
  | 'EXECUTION_FAILED'; // Orchestrator could not complete

// -----------------------------------------------------------------------------
// Error Classes
// -----------------------------------------------------------------------------

/**
 * Base class for every error the orchestrator throws.
 */
export class ForkError extends Error {
  public readonly code: ForkErrorCode;

  constructor(message: string, code: ForkErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ForkError';
    this.code = code;

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Raised before any fork starts when the run arguments are unusable.
 */
export class ForkValidationError extends ForkError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'ForkValidationError';
  }
}

/**
 * Raised when the orchestrator itself fails; the original error is kept as `cause`.
 */
export class ForkExecutionError extends ForkError {
  constructor(message: string, cause?: unknown) {
    super(message, 'EXECUTION_FAILED', cause === undefined ? undefined : { cause });
    this.name = 'ForkExecutionError';
  }
}

/**
 * Raised when a run is aborted. Carries the results of forks that finished first.
 */
export class ForkCancelledError<T = unknown> extends ForkError {
  public readonly completed: readonly T[];

  constructor(message: string, completed: readonly T[] = []) {
    super(message, 'CANCELLED');
    this.name = 'ForkCancelledError';
    this.completed = completed;
  }
}

/**
 * Raised when a model tool call names an unknown tool or has malformed input.
 */
export class ToolInvocationError extends ForkError {
  public readonly toolName: string;

  constructor(toolName: string, message: string) {
    super(message, 'TOOL_EXECUTION_ERROR');
    this.name = 'ToolInvocationError';
    this.toolName = toolName;
  }
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

/**
 * Message text for any thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

