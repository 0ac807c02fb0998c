/**
 * Type definitions for the tool response contract.
 */

/**
 * Error codes for tool failures.
 */
export type ToolErrorCode =
  | 'VALIDATION_ERROR' // Invalid input parameters
  | 'IO_ERROR' // File system or process errors
  | 'PERMISSION_DENIED' // Access denied
  | 'NOT_FOUND' // Resource not found
  | 'TIMEOUT' // Operation timed out
  | 'UNKNOWN'; // Unexpected errors

/**
 * What the agent sees from one tool call.
 */
export interface ToolExecution {
  /** Text returned to the model */
  output: string;
  /** Sent as is_error on the tool result */
  isError: boolean;
  code?: ToolErrorCode;
}
