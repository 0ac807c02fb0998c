/**
 * Model error type and error classification.
 */

import type { ModelErrorCode, RetryableErrorCode } from './types.js';

/**
 * Error thrown by completion services.
 */
export class ModelError extends Error {
  public readonly code: ModelErrorCode;

  constructor(message: string, code: ModelErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ModelError';
    this.code = code;

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, ModelError);
    }
  }
}

const RETRYABLE_CODES: readonly RetryableErrorCode[] = ['RATE_LIMITED', 'NETWORK_ERROR', 'TIMEOUT'];

export function isRetryableCode(code: ModelErrorCode): code is RetryableErrorCode {
  return RETRYABLE_CODES.some((retryable) => retryable === code);
}

function statusOf(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function mapStatusToCode(status: number): ModelErrorCode | undefined {
  if (status === 401 || status === 403) return 'AUTHENTICATION_ERROR';
  if (status === 404) return 'MODEL_NOT_FOUND';
  if (status === 408) return 'TIMEOUT';
  // 529 is Anthropic's "overloaded"
  if (status === 429 || status === 529) return 'RATE_LIMITED';
  if (status >= 500) return 'NETWORK_ERROR';
  return undefined;
}

/**
 * Map common LLM errors to ModelErrorCode.
 * Uses the HTTP status when the error carries one, otherwise keyword
 * matching on the message.
 */
export function mapErrorToCode(error: unknown): ModelErrorCode {
  if (error instanceof ModelError) return error.code;

  if (error instanceof Error) {
    const status = statusOf(error);
    if (status !== undefined) {
      const fromStatus = mapStatusToCode(status);
      if (fromStatus !== undefined) return fromStatus;
    }

    const message = error.message.toLowerCase();

    if (
      message.includes('api key') ||
      message.includes('authentication') ||
      message.includes('unauthorized')
    ) {
      return 'AUTHENTICATION_ERROR';
    }
    if (message.includes('rate limit') || message.includes('429') || message.includes('overloaded')) {
      return 'RATE_LIMITED';
    }
    if (message.includes('model') && message.includes('not found')) {
      return 'MODEL_NOT_FOUND';
    }
    if (
      message.includes('context length') ||
      message.includes('too long') ||
      message.includes('token limit')
    ) {
      return 'CONTEXT_LENGTH_EXCEEDED';
    }
    if (message.includes('timeout') || message.includes('timed out')) {
      return 'TIMEOUT';
    }
    if (
      message.includes('network') ||
      message.includes('econnrefused') ||
      message.includes('econnreset') ||
      message.includes('fetch failed')
    ) {
      return 'NETWORK_ERROR';
    }
  }
  return 'UNKNOWN';
}
