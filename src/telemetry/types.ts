/**
 * Telemetry type definitions.
 */

import type { Span } from '@opentelemetry/api';
import type { SpanExporter } from '@opentelemetry/sdk-trace-base';
import type { TelemetryConfig } from '../config/schema.js';

export type TelemetryErrorCode = 'ALREADY_INITIALIZED' | 'NOT_INITIALIZED' | 'UNKNOWN';

export interface TelemetrySuccessResponse<T = void> {
  success: true;
  result: T;
  message: string;
}

export interface TelemetryErrorResponse {
  success: false;
  error: TelemetryErrorCode;
  message: string;
}

export type TelemetryResponse<T = void> = TelemetrySuccessResponse<T> | TelemetryErrorResponse;

export type ExporterType = 'otlp' | 'console' | 'none';

/**
 * Options for telemetry initialization.
 */
export interface TelemetryOptions {
  config: TelemetryConfig;
  serviceName?: string;
  serviceVersion?: string;
  /** Defaults to 'otlp' (HTTP) */
  exporterType?: ExporterType;
  /** Takes the place of the type-based exporter; used by tests */
  customExporter?: SpanExporter;
  onDebug?: (message: string) => void;
}

export interface TelemetryInitResult {
  enabled: boolean;
  exporterType: ExporterType;
  /** Set for the OTLP exporter */
  endpoint?: string;
  serviceName: string;
  enableSensitiveData: boolean;
}

// -----------------------------------------------------------------------------
// Span Options
// -----------------------------------------------------------------------------

export interface ForkSpanOptions {
  forkId: number;
  sandboxId: string;
  model: string;
}

export interface ForkSpanEndOptions {
  status: string;
  turns: number;
  toolCalls: number;
  errors: number;
  totalTokens: number;
  totalCost: number;
  /** Set when the fork failed */
  errorType?: string;
}

export interface LLMSpanOptions {
  modelName: string;
  /** Defaults to 'anthropic' */
  providerName?: string;
  maxTokens?: number;
  /** Fork id as a string; recorded as the conversation id */
  conversationId?: string;
  parent?: Span;
}

export interface LLMSpanEndOptions {
  inputTokens?: number;
  outputTokens?: number;
  finishReason?: string;
  errorType?: string;
}

export interface ToolSpanOptions {
  toolName: string;
  toolCallId?: string;
  /** Recorded only when sensitive data is enabled */
  arguments?: Record<string, unknown>;
  parent?: Span;
}

export interface ToolSpanEndOptions {
  success: boolean;
  errorType?: string;
}
