/**
 * Telemetry module - optional OpenTelemetry tracing for forks.
 */

export type {
  TelemetryErrorCode,
  TelemetryResponse,
  ExporterType,
  TelemetryOptions,
  TelemetryInitResult,
  ForkSpanOptions,
  ForkSpanEndOptions,
  LLMSpanOptions,
  LLMSpanEndOptions,
  ToolSpanOptions,
  ToolSpanEndOptions,
} from './types.js';

export {
  initializeTelemetry,
  getTracer,
  isEnabled,
  isSensitiveDataEnabled,
  getConfig,
  shutdown,
  DEFAULT_OTLP_HTTP_ENDPOINT,
} from './setup.js';

export * from './conventions.js';

export {
  startForkSpan,
  endForkSpan,
  startLLMSpan,
  endLLMSpan,
  startToolSpan,
  endToolSpan,
} from './spans.js';
