/**
 * OpenTelemetry setup.
 *
 * Spans are created manually through the helpers in spans.ts. Until
 * initializeTelemetry() installs a provider they go to the API's no-op
 * tracer, so a disabled run pays nothing for them.
 */

import { trace, diag, DiagConsoleLogger, DiagLogLevel } from '@opentelemetry/api';
import type { Tracer } from '@opentelemetry/api';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import {
  BasicTracerProvider,
  ConsoleSpanExporter,
  SimpleSpanProcessor,
  type SpanExporter,
} from '@opentelemetry/sdk-trace-base';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';

import type {
  ExporterType,
  TelemetryInitResult,
  TelemetryOptions,
  TelemetryResponse,
} from './types.js';

const DEFAULT_SERVICE_NAME = 'sandbox-forks';
const DEFAULT_SERVICE_VERSION = '0.1.0';
export const DEFAULT_OTLP_HTTP_ENDPOINT = 'http://localhost:4318/v1/traces';

let tracerProvider: BasicTracerProvider | null = null;
let initResult: TelemetryInitResult | null = null;

function createExporter(type: Exclude<ExporterType, 'none'>, endpoint: string): SpanExporter {
  switch (type) {
    case 'otlp':
      return new OTLPTraceExporter({ url: endpoint });
    case 'console':
      return new ConsoleSpanExporter();
  }
}

/**
 * Install a tracer provider for the configured exporter.
 * A disabled config, or exporter type 'none' without a custom exporter,
 * records the state and leaves the no-op tracer in place.
 *
 * @example
 * const result = await initializeTelemetry({ config: config.telemetry });
 * if (result.success && result.result.enabled) {
 *   logger.info(`Tracing to ${result.result.endpoint ?? 'console'}`);
 * }
 */
export async function initializeTelemetry(
  options: TelemetryOptions
): Promise<TelemetryResponse<TelemetryInitResult>> {
  const { config } = options;
  const debug = options.onDebug ?? ((_message: string): void => {});

  if (initResult !== null) {
    return {
      success: false,
      error: 'ALREADY_INITIALIZED',
      message: 'Telemetry has already been initialized. Call shutdown() first to reinitialize.',
    };
  }

  const serviceName = options.serviceName ?? DEFAULT_SERVICE_NAME;
  const exporterType: ExporterType = options.exporterType ?? 'otlp';
  const disabled: TelemetryInitResult = {
    enabled: false,
    exporterType: 'none',
    serviceName,
    enableSensitiveData: false,
  };

  if (!config.enabled) {
    debug('Telemetry disabled via configuration');
    initResult = disabled;
    return { success: true, result: disabled, message: 'Telemetry disabled' };
  }

  if (exporterType === 'none' && options.customExporter === undefined) {
    debug('No exporter configured (no-op mode)');
    initResult = disabled;
    return { success: true, result: disabled, message: 'Telemetry initialized with none exporter' };
  }

  const endpoint = config.otlpEndpoint ?? DEFAULT_OTLP_HTTP_ENDPOINT;
  let exporter: SpanExporter;
  if (options.customExporter !== undefined) {
    debug('Using custom span exporter');
    exporter = options.customExporter;
  } else if (exporterType === 'none') {
    initResult = disabled;
    return { success: true, result: disabled, message: 'Telemetry initialized with none exporter' };
  } else {
    debug(`Creating ${exporterType} exporter`);
    exporter = createExporter(exporterType, endpoint);
  }

  tracerProvider = new BasicTracerProvider({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: serviceName,
      [ATTR_SERVICE_VERSION]: options.serviceVersion ?? DEFAULT_SERVICE_VERSION,
    }),
    spanProcessors: [new SimpleSpanProcessor(exporter)],
  });
  trace.setGlobalTracerProvider(tracerProvider);

  if (process.env['DEBUG_OTEL'] === 'true') {
    diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.DEBUG);
  }

  initResult = {
    enabled: true,
    exporterType,
    endpoint: exporterType === 'otlp' && options.customExporter === undefined ? endpoint : undefined,
    serviceName,
    enableSensitiveData: config.enableSensitiveData,
  };
  debug(`Telemetry initialized: ${JSON.stringify(initResult)}`);

  return {
    success: true,
    result: initResult,
    message: `Telemetry initialized with ${exporterType} exporter`,
  };
}

export function getTracer(name?: string): Tracer {
  return trace.getTracer(name ?? initResult?.serviceName ?? DEFAULT_SERVICE_NAME);
}

export function isEnabled(): boolean {
  return initResult?.enabled ?? false;
}

export function isSensitiveDataEnabled(): boolean {
  return initResult?.enableSensitiveData ?? false;
}

export function getConfig(): TelemetryInitResult | null {
  return initResult;
}

/**
 * Flush pending spans and drop the provider. Must be called before
 * initializing again.
 */
export async function shutdown(): Promise<TelemetryResponse> {
  if (initResult === null) {
    return { success: false, error: 'NOT_INITIALIZED', message: 'Telemetry is not initialized' };
  }

  try {
    if (tracerProvider !== null) {
      await tracerProvider.shutdown();
      tracerProvider = null;
    }
    trace.disable();
    initResult = null;
    return { success: true, result: undefined, message: 'Telemetry shutdown complete' };
  } catch (error) {
    return {
      success: false,
      error: 'UNKNOWN',
      message: error instanceof Error ? error.message : 'Unknown error during shutdown',
    };
  }
}
