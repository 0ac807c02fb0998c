/**
 * Programmatic API. The `sandbox-forks` binary is src/index.tsx.
 *
 * @example
 * ```typescript
 * import { getDefaultConfig, runForks, createAnthropicCompletionService } from 'sandbox-forks';
 *
 * const config = getDefaultConfig();
 * const report = await runForks(
 *   { prompt: 'Add a README', numForks: 3, model: 'sonnet', maxTurns: 20 },
 *   { config, createCompletionService: (model) => createAnthropicCompletionService({ model }) }
 * );
 * ```
 */

export * from './agent/index.js';
export * from './cli/index.js';
export * from './components/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './logging/index.js';
export * from './model/index.js';
export * from './orchestrator/index.js';
export * from './runtime/index.js';
export * from './sandbox/index.js';
export * from './security/index.js';
export * from './telemetry/index.js';
export * from './tools/index.js';

export {
  errorResponse as configErrorResponse,
  successResponse as configSuccessResponse,
} from './config/index.js';
