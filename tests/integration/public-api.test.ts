/**
 * The programmatic entry point exposes each module.
 */

import { describe, expect, it } from '@jest/globals';

import * as api from '../../src/lib.js';

describe('public API', () => {
  it('exports the orchestrator, agent and CLI entry points', () => {
    expect(typeof api.runForks).toBe('function');
    expect(typeof api.Agent).toBe('function');
    expect(typeof api.runForkCommand).toBe('function');
    expect(typeof api.ToolExecutor).toBe('function');
    expect(typeof api.SecurityPolicy).toBe('function');
    expect(typeof api.LocalSandboxService).toBe('function');
    expect(typeof api.startForkSpan).toBe('function');
    expect(typeof api.ForkSummary).toBe('function');
  });

  it('exposes the config response helpers under both names', () => {
    expect(api.errorResponse).toBe(api.configErrorResponse);
    expect(api.configErrorResponse('PARSE_ERROR', 'bad json')).toEqual({
      success: false,
      error: 'PARSE_ERROR',
      message: 'bad json',
    });
  });

  it('builds a default config', () => {
    expect(api.getDefaultConfig().forks.maxForks).toBe(100);
  });
});
