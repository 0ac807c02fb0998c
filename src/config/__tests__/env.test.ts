/**
 * Tests for environment variable parsing.
 */

import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';

import { ProcessEnvReader, readEnvConfig, isModelAlias, type IEnvReader } from '../env.js';

// Mock environment reader for testing
class MockEnvReader implements IEnvReader {
  private env: Map<string, string> = new Map();

  get(name: string): string | undefined {
    return this.env.get(name);
  }

  getBoolean(name: string): boolean | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    const lower = value.toLowerCase();
    if (lower === 'true' || lower === '1' || lower === 'yes') return true;
    if (lower === 'false' || lower === '0' || lower === 'no') return false;
    return undefined;
  }

  getNumber(name: string): number | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    const num = Number(value);
    return Number.isNaN(num) ? undefined : num;
  }

  set(name: string, value: string): void {
    this.env.set(name, value);
  }
}

describe('ProcessEnvReader', () => {
  const originalEnv = process.env;
  let reader: ProcessEnvReader;

  beforeEach(() => {
    process.env = { ...originalEnv };
    reader = new ProcessEnvReader();
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should return environment variable value', () => {
    process.env.FORKS_TEST_VAR = 'test-value';
    expect(reader.get('FORKS_TEST_VAR')).toBe('test-value');
  });

  it('should return undefined for missing variable', () => {
    delete process.env.FORKS_MISSING_VAR;
    expect(reader.get('FORKS_MISSING_VAR')).toBeUndefined();
  });

  it.each([
    ['true', true],
    ['YES', true],
    ['1', true],
    ['false', false],
    ['No', false],
    ['0', false],
  ])('should parse "%s" as %s', (input, expected) => {
    process.env.BOOL_VAR = input;
    expect(reader.getBoolean('BOOL_VAR')).toBe(expected);
  });

  it('should return undefined for non-boolean string', () => {
    process.env.BOOL_VAR = 'maybe';
    expect(reader.getBoolean('BOOL_VAR')).toBeUndefined();
  });

  it('should parse numbers and reject non-numeric strings', () => {
    process.env.NUM_VAR = '42';
    expect(reader.getNumber('NUM_VAR')).toBe(42);
    process.env.NUM_VAR = 'forty';
    expect(reader.getNumber('NUM_VAR')).toBeUndefined();
  });
});

describe('readEnvConfig', () => {
  let mockEnv: MockEnvReader;

  beforeEach(() => {
    mockEnv = new MockEnvReader();
  });

  it('should return an empty object when nothing is set', () => {
    expect(readEnvConfig(mockEnv)).toEqual({});
  });

  it('should map ANTHROPIC_API_KEY to provider.apiKey', () => {
    mockEnv.set('ANTHROPIC_API_KEY', 'test-secret');
    expect(readEnvConfig(mockEnv)).toEqual({ provider: { apiKey: 'test-secret' } });
  });

  it('should map fork settings into one nested section', () => {
    mockEnv.set('FORKS_LOG_DIR', '/tmp/fork-logs');
    mockEnv.set('FORKS_MAX_WORKERS', '4');
    mockEnv.set('FORKS_MAX_TURNS', '12');
    mockEnv.set('FORKS_MODEL', 'haiku');

    expect(readEnvConfig(mockEnv)).toEqual({
      forks: { logDir: '/tmp/fork-logs', maxWorkers: 4, maxTurns: 12, defaultModel: 'haiku' },
    });
  });

  it('should map FORKS_LOG_LEVEL', () => {
    mockEnv.set('FORKS_LOG_LEVEL', 'debug');
    expect(readEnvConfig(mockEnv)).toEqual({ logLevel: 'debug' });
  });

  it('should map FORKS_STRICT_PATHS as a boolean', () => {
    mockEnv.set('FORKS_STRICT_PATHS', 'false');
    expect(readEnvConfig(mockEnv)).toEqual({ security: { strictPathValidation: false } });
  });

  it('should map telemetry settings', () => {
    mockEnv.set('FORKS_ENABLE_OTEL', 'yes');
    mockEnv.set('FORKS_OTLP_ENDPOINT', 'http://localhost:4318/v1/traces');
    expect(readEnvConfig(mockEnv)).toEqual({
      telemetry: { enabled: true, otlpEndpoint: 'http://localhost:4318/v1/traces' },
    });
  });

  it.each([
    ['FORKS_LOG_LEVEL', 'verbose'],
    ['FORKS_MAX_WORKERS', '0'],
    ['FORKS_MAX_WORKERS', '2.5'],
    ['FORKS_MAX_TURNS', 'many'],
    ['FORKS_MODEL', 'gpt-4o'],
    ['FORKS_OTLP_ENDPOINT', 'not a url'],
    ['FORKS_ENABLE_OTEL', 'sometimes'],
  ])('should drop invalid %s=%s', (name, value) => {
    mockEnv.set(name, value);
    expect(readEnvConfig(mockEnv)).toEqual({});
  });
});

describe('isModelAlias', () => {
  it('should accept known aliases only', () => {
    expect(isModelAlias('sonnet')).toBe(true);
    expect(isModelAlias('opus')).toBe(true);
    expect(isModelAlias('haiku')).toBe(true);
    expect(isModelAlias('claude-sonnet-4-5-20250929')).toBe(false);
  });
});
