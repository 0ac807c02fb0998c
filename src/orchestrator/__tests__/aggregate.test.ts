/**
 * Tests for result aggregation and the summary report.
 */

import { describe, expect, it } from '@jest/globals';

import {
  aggregateResults,
  formatCost,
  formatSeconds,
  formatSummary,
  formatTokens,
} from '../aggregate.js';
import type { ForkResult } from '../types.js';

function result(overrides: Partial<ForkResult> & { forkId: number }): ForkResult {
  return {
    sandboxId: `fork_${String(overrides.forkId)}_test`,
    success: true,
    finalResponse: 'done',
    turns: 1,
    toolCalls: 0,
    errors: 0,
    totalTokens: 0,
    totalCost: 0,
    executionTime: 0,
    status: 'completed',
    ...overrides,
  };
}

const RESULTS: ForkResult[] = [
  result({ forkId: 0, turns: 2, toolCalls: 3, totalTokens: 1000, totalCost: 0.003, executionTime: 1.5 }),
  result({
    forkId: 1,
    success: false,
    turns: 4,
    toolCalls: 1,
    errors: 2,
    totalTokens: 500,
    totalCost: 0.0015,
    executionTime: 2.5,
    error: 'Boom',
  }),
];

describe('aggregateResults', () => {
  it('sums and averages over every fork', () => {
    const summary = aggregateResults(RESULTS);

    expect(summary).toMatchObject({
      totalForks: 2,
      successful: 1,
      failed: 1,
      successRate: 0.5,
      totalTurns: 6,
      totalToolCalls: 4,
      totalErrors: 2,
      totalTokens: 1500,
      totalTime: 4,
      avgTurns: 3,
      avgToolCalls: 2,
      avgTokens: 750,
      avgTime: 2,
      successfulForks: [0],
      failedForks: [{ forkId: 1, error: 'Boom' }],
    });
    expect(summary.totalCost).toBeCloseTo(0.0045, 10);
    expect(summary.avgCost).toBeCloseTo(0.00225, 10);
  });

  it('reports a failed fork without an error message as unknown', () => {
    const summary = aggregateResults([result({ forkId: 3, success: false })]);
    expect(summary.failedForks).toEqual([{ forkId: 3, error: 'Unknown error' }]);
  });

  it('returns zero averages for no results', () => {
    const summary = aggregateResults([]);
    expect(summary.totalForks).toBe(0);
    expect(summary.successRate).toBe(0);
    expect(summary.avgTurns).toBe(0);
    expect(summary.avgCost).toBe(0);
  });
});

describe('formatters', () => {
  it('formats tokens with thousands separators', () => {
    expect(formatTokens(1234567)).toBe('1,234,567');
    expect(formatTokens(749.6)).toBe('750');
  });

  it('formats cost with four decimals', () => {
    expect(formatCost(0.0045)).toBe('$0.0045');
    expect(formatCost(0)).toBe('$0.0000');
  });

  it('formats seconds with two decimals', () => {
    expect(formatSeconds(1.234)).toBe('1.23s');
  });
});

describe('formatSummary', () => {
  it('lists totals, averages and the failed forks', () => {
    const lines = formatSummary(aggregateResults(RESULTS), RESULTS);

    expect(lines[1]).toBe('FORK EXECUTION RESULTS');
    expect(lines).toContain('Total forks:       2');
    expect(lines).toContain('Successful:        1 (50.0%)');
    expect(lines).toContain('Total tokens:      1,500');
    expect(lines).toContain('Total cost:        $0.0045');
    expect(lines).toContain('Avg tokens/fork:   750');
    expect(lines).toContain('Avg time/fork:     2.00s');
    expect(lines.slice(-3)).toEqual(['', 'Failed forks:', '  Fork 1: Boom']);
  });

  it('ends with the rule when every fork succeeded', () => {
    const only = [result({ forkId: 0 })];
    const lines = formatSummary(aggregateResults(only), only);
    expect(lines[lines.length - 1]).toBe('='.repeat(80));
    expect(lines).not.toContain('Failed forks:');
  });
});
