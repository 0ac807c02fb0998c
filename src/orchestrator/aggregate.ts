/**
 * Summary statistics over fork results.
 */

import type { AggregateSummary, ForkResult } from './types.js';

const RULE = '='.repeat(80);

function sum(results: readonly ForkResult[], pick: (result: ForkResult) => number): number {
  return results.reduce((total, result) => total + pick(result), 0);
}

export function aggregateResults(results: readonly ForkResult[]): AggregateSummary {
  const count = results.length;
  const average = (total: number): number => (count > 0 ? total / count : 0);

  const successful = results.filter((result) => result.success);
  const failed = results.filter((result) => !result.success);

  const totalTurns = sum(results, (r) => r.turns);
  const totalToolCalls = sum(results, (r) => r.toolCalls);
  const totalTokens = sum(results, (r) => r.totalTokens);
  const totalCost = sum(results, (r) => r.totalCost);
  const totalTime = sum(results, (r) => r.executionTime);

  return {
    totalForks: count,
    successful: successful.length,
    failed: failed.length,
    successRate: average(successful.length),
    totalTurns,
    totalToolCalls,
    totalErrors: sum(results, (r) => r.errors),
    totalTokens,
    totalCost,
    totalTime,
    avgTurns: average(totalTurns),
    avgToolCalls: average(totalToolCalls),
    avgTokens: average(totalTokens),
    avgTime: average(totalTime),
    avgCost: average(totalCost),
    successfulForks: successful.map((r) => r.forkId),
    failedForks: failed.map((r) => ({ forkId: r.forkId, error: r.error ?? 'Unknown error' })),
  };
}

export function formatTokens(tokens: number): string {
  return Math.round(tokens).toLocaleString('en-US');
}

export function formatCost(cost: number): string {
  return `$${cost.toFixed(4)}`;
}

export function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(2)}s`;
}

/**
 * Lines of the results report: totals, averages, then one line per failed fork.
 */
export function formatSummary(summary: AggregateSummary, results: readonly ForkResult[]): string[] {
  const lines = [
    RULE,
    'FORK EXECUTION RESULTS',
    RULE,
    `Total forks:       ${String(summary.totalForks)}`,
    `Successful:        ${String(summary.successful)} (${(summary.successRate * 100).toFixed(1)}%)`,
    `Failed:            ${String(summary.failed)}`,
    '',
    `Total turns:       ${String(summary.totalTurns)}`,
    `Total tool calls:  ${String(summary.totalToolCalls)}`,
    `Total errors:      ${String(summary.totalErrors)}`,
    `Total tokens:      ${formatTokens(summary.totalTokens)}`,
    `Total cost:        ${formatCost(summary.totalCost)}`,
    `Total time:        ${formatSeconds(summary.totalTime)}`,
    '',
    `Avg turns/fork:    ${summary.avgTurns.toFixed(1)}`,
    `Avg tools/fork:    ${summary.avgToolCalls.toFixed(1)}`,
    `Avg tokens/fork:   ${formatTokens(summary.avgTokens)}`,
    `Avg time/fork:     ${formatSeconds(summary.avgTime)}`,
    `Avg cost/fork:     ${formatCost(summary.avgCost)}`,
    RULE,
  ];

  const failed = results.filter((result) => !result.success);
  if (failed.length > 0) {
    lines.push('', 'Failed forks:');
    for (const result of failed) {
      lines.push(`  Fork ${String(result.forkId)}: ${result.error ?? 'Unknown error'}`);
    }
  }
  return lines;
}
