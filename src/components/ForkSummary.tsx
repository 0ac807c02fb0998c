/**
 * Final report: one line per fork, run totals, then the failed forks.
 */

import React from 'react';
import { Box, Text } from 'ink';

import {
  formatCost,
  formatSeconds,
  formatTokens,
} from '../orchestrator/aggregate.js';
import type { AggregateSummary, ForkResult } from '../orchestrator/types.js';

export interface ForkSummaryProps {
  summary: AggregateSummary;
  results: readonly ForkResult[];
  /** Seconds; shown when given */
  wallTime?: number;
}

function ForkLine({ result }: { result: ForkResult }): React.ReactElement {
  return (
    <Box>
      <Text color={result.success ? 'green' : 'red'}>{result.success ? '✓' : '✗'}</Text>
      <Text>{` Fork ${String(result.forkId)} ${result.status}`}</Text>
      <Text dimColor>
        {` turns=${String(result.turns)} tools=${String(result.toolCalls)} ` +
          `tokens=${formatTokens(result.totalTokens)} ${formatSeconds(result.executionTime)}`}
      </Text>
    </Box>
  );
}

export function ForkSummary({ summary, results, wallTime }: ForkSummaryProps): React.ReactElement {
  const rate = (summary.successRate * 100).toFixed(1);

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text bold>Fork results</Text>
      {results.map((result) => (
        <ForkLine key={result.forkId} result={result} />
      ))}

      <Box flexDirection="column" marginTop={1}>
        <Text>{`Successful: ${String(summary.successful)}/${String(summary.totalForks)} (${rate}%)`}</Text>
        <Text>
          {`Turns: ${String(summary.totalTurns)}  Tool calls: ${String(summary.totalToolCalls)}  ` +
            `Errors: ${String(summary.totalErrors)}`}
        </Text>
        <Text>
          {`Tokens: ${formatTokens(summary.totalTokens)}  Cost: ${formatCost(summary.totalCost)}`}
        </Text>
        {wallTime !== undefined && (
          <Text dimColor>{`Wall-clock time: ${formatSeconds(wallTime)}`}</Text>
        )}
      </Box>

      {summary.failedForks.length > 0 && (
        <Box flexDirection="column" marginTop={1}>
          <Text color="red" bold>
            Failed forks
          </Text>
          {summary.failedForks.map((failed) => (
            <Text key={failed.forkId} color="red">
              {`  Fork ${String(failed.forkId)}: ${failed.error}`}
            </Text>
          ))}
        </Box>
      )}
    </Box>
  );
}
