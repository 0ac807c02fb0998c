/**
 * Live fork counters, re-rendered on every ProgressTracker change.
 */

import React from 'react';
import { Box, Text } from 'ink';

import type { ProgressStatus } from '../logging/progress.js';

export interface ForkProgressProps {
  status: ProgressStatus;
}

export function ForkProgress({ status }: ForkProgressProps): React.ReactElement {
  const finished = status.completed + status.failed;

  return (
    <Box flexDirection="column">
      <Text bold>{`Forks: ${String(finished)}/${String(status.total)} finished`}</Text>
      <Text>
        <Text color="green">{`${String(status.completed)} completed`}</Text>
        {', '}
        <Text color={status.failed > 0 ? 'red' : undefined}>{`${String(status.failed)} failed`}</Text>
        {', '}
        <Text color="cyan">{`${String(status.inProgress)} in progress`}</Text>
        {', '}
        <Text dimColor>{`${String(status.pending)} pending`}</Text>
      </Text>
    </Box>
  );
}
