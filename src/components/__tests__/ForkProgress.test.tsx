/**
 * Tests for ForkProgress component.
 */

import React from 'react';
import { describe, it, expect } from '@jest/globals';
import { render } from 'ink-testing-library';
import { ForkProgress } from '../ForkProgress.js';

describe('ForkProgress', () => {
  it('shows finished over total', () => {
    const { lastFrame } = render(
      <ForkProgress status={{ total: 5, completed: 2, failed: 1, inProgress: 2, pending: 0 }} />
    );

    expect(lastFrame()).toContain('Forks: 3/5 finished');
  });

  it('shows every counter', () => {
    const { lastFrame } = render(
      <ForkProgress status={{ total: 4, completed: 1, failed: 0, inProgress: 2, pending: 1 }} />
    );

    expect(lastFrame()).toContain('1 completed, 0 failed, 2 in progress, 1 pending');
  });

  it('updates on rerender', () => {
    const { lastFrame, rerender } = render(
      <ForkProgress status={{ total: 1, completed: 0, failed: 0, inProgress: 1, pending: 0 }} />
    );
    rerender(<ForkProgress status={{ total: 1, completed: 1, failed: 0, inProgress: 0, pending: 0 }} />);

    expect(lastFrame()).toContain('Forks: 1/1 finished');
  });
});
