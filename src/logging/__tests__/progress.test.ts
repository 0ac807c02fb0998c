/**
 * Tests for ProgressTracker.
 */

import { describe, expect, it } from '@jest/globals';

import { ProgressTracker, type ProgressStatus } from '../progress.js';

describe('ProgressTracker', () => {
  it('starts with every fork pending', () => {
    const tracker = new ProgressTracker(3);

    expect(tracker.getStatus()).toEqual({
      total: 3,
      completed: 0,
      failed: 0,
      inProgress: 0,
      pending: 3,
    });
    expect(tracker.isComplete()).toBe(false);
  });

  it('moves forks from pending to in progress to done', () => {
    const tracker = new ProgressTracker(3);
    tracker.startFork();
    tracker.startFork();
    tracker.completeFork(true);

    expect(tracker.getStatus()).toEqual({
      total: 3,
      completed: 1,
      failed: 0,
      inProgress: 1,
      pending: 1,
    });
  });

  it('is complete once every fork has finished, successful or not', () => {
    const tracker = new ProgressTracker(2);
    tracker.startFork();
    tracker.startFork();
    tracker.completeFork(true);
    tracker.completeFork(false);

    expect(tracker.isComplete()).toBe(true);
    expect(tracker.getStatus().failed).toBe(1);
  });

  it('never lets inProgress go negative', () => {
    const tracker = new ProgressTracker(1);
    tracker.completeFork(false);

    expect(tracker.getStatus().inProgress).toBe(0);
  });

  it('notifies listeners after each change until unsubscribed', () => {
    const tracker = new ProgressTracker(2);
    const seen: ProgressStatus[] = [];
    const unsubscribe = tracker.onChange((status) => seen.push(status));

    tracker.startFork();
    unsubscribe();
    tracker.completeFork(true);

    expect(seen).toEqual([{ total: 2, completed: 0, failed: 0, inProgress: 1, pending: 1 }]);
  });
});
