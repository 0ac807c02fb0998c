export interface ProgressStatus {
  total: number;
  completed: number;
  failed: number;
  inProgress: number;
  pending: number;
}

export type ProgressListener = (status: ProgressStatus) => void;

/**
 * Counts forks as they start and finish. Updates are synchronous, so each one
 * is atomic on the event loop.
 */
export class ProgressTracker {
  readonly total: number;
  private completed = 0;
  private failed = 0;
  private inProgress = 0;
  private readonly listeners = new Set<ProgressListener>();

  constructor(total: number) {
    this.total = total;
  }

  startFork(): void {
    this.inProgress += 1;
    this.notify();
  }

  completeFork(success: boolean): void {
    if (success) {
      this.completed += 1;
    } else {
      this.failed += 1;
    }
    this.inProgress = Math.max(0, this.inProgress - 1);
    this.notify();
  }

  getStatus(): ProgressStatus {
    return {
      total: this.total,
      completed: this.completed,
      failed: this.failed,
      inProgress: this.inProgress,
      pending: Math.max(0, this.total - this.completed - this.failed - this.inProgress),
    };
  }

  isComplete(): boolean {
    return this.completed + this.failed >= this.total;
  }

  /**
   * Subscribe to status changes. Returns the unsubscribe function.
   */
  onChange(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    const status = this.getStatus();
    for (const listener of this.listeners) {
      listener(status);
    }
  }
}
