export interface ProgressSnapshot {
  completed: number;
  total: number;
}

export type ProgressListener = (snapshot: ProgressSnapshot) => void;

/**
 * Monotonic count of completed leaves. Observers read it; nothing waits on it.
 */
export class ProgressCounter {
  private completedCount = 0;

  constructor(
    public readonly total: number,
    private readonly listener: ProgressListener | undefined,
    private readonly onListenerError: (error: unknown) => void
  ) {}

  increment(): void {
    if (this.completedCount >= this.total) {
      return;
    }
    this.completedCount += 1;
    if (!this.listener) {
      return;
    }
    try {
      this.listener({ completed: this.completedCount, total: this.total });
    } catch (error) {
      this.onListenerError(error);
    }
  }
}
