/**
 * Serial Trigger
 *
 * Runs an async task on demand, never two at once. Triggers that arrive while
 * the task is running collapse into a single follow-up run.
 */

export class SerialTrigger {
  private readonly task: () => Promise<void>;
  private readonly onError: (error: unknown) => void;
  private active: Promise<void> | null = null;
  private pending = false;
  private runs = 0;

  constructor(task: () => Promise<void>, onError: (error: unknown) => void) {
    this.task = task;
    this.onError = onError;
  }

  /**
   * Request a run; resolves once no run is pending any more
   */
  trigger(): Promise<void> {
    this.pending = true;
    if (!this.active) {
      this.active = this.drain();
    }
    return this.active;
  }

  /**
   * Resolves when the current run (and its follow-up, if any) is done
   */
  async idle(): Promise<void> {
    await this.active;
  }

  get busy(): boolean {
    return this.active !== null;
  }

  get completedRuns(): number {
    return this.runs;
  }

  private async drain(): Promise<void> {
    // Yield once so trigger() has stored this promise before the loop can end
    await Promise.resolve();

    try {
      while (this.pending) {
        this.pending = false;
        try {
          await this.task();
        } catch (error) {
          this.onError(error);
        }
        this.runs++;
      }
    } finally {
      this.active = null;
    }
  }
}
