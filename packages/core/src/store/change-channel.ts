export interface ChangeChannelOptions {
  /** Work performed for each drained signal (a store reload). */
  onDrain: () => Promise<void>;
  /** Receives failures of `onDrain`; the channel keeps draining afterwards. */
  onError: (err: unknown) => void;
  /** Quiet period after the first signal before draining starts. */
  debounceMs?: number;
}

/**
 * One-slot channel from a change watcher to the store.
 *
 * A signal sets the slot. The drain loop clears the slot and runs `onDrain`
 * once per cycle, so any number of signals that arrive while a cycle is
 * pending or running collapse into a single follow-up cycle.
 */
export class ChangeChannel {
  private readonly debounceMs: number;
  private pending = false;
  private closed = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private draining: Promise<void> | null = null;

  constructor(private readonly options: ChangeChannelOptions) {
    this.debounceMs = options.debounceMs ?? 0;
  }

  notify(): void {
    if (this.closed) return;
    this.pending = true;
    if (this.draining || this.timer) return;

    if (this.debounceMs > 0) {
      this.timer = setTimeout(() => {
        this.timer = null;
        this.startDrain();
      }, this.debounceMs);
    } else {
      this.startDrain();
    }
  }

  /** Drop pending signals and wait for a running cycle to finish. */
  async close(): Promise<void> {
    this.closed = true;
    this.pending = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.draining) {
      await this.draining;
    }
  }

  private startDrain(): void {
    this.draining = this.drainLoop().finally(() => {
      this.draining = null;
      // A signal may land between the loop's last check and this callback
      if (this.pending && !this.closed) this.startDrain();
    });
  }

  private async drainLoop(): Promise<void> {
    while (this.pending && !this.closed) {
      this.pending = false;
      try {
        await this.options.onDrain();
      } catch (err: unknown) {
        this.options.onError(err);
      }
    }
  }
}
