/**
 * Cancellable timer primitives shared by every periodic concern.
 *
 * Each task carries a generation counter. A callback that was already queued
 * by the runtime when `cancel()` ran checks its generation and returns
 * without firing, so no tick is ever observed after cancellation returns.
 */

export class PeriodicTask {
  private timer: NodeJS.Timeout | null = null;
  private generation = 0;

  constructor(
    private readonly intervalMs: number,
    private readonly onTick: () => void
  ) {}

  get isActive(): boolean {
    return this.timer !== null;
  }

  /** (Re)starts the task. The first tick fires one interval from now. */
  start(): void {
    this.cancel();
    const generation = this.generation;
    this.timer = setInterval(() => {
      if (generation !== this.generation) return;
      this.onTick();
    }, this.intervalMs);
  }

  cancel(): void {
    this.generation++;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}

export class DelayedTask {
  private timer: NodeJS.Timeout | null = null;
  private generation = 0;

  constructor(private readonly delayMs: number) {}

  get isPending(): boolean {
    return this.timer !== null;
  }

  /** Schedules `fn`, replacing whatever was pending. */
  schedule(fn: () => void): void {
    this.cancel();
    const generation = this.generation;
    this.timer = setTimeout(() => {
      if (generation !== this.generation) return;
      this.timer = null;
      fn();
    }, this.delayMs);
  }

  cancel(): void {
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
