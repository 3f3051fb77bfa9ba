import { PeriodicTask } from './task-timers';
import { WAVE_GOVERNANCE } from './wave-governance-constants';

export interface ChimeOutput {
  chime(): void;
}

/** Rings the terminal bell on stdout. */
export class TerminalBell implements ChimeOutput {
  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  chime(): void {
    this.stream.write('\u0007');
  }
}

/**
 * Audible nudge while a session is suspended: one chime immediately,
 * then one per interval until stopped.
 */
export class ReminderPing {
  private readonly ticker: PeriodicTask;

  constructor(
    private readonly output: ChimeOutput = new TerminalBell(),
    intervalMs: number = WAVE_GOVERNANCE.REMINDER_PING_INTERVAL_MS
  ) {
    this.ticker = new PeriodicTask(intervalMs, () => this.ring());
  }

  get isActive(): boolean {
    return this.ticker.isActive;
  }

  start(): void {
    this.ticker.start();
    this.ring();
  }

  stop(): void {
    this.ticker.cancel();
  }

  private ring(): void {
    try {
      this.output.chime();
    } catch (err) {
      console.error('[SessionCoordinator] Reminder chime failed:', err);
    }
  }
}
