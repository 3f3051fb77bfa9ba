import { EventEmitter } from 'events';
import type { ParameterUpdate, WaveParameters, WaveSnapshot, WaveState } from './types';
import { deriveParameters, intensityAt } from './intensity-curve';
import { PeriodicTask } from './task-timers';
import { WAVE_GOVERNANCE } from './wave-governance-constants';

export interface WaveScheduler {
  on(event: 'parameters', listener: (update: ParameterUpdate) => void): this;
  on(event: 'completed', listener: () => void): this;
  on(event: 'state', listener: (state: WaveState) => void): this;
  off(event: 'parameters', listener: (update: ParameterUpdate) => void): this;
  off(event: 'completed', listener: () => void): this;
  off(event: 'state', listener: (state: WaveState) => void): this;
}

/**
 * Drives a timed focus session along the intensity curve.
 *
 * One tick per second advances elapsed time. Every few ticks (and on the
 * first tick after a start) the current parameters are published; BPM is
 * flagged as changed only when it moved past the threshold since the last
 * flagged value, so the backend is not reset for every small tempo drift.
 */
export class WaveScheduler extends EventEmitter {
  private state: WaveState = 'idle';
  private duration: number = WAVE_GOVERNANCE.SESSION_DEFAULT_SECONDS;
  private elapsedTime = 0;
  private intensity = 0;
  private lastSentBpm: number = WAVE_GOVERNANCE.WAVE_BPM_MIN;
  private ticksSinceUpdate = 0;
  private readonly ticker: PeriodicTask;

  constructor(durationSeconds?: number) {
    super();
    if (durationSeconds !== undefined) {
      this.setDuration(durationSeconds);
    }
    this.ticker = new PeriodicTask(WAVE_GOVERNANCE.TICK_INTERVAL_MS, () => this.tick());
  }

  get currentState(): WaveState {
    return this.state;
  }

  get currentParameters(): WaveParameters {
    return deriveParameters(this.intensity);
  }

  get progress(): number {
    if (this.duration <= 0) return 0;
    return Math.min(this.elapsedTime / this.duration, 1);
  }

  setDuration(seconds: number): void {
    if (this.state === 'running') {
      throw new Error('Cannot change the session length while a wave is running.');
    }
    if (
      !Number.isInteger(seconds)
      || seconds < WAVE_GOVERNANCE.SESSION_MIN_SECONDS
      || seconds > WAVE_GOVERNANCE.SESSION_MAX_SECONDS
    ) {
      throw new Error(
        `Session length must be a whole number of seconds in `
        + `[${WAVE_GOVERNANCE.SESSION_MIN_SECONDS}, ${WAVE_GOVERNANCE.SESSION_MAX_SECONDS}], got ${seconds}.`
      );
    }
    this.duration = seconds;
  }

  start(): void {
    this.resetProgress();
    this.setState('running');
    this.ticker.start();
    console.log(`[WaveScheduler] Wave started (${this.duration}s)`);
  }

  pause(): void {
    if (this.state !== 'running') return;
    this.ticker.cancel();
    this.setState('paused');
  }

  resume(): void {
    if (this.state !== 'paused') return;
    this.setState('running');
    this.ticker.start();
  }

  cancel(): void {
    this.ticker.cancel();
    this.elapsedTime = 0;
    this.intensity = 0;
    this.setState('idle');
  }

  /**
   * Re-zeroes a live session (after a suspend/refocus cycle) while keeping
   * the registered duration. Ignored unless running or paused.
   */
  restart(): void {
    if (this.state !== 'running' && this.state !== 'paused') {
      console.warn(`[WaveScheduler] restart() ignored in state ${this.state}`);
      return;
    }
    this.resetProgress();
    this.setState('running');
    this.ticker.start();
    console.log('[WaveScheduler] Wave restarted');
  }

  snapshot(): WaveSnapshot {
    return {
      state: this.state,
      duration: this.duration,
      elapsedTime: this.elapsedTime,
      remainingTime: Math.max(this.duration - this.elapsedTime, 0),
      progress: this.progress,
      intensity: this.intensity,
      parameters: this.currentParameters,
    };
  }

  private resetProgress(): void {
    this.ticker.cancel();
    this.elapsedTime = 0;
    this.intensity = 0;
    this.lastSentBpm = WAVE_GOVERNANCE.WAVE_BPM_MIN;
    // Primed so the very first tick publishes parameters.
    this.ticksSinceUpdate = WAVE_GOVERNANCE.PARAMETER_UPDATE_TICKS;
  }

  private tick(): void {
    if (this.state !== 'running') {
      this.ticker.cancel();
      return;
    }

    this.elapsedTime += 1;
    this.intensity = intensityAt(this.progress);
    this.ticksSinceUpdate += 1;

    if (this.elapsedTime >= this.duration) {
      this.elapsedTime = this.duration;
      this.ticker.cancel();
      this.setState('completed');
      console.log('[WaveScheduler] Wave completed');
      this.emit('completed');
      return;
    }

    if (this.ticksSinceUpdate >= WAVE_GOVERNANCE.PARAMETER_UPDATE_TICKS) {
      this.ticksSinceUpdate = 0;
      const parameters = this.currentParameters;
      const bpmChanged =
        Math.abs(parameters.bpm - this.lastSentBpm) >= WAVE_GOVERNANCE.BPM_CHANGE_THRESHOLD;
      if (bpmChanged) {
        this.lastSentBpm = parameters.bpm;
      }
      const update: ParameterUpdate = {
        parameters,
        bpmChanged,
        elapsedTime: this.elapsedTime,
      };
      this.emit('parameters', update);
    }
  }

  private setState(next: WaveState): void {
    if (this.state === next) return;
    this.state = next;
    this.emit('state', next);
  }
}
