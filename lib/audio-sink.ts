import { PeriodicTask } from './task-timers';
import { WAVE_GOVERNANCE } from './wave-governance-constants';

export const SINK_SAMPLE_RATE = 48_000;
export const SINK_CHANNELS = 2;

const BYTES_PER_SAMPLE = 2;
const INT16_SCALE = 1 / 32_767;

/**
 * Receives decoded audio from the streaming client and owns playback.
 * Input is interleaved little-endian 16-bit PCM at 48 kHz stereo.
 */
export interface AudioSink {
  enqueue(pcm: Uint8Array): void;
  start(): void;
  stop(): void;
  pause(): void;
  resume(): void;
  fadeIn(seconds: number): void;
  fadeOut(seconds: number): void;
  cancelFade(): void;
}

/** One decoded block of audio, one Float32Array per channel. */
export interface PcmFrame {
  sampleRate: number;
  frameCount: number;
  channels: Float32Array[];
}

/** Host playback device. Frames arrive in order while the sink is playing. */
export interface AudioOutput {
  write(frame: PcmFrame): void;
  setVolume(volume: number): void;
  /** Drops anything already handed over but not yet played. */
  flush(): void;
}

export type SinkState = 'stopped' | 'playing' | 'paused';

export function decodePcm16(pcm: Uint8Array, channelCount = SINK_CHANNELS): PcmFrame {
  const frameCount = Math.floor(pcm.byteLength / (BYTES_PER_SAMPLE * channelCount));
  const channels = Array.from({ length: channelCount }, () => new Float32Array(frameCount));
  const view = new DataView(pcm.buffer, pcm.byteOffset, pcm.byteLength);

  for (let frame = 0; frame < frameCount; frame++) {
    for (let channel = 0; channel < channelCount; channel++) {
      const offset = (frame * channelCount + channel) * BYTES_PER_SAMPLE;
      channels[channel][frame] = view.getInt16(offset, true) * INT16_SCALE;
    }
  }

  return { sampleRate: SINK_SAMPLE_RATE, frameCount, channels };
}

interface ActiveFade {
  task: PeriodicTask;
  step: number;
  from: number;
  to: number;
}

/**
 * Default sink: converts PCM to planar float and forwards it to the host
 * output. Frames that arrive while paused are held and released in order
 * on resume; frames that arrive while stopped are dropped.
 */
export class PcmAudioSink implements AudioSink {
  private state: SinkState = 'stopped';
  private volume = 1;
  private held: PcmFrame[] = [];
  private fade: ActiveFade | null = null;

  constructor(private readonly output: AudioOutput) {}

  get currentState(): SinkState {
    return this.state;
  }

  get currentVolume(): number {
    return this.volume;
  }

  get isFading(): boolean {
    return this.fade !== null;
  }

  enqueue(pcm: Uint8Array): void {
    const frame = decodePcm16(pcm);
    if (frame.frameCount === 0) return;

    switch (this.state) {
      case 'playing':
        this.output.write(frame);
        return;
      case 'paused':
        this.held.push(frame);
        return;
      case 'stopped':
        return;
    }
  }

  start(): void {
    if (this.state === 'playing') return;
    this.cancelFade();
    this.state = 'playing';
    this.releaseHeld();
  }

  stop(): void {
    this.stopFade();
    this.held = [];
    this.state = 'stopped';
    this.output.flush();
  }

  pause(): void {
    if (this.state !== 'playing') return;
    this.state = 'paused';
  }

  resume(): void {
    this.cancelFade();
    this.state = 'playing';
    this.releaseHeld();
  }

  fadeIn(seconds: number): void {
    this.runFade(0, 1, seconds);
  }

  fadeOut(seconds: number): void {
    this.runFade(this.volume, 0, seconds);
  }

  /** Stops a running fade and restores full volume. No-op when idle. */
  cancelFade(): void {
    if (!this.fade) return;
    this.stopFade();
    this.setVolume(1);
  }

  private runFade(from: number, to: number, seconds: number): void {
    this.stopFade();
    const steps = WAVE_GOVERNANCE.FADE_STEPS;
    const intervalMs = Math.max(1, Math.round((Math.max(0, seconds) * 1000) / steps));
    this.setVolume(from);

    const task = new PeriodicTask(intervalMs, () => {
      const fade = this.fade;
      if (!fade || fade.task !== task) return;
      fade.step += 1;
      this.setVolume(fade.from + ((fade.to - fade.from) * fade.step) / steps);
      if (fade.step >= steps) {
        this.stopFade();
      }
    });
    this.fade = { task, step: 0, from, to };
    task.start();
  }

  private stopFade(): void {
    this.fade?.task.cancel();
    this.fade = null;
  }

  private setVolume(volume: number): void {
    this.volume = volume;
    this.output.setVolume(volume);
  }

  private releaseHeld(): void {
    const frames = this.held;
    this.held = [];
    for (const frame of frames) {
      this.output.write(frame);
    }
  }
}
