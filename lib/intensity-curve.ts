import type { WaveParameters } from './types';
import { WAVE_GOVERNANCE } from './wave-governance-constants';

function clampUnit(t: number): number {
  if (!Number.isFinite(t)) return 0;
  return Math.max(0, Math.min(1, t));
}

/** Slow start, fast middle, slow arrival. */
export function smoothstep(t: number): number {
  const c = clampUnit(t);
  return c * c * (3 - 2 * c);
}

/** Decelerating curve. */
export function easeOut(t: number): number {
  const c = clampUnit(t);
  return c * (2 - c);
}

export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * clampUnit(t);
}

/**
 * Maps session progress (elapsed / duration) to intensity in [0, 1].
 * Ramps up to 1 at the peak, then descends back to 0 at the end.
 */
export function intensityAt(progress: number): number {
  const peak = WAVE_GOVERNANCE.PEAK_PROGRESS;
  const p = clampUnit(progress);
  if (p <= peak) {
    return smoothstep(p / peak);
  }
  return 1 - easeOut((p - peak) / (1 - peak));
}

export function deriveParameters(intensity: number): WaveParameters {
  const i = clampUnit(intensity);
  return {
    bpm: Math.trunc(lerp(WAVE_GOVERNANCE.WAVE_BPM_MIN, WAVE_GOVERNANCE.WAVE_BPM_MAX, i)),
    density: lerp(WAVE_GOVERNANCE.DENSITY_MIN, WAVE_GOVERNANCE.DENSITY_MAX, i),
    brightness: lerp(WAVE_GOVERNANCE.BRIGHTNESS_MIN, WAVE_GOVERNANCE.BRIGHTNESS_MAX, i),
    calmWeight: Math.max(1 - i, WAVE_GOVERNANCE.PROMPT_WEIGHT_FLOOR),
    intenseWeight: Math.max(i, WAVE_GOVERNANCE.PROMPT_WEIGHT_FLOOR),
  };
}

export function clampFreePlayBpm(bpm: number): number {
  if (!Number.isFinite(bpm)) return WAVE_GOVERNANCE.FREE_PLAY_DEFAULT_BPM;
  const rounded = Math.round(bpm);
  if (rounded < WAVE_GOVERNANCE.FREE_PLAY_BPM_MIN) return WAVE_GOVERNANCE.FREE_PLAY_BPM_MIN;
  if (rounded > WAVE_GOVERNANCE.FREE_PLAY_BPM_MAX) return WAVE_GOVERNANCE.FREE_PLAY_BPM_MAX;
  return rounded;
}
