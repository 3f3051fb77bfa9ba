import { describe, it, expect } from 'vitest';
import { WAVE_GOVERNANCE } from '../wave-governance-constants';

describe('WAVE_GOVERNANCE invariants', () => {
  it('wave BPM range sits inside the free-play range', () => {
    expect(WAVE_GOVERNANCE.WAVE_BPM_MIN).toBeGreaterThan(0);
    expect(WAVE_GOVERNANCE.WAVE_BPM_MAX).toBeGreaterThan(WAVE_GOVERNANCE.WAVE_BPM_MIN);
    expect(WAVE_GOVERNANCE.FREE_PLAY_BPM_MIN).toBeLessThanOrEqual(WAVE_GOVERNANCE.WAVE_BPM_MIN);
    expect(WAVE_GOVERNANCE.FREE_PLAY_BPM_MAX).toBeGreaterThanOrEqual(WAVE_GOVERNANCE.WAVE_BPM_MAX);
  });

  it('free-play default BPM is inside its range', () => {
    expect(WAVE_GOVERNANCE.FREE_PLAY_DEFAULT_BPM).toBeGreaterThanOrEqual(WAVE_GOVERNANCE.FREE_PLAY_BPM_MIN);
    expect(WAVE_GOVERNANCE.FREE_PLAY_DEFAULT_BPM).toBeLessThanOrEqual(WAVE_GOVERNANCE.FREE_PLAY_BPM_MAX);
  });

  it('density and brightness ranges are ordered within [0, 1]', () => {
    expect(WAVE_GOVERNANCE.DENSITY_MIN).toBeGreaterThanOrEqual(0);
    expect(WAVE_GOVERNANCE.DENSITY_MAX).toBeLessThanOrEqual(1);
    expect(WAVE_GOVERNANCE.DENSITY_MAX).toBeGreaterThan(WAVE_GOVERNANCE.DENSITY_MIN);
    expect(WAVE_GOVERNANCE.BRIGHTNESS_MIN).toBeGreaterThanOrEqual(0);
    expect(WAVE_GOVERNANCE.BRIGHTNESS_MAX).toBeLessThanOrEqual(1);
    expect(WAVE_GOVERNANCE.BRIGHTNESS_MAX).toBeGreaterThan(WAVE_GOVERNANCE.BRIGHTNESS_MIN);
  });

  it('default session length is inside the accepted bounds', () => {
    expect(WAVE_GOVERNANCE.SESSION_DEFAULT_SECONDS).toBe(1500);
    expect(WAVE_GOVERNANCE.SESSION_DEFAULT_SECONDS).toBeGreaterThanOrEqual(WAVE_GOVERNANCE.SESSION_MIN_SECONDS);
    expect(WAVE_GOVERNANCE.SESSION_DEFAULT_SECONDS).toBeLessThanOrEqual(WAVE_GOVERNANCE.SESSION_MAX_SECONDS);
  });

  it('peak progress is strictly inside (0, 1)', () => {
    expect(WAVE_GOVERNANCE.PEAK_PROGRESS).toBeGreaterThan(0);
    expect(WAVE_GOVERNANCE.PEAK_PROGRESS).toBeLessThan(1);
  });

  it('steering override outweighs a full-strength ambient prompt', () => {
    expect(WAVE_GOVERNANCE.STEERING_OVERRIDE_WEIGHT).toBeGreaterThan(1);
    expect(WAVE_GOVERNANCE.PROMPT_WEIGHT_FLOOR).toBeGreaterThan(0);
    expect(WAVE_GOVERNANCE.PROMPT_WEIGHT_FLOOR).toBeLessThan(WAVE_GOVERNANCE.SINGLE_PROMPT_WEIGHT);
  });

  it('grace and dwell periods are 10 seconds', () => {
    expect(WAVE_GOVERNANCE.GRACE_PERIOD_SECONDS).toBe(10);
    expect(WAVE_GOVERNANCE.DWELL_PERIOD_MS).toBe(10_000);
  });

  it('parameter cadence and BPM threshold are positive', () => {
    expect(WAVE_GOVERNANCE.PARAMETER_UPDATE_TICKS).toBeGreaterThan(0);
    expect(WAVE_GOVERNANCE.BPM_CHANGE_THRESHOLD).toBeGreaterThan(0);
  });
});
