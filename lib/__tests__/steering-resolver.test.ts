import { describe, it, expect } from 'vitest';
import {
  describePrompts,
  resolveFreePlayPrompts,
  resolvePrompts,
  resolveWavePrompts,
} from '../steering-resolver';
import type { WaveParameters } from '../types';

const parameters: WaveParameters = {
  bpm: 90,
  density: 0.4,
  brightness: 0.5,
  calmWeight: 0.7,
  intenseWeight: 0.3,
};

describe('resolveWavePrompts', () => {
  it('sends the calm and intense pair weighted by the curve', () => {
    expect(resolveWavePrompts({ calmPrompt: 'calm', intensePrompt: 'intense', parameters })).toEqual([
      { text: 'calm', weight: 0.7 },
      { text: 'intense', weight: 0.3 },
    ]);
  });

  it('appends the routed prompt and then the steering override', () => {
    const prompts = resolveWavePrompts({
      calmPrompt: 'calm',
      intensePrompt: 'intense',
      parameters,
      routedPrompt: 'focused lo-fi',
      steeringOverride: 'add a cello',
    });
    expect(prompts).toEqual([
      { text: 'calm', weight: 0.7 },
      { text: 'intense', weight: 0.3 },
      { text: 'focused lo-fi', weight: 1.0 },
      { text: 'add a cello', weight: 2.0 },
    ]);
  });

  it('floors zero and invalid weights', () => {
    const prompts = resolveWavePrompts({
      calmPrompt: 'calm',
      intensePrompt: 'intense',
      parameters: { ...parameters, calmWeight: 0, intenseWeight: Number.NaN },
    });
    expect(prompts.map((p) => p.weight)).toEqual([0.1, 0.1]);
  });

  it('skips blank prompts', () => {
    const prompts = resolveWavePrompts({
      calmPrompt: '  ',
      intensePrompt: 'intense',
      parameters,
      routedPrompt: '',
      steeringOverride: null,
    });
    expect(prompts).toEqual([{ text: 'intense', weight: 0.3 }]);
  });
});

describe('resolveFreePlayPrompts', () => {
  it('prefers the steering override, then the routed prompt, then the static prompt', () => {
    expect(
      resolveFreePlayPrompts({ freePlayPrompt: 'base', routedPrompt: 'routed', steeringOverride: 'steer' })
    ).toEqual([{ text: 'steer', weight: 1.0 }]);
    expect(resolveFreePlayPrompts({ freePlayPrompt: 'base', routedPrompt: 'routed' })).toEqual([
      { text: 'routed', weight: 1.0 },
    ]);
    expect(resolveFreePlayPrompts({ freePlayPrompt: 'base', routedPrompt: ' ' })).toEqual([
      { text: 'base', weight: 1.0 },
    ]);
  });

  it('returns nothing when every source is blank', () => {
    expect(resolveFreePlayPrompts({ freePlayPrompt: '' })).toEqual([]);
  });
});

describe('resolvePrompts', () => {
  it('dispatches on the session mode', () => {
    expect(resolvePrompts({ mode: 'free_play', freePlayPrompt: 'base' })).toEqual([{ text: 'base', weight: 1.0 }]);
    expect(
      resolvePrompts({ mode: 'wave', calmPrompt: 'calm', intensePrompt: 'intense', parameters })
    ).toHaveLength(2);
  });
});

describe('describePrompts', () => {
  it('formats text and weight for the log', () => {
    expect(
      describePrompts([
        { text: 'calm', weight: 0.7 },
        { text: 'add a cello', weight: 2 },
      ])
    ).toBe('"calm"@0.70, "add a cello"@2.00');
  });
});
