import type { WaveParameters, WeightedPrompt } from './types';
import { WAVE_GOVERNANCE } from './wave-governance-constants';

export interface WavePromptSources {
  calmPrompt: string;
  intensePrompt: string;
  parameters: WaveParameters;
  routedPrompt?: string | null;
  steeringOverride?: string | null;
}

export interface FreePlayPromptSources {
  freePlayPrompt: string;
  routedPrompt?: string | null;
  steeringOverride?: string | null;
}

function usable(text: string | null | undefined): text is string {
  return typeof text === 'string' && text.trim().length > 0;
}

function positiveWeight(weight: number): number {
  return Number.isFinite(weight) && weight > 0 ? weight : WAVE_GOVERNANCE.PROMPT_WEIGHT_FLOOR;
}

/**
 * Wave mode: the calm/intense pair always leads, a routed profile follows,
 * and a user steering prompt is appended last so it dominates the blend
 * without erasing the ambient pair. Order is significant to the backend.
 */
export function resolveWavePrompts(sources: WavePromptSources): WeightedPrompt[] {
  const prompts: WeightedPrompt[] = [];
  if (usable(sources.calmPrompt)) {
    prompts.push({ text: sources.calmPrompt, weight: positiveWeight(sources.parameters.calmWeight) });
  }
  if (usable(sources.intensePrompt)) {
    prompts.push({ text: sources.intensePrompt, weight: positiveWeight(sources.parameters.intenseWeight) });
  }
  if (usable(sources.routedPrompt)) {
    prompts.push({ text: sources.routedPrompt, weight: WAVE_GOVERNANCE.SINGLE_PROMPT_WEIGHT });
  }
  if (usable(sources.steeringOverride)) {
    prompts.push({ text: sources.steeringOverride, weight: WAVE_GOVERNANCE.STEERING_OVERRIDE_WEIGHT });
  }
  return prompts;
}

/**
 * Free-play mode has a single active prompt: steering beats the routed
 * profile, which replaces the static free-play prompt.
 */
export function resolveFreePlayPrompts(sources: FreePlayPromptSources): WeightedPrompt[] {
  const text = [sources.steeringOverride, sources.routedPrompt, sources.freePlayPrompt].find(usable);
  return text ? [{ text, weight: WAVE_GOVERNANCE.SINGLE_PROMPT_WEIGHT }] : [];
}

export type PromptSources =
  | ({ mode: 'wave' } & WavePromptSources)
  | ({ mode: 'free_play' } & FreePlayPromptSources);

export function resolvePrompts(sources: PromptSources): WeightedPrompt[] {
  switch (sources.mode) {
    case 'wave':
      return resolveWavePrompts(sources);
    case 'free_play':
      return resolveFreePlayPrompts(sources);
  }
}

export function describePrompts(prompts: readonly WeightedPrompt[]): string {
  return prompts.map((p) => `"${p.text}"@${p.weight.toFixed(2)}`).join(', ');
}
