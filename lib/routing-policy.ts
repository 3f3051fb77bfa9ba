import { EventEmitter } from 'events';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type {
  AppMusicRule,
  ContextSignal,
  FocusContext,
  RoutedPromptChange,
  RoutingState,
} from './types';
import { matchesAppName, matchesDomain, normalizeDomain } from './context-matching';
import { loadRecord, STORE_KEYS, type KeyValueStore } from './preferences-store';
import { DelayedTask } from './task-timers';
import { WAVE_GOVERNANCE } from './wave-governance-constants';

export const DEFAULT_ROUTING_RULES: readonly AppMusicRule[] = [
  {
    id: '00000000-0001-0000-0000-000000000000',
    label: 'Writing',
    appNames: ['Obsidian', 'Notes', 'Pages', 'TextEdit'],
    domains: ['docs.google.com', 'notion.so'],
    prompt: 'chill ambient instrumental music, calm and focused',
  },
  {
    id: '00000000-0002-0000-0000-000000000000',
    label: 'Social Media',
    appNames: ['Instagram', 'TikTok'],
    domains: ['instagram.com', 'reddit.com', 'twitter.com', 'x.com', 'tiktok.com', 'facebook.com'],
    prompt: 'upbeat pop music with catchy beats and energy',
  },
  {
    id: '00000000-0003-0000-0000-000000000000',
    label: 'Coding',
    appNames: ['Xcode', 'Code', 'Cursor', 'Terminal', 'iTerm2', 'Warp'],
    domains: ['github.com'],
    prompt: 'edm dubstep electronic high energy bass drops',
  },
];

const ruleSchema = z.object({
  id: z.string().min(1),
  label: z.string(),
  appNames: z.array(z.string()),
  domains: z.array(z.string()),
  prompt: z.string(),
});

const storedRulesSchema = z.array(ruleSchema);

export type RuleDraft = Omit<AppMusicRule, 'id'>;

export function ruleMatches(rule: AppMusicRule, context: FocusContext): boolean {
  if (matchesAppName(context.appName, rule.appNames)) return true;
  return matchesDomain(context.activeHost, rule.domains);
}

/** First rule in stored order matching the context, or null. */
export function findMatchingRule(
  rules: readonly AppMusicRule[],
  context: FocusContext
): AppMusicRule | null {
  return rules.find((rule) => ruleMatches(rule, context)) ?? null;
}

export interface RoutingPolicyOptions {
  signal: ContextSignal;
  store?: KeyValueStore;
}

export interface RoutingPolicyEngine {
  on(event: 'prompt_changed', listener: (change: RoutedPromptChange) => void): this;
  on(event: 'state', listener: (state: RoutingState) => void): this;
  off(event: 'prompt_changed', listener: (change: RoutedPromptChange) => void): this;
  off(event: 'state', listener: (state: RoutingState) => void): this;
}

interface PendingCandidate {
  rule: AppMusicRule | null;
}

/**
 * Swaps the active music profile when the user's context settles on a
 * different rule. A candidate must stay stable for the whole dwell period;
 * every change of candidate restarts the dwell, and flicking back to the
 * active rule cancels it without an emission.
 */
export class RoutingPolicyEngine extends EventEmitter {
  private rules: readonly AppMusicRule[] = freezeRules(DEFAULT_ROUTING_RULES);
  private enabled = false;
  private requested = false;
  private autoRoutingEnabled = true;
  private activeRule: AppMusicRule | null = null;
  private pending: PendingCandidate | null = null;
  private unsubscribe: (() => void) | null = null;
  private readonly dwell = new DelayedTask(WAVE_GOVERNANCE.DWELL_PERIOD_MS);
  private readonly signal: ContextSignal;
  private readonly store: KeyValueStore | undefined;

  /** Prompt restored when the context stops matching any rule. */
  originalPrompt = '';

  constructor(options: RoutingPolicyOptions) {
    super();
    this.signal = options.signal;
    this.store = options.store;
    this.load();
  }

  get state(): RoutingState {
    return {
      enabled: this.enabled,
      activeRule: this.activeRule,
      pendingRule: this.pending ? this.pending.rule : undefined,
    };
  }

  get currentRules(): readonly AppMusicRule[] {
    return this.rules;
  }

  /** True while the engine is actually watching the context. */
  get isEnabled(): boolean {
    return this.enabled;
  }

  get isAutoRoutingEnabled(): boolean {
    return this.autoRoutingEnabled;
  }

  /** Requests routing for the session. It only runs while auto-routing is on. */
  setEnabled(enabled: boolean): void {
    this.requested = enabled;
    if (enabled && this.autoRoutingEnabled) {
      this.startMonitoring();
    } else {
      this.stopMonitoring();
    }
  }

  setAutoRoutingEnabled(enabled: boolean): void {
    const changed = this.autoRoutingEnabled !== enabled;
    this.autoRoutingEnabled = enabled;
    if (changed) {
      console.log(`[RoutingPolicy] Auto-routing ${enabled ? 'on' : 'off'}`);
      this.setEnabled(this.requested);
    }
    if (!this.store) return;
    try {
      this.store.save(STORE_KEYS.AUTO_ROUTING, enabled);
    } catch (err) {
      console.error('[RoutingPolicy] Failed to persist auto-routing preference:', err);
    }
  }

  // ─── Rule editing ───────────────────────────────────────────────────

  setRules(rules: readonly AppMusicRule[]): void {
    this.rules = freezeRules(rules);
    this.persist();
  }

  addRule(draft: RuleDraft): AppMusicRule {
    const rule: AppMusicRule = { id: randomUUID(), ...sanitizeDraft(draft) };
    this.setRules([...this.rules, rule]);
    return rule;
  }

  updateRule(id: string, patch: Partial<RuleDraft>): AppMusicRule {
    const existing = this.rules.find((rule) => rule.id === id);
    if (!existing) {
      throw new Error(`Unknown routing rule: ${id}`);
    }
    const updated: AppMusicRule = {
      id,
      ...sanitizeDraft({
        label: patch.label ?? existing.label,
        appNames: patch.appNames ?? existing.appNames,
        domains: patch.domains ?? existing.domains,
        prompt: patch.prompt ?? existing.prompt,
      }),
    };
    this.setRules(this.rules.map((rule) => (rule.id === id ? updated : rule)));
    return updated;
  }

  removeRule(id: string): void {
    this.setRules(this.rules.filter((rule) => rule.id !== id));
  }

  resetToDefaults(): void {
    this.setRules(DEFAULT_ROUTING_RULES);
  }

  // ─── Monitoring ─────────────────────────────────────────────────────

  private startMonitoring(): void {
    this.stopMonitoring();
    this.enabled = true;
    this.unsubscribe = this.signal.subscribe((context) => this.evaluate(context));
    console.log(`[RoutingPolicy] Routing enabled (${this.rules.length} rules)`);
    this.evaluate(this.signal.current());
  }

  private stopMonitoring(): void {
    const wasEnabled = this.enabled;
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.dwell.cancel();
    this.pending = null;
    // Monitoring restarts from no profile, so re-enabling re-applies the matching rule.
    this.activeRule = null;
    this.enabled = false;
    if (wasEnabled) {
      console.log('[RoutingPolicy] Routing disabled');
      this.emitState();
    }
  }

  private evaluate(context: FocusContext): void {
    if (!this.enabled) return;

    const rules = this.rules;
    const matched = findMatchingRule(rules, context);
    const matchedId = matched?.id ?? null;

    if (matchedId === (this.activeRule?.id ?? null)) {
      if (this.pending) {
        this.dwell.cancel();
        this.pending = null;
        console.log('[RoutingPolicy] Context returned to the active profile; pending switch cancelled');
        this.emitState();
      }
      return;
    }

    if (this.pending && (this.pending.rule?.id ?? null) === matchedId) {
      return;
    }

    this.pending = { rule: matched };
    console.log(`[RoutingPolicy] Candidate ${matched ? `"${matched.label}"` : '(no match)'} pending`);
    this.dwell.schedule(() => this.commit(matched));
    this.emitState();
  }

  private commit(candidate: AppMusicRule | null): void {
    if (!this.enabled) return;
    this.pending = null;

    if (candidate) {
      this.activeRule = candidate;
      console.log(`[RoutingPolicy] Switched to "${candidate.label}"`);
      this.emitState();
      this.emit('prompt_changed', { prompt: candidate.prompt, rule: candidate } satisfies RoutedPromptChange);
      return;
    }

    const hadActive = this.activeRule !== null;
    this.activeRule = null;
    this.emitState();
    if (hadActive) {
      console.log('[RoutingPolicy] No rule matches; restoring the original prompt');
      this.emit('prompt_changed', { prompt: this.originalPrompt, rule: null } satisfies RoutedPromptChange);
    }
  }

  private emitState(): void {
    this.emit('state', this.state);
  }

  // ─── Persistence ────────────────────────────────────────────────────

  private persist(): void {
    if (!this.store) return;
    try {
      this.store.save(STORE_KEYS.ROUTING_RULES, this.rules);
    } catch (err) {
      console.error('[RoutingPolicy] Failed to persist routing rules:', err);
    }
  }

  private load(): void {
    if (!this.store) return;
    const stored = loadRecord(this.store, STORE_KEYS.ROUTING_RULES, storedRulesSchema);
    if (stored) {
      this.rules = freezeRules(stored);
    }
    const autoRouting = loadRecord(this.store, STORE_KEYS.AUTO_ROUTING, z.boolean());
    if (autoRouting !== undefined) {
      this.autoRoutingEnabled = autoRouting;
    }
  }
}

function sanitizeDraft(draft: RuleDraft): RuleDraft {
  const label = draft.label.trim();
  const prompt = draft.prompt.trim();
  if (!label) throw new Error('Routing rule label must not be empty.');
  if (!prompt) throw new Error('Routing rule prompt must not be empty.');
  return {
    label,
    prompt,
    appNames: draft.appNames.map((name) => name.trim()).filter(Boolean),
    domains: draft.domains.map(normalizeDomain).filter(Boolean),
  };
}

function freezeRules(rules: readonly AppMusicRule[]): readonly AppMusicRule[] {
  return Object.freeze(
    rules.map((rule) =>
      Object.freeze({
        ...rule,
        appNames: Object.freeze([...rule.appNames]),
        domains: Object.freeze([...rule.domains]),
      })
    )
  );
}
