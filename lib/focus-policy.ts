import { EventEmitter } from 'events';
import { z } from 'zod';
import type {
  ContextSignal,
  FocusContext,
  FocusGuardMode,
  FocusLists,
  FocusPolicyState,
  FocusTarget,
} from './types';
import { matchesAppName, matchesDomain, normalizeDomain, sameAppName } from './context-matching';
import { loadRecord, STORE_KEYS, type KeyValueStore } from './preferences-store';
import { PeriodicTask } from './task-timers';
import { WAVE_GOVERNANCE } from './wave-governance-constants';

export const DEFAULT_FOCUS_LISTS: Readonly<FocusLists> = Object.freeze({
  blockedApps: ['Instagram', 'Reddit', 'TikTok'],
  blockedDomains: ['instagram.com', 'reddit.com', 'youtube.com', 'twitter.com', 'x.com', 'tiktok.com'],
  allowedApps: ['Notes', 'Google Chrome', 'Safari', 'Spotify', 'Finder', 'Calendar'],
  allowedDomains: ['mail.google.com', 'docs.google.com', 'notion.so', 'github.com'],
});

export const MONITORING_APP_NAME = 'Waves';

const storedFocusConfigSchema = z.object({
  mode: z.enum(['blocklist', 'allowlist']),
  apps: z.array(z.string()),
  domains: z.array(z.string()),
  allowedApps: z.array(z.string()).optional(),
  allowedDomains: z.array(z.string()).optional(),
});

type StoredFocusConfig = z.infer<typeof storedFocusConfigSchema>;

export interface FocusPolicyOptions {
  signal: ContextSignal;
  store?: KeyValueStore;
  /** Foreground app name of the monitor itself; never treated as a violation. */
  selfAppName?: string;
}

export interface FocusPolicyEngine {
  on(event: 'violation', listener: () => void): this;
  on(event: 'refocused', listener: () => void): this;
  on(event: 'state', listener: (state: FocusPolicyState) => void): this;
  off(event: 'violation', listener: () => void): this;
  off(event: 'refocused', listener: () => void): this;
  off(event: 'state', listener: (state: FocusPolicyState) => void): this;
}

/**
 * Gates a session on the user's foreground context.
 *
 * Clear → Violating → Suspended → Clear. A blocked context starts a
 * violation; after the grace period of consecutive policy ticks the engine
 * suspends and emits `violation` once. Returning to an allowed context
 * clears the episode and emits `refocused` only if it had suspended.
 */
export class FocusPolicyEngine extends EventEmitter {
  private enabled = false;
  private mode: FocusGuardMode = 'blocklist';
  private lists: FocusLists = cloneLists(DEFAULT_FOCUS_LISTS);
  private isViolating = false;
  private violationSeconds = 0;
  private isSuspended = false;
  private unsubscribe: (() => void) | null = null;
  private readonly ticker: PeriodicTask;
  private readonly signal: ContextSignal;
  private readonly store: KeyValueStore | undefined;
  private readonly selfAppName: string;

  constructor(options: FocusPolicyOptions) {
    super();
    this.signal = options.signal;
    this.store = options.store;
    this.selfAppName = options.selfAppName ?? MONITORING_APP_NAME;
    this.ticker = new PeriodicTask(WAVE_GOVERNANCE.POLICY_TICK_INTERVAL_MS, () => this.tick());
    this.load();
  }

  get state(): FocusPolicyState {
    return {
      enabled: this.enabled,
      mode: this.mode,
      isViolating: this.isViolating,
      violationSeconds: this.violationSeconds,
      isSuspended: this.isSuspended,
    };
  }

  get currentLists(): FocusLists {
    return cloneLists(this.lists);
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(enabled: boolean): void {
    if (enabled) {
      this.startMonitoring();
    } else {
      this.stopMonitoring();
    }
  }

  // ─── Classification ─────────────────────────────────────────────────

  isContextBlocked(context: FocusContext): boolean {
    if (sameAppName(context.appName, this.selfAppName)) return false;

    // Snapshot so a concurrent list edit cannot change the answer midway.
    const lists = this.lists;
    const host = context.activeHost;

    switch (this.mode) {
      case 'blocklist':
        if (matchesAppName(context.appName, lists.blockedApps)) return true;
        return matchesDomain(host, lists.blockedDomains);

      case 'allowlist':
        if (matchesAppName(context.appName, lists.allowedApps)) return false;
        if (host) return !matchesDomain(host, lists.allowedDomains);
        return true;
    }
  }

  // ─── List editing ───────────────────────────────────────────────────

  setMode(mode: FocusGuardMode): void {
    if (this.mode === mode) return;
    this.mode = mode;
    this.persist();
    this.reevaluate();
  }

  setLists(patch: Partial<FocusLists>): void {
    this.lists = {
      blockedApps: cleanList(patch.blockedApps ?? this.lists.blockedApps, false),
      blockedDomains: cleanList(patch.blockedDomains ?? this.lists.blockedDomains, true),
      allowedApps: cleanList(patch.allowedApps ?? this.lists.allowedApps, false),
      allowedDomains: cleanList(patch.allowedDomains ?? this.lists.allowedDomains, true),
    };
    this.persist();
    this.reevaluate();
  }

  /** Adds a domain and/or app to the blocklist. Returns the names that were applied. */
  block(target: FocusTarget): string[] {
    const applied: string[] = [];
    const next = cloneLists(this.lists);
    const domain = target.domain ? normalizeDomain(target.domain) : '';
    const appName = target.appName?.trim() ?? '';

    if (domain) {
      if (!next.blockedDomains.some((d) => normalizeDomain(d) === domain)) {
        next.blockedDomains.push(domain);
      }
      applied.push(domain);
    }
    if (appName) {
      if (!matchesAppName(appName, next.blockedApps)) {
        next.blockedApps.push(appName);
      }
      applied.push(appName);
    }

    if (applied.length > 0) {
      this.lists = next;
      this.persist();
      this.reevaluate();
    }
    return applied;
  }

  /** Removes a domain and/or app from the blocklist. Returns the names that were requested. */
  unblock(target: FocusTarget): string[] {
    const applied: string[] = [];
    const next = cloneLists(this.lists);
    const domain = target.domain ? normalizeDomain(target.domain) : '';
    const appName = target.appName?.trim() ?? '';

    if (domain) {
      next.blockedDomains = next.blockedDomains.filter((d) => normalizeDomain(d) !== domain);
      applied.push(domain);
    }
    if (appName) {
      next.blockedApps = next.blockedApps.filter((a) => !sameAppName(a, appName));
      applied.push(appName);
    }

    if (applied.length > 0) {
      this.lists = next;
      this.persist();
      this.reevaluate();
    }
    return applied;
  }

  resetToDefaults(): void {
    this.lists = cloneLists(DEFAULT_FOCUS_LISTS);
    this.mode = 'blocklist';
    this.persist();
    this.reevaluate();
  }

  /** Re-runs classification against the current context after a policy edit. */
  reevaluate(): void {
    if (!this.enabled) return;
    this.evaluate(this.signal.current());
  }

  // ─── Monitoring ─────────────────────────────────────────────────────

  private startMonitoring(): void {
    this.stopMonitoring();
    this.enabled = true;
    this.isViolating = false;
    this.violationSeconds = 0;
    this.isSuspended = false;

    this.unsubscribe = this.signal.subscribe((context) => this.evaluate(context));
    this.ticker.start();
    console.log(`[FocusPolicy] Monitoring enabled (${this.mode})`);
    this.emitState();
    this.evaluate(this.signal.current());
  }

  private stopMonitoring(): void {
    const wasEnabled = this.enabled;
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.ticker.cancel();
    this.enabled = false;
    this.isViolating = false;
    this.violationSeconds = 0;
    this.isSuspended = false;
    if (wasEnabled) {
      console.log('[FocusPolicy] Monitoring disabled');
      this.emitState();
    }
  }

  private evaluate(context: FocusContext): void {
    if (!this.enabled) return;
    const blocked = this.isContextBlocked(context);

    if (blocked && !this.isViolating) {
      this.isViolating = true;
      this.violationSeconds = 0;
      console.log(`[FocusPolicy] Violation started: ${describeContext(context)}`);
      this.emitState();
    } else if (!blocked && this.isViolating) {
      const wasSuspended = this.isSuspended;
      this.isViolating = false;
      this.violationSeconds = 0;
      this.isSuspended = false;
      console.log(`[FocusPolicy] Violation cleared: ${describeContext(context)}`);
      this.emitState();
      if (wasSuspended) {
        this.emit('refocused');
      }
    }
  }

  private tick(): void {
    if (!this.enabled) return;
    if (!this.isViolating || this.isSuspended) return;

    this.violationSeconds += 1;
    if (this.violationSeconds >= WAVE_GOVERNANCE.GRACE_PERIOD_SECONDS) {
      this.isSuspended = true;
      console.log(`[FocusPolicy] Grace period elapsed after ${this.violationSeconds}s, suspending`);
      this.emitState();
      this.emit('violation');
      return;
    }
    this.emitState();
  }

  private emitState(): void {
    this.emit('state', this.state);
  }

  // ─── Persistence ────────────────────────────────────────────────────

  private persist(): void {
    if (!this.store) return;
    const record: StoredFocusConfig = {
      mode: this.mode,
      apps: this.lists.blockedApps,
      domains: this.lists.blockedDomains,
      allowedApps: this.lists.allowedApps,
      allowedDomains: this.lists.allowedDomains,
    };
    try {
      this.store.save(STORE_KEYS.FOCUS_GUARD, record);
    } catch (err) {
      console.error('[FocusPolicy] Failed to persist focus lists:', err);
    }
  }

  private load(): void {
    if (!this.store) return;
    const stored = loadRecord(this.store, STORE_KEYS.FOCUS_GUARD, storedFocusConfigSchema);
    if (!stored) return;
    this.mode = stored.mode;
    this.lists = {
      blockedApps: cleanList(stored.apps, false),
      blockedDomains: cleanList(stored.domains, true),
      allowedApps: cleanList(stored.allowedApps ?? DEFAULT_FOCUS_LISTS.allowedApps, false),
      allowedDomains: cleanList(stored.allowedDomains ?? DEFAULT_FOCUS_LISTS.allowedDomains, true),
    };
  }
}

function cloneLists(lists: Readonly<FocusLists>): FocusLists {
  return {
    blockedApps: [...lists.blockedApps],
    blockedDomains: [...lists.blockedDomains],
    allowedApps: [...lists.allowedApps],
    allowedDomains: [...lists.allowedDomains],
  };
}

function cleanList(values: readonly string[], domains: boolean): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const cleaned = domains ? normalizeDomain(value) : value.trim();
    if (!cleaned) continue;
    const key = cleaned.toLocaleLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(cleaned);
  }
  return result;
}

function describeContext(context: FocusContext): string {
  return context.activeHost ? `${context.appName} (${context.activeHost})` : context.appName;
}
