import type { ContextListener, ContextSignal, FocusContext } from './types';
import { extractHost, matchesAppName } from './context-matching';
import { describeError } from './session-errors';
import { PeriodicTask } from './task-timers';
import { WAVE_GOVERNANCE } from './wave-governance-constants';

export const DEFAULT_BROWSER_APPS: readonly string[] = [
  'Safari',
  'Google Chrome',
  'Arc',
  'Microsoft Edge',
  'Brave Browser',
];

const UNKNOWN_APP = 'Unknown';

/** Host-side access to the frontmost browser tab. */
export interface ForegroundProbe {
  /** URL of the active tab of `appName`, or null when it cannot be read. */
  readActiveUrl(appName: string): Promise<string | null>;
}

export interface ActivityMonitorOptions {
  probe?: ForegroundProbe;
  browserApps?: readonly string[];
  initialAppName?: string;
  pollIntervalMs?: number;
}

/**
 * Default `ContextSignal`. The host pushes app activations; while a browser
 * is frontmost the active tab is polled so tab navigation is noticed
 * without an activation event. Listeners only hear about real changes.
 */
export class ActivityMonitor implements ContextSignal {
  private context: FocusContext;
  private previous: FocusContext | null = null;
  private browserApp: string | null = null;
  private generation = 0;
  private readonly listeners = new Set<ContextListener>();
  private readonly poller: PeriodicTask;
  private readonly probe: ForegroundProbe | undefined;
  private readonly browserApps: readonly string[];

  constructor(options: ActivityMonitorOptions = {}) {
    this.probe = options.probe;
    this.browserApps = options.browserApps ?? DEFAULT_BROWSER_APPS;
    this.context = { appName: options.initialAppName?.trim() || UNKNOWN_APP, activeHost: null };
    this.poller = new PeriodicTask(
      options.pollIntervalMs ?? WAVE_GOVERNANCE.BROWSER_POLL_INTERVAL_MS,
      () => this.poll()
    );
  }

  current(): FocusContext {
    return this.context;
  }

  get previousContext(): FocusContext | null {
    return this.previous;
  }

  subscribe(listener: ContextListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  isBrowser(appName: string): boolean {
    return matchesAppName(appName, this.browserApps);
  }

  /** Called by the host whenever a different app comes to the foreground. */
  async handleActivation(appName: string): Promise<void> {
    const name = appName.trim() || UNKNOWN_APP;
    const generation = ++this.generation;

    if (this.probe && this.isBrowser(name)) {
      this.browserApp = name;
      this.poller.start();
      await this.refreshHost(name, generation);
      return;
    }

    this.browserApp = null;
    this.poller.cancel();
    this.publish({ appName: name, activeHost: null });
  }

  stop(): void {
    this.generation++;
    this.browserApp = null;
    this.poller.cancel();
  }

  private poll(): void {
    const app = this.browserApp;
    if (!app) return;
    void this.refreshHost(app, this.generation);
  }

  private async refreshHost(appName: string, generation: number): Promise<void> {
    let host: string | null = null;
    if (this.probe) {
      try {
        host = extractHost(await this.probe.readActiveUrl(appName));
      } catch (err) {
        console.warn(`[ActivityMonitor] Could not read the active tab of ${appName}:`, describeError(err));
      }
    }
    // An activation that landed while the probe was running wins.
    if (generation !== this.generation) return;
    this.publish({ appName, activeHost: host });
  }

  private publish(next: FocusContext): void {
    const prev = this.context;
    if (prev.appName === next.appName && prev.activeHost === next.activeHost) return;
    this.previous = prev;
    this.context = next;
    for (const listener of [...this.listeners]) {
      try {
        listener(next, prev);
      } catch (err) {
        console.error('[ActivityMonitor] Context listener failed:', err);
      }
    }
  }
}
