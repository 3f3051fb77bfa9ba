import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ActivityMonitor, type ForegroundProbe } from '../activity-monitor';
import type { FocusContext } from '../types';

function createProbe(url: string | null = null) {
  const readActiveUrl = vi.fn<ForegroundProbe['readActiveUrl']>().mockResolvedValue(url);
  return { readActiveUrl };
}

function record(monitor: ActivityMonitor) {
  const seen: Array<[FocusContext, FocusContext | null]> = [];
  monitor.subscribe((context, previous) => seen.push([context, previous]));
  return seen;
}

describe('ActivityMonitor', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('publishes app activations with the previous context', async () => {
    const monitor = new ActivityMonitor({ initialAppName: 'Finder' });
    const seen = record(monitor);

    await monitor.handleActivation('Notes');
    await monitor.handleActivation('Notes');

    expect(seen).toEqual([[{ appName: 'Notes', activeHost: null }, { appName: 'Finder', activeHost: null }]]);
    expect(monitor.previousContext).toEqual({ appName: 'Finder', activeHost: null });
  });

  it('starts from an unknown app', () => {
    expect(new ActivityMonitor().current()).toEqual({ appName: 'Unknown', activeHost: null });
  });

  it('reads the active tab host when a browser comes forward', async () => {
    const probe = createProbe('https://Old.Reddit.com/r/typescript');
    const monitor = new ActivityMonitor({ probe });

    await monitor.handleActivation('Google Chrome');

    expect(probe.readActiveUrl).toHaveBeenCalledWith('Google Chrome');
    expect(monitor.current()).toEqual({ appName: 'Google Chrome', activeHost: 'old.reddit.com' });
  });

  it('polls the browser tab and reports navigation', async () => {
    const probe = createProbe('https://github.com/');
    const monitor = new ActivityMonitor({ probe, pollIntervalMs: 2_000 });
    const seen = record(monitor);
    await monitor.handleActivation('Safari');

    probe.readActiveUrl.mockResolvedValue('https://www.youtube.com/watch');
    await vi.advanceTimersByTimeAsync(2_000);

    expect(seen.map(([context]) => context.activeHost)).toEqual(['github.com', 'www.youtube.com']);

    await vi.advanceTimersByTimeAsync(2_000);
    expect(seen).toHaveLength(2);
  });

  it('stops polling when a non-browser app comes forward', async () => {
    const probe = createProbe('https://github.com/');
    const monitor = new ActivityMonitor({ probe });
    await monitor.handleActivation('Arc');
    await monitor.handleActivation('Terminal');
    probe.readActiveUrl.mockClear();

    await vi.advanceTimersByTimeAsync(10_000);
    expect(probe.readActiveUrl).not.toHaveBeenCalled();
    expect(monitor.current()).toEqual({ appName: 'Terminal', activeHost: null });
  });

  it('drops a tab read that finishes after a newer activation', async () => {
    let answer: (url: string | null) => void = () => {};
    const probe = {
      readActiveUrl: vi.fn<ForegroundProbe['readActiveUrl']>(
        () => new Promise<string | null>((resolve) => {
          answer = resolve;
        })
      ),
    };
    const monitor = new ActivityMonitor({ probe });

    const browser = monitor.handleActivation('Safari');
    await monitor.handleActivation('Notes');
    answer('https://reddit.com/');
    await browser;

    expect(monitor.current()).toEqual({ appName: 'Notes', activeHost: null });
  });

  it('publishes the browser without a host when the tab cannot be read', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const probe = { readActiveUrl: vi.fn<ForegroundProbe['readActiveUrl']>().mockRejectedValue(new Error('denied')) };
    const monitor = new ActivityMonitor({ probe });

    await monitor.handleActivation('Safari');

    expect(monitor.current()).toEqual({ appName: 'Safari', activeHost: null });
    expect(warn).toHaveBeenCalledWith('[ActivityMonitor] Could not read the active tab of Safari:', 'denied');
    monitor.stop();
  });

  it('treats browsers as plain apps without a probe', async () => {
    const monitor = new ActivityMonitor();
    await monitor.handleActivation('Safari');
    expect(monitor.current()).toEqual({ appName: 'Safari', activeHost: null });
    expect(monitor.isBrowser('safari')).toBe(true);
    expect(monitor.isBrowser('Notes')).toBe(false);
  });

  it('a failing listener does not stop the others', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const monitor = new ActivityMonitor();
    monitor.subscribe(() => {
      throw new Error('listener bug');
    });
    const second = vi.fn();
    const unsubscribe = monitor.subscribe(second);

    await monitor.handleActivation('Notes');
    expect(second).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);

    unsubscribe();
    await monitor.handleActivation('Mail');
    expect(second).toHaveBeenCalledTimes(1);
  });
});
