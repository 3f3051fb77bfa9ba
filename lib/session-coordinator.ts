import { EventEmitter } from 'events';
import type {
  ConnectionState,
  ContextSignal,
  MusicConfigUpdate,
  ParameterUpdate,
  RoutedPromptChange,
  SessionMode,
  SessionSnapshot,
  SteeringIntent,
  SteeringIntentClassifier,
  SteeringStatus,
  WaveParameters,
  WeightedPrompt,
} from './types';
import type { AudioSink } from './audio-sink';
import { FocusPolicyEngine } from './focus-policy';
import { clampFreePlayBpm } from './intensity-curve';
import {
  calmPromptFor,
  DEFAULT_MUSIC_PREFERENCES,
  defaultPromptFor,
  intensePromptFor,
  loadMusicPreferences,
  saveMusicPreferences,
  type MusicPreferences,
} from './music-preferences';
import type { KeyValueStore } from './preferences-store';
import { ReminderPing } from './reminder-ping';
import { RoutingPolicyEngine } from './routing-policy';
import { describeError } from './session-errors';
import { describePrompts, resolveFreePlayPrompts, resolveWavePrompts } from './steering-resolver';
import type { StreamingClient } from './streaming-client';
import { DelayedTask } from './task-timers';
import { WaveScheduler } from './wave-scheduler';
import { WAVE_GOVERNANCE } from './wave-governance-constants';

export interface SessionCoordinatorOptions {
  client: StreamingClient;
  sink: AudioSink;
  signal: ContextSignal;
  /** Returns the current credential; empty string when none is configured. */
  apiKey: () => string;
  store?: KeyValueStore;
  classifier?: SteeringIntentClassifier;
  scheduler?: WaveScheduler;
  reminder?: ReminderPing;
  /** App name of the host UI, exempt from the focus policy. */
  selfAppName?: string;
}

export interface SessionCoordinator {
  on(event: 'state', listener: (snapshot: SessionSnapshot) => void): this;
  on(event: 'setup_required', listener: () => void): this;
  off(event: 'state', listener: (snapshot: SessionSnapshot) => void): this;
  off(event: 'setup_required', listener: () => void): this;
}

/**
 * Single owner of a listening session.
 *
 * Every public operation and every engine notification runs through one
 * promise chain, so a focus suspension can never interleave with a user
 * pause. Lifecycle operations also bump an epoch the moment they are
 * called: a queued or in-flight operation from an older epoch is dropped
 * when it next checks, which is how a pause cancels a start that is still
 * waiting on its connection.
 */
export class SessionCoordinator extends EventEmitter {
  readonly scheduler: WaveScheduler;
  readonly focus: FocusPolicyEngine;
  readonly routing: RoutingPolicyEngine;

  private mode: SessionMode = 'idle';
  private isStreaming = false;
  private suspended = false;
  private setupRequired: boolean;
  private steeringOverride: string | null = null;
  private routedPrompt: string | null = null;
  private calmPrompt: string;
  private intensePrompt: string;
  private freePlayPrompt: string;
  private freePlayBpm: number = WAVE_GOVERNANCE.FREE_PLAY_DEFAULT_BPM;
  private steeringStatus: SteeringStatus = { kind: 'idle' };
  private steeringRequest = 0;
  private epoch = 0;
  private opInProgress: Promise<void> = Promise.resolve();
  private opCounter = 0;
  private readonly statusReset = new DelayedTask(WAVE_GOVERNANCE.STEERING_STATUS_TTL_MS);
  private readonly client: StreamingClient;
  private readonly sink: AudioSink;
  private readonly apiKey: () => string;
  private readonly store: KeyValueStore | undefined;
  private readonly classifier: SteeringIntentClassifier | undefined;
  private readonly reminder: ReminderPing;

  constructor(options: SessionCoordinatorOptions) {
    super();
    this.client = options.client;
    this.sink = options.sink;
    this.apiKey = options.apiKey;
    this.store = options.store;
    this.classifier = options.classifier;
    this.scheduler = options.scheduler ?? new WaveScheduler();
    this.reminder = options.reminder ?? new ReminderPing();
    this.focus = new FocusPolicyEngine({
      signal: options.signal,
      store: options.store,
      selfAppName: options.selfAppName,
    });
    this.routing = new RoutingPolicyEngine({ signal: options.signal, store: options.store });

    const prefs = (this.store && loadMusicPreferences(this.store)) ?? DEFAULT_MUSIC_PREFERENCES;
    this.calmPrompt = calmPromptFor(prefs);
    this.intensePrompt = intensePromptFor(prefs);
    this.freePlayPrompt = defaultPromptFor(prefs);
    this.routing.originalPrompt = this.freePlayPrompt;
    this.setupRequired = this.apiKey() === '';

    this.wireEngines();
  }

  // ─── Observation ────────────────────────────────────────────────────

  snapshot(): SessionSnapshot {
    return {
      mode: this.mode,
      isStreaming: this.isStreaming,
      suspended: this.suspended,
      setupRequired: this.setupRequired,
      connection: this.client.state,
      wave: this.scheduler.snapshot(),
      steeringOverride: this.steeringOverride,
      routedPrompt: this.routedPrompt,
      freePlayPrompt: this.freePlayPrompt,
      freePlayBpm: this.freePlayBpm,
      steeringStatus: this.steeringStatus,
      focus: this.focus.state,
    };
  }

  /** Resolves once every operation queued so far has finished. */
  whenIdle(): Promise<void> {
    return this.opInProgress;
  }

  // ─── Wave lifecycle ─────────────────────────────────────────────────

  startWave(durationSeconds?: number): Promise<void> {
    const epoch = this.beginLifecycle();
    return this.enqueue('start-wave', async () => {
      if (this.superseded(epoch, 'start-wave')) return;
      const apiKey = this.requireCredential();
      if (!apiKey) return;

      if (this.scheduler.currentState !== 'idle') {
        this.scheduler.cancel();
      }
      if (durationSeconds !== undefined) {
        this.scheduler.setDuration(durationSeconds);
      }
      this.steeringOverride = null;
      this.clearSuspension();

      if (!(await this.ensureConnected(apiKey, epoch, 'start-wave'))) return;

      this.mode = 'wave';
      const initial = this.scheduler.currentParameters;
      await this.client.setPrompts(this.wavePrompts(initial));
      await this.client.setMusicConfig(fullConfig(initial));
      this.sink.start();
      this.sink.fadeIn(WAVE_GOVERNANCE.FADE_IN_SECONDS);
      await this.client.play();
      this.isStreaming = true;
      this.scheduler.start();
      this.emitState();
    });
  }

  pauseWave(): Promise<void> {
    const epoch = this.beginLifecycle();
    return this.enqueue('pause-wave', async () => {
      if (this.superseded(epoch, 'pause-wave')) return;
      if (this.mode !== 'wave' || this.scheduler.currentState !== 'running') return;
      this.scheduler.pause();
      await this.client.pause();
      this.sink.pause();
      this.isStreaming = false;
      this.emitState();
    });
  }

  /** Resumes a paused or suspended wave, reconnecting first if the connection was lost. */
  resumeWave(): Promise<void> {
    const epoch = this.beginLifecycle();
    return this.enqueue('resume-wave', async () => {
      if (this.superseded(epoch, 'resume-wave')) return;
      if (this.mode !== 'wave' || this.scheduler.currentState !== 'paused') return;
      const apiKey = this.requireCredential();
      if (!apiKey) return;

      this.clearSuspension();
      if (!this.client.isConnected) {
        if (!(await this.ensureConnected(apiKey, epoch, 'resume-wave'))) return;
        const current = this.scheduler.currentParameters;
        await this.client.setPrompts(this.wavePrompts(current));
        await this.client.setMusicConfig(fullConfig(current));
        this.sink.start();
      } else {
        this.sink.resume();
      }
      await this.client.play();
      this.isStreaming = true;
      this.scheduler.resume();
      this.emitState();
    });
  }

  cancelWave(): Promise<void> {
    const epoch = this.beginLifecycle();
    return this.enqueue('cancel-wave', async () => {
      if (this.superseded(epoch, 'cancel-wave')) return;
      if (this.mode !== 'wave' && this.scheduler.currentState === 'idle') return;
      this.steeringOverride = null;
      this.clearSuspension();
      this.scheduler.cancel();
      await this.stopMusic();
      this.mode = 'idle';
      this.emitState();
    });
  }

  /** Pauses a running wave because the user drifted into a blocked context. */
  suspendWave(): Promise<void> {
    const epoch = this.beginLifecycle();
    return this.enqueue('suspend-wave', () => this.suspend(epoch, 'suspend-wave'));
  }

  /**
   * Brings a suspended wave back from the top of the curve. The backend's
   * generation history is stale after the pause, so the context is reset.
   */
  resumeSuspendedWave(): Promise<void> {
    const epoch = this.beginLifecycle();
    return this.enqueue('resume-suspended-wave', () => this.resumeSuspended(epoch, 'resume-suspended-wave'));
  }

  private async suspend(epoch: number, label: string): Promise<void> {
    if (this.superseded(epoch, label)) return;
    if (this.mode !== 'wave' || this.scheduler.currentState !== 'running') return;
    this.scheduler.pause();
    await this.client.pause();
    this.sink.pause();
    this.isStreaming = false;
    this.suspended = true;
    this.reminder.start();
    console.log('[SessionCoordinator] Wave suspended by focus policy');
    this.emitState();
  }

  private async resumeSuspended(epoch: number, label: string): Promise<void> {
    if (this.superseded(epoch, label)) return;
    if (!this.suspended || this.mode !== 'wave') return;
    const apiKey = this.requireCredential();
    if (!apiKey) return;

    this.steeringOverride = null;
    this.clearSuspension();
    this.sink.cancelFade();
    const reconnected = !this.client.isConnected;
    if (reconnected && !(await this.ensureConnected(apiKey, epoch, label))) return;

    this.scheduler.restart();
    const initial = this.scheduler.currentParameters;
    await this.client.setPrompts(this.wavePrompts(initial));
    await this.client.setMusicConfig(fullConfig(initial));
    await this.client.resetContext();
    if (reconnected) {
      this.sink.start();
    } else {
      this.sink.resume();
    }
    this.sink.fadeIn(WAVE_GOVERNANCE.FADE_IN_SECONDS);
    await this.client.play();
    this.isStreaming = true;
    console.log('[SessionCoordinator] Wave resumed after refocus');
    this.emitState();
  }

  // ─── Free play ──────────────────────────────────────────────────────

  startFreePlay(prompt?: string): Promise<void> {
    const epoch = this.beginLifecycle();
    return this.enqueue('start-free-play', async () => {
      if (this.superseded(epoch, 'start-free-play')) return;
      const apiKey = this.requireCredential();
      if (!apiKey) return;

      if (this.scheduler.currentState !== 'idle') {
        this.scheduler.cancel();
      }
      this.clearSuspension();
      this.steeringOverride = null;
      const text = prompt?.trim();
      if (text) {
        this.freePlayPrompt = text;
        this.routing.originalPrompt = text;
      }

      if (!(await this.ensureConnected(apiKey, epoch, 'start-free-play'))) return;

      this.mode = 'free_play';
      await this.client.setPrompts(this.freePlayPrompts());
      await this.client.setMusicConfig({ bpm: this.freePlayBpm });
      this.sink.start();
      await this.client.play();
      this.isStreaming = true;
      this.emitState();
    });
  }

  pauseFreePlay(): Promise<void> {
    const epoch = this.beginLifecycle();
    return this.enqueue('pause-free-play', async () => {
      if (this.superseded(epoch, 'pause-free-play')) return;
      if (this.mode !== 'free_play' || !this.isStreaming) return;
      await this.client.pause();
      this.sink.pause();
      this.isStreaming = false;
      this.emitState();
    });
  }

  stopFreePlay(): Promise<void> {
    const epoch = this.beginLifecycle();
    return this.enqueue('stop-free-play', async () => {
      if (this.superseded(epoch, 'stop-free-play')) return;
      if (this.mode !== 'free_play') return;
      this.steeringOverride = null;
      await this.stopMusic();
      this.mode = 'idle';
      this.emitState();
    });
  }

  /** Clamps to the free-play range; a large jump while playing also resets the context. */
  setFreePlayBpm(bpm: number): Promise<void> {
    return this.enqueue('set-free-play-bpm', async () => {
      const previous = this.freePlayBpm;
      this.freePlayBpm = clampFreePlayBpm(bpm);
      if (this.mode === 'free_play' && this.isStreaming && this.freePlayBpm !== previous) {
        await this.client.setMusicConfig({ bpm: this.freePlayBpm });
        if (Math.abs(this.freePlayBpm - previous) >= WAVE_GOVERNANCE.BPM_CHANGE_THRESHOLD) {
          await this.client.resetContext();
        }
      }
      this.emitState();
    });
  }

  // ─── Steering ───────────────────────────────────────────────────────

  /**
   * Applies a steering prompt to the live stream. Returns false when no
   * session is streaming, in which case nothing changes.
   */
  steerMusic(text: string): Promise<boolean> {
    return this.enqueue('steer-music', () => this.applySteering(text));
  }

  /**
   * Classifies free text and applies the result. Classification runs
   * outside the operation queue so ticks keep flowing while it waits; only
   * the newest request is applied.
   */
  async handleSteeringInput(text: string): Promise<void> {
    const trimmed = text.trim();
    if (!trimmed) return;
    if (!this.apiKey()) {
      this.markSetupRequired();
      return;
    }
    if (!this.classifier) {
      this.setSteeringStatus({ kind: 'error', message: 'Steering is not available' });
      return;
    }

    const request = ++this.steeringRequest;
    this.setSteeringStatus({ kind: 'classifying' });
    const lists = this.focus.currentLists;

    let intent: SteeringIntent;
    try {
      intent = await this.classifier.classify({
        text: trimmed,
        blockedDomains: lists.blockedDomains,
        blockedApps: lists.blockedApps,
      });
    } catch (err) {
      console.error('[SessionCoordinator] Steering classification failed:', describeError(err));
      if (request === this.steeringRequest) {
        this.setSteeringStatus({ kind: 'error', message: describeError(err) });
      }
      return;
    }

    if (request !== this.steeringRequest) return;
    await this.enqueue('steering-intent', () => this.applyIntent(intent));
  }

  // ─── Preferences and policies ───────────────────────────────────────

  applyPreferences(prefs: MusicPreferences): Promise<void> {
    return this.enqueue('apply-preferences', async () => {
      this.calmPrompt = calmPromptFor(prefs);
      this.intensePrompt = intensePromptFor(prefs);
      this.freePlayPrompt = defaultPromptFor(prefs);
      this.routing.originalPrompt = this.freePlayPrompt;
      if (this.store) {
        try {
          saveMusicPreferences(this.store, prefs);
        } catch (err) {
          console.error('[SessionCoordinator] Failed to persist music preferences:', err);
        }
      }
      await this.resendPrompts();
      this.emitState();
    });
  }

  setFocusGuardEnabled(enabled: boolean): Promise<void> {
    return this.enqueue('set-focus-guard', async () => {
      this.focus.setEnabled(enabled);
      if (!enabled && this.suspended) {
        // Nothing will ever report a refocus now; leave the wave paused.
        this.clearSuspension();
      }
      this.emitState();
    });
  }

  setRoutingEnabled(enabled: boolean): Promise<void> {
    return this.enqueue('set-routing', async () => {
      this.routing.setEnabled(enabled);
      await this.dropRoutedPromptIfIdle();
      this.emitState();
    });
  }

  /** Stored preference; while off, routing stays idle even when requested. */
  setAutoRoutingEnabled(enabled: boolean): Promise<void> {
    return this.enqueue('set-auto-routing', async () => {
      this.routing.setAutoRoutingEnabled(enabled);
      await this.dropRoutedPromptIfIdle();
      this.emitState();
    });
  }

  /** Stops every timer and closes the connection. */
  dispose(): void {
    this.beginLifecycle();
    this.focus.setEnabled(false);
    this.routing.setEnabled(false);
    this.scheduler.cancel();
    this.reminder.stop();
    this.statusReset.cancel();
    this.client.disconnect();
    this.isStreaming = false;
    this.mode = 'idle';
  }

  // ─── Engine notifications ───────────────────────────────────────────

  private wireEngines(): void {
    this.scheduler.on('parameters', (update) => {
      this.dispatch('wave-parameters', () => this.applyParameters(update));
    });
    this.scheduler.on('completed', () => {
      this.dispatch('wave-completed', () => this.completeWave());
    });
    this.scheduler.on('state', () => this.emitState());

    // Both checks run inside the queue: a violation and its refocus can
    // fire while an earlier operation is still in flight.
    this.focus.on('violation', () => {
      const epoch = this.epoch;
      this.dispatch('focus-violation', async () => {
        if (!this.focus.state.isSuspended) {
          console.log('[SessionCoordinator] Focus restored before the suspension ran; skipping');
          return;
        }
        await this.suspend(epoch, 'focus-violation');
      });
    });
    this.focus.on('refocused', () => {
      const epoch = this.epoch;
      this.dispatch('focus-refocused', () => this.resumeSuspended(epoch, 'focus-refocused'));
    });
    this.focus.on('state', () => this.emitState());

    this.routing.on('prompt_changed', (change) => {
      this.dispatch('routed-prompt', () => this.applyRoutedPrompt(change));
    });

    this.client.on('state', (state) => {
      if (state.status === 'error') {
        this.dispatch('connection-lost', () => this.handleConnectionLoss(state));
      }
      this.emitState();
    });
  }

  private async applyParameters(update: ParameterUpdate): Promise<void> {
    if (this.mode !== 'wave' || !this.isStreaming || !this.client.isConnected) return;
    const { parameters, bpmChanged } = update;
    await this.client.setPrompts(this.wavePrompts(parameters));
    await this.client.setMusicConfig({
      bpm: bpmChanged ? parameters.bpm : undefined,
      density: parameters.density,
      brightness: parameters.brightness,
    });
    if (bpmChanged) {
      await this.client.resetContext();
    }
    this.emitState();
  }

  private async completeWave(): Promise<void> {
    if (this.mode !== 'wave') return;
    this.steeringOverride = null;
    this.clearSuspension();
    await this.stopMusic();
    this.mode = 'idle';
    console.log('[SessionCoordinator] Wave finished');
    this.emitState();
  }

  private async applyRoutedPrompt(change: RoutedPromptChange): Promise<void> {
    this.routedPrompt = change.rule ? change.prompt : null;
    console.log(
      `[SessionCoordinator] Routed prompt ${change.rule ? `set by "${change.rule.label}"` : 'cleared'}`
    );
    await this.resendPrompts();
    this.emitState();
  }

  /** Stops playback and reflects the error. Reconnecting needs an explicit start or resume. */
  private async handleConnectionLoss(state: Extract<ConnectionState, { status: 'error' }>): Promise<void> {
    console.error(`[SessionCoordinator] Connection lost: ${state.message}`);
    if (this.mode === 'idle') return;
    this.sink.stop();
    this.scheduler.pause();
    this.reminder.stop();
    this.isStreaming = false;
    this.emitState();
  }

  private async applyIntent(intent: SteeringIntent): Promise<void> {
    switch (intent.kind) {
      case 'steer_music': {
        const applied = await this.applySteering(intent.prompt);
        this.setSteeringStatus(
          applied
            ? { kind: 'success', message: `Music: ${intent.prompt.trim()}` }
            : { kind: 'error', message: 'Start a session to steer the music' }
        );
        return;
      }
      case 'block': {
        const names = this.focus.block({ domain: intent.domain, appName: intent.appName });
        this.setSteeringStatus(
          names.length > 0
            ? { kind: 'success', message: `Blocked ${names.join(' & ')}` }
            : { kind: 'error', message: 'Nothing to block' }
        );
        return;
      }
      case 'unblock': {
        const names = this.focus.unblock({ domain: intent.domain, appName: intent.appName });
        this.setSteeringStatus(
          names.length > 0
            ? { kind: 'success', message: `Unblocked ${names.join(' & ')}` }
            : { kind: 'error', message: 'Nothing to unblock' }
        );
        return;
      }
    }
  }

  private async applySteering(text: string): Promise<boolean> {
    const prompt = text.trim();
    if (!prompt || !this.isStreaming || !this.client.isConnected) return false;
    this.steeringOverride = prompt;
    await this.resendPrompts();
    this.emitState();
    return true;
  }

  // ─── Helpers ────────────────────────────────────────────────────────

  /**
   * Serialize every state mutation through a single Promise chain. A failed
   * operation is logged and rethrown to its caller but never blocks the next.
   */
  private enqueue<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const opId = ++this.opCounter;
    const previous = this.opInProgress;
    const current = previous.then(() => {
      console.log(`[SessionCoordinator] Op #${opId} starting: ${label}`);
      return fn();
    }).then(
      (result) => {
        console.log(`[SessionCoordinator] Op #${opId} completed: ${label}`);
        return result;
      },
      (err: unknown) => {
        console.error(`[SessionCoordinator] Op #${opId} failed: ${label}`, err);
        throw err;
      }
    );
    this.opInProgress = current.then(() => {}, () => {});
    return current;
  }

  /** Queues an engine-driven operation that has no caller to report to. */
  private dispatch(label: string, fn: () => Promise<void>): void {
    this.enqueue(label, fn).catch((err: unknown) => this.logDropped(label, err));
  }

  private logDropped(label: string, err: unknown): void {
    console.warn(`[SessionCoordinator] ${label} did not complete: ${describeError(err)}`);
  }

  private beginLifecycle(): number {
    return ++this.epoch;
  }

  private superseded(epoch: number, label: string): boolean {
    if (epoch === this.epoch) return false;
    console.log(`[SessionCoordinator] ${label} superseded by a newer lifecycle operation`);
    return true;
  }

  /**
   * Connects when needed. Returns false when the connection failed or a
   * newer lifecycle operation arrived while it was being established; in
   * the latter case the fresh connection is discarded.
   */
  private async ensureConnected(apiKey: string, epoch: number, label: string): Promise<boolean> {
    if (this.client.isConnected) return true;
    const connected = await this.client.connect(apiKey);
    if (this.superseded(epoch, label)) {
      if (connected && !this.isStreaming) {
        this.client.disconnect();
      }
      return false;
    }
    if (!connected) {
      this.emitState();
      return false;
    }
    return true;
  }

  private requireCredential(): string | null {
    const apiKey = this.apiKey();
    if (!apiKey) {
      this.markSetupRequired();
      return null;
    }
    if (this.setupRequired) {
      this.setupRequired = false;
      this.emitState();
    }
    return apiKey;
  }

  private markSetupRequired(): void {
    console.warn('[SessionCoordinator] No API key configured; setup required');
    this.setupRequired = true;
    this.emit('setup_required');
    this.emitState();
  }

  private async stopMusic(): Promise<void> {
    if (this.client.isConnected) {
      await this.client.stop();
    }
    this.sink.stop();
    this.isStreaming = false;
    this.client.disconnect();
  }

  private async dropRoutedPromptIfIdle(): Promise<void> {
    if (this.routing.isEnabled || this.routedPrompt === null) return;
    this.routedPrompt = null;
    await this.resendPrompts();
  }

  private clearSuspension(): void {
    this.reminder.stop();
    this.suspended = false;
  }

  private async resendPrompts(): Promise<void> {
    if (!this.isStreaming || !this.client.isConnected) return;
    const prompts = this.currentPrompts();
    if (prompts.length === 0) return;
    await this.client.setPrompts(prompts);
  }

  private currentPrompts(): WeightedPrompt[] {
    switch (this.mode) {
      case 'wave':
        return this.wavePrompts(this.scheduler.currentParameters);
      case 'free_play':
        return this.freePlayPrompts();
      case 'idle':
        return [];
    }
  }

  private wavePrompts(parameters: WaveParameters): WeightedPrompt[] {
    const prompts = resolveWavePrompts({
      calmPrompt: this.calmPrompt,
      intensePrompt: this.intensePrompt,
      parameters,
      routedPrompt: this.routedPrompt,
      steeringOverride: this.steeringOverride,
    });
    console.log(`[SessionCoordinator] Wave prompts: ${describePrompts(prompts)}`);
    return prompts;
  }

  private freePlayPrompts(): WeightedPrompt[] {
    return resolveFreePlayPrompts({
      freePlayPrompt: this.freePlayPrompt,
      routedPrompt: this.routedPrompt,
      steeringOverride: this.steeringOverride,
    });
  }

  private setSteeringStatus(status: SteeringStatus): void {
    this.statusReset.cancel();
    this.steeringStatus = status;
    if (status.kind === 'success' || status.kind === 'error') {
      this.statusReset.schedule(() => {
        this.steeringStatus = { kind: 'idle' };
        this.emitState();
      });
    }
    this.emitState();
  }

  private emitState(): void {
    this.emit('state', this.snapshot());
  }
}

function fullConfig(parameters: WaveParameters): MusicConfigUpdate {
  return {
    bpm: parameters.bpm,
    density: parameters.density,
    brightness: parameters.brightness,
  };
}
