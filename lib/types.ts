// ─── Wave Session ───────────────────────────────────────────────────

export type WaveState = 'idle' | 'running' | 'paused' | 'completed';

export interface WaveParameters {
  bpm: number;
  density: number;
  brightness: number;
  calmWeight: number;
  intenseWeight: number;
}

export interface ParameterUpdate {
  parameters: WaveParameters;
  /** True when the tempo moved far enough from the last sent BPM to need a context reset. */
  bpmChanged: boolean;
  elapsedTime: number;
}

export interface WaveSnapshot {
  state: WaveState;
  duration: number;
  elapsedTime: number;
  remainingTime: number;
  progress: number;
  intensity: number;
  parameters: WaveParameters;
}

// ─── Observed Context ───────────────────────────────────────────────

export interface FocusContext {
  appName: string;
  /** Lowercased host of the active browser tab, when the frontmost app is a browser. */
  activeHost: string | null;
}

export type ContextListener = (context: FocusContext, previous: FocusContext | null) => void;

/**
 * Source of the user's current foreground activity.
 * `subscribe` returns an unsubscribe function.
 */
export interface ContextSignal {
  current(): FocusContext;
  subscribe(listener: ContextListener): () => void;
}

// ─── Focus Policy ───────────────────────────────────────────────────

export type FocusGuardMode = 'blocklist' | 'allowlist';

export interface FocusLists {
  blockedApps: string[];
  blockedDomains: string[];
  allowedApps: string[];
  allowedDomains: string[];
}

export interface FocusPolicyState {
  enabled: boolean;
  mode: FocusGuardMode;
  isViolating: boolean;
  violationSeconds: number;
  isSuspended: boolean;
}

export interface FocusTarget {
  domain?: string;
  appName?: string;
}

// ─── Routing Policy ─────────────────────────────────────────────────

export interface AppMusicRule {
  id: string;
  label: string;
  appNames: readonly string[];
  domains: readonly string[];
  prompt: string;
}

export interface RoutingState {
  enabled: boolean;
  activeRule: AppMusicRule | null;
  /** `undefined` when nothing is pending; `null` when "no match" is pending. */
  pendingRule: AppMusicRule | null | undefined;
}

export interface RoutedPromptChange {
  prompt: string;
  /** The committed rule, or null when the original prompt was restored. */
  rule: AppMusicRule | null;
}

// ─── Streaming ──────────────────────────────────────────────────────

export interface WeightedPrompt {
  text: string;
  weight: number;
}

export type ConnectionState =
  | { status: 'disconnected' }
  | { status: 'connecting' }
  | { status: 'connected' }
  | { status: 'error'; message: string };

export interface MusicConfigUpdate {
  bpm?: number;
  density?: number;
  brightness?: number;
  temperature?: number;
}

export type PlaybackControl = 'PLAY' | 'PAUSE' | 'STOP' | 'RESET_CONTEXT';

// ─── Steering ───────────────────────────────────────────────────────

export type SteeringIntent =
  | { kind: 'steer_music'; prompt: string }
  | { kind: 'block'; domain: string; appName: string }
  | { kind: 'unblock'; domain: string; appName: string };

export interface SteeringClassificationRequest {
  text: string;
  blockedDomains: string[];
  blockedApps: string[];
}

export interface SteeringIntentClassifier {
  classify(request: SteeringClassificationRequest): Promise<SteeringIntent>;
}

export type SteeringStatus =
  | { kind: 'idle' }
  | { kind: 'classifying' }
  | { kind: 'success'; message: string }
  | { kind: 'error'; message: string };

// ─── Session ────────────────────────────────────────────────────────

export type SessionMode = 'idle' | 'free_play' | 'wave';

export interface SessionSnapshot {
  mode: SessionMode;
  isStreaming: boolean;
  /** Paused by the focus policy; cleared on refocus, resume or cancel. */
  suspended: boolean;
  setupRequired: boolean;
  connection: ConnectionState;
  wave: WaveSnapshot;
  steeringOverride: string | null;
  routedPrompt: string | null;
  freePlayPrompt: string;
  freePlayBpm: number;
  steeringStatus: SteeringStatus;
  focus: FocusPolicyState;
}
