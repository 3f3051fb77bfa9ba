export * from './types';
export { WAVE_GOVERNANCE } from './wave-governance-constants';
export { PeriodicTask, DelayedTask } from './task-timers';
export {
  smoothstep,
  easeOut,
  lerp,
  intensityAt,
  deriveParameters,
  clampFreePlayBpm,
} from './intensity-curve';
export { WaveScheduler } from './wave-scheduler';
export {
  normalizeDomain,
  sameAppName,
  matchesAppName,
  hostMatchesDomain,
  matchesDomain,
  extractHost,
} from './context-matching';
export {
  ActivityMonitor,
  DEFAULT_BROWSER_APPS,
  type ActivityMonitorOptions,
  type ForegroundProbe,
} from './activity-monitor';
export {
  FocusPolicyEngine,
  DEFAULT_FOCUS_LISTS,
  MONITORING_APP_NAME,
  type FocusPolicyOptions,
} from './focus-policy';
export {
  RoutingPolicyEngine,
  DEFAULT_ROUTING_RULES,
  findMatchingRule,
  ruleMatches,
  type RoutingPolicyOptions,
  type RuleDraft,
} from './routing-policy';
export {
  resolvePrompts,
  resolveWavePrompts,
  resolveFreePlayPrompts,
  describePrompts,
  type PromptSources,
  type WavePromptSources,
  type FreePlayPromptSources,
} from './steering-resolver';
export {
  StreamingClient,
  createWebSocket,
  type SocketFactory,
  type StreamingClientOptions,
  type StreamingSocket,
} from './streaming-client';
export {
  PcmAudioSink,
  decodePcm16,
  SINK_CHANNELS,
  SINK_SAMPLE_RATE,
  type AudioOutput,
  type AudioSink,
  type PcmFrame,
  type SinkState,
} from './audio-sink';
export { ReminderPing, TerminalBell, type ChimeOutput } from './reminder-ping';
export {
  GeminiIntentClassifier,
  buildClassifierPrompt,
  buildClassifierRequestBody,
  parseIntentResponse,
  type GeminiIntentClassifierOptions,
} from './intent-classifier';
export {
  JsonFileStore,
  MemoryStore,
  STORE_KEYS,
  loadRecord,
  type KeyValueStore,
} from './preferences-store';
export {
  AVAILABLE_GENRES,
  AVAILABLE_MOODS,
  DEFAULT_MUSIC_PREFERENCES,
  calmPromptFor,
  intensePromptFor,
  defaultPromptFor,
  loadMusicPreferences,
  saveMusicPreferences,
  type MusicPreferences,
} from './music-preferences';
export {
  loadRuntimeConfig,
  resolveApiKey,
  buildStreamingUrl,
  getPositiveInt,
  DEFAULT_INTENT_ENDPOINT,
  DEFAULT_STREAMING_API_VERSION,
  DEFAULT_STREAMING_BASE_URL,
  DEFAULT_STREAMING_MODEL,
  type RuntimeConfig,
} from './config';
export { SessionError, describeError, isSessionError, type SessionErrorCode } from './session-errors';
export { SessionCoordinator, type SessionCoordinatorOptions } from './session-coordinator';
export { createSession, type Session, type SessionHost } from './create-session';
