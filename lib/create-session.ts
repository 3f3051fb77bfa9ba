import { ActivityMonitor, type ForegroundProbe } from './activity-monitor';
import { PcmAudioSink, type AudioOutput } from './audio-sink';
import { loadRuntimeConfig, resolveApiKey, type RuntimeConfig } from './config';
import { GeminiIntentClassifier } from './intent-classifier';
import { JsonFileStore, type KeyValueStore } from './preferences-store';
import { ReminderPing, type ChimeOutput } from './reminder-ping';
import { SessionCoordinator } from './session-coordinator';
import { StreamingClient, type SocketFactory } from './streaming-client';

export interface SessionHost {
  output: AudioOutput;
  probe?: ForegroundProbe;
  chime?: ChimeOutput;
  browserApps?: readonly string[];
  selfAppName?: string;
  env?: NodeJS.ProcessEnv;
  /** Overrides the file store under the configured data directory. */
  store?: KeyValueStore;
  createSocket?: SocketFactory;
  fetch?: typeof fetch;
}

export interface Session {
  config: RuntimeConfig;
  store: KeyValueStore;
  monitor: ActivityMonitor;
  coordinator: SessionCoordinator;
}

/** Wires the default adapters around a coordinator from runtime configuration. */
export function createSession(host: SessionHost): Session {
  const config = loadRuntimeConfig(host.env);
  const store = host.store ?? new JsonFileStore(config.dataDir);
  const apiKey = () => resolveApiKey(config, store);

  const sink = new PcmAudioSink(host.output);
  const client = new StreamingClient({
    sink,
    baseUrl: config.streamingBaseUrl,
    apiVersion: config.streamingApiVersion,
    model: config.streamingModel,
    connectTimeoutMs: config.connectTimeoutMs,
    createSocket: host.createSocket,
  });
  const monitor = new ActivityMonitor({
    probe: host.probe,
    browserApps: host.browserApps,
  });
  const classifier = new GeminiIntentClassifier({
    apiKey,
    endpoint: config.intentEndpoint,
    timeoutMs: config.classifyTimeoutMs,
    fetch: host.fetch,
  });

  const coordinator = new SessionCoordinator({
    client,
    sink,
    signal: monitor,
    apiKey,
    store,
    classifier,
    reminder: new ReminderPing(host.chime),
    selfAppName: host.selfAppName,
  });

  return { config, store, monitor, coordinator };
}
