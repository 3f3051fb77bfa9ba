import * as path from 'path';
import { z } from 'zod';
import { loadRecord, STORE_KEYS, type KeyValueStore } from './preferences-store';

export const DEFAULT_STREAMING_BASE_URL =
  'wss://generativelanguage.googleapis.com/ws/google.ai.generativelanguage';
export const DEFAULT_STREAMING_API_VERSION = 'v1alpha';
export const DEFAULT_STREAMING_MODEL = 'models/lyria-realtime-exp';
export const DEFAULT_INTENT_ENDPOINT =
  'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.5-flash:generateContent';

export interface RuntimeConfig {
  /** Credential from the environment; empty when unset. */
  apiKey: string;
  streamingBaseUrl: string;
  streamingApiVersion: string;
  streamingModel: string;
  intentEndpoint: string;
  dataDir: string;
  connectTimeoutMs: number;
  classifyTimeoutMs: number;
}

export function getPositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(String(raw ?? ''), 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function getString(raw: string | undefined, fallback: string): string {
  const trimmed = (raw ?? '').trim();
  return trimmed || fallback;
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return {
    apiKey: (env.GEMINI_API_KEY ?? '').trim(),
    streamingBaseUrl: getString(env.LYRIA_WS_URL, DEFAULT_STREAMING_BASE_URL),
    streamingApiVersion: getString(env.LYRIA_API_VERSION, DEFAULT_STREAMING_API_VERSION),
    streamingModel: getString(env.LYRIA_MODEL, DEFAULT_STREAMING_MODEL),
    intentEndpoint: getString(env.GEMINI_INTENT_ENDPOINT, DEFAULT_INTENT_ENDPOINT),
    dataDir: getString(env.WAVES_DATA_DIR, path.join(process.cwd(), '.waves')),
    connectTimeoutMs: getPositiveInt(env.WAVES_CONNECT_TIMEOUT_MS, 10_000),
    classifyTimeoutMs: getPositiveInt(env.WAVES_CLASSIFY_TIMEOUT_MS, 15_000),
  };
}

/** Environment credential first, then the stored one. Empty string means missing. */
export function resolveApiKey(config: Pick<RuntimeConfig, 'apiKey'>, store?: KeyValueStore): string {
  if (config.apiKey) return config.apiKey;
  if (!store) return '';
  return (loadRecord(store, STORE_KEYS.API_KEY, z.string()) ?? '').trim();
}

export function buildStreamingUrl(
  config: Pick<RuntimeConfig, 'streamingBaseUrl' | 'streamingApiVersion'>,
  apiKey: string
): string {
  return `${config.streamingBaseUrl}.${config.streamingApiVersion}.GenerativeService.BidiGenerateMusic?key=${encodeURIComponent(apiKey)}`;
}
