import { describe, it, expect } from 'vitest';
import * as path from 'path';
import {
  buildStreamingUrl,
  DEFAULT_INTENT_ENDPOINT,
  DEFAULT_STREAMING_BASE_URL,
  getPositiveInt,
  loadRuntimeConfig,
  resolveApiKey,
} from '../config';
import { MemoryStore, STORE_KEYS } from '../preferences-store';

describe('loadRuntimeConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadRuntimeConfig({})).toEqual({
      apiKey: '',
      streamingBaseUrl: DEFAULT_STREAMING_BASE_URL,
      streamingApiVersion: 'v1alpha',
      streamingModel: 'models/lyria-realtime-exp',
      intentEndpoint: DEFAULT_INTENT_ENDPOINT,
      dataDir: path.join(process.cwd(), '.waves'),
      connectTimeoutMs: 10_000,
      classifyTimeoutMs: 15_000,
    });
  });

  it('reads overrides and ignores blank or invalid values', () => {
    const config = loadRuntimeConfig({
      GEMINI_API_KEY: ' test-secret ',
      LYRIA_WS_URL: 'ws://localhost:9000/music',
      LYRIA_MODEL: '   ',
      WAVES_DATA_DIR: '/tmp/waves',
      WAVES_CONNECT_TIMEOUT_MS: '2500',
      WAVES_CLASSIFY_TIMEOUT_MS: '-1',
    });

    expect(config).toMatchObject({
      apiKey: 'test-secret',
      streamingBaseUrl: 'ws://localhost:9000/music',
      streamingModel: 'models/lyria-realtime-exp',
      dataDir: '/tmp/waves',
      connectTimeoutMs: 2_500,
      classifyTimeoutMs: 15_000,
    });
  });
});

describe('getPositiveInt', () => {
  it('parses positive integers and falls back otherwise', () => {
    expect(getPositiveInt('42', 5)).toBe(42);
    expect(getPositiveInt('7.9', 5)).toBe(7);
    expect(getPositiveInt('0', 5)).toBe(5);
    expect(getPositiveInt('abc', 5)).toBe(5);
    expect(getPositiveInt(undefined, 5)).toBe(5);
  });
});

describe('resolveApiKey', () => {
  it('prefers the environment credential', () => {
    const store = new MemoryStore();
    store.save(STORE_KEYS.API_KEY, 'stored-secret');
    expect(resolveApiKey({ apiKey: 'test-secret' }, store)).toBe('test-secret');
  });

  it('falls back to the stored credential', () => {
    const store = new MemoryStore();
    store.save(STORE_KEYS.API_KEY, ' stored-secret ');
    expect(resolveApiKey({ apiKey: '' }, store)).toBe('stored-secret');
  });

  it('returns an empty string when nothing is configured', () => {
    expect(resolveApiKey({ apiKey: '' })).toBe('');
    expect(resolveApiKey({ apiKey: '' }, new MemoryStore())).toBe('');
  });
});

describe('buildStreamingUrl', () => {
  it('appends the service path and the escaped key', () => {
    expect(
      buildStreamingUrl({ streamingBaseUrl: 'ws://localhost:9000/music', streamingApiVersion: 'v2' }, 'a b&c')
    ).toBe('ws://localhost:9000/music.v2.GenerativeService.BidiGenerateMusic?key=a%20b%26c');
  });
});
