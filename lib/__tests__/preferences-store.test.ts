import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { JsonFileStore, loadRecord, MemoryStore, STORE_KEYS } from '../preferences-store';

describe('MemoryStore', () => {
  it('returns undefined for a missing record', () => {
    expect(new MemoryStore().load('anything')).toBeUndefined();
  });

  it('stores a copy of the value', () => {
    const store = new MemoryStore();
    const value = { apps: ['Slack'] };
    store.save('focus', value);
    value.apps.push('Discord');

    expect(store.load('focus')).toEqual({ apps: ['Slack'] });
  });
});

describe('JsonFileStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'waves-store-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes one pretty-printed file per key', () => {
    const store = new JsonFileStore(path.join(dir, 'nested'));
    store.save(STORE_KEYS.AUTO_ROUTING, false);
    store.save(STORE_KEYS.MUSIC_PREFERENCES, { selectedGenres: ['Jazz'], selectedMood: 'Warm & Melodic' });

    expect(fs.readFileSync(path.join(dir, 'nested', 'appMusicAutoRouting.json'), 'utf-8')).toBe('false');
    expect(store.load(STORE_KEYS.MUSIC_PREFERENCES)).toEqual({ selectedGenres: ['Jazz'], selectedMood: 'Warm & Melodic' });
    expect(fs.readdirSync(path.join(dir, 'nested')).sort()).toEqual(['appMusicAutoRouting.json', 'musicPreferences.json']);
  });

  it('returns undefined for a missing file', () => {
    expect(new JsonFileStore(dir).load('focusGuardConfig')).toBeUndefined();
  });

  it('reads a record with a byte order mark', () => {
    fs.writeFileSync(path.join(dir, 'geminiAPIKey.json'), '\uFEFF"test-secret"', 'utf-8');
    expect(new JsonFileStore(dir).load('geminiAPIKey')).toBe('test-secret');
  });

  it('logs and ignores a corrupt record', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    fs.writeFileSync(path.join(dir, 'appMusicRules.json'), '{ not json', 'utf-8');

    expect(new JsonFileStore(dir).load('appMusicRules')).toBeUndefined();
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('rejects keys that would escape the directory', () => {
    const store = new JsonFileStore(dir);
    expect(() => store.save('../outside', 1)).toThrow('Invalid store key: "../outside"');
    expect(() => store.load('a/b')).toThrow('Invalid store key: "a/b"');
  });
});

describe('loadRecord', () => {
  it('returns the validated record', () => {
    const store = new MemoryStore();
    store.save('count', 3);
    expect(loadRecord(store, 'count', z.number())).toBe(3);
  });

  it('returns undefined for a missing record without warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(loadRecord(new MemoryStore(), 'count', z.number())).toBeUndefined();
    expect(warn).not.toHaveBeenCalled();
  });

  it('warns about and ignores a record of the wrong shape', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const store = new MemoryStore();
    store.save(STORE_KEYS.API_KEY, 5);

    expect(loadRecord(store, STORE_KEYS.API_KEY, z.string())).toBeUndefined();
    expect(warn).toHaveBeenCalledWith(
      '[PreferencesStore] Ignoring invalid geminiAPIKey record: Expected string, received number'
    );
  });
});
