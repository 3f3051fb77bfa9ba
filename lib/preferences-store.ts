import * as fs from 'fs';
import * as path from 'path';
import type { z } from 'zod';

/**
 * Load/save of serialized records keyed by logical name.
 * A missing record is a normal state: `load` returns undefined.
 */
export interface KeyValueStore {
  load(key: string): unknown;
  save(key: string, value: unknown): void;
}

export const STORE_KEYS = {
  FOCUS_GUARD: 'focusGuardConfig',
  ROUTING_RULES: 'appMusicRules',
  AUTO_ROUTING: 'appMusicAutoRouting',
  MUSIC_PREFERENCES: 'musicPreferences',
  API_KEY: 'geminiAPIKey',
} as const;

const KEY_PATTERN = /^[A-Za-z0-9_.-]+$/;

function assertValidKey(key: string): void {
  if (!KEY_PATTERN.test(key)) {
    throw new Error(`Invalid store key: ${JSON.stringify(key)}`);
  }
}

export class MemoryStore implements KeyValueStore {
  private records = new Map<string, string>();

  load(key: string): unknown {
    const raw = this.records.get(key);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  save(key: string, value: unknown): void {
    this.records.set(key, JSON.stringify(value));
  }
}

/**
 * One `<key>.json` file per record under `dir`. Unreadable or corrupt
 * records are logged and reported as absent.
 */
export class JsonFileStore implements KeyValueStore {
  constructor(private readonly dir: string) {}

  load(key: string): unknown {
    assertValidKey(key);
    const filePath = this.pathFor(key);
    if (!fs.existsSync(filePath)) {
      return undefined;
    }
    try {
      const raw = fs.readFileSync(filePath, 'utf-8');
      const normalized = raw.startsWith('\uFEFF') ? raw.slice(1) : raw;
      return JSON.parse(normalized);
    } catch (err) {
      console.error(`[PreferencesStore] Failed to read ${key}:`, err);
      return undefined;
    }
  }

  save(key: string, value: unknown): void {
    assertValidKey(key);
    fs.mkdirSync(this.dir, { recursive: true });
    const filePath = this.pathFor(key);
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(value, null, 2), 'utf-8');
    fs.renameSync(tmpPath, filePath);
  }

  private pathFor(key: string): string {
    return path.join(this.dir, `${key}.json`);
  }
}

/**
 * Loads a record and validates it against `schema`. Absent or invalid
 * records yield undefined so callers fall back to their defaults.
 */
export function loadRecord<T>(
  store: KeyValueStore,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T | undefined {
  const raw = store.load(key);
  if (raw === undefined) return undefined;
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[PreferencesStore] Ignoring invalid ${key} record: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    return undefined;
  }
  return parsed.data;
}
