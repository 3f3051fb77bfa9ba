import { z } from 'zod';
import { loadRecord, STORE_KEYS, type KeyValueStore } from './preferences-store';

export const AVAILABLE_GENRES = [
  'Ambient', 'Techno', 'Lo-fi', 'Classical',
  'Jazz', 'Indie', 'Electronic', 'Hip-Hop',
  'Rock', 'R&B', 'Acoustic', 'Cinematic',
] as const;

export const AVAILABLE_MOODS = [
  'Chill & Spacey',
  'Warm & Melodic',
  'Dark & Driving',
  'Bright & Uplifting',
] as const;

export type Mood = (typeof AVAILABLE_MOODS)[number];

export interface MusicPreferences {
  selectedGenres: string[];
  selectedMood: string;
}

export const DEFAULT_MUSIC_PREFERENCES: Readonly<MusicPreferences> = Object.freeze({
  selectedGenres: ['Electronic'],
  selectedMood: 'Chill & Spacey',
});

interface MoodVocabulary {
  calm: string;
  intense: string;
  /** Short mood phrase used in the free-play prompt. */
  word: string;
}

const MOOD_VOCABULARY: Record<Mood, MoodVocabulary> = {
  'Chill & Spacey': {
    calm: 'ambient ethereal spacey floating dreamy',
    intense: 'deep immersive expansive layered swirling',
    word: 'chill spacey',
  },
  'Warm & Melodic': {
    calm: 'warm soft melodic gentle soothing',
    intense: 'energetic rich lush harmonic soaring',
    word: 'warm melodic',
  },
  'Dark & Driving': {
    calm: 'dark moody atmospheric brooding minimal',
    intense: 'aggressive driving intense pounding heavy',
    word: 'dark driving',
  },
  'Bright & Uplifting': {
    calm: 'gentle light airy peaceful calm',
    intense: 'energetic euphoric uplifting powerful bright',
    word: 'bright uplifting',
  },
};

const FALLBACK_VOCABULARY: MoodVocabulary = {
  calm: 'ambient chill',
  intense: 'energetic driving',
  word: 'chill',
};

function isMood(value: string): value is Mood {
  return AVAILABLE_MOODS.some((mood) => mood === value);
}

function vocabularyFor(mood: string): MoodVocabulary {
  return isMood(mood) ? MOOD_VOCABULARY[mood] : FALLBACK_VOCABULARY;
}

/** Prompt paired with `calmWeight` in a wave. */
export function calmPromptFor(prefs: MusicPreferences): string {
  return `${vocabularyFor(prefs.selectedMood).calm} ${prefs.selectedGenres.join(' ')}`;
}

/** Prompt paired with `intenseWeight` in a wave. */
export function intensePromptFor(prefs: MusicPreferences): string {
  return `${vocabularyFor(prefs.selectedMood).intense} ${prefs.selectedGenres.join(' ')}`;
}

/** Single prompt used by free-play. */
export function defaultPromptFor(prefs: MusicPreferences): string {
  const genre = prefs.selectedGenres[0] ?? 'electronic';
  return `${vocabularyFor(prefs.selectedMood).word} ${genre.toLowerCase()} with deep bass`;
}

const storedPreferencesSchema = z.object({
  selectedGenres: z.array(z.string()),
  selectedMood: z.string(),
});

export function loadMusicPreferences(store: KeyValueStore): MusicPreferences | undefined {
  return loadRecord(store, STORE_KEYS.MUSIC_PREFERENCES, storedPreferencesSchema);
}

export function saveMusicPreferences(store: KeyValueStore, prefs: MusicPreferences): void {
  store.save(STORE_KEYS.MUSIC_PREFERENCES, {
    selectedGenres: [...prefs.selectedGenres],
    selectedMood: prefs.selectedMood,
  });
}
