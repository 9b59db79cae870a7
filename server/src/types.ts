/**
 * Metadata for the track currently loaded in the external player
 */
export interface TrackInfo {
  trackId: string;
  title: string;
  artist: string;
}

/**
 * Immutable reading of external playback state.
 * `sampledAt` is server monotonic time in milliseconds (performance.now()).
 */
export type PlaybackSnapshot = Readonly<{
  trackId: string;
  positionSeconds: number;
  isPlaying: boolean;
  sampledAt: number;
  track: Readonly<TrackInfo>;
}>;

/** Nothing is loaded in the player. */
export const NOT_PLAYING = Object.freeze({ kind: "not-playing" as const });
export type NotPlaying = typeof NOT_PLAYING;

export type PlaybackReading = PlaybackSnapshot | NotPlaying;

export function isNotPlaying(reading: PlaybackReading): reading is NotPlaying {
  return reading === NOT_PLAYING;
}

/**
 * The external player. Implementations throw SourceUnavailableError when the
 * player cannot be reached; callers skip that cycle.
 */
export interface PositionSource {
  sample(): Promise<PlaybackReading>;
}

export function createSnapshot(
  track: TrackInfo,
  positionSeconds: number,
  isPlaying: boolean,
  sampledAt: number
): PlaybackSnapshot {
  return Object.freeze({
    trackId: track.trackId,
    positionSeconds: Math.max(0, positionSeconds),
    isPlaying,
    sampledAt,
    track: Object.freeze({ ...track }),
  });
}

/**
 * One line of time-synced lyrics. Sequences are sorted ascending by timeSeconds.
 */
export interface LyricLine {
  timestamp: string; // LRC tag, e.g. [00:16.45]
  timeSeconds: number;
  originalText: string;
  phonetics?: string;
  translations: Record<string, string>; // language code -> text
}

/** Raw timed line as returned by a lyric lookup, before enrichment. */
export interface TimedText {
  timestamp: string;
  timeSeconds: number;
  text: string;
}

/** Resolves null when no synced lyrics exist for the track. */
export interface LyricLookup {
  fetchLyrics(trackId: string, title: string, artist: string, signal?: AbortSignal): Promise<TimedText[] | null>;
}

export interface TranslationStats {
  languageCode: string;
  languageName: string;
  durationSeconds: number;
  translatedWordCount: number;
  fromCache: boolean;
}

/** A named model configuration for translation calls. */
export interface TranslationProfile {
  name: string;
  model: string;
  thinkingMode: "default" | "no_thinking";
}

export interface EngineOptions {
  profile: TranslationProfile;
  sourceLanguages: string[];
  signal?: AbortSignal;
}

/**
 * Translation/phonetics engine. Each method rejects when the model call fails
 * or returns output that does not line up with the input.
 */
export interface TranslationEngine {
  /** Returns one translated string per input line. */
  translateLines(lines: string[], targetLanguageName: string, options: EngineOptions): Promise<string[]>;
  translateText(text: string, targetLanguageName: string, options: EngineOptions): Promise<string>;
  /** Returns one IPA transcription per input line. */
  phonetics(lines: string[], options: EngineOptions): Promise<string[]>;
  detectLanguage(sample: string[], title: string, artist: string, options: EngineOptions): Promise<string[]>;
}

export interface Language {
  code: string;
  name: string;
  flag: string;
}

export interface Preferences {
  languages: string[];
  translationProfile: string;
}

/**
 * Spotify token information for the single listener
 */
export interface TokenInfo {
  accessToken: string;
  refreshToken: string;
  expiresAt: number; // timestamp in milliseconds
}
