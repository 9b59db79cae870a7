import { performance } from "perf_hooks";
import { CacheStats, ComputeOptions, FetchCache, FetchCacheOptions, Result, cacheKey, songKeyPrefix } from "./fetchCache";
import { NotFoundError } from "./errors";
import { SUPPORTED_LANGUAGES } from "./preferences";
import {
  EngineOptions,
  LyricLine,
  LyricLookup,
  TimedText,
  TrackInfo,
  TranslationEngine,
  TranslationProfile,
  TranslationStats,
} from "./types";

export const TRANSLATION_PLACEHOLDER = "[translation unavailable]";
export const PHONETICS_PLACEHOLDER = "[phonetics unavailable]";

const LANGUAGE_SAMPLE_LINES = 10;

interface LanguageTranslation {
  lines: string[];
  title: string;
  durationSeconds: number;
  translatedWordCount: number;
}

export interface LyricsRequest {
  track: TrackInfo;
  languages?: string[];
  phonetics?: boolean;
  profileKey: string;
  profile: TranslationProfile;
}

export type LyricsResult =
  | {
      status: "ok";
      track: TrackInfo;
      lines: LyricLine[];
      sourceLanguages: string[];
      translatedTitles: Record<string, string>;
      stats: TranslationStats[];
      failedLanguages: string[];
    }
  | { status: "not_found"; track: TrackInfo };

export interface LyricsServiceOptions {
  lookup: LyricLookup;
  engine: TranslationEngine;
  cache?: Omit<FetchCacheOptions, "name">;
  computeTimeoutMs?: number;
}

function countWords(lines: string[]): number {
  return lines.reduce((total, line) => total + line.split(/\s+/).filter(Boolean).length, 0);
}

/**
 * Lyrics, language detection, phonetics and translations for a track, each
 * computed at most once per key. Translations are cached per language so a
 * language shared by two requested sets is only translated once.
 */
export class LyricsService {
  private readonly lookup: LyricLookup;
  private readonly engine: TranslationEngine;
  private readonly computeOptions: ComputeOptions;

  private readonly lyricsCache: FetchCache<TimedText[]>;
  private readonly languageCache: FetchCache<string[]>;
  private readonly phoneticsCache: FetchCache<string[]>;
  private readonly translationCache: FetchCache<LanguageTranslation>;

  constructor(options: LyricsServiceOptions) {
    this.lookup = options.lookup;
    this.engine = options.engine;
    this.computeOptions = { timeoutMs: options.computeTimeoutMs };

    const cacheOptions = options.cache ?? {};
    this.lyricsCache = new FetchCache({ ...cacheOptions, name: "LyricsCache" });
    this.languageCache = new FetchCache({ ...cacheOptions, name: "LanguageCache" });
    this.phoneticsCache = new FetchCache({ ...cacheOptions, name: "PhoneticsCache" });
    this.translationCache = new FetchCache({ ...cacheOptions, name: "TranslationCache" });
  }

  public async getLyrics(request: LyricsRequest): Promise<LyricsResult> {
    const { track } = request;
    const lyrics = await this.fetchLyrics(track);

    if (!lyrics.ok) {
      if (lyrics.error.kind === "NotFound") {
        return { status: "not_found", track };
      }
      throw lyrics.error;
    }

    const timed = lyrics.value;
    const texts = timed.map((line) => line.text);
    const sourceLanguages = await this.detectLanguage(track, texts, request.profile);
    const engineOptions: EngineOptions = { profile: request.profile, sourceLanguages };

    const languages = Array.from(new Set(request.languages ?? [])).sort();
    const [phonetics, translations] = await Promise.all([
      request.phonetics ? this.fetchPhonetics(track, texts, engineOptions) : Promise.resolve(null),
      Promise.all(languages.map((code) => this.fetchTranslation(track, code, texts, request.profileKey, engineOptions))),
    ]);

    const translatedTitles: Record<string, string> = {};
    const stats: TranslationStats[] = [];
    const failedLanguages: string[] = [];

    for (const { code, result, fromCache } of translations) {
      const language = SUPPORTED_LANGUAGES.get(code);
      if (!result.ok) {
        failedLanguages.push(code);
        continue;
      }
      translatedTitles[code] = result.value.title;
      stats.push({
        languageCode: code,
        languageName: language?.name ?? code,
        durationSeconds: result.value.durationSeconds,
        translatedWordCount: result.value.translatedWordCount,
        fromCache,
      });
    }

    const lines: LyricLine[] = timed.map((line, index) => {
      const lineTranslations: Record<string, string> = {};
      for (const { code, result } of translations) {
        lineTranslations[code] = result.ok ? result.value.lines[index] : TRANSLATION_PLACEHOLDER;
      }
      const merged: LyricLine = {
        timestamp: line.timestamp,
        timeSeconds: line.timeSeconds,
        originalText: line.text,
        translations: lineTranslations,
      };
      if (phonetics) {
        merged.phonetics = phonetics.ok ? phonetics.value[index] : PHONETICS_PLACEHOLDER;
      }
      return merged;
    });

    return { status: "ok", track, lines, sourceLanguages, translatedTitles, stats, failedLanguages };
  }

  private fetchLyrics(track: TrackInfo): Promise<Result<TimedText[]>> {
    return this.lyricsCache.getOrCompute(
      cacheKey(track, "lyrics"),
      async (signal) => {
        console.log(`[Lyrics] Fetching lyrics for "${track.title}" by ${track.artist}`);
        const lines = await this.lookup.fetchLyrics(track.trackId, track.title, track.artist, signal);
        if (!lines || lines.length === 0) {
          throw new NotFoundError(`No synced lyrics for "${track.title}" by ${track.artist}`);
        }
        return lines;
      },
      this.computeOptions
    );
  }

  /**
   * Detected source languages, or an empty list when detection failed
   */
  private async detectLanguage(track: TrackInfo, texts: string[], profile: TranslationProfile): Promise<string[]> {
    const result = await this.languageCache.getOrCompute(
      cacheKey(track, "language"),
      (signal) =>
        this.engine.detectLanguage(texts.slice(0, LANGUAGE_SAMPLE_LINES), track.title, track.artist, {
          profile,
          sourceLanguages: [],
          signal,
        }),
      this.computeOptions
    );
    if (!result.ok) {
      console.warn(`[Lyrics] Language detection failed for "${track.title}": ${result.error.message}`);
      return [];
    }
    return result.value;
  }

  private fetchPhonetics(track: TrackInfo, texts: string[], options: EngineOptions): Promise<Result<string[]>> {
    return this.phoneticsCache.getOrCompute(
      cacheKey(track, "phonetics"),
      (signal) => {
        console.log(`[Lyrics] Generating phonetics for "${track.title}"`);
        return this.engine.phonetics(texts, { ...options, signal });
      },
      this.computeOptions
    );
  }

  private async fetchTranslation(
    track: TrackInfo,
    code: string,
    texts: string[],
    profileKey: string,
    options: EngineOptions
  ): Promise<{ code: string; result: Result<LanguageTranslation>; fromCache: boolean }> {
    const key = cacheKey(track, "translation", `${code}@${profileKey}`);
    const fromCache = this.translationCache.peek(key)?.state === "ready";
    const languageName = SUPPORTED_LANGUAGES.get(code)?.name ?? code;

    const result = await this.translationCache.getOrCompute(
      key,
      async (signal) => {
        console.log(`[Lyrics] Translating "${track.title}" to ${languageName}`);
        const started = performance.now();
        const engineOptions = { ...options, signal };
        const [lines, title] = await Promise.all([
          this.engine.translateLines(texts, languageName, engineOptions),
          this.engine.translateText(track.title, languageName, engineOptions).catch((error: unknown) => {
            console.warn(`[Lyrics] Title translation to ${languageName} failed, keeping original:`, error);
            return track.title;
          }),
        ]);
        return {
          lines,
          title,
          durationSeconds: Math.round((performance.now() - started) / 10) / 100,
          translatedWordCount: countWords(lines),
        };
      },
      this.computeOptions
    );

    return { code, result, fromCache };
  }

  /**
   * Drop one cache entry by its full key, in whichever cache holds it
   */
  public invalidate(key: string): boolean {
    const removed = [this.lyricsCache, this.languageCache, this.phoneticsCache, this.translationCache].map((cache) =>
      cache.invalidate(key)
    );
    return removed.some(Boolean);
  }

  /**
   * Drop every cached artifact of one song
   */
  public invalidateSong(song: { title: string; artist: string }): number {
    const prefix = songKeyPrefix(song);
    return [this.lyricsCache, this.languageCache, this.phoneticsCache, this.translationCache].reduce(
      (total, cache) => total + cache.invalidatePrefix(prefix),
      0
    );
  }

  public stats(): Record<string, CacheStats> {
    return {
      lyrics: this.lyricsCache.stats(),
      language: this.languageCache.stats(),
      phonetics: this.phoneticsCache.stats(),
      translation: this.translationCache.stats(),
    };
  }
}
