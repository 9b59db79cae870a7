import languageData from "../data/languages.json";
import { Language, Preferences, TranslationProfile } from "./types";

export const SUPPORTED_LANGUAGES: ReadonlyMap<string, Language> = new Map(
  languageData.map((language) => [language.code, language])
);

export const TRANSLATION_PROFILES: Readonly<Record<string, TranslationProfile>> = {
  "gemini-2.5-flash_default": {
    name: "Gemini 2.5 Flash",
    model: "gemini-2.5-flash",
    thinkingMode: "default",
  },
  "gemini-2.5-flash_no_thinking": {
    name: "Gemini 2.5 Flash (No Thinking)",
    model: "gemini-2.5-flash",
    thinkingMode: "no_thinking",
  },
  "gemini-2.5-pro_default": {
    name: "Gemini 2.5 Pro",
    model: "gemini-2.5-pro",
    thinkingMode: "default",
  },
  "gemini-2.0-flash_default": {
    name: "Gemini 2.0 Flash",
    model: "gemini-2.0-flash",
    thinkingMode: "default",
  },
  "gemini-2.0-flash-lite_default": {
    name: "Gemini 2.0 Flash Lite",
    model: "gemini-2.0-flash-lite",
    thinkingMode: "default",
  },
};

export const DEFAULT_PROFILE_KEY = "gemini-2.5-flash_no_thinking";

/**
 * Split a comma separated or repeated query value into known language codes
 */
export function parseLanguageCodes(value: unknown): string[] {
  const raw = Array.isArray(value) ? value : [value];
  const codes = raw
    .filter((item): item is string => typeof item === "string")
    .flatMap((item) => item.split(","))
    .map((code) => code.trim().toLowerCase())
    .filter((code) => SUPPORTED_LANGUAGES.has(code));
  return Array.from(new Set(codes));
}

/**
 * In-memory preferences for the single listener this server serves
 */
export class PreferenceStore {
  private preferences: Preferences = {
    languages: [],
    translationProfile: DEFAULT_PROFILE_KEY,
  };

  public get(): Preferences {
    return { ...this.preferences, languages: [...this.preferences.languages] };
  }

  public setLanguages(codes: string[]): Preferences {
    this.preferences = {
      ...this.preferences,
      languages: codes.filter((code) => SUPPORTED_LANGUAGES.has(code)),
    };
    return this.get();
  }

  /** Unknown profile keys fall back to the default profile. */
  public setProfile(profileKey: string): Preferences {
    this.preferences = {
      ...this.preferences,
      translationProfile: profileKey in TRANSLATION_PROFILES ? profileKey : DEFAULT_PROFILE_KEY,
    };
    return this.get();
  }

  public getProfile(): { key: string; profile: TranslationProfile } {
    const key = this.preferences.translationProfile;
    return { key, profile: TRANSLATION_PROFILES[key] };
  }

  /**
   * Languages ordered with the saved selection first, as the language picker shows them
   */
  public sortedLanguages(): Language[] {
    const selected = new Set(this.preferences.languages);
    return Array.from(SUPPORTED_LANGUAGES.values()).sort(
      (a, b) => Number(selected.has(b.code)) - Number(selected.has(a.code))
    );
  }
}
