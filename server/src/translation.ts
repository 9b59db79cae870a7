import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { generateObject, LanguageModel } from "ai";
import { z } from "zod";
import { ComputeFailedError } from "./errors";
import { EngineOptions, TranslationEngine, TranslationProfile } from "./types";

const TranslatedLinesSchema = z.object({
  translations: z.array(z.string()),
});

const TranslatedTextSchema = z.object({
  translation: z.string(),
});

const PhoneticsSchema = z.object({
  phonetics: z.array(z.string()),
});

const LanguagesSchema = z.object({
  languages: z.array(z.string()),
});

type ProviderOptions = Parameters<typeof generateObject>[0]["providerOptions"];

/**
 * Only flash models accept a zero thinking budget; other models keep their
 * default thinking behaviour.
 */
export function thinkingOptions(profile: TranslationProfile): ProviderOptions {
  if (profile.thinkingMode !== "no_thinking") {
    return undefined;
  }
  if (!profile.model.toLowerCase().includes("flash")) {
    console.warn(`[Translation] "No thinking" is not supported for ${profile.model}, using default thinking`);
    return undefined;
  }
  return { google: { thinkingConfig: { thinkingBudget: 0 } } };
}

function sourceLanguageHint(sourceLanguages: string[]): string {
  return sourceLanguages.length > 0 ? ` from ${sourceLanguages.join(", ")}` : "";
}

function expectLineCount(kind: string, received: string[], expected: number): string[] {
  if (received.length !== expected) {
    throw new ComputeFailedError(`Model returned ${received.length} ${kind} lines, but ${expected} were expected`);
  }
  return received;
}

/**
 * Translation, phonetics and language detection through a Gemini model
 */
export class GeminiTranslationEngine implements TranslationEngine {
  private readonly resolveModel: (modelId: string) => LanguageModel;

  constructor(apiKey?: string) {
    const google = createGoogleGenerativeAI(apiKey ? { apiKey } : {});
    this.resolveModel = (modelId) => google(modelId);
  }

  public async translateLines(lines: string[], targetLanguageName: string, options: EngineOptions): Promise<string[]> {
    const count = lines.length;
    const { object } = await generateObject({
      model: this.resolveModel(options.profile.model),
      schema: TranslatedLinesSchema,
      system:
        `You are a translation expert. Translate the user's text${sourceLanguageHint(options.sourceLanguages)} ` +
        `to ${targetLanguageName}. The text is song lyrics, one line per newline, exactly ${count} lines. ` +
        `Return a "translations" array of exactly ${count} strings in the same order. ` +
        "Do not merge, split or drop lines.",
      prompt: lines.join("\n"),
      temperature: 0.3,
      abortSignal: options.signal,
      providerOptions: thinkingOptions(options.profile),
    });

    return expectLineCount("translated", object.translations, count);
  }

  public async translateText(text: string, targetLanguageName: string, options: EngineOptions): Promise<string> {
    const { object } = await generateObject({
      model: this.resolveModel(options.profile.model),
      schema: TranslatedTextSchema,
      system: `You are a translation expert. Translate the user's text to ${targetLanguageName}. Return only the translation.`,
      prompt: text,
      temperature: 0.3,
      abortSignal: options.signal,
      providerOptions: thinkingOptions(options.profile),
    });
    return object.translation;
  }

  public async phonetics(lines: string[], options: EngineOptions): Promise<string[]> {
    const count = lines.length;
    const languageHint =
      options.sourceLanguages.length > 0 ? `The lyrics are in ${options.sourceLanguages.join(", ")}. ` : "";

    const { object } = await generateObject({
      model: this.resolveModel(options.profile.model),
      schema: PhoneticsSchema,
      system:
        "You are a linguist. Give the International Phonetic Alphabet transcription of each line of song lyrics. " +
        languageHint +
        `There are exactly ${count} lines; return a "phonetics" array of exactly ${count} strings, one per line. ` +
        "Use an empty string for instrumental lines or lines that cannot be transcribed.",
      prompt: lines.join("\n"),
      temperature: 0,
      abortSignal: options.signal,
      providerOptions: thinkingOptions(options.profile),
    });

    return expectLineCount("phonetic", object.phonetics, count);
  }

  public async detectLanguage(
    sample: string[],
    title: string,
    artist: string,
    options: EngineOptions
  ): Promise<string[]> {
    const { object } = await generateObject({
      model: this.resolveModel(options.profile.model),
      schema: LanguagesSchema,
      system:
        `Identify the primary language or languages of the song "${title}" by ${artist} from the lyric lines given. ` +
        'Return a "languages" array of language names in English, e.g. ["English", "Spanish"].',
      prompt: sample.join("\n"),
      temperature: 0,
      abortSignal: options.signal,
      providerOptions: thinkingOptions(options.profile),
    });
    return object.languages;
  }
}
