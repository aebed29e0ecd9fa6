// pattern: Imperative Shell
import { generateText } from "ai";
import type { LanguageModel } from "ai";
import type { Logger } from "pino";
import { timeoutSignal } from "../shared/abort";

export type Translator = (text: string, contextHint: string) => Promise<string>;

export type GenerateRequest = {
  readonly model: LanguageModel;
  readonly system: string;
  readonly prompt: string;
  readonly abortSignal: AbortSignal;
};

export type GenerateFn = (request: GenerateRequest) => Promise<{ readonly text: string }>;

const defaultGenerate: GenerateFn = (request) => generateText({ ...request });

export type TranslationOptions = {
  readonly targetLanguage: string;
  readonly timeoutMs: number;
  readonly maxInputLength: number;
  /** Aborts a translation in flight on shutdown. */
  readonly signal?: AbortSignal;
};

const MIN_TRANSLATABLE_LENGTH = 10;
const ARABIC_RATIO_THRESHOLD = 0.7;
const CRYPTO_HINT_WORDS = ["bitcoin", "crypto", "ethereum"];

/**
 * Share of letters in the Arabic block. Text with no letters scores 0.
 */
export function arabicRatio(text: string): number {
  let letters = 0;
  let arabic = 0;
  for (const char of text) {
    if (!/\p{L}/u.test(char)) continue;
    letters++;
    if (/[\u0600-\u06FF]/.test(char)) arabic++;
  }
  return letters === 0 ? 0 : arabic / letters;
}

export function contextHint(title: string, summary: string | null): string {
  const content = `${title} ${summary ?? ""}`.toLowerCase();
  return CRYPTO_HINT_WORDS.some((word) => content.includes(word))
    ? "cryptocurrency news"
    : "financial news";
}

export function createLlmTranslator(
  model: LanguageModel,
  options: TranslationOptions,
  generate: GenerateFn = defaultGenerate,
): Translator {
  const system =
    `You are a professional translator for financial and cryptocurrency news. ` +
    `Translate the user's text into ${options.targetLanguage}, keeping market ` +
    `terminology accurate. Reply with the translation only.`;

  return async (text, hint) => {
    const { text: translated } = await generate({
      model,
      system,
      prompt: `Translate this ${hint}:\n\n${text}`,
      abortSignal: timeoutSignal(options.timeoutMs, options.signal),
    });
    return translated.trim();
  };
}

/**
 * Never throws: any failure, timeout or empty reply yields the original
 * text. Short text and text already in Arabic script skip the call.
 */
export async function translateWithFallback(
  translator: Translator,
  text: string,
  hint: string,
  options: TranslationOptions,
  logger: Logger,
): Promise<string> {
  const trimmed = text.trim();
  if (trimmed.length < MIN_TRANSLATABLE_LENGTH) return text;
  if (
    options.targetLanguage.toLowerCase() === "arabic" &&
    arabicRatio(trimmed) > ARABIC_RATIO_THRESHOLD
  ) {
    return text;
  }

  const input =
    trimmed.length > options.maxInputLength
      ? `${trimmed.slice(0, options.maxInputLength)}...`
      : trimmed;

  try {
    const translated = await translator(input, hint);
    if (translated.length === 0) {
      logger.warn({ hint }, "translation returned empty text, using original");
      return text;
    }
    return translated;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ error: message, hint }, "translation failed, using original");
    return text;
  }
}
