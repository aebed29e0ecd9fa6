import type { LanguageModel } from "ai";
import { requireEnv } from "../config";
import type { AppConfig } from "../config";
import { getModel } from "./providers";
import type { ProviderName } from "./providers";

const API_KEY_VARIABLES: Readonly<Record<ProviderName, string | null>> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
  gemini: "GOOGLE_GENERATIVE_AI_API_KEY",
  groq: "GROQ_API_KEY",
  ollama: null,
  lmstudio: null,
};

/**
 * Builds the translation model. Hosted providers need their API key in the
 * environment; local ones (ollama, lmstudio) do not.
 */
export function createLlmClient(
  translation: AppConfig["translation"],
  env: Readonly<Record<string, string | undefined>> = process.env,
): LanguageModel {
  const keyVariable = API_KEY_VARIABLES[translation.provider];
  if (keyVariable) {
    requireEnv(keyVariable, env);
  }
  return getModel(translation.provider, translation.model);
}
