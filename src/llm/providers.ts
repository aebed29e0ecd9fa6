import { anthropic } from "@ai-sdk/anthropic";
import { openai } from "@ai-sdk/openai";
import { google } from "@ai-sdk/google";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { createOllama } from "ollama-ai-provider-v2";
import type { LanguageModel } from "ai";
import type { AppConfig } from "../config";

const ollama = createOllama({
  baseURL: process.env["OLLAMA_BASE_URL"] ?? "http://localhost:11434",
});

const lmstudio = createOpenAICompatible({
  name: "lmstudio",
  baseURL: process.env["LMSTUDIO_BASE_URL"] ?? "http://localhost:1234/v1",
});

const groq = createOpenAICompatible({
  name: "groq",
  baseURL: process.env["GROQ_BASE_URL"] ?? "https://api.groq.com/openai/v1",
  apiKey: process.env["GROQ_API_KEY"],
});

export type ProviderName = AppConfig["translation"]["provider"];

export function getModel(provider: ProviderName, modelId: string): LanguageModel {
  switch (provider) {
    case "anthropic":
      return anthropic(modelId);
    case "openai":
      return openai(modelId);
    case "gemini":
      return google(modelId);
    case "ollama":
      return ollama(modelId);
    case "lmstudio":
      return lmstudio(modelId);
    case "groq":
      return groq(modelId);
    default: {
      const _exhaustive: never = provider;
      throw new Error(`unknown provider: ${_exhaustive}`);
    }
  }
}
