import { anthropic } from "@ai-sdk/anthropic";
import { openai } from "@ai-sdk/openai";
import { google } from "@ai-sdk/google";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { createOllama } from "ollama-ai-provider-v2";
import type { LanguageModel } from "ai";
import type { LlmProvider } from "../config";

/**
 * Resolves `classifier.provider` / `classifier.model` from the config into the
 * model the LLM classifier labels articles with.
 *
 * Hosted providers read their API keys from the environment (`ANTHROPIC_API_KEY`,
 * `OPENAI_API_KEY`, `GOOGLE_GENERATIVE_AI_API_KEY`). The local ones are built on
 * demand so that `OLLAMA_BASE_URL` and `LMSTUDIO_BASE_URL` are read when the
 * classifier is created, not at import.
 */
export function getModel(provider: LlmProvider, modelId: string): LanguageModel {
  switch (provider) {
    case "anthropic":
      return anthropic(modelId);
    case "openai":
      return openai(modelId);
    case "gemini":
      return google(modelId);
    case "ollama":
      return createOllama({
        baseURL: process.env["OLLAMA_BASE_URL"] ?? "http://localhost:11434/api",
      })(modelId);
    case "lmstudio":
      return createOpenAICompatible({
        name: "lmstudio",
        baseURL: process.env["LMSTUDIO_BASE_URL"] ?? "http://localhost:1234/v1",
      })(modelId);
    default: {
      const _exhaustive: never = provider;
      throw new Error(`unknown provider: ${_exhaustive}`);
    }
  }
}
