/**
 * Model Catalog
 * Maps model names to their provider and input token budget
 */

import { z } from "zod";
import { UnknownModelError } from "@foresight/core";
import type { ModelProvider } from "./types.js";

export interface ModelSpec {
  provider: ModelProvider;
  tokenLimit: number;
}

export const MODEL_CATALOG: Readonly<Record<string, ModelSpec>> = Object.freeze({
  // OpenAI
  "gpt-4": { provider: "openai", tokenLimit: 8_000 },
  "gpt-4-1106-preview": { provider: "openai", tokenLimit: 128_000 },
  "gpt-4-turbo": { provider: "openai", tokenLimit: 128_000 },
  "gpt-4o": { provider: "openai", tokenLimit: 128_000 },
  "gpt-4o-mini": { provider: "openai", tokenLimit: 128_000 },
  "gpt-3.5-turbo": { provider: "openai", tokenLimit: 8_000 },
  "gpt-3.5-turbo-1106": { provider: "openai", tokenLimit: 16_000 },
  "gpt-3.5-turbo-16k": { provider: "openai", tokenLimit: 16_000 },

  // Anthropic
  "claude-2": { provider: "anthropic", tokenLimit: 100_000 },
  "claude-2.1": { provider: "anthropic", tokenLimit: 200_000 },
  "claude-3-opus-20240229": { provider: "anthropic", tokenLimit: 200_000 },
  "claude-3-sonnet-20240229": { provider: "anthropic", tokenLimit: 200_000 },
  "claude-3-5-sonnet-20241022": { provider: "anthropic", tokenLimit: 200_000 },
  "claude-sonnet-4-20250514": { provider: "anthropic", tokenLimit: 200_000 },

  // Google
  "gemini-pro": { provider: "google", tokenLimit: 30_720 },
  "gemini-1.5-pro": { provider: "google", tokenLimit: 1_000_000 },
  "gemini-1.5-flash": { provider: "google", tokenLimit: 1_000_000 },

  // Together
  "togethercomputer/llama-2-7b-chat": { provider: "together", tokenLimit: 4_096 },
  "togethercomputer/llama-2-13b-chat": { provider: "together", tokenLimit: 4_096 },
  "togethercomputer/llama-2-70b-chat": { provider: "together", tokenLimit: 4_096 },
  "togethercomputer/LLaMA-2-7B-32K": { provider: "together", tokenLimit: 32_768 },
  "togethercomputer/StripedHyena-Hessian-7B": { provider: "together", tokenLimit: 32_768 },
  "mistralai/Mistral-7B-Instruct-v0.2": { provider: "together", tokenLimit: 32_768 },
  "mistralai/Mixtral-8x7B-Instruct-v0.1": { provider: "together", tokenLimit: 32_768 },
  "zero-one-ai/Yi-34B-Chat": { provider: "together", tokenLimit: 4_096 },
  "NousResearch/Nous-Hermes-2-Mixtral-8x7B-DPO": { provider: "together", tokenLimit: 32_768 },
  "NousResearch/Nous-Hermes-2-Yi-34B": { provider: "together", tokenLimit: 32_768 },
});

/**
 * "ft:gpt-3.5-turbo-1106:org::id" -> "gpt-3.5-turbo-1106"
 */
function fineTunedBase(model: string): string | null {
  if (!model.startsWith("ft:gpt")) return null;
  return model.split(":")[1] ?? null;
}

/**
 * Look up a model. Unknown names are an error, never a guess.
 */
export function getModelSpec(model: string): ModelSpec {
  if (Object.hasOwn(MODEL_CATALOG, model)) {
    return MODEL_CATALOG[model];
  }

  const base = fineTunedBase(model);
  if (base !== null) {
    const tokenLimit = Object.hasOwn(MODEL_CATALOG, base) ? MODEL_CATALOG[base].tokenLimit : 16_000;
    return { provider: "openai", tokenLimit };
  }

  throw new UnknownModelError(model);
}

export function inferModelProvider(model: string): ModelProvider {
  return getModelSpec(model).provider;
}

export function getModelTokenLimit(model: string): number {
  return getModelSpec(model).tokenLimit;
}

export function isKnownModel(model: string): boolean {
  return Object.hasOwn(MODEL_CATALOG, model) || fineTunedBase(model) !== null;
}

/**
 * Model name that must resolve to a provider
 */
export const ModelNameSchema = z
  .string()
  .refine(isKnownModel, (model) => ({ message: `Unknown model: ${model}` }));
