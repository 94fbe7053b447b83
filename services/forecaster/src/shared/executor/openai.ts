/**
 * OpenAI Provider
 * Chat completions through the openai SDK; Together serves the same API
 */

import OpenAI from "openai";
import { toProviderError } from "./errors.js";
import type { CompletionRequest, CompletionResult, ICompletionProvider } from "./types.js";

export const TOGETHER_BASE_URL = "https://api.together.xyz/v1";

export interface OpenAIProviderOptions {
  apiKey?: string;
  baseURL?: string;
  provider?: "openai" | "together";
  /** Injected client, mainly for tests */
  client?: OpenAI;
}

export class OpenAICompletionProvider implements ICompletionProvider {
  readonly provider: "openai" | "together";
  private readonly client: OpenAI;
  private readonly hasKey: boolean;

  constructor(options: OpenAIProviderOptions) {
    this.provider = options.provider ?? "openai";
    this.hasKey = Boolean(options.apiKey) || options.client !== undefined;
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        // Retries are owned by the router
        maxRetries: 0,
      });
  }

  isReady(): boolean {
    return this.hasKey;
  }

  async generate(request: CompletionRequest): Promise<CompletionResult> {
    const startTime = Date.now();
    const user = { role: "user" as const, content: request.prompt };
    const messages = request.systemPrompt
      ? [{ role: "system" as const, content: request.systemPrompt }, user]
      : [user];

    try {
      const response = await this.client.chat.completions.create({
        model: request.model,
        messages,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      });

      return {
        text: response.choices[0]?.message?.content ?? "",
        durationMs: Date.now() - startTime,
        tokens: response.usage
          ? { input: response.usage.prompt_tokens, output: response.usage.completion_tokens }
          : undefined,
      };
    } catch (error) {
      throw toProviderError(error, this.provider, request.model);
    }
  }
}

/**
 * Together's OpenAI-compatible endpoint
 */
export function createTogetherProvider(apiKey: string): OpenAICompletionProvider {
  return new OpenAICompletionProvider({ apiKey, baseURL: TOGETHER_BASE_URL, provider: "together" });
}
