/**
 * Google Provider
 * Gemini models through @google/generative-ai
 */

import { GoogleGenerativeAI } from "@google/generative-ai";
import { toProviderError } from "./errors.js";
import type { CompletionRequest, CompletionResult, ICompletionProvider } from "./types.js";

export class GoogleCompletionProvider implements ICompletionProvider {
  readonly provider = "google" as const;
  private readonly client: GoogleGenerativeAI;
  private readonly hasKey: boolean;

  constructor(apiKey: string) {
    this.client = new GoogleGenerativeAI(apiKey);
    this.hasKey = apiKey.length > 0;
  }

  isReady(): boolean {
    return this.hasKey;
  }

  async generate(request: CompletionRequest): Promise<CompletionResult> {
    const startTime = Date.now();

    try {
      const model = this.client.getGenerativeModel({
        model: request.model,
        ...(request.systemPrompt ? { systemInstruction: request.systemPrompt } : {}),
        generationConfig: {
          temperature: request.temperature,
          maxOutputTokens: request.maxTokens,
        },
      });

      const response = (await model.generateContent(request.prompt)).response;
      const usage = response.usageMetadata;

      return {
        text: response.text(),
        durationMs: Date.now() - startTime,
        tokens: usage
          ? { input: usage.promptTokenCount, output: usage.candidatesTokenCount }
          : undefined,
      };
    } catch (error) {
      throw toProviderError(error, this.provider, request.model);
    }
  }
}
