/**
 * OpenAI Embeddings
 * Batched, order-preserving embeddings with bounded retries
 */

import OpenAI from "openai";
import { ConfigError, logger, withRetry, type ChildLogger } from "@foresight/core";
import { toProviderError } from "../executor/errors.js";
import type { IEmbedder } from "./types.js";

export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";

export interface OpenAIEmbedderOptions {
  apiKey?: string;
  client?: OpenAI;
  model?: string;
  batchSize?: number;
  maxAttempts?: number;
  retryDelayMs?: number;
}

export class OpenAIEmbedder implements IEmbedder {
  private readonly log: ChildLogger;
  private readonly apiKey?: string;
  private client: OpenAI | null;
  private readonly model: string;
  private readonly batchSize: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;

  constructor(options: OpenAIEmbedderOptions = {}) {
    this.log = logger.child({ component: "embeddings" });
    this.apiKey = options.apiKey;
    this.client = options.client ?? null;
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.batchSize = options.batchSize ?? 500;
    this.maxAttempts = options.maxAttempts ?? 5;
    this.retryDelayMs = options.retryDelayMs ?? 30_000;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      // Newlines degrade embedding quality
      const batch = texts.slice(i, i + this.batchSize).map((text) => text.replace(/\n/g, " "));
      const response = await withRetry(() => this.request(batch), {
        maxAttempts: this.maxAttempts,
        delayMs: this.retryDelayMs,
        label: "Embedding",
        context: { provider: "openai", model: this.model, batchSize: batch.length },
      });
      vectors.push(...response);
    }

    this.log.debug("Embedded texts", { count: texts.length, model: this.model });
    return vectors;
  }

  // Created on first use
  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.apiKey) {
        throw new ConfigError("OPENAI_API_KEY is required for embeddings");
      }
      this.client = new OpenAI({ apiKey: this.apiKey, maxRetries: 0 });
    }
    return this.client;
  }

  private async request(batch: string[]): Promise<number[][]> {
    const client = this.getClient();
    try {
      const response = await client.embeddings.create({ model: this.model, input: batch });
      return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
    } catch (error) {
      throw toProviderError(error, "openai", this.model);
    }
  }
}
