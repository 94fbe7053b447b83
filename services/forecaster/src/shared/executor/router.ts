/**
 * Completion Router
 * Dispatches requests to provider implementations by model name, with retries
 */

import { ConfigError, logger, withRetry, type ChildLogger } from "@foresight/core";
import { inferModelProvider } from "./models.js";
import type {
  CompletionCallOptions,
  CompletionRequest,
  ICompletion,
  ICompletionProvider,
  ModelProvider,
} from "./types.js";

export type ProviderTable = Partial<Record<ModelProvider, ICompletionProvider>>;

export interface CompletionRouterOptions {
  providers: ProviderTable;

  /** Attempts for single calls (default: unbounded) */
  maxAttempts?: number;

  /** Attempts per request inside completeAll (default 5) */
  batchMaxAttempts?: number;

  /** Fixed wait between attempts (default 30s) */
  retryDelayMs?: number;
}

export class CompletionRouter implements ICompletion {
  private readonly log: ChildLogger;
  private readonly providers: ProviderTable;
  private readonly maxAttempts: number;
  private readonly batchMaxAttempts: number;
  private readonly retryDelayMs: number;

  constructor(options: CompletionRouterOptions) {
    this.log = logger.child({ component: "completion" });
    this.providers = { ...options.providers };
    this.maxAttempts = options.maxAttempts ?? Infinity;
    this.batchMaxAttempts = options.batchMaxAttempts ?? 5;
    this.retryDelayMs = options.retryDelayMs ?? 30_000;
  }

  /**
   * Provider for a model. Unknown names and unregistered or unready
   * providers throw before anything is sent.
   */
  resolve(model: string): ICompletionProvider {
    const provider = inferModelProvider(model);
    const implementation = this.providers[provider];
    if (!implementation) {
      throw new ConfigError(`No ${provider} provider registered for model ${model}`, { provider, model });
    }
    if (!implementation.isReady()) {
      throw new ConfigError(`The ${provider} provider for model ${model} has no credentials`, { provider, model });
    }
    return implementation;
  }

  async complete(request: CompletionRequest, options?: CompletionCallOptions): Promise<string> {
    const implementation = this.resolve(request.model);
    const context = { provider: implementation.provider, model: request.model };

    const result = await withRetry(() => implementation.generate(request), {
      maxAttempts: options?.maxAttempts ?? this.maxAttempts,
      delayMs: this.retryDelayMs,
      label: "Completion",
      context,
    });

    this.log.debug("Completion finished", {
      ...context,
      durationMs: result.durationMs,
      inputTokens: result.tokens?.input,
      outputTokens: result.tokens?.output,
    });

    return result.text;
  }

  async completeAll(
    requests: readonly CompletionRequest[],
    options?: CompletionCallOptions
  ): Promise<string[]> {
    // Resolve everything first so a bad model name fails the batch before any call
    for (const request of requests) {
      this.resolve(request.model);
    }

    const maxAttempts = options?.maxAttempts ?? this.batchMaxAttempts;
    return Promise.all(requests.map((request) => this.complete(request, { maxAttempts })));
  }
}
