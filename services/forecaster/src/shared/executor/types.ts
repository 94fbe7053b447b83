/**
 * Executor Types
 * Completion capability and the per-provider implementations behind it
 */

// ============================================
// PROVIDERS
// ============================================

export type ModelProvider = "openai" | "anthropic" | "google" | "together";

/**
 * A single provider family (OpenAI, Anthropic, ...)
 */
export interface ICompletionProvider {
  readonly provider: ModelProvider;

  /**
   * Issue one completion, no retries
   */
  generate(request: CompletionRequest): Promise<CompletionResult>;

  /**
   * Check if credentials are present
   */
  isReady(): boolean;
}

// ============================================
// REQUEST / RESPONSE
// ============================================

export interface CompletionRequest {
  model: string;
  prompt: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface CompletionResult {
  text: string;
  durationMs: number;
  tokens?: {
    input: number;
    output: number;
  };
  costUsd?: number;
}

export interface CompletionCallOptions {
  /** Attempts before giving up; Infinity keeps retrying */
  maxAttempts?: number;
}

// ============================================
// COMPLETION CAPABILITY
// ============================================

/**
 * What the pipeline depends on: text in, text out
 */
export interface ICompletion {
  /**
   * Single call. Retries transient failures with a fixed delay.
   */
  complete(request: CompletionRequest, options?: CompletionCallOptions): Promise<string>;

  /**
   * Concurrent calls with a bounded retry budget; output order follows input order
   */
  completeAll(
    requests: readonly CompletionRequest[],
    options?: CompletionCallOptions
  ): Promise<string[]>;
}
