/**
 * Claude Provider
 * Single-turn, tool-free completions through the Claude Agent SDK
 */

import { query, type Options } from "@anthropic-ai/claude-agent-sdk";
import { ProviderError } from "@foresight/core";
import { toProviderError } from "./errors.js";
import type { CompletionRequest, CompletionResult, ICompletionProvider } from "./types.js";

export interface ClaudeProviderOptions {
  /** Working directory handed to the SDK */
  cwd?: string;
}

/**
 * The SDK reads ANTHROPIC_API_KEY from the environment and has no temperature
 * or max-token knobs; those request fields are ignored.
 */
export class ClaudeCompletionProvider implements ICompletionProvider {
  readonly provider = "anthropic" as const;
  private readonly cwd: string;

  constructor(options: ClaudeProviderOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
  }

  isReady(): boolean {
    return Boolean(process.env.ANTHROPIC_API_KEY);
  }

  async generate(request: CompletionRequest): Promise<CompletionResult> {
    const startTime = Date.now();

    const options: Options = {
      model: request.model,
      systemPrompt: request.systemPrompt,
      maxTurns: 1,
      allowedTools: [],
      cwd: this.cwd,
    };

    let output = "";
    let costUsd = 0;

    try {
      for await (const message of query({ prompt: request.prompt, options })) {
        if (message.type !== "result") continue;

        if (message.subtype === "success") {
          output = message.result;
          costUsd = message.total_cost_usd;
        } else {
          throw new ProviderError(`Claude run ended with ${message.subtype}`, this.provider, {
            model: request.model,
          });
        }
      }
    } catch (error) {
      throw toProviderError(error, this.provider, request.model);
    }

    return {
      text: output,
      durationMs: Date.now() - startTime,
      costUsd,
    };
  }
}
