/**
 * Normalize SDK failures into ProviderError
 */

import { ProviderError, isForesightError } from "@foresight/core";
import type { ModelProvider } from "./types.js";

/**
 * HTTP status carried by SDK errors (OpenAI APIError, Gemini fetch errors)
 */
function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    const status = error.status;
    return typeof status === "number" ? status : undefined;
  }
  return undefined;
}

export function toProviderError(error: unknown, provider: ModelProvider, model: string): Error {
  if (isForesightError(error)) return error;

  const cause = error instanceof Error ? error : undefined;
  return new ProviderError(`${provider} completion failed: ${cause?.message ?? String(error)}`, provider, {
    cause,
    model,
    statusCode: statusOf(error),
  });
}
