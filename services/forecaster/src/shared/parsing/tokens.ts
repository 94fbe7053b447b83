/**
 * Token Heuristics
 * Character-based token estimates. OpenAI tokenizers average about four
 * characters per token on English prose; the other providers are counted
 * more conservatively.
 */

import { inferModelProvider } from "../executor/models.js";
import type { ModelProvider } from "../executor/types.js";

const CHARS_PER_TOKEN: Record<ModelProvider, number> = {
  openai: 4,
  anthropic: 3,
  google: 3,
  together: 3,
};

export function charsPerToken(model: string): number {
  return CHARS_PER_TOKEN[inferModelProvider(model)];
}

export function countTokens(text: string, model: string): number {
  return Math.ceil(text.length / charsPerToken(model));
}

/**
 * Split text on word boundaries into chunks of at most `maxTokens` each.
 * A single word longer than the budget is cut at the character limit.
 */
export function splitIntoChunks(text: string, maxTokens: number, model: string): string[] {
  if (maxTokens < 1) {
    throw new RangeError(`maxTokens must be at least 1, got ${maxTokens}`);
  }

  const maxChars = maxTokens * charsPerToken(model);
  const chunks: string[] = [];
  let current = "";

  for (const word of text.split(/\s+/)) {
    if (word.length === 0) continue;

    if (word.length > maxChars) {
      if (current) chunks.push(current);
      current = "";
      for (let i = 0; i < word.length; i += maxChars) {
        chunks.push(word.slice(i, i + maxChars));
      }
      continue;
    }

    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length > maxChars) {
      chunks.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }

  if (current) chunks.push(current);
  return chunks;
}
