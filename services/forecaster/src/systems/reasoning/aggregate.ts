/**
 * Aggregation Strategies
 * Pure combination of base predictions into one forecast
 */

import { ConfigError } from "@foresight/core";
import { DEFAULT_PROBABILITY } from "../../shared/parsing/response.js";
import { isVocabularyToken, type AnswerVocabulary } from "./vocabulary.js";

function requireValues(values: readonly number[], strategy: string): void {
  if (values.length === 0) {
    throw new ConfigError(`${strategy} needs at least one prediction`);
  }
}

export function mean(values: readonly number[]): number {
  requireValues(values, "mean");
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function median(values: readonly number[]): number {
  requireValues(values, "median");
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[middle] : (sorted[middle - 1] + sorted[middle]) / 2;
}

/**
 * Mean of `values` where value i counts with `weights[i]`
 */
export function weightedMean(values: readonly number[], weights: readonly number[]): number {
  requireValues(values, "weighted-mean");
  if (weights.length !== values.length) {
    throw new ConfigError(`weighted-mean got ${values.length} values but ${weights.length} weights`);
  }
  if (weights.some((weight) => weight < 0)) {
    throw new ConfigError("weighted-mean weights must not be negative");
  }

  const total = weights.reduce((sum, weight) => sum + weight, 0);
  if (total <= 0) {
    throw new ConfigError("weighted-mean weights must sum to more than zero");
  }
  return values.reduce((sum, value, index) => sum + value * weights[index], 0) / total;
}

/**
 * Weighted mean that halves the weight of the values furthest from the
 * median and spreads the difference over the others. Ties at the largest
 * distance are all halved, so input order does not matter.
 */
export function trimmedMean(values: readonly number[]): number {
  requireValues(values, "trimmed-mean");
  if (values.length === 1) return values[0];

  const center = median(values);
  const distances = values.map((value) => Math.abs(value - center));
  const furthest = Math.max(...distances);

  const shared = 0.5 / (values.length - 1);
  const weights = distances.map((distance) => (distance === furthest ? 0.5 : 1 + shared));
  return weightedMean(values, weights);
}

/**
 * Most frequent item; ties go to the one seen first
 */
export function mostFrequent<T>(items: readonly T[]): T | null {
  const counts = new Map<T, number>();
  for (const item of items) {
    counts.set(item, (counts.get(item) ?? 0) + 1);
  }

  let best: T | null = null;
  let bestCount = 0;
  for (const [item, count] of counts) {
    if (count > bestCount) {
      best = item;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Out-of-range or non-numeric probabilities become 0.5
 */
export function clampProbability(value: number): number {
  return Number.isFinite(value) && value >= 0 && value <= 1 ? value : DEFAULT_PROBABILITY;
}

/**
 * Phrases outside the vocabulary become its fallback
 */
export function clampToken(token: string | null, vocabulary: AnswerVocabulary): string {
  return token !== null && isVocabularyToken(vocabulary, token) ? token : vocabulary.fallback;
}
