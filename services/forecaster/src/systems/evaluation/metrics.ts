/**
 * Scoring
 */

import type { Prediction } from "../reasoning/types.js";
import { tokenProbability, type AnswerVocabulary } from "../reasoning/vocabulary.js";

/**
 * Squared error of a probability against a 0/1 outcome
 */
export function brierScore(probability: number, answer: 0 | 1): number {
  return (probability - answer) ** 2;
}

/**
 * Probabilities pass through; phrases map to the probability they stand for
 */
export function predictionProbability(prediction: Prediction, vocabulary: AnswerVocabulary): number {
  return typeof prediction === "number" ? prediction : tokenProbability(vocabulary, prediction);
}
