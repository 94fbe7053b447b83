/**
 * Reasoning System
 * Ensemble forecasting over an evidence digest
 */

export * from "./types.js";
export * from "./vocabulary.js";
export * from "./config.js";
export {
  mean,
  median,
  weightedMean,
  trimmedMean,
  mostFrequent,
  clampProbability,
  clampToken,
} from "./aggregate.js";
export {
  elicitBaseReasonings,
  aggregateBaseReasonings,
  metaReason,
  concatenateReasonings,
  extractPrediction,
  reasoningVariables,
} from "./ensemble.js";
export { scoreAlignment, type AlignmentSettings } from "./alignment.js";
