/**
 * Evaluation System
 * Per-question forecasting, scoring and resumable batches
 */

export * from "./types.js";
export { brierScore, predictionProbability } from "./metrics.js";
export { retrieveAndForecast, resultKey, parseForecastQuestion, todayToClose } from "./evaluator.js";
export { runForecastBatch, type BatchOptions } from "./batch.js";
