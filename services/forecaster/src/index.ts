/**
 * @foresight/forecaster
 * Retrieval-augmented ensemble forecasting
 */

export * from "./shared/index.js";
export * from "./systems/retrieval/index.js";
export * from "./systems/reasoning/index.js";
export * from "./systems/evaluation/index.js";
export * from "./systems/labeling/index.js";
export {
  ForecastingSystem,
  createForecastingSystem,
  createDefaultDependencies,
  type ForecastingDependencies,
  type ForecastingSystemOptions,
  type RunBatchOptions,
} from "./system.js";
