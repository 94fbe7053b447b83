/**
 * Batch Runner
 * Forecasts a list of questions in order, resuming past ones already stored
 */

import { logger } from "@foresight/core";
import type { IStore } from "../../shared/store/types.js";
import type { RetrievalConfig } from "../retrieval/config.js";
import type { RetrievalDependencies } from "../retrieval/pipeline.js";
import { assertEnsembleConfig, type ReasoningConfig } from "../reasoning/config.js";
import { resultKey, retrieveAndForecast } from "./evaluator.js";
import type { BatchSummary, ForecastQuestionInput } from "./types.js";

const log = logger.child({ component: "batch" });

export interface BatchOptions {
  retrievalConfig: RetrievalConfig;
  reasoningConfig: ReasoningConfig;
  store: IStore;
  outputDir: string;

  /** Distinguishes repeated passes over the same questions (default 0) */
  retrievalIndex?: number;
}

/**
 * One question at a time. A failing question is counted and the run goes on.
 */
export async function runForecastBatch(
  questions: readonly ForecastQuestionInput[],
  deps: RetrievalDependencies,
  options: BatchOptions
): Promise<BatchSummary> {
  assertEnsembleConfig(options.reasoningConfig);
  const retrievalIndex = options.retrievalIndex ?? 0;
  const summary: BatchSummary = { succeeded: 0, failed: 0, skipped: 0, written: [] };

  for (const [index, question] of questions.entries()) {
    const key = resultKey(options.outputDir, retrievalIndex, question.question);

    try {
      if (await options.store.exists(key)) {
        log.debug("Result exists, skipping", { key });
        summary.skipped++;
        continue;
      }

      log.info(`Forecasting question ${index + 1}/${questions.length}`, { question: question.question.slice(0, 80) });

      const record = await retrieveAndForecast(question, options.retrievalConfig, options.reasoningConfig, deps);
      if (!record) {
        summary.failed++;
        continue;
      }
      await options.store.write(key, record);
      summary.written.push(key);
      summary.succeeded++;
    } catch (error) {
      log.error("Question failed", error, { key });
      summary.failed++;
    }
  }

  log.info("Batch finished", {
    retrievalIndex,
    succeeded: summary.succeeded,
    failed: summary.failed,
    skipped: summary.skipped,
  });
  log.metric("batch_succeeded", summary.succeeded);
  log.metric("batch_failed", summary.failed);

  return summary;
}
