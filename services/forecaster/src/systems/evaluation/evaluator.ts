/**
 * Evaluator
 * Runs one question end to end: retrieval, ensemble, alignment, scoring
 */

import { logger, ValidationError, formatZodIssues } from "@foresight/core";
import { retrieveSummarizeAndRank, type RetrievalDependencies } from "../retrieval/pipeline.js";
import type { RetrievalConfig } from "../retrieval/config.js";
import type { RetrievalResult } from "../retrieval/types.js";
import { assertEnsembleConfig, type ReasoningConfig } from "../reasoning/config.js";
import { metaReason } from "../reasoning/ensemble.js";
import { scoreAlignment } from "../reasoning/alignment.js";
import type { ReasoningInput } from "../reasoning/types.js";
import { getVocabulary } from "../reasoning/vocabulary.js";
import { brierScore, predictionProbability } from "./metrics.js";
import {
  ForecastQuestionSchema,
  type BrierScores,
  type ForecastQuestion,
  type ForecastQuestionInput,
  type ForecastRecord,
} from "./types.js";

const log = logger.child({ component: "evaluator" });

/**
 * Store key for a question's record:
 * "{outputDir}/{retrievalIndex}/{question with spaces as _ and no slashes}.{ext}"
 */
export function resultKey(outputDir: string, retrievalIndex: number, question: string, ext = "json"): string {
  const name = question.replace(/ /g, "_").replace(/\//g, "");
  return `${outputDir}/${retrievalIndex}/${name}.${ext}`;
}

export function parseForecastQuestion(input: ForecastQuestionInput): ForecastQuestion {
  const parsed = ForecastQuestionSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`Invalid forecast question: ${formatZodIssues(parsed.error)}`, {
      field: parsed.error.issues[0]?.path.join("."),
      context: { issues: parsed.error.issues },
    });
  }
  return parsed.data;
}

export function todayToClose(question: ForecastQuestion): [string, string] {
  const today = question.retrievalDates.end;
  return [today, question.questionDates?.close ?? today];
}

/**
 * Retrieve evidence and forecast one question.
 *
 * Null when retrieval fails; the error is logged. Configs and the question
 * are checked before anything is called.
 */
export async function retrieveAndForecast(
  input: ForecastQuestionInput,
  retrievalConfig: RetrievalConfig,
  reasoningConfig: ReasoningConfig,
  deps: RetrievalDependencies
): Promise<ForecastRecord | null> {
  assertEnsembleConfig(reasoningConfig);
  const question = parseForecastQuestion(input);
  const qlog = log.child({ question: question.question.slice(0, 80) });

  let retrieval: RetrievalResult;
  try {
    retrieval = await retrieveSummarizeAndRank(question, retrievalConfig, deps);
  } catch (error) {
    qlog.error("Retrieval failed", error);
    return null;
  }

  const dates = todayToClose(question);
  const reasoningInput: ReasoningInput = {
    question: question.question,
    background: question.background,
    resolutionCriteria: question.resolutionCriteria,
    dateBegin: dates[0],
    dateEnd: dates[1],
    retrievedInfo: retrieval.digest,
  };

  const stopReasoning = qlog.time("reasoning");
  const ensemble = await metaReason(reasoningInput, reasoningConfig, deps.completion);
  stopReasoning();

  const alignmentScores = reasoningConfig.alignment.enabled
    ? await scoreAlignment(reasoningInput, ensemble.baseReasonings, deps.completion, reasoningConfig.alignment)
    : null;

  let brierScores: BrierScores | null = null;
  if (question.answer !== undefined) {
    const answer = question.answer;
    const vocabulary = getVocabulary(reasoningConfig.vocabulary);
    brierScores = {
      base: ensemble.basePredictions.map((group) =>
        group.map((prediction) => brierScore(predictionProbability(prediction, vocabulary), answer))
      ),
      meta: brierScore(predictionProbability(ensemble.metaPrediction, vocabulary), answer),
    };
    qlog.metric("brier_meta", brierScores.meta);
  }

  return {
    question: question.question,
    background: question.background,
    resolutionCriteria: question.resolutionCriteria,
    dataSource: question.dataSource ?? null,
    questionDates: question.questionDates ?? null,
    retrievalDates: question.retrievalDates,
    todayToClose: dates,
    answer: question.answer ?? null,
    communityPrediction: question.communityPrediction ?? null,
    queryPlan: retrieval.queryPlan,
    rankedArticles: retrieval.rankedArticles.map((article) => ({ title: article.title, link: article.link })),
    digest: retrieval.digest,
    ensemble,
    alignmentScores,
    brierScores,
    createdAt: new Date().toISOString(),
  };
}
