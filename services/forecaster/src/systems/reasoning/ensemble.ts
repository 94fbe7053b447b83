/**
 * Ensemble Reasoner
 * Elicits reasonings from several base models and combines their
 * predictions into one forecast
 */

import { ConfigError, ValidationError, deepFreeze, logger } from "@foresight/core";
import type { CompletionRequest, ICompletion } from "../../shared/executor/types.js";
import { renderTemplate } from "../../shared/prompt/registry.js";
import type { PromptTemplate, PromptVariables } from "../../shared/prompt/types.js";
import { extractProbability, extractVocabularyToken } from "../../shared/parsing/response.js";
import {
  clampProbability,
  clampToken,
  mean,
  median,
  mostFrequent,
  trimmedMean,
  weightedMean,
} from "./aggregate.js";
import { assertEnsembleConfig, type ReasoningConfig } from "./config.js";
import type { AnswerType, BaseReasoning, EnsembleResult, Prediction, ReasoningInput } from "./types.js";
import { getVocabulary, vocabularyTokens, type AnswerVocabulary } from "./vocabulary.js";

const log = logger.child({ component: "ensemble" });

export function reasoningVariables(input: ReasoningInput, vocabulary: AnswerVocabulary): PromptVariables {
  return {
    question: input.question,
    background: input.background,
    resolution_criteria: input.resolutionCriteria,
    date_begin: input.dateBegin,
    date_end: input.dateEnd,
    retrieved_info: input.retrievedInfo,
    answer_options: vocabularyTokens(vocabulary).join(", "),
  };
}

/**
 * Parse a response into a clamped prediction of the configured answer type
 */
export function extractPrediction(response: string, answerType: AnswerType, vocabulary: AnswerVocabulary): Prediction {
  if (answerType === "probability") {
    return clampProbability(extractProbability(response));
  }
  return clampToken(extractVocabularyToken(response, vocabularyTokens(vocabulary)), vocabulary);
}

/**
 * "---\nResponse from forecaster 1:\n...\n\n-\nResponse from forecaster 2:\n...\n---"
 */
export function concatenateReasonings(responses: readonly string[]): string {
  const blocks = responses.map((response, index) => `Response from forecaster ${index + 1}:\n${response}`);
  return "---\n" + blocks.join("\n\n-\n") + "\n---";
}

interface PlannedPrompt {
  group: number;
  model: string;
  template: PromptTemplate;
  request: CompletionRequest;
}

/**
 * Render every (model, template) prompt and issue them together. The result
 * is grouped by model in config order.
 */
export async function elicitBaseReasonings(
  input: ReasoningInput,
  config: ReasoningConfig,
  completion: ICompletion
): Promise<BaseReasoning[][]> {
  const vocabulary = getVocabulary(config.vocabulary);
  const variables = reasoningVariables(input, vocabulary);

  const planned: PlannedPrompt[] = config.baseModels.flatMap((model, group) =>
    config.templates[group].map((template) => ({
      group,
      model,
      template,
      request: {
        model,
        temperature: config.baseTemperature,
        prompt: renderTemplate(template, variables),
      },
    }))
  );

  const responses = await completion.completeAll(planned.map((entry) => entry.request));

  const grouped: BaseReasoning[][] = config.baseModels.map(() => []);
  planned.forEach((entry, index) => {
    grouped[entry.group].push({
      model: entry.model,
      templateId: entry.template.id,
      prompt: entry.request.prompt,
      response: responses[index],
      prediction: extractPrediction(responses[index], config.answerType, vocabulary),
    });
  });

  log.info("Elicited base reasonings", { models: config.baseModels.length, prompts: planned.length });
  return grouped;
}

function numeric(predictions: readonly Prediction[]): number[] {
  return predictions.map((prediction) => (typeof prediction === "number" ? prediction : Number.NaN));
}

function finish(
  baseReasonings: readonly (readonly BaseReasoning[])[],
  metaPrediction: Prediction,
  meta: { prompt: string; reasoning: string } | null = null
): EnsembleResult {
  const result: EnsembleResult = {
    baseReasonings,
    basePredictions: baseReasonings.map((group) => group.map((reasoning) => reasoning.prediction)),
    metaPrediction,
    metaPrompt: meta?.prompt ?? null,
    metaReasoning: meta?.reasoning ?? null,
  };
  return deepFreeze(result);
}

/**
 * Combine base reasonings with the configured strategy. A single reasoning
 * is returned as the answer whatever the strategy; only `meta` calls a model.
 */
export async function aggregateBaseReasonings(
  baseReasonings: readonly (readonly BaseReasoning[])[],
  input: ReasoningInput,
  config: ReasoningConfig,
  completion: ICompletion
): Promise<EnsembleResult> {
  assertEnsembleConfig(config);
  const vocabulary = getVocabulary(config.vocabulary);
  const flat = baseReasonings.flat();

  if (flat.length === 0) {
    throw new ValidationError("No base reasonings to aggregate", { field: "baseReasonings" });
  }
  if (flat.length === 1) {
    return finish(baseReasonings, flat[0].prediction);
  }

  const predictions = flat.map((reasoning) => reasoning.prediction);

  switch (config.strategy) {
    case "mean":
      return finish(baseReasonings, clampProbability(mean(numeric(predictions))));

    case "weighted-mean": {
      const weights = config.weights ?? [];
      if (weights.length !== baseReasonings.length) {
        throw new ConfigError(`Got ${baseReasonings.length} reasoning groups but ${weights.length} weights`);
      }
      const perPrediction = baseReasonings.flatMap((group, index) => group.map(() => weights[index]));
      return finish(baseReasonings, clampProbability(weightedMean(numeric(predictions), perPrediction)));
    }

    case "trimmed-mean":
      return finish(baseReasonings, clampProbability(trimmedMean(numeric(predictions))));

    case "vote-or-median":
      if (config.answerType === "probability") {
        return finish(baseReasonings, clampProbability(median(numeric(predictions))));
      }
      return finish(
        baseReasonings,
        clampToken(mostFrequent(predictions.map((prediction) => String(prediction))), vocabulary)
      );

    case "meta": {
      const prompt = renderTemplate(config.metaTemplate, {
        ...reasoningVariables(input, vocabulary),
        base_reasonings: concatenateReasonings(flat.map((reasoning) => reasoning.response)),
      });
      const reasoning = await completion.complete({
        model: config.metaModel,
        temperature: config.metaTemperature,
        prompt,
      });
      const prediction = extractPrediction(reasoning, config.answerType, vocabulary);
      log.debug("Meta reasoning finished", { model: config.metaModel, prediction });
      return finish(baseReasonings, prediction, { prompt, reasoning });
    }
  }
}

/**
 * Elicit and aggregate. The config contract is checked before any call.
 */
export async function metaReason(
  input: ReasoningInput,
  config: ReasoningConfig,
  completion: ICompletion
): Promise<EnsembleResult> {
  assertEnsembleConfig(config);
  const baseReasonings = await elicitBaseReasonings(input, config, completion);
  return aggregateBaseReasonings(baseReasonings, input, config, completion);
}
