/**
 * Reasoning Types
 */

/** A probability in [0, 1], or a vocabulary phrase */
export type Prediction = number | string;

export const ANSWER_TYPES = ["probability", "tokens"] as const;
export type AnswerType = (typeof ANSWER_TYPES)[number];

export const AGGREGATION_STRATEGIES = ["mean", "weighted-mean", "vote-or-median", "trimmed-mean", "meta"] as const;
export type AggregationStrategy = (typeof AGGREGATION_STRATEGIES)[number];

/** Strategies that average numbers and so need probability answers */
export const MEAN_FAMILY: readonly AggregationStrategy[] = ["mean", "weighted-mean", "trimmed-mean"];

/**
 * What every reasoning prompt is rendered with
 */
export interface ReasoningInput {
  question: string;
  background: string;
  resolutionCriteria: string;

  /** "Today" for the forecaster: the end of the retrieval window */
  dateBegin: string;

  /** Question close date */
  dateEnd: string;

  /** Evidence digest */
  retrievedInfo: string;
}

export interface BaseReasoning {
  readonly model: string;
  readonly templateId: string;
  readonly prompt: string;
  readonly response: string;
  readonly prediction: Prediction;
}

export interface EnsembleResult {
  /** Grouped by base model, in config order */
  readonly baseReasonings: readonly (readonly BaseReasoning[])[];
  readonly basePredictions: readonly (readonly Prediction[])[];
  readonly metaPrediction: Prediction;

  /** Only set by the meta strategy */
  readonly metaPrompt: string | null;
  readonly metaReasoning: string | null;
}
