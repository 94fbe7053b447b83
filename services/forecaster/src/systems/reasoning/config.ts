/**
 * Reasoning Config
 * Validated, frozen settings for the forecasting ensemble
 */

import { z } from "zod";
import { ConfigError, deepFreeze, formatZodIssues, type DeepReadonly } from "@foresight/core";
import { ModelNameSchema } from "../../shared/executor/models.js";
import { templateSchemaFor } from "../../shared/prompt/types.js";
import {
  ALIGNMENT_RATING,
  META_REASONING,
  REASONING_BASE_RATES,
  REASONING_SCRATCHPAD,
} from "../../shared/prompt/library.js";
import { AGGREGATION_STRATEGIES, ANSWER_TYPES, MEAN_FAMILY, type AggregationStrategy, type AnswerType } from "./types.js";
import { VOCABULARY_IDS } from "./vocabulary.js";

const ReasoningConfigObject = z.object({
  baseModels: z.array(ModelNameSchema).min(1).default(["gpt-4-1106-preview"]),
  baseTemperature: z.number().min(0).max(2).default(1),

  /** One template list per base model */
  templates: z
    .array(z.array(templateSchemaFor("base-reasoning")).min(1))
    .min(1)
    .default(() => [[REASONING_SCRATCHPAD, REASONING_BASE_RATES]]),

  strategy: z.enum(AGGREGATION_STRATEGIES).default("meta"),
  answerType: z.enum(ANSWER_TYPES).default("probability"),
  vocabulary: z.enum(VOCABULARY_IDS).default("ten-options"),

  /** One weight per base model, for weighted-mean */
  weights: z.array(z.number()).optional(),

  metaModel: ModelNameSchema.default("gpt-4"),
  metaTemperature: z.number().min(0).max(2).default(0.2),
  metaTemplate: templateSchemaFor("meta-reasoning").default(META_REASONING),

  alignment: z
    .object({
      enabled: z.boolean().default(false),
      model: ModelNameSchema.default("gpt-3.5-turbo-1106"),
      temperature: z.number().min(0).max(2).default(0),
      template: templateSchemaFor("alignment").default(ALIGNMENT_RATING),
      maxAttempts: z.number().int().positive().default(3),
    })
    .default({}),
});

export interface EnsembleShape {
  baseModels: readonly string[];
  templates: readonly (readonly unknown[])[];
  strategy: AggregationStrategy;
  answerType: AnswerType;
  weights?: readonly number[];
}

/**
 * Contract violations between fields of an ensemble config
 */
export function ensembleConfigProblems(config: EnsembleShape): string[] {
  const problems: string[] = [];

  if (config.templates.length !== config.baseModels.length) {
    problems.push(
      `templates has ${config.templates.length} lists but there are ${config.baseModels.length} base models`
    );
  }

  if (MEAN_FAMILY.includes(config.strategy) && config.answerType !== "probability") {
    problems.push(`${config.strategy} needs probability answers, got ${config.answerType}`);
  }

  if (config.strategy === "weighted-mean") {
    const weights = config.weights;
    if (!weights) {
      problems.push("weighted-mean needs weights");
    } else {
      if (weights.length !== config.baseModels.length) {
        problems.push(`weights has ${weights.length} entries but there are ${config.baseModels.length} base models`);
      }
      if (weights.some((weight) => weight < 0)) {
        problems.push("weights must not be negative");
      }
      if (weights.reduce((sum, weight) => sum + weight, 0) <= 0) {
        problems.push("weights must sum to more than zero");
      }
    }
  }

  return problems;
}

/**
 * Throw before any call when the ensemble contract is broken
 */
export function assertEnsembleConfig(config: EnsembleShape): void {
  const problems = ensembleConfigProblems(config);
  if (problems.length > 0) {
    throw new ConfigError(`Invalid reasoning config: ${problems.join("; ")}`, { problems });
  }
}

export const ReasoningConfigSchema = ReasoningConfigObject.superRefine((config, ctx) => {
  for (const message of ensembleConfigProblems(config)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message });
  }
});

export type ReasoningConfigInput = z.input<typeof ReasoningConfigSchema>;
export type ReasoningConfig = DeepReadonly<z.output<typeof ReasoningConfigSchema>>;

export function createReasoningConfig(overrides: ReasoningConfigInput = {}): ReasoningConfig {
  const parsed = ReasoningConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ConfigError(`Invalid reasoning config: ${formatZodIssues(parsed.error)}`, {
      issues: parsed.error.issues,
    });
  }
  return deepFreeze(parsed.data);
}
