/**
 * Retrieval Config
 * Validated, frozen settings for one retrieval pass
 */

import { z } from "zod";
import { ConfigError, deepFreeze, formatZodIssues, type DeepReadonly } from "@foresight/core";
import { templateSchemaFor, type PromptTemplate } from "../../shared/prompt/types.js";
import {
  RELEVANCE_RATING,
  SEARCH_QUERY_BRIEF,
  SEARCH_QUERY_SUBQUESTIONS,
  SUMMARIZATION,
} from "../../shared/prompt/library.js";
import { ModelNameSchema } from "../../shared/executor/models.js";

export const RANKING_METHODS = ["model-rating", "embedding"] as const;
export type RankingMethod = (typeof RANKING_METHODS)[number];

export const RATING_DETAILS = ["title", "title-excerpt", "full-text"] as const;
export type RatingDetail = (typeof RATING_DETAILS)[number];

export const SORT_KEYS = ["relevance", "date"] as const;
export type SortKey = (typeof SORT_KEYS)[number];

export const NEWSCATCHER_SOURCE_ID = "newscatcher";
export const GOOGLE_NEWS_SOURCE_ID = "google-news";

function defaultQueryPlans(): QueryPlanSpec[] {
  const sources = [
    { sourceId: NEWSCATCHER_SOURCE_ID, maxWords: 5 },
    { sourceId: GOOGLE_NEWS_SOURCE_ID, maxWords: 8 },
  ];
  const templates = [SEARCH_QUERY_SUBQUESTIONS, SEARCH_QUERY_BRIEF];
  return sources.flatMap((source) => templates.map((template) => ({ template, ...source })));
}

const queryPlanSchema = z.object({
  template: templateSchemaFor("search-query"),
  sourceId: z.string().min(1),
  maxWords: z.number().int().positive(),
});

export type QueryPlanSpec = { template: PromptTemplate; sourceId: string; maxWords: number };

export const RetrievalConfigSchema = z.object({
  queries: z
    .object({
      model: ModelNameSchema.default("gpt-4-1106-preview"),
      temperature: z.number().min(0).max(2).default(0),
      /** Generated queries requested per plan */
      numKeywords: z.number().int().positive().default(3),
      plans: z.array(queryPlanSchema).min(1).default(defaultQueryPlans),
    })
    .default({}),

  articlesPerQuery: z.number().int().positive().default(5),

  /** Characters; shorter documents are discarded */
  minArticleLength: z.number().int().nonnegative().default(200),

  prefilter: z
    .object({
      enabled: z.boolean().default(true),
      minPoolSize: z.number().int().nonnegative().default(25),
      threshold: z.number().min(-1).max(1).default(0.32),
      largePoolSize: z.number().int().positive().default(100),
      largePoolThreshold: z.number().min(-1).max(1).default(0.36),
      maxTextChars: z.number().int().positive().default(18_000),
    })
    .default({}),

  ranking: z
    .object({
      method: z.enum(RANKING_METHODS).default("model-rating"),
      model: ModelNameSchema.default("gpt-3.5-turbo-1106"),
      temperature: z.number().min(0).max(2).default(0),
      template: templateSchemaFor("relevance").default(RELEVANCE_RATING),
      detail: z.enum(RATING_DETAILS).default("title-excerpt"),
      ratingThreshold: z.number().default(4),
      similarityThreshold: z.number().min(-1).max(1).default(0.5),
      sortBy: z.enum(SORT_KEYS).default("date"),
    })
    .default({}),

  summarization: z
    .object({
      model: ModelNameSchema.default("gpt-3.5-turbo-1106"),
      temperature: z.number().min(0).max(2).default(0.2),
      template: templateSchemaFor("summarization").default(SUMMARIZATION),
      /** Appended as a length instruction when set */
      maxWords: z.number().int().positive().optional(),
      marginTokens: z.number().int().nonnegative().default(1_000),
      maxDepth: z.number().int().positive().default(8),
    })
    .default({}),

  maxSummarizedArticles: z.number().int().positive().default(20),

  extractBackgroundUrls: z.boolean().default(true),
});

export type RetrievalConfigInput = z.input<typeof RetrievalConfigSchema>;
export type RetrievalConfig = DeepReadonly<z.output<typeof RetrievalConfigSchema>>;

/**
 * Defaults overlaid with caller overrides, validated and frozen
 */
export function createRetrievalConfig(overrides: RetrievalConfigInput = {}): RetrievalConfig {
  const parsed = RetrievalConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ConfigError(`Invalid retrieval config: ${formatZodIssues(parsed.error)}`, {
      issues: parsed.error.issues,
    });
  }
  return deepFreeze(parsed.data);
}
