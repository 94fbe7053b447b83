/**
 * Relevance Ranker
 * Rates articles against the question, then filters and orders them
 */

import { logger, ValidationError } from "@foresight/core";
import type { ICompletion } from "../../shared/executor/types.js";
import type { IEmbedder } from "../../shared/embedding/types.js";
import { cosineSimilarity } from "../../shared/embedding/similarity.js";
import { renderTemplate } from "../../shared/prompt/registry.js";
import { extractRating } from "../../shared/parsing/response.js";
import { SORT_KEYS, type RatingDetail, type RetrievalConfig, type SortKey } from "./config.js";
import { questionEmbeddingText } from "./prefilter.js";
import type { Article, ArticlePatch, QuestionContext } from "./types.js";

const log = logger.child({ component: "ranker" });

const EXCERPT_CHARS = 1_000;
const FULL_TEXT_CHARS = 40_000;
const EMBEDDING_TEXT_CHARS = 18_000;

export type RankingSettings = RetrievalConfig["ranking"];

export interface RankingDependencies {
  completion: ICompletion;
  embedder: IEmbedder;
}

// ============================================
// PATCHES
// ============================================

/**
 * Copy of `articles` with each patch merged into the article sharing its id
 */
export function applyPatches(articles: readonly Article[], patches: readonly ArticlePatch[]): Article[] {
  const byId = new Map<number, ArticlePatch>();
  for (const patch of patches) {
    byId.set(patch.id, { ...byId.get(patch.id), ...patch });
  }
  return articles.map((article) => {
    const patch = byId.get(article.id);
    return patch ? { ...article, ...patch } : article;
  });
}

// ============================================
// RATING
// ============================================

export function articleForRating(article: Article, detail: RatingDetail): string {
  switch (detail) {
    case "title":
      return `Title: ${article.title}`;
    case "title-excerpt":
      return `Title: ${article.title}\n${article.text.slice(0, EXCERPT_CHARS)}`;
    case "full-text":
      return article.text.slice(0, FULL_TEXT_CHARS);
  }
}

async function rateWithModel(
  context: QuestionContext,
  articles: readonly Article[],
  completion: ICompletion,
  settings: RankingSettings
): Promise<ArticlePatch[]> {
  const requests = articles.map((article) => ({
    model: settings.model,
    temperature: settings.temperature,
    prompt: renderTemplate(settings.template, {
      question: context.question,
      background: context.background,
      resolution_criteria: context.resolutionCriteria,
      article: articleForRating(article, settings.detail),
    }),
  }));

  const responses = await completion.completeAll(requests);

  return articles.map((article, index) => ({
    id: article.id,
    relevanceRating: extractRating(responses[index]),
    relevanceReasoning: responses[index],
  }));
}

async function rateWithEmbeddings(
  context: QuestionContext,
  articles: readonly Article[],
  embedder: IEmbedder,
  known: ReadonlyMap<number, number>
): Promise<ArticlePatch[]> {
  const missing = articles.filter((article) => !known.has(article.id));
  const similarities = new Map(known);

  if (missing.length > 0) {
    const vectors = await embedder.embed([
      questionEmbeddingText(context),
      ...missing.map((article) => article.text.slice(0, EMBEDDING_TEXT_CHARS)),
    ]);
    if (vectors.length !== missing.length + 1) {
      throw new ValidationError(`Expected ${missing.length + 1} embeddings, received ${vectors.length}`, {
        field: "embeddings",
        expected: String(missing.length + 1),
        received: String(vectors.length),
        context: { articles: missing.map((article) => article.id) },
      });
    }

    const [questionVector, ...articleVectors] = vectors;
    missing.forEach((article, index) => {
      similarities.set(article.id, cosineSimilarity(questionVector, articleVectors[index]));
    });
  }

  return articles.map((article) => ({
    id: article.id,
    relevanceRating: similarities.get(article.id) ?? null,
    relevanceReasoning: null,
  }));
}

/**
 * Rating patches for every article. With embeddings, similarities already
 * computed by the pre-filter are reused.
 */
export async function rateArticles(
  context: QuestionContext,
  articles: readonly Article[],
  deps: RankingDependencies,
  settings: RankingSettings,
  knownSimilarities: ReadonlyMap<number, number> = new Map()
): Promise<ArticlePatch[]> {
  if (articles.length === 0) return [];

  const stop = log.time("rating", { method: settings.method, count: articles.length });
  const patches =
    settings.method === "model-rating"
      ? await rateWithModel(context, articles, deps.completion, settings)
      : await rateWithEmbeddings(context, articles, deps.embedder, knownSimilarities);
  stop();

  return patches;
}

/**
 * Minimum rating kept for the configured method
 */
export function relevanceThreshold(settings: Pick<RankingSettings, "method" | "ratingThreshold" | "similarityThreshold">): number {
  return settings.method === "model-rating" ? settings.ratingThreshold : settings.similarityThreshold;
}

// ============================================
// SORT / FILTER
// ============================================

export interface SortAndFilterOptions {
  sortBy: string;
  threshold: number;

  /** Stands in for missing publish dates */
  retrievalEnd: string;
}

function isSortKey(value: string): value is SortKey {
  return SORT_KEYS.some((key) => key === value);
}

/**
 * Drop unrated and below-threshold articles, then order by rating or date
 * (both descending, ties keep their input order).
 */
export function sortAndFilterArticles(articles: readonly Article[], options: SortAndFilterOptions): Article[] {
  const { sortBy, threshold, retrievalEnd } = options;
  if (!isSortKey(sortBy)) {
    throw new ValidationError(`Unknown sort key: ${sortBy}`, {
      field: "sortBy",
      expected: SORT_KEYS.join(" | "),
      received: sortBy,
    });
  }

  const kept = articles.filter(
    (article) => article.relevanceRating !== null && article.relevanceRating >= threshold
  );

  if (sortBy === "relevance") {
    return [...kept].sort((a, b) => (b.relevanceRating ?? 0) - (a.relevanceRating ?? 0));
  }

  return kept
    .map((article) => (article.publishedAt ? article : { ...article, publishedAt: retrievalEnd }))
    .sort((a, b) => (b.publishedAt ?? "").localeCompare(a.publishedAt ?? ""));
}
