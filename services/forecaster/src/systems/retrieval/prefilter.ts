/**
 * Embedding Pre-Filter
 * Cheap similarity cut applied to large pools before model rating
 */

import { logger } from "@foresight/core";
import type { IEmbedder } from "../../shared/embedding/types.js";
import { cosineSimilarity } from "../../shared/embedding/similarity.js";
import type { RetrievalConfig } from "./config.js";
import type { Article, PrefilterResult, QuestionContext } from "./types.js";

const log = logger.child({ component: "prefilter" });

export type PrefilterSettings = RetrievalConfig["prefilter"];

export function questionEmbeddingText(context: Pick<QuestionContext, "question" | "background">): string {
  return `Question: ${context.question}\n\nBackground:${context.background}`;
}

export function prefilterThreshold(poolSize: number, settings: PrefilterSettings): number {
  return poolSize >= settings.largePoolSize ? settings.largePoolThreshold : settings.threshold;
}

/**
 * Keep articles whose similarity to the question is above the threshold.
 *
 * Null means the filter did not run (pool too small, or embeddings failed)
 * and the caller should carry on with the unfiltered pool.
 */
export async function prefilterArticles(
  context: QuestionContext,
  articles: readonly Article[],
  embedder: IEmbedder,
  settings: PrefilterSettings
): Promise<PrefilterResult | null> {
  if (articles.length < settings.minPoolSize) {
    log.debug("Pool below pre-filter minimum", { poolSize: articles.length, minPoolSize: settings.minPoolSize });
    return null;
  }

  const texts = [
    questionEmbeddingText(context),
    ...articles.map((article) => article.text.slice(0, settings.maxTextChars)),
  ];

  let vectors: number[][];
  try {
    vectors = await embedder.embed(texts);
  } catch (error) {
    log.error("Embedding failed, skipping pre-filter", error, { poolSize: articles.length });
    return null;
  }

  if (vectors.length !== texts.length) {
    log.warn("Embedding count mismatch, skipping pre-filter", { expected: texts.length, received: vectors.length });
    return null;
  }

  const [questionVector, ...articleVectors] = vectors;
  const threshold = prefilterThreshold(articles.length, settings);
  const similarities = new Map<number, number>();
  const kept: Article[] = [];

  articles.forEach((article, index) => {
    const similarity = cosineSimilarity(questionVector, articleVectors[index]);
    if (similarity > threshold) {
      kept.push(article);
      similarities.set(article.id, similarity);
    }
  });

  log.info("Pre-filtered articles", { before: articles.length, after: kept.length, threshold });
  return { articles: kept, similarities, threshold };
}
