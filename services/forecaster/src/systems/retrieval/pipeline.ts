/**
 * Retrieval Pass
 * Query planning → retrieval → pre-filter → rating → sort/filter →
 * background pages → summarization → digest
 */

import { logger } from "@foresight/core";
import type { DocumentSource } from "@foresight/news";
import type { ICompletion } from "../../shared/executor/types.js";
import type { IEmbedder } from "../../shared/embedding/types.js";
import { backgroundUrls, retrieveBackgroundArticles, type PageSource } from "./background.js";
import type { RetrievalConfig } from "./config.js";
import { prefilterArticles } from "./prefilter.js";
import { planSearchQueries } from "./query-planner.js";
import { applyPatches, rateArticles, relevanceThreshold, sortAndFilterArticles } from "./ranker.js";
import { retrieveArticles } from "./retriever.js";
import { buildDigest, summarizeArticles } from "./summarizer.js";
import type { QuestionContext, RetrievalResult } from "./types.js";

export interface RetrievalDependencies {
  completion: ICompletion;
  embedder: IEmbedder;
  sources: readonly DocumentSource[];
  pages: PageSource;
}

export interface RetrievalInput extends QuestionContext {
  urlsInBackground?: readonly string[];
}

export async function retrieveSummarizeAndRank(
  input: RetrievalInput,
  config: RetrievalConfig,
  deps: RetrievalDependencies
): Promise<RetrievalResult> {
  const log = logger.child({ component: "retrieval", question: input.question.slice(0, 80) });
  const stopTotal = log.time("retrieval_pass");

  let stop = log.time("query_planning");
  const queryPlan = await planSearchQueries(input, config, deps.completion);
  stop();

  stop = log.time("search");
  const allArticles = await retrieveArticles(queryPlan, input.retrievalDates, deps.sources, config);
  stop();
  log.metric("articles_retrieved", allArticles.length);

  let pool = allArticles;
  let similarities: ReadonlyMap<number, number> = new Map();
  if (config.prefilter.enabled) {
    const filtered = await prefilterArticles(input, pool, deps.embedder, config.prefilter);
    if (filtered) {
      pool = filtered.articles;
      similarities = filtered.similarities;
      log.metric("articles_after_prefilter", pool.length);
    }
  }

  const patches = await rateArticles(input, pool, deps, config.ranking, similarities);
  let ranked = sortAndFilterArticles(applyPatches(pool, patches), {
    sortBy: config.ranking.sortBy,
    threshold: relevanceThreshold(config.ranking),
    retrievalEnd: input.retrievalDates.end,
  });
  log.metric("articles_relevant", ranked.length);

  if (config.extractBackgroundUrls) {
    const urls = backgroundUrls(input.background, input.urlsInBackground);
    if (urls.length > 0) {
      const background = await retrieveBackgroundArticles(urls, ranked, deps.pages, {
        minArticleLength: config.minArticleLength,
        retrievalEnd: input.retrievalDates.end,
        firstId: allArticles.reduce((max, article) => Math.max(max, article.id), -1) + 1,
      });
      ranked = [...background, ...ranked];
    }
  }

  const top = ranked.slice(0, config.maxSummarizedArticles);
  const rankedArticles = await summarizeArticles(input, top, deps.completion, config.summarization);
  const digest = buildDigest(rankedArticles);

  stopTotal();
  return { queryPlan, allArticles, rankedArticles, digest };
}
