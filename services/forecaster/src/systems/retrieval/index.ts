/**
 * Retrieval System
 * Evidence gathering for a forecasting question
 */

export * from "./types.js";
export * from "./config.js";
export { planSearchQueries } from "./query-planner.js";
export { retrieveArticles, dedupeArticles, toArticle } from "./retriever.js";
export { prefilterArticles, prefilterThreshold, questionEmbeddingText, type PrefilterSettings } from "./prefilter.js";
export {
  rateArticles,
  sortAndFilterArticles,
  applyPatches,
  articleForRating,
  relevanceThreshold,
  type RankingDependencies,
  type RankingSettings,
  type SortAndFilterOptions,
} from "./ranker.js";
export {
  recursiveSummarize,
  summarizeArticles,
  buildDigest,
  chunkBudget,
  EMPTY_DIGEST,
  type SummarizationSettings,
} from "./summarizer.js";
export {
  retrieveBackgroundArticles,
  backgroundUrls,
  BACKGROUND_SEARCH_TERM,
  type PageSource,
  type BackgroundOptions,
} from "./background.js";
export {
  retrieveSummarizeAndRank,
  type RetrievalDependencies,
  type RetrievalInput,
} from "./pipeline.js";
