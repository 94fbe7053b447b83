/**
 * Retrieval Types
 */

import type { DateRange } from "@foresight/news";

// ============================================
// ARTICLES
// ============================================

/**
 * A normalized piece of evidence. Records are never mutated; stages return
 * copies or id-addressed patches.
 */
export interface Article {
  /** Unique within one retrieval pass */
  readonly id: number;
  readonly title: string;

  /** Canonical link, part of the dedup key */
  readonly link: string;

  /** YYYY-MM-DD, or null when the source gave no date */
  readonly publishedAt: string | null;
  readonly text: string;

  /** Starts as the full text; never longer than it */
  readonly summary: string;

  /** 1-6 for model ratings, -1..1 for embedding similarity */
  readonly relevanceRating: number | null;
  readonly relevanceReasoning: string | null;

  /** The query that surfaced the article */
  readonly searchTerm: string;
  readonly sourceSite: string;
}

export type ArticlePatch = { readonly id: number } & Partial<Omit<Article, "id">>;

// ============================================
// QUERIES
// ============================================

/** Template id for the question text appended to every query list */
export const QUESTION_QUERY_TEMPLATE_ID = "question";

export interface SearchQuery {
  text: string;
  templateId: string;
}

/**
 * Query lists keyed by source id
 */
export type QueryPlan = Record<string, SearchQuery[]>;

// ============================================
// QUESTION CONTEXT
// ============================================

/**
 * The parts of a forecasting question the retrieval stages read
 */
export interface QuestionContext {
  question: string;
  background: string;
  resolutionCriteria: string;
  retrievalDates: DateRange;
}

// ============================================
// STAGE RESULTS
// ============================================

export interface PrefilterResult {
  articles: Article[];

  /** Cosine similarity of each kept article, by id */
  similarities: Map<number, number>;
  threshold: number;
}

export interface RetrievalResult {
  queryPlan: QueryPlan;

  /** Every article retrieved, after dedup */
  allArticles: Article[];

  /** Rated, filtered, sorted; at most maxSummarizedArticles, summarized */
  rankedArticles: Article[];

  /** Evidence block handed to forecasters */
  digest: string;
}
