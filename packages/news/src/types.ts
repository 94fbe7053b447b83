/**
 * News Types
 * Source contract, normalized payload and provider response schemas
 */

import { z } from "zod";

// ============================================
// SOURCE CONTRACT
// ============================================

/**
 * Inclusive publication window, ISO dates (YYYY-MM-DD)
 */
export interface DateRange {
  start: string;
  end: string;
}

/**
 * A document as returned by a source, before it becomes an Article
 */
export interface RawDocument {
  title: string;
  link: string;
  text: string;
  publishedAt: string | null;
  sourceSite: string;
}

export interface SearchOptions {
  /** Maximum documents to return for this query */
  limit: number;
}

/**
 * Document-retrieval capability
 */
export interface DocumentSource {
  /** Stable identifier, also used to route query lists */
  readonly id: string;

  search(query: string, range: DateRange, options: SearchOptions): Promise<RawDocument[]>;
}

/**
 * Result of extracting a single web page
 */
export interface ExtractedPage {
  url: string;
  title: string;
  text: string;
  publishedAt: string | null;
  siteName: string;
}

// ============================================
// NEWSCATCHER SCHEMAS
// ============================================

export const NewsCatcherArticleSchema = z.object({
  title: z.string().nullish(),
  link: z.string(),
  published_date: z.string().nullish(),
  clean_url: z.string().nullish(),
  summary: z.string().nullish(),
  excerpt: z.string().nullish(),
  rights: z.string().nullish(),
});

// "No matches" responses omit the articles field entirely
export const NewsCatcherSearchResponseSchema = z.object({
  status: z.string(),
  total_hits: z.number().optional(),
  articles: z.array(NewsCatcherArticleSchema).optional(),
});

export type NewsCatcherArticle = z.infer<typeof NewsCatcherArticleSchema>;
export type NewsCatcherSearchResponse = z.infer<typeof NewsCatcherSearchResponseSchema>;
