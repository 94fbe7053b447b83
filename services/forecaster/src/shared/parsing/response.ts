/**
 * Response Parsing
 * Pure extraction of queries, ratings, probabilities and likelihood phrases
 * from free-text model output. Nothing here throws on malformed input.
 */

import { logger } from "@foresight/core";

const log = logger.child({ component: "parsing" });

export const DEFAULT_PROBABILITY = 0.5;
export const DEFAULT_RATING = 1;
export const RATING_SCALE = { min: 1, max: 6 } as const;

const SEARCH_QUERIES_MARKER = "Search Queries:";
const TOKEN_WINDOW_WORDS = 50;

// ============================================
// SEARCH QUERIES
// ============================================

function stripQueryEdges(value: string): string {
  return value.replace(/^[.\-;\s]+|[.\-;\s]+$/g, "");
}

/**
 * Queries listed after "Search Queries:", separated by semicolons
 */
export function extractSearchQueries(response: string): string[] {
  const markerAt = response.indexOf(SEARCH_QUERIES_MARKER);
  if (markerAt === -1) {
    log.warn("No search query marker in response", { preview: response.slice(-200) });
    return [];
  }

  const flattened = response
    .slice(markerAt + SEARCH_QUERIES_MARKER.length)
    .split(/\r?\n/)
    .map((line) => line.trim())
    .join(" ");

  return flattened
    .split(";")
    .map((part) => stripQueryEdges(part.replace(/"/g, "")))
    .filter((query) => query.length > 0);
}

// ============================================
// RATINGS
// ============================================

function parseRatingToken(token: string | undefined): number | null {
  if (token === undefined) return null;
  const cleaned = token.replace(/[*.,]/g, "");
  if (!/^\d+$/.test(cleaned)) return null;
  const value = Number(cleaned);
  return value >= RATING_SCALE.min && value <= RATING_SCALE.max ? value : null;
}

/**
 * 1-6 rating from either a leading integer or the token after "Rating:".
 * Anything unparseable or out of scale is the lowest rating.
 */
export function extractRating(response: string): number {
  const leading = parseRatingToken(response.trim().split(/\s+/)[0]);
  if (leading !== null) return leading;

  const parts = response.split("Rating:");
  if (parts.length > 1) {
    const afterMarker = parseRatingToken(parts[1].trim().split(/\s+/)[0]);
    if (afterMarker !== null) return afterMarker;
  }

  return DEFAULT_RATING;
}

// ============================================
// PROBABILITIES
// ============================================

function lastProbability(values: number[]): number | null {
  if (values.length === 0) return null;
  const last = values[values.length - 1];
  return last <= 1 ? last : null;
}

/**
 * Probability from a starred answer such as *0.35* or *35%*.
 *
 * The last starred number wins. Failing that, numbers directly before a star
 * are tried. Defaults to 0.5.
 */
export function extractProbability(response: string): number {
  const starred: number[] = [];
  for (const match of response.matchAll(/\*(.*?[\d.]+.*?)\*/g)) {
    const inner = match[1];
    const numeric = /[\d.]+/.exec(inner);
    if (!numeric) continue;
    const value = Number(numeric[0]);
    if (Number.isNaN(value)) continue;
    starred.push(inner.includes("%") ? value / 100 : value);
  }

  const fromStars = lastProbability(starred);
  if (fromStars !== null) return fromStars;

  const beforeStar: number[] = [];
  for (const match of response.matchAll(/([\d.]+.*?)\*/g)) {
    for (const numeric of match[1].matchAll(/[\d.]+/g)) {
      const value = Number(numeric[0]);
      if (!Number.isNaN(value)) beforeStar.push(value);
    }
  }

  return lastProbability(beforeStar) ?? DEFAULT_PROBABILITY;
}

// ============================================
// VOCABULARY TOKENS
// ============================================

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function wordCount(value: string): number {
  return value.trim().split(/\s+/).length;
}

/**
 * Find a vocabulary phrase near the end of a response. Phrases with more
 * words win so "Very Likely" is not read as "Likely"; among equals the one
 * appearing last wins. Matching is case-sensitive on word boundaries.
 */
export function extractVocabularyToken(response: string, vocabulary: readonly string[]): string | null {
  const window = response.trim().split(/\s+/).slice(-TOKEN_WINDOW_WORDS).join(" ");

  let best: { token: string; words: number; position: number } | null = null;
  for (const token of vocabulary) {
    const pattern = new RegExp(`(?<![A-Za-z])${escapeRegExp(token)}(?![A-Za-z])`, "g");
    let position = -1;
    for (const match of window.matchAll(pattern)) {
      position = match.index ?? position;
    }
    if (position === -1) continue;

    const words = wordCount(token);
    if (!best || words > best.words || (words === best.words && position > best.position)) {
      best = { token, words, position };
    }
  }

  if (!best) {
    log.debug("No vocabulary token in response tail", { tail: window.slice(-120) });
    return null;
  }
  return best.token;
}
