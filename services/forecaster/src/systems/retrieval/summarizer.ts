/**
 * Recursive Summarizer
 * Compresses article text to fit the summarization model, chunking and
 * re-summarizing when the text is over the model's input limit
 */

import { logger } from "@foresight/core";
import type { ICompletion } from "../../shared/executor/types.js";
import { getModelTokenLimit } from "../../shared/executor/models.js";
import { renderTemplate } from "../../shared/prompt/registry.js";
import { countTokens, splitIntoChunks } from "../../shared/parsing/tokens.js";
import type { RetrievalConfig } from "./config.js";
import type { Article, QuestionContext } from "./types.js";

const log = logger.child({ component: "summarizer" });

export type SummarizationSettings = RetrievalConfig["summarization"];

/**
 * Chunk budget: the model limit minus the margin, but never below half the limit
 */
export function chunkBudget(limit: number, marginTokens: number): number {
  return Math.max(limit - marginTokens, Math.floor(limit / 2), 1);
}

async function summarizeOnce(
  text: string,
  context: Pick<QuestionContext, "question" | "background">,
  completion: ICompletion,
  settings: SummarizationSettings
): Promise<string> {
  let prompt = renderTemplate(settings.template, {
    question: context.question,
    background: context.background,
    article: text,
  });
  if (settings.maxWords !== undefined) {
    prompt += `\n\nKeep the summary under ${settings.maxWords} words.`;
  }

  const summary = await completion.complete({
    model: settings.model,
    temperature: settings.temperature,
    prompt,
  });

  // A summary never grows the text
  return summary.length > text.length ? text : summary;
}

/**
 * Summarize `text` so the result fits the model's token limit.
 *
 * Text over the limit is split into word-aligned chunks, each chunk is
 * summarized, and the joined summaries are summarized again. A pass that
 * fails to shrink the text, or reaching `maxDepth`, falls back to the first
 * chunk only.
 */
export async function recursiveSummarize(
  text: string,
  context: Pick<QuestionContext, "question" | "background">,
  completion: ICompletion,
  settings: SummarizationSettings,
  depth = 0
): Promise<string> {
  const limit = getModelTokenLimit(settings.model);
  if (countTokens(text, settings.model) <= limit) {
    return summarizeOnce(text, context, completion, settings);
  }

  const chunks = splitIntoChunks(text, chunkBudget(limit, settings.marginTokens), settings.model);

  if (depth >= settings.maxDepth) {
    log.warn("Summarization depth limit reached, truncating", { depth, chunks: chunks.length });
    return summarizeOnce(chunks[0], context, completion, settings);
  }

  const summaries = await Promise.all(
    chunks.map((chunk) => recursiveSummarize(chunk, context, completion, settings, depth + 1))
  );
  const joined = summaries.join(" ");

  if (joined.length >= text.length) {
    log.warn("Summarization pass did not shrink text, truncating", { depth, length: text.length });
    return summarizeOnce(chunks[0], context, completion, settings);
  }

  return recursiveSummarize(joined, context, completion, settings, depth + 1);
}

/**
 * Summarized copies of every article, all in flight together
 */
export async function summarizeArticles(
  context: Pick<QuestionContext, "question" | "background">,
  articles: readonly Article[],
  completion: ICompletion,
  settings: SummarizationSettings
): Promise<Article[]> {
  const stop = log.time("summarization", { count: articles.length });
  const summaries = await Promise.all(
    articles.map((article) => recursiveSummarize(article.text, context, completion, settings))
  );
  stop();

  return articles.map((article, index) => ({ ...article, summary: summaries[index] }));
}

export const EMPTY_DIGEST = "---\nNo articles were retrieved for this question.\n----";

/**
 * Numbered evidence block handed to forecasters
 */
export function buildDigest(articles: readonly Pick<Article, "title" | "publishedAt" | "summary">[]): string {
  if (articles.length === 0) {
    return EMPTY_DIGEST;
  }

  const items = articles.map(
    (article, index) =>
      `[${index + 1}] ${article.title} (published on ${article.publishedAt ?? "unknown date"})\nSummary: ${article.summary}\n`
  );
  return "---\nARTICLES\n" + items.join("\n") + "----";
}
