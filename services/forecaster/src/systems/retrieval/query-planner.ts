/**
 * Query Planner
 * Turns a question into search query lists, one per document source
 */

import { logger } from "@foresight/core";
import { cleanNewsCatcherQuery } from "@foresight/news";
import type { ICompletion } from "../../shared/executor/types.js";
import { renderTemplate } from "../../shared/prompt/registry.js";
import { extractSearchQueries } from "../../shared/parsing/response.js";
import { NEWSCATCHER_SOURCE_ID, type RetrievalConfig } from "./config.js";
import { QUESTION_QUERY_TEMPLATE_ID, type QueryPlan, type QuestionContext, type SearchQuery } from "./types.js";

const log = logger.child({ component: "query-planner" });

function cleanForSource(sourceId: string, text: string): string {
  return sourceId === NEWSCATCHER_SOURCE_ID ? cleanNewsCatcherQuery(text) : text.trim();
}

function dedupeQueries(queries: SearchQuery[]): SearchQuery[] {
  const seen = new Set<string>();
  return queries.filter((query) => {
    if (query.text.length === 0 || seen.has(query.text)) return false;
    seen.add(query.text);
    return true;
  });
}

/**
 * One completion per configured plan, all in flight together. Each source
 * gets its generated queries followed by the question itself.
 */
export async function planSearchQueries(
  context: QuestionContext,
  config: RetrievalConfig,
  completion: ICompletion
): Promise<QueryPlan> {
  const { plans, model, temperature, numKeywords } = config.queries;

  const requests = plans.map((plan) => ({
    model,
    temperature,
    prompt: renderTemplate(plan.template, {
      question: context.question,
      background: context.background,
      resolution_criteria: context.resolutionCriteria,
      date_begin: context.retrievalDates.start,
      date_end: context.retrievalDates.end,
      num_keywords: numKeywords,
      max_words: plan.maxWords,
    }),
  }));

  const responses = await completion.completeAll(requests);

  const grouped = new Map<string, SearchQuery[]>();
  plans.forEach((plan, index) => {
    const extracted = extractSearchQueries(responses[index]);
    if (extracted.length !== numKeywords) {
      log.warn("Query count differs from the requested count", {
        templateId: plan.template.id,
        source: plan.sourceId,
        requested: numKeywords,
        received: extracted.length,
      });
    }

    const queries = extracted.slice(0, numKeywords).map((text) => ({
      text: cleanForSource(plan.sourceId, text),
      templateId: plan.template.id,
    }));
    grouped.set(plan.sourceId, [...(grouped.get(plan.sourceId) ?? []), ...queries]);
  });

  const queryPlan: QueryPlan = {};
  for (const [sourceId, queries] of grouped) {
    const question = { text: cleanForSource(sourceId, context.question), templateId: QUESTION_QUERY_TEMPLATE_ID };
    queryPlan[sourceId] = dedupeQueries([...queries, question]);
  }

  log.info("Planned search queries", {
    sources: Object.keys(queryPlan),
    total: Object.values(queryPlan).reduce((sum, queries) => sum + queries.length, 0),
  });

  return queryPlan;
}
