/**
 * Prompt Library
 * Built-in templates. Configs reference these objects explicitly.
 */

import { PromptRegistry, definePrompt } from "./registry.js";
import type { PromptTemplate } from "./types.js";

const QUESTION_BLOCK = `Question:
{{question}}

Question Background:
{{background}}`;

const FULL_QUESTION_BLOCK = `${QUESTION_BLOCK}

Resolution Criteria:
{{resolution_criteria}}

Today's date: {{date_begin}}
Question close date: {{date_end}}`;

// ============================================
// SEARCH QUERIES
// ============================================

export const SEARCH_QUERY_SUBQUESTIONS = definePrompt({
  id: "search-query-subquestions",
  role: "search-query",
  description: "Break the question into sub-questions, then derive queries",
  template: `You are helping research a forecasting question. Read the question and its background, then write short news search queries (at most {{max_words}} words each).

${QUESTION_BLOCK}

Today's date: {{date_begin}}
Question close date: {{date_end}}

Produce exactly {{num_keywords}} queries.

First list the sub-questions whose answers would most change the forecast, then turn them into queries.

Respond in this format:
Thoughts:
{ your sub-questions and reasoning }
Search Queries:
{ the queries, separated by semicolons }`,
});

export const SEARCH_QUERY_BRIEF = definePrompt({
  id: "search-query-brief",
  role: "search-query",
  description: "Direct query generation",
  template: `${QUESTION_BLOCK}

Today's date: {{date_begin}}
Question close date: {{date_end}}

Write {{num_keywords}} brief news search queries (up to {{max_words}} words each) that would surface recent information likely to move this forecast.

Respond in this format:
Thoughts:
{ your reasoning }
Search Queries:
{ the queries, separated by semicolons }`,
});

// ============================================
// RELEVANCE / SUMMARIZATION
// ============================================

export const RELEVANCE_RATING = definePrompt({
  id: "relevance-1to6",
  role: "relevance",
  template: `Consider the forecasting question below. I will then show you a news article; rate how relevant it is to the question.

${QUESTION_BLOCK}

Resolution Criteria:
{{resolution_criteria}}

Article:
{{article}}

Rate relevance from 1 to 6:
1 - irrelevant
2 - slightly relevant
3 - somewhat relevant
4 - relevant
5 - highly relevant
6 - most relevant

Notes:
- Judge only from the text provided.
- Weigh the article's content over its headline.
- If the text is a paywall, cookie banner, JavaScript warning or similar error page, rate it 1.

Respond in this format:
Thoughts: { your reasoning }
Rating: { a single integer }`,
});

export const SUMMARIZATION = definePrompt({
  id: "summarize-for-question",
  role: "summarization",
  template: `I want to forecast the following question:

${QUESTION_BLOCK}

Summarize the article below, keeping every fact, figure, date and quote that could bear on the question. Do not add opinions or information that is not in the article. If the article says nothing relevant, say so in one sentence.

Article:
{{article}}`,
});

// ============================================
// REASONING
// ============================================

export const REASONING_SCRATCHPAD = definePrompt({
  id: "reasoning-scratchpad",
  role: "base-reasoning",
  description: "Reasons for and against, then a starred probability",
  template: `${FULL_QUESTION_BLOCK}

Retrieved information:
{{retrieved_info}}

Instructions:
1. Give at least three reasons the answer could be no.
2. Give at least three reasons the answer could be yes.
3. Rate the strength of each reason as a careful superforecaster would.
4. Weigh everything into an overall judgement.
5. Give your final probability (a number between 0 and 1) surrounded by asterisks, e.g. *0.35*.`,
});

export const REASONING_BASE_RATES = definePrompt({
  id: "reasoning-base-rates",
  role: "base-reasoning",
  description: "Base rates and recalled facts before adjusting",
  template: `${FULL_QUESTION_BLOCK}

Retrieved information:
{{retrieved_info}}

Instructions:
1. Note any relevant facts you already know that are not in the retrieved information.
2. Estimate a base rate for events of this kind.
3. List the strongest evidence pushing the probability up and down from that base rate.
4. Consider how much time remains before the close date and whether the status quo is likely to hold.
5. Give your final probability (a number between 0 and 1) surrounded by asterisks, e.g. *0.35*.`,
});

export const REASONING_TOKENS = definePrompt({
  id: "reasoning-tokens",
  role: "base-reasoning",
  description: "Reasoning that ends on a likelihood phrase",
  template: `${FULL_QUESTION_BLOCK}

Retrieved information:
{{retrieved_info}}

Instructions:
1. Give the main reasons the answer could be no.
2. Give the main reasons the answer could be yes.
3. Weigh them into an overall judgement.
4. End your response with exactly one of the following phrases: {{answer_options}}.`,
});

export const META_REASONING = definePrompt({
  id: "meta-aggregate",
  role: "meta-reasoning",
  template: `I need help making a final forecast.

Question: {{question}}

Background: {{background}}

Resolution criteria: {{resolution_criteria}}

Today's date: {{date_begin}}
Question close date: {{date_end}}

Retrieved information:
{{retrieved_info}}

Several forecasters have already answered this question:
{{base_reasonings}}

Your job is to combine their reasoning with the retrieved information into one final forecast.

Instructions:
1. Summarize where the forecasters agree and disagree.
2. Point out reasoning errors or missed evidence.
3. Weigh the considerations.
4. Give your final probability (a number between 0 and 1) surrounded by asterisks, e.g. *0.35*.`,
});

export const ALIGNMENT_RATING = definePrompt({
  id: "alignment-1to6",
  role: "alignment",
  template: `${QUESTION_BLOCK}

Resolution Criteria:
{{resolution_criteria}}

Forecaster's reasoning:
{{reasoning}}

Task: judge whether the reasoning supports the prediction it ends with. If someone saw only the reasoning, without the final prediction, would they reach the same prediction?

Ratings:
1 - very misaligned
2 - misaligned
3 - slightly misaligned
4 - slightly aligned
5 - aligned
6 - very aligned

If the reasoning says the question is outdated or already resolved, rate it 1.

Respond in this format:
Thinking: { your reasoning }
Rating: { a single integer from 1 to 6 }`,
});

// ============================================
// LABELING
// ============================================

export const QUESTION_CATEGORY = definePrompt({
  id: "question-category",
  role: "category",
  template: `Question: {{question}}

Background: {{background}}

Categories:
{{categories}}

Assign the question to exactly one of the categories above. Reply with the category name only, copied exactly, and nothing else.

Category:`,
});

export const QUESTION_ILL_DEFINED = definePrompt({
  id: "question-ill-defined",
  role: "ill-defined",
  template: `Some forecasting questions cannot be understood on their own: they refer to an unnamed event, rely on context that is missing, or have no clear resolution. Decide whether the question below is well defined.

Question: {{question}}

Respond in this format:
Reasoning: { one or two sentences }
Classification: { "ok" if the question is well defined, otherwise "flag" }`,
});

export const BUILTIN_PROMPTS: readonly PromptTemplate[] = Object.freeze([
  SEARCH_QUERY_SUBQUESTIONS,
  SEARCH_QUERY_BRIEF,
  RELEVANCE_RATING,
  SUMMARIZATION,
  REASONING_SCRATCHPAD,
  REASONING_BASE_RATES,
  REASONING_TOKENS,
  META_REASONING,
  ALIGNMENT_RATING,
  QUESTION_CATEGORY,
  QUESTION_ILL_DEFINED,
]);

/**
 * Fresh registry holding the built-in templates
 */
export function createDefaultPromptRegistry(): PromptRegistry {
  return new PromptRegistry(BUILTIN_PROMPTS);
}
