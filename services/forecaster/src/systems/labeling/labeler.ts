/**
 * Question Labeler
 * Category and ill-definedness labels for question sets, run on a worker pool
 */

import { logger } from "@foresight/core";
import type { ICompletion } from "../../shared/executor/types.js";
import type { PromptTemplate } from "../../shared/prompt/types.js";
import { renderTemplate } from "../../shared/prompt/registry.js";
import { QUESTION_CATEGORY, QUESTION_ILL_DEFINED } from "../../shared/prompt/library.js";
import { runWorkerPool } from "../../shared/concurrency/pool.js";
import { QUESTION_CATEGORIES, isQuestionCategory, type QuestionCategory } from "./categories.js";

const log = logger.child({ component: "labeler" });

const CLASSIFICATION_MARKER = "Classification:";

export interface LabelerOptions {
  model: string;
  temperature?: number;
  categoryTemplate?: PromptTemplate;
  illDefinedTemplate?: PromptTemplate;

  /** Attempts per call (default 3) */
  maxAttempts?: number;
}

export interface LabelableQuestion {
  question: string;
  background?: string;
}

export interface QuestionLabels {
  question: string;
  category: QuestionCategory | null;
  illDefined: boolean | null;
}

export interface LabelingResult {
  labels: QuestionLabels[];
  succeeded: number;
  failed: number;
}

/**
 * One of the fixed categories, or null when the reply is not one
 */
export async function assignCategory(
  question: LabelableQuestion,
  completion: ICompletion,
  options: LabelerOptions
): Promise<QuestionCategory | null> {
  const response = await completion.complete(
    {
      model: options.model,
      temperature: options.temperature ?? 0.1,
      prompt: renderTemplate(options.categoryTemplate ?? QUESTION_CATEGORY, {
        question: question.question,
        background: question.background ?? "",
        categories: QUESTION_CATEGORIES.join("\n"),
      }),
    },
    { maxAttempts: options.maxAttempts ?? 3 }
  );

  const category = response.replace(/^["'\s.]+|["'\s.]+$/g, "");
  if (!isQuestionCategory(category)) {
    log.warn("Reply is not a known category", { question: question.question.slice(0, 80), reply: category });
    return null;
  }
  return category;
}

/**
 * True when flagged, false when "ok", null when the reply has no classification
 */
export async function isIllDefined(
  question: LabelableQuestion,
  completion: ICompletion,
  options: LabelerOptions
): Promise<boolean | null> {
  const response = await completion.complete(
    {
      model: options.model,
      temperature: options.temperature ?? 0.1,
      prompt: renderTemplate(options.illDefinedTemplate ?? QUESTION_ILL_DEFINED, { question: question.question }),
    },
    { maxAttempts: options.maxAttempts ?? 3 }
  );

  const markerAt = response.indexOf(CLASSIFICATION_MARKER);
  if (markerAt === -1) {
    log.warn("No classification in reply", { question: question.question.slice(0, 80) });
    return null;
  }

  const verdict = response
    .slice(markerAt + CLASSIFICATION_MARKER.length)
    .trim()
    .split(/\s+/)[0]
    .replace(/["'.,]/g, "")
    .toLowerCase();
  return verdict !== "ok";
}

/**
 * Label every question with `concurrency` workers. A question whose calls
 * throw is counted as failed and labeled with nulls.
 */
export async function labelQuestions(
  questions: readonly LabelableQuestion[],
  completion: ICompletion,
  options: LabelerOptions & { concurrency?: number }
): Promise<LabelingResult> {
  const settled = await runWorkerPool(questions, options.concurrency ?? 10, async (question) => {
    const [category, illDefined] = await Promise.all([
      assignCategory(question, completion, options),
      isIllDefined(question, completion, options),
    ]);
    return { question: question.question, category, illDefined };
  });

  let failed = 0;
  const labels = settled.map((result, index): QuestionLabels => {
    if (result.status === "fulfilled") return result.value;
    failed++;
    log.error("Labeling failed", result.reason, { question: questions[index].question.slice(0, 80) });
    return { question: questions[index].question, category: null, illDefined: null };
  });

  log.info("Labeled questions", { total: questions.length, failed });
  return { labels, succeeded: questions.length - failed, failed };
}
