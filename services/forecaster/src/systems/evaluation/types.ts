/**
 * Evaluation Types
 * The question going in and the record persisted per question
 */

import { z } from "zod";
import type { DateRange } from "@foresight/news";
import type { QueryPlan } from "../retrieval/types.js";
import type { EnsembleResult } from "../reasoning/types.js";

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}/, "Expected an ISO date (YYYY-MM-DD)");

export const ForecastQuestionSchema = z.object({
  question: z.string().min(1),
  background: z.string().default(""),
  resolutionCriteria: z.string().default(""),
  retrievalDates: z.object({ start: isoDate, end: isoDate }),
  questionDates: z.object({ open: isoDate, close: isoDate }).optional(),
  answer: z.union([z.literal(0), z.literal(1)]).optional(),
  communityPrediction: z.number().min(0).max(1).optional(),
  urlsInBackground: z.array(z.string().url()).optional(),
  dataSource: z.string().optional(),
});

export type ForecastQuestionInput = z.input<typeof ForecastQuestionSchema>;
export type ForecastQuestion = z.output<typeof ForecastQuestionSchema>;

export interface BrierScores {
  /** One score per base prediction, grouped like the ensemble */
  base: number[][];
  meta: number;
}

export interface ForecastRecord {
  question: string;
  background: string;
  resolutionCriteria: string;
  dataSource: string | null;
  questionDates: { open: string; close: string } | null;
  retrievalDates: DateRange;

  /** [retrieval end, question close] */
  todayToClose: [string, string];
  answer: 0 | 1 | null;
  communityPrediction: number | null;

  queryPlan: QueryPlan;
  rankedArticles: { title: string; link: string }[];
  digest: string;

  ensemble: EnsembleResult;
  alignmentScores: number[][] | null;
  brierScores: BrierScores | null;

  createdAt: string;
}

export interface BatchSummary {
  succeeded: number;
  failed: number;
  skipped: number;

  /** Keys written during this run */
  written: string[];
}
