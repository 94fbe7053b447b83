/**
 * Alignment Scorer
 * Rates whether each reasoning on its own supports the prediction it made
 */

import { logger } from "@foresight/core";
import type { ICompletion } from "../../shared/executor/types.js";
import { renderTemplate } from "../../shared/prompt/registry.js";
import { extractRating } from "../../shared/parsing/response.js";
import type { ReasoningConfig } from "./config.js";
import type { BaseReasoning, ReasoningInput } from "./types.js";

const log = logger.child({ component: "alignment" });

export type AlignmentSettings = ReasoningConfig["alignment"];

/**
 * One 1-6 rating per reasoning, grouped like the input. Reasonings whose
 * rating call fails are left out of their group.
 */
export async function scoreAlignment(
  input: Pick<ReasoningInput, "question" | "background" | "resolutionCriteria">,
  baseReasonings: readonly (readonly BaseReasoning[])[],
  completion: ICompletion,
  settings: AlignmentSettings
): Promise<number[][]> {
  const scored = await Promise.all(
    baseReasonings.map(async (group, groupIndex) => {
      const settled = await Promise.allSettled(
        group.map((reasoning) =>
          completion.complete(
            {
              model: settings.model,
              temperature: settings.temperature,
              prompt: renderTemplate(settings.template, {
                question: input.question,
                background: input.background,
                resolution_criteria: input.resolutionCriteria,
                reasoning: reasoning.response,
              }),
            },
            { maxAttempts: settings.maxAttempts }
          )
        )
      );

      const ratings: number[] = [];
      settled.forEach((result, index) => {
        if (result.status === "fulfilled") {
          ratings.push(extractRating(result.value));
        } else {
          log.error("Alignment rating failed", result.reason, {
            group: groupIndex,
            index,
            model: group[index].model,
          });
        }
      });
      return ratings;
    })
  );

  log.info("Scored alignment", { ratings: scored.reduce((sum, group) => sum + group.length, 0) });
  return scored;
}
