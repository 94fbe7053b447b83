/**
 * Forecast CLI
 * Runs a batch over a JSON file of questions:
 *   forecast <questions.json> [retrievalIndex]
 */

import fs from "fs/promises";
import { z } from "zod";
import { formatZodIssues, logger, ValidationError } from "@foresight/core";
import { ForecastQuestionSchema } from "./systems/evaluation/types.js";
import { createForecastingSystem } from "./system.js";

const QuestionFileSchema = z.array(ForecastQuestionSchema);

async function main(): Promise<void> {
  const [path, indexArg] = process.argv.slice(2);
  if (!path) {
    console.error("Usage: forecast <questions.json> [retrievalIndex]");
    process.exit(1);
  }

  const parsed = QuestionFileSchema.safeParse(JSON.parse(await fs.readFile(path, "utf-8")));
  if (!parsed.success) {
    throw new ValidationError(`Invalid question file: ${formatZodIssues(parsed.error)}`, { field: path });
  }

  const system = createForecastingSystem();
  console.log("System Info:", system.getInfo());

  const retrievalIndex = indexArg ? Number.parseInt(indexArg, 10) : 0;
  const summary = await system.runBatch(parsed.data, { retrievalIndex });

  console.log();
  console.log("=".repeat(60));
  console.log("BATCH SUMMARY");
  console.log("=".repeat(60));
  console.log("Succeeded:", summary.succeeded);
  console.log("Failed:", summary.failed);
  console.log("Skipped:", summary.skipped);
  for (const key of summary.written) {
    console.log(`- ${key}`);
  }
}

main().catch((error) => {
  logger.error("Forecast run failed", error);
  process.exit(1);
});
