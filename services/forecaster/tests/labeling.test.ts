import { beforeEach, describe, expect, it } from "vitest";
import { logger } from "@foresight/core";
import { assignCategory, isIllDefined, labelQuestions } from "../src/systems/labeling/labeler.js";
import { isQuestionCategory } from "../src/systems/labeling/categories.js";
import { FakeCompletion } from "./fakes.js";

const OPTIONS = { model: "gpt-4o-mini" };
const QUESTION = { question: "Will the home team win the final?", background: "The final is on Sunday." };

beforeEach(() => {
  logger.setHandlers([]);
});

describe("assignCategory", () => {
  it("accepts a category with stray quotes and punctuation", async () => {
    await expect(assignCategory(QUESTION, new FakeCompletion(() => "Economics & Business."), OPTIONS)).resolves.toBe(
      "Economics & Business"
    );
    await expect(assignCategory(QUESTION, new FakeCompletion(() => ' "Sports"\n'), OPTIONS)).resolves.toBe("Sports");
  });

  it("returns null for anything outside the list", async () => {
    await expect(assignCategory(QUESTION, new FakeCompletion(() => "Finance"), OPTIONS)).resolves.toBeNull();
  });

  it("lists every category in the prompt", async () => {
    const completion = new FakeCompletion(() => "Sports");
    await assignCategory(QUESTION, completion, OPTIONS);

    expect(completion.requests[0].prompt).toContain("Science & Tech\nHealthcare & Biology\n");
    expect(completion.requests[0].temperature).toBe(0.1);
  });
});

describe("isIllDefined", () => {
  it("reads the classification line", async () => {
    const verdict = (reply: string) => isIllDefined(QUESTION, new FakeCompletion(() => reply), OPTIONS);

    await expect(verdict("Reasoning: clear.\nClassification: ok")).resolves.toBe(false);
    await expect(verdict('Reasoning: clear.\nClassification: "OK".')).resolves.toBe(false);
    await expect(verdict("Reasoning: which event?\nClassification: flag")).resolves.toBe(true);
    await expect(verdict("I am not sure.")).resolves.toBeNull();
  });
});

describe("labelQuestions", () => {
  it("labels in input order and counts failures", async () => {
    const completion = new FakeCompletion((request) => {
      if (request.prompt.includes("broken")) throw new Error("model unavailable");
      return request.prompt.includes("Categories:") ? "Sports" : "Classification: ok";
    });

    const result = await labelQuestions(
      [QUESTION, { question: "A broken question?" }, { question: "Who wins the cup?" }],
      completion,
      { ...OPTIONS, concurrency: 2 }
    );

    expect(result.succeeded).toBe(2);
    expect(result.failed).toBe(1);
    expect(result.labels).toEqual([
      { question: QUESTION.question, category: "Sports", illDefined: false },
      { question: "A broken question?", category: null, illDefined: null },
      { question: "Who wins the cup?", category: "Sports", illDefined: false },
    ]);
  });
});

describe("isQuestionCategory", () => {
  it("matches names exactly", () => {
    expect(isQuestionCategory("Sports")).toBe(true);
    expect(isQuestionCategory("sports")).toBe(false);
  });
});
