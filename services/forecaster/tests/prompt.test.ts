import { describe, expect, it } from "vitest";
import { ConfigError, ValidationError } from "@foresight/core";
import { definePrompt, placeholdersOf, renderTemplate } from "../src/shared/prompt/registry.js";
import { templateSchemaFor } from "../src/shared/prompt/types.js";
import {
  BUILTIN_PROMPTS,
  QUESTION_ILL_DEFINED,
  RELEVANCE_RATING,
  createDefaultPromptRegistry,
} from "../src/shared/prompt/library.js";

const GREETING = definePrompt({
  id: "greeting",
  role: "summarization",
  template: "Hello {{ name }}, you asked about {{topic}}. Bye {{name}}.",
});

describe("renderTemplate", () => {
  it("substitutes every placeholder", () => {
    expect(renderTemplate(GREETING, { name: "Ada", topic: "rates" })).toBe(
      "Hello Ada, you asked about rates. Bye Ada."
    );
  });

  it("stringifies numbers", () => {
    const template = definePrompt({ id: "count", role: "search-query", template: "Write {{n}} queries" });
    expect(renderTemplate(template, { n: 3 })).toBe("Write 3 queries");
  });

  it("throws on a missing variable", () => {
    expect(() => renderTemplate(GREETING, { name: "Ada" })).toThrow(ValidationError);
    expect(() => renderTemplate(GREETING, { name: "Ada" })).toThrow("Prompt greeting is missing variables: topic");
  });

  it("lists placeholders once, in order", () => {
    expect(placeholdersOf(GREETING.template)).toEqual(["name", "topic"]);
  });
});

describe("definePrompt", () => {
  it("defaults the version and freezes the template", () => {
    expect(GREETING.version).toBe("1");
    expect(Object.isFrozen(GREETING)).toBe(true);
  });
});

describe("templateSchemaFor", () => {
  it("accepts templates of the role and rejects others", () => {
    expect(templateSchemaFor("relevance").safeParse(RELEVANCE_RATING).success).toBe(true);
    expect(templateSchemaFor("alignment").safeParse(RELEVANCE_RATING).success).toBe(false);
  });
});

describe("PromptRegistry", () => {
  it("holds the built-in templates", () => {
    const registry = createDefaultPromptRegistry();

    expect(registry.list()).toHaveLength(BUILTIN_PROMPTS.length);
    expect(registry.list("ill-defined")).toEqual([QUESTION_ILL_DEFINED]);
    expect(registry.require("relevance-1to6")).toBe(RELEVANCE_RATING);
    expect(registry.get("missing")).toBeUndefined();
  });

  it("renders by id", () => {
    const registry = createDefaultPromptRegistry();
    expect(registry.render("question-ill-defined", { question: "Will it rain?" })).toContain("Question: Will it rain?");
  });

  it("throws on an unknown id", () => {
    expect(() => createDefaultPromptRegistry().require("missing")).toThrow(ConfigError);
  });

  it("has unique ids", () => {
    expect(new Set(BUILTIN_PROMPTS.map((prompt) => prompt.id)).size).toBe(BUILTIN_PROMPTS.length);
  });
});
