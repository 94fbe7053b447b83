import { beforeEach, describe, expect, it } from "vitest";
import { ConfigError, ValidationError, logger } from "@foresight/core";
import {
  clampProbability,
  clampToken,
  mean,
  median,
  mostFrequent,
  trimmedMean,
  weightedMean,
} from "../src/systems/reasoning/aggregate.js";
import { createReasoningConfig, ensembleConfigProblems, type ReasoningConfig } from "../src/systems/reasoning/config.js";
import {
  aggregateBaseReasonings,
  concatenateReasonings,
  extractPrediction,
  metaReason,
} from "../src/systems/reasoning/ensemble.js";
import { scoreAlignment } from "../src/systems/reasoning/alignment.js";
import type { BaseReasoning, ReasoningInput } from "../src/systems/reasoning/types.js";
import { SIX_OPTIONS, TEN_OPTIONS, tokenProbability } from "../src/systems/reasoning/vocabulary.js";
import { REASONING_BASE_RATES, REASONING_SCRATCHPAD, REASONING_TOKENS } from "../src/shared/prompt/library.js";
import { FakeCompletion } from "./fakes.js";

const INPUT: ReasoningInput = {
  question: "Will the central bank cut rates by June 2024?",
  background: "The bank meets monthly.",
  resolutionCriteria: "Resolves yes if the policy rate is lowered.",
  dateBegin: "2024-03-10",
  dateEnd: "2024-06-30",
  retrievedInfo: "---\nARTICLES\n[1] Rates held (published on 2024-03-05)\nSummary: The bank held.\n----",
};

function reasoning(model: string, response: string, prediction: number | string): BaseReasoning {
  return { model, templateId: REASONING_SCRATCHPAD.id, prompt: "prompt", response, prediction };
}

beforeEach(() => {
  logger.setHandlers([]);
});

describe("aggregation functions", () => {
  it("averages", () => {
    expect(mean([0.2, 0.5, 0.8])).toBeCloseTo(0.5);
    expect(median([0.2, 0.5, 0.8])).toBe(0.5);
    expect(median([0.1, 0.4, 0.2, 0.9])).toBeCloseTo(0.3);
  });

  it("weights values", () => {
    expect(weightedMean([0.2, 0.8], [3, 1])).toBeCloseTo(0.35);
    expect(() => weightedMean([0.2, 0.8], [1])).toThrow(ConfigError);
    expect(() => weightedMean([0.2, 0.8], [1, -1])).toThrow(ConfigError);
    expect(() => weightedMean([0.2, 0.8], [0, 0])).toThrow(ConfigError);
  });

  it("halves the weight of the outlier in the trimmed mean", () => {
    // weights 1/6, 5/12, 5/12
    expect(trimmedMean([0.1, 0.5, 0.6])).toBeCloseTo(0.475);
    expect(trimmedMean([0.4])).toBe(0.4);
  });

  it("halves every value tied at the largest distance from the median", () => {
    expect(trimmedMean([0.25, 0.5, 0.75])).toBe(0.5);
    expect(trimmedMean([0.75, 0.5, 0.25])).toBe(0.5);
    expect(trimmedMean([0.5, 0.75, 0.25])).toBe(0.5);
  });

  it("picks the most frequent item, ties to the first seen", () => {
    expect(mostFrequent(["a", "b", "b"])).toBe("b");
    expect(mostFrequent(["a", "b", "b", "a"])).toBe("a");
    expect(mostFrequent([])).toBeNull();
  });

  it("rejects empty input", () => {
    expect(() => mean([])).toThrow(ConfigError);
  });

  it("clamps probabilities and phrases", () => {
    expect(clampProbability(0.3)).toBe(0.3);
    expect(clampProbability(1.2)).toBe(0.5);
    expect(clampProbability(Number.NaN)).toBe(0.5);
    expect(clampToken("Likely", TEN_OPTIONS)).toBe("Likely");
    expect(clampToken("Maybe", TEN_OPTIONS)).toBe("Slightly Unlikely");
    expect(clampToken(null, SIX_OPTIONS)).toBe("Unlikely");
  });
});

describe("vocabularies", () => {
  it("maps phrases to probabilities", () => {
    expect(tokenProbability(TEN_OPTIONS, "Very Likely")).toBe(0.75);
    expect(tokenProbability(SIX_OPTIONS, "Very Likely")).toBe(0.75);
    expect(tokenProbability(TEN_OPTIONS, "Maybe")).toBe(0.45);
  });
});

describe("createReasoningConfig", () => {
  it("fills defaults", () => {
    const config = createReasoningConfig();

    expect(config.strategy).toBe("meta");
    expect(config.metaModel).toBe("gpt-4");
    expect(config.baseModels).toEqual(["gpt-4-1106-preview"]);
    expect(config.templates[0].map((template) => template.id)).toEqual(["reasoning-scratchpad", "reasoning-base-rates"]);
    expect(config.alignment.enabled).toBe(false);
    expect(Object.isFrozen(config.templates[0])).toBe(true);
  });

  it("rejects a weight count that does not match the models", () => {
    expect(() =>
      createReasoningConfig({
        strategy: "weighted-mean",
        baseModels: ["gpt-4o", "claude-2"],
        templates: [[REASONING_SCRATCHPAD], [REASONING_SCRATCHPAD]],
        weights: [1],
      })
    ).toThrow(ConfigError);
  });

  it("rejects averaging phrase answers", () => {
    expect(() => createReasoningConfig({ strategy: "mean", answerType: "tokens" })).toThrow(ConfigError);
  });

  it("rejects templates that do not match the models", () => {
    expect(() => createReasoningConfig({ baseModels: ["gpt-4o", "claude-2"] })).toThrow(ConfigError);
  });

  it("lists every problem", () => {
    expect(
      ensembleConfigProblems({
        baseModels: ["gpt-4o"],
        templates: [[], []],
        strategy: "weighted-mean",
        answerType: "tokens",
      })
    ).toEqual([
      "templates has 2 lists but there are 1 base models",
      "weighted-mean needs probability answers, got tokens",
      "weighted-mean needs weights",
    ]);
  });
});

describe("extractPrediction", () => {
  it("parses and clamps by answer type", () => {
    expect(extractPrediction("Final: *0.35*", "probability", TEN_OPTIONS)).toBe(0.35);
    expect(extractPrediction("Final: *1.5*", "probability", TEN_OPTIONS)).toBe(0.5);
    expect(extractPrediction("Overall this is Extremely Likely", "tokens", TEN_OPTIONS)).toBe("Extremely Likely");
    expect(extractPrediction("No idea at all", "tokens", SIX_OPTIONS)).toBe("No");
    expect(extractPrediction("hard to say", "tokens", SIX_OPTIONS)).toBe("Unlikely");
  });
});

describe("concatenateReasonings", () => {
  it("numbers each response", () => {
    expect(concatenateReasonings(["first", "second"])).toBe(
      "---\nResponse from forecaster 1:\nfirst\n\n-\nResponse from forecaster 2:\nsecond\n---"
    );
  });
});

describe("metaReason", () => {
  it("averages probabilities with the mean strategy", async () => {
    const completion = new FakeCompletion((request) =>
      request.model === "gpt-4o" ? "Reasons... *0.3*" : "Reasons... *0.7*"
    );
    const config = createReasoningConfig({
      baseModels: ["gpt-4o", "claude-2"],
      templates: [[REASONING_SCRATCHPAD], [REASONING_SCRATCHPAD]],
      strategy: "mean",
    });

    const result = await metaReason(INPUT, config, completion);

    expect(result.basePredictions).toEqual([[0.3], [0.7]]);
    expect(result.metaPrediction).toBeCloseTo(0.5);
    expect(result.metaPrompt).toBeNull();
    expect(result.metaReasoning).toBeNull();
    expect(Object.isFrozen(result)).toBe(true);
    expect(completion.requests[0].prompt).toContain(INPUT.retrievedInfo);
    expect(completion.requests[0].temperature).toBe(1);
  });

  it("weights each prediction by its model group", async () => {
    const completion = new FakeCompletion((request) => {
      if (request.model === "claude-2") return "*0.8*";
      return request.prompt.includes("base rate") ? "*0.4*" : "*0.2*";
    });
    const config = createReasoningConfig({
      baseModels: ["gpt-4o", "claude-2"],
      templates: [[REASONING_SCRATCHPAD, REASONING_BASE_RATES], [REASONING_SCRATCHPAD]],
      strategy: "weighted-mean",
      weights: [1, 2],
    });

    const result = await metaReason(INPUT, config, completion);

    expect(result.basePredictions).toEqual([[0.2, 0.4], [0.8]]);
    // (0.2 + 0.4 + 2 * 0.8) / 4
    expect(result.metaPrediction).toBeCloseTo(0.55);
  });

  it("takes a majority vote over phrases", async () => {
    const completion = new FakeCompletion((request) =>
      request.model === "claude-2" ? "On balance: Likely" : "On balance: Very Likely"
    );
    const config = createReasoningConfig({
      baseModels: ["gpt-4o", "claude-2", "gemini-pro"],
      templates: [[REASONING_TOKENS], [REASONING_TOKENS], [REASONING_TOKENS]],
      strategy: "vote-or-median",
      answerType: "tokens",
    });

    const result = await metaReason(INPUT, config, completion);

    expect(result.basePredictions).toEqual([["Very Likely"], ["Likely"], ["Very Likely"]]);
    expect(result.metaPrediction).toBe("Very Likely");
    expect(completion.requests[0].prompt).toContain(
      "No, Extremely Unlikely, Very Unlikely, Unlikely, Slightly Unlikely, Slightly Likely, Likely, Very Likely, Extremely Likely, Yes"
    );
  });

  it("asks the meta model to combine the reasonings", async () => {
    const completion = new FakeCompletion((request) => {
      if (request.model === "gpt-4") return "Combined view: *0.65*";
      return request.prompt.includes("base rate") ? "Base rates say *0.4*" : "Scratchpad says *0.3*";
    });
    const config = createReasoningConfig({ baseModels: ["gpt-4o"] });

    const result = await metaReason(INPUT, config, completion);

    expect(result.metaPrediction).toBe(0.65);
    expect(result.metaReasoning).toBe("Combined view: *0.65*");
    expect(result.metaPrompt).toContain(concatenateReasonings(["Scratchpad says *0.3*", "Base rates say *0.4*"]));
    expect(completion.promptsFor("gpt-4")).toHaveLength(1);
    expect(completion.requests.at(-1)?.temperature).toBe(0.2);
  });

  it("returns a single reasoning without aggregating", async () => {
    const completion = new FakeCompletion(() => "Only one: *0.42*");
    const config = createReasoningConfig({ baseModels: ["gpt-4o"], templates: [[REASONING_SCRATCHPAD]] });

    const result = await metaReason(INPUT, config, completion);

    expect(result.metaPrediction).toBe(0.42);
    expect(result.metaReasoning).toBeNull();
    expect(completion.requests).toHaveLength(1);
  });

  it("checks the config before calling any model", async () => {
    const completion = new FakeCompletion(() => "*0.5*");
    const config: ReasoningConfig = { ...createReasoningConfig(), strategy: "weighted-mean" };

    await expect(metaReason(INPUT, config, completion)).rejects.toBeInstanceOf(ConfigError);
    expect(completion.requests).toHaveLength(0);
  });
});

describe("aggregateBaseReasonings", () => {
  it("takes the median of probabilities with vote-or-median", async () => {
    const config = createReasoningConfig({
      baseModels: ["gpt-4o", "claude-2"],
      templates: [[REASONING_SCRATCHPAD], [REASONING_SCRATCHPAD]],
      strategy: "vote-or-median",
    });
    const groups = [[reasoning("gpt-4o", "a", 0.1), reasoning("gpt-4o", "b", 0.9)], [reasoning("claude-2", "c", 0.6)]];

    const result = await aggregateBaseReasonings(groups, INPUT, config, new FakeCompletion(() => ""));
    expect(result.metaPrediction).toBe(0.6);
  });

  it("rejects an empty ensemble", async () => {
    const config = createReasoningConfig({ baseModels: ["gpt-4o"], templates: [[REASONING_SCRATCHPAD]] });
    await expect(aggregateBaseReasonings([[]], INPUT, config, new FakeCompletion(() => ""))).rejects.toBeInstanceOf(
      ValidationError
    );
  });
});

describe("scoreAlignment", () => {
  it("rates each reasoning and leaves out failed calls", async () => {
    const completion = new FakeCompletion((request) => {
      if (request.prompt.includes("reason B")) throw new ValidationError("bad reply");
      return request.prompt.includes("reason A") ? "Thinking: consistent.\nRating: 5" : "4";
    });
    const settings = createReasoningConfig().alignment;

    const scores = await scoreAlignment(
      INPUT,
      [[reasoning("gpt-4o", "reason A", 0.3), reasoning("gpt-4o", "reason B", 0.4)], [reasoning("claude-2", "reason C", 0.7)]],
      completion,
      settings
    );

    expect(scores).toEqual([[5], [4]]);
    expect(completion.requests.every((request) => request.model === "gpt-3.5-turbo-1106")).toBe(true);
  });
});
