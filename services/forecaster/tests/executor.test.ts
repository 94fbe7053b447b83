import { beforeEach, describe, expect, it } from "vitest";
import { ConfigError, ProviderError, UnknownModelError, logger, sleep } from "@foresight/core";
import { CompletionRouter } from "../src/shared/executor/router.js";
import { getModelSpec, inferModelProvider, isKnownModel } from "../src/shared/executor/models.js";
import type { CompletionRequest, CompletionResult, ICompletionProvider } from "../src/shared/executor/types.js";
import { runWorkerPool } from "../src/shared/concurrency/pool.js";

class ScriptedProvider implements ICompletionProvider {
  readonly provider = "openai" as const;
  calls = 0;
  private readonly failures: number;
  private readonly ready: boolean;

  constructor(failures = 0, ready = true) {
    this.failures = failures;
    this.ready = ready;
  }

  isReady(): boolean {
    return this.ready;
  }

  async generate(request: CompletionRequest): Promise<CompletionResult> {
    this.calls++;
    if (this.calls <= this.failures) {
      throw new ProviderError("openai completion failed: overloaded", "openai", { statusCode: 503 });
    }
    return { text: `echo: ${request.prompt}`, durationMs: 1 };
  }
}

beforeEach(() => {
  logger.setHandlers([]);
});

describe("model catalog", () => {
  it("resolves providers by name", () => {
    expect(inferModelProvider("gpt-4")).toBe("openai");
    expect(inferModelProvider("claude-2.1")).toBe("anthropic");
    expect(inferModelProvider("gemini-pro")).toBe("google");
    expect(inferModelProvider("mistralai/Mixtral-8x7B-Instruct-v0.1")).toBe("together");
  });

  it("maps fine-tuned models to their base", () => {
    expect(getModelSpec("ft:gpt-3.5-turbo-1106:acme::abc123")).toEqual({ provider: "openai", tokenLimit: 16_000 });
    expect(isKnownModel("ft:gpt-3.5-turbo-1106:acme::abc123")).toBe(true);
  });

  it("rejects unknown models", () => {
    expect(() => getModelSpec("mystery-model")).toThrow(UnknownModelError);
    expect(isKnownModel("mystery-model")).toBe(false);
  });
});

describe("CompletionRouter", () => {
  it("routes to the registered provider", async () => {
    const provider = new ScriptedProvider();
    const router = new CompletionRouter({ providers: { openai: provider }, retryDelayMs: 0 });

    await expect(router.complete({ model: "gpt-4", prompt: "hi" })).resolves.toBe("echo: hi");
  });

  it("fails on unknown models and missing providers", async () => {
    const router = new CompletionRouter({ providers: { openai: new ScriptedProvider() }, retryDelayMs: 0 });

    await expect(router.complete({ model: "mystery-model", prompt: "hi" })).rejects.toBeInstanceOf(UnknownModelError);
    await expect(router.complete({ model: "claude-2", prompt: "hi" })).rejects.toBeInstanceOf(ConfigError);
  });

  it("refuses providers without credentials before calling them", async () => {
    const provider = new ScriptedProvider(0, false);
    const router = new CompletionRouter({ providers: { openai: provider }, retryDelayMs: 0 });

    await expect(router.complete({ model: "gpt-4", prompt: "hi" })).rejects.toThrow(
      new ConfigError("The openai provider for model gpt-4 has no credentials")
    );
    expect(provider.calls).toBe(0);
  });

  it("retries transient failures", async () => {
    const provider = new ScriptedProvider(2);
    const router = new CompletionRouter({ providers: { openai: provider }, retryDelayMs: 0 });

    await expect(router.complete({ model: "gpt-4", prompt: "hi" })).resolves.toBe("echo: hi");
    expect(provider.calls).toBe(3);
  });

  it("bounds retries inside completeAll", async () => {
    const provider = new ScriptedProvider(10);
    const router = new CompletionRouter({ providers: { openai: provider }, retryDelayMs: 0, batchMaxAttempts: 2 });

    await expect(router.completeAll([{ model: "gpt-4", prompt: "hi" }])).rejects.toBeInstanceOf(ProviderError);
    expect(provider.calls).toBe(2);
  });

  it("checks every model before sending a batch", async () => {
    const provider = new ScriptedProvider();
    const router = new CompletionRouter({ providers: { openai: provider }, retryDelayMs: 0 });

    await expect(
      router.completeAll([
        { model: "gpt-4", prompt: "a" },
        { model: "mystery-model", prompt: "b" },
      ])
    ).rejects.toBeInstanceOf(UnknownModelError);
    expect(provider.calls).toBe(0);
  });

  it("keeps batch output in request order", async () => {
    const router = new CompletionRouter({ providers: { openai: new ScriptedProvider() }, retryDelayMs: 0 });

    const texts = await router.completeAll([
      { model: "gpt-4", prompt: "first" },
      { model: "gpt-4o", prompt: "second" },
    ]);
    expect(texts).toEqual(["echo: first", "echo: second"]);
  });
});

describe("runWorkerPool", () => {
  it("returns results in input order", async () => {
    const results = await runWorkerPool([30, 5, 15], 2, async (delay, index) => {
      await sleep(delay);
      return index * 10;
    });

    expect(results).toEqual([
      { status: "fulfilled", value: 0 },
      { status: "fulfilled", value: 10 },
      { status: "fulfilled", value: 20 },
    ]);
  });

  it("settles failing items on their own", async () => {
    const boom = new Error("boom");
    const results = await runWorkerPool(["a", "b"], 4, async (item) => {
      if (item === "b") throw boom;
      return item.toUpperCase();
    });

    expect(results).toEqual([
      { status: "fulfilled", value: "A" },
      { status: "rejected", reason: boom },
    ]);
  });

  it("never runs more than the concurrency limit", async () => {
    let active = 0;
    let peak = 0;
    await runWorkerPool([1, 2, 3, 4, 5], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      active--;
    });
    expect(peak).toBe(2);
  });

  it("rejects a non-positive concurrency", async () => {
    await expect(runWorkerPool([1], 0, async (item) => item)).rejects.toBeInstanceOf(RangeError);
  });
});
