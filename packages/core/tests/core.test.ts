import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import {
  ConfigError,
  NetworkError,
  ProviderError,
  ValidationError,
  deepFreeze,
  formatZodIssues,
  isRetryableError,
  loadBaseConfig,
  logger,
  withRetry,
  wrapError,
  type LogEntry,
} from "../src/index.js";

describe("errors", () => {
  it("marks provider errors retryable only for transient statuses", () => {
    expect(new ProviderError("rate limited", "openai", { statusCode: 429 }).retryable).toBe(true);
    expect(new ProviderError("bad gateway", "openai", { statusCode: 502 }).retryable).toBe(true);
    expect(new ProviderError("no status", "google").retryable).toBe(true);
    expect(new ProviderError("bad request", "openai", { statusCode: 400 }).retryable).toBe(false);
  });

  it("recognises transient plain errors by message", () => {
    expect(isRetryableError(new Error("Request timeout after 60s"))).toBe(true);
    expect(isRetryableError(new Error("invalid prompt"))).toBe(false);
    expect(isRetryableError("timeout")).toBe(false);
  });

  it("wraps unknown values", () => {
    const wrapped = wrapError("boom");
    expect(wrapped.code).toBe("UNKNOWN_ERROR");
    expect(wrapped.message).toBe("boom");

    const config = new ConfigError("bad");
    expect(wrapError(config)).toBe(config);
    expect(config.toJSON()).toMatchObject({ name: "ConfigError", code: "CONFIG_ERROR", retryable: false });
  });
});

describe("loadBaseConfig", () => {
  it("applies defaults and treats blank keys as missing", () => {
    const config = loadBaseConfig({ OPENAI_API_KEY: "test-secret", ANTHROPIC_API_KEY: "", SUPABASE_URL: "" });

    expect(config.providers.openaiApiKey).toBe("test-secret");
    expect(config.providers.anthropicApiKey).toBeUndefined();
    expect(config.supabase).toBeUndefined();
    expect(config.pipeline).toEqual({ outputDir: "forecasts", retryDelayMs: 30_000 });
    expect(config.env.logLevel).toBe("info");
  });

  it("builds the supabase block only when url and key are present", () => {
    const config = loadBaseConfig({
      SUPABASE_URL: "https://example.supabase.co",
      SUPABASE_KEY: "test-secret",
      RETRY_DELAY_MS: "250",
    });

    expect(config.supabase).toEqual({
      url: "https://example.supabase.co",
      key: "test-secret",
      bucket: "forecasts",
    });
    expect(config.pipeline.retryDelayMs).toBe(250);
  });

  it("rejects invalid values", () => {
    expect(() => loadBaseConfig({ LOG_LEVEL: "verbose" })).toThrow(ConfigError);
  });
});

describe("formatZodIssues", () => {
  it("joins issue paths and messages", () => {
    const schema = z.object({ name: z.string(), tags: z.array(z.string()) });
    const result = schema.safeParse({ name: 1, tags: ["a", 2] });
    if (result.success) throw new Error("expected a parse failure");

    expect(formatZodIssues(result.error)).toBe(
      "name: Expected string, received number; tags.1: Expected string, received number"
    );
  });

  it("labels root issues", () => {
    const result = z.string().safeParse(3);
    if (result.success) throw new Error("expected a parse failure");

    expect(formatZodIssues(result.error)).toBe("(root): Expected string, received number");
  });
});

describe("deepFreeze", () => {
  it("freezes nested objects and arrays", () => {
    const frozen = deepFreeze({ outer: { inner: [1, 2] }, list: [{ id: 1 }] });

    expect(Object.isFrozen(frozen)).toBe(true);
    expect(Object.isFrozen(frozen.outer)).toBe(true);
    expect(Object.isFrozen(frozen.outer.inner)).toBe(true);
    expect(Object.isFrozen(frozen.list[0])).toBe(true);
  });

  it("passes primitives through", () => {
    expect(deepFreeze(4)).toBe(4);
    expect(deepFreeze(null)).toBeNull();
  });
});

describe("withRetry", () => {
  beforeEach(() => {
    logger.setHandlers([]);
  });

  afterEach(() => {
    logger.resetHandlers();
  });

  it("retries transient failures until success", async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new NetworkError("fetch failed"))
      .mockRejectedValueOnce(new NetworkError("fetch failed"))
      .mockResolvedValue("ok");

    await expect(withRetry(fn, { maxAttempts: 3, delayMs: 0, label: "test" })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(fn.mock.calls.map((call) => call[0])).toEqual([1, 2, 3]);
  });

  it("gives up after maxAttempts", async () => {
    const fn = vi.fn(async () => {
      throw new NetworkError("fetch failed");
    });

    await expect(withRetry(fn, { maxAttempts: 2, delayMs: 0, label: "test" })).rejects.toThrow("fetch failed");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry non-retryable errors", async () => {
    const fn = vi.fn(async () => {
      throw new ValidationError("bad input");
    });

    await expect(withRetry(fn, { maxAttempts: Infinity, delayMs: 0, label: "test" })).rejects.toThrow(
      ValidationError
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("rejects a non-positive attempt budget", async () => {
    await expect(withRetry(async () => 1, { maxAttempts: 0, delayMs: 0, label: "test" })).rejects.toThrow(
      RangeError
    );
  });
});

describe("logger", () => {
  const entries: LogEntry[] = [];

  beforeEach(() => {
    entries.length = 0;
    logger.setHandlers([(entry) => entries.push(entry)]);
    logger.setLevel("info");
  });

  afterEach(() => {
    logger.resetHandlers();
  });

  it("merges child context and filters by level", () => {
    const log = logger.child({ component: "ranker" }).child({ stage: "rating" });
    log.debug("hidden");
    log.info("rated", { count: 3 });

    expect(entries).toHaveLength(1);
    expect(entries[0].message).toBe("rated");
    expect(entries[0].context).toEqual({ component: "ranker", stage: "rating", count: 3 });
  });

  it("records metrics with name and value", () => {
    logger.metric("articles_kept", 7, { component: "prefilter" });

    expect(entries[0].message).toBe("METRIC: articles_kept=7");
    expect(entries[0].context).toEqual({ component: "prefilter", metric: "articles_kept", value: 7 });
  });
});
