/**
 * Configuration Management
 * Loads and validates provider credentials and runtime settings from the environment
 */

import { z } from "zod";
import "dotenv/config";
import { ConfigError } from "./errors.js";

// dotenv yields "" for keys left blank in .env
const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalSecret = z.preprocess(blankToUndefined, z.string().optional());

// Every provider key is optional; a missing one only disables that provider
const baseEnvSchema = z.object({
  // Model providers
  OPENAI_API_KEY: optionalSecret,
  ANTHROPIC_API_KEY: optionalSecret,
  GOOGLE_AI_API_KEY: optionalSecret,
  TOGETHER_API_KEY: optionalSecret,

  // News
  NEWSCATCHER_API_KEY: optionalSecret,

  // Supabase
  SUPABASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  SUPABASE_KEY: optionalSecret,
  SUPABASE_BUCKET: z.string().min(1).default("forecasts"),

  // Pipeline
  OUTPUT_DIR: z.string().min(1).default("forecasts"),
  RETRY_DELAY_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().nonnegative().default(30_000)
  ),

  // General
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  DATA_DIR: z.string().default("./data"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type BaseEnv = z.infer<typeof baseEnvSchema>;

/**
 * Base configuration - shared across packages
 */
export interface BaseConfig {
  providers: {
    openaiApiKey?: string;
    anthropicApiKey?: string;
    googleApiKey?: string;
    togetherApiKey?: string;
  };

  news: {
    newscatcherApiKey?: string;
  };

  supabase?: {
    url: string;
    key: string;
    bucket: string;
  };

  pipeline: {
    outputDir: string;
    retryDelayMs: number;
  };

  env: {
    logLevel: "debug" | "info" | "warn" | "error";
    dataDir: string;
    nodeEnv: "development" | "production" | "test";
  };
}

/**
 * "path: message; path: message" for a failed parse
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

let baseConfigInstance: BaseConfig | null = null;

/**
 * Load and validate base configuration
 */
export function loadBaseConfig(source: NodeJS.ProcessEnv = process.env): BaseConfig {
  const parseResult = baseEnvSchema.safeParse(source);

  if (!parseResult.success) {
    throw new ConfigError(`Configuration validation failed: ${formatZodIssues(parseResult.error)}`);
  }

  const env = parseResult.data;

  return {
    providers: {
      openaiApiKey: env.OPENAI_API_KEY,
      anthropicApiKey: env.ANTHROPIC_API_KEY,
      googleApiKey: env.GOOGLE_AI_API_KEY,
      togetherApiKey: env.TOGETHER_API_KEY,
    },

    news: {
      newscatcherApiKey: env.NEWSCATCHER_API_KEY,
    },

    supabase: env.SUPABASE_URL && env.SUPABASE_KEY
      ? {
          url: env.SUPABASE_URL,
          key: env.SUPABASE_KEY,
          bucket: env.SUPABASE_BUCKET,
        }
      : undefined,

    pipeline: {
      outputDir: env.OUTPUT_DIR,
      retryDelayMs: env.RETRY_DELAY_MS,
    },

    env: {
      logLevel: env.LOG_LEVEL,
      dataDir: env.DATA_DIR,
      nodeEnv: env.NODE_ENV,
    },
  };
}

/**
 * Get base configuration (lazy-loaded singleton)
 */
export function getBaseConfig(): BaseConfig {
  if (!baseConfigInstance) {
    baseConfigInstance = loadBaseConfig();
  }
  return baseConfigInstance;
}

/**
 * Reset config (for testing)
 */
export function resetBaseConfig(): void {
  baseConfigInstance = null;
}

/**
 * Helper to require environment variable
 */
export function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new ConfigError(`Missing required environment variable: ${name}`, { name });
  }
  return value;
}

/**
 * Helper to get optional environment variable with default
 */
export function getEnv(name: string, defaultValue: string): string {
  return process.env[name] ?? defaultValue;
}
