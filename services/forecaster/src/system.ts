/**
 * Forecasting System
 * Wires providers, sources and storage into the retrieval and reasoning passes
 */

import { getBaseConfig, logger, type BaseConfig } from "@foresight/core";
import { GoogleNewsSource, NewsCatcherClient, PageFetcher, type DocumentSource } from "@foresight/news";
import { CompletionRouter, type ProviderTable } from "./shared/executor/router.js";
import { OpenAICompletionProvider, createTogetherProvider } from "./shared/executor/openai.js";
import { GoogleCompletionProvider } from "./shared/executor/google.js";
import { ClaudeCompletionProvider } from "./shared/executor/claude.js";
import { OpenAIEmbedder } from "./shared/embedding/openai.js";
import { createFileStore } from "./shared/store/file.js";
import { createSupabaseStore, getSupabase } from "./shared/store/supabase.js";
import type { IStore } from "./shared/store/types.js";
import { createRetrievalConfig, type RetrievalConfig, type RetrievalConfigInput } from "./systems/retrieval/config.js";
import type { RetrievalDependencies } from "./systems/retrieval/pipeline.js";
import { createReasoningConfig, type ReasoningConfig, type ReasoningConfigInput } from "./systems/reasoning/config.js";
import { retrieveAndForecast } from "./systems/evaluation/evaluator.js";
import { runForecastBatch } from "./systems/evaluation/batch.js";
import type { BatchSummary, ForecastQuestionInput, ForecastRecord } from "./systems/evaluation/types.js";
import {
  labelQuestions,
  type LabelableQuestion,
  type LabelerOptions,
  type LabelingResult,
} from "./systems/labeling/labeler.js";

const log = logger.child({ component: "forecasting-system" });

export interface ForecastingDependencies extends RetrievalDependencies {
  store: IStore;
}

export interface ForecastingSystemOptions {
  retrieval?: RetrievalConfigInput;
  reasoning?: ReasoningConfigInput;

  /** Store prefix for batch results (default: OUTPUT_DIR) */
  outputDir?: string;
}

export interface RunBatchOptions {
  outputDir?: string;
  retrievalIndex?: number;
}

/**
 * Production dependencies from the base config. Providers whose key is
 * missing are not registered; requests for their models fail with a
 * ConfigError at call time.
 */
export function createDefaultDependencies(config: BaseConfig = getBaseConfig()): ForecastingDependencies {
  const { providers, news, pipeline } = config;

  const table: ProviderTable = {};
  if (providers.openaiApiKey) {
    table.openai = new OpenAICompletionProvider({ apiKey: providers.openaiApiKey });
  }
  if (providers.anthropicApiKey) {
    table.anthropic = new ClaudeCompletionProvider();
  }
  if (providers.googleApiKey) {
    table.google = new GoogleCompletionProvider(providers.googleApiKey);
  }
  if (providers.togetherApiKey) {
    table.together = createTogetherProvider(providers.togetherApiKey);
  }

  const pages = new PageFetcher();
  const sources: DocumentSource[] = [];
  if (news.newscatcherApiKey) {
    sources.push(new NewsCatcherClient({ apiKey: news.newscatcherApiKey, retryDelayMs: pipeline.retryDelayMs }));
  }
  sources.push(new GoogleNewsSource({ pages }));

  const store = config.supabase
    ? createSupabaseStore(getSupabase(config.supabase.url, config.supabase.key), config.supabase.bucket)
    : createFileStore(config.env.dataDir);

  log.debug("Created default dependencies", {
    providers: Object.keys(table),
    sources: sources.map((source) => source.id),
    store: config.supabase ? "supabase" : "file",
  });

  return {
    completion: new CompletionRouter({ providers: table, retryDelayMs: pipeline.retryDelayMs }),
    embedder: new OpenAIEmbedder({ apiKey: providers.openaiApiKey, retryDelayMs: pipeline.retryDelayMs }),
    sources,
    pages,
    store,
  };
}

export class ForecastingSystem {
  readonly retrievalConfig: RetrievalConfig;
  readonly reasoningConfig: ReasoningConfig;
  private readonly outputDir: string;
  private readonly deps: ForecastingDependencies;

  constructor(options: ForecastingSystemOptions = {}, deps?: Partial<ForecastingDependencies>) {
    // Invalid configs throw here, before any dependency is built
    this.retrievalConfig = createRetrievalConfig(options.retrieval);
    this.reasoningConfig = createReasoningConfig(options.reasoning);

    let defaults: ForecastingDependencies | null = null;
    const fallback = (): ForecastingDependencies => (defaults ??= createDefaultDependencies());

    this.deps = {
      completion: deps?.completion ?? fallback().completion,
      embedder: deps?.embedder ?? fallback().embedder,
      sources: deps?.sources ?? fallback().sources,
      pages: deps?.pages ?? fallback().pages,
      store: deps?.store ?? fallback().store,
    };
    this.outputDir = options.outputDir ?? getBaseConfig().pipeline.outputDir;
  }

  /**
   * Forecast one question; null when retrieval failed
   */
  async forecast(question: ForecastQuestionInput): Promise<ForecastRecord | null> {
    return retrieveAndForecast(question, this.retrievalConfig, this.reasoningConfig, this.deps);
  }

  /**
   * Forecast and store each question, skipping those already stored
   */
  async runBatch(questions: readonly ForecastQuestionInput[], options: RunBatchOptions = {}): Promise<BatchSummary> {
    return runForecastBatch(questions, this.deps, {
      retrievalConfig: this.retrievalConfig,
      reasoningConfig: this.reasoningConfig,
      store: this.deps.store,
      outputDir: options.outputDir ?? this.outputDir,
      retrievalIndex: options.retrievalIndex,
    });
  }

  async label(
    questions: readonly LabelableQuestion[],
    options: LabelerOptions & { concurrency?: number }
  ): Promise<LabelingResult> {
    return labelQuestions(questions, this.deps.completion, options);
  }

  getInfo(): { baseModels: readonly string[]; strategy: string; sources: string[]; outputDir: string } {
    return {
      baseModels: this.reasoningConfig.baseModels,
      strategy: this.reasoningConfig.strategy,
      sources: this.deps.sources.map((source) => source.id),
      outputDir: this.outputDir,
    };
  }
}

export function createForecastingSystem(
  options?: ForecastingSystemOptions,
  deps?: Partial<ForecastingDependencies>
): ForecastingSystem {
  return new ForecastingSystem(options, deps);
}
