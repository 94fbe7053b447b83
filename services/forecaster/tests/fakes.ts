/**
 * In-process stand-ins for the pipeline's external capabilities
 */

import type { DateRange, DocumentSource, ExtractedPage, RawDocument, SearchOptions } from "@foresight/news";
import type { CompletionRequest, ICompletion } from "../src/shared/executor/types.js";
import type { IEmbedder } from "../src/shared/embedding/types.js";
import type { IStore } from "../src/shared/store/types.js";
import type { PageSource } from "../src/systems/retrieval/background.js";

export type Responder = (request: CompletionRequest) => string | Promise<string>;

export class FakeCompletion implements ICompletion {
  readonly requests: CompletionRequest[] = [];
  private readonly respond: Responder;

  constructor(respond: Responder) {
    this.respond = respond;
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    return this.respond(request);
  }

  async completeAll(requests: readonly CompletionRequest[]): Promise<string[]> {
    return Promise.all(requests.map((request) => this.complete(request)));
  }

  promptsFor(model: string): string[] {
    return this.requests.filter((request) => request.model === model).map((request) => request.prompt);
  }
}

/**
 * Embeds a text as the vector registered for the first matching needle,
 * or [0, 1] when none matches
 */
export class FakeEmbedder implements IEmbedder {
  calls = 0;
  private readonly vectors: Array<[string, number[]]>;

  constructor(vectors: Array<[string, number[]]> = []) {
    this.vectors = vectors;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    this.calls++;
    return texts.map((text) => this.vectors.find(([needle]) => text.includes(needle))?.[1] ?? [0, 1]);
  }
}

export class FailingEmbedder implements IEmbedder {
  async embed(): Promise<number[][]> {
    throw new Error("embedding service unavailable");
  }
}

export class FakeSource implements DocumentSource {
  readonly id: string;
  readonly queries: string[] = [];
  private readonly results: (query: string) => RawDocument[];

  constructor(id: string, results: (query: string) => RawDocument[]) {
    this.id = id;
    this.results = results;
  }

  async search(query: string, _range: DateRange, options: SearchOptions): Promise<RawDocument[]> {
    this.queries.push(query);
    return this.results(query).slice(0, options.limit);
  }
}

export class FakePages implements PageSource {
  readonly fetched: string[] = [];
  private readonly pages: Record<string, ExtractedPage>;

  constructor(pages: Record<string, ExtractedPage> = {}) {
    this.pages = pages;
  }

  async fetch(url: string): Promise<ExtractedPage | null> {
    this.fetched.push(url);
    return this.pages[url] ?? null;
  }
}

export class MemoryStore implements IStore {
  readonly data = new Map<string, unknown>();

  async read<T>(key: string): Promise<T | null> {
    const value = this.data.get(key);
    if (value === undefined) return null;
    const copy: T = JSON.parse(JSON.stringify(value));
    return copy;
  }

  async write<T>(key: string, data: T): Promise<void> {
    this.data.set(key, JSON.parse(JSON.stringify(data)));
  }

  async exists(key: string): Promise<boolean> {
    return this.data.has(key);
  }

  async delete(key: string): Promise<boolean> {
    return this.data.delete(key);
  }

  async list(pattern?: string): Promise<string[]> {
    return [...this.data.keys()].filter((key) => !pattern || key.includes(pattern)).sort();
  }

  getPath(key: string): string {
    return `memory://${key}`;
  }
}

export function rawDocument(overrides: Partial<RawDocument> = {}): RawDocument {
  return {
    title: "Central bank holds rates",
    link: "https://news.example.com/rates",
    text: "The central bank left its benchmark rate unchanged. ".repeat(10),
    publishedAt: "2024-03-05",
    sourceSite: "news.example.com",
    ...overrides,
  };
}
