/**
 * Shared Infrastructure Exports
 */

// Executor (completions)
export * from "./executor/index.js";

// Embedding
export * from "./embedding/index.js";

// Store (results sink)
export * from "./store/index.js";

// Prompt (templates)
export * from "./prompt/index.js";

// Parsing (response extraction, token heuristics)
export * from "./parsing/index.js";

// Concurrency
export * from "./concurrency/index.js";
