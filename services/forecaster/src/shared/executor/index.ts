export * from "./types.js";
export * from "./models.js";
export { CompletionRouter, type CompletionRouterOptions, type ProviderTable } from "./router.js";
export { OpenAICompletionProvider, createTogetherProvider, TOGETHER_BASE_URL } from "./openai.js";
export type { OpenAIProviderOptions } from "./openai.js";
export { ClaudeCompletionProvider, type ClaudeProviderOptions } from "./claude.js";
export { GoogleCompletionProvider } from "./google.js";
