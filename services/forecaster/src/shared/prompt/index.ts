export * from "./types.js";
export { PromptRegistry, renderTemplate, placeholdersOf, definePrompt } from "./registry.js";
export * from "./library.js";
