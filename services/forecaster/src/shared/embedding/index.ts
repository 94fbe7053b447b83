export type { IEmbedder } from "./types.js";
export { cosineSimilarity } from "./similarity.js";
export { OpenAIEmbedder, DEFAULT_EMBEDDING_MODEL, type OpenAIEmbedderOptions } from "./openai.js";
