/**
 * Embedding capability
 */
export interface IEmbedder {
  /**
   * One vector per input text, in input order
   */
  embed(texts: readonly string[]): Promise<number[][]>;
}
