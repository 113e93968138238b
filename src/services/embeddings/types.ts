/**
 * Embedding Service Types
 *
 * Provider abstraction used by the relevance selector's semantic score.
 */

export type EmbeddingProviderType = 'openai' | 'azure-openai';

/**
 * Pluggable embedding provider interface.
 */
export interface EmbeddingProvider {
  /** Provider type identifier */
  readonly providerType: EmbeddingProviderType;

  /** Model or deployment name */
  readonly modelName: string;

  /**
   * Embed a single text string.
   * @returns Unit-length embedding vector
   */
  embed(text: string): Promise<number[]>;

  /**
   * Embed multiple texts with batching and rate limit handling.
   * @returns One unit-length vector per input, in input order
   */
  embedBatch(texts: string[]): Promise<number[][]>;

  /**
   * Check if the provider is reachable and configured correctly.
   */
  isAvailable(): Promise<boolean>;
}

export { EmbeddingError, RateLimitError } from '../../core/errors.js';
