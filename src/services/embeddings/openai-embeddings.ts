/**
 * OpenAI Embedding Provider
 *
 * Implements EmbeddingProvider over the openai SDK. Works with both the
 * OpenAI and the AzureOpenAI client. Batches are retried with exponential
 * backoff on rate limits; vectors are returned at unit length.
 */

import OpenAI from 'openai';
import { retryWithBackoff, type SleepFn } from '../../core/concurrency.js';
import { createLogger } from '../../core/logger.js';
import type { EmbeddingProvider, EmbeddingProviderType } from './types.js';
import { EmbeddingError, RateLimitError } from './types.js';
import { normalizeVector } from './vector-math.js';

const log = createLogger('openai-embeddings');

const DEFAULT_MODEL = 'text-embedding-3-small';
const BATCH_SIZE = 100; // API maximum is 2048
const BATCH_MAX_ATTEMPTS = 5;
const INITIAL_BACKOFF_MS = 1000;

/**
 * The part of the OpenAI / AzureOpenAI client this provider calls.
 */
export interface EmbeddingsClient {
  embeddings: {
    create(body: { model: string; input: string | string[] }): Promise<{
      data: Array<{ embedding: number[] }>;
    }>;
  };
}

export interface OpenAIEmbeddingProviderOptions {
  model?: string;
  providerType?: EmbeddingProviderType;
  sleep?: SleepFn;
}

/**
 * OpenAI embedding provider implementation.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly providerType: EmbeddingProviderType;

  private client: EmbeddingsClient;
  private model: string;
  private sleep?: SleepFn;

  constructor(client: EmbeddingsClient, options: OpenAIEmbeddingProviderOptions = {}) {
    this.client = client;
    this.model = options.model ?? DEFAULT_MODEL;
    this.providerType = options.providerType ?? 'openai';
    this.sleep = options.sleep;

    log.debug({ model: this.model, provider: this.providerType }, 'Embedding provider initialized');
  }

  /**
   * Get the model name for embedding versioning.
   */
  get modelName(): string {
    return this.model;
  }

  /**
   * Check if the embeddings endpoint answers.
   */
  async isAvailable(): Promise<boolean> {
    try {
      await this.client.embeddings.create({ model: this.model, input: 'test' });
      return true;
    } catch (error) {
      log.warn({ err: error }, 'Embedding provider not available');
      return false;
    }
  }

  /**
   * Embed a single text string.
   */
  async embed(text: string): Promise<number[]> {
    if (!text || text.trim().length === 0) {
      throw new EmbeddingError('Cannot embed empty text', this.providerType);
    }

    try {
      const response = await this.client.embeddings.create({ model: this.model, input: text });
      const first = response.data[0];
      if (!first) {
        throw new EmbeddingError('Embedding response contained no vectors', this.providerType);
      }
      return normalizeVector(first.embedding);
    } catch (error) {
      throw this.toEmbeddingError(error, 'Failed to embed text');
    }
  }

  /**
   * Embed multiple texts with batching and rate limit handling.
   * Empty texts map to empty vectors.
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    // Filter out empty texts and track their indices
    const validTexts: { text: string; index: number }[] = [];
    texts.forEach((text, index) => {
      if (text.trim().length > 0) {
        validTexts.push({ text, index });
      }
    });

    const results: number[][] = texts.map(() => []);
    let completed = 0;

    for (let i = 0; i < validTexts.length; i += BATCH_SIZE) {
      const batch = validTexts.slice(i, i + BATCH_SIZE);

      const response = await retryWithBackoff(
        async () => {
          try {
            return await this.client.embeddings.create({
              model: this.model,
              input: batch.map((v) => v.text),
            });
          } catch (error) {
            throw this.toEmbeddingError(error, `Failed to embed batch starting at ${i}`);
          }
        },
        {
          attempts: BATCH_MAX_ATTEMPTS,
          delayMs: INITIAL_BACKOFF_MS,
          shouldRetry: (error) => error instanceof RateLimitError,
          delayFor: (error) => (error instanceof RateLimitError ? error.retryAfterMs : undefined),
          onRetry: (_error, attempt, delayMs) =>
            log.warn({ attempt, delayMs, batchStart: i }, 'Rate limited, retrying with backoff'),
          sleep: this.sleep,
        }
      );

      // Map results back to original indices
      response.data.forEach((item, j) => {
        const target = batch[j];
        if (target) {
          results[target.index] = normalizeVector(item.embedding);
        }
      });

      completed += batch.length;
      log.debug({ batchStart: i, batchSize: batch.length, completed }, 'Batch embedded');
    }

    return results;
  }

  private toEmbeddingError(error: unknown, context: string): EmbeddingError {
    if (error instanceof EmbeddingError) {
      return error;
    }
    if (error instanceof OpenAI.APIError && error.status === 429) {
      return new RateLimitError(this.providerType, this.getRetryAfter(error));
    }
    const cause = error instanceof Error ? error : undefined;
    return new EmbeddingError(
      `${context}: ${cause ? cause.message : String(error)}`,
      this.providerType,
      cause
    );
  }

  /**
   * Extract retry-after time from rate limit error.
   */
  private getRetryAfter(error: InstanceType<typeof OpenAI.APIError>): number | undefined {
    const retryAfter = error.headers?.['retry-after'];
    if (retryAfter) {
      const seconds = parseInt(retryAfter, 10);
      return Number.isNaN(seconds) ? undefined : seconds * 1000;
    }
    return undefined;
  }
}
