/**
 * Embedding Service
 *
 * - Creates the embedding provider from configuration (OpenAI key, or an
 *   Azure embedding deployment next to the chat endpoint)
 * - Wraps it in a capability that is probed once and degrades to
 *   "unavailable" instead of failing a translation
 */

import OpenAI, { AzureOpenAI } from 'openai';
import { API_VERSIONS, normalizeEndpoint } from '../../config/llm-config.js';
import type { PipelineConfig } from '../../config/pipeline-config.js';
import { withTimeout } from '../../core/concurrency.js';
import { createLogger } from '../../core/logger.js';
import { OpenAIEmbeddingProvider } from './openai-embeddings.js';
import type { EmbeddingProvider } from './types.js';

const log = createLogger('embedding-service');

/**
 * Create an embedding provider from configuration.
 * Returns null when no embedding credential is configured.
 */
export function createEmbeddingProvider(config: PipelineConfig): EmbeddingProvider | null {
  if (config.embeddingDeployment && config.azureEndpoint && config.azureApiKey) {
    log.debug({ deployment: config.embeddingDeployment }, 'Creating Azure embedding provider');
    const client = new AzureOpenAI({
      endpoint: normalizeEndpoint(config.azureEndpoint),
      apiKey: config.azureApiKey,
      apiVersion: API_VERSIONS.standard,
      deployment: config.embeddingDeployment,
      maxRetries: 0,
      timeout: config.embeddingTimeoutMs,
    });
    return new OpenAIEmbeddingProvider(client, {
      model: config.embeddingDeployment,
      providerType: 'azure-openai',
    });
  }

  if (config.openaiApiKey) {
    log.debug({ model: config.embeddingModel }, 'Creating OpenAI embedding provider');
    const client = new OpenAI({
      apiKey: config.openaiApiKey,
      maxRetries: 0,
      timeout: config.embeddingTimeoutMs,
    });
    return new OpenAIEmbeddingProvider(client, { model: config.embeddingModel });
  }

  return null;
}

/**
 * Vectors for one question and a list of example texts.
 */
export interface QuestionEmbeddings {
  question: number[];
  examples: number[][];
}

/**
 * Optional semantic scoring capability.
 *
 * `available()` probes the provider once per instance. When the provider is
 * missing or the probe fails, callers score heuristically. A failure while
 * embedding a particular request also reports null for that request only.
 */
export class EmbeddingCapability {
  private probe: Promise<boolean> | null = null;
  private readonly cache = new Map<string, number[]>();

  constructor(private readonly provider: EmbeddingProvider | null) {}

  static disabled(): EmbeddingCapability {
    return new EmbeddingCapability(null);
  }

  available(): Promise<boolean> {
    if (!this.provider) {
      return Promise.resolve(false);
    }
    if (!this.probe) {
      const provider = this.provider;
      this.probe = provider.isAvailable().then(
        (ok) => {
          log.info({ provider: provider.providerType, model: provider.modelName, ok }, 'Embedding capability probed');
          return ok;
        },
        (error: unknown) => {
          log.warn({ err: error }, 'Embedding probe failed');
          return false;
        }
      );
    }
    return this.probe;
  }

  /**
   * Embed the question and every example text. Example vectors are cached
   * by text for the lifetime of this capability. With a budget, null is
   * reported once it runs out and the request scores heuristically.
   */
  async embedForScoring(
    question: string,
    texts: string[],
    budgetMs?: number
  ): Promise<QuestionEmbeddings | null> {
    if (!this.provider) {
      return null;
    }
    if (budgetMs === undefined) {
      return this.embedAll(this.provider, question, texts);
    }
    if (budgetMs <= 0) {
      return null;
    }
    return withTimeout(this.embedAll(this.provider, question, texts), budgetMs, () => {
      log.warn({ budgetMs }, 'Embedding budget exhausted, scoring heuristically for this request');
      return null;
    });
  }

  private async embedAll(
    provider: EmbeddingProvider,
    question: string,
    texts: string[]
  ): Promise<QuestionEmbeddings | null> {
    try {
      if (!(await this.available())) {
        return null;
      }

      const missing = [...new Set(texts.filter((text) => !this.cache.has(text)))];
      if (missing.length > 0) {
        const vectors = await provider.embedBatch(missing);
        missing.forEach((text, i) => {
          this.cache.set(text, vectors[i] ?? []);
        });
      }

      const questionVector = await provider.embed(question);
      return {
        question: questionVector,
        examples: texts.map((text) => this.cache.get(text) ?? []),
      };
    } catch (error) {
      log.warn({ err: error }, 'Embedding failed, scoring heuristically for this request');
      return null;
    }
  }
}
