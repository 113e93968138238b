/**
 * Embeddings Service - Public API
 */

// Types
export type { EmbeddingProvider, EmbeddingProviderType } from './types.js';

// Provider implementation
export {
  OpenAIEmbeddingProvider,
  type EmbeddingsClient,
  type OpenAIEmbeddingProviderOptions,
} from './openai-embeddings.js';

// Service functions
export {
  createEmbeddingProvider,
  EmbeddingCapability,
  type QuestionEmbeddings,
} from './embedding-service.js';

export { cosineSimilarity, normalizeVector } from './vector-math.js';
