/**
 * Relevance Selector
 *
 * Picks the examples most similar to a question. Heuristic scores are
 * blended with embedding cosine similarity when the embedding capability
 * is available:
 *
 *   final = 0.55 * (heuristic / maxHeuristic) + 0.45 * cosine
 *
 * Without embeddings the heuristic score is used as is.
 */

import { DEFAULTS } from '../../config/defaults.js';
import { createLogger } from '../../core/logger.js';
import type { Example, RelevanceSelection, ScoredExample } from '../../core/types.js';
import type { EmbeddingCapability } from '../embeddings/embedding-service.js';
import { cosineSimilarity } from '../embeddings/vector-math.js';
import { scoreHeuristic } from './lexical-scoring.js';

const log = createLogger('relevance-selector');

export const BLEND_WEIGHTS = {
  HEURISTIC: 0.55,
  EMBEDDING: 0.45,
} as const;

export interface SelectionOptions {
  topK?: number;
  /** Examples taken in corpus order when nothing scores positive */
  minGrounding?: number;
  embeddings?: EmbeddingCapability;
  /** Time allowed for embedding before scoring heuristically */
  embeddingBudgetMs?: number;
}

/**
 * Score-descending; equal scores keep corpus order.
 */
function rank(scored: ScoredExample[]): ScoredExample[] {
  return [...scored].sort((a, b) => b.finalScore - a.finalScore || a.index - b.index);
}

export async function selectRelevantExamples(
  question: string,
  examples: readonly Example[],
  options: SelectionOptions = {}
): Promise<RelevanceSelection> {
  const topK = Math.max(1, options.topK ?? DEFAULTS.FEW_SHOT_TOP_K);
  const minGrounding = Math.max(1, options.minGrounding ?? DEFAULTS.FEW_SHOT_MIN_GROUNDING);

  if (examples.length === 0) {
    return { selected: [], ranked: [], embeddingsUsed: false, usedFallback: false };
  }

  const heuristic = examples.map((example) => scoreHeuristic(question, example.question));
  const maxHeuristic = Math.max(0, ...heuristic);

  const vectors = options.embeddings
    ? await options.embeddings.embedForScoring(
        question,
        examples.map((example) => example.question),
        options.embeddingBudgetMs
      )
    : null;
  const embeddingsUsed = vectors !== null;

  const scored: ScoredExample[] = examples.map((example, index) => {
    const heuristicScore = heuristic[index];
    if (!vectors) {
      return { example, index, heuristicScore, embeddingScore: null, finalScore: heuristicScore };
    }
    const embeddingScore = cosineSimilarity(vectors.question, vectors.examples[index] ?? []);
    const normalized = maxHeuristic > 0 ? heuristicScore / maxHeuristic : 0;
    return {
      example,
      index,
      heuristicScore,
      embeddingScore,
      finalScore: BLEND_WEIGHTS.HEURISTIC * normalized + BLEND_WEIGHTS.EMBEDDING * embeddingScore,
    };
  });

  const ranked = rank(scored);
  let selected = ranked.filter((entry) => entry.finalScore > 0).slice(0, topK);
  let usedFallback = false;

  if (selected.length === 0) {
    // Corpus order, not rank order: nothing here is more relevant than the rest
    selected = scored.slice(0, Math.min(minGrounding, scored.length, topK));
    usedFallback = true;
  }

  log.debug(
    {
      embeddingsUsed,
      maxHeuristic,
      usedFallback,
      topScores: ranked.slice(0, 3).map((entry) => Math.round(entry.finalScore * 10000) / 10000),
    },
    'Examples selected'
  );

  return { selected, ranked, embeddingsUsed, usedFallback };
}
