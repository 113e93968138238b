import type { Example } from '../../../core/types.js';
import { EmbeddingCapability } from '../../embeddings/embedding-service.js';
import type { EmbeddingProvider } from '../../embeddings/types.js';
import { selectRelevantExamples } from '../relevance-selector.js';

function example(question: string): Example {
  return { question, query: `// ${question}` };
}

function fakeProvider(vectors: Record<string, number[]>): EmbeddingProvider {
  const lookup = (text: string): number[] => vectors[text] ?? [0, 0];
  return {
    providerType: 'openai',
    modelName: 'test-embedding',
    embed: async (text) => lookup(text),
    embedBatch: async (texts) => texts.map(lookup),
    isAvailable: async () => true,
  };
}

describe('selectRelevantExamples', () => {
  const corpus = [
    example('Count log lines per container over time'),
    example('Show pods stuck in Pending state'),
    example('Show CPU usage of containers by node'),
  ];

  test('returns at most topK examples, best first', async () => {
    const selection = await selectRelevantExamples('show pods pending', corpus, { topK: 2 });

    expect(selection.selected.length).toBeLessThanOrEqual(2);
    expect(selection.selected[0].example.question).toBe('Show pods stuck in Pending state');
    expect(selection.selected[0].heuristicScore).toBe(6);
    expect(selection.ranked).toHaveLength(3);
    expect(selection.embeddingsUsed).toBe(false);
    expect(selection.usedFallback).toBe(false);
  });

  test('falls back to the first examples in corpus order when nothing overlaps', async () => {
    const unrelated = [example('abc one'), example('def two'), example('ghi six')];

    const selection = await selectRelevantExamples('zzzz qqqq', unrelated);

    expect(selection.usedFallback).toBe(true);
    expect(selection.selected.map((entry) => entry.index)).toEqual([0, 1]);
  });

  test('fallback never exceeds topK', async () => {
    const unrelated = [example('abc one'), example('def two'), example('ghi six')];
    const selection = await selectRelevantExamples('zzzz qqqq', unrelated, { topK: 1 });
    expect(selection.selected).toHaveLength(1);
  });

  test('an empty corpus selects nothing', async () => {
    const selection = await selectRelevantExamples('anything', []);
    expect(selection.selected).toEqual([]);
    expect(selection.usedFallback).toBe(false);
  });

  test('blends cosine similarity when embeddings are available', async () => {
    const examples = [example('abc one'), example('def two')];
    const embeddings = new EmbeddingCapability(
      fakeProvider({ zzzz: [1, 0], 'abc one': [0, 1], 'def two': [1, 0] })
    );

    const selection = await selectRelevantExamples('zzzz', examples, { embeddings });

    expect(selection.embeddingsUsed).toBe(true);
    expect(selection.usedFallback).toBe(false);
    expect(selection.selected.map((entry) => entry.index)).toEqual([1]);
    expect(selection.selected[0].embeddingScore).toBe(1);
    expect(selection.selected[0].finalScore).toBeCloseTo(0.45);
  });

  test('scores heuristically when the provider fails', async () => {
    const provider = fakeProvider({});
    provider.embedBatch = async () => {
      throw new Error('quota exhausted');
    };

    const selection = await selectRelevantExamples('show pods pending', corpus, {
      embeddings: new EmbeddingCapability(provider),
    });

    expect(selection.embeddingsUsed).toBe(false);
    expect(selection.selected[0].finalScore).toBe(6);
  });
});
