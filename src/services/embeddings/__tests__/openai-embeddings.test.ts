import OpenAI from 'openai';
import { EmbeddingError, RateLimitError } from '../../../core/errors.js';
import { OpenAIEmbeddingProvider, type EmbeddingsClient } from '../openai-embeddings.js';

type Step = { vectors: number[][] } | { fail: unknown };

/**
 * Stands in for `client.embeddings`: records every request body and plays
 * back scripted vectors or errors.
 */
function scriptedClient(steps: Step[]) {
  const requests: Array<string | string[]> = [];
  const client: EmbeddingsClient = {
    embeddings: {
      create: async (body) => {
        requests.push(body.input);
        const step = steps.shift();
        if (!step) {
          throw new Error('no scripted response left');
        }
        if ('fail' in step) {
          throw step.fail;
        }
        return { data: step.vectors.map((embedding) => ({ embedding })) };
      },
    },
  };
  return { client, requests };
}

function rateLimited(retryAfterSeconds?: string) {
  return new OpenAI.APIError(
    429,
    { message: 'slow down' },
    undefined,
    retryAfterSeconds === undefined ? undefined : { 'retry-after': retryAfterSeconds }
  );
}

function providerFor(steps: Step[]) {
  const { client, requests } = scriptedClient(steps);
  const delays: number[] = [];
  const provider = new OpenAIEmbeddingProvider(client, {
    model: 'test-embedding',
    sleep: async (ms) => {
      delays.push(ms);
    },
  });
  return { provider, requests, delays };
}

describe('OpenAIEmbeddingProvider', () => {
  test('embed returns a unit-length vector', async () => {
    const { provider, requests } = providerFor([{ vectors: [[3, 4]] }]);

    expect(await provider.embed('failed requests')).toEqual([0.6, 0.8]);
    expect(requests).toEqual(['failed requests']);
    expect(provider.modelName).toBe('test-embedding');
  });

  test('embed refuses blank text without calling the API', async () => {
    const { provider, requests } = providerFor([]);

    await expect(provider.embed('   ')).rejects.toThrow(EmbeddingError);
    expect(requests).toEqual([]);
  });

  test('embedBatch skips blank texts and keeps input positions', async () => {
    const { provider, requests } = providerFor([{ vectors: [[2, 0], [0, 5]] }]);

    const vectors = await provider.embedBatch(['pods', '  ', 'nodes']);

    expect(requests).toEqual([['pods', 'nodes']]);
    expect(vectors).toEqual([[1, 0], [], [0, 1]]);
  });

  test('embedBatch sends at most 100 texts per request', async () => {
    const texts = Array.from({ length: 101 }, (_, i) => `question ${i}`);
    const { provider, requests } = providerFor([
      { vectors: texts.slice(0, 100).map(() => [1, 0]) },
      { vectors: [[0, 2]] },
    ]);

    const vectors = await provider.embedBatch(texts);

    expect(requests.map((input) => input.length)).toEqual([100, 1]);
    expect(vectors[100]).toEqual([0, 1]);
  });

  test('rate limits are retried, honoring Retry-After', async () => {
    const { provider, requests, delays } = providerFor([
      { fail: rateLimited('3') },
      { fail: rateLimited() },
      { vectors: [[1, 0]] },
    ]);

    expect(await provider.embedBatch(['pods'])).toEqual([[1, 0]]);
    expect(requests).toHaveLength(3);
    expect(delays).toEqual([3000, 2000]);
  });

  test('gives up after five rate-limited requests', async () => {
    const { provider, requests, delays } = providerFor(
      Array.from({ length: 5 }, () => ({ fail: rateLimited() }))
    );

    await expect(provider.embedBatch(['pods'])).rejects.toThrow(RateLimitError);
    expect(requests).toHaveLength(5);
    expect(delays).toEqual([1000, 2000, 4000, 8000]);
  });

  test('other failures are not retried', async () => {
    const { provider, requests } = providerFor([
      { fail: new Error('socket hang up') },
      { vectors: [[1, 0]] },
    ]);

    await expect(provider.embedBatch(['pods'])).rejects.toThrow(
      'Failed to embed batch starting at 0: socket hang up'
    );
    expect(requests).toHaveLength(1);
  });

  test('isAvailable reports a failing endpoint as unavailable', async () => {
    const { provider } = providerFor([{ fail: new Error('unreachable') }]);
    expect(await provider.isAvailable()).toBe(false);
  });

  test('isAvailable is true when the probe succeeds', async () => {
    const { provider, requests } = providerFor([{ vectors: [[1]] }]);
    expect(await provider.isAvailable()).toBe(true);
    expect(requests).toEqual(['test']);
  });
});
