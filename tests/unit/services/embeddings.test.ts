import { describe, expect, it } from 'vitest';
import { EmbeddingError } from '../../../src/errors.js';
import { OpenAIEmbeddings, type EmbeddingsClient } from '../../../src/services/embeddings.js';

interface Call {
  model: string;
  input: string[];
  dimensions?: number;
}

function fakeClient(opts: { reverse?: boolean; size?: number; fail?: boolean } = {}): {
  client: EmbeddingsClient;
  calls: Call[];
} {
  const calls: Call[] = [];
  const client: EmbeddingsClient = {
    embeddings: {
      async create(params) {
        calls.push(params);
        if (opts.fail) throw new Error('rate limited');
        const data = params.input.map((text, index) => ({
          index,
          embedding: new Array<number>(opts.size ?? 2).fill(text.length),
        }));
        return { data: opts.reverse ? data.reverse() : data };
      },
    },
  };
  return { client, calls };
}

describe('OpenAIEmbeddings', () => {
  it('batches input and keeps the input order', async () => {
    const { client, calls } = fakeClient({ reverse: true });
    const embeddings = new OpenAIEmbeddings({ model: 'text-embedding-3-small', dimensions: 2, batchSize: 2, client });

    const vectors = await embeddings.embed(['a', 'bb', 'ccc', 'dddd', 'eeeee']);

    expect(vectors).toEqual([
      [1, 1],
      [2, 2],
      [3, 3],
      [4, 4],
      [5, 5],
    ]);
    expect(calls.map((c) => c.input)).toEqual([['a', 'bb'], ['ccc', 'dddd'], ['eeeee']]);
  });

  it('only sends a dimensions override to models that accept one', async () => {
    const v3 = fakeClient();
    await new OpenAIEmbeddings({ model: 'text-embedding-3-large', dimensions: 2, client: v3.client }).embed(['x']);
    expect(v3.calls[0].dimensions).toBe(2);

    const ada = fakeClient();
    await new OpenAIEmbeddings({ model: 'text-embedding-ada-002', dimensions: 2, client: ada.client }).embed(['x']);
    expect(ada.calls[0].dimensions).toBeUndefined();
  });

  it('rejects empty input without calling the provider', async () => {
    const { client, calls } = fakeClient();
    const embeddings = new OpenAIEmbeddings({ model: 'm', dimensions: 2, client });
    await expect(embeddings.embed([])).rejects.toBeInstanceOf(EmbeddingError);
    expect(calls).toEqual([]);
  });

  it('reports provider failures and wrong-sized vectors as EmbeddingError', async () => {
    const failing = new OpenAIEmbeddings({ model: 'm', dimensions: 2, client: fakeClient({ fail: true }).client });
    await expect(failing.embed(['x'])).rejects.toThrow('Embedding provider failed: rate limited');

    const wrongSize = new OpenAIEmbeddings({ model: 'm', dimensions: 2, client: fakeClient({ size: 3 }).client });
    await expect(wrongSize.embed(['x'])).rejects.toThrow('Unexpected embedding size; expected 2, got 3');
  });
});
