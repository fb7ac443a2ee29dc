// src/services/embeddings.ts
// What: Embedding port and its OpenAI implementation.
// How: EmbeddingPort is the only thing the manager knows about embeddings. OpenAIEmbeddings splits input into
//      batches of EMBED_BATCH_SIZE, fans them out through p-limit, restores input order, and validates that
//      every vector has the configured dimension. Provider failures become EmbeddingError.

import OpenAI from 'openai';
import pLimit from 'p-limit';
import { EmbeddingError, errorMessage } from '../errors.js';

export interface EmbeddingPort {
  readonly model: string;
  readonly dimensions: number;
  embed(texts: string[]): Promise<number[][]>;
}

/** The slice of the OpenAI client used here; lets tests pass an in-process stand-in. */
export interface EmbeddingsClient {
  embeddings: {
    create(params: {
      model: string;
      input: string[];
      dimensions?: number;
    }): Promise<{ data: { embedding: number[]; index: number }[] }>;
  };
}

export interface OpenAIEmbeddingsOptions {
  apiKey?: string;
  model: string;
  dimensions: number;
  batchSize?: number;
  concurrency?: number;
  client?: EmbeddingsClient;
}

export class OpenAIEmbeddings implements EmbeddingPort {
  readonly model: string;
  readonly dimensions: number;
  private readonly client: EmbeddingsClient;
  private readonly batchSize: number;
  private readonly concurrency: number;

  constructor(opts: OpenAIEmbeddingsOptions) {
    this.model = opts.model;
    this.dimensions = opts.dimensions;
    this.batchSize = Math.max(1, opts.batchSize ?? 32);
    this.concurrency = Math.max(1, opts.concurrency ?? 2);
    this.client = opts.client ?? new OpenAI({ apiKey: opts.apiKey });
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      throw new EmbeddingError('Cannot embed an empty list of texts');
    }
    const batches: string[][] = [];
    for (let offset = 0; offset < texts.length; offset += this.batchSize) {
      batches.push(texts.slice(offset, offset + this.batchSize));
    }
    const limit = pLimit(this.concurrency);
    const results = await Promise.all(batches.map((batch) => limit(() => this.embedBatch(batch))));
    return results.flat();
  }

  private async embedBatch(batch: string[]): Promise<number[][]> {
    let data: { embedding: number[]; index: number }[];
    try {
      const res = await this.client.embeddings.create({
        model: this.model,
        input: batch,
        // Only the text-embedding-3 family accepts a dimensions override.
        dimensions: this.model.startsWith('text-embedding-3') ? this.dimensions : undefined,
      });
      data = res.data;
    } catch (err) {
      throw new EmbeddingError(`Embedding provider failed: ${errorMessage(err)}`, { cause: err });
    }
    if (data.length !== batch.length) {
      throw new EmbeddingError(`Embedding provider returned ${data.length} vectors for ${batch.length} inputs`);
    }
    const vectors = [...data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
    for (const v of vectors) {
      if (v.length !== this.dimensions) {
        throw new EmbeddingError(`Unexpected embedding size; expected ${this.dimensions}, got ${v.length}`);
      }
    }
    return vectors;
  }
}
