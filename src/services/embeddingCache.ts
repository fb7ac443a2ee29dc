// src/services/embeddingCache.ts
// What: Persistent embedding cache in front of any EmbeddingPort.
// How: Keys are sha256(model + text). Hits are served from memory; misses go to the wrapped port in one call
//      and are written back to a JSON file. An unreadable cache file is logged and replaced, never fatal.

import { createHash } from 'crypto';
import { z } from 'zod';
import baseLogger from '../logging.js';
import { readFileIfExists, writeFileAtomic } from '../util/fsAtomic.js';
import type { EmbeddingPort } from './embeddings.js';

const logger = baseLogger.child({ component: 'embedding-cache' });

const cacheFileSchema = z.object({
  version: z.literal(1),
  model: z.string(),
  entries: z.record(z.array(z.number())),
});

export class CachedEmbeddings implements EmbeddingPort {
  private entries: Map<string, number[]> | null = null;

  constructor(
    private readonly inner: EmbeddingPort,
    private readonly cachePath: string,
  ) {}

  get model(): string {
    return this.inner.model;
  }

  get dimensions(): number {
    return this.inner.dimensions;
  }

  async embed(texts: string[]): Promise<number[][]> {
    const entries = await this.load();
    const keys = texts.map((t) => this.key(t));
    const missing: string[] = [];
    const missingKeys = new Set<string>();
    keys.forEach((k, i) => {
      if (!entries.has(k) && !missingKeys.has(k)) {
        missingKeys.add(k);
        missing.push(texts[i]);
      }
    });

    if (missing.length > 0 || texts.length === 0) {
      // Empty input still reaches the wrapped port so it can reject it.
      const vectors = await this.inner.embed(missing);
      missing.forEach((t, i) => entries.set(this.key(t), vectors[i]));
      await this.save(entries);
    }

    return keys.map((k) => {
      const v = entries.get(k);
      if (!v) throw new Error(`Embedding cache lost entry ${k}`);
      return v;
    });
  }

  /** Number of cached vectors; loads the cache file on first use. */
  async size(): Promise<number> {
    return (await this.load()).size;
  }

  private key(text: string): string {
    return createHash('sha256').update(this.inner.model).update('\u0000').update(text).digest('hex');
  }

  private async load(): Promise<Map<string, number[]>> {
    if (this.entries) return this.entries;
    const entries = new Map<string, number[]>();
    const raw = await readFileIfExists(this.cachePath);
    if (raw) {
      try {
        const parsed = cacheFileSchema.parse(JSON.parse(raw.toString('utf8')));
        if (parsed.model === this.inner.model) {
          for (const [k, v] of Object.entries(parsed.entries)) entries.set(k, v);
        } else {
          logger.info({ cached: parsed.model, current: this.inner.model }, 'Embedding model changed; starting a fresh cache');
        }
      } catch (err) {
        logger.warn({ err, path: this.cachePath }, 'Embedding cache unreadable; starting fresh');
      }
    }
    this.entries = entries;
    return entries;
  }

  private async save(entries: Map<string, number[]>): Promise<void> {
    const out = { version: 1, model: this.inner.model, entries: Object.fromEntries(entries) };
    try {
      await writeFileAtomic(this.cachePath, JSON.stringify(out));
    } catch (err) {
      // Entries stay in memory; only persistence is lost.
      logger.warn({ err, path: this.cachePath }, 'Failed to persist embedding cache');
    }
  }
}
