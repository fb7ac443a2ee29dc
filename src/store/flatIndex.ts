// src/store/flatIndex.ts
// What: Flat in-memory vector index with optional single-file persistence.
// How: Chunks live in one array in insertion order and search is a linear cosine scan. There is no native
//      delete: delete() rebuilds the array from the surviving chunks, so callers should batch deletions.
//      Every mutation builds the next state, persists it (when a store path is set), then swaps it in.

import { IndexOperationError, errorMessage } from '../errors.js';
import baseLogger from '../logging.js';
import type { Chunk, ScoredChunk } from '../models/types.js';
import { diskUsage, readFileIfExists, writeFileAtomic } from '../util/fsAtomic.js';
import { decodeIndexBlob, encodeIndexBlob } from './codec.js';
import {
  type DeleteOutcome,
  type IndexBackend,
  rankChunks,
  validateNewChunks,
  validateQuery,
} from './indexBackend.js';

const logger = baseLogger.child({ component: 'flat-index' });

export interface FlatIndexOptions {
  dimensions: number;
  storePath?: string; // JSON file; purely in-memory when omitted
}

export class FlatIndex implements IndexBackend {
  readonly type = 'flat' as const;
  readonly dimensions: number;
  private readonly storePath?: string;
  private chunks: Chunk[] = [];
  private ids = new Set<string>();

  constructor(opts: FlatIndexOptions) {
    this.dimensions = opts.dimensions;
    this.storePath = opts.storePath;
  }

  async load(): Promise<void> {
    if (!this.storePath) return;
    const raw = await readFileIfExists(this.storePath);
    if (!raw) {
      this.swap([]);
      return;
    }
    const decoded = decodeIndexBlob(raw, this.dimensions);
    this.swap(decoded.chunks);
    logger.info({ chunks: this.chunks.length, path: this.storePath }, 'Loaded flat index');
  }

  async add(chunks: Chunk[]): Promise<void> {
    validateNewChunks(chunks, this.dimensions, (id) => this.ids.has(id));
    if (chunks.length === 0) return;
    const next = [...this.chunks, ...chunks];
    await this.commit(next, 'add');
  }

  async search(query: readonly number[], k: number): Promise<ScoredChunk[]> {
    validateQuery(query, this.dimensions);
    return rankChunks(this.chunks, query, k);
  }

  async delete(ids: string[]): Promise<DeleteOutcome> {
    const drop = new Set(ids);
    const present = [...drop].filter((id) => this.ids.has(id));
    const missing = [...drop].filter((id) => !this.ids.has(id));
    if (present.length === 0) return { deleted: [], failed: [], missing };

    const survivors = this.chunks.filter((c) => !drop.has(c.id));
    try {
      await this.commit(survivors, 'delete');
    } catch (err) {
      logger.error({ err, count: present.length }, 'Flat index rebuild failed; nothing deleted');
      return { deleted: [], failed: present, missing };
    }
    logger.debug({ removed: present.length, remaining: survivors.length }, 'Rebuilt flat index');
    return { deleted: present, failed: [], missing };
  }

  async clear(): Promise<void> {
    await this.commit([], 'clear');
  }

  async snapshot(): Promise<Buffer> {
    return encodeIndexBlob(this.type, this.dimensions, this.chunks);
  }

  async restore(blob: Buffer): Promise<void> {
    const decoded = decodeIndexBlob(blob, this.dimensions);
    await this.commit(decoded.chunks, 'restore');
  }

  count(): number {
    return this.chunks.length;
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  chunkIds(): string[] {
    return this.chunks.map((c) => c.id);
  }

  async storageBytes(): Promise<number> {
    if (this.storePath) return diskUsage(this.storePath);
    let total = 0;
    for (const c of this.chunks) total += Buffer.byteLength(c.text, 'utf8') + c.vector.length * 4;
    return total;
  }

  private async commit(next: Chunk[], op: string): Promise<void> {
    if (this.storePath) {
      try {
        await writeFileAtomic(this.storePath, encodeIndexBlob(this.type, this.dimensions, next));
      } catch (err) {
        throw new IndexOperationError(`Flat index ${op} failed to persist: ${errorMessage(err)}`, { cause: err });
      }
    }
    this.swap(next);
  }

  private swap(next: Chunk[]): void {
    this.chunks = next;
    this.ids = new Set(next.map((c) => c.id));
  }
}
