// src/store/indexBackend.ts
// What: The contract both vector index variants satisfy, plus the shared ranking and validation logic.
// How: MemoryManager only sees IndexBackend. Ranking is cosine similarity with a stable sort, so equal scores
//      keep insertion order (earlier-inserted first).

import { IndexOperationError } from '../errors.js';
import type { BackendType, Chunk, ScoredChunk } from '../models/types.js';
import { cosine } from '../util/vector.js';

export interface DeleteOutcome {
  deleted: string[];
  failed: string[];
  missing: string[]; // ids the index never had
}

export interface IndexBackend {
  readonly type: BackendType;
  readonly dimensions: number;
  /** Opens persisted state. Throws IndexCorruptedError when it cannot be read back. */
  load(): Promise<void>;
  /** All chunks of one call become visible together, or none do. */
  add(chunks: Chunk[]): Promise<void>;
  search(query: readonly number[], k: number): Promise<ScoredChunk[]>;
  delete(ids: string[]): Promise<DeleteOutcome>;
  clear(): Promise<void>;
  snapshot(): Promise<Buffer>;
  /** Validates the blob completely before replacing live state; failures leave the index untouched. */
  restore(blob: Buffer): Promise<void>;
  count(): number;
  has(id: string): boolean;
  chunkIds(): string[];
  storageBytes(): Promise<number>;
}

export function rankChunks(ordered: readonly Chunk[], query: readonly number[], k: number): ScoredChunk[] {
  const limit = Math.min(Math.max(0, Math.floor(k)), ordered.length);
  if (limit === 0) return [];
  const scored = ordered.map((chunk) => ({ chunk, score: cosine(query, chunk.vector) }));
  scored.sort((a, b) => b.score - a.score);
  return scored.slice(0, limit);
}

export function validateNewChunks(
  chunks: readonly Chunk[],
  dimensions: number,
  exists: (id: string) => boolean,
): void {
  const batch = new Set<string>();
  for (const c of chunks) {
    if (c.vector.length !== dimensions) {
      throw new IndexOperationError(
        `Chunk ${c.id} has ${c.vector.length} dimensions, index expects ${dimensions}`,
        { docIds: [c.source_doc_id] },
      );
    }
    if (exists(c.id) || batch.has(c.id)) {
      throw new IndexOperationError(`Chunk ${c.id} already exists`, { docIds: [c.source_doc_id] });
    }
    batch.add(c.id);
  }
}

export function validateQuery(query: readonly number[], dimensions: number): void {
  if (query.length !== dimensions) {
    throw new IndexOperationError(`Query vector has ${query.length} dimensions, index expects ${dimensions}`);
  }
}
