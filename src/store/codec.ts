// src/store/codec.ts
// What: Wire format for index contents, shared by both backends and by snapshots.
// How: Chunks are serialized as JSON records with base64 float32 vectors. decodeIndexBlob() validates the
//      envelope with zod and every vector's dimension, and reports any problem as IndexCorruptedError.

import { z } from 'zod';
import { IndexCorruptedError, errorMessage } from '../errors.js';
import type { BackendType, Chunk } from '../models/types.js';
import { decodeVector, encodeVector } from '../util/vector.js';

export const chunkRecordSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  source_doc_id: z.string().min(1),
  offset_start: z.number().int().nonnegative(),
  offset_end: z.number().int().nonnegative(),
  vector: z.string(),
});

export type ChunkRecord = z.infer<typeof chunkRecordSchema>;

const indexBlobSchema = z.object({
  format: z.literal('index-blob'),
  version: z.literal(1),
  backend_type: z.enum(['flat', 'document']),
  dimensions: z.number().int().nonnegative(),
  chunks: z.array(chunkRecordSchema),
});

export interface DecodedIndex {
  backendType: BackendType;
  chunks: Chunk[];
}

export function toRecord(c: Chunk): ChunkRecord {
  return {
    id: c.id,
    text: c.text,
    source_doc_id: c.source_doc_id,
    offset_start: c.offset_start,
    offset_end: c.offset_end,
    vector: encodeVector(c.vector),
  };
}

export function fromRecord(r: ChunkRecord, dimensions: number): Chunk {
  const vector = decodeVector(r.vector);
  if (!vector || vector.length !== dimensions) {
    throw new IndexCorruptedError(
      `Chunk ${r.id} has a malformed vector (expected ${dimensions} dimensions, got ${vector?.length ?? 'unreadable'})`,
    );
  }
  return {
    id: r.id,
    text: r.text,
    source_doc_id: r.source_doc_id,
    offset_start: r.offset_start,
    offset_end: r.offset_end,
    vector,
  };
}

export function encodeIndexBlob(backendType: BackendType, dimensions: number, chunks: readonly Chunk[]): Buffer {
  const out = {
    format: 'index-blob',
    version: 1,
    backend_type: backendType,
    dimensions,
    chunks: chunks.map(toRecord),
  };
  return Buffer.from(JSON.stringify(out), 'utf8');
}

export function decodeIndexBlob(blob: Buffer, dimensions: number): DecodedIndex {
  let raw: unknown;
  try {
    raw = JSON.parse(blob.toString('utf8'));
  } catch (err) {
    throw new IndexCorruptedError(`Index data is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = indexBlobSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new IndexCorruptedError(`Index data failed validation: ${issues}`);
  }
  if (parsed.data.dimensions !== dimensions) {
    throw new IndexCorruptedError(
      `Index was built with ${parsed.data.dimensions}-dimensional vectors, expected ${dimensions}`,
    );
  }
  const chunks = parsed.data.chunks.map((r) => fromRecord(r, dimensions));
  assertUniqueIds(chunks);
  return { backendType: parsed.data.backend_type, chunks };
}

function assertUniqueIds(chunks: readonly Chunk[]): void {
  const seen = new Set<string>();
  for (const c of chunks) {
    if (seen.has(c.id)) throw new IndexCorruptedError(`Duplicate chunk id ${c.id}`);
    seen.add(c.id);
  }
}
