import { describe, expect, it } from 'vitest';
import { IndexCorruptedError } from '../../../src/errors.js';
import type { Chunk } from '../../../src/models/types.js';
import { decodeIndexBlob, encodeIndexBlob, toRecord } from '../../../src/store/codec.js';

const chunks: Chunk[] = [
  { id: 'd1:0', text: 'first', vector: [1, 0], source_doc_id: 'd1', offset_start: 0, offset_end: 5 },
  { id: 'd1:1', text: 'second', vector: [0, 0.5], source_doc_id: 'd1', offset_start: 3, offset_end: 9 },
];

function blob(body: Record<string, unknown>): Buffer {
  return Buffer.from(JSON.stringify({ format: 'index-blob', version: 1, backend_type: 'flat', dimensions: 2, ...body }));
}

describe('index blob codec', () => {
  it('decodes what it encodes, keeping the backend type', () => {
    const decoded = decodeIndexBlob(encodeIndexBlob('document', 2, chunks), 2);
    expect(decoded.backendType).toBe('document');
    expect(decoded.chunks).toEqual(chunks);
  });

  it('rejects blobs built for another dimension', () => {
    expect(() => decodeIndexBlob(encodeIndexBlob('flat', 2, chunks), 3)).toThrow(
      'Index was built with 2-dimensional vectors, expected 3',
    );
  });

  it('rejects malformed envelopes, vectors and duplicate ids as corruption', () => {
    expect(() => decodeIndexBlob(Buffer.from('{'), 2)).toThrow(IndexCorruptedError);
    expect(() => decodeIndexBlob(blob({ format: 'other', chunks: [] }), 2)).toThrow(IndexCorruptedError);

    const shortVector = { ...toRecord(chunks[0]), vector: Buffer.from(Float32Array.from([1]).buffer).toString('base64') };
    expect(() => decodeIndexBlob(blob({ chunks: [shortVector] }), 2)).toThrow(
      'Chunk d1:0 has a malformed vector (expected 2 dimensions, got 1)',
    );

    const dup = toRecord(chunks[0]);
    expect(() => decodeIndexBlob(blob({ chunks: [dup, dup] }), 2)).toThrow('Duplicate chunk id d1:0');
  });
});
