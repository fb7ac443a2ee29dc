import { describe, expect, it } from 'vitest';
import { cosine, decodeVector, encodeVector } from '../../../src/util/vector.js';

describe('cosine', () => {
  it('scores direction, not magnitude', () => {
    expect(cosine([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 12);
    expect(cosine([1, 0], [0, 1])).toBe(0);
    expect(cosine([1, 0], [-3, 0])).toBe(-1);
  });

  it('returns 0 when either vector has zero norm', () => {
    expect(cosine([0, 0], [1, 1])).toBe(0);
    expect(cosine([1, 1], [0, 0])).toBe(0);
  });
});

describe('vector encoding', () => {
  it('stores float32 values as base64', () => {
    const encoded = encodeVector([0.5, -2, 3.25]);
    expect(encoded).toBe(Buffer.from(Float32Array.from([0.5, -2, 3.25]).buffer).toString('base64'));
    expect(decodeVector(encoded)).toEqual([0.5, -2, 3.25]);
  });

  it('rejects payloads that are not a whole number of floats', () => {
    expect(decodeVector('AAA=')).toBeNull();
    expect(decodeVector('')).toEqual([]);
  });
});
