import { describe, expect, it } from 'vitest';
import { ChunkingError } from '../../../src/errors.js';
import { Chunker } from '../../../src/services/chunking.js';
import { P1, THREE_PARAGRAPHS } from '../../helpers.js';

describe('Chunker', () => {
  it('prefers paragraph breaks and overlaps on word boundaries', () => {
    const windows = new Chunker({ chunkSize: 50, chunkOverlap: 10 }).split(THREE_PARAGRAPHS).toArray();

    expect(windows.map((w) => [w.start, w.end])).toEqual([
      [0, 30],
      [18, 62],
      [49, 94],
    ]);
    expect(windows[0].text).toBe(P1);
    expect(windows[1].text).toBe('river trade.\n\nBeta notes about hill castles.');
    expect(windows[2].text).toBe('hill castles.\n\nGamma notes about sea harbors.');
    for (const w of windows) {
      expect(THREE_PARAGRAPHS.slice(w.start, w.end)).toBe(w.text);
    }
  });

  it('falls back to sentence ends, then whitespace', () => {
    const text = 'One two. Three four five six.';
    const windows = new Chunker({ chunkSize: 15, chunkOverlap: 0 }).split(text).toArray();

    expect(windows.map((w) => w.text)).toEqual(['One two.', 'Three four five', 'six.']);
  });

  it('hard-cuts text with no boundaries at all', () => {
    const windows = new Chunker({ chunkSize: 10, chunkOverlap: 0 }).split('x'.repeat(25)).toArray();

    expect(windows.map((w) => [w.start, w.end])).toEqual([
      [0, 10],
      [10, 20],
      [20, 25],
    ]);
  });

  it('never splits a surrogate pair on a hard cut', () => {
    const text = '😀'.repeat(10);
    const windows = new Chunker({ chunkSize: 5, chunkOverlap: 0 }).split(text).toArray();

    expect(windows.map((w) => [w.start, w.end])).toEqual([
      [0, 4],
      [4, 8],
      [8, 12],
      [12, 16],
      [16, 20],
    ]);
    const loneSurrogate = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;
    for (const w of windows) {
      expect(w.text).toBe('😀😀');
      expect(loneSurrogate.test(w.text)).toBe(false);
    }
    expect(windows.map((w) => w.text).join('')).toBe(text);
  });

  it('can iterate the same sequence more than once', () => {
    const seq = new Chunker({ chunkSize: 50, chunkOverlap: 10 }).split(THREE_PARAGRAPHS);
    expect([...seq]).toEqual([...seq]);
  });

  it('keeps short text in a single window', () => {
    const windows = new Chunker().split('  short note  ').toArray();
    expect(windows).toEqual([{ text: 'short note', start: 2, end: 12 }]);
  });

  it('validates its settings and input', () => {
    expect(() => new Chunker({ chunkSize: 100, chunkOverlap: 100 })).toThrow(
      'chunk_size (100) must be greater than chunk_overlap (100)',
    );
    expect(() => new Chunker({ chunkSize: 0 })).toThrow(ChunkingError);
    expect(() => new Chunker({ chunkSize: 10.5, chunkOverlap: 0 })).toThrow(ChunkingError);
    expect(() => new Chunker({ chunkOverlap: -1 })).toThrow(ChunkingError);
    expect(() => new Chunker().split(' \n\t ')).toThrow('Cannot chunk empty text');
  });
});
