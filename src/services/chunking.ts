// src/services/chunking.ts
// What: Boundary-aware overlapping chunker with stable offsets.
// How: Walks the text with a window of at most chunkSize characters. Each window ends at the last paragraph
//      break that fits, else the last sentence end, else the last whitespace, else a hard cut. The next window
//      starts chunkOverlap characters before the previous end, moved back to the start of that word.
//      split() validates eagerly and returns a lazy sequence that can be iterated any number of times.

import { ChunkingError } from '../errors.js';

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

export interface TextWindow {
  text: string;
  start: number; // inclusive offset into the source text
  end: number; // exclusive
}

export interface ChunkerOptions {
  chunkSize?: number;
  chunkOverlap?: number;
}

interface CutRule {
  pattern: RegExp;
  cutAt: 'start' | 'end';
}

// Ordered by preference.
const CUT_RULES: CutRule[] = [
  { pattern: /\n[ \t]*\n/g, cutAt: 'start' },
  { pattern: /[.!?]+["')\]]*(?=\s)/g, cutAt: 'end' },
  { pattern: /\s/g, cutAt: 'start' },
];

export class Chunker {
  readonly chunkSize: number;
  readonly chunkOverlap: number;

  constructor(opts: ChunkerOptions = {}) {
    const size = opts.chunkSize ?? DEFAULT_CHUNK_SIZE;
    const overlap = opts.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;
    if (!Number.isInteger(size) || size <= 0) {
      throw new ChunkingError(`chunk_size must be a positive integer, got ${size}`);
    }
    if (!Number.isInteger(overlap) || overlap < 0) {
      throw new ChunkingError(`chunk_overlap must be a non-negative integer, got ${overlap}`);
    }
    if (size <= overlap) {
      throw new ChunkingError(`chunk_size (${size}) must be greater than chunk_overlap (${overlap})`);
    }
    this.chunkSize = size;
    this.chunkOverlap = overlap;
  }

  split(text: string): ChunkSequence {
    if (text.trim().length === 0) {
      throw new ChunkingError('Cannot chunk empty text');
    }
    return new ChunkSequence(text, this.chunkSize, this.chunkOverlap);
  }
}

export class ChunkSequence implements Iterable<TextWindow> {
  constructor(
    readonly source: string,
    private readonly size: number,
    private readonly overlap: number,
  ) {}

  *[Symbol.iterator](): Iterator<TextWindow> {
    yield* windows(this.source, this.size, this.overlap);
  }

  toArray(): TextWindow[] {
    return Array.from(this);
  }
}

function* windows(text: string, size: number, overlap: number): Generator<TextWindow> {
  const n = text.length;
  let start = skipWhitespace(text, 0);
  let prevEnd = -1;

  while (start < n) {
    let hardEnd = Math.min(start + size, n);
    if (prevEnd >= 0 && !hasContent(text, prevEnd, hardEnd)) {
      // Nothing new fits behind the overlap; drop it for this window.
      start = skipWhitespace(text, prevEnd);
      hardEnd = Math.min(start + size, n);
    }
    const floor = prevEnd >= 0 ? prevEnd : start;
    const end = hardEnd === n ? trimEnd(text, start, n) : findCut(text, start, hardEnd, floor);

    yield { text: text.slice(start, end), start, end };

    if (skipWhitespace(text, end) >= n) return;
    start = overlapStart(text, start, end, size, overlap);
    prevEnd = end;
  }
}

function findCut(text: string, start: number, hardEnd: number, floor: number): number {
  // One extra character so a sentence ending exactly at hardEnd can see its trailing space.
  const region = text.slice(start, Math.min(text.length, hardEnd + 1));
  for (const rule of CUT_RULES) {
    let best = -1;
    for (const m of region.matchAll(rule.pattern)) {
      const idx = m.index ?? 0;
      const cut = start + (rule.cutAt === 'start' ? idx : idx + m[0].length);
      if (cut > hardEnd) break;
      const trimmed = trimEnd(text, start, cut);
      if (trimmed > floor) best = trimmed;
    }
    if (best > 0) return best;
  }
  // Hard cut, never between the two halves of a surrogate pair.
  const e = trimEnd(text, start, hardEnd);
  return e - 1 > start && isHighSurrogate(text.charCodeAt(e - 1)) ? e - 1 : e;
}

function overlapStart(text: string, start: number, end: number, size: number, overlap: number): number {
  const resume = skipWhitespace(text, end);
  if (overlap === 0) return resume;
  const s = end - overlap;
  if (s <= start) return resume;

  // Back to the start of the word s falls in, as long as the next window can still pass `end`.
  let b = s;
  while (b - 1 > start && !isWhitespace(text[b - 1])) b--;
  if (b > start && isWhitespace(text[b - 1]) && b + size > end) {
    return skipWhitespace(text, b) < end ? skipWhitespace(text, b) : resume;
  }

  // Otherwise forward to the next word start inside the previous window.
  let f = s;
  while (f < end && !isWhitespace(text[f])) f++;
  f = skipWhitespace(text, f);
  return f < end ? f : resume;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isWhitespace(ch: string | undefined): boolean {
  return ch !== undefined && /\s/.test(ch);
}

function skipWhitespace(text: string, from: number): number {
  let i = from;
  while (i < text.length && isWhitespace(text[i])) i++;
  return i;
}

function trimEnd(text: string, start: number, end: number): number {
  let e = end;
  while (e > start && isWhitespace(text[e - 1])) e--;
  return e;
}

function hasContent(text: string, from: number, to: number): boolean {
  for (let i = from; i < to; i++) {
    if (!isWhitespace(text[i])) return true;
  }
  return false;
}
