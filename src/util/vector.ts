// src/util/vector.ts
// What: Vector helpers shared by both index backends.
// How: cosine() scores two vectors (0 when either has zero norm),
//      encodeVector()/decodeVector() store vectors as base64 little-endian float32.

export function cosine(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let na = 0;
  let nb = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i];
    const y = b[i];
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export function encodeVector(v: readonly number[]): string {
  const f32 = Float32Array.from(v);
  return Buffer.from(f32.buffer, f32.byteOffset, f32.byteLength).toString('base64');
}

/** Returns null when the payload is not a whole number of float32 values. */
export function decodeVector(encoded: string): number[] | null {
  const buf = Buffer.from(encoded, 'base64');
  if (buf.byteLength % 4 !== 0) return null;
  const out: number[] = [];
  for (let offset = 0; offset < buf.byteLength; offset += 4) {
    out.push(buf.readFloatLE(offset));
  }
  return out;
}
