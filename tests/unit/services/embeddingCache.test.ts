import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CachedEmbeddings } from '../../../src/services/embeddingCache.js';
import { HashEmbeddings, removeDir, tempDir } from '../../helpers.js';

describe('CachedEmbeddings', () => {
  let dir: string;
  let cachePath: string;

  beforeEach(async () => {
    dir = await tempDir();
    cachePath = path.join(dir, 'cache', 'embeddings.json');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('only sends unseen texts to the wrapped port', async () => {
    const inner = new HashEmbeddings(8);
    const cached = new CachedEmbeddings(inner, cachePath);

    const first = await cached.embed(['alpha', 'beta', 'alpha']);
    const second = await cached.embed(['beta', 'gamma']);

    expect(inner.textsEmbedded).toBe(3);
    expect(first).toEqual([inner.vector('alpha'), inner.vector('beta'), inner.vector('alpha')]);
    expect(second).toEqual([inner.vector('beta'), inner.vector('gamma')]);
    expect(await cached.size()).toBe(3);
  });

  it('serves hits from the cache file after a restart', async () => {
    await new CachedEmbeddings(new HashEmbeddings(8), cachePath).embed(['alpha']);

    const inner = new HashEmbeddings(8);
    const reopened = new CachedEmbeddings(inner, cachePath);
    expect(await reopened.embed(['alpha'])).toEqual([inner.vector('alpha')]);
    expect(inner.calls).toBe(0);
  });

  it('starts fresh when the cache file is unreadable', async () => {
    await fs.mkdir(path.dirname(cachePath), { recursive: true });
    await fs.writeFile(cachePath, 'garbage');

    const inner = new HashEmbeddings(8);
    const cached = new CachedEmbeddings(inner, cachePath);
    await cached.embed(['alpha']);

    expect(inner.calls).toBe(1);
    const saved: unknown = JSON.parse(await fs.readFile(cachePath, 'utf8'));
    expect(saved).toMatchObject({ version: 1, model: 'test-hash' });
  });

  it('passes empty input through so the wrapped port rejects it', async () => {
    const cached = new CachedEmbeddings(new HashEmbeddings(8), cachePath);
    await expect(cached.embed([])).rejects.toThrow('Cannot embed an empty list of texts');
  });
});
