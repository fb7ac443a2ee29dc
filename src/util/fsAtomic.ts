// src/util/fsAtomic.ts
// What: Crash-safe file writes.
// How: Writes to a sibling temp file, fsyncs it, then renames over the target so readers only ever
//      observe the previous or the next complete version.

import fs from 'fs/promises';
import type { Stats } from 'fs';
import path from 'path';
import { randomBytes } from 'crypto';

export async function writeFileAtomic(target: string, data: string | Buffer): Promise<void> {
  await fs.mkdir(path.dirname(target), { recursive: true });
  const tmp = path.join(path.dirname(target), `.${path.basename(target)}.${randomBytes(4).toString('hex')}.tmp`);
  const handle = await fs.open(tmp, 'w');
  try {
    await handle.writeFile(data);
    await handle.sync();
  } finally {
    await handle.close();
  }
  try {
    await fs.rename(tmp, target);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

export async function readFileIfExists(target: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(target);
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

export function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/** Sum of file sizes below a directory (or of a single file). Missing paths count as zero. */
export async function diskUsage(target: string): Promise<number> {
  const st = await statIfExists(target);
  if (!st) return 0;
  if (st.isFile()) return st.size;
  if (!st.isDirectory()) return 0;
  let total = 0;
  const entries = await fs.readdir(target, { withFileTypes: true });
  for (const e of entries) {
    total += await diskUsage(path.join(target, e.name));
  }
  return total;
}

async function statIfExists(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}
