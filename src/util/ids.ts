// src/util/ids.ts
// What: Identifier helpers.
// How: Documents get uuid v4 ids; chunk ids are derived from the owning document and ordinal;
//      snapshot ids are a compact UTC timestamp plus random hex so they sort by creation time.

import { randomBytes } from 'crypto';
import { v4 as uuidv4 } from 'uuid';

export function newDocId(): string {
  return uuidv4();
}

export function chunkId(docId: string, ordinal: number): string {
  return `${docId}:${ordinal}`;
}

export function newSnapshotId(now: Date = new Date()): string {
  const ts = now.toISOString().replace(/[-:.]/g, '');
  const rand = randomBytes(4).toString('hex');
  return `${ts}-${rand}`;
}
