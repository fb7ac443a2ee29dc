// src/store/registry.ts
// What: Authoritative table of ingested documents, persisted as one structured record file.
// How: Entries live in an insertion-ordered Map with a fingerprint index beside it. Every mutation computes the
//      next table, writes it atomically, and only then swaps it in, so a failed write leaves the live registry
//      exactly as it was. serialize()/restore() feed the backup store.

import { z } from 'zod';
import { IndexCorruptedError, IndexOperationError, errorMessage } from '../errors.js';
import baseLogger from '../logging.js';
import { FILE_TYPES, type DocumentEntry, type DocumentFilter } from '../models/types.js';
import { diskUsage, readFileIfExists, writeFileAtomic } from '../util/fsAtomic.js';

const logger = baseLogger.child({ component: 'registry' });

const entrySchema = z.object({
  doc_id: z.string().min(1),
  original_filename: z.string().min(1),
  fingerprint: z.string().regex(/^[0-9a-f]{64}$/),
  file_type: z.enum(FILE_TYPES),
  chunk_ids: z.array(z.string().min(1)),
  ingested_at: z.string().datetime(),
  byte_size: z.number().int().nonnegative(),
});

const registryFileSchema = z.object({
  version: z.literal(1),
  documents: z.array(entrySchema),
});

type Table = Map<string, DocumentEntry>;

export class DocumentRegistry {
  private entries: Table = new Map();
  private fingerprints = new Map<string, string>();

  /** Without a file path the registry lives in memory only. */
  constructor(private readonly filePath?: string) {}

  async load(): Promise<void> {
    if (!this.filePath) return;
    const raw = await readFileIfExists(this.filePath);
    if (!raw) {
      this.swap(new Map());
      return;
    }
    this.swap(decodeTable(raw));
    logger.info({ documents: this.entries.size, path: this.filePath }, 'Loaded document registry');
  }

  get(docId: string): DocumentEntry | undefined {
    return this.entries.get(docId);
  }

  has(docId: string): boolean {
    return this.entries.has(docId);
  }

  findByFingerprint(fingerprint: string): DocumentEntry | undefined {
    const docId = this.fingerprints.get(fingerprint);
    return docId === undefined ? undefined : this.entries.get(docId);
  }

  size(): number {
    return this.entries.size;
  }

  /** Newest first. */
  list(filter: DocumentFilter = {}): DocumentEntry[] {
    const needle = filter.search?.trim().toLowerCase();
    const out: DocumentEntry[] = [];
    for (const entry of this.entries.values()) {
      if (filter.file_type && entry.file_type !== filter.file_type) continue;
      if (needle && !entry.original_filename.toLowerCase().includes(needle)) continue;
      out.push(cloneEntry(entry));
    }
    return out.reverse();
  }

  /** Every chunk id referenced by any entry, in registry order. */
  chunkIds(): string[] {
    return [...this.entries.values()].flatMap((e) => e.chunk_ids);
  }

  async record(entry: DocumentEntry): Promise<void> {
    if (this.entries.has(entry.doc_id)) {
      throw new IndexOperationError(`Document ${entry.doc_id} is already registered`, { docIds: [entry.doc_id] });
    }
    const clash = this.fingerprints.get(entry.fingerprint);
    if (clash !== undefined) {
      throw new IndexOperationError(`Fingerprint already registered to ${clash}`, { docIds: [entry.doc_id, clash] });
    }
    const next = new Map(this.entries);
    next.set(entry.doc_id, cloneEntry(entry));
    await this.commit(next);
  }

  /** Removes the given entries; unknown ids are ignored. Returns the ids actually removed. */
  async remove(docIds: string[]): Promise<string[]> {
    const next = new Map(this.entries);
    const removed = docIds.filter((id) => next.delete(id));
    if (removed.length > 0) await this.commit(next);
    return removed;
  }

  /** Narrows an entry to the chunks that are still in the index after a partial delete. */
  async setChunkIds(docId: string, chunkIds: string[]): Promise<void> {
    const current = this.entries.get(docId);
    if (!current) return;
    const next = new Map(this.entries);
    next.set(docId, { ...current, chunk_ids: [...chunkIds] });
    await this.commit(next);
  }

  async clear(): Promise<void> {
    await this.commit(new Map());
  }

  serialize(): Buffer {
    return encodeTable(this.entries);
  }

  async restore(blob: Buffer): Promise<void> {
    await this.commit(decodeTable(blob));
  }

  async storageBytes(): Promise<number> {
    return this.filePath ? diskUsage(this.filePath) : this.serialize().byteLength;
  }

  private async commit(next: Table): Promise<void> {
    if (this.filePath) {
      try {
        await writeFileAtomic(this.filePath, encodeTable(next));
      } catch (err) {
        throw new IndexOperationError(`Failed to persist document registry: ${errorMessage(err)}`, { cause: err });
      }
    }
    this.swap(next);
  }

  private swap(next: Table): void {
    const fingerprints = new Map<string, string>();
    for (const e of next.values()) fingerprints.set(e.fingerprint, e.doc_id);
    this.entries = next;
    this.fingerprints = fingerprints;
  }
}

function cloneEntry(e: DocumentEntry): DocumentEntry {
  return { ...e, chunk_ids: [...e.chunk_ids] };
}

function encodeTable(table: Table): Buffer {
  return Buffer.from(JSON.stringify({ version: 1, documents: [...table.values()] }, null, 2), 'utf8');
}

function decodeTable(raw: Buffer): Table {
  let parsed: z.infer<typeof registryFileSchema>;
  try {
    parsed = registryFileSchema.parse(JSON.parse(raw.toString('utf8')));
  } catch (err) {
    throw new IndexCorruptedError(`Document registry unreadable: ${errorMessage(err)}`, { cause: err });
  }
  const table: Table = new Map();
  const fingerprints = new Set<string>();
  for (const e of parsed.documents) {
    if (table.has(e.doc_id)) throw new IndexCorruptedError(`Duplicate registry entry ${e.doc_id}`);
    if (fingerprints.has(e.fingerprint)) {
      throw new IndexCorruptedError(`Duplicate fingerprint in registry for ${e.doc_id}`, { docIds: [e.doc_id] });
    }
    fingerprints.add(e.fingerprint);
    table.set(e.doc_id, e);
  }
  return table;
}
