// src/store/documentIndex.ts
// What: Persistent document-oriented vector index with native delete-by-id.
// How: The persistence directory holds meta.json plus one JSON file per source document under docs/.
//      Each chunk carries a persisted sequence number so search ties keep insertion order across restarts.
//      add() writes every touched document file and undoes the ones already written if a later one fails.
//      delete() rewrites or unlinks only the affected document files, each atomically, without a rebuild.
//      clear() and restore() swap whole docs/ directories by rename.

import fs from 'fs/promises';
import path from 'path';
import { randomBytes } from 'crypto';
import { z } from 'zod';
import { IndexCorruptedError, IndexOperationError, errorMessage } from '../errors.js';
import baseLogger from '../logging.js';
import type { Chunk, ScoredChunk } from '../models/types.js';
import { diskUsage, isNotFound, readFileIfExists, writeFileAtomic } from '../util/fsAtomic.js';
import { chunkRecordSchema, decodeIndexBlob, encodeIndexBlob, fromRecord, toRecord } from './codec.js';
import {
  type DeleteOutcome,
  type IndexBackend,
  rankChunks,
  validateNewChunks,
  validateQuery,
} from './indexBackend.js';

const logger = baseLogger.child({ component: 'document-index' });

const DOCS_DIR = 'docs';
const META_FILE = 'meta.json';

const metaSchema = z.object({
  version: z.literal(1),
  dimensions: z.number().int().nonnegative(),
});

const docFileSchema = z.object({
  version: z.literal(1),
  source_doc_id: z.string().min(1),
  chunks: z.array(chunkRecordSchema.extend({ seq: z.number().int().nonnegative() })),
});

interface StoredChunk {
  chunk: Chunk;
  seq: number;
}

export interface DocumentIndexOptions {
  dimensions: number;
  dir: string;
}

export class DocumentIndex implements IndexBackend {
  readonly type = 'document' as const;
  readonly dimensions: number;
  private readonly dir: string;
  private docs = new Map<string, StoredChunk[]>();
  private byId = new Map<string, StoredChunk>();
  private nextSeq = 0;
  private ordered: Chunk[] | null = null;

  constructor(opts: DocumentIndexOptions) {
    this.dimensions = opts.dimensions;
    this.dir = opts.dir;
  }

  private get docsDir(): string {
    return path.join(this.dir, DOCS_DIR);
  }

  async load(): Promise<void> {
    await fs.mkdir(this.docsDir, { recursive: true });
    await this.removeLeftovers();
    await this.checkMeta();

    const docs = new Map<string, StoredChunk[]>();
    const entries = await fs.readdir(this.docsDir, { withFileTypes: true });
    for (const e of entries) {
      if (!e.isFile() || !e.name.endsWith('.json') || e.name.startsWith('.')) continue;
      const file = path.join(this.docsDir, e.name);
      const raw = await fs.readFile(file, 'utf8');
      const stored = this.parseDocFile(raw, e.name);
      docs.set(stored.docId, stored.chunks);
    }
    this.swap(docs);
    logger.info({ documents: docs.size, chunks: this.byId.size, dir: this.dir }, 'Loaded document index');
  }

  async add(chunks: Chunk[]): Promise<void> {
    validateNewChunks(chunks, this.dimensions, (id) => this.byId.has(id));
    if (chunks.length === 0) return;

    let seq = this.nextSeq;
    const next = new Map(this.docs);
    for (const chunk of chunks) {
      const current = next.get(chunk.source_doc_id) ?? [];
      next.set(chunk.source_doc_id, [...current, { chunk, seq: seq++ }]);
    }
    const touched = [...new Set(chunks.map((c) => c.source_doc_id))];

    const written: string[] = [];
    try {
      for (const docId of touched) {
        await this.writeDoc(docId, next.get(docId) ?? []);
        written.push(docId);
      }
    } catch (err) {
      await this.undoWrites(written);
      throw new IndexOperationError(`Document index add failed: ${errorMessage(err)}`, {
        docIds: touched,
        cause: err,
      });
    }
    this.swap(next);
  }

  async search(query: readonly number[], k: number): Promise<ScoredChunk[]> {
    validateQuery(query, this.dimensions);
    return rankChunks(this.orderedChunks(), query, k);
  }

  async delete(ids: string[]): Promise<DeleteOutcome> {
    const unique = [...new Set(ids)];
    const missing = unique.filter((id) => !this.byId.has(id));
    const grouped = new Map<string, Set<string>>();
    for (const id of unique) {
      const stored = this.byId.get(id);
      if (!stored) continue;
      const docId = stored.chunk.source_doc_id;
      const set = grouped.get(docId) ?? new Set<string>();
      set.add(id);
      grouped.set(docId, set);
    }

    const deleted: string[] = [];
    const failed: string[] = [];
    const next = new Map(this.docs);
    for (const [docId, drop] of grouped) {
      const survivors = (this.docs.get(docId) ?? []).filter((s) => !drop.has(s.chunk.id));
      try {
        if (survivors.length === 0) await this.unlinkDoc(docId);
        else await this.writeDoc(docId, survivors);
      } catch (err) {
        logger.error({ err, doc_id: docId }, 'Failed to delete chunks from document file');
        failed.push(...drop);
        continue;
      }
      if (survivors.length === 0) next.delete(docId);
      else next.set(docId, survivors);
      deleted.push(...drop);
    }
    this.swap(next);
    return { deleted, failed, missing };
  }

  async clear(): Promise<void> {
    await this.replaceDocsDir(new Map());
  }

  async snapshot(): Promise<Buffer> {
    return encodeIndexBlob(this.type, this.dimensions, this.orderedChunks());
  }

  async restore(blob: Buffer): Promise<void> {
    const decoded = decodeIndexBlob(blob, this.dimensions);
    const docs = new Map<string, StoredChunk[]>();
    decoded.chunks.forEach((chunk, seq) => {
      const current = docs.get(chunk.source_doc_id) ?? [];
      current.push({ chunk, seq });
      docs.set(chunk.source_doc_id, current);
    });
    await this.replaceDocsDir(docs);
  }

  count(): number {
    return this.byId.size;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  chunkIds(): string[] {
    return this.orderedChunks().map((c) => c.id);
  }

  async storageBytes(): Promise<number> {
    return diskUsage(this.dir);
  }

  // -------------------- persistence helpers --------------------

  private docPath(docId: string, dir = this.docsDir): string {
    return path.join(dir, `${encodeURIComponent(docId)}.json`);
  }

  private async writeDoc(docId: string, stored: StoredChunk[], dir = this.docsDir): Promise<void> {
    const out = {
      version: 1,
      source_doc_id: docId,
      chunks: stored.map((s) => ({ ...toRecord(s.chunk), seq: s.seq })),
    };
    await writeFileAtomic(this.docPath(docId, dir), JSON.stringify(out));
  }

  private async unlinkDoc(docId: string): Promise<void> {
    try {
      await fs.unlink(this.docPath(docId));
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
  }

  private async undoWrites(docIds: string[]): Promise<void> {
    for (const docId of docIds) {
      const previous = this.docs.get(docId);
      try {
        if (previous) await this.writeDoc(docId, previous);
        else await this.unlinkDoc(docId);
      } catch (err) {
        logger.error({ err, doc_id: docId }, 'Could not undo partial document index write');
      }
    }
  }

  /** Writes a complete docs/ tree beside the live one, then swaps the two by rename. */
  private async replaceDocsDir(docs: Map<string, StoredChunk[]>): Promise<void> {
    const suffix = randomBytes(4).toString('hex');
    const staging = path.join(this.dir, `${DOCS_DIR}.staging-${suffix}`);
    const retired = path.join(this.dir, `${DOCS_DIR}.old-${suffix}`);
    try {
      await fs.mkdir(staging, { recursive: true });
      for (const [docId, stored] of docs) await this.writeDoc(docId, stored, staging);
      await this.writeMeta();
    } catch (err) {
      await fs.rm(staging, { recursive: true, force: true });
      throw new IndexOperationError(`Document index staging failed: ${errorMessage(err)}`, { cause: err });
    }

    try {
      await fs.rename(this.docsDir, retired);
    } catch (err) {
      if (!isNotFound(err)) {
        await fs.rm(staging, { recursive: true, force: true });
        throw new IndexOperationError(`Document index swap failed: ${errorMessage(err)}`, { cause: err });
      }
    }
    try {
      await fs.rename(staging, this.docsDir);
    } catch (err) {
      await fs.rename(retired, this.docsDir).catch((restoreErr: unknown) => {
        logger.error({ err: restoreErr }, 'Could not put previous docs directory back');
      });
      await fs.rm(staging, { recursive: true, force: true });
      throw new IndexOperationError(`Document index swap failed: ${errorMessage(err)}`, { cause: err });
    }

    this.swap(docs);
    await fs.rm(retired, { recursive: true, force: true }).catch((err: unknown) => {
      logger.warn({ err, dir: retired }, 'Failed to remove retired docs directory');
    });
  }

  private async removeLeftovers(): Promise<void> {
    const entries = await fs.readdir(this.dir, { withFileTypes: true });
    for (const e of entries) {
      if (e.isDirectory() && (e.name.startsWith(`${DOCS_DIR}.staging-`) || e.name.startsWith(`${DOCS_DIR}.old-`))) {
        await fs.rm(path.join(this.dir, e.name), { recursive: true, force: true });
      }
    }
  }

  private async checkMeta(): Promise<void> {
    const raw = await readFileIfExists(path.join(this.dir, META_FILE));
    if (!raw) {
      await this.writeMeta();
      return;
    }
    let meta: z.infer<typeof metaSchema>;
    try {
      meta = metaSchema.parse(JSON.parse(raw.toString('utf8')));
    } catch (err) {
      throw new IndexCorruptedError(`Document index metadata unreadable: ${errorMessage(err)}`, { cause: err });
    }
    if (meta.dimensions !== this.dimensions) {
      throw new IndexCorruptedError(
        `Document index was built with ${meta.dimensions}-dimensional vectors, expected ${this.dimensions}`,
      );
    }
  }

  private async writeMeta(): Promise<void> {
    await writeFileAtomic(path.join(this.dir, META_FILE), JSON.stringify({ version: 1, dimensions: this.dimensions }));
  }

  private parseDocFile(raw: string, name: string): { docId: string; chunks: StoredChunk[] } {
    let parsed: z.infer<typeof docFileSchema>;
    try {
      parsed = docFileSchema.parse(JSON.parse(raw));
    } catch (err) {
      throw new IndexCorruptedError(`Document index file ${name} unreadable: ${errorMessage(err)}`, { cause: err });
    }
    const chunks = parsed.chunks.map((r) => {
      const chunk = fromRecord(r, this.dimensions);
      if (chunk.source_doc_id !== parsed.source_doc_id) {
        throw new IndexCorruptedError(`Chunk ${chunk.id} in ${name} belongs to another document`);
      }
      return { chunk, seq: r.seq };
    });
    return { docId: parsed.source_doc_id, chunks };
  }

  private swap(docs: Map<string, StoredChunk[]>): void {
    const byId = new Map<string, StoredChunk>();
    let maxSeq = -1;
    for (const stored of docs.values()) {
      for (const s of stored) {
        if (byId.has(s.chunk.id)) throw new IndexCorruptedError(`Duplicate chunk id ${s.chunk.id}`);
        byId.set(s.chunk.id, s);
        if (s.seq > maxSeq) maxSeq = s.seq;
      }
    }
    this.docs = docs;
    this.byId = byId;
    this.nextSeq = maxSeq + 1;
    this.ordered = null;
  }

  private orderedChunks(): Chunk[] {
    if (!this.ordered) {
      this.ordered = [...this.byId.values()].sort((a, b) => a.seq - b.seq).map((s) => s.chunk);
    }
    return this.ordered;
  }
}
