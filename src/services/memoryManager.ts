// src/services/memoryManager.ts
// What: Orchestrates ingestion, deduplication, replacement, deletion, backup/restore and health checks over one
//       IndexBackend and one DocumentRegistry.
// How: The (index, registry) pair is guarded by a ReadWriteLock. Queries and health checks share it; every
//      mutation holds it exclusively. Ingest extracts, chunks and fingerprints with no lock, checks duplicates
//      under the read lock, embeds with no lock, then re-checks and commits under the write lock. A registry
//      failure after index.add deletes the just-added chunks again. Destructive operations take an implicit
//      snapshot first and restore it if the index and registry cannot both be updated.
//      Each mutation is tracked by an OperationTracker.

import { setTimeout as sleep } from 'timers/promises';
import {
  EmbeddingError,
  IndexCorruptedError,
  MemoryError,
  RetrievalUnavailableError,
  ValidationError,
  errorMessage,
} from '../errors.js';
import baseLogger, { type Logger } from '../logging.js';
import type {
  Chunk,
  DocumentEntry,
  DocumentFilter,
  FailedFile,
  IncomingFile,
  IngestResult,
  OpenReport,
  ProbeResult,
  QueryMatch,
  RemoveResult,
  ReplaceResult,
  SnapshotManifest,
  StoreStats,
} from '../models/types.js';
import type { BackupStore } from '../store/backupStore.js';
import type { IndexBackend } from '../store/indexBackend.js';
import type { DocumentRegistry } from '../store/registry.js';
import { chunkId, newDocId } from '../util/ids.js';
import { ReadWriteLock } from '../util/rwlock.js';
import type { Chunker } from './chunking.js';
import type { EmbeddingPort } from './embeddings.js';
import type { TextExtractor } from './extractor.js';
import { fingerprint } from './fingerprint.js';
import { OperationTracker } from './operation.js';

export const DEFAULT_HEALTH_THRESHOLD = 0.8;

export interface MemoryManagerDeps {
  index: IndexBackend;
  registry: DocumentRegistry;
  backups: BackupStore;
  embeddings: EmbeddingPort;
  extractor: TextExtractor;
  chunker: Chunker;
  retryBackoffMs?: number;
  healthThreshold?: number;
  logger?: Logger;
}

interface PreparedDocument {
  file: IncomingFile;
  fingerprint: string;
  windows: { text: string; start: number; end: number }[];
}

export class MemoryManager {
  private readonly index: IndexBackend;
  private readonly registry: DocumentRegistry;
  private readonly backups: BackupStore;
  private readonly embeddings: EmbeddingPort;
  private readonly extractor: TextExtractor;
  private readonly chunker: Chunker;
  private readonly retryBackoffMs: number;
  private readonly healthThreshold: number;
  private readonly log: Logger;
  private readonly lock = new ReadWriteLock();

  constructor(deps: MemoryManagerDeps) {
    this.index = deps.index;
    this.registry = deps.registry;
    this.backups = deps.backups;
    this.embeddings = deps.embeddings;
    this.extractor = deps.extractor;
    this.chunker = deps.chunker;
    this.retryBackoffMs = deps.retryBackoffMs ?? 500;
    this.healthThreshold = deps.healthThreshold ?? DEFAULT_HEALTH_THRESHOLD;
    this.log = (deps.logger ?? baseLogger).child({ component: 'memory-manager' });
    if (this.embeddings.dimensions !== this.index.dimensions) {
      throw new ValidationError(
        `Embedding dimensions (${this.embeddings.dimensions}) do not match the index (${this.index.dimensions})`,
      );
    }
  }

  get backendType(): IndexBackend['type'] {
    return this.index.type;
  }

  /**
   * Loads persisted state. Indexed chunks no registry entry claims are left over from an ingest that never
   * committed and are dropped. Corruption (unreadable state, or registry entries pointing at missing chunks)
   * triggers a restore of the newest snapshot; if that is impossible, IndexCorruptedError is thrown with
   * recovered=false.
   */
  async open(): Promise<OpenReport> {
    return this.lock.write(async (): Promise<OpenReport> => {
      try {
        await this.index.load();
        await this.registry.load();
        const orphans = this.checkReferences();
        if (orphans.length > 0) await this.dropOrphans(orphans);
        this.log.info(
          { backend: this.index.type, docs: this.registry.size(), chunks: this.index.count() },
          'Document memory opened',
        );
        return { status: 'ok' };
      } catch (err) {
        if (!(err instanceof IndexCorruptedError)) throw err;
        return this.recover(err);
      }
    });
  }

  async ingest(file: IncomingFile): Promise<IngestResult> {
    return this.runIngest(file, false);
  }

  async removeDocuments(docIds: string[]): Promise<RemoveResult> {
    const unique = [...new Set(docIds)];
    if (unique.length === 0) throw new ValidationError('doc_ids must contain at least one id');

    return this.lock.write(async () => {
      const op = new OperationTracker('remove', { doc_ids: unique }, this.log);
      op.to('Validating');
      const failed: RemoveResult['failed'] = [];
      const targets: DocumentEntry[] = [];
      for (const id of unique) {
        const entry = this.registry.get(id);
        if (entry) targets.push(entry);
        else failed.push({ doc_id: id, reason: 'not_found' });
      }
      if (targets.length === 0) {
        op.to('Rejected');
        return { removed: [], failed };
      }

      const snapshot = await this.implicitSnapshot('remove');
      op.to('Indexing');
      try {
        const outcome = await this.index.delete(targets.flatMap((e) => e.chunk_ids));
        const gone = new Set([...outcome.deleted, ...outcome.missing]);
        const removed: string[] = [];
        for (const entry of targets) {
          const survivors = entry.chunk_ids.filter((id) => !gone.has(id));
          if (survivors.length === 0) {
            removed.push(entry.doc_id);
            continue;
          }
          // Registry keeps the entry, narrowed to what is still in the index.
          await this.registry.setChunkIds(entry.doc_id, survivors);
          failed.push({ doc_id: entry.doc_id, reason: 'delete_failed' });
        }
        await this.registry.remove(removed);
        op.to('Committed');
        this.log.info({ removed, failed, snapshot_id: snapshot.id }, 'Documents removed');
        return { removed, failed, snapshot_id: snapshot.id };
      } catch (err) {
        await this.rollbackTo(snapshot, op, err);
        throw err;
      }
    });
  }

  async clearAll(): Promise<{ snapshot_id: string }> {
    return this.lock.write(async () => {
      const op = new OperationTracker('clear', {}, this.log);
      op.to('Validating');
      const snapshot = await this.implicitSnapshot('clear-all');
      op.to('Indexing');
      await this.wipe(snapshot, op);
      op.to('Committed');
      this.log.info({ snapshot_id: snapshot.id }, 'Document memory cleared');
      return { snapshot_id: snapshot.id };
    });
  }

  /**
   * Snapshot, wipe, then ingest each file in order. A failing file is reported and the rest continue; files
   * already ingested stay committed when a later one fails or the signal aborts.
   */
  async replaceAll(files: IncomingFile[], signal?: AbortSignal): Promise<ReplaceResult> {
    return this.lock.write(async () => {
      const op = new OperationTracker('replace', { files: files.length }, this.log);
      op.to('Validating');
      const snapshot = await this.implicitSnapshot('replace-all');
      op.to('Indexing');
      await this.wipe(snapshot, op);
      op.to('Committed');

      const result: ReplaceResult = {
        snapshot_id: snapshot.id,
        ingested: [],
        duplicates: [],
        failed: [],
        skipped: [],
        cancelled: false,
      };
      for (const [i, file] of files.entries()) {
        if (signal?.aborted) {
          result.cancelled = true;
          result.skipped = files.slice(i).map((f) => f.filename);
          this.log.warn({ skipped: result.skipped.length }, 'Replace cancelled between files');
          break;
        }
        try {
          const outcome = await this.runIngest(file, true);
          if (outcome.status === 'committed') {
            result.ingested.push({ doc_id: outcome.doc_id, filename: outcome.filename, chunk_count: outcome.chunk_count });
          } else {
            result.duplicates.push({ filename: outcome.filename, existing_doc_id: outcome.existing_doc_id });
          }
        } catch (err) {
          if (!(err instanceof MemoryError)) throw err;
          result.failed.push(toFailedFile(file.filename, err));
        }
      }
      this.log.info(
        {
          snapshot_id: snapshot.id,
          ingested: result.ingested.length,
          duplicates: result.duplicates.length,
          failed: result.failed.length,
          cancelled: result.cancelled,
        },
        'Replace finished',
      );
      return result;
    });
  }

  async query(text: string, k = 5): Promise<QueryMatch[]> {
    if (text.trim().length === 0) throw new ValidationError('Query text must not be empty');
    if (!Number.isInteger(k) || k < 1) throw new ValidationError(`k must be a positive integer, got ${k}`);
    const [vector] = await this.embedForQuery([text]);
    return this.lock.read(() => this.search(vector, k));
  }

  /** A probe passes when its best match scores at or above the threshold. Read-only. */
  async healthCheck(probes: string[], threshold = this.healthThreshold): Promise<ProbeResult[]> {
    if (probes.length === 0) throw new ValidationError('At least one probe query is required');
    if (probes.some((p) => p.trim().length === 0)) throw new ValidationError('Probe queries must not be empty');
    if (!Number.isFinite(threshold)) throw new ValidationError('threshold must be a finite number');

    const allFailed = () => probes.map((probe): ProbeResult => ({ probe, status: 'failed', top_score: null }));
    if (await this.lock.read(async () => this.index.count() === 0)) return allFailed();
    const vectors = await this.embedForQuery(probes);
    return this.lock.read(async () => {
      // A writer may have emptied the index while the probes were embedding.
      if (this.index.count() === 0) return allFailed();
      const out: ProbeResult[] = [];
      for (const [i, probe] of probes.entries()) {
        const [top] = await this.search(vectors[i], 1);
        const score = top ? top.score : null;
        out.push({ probe, status: score !== null && score >= threshold ? 'passed' : 'failed', top_score: score });
      }
      this.log.info({ probes: probes.length, passed: out.filter((r) => r.status === 'passed').length }, 'Health check');
      return out;
    });
  }

  async listDocuments(filter: DocumentFilter = {}): Promise<DocumentEntry[]> {
    return this.lock.read(async () => this.registry.list(filter));
  }

  async storeStats(): Promise<StoreStats> {
    return this.lock.read(async () => ({
      doc_count: this.registry.size(),
      chunk_count: this.index.count(),
      backend_type: this.index.type,
      storage_bytes: (await this.index.storageBytes()) + (await this.registry.storageBytes()),
    }));
  }

  async createBackup(label: string): Promise<SnapshotManifest> {
    const trimmed = label.trim();
    if (trimmed.length === 0) throw new ValidationError('Backup label must not be empty');
    return this.lock.read(() => this.backups.create(trimmed));
  }

  /** Accepts a snapshot id or label. A failed restore leaves the current state active. */
  async restoreBackup(ref: string): Promise<SnapshotManifest> {
    return this.lock.write(async () => {
      const op = new OperationTracker('restore', { ref }, this.log);
      op.to('Validating');
      op.to('Indexing');
      try {
        const manifest = await this.backups.restore(ref);
        op.to('Committed');
        return manifest;
      } catch (err) {
        op.fail();
        throw err;
      }
    });
  }

  async listBackups(): Promise<SnapshotManifest[]> {
    return this.backups.list();
  }

  /** Every registry chunk id is in the index and every indexed chunk belongs to a registry entry. */
  assertIntegrity(): void {
    const orphans = this.checkReferences();
    if (orphans.length > 0) {
      throw new IndexCorruptedError(`Index holds ${orphans.length} chunk(s) with no registry entry`);
    }
  }

  /** Throws on chunks claimed twice or missing from the index; returns indexed chunk ids nothing claims. */
  private checkReferences(): string[] {
    const indexed = new Set(this.index.chunkIds());
    const referenced = new Set<string>();
    for (const entry of this.registry.list()) {
      for (const id of entry.chunk_ids) {
        if (referenced.has(id)) {
          throw new IndexCorruptedError(`Chunk ${id} is claimed by more than one document`, { docIds: [entry.doc_id] });
        }
        if (!indexed.has(id)) {
          throw new IndexCorruptedError(`Registry entry ${entry.doc_id} references missing chunk ${id}`, {
            docIds: [entry.doc_id],
          });
        }
        referenced.add(id);
      }
    }
    return [...indexed].filter((id) => !referenced.has(id));
  }

  private async dropOrphans(orphans: string[]): Promise<void> {
    const outcome = await this.index.delete(orphans);
    if (outcome.failed.length > 0) {
      this.log.error({ orphaned: outcome.failed }, 'Could not drop chunks left by an uncommitted ingest');
      return;
    }
    this.log.warn({ dropped: outcome.deleted.length }, 'Dropped index chunks left by an uncommitted ingest');
  }

  // -------------------- ingest pipeline --------------------

  /** exclusive=true means the caller already holds the write lock. */
  private async runIngest(file: IncomingFile, exclusive: boolean): Promise<IngestResult> {
    const op = new OperationTracker('ingest', { filename: file.filename }, this.log);
    try {
      op.to('Validating');
      const prepared = await this.prepare(file);

      const existing = exclusive
        ? this.registry.findByFingerprint(prepared.fingerprint)
        : await this.lock.read(async () => this.registry.findByFingerprint(prepared.fingerprint));
      if (existing) return this.rejectDuplicate(op, file, existing);

      op.to('Embedding');
      const vectors = await this.embedWithRetry(prepared.windows.map((w) => w.text));

      op.to('Indexing');
      const commit = () => this.commit(prepared, vectors, op);
      return exclusive ? await commit() : await this.lock.write(commit);
    } catch (err) {
      op.fail();
      throw err;
    }
  }

  private async prepare(file: IncomingFile): Promise<PreparedDocument> {
    if (file.filename.trim().length === 0) throw new ValidationError('Filename must not be empty');
    if (file.bytes.length === 0) throw new ValidationError(`${file.filename} is empty`);
    const { text } = await this.extractor.extract(file);
    const windows = this.chunker.split(text).toArray();
    return { file, fingerprint: fingerprint(text), windows };
  }

  private async commit(prepared: PreparedDocument, vectors: number[][], op: OperationTracker): Promise<IngestResult> {
    const { file } = prepared;
    // Another writer may have committed the same content while this one was embedding.
    const existing = this.registry.findByFingerprint(prepared.fingerprint);
    if (existing) return this.rejectDuplicate(op, file, existing);

    const docId = newDocId();
    const chunks: Chunk[] = prepared.windows.map((w, i) => ({
      id: chunkId(docId, i),
      text: w.text,
      vector: vectors[i],
      source_doc_id: docId,
      offset_start: w.start,
      offset_end: w.end,
    }));
    const entry: DocumentEntry = {
      doc_id: docId,
      original_filename: file.filename,
      fingerprint: prepared.fingerprint,
      file_type: file.file_type,
      chunk_ids: chunks.map((c) => c.id),
      ingested_at: new Date().toISOString(),
      byte_size: file.bytes.length,
    };

    await this.index.add(chunks);
    try {
      await this.registry.record(entry);
    } catch (err) {
      op.to('Failed');
      await this.compensateAdd(entry, op);
      throw err;
    }
    op.to('Committed');
    this.log.info({ doc_id: docId, filename: file.filename, chunks: chunks.length }, 'Document committed');
    return { status: 'committed', doc_id: docId, filename: file.filename, chunk_count: chunks.length };
  }

  private async compensateAdd(entry: DocumentEntry, op: OperationTracker): Promise<void> {
    const outcome = await this.index.delete(entry.chunk_ids);
    if (outcome.failed.length > 0) {
      this.log.fatal(
        { doc_id: entry.doc_id, orphaned: outcome.failed },
        'Compensating delete left orphan chunks in the index',
      );
      return;
    }
    op.to('RolledBack');
    this.log.warn({ doc_id: entry.doc_id }, 'Rolled back index add after registry failure');
  }

  private rejectDuplicate(op: OperationTracker, file: IncomingFile, existing: DocumentEntry): IngestResult {
    op.to('Rejected');
    this.log.info({ filename: file.filename, existing_doc_id: existing.doc_id }, 'Duplicate content rejected');
    return { status: 'duplicate', filename: file.filename, existing_doc_id: existing.doc_id };
  }

  // -------------------- embedding --------------------

  /** One retry after the configured backoff; the second EmbeddingError is surfaced. */
  private async embedWithRetry(texts: string[]): Promise<number[][]> {
    try {
      return this.checkVectors(texts, await this.embeddings.embed(texts));
    } catch (err) {
      if (!(err instanceof EmbeddingError)) throw err;
      this.log.warn({ err, count: texts.length, backoff_ms: this.retryBackoffMs }, 'Embedding failed; retrying once');
    }
    await sleep(this.retryBackoffMs);
    return this.checkVectors(texts, await this.embeddings.embed(texts));
  }

  private async embedForQuery(texts: string[]): Promise<number[][]> {
    try {
      return await this.embedWithRetry(texts);
    } catch (err) {
      if (!(err instanceof EmbeddingError)) throw err;
      throw new RetrievalUnavailableError(`Retrieval unavailable: ${err.message}`, { cause: err });
    }
  }

  private checkVectors(texts: string[], vectors: number[][]): number[][] {
    if (vectors.length !== texts.length) {
      throw new EmbeddingError(`Embedding port returned ${vectors.length} vectors for ${texts.length} texts`);
    }
    const bad = vectors.find((v) => v.length !== this.index.dimensions);
    if (bad) {
      throw new EmbeddingError(`Embedding has ${bad.length} dimensions, index expects ${this.index.dimensions}`);
    }
    return vectors;
  }

  // -------------------- reads --------------------

  private async search(vector: number[], k: number): Promise<QueryMatch[]> {
    const hits = await this.index.search(vector, k);
    const out: QueryMatch[] = [];
    for (const { chunk, score } of hits) {
      const entry = this.registry.get(chunk.source_doc_id);
      if (!entry) {
        this.log.error({ chunk_id: chunk.id, doc_id: chunk.source_doc_id }, 'Indexed chunk has no registry entry');
        continue;
      }
      out.push({
        chunk_id: chunk.id,
        chunk_text: chunk.text,
        score,
        doc_id: entry.doc_id,
        filename: entry.original_filename,
        file_type: entry.file_type,
        source_offsets: { start: chunk.offset_start, end: chunk.offset_end },
      });
    }
    return out;
  }

  // -------------------- snapshots & recovery --------------------

  private async implicitSnapshot(reason: string): Promise<SnapshotManifest> {
    return this.backups.create(`auto:${reason}:${new Date().toISOString()}`);
  }

  private async wipe(snapshot: SnapshotManifest, op: OperationTracker): Promise<void> {
    try {
      await this.index.clear();
      await this.registry.clear();
    } catch (err) {
      await this.rollbackTo(snapshot, op, err);
      throw err;
    }
  }

  private async rollbackTo(snapshot: SnapshotManifest, op: OperationTracker, cause: unknown): Promise<void> {
    op.fail();
    this.log.error({ err: cause, snapshot_id: snapshot.id }, 'Mutation failed; restoring implicit snapshot');
    try {
      await this.backups.restore(snapshot.id);
      op.to('RolledBack');
    } catch (err) {
      this.log.fatal({ err, snapshot_id: snapshot.id }, 'Restoring implicit snapshot failed');
    }
  }

  private async recover(cause: IndexCorruptedError): Promise<OpenReport> {
    this.log.error({ err: cause }, 'Persisted state is corrupted; attempting restore from newest snapshot');
    const latest = await this.backups.latest().catch((err: unknown) => {
      this.log.error({ err }, 'Cannot list snapshots');
      return undefined;
    });
    if (!latest) {
      throw new IndexCorruptedError(`${cause.message} (no snapshot available to restore)`, {
        recovered: false,
        cause,
      });
    }
    try {
      await this.backups.restore(latest.id);
      this.assertIntegrity();
    } catch (err) {
      throw new IndexCorruptedError(`${cause.message} (restore of ${latest.id} failed: ${errorMessage(err)})`, {
        recovered: false,
        snapshotId: latest.id,
        cause: err,
      });
    }
    this.log.warn({ snapshot_id: latest.id, label: latest.label }, 'Restored newest snapshot after corruption');
    return { status: 'restored', snapshot_id: latest.id, reason: cause.message };
  }
}

function toFailedFile(filename: string, err: MemoryError): FailedFile {
  return { filename, code: err.code, error: err.message };
}
