// src/store/backupStore.ts
// What: Point-in-time snapshots of the index and the registry, taken and restored as one unit.
// How: Each snapshot is a directory under the backups root holding index.blob, registry.json and a manifest.
//      The directory is assembled under a dot-prefixed staging name and renamed into place only after every part
//      is on disk, so list() never sees a half-written snapshot. restore() checks compatibility and checksums
//      before touching live state, and puts the previous index back if the registry swap fails.

import fs from 'fs/promises';
import path from 'path';
import { createHash } from 'crypto';
import { z } from 'zod';
import { SnapshotError, SnapshotNotFoundError, errorMessage } from '../errors.js';
import baseLogger from '../logging.js';
import type { SnapshotManifest } from '../models/types.js';
import { isNotFound, readFileIfExists, writeFileAtomic } from '../util/fsAtomic.js';
import { newSnapshotId } from '../util/ids.js';
import type { IndexBackend } from './indexBackend.js';
import type { DocumentRegistry } from './registry.js';

const logger = baseLogger.child({ component: 'backup-store' });

const MANIFEST = 'manifest.json';
const INDEX_BLOB = 'index.blob';
const REGISTRY_BLOB = 'registry.json';

const manifestSchema = z.object({
  id: z.string().min(1),
  label: z.string(),
  created_at: z.string().datetime(),
  backend_type: z.enum(['flat', 'document']),
  dimensions: z.number().int().nonnegative(),
  doc_count: z.number().int().nonnegative(),
  chunk_count: z.number().int().nonnegative(),
  index_sha256: z.string().regex(/^[0-9a-f]{64}$/),
  registry_sha256: z.string().regex(/^[0-9a-f]{64}$/),
});

export interface RetentionPolicy {
  maxCount: number;
  maxAgeMs?: number;
}

export interface BackupStoreOptions {
  dir: string;
  retention: RetentionPolicy;
  now?: () => Date;
}

function sha256(buf: Buffer): string {
  return createHash('sha256').update(buf).digest('hex');
}

export class BackupStore {
  private readonly dir: string;
  private readonly retention: RetentionPolicy;
  private readonly now: () => Date;

  constructor(
    opts: BackupStoreOptions,
    private readonly index: IndexBackend,
    private readonly registry: DocumentRegistry,
  ) {
    this.dir = opts.dir;
    this.retention = opts.retention;
    this.now = opts.now ?? (() => new Date());
  }

  /** Captures both parts; nothing is listed unless all of them reached disk. */
  async create(label: string): Promise<SnapshotManifest> {
    const createdAt = await this.nextTimestamp();
    const id = newSnapshotId(createdAt);
    const staging = path.join(this.dir, `.staging-${id}`);

    let manifest: SnapshotManifest;
    try {
      const indexBlob = await this.index.snapshot();
      const registryBlob = this.registry.serialize();
      manifest = {
        id,
        label,
        created_at: createdAt.toISOString(),
        backend_type: this.index.type,
        dimensions: this.index.dimensions,
        doc_count: this.registry.size(),
        chunk_count: this.index.count(),
        index_sha256: sha256(indexBlob),
        registry_sha256: sha256(registryBlob),
      };
      await fs.mkdir(staging, { recursive: true });
      await writeFileAtomic(path.join(staging, INDEX_BLOB), indexBlob);
      await writeFileAtomic(path.join(staging, REGISTRY_BLOB), registryBlob);
      await writeFileAtomic(path.join(staging, MANIFEST), JSON.stringify(manifest, null, 2));
      await fs.rename(staging, path.join(this.dir, id));
    } catch (err) {
      await fs.rm(staging, { recursive: true, force: true }).catch((rmErr: unknown) => {
        logger.warn({ err: rmErr, dir: staging }, 'Failed to remove snapshot staging directory');
      });
      throw new SnapshotError(`Snapshot "${label}" failed: ${errorMessage(err)}`, { cause: err });
    }

    logger.info(
      { snapshot_id: id, label, docs: manifest.doc_count, chunks: manifest.chunk_count },
      'Snapshot created',
    );
    await this.prune().catch((err: unknown) => {
      logger.error({ err }, 'Snapshot retention pass failed');
    });
    return manifest;
  }

  /** Newest first. Staging directories and snapshots with unreadable manifests are not listed. */
  async list(): Promise<SnapshotManifest[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new SnapshotError(`Cannot read backups directory: ${errorMessage(err)}`, { cause: err });
    }
    const out: SnapshotManifest[] = [];
    for (const name of entries) {
      if (name.startsWith('.')) continue;
      const manifest = await this.readManifest(name);
      if (manifest) out.push(manifest);
    }
    return out.sort((a, b) => b.created_at.localeCompare(a.created_at) || b.id.localeCompare(a.id));
  }

  async latest(): Promise<SnapshotManifest | undefined> {
    const all = await this.list();
    return all[0];
  }

  /** Accepts a snapshot id, or a label (newest snapshot carrying it wins). */
  async resolve(ref: string): Promise<SnapshotManifest> {
    const all = await this.list();
    const found = all.find((m) => m.id === ref) ?? all.find((m) => m.label === ref);
    if (!found) throw new SnapshotNotFoundError(ref);
    return found;
  }

  /**
   * Replaces the live index and registry with the snapshot's. Any failure leaves the pre-restore state active:
   * validation runs before mutation, and a failed registry swap rolls the index back.
   */
  async restore(ref: string): Promise<SnapshotManifest> {
    const manifest = await this.resolve(ref);
    if (manifest.backend_type !== this.index.type) {
      throw new SnapshotError(
        `Snapshot ${manifest.id} was taken from a ${manifest.backend_type} index; live index is ${this.index.type}`,
      );
    }
    if (manifest.dimensions !== this.index.dimensions) {
      throw new SnapshotError(
        `Snapshot ${manifest.id} has ${manifest.dimensions}-dimensional vectors; live index uses ${this.index.dimensions}`,
      );
    }

    const snapDir = path.join(this.dir, manifest.id);
    const indexBlob = await this.readPart(snapDir, INDEX_BLOB, manifest.index_sha256);
    const registryBlob = await this.readPart(snapDir, REGISTRY_BLOB, manifest.registry_sha256);

    const previousIndex = await this.index.snapshot();
    try {
      await this.index.restore(indexBlob);
    } catch (err) {
      throw new SnapshotError(`Restoring index from ${manifest.id} failed: ${errorMessage(err)}`, { cause: err });
    }
    try {
      await this.registry.restore(registryBlob);
    } catch (err) {
      try {
        await this.index.restore(previousIndex);
      } catch (rollbackErr) {
        logger.fatal({ err: rollbackErr, snapshot_id: manifest.id }, 'Index rollback after failed restore failed');
      }
      throw new SnapshotError(`Restoring registry from ${manifest.id} failed: ${errorMessage(err)}`, { cause: err });
    }

    logger.info({ snapshot_id: manifest.id, label: manifest.label }, 'Snapshot restored');
    return manifest;
  }

  /** Keeps the newest maxCount snapshots and drops those older than maxAgeMs. Returns the removed ids. */
  async prune(): Promise<string[]> {
    const all = await this.list();
    const cutoff = this.retention.maxAgeMs === undefined ? null : this.now().getTime() - this.retention.maxAgeMs;
    const doomed = all.filter(
      (m, i) => i >= this.retention.maxCount || (cutoff !== null && Date.parse(m.created_at) < cutoff),
    );
    for (const m of doomed) {
      await fs.rm(path.join(this.dir, m.id), { recursive: true, force: true });
      logger.debug({ snapshot_id: m.id, label: m.label }, 'Pruned snapshot');
    }
    return doomed.map((m) => m.id);
  }

  // created_at must order snapshots strictly, even when two land in the same millisecond.
  private async nextTimestamp(): Promise<Date> {
    const now = this.now();
    const newest = await this.latest();
    if (!newest) return now;
    const floor = Date.parse(newest.created_at) + 1;
    return now.getTime() < floor ? new Date(floor) : now;
  }

  private async readManifest(name: string): Promise<SnapshotManifest | null> {
    let raw: Buffer | null;
    try {
      raw = await readFileIfExists(path.join(this.dir, name, MANIFEST));
    } catch (err) {
      logger.warn({ err, dir: name }, 'Skipping snapshot with unreadable manifest');
      return null;
    }
    if (!raw) return null;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw.toString('utf8'));
    } catch (err) {
      logger.warn({ err, dir: name }, 'Skipping snapshot with malformed manifest');
      return null;
    }
    const result = manifestSchema.safeParse(parsed);
    if (!result.success || result.data.id !== name) {
      logger.warn({ dir: name }, 'Skipping snapshot with invalid manifest');
      return null;
    }
    return result.data;
  }

  private async readPart(snapDir: string, file: string, expected: string): Promise<Buffer> {
    const buf = await readFileIfExists(path.join(snapDir, file)).catch((err: unknown) => {
      throw new SnapshotError(`Cannot read ${file}: ${errorMessage(err)}`, { cause: err });
    });
    if (!buf) throw new SnapshotError(`Snapshot part ${file} is missing`);
    if (sha256(buf) !== expected) throw new SnapshotError(`Snapshot part ${file} failed its checksum`);
    return buf;
  }
}
