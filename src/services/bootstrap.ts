// src/services/bootstrap.ts
// What: Builds the object graph for one deployment from configuration.
// How: Chooses the index backend once (INDEX_BACKEND), lays out the data directory, wraps the OpenAI port in the
//      persistent cache when enabled, and hands everything to MemoryManager. Tests override the embedding port
//      and the extractor.

import path from 'path';
import type { AppConfig } from '../config/schema.js';
import type { Logger } from '../logging.js';
import { BackupStore } from '../store/backupStore.js';
import { DocumentIndex } from '../store/documentIndex.js';
import { FlatIndex } from '../store/flatIndex.js';
import type { IndexBackend } from '../store/indexBackend.js';
import { DocumentRegistry } from '../store/registry.js';
import { Chunker } from './chunking.js';
import { CachedEmbeddings } from './embeddingCache.js';
import { OpenAIEmbeddings, type EmbeddingPort } from './embeddings.js';
import { DefaultTextExtractor, type TextExtractor } from './extractor.js';
import { MemoryManager } from './memoryManager.js';
import { SessionMemory } from './sessionMemory.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export type ServiceConfig = Pick<
  AppConfig,
  | 'OPENAI_API_KEY'
  | 'OPENAI_EMBED_MODEL'
  | 'EMBEDDING_DIMENSIONS'
  | 'EMBED_BATCH_SIZE'
  | 'EMBED_CONCURRENCY'
  | 'EMBED_RETRY_BACKOFF_MS'
  | 'EMBEDDING_CACHE'
  | 'INDEX_BACKEND'
  | 'DATA_DIR'
  | 'CHUNK_SIZE'
  | 'CHUNK_OVERLAP'
  | 'MAX_SNAPSHOTS'
  | 'SNAPSHOT_MAX_AGE_DAYS'
  | 'HEALTH_THRESHOLD'
  | 'SESSION_HISTORY_LIMIT'
  | 'MARKITDOWN_TIMEOUT_MS'
  | 'MARKITDOWN_MAX_BYTES'
  | 'PYTHON_BIN'
  | 'PYTHON_ENV'
>;

export interface ServiceOverrides {
  embeddings?: EmbeddingPort;
  extractor?: TextExtractor;
  logger?: Logger;
}

export interface Services {
  manager: MemoryManager;
  sessions: SessionMemory;
}

export function dataLayout(dataDir: string) {
  return {
    registry: path.join(dataDir, 'registry.json'),
    index: path.join(dataDir, 'index'),
    flatIndexFile: path.join(dataDir, 'index', 'flat-index.json'),
    backups: path.join(dataDir, 'backups'),
    embeddingCache: path.join(dataDir, 'embeddings-cache.json'),
  };
}

export function createServices(config: ServiceConfig, overrides: ServiceOverrides = {}): Services {
  const layout = dataLayout(config.DATA_DIR);
  const dimensions = config.EMBEDDING_DIMENSIONS;

  const index: IndexBackend =
    config.INDEX_BACKEND === 'flat'
      ? new FlatIndex({ dimensions, storePath: layout.flatIndexFile })
      : new DocumentIndex({ dimensions, dir: layout.index });
  const registry = new DocumentRegistry(layout.registry);
  const backups = new BackupStore(
    {
      dir: layout.backups,
      retention: {
        maxCount: config.MAX_SNAPSHOTS,
        maxAgeMs: config.SNAPSHOT_MAX_AGE_DAYS > 0 ? config.SNAPSHOT_MAX_AGE_DAYS * DAY_MS : undefined,
      },
    },
    index,
    registry,
  );

  let embeddings: EmbeddingPort =
    overrides.embeddings ??
    new OpenAIEmbeddings({
      apiKey: config.OPENAI_API_KEY,
      model: config.OPENAI_EMBED_MODEL,
      dimensions,
      batchSize: config.EMBED_BATCH_SIZE,
      concurrency: config.EMBED_CONCURRENCY,
    });
  if (config.EMBEDDING_CACHE) embeddings = new CachedEmbeddings(embeddings, layout.embeddingCache);

  const extractor =
    overrides.extractor ??
    new DefaultTextExtractor({
      pythonBin: config.PYTHON_BIN,
      pythonEnv: config.PYTHON_ENV,
      timeoutMs: config.MARKITDOWN_TIMEOUT_MS,
      maxBytes: config.MARKITDOWN_MAX_BYTES,
    });

  const manager = new MemoryManager({
    index,
    registry,
    backups,
    embeddings,
    extractor,
    chunker: new Chunker({ chunkSize: config.CHUNK_SIZE, chunkOverlap: config.CHUNK_OVERLAP }),
    retryBackoffMs: config.EMBED_RETRY_BACKOFF_MS,
    healthThreshold: config.HEALTH_THRESHOLD,
    logger: overrides.logger,
  });
  const sessions = new SessionMemory({ maxMessages: config.SESSION_HISTORY_LIMIT });
  return { manager, sessions };
}
