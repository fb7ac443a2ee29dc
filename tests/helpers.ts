import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { EmbeddingError } from '../src/errors.js';
import type { BackendType, FileType, IncomingFile, OpenReport } from '../src/models/types.js';
import { createServices, type ServiceConfig, type Services } from '../src/services/bootstrap.js';
import type { EmbeddingPort } from '../src/services/embeddings.js';
import { DefaultTextExtractor, type MarkdownConverter } from '../src/services/extractor.js';

export async function tempDir(prefix = 'docmem-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

function fnv1a(token: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    h ^= token.charCodeAt(i);
    h = Math.imul(h, 0x01000193) >>> 0;
  }
  return h;
}

/** Deterministic bag-of-words embedding: identical word multisets give identical vectors. */
export class HashEmbeddings implements EmbeddingPort {
  readonly model = 'test-hash';
  calls = 0;
  textsEmbedded = 0;
  private failures = 0;

  constructor(readonly dimensions = 256) {}

  /** The next n embed() calls throw EmbeddingError. */
  failNext(n: number): void {
    this.failures = n;
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.calls += 1;
    if (this.failures > 0) {
      this.failures -= 1;
      throw new EmbeddingError('provider unavailable');
    }
    if (texts.length === 0) throw new EmbeddingError('Cannot embed an empty list of texts');
    this.textsEmbedded += texts.length;
    return texts.map((t) => this.vector(t));
  }

  vector(text: string): number[] {
    const v = new Array<number>(this.dimensions).fill(0);
    for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      v[fnv1a(token) % this.dimensions] += 1;
    }
    return v;
  }
}

export const BROKEN_MARKER = '%BROKEN%';

/** TXT decodes for real; PDF/DOCX "convert" to their bytes as text, and crash when the content is marked broken. */
export function testExtractor(): DefaultTextExtractor {
  const convert: MarkdownConverter = async (filePath) => {
    const raw = await fs.readFile(filePath, 'utf8');
    if (raw.includes(BROKEN_MARKER)) throw new Error('converter crashed');
    return raw;
  };
  return new DefaultTextExtractor({ pythonBin: 'python3' }, convert);
}

export function txt(filename: string, text: string): IncomingFile {
  return { filename, bytes: Buffer.from(text, 'utf8'), file_type: 'TXT' };
}

export function file(filename: string, text: string, fileType: FileType): IncomingFile {
  return { filename, bytes: Buffer.from(text, 'utf8'), file_type: fileType };
}

export function serviceConfig(dataDir: string, overrides: Partial<ServiceConfig> = {}): ServiceConfig {
  return {
    OPENAI_API_KEY: 'test-secret',
    OPENAI_EMBED_MODEL: 'test-hash',
    EMBEDDING_DIMENSIONS: 256,
    EMBED_BATCH_SIZE: 32,
    EMBED_CONCURRENCY: 1,
    EMBED_RETRY_BACKOFF_MS: 0,
    EMBEDDING_CACHE: false,
    INDEX_BACKEND: 'flat',
    DATA_DIR: dataDir,
    CHUNK_SIZE: 50,
    CHUNK_OVERLAP: 10,
    MAX_SNAPSHOTS: 20,
    SNAPSHOT_MAX_AGE_DAYS: 0,
    HEALTH_THRESHOLD: 0.8,
    SESSION_HISTORY_LIMIT: 5,
    MARKITDOWN_TIMEOUT_MS: 1000,
    MARKITDOWN_MAX_BYTES: 1024 * 1024,
    PYTHON_BIN: 'python3',
    PYTHON_ENV: undefined,
    ...overrides,
  };
}

export interface TestServices extends Services {
  embeddings: HashEmbeddings;
  report: OpenReport;
}

export async function openServices(
  dataDir: string,
  backend: BackendType = 'flat',
  opts: { config?: Partial<ServiceConfig>; embeddings?: HashEmbeddings } = {},
): Promise<TestServices> {
  const embeddings = opts.embeddings ?? new HashEmbeddings();
  const services = createServices(serviceConfig(dataDir, { INDEX_BACKEND: backend, ...opts.config }), {
    embeddings,
    extractor: testExtractor(),
  });
  const report = await services.manager.open();
  return { ...services, embeddings, report };
}

// Three 30-character paragraphs; with chunk size 50 and overlap 10 this splits into exactly three chunks.
export const P1 = 'Alpha notes about river trade.';
export const P2 = 'Beta notes about hill castles.';
export const P3 = 'Gamma notes about sea harbors.';
export const THREE_PARAGRAPHS = [P1, P2, P3].join('\n\n');
