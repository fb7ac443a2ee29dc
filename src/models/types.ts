// src/models/types.ts
// What: Shared TypeScript types for stored entities and DTOs used by routes/services.
// How: Entities mirror the persisted JSON records (snake_case), DTOs mirror API responses.

export const FILE_TYPES = ['PDF', 'TXT', 'DOCX'] as const;
export type FileType = (typeof FILE_TYPES)[number];

export type BackendType = 'flat' | 'document';

export interface Chunk {
  readonly id: string;
  readonly text: string;
  readonly vector: readonly number[];
  readonly source_doc_id: string;
  readonly offset_start: number;
  readonly offset_end: number;
}

export interface ScoredChunk {
  chunk: Chunk;
  score: number; // cosine similarity in [-1, 1]
}

export interface DocumentEntry {
  doc_id: string;
  original_filename: string;
  fingerprint: string; // sha256 hex of normalized content
  file_type: FileType;
  chunk_ids: string[];
  ingested_at: string; // ISO timestamp
  byte_size: number;
}

export interface IncomingFile {
  filename: string;
  bytes: Buffer;
  file_type: FileType;
}

export interface SnapshotManifest {
  id: string;
  label: string;
  created_at: string; // ISO timestamp
  backend_type: BackendType;
  dimensions: number;
  doc_count: number;
  chunk_count: number;
  index_sha256: string;
  registry_sha256: string;
}

export type IngestResult =
  | { status: 'committed'; doc_id: string; filename: string; chunk_count: number }
  | { status: 'duplicate'; filename: string; existing_doc_id: string };

export interface QueryMatch {
  chunk_id: string;
  chunk_text: string;
  score: number;
  doc_id: string;
  filename: string;
  file_type: FileType;
  source_offsets: { start: number; end: number };
}

export interface RemoveResult {
  removed: string[];
  failed: { doc_id: string; reason: 'not_found' | 'delete_failed' }[];
  snapshot_id?: string;
}

export interface FailedFile {
  filename: string;
  code: string;
  error: string;
}

export interface ReplaceResult {
  snapshot_id: string;
  ingested: { doc_id: string; filename: string; chunk_count: number }[];
  duplicates: { filename: string; existing_doc_id: string }[];
  failed: FailedFile[];
  skipped: string[]; // not attempted because the call was cancelled
  cancelled: boolean;
}

export interface ProbeResult {
  probe: string;
  status: 'passed' | 'failed';
  top_score: number | null;
}

export interface StoreStats {
  doc_count: number;
  chunk_count: number;
  backend_type: BackendType;
  storage_bytes: number;
}

export interface DocumentFilter {
  file_type?: FileType;
  search?: string; // case-insensitive substring of original_filename
}

export type OpenReport = { status: 'ok' } | { status: 'restored'; snapshot_id: string; reason: string };
