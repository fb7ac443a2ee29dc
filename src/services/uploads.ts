// src/services/uploads.ts
// What: Helpers for turning a multipart upload into an IncomingFile.
// How: Sanitizes the client-supplied filename, then derives the file type from the extension, falling back
//      to the declared mimetype. Anything else is unsupported.

import path from 'path';
import type { FileType, IncomingFile } from '../models/types.js';

const BY_EXTENSION: Record<string, FileType> = {
  '.pdf': 'PDF',
  '.txt': 'TXT',
  '.text': 'TXT',
  '.docx': 'DOCX',
};

const BY_MIMETYPE: Record<string, FileType> = {
  'application/pdf': 'PDF',
  'text/plain': 'TXT',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'DOCX',
};

/**
 * Sanitize filename to prevent path traversal and ensure valid characters.
 * - Removes path components (/, \)
 * - Limits length to 200 characters
 * - Replaces problematic characters
 */
export function sanitizeFilename(name: string): string {
  // Remove any path components, including Windows-style ones
  let sanitized = path.basename(name.replace(/\\/g, '/'));

  // Replace problematic characters
  sanitized = sanitized.replace(/[<>:"|?*\x00-\x1f]/g, '_').trim();
  if (sanitized === '' || sanitized === '.' || sanitized === '..') return 'upload';

  // Limit length (preserve extension)
  const ext = path.extname(sanitized);
  const base = path.basename(sanitized, ext);
  const maxBaseLen = 200 - ext.length;

  if (base.length > maxBaseLen) {
    sanitized = base.substring(0, maxBaseLen) + ext;
  }

  return sanitized;
}

/** Returns null for anything that is not PDF, TXT or DOCX. */
export function detectFileType(filename: string, mimetype?: string): FileType | null {
  const ext = path.extname(filename).toLowerCase();
  if (Object.hasOwn(BY_EXTENSION, ext)) return BY_EXTENSION[ext];
  const mime = mimetype?.split(';')[0].trim().toLowerCase();
  if (mime && Object.hasOwn(BY_MIMETYPE, mime)) return BY_MIMETYPE[mime];
  return null;
}

export function toIncomingFile(originalName: string, bytes: Buffer, fileType: FileType): IncomingFile {
  return { filename: sanitizeFilename(originalName), bytes, file_type: fileType };
}
