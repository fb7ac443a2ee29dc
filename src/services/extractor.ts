// src/services/extractor.ts
// What: Turns uploaded bytes into (raw text, source metadata) pairs.
// How: TXT is decoded in-process as strict UTF-8 (BOM dropped). PDF and DOCX are written to a private temp
//      directory and converted with markitdown in a child process; the temp directory is always removed.

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ExtractionError, errorMessage } from '../errors.js';
import baseLogger from '../logging.js';
import type { FileType, IncomingFile } from '../models/types.js';
import { convertToMarkdown, MarkitDownError, type MarkitDownOptions } from './markitdown.js';

const logger = baseLogger.child({ component: 'extractor' });

export interface SourceMetadata {
  filename: string;
  file_type: FileType;
  byte_size: number;
  converter: 'utf8' | 'markitdown';
}

export interface ExtractedText {
  text: string;
  metadata: SourceMetadata;
}

export interface TextExtractor {
  extract(file: IncomingFile): Promise<ExtractedText>;
}

export type MarkdownConverter = (filePath: string, opts: MarkitDownOptions) => Promise<string>;

const EXTENSIONS: Record<FileType, string> = { PDF: '.pdf', TXT: '.txt', DOCX: '.docx' };

export class DefaultTextExtractor implements TextExtractor {
  constructor(
    private readonly markitdown: MarkitDownOptions,
    private readonly convert: MarkdownConverter = convertToMarkdown,
  ) {}

  async extract(file: IncomingFile): Promise<ExtractedText> {
    const base = { filename: file.filename, file_type: file.file_type, byte_size: file.bytes.length };
    if (file.file_type === 'TXT') {
      return { text: decodeUtf8(file), metadata: { ...base, converter: 'utf8' } };
    }
    const text = await this.viaMarkitdown(file);
    return { text, metadata: { ...base, converter: 'markitdown' } };
  }

  private async viaMarkitdown(file: IncomingFile): Promise<string> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'docmem-'));
    const target = path.join(dir, `upload${EXTENSIONS[file.file_type]}`);
    try {
      await fs.writeFile(target, file.bytes);
      return await this.convert(target, this.markitdown);
    } catch (err) {
      const detail = err instanceof MarkitDownError && err.stderr ? `${err.message}: ${err.stderr}` : errorMessage(err);
      logger.warn({ err, filename: file.filename, file_type: file.file_type }, 'Text extraction failed');
      throw new ExtractionError(`Could not extract text from ${file.filename}: ${detail}`, { cause: err });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }
}

function decodeUtf8(file: IncomingFile): string {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: false }).decode(file.bytes);
  } catch (err) {
    throw new ExtractionError(`${file.filename} is not valid UTF-8 text`, { cause: err });
  }
}
