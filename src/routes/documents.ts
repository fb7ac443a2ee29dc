// src/routes/documents.ts
// What: Document lifecycle endpoints: ingest, list, remove, clear, replace.
// How: multer keeps uploads in memory with a size cap and rejects anything that is not PDF/TXT/DOCX (415).
//      Duplicate ingests answer 409 with the existing doc id. POST /replace aborts between files when the
//      client goes away.

import { Router, type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { UnsupportedFileTypeError, ValidationError } from '../errors.js';
import logger from '../logging.js';
import { FILE_TYPES, type IncomingFile } from '../models/types.js';
import type { MemoryManager } from '../services/memoryManager.js';
import { detectFileType, toIncomingFile } from '../services/uploads.js';
import { parseInput } from './validate.js';

const MAX_REPLACE_FILES = 100;

const listQuery = z.object({
  type: z
    .string()
    .transform((s) => s.toUpperCase())
    .pipe(z.enum(FILE_TYPES))
    .optional(),
  search: z.string().max(200).optional(),
});

const removeBody = z.object({
  doc_ids: z.array(z.string().min(1)).min(1),
});

export interface DocumentsRouterDeps {
  manager: MemoryManager;
  uploadMaxBytes: number;
}

function createUpload(maxBytes: number): multer.Multer {
  return multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxBytes },
    fileFilter: (_req, file, cb) => {
      if (detectFileType(file.originalname, file.mimetype)) cb(null, true);
      else cb(new UnsupportedFileTypeError(file.originalname));
    },
  });
}

function toFile(file: Express.Multer.File): IncomingFile {
  const type = detectFileType(file.originalname, file.mimetype);
  if (!type) throw new UnsupportedFileTypeError(file.originalname);
  return toIncomingFile(file.originalname, file.buffer, type);
}

export function documentsRouter({ manager, uploadMaxBytes }: DocumentsRouterDeps): Router {
  const router = Router();
  const upload = createUpload(uploadMaxBytes);

  // POST /documents - ingest one file
  router.post('/', upload.single('file'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.file) throw new ValidationError('No file provided (multipart field "file")');
      const file = toFile(req.file);
      logger.info({ filename: file.filename, size: file.bytes.length, type: file.file_type }, 'Upload request received');

      const result = await manager.ingest(file);
      if (result.status === 'duplicate') {
        res.status(409).json(result);
        return;
      }
      res.status(201).json(result);
    } catch (err) {
      next(err);
    }
  });

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { type, search } = parseInput(listQuery, req.query);
      const documents = await manager.listDocuments({ file_type: type, search });
      res.json({ count: documents.length, documents });
    } catch (err) {
      next(err);
    }
  });

  router.post('/remove', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { doc_ids } = parseInput(removeBody, req.body);
      res.json(await manager.removeDocuments(doc_ids));
    } catch (err) {
      next(err);
    }
  });

  router.post('/clear', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await manager.clearAll());
    } catch (err) {
      next(err);
    }
  });

  router.post(
    '/replace',
    upload.array('files', MAX_REPLACE_FILES),
    async (req: Request, res: Response, next: NextFunction) => {
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableEnded) controller.abort();
      });
      try {
        const uploaded = Array.isArray(req.files) ? req.files : [];
        if (uploaded.length === 0) throw new ValidationError('No files provided (multipart field "files")');
        const files = uploaded.map(toFile);
        logger.info({ files: files.map((f) => f.filename) }, 'Replace request received');
        res.json(await manager.replaceAll(files, controller.signal));
      } catch (err) {
        next(err);
      }
    },
  );

  return router;
}
