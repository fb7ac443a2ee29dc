// src/app.ts
// What: Express application factory.
// How: Creates the app with a JSON body limit, mounts the root router, and installs the centralized error handler
//      returning { error: { message, code?, doc_ids? } }. server.ts listens; tests use an ephemeral port.

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { MemoryError } from './errors.js';
import logger from './logging.js';
import { createRouter, type RouterDeps } from './routes/index.js';

interface ErrorBody {
  status: number;
  message: string;
  code?: string;
  doc_ids?: string[];
}

function describeError(err: unknown): ErrorBody {
  if (err instanceof MemoryError) {
    return {
      status: err.status,
      message: err.message,
      code: err.code,
      doc_ids: err.docIds.length > 0 ? err.docIds : undefined,
    };
  }
  if (err instanceof multer.MulterError) {
    return { status: err.code === 'LIMIT_FILE_SIZE' ? 413 : 400, message: err.message, code: err.code };
  }
  // body-parser errors (malformed JSON, oversized body) carry their own 4xx status
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
    return { status: err.status, message: err.message, code: 'BAD_REQUEST' };
  }
  return { status: 500, message: 'Internal Server Error' };
}

export function createApp(deps: RouterDeps): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));

  app.use('/', createRouter(deps));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: { message: 'Not Found', code: 'NOT_FOUND' } });
  });

  // Centralized error handler
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const { status, message, code, doc_ids } = describeError(err);
    if (status >= 500) logger.error({ err, status, code, path: req.path }, 'Request failed');
    else logger.warn({ status, code, path: req.path, message }, 'Request rejected');
    res.status(status).json({ error: { message, code, doc_ids } });
  });

  return app;
}
