// src/routes/index.ts
// What: Root router composition.
// How: Exposes /health and mounts /documents, /query, /backups, /sessions plus /stats and /health-check.
//      Every router receives its collaborators explicitly; nothing here reads process-wide state.

import { Router, type Request, type Response } from 'express';
import type { MemoryManager } from '../services/memoryManager.js';
import type { SessionMemory } from '../services/sessionMemory.js';
import { backupsRouter } from './backups.js';
import { documentsRouter } from './documents.js';
import { maintenanceRouter } from './maintenance.js';
import { searchRouter } from './search.js';
import { sessionsRouter } from './sessions.js';

export interface RouterDeps {
  manager: MemoryManager;
  sessions: SessionMemory;
  uploadMaxBytes: number;
}

export function createRouter({ manager, sessions, uploadMaxBytes }: RouterDeps): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', backend: manager.backendType });
  });

  router.use('/documents', documentsRouter({ manager, uploadMaxBytes }));
  router.use('/query', searchRouter(manager));
  router.use('/backups', backupsRouter(manager));
  router.use('/sessions', sessionsRouter(sessions));
  router.use('/', maintenanceRouter(manager));

  return router;
}
