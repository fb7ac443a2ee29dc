// src/routes/backups.ts
// What: Snapshot listing, creation and restore.
// How: Restore takes a snapshot id or a label; unknown references answer 404, incompatible or damaged
//      snapshots 500, and in both cases the live store is left as it was.

import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { MemoryManager } from '../services/memoryManager.js';
import { parseInput } from './validate.js';

const createBody = z.object({ label: z.string().trim().min(1).max(200) });
const restoreBody = z.object({ snapshot: z.string().trim().min(1) });

export function backupsRouter(manager: MemoryManager): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const snapshots = await manager.listBackups();
      res.json({ count: snapshots.length, snapshots });
    } catch (err) {
      next(err);
    }
  });

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { label } = parseInput(createBody, req.body);
      const manifest = await manager.createBackup(label);
      res.status(201).json({ snapshot_id: manifest.id, manifest });
    } catch (err) {
      next(err);
    }
  });

  router.post('/restore', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { snapshot } = parseInput(restoreBody, req.body);
      const manifest = await manager.restoreBackup(snapshot);
      res.json({ restored: true, snapshot_id: manifest.id, manifest });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
