// src/routes/maintenance.ts
// What: Store statistics and the post-mutation health check.

import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { MemoryManager } from '../services/memoryManager.js';
import { parseInput } from './validate.js';

const healthCheckBody = z.object({
  probes: z.array(z.string().trim().min(1).max(2000)).min(1).max(50),
  threshold: z.number().min(-1).max(1).optional(),
});

export function maintenanceRouter(manager: MemoryManager): Router {
  const router = Router();

  router.get('/stats', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await manager.storeStats());
    } catch (err) {
      next(err);
    }
  });

  router.post('/health-check', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { probes, threshold } = parseInput(healthCheckBody, req.body);
      const results = await manager.healthCheck(probes, threshold);
      res.json({ all_failed: results.every((r) => r.status === 'failed'), results });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
