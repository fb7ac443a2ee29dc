// src/routes/search.ts
// What: POST /query for semantic retrieval over stored chunks.
// How: Validates input with zod and hands it to MemoryManager.query(). Matches come back ranked, with chunk text,
//      score, source filename and offsets, ready for a generation layer to consume.

import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { MemoryManager } from '../services/memoryManager.js';
import { parseInput } from './validate.js';

const schema = z.object({
  // Cap query length to avoid oversized embedding requests and responses
  text: z.string().trim().min(1).max(2000),
  k: z.number().int().positive().max(100).optional().default(5),
});

export function searchRouter(manager: MemoryManager): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { text, k } = parseInput(schema, req.body);
      const matches = await manager.query(text, k);
      res.json({ query: text, k, matches });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
