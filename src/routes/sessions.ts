// src/routes/sessions.ts
// What: Conversation history per session, kept apart from the document store.

import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { SessionMemory } from '../services/sessionMemory.js';
import { parseInput } from './validate.js';

const sessionParams = z.object({ id: z.string().trim().min(1).max(200) });
const appendBody = z.object({
  role: z.enum(['user', 'assistant', 'system']),
  content: z.string().min(1).max(20_000),
});

export function sessionsRouter(sessions: SessionMemory): Router {
  const router = Router();

  router.get('/:id/messages', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseInput(sessionParams, req.params);
      res.json({ session_id: id, messages: sessions.history(id) });
    } catch (err) {
      next(err);
    }
  });

  router.post('/:id/messages', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseInput(sessionParams, req.params);
      const { role, content } = parseInput(appendBody, req.body);
      res.status(201).json({ session_id: id, messages: sessions.append(id, role, content) });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:id/messages', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseInput(sessionParams, req.params);
      sessions.clear(id);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
