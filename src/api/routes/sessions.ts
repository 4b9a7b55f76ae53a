/**
 * Sessions API Route
 *
 * POST   /sessions              - Start a session
 * GET    /sessions/:id          - Session state and history
 * POST   /sessions/:id/messages - Post a user message, wait for the response
 * POST   /sessions/:id/cancel   - Cancel a session
 * DELETE /sessions/:id          - End a session
 */

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { InvalidInputError } from '../../core/errors.js';
import type { SessionManager } from '../../execution/session-manager.js';

const StartSessionSchema = z.object({
  turnBudget: z.number().int().min(1).max(50).optional(),
});

const PostMessageSchema = z.object({
  text: z.string().trim().min(1, 'text must not be empty'),
});

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`);
    throw new InvalidInputError('Invalid request body', issues);
  }
  return result.data;
}

export function createSessionsRouter(sessions: SessionManager): Router {
  const router = Router();

  /**
   * POST /sessions
   */
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(StartSessionSchema, req.body);
      const sessionId = sessions.startSession({ turnBudget: body.turnBudget });
      res.status(201).json(sessions.getSession(sessionId));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /sessions/:id
   */
  router.get('/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = sessions.getSession(req.params.id);
      res.json({ ...session, messages: sessions.getHistory(req.params.id) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /sessions/:id/messages
   *
   * Responds once the message reaches a terminal state.
   */
  router.post('/:id/messages', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(PostMessageSchema, req.body);
      const response = await sessions.postMessage(req.params.id, body.text);
      res.json({ response });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /sessions/:id/cancel
   */
  router.post('/:id/cancel', (req: Request, res: Response, next: NextFunction) => {
    try {
      sessions.cancelSession(req.params.id);
      res.status(202).json({ id: req.params.id, cancelled: true });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /sessions/:id
   */
  router.delete('/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      sessions.endSession(req.params.id);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
