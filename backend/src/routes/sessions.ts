import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { Orchestrator } from '../services/orchestrator.js';
import type { Logger } from '../utils/logger.js';
import { MAX_TIMER_DELAY_MS } from '../types/config.js';
import { sendError, sendValidationError } from './utils.js';

const createSessionSchema = z.object({
  task: z.union([z.string().trim().min(1, 'Task is required'), z.record(z.unknown())]),
  timeoutMs: z.number().int().nonnegative().max(MAX_TIMER_DELAY_MS).optional(),
  gracePeriodMs: z.number().int().nonnegative().optional(),
  retainWorkspace: z.boolean().optional()
});

const cancelSessionSchema = z.object({
  gracePeriodMs: z.number().int().nonnegative().optional()
});

const fromSchema = z.coerce.number().int().nonnegative().default(0);

export function createSessionRouter(orchestrator: Orchestrator, logger?: Logger): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json(orchestrator.list());
  });

  router.post('/', (req: Request, res: Response) => {
    const parsed = createSessionSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      logger?.warn('Session creation failed: invalid request body');
      sendValidationError(res, parsed.error);
      return;
    }

    const { task, ...options } = parsed.data;
    try {
      const created = orchestrator.submit(task, options);
      logger?.verbose(`Session ${created.sessionId} submitted`);
      res.status(201).json(created);
    } catch (error) {
      sendError(res, error, 'Failed to create session', logger);
    }
  });

  router.post('/cancel-all', async (req: Request, res: Response): Promise<void> => {
    const parsed = cancelSessionSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const result = await orchestrator.cancelAll(parsed.data.gracePeriodMs);
      logger?.info(`Cancel-all requested: ${result.cancelled.length} session(s) cancelled`);
      res.status(202).json(result);
    } catch (error) {
      sendError(res, error, 'Failed to cancel sessions', logger);
    }
  });

  router.get('/:id', (req: Request, res: Response) => {
    try {
      res.json(orchestrator.status(req.params.id));
    } catch (error) {
      sendError(res, error, 'Failed to get session', logger);
    }
  });

  router.get('/:id/stream', async (req: Request, res: Response): Promise<void> => {
    const from = fromSchema.safeParse(req.query.from);
    if (!from.success) {
      sendValidationError(res, from.error);
      return;
    }

    const controller = new AbortController();
    let events: AsyncIterable<unknown>;
    try {
      events = orchestrator.stream(req.params.id, from.data, controller.signal);
    } catch (error) {
      sendError(res, error, 'Failed to stream session output', logger);
      return;
    }

    // Stop reading when the client goes away
    res.on('close', () => controller.abort());
    res.status(200);
    res.setHeader('Content-Type', 'application/x-ndjson; charset=utf-8');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    try {
      for await (const event of events) {
        res.write(JSON.stringify(event) + '\n');
      }
    } catch (error) {
      logger?.warn(`Output stream of session ${req.params.id} failed`, error instanceof Error ? error : undefined);
    } finally {
      res.end();
    }
  });

  router.post('/:id/cancel', async (req: Request, res: Response): Promise<void> => {
    const parsed = cancelSessionSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const result = await orchestrator.cancel(req.params.id, parsed.data.gracePeriodMs);
      res.status(202).json(result);
    } catch (error) {
      sendError(res, error, 'Failed to cancel session', logger);
    }
  });

  return router;
}
