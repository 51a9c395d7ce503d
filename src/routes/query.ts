// src/routes/query.ts — query endpoints: JSON, SSE stream, history, feedback and analytics
import express, { type Request, type Response } from 'express';
import { z } from 'zod';
import { logger } from '@/services/logger';
import type { PipelineDeps } from '@/services/pipeline-deps';
import type { ProgressChannel, ResponsePayload } from '@/types/core';
import { QueueFullError, errorMessage } from '@/utils/errors';
import { CollectingProgressChannel } from '@/utils/progress';
import { SSE, SseProgressChannel } from '@/utils/sse';

const queryInput = z.object({
  userId: z.string().trim().min(1).max(128),
  message: z.string().trim().min(1).max(4000),
});

const feedbackInput = z.object({
  userId: z.string().trim().min(1).max(128),
  satisfaction: z.coerce.number().min(1).max(5),
});

function sendJsonError(res: Response, status: number, code: string, details?: unknown) {
  return res.status(status).json({ error: code, details });
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
}

/** Run one query with the user's chat history, then record the exchange in that history. */
export async function runForUser(
  deps: PipelineDeps,
  userId: string,
  text: string,
  channel: ProgressChannel,
  signal?: AbortSignal,
): Promise<ResponsePayload> {
  const history = deps.chatHistory.get(userId);
  const payload = await deps.driver.run({ userId, text, history, signal }, channel);
  deps.chatHistory.append(
    userId,
    { role: 'user', content: text },
    { role: 'assistant', content: payload.response },
  );
  return payload;
}

export function createQueryRouter(deps: PipelineDeps): express.Router {
  const router = express.Router();

  router.post('/', async (req: Request, res: Response) => {
    const parsed = queryInput.safeParse(req.body);
    if (!parsed.success) {
      logger.warn('http:query_validation_failed', { error: describeIssues(parsed.error) });
      return sendJsonError(res, 400, 'bad_request', describeIssues(parsed.error));
    }

    const { userId, message } = parsed.data;
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    const channel = new CollectingProgressChannel();
    try {
      const response = await deps.queue.run(() => runForUser(deps, userId, message, channel, controller.signal));
      return res.json({ statusUpdates: channel.statusUpdates, response });
    } catch (err) {
      if (err instanceof QueueFullError) return sendJsonError(res, 503, 'busy', err.message);
      logger.error('http:query_failed', { userId, error: errorMessage(err) });
      return sendJsonError(res, 500, 'internal_error', errorMessage(err));
    }
  });

  router.get('/stream', async (req: Request, res: Response) => {
    const parsed = queryInput.safeParse(req.query);
    if (!parsed.success) {
      return sendJsonError(res, 400, 'bad_request', describeIssues(parsed.error));
    }

    const { userId, message } = parsed.data;
    const startedAt = Date.now();
    const controller = new AbortController();
    const sse = new SSE(res);
    sse.init();

    req.on('close', () => {
      if (sse.isClosed()) return;
      sse.markClosed();
      controller.abort();
      logger.info('http:sse_client_disconnected', { userId, durationMs: Date.now() - startedAt });
    });

    try {
      await deps.queue.run(() =>
        runForUser(deps, userId, message, new SseProgressChannel(sse), controller.signal),
      );
    } catch (err) {
      logger.error('http:sse_failed', { userId, error: errorMessage(err) });
      sse.send('error', {
        error: err instanceof QueueFullError ? 'busy' : 'internal_error',
        details: errorMessage(err),
      });
      sse.close();
    }
  });

  router.delete('/history/:userId', (req: Request, res: Response) => {
    deps.chatHistory.clear(req.params.userId);
    res.json({ status: 'history_cleared', userId: req.params.userId });
  });

  router.post('/feedback', (req: Request, res: Response) => {
    const parsed = feedbackInput.safeParse(req.body);
    if (!parsed.success) {
      return sendJsonError(res, 400, 'bad_request', describeIssues(parsed.error));
    }
    const recorded = deps.analytics.recordSatisfaction(parsed.data.userId, parsed.data.satisfaction);
    if (!recorded) return sendJsonError(res, 404, 'no_interactions', parsed.data.userId);
    return res.json({ recorded: true });
  });

  router.get('/analytics/:userId', (req: Request, res: Response) => {
    const { userId } = req.params;
    res.json({
      patterns: deps.analytics.analyze(userId),
      toolSuggestions: deps.discovery.getToolSuggestions(deps.memory.getProfile(userId)),
    });
  });

  return router;
}
