// src/routes/agent.ts: query endpoint and config cache control
import express, { type NextFunction, type Request, type Response } from 'express';
import { validateAgentQuery } from '@/agent/agent.validation';
import { selectHistoryWindow } from '@/services/chat-history';
import { runPipeline } from '@/services/orchestrator';
import type { ServiceDeps } from '@/services/pipeline-deps';
import { logger } from '@/services/logger';
import { createErrorResponse, createSuccessResponse } from '@/utils/errorResponse';
import { PipelineAbortedError, errorMessage } from '@/utils/errors';
import type { ConversationMessage } from '@/types/core';

export function createAgentRouter(deps: ServiceDeps): express.Router {
  const router = express.Router();

  router.post('/query', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateAgentQuery(req.body);
    if (!validation.success) {
      logger.warn('POST /api/agent/query validation failed', { errors: validation.error });
      res.status(400).json(createErrorResponse('bad_request', 'Invalid request body', validation.error));
      return;
    }
    const body = validation.data;

    // Client disconnect cancels the in-flight pipeline.
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      // Supplied history is held to the same window as stored history.
      let history: ConversationMessage[] = body.conversation_history
        ? selectHistoryWindow(body.conversation_history, deps.historyWindow)
        : [];
      if (!body.conversation_history) {
        try {
          history = await deps.history.loadConversation(body.session_id, controller.signal);
        } catch (err) {
          if (controller.signal.aborted) throw new PipelineAbortedError();
          logger.warn('chat-history:load_failed', { sessionId: body.session_id, error: errorMessage(err) });
        }
      }

      const result = await runPipeline(
        {
          query: body.query,
          province: body.province,
          sessionId: body.session_id,
          userId: body.user_id,
          conversationHistory: history,
          signal: controller.signal,
        },
        deps.pipeline,
      );

      try {
        await deps.history.saveExchange({
          sessionId: body.session_id,
          userId: body.user_id,
          province: body.province,
          query: body.query,
          response: result.response,
          confidenceScore: result.confidenceScore,
          escalated: result.escalated,
          sources: result.sources,
        });
      } catch (err) {
        logger.warn('chat-history:save_failed', { sessionId: body.session_id, error: errorMessage(err) });
      }

      res.json(createSuccessResponse(result));
    } catch (err) {
      if (err instanceof PipelineAbortedError) {
        logger.info('POST /api/agent/query aborted by client', { sessionId: body.session_id });
        return;
      }
      next(err);
    }
  });

  router.post('/config/invalidate', (_req: Request, res: Response) => {
    deps.config.invalidate();
    deps.pipeline.prompts.invalidate();
    res.json(createSuccessResponse({ invalidated: true }));
  });

  return router;
}
