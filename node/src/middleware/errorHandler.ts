/// <reference path="../types/express/index.d.ts" />
import type { NextFunction, Request, Response } from 'express';
import { logger } from '@/services/logger';
import { createErrorResponse } from '@/utils/errorResponse';
import { errorMessage } from '@/utils/errors';

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  logger.error('http:unhandled_error', {
    method: req.method,
    path: req.path,
    correlationId: req.correlationId,
    error: errorMessage(err),
  });
  if (res.headersSent) return;
  res.status(500).json(createErrorResponse('internal_error', 'Internal server error'));
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(createErrorResponse('not_found', `No route for ${req.method} ${req.path}`));
}
