/// <reference path="../types/express/index.d.ts" />
// node/src/middleware/correlation.ts: correlation ID for observability
import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';

export function attachCorrelationId(req: Request, res: Response, next: NextFunction): void {
  const correlationId = req.header('x-correlation-id') ?? randomUUID();
  req.correlationId = correlationId;
  res.setHeader('x-correlation-id', correlationId);
  next();
}
