// src/middleware/correlation.ts — correlation id per request, echoed on the response
import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

export const CORRELATION_HEADER = 'x-correlation-id';

export function attachCorrelationId(req: Request, res: Response, next: NextFunction): void {
  const headerId = req.header(CORRELATION_HEADER);
  const correlationId = headerId && headerId.trim() ? headerId.trim() : randomUUID();

  res.locals.correlationId = correlationId;
  res.setHeader(CORRELATION_HEADER, correlationId);
  next();
}

export function correlationIdOf(res: Response): string | undefined {
  const id: unknown = res.locals.correlationId;
  return typeof id === 'string' ? id : undefined;
}
