// src/routes/handler.ts — binds request parameters and wraps the outcome in the envelope
import type { Request, RequestHandler, Response } from 'express';
import type { z } from 'zod';
import { correlationIdOf } from '@/middleware/correlation';
import { logger } from '@/services/logger';
import {
  createErrorResponse,
  createSuccessResponse,
  errorMessage,
  toFieldErrors,
} from '@/utils/errorResponse';
import { isRecord } from '@/utils/helpers';

const routeLogger = logger.getSubLogger({ name: 'routes' });

/** Query string, then JSON body, then path params; later sources win. */
export function requestParams(req: Request): Record<string, unknown> {
  return {
    ...req.query,
    ...(isRecord(req.body) ? req.body : {}),
    ...req.params,
  };
}

/**
 * Express handler for one upstream call. Unbindable parameters answer 422; anything the
 * wrapper throws answers 200 with `{ success: false, error }`.
 */
export function envelopeHandler<S extends z.AnyZodObject, T>(
  schema: S,
  run: (params: z.infer<S>) => Promise<T> | T,
): RequestHandler {
  return async (req: Request, res: Response) => {
    const parsed = schema.safeParse(requestParams(req));
    if (!parsed.success) {
      res.status(422).json(createErrorResponse('Invalid request parameters', toFieldErrors(parsed.error)));
      return;
    }

    try {
      const data = await run(parsed.data);
      res.json(createSuccessResponse(data));
    } catch (err) {
      const message = errorMessage(err);
      routeLogger.warn(`${req.method} ${req.path} failed`, { error: message, correlationId: correlationIdOf(res) });
      res.json(createErrorResponse(message));
    }
  };
}
