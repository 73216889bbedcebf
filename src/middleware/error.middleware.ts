import type { Request, Response, NextFunction } from 'express';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { rpcError } from '@/mcp/jsonrpc';
import { correlationIdOf } from '@/middleware/correlation';
import { logger } from '@/services/logger';
import { createErrorResponse, errorMessage } from '@/utils/errorResponse';
import { isRecord } from '@/utils/helpers';

const httpLogger = logger.getSubLogger({ name: 'http' });

/** Routes that speak JSON-RPC rather than the success/error envelope. */
function isRpcPath(path: string): boolean {
  return path === '/sse' || path.startsWith('/sse/') || path === '/mcp';
}

function isJsonParseError(err: unknown): boolean {
  return isRecord(err) && err.type === 'entity.parse.failed';
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(createErrorResponse(`Not found: ${req.method} ${req.path}`));
}

export function errorMiddleware(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (isJsonParseError(err)) {
    httpLogger.warn('Malformed JSON body', { path: req.path, correlationId: correlationIdOf(res) });
    if (isRpcPath(req.path)) {
      res.status(200).json(rpcError(null, ErrorCode.ParseError, 'Parse error'));
    } else {
      res.status(400).json(createErrorResponse('Malformed JSON body'));
    }
    return;
  }

  httpLogger.error('Unhandled error', {
    path: req.path,
    correlationId: correlationIdOf(res),
    error: errorMessage(err),
  });
  if (res.headersSent) {
    res.end();
    return;
  }
  res.status(500).json(createErrorResponse('Internal Server Error'));
}
