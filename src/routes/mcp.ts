/**
 * MCP transports:
 *   GET|POST /sse        event stream (endpoint event, then pings); POST with a JSON-RPC body answers directly
 *   POST /sse/messages   JSON-RPC for clients that opened a stream
 *   POST /mcp/tool       legacy `{ name, input }` → `{ success, result | error }`
 *   POST /mcp            MCP SDK Streamable HTTP transport (stateless)
 */
import express, { type Request, type Response } from 'express';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { dispatchTool } from '@/mcp/dispatcher';
import { McpEventStream } from '@/mcp/event-stream';
import { handleRpcMessage, isRpcMessage, rpcError } from '@/mcp/jsonrpc';
import { buildMcpServer } from '@/mcp/server';
import type { SessionRegistry } from '@/mcp/sessions';
import { logger } from '@/services/logger';
import type { TravelServices } from '@/services/providers';
import { errorMessage } from '@/utils/errorResponse';
import { isRecord } from '@/utils/helpers';
import { SSE } from '@/utils/sse';

export const MESSAGES_PATH = '/sse/messages';

export interface McpRouteOptions {
  services: TravelServices;
  sessions: SessionRegistry;
  heartbeatMs: number;
}

const mcpLogger = logger.getSubLogger({ name: 'mcp' });

export function mcpRoutes({ services, sessions, heartbeatMs }: McpRouteOptions): express.Router {
  const router = express.Router();

  const openStream = (_req: Request, res: Response): void => {
    const stream = new McpEventStream(new SSE(res), sessions, { heartbeatMs, messagesPath: MESSAGES_PATH });
    res.on('close', () => stream.close());
    res.on('error', (err) => stream.fail(err));
    stream.start();
  };

  const answerRpc = async (req: Request, res: Response): Promise<void> => {
    const response = await handleRpcMessage(req.body, services);
    if (response === null) {
      res.status(202).end();
      return;
    }
    res.json(response);
  };

  router.get('/sse', openStream);

  router.post('/sse', async (req: Request, res: Response) => {
    if (isRpcMessage(req.body)) {
      await answerRpc(req, res);
      return;
    }
    openStream(req, res);
  });

  router.post(MESSAGES_PATH, async (req: Request, res: Response) => {
    const sessionId = req.query.session_id;
    if (typeof sessionId !== 'string' || sessionId === '') {
      res.json(rpcError(null, ErrorCode.InvalidParams, 'Missing session_id'));
      return;
    }
    await answerRpc(req, res);
  });

  router.post('/mcp/tool', async (req: Request, res: Response) => {
    const body: Record<string, unknown> = isRecord(req.body) ? req.body : {};
    try {
      const result = await dispatchTool(services, body.name, body.input);
      res.json({ success: true, result });
    } catch (err) {
      mcpLogger.warn('legacy tool call failed', { name: body.name, err: errorMessage(err) });
      res.json({ success: false, error: errorMessage(err) });
    }
  });

  router.post('/mcp', async (req: Request, res: Response) => {
    const server = buildMcpServer(services);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    res.on('close', () => {
      Promise.all([transport.close(), server.close()]).catch((err: unknown) => {
        mcpLogger.warn('MCP transport close failed', { err: errorMessage(err) });
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      mcpLogger.error('MCP HTTP request error', { err: errorMessage(err) });
      if (!res.headersSent) {
        res.status(500).json(rpcError(null, ErrorCode.InternalError, 'Internal server error'));
      }
    }
  });

  router.get('/mcp', (_req: Request, res: Response) => {
    res.status(405).json(rpcError(null, ErrorCode.ConnectionClosed, 'Method not allowed'));
  });

  return router;
}
