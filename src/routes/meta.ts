import express, { type Request, type Response } from 'express';
import { DEFAULT_PROTOCOL_VERSION, SERVER_INFO } from '@/mcp/jsonrpc';
import { listTools } from '@/mcp/registry';
import { activeServiceIds, type TravelServices } from '@/services/providers';

export const SERVICE_NAME = 'Travel Assistant MCP Server';

export function metaRoutes(services: TravelServices): express.Router {
  const router = express.Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      name: SERVICE_NAME,
      version: SERVER_INFO.version,
      status: 'running',
      services: activeServiceIds(services),
      tools_count: listTools().length,
      mcp_endpoint: '/sse',
      protocol: `MCP ${DEFAULT_PROTOCOL_VERSION}`,
    });
  });

  // Independent of upstream availability.
  router.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'healthy', message: 'Server is running' });
  });

  return router;
}
