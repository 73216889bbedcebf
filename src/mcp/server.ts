/**
 * The six tools on an MCP SDK server, for the transports the SDK implements
 * (Streamable HTTP on /mcp, stdio). Descriptors come from the registry and calls go
 * through the same dispatcher as /sse, so arguments bind identically on every transport.
 */
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { callTool, SERVER_INFO } from '@/mcp/jsonrpc';
import { listTools } from '@/mcp/registry';
import type { TravelServices } from '@/services/providers';

export function buildMcpServer(services: TravelServices): Server {
  const server = new Server(
    { name: SERVER_INFO.name, version: SERVER_INFO.version },
    { capabilities: { tools: { listChanged: true } } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: [...listTools()] }));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    callTool(services, request.params.name, request.params.arguments),
  );

  return server;
}
