/**
 * MCP server on stdio for desktop clients. Same tools and upstream credentials as the HTTP server.
 * Run: npm run mcp:stdio  (or npx tsx src/mcp/stdio.ts)
 */
import '@/mcp/stdio-env';
import 'dotenv/config';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from '@/config/app.config';
import { buildMcpServer } from '@/mcp/server';
import { logger } from '@/services/logger';
import { createTravelServices } from '@/services/providers';

async function main(): Promise<void> {
  const config = loadConfig();
  const server = buildMcpServer(createTravelServices(config));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Travel MCP server running on stdio');
}

main().catch((err: unknown) => {
  logger.fatal('Fatal error', { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
