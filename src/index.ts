// Load environment variables FIRST
import 'dotenv/config';

import { loadConfig } from '@/config/app.config';
import { createApp } from '@/app';
import { listTools } from '@/mcp/registry';
import { logger } from '@/services/logger';
import { activeServiceIds, createTravelServices } from '@/services/providers';
import {
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';

const config = loadConfig();
const services = createTravelServices(config);
const app = createApp({ config, services });

setupUnhandledRejectionHandler();
setupUncaughtExceptionHandler();
setupGracefulShutdown();

const server = app.listen(config.port, config.host, () => {
  logger.info(`Server running on http://${config.host}:${config.port}`);
  logger.info(`Environment: ${config.nodeEnv}`);
  logger.info(`Services: ${activeServiceIds(services).join(', ') || 'none'}`);
  logger.info(`MCP endpoint: /sse (JSON-RPC 2.0), tools available: ${listTools().length}`);
  if (!config.serpApiKey) logger.warn('SERPAPI_KEY not set: flight, hotel, event and finance calls will fail');
  if (!config.weatherstackApiKey) logger.warn('WEATHERSTACK_API_KEY not set: weather calls will fail');
});
setServerInstance(server);

export default app;
