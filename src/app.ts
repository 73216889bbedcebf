import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';

import type { AppConfig } from '@/config/app.config';
import { SessionRegistry } from '@/mcp/sessions';
import { attachCorrelationId } from '@/middleware/correlation';
import { errorMiddleware, notFoundHandler } from '@/middleware/error.middleware';
import { eventRoutes } from '@/routes/events';
import { financeRoutes } from '@/routes/finance';
import { flightRoutes } from '@/routes/flights';
import { geocodingRoutes } from '@/routes/geocoding';
import { hotelRoutes } from '@/routes/hotels';
import { mcpRoutes } from '@/routes/mcp';
import { metaRoutes } from '@/routes/meta';
import { weatherRoutes } from '@/routes/weather';
import { logger } from '@/services/logger';
import type { ServiceId, TravelServices } from '@/services/providers';

export interface AppOptions {
  config: AppConfig;
  services: TravelServices;
  sessions?: SessionRegistry;
}

const httpLogger = logger.getSubLogger({ name: 'http' });

function skipped(id: ServiceId): void {
  httpLogger.warn(`Service ${id} not available, its endpoints are not mounted`);
}

export function createApp({ config, services, sessions = new SessionRegistry() }: AppOptions): Express {
  const app = express();

  // Security middleware
  app.use(helmet());

  app.use(cors({ origin: config.corsOrigin }));

  app.use(attachCorrelationId);

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));

  // Access log through tslog
  if (config.nodeEnv !== 'test') {
    app.use(
      morgan(config.nodeEnv === 'development' ? 'dev' : 'combined', {
        stream: { write: (line: string) => httpLogger.info(line.trimEnd()) },
      }),
    );
  }

  app.use(metaRoutes(services));

  if (services.flights) app.use(flightRoutes(services.flights));
  else skipped('flights');
  if (services.hotels) app.use(hotelRoutes(services.hotels));
  else skipped('hotels');
  if (services.events) app.use(eventRoutes(services.events));
  else skipped('events');
  if (services.weather) app.use('/weather', weatherRoutes(services.weather));
  else skipped('weather');
  if (services.finance) app.use('/finance', financeRoutes(services.finance));
  else skipped('finance');
  if (services.geocoding) app.use('/geocoding', geocodingRoutes(services.geocoding));
  else skipped('geocoding');

  app.use(mcpRoutes({ services, sessions, heartbeatMs: config.heartbeatMs }));

  // Error handling middleware
  app.use(notFoundHandler);
  app.use(errorMiddleware);

  return app;
}
