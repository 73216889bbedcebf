import express from 'express';
import { eventSearchSchema } from '@/mcp/tool-contract';
import type { EventProvider } from '@/services/providers/events/event-provider';
import { envelopeHandler } from '@/routes/handler';

export function eventRoutes(provider: EventProvider): express.Router {
  const router = express.Router();

  router.post(
    '/search-events',
    envelopeHandler(eventSearchSchema, (params) => provider.searchEvents(params)),
  );

  return router;
}
