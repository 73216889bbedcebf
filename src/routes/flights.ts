import express from 'express';
import { flightSearchSchema } from '@/mcp/tool-contract';
import type { FlightProvider } from '@/services/providers/flights/flight-provider';
import { envelopeHandler } from '@/routes/handler';

export function flightRoutes(provider: FlightProvider): express.Router {
  const router = express.Router();

  router.post(
    '/search-flights',
    envelopeHandler(flightSearchSchema, (params) => provider.searchFlights(params)),
  );

  return router;
}
