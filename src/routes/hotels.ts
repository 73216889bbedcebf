import express from 'express';
import { hotelSearchSchema } from '@/mcp/tool-contract';
import type { HotelProvider } from '@/services/providers/hotels/hotel-provider';
import { envelopeHandler } from '@/routes/handler';

export function hotelRoutes(provider: HotelProvider): express.Router {
  const router = express.Router();

  router.post(
    '/search-hotels',
    envelopeHandler(hotelSearchSchema, (params) => provider.searchHotels(params)),
  );

  return router;
}
