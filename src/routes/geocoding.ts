import express from 'express';
import { distanceSchema, geocodeSchema, reverseGeocodeSchema } from '@/mcp/tool-contract';
import type { GeocodingProvider } from '@/services/providers/geocoding/geocoding-provider';
import { envelopeHandler } from '@/routes/handler';

/** Mounted at /geocoding. */
export function geocodingRoutes(provider: GeocodingProvider): express.Router {
  const router = express.Router();

  router.get('/geocode', envelopeHandler(geocodeSchema, (params) => provider.geocode(params)));
  router.get('/reverse', envelopeHandler(reverseGeocodeSchema, (params) => provider.reverseGeocode(params)));
  router.get('/distance', envelopeHandler(distanceSchema, (params) => provider.distance(params)));

  return router;
}
