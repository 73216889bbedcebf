import express from 'express';
import { currentWeatherSchema, forecastSchema } from '@/mcp/tool-contract';
import type { WeatherProvider } from '@/services/providers/weather/weather-provider';
import { envelopeHandler } from '@/routes/handler';

/** Mounted at /weather. */
export function weatherRoutes(provider: WeatherProvider): express.Router {
  const router = express.Router();

  router.get('/current', envelopeHandler(currentWeatherSchema, (params) => provider.getCurrentWeather(params)));
  router.get('/forecast', envelopeHandler(forecastSchema, (params) => provider.getForecast(params)));

  return router;
}
