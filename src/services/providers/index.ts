// src/services/providers/index.ts
// Registry of the upstream wrappers. A service left out of the registry has its routes
// omitted and its tool reported as unavailable.
import type { AppConfig } from '@/config/app.config';
import { logger } from '@/services/logger';
import type { EventProvider } from '@/services/providers/events/event-provider';
import { SerpEventProvider } from '@/services/providers/events/serp-events';
import type { FinanceProvider } from '@/services/providers/finance/finance-provider';
import { SerpFinanceProvider } from '@/services/providers/finance/serp-finance';
import type { FlightProvider } from '@/services/providers/flights/flight-provider';
import { SerpFlightProvider } from '@/services/providers/flights/serp-flights';
import type { GeocodingProvider } from '@/services/providers/geocoding/geocoding-provider';
import { NominatimGeocodingProvider } from '@/services/providers/geocoding/nominatim-geocoding';
import type { HotelProvider } from '@/services/providers/hotels/hotel-provider';
import { SerpHotelProvider } from '@/services/providers/hotels/serp-hotels';
import { SerpApiClient } from '@/services/providers/serpapi';
import { createUpstreamClient } from '@/services/providers/upstream';
import type { WeatherProvider } from '@/services/providers/weather/weather-provider';
import { WeatherstackProvider } from '@/services/providers/weather/weatherstack-weather';

export interface TravelServices {
  flights?: FlightProvider;
  hotels?: HotelProvider;
  weather?: WeatherProvider;
  events?: EventProvider;
  finance?: FinanceProvider;
  geocoding?: GeocodingProvider;
}

export type ServiceId = keyof TravelServices;

export const SERVICE_IDS: readonly ServiceId[] = ['flights', 'hotels', 'weather', 'events', 'finance', 'geocoding'];

export function activeServiceIds(services: TravelServices): ServiceId[] {
  return SERVICE_IDS.filter((id) => services[id] !== undefined);
}

type ServiceFactories = { [K in ServiceId]-?: () => NonNullable<TravelServices[K]> };

const providerLogger = logger.getSubLogger({ name: 'providers' });

function build<K extends ServiceId>(services: TravelServices, id: K, factory: () => NonNullable<TravelServices[K]>): void {
  try {
    services[id] = factory();
  } catch (err) {
    providerLogger.warn(`Service ${id} unavailable, its endpoints are disabled`, {
      err: err instanceof Error ? err.message : String(err),
    });
  }
}

/** Builds the default registry from configuration. Credentials are checked per call, not here. */
export function createTravelServices(config: AppConfig): TravelServices {
  const http = createUpstreamClient(config.upstreamTimeoutMs);
  const serp = new SerpApiClient(http, config.serpApiKey);
  const geocoderHttp = createUpstreamClient(config.upstreamTimeoutMs, { 'User-Agent': config.geocoderUserAgent });

  const factories: ServiceFactories = {
    flights: () => new SerpFlightProvider(serp),
    hotels: () => new SerpHotelProvider(serp),
    weather: () => new WeatherstackProvider(http, config.weatherstackApiKey),
    events: () => new SerpEventProvider(serp),
    finance: () => new SerpFinanceProvider(serp),
    geocoding: () => new NominatimGeocodingProvider(geocoderHttp),
  };

  const services: TravelServices = {};
  for (const id of SERVICE_IDS) build(services, id, factories[id]);
  return services;
}
