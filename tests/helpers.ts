import type { Server } from 'http';
import type { Express } from 'express';
import axios, { AxiosError, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { vi } from 'vitest';
import type { AppConfig } from '@/config/app.config';
import type { EventProvider } from '@/services/providers/events/event-provider';
import type { FinanceProvider } from '@/services/providers/finance/finance-provider';
import type { FlightProvider } from '@/services/providers/flights/flight-provider';
import type { GeocodingProvider } from '@/services/providers/geocoding/geocoding-provider';
import type { HotelProvider } from '@/services/providers/hotels/hotel-provider';
import type { WeatherProvider } from '@/services/providers/weather/weather-provider';

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 0,
    host: '127.0.0.1',
    nodeEnv: 'test',
    corsOrigin: '*',
    serpApiKey: 'test-serp-key',
    weatherstackApiKey: 'test-weather-key',
    geocoderUserAgent: 'travel-mcp-gateway-tests/1.0',
    upstreamTimeoutMs: 1_000,
    heartbeatMs: 30_000,
    ...overrides,
  };
}

/** In-memory providers; every method is a vi.fn with no behaviour until a test gives it one. */
export function fakeServices() {
  return {
    flights: { name: 'fake-flights', searchFlights: vi.fn<FlightProvider['searchFlights']>() },
    hotels: { name: 'fake-hotels', searchHotels: vi.fn<HotelProvider['searchHotels']>() },
    weather: {
      name: 'fake-weather',
      getCurrentWeather: vi.fn<WeatherProvider['getCurrentWeather']>(),
      getForecast: vi.fn<WeatherProvider['getForecast']>(),
    },
    events: { name: 'fake-events', searchEvents: vi.fn<EventProvider['searchEvents']>() },
    finance: {
      name: 'fake-finance',
      convertCurrency: vi.fn<FinanceProvider['convertCurrency']>(),
      getStockQuote: vi.fn<FinanceProvider['getStockQuote']>(),
    },
    geocoding: {
      name: 'fake-geocoding',
      geocode: vi.fn<GeocodingProvider['geocode']>(),
      reverseGeocode: vi.fn<GeocodingProvider['reverseGeocode']>(),
      distance: vi.fn<GeocodingProvider['distance']>(),
    },
  };
}

export type FakeServices = ReturnType<typeof fakeServices>;

export interface StubReply {
  status?: number;
  data: unknown;
}

/**
 * axios instance whose adapter answers in process. Non-2xx replies reject the way
 * axios does, with the response attached.
 */
export function stubHttp(reply: (config: InternalAxiosRequestConfig) => StubReply) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http: AxiosInstance = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const { status = 200, data } = reply(config);
      const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
      if (status >= 400) {
        throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
      }
      return response;
    },
  });
  return { http, requests };
}

export interface RunningServer {
  baseUrl: string;
  close(): Promise<void>;
}

export async function startServer(app: Express): Promise<RunningServer> {
  const server: Server = await new Promise((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server has no TCP address');
  const { port } = address;
  return {
    baseUrl: `http://127.0.0.1:${port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

/** Client that never rejects on HTTP status, so tests can assert on it. */
export const client = axios.create({ validateStatus: () => true, timeout: 5_000 });
