/**
 * Tool dispatcher: maps a tool name onto exactly one upstream wrapper call.
 * Arguments bind like keyword arguments: defaults fill in, a missing required argument
 * or an unknown one fails the call. Wrapper failures propagate untouched.
 */
import type { z } from 'zod';
import {
  currencyConversionSchema,
  currentWeatherSchema,
  eventSearchSchema,
  flightSearchSchema,
  geocodeSchema,
  hotelSearchSchema,
} from '@/mcp/tool-contract';
import { isToolName, type ToolName } from '@/mcp/registry';
import { logger } from '@/services/logger';
import type { ServiceId, TravelServices } from '@/services/providers';
import { isRecord } from '@/utils/helpers';
import { formatFieldErrors, toFieldErrors } from '@/utils/errorResponse';

export class UnknownToolError extends Error {
  constructor(readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
  }
}

export class ToolArgumentError extends Error {
  constructor(message: string) {
    super(`Invalid arguments: ${message}`);
    this.name = 'ToolArgumentError';
  }
}

export class ServiceUnavailableError extends Error {
  constructor(readonly service: ServiceId) {
    super(`Service unavailable: ${service}`);
    this.name = 'ServiceUnavailableError';
  }
}

export const TOOL_SERVICES: Record<ToolName, ServiceId> = {
  search_flights: 'flights',
  search_hotels: 'hotels',
  get_current_weather: 'weather',
  search_events: 'events',
  convert_currency: 'finance',
  geocode_location: 'geocoding',
};

const dispatchLogger = logger.getSubLogger({ name: 'dispatch' });

function requireService<K extends ServiceId>(services: TravelServices, id: K): NonNullable<TravelServices[K]> {
  const service = services[id];
  if (!service) throw new ServiceUnavailableError(id);
  return service;
}

export function bindArguments<S extends z.AnyZodObject>(schema: S, args: unknown): z.infer<S> {
  const input = args ?? {};
  if (isRecord(input)) {
    const unexpected = Object.keys(input).filter((key) => !Object.hasOwn(schema.shape, key));
    if (unexpected.length > 0) {
      throw new ToolArgumentError(unexpected.map((key) => `${key}: Unexpected argument`).join('; '));
    }
  }
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw new ToolArgumentError(formatFieldErrors(toFieldErrors(parsed.error)));
  return parsed.data;
}

/**
 * Invokes the wrapper behind `name`.
 * @throws UnknownToolError when `name` is not one of the six tools; no wrapper runs.
 */
export async function dispatchTool(services: TravelServices, name: unknown, args?: unknown): Promise<unknown> {
  if (!isToolName(name)) throw new UnknownToolError(String(name));
  dispatchLogger.info('tools/call', { name });

  switch (name) {
    case 'search_flights':
      return requireService(services, 'flights').searchFlights(bindArguments(flightSearchSchema, args));
    case 'search_hotels':
      return requireService(services, 'hotels').searchHotels(bindArguments(hotelSearchSchema, args));
    case 'get_current_weather':
      return requireService(services, 'weather').getCurrentWeather(bindArguments(currentWeatherSchema, args));
    case 'search_events':
      return requireService(services, 'events').searchEvents(bindArguments(eventSearchSchema, args));
    case 'convert_currency':
      return requireService(services, 'finance').convertCurrency(bindArguments(currencyConversionSchema, args));
    case 'geocode_location':
      return requireService(services, 'geocoding').geocode(bindArguments(geocodeSchema, args));
  }
}
