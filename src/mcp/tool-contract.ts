/**
 * Parameter contracts shared by the REST routes and the tool dispatcher.
 * Each schema binds loosely typed input (query strings, JSON bodies, tool arguments)
 * to the parameters of one upstream wrapper call, applying defaults.
 */
import { z } from 'zod';

/** Upstream JSON, passed through without interpretation. */
export type UpstreamPayload = Record<string, unknown>;

const text = z.string().trim().min(1);
const count = (min: number, max: number) => z.number().int().min(min).max(max);

/** Query values arrive as strings. A blank one counts as absent, so `lat1=` is missing rather than 0. */
function toNumberInput(value: unknown): unknown {
  if (value === null) return undefined;
  if (typeof value !== 'string') return value;
  return value.trim() === '' ? undefined : Number(value);
}

/** Numeric parameter; the preprocessing wraps any default so a blank value falls back to it. */
const numeric = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(toNumberInput, schema);

/** Accepts real booleans and the query-string spellings true/false/1/0. */
const booleanish = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1'),
]);

export const weatherUnits = ['m', 'f', 's'] as const;
export type WeatherUnits = (typeof weatherUnits)[number];

export const distanceUnits = ['km', 'mi', 'm'] as const;
export type DistanceUnit = (typeof distanceUnits)[number];

export const flightSearchSchema = z.object({
  departure_id: text,
  arrival_id: text,
  outbound_date: text,
  return_date: text.optional(),
  adults: numeric(count(1, 9).default(1)),
  children: numeric(count(0, 9).default(0)),
  infants_in_seat: numeric(count(0, 9).default(0)),
  infants_on_lap: numeric(count(0, 9).default(0)),
  // 1 economy, 2 premium economy, 3 business, 4 first
  travel_class: numeric(count(1, 4).default(1)),
  currency: text.default('USD'),
  max_results: numeric(count(1, 100).default(10)),
});
export type FlightSearchParams = z.infer<typeof flightSearchSchema>;

export const hotelSearchSchema = z.object({
  location: text,
  check_in_date: text,
  check_out_date: text,
  adults: numeric(count(1, 20).default(2)),
  children: numeric(count(0, 20).default(0)),
  currency: text.default('USD'),
  sort_by: numeric(z.number().int().optional()),
  min_price: numeric(z.number().min(0).optional()),
  max_price: numeric(z.number().min(0).optional()),
  max_results: numeric(count(1, 100).default(10)),
});
export type HotelSearchParams = z.infer<typeof hotelSearchSchema>;

export const currentWeatherSchema = z.object({
  location: text,
  units: z.enum(weatherUnits).default('m'),
});
export type CurrentWeatherParams = z.infer<typeof currentWeatherSchema>;

export const forecastSchema = z.object({
  location: text,
  forecast_days: numeric(count(1, 14).default(3)),
  hourly: booleanish.default(false),
  units: z.enum(weatherUnits).default('m'),
});
export type ForecastParams = z.infer<typeof forecastSchema>;

export const eventSearchSchema = z.object({
  query: text,
  location: text.optional(),
  date_range_start: text.optional(),
  date_range_end: text.optional(),
  category: text.optional(),
  max_results: numeric(count(1, 100).default(10)),
});
export type EventSearchParams = z.infer<typeof eventSearchSchema>;

export const currencyConversionSchema = z.object({
  from_currency: text.toUpperCase(),
  to_currency: text.toUpperCase(),
  amount: numeric(z.number().min(0).default(1.0)),
});
export type CurrencyConversionParams = z.infer<typeof currencyConversionSchema>;

export const stockQuoteSchema = z.object({
  symbol: text.toUpperCase(),
  exchange: text.toUpperCase().optional(),
});
export type StockQuoteParams = z.infer<typeof stockQuoteSchema>;

export const geocodeSchema = z.object({
  location: text,
  max_results: numeric(count(1, 50).default(1)),
});
export type GeocodeParams = z.infer<typeof geocodeSchema>;

const latitude = numeric(z.number().min(-90).max(90));
const longitude = numeric(z.number().min(-180).max(180));

export const reverseGeocodeSchema = z.object({
  latitude,
  longitude,
});
export type ReverseGeocodeParams = z.infer<typeof reverseGeocodeSchema>;

export const distanceSchema = z.object({
  lat1: latitude,
  lon1: longitude,
  lat2: latitude,
  lon2: longitude,
  unit: z.enum(distanceUnits).default('km'),
});
export type DistanceParams = z.infer<typeof distanceSchema>;

/** Result of convert_currency. */
export interface CurrencyConversionResult {
  from_currency: string;
  to_currency: string;
  amount: number;
  rate: number;
  converted_amount: number;
  summary: UpstreamPayload;
}

export interface GeocodeMatch {
  latitude: number;
  longitude: number;
  display_name: string;
  type?: string;
  importance?: number;
}

/** Result of geocode_location. */
export interface GeocodeResult {
  location: string;
  results: GeocodeMatch[];
}

export interface ReverseGeocodeResult {
  latitude: number;
  longitude: number;
  display_name: string;
  address: UpstreamPayload;
}

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface DistanceResult {
  from: Coordinates;
  to: Coordinates;
  distance: number;
  unit: DistanceUnit;
}
