/**
 * Geocoding against OpenStreetMap Nominatim (no API key; a User-Agent is mandatory and
 * is set on the axios instance). Distance is computed locally.
 */
import type { AxiosInstance } from 'axios';
import type {
  DistanceParams,
  DistanceResult,
  GeocodeMatch,
  GeocodeParams,
  GeocodeResult,
  ReverseGeocodeParams,
  ReverseGeocodeResult,
} from '@/mcp/tool-contract';
import type { GeocodingProvider } from '@/services/providers/geocoding/geocoding-provider';
import { distanceBetween } from '@/services/providers/geocoding/distance';
import { asRecord, fetchJson, UpstreamError } from '@/services/providers/upstream';
import { isRecord } from '@/utils/helpers';

export const NOMINATIM_URL = 'https://nominatim.openstreetmap.org';

function toNumber(value: unknown): number | undefined {
  const n = typeof value === 'string' ? Number.parseFloat(value) : value;
  return typeof n === 'number' && Number.isFinite(n) ? n : undefined;
}

function toMatch(item: unknown): GeocodeMatch | null {
  if (!isRecord(item)) return null;
  const latitude = toNumber(item.lat);
  const longitude = toNumber(item.lon);
  if (latitude === undefined || longitude === undefined) return null;
  const match: GeocodeMatch = {
    latitude,
    longitude,
    display_name: typeof item.display_name === 'string' ? item.display_name : '',
  };
  if (typeof item.type === 'string') match.type = item.type;
  const importance = toNumber(item.importance);
  if (importance !== undefined) match.importance = importance;
  return match;
}

export class NominatimGeocodingProvider implements GeocodingProvider {
  readonly name = 'nominatim';

  constructor(private readonly http: AxiosInstance) {}

  async geocode(params: GeocodeParams): Promise<GeocodeResult> {
    const raw = await fetchJson(this.http, `${NOMINATIM_URL}/search`, {
      q: params.location,
      format: 'jsonv2',
      limit: params.max_results,
    });
    if (!Array.isArray(raw)) throw new UpstreamError('Unexpected response from Nominatim');

    const results = raw.map(toMatch).filter((m): m is GeocodeMatch => m !== null);
    if (results.length === 0) throw new Error(`No results found for location: ${params.location}`);
    return { location: params.location, results: results.slice(0, params.max_results) };
  }

  async reverseGeocode(params: ReverseGeocodeParams): Promise<ReverseGeocodeResult> {
    const raw = await fetchJson(this.http, `${NOMINATIM_URL}/reverse`, {
      lat: params.latitude,
      lon: params.longitude,
      format: 'jsonv2',
    });
    const payload = asRecord(raw, 'Nominatim');
    if (typeof payload.error === 'string') throw new UpstreamError(payload.error);

    return {
      latitude: toNumber(payload.lat) ?? params.latitude,
      longitude: toNumber(payload.lon) ?? params.longitude,
      display_name: typeof payload.display_name === 'string' ? payload.display_name : '',
      address: isRecord(payload.address) ? payload.address : {},
    };
  }

  distance(params: DistanceParams): DistanceResult {
    const from = { latitude: params.lat1, longitude: params.lon1 };
    const to = { latitude: params.lat2, longitude: params.lon2 };
    return { from, to, distance: distanceBetween(from, to, params.unit), unit: params.unit };
  }
}
