// src/services/providers/geocoding/geocoding-provider.ts
import type {
  DistanceParams,
  DistanceResult,
  GeocodeParams,
  GeocodeResult,
  ReverseGeocodeParams,
  ReverseGeocodeResult,
} from '@/mcp/tool-contract';

export interface GeocodingProvider {
  name: string;
  geocode(params: GeocodeParams): Promise<GeocodeResult>;
  reverseGeocode(params: ReverseGeocodeParams): Promise<ReverseGeocodeResult>;
  distance(params: DistanceParams): DistanceResult;
}
