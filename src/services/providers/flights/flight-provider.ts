// src/services/providers/flights/flight-provider.ts
import type { FlightSearchParams, UpstreamPayload } from '@/mcp/tool-contract';

export interface FlightProvider {
  name: string;
  searchFlights(params: FlightSearchParams): Promise<UpstreamPayload>;
}
