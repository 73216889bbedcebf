// src/services/providers/flights/serp-flights.ts
import type { FlightSearchParams, UpstreamPayload } from '@/mcp/tool-contract';
import type { FlightProvider } from '@/services/providers/flights/flight-provider';
import type { SerpApiClient } from '@/services/providers/serpapi';
import { truncateLists } from '@/services/providers/upstream';

// google_flights trip type
const ROUND_TRIP = 1;
const ONE_WAY = 2;

/** Google Flights through SerpAPI. Returns the upstream payload with result lists capped. */
export class SerpFlightProvider implements FlightProvider {
  readonly name = 'serpapi-google-flights';

  constructor(private readonly serp: SerpApiClient) {}

  async searchFlights(params: FlightSearchParams): Promise<UpstreamPayload> {
    const payload = await this.serp.search('google_flights', {
      departure_id: params.departure_id.toUpperCase(),
      arrival_id: params.arrival_id.toUpperCase(),
      outbound_date: params.outbound_date,
      return_date: params.return_date,
      type: params.return_date ? ROUND_TRIP : ONE_WAY,
      adults: params.adults,
      children: params.children,
      infants_in_seat: params.infants_in_seat,
      infants_on_lap: params.infants_on_lap,
      travel_class: params.travel_class,
      currency: params.currency,
      hl: 'en',
      gl: 'us',
    });
    return truncateLists(payload, ['best_flights', 'other_flights'], params.max_results);
  }
}
