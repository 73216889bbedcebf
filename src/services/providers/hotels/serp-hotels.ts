// src/services/providers/hotels/serp-hotels.ts
import type { HotelSearchParams, UpstreamPayload } from '@/mcp/tool-contract';
import type { HotelProvider } from '@/services/providers/hotels/hotel-provider';
import type { SerpApiClient } from '@/services/providers/serpapi';
import { truncateLists } from '@/services/providers/upstream';

export class SerpHotelProvider implements HotelProvider {
  readonly name = 'serpapi-google-hotels';

  constructor(private readonly serp: SerpApiClient) {}

  async searchHotels(params: HotelSearchParams): Promise<UpstreamPayload> {
    const payload = await this.serp.search('google_hotels', {
      q: params.location,
      check_in_date: params.check_in_date,
      check_out_date: params.check_out_date,
      adults: params.adults,
      children: params.children,
      currency: params.currency,
      sort_by: params.sort_by,
      min_price: params.min_price,
      max_price: params.max_price,
      hl: 'en',
      gl: 'us',
    });
    return truncateLists(payload, ['properties'], params.max_results);
  }
}
