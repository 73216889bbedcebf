// src/services/providers/hotels/hotel-provider.ts
import type { HotelSearchParams, UpstreamPayload } from '@/mcp/tool-contract';

export interface HotelProvider {
  name: string;
  searchHotels(params: HotelSearchParams): Promise<UpstreamPayload>;
}
