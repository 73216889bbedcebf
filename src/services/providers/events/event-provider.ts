// src/services/providers/events/event-provider.ts
import type { EventSearchParams, UpstreamPayload } from '@/mcp/tool-contract';

export interface EventProvider {
  name: string;
  searchEvents(params: EventSearchParams): Promise<UpstreamPayload>;
}
