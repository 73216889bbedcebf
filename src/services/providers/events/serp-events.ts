// src/services/providers/events/serp-events.ts
import type { EventSearchParams, UpstreamPayload } from '@/mcp/tool-contract';
import type { EventProvider } from '@/services/providers/events/event-provider';
import type { SerpApiClient } from '@/services/providers/serpapi';
import { truncateLists } from '@/services/providers/upstream';

/**
 * Google Events has no structured date or category filter, so both are folded into
 * the free-text query, e.g. `jazz concerts in Chicago from 2025-06-01 to 2025-06-07`.
 */
export function buildEventQuery(params: EventSearchParams): string {
  const parts = [params.query];
  if (params.category) parts.push(params.category);
  if (params.location) parts.push(`in ${params.location}`);
  const start = params.date_range_start;
  const end = params.date_range_end;
  if (start && end) parts.push(`from ${start} to ${end}`);
  else if (start) parts.push(`after ${start}`);
  else if (end) parts.push(`before ${end}`);
  return parts.join(' ');
}

export class SerpEventProvider implements EventProvider {
  readonly name = 'serpapi-google-events';

  constructor(private readonly serp: SerpApiClient) {}

  async searchEvents(params: EventSearchParams): Promise<UpstreamPayload> {
    const payload = await this.serp.search('google_events', {
      q: buildEventQuery(params),
      hl: 'en',
      gl: 'us',
    });
    return truncateLists(payload, ['events_results'], params.max_results);
  }
}
