// src/services/providers/serpapi.ts
// SerpAPI backs flights, hotels, events and finance; one client, one key.
import type { AxiosInstance } from 'axios';
import type { UpstreamPayload } from '@/mcp/tool-contract';
import { asRecord, fetchJson, requireCredential, UpstreamError, type QueryParams } from '@/services/providers/upstream';

export const SERPAPI_URL = 'https://serpapi.com/search.json';

export class SerpApiClient {
  constructor(
    private readonly http: AxiosInstance,
    private readonly apiKey?: string,
  ) {}

  async search(engine: string, params: QueryParams): Promise<UpstreamPayload> {
    const apiKey = requireCredential(this.apiKey, 'SERPAPI_KEY');
    const raw = await fetchJson(this.http, SERPAPI_URL, { engine, ...params, api_key: apiKey });
    const payload = asRecord(raw, 'SerpAPI');
    // SerpAPI reports some failures inside a 200 body.
    if (typeof payload.error === 'string') throw new UpstreamError(payload.error);
    return payload;
  }
}
