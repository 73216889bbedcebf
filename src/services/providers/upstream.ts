// src/services/providers/upstream.ts
// Shared HTTP plumbing for the upstream wrappers. No retries: one request, one answer.
import axios, { type AxiosInstance } from 'axios';
import type { UpstreamPayload } from '@/mcp/tool-contract';
import { isRecord } from '@/utils/helpers';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export class UpstreamError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'UpstreamError';
  }
}

export function createUpstreamClient(timeoutMs: number, headers: Record<string, string> = {}): AxiosInstance {
  return axios.create({
    timeout: timeoutMs,
    headers: { Accept: 'application/json', ...headers },
  });
}

/** Credentials are checked at call time, never at startup. */
export function requireCredential(value: string | undefined, envName: string): string {
  if (!value) throw new Error(`Missing ${envName}`);
  return value;
}

export function asRecord(value: unknown, source: string): UpstreamPayload {
  if (!isRecord(value)) throw new UpstreamError(`Unexpected response from ${source}`);
  return value;
}

/** Pulls a human readable message out of an upstream error body. */
function bodyMessage(data: unknown): string | undefined {
  if (typeof data === 'string' && data.trim()) return data.trim();
  if (!isRecord(data)) return undefined;
  if (typeof data.error === 'string') return data.error;
  if (isRecord(data.error) && typeof data.error.info === 'string') return data.error.info;
  if (typeof data.message === 'string') return data.message;
  return undefined;
}

export async function fetchJson(http: AxiosInstance, url: string, params: QueryParams): Promise<unknown> {
  try {
    const res = await http.get<unknown>(url, { params });
    return res.data;
  } catch (err) {
    if (axios.isAxiosError(err)) {
      const status = err.response?.status;
      if (status !== undefined) {
        const detail = bodyMessage(err.response?.data);
        throw new UpstreamError(detail ?? `Upstream request failed with status ${status}`, status);
      }
      throw new UpstreamError(err.message);
    }
    throw err;
  }
}

/** Copies the payload with each listed array field cut to `max` entries. */
export function truncateLists(payload: UpstreamPayload, keys: string[], max: number): UpstreamPayload {
  const out: UpstreamPayload = { ...payload };
  for (const key of keys) {
    const value = out[key];
    if (Array.isArray(value)) out[key] = value.slice(0, max);
  }
  return out;
}
