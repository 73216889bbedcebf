/** App configuration, read once from the environment at startup. */
import { logger } from '@/services/logger';

export const DEFAULT_PORT = 8000;
const DEFAULT_UPSTREAM_TIMEOUT_MS = 30_000;
const DEFAULT_HEARTBEAT_MS = 30_000;

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  corsOrigin: string[] | '*';
  serpApiKey?: string;
  weatherstackApiKey?: string;
  geocoderUserAgent: string;
  upstreamTimeoutMs: number;
  heartbeatMs: number;
}

type Env = Record<string, string | undefined>;

type WarnFn = (message: string, meta?: Record<string, unknown>) => void;

const configLogger = logger.getSubLogger({ name: 'config' });

const defaultWarn: WarnFn = (message, meta) => {
  configLogger.warn(message, meta ?? {});
};

/**
 * Parses PORT. Empty or unset falls back silently; anything that is not a whole
 * number in 0..65535 falls back with a warning.
 */
export function resolvePort(raw: string | undefined, warn: WarnFn = defaultWarn): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_PORT;
  const value = raw.trim();
  if (/^\d+$/.test(value)) {
    const port = Number.parseInt(value, 10);
    if (port <= 65535) return port;
  }
  warn(`Invalid PORT value: '${raw}', using default ${DEFAULT_PORT}`, { raw });
  return DEFAULT_PORT;
}

function positiveInt(raw: string | undefined, fallback: number, name: string, warn: WarnFn): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (Number.isFinite(parsed) && parsed > 0 && String(parsed) === raw.trim()) return parsed;
  warn(`Invalid ${name} value: '${raw}', using default ${fallback}`, { raw });
  return fallback;
}

function nonEmpty(raw: string | undefined): string | undefined {
  const value = raw?.trim();
  return value ? value : undefined;
}

function parseCorsOrigin(raw: string | undefined): string[] | '*' {
  const value = nonEmpty(raw);
  if (!value || value === '*') return '*';
  return value
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
}

export function loadConfig(env: Env = process.env, warn: WarnFn = defaultWarn): AppConfig {
  return {
    port: resolvePort(env.PORT, warn),
    host: nonEmpty(env.HOST) ?? '0.0.0.0',
    nodeEnv: nonEmpty(env.NODE_ENV) ?? 'development',
    corsOrigin: parseCorsOrigin(env.CORS_ORIGIN),
    serpApiKey: nonEmpty(env.SERPAPI_KEY),
    weatherstackApiKey: nonEmpty(env.WEATHERSTACK_API_KEY),
    geocoderUserAgent: nonEmpty(env.GEOCODER_USER_AGENT) ?? 'travel-mcp-gateway/1.0',
    upstreamTimeoutMs: positiveInt(env.UPSTREAM_TIMEOUT_MS, DEFAULT_UPSTREAM_TIMEOUT_MS, 'UPSTREAM_TIMEOUT_MS', warn),
    heartbeatMs: positiveInt(env.MCP_HEARTBEAT_MS, DEFAULT_HEARTBEAT_MS, 'MCP_HEARTBEAT_MS', warn),
  };
}
