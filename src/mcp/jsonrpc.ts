/**
 * JSON-RPC 2.0 handling for the MCP methods this server answers:
 * initialize, tools/list, tools/call (plus ping and client notifications).
 * Shared by POST /sse, POST /sse/messages and the legacy tool route.
 */
import { z } from 'zod';
import { ErrorCode, SUPPORTED_PROTOCOL_VERSIONS } from '@modelcontextprotocol/sdk/types.js';
import { dispatchTool } from '@/mcp/dispatcher';
import { toolResultErr, toolResultOk, type ToolCallResult } from '@/mcp/envelope';
import { listTools } from '@/mcp/registry';
import { logger } from '@/services/logger';
import type { TravelServices } from '@/services/providers';
import { isRecord } from '@/utils/helpers';
import { errorMessage } from '@/utils/errorResponse';

export const DEFAULT_PROTOCOL_VERSION = '2024-11-05';

export const SERVER_INFO = {
  name: 'travel-assistant',
  version: '1.0.0',
} as const;

export type JsonRpcId = string | number | null;

export interface JsonRpcError {
  code: number;
  message: string;
}

export type JsonRpcResponse =
  | { jsonrpc: '2.0'; id: JsonRpcId; result: unknown }
  | { jsonrpc: '2.0'; id: JsonRpcId; error: JsonRpcError };

const requestSchema = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});

type JsonRpcRequest = z.infer<typeof requestSchema>;

const rpcLogger = logger.getSubLogger({ name: 'jsonrpc' });

export function rpcResult(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { jsonrpc: '2.0', id, result };
}

export function rpcError(id: JsonRpcId, code: number, message: string): JsonRpcResponse {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

/** Best-effort id for error replies to messages that failed validation. */
function looseId(message: unknown): JsonRpcId {
  if (isRecord(message) && (typeof message.id === 'string' || typeof message.id === 'number')) return message.id;
  return null;
}

/** True for a body that looks like a JSON-RPC call rather than a stream request. */
export function isRpcMessage(body: unknown): boolean {
  return isRecord(body) && typeof body.method === 'string';
}

function negotiateProtocolVersion(requested: unknown): string {
  if (typeof requested === 'string' && SUPPORTED_PROTOCOL_VERSIONS.some((version) => version === requested)) {
    return requested;
  }
  return DEFAULT_PROTOCOL_VERSION;
}

function initializeResult(params: Record<string, unknown> | undefined) {
  return {
    protocolVersion: negotiateProtocolVersion(params?.protocolVersion),
    capabilities: {
      tools: { listChanged: true },
      resources: {},
      prompts: {},
      logging: {},
    },
    serverInfo: SERVER_INFO,
  };
}

/** Runs one tool and folds any failure, an unknown tool name included, into the result. */
export async function callTool(services: TravelServices, name: unknown, args: unknown): Promise<ToolCallResult> {
  try {
    return toolResultOk(await dispatchTool(services, name, args));
  } catch (err) {
    rpcLogger.warn('tool execution failed', { name, err: errorMessage(err) });
    return toolResultErr(String(name), errorMessage(err));
  }
}

async function route(request: JsonRpcRequest, services: TravelServices): Promise<JsonRpcResponse> {
  const id = request.id ?? null;
  switch (request.method) {
    case 'initialize':
      return rpcResult(id, initializeResult(request.params));
    case 'ping':
      return rpcResult(id, {});
    case 'tools/list':
      return rpcResult(id, { tools: listTools() });
    case 'tools/call': {
      const name = request.params?.name;
      if (typeof name !== 'string') return rpcError(id, ErrorCode.InvalidParams, 'Missing tool name');
      return rpcResult(id, await callTool(services, name, request.params?.arguments));
    }
    default:
      return rpcError(id, ErrorCode.MethodNotFound, `Method not found: ${request.method}`);
  }
}

/**
 * Handles one JSON-RPC message. Returns null for notifications, which get no reply.
 * Never throws: failures come back as JSON-RPC error objects.
 */
export async function handleRpcMessage(message: unknown, services: TravelServices): Promise<JsonRpcResponse | null> {
  const parsed = requestSchema.safeParse(message);
  if (!parsed.success) return rpcError(looseId(message), ErrorCode.InvalidRequest, 'Invalid Request');

  const request = parsed.data;
  rpcLogger.info('request', { method: request.method, id: request.id });
  if (request.method.startsWith('notifications/')) return null;

  try {
    return await route(request, services);
  } catch (err) {
    rpcLogger.error('request failed', { method: request.method, err: errorMessage(err) });
    return rpcError(request.id ?? null, ErrorCode.InternalError, `Internal error: ${errorMessage(err)}`);
  }
}
