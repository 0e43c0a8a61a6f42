import { z } from 'zod';
import { isCatalogError } from '../core/errors';

export const JSON_RPC_VERSION = '2.0';

export const RpcErrorCode = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  TOOL_NOT_FOUND: -32001,
  STORE_UNAVAILABLE: -32002,
  MODEL_UNAVAILABLE: -32003
} as const;

export type RpcErrorCodeValue = (typeof RpcErrorCode)[keyof typeof RpcErrorCode];

export type JsonRpcId = string | number | null;

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: {
    retryable: boolean;
    kind?: string;
    details?: Record<string, unknown>;
  };
}

export type JsonRpcResponse =
  | { jsonrpc: typeof JSON_RPC_VERSION; id: JsonRpcId; result: unknown }
  | { jsonrpc: typeof JSON_RPC_VERSION; id: JsonRpcId; error: JsonRpcErrorObject };

export const jsonRpcRequestSchema = z.object({
  jsonrpc: z.literal(JSON_RPC_VERSION),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().min(1),
  params: z.unknown().optional()
});

export type JsonRpcRequest = z.infer<typeof jsonRpcRequestSchema>;

export const toolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.unknown().optional()
});

export function rpcResult(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { jsonrpc: JSON_RPC_VERSION, id, result };
}

export function rpcError(id: JsonRpcId, error: JsonRpcErrorObject): JsonRpcResponse {
  return { jsonrpc: JSON_RPC_VERSION, id, error };
}

/** Best-effort id recovery from an envelope that failed validation. */
export function extractId(payload: unknown): JsonRpcId {
  if (typeof payload !== 'object' || payload === null || !('id' in payload)) {
    return null;
  }
  const { id } = payload;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}

/**
 * Translates any thrown value into a JSON-RPC error object. Only typed catalog errors
 * keep their message; schema mismatches and unexpected failures read "Internal error".
 */
export function toRpcError(error: unknown): JsonRpcErrorObject {
  if (!isCatalogError(error)) {
    return { code: RpcErrorCode.INTERNAL_ERROR, message: 'Internal error', data: { retryable: false } };
  }

  const data = {
    retryable: error.retryable,
    kind: error.code,
    ...(error.details ? { details: error.details } : {})
  };

  switch (error.code) {
    case 'INVALID_QUERY':
    case 'INVALID_ARGUMENTS':
      return { code: RpcErrorCode.INVALID_PARAMS, message: error.message, data };
    case 'TOOL_NOT_FOUND':
      return { code: RpcErrorCode.TOOL_NOT_FOUND, message: error.message, data };
    case 'STORE_UNAVAILABLE':
      return { code: RpcErrorCode.STORE_UNAVAILABLE, message: error.message, data: { retryable: true, kind: error.code } };
    case 'MODEL_UNAVAILABLE':
      return { code: RpcErrorCode.MODEL_UNAVAILABLE, message: error.message, data: { retryable: error.retryable, kind: error.code } };
    case 'SCHEMA_MISMATCH':
      return { code: RpcErrorCode.INTERNAL_ERROR, message: 'Internal error', data: { retryable: false } };
  }
}

/** Errors whose detail stays server-side and must be logged there. */
export function isInternalError(error: unknown): boolean {
  return !isCatalogError(error) || error.code === 'SCHEMA_MISMATCH';
}
