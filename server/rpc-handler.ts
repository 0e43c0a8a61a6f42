import type { FastifyBaseLogger } from 'fastify';
import type { StructuredAuditLogger } from '../observability/audit-logger';
import type { ToolRegistry } from '../tools/registry';
import { describeError } from '../core/errors';
import {
  RpcErrorCode,
  extractId,
  isInternalError,
  jsonRpcRequestSchema,
  rpcError,
  rpcResult,
  toRpcError,
  toolCallParamsSchema,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcResponse
} from './json-rpc';

export const PROTOCOL_VERSION = '2024-11-05';

export interface ServerInfo {
  name: string;
  version: string;
}

export interface RpcHandlerOptions {
  registry: ToolRegistry;
  auditLogger: StructuredAuditLogger;
  logger: FastifyBaseLogger;
  serverInfo: ServerInfo;
}

export interface RpcCallContext {
  requestId: string;
  signal?: AbortSignal;
}

/**
 * Dispatches one JSON-RPC envelope. Returns undefined for notifications
 * (requests without an `id`), which get no response body.
 */
export class RpcHandler {
  constructor(private readonly options: RpcHandlerOptions) {}

  async handle(payload: unknown, context: RpcCallContext): Promise<JsonRpcResponse | undefined> {
    if (Array.isArray(payload)) {
      return rpcError(null, { code: RpcErrorCode.INVALID_REQUEST, message: 'Batch requests are not supported' });
    }

    const parsed = jsonRpcRequestSchema.safeParse(payload);
    if (!parsed.success) {
      return rpcError(extractId(payload), { code: RpcErrorCode.INVALID_REQUEST, message: 'Invalid Request' });
    }

    const request = parsed.data;
    if (request.id === undefined) {
      if (!request.method.startsWith('notifications/')) {
        this.options.logger.warn({ method: request.method }, 'ignoring JSON-RPC notification for unknown method');
      }
      return undefined;
    }

    return this.dispatch(request, request.id, context);
  }

  private async dispatch(request: JsonRpcRequest, id: JsonRpcId, context: RpcCallContext): Promise<JsonRpcResponse> {
    switch (request.method) {
      case 'initialize':
        return rpcResult(id, {
          protocolVersion: PROTOCOL_VERSION,
          capabilities: { tools: {} },
          serverInfo: this.options.serverInfo
        });
      case 'ping':
        return rpcResult(id, {});
      case 'tools/list':
        return rpcResult(id, { tools: this.options.registry.describe() });
      case 'tools/call':
        return this.callTool(request.params, id, context);
      default:
        if (request.method.startsWith('notifications/')) {
          return rpcResult(id, {});
        }
        return rpcError(id, { code: RpcErrorCode.METHOD_NOT_FOUND, message: 'Method not found' });
    }
  }

  private async callTool(params: unknown, id: JsonRpcId, context: RpcCallContext): Promise<JsonRpcResponse> {
    const parsedParams = toolCallParamsSchema.safeParse(params);
    if (!parsedParams.success) {
      return rpcError(id, {
        code: RpcErrorCode.INVALID_PARAMS,
        message: 'tools/call requires params.name',
        data: { retryable: false }
      });
    }

    const { name, arguments: args } = parsedParams.data;
    const startedAt = Date.now();

    try {
      const result = await this.options.registry.call(name, args, {
        requestId: context.requestId,
        signal: context.signal
      });
      await this.options.auditLogger.logToolCall({
        requestId: context.requestId,
        toolName: name,
        input: args ?? {},
        success: true,
        durationMs: Date.now() - startedAt
      });
      return rpcResult(id, result);
    } catch (error) {
      const rpcFailure = toRpcError(error);
      if (isInternalError(error)) {
        this.options.logger.error({ err: error, tool: name }, 'tool call failed');
        await this.options.auditLogger.logError({
          requestId: context.requestId,
          error: describeError(error),
          context: { toolName: name }
        });
      }
      await this.options.auditLogger.logToolCall({
        requestId: context.requestId,
        toolName: name,
        input: args ?? {},
        success: false,
        durationMs: Date.now() - startedAt,
        errorCode: rpcFailure.code,
        error: rpcFailure.message
      });
      return rpcError(id, rpcFailure);
    }
  }
}
