import Fastify, { type FastifyServerOptions } from 'fastify';
import { loadConfig, type AppConfig } from '../config/app-config';
import type { CatalogStore } from '../core/contracts/catalog';
import { describeError } from '../core/errors';
import { PinoAuditLogger, StructuredAuditLogger } from '../observability/audit-logger';
import type { ToolRegistry } from '../tools/registry';
import { buildContainer, type ContainerContext } from './container';
import { RpcErrorCode, rpcError } from './json-rpc';
import { RpcHandler } from './rpc-handler';

export const SERVER_NAME = 'catalog-search-server';
export const SERVER_VERSION = '1.0.0';

export interface BuildServerOptions {
  logger?: FastifyServerOptions['logger'];
  config?: AppConfig;
  /** Prebuilt container; its cleanup still runs when the server closes. */
  context?: ContainerContext;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const config = options.config ?? loadConfig();
  const fastify = Fastify({ logger: options.logger ?? { level: config.logLevel } });
  const containerContext = options.context ?? await buildContainer(config, {
    auditLogger: new StructuredAuditLogger(new PinoAuditLogger(fastify.log))
  });
  const { container } = containerContext;

  fastify.addHook('onClose', async () => {
    await containerContext.cleanup();
  });

  const store = container.resolve<CatalogStore>('catalogStore');
  const rpcHandler = new RpcHandler({
    registry: container.resolve<ToolRegistry>('toolRegistry'),
    auditLogger: new StructuredAuditLogger(new PinoAuditLogger(fastify.log)),
    logger: fastify.log,
    serverInfo: { name: SERVER_NAME, version: SERVER_VERSION }
  });

  // Bodies are parsed in the route so malformed JSON becomes a JSON-RPC parse error.
  fastify.removeContentTypeParser('application/json');
  fastify.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  fastify.get('/', async (request) => {
    let products = 0;
    let storeReady = true;
    try {
      products = await store.count();
    } catch (error) {
      storeReady = false;
      request.log.warn({ err: error }, 'catalog store not reachable');
    }
    return {
      name: SERVER_NAME,
      status: 'online',
      protocol: 'mcp-http',
      store_ready: storeReady,
      products
    };
  });

  fastify.get('/health', async () => ({ status: 'ok' }));

  fastify.post('/mcp', async (request, reply) => {
    let payload: unknown;
    try {
      payload = JSON.parse(typeof request.body === 'string' ? request.body : '');
    } catch (error) {
      request.log.debug({ err: error }, 'rejecting malformed JSON-RPC body');
      return reply.send(rpcError(null, { code: RpcErrorCode.PARSE_ERROR, message: 'Parse error' }));
    }

    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableEnded) {
        controller.abort();
      }
    });

    const response = await rpcHandler.handle(payload, { requestId: request.id, signal: controller.signal });
    if (!response) {
      return reply.code(202).send();
    }
    return reply.send(response);
  });

  return fastify;
}

if (require.main === module) {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    console.error(`[ERROR] ${describeError(error)}`);
    process.exit(1);
  }

  buildServer({ config }).then(async (fastify) => {
    try {
      await fastify.listen({ port: config.port, host: config.host });
      console.log(`[INFO] Catalog search server listening on ${config.host}:${config.port}`);
    } catch (error) {
      console.error(`[ERROR] Failed to start server on port ${config.port}:`, error);
      process.exit(1);
    }
  }).catch((error: unknown) => {
    console.error('[ERROR] Failed to build server:', error);
    process.exit(1);
  });
}
