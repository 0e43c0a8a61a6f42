import { Pool } from 'pg';
import type { AppConfig } from '../config/app-config';
import { Container } from '../core/di/container';
import type { CatalogStore, IndexSpec } from '../core/contracts/catalog';
import type { Embedder } from '../core/contracts/embedding';
import { SchemaMismatchError } from '../core/errors';
import { LocalCatalogStore } from '../catalog/local-catalog-store';
import { PostgresCatalogStore } from '../catalog/postgres-catalog-store';
import { createEmbedder } from '../embedding/create-embedder';
import { IngestionPipeline } from '../ingestion/ingestion-pipeline';
import { JsonFileProductSource } from '../ingestion/product-source';
import { StructuredAuditLogger } from '../observability/audit-logger';
import { SearchExecutor } from '../search/search-executor';
import { ToolRegistry, initializeToolRegistry } from '../tools/registry';

export interface ContainerContext {
  container: Container;
  /**
   * Closes the catalog store and any Postgres pool this container created.
   * Should be called when the container is no longer needed (e.g., in test teardown).
   */
  cleanup(): Promise<void>;
}

export interface BuildContainerOptions {
  /** Use this pool instead of connecting to DATABASE_URL. The caller keeps ownership. */
  pool?: Pool;
  embedder?: Embedder;
  auditLogger?: StructuredAuditLogger;
}

export function indexSpecFor(config: AppConfig): IndexSpec {
  return { metric: 'L2', kind: 'IVF_FLAT', params: { nlist: config.index.nlist } };
}

export async function buildContainer(config: AppConfig, options: BuildContainerOptions = {}): Promise<ContainerContext> {
  const container = new Container();

  const embedder = options.embedder ?? await createEmbedder(config.embedding);
  if (embedder.dimension !== config.embedding.dimension) {
    throw new SchemaMismatchError(
      `Embedder ${embedder.modelName} produces ${embedder.dimension}-dimensional vectors, EMBEDDING_DIM is ${config.embedding.dimension}`
    );
  }
  console.log(`[INFO] Embedding model ${embedder.modelName} loaded (dimension ${embedder.dimension})`);

  const { store, ownedPool } = buildCatalogStore(config, options.pool);
  const cleanup = async () => {
    await store.close();
    if (ownedPool) {
      await ownedPool.end();
    }
  };

  try {
    await store.defineSchema(embedder.dimension);

    if (store instanceof LocalCatalogStore) {
      const report = await new IngestionPipeline({
        store,
        embedder,
        source: new JsonFileProductSource(config.catalogFile),
        dimension: embedder.dimension,
        indexSpec: indexSpecFor(config),
        batchSize: config.ingestBatchSize,
        auditLogger: options.auditLogger
      }).run();
      if (report.status !== 'published') {
        const first = report.failed[0];
        throw new Error(
          `Catalog ingestion from ${config.catalogFile} failed: ${report.failed.length} record(s) rejected` +
          (first ? ` (first: ${first.stage} ${first.productId ?? '-'}: ${first.error})` : '')
        );
      }
    } else {
      console.log(`[INFO] Catalog store holds ${await store.count()} published products`);
    }
  } catch (error) {
    await cleanup();
    throw error;
  }

  const executor = new SearchExecutor({
    embedder,
    store,
    embedTimeoutMs: config.embedding.timeoutMs,
    storeTimeoutMs: config.storeTimeoutMs
  });
  const toolRegistry = initializeToolRegistry(new ToolRegistry(), { executor });

  container.registerValue('config', config);
  container.registerValue('embedder', embedder);
  container.registerValue('catalogStore', store);
  container.registerValue('searchExecutor', executor);
  container.registerValue('toolRegistry', toolRegistry);
  container.freeze();

  return { container, cleanup };
}

function buildCatalogStore(config: AppConfig, pool?: Pool): { store: CatalogStore; ownedPool?: Pool } {
  if (pool) {
    return { store: new PostgresCatalogStore(pool, { nprobe: config.index.nprobe, nlist: config.index.nlist }) };
  }

  if (config.databaseUrl) {
    const ownedPool = new Pool({ connectionString: config.databaseUrl });
    console.log('[INFO] Using Postgres catalog store');
    return {
      store: new PostgresCatalogStore(ownedPool, { nprobe: config.index.nprobe, nlist: config.index.nlist }),
      ownedPool
    };
  }

  console.log('[INFO] DATABASE_URL not set, using in-memory catalog store');
  return { store: new LocalCatalogStore({ nprobe: config.index.nprobe }) };
}
