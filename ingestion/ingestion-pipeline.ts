import type { CatalogProduct, CatalogStore, IndexSpec, IndexStats, Product } from '../core/contracts/catalog';
import { DEFAULT_INDEX_SPEC } from '../core/contracts/catalog';
import type { Embedder } from '../core/contracts/embedding';
import { SchemaMismatchError, describeError } from '../core/errors';
import type { StructuredAuditLogger } from '../observability/audit-logger';
import type { ProductSource } from './product-source';

export type IngestionStage = 'validation' | 'embedding' | 'insert' | 'index';

export interface IngestionFailure {
  productId: number | null;
  stage: IngestionStage;
  error: string;
}

export interface IngestionReport {
  status: 'published' | 'failed';
  source: string;
  loaded: number;
  /** Ids that cleared every stage they reached. Only published when status is 'published'. */
  succeeded: number[];
  failed: IngestionFailure[];
  index?: IndexStats;
  durationMs: number;
}

export interface IngestionPipelineOptions {
  store: CatalogStore;
  embedder: Embedder;
  source: ProductSource;
  dimension: number;
  indexSpec?: IndexSpec;
  batchSize?: number;
  auditLogger?: StructuredAuditLogger;
}

/**
 * Loads, embeds and stages a catalog, then publishes it with one index build.
 * Any failed record leaves the published catalog untouched.
 */
export class IngestionPipeline {
  private readonly indexSpec: IndexSpec;
  private readonly batchSize: number;

  constructor(private readonly options: IngestionPipelineOptions) {
    this.indexSpec = options.indexSpec ?? DEFAULT_INDEX_SPEC;
    this.batchSize = Math.max(1, options.batchSize ?? 64);
  }

  async run(): Promise<IngestionReport> {
    const startedAt = Date.now();
    const { store, embedder, source, dimension } = this.options;

    if (embedder.dimension !== dimension) {
      throw new SchemaMismatchError(
        `Embedder ${embedder.modelName} produces ${embedder.dimension}-dimensional vectors, catalog expects ${dimension}`,
        { expected: dimension, actual: embedder.dimension }
      );
    }

    await store.defineSchema(dimension);
    // Rows staged by an earlier run that never built must not be published with this one.
    await store.discardPending();
    const { products, rejected } = await source.load();
    console.log(`[INFO] Loaded ${products.length} products from ${source.name} (${rejected.length} rejected)`);

    const failed: IngestionFailure[] = rejected.map((record) => ({
      productId: record.productId,
      stage: 'validation',
      error: `record ${record.position}: ${record.error}`
    }));

    const embedded = await this.embedAll(products, failed);

    const finish = async (status: IngestionReport['status'], succeeded: number[], index?: IndexStats) => {
      const report: IngestionReport = {
        status,
        source: source.name,
        loaded: products.length + rejected.length,
        succeeded,
        failed,
        index,
        durationMs: Date.now() - startedAt
      };
      await this.options.auditLogger?.logIngestion({
        source: report.source,
        status: report.status,
        loaded: report.loaded,
        succeeded: report.succeeded.length,
        failed: report.failed.length,
        durationMs: report.durationMs
      });
      return report;
    };

    if (failed.length) {
      await store.discardPending();
      return finish('failed', embedded.map((product) => product.product_id));
    }

    const staged: number[] = [];
    for (let offset = 0; offset < embedded.length; offset += this.batchSize) {
      const batch = embedded.slice(offset, offset + this.batchSize);
      try {
        await store.insert(batch);
        staged.push(...batch.map((product) => product.product_id));
      } catch (error) {
        await store.discardPending();
        if (error instanceof SchemaMismatchError) {
          throw error;
        }
        failed.push(...batch.map((product) => ({
          productId: product.product_id,
          stage: 'insert' as const,
          error: describeError(error)
        })));
        return finish('failed', staged);
      }
    }

    try {
      const index = await store.buildIndex(this.indexSpec);
      console.log(`[INFO] Published ${index.records} products across ${index.clusters} clusters`);
      return finish('published', staged, index);
    } catch (error) {
      await store.discardPending();
      failed.push({ productId: null, stage: 'index', error: describeError(error) });
      return finish('failed', staged);
    }
  }

  /** Embeds descriptions `batchSize` at a time; per-record failures are collected, not thrown. */
  private async embedAll(products: readonly CatalogProduct[], failed: IngestionFailure[]): Promise<Product[]> {
    const { embedder, dimension } = this.options;
    const embedded: Product[] = [];

    for (let offset = 0; offset < products.length; offset += this.batchSize) {
      const batch = products.slice(offset, offset + this.batchSize);
      const outcomes = await Promise.allSettled(batch.map((product) => embedder.embed(product.description)));

      outcomes.forEach((outcome, position) => {
        const product = batch[position];
        if (!product) {
          return;
        }
        if (outcome.status === 'rejected') {
          if (outcome.reason instanceof SchemaMismatchError) {
            throw outcome.reason;
          }
          failed.push({ productId: product.product_id, stage: 'embedding', error: describeError(outcome.reason) });
          return;
        }
        if (outcome.value.length !== dimension) {
          throw new SchemaMismatchError(
            `Embedding for product ${product.product_id} has dimension ${outcome.value.length}, expected ${dimension}`,
            { expected: dimension, actual: outcome.value.length }
          );
        }
        embedded.push({ ...product, embedding: outcome.value });
      });
    }

    return embedded;
  }
}
