import type { Pool, PoolClient } from 'pg';
import type {
  CatalogHit,
  CatalogProduct,
  CatalogStore,
  IndexSpec,
  IndexStats,
  Predicate,
  Product
} from '../core/contracts/catalog';
import { SchemaMismatchError, StoreUnavailableError, isCatalogError } from '../core/errors';
import { predicateToSql } from './predicate';
import { PRODUCT_FIELDS, assertEmbedding, assertIndexSpec } from './schema';
import { squaredL2, validateVector } from './vector/distance';
import { probeClusters, rankClusters, trainIvf } from './vector/ivf-flat-index';

type ProductRow = {
  product_id: number | string;
  name: string;
  description: string;
  category: string;
  price: number | string;
  in_stock: boolean;
  brand: string;
  embedding: unknown;
};

type CentroidRow = {
  cluster_id: number | string;
  centroid: unknown;
};

type MetaRow = {
  meta_value: string;
};

type CountRow = {
  total: number | string;
};

type TableNameRow = {
  table_name: string;
};

const META_DIMENSION = 'embedding_dimension';
const META_INDEX_VERSION = 'index_version';
const META_SELECT = 'SELECT meta_value FROM catalog_meta WHERE meta_key = $1';
const UPDATE_CHUNK_SIZE = 500;
const COLUMNS = [...PRODUCT_FIELDS, 'embedding'].join(', ');
const SNAPSHOT_BEGIN = 'BEGIN ISOLATION LEVEL REPEATABLE READ';

// Created only when absent; IF NOT EXISTS covers two processes racing on a fresh database.
const TABLES: Record<string, string> = {
  catalog_meta: `
    CREATE TABLE IF NOT EXISTS catalog_meta (
      meta_key TEXT PRIMARY KEY,
      meta_value TEXT NOT NULL
    )`,
  products: `
    CREATE TABLE IF NOT EXISTS products (
      product_id BIGINT PRIMARY KEY,
      name TEXT NOT NULL,
      description TEXT NOT NULL,
      category TEXT NOT NULL,
      price DOUBLE PRECISION NOT NULL,
      in_stock BOOLEAN NOT NULL,
      brand TEXT NOT NULL,
      embedding JSONB NOT NULL,
      cluster_id INTEGER
    )`,
  staged_products: `
    CREATE TABLE IF NOT EXISTS staged_products (
      product_id BIGINT PRIMARY KEY,
      name TEXT NOT NULL,
      description TEXT NOT NULL,
      category TEXT NOT NULL,
      price DOUBLE PRECISION NOT NULL,
      in_stock BOOLEAN NOT NULL,
      brand TEXT NOT NULL,
      embedding JSONB NOT NULL
    )`,
  product_centroids: `
    CREATE TABLE IF NOT EXISTS product_centroids (
      cluster_id INTEGER PRIMARY KEY,
      centroid JSONB NOT NULL
    )`
};

export interface PostgresCatalogStoreOptions {
  nprobe?: number;
  /** Cluster count used when the index has to be rebuilt at query time. */
  nlist?: number;
}

interface LoadedIndex {
  version: string;
  centroids: number[][];
}

/**
 * Catalog persisted in Postgres. Scalar predicates run in SQL; the IVF index lives in
 * `product_centroids` plus a `cluster_id` column on each published row.
 *
 * Inserts land in `staged_products` and are published by `buildIndex` inside one
 * transaction, together with the retrained centroids, so readers never see a
 * half-ingested catalog.
 */
export class PostgresCatalogStore implements CatalogStore {
  private readonly nprobe: number;
  private readonly nlist: number;
  private dimension?: number;
  private loadedIndex?: LoadedIndex;
  private closed = false;

  constructor(private readonly pool: Pool, options: PostgresCatalogStoreOptions = {}) {
    this.nprobe = options.nprobe ?? 10;
    this.nlist = options.nlist ?? 128;
  }

  async defineSchema(dimension: number): Promise<void> {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new SchemaMismatchError(`Embedding dimension must be a positive integer, got ${dimension}`);
    }

    await this.guard('schema definition', async () => {
      const names = Object.keys(TABLES);
      const tables = await this.pool.query<TableNameRow>(
        `SELECT table_name FROM information_schema.tables WHERE table_name IN (${names.map((_, i) => `$${i + 1}`).join(',')})`,
        names
      );
      const present = new Set(tables.rows.map((row) => row.table_name));
      for (const [name, ddl] of Object.entries(TABLES)) {
        if (!present.has(name)) {
          await this.pool.query(ddl);
        }
      }

      await this.pool.query(
        `INSERT INTO catalog_meta (meta_key, meta_value) VALUES ($1, $2) ON CONFLICT (meta_key) DO NOTHING`,
        [META_DIMENSION, String(dimension)]
      );
      const result = await this.pool.query<MetaRow>(META_SELECT, [META_DIMENSION]);
      const existing = Number(result.rows[0]?.meta_value);
      if (existing !== dimension) {
        throw new SchemaMismatchError(
          `Catalog schema declares embedding dimension ${existing}, got ${dimension}`,
          { expected: existing, actual: dimension }
        );
      }
    });

    this.dimension = dimension;
  }

  async insert(records: Product[]): Promise<number> {
    const dimension = this.requireDimension();
    for (const record of records) {
      assertEmbedding(record, dimension);
    }

    await this.guard('insert', () => this.withTransaction(async (client) => {
      for (const record of records) {
        await client.query(
          `
          INSERT INTO staged_products (product_id, name, description, category, price, in_stock, brand, embedding)
          VALUES ($1,$2,$3,$4,$5,$6,$7,$8)
          ON CONFLICT (product_id) DO UPDATE SET
            name = EXCLUDED.name,
            description = EXCLUDED.description,
            category = EXCLUDED.category,
            price = EXCLUDED.price,
            in_stock = EXCLUDED.in_stock,
            brand = EXCLUDED.brand,
            embedding = EXCLUDED.embedding
          `,
          [
            record.product_id,
            record.name,
            record.description,
            record.category,
            record.price,
            record.in_stock,
            record.brand,
            JSON.stringify(record.embedding)
          ]
        );
      }
    }));

    return records.length;
  }

  async discardPending(): Promise<void> {
    this.assertOpen();
    await this.guard('discard', async () => {
      await this.pool.query(`DELETE FROM staged_products`);
    });
  }

  async buildIndex(spec: IndexSpec): Promise<IndexStats> {
    assertIndexSpec(spec);
    this.requireDimension();

    const stats = await this.guard('index build', () => this.withTransaction(async (client) => {
      const staged = await client.query<ProductRow>(`SELECT ${COLUMNS} FROM staged_products`);
      for (const row of staged.rows) {
        await client.query(
          `
          INSERT INTO products (product_id, name, description, category, price, in_stock, brand, embedding, cluster_id)
          VALUES ($1,$2,$3,$4,$5,$6,$7,$8,NULL)
          ON CONFLICT (product_id) DO UPDATE SET
            name = EXCLUDED.name,
            description = EXCLUDED.description,
            category = EXCLUDED.category,
            price = EXCLUDED.price,
            in_stock = EXCLUDED.in_stock,
            brand = EXCLUDED.brand,
            embedding = EXCLUDED.embedding,
            cluster_id = NULL
          `,
          [
            Number(row.product_id),
            row.name,
            row.description,
            row.category,
            Number(row.price),
            row.in_stock,
            row.brand,
            JSON.stringify(parseEmbedding(row.embedding, row.product_id))
          ]
        );
      }
      await client.query(`DELETE FROM staged_products`);

      return this.trainAndStore(client, spec.params.nlist);
    }));

    this.loadedIndex = undefined;
    return stats;
  }

  async hybridSearch(vector: number[], predicate: Predicate, limit: number): Promise<CatalogHit[]> {
    validateVector(vector);
    const dimension = this.requireDimension();
    if (vector.length !== dimension) {
      throw new SchemaMismatchError(`Query vector has dimension ${vector.length}, catalog expects ${dimension}`);
    }
    if (limit <= 0) {
      return [];
    }

    return this.guard('search', async () => {
      const hits = await this.searchSnapshot(vector, predicate, limit);
      if (hits) {
        return hits;
      }
      // Published rows without centroids: rebuild the index, then answer from the new snapshot.
      await this.withTransaction((client) => this.trainAndStore(client, this.nlist));
      return (await this.searchSnapshot(vector, predicate, limit)) ?? [];
    });
  }

  /**
   * Reads the index version, the centroids and every probed cluster inside one
   * REPEATABLE READ transaction, so a concurrent `buildIndex` cannot move rows
   * between clusters mid-search. Resolves to undefined when the index is missing.
   */
  private searchSnapshot(vector: number[], predicate: Predicate, limit: number): Promise<CatalogHit[] | undefined> {
    return this.withTransaction(async (client) => {
      const centroids = await this.loadCentroids(client);
      if (!centroids) {
        return undefined;
      }
      if (!centroids.length) {
        return [];
      }

      const candidates = await probeClusters<CatalogProduct>({
        order: rankClusters(centroids, vector),
        nprobe: this.nprobe,
        limit,
        fetch: async (clusters) => {
          const clusterPlaceholders = clusters.map((_, i) => `$${i + 1}`).join(',');
          const { conditions, values } = predicateToSql(predicate, clusters.length + 1);
          const where = [`cluster_id IN (${clusterPlaceholders})`, ...conditions].join(' AND ');
          const result = await client.query<ProductRow>(
            `SELECT ${COLUMNS} FROM products WHERE ${where}`,
            [...clusters, ...values]
          );
          return result.rows.map((row) => {
            const product = toCatalogProduct(row);
            return {
              id: product.product_id,
              distance: squaredL2(vector, parseEmbedding(row.embedding, row.product_id)),
              item: product
            };
          });
        }
      });

      return candidates.map((candidate) => ({ product: candidate.item, distance: candidate.distance }));
    }, SNAPSHOT_BEGIN);
  }

  async count(): Promise<number> {
    return this.guard('count', async () => {
      const result = await this.pool.query<CountRow>(`SELECT COUNT(*) AS total FROM products`);
      return Number(result.rows[0]?.total ?? 0);
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    this.loadedIndex = undefined;
  }

  /**
   * Returns the published centroids, reloading them when another process rebuilt the
   * index. Undefined means published rows exist without any centroids.
   */
  private async loadCentroids(client: PoolClient): Promise<number[][] | undefined> {
    const version = await readIndexVersion(client);
    if (this.loadedIndex && this.loadedIndex.version === version) {
      return this.loadedIndex.centroids;
    }

    const result = await client.query<CentroidRow>(`SELECT cluster_id, centroid FROM product_centroids ORDER BY cluster_id`);
    const centroids = result.rows.map((row) => parseEmbedding(row.centroid, row.cluster_id));
    if (!centroids.length) {
      const published = await client.query<CountRow>(`SELECT COUNT(*) AS total FROM products`);
      if (Number(published.rows[0]?.total ?? 0) > 0) {
        return undefined;
      }
    }

    this.loadedIndex = { version, centroids };
    return centroids;
  }

  private async trainAndStore(client: PoolClient, nlist: number): Promise<IndexStats> {
    const published = await client.query<ProductRow>(`SELECT ${COLUMNS} FROM products`);
    const entries = published.rows.map((row) => ({
      id: Number(row.product_id),
      vector: parseEmbedding(row.embedding, row.product_id)
    }));
    const model = trainIvf(entries, nlist);

    await client.query(`DELETE FROM product_centroids`);
    for (const [clusterId, centroid] of model.centroids.entries()) {
      await client.query(
        `INSERT INTO product_centroids (cluster_id, centroid) VALUES ($1, $2)`,
        [clusterId, JSON.stringify(centroid)]
      );
    }

    const members = new Map<number, number[]>();
    for (const [productId, clusterId] of model.assignments) {
      const list = members.get(clusterId) ?? [];
      list.push(productId);
      members.set(clusterId, list);
    }
    for (const [clusterId, productIds] of members) {
      for (let offset = 0; offset < productIds.length; offset += UPDATE_CHUNK_SIZE) {
        const chunk = productIds.slice(offset, offset + UPDATE_CHUNK_SIZE);
        const placeholders = chunk.map((_, i) => `$${i + 2}`).join(',');
        await client.query(
          `UPDATE products SET cluster_id = $1 WHERE product_id IN (${placeholders})`,
          [clusterId, ...chunk]
        );
      }
    }

    const previous = Number(await readIndexVersion(client));
    const nextVersion = String((Number.isFinite(previous) ? previous : 0) + 1);
    await client.query(
      `INSERT INTO catalog_meta (meta_key, meta_value) VALUES ($1, $2) ON CONFLICT (meta_key) DO UPDATE SET meta_value = EXCLUDED.meta_value`,
      [META_INDEX_VERSION, nextVersion]
    );

    return { records: entries.length, clusters: model.centroids.length, builtAt: Date.now() };
  }

  private async withTransaction<T>(work: (client: PoolClient) => Promise<T>, begin = 'BEGIN'): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query(begin);
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  /** Connection-level driver failures become StoreUnavailableError; everything else propagates. */
  private async guard<T>(operation: string, work: () => Promise<T>): Promise<T> {
    this.assertOpen();
    try {
      return await work();
    } catch (error) {
      if (isCatalogError(error) || !isConnectionError(error)) {
        throw error;
      }
      throw new StoreUnavailableError(`Catalog store ${operation} failed: database unreachable`, { cause: error });
    }
  }

  private requireDimension(): number {
    this.assertOpen();
    if (this.dimension === undefined) {
      throw new SchemaMismatchError('Catalog schema is not defined');
    }
    return this.dimension;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreUnavailableError('Catalog store is closed');
    }
  }
}

async function readIndexVersion(client: PoolClient): Promise<string> {
  const result = await client.query<MetaRow>(META_SELECT, [META_INDEX_VERSION]);
  return result.rows[0]?.meta_value ?? '0';
}

function toCatalogProduct(row: ProductRow): CatalogProduct {
  return {
    product_id: Number(row.product_id),
    name: row.name,
    description: row.description,
    category: row.category,
    price: Number(row.price),
    in_stock: row.in_stock,
    brand: row.brand
  };
}

function parseEmbedding(raw: unknown, owner: number | string): number[] {
  const value: unknown = typeof raw === 'string' ? JSON.parse(raw) : raw;
  if (!Array.isArray(value) || !value.every((item): item is number => typeof item === 'number')) {
    throw new Error(`Corrupt vector stored for ${owner}`);
  }
  return value;
}

const CONNECTION_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EPIPE']);

function isConnectionError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if ('code' in error && typeof error.code === 'string') {
    // SQLSTATE class 08 is connection exceptions, 57P0x is server shutdown.
    if (CONNECTION_ERROR_CODES.has(error.code) || error.code.startsWith('08') || error.code.startsWith('57P0')) {
      return true;
    }
  }
  return error instanceof Error && /connection (terminated|timeout)|timeout exceeded when trying to connect/i.test(error.message);
}
