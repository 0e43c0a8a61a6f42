import type {
  CatalogHit,
  CatalogProduct,
  CatalogStore,
  IndexSpec,
  IndexStats,
  Predicate,
  Product
} from '../core/contracts/catalog';
import { SchemaMismatchError, StoreUnavailableError } from '../core/errors';
import { matchesPredicate } from './predicate';
import { squaredL2, validateVector } from './vector/distance';
import { IvfFlatIndex, probeClusters, type IndexedVector } from './vector/ivf-flat-index';
import { assertEmbedding, assertIndexSpec, toCatalogProduct } from './schema';

interface StoredProduct extends IndexedVector {
  product: Readonly<CatalogProduct>;
}

interface Snapshot {
  records: ReadonlyMap<number, StoredProduct>;
  index?: IvfFlatIndex<StoredProduct>;
}

export interface LocalCatalogStoreOptions {
  nprobe?: number;
}

/**
 * In-memory catalog. Inserts are staged; `buildIndex` merges them into a new
 * snapshot and swaps it in one assignment, so searches running during ingestion
 * keep reading the previous catalog and index.
 */
export class LocalCatalogStore implements CatalogStore {
  private readonly nprobe: number;
  private dimension?: number;
  private pending = new Map<number, StoredProduct>();
  private snapshot: Snapshot = { records: new Map() };
  private closed = false;

  constructor(options: LocalCatalogStoreOptions = {}) {
    this.nprobe = options.nprobe ?? 10;
  }

  async defineSchema(dimension: number): Promise<void> {
    this.assertOpen();
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new SchemaMismatchError(`Embedding dimension must be a positive integer, got ${dimension}`);
    }

    if (this.dimension === undefined) {
      this.dimension = dimension;
      return;
    }

    if (this.dimension !== dimension) {
      throw new SchemaMismatchError(
        `Catalog schema declares embedding dimension ${this.dimension}, got ${dimension}`,
        { expected: this.dimension, actual: dimension }
      );
    }
  }

  async insert(records: Product[]): Promise<number> {
    this.assertOpen();
    const dimension = this.requireDimension();

    // Validate the whole batch before staging any of it.
    const staged = records.map((record) => {
      assertEmbedding(record, dimension);
      const stored: StoredProduct = {
        id: record.product_id,
        vector: Object.freeze([...record.embedding]),
        product: Object.freeze(toCatalogProduct(record))
      };
      return stored;
    });

    for (const record of staged) {
      this.pending.set(record.id, record);
    }
    return staged.length;
  }

  async discardPending(): Promise<void> {
    this.pending = new Map();
  }

  async buildIndex(spec: IndexSpec): Promise<IndexStats> {
    this.assertOpen();
    assertIndexSpec(spec);

    const records = new Map(this.snapshot.records);
    for (const [id, record] of this.pending) {
      records.set(id, record);
    }

    const index = IvfFlatIndex.build([...records.values()], spec.params.nlist);
    this.snapshot = { records, index };
    this.pending = new Map();

    return { records: records.size, clusters: index.clusterCount, builtAt: Date.now() };
  }

  async hybridSearch(vector: number[], predicate: Predicate, limit: number): Promise<CatalogHit[]> {
    this.assertOpen();
    validateVector(vector);
    const dimension = this.requireDimension();
    if (vector.length !== dimension) {
      throw new SchemaMismatchError(`Query vector has dimension ${vector.length}, catalog expects ${dimension}`);
    }

    const { index } = this.snapshot;
    if (!index || limit <= 0) {
      return [];
    }

    const candidates = await probeClusters({
      order: index.rank(vector),
      nprobe: this.nprobe,
      limit,
      fetch: async (clusters) => clusters.flatMap((cluster) =>
        index.list(cluster)
          .filter((record) => matchesPredicate(record.product, predicate))
          .map((record) => ({ id: record.id, distance: squaredL2(vector, record.vector), item: record.product }))
      )
    });

    return candidates.map((candidate) => ({ product: { ...candidate.item }, distance: candidate.distance }));
  }

  async count(): Promise<number> {
    this.assertOpen();
    return this.snapshot.records.size;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.pending = new Map();
    this.snapshot = { records: new Map() };
  }

  private requireDimension(): number {
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
