export interface CatalogProduct {
  product_id: number;
  name: string;
  description: string;
  category: string;
  price: number;
  in_stock: boolean;
  brand: string;
}

/** A catalog entry together with the embedding derived from its description. */
export interface Product extends CatalogProduct {
  embedding: number[];
}

export type PredicateClause =
  | { field: 'price'; op: 'lte'; value: number }
  | { field: 'category'; op: 'eq'; value: string }
  | { field: 'brand'; op: 'eq'; value: string }
  | { field: 'in_stock'; op: 'eq'; value: true };

/** Conjunction of scalar comparisons. An empty predicate matches every record. */
export type Predicate = readonly PredicateClause[];

export type DistanceMetric = 'L2';
export type IndexKind = 'IVF_FLAT';

export interface IndexSpec {
  metric: DistanceMetric;
  kind: IndexKind;
  params: { nlist: number };
}

export interface IndexStats {
  records: number;
  clusters: number;
  builtAt: number;
}

export interface CatalogHit {
  product: CatalogProduct;
  /** Squared Euclidean distance between the query vector and the product embedding. */
  distance: number;
}

export interface CatalogStore {
  defineSchema(dimension: number): Promise<void>;
  insert(records: Product[]): Promise<number>;
  discardPending(): Promise<void>;
  buildIndex(spec: IndexSpec): Promise<IndexStats>;
  hybridSearch(vector: number[], predicate: Predicate, limit: number): Promise<CatalogHit[]>;
  count(): Promise<number>;
  close(): Promise<void>;
}

export const DEFAULT_INDEX_SPEC: IndexSpec = {
  metric: 'L2',
  kind: 'IVF_FLAT',
  params: { nlist: 128 }
};
