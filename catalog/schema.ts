import type { CatalogProduct, IndexSpec, Product } from '../core/contracts/catalog';
import { SchemaMismatchError } from '../core/errors';
import { validateVector } from './vector/distance';

/** Scalar fields every catalog row carries next to its embedding. */
export const PRODUCT_FIELDS = ['product_id', 'name', 'description', 'category', 'price', 'in_stock', 'brand'] as const;

export function toCatalogProduct(record: CatalogProduct): CatalogProduct {
  return {
    product_id: record.product_id,
    name: record.name,
    description: record.description,
    category: record.category,
    price: record.price,
    in_stock: record.in_stock,
    brand: record.brand
  };
}

export function assertEmbedding(record: Product, dimension: number): void {
  if (record.embedding.length !== dimension) {
    throw new SchemaMismatchError(
      `Product ${record.product_id} has embedding dimension ${record.embedding.length}, expected ${dimension}`,
      { productId: record.product_id, expected: dimension, actual: record.embedding.length }
    );
  }
  validateVector(record.embedding);
}

export function assertIndexSpec(spec: IndexSpec): void {
  if (spec.metric !== 'L2') {
    throw new Error(`Unsupported distance metric: ${String(spec.metric)}`);
  }
  if (spec.kind !== 'IVF_FLAT') {
    throw new Error(`Unsupported index kind: ${String(spec.kind)}`);
  }
  if (!Number.isInteger(spec.params.nlist) || spec.params.nlist <= 0) {
    throw new Error(`Invalid nlist: ${spec.params.nlist}. Must be a positive integer.`);
  }
}
