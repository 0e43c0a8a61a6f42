import path from 'path';
import type { CatalogProduct, Product } from '../../core/contracts/catalog';
import type { Embedder } from '../../core/contracts/embedding';

export const CATALOG_FILE = path.join(__dirname, '../../data/products.json');
export const MODEL_FILE = path.join(__dirname, '../../models/catalog-hash-v1.json');

export function makeProduct(id: number, embedding: number[], overrides: Partial<CatalogProduct> = {}): Product {
  return {
    product_id: id,
    name: `Product ${id}`,
    description: `Description of product ${id}`,
    category: 'Footwear',
    price: 10,
    in_stock: true,
    brand: 'ActiveGear',
    ...overrides,
    embedding
  };
}

export function fixedEmbedder(vector: number[]): Embedder & { embed: jest.Mock<Promise<number[]>, [string]> } {
  return {
    dimension: vector.length,
    modelName: 'fixed-test-model',
    embed: jest.fn(async (_text: string) => [...vector])
  };
}

/** Wraps an embedder so calls can be counted without touching the frozen original. */
export function spyingEmbedder(inner: Embedder): Embedder & { embed: jest.Mock<Promise<number[]>, [string]> } {
  return {
    dimension: inner.dimension,
    modelName: inner.modelName,
    embed: jest.fn((text: string) => inner.embed(text))
  };
}
