import type { CatalogProduct } from './catalog';

export const DEFAULT_TOP_K = 5;

export interface SearchQuery {
  query: string;
  top_k?: number;
  max_price?: number;
  category?: string;
  brand?: string;
  in_stock_only?: boolean;
}

export interface RankedProduct extends CatalogProduct {
  /** 100 / (1 + distance), unrounded. */
  relevance: number;
  distance: number;
}

export interface SearchResult {
  query: string;
  total_results: number;
  products: RankedProduct[];
}

export interface SearchOptions {
  signal?: AbortSignal;
}
