import type { CatalogStore } from '../core/contracts/catalog';
import type { Embedder } from '../core/contracts/embedding';
import {
  DEFAULT_TOP_K,
  type RankedProduct,
  type SearchOptions,
  type SearchQuery,
  type SearchResult
} from '../core/contracts/search';
import { InvalidQueryError, ModelUnavailableError, StoreUnavailableError } from '../core/errors';
import { withTimeout } from '../core/timeout';
import { buildPredicate } from '../catalog/predicate';
import { distanceToRelevance } from './relevance';

export interface SearchExecutorOptions {
  embedder: Embedder;
  store: CatalogStore;
  embedTimeoutMs?: number;
  storeTimeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 5000;

export class SearchExecutor {
  private readonly embedder: Embedder;
  private readonly store: CatalogStore;
  private readonly embedTimeoutMs: number;
  private readonly storeTimeoutMs: number;

  constructor(options: SearchExecutorOptions) {
    this.embedder = options.embedder;
    this.store = options.store;
    this.embedTimeoutMs = options.embedTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.storeTimeoutMs = options.storeTimeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async search(input: SearchQuery, options: SearchOptions = {}): Promise<SearchResult> {
    const topK = validateQuery(input);

    const vector = await withTimeout(
      this.embedder.embed(input.query),
      this.embedTimeoutMs,
      () => new ModelUnavailableError(`Embedding timed out after ${this.embedTimeoutMs}ms`, { retryable: true }),
      options.signal
    );

    const predicate = buildPredicate(input);
    const hits = await withTimeout(
      this.store.hybridSearch(vector, predicate, topK),
      this.storeTimeoutMs,
      () => new StoreUnavailableError(`Catalog search timed out after ${this.storeTimeoutMs}ms`),
      options.signal
    );

    const products: RankedProduct[] = hits
      .map((hit) => ({
        ...hit.product,
        distance: hit.distance,
        relevance: distanceToRelevance(hit.distance)
      }))
      .sort((a, b) => b.relevance - a.relevance || a.product_id - b.product_id)
      .slice(0, topK);

    return {
      query: input.query,
      total_results: products.length,
      products
    };
  }
}

function validateQuery(input: SearchQuery): number {
  if (!input.query.trim()) {
    throw new InvalidQueryError('Query must not be empty', { field: 'query' });
  }

  const topK = input.top_k ?? DEFAULT_TOP_K;
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new InvalidQueryError(`top_k must be a positive integer, got ${topK}`, { field: 'top_k' });
  }

  if (input.max_price !== undefined && (!Number.isFinite(input.max_price) || input.max_price < 0)) {
    throw new InvalidQueryError(`max_price must be a non-negative number, got ${input.max_price}`, { field: 'max_price' });
  }

  return topK;
}
