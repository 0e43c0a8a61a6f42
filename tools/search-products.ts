import { z } from 'zod';
import type { SearchQuery, SearchResult } from '../core/contracts/search';
import type { JsonSchema, ToolDefinition } from '../core/contracts/tool';
import { InvalidArgumentsError } from '../core/errors';
import type { SearchExecutor } from '../search/search-executor';
import { formatRelevance } from '../search/relevance';

export const SEARCH_PRODUCTS_TOOL = 'search_products';

const DESCRIPTION =
  'Semantic search for e-commerce products. Understands natural language queries ' +
  "(e.g., 'waterproof running shoes under 100 euros') and returns ranked results with relevance scores. " +
  'Supports optional filtering by price, category, brand, and stock availability. ' +
  'Use this tool when customers want to find, search, browse, or get recommendations for products.';

const inputSchema: JsonSchema = {
  type: 'object',
  properties: {
    query: {
      type: 'string',
      description: 'Natural language description of the desired product'
    },
    top_k: {
      type: 'integer',
      description: 'Maximum number of results to return (default 5)',
      default: 5,
      minimum: 1
    },
    max_price: {
      type: 'number',
      description: 'Maximum price in EUR (optional filter)',
      minimum: 0
    },
    category: {
      type: 'string',
      description: 'Product category to filter by'
    },
    in_stock_only: {
      type: 'boolean',
      description: 'If true, return only products currently in stock',
      default: false
    },
    brand: {
      type: 'string',
      description: "Brand name to filter by (e.g., 'ActiveGear')"
    }
  },
  required: ['query'],
  additionalProperties: false
};

// null is accepted for optional fields and means "not supplied".
export const searchProductsArgsSchema = z
  .object({
    query: z.string(),
    top_k: z.number().int().min(1).nullish(),
    max_price: z.number().finite().min(0).nullish(),
    category: z.string().nullish(),
    in_stock_only: z.boolean().nullish(),
    brand: z.string().nullish()
  })
  .strict();

export type SearchProductsArgs = z.infer<typeof searchProductsArgsSchema>;

export interface DisplayProduct {
  product_id: number;
  name: string;
  category: string;
  description: string;
  price: number;
  in_stock: boolean;
  brand: string;
  relevance: string;
}

export interface SearchProductsPayload {
  query: string;
  total_results: number;
  products: DisplayProduct[];
}

export function parseSearchProductsArgs(args: unknown): SearchQuery {
  const parsed = searchProductsArgsSchema.safeParse(args ?? {});
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
      .join('; ');
    throw new InvalidArgumentsError(`Invalid arguments for ${SEARCH_PRODUCTS_TOOL}: ${message}`, {
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    });
  }

  const { query, top_k, max_price, category, in_stock_only, brand } = parsed.data;
  return {
    query,
    top_k: top_k ?? undefined,
    max_price: max_price ?? undefined,
    category: category ?? undefined,
    in_stock_only: in_stock_only ?? undefined,
    brand: brand ?? undefined
  };
}

export function toSearchProductsPayload(result: SearchResult): SearchProductsPayload {
  return {
    query: result.query,
    total_results: result.total_results,
    products: result.products.map((product) => ({
      product_id: product.product_id,
      name: product.name,
      category: product.category,
      description: product.description,
      price: product.price,
      in_stock: product.in_stock,
      brand: product.brand,
      relevance: formatRelevance(product.relevance)
    }))
  };
}

export function createSearchProductsTool(executor: SearchExecutor): ToolDefinition {
  return {
    name: SEARCH_PRODUCTS_TOOL,
    description: DESCRIPTION,
    inputSchema,
    handler: async (args, context) => {
      const query = parseSearchProductsArgs(args);
      const result = await executor.search(query, { signal: context.signal });
      return {
        content: [{ type: 'text', text: JSON.stringify(toSearchProductsPayload(result), null, 2) }]
      };
    }
  };
}
