/**
 * Pure helpers for the catalog search TUI. Exported for testing.
 */

import { z } from 'zod';

export interface SearchFormInput {
  query: string;
  topK?: string;
  maxPrice?: string;
  category?: string;
  brand?: string;
  inStockOnly?: boolean;
}

export interface ToolCallRequest {
  jsonrpc: '2.0';
  id: number;
  method: 'tools/call';
  params: {
    name: 'search_products';
    arguments: Record<string, string | number | boolean>;
  };
}

const displayedProductSchema = z.object({
  product_id: z.number(),
  name: z.string(),
  brand: z.string(),
  category: z.string(),
  price: z.number(),
  in_stock: z.boolean(),
  relevance: z.string()
});

const payloadSchema = z.object({
  products: z.array(displayedProductSchema)
});

const rpcReplySchema = z.object({
  result: z
    .object({
      content: z.array(z.object({ type: z.string(), text: z.string().optional() })).optional()
    })
    .optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.object({ retryable: z.boolean().optional() }).passthrough().optional()
    })
    .optional()
});

/** Blank optional fields are omitted; numeric fields must parse. */
export function buildToolCallRequest(form: SearchFormInput, id: number): ToolCallRequest {
  const args: Record<string, string | number | boolean> = { query: form.query.trim() };

  const topK = form.topK?.trim();
  if (topK) {
    const value = Number(topK);
    if (!Number.isInteger(value) || value < 1) {
      throw new Error(`Invalid result count: ${topK}`);
    }
    args.top_k = value;
  }

  const maxPrice = form.maxPrice?.trim();
  if (maxPrice) {
    const value = Number(maxPrice);
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(`Invalid max price: ${maxPrice}`);
    }
    args.max_price = value;
  }

  const category = form.category?.trim();
  if (category) args.category = category;
  const brand = form.brand?.trim();
  if (brand) args.brand = brand;
  if (form.inStockOnly) args.in_stock_only = true;

  return {
    jsonrpc: '2.0',
    id,
    method: 'tools/call',
    params: { name: 'search_products', arguments: args }
  };
}

export function formatSearchResponse(body: unknown): string {
  const reply = rpcReplySchema.safeParse(body);
  if (!reply.success) {
    return '\n(Unrecognised server response)';
  }

  const { error, result } = reply.data;
  if (error) {
    const retry = error.data?.retryable ? ' (retryable)' : '';
    return `\nError ${error.code}: ${error.message}${retry}`;
  }

  const text = result?.content?.find((item) => item.type === 'text')?.text;
  if (!text) {
    return '\n(No result content)';
  }

  const payload = payloadSchema.safeParse(parseJson(text));
  if (!payload.success) {
    return '\n(Unrecognised result payload)';
  }

  const { products } = payload.data;
  if (!products.length) {
    return '\nNo matching products.';
  }

  const lines = [`\n--- ${products.length} result(s) ---`];
  products.forEach((product, position) => {
    const stock = product.in_stock ? 'in stock' : 'out of stock';
    lines.push(`${position + 1}. ${product.name} (${product.brand}, ${product.category})`);
    lines.push(`   €${product.price.toFixed(2)} · ${stock} · relevance ${product.relevance} · id ${product.product_id}`);
  });
  return lines.join('\n');
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
