import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { CatalogProduct } from '../core/contracts/catalog';

export const productRecordSchema = z
  .object({
    product_id: z.number().int().nonnegative(),
    name: z.string().trim().min(1),
    description: z.string().trim().min(1),
    category: z.string().trim().min(1),
    price: z.number().finite().nonnegative(),
    in_stock: z.boolean(),
    brand: z.string().trim().min(1)
  })
  .strip();

export interface RejectedRecord {
  position: number;
  productId: number | null;
  error: string;
}

export interface LoadedProducts {
  products: CatalogProduct[];
  rejected: RejectedRecord[];
}

export interface ProductSource {
  readonly name: string;
  load(): Promise<LoadedProducts>;
}

/**
 * Validates raw records one by one. Invalid records and repeated product ids are
 * rejected individually so the caller can report every bad entry at once.
 */
export function validateRecords(records: readonly unknown[]): LoadedProducts {
  const products: CatalogProduct[] = [];
  const rejected: RejectedRecord[] = [];
  const seen = new Set<number>();

  records.forEach((record, position) => {
    const parsed = productRecordSchema.safeParse(record);
    if (!parsed.success) {
      rejected.push({
        position,
        productId: rawProductId(record),
        error: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`).join('; ')
      });
      return;
    }

    if (seen.has(parsed.data.product_id)) {
      rejected.push({
        position,
        productId: parsed.data.product_id,
        error: `Duplicate product_id ${parsed.data.product_id}`
      });
      return;
    }

    seen.add(parsed.data.product_id);
    products.push(parsed.data);
  });

  return { products, rejected };
}

export class JsonFileProductSource implements ProductSource {
  readonly name: string;

  constructor(private readonly path: string) {
    this.name = path;
  }

  async load(): Promise<LoadedProducts> {
    const raw = await readFile(this.path, 'utf8');

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Product file ${this.path} is not valid JSON`, { cause: error });
    }

    if (!Array.isArray(parsed)) {
      throw new Error(`Product file ${this.path} must contain a JSON array`);
    }

    return validateRecords(parsed);
  }
}

/** In-memory source, used for seeding and tests. */
export class StaticProductSource implements ProductSource {
  readonly name = 'static';

  constructor(private readonly records: readonly unknown[]) {}

  async load(): Promise<LoadedProducts> {
    return validateRecords(this.records);
  }
}

function rawProductId(record: unknown): number | null {
  if (typeof record === 'object' && record !== null && 'product_id' in record && typeof record.product_id === 'number') {
    return record.product_id;
  }
  return null;
}
