import type { CatalogProduct, Predicate, PredicateClause } from '../core/contracts/catalog';

export interface PredicateFilters {
  max_price?: number;
  category?: string;
  brand?: string;
  in_stock_only?: boolean;
}

/**
 * Conjunction of every filter the caller supplied. Missing filters, blank strings
 * and `in_stock_only: false` add no clause.
 */
export function buildPredicate(filters: PredicateFilters): Predicate {
  const clauses: PredicateClause[] = [];

  if (filters.max_price !== undefined) {
    clauses.push({ field: 'price', op: 'lte', value: filters.max_price });
  }
  const category = filters.category?.trim();
  if (category) {
    clauses.push({ field: 'category', op: 'eq', value: category });
  }
  const brand = filters.brand?.trim();
  if (brand) {
    clauses.push({ field: 'brand', op: 'eq', value: brand });
  }
  if (filters.in_stock_only) {
    clauses.push({ field: 'in_stock', op: 'eq', value: true });
  }

  return clauses;
}

export function matchesPredicate(product: CatalogProduct, predicate: Predicate): boolean {
  return predicate.every((clause) => {
    switch (clause.field) {
      case 'price':
        return product.price <= clause.value;
      case 'category':
        return product.category === clause.value;
      case 'brand':
        return product.brand === clause.value;
      case 'in_stock':
        return product.in_stock === clause.value;
    }
  });
}

/**
 * Renders the predicate as parameterised SQL conditions. Placeholders start at
 * `$${firstParameter}` so callers can put their own parameters first.
 */
export function predicateToSql(predicate: Predicate, firstParameter: number): { conditions: string[]; values: Array<string | number | boolean> } {
  const conditions: string[] = [];
  const values: Array<string | number | boolean> = [];

  for (const clause of predicate) {
    const placeholder = `$${firstParameter + values.length}`;
    switch (clause.field) {
      case 'price':
        conditions.push(`price <= ${placeholder}`);
        break;
      case 'category':
        conditions.push(`category = ${placeholder}`);
        break;
      case 'brand':
        conditions.push(`brand = ${placeholder}`);
        break;
      case 'in_stock':
        conditions.push(`in_stock = ${placeholder}`);
        break;
    }
    values.push(clause.value);
  }

  return { conditions, values };
}
