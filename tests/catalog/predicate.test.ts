import { buildPredicate, matchesPredicate, predicateToSql } from '../../catalog/predicate';
import { makeProduct } from '../helpers/fixtures';

describe('buildPredicate', () => {
  it('imposes no constraint when no filters are given', () => {
    expect(buildPredicate({})).toEqual([]);
  });

  it('drops blank strings and in_stock_only=false', () => {
    expect(buildPredicate({ max_price: 100, category: ' Footwear ', brand: '  ', in_stock_only: false })).toEqual([
      { field: 'price', op: 'lte', value: 100 },
      { field: 'category', op: 'eq', value: 'Footwear' }
    ]);
  });

  it('keeps a zero price bound', () => {
    expect(buildPredicate({ max_price: 0 })).toEqual([{ field: 'price', op: 'lte', value: 0 }]);
  });

  it('adds an in-stock clause when requested', () => {
    expect(buildPredicate({ in_stock_only: true, brand: 'Nordwind' })).toEqual([
      { field: 'brand', op: 'eq', value: 'Nordwind' },
      { field: 'in_stock', op: 'eq', value: true }
    ]);
  });
});

describe('matchesPredicate', () => {
  it('treats the price bound as inclusive', () => {
    const predicate = buildPredicate({ max_price: 100 });

    expect(matchesPredicate(makeProduct(1, [0], { price: 100 }), predicate)).toBe(true);
    expect(matchesPredicate(makeProduct(2, [0], { price: 100.01 }), predicate)).toBe(false);
  });

  it('requires every clause to hold', () => {
    const predicate = buildPredicate({ category: 'Footwear', in_stock_only: true });

    expect(matchesPredicate(makeProduct(1, [0], { category: 'Footwear', in_stock: true }), predicate)).toBe(true);
    expect(matchesPredicate(makeProduct(2, [0], { category: 'Footwear', in_stock: false }), predicate)).toBe(false);
    expect(matchesPredicate(makeProduct(3, [0], { category: 'Clothing', in_stock: true }), predicate)).toBe(false);
  });

  it('compares categories exactly', () => {
    const predicate = buildPredicate({ category: 'footwear' });

    expect(matchesPredicate(makeProduct(1, [0], { category: 'Footwear' }), predicate)).toBe(false);
  });
});

describe('predicateToSql', () => {
  it('numbers placeholders from the given offset', () => {
    const predicate = buildPredicate({ max_price: 50, category: 'Outdoor', in_stock_only: true });

    expect(predicateToSql(predicate, 3)).toEqual({
      conditions: ['price <= $3', 'category = $4', 'in_stock = $5'],
      values: [50, 'Outdoor', true]
    });
  });

  it('returns nothing for an empty predicate', () => {
    expect(predicateToSql([], 1)).toEqual({ conditions: [], values: [] });
  });
});
