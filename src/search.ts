import type { Product } from './types.js';

const fold = (text: string): string => text.normalize('NFKC').toLowerCase();

/**
 * Filters products by a free-text query over name and description.
 * Matching is a case-insensitive substring test on the query as typed;
 * order is preserved.
 * @param products - Source product list.
 * @param query - Raw search text.
 * @returns The input list itself for a blank query, otherwise the matches.
 */
export const filterProducts = (products: readonly Product[], query: string): readonly Product[] => {
  if (!query.trim()) {
    return products;
  }
  const needle = fold(query);
  return products.filter(
    (product) => fold(product.name).includes(needle) || fold(product.description).includes(needle)
  );
};
