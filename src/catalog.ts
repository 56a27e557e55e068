import productSeeds from './data/products.json';
import type { Product, ProductSeed } from './types.js';
import { slugify } from './utils.js';

const DEFAULT_SEEDS: readonly ProductSeed[] = productSeeds;

let sequence = 0;

/**
 * Builds an immutable product with a process-unique identifier.
 * @param seed - Product attributes.
 * @returns Frozen product.
 */
export const createProduct = (seed: ProductSeed): Product => {
  sequence += 1;
  return Object.freeze({
    id: `${slugify(seed.name) || 'product'}-${sequence}`,
    name: seed.name,
    price: seed.price,
    imageUrl: seed.imageUrl,
    description: seed.description,
    rating: seed.rating
  });
};

/**
 * Products are equal when they carry the same identifier.
 */
export const isSameProduct = (left: Product, right: Product): boolean => left.id === right.id;

/**
 * Fixed, ordered product list owned by a storefront session.
 */
export class Catalog {
  private readonly products: readonly Product[];

  private readonly byId: ReadonlyMap<string, Product>;

  public constructor(seeds: readonly ProductSeed[] = DEFAULT_SEEDS) {
    this.products = Object.freeze(seeds.map(createProduct));
    this.byId = new Map(this.products.map((product) => [product.id, product]));
  }

  /**
   * Returns every product in catalog order.
   * @returns The same frozen list on every call.
   */
  public list(): readonly Product[] {
    return this.products;
  }

  /**
   * Looks up a product by identifier.
   * @param id - Product identifier.
   * @returns Product or undefined.
   */
  public findById(id: string): Product | undefined {
    return this.byId.get(id);
  }

  /**
   * Checks whether this catalog owns the given product instance.
   * @param product - Product to check.
   * @returns True for products created by this catalog.
   */
  public has(product: Product): boolean {
    return this.byId.get(product.id) === product;
  }
}
