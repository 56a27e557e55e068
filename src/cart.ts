import type { Catalog } from './catalog.js';
import { CartError } from './errors.js';
import type { CartListener, Product } from './types.js';

/**
 * In-memory cart. Entries are product references in insertion order;
 * adding a product twice yields two entries.
 */
export class Cart {
  private entries: Product[] = [];

  private readonly listeners = new Set<CartListener>();

  private readonly catalog: Catalog;

  public constructor(catalog: Catalog) {
    this.catalog = catalog;
  }

  /**
   * Appends a catalog product and notifies listeners before returning.
   * @param product - Product owned by the session catalog.
   */
  public add(product: Product): void {
    if (!this.catalog.has(product)) {
      throw new CartError('unknown-product', `Product "${product.id}" is not part of the catalog`);
    }
    this.entries.push(product);
    this.emit();
  }

  /**
   * Removes the entry at the given position.
   * @param index - Zero-based entry position.
   * @returns Removed product.
   */
  public remove(index: number): Product {
    if (!Number.isInteger(index) || index < 0 || index >= this.entries.length) {
      throw new CartError('out-of-range', `Cart index ${index} is outside [0, ${this.entries.length})`);
    }
    const [removed] = this.entries.splice(index, 1);
    this.emit();
    return removed;
  }

  public count(): number {
    return this.entries.length;
  }

  /**
   * Returns a snapshot of the entries in insertion order.
   */
  public items(): readonly Product[] {
    return [...this.entries];
  }

  /**
   * Sums entry prices.
   */
  public total(): number {
    return this.entries.reduce((sum, product) => sum + product.price, 0);
  }

  /**
   * Registers a count listener.
   * @param listener - Callback invoked synchronously after every change.
   * @returns Unsubscribe function.
   */
  public onChange(listener: CartListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(): void {
    const count = this.entries.length;
    this.listeners.forEach((listener) => listener(count));
  }
}
