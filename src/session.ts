import { Cart } from './cart.js';
import { Catalog } from './catalog.js';
import { CatalogError } from './errors.js';
import { filterProducts } from './search.js';
import type { Product, SessionListener, ViewState } from './types.js';
import * as view from './view-state.js';

/**
 * Coordinates catalog, cart and view state for one storefront session.
 * Listeners run synchronously after every view or cart change.
 */
export class StoreSession {
  public readonly catalog: Catalog;

  public readonly cart: Cart;

  private state: ViewState = view.initialViewState;

  private readonly listeners = new Set<SessionListener>();

  public constructor(catalog: Catalog = new Catalog()) {
    this.catalog = catalog;
    this.cart = new Cart(catalog);
    this.cart.onChange(() => this.emit());
  }

  public getState(): ViewState {
    return this.state;
  }

  /**
   * Products matching the current search query, recomputed on every read.
   */
  public visibleProducts(): readonly Product[] {
    return filterProducts(this.catalog.list(), this.state.searchQuery);
  }

  public isDetailOpen(): boolean {
    return view.isDetailOpen(this.state);
  }

  /**
   * Opens the detail sheet for a product.
   * @param productId - Catalog identifier.
   */
  public selectProduct(productId: string): void {
    this.apply(view.selectProduct(this.state, this.resolve(productId)));
  }

  public dismissDetail(): void {
    this.apply(view.dismissDetail(this.state));
  }

  public openCart(): void {
    this.apply(view.openCart(this.state));
  }

  /**
   * Closes the cart popup. Backdrop, Close button and header icon all land here.
   */
  public closeCart(): void {
    this.apply(view.closeCart(this.state));
  }

  public setSearchQuery(query: string): void {
    this.apply(view.setSearchQuery(this.state, query));
  }

  /**
   * Adds a catalog product to the cart.
   * @param productId - Catalog identifier.
   */
  public addToCart(productId: string): void {
    this.cart.add(this.resolve(productId));
  }

  /**
   * Removes a cart entry by position.
   * @param index - Zero-based entry position.
   * @returns Removed product.
   */
  public removeFromCart(index: number): Product {
    return this.cart.remove(index);
  }

  public cartCount(): number {
    return this.cart.count();
  }

  public cartItems(): readonly Product[] {
    return this.cart.items();
  }

  public cartTotal(): number {
    return this.cart.total();
  }

  /**
   * Registers change listener.
   * @param listener - Callback receiving the current view state.
   * @returns Unsubscribe function.
   */
  public subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private resolve(productId: string): Product {
    const product = this.catalog.findById(productId);
    if (!product) {
      throw new CatalogError('unknown-product', `Unknown product "${productId}"`);
    }
    return product;
  }

  private apply(next: ViewState): void {
    if (next === this.state) {
      return;
    }
    this.state = next;
    this.emit();
  }

  private emit(): void {
    this.listeners.forEach((listener) => listener(this.state));
  }
}
