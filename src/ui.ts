import { ADDED_FLASH_MS, LIKE_PULSE_MS, SEARCH_PLACEHOLDER, STORE_TITLE } from './config.js';
import { hydrateImages } from './images.js';
import type { StoreSession } from './session.js';
import { TimerScope } from './timers.js';
import type { Product, ViewState } from './types.js';
import { escapeHtml, formatCurrency, formatRating } from './utils.js';

interface InitOptions {
  root: HTMLElement;
  session: StoreSession;
}

/**
 * Handles rendering and UI interactions.
 */
export class UIController {
  private root: HTMLElement | null = null;

  private session: StoreSession | null = null;

  private rendered: ViewState | null = null;

  private renderedCount = -1;

  private readonly liked = new Set<string>();

  private cardTimers = new TimerScope();

  private readonly pendingEffects = new Map<Element, () => void>();

  private readonly cleanups: Array<() => void> = [];

  /**
   * Builds the page shell and starts listening to the session.
   * @param options - Mount point and session.
   */
  public init(options: InitOptions): void {
    this.root = options.root;
    this.session = options.session;
    this.root.innerHTML = `
      <div class="storefront">
        <header class="storefront__header">
          <h1 class="storefront__title">${escapeHtml(STORE_TITLE)}</h1>
          <input
            class="search-input js-search"
            type="search"
            placeholder="${escapeHtml(SEARCH_PLACEHOLDER)}"
            aria-label="${escapeHtml(SEARCH_PLACEHOLDER)}"
          />
          <button class="cart-button js-open-cart" type="button" aria-label="Open cart">
            ${this.cartIconMarkup()}
          </button>
        </header>
        <main class="product-grid js-grid" aria-live="polite"></main>
        <div class="js-detail"></div>
        <div class="js-cart-popup"></div>
      </div>
    `;
    this.bindInteractions();
    this.cleanups.push(this.session.subscribe((state) => this.render(state)));
    this.render(this.session.getState());
  }

  /**
   * Removes listeners, cancels pending card effects and clears the mount point.
   */
  public destroy(): void {
    this.cleanups.splice(0).forEach((cleanup) => cleanup());
    this.cardTimers.dispose();
    this.pendingEffects.clear();
    if (this.root) {
      this.root.innerHTML = '';
    }
    this.root = null;
    this.session = null;
    this.rendered = null;
    this.renderedCount = -1;
  }

  /**
   * Re-renders the parts of the page affected by a state change.
   * @param state - Current view state.
   */
  private render(state: ViewState): void {
    if (!this.root || !this.session) {
      return;
    }
    const previous = this.rendered;
    const count = this.session.cartCount();
    const countChanged = count !== this.renderedCount;
    this.rendered = state;
    this.renderedCount = count;

    if (!previous || previous.searchQuery !== state.searchQuery) {
      this.syncSearchInput(state.searchQuery);
      this.renderGrid();
    }
    if (!previous || previous.selectedProduct !== state.selectedProduct) {
      this.renderDetail(state.selectedProduct);
    }
    if (!previous || previous.cartOpen !== state.cartOpen || (state.cartOpen && countChanged)) {
      this.renderCartPopup(state.cartOpen);
    }
    if (countChanged) {
      this.updateCartCounter(count);
    }
  }

  private syncSearchInput(query: string): void {
    const input = this.root?.querySelector<HTMLInputElement>('.js-search');
    if (input && input.value !== query) {
      input.value = query;
    }
  }

  /**
   * Renders product cards for the current search query.
   */
  private renderGrid(): void {
    const grid = this.root?.querySelector<HTMLElement>('.js-grid');
    if (!grid || !this.session) {
      return;
    }
    this.cardTimers.dispose();
    this.cardTimers = new TimerScope();
    this.pendingEffects.clear();
    const products = this.session.visibleProducts();
    grid.innerHTML = products.length
      ? products.map((product) => this.cardMarkup(product)).join('')
      : '<p class="product-grid__empty">No products match</p>';
    hydrateImages(grid);
  }

  private cardMarkup(product: Product): string {
    const liked = this.liked.has(product.id);
    const name = escapeHtml(product.name);
    return `
      <article class="product-card" data-id="${escapeHtml(product.id)}" tabindex="0">
        <div class="product-card__media">
          <div
            class="product-card__image"
            data-image-src="${escapeHtml(product.imageUrl)}"
            data-image-alt="${name}"
          ></div>
          <button
            class="like-button js-like${liked ? ' is-liked' : ''}"
            type="button"
            aria-pressed="${liked}"
            aria-label="Like ${name}"
          >${liked ? '♥' : '♡'}</button>
        </div>
        <h2 class="product-card__title">${name}</h2>
        <p class="product-card__price">${escapeHtml(formatCurrency(product.price))}</p>
        <p class="product-card__rating">${escapeHtml(formatRating(product.rating))}</p>
        <div class="product-card__actions">
          <button class="button js-add-to-cart" type="button">Add to Cart</button>
          <span class="product-card__added" aria-live="polite">Added!</span>
        </div>
      </article>
    `;
  }

  /**
   * Renders or removes the product detail sheet.
   * @param product - Selected product or null.
   */
  private renderDetail(product: Product | null): void {
    const container = this.root?.querySelector<HTMLElement>('.js-detail');
    if (!container) {
      return;
    }
    if (!product) {
      container.innerHTML = '';
      return;
    }
    const name = escapeHtml(product.name);
    container.innerHTML = `
      <div class="sheet" role="dialog" aria-modal="true" aria-labelledby="detail-title">
        <div class="sheet__backdrop js-dismiss-detail"></div>
        <section class="sheet__panel">
          <div class="sheet__image" data-image-src="${escapeHtml(product.imageUrl)}" data-image-alt="${name}"></div>
          <h2 id="detail-title" class="sheet__title">${name}</h2>
          <p class="sheet__price">${escapeHtml(formatCurrency(product.price))}</p>
          <p class="sheet__rating">${escapeHtml(formatRating(product.rating))}</p>
          <p class="sheet__description">${escapeHtml(product.description)}</p>
          <button class="button button--buy" type="button">Buy Now</button>
          <button class="button button--secondary js-dismiss-detail" type="button">Done</button>
        </section>
      </div>
    `;
    hydrateImages(container);
  }

  /**
   * Renders or removes the cart popup.
   * @param open - Whether the popup is visible.
   */
  private renderCartPopup(open: boolean): void {
    const container = this.root?.querySelector<HTMLElement>('.js-cart-popup');
    if (!container || !this.session) {
      return;
    }
    if (!open) {
      container.innerHTML = '';
      return;
    }
    const rows = this.session
      .cartItems()
      .map((product, index) => {
        const name = escapeHtml(product.name);
        return `
          <li class="cart-item" data-index="${index}">
            <div class="cart-item__image" data-image-src="${escapeHtml(product.imageUrl)}" data-image-alt="${name}"></div>
            <div class="cart-item__details">
              <p class="cart-item__name">${name}</p>
              <p class="cart-item__price">${escapeHtml(formatCurrency(product.price))}</p>
              <p class="cart-item__rating">${escapeHtml(formatRating(product.rating))}</p>
            </div>
            <button class="button button--icon js-remove" type="button" aria-label="Remove ${name}">×</button>
          </li>
        `;
      })
      .join('');
    container.innerHTML = `
      <div class="cart-popup" role="dialog" aria-modal="true" aria-labelledby="cart-title">
        <div class="cart-popup__backdrop js-close-cart"></div>
        <section class="cart-popup__panel">
          <header class="cart-popup__header">
            <button class="cart-button js-close-cart" type="button" aria-label="Close cart">
              ${this.cartIconMarkup()}
            </button>
            <h2 id="cart-title" class="cart-popup__title">Your Cart</h2>
          </header>
          <ul class="cart-list">${rows || '<li class="cart-list__empty">Your cart is empty</li>'}</ul>
          <p class="cart-popup__total">Total: <strong>${escapeHtml(formatCurrency(this.session.cartTotal()))}</strong></p>
          <button class="button js-close-cart" type="button">Close</button>
        </section>
      </div>
    `;
    hydrateImages(container);
    this.updateCartCounter(this.session.cartCount());
  }

  private cartIconMarkup(): string {
    return `
      <span class="cart-button__icon" aria-hidden="true">🛒</span>
      <span class="cart-button__badge js-cart-count" hidden>0</span>
    `;
  }

  /**
   * Updates every cart badge on the page.
   * @param count - Number of cart entries.
   */
  private updateCartCounter(count: number): void {
    this.root?.querySelectorAll<HTMLElement>('.js-cart-count').forEach((badge) => {
      badge.textContent = String(count);
      badge.hidden = count === 0;
    });
  }

  /**
   * Binds delegated listeners on the page shell.
   */
  private bindInteractions(): void {
    const root = this.root;
    if (!root) {
      return;
    }
    this.listen(root.querySelector('.js-search'), 'input', (event) => {
      if (event.target instanceof HTMLInputElement) {
        const { value } = event.target;
        this.runAction(() => this.session?.setSearchQuery(value));
      }
    });
    this.listen(root.querySelector('.js-open-cart'), 'click', () => {
      this.runAction(() => this.session?.openCart());
    });
    this.listen(root.querySelector('.js-grid'), 'click', this.handleGridClick);
    this.listen(root.querySelector('.js-grid'), 'keydown', this.handleGridKeydown);
    this.listen(root.querySelector('.js-detail'), 'click', (event) => {
      if (event.target instanceof Element && event.target.closest('.js-dismiss-detail')) {
        this.runAction(() => this.session?.dismissDetail());
      }
    });
    this.listen(root.querySelector('.js-cart-popup'), 'click', this.handleCartClick);
    this.listen(root.ownerDocument, 'keydown', this.handleEscape);
  }

  private handleGridClick = (event: Event): void => {
    const target = event.target;
    if (!(target instanceof Element)) {
      return;
    }
    const card = target.closest<HTMLElement>('.product-card');
    const id = card?.dataset.id;
    if (!card || !id) {
      return;
    }
    if (target.closest('.js-like')) {
      this.toggleLike(card, id);
      return;
    }
    if (target.closest('.js-add-to-cart')) {
      if (this.runAction(() => this.session?.addToCart(id))) {
        this.flashAdded(card);
      }
      return;
    }
    this.runAction(() => this.session?.selectProduct(id));
  };

  private handleGridKeydown = (event: Event): void => {
    if (!(event instanceof KeyboardEvent) || event.key !== 'Enter') {
      return;
    }
    const target = event.target;
    if (!(target instanceof HTMLElement) || !target.classList.contains('product-card')) {
      return;
    }
    const id = target.dataset.id;
    if (id) {
      this.runAction(() => this.session?.selectProduct(id));
    }
  };

  private handleCartClick = (event: Event): void => {
    const target = event.target;
    if (!(target instanceof Element)) {
      return;
    }
    const remove = target.closest('.js-remove');
    if (remove) {
      const index = Number(remove.closest<HTMLElement>('.cart-item')?.dataset.index);
      this.runAction(() => this.session?.removeFromCart(index));
      return;
    }
    if (target.closest('.js-close-cart')) {
      this.runAction(() => this.session?.closeCart());
    }
  };

  private handleEscape = (event: Event): void => {
    if (!(event instanceof KeyboardEvent) || event.key !== 'Escape' || !this.session) {
      return;
    }
    const state = this.session.getState();
    if (state.cartOpen) {
      this.session.closeCart();
    } else if (this.session.isDetailOpen()) {
      this.session.dismissDetail();
    }
  };

  /**
   * Toggles the like flag of a card and plays the pulse effect.
   * @param card - Card element.
   * @param id - Product identifier.
   */
  private toggleLike(card: HTMLElement, id: string): void {
    const button = card.querySelector<HTMLButtonElement>('.js-like');
    if (!button) {
      return;
    }
    const liked = !this.liked.has(id);
    if (liked) {
      this.liked.add(id);
    } else {
      this.liked.delete(id);
    }
    button.classList.toggle('is-liked', liked);
    button.setAttribute('aria-pressed', String(liked));
    button.textContent = liked ? '♥' : '♡';
    this.playEffect(button, 'is-pulsing', LIKE_PULSE_MS);
  }

  /**
   * Shows the "Added!" confirmation on a card for a short moment.
   * @param card - Card element.
   */
  private flashAdded(card: HTMLElement): void {
    const label = card.querySelector<HTMLElement>('.product-card__added');
    if (!label) {
      return;
    }
    this.playEffect(label, 'is-visible', ADDED_FLASH_MS);
  }

  /**
   * Adds a class for a fixed time. Replaying restarts the countdown.
   * @param element - Element carrying the effect.
   * @param className - Class to add and later remove.
   * @param duration - Duration in milliseconds.
   */
  private playEffect(element: Element, className: string, duration: number): void {
    this.pendingEffects.get(element)?.();
    element.classList.add(className);
    const cancel = this.cardTimers.schedule(() => {
      this.pendingEffects.delete(element);
      element.classList.remove(className);
    }, duration);
    this.pendingEffects.set(element, cancel);
  }

  /**
   * Runs a session action and logs failures without breaking the page.
   * @param action - Action to run.
   * @returns True when the action completed.
   */
  private runAction(action: () => unknown): boolean {
    try {
      action();
      return true;
    } catch (error) {
      console.error(error);
      return false;
    }
  }

  private listen(target: EventTarget | null, type: string, listener: (event: Event) => void): void {
    if (!target) {
      return;
    }
    target.addEventListener(type, listener);
    this.cleanups.push(() => target.removeEventListener(type, listener));
  }
}
