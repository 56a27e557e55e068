import { CatalogError } from '../src/errors.js';
import { StoreSession } from '../src/session.js';
import { UIController } from '../src/ui.js';

describe('UIController', () => {
  let root: HTMLElement;
  let session: StoreSession;
  let ui: UIController;

  const query = <T extends HTMLElement = HTMLElement>(selector: string): T => {
    const element = root.querySelector<T>(selector);
    if (!element) {
      throw new Error(`Missing element ${selector}`);
    }
    return element;
  };

  const cardTitles = (): string[] =>
    Array.from(root.querySelectorAll('.product-card__title')).map((title) => title.textContent ?? '');

  const search = (value: string): void => {
    const input = query<HTMLInputElement>('.js-search');
    input.value = value;
    input.dispatchEvent(new Event('input', { bubbles: true }));
  };

  const pressEscape = (): void => {
    document.dispatchEvent(new KeyboardEvent('keydown', { key: 'Escape' }));
  };

  beforeEach(() => {
    root = document.createElement('div');
    document.body.append(root);
    session = new StoreSession();
    ui = new UIController();
    ui.init({ root, session });
  });

  afterEach(() => {
    ui.destroy();
    root.remove();
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  it('renders the title and every product card', () => {
    expect(query('.storefront__title').textContent).toBe('Trending Products');
    expect(cardTitles()).toEqual([
      'Designer Handbag',
      'Sports Shoes',
      'Wireless Headphones',
      'Sunglasses',
      'Smart Watch',
      'Leather Wallet'
    ]);
    expect(query('.product-card__price').textContent).toBe('$599.99');
    expect(query('.product-card__rating').textContent).toBe('Rating: 4.5 ⭐️');
  });

  it('filters cards as the user types', () => {
    search('leather');
    expect(session.getState().searchQuery).toBe('leather');
    expect(cardTitles()).toEqual(['Designer Handbag', 'Leather Wallet']);
    search('');
    expect(cardTitles()).toHaveLength(6);
  });

  it('shows an empty state when nothing matches', () => {
    search('xyz');
    expect(cardTitles()).toEqual([]);
    expect(query('.product-grid__empty').textContent).toBe('No products match');
  });

  it('hides the cart badge while the cart is empty', () => {
    expect(query('.js-open-cart .js-cart-count').hidden).toBe(true);
  });

  it('updates the badge and flashes a confirmation on add', () => {
    jest.useFakeTimers();
    query('.product-card .js-add-to-cart').click();
    const badge = query('.js-open-cart .js-cart-count');
    expect(session.cartCount()).toBe(1);
    expect(badge.textContent).toBe('1');
    expect(badge.hidden).toBe(false);
    const added = query('.product-card__added');
    expect(added.classList.contains('is-visible')).toBe(true);
    jest.advanceTimersByTime(799);
    expect(added.classList.contains('is-visible')).toBe(true);
    jest.advanceTimersByTime(1);
    expect(added.classList.contains('is-visible')).toBe(false);
  });

  it('toggles the like button without opening the detail sheet', () => {
    jest.useFakeTimers();
    const like = query<HTMLButtonElement>('.product-card .js-like');
    like.click();
    expect(like.getAttribute('aria-pressed')).toBe('true');
    expect(like.textContent).toBe('♥');
    expect(like.classList.contains('is-pulsing')).toBe(true);
    jest.advanceTimersByTime(500);
    expect(like.classList.contains('is-pulsing')).toBe(false);
    expect(session.isDetailOpen()).toBe(false);
    like.click();
    expect(like.getAttribute('aria-pressed')).toBe('false');
    expect(like.textContent).toBe('♡');
  });

  it('restarts the pulse when the like button is toggled quickly', () => {
    jest.useFakeTimers();
    const like = query('.product-card .js-like');
    like.click();
    jest.advanceTimersByTime(400);
    like.click();
    expect(jest.getTimerCount()).toBe(1);
    jest.advanceTimersByTime(200);
    expect(like.classList.contains('is-pulsing')).toBe(true);
    jest.advanceTimersByTime(300);
    expect(like.classList.contains('is-pulsing')).toBe(false);
    expect(jest.getTimerCount()).toBe(0);
  });

  it('restarts the confirmation when a product is added again', () => {
    jest.useFakeTimers();
    const add = query('.product-card .js-add-to-cart');
    const added = query('.product-card__added');
    add.click();
    jest.advanceTimersByTime(700);
    add.click();
    jest.advanceTimersByTime(700);
    expect(added.classList.contains('is-visible')).toBe(true);
    jest.advanceTimersByTime(100);
    expect(added.classList.contains('is-visible')).toBe(false);
    expect(session.cartCount()).toBe(2);
  });

  it('keeps the liked flag when the grid re-renders', () => {
    query('.product-card .js-like').click();
    search('handbag');
    expect(query('.product-card .js-like').getAttribute('aria-pressed')).toBe('true');
  });

  it('cancels pending card effects on destroy', () => {
    jest.useFakeTimers();
    query('.product-card .js-add-to-cart').click();
    query('.product-card .js-like').click();
    expect(jest.getTimerCount()).toBe(2);
    ui.destroy();
    expect(jest.getTimerCount()).toBe(0);
  });

  it('opens the detail sheet for a tapped card and dismisses it', () => {
    root.querySelectorAll<HTMLElement>('.product-card__title')[1].click();
    expect(session.isDetailOpen()).toBe(true);
    expect(query('.sheet__title').textContent).toBe('Sports Shoes');
    expect(query('.sheet__description').textContent).toBe(
      'High-performance sports shoes that are both comfortable and durable.'
    );
    query('.sheet__panel .js-dismiss-detail').click();
    expect(session.isDetailOpen()).toBe(false);
    expect(root.querySelector('.sheet')).toBeNull();
  });

  it('shows an inert Buy Now button in the detail sheet', () => {
    query('.product-card__title').click();
    const buy = query('.sheet__panel .button--buy');
    expect(buy.textContent).toBe('Buy Now');
    buy.click();
    expect(session.isDetailOpen()).toBe(true);
    expect(session.cartCount()).toBe(0);
  });

  it('dismisses the detail sheet from the backdrop and with Escape', () => {
    query('.product-card__title').click();
    query('.sheet__backdrop').click();
    expect(root.querySelector('.sheet')).toBeNull();
    query('.product-card__title').click();
    pressEscape();
    expect(root.querySelector('.sheet')).toBeNull();
  });

  it('opens an empty cart popup', () => {
    query('.js-open-cart').click();
    expect(session.getState().cartOpen).toBe(true);
    expect(query('.cart-popup__title').textContent).toBe('Your Cart');
    expect(query('.cart-list__empty').textContent).toBe('Your cart is empty');
    expect(query('.cart-popup__total strong').textContent).toBe('$0.00');
  });

  it.each([
    ['backdrop', '.cart-popup__backdrop'],
    ['header icon', '.cart-popup__header .js-close-cart'],
    ['close button', '.cart-popup__panel > .js-close-cart']
  ])('closes the cart popup from the %s', (_label, selector) => {
    query('.js-open-cart').click();
    query(selector).click();
    expect(session.getState().cartOpen).toBe(false);
    expect(root.querySelector('.cart-popup')).toBeNull();
  });

  it('closes the cart popup with Escape', () => {
    query('.js-open-cart').click();
    pressEscape();
    expect(root.querySelector('.cart-popup')).toBeNull();
  });

  it('lists cart entries with a total and removes them', () => {
    const [handbag, , , , , wallet] = session.catalog.list();
    session.addToCart(handbag.id);
    session.addToCart(handbag.id);
    session.addToCart(wallet.id);
    query('.js-open-cart').click();
    const entryNames = (): string[] =>
      Array.from(root.querySelectorAll('.cart-item__name')).map((name) => name.textContent ?? '');
    expect(entryNames()).toEqual(['Designer Handbag', 'Designer Handbag', 'Leather Wallet']);
    expect(query('.cart-popup__total strong').textContent).toBe('$1,449.97');
    expect(query('.cart-popup__header .js-cart-count').textContent).toBe('3');

    root.querySelectorAll<HTMLElement>('.cart-item .js-remove')[1].click();
    expect(entryNames()).toEqual(['Designer Handbag', 'Leather Wallet']);
    expect(query('.js-open-cart .js-cart-count').textContent).toBe('2');
    expect(query('.cart-popup__header .js-cart-count').textContent).toBe('2');
  });

  it('renders a placeholder for a card whose image fails', () => {
    const frames = root.querySelectorAll<HTMLElement>('.product-grid .media');
    frames[0].querySelector('img')?.dispatchEvent(new Event('error'));
    expect(frames[0].dataset.phase).toBe('error');
    expect(frames[1].dataset.phase).toBe('loading');
  });

  it('logs actions that reference unknown products', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const card = query('.product-card');
    card.dataset.id = 'missing';
    query('.product-card .js-add-to-cart').click();
    expect(errorSpy).toHaveBeenCalledWith(expect.any(CatalogError));
    expect(session.cartCount()).toBe(0);
    expect(query('.product-card__added').classList.contains('is-visible')).toBe(false);
  });
});
