/**
 * Storefront settings shared by the UI modules.
 * @module config
 */

export const STORE_TITLE = 'Trending Products';

export const SEARCH_PLACEHOLDER = 'Search products';

export const LOCALE = 'en-US';

export const CURRENCY = 'USD';

/** Duration of the heart pulse after a like toggle. */
export const LIKE_PULSE_MS = 500;

/** How long the "Added!" confirmation stays on a card. */
export const ADDED_FLASH_MS = 800;
