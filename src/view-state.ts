/**
 * Pure transitions over the storefront view state.
 * Every function returns a new frozen value, or the input when nothing changes.
 * @module view-state
 */
import type { Product, ViewState } from './types.js';

export const initialViewState: ViewState = Object.freeze({
  selectedProduct: null,
  cartOpen: false,
  searchQuery: ''
});

const update = (state: ViewState, patch: Partial<ViewState>): ViewState => {
  const next: ViewState = { ...state, ...patch };
  const changed =
    next.selectedProduct !== state.selectedProduct ||
    next.cartOpen !== state.cartOpen ||
    next.searchQuery !== state.searchQuery;
  return changed ? Object.freeze(next) : state;
};

/** Opens the detail sheet for a product. */
export const selectProduct = (state: ViewState, product: Product): ViewState =>
  update(state, { selectedProduct: product });

/** Closes the detail sheet and drops the selection. */
export const dismissDetail = (state: ViewState): ViewState => update(state, { selectedProduct: null });

export const openCart = (state: ViewState): ViewState => update(state, { cartOpen: true });

export const closeCart = (state: ViewState): ViewState => update(state, { cartOpen: false });

export const setSearchQuery = (state: ViewState, searchQuery: string): ViewState =>
  update(state, { searchQuery });

export const isDetailOpen = (state: ViewState): boolean => state.selectedProduct !== null;
