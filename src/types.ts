/** Product data as it is declared in the bundled catalog file. */
export interface ProductSeed {
  name: string;
  price: number;
  imageUrl: string;
  description: string;
  rating: number;
}

export interface Product {
  readonly id: string;
  readonly name: string;
  readonly price: number;
  readonly imageUrl: string;
  readonly description: string;
  readonly rating: number;
}

/**
 * Transient view flags. The detail sheet is open exactly when
 * `selectedProduct` is set.
 */
export interface ViewState {
  readonly selectedProduct: Product | null;
  readonly cartOpen: boolean;
  readonly searchQuery: string;
}

export type ImagePhase = 'loading' | 'loaded' | 'error';

export type CartListener = (count: number) => void;

export type SessionListener = (state: ViewState) => void;
