export type StoreErrorKind = 'out-of-range' | 'unknown-product';

/**
 * Base class for failures raised by catalog and cart operations.
 */
export class StoreError extends Error {
  public readonly kind: StoreErrorKind;

  public constructor(kind: StoreErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class CartError extends StoreError {}

export class CatalogError extends StoreError {}
