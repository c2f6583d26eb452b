/**
 * Packing error taxonomy
 *
 * InvalidInputError is raised before anything is packed.
 * StockExhaustedError is raised by the allocator and turned into a partial
 * Solution by the engine. Parts that exceed every stock type are never thrown;
 * they are listed in Solution.unplaced.
 */

export type PackingErrorCode = 'INVALID_INPUT' | 'STOCK_EXHAUSTED';

export class PackingError extends Error {
  constructor(
    message: string,
    readonly code: PackingErrorCode,
    readonly statusCode: number
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidInputError extends PackingError {
  constructor(message: string, readonly details?: unknown) {
    super(message, 'INVALID_INPUT', 400);
  }
}

export class StockExhaustedError extends PackingError {
  constructor(message = 'All stock types have zero remaining quantity') {
    super(message, 'STOCK_EXHAUSTED', 409);
  }
}

export function isPackingError(error: unknown): error is PackingError {
  return error instanceof PackingError;
}
