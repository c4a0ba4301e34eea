import type { Bounds } from './types.js';

export type BuyInErrorCode = 'MISSING_FIT' | 'INVALID_RANGE' | 'SHIP_NOT_FOUND' | 'SHIP_EXISTS';

export class BuyInError extends Error {
  constructor(
    readonly code: BuyInErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingFitError extends BuyInError {
  constructor(
    readonly owner: string,
    readonly key: string,
    message = `No fit for ${key} on ${owner}`
  ) {
    super('MISSING_FIT', message);
  }
}

export class InvalidRangeError extends BuyInError {
  constructor(
    readonly field: string,
    readonly value: number,
    readonly bounds: Bounds
  ) {
    super('INVALID_RANGE', `${field} = ${value} is outside [${bounds.min}, ${bounds.max}]`);
  }
}

export class ShipNotFoundError extends BuyInError {
  constructor(readonly shipName: string) {
    super('SHIP_NOT_FOUND', `Ship ${shipName} not found`);
  }
}

export class ShipExistsError extends BuyInError {
  constructor(readonly shipName: string) {
    super('SHIP_EXISTS', `Ship ${shipName} already exists`);
  }
}
