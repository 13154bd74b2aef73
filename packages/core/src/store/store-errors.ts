/**
 * Store Domain Errors
 *
 * Thrown synchronously by store operations before any state changes.
 * Presentation code maps them to user-facing messages.
 */

export type EntityKind = 'item' | 'customer' | 'inventory record' | 'sales record';

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

export class StoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StoreError';
  }
}

export class ValidationError extends StoreError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends StoreError {
  constructor(
    readonly entity: EntityKind,
    readonly id: string
  ) {
    super(`${capitalize(entity)} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}

export class InsufficientStockError extends StoreError {
  constructor(
    readonly sku: string,
    readonly available: number,
    readonly requested: number
  ) {
    super(`Insufficient stock for ${sku}: ${available} available, ${requested} requested`);
    this.name = 'InsufficientStockError';
  }
}

export class DisabledEntityError extends StoreError {
  constructor(
    readonly entity: 'item' | 'customer',
    readonly id: string
  ) {
    super(`${capitalize(entity)} is disabled: ${id}`);
    this.name = 'DisabledEntityError';
  }
}

export class ReferentialIntegrityError extends StoreError {
  constructor(
    readonly entity: 'item' | 'customer',
    readonly id: string,
    readonly references: number
  ) {
    super(
      `${capitalize(entity)} ${id} is referenced by ${references} active ledger record(s); disable it instead`
    );
    this.name = 'ReferentialIntegrityError';
  }
}
