// Custom error classes for domain-specific errors

import type { ReservationStatus } from '../types/stock.types';

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

export class InvalidQuantityError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_QUANTITY', 400);
     }
}

export class NegativeResultError extends DomainError {
     constructor(
          public readonly variantId: number,
          public readonly branchId: number | null,
          public readonly current: number,
          public readonly delta: number
     ) {
          super(
               branchId === null
                    ? `Cannot deduct ${-delta} from variant ${variantId}: only ${current} assigned across branches`
                    : `Adjustment of ${delta} on variant ${variantId} at branch ${branchId} would leave ${current + delta}`,
               'NEGATIVE_RESULT',
               409
          );
     }
}

export class InsufficientStockError extends DomainError {
     constructor(
          public readonly variantId: number,
          public readonly requested: number,
          public readonly available: number
     ) {
          super(
               `Insufficient stock for variant ${variantId}: requested ${requested}, available ${available}`,
               'INSUFFICIENT_STOCK',
               409
          );
     }
}

export class InvalidTransitionError extends DomainError {
     constructor(
          public readonly reservationId: number,
          public readonly from: ReservationStatus,
          public readonly to: ReservationStatus
     ) {
          super(
               `Reservation ${reservationId} cannot move from ${from} to ${to}`,
               'INVALID_TRANSITION',
               409
          );
     }
}

export class ReservationExpiredError extends DomainError {
     constructor(
          public readonly reservationId: number,
          public readonly expiresAt: Date
     ) {
          super(
               `Reservation ${reservationId} expired at ${expiresAt.toISOString()}`,
               'RESERVATION_EXPIRED',
               410
          );
     }
}

export class OrphanedVariantError extends DomainError {
     constructor(public readonly variantId: number) {
          super(
               `Variant ${variantId} does not resolve to a web or warehouse variant`,
               'ORPHANED_VARIANT',
               422
          );
     }
}

export class InactiveVariantError extends DomainError {
     constructor(public readonly variantId: number) {
          super(`Variant ${variantId} is no longer active`, 'VARIANT_INACTIVE', 409);
     }
}

export class NotFoundError extends DomainError {
     constructor(message: string, code: string = 'NOT_FOUND') {
          super(message, code, 404);
     }
}

export class ReservationNotFoundError extends NotFoundError {
     constructor(public readonly reservationId: number) {
          super(`Reservation ${reservationId} not found`, 'RESERVATION_NOT_FOUND');
     }
}

export class VariantNotFoundError extends NotFoundError {
     constructor(public readonly variantId: number) {
          super(`Variant ${variantId} not found`, 'VARIANT_NOT_FOUND');
     }
}

export class SaleReservationsNotFoundError extends NotFoundError {
     constructor(public readonly saleId: number) {
          super(`Sale ${saleId} has no active reservations`, 'SALE_RESERVATIONS_NOT_FOUND');
     }
}

// Raised at startup when a setting cannot be used; not a request error
export class ConfigurationError extends Error {
     constructor(
          public readonly setting: string,
          public readonly value: unknown
     ) {
          super(`${setting} must be a positive integer, got ${String(value)}`);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}
