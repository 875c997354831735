// Type definitions for domain models

export interface WebVariant {
     id: number;
     productId: number;
     sizeId: number;
     colorId: number;
     displayedStock: number;
     isActive: boolean;
}

export interface WarehouseVariant {
     id: number;
     productId: number;
     sizeId: number;
     colorId: number;
     branchId: number;
     quantity: number;
}

export type VariantKind = 'web' | 'legacy-warehouse' | 'not_found';

/**
 * Outcome of resolving a variant id of unknown origin.
 *
 * `stockVariantId` names the web variant whose branch assignments are the
 * authoritative stock source; a legacy variant with no active web counterpart
 * has none.
 */
export type VariantResolution =
     | { kind: 'web'; variant: WebVariant; stockVariantId: number }
     | { kind: 'legacy-warehouse'; variant: WarehouseVariant; stockVariantId: number | null }
     | { kind: 'not_found'; variantId: number };

export interface BranchAssignment {
     id: number;
     variantId: number;
     branchId: number;
     assignedQuantity: number;
     createdAt: Date;
     updatedAt: Date;
}

export interface BranchStock {
     branchId: number;
     quantity: number;
}

export type StockLedgerEntryType = 'ASSIGN' | 'ADJUSTMENT' | 'RESERVATION_COMMIT';

export interface DeductOptions {
     preferredBranchId?: number;
     referenceId?: string;
}

export type ReservationStatus = 'active' | 'committed' | 'released' | 'expired';

export interface Reservation {
     id: number;
     saleId: number;
     variantId: number;
     quantity: number;
     reservedAt: Date;
     expiresAt: Date;
     status: ReservationStatus;
     createdAt: Date;
}

export interface ReservationLine {
     variantId: number;
     quantity: number;
}

export interface ReserveStockRequest {
     saleId: number;
     variantId: number;
     quantity: number;
     ttlSeconds?: number;
}

export interface ReserveSaleRequest {
     saleId: number;
     lines: ReservationLine[];
     ttlSeconds?: number;
}

export interface CommitOptions {
     preferredBranchId?: number;
}

export interface CartLineItem {
     id: number;
     cartId: number;
     variantId: number;
     quantity: number;
}

export type CartLineStatus = 'Ok' | 'Insufficient' | 'OrphanedVariant' | 'InactiveVariant';

export interface CartLineValidation {
     cartItemId: number;
     variantId: number;
     requested: number;
     resolvedAs: VariantKind;
     stockVariantId: number | null;
     available: number | null;
     status: CartLineStatus;
}

// Domain events
export type StockEventType =
     | 'StockReserved'
     | 'ReservationCommitted'
     | 'ReservationReleased'
     | 'ReservationExpired';

export interface ReservationEventPayload {
     reservationId: number;
     saleId: number;
     variantId: number;
     quantity: number;
     reason?: string;
     timestamp: string;
}
