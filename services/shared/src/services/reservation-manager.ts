import { PoolClient } from 'pg';
import {
     CommitOptions,
     Reservation,
     ReservationEventPayload,
     ReservationLine,
     ReservationStatus,
     ReserveSaleRequest,
     ReserveStockRequest,
     StockEventType,
     VariantResolution,
} from '../types/stock.types';
import {
     InactiveVariantError,
     InsufficientStockError,
     InvalidQuantityError,
     InvalidTransitionError,
     OrphanedVariantError,
     ReservationExpiredError,
     ReservationNotFoundError,
     SaleReservationsNotFoundError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { positiveIntSetting } from '../utils/config';
import { isPositiveInteger, toInt } from '../utils/numbers';
import { BranchStockLedger } from './branch-stock-ledger';
import { VariantCatalog } from './variant-catalog';

const RESERVATION_COLUMNS = 'id, sale_id, variant_id, quantity, reserved_at, expires_at, status, created_at';

interface ReservationRow {
     id: number;
     sale_id: number;
     variant_id: number;
     quantity: number;
     reserved_at: Date;
     expires_at: Date;
     status: ReservationStatus;
     created_at: Date;
}

export interface ReservationManagerOptions {
     ledger?: BranchStockLedger;
     catalog?: VariantCatalog;
     now?: () => Date;
     defaultTtlSeconds?: number;
}

function mapReservation(row: ReservationRow): Reservation {
     return {
          id: row.id,
          saleId: row.sale_id,
          variantId: row.variant_id,
          quantity: row.quantity,
          reservedAt: row.reserved_at,
          expiresAt: row.expires_at,
          status: row.status,
          createdAt: row.created_at,
     };
}

export class ReservationManager {
     private readonly ledger: BranchStockLedger;
     private readonly catalog: VariantCatalog;
     private readonly now: () => Date;
     private readonly defaultTtlSeconds: number;

     constructor(options: ReservationManagerOptions = {}) {
          this.ledger = options.ledger ?? new BranchStockLedger();
          this.catalog = options.catalog ?? new VariantCatalog();
          this.now = options.now ?? (() => new Date());
          this.defaultTtlSeconds = positiveIntSetting(
               'RESERVATION_TTL_SECONDS',
               options.defaultTtlSeconds,
               1800
          );
     }

     /**
      * Units of a web variant that can still be reserved: everything assigned
      * to branches minus what active reservations hold
      */
     async available(client: PoolClient, variantId: number): Promise<number> {
          const assigned = await this.ledger.totalAssigned(client, variantId);
          const reserved = await this.activeReservedQuantity(client, variantId);
          return assigned - reserved;
     }

     async activeReservedQuantity(client: PoolClient, variantId: number): Promise<number> {
          const { rows } = await client.query<{ reserved: string | number }>(
               `
      SELECT COALESCE(SUM(quantity), 0) AS reserved
      FROM stock_reservation
      WHERE variant_id = $1 AND status = 'active'
    `,
               [variantId]
          );

          return rows.length > 0 ? toInt(rows[0].reserved) : 0;
     }

     /**
      * Hold stock of one variant for a sale
      */
     async reserve(client: PoolClient, request: ReserveStockRequest): Promise<Reservation> {
          const [reservation] = await this.reserveForSale(client, {
               saleId: request.saleId,
               lines: [{ variantId: request.variantId, quantity: request.quantity }],
               ttlSeconds: request.ttlSeconds,
          });
          return reservation;
     }

     /**
      * Hold stock for every line of a sale, or for none of them
      */
     async reserveForSale(client: PoolClient, request: ReserveSaleRequest): Promise<Reservation[]> {
          const { saleId, lines } = request;
          const ttlSeconds = request.ttlSeconds ?? this.defaultTtlSeconds;

          logger.info({ saleId, lineCount: lines.length, ttlSeconds }, 'Reserving stock for sale');

          if (lines.length === 0) {
               throw new InvalidQuantityError('Sale must reserve at least one line');
          }

          for (const line of lines) {
               if (!isPositiveInteger(line.quantity)) {
                    throw new InvalidQuantityError(
                         `Quantity must be a positive integer for variant ${line.variantId}`
                    );
               }
          }

          if (!isPositiveInteger(ttlSeconds)) {
               throw new InvalidQuantityError(
                    `Reservation TTL must be a positive number of seconds, got ${ttlSeconds}`
               );
          }

          // Reservations are always held against the web variant that owns the stock
          const resolvedLines: Array<{ line: ReservationLine; stockVariantId: number }> = [];
          for (const line of lines) {
               const resolution = await this.catalog.resolve(client, line.variantId);
               resolvedLines.push({ line, stockVariantId: this.stockVariantFor(resolution, line) });
          }

          const requested = new Map<number, number>();
          for (const { line, stockVariantId } of resolvedLines) {
               requested.set(stockVariantId, (requested.get(stockVariantId) ?? 0) + line.quantity);
          }

          // Ascending lock order keeps concurrent multi-line sales from deadlocking
          const variantIds = [...requested.keys()].sort((a, b) => a - b);
          for (const variantId of variantIds) {
               await this.ledger.lockVariant(client, variantId);
          }

          for (const variantId of variantIds) {
               const quantity = requested.get(variantId) ?? 0;
               const available = await this.available(client, variantId);
               if (quantity > available) {
                    throw new InsufficientStockError(variantId, quantity, available);
               }
          }

          const reservedAt = this.now();
          const expiresAt = new Date(reservedAt.getTime() + ttlSeconds * 1000);
          const reservations: Reservation[] = [];

          for (const { line, stockVariantId } of resolvedLines) {
               const { rows } = await client.query<ReservationRow>(
                    `
        INSERT INTO stock_reservation (
          sale_id,
          variant_id,
          quantity,
          reserved_at,
          expires_at,
          status
        ) VALUES ($1, $2, $3, $4, $5, 'active')
        RETURNING ${RESERVATION_COLUMNS}
      `,
                    [saleId, stockVariantId, line.quantity, reservedAt, expiresAt]
               );

               const reservation = mapReservation(rows[0]);
               await this.recordEvent(client, 'StockReserved', reservation);
               reservations.push(reservation);

               logger.debug(
                    {
                         saleId,
                         reservationId: reservation.id,
                         variantId: stockVariantId,
                         quantity: line.quantity,
                    },
                    'Stock reserved'
               );
          }

          logger.info({ saleId, expiresAt: expiresAt.toISOString() }, 'Sale stock reserved');

          return reservations;
     }

     /**
      * Turn a hold into a sale: stock leaves the branch ledger and the
      * reservation becomes committed, both inside the caller's transaction.
      *
      * Locks the variant before the reservation, the same order reserve and
      * commitSale use.
      */
     async commit(
          client: PoolClient,
          reservationId: number,
          options: CommitOptions = {}
     ): Promise<Reservation> {
          const current = await this.getReservation(client, reservationId);
          if (!current) {
               throw new ReservationNotFoundError(reservationId);
          }

          await this.ledger.lockVariant(client, current.variantId);
          const reservation = await this.lockReservation(client, reservationId);

          if (reservation.status !== 'active') {
               throw new InvalidTransitionError(reservationId, reservation.status, 'committed');
          }

          if (this.now().getTime() >= reservation.expiresAt.getTime()) {
               throw new ReservationExpiredError(reservationId, reservation.expiresAt);
          }

          // Decrement first so a committed row always has its stock removed
          await this.ledger.deductAcrossBranches(client, reservation.variantId, reservation.quantity, {
               preferredBranchId: options.preferredBranchId,
               referenceId: `reservation:${reservationId}`,
          });

          await this.updateStatus(client, reservationId, 'committed');

          const committed: Reservation = { ...reservation, status: 'committed' };
          await this.recordEvent(client, 'ReservationCommitted', committed);

          logger.info(
               { reservationId, saleId: reservation.saleId, quantity: reservation.quantity },
               'Reservation committed'
          );

          return committed;
     }

     /**
      * Give a hold back without touching the ledger
      */
     async release(client: PoolClient, reservationId: number, reason?: string): Promise<Reservation> {
          const reservation = await this.lockReservation(client, reservationId);

          if (reservation.status !== 'active') {
               throw new InvalidTransitionError(reservationId, reservation.status, 'released');
          }

          await this.updateStatus(client, reservationId, 'released');

          const released: Reservation = { ...reservation, status: 'released' };
          await this.recordEvent(client, 'ReservationReleased', released, reason || 'SALE_CANCELLED');

          logger.info({ reservationId, saleId: reservation.saleId, reason }, 'Reservation released');

          return released;
     }

     async commitSale(
          client: PoolClient,
          saleId: number,
          options: CommitOptions = {}
     ): Promise<Reservation[]> {
          const active = await this.activeReservationsForSale(client, saleId);

          const variantIds = [...new Set(active.map((r) => r.variantId))].sort((a, b) => a - b);
          for (const variantId of variantIds) {
               await this.ledger.lockVariant(client, variantId);
          }

          const committed: Reservation[] = [];
          for (const { id } of active) {
               committed.push(await this.commit(client, id, options));
          }
          return committed;
     }

     async releaseSale(client: PoolClient, saleId: number, reason?: string): Promise<Reservation[]> {
          const active = await this.activeReservationsForSale(client, saleId);
          const released: Reservation[] = [];
          for (const { id } of active) {
               released.push(await this.release(client, id, reason));
          }
          return released;
     }

     /**
      * Expire every active reservation whose window has closed. Rows locked by
      * an in-flight commit or release are left for the next run.
      */
     async sweepExpired(
          client: PoolClient,
          now: Date = this.now(),
          limit: number = 500
     ): Promise<Reservation[]> {
          const { rows } = await client.query<ReservationRow>(
               `
      UPDATE stock_reservation
      SET status = 'expired',
          updated_at = NOW()
      WHERE id IN (
        SELECT id
        FROM stock_reservation
        WHERE status = 'active' AND expires_at <= $1
        ORDER BY expires_at
        LIMIT $2
        FOR UPDATE SKIP LOCKED
      )
      AND status = 'active'
      RETURNING ${RESERVATION_COLUMNS}
    `,
               [now, limit]
          );

          const expired = rows.map(mapReservation);

          for (const reservation of expired) {
               await this.recordEvent(client, 'ReservationExpired', reservation, 'TTL_ELAPSED');
          }

          if (expired.length > 0) {
               logger.info(
                    { expiredCount: expired.length, now: now.toISOString() },
                    'Expired reservations swept'
               );
          }

          return expired;
     }

     async getReservation(client: PoolClient, reservationId: number): Promise<Reservation | null> {
          const { rows } = await client.query<ReservationRow>(
               `
      SELECT ${RESERVATION_COLUMNS}
      FROM stock_reservation
      WHERE id = $1
    `,
               [reservationId]
          );

          return rows.length > 0 ? mapReservation(rows[0]) : null;
     }

     async listActiveForVariant(client: PoolClient, variantId: number): Promise<Reservation[]> {
          const { rows } = await client.query<ReservationRow>(
               `
      SELECT ${RESERVATION_COLUMNS}
      FROM stock_reservation
      WHERE variant_id = $1 AND status = 'active'
      ORDER BY expires_at ASC, id ASC
    `,
               [variantId]
          );

          return rows.map(mapReservation);
     }

     private stockVariantFor(resolution: VariantResolution, line: ReservationLine): number {
          switch (resolution.kind) {
               case 'not_found':
                    throw new OrphanedVariantError(line.variantId);
               case 'web':
                    if (!resolution.variant.isActive) {
                         throw new InactiveVariantError(line.variantId);
                    }
                    return resolution.stockVariantId;
               case 'legacy-warehouse':
                    if (resolution.stockVariantId === null) {
                         // No web counterpart means nothing is assigned to the web channel
                         throw new InsufficientStockError(line.variantId, line.quantity, 0);
                    }
                    return resolution.stockVariantId;
          }
     }

     private async lockReservation(client: PoolClient, reservationId: number): Promise<Reservation> {
          const { rows } = await client.query<ReservationRow>(
               `
      SELECT ${RESERVATION_COLUMNS}
      FROM stock_reservation
      WHERE id = $1
      FOR UPDATE
    `,
               [reservationId]
          );

          if (rows.length === 0) {
               throw new ReservationNotFoundError(reservationId);
          }

          return mapReservation(rows[0]);
     }

     // Variant order, so a sale locks its variants the way reserveForSale does
     private async activeReservationsForSale(
          client: PoolClient,
          saleId: number
     ): Promise<Array<{ id: number; variantId: number }>> {
          const { rows } = await client.query<{ id: number; variant_id: number }>(
               `
      SELECT id, variant_id
      FROM stock_reservation
      WHERE sale_id = $1 AND status = 'active'
      ORDER BY variant_id, id
    `,
               [saleId]
          );

          if (rows.length === 0) {
               throw new SaleReservationsNotFoundError(saleId);
          }

          return rows
               .map((r) => ({ id: r.id, variantId: r.variant_id }))
               .sort((a, b) => a.variantId - b.variantId || a.id - b.id);
     }

     private async updateStatus(
          client: PoolClient,
          reservationId: number,
          status: ReservationStatus
     ): Promise<void> {
          await client.query(
               `
      UPDATE stock_reservation
      SET status = $2,
          updated_at = NOW()
      WHERE id = $1
    `,
               [reservationId, status]
          );
     }

     private async recordEvent(
          client: PoolClient,
          type: StockEventType,
          reservation: Reservation,
          reason?: string
     ): Promise<void> {
          const payload: ReservationEventPayload = {
               reservationId: reservation.id,
               saleId: reservation.saleId,
               variantId: reservation.variantId,
               quantity: reservation.quantity,
               reason,
               timestamp: new Date().toISOString(),
          };

          await client.query(
               `
      INSERT INTO domain_event (type, payload)
      VALUES ($1, $2::jsonb)
    `,
               [type, JSON.stringify(payload)]
          );
     }
}
