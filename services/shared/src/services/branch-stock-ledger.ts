import { PoolClient } from 'pg';
import {
     BranchAssignment,
     BranchStock,
     DeductOptions,
     StockLedgerEntryType,
} from '../types/stock.types';
import {
     InvalidQuantityError,
     NegativeResultError,
     VariantNotFoundError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { isNonNegativeInteger, isPositiveInteger, toInt } from '../utils/numbers';

interface AssignmentRow {
     id: number;
     variant_id: number;
     branch_id: number;
     assigned_quantity: number;
     created_at: Date;
     updated_at: Date;
}

/**
 * Order in which a variant-wide deduction draws from branches: the preferred
 * branch first, then the branch holding the most, ties by lowest branch id.
 * Returns null when the branches together hold less than `quantity`.
 */
export function planDeduction(
     assignments: BranchStock[],
     quantity: number,
     preferredBranchId?: number
): BranchStock[] | null {
     const candidates = assignments
          .filter((a) => a.quantity > 0)
          .sort((a, b) => {
               const aPreferred = a.branchId === preferredBranchId ? 0 : 1;
               const bPreferred = b.branchId === preferredBranchId ? 0 : 1;
               if (aPreferred !== bPreferred) return aPreferred - bPreferred;
               if (a.quantity !== b.quantity) return b.quantity - a.quantity;
               return a.branchId - b.branchId;
          });

     const plan: BranchStock[] = [];
     let remaining = quantity;

     for (const candidate of candidates) {
          if (remaining === 0) break;
          const take = Math.min(candidate.quantity, remaining);
          plan.push({ branchId: candidate.branchId, quantity: take });
          remaining -= take;
     }

     return remaining === 0 ? plan : null;
}

export class BranchStockLedger {
     /**
      * Serializes every stock write and availability check for one variant.
      * Must run inside a transaction; the lock is held until it ends.
      */
     async lockVariant(client: PoolClient, variantId: number): Promise<void> {
          const { rows } = await client.query<{ id: number }>(
               `
      SELECT id
      FROM web_variant
      WHERE id = $1
      FOR UPDATE
    `,
               [variantId]
          );

          if (rows.length === 0) {
               throw new VariantNotFoundError(variantId);
          }
     }

     /**
      * Set the quantity assigned to a branch, creating the assignment if needed
      */
     async assign(
          client: PoolClient,
          variantId: number,
          branchId: number,
          quantity: number
     ): Promise<BranchAssignment> {
          if (!isNonNegativeInteger(quantity)) {
               throw new InvalidQuantityError(
                    `Assigned quantity must be a non-negative integer, got ${quantity}`
               );
          }

          await this.lockVariant(client, variantId);

          const previous = await this.findAssignment(client, variantId, branchId);

          const { rows } = await client.query<AssignmentRow>(
               `
      INSERT INTO branch_assignment (variant_id, branch_id, assigned_quantity)
      VALUES ($1, $2, $3)
      ON CONFLICT (variant_id, branch_id) DO UPDATE
      SET assigned_quantity = EXCLUDED.assigned_quantity,
          updated_at = NOW()
      RETURNING id, variant_id, branch_id, assigned_quantity, created_at, updated_at
    `,
               [variantId, branchId, quantity]
          );

          const delta = quantity - (previous ? previous.quantity : 0);
          await this.recordEntry(client, variantId, branchId, 'ASSIGN', delta, null);
          await this.refreshDisplayedStock(client, variantId);

          logger.info({ variantId, branchId, quantity, delta }, 'Branch stock assigned');

          const row = rows[0];
          return {
               id: row.id,
               variantId: row.variant_id,
               branchId: row.branch_id,
               assignedQuantity: row.assigned_quantity,
               createdAt: row.created_at,
               updatedAt: row.updated_at,
          };
     }

     /**
      * Add `delta` to a branch assignment. Nothing is written when the result
      * would drop below zero.
      */
     async adjust(
          client: PoolClient,
          variantId: number,
          branchId: number,
          delta: number,
          referenceId?: string
     ): Promise<number> {
          if (!Number.isInteger(delta)) {
               throw new InvalidQuantityError(`Adjustment must be an integer, got ${delta}`);
          }

          await this.lockVariant(client, variantId);

          const next = await this.applyDelta(
               client,
               variantId,
               branchId,
               delta,
               'ADJUSTMENT',
               referenceId ?? null
          );
          await this.refreshDisplayedStock(client, variantId);

          logger.info({ variantId, branchId, delta, newQuantity: next }, 'Branch stock adjusted');

          return next;
     }

     /**
      * Permanently remove `quantity` units of a variant, drawing from branches
      * in `planDeduction` order
      */
     async deductAcrossBranches(
          client: PoolClient,
          variantId: number,
          quantity: number,
          options: DeductOptions = {}
     ): Promise<BranchStock[]> {
          if (!isPositiveInteger(quantity)) {
               throw new InvalidQuantityError(
                    `Deducted quantity must be a positive integer, got ${quantity}`
               );
          }

          await this.lockVariant(client, variantId);

          const { rows } = await client.query<{ branch_id: number; assigned_quantity: number }>(
               `
      SELECT branch_id, assigned_quantity
      FROM branch_assignment
      WHERE variant_id = $1
      ORDER BY branch_id
      FOR UPDATE
    `,
               [variantId]
          );

          const assignments = rows.map((r) => ({
               branchId: r.branch_id,
               quantity: r.assigned_quantity,
          }));
          const plan = planDeduction(assignments, quantity, options.preferredBranchId);

          if (!plan) {
               const total = assignments.reduce((sum, a) => sum + a.quantity, 0);
               throw new NegativeResultError(variantId, null, total, -quantity);
          }

          for (const step of plan) {
               await this.applyDelta(
                    client,
                    variantId,
                    step.branchId,
                    -step.quantity,
                    'RESERVATION_COMMIT',
                    options.referenceId ?? null
               );
          }
          await this.refreshDisplayedStock(client, variantId);

          logger.info({ variantId, quantity, plan }, 'Stock deducted across branches');

          return plan;
     }

     async totalAssigned(client: PoolClient, variantId: number): Promise<number> {
          const { rows } = await client.query<{ total: string | number }>(
               `
      SELECT COALESCE(SUM(assigned_quantity), 0) AS total
      FROM branch_assignment
      WHERE variant_id = $1
    `,
               [variantId]
          );

          return rows.length > 0 ? toInt(rows[0].total) : 0;
     }

     async perBranch(client: PoolClient, variantId: number): Promise<BranchStock[]> {
          const { rows } = await client.query<{ branch_id: number; assigned_quantity: number }>(
               `
      SELECT branch_id, assigned_quantity
      FROM branch_assignment
      WHERE variant_id = $1
      ORDER BY branch_id ASC
    `,
               [variantId]
          );

          return rows.map((row) => ({
               branchId: row.branch_id,
               quantity: row.assigned_quantity,
          }));
     }

     private async findAssignment(
          client: PoolClient,
          variantId: number,
          branchId: number
     ): Promise<{ id: number; quantity: number } | null> {
          const { rows } = await client.query<{ id: number; assigned_quantity: number }>(
               `
      SELECT id, assigned_quantity
      FROM branch_assignment
      WHERE variant_id = $1 AND branch_id = $2
      FOR UPDATE
    `,
               [variantId, branchId]
          );

          return rows.length > 0 ? { id: rows[0].id, quantity: rows[0].assigned_quantity } : null;
     }

     // Caller holds the variant lock
     private async applyDelta(
          client: PoolClient,
          variantId: number,
          branchId: number,
          delta: number,
          type: StockLedgerEntryType,
          referenceId: string | null
     ): Promise<number> {
          const current = await this.findAssignment(client, variantId, branchId);
          const currentQuantity = current ? current.quantity : 0;
          const next = currentQuantity + delta;

          if (next < 0) {
               throw new NegativeResultError(variantId, branchId, currentQuantity, delta);
          }

          if (current) {
               await client.query(
                    `
        UPDATE branch_assignment
        SET assigned_quantity = $1,
            updated_at = NOW()
        WHERE id = $2
      `,
                    [next, current.id]
               );
          } else {
               await client.query(
                    `
        INSERT INTO branch_assignment (variant_id, branch_id, assigned_quantity)
        VALUES ($1, $2, $3)
      `,
                    [variantId, branchId, next]
               );
          }

          await this.recordEntry(client, variantId, branchId, type, delta, referenceId);

          logger.debug(
               { variantId, branchId, delta, previous: currentQuantity, next },
               'Branch assignment updated'
          );

          return next;
     }

     private async recordEntry(
          client: PoolClient,
          variantId: number,
          branchId: number,
          type: StockLedgerEntryType,
          delta: number,
          referenceId: string | null
     ): Promise<void> {
          await client.query(
               `
      INSERT INTO stock_ledger (
        variant_id,
        branch_id,
        type,
        quantity_delta,
        reference_id
      ) VALUES ($1, $2, $3, $4, $5)
    `,
               [variantId, branchId, type, delta, referenceId]
          );
     }

     // displayed_stock is a cached hint for the storefront, never read for availability
     private async refreshDisplayedStock(client: PoolClient, variantId: number): Promise<void> {
          await client.query(
               `
      UPDATE web_variant
      SET displayed_stock = (
        SELECT COALESCE(SUM(assigned_quantity), 0)
        FROM branch_assignment
        WHERE variant_id = $1
      )
      WHERE id = $1
    `,
               [variantId]
          );
     }
}
