import { PoolClient } from 'pg';
import { CartLineItem, CartLineValidation, VariantResolution } from '../types/stock.types';
import { logger } from '../utils/logger';
import { ReservationManager } from './reservation-manager';
import { VariantCatalog } from './variant-catalog';

export interface CartConsistencyCheckerOptions {
     catalog?: VariantCatalog;
     reservations?: ReservationManager;
}

export function isCartValid(results: CartLineValidation[]): boolean {
     return results.every((r) => r.status === 'Ok');
}

/**
 * Read-only report on whether every line of a cart can be fulfilled. Every
 * line is evaluated so the shopper sees all problems at once.
 */
export class CartConsistencyChecker {
     private readonly catalog: VariantCatalog;
     private readonly reservations: ReservationManager;

     constructor(options: CartConsistencyCheckerOptions = {}) {
          this.catalog = options.catalog ?? new VariantCatalog();
          this.reservations =
               options.reservations ?? new ReservationManager({ catalog: this.catalog });
     }

     async validateCart(client: PoolClient, cartId: number): Promise<CartLineValidation[]> {
          const { rows } = await client.query<{
               id: number;
               cart_id: number;
               variant_id: number;
               quantity: number;
          }>(
               `
      SELECT id, cart_id, variant_id, quantity
      FROM cart_item
      WHERE cart_id = $1
      ORDER BY id
    `,
               [cartId]
          );

          const items: CartLineItem[] = rows.map((row) => ({
               id: row.id,
               cartId: row.cart_id,
               variantId: row.variant_id,
               quantity: row.quantity,
          }));

          // Several lines may draw on the same stock variant
          const availability = new Map<number, number>();
          const results: CartLineValidation[] = [];

          for (const item of items) {
               const resolution = await this.catalog.resolve(client, item.variantId);
               results.push(await this.validateLine(client, item, resolution, availability));
          }

          const problems = results.filter((r) => r.status !== 'Ok');
          if (problems.length > 0) {
               logger.info(
                    {
                         cartId,
                         lineCount: results.length,
                         problems: problems.map((p) => ({ cartItemId: p.cartItemId, status: p.status })),
                    },
                    'Cart has lines that cannot be fulfilled'
               );
          }

          return results;
     }

     private async validateLine(
          client: PoolClient,
          item: CartLineItem,
          resolution: VariantResolution,
          availability: Map<number, number>
     ): Promise<CartLineValidation> {
          const base = {
               cartItemId: item.id,
               variantId: item.variantId,
               requested: item.quantity,
          };

          if (resolution.kind === 'not_found') {
               return {
                    ...base,
                    resolvedAs: 'not_found',
                    stockVariantId: null,
                    available: null,
                    status: 'OrphanedVariant',
               };
          }

          if (resolution.kind === 'web' && !resolution.variant.isActive) {
               return {
                    ...base,
                    resolvedAs: 'web',
                    stockVariantId: resolution.stockVariantId,
                    available: null,
                    status: 'InactiveVariant',
               };
          }

          const stockVariantId = resolution.stockVariantId;
          let available = 0;

          if (stockVariantId !== null) {
               const cached = availability.get(stockVariantId);
               available = cached ?? (await this.reservations.available(client, stockVariantId));
               availability.set(stockVariantId, available);
          }

          return {
               ...base,
               resolvedAs: resolution.kind,
               stockVariantId,
               available,
               status: item.quantity > available ? 'Insufficient' : 'Ok',
          };
     }
}
