import { PoolClient } from 'pg';
import { VariantResolution } from '../types/stock.types';
import { logger } from '../utils/logger';

interface WebVariantRow {
     id: number;
     product_id: number;
     size_id: number;
     color_id: number;
     displayed_stock: number;
     is_active: boolean;
}

interface WarehouseVariantRow {
     id: number;
     product_id: number;
     size_id: number;
     color_id: number;
     branch_id: number;
     quantity: number;
     web_variant_id: number | null;
}

/**
 * Carts and sales created before web variants existed still carry ids from
 * the warehouse variant table. This is the only place that knows both shapes.
 */
export class VariantCatalog {
     /**
      * Resolve a variant id: web variants first, then legacy warehouse variants
      */
     async resolve(client: PoolClient, variantId: number): Promise<VariantResolution> {
          const { rows: webRows } = await client.query<WebVariantRow>(
               `
      SELECT id, product_id, size_id, color_id, displayed_stock, is_active
      FROM web_variant
      WHERE id = $1
    `,
               [variantId]
          );

          if (webRows.length > 0) {
               const row = webRows[0];
               return {
                    kind: 'web',
                    stockVariantId: row.id,
                    variant: {
                         id: row.id,
                         productId: row.product_id,
                         sizeId: row.size_id,
                         colorId: row.color_id,
                         displayedStock: row.displayed_stock,
                         isActive: row.is_active,
                    },
               };
          }

          // Legacy ids map onto the active web variant with the same product, size and color
          const { rows: warehouseRows } = await client.query<WarehouseVariantRow>(
               `
      SELECT
        wh.id,
        wh.product_id,
        wh.size_id,
        wh.color_id,
        wh.branch_id,
        wh.quantity,
        wv.id AS web_variant_id
      FROM warehouse_variant wh
      LEFT JOIN web_variant wv
        ON wv.product_id = wh.product_id
       AND wv.size_id = wh.size_id
       AND wv.color_id = wh.color_id
       AND wv.is_active
      WHERE wh.id = $1
      LIMIT 1
    `,
               [variantId]
          );

          if (warehouseRows.length > 0) {
               const row = warehouseRows[0];
               logger.debug(
                    { variantId, webVariantId: row.web_variant_id },
                    'Resolved legacy warehouse variant'
               );
               return {
                    kind: 'legacy-warehouse',
                    stockVariantId: row.web_variant_id,
                    variant: {
                         id: row.id,
                         productId: row.product_id,
                         sizeId: row.size_id,
                         colorId: row.color_id,
                         branchId: row.branch_id,
                         quantity: row.quantity,
                    },
               };
          }

          return { kind: 'not_found', variantId };
     }
}
