import { closePool, withTransaction } from './client';
import { BranchStockLedger } from '../services/branch-stock-ledger';
import { logger } from '../utils/logger';

const ledger = new BranchStockLedger();

/**
 * Demo data: two branches, three web variants with stock spread across them,
 * one legacy warehouse variant and a cart that mixes both id shapes.
 */
async function seedDatabase(): Promise<void> {
     try {
          logger.info('Seeding database with demo data');

          await withTransaction(async (client) => {
               const { rows: branches } = await client.query<{ id: number }>(`
        INSERT INTO branch (name, address) VALUES
        ('Centro', 'Av. Principal 100'),
        ('Norte', 'Calle 45 #12')
        RETURNING id
      `);

               const { rows: variants } = await client.query<{ id: number }>(`
        INSERT INTO web_variant (product_id, size_id, color_id) VALUES
        (6, 1, 1),
        (6, 2, 1),
        (7, 3, 2)
        ON CONFLICT DO NOTHING
        RETURNING id
      `);

               logger.info({ branches: branches.length, variants: variants.length }, 'Inserted catalog');

               const [centro, norte] = branches.map((b) => b.id);
               for (const [index, variant] of variants.entries()) {
                    await ledger.assign(client, variant.id, centro, 5 + index);
                    await ledger.assign(client, variant.id, norte, 3);
               }

               const { rows: legacy } = await client.query<{ id: number }>(
                    `
        INSERT INTO warehouse_variant (product_id, size_id, color_id, branch_id, quantity)
        VALUES (6, 1, 1, $1, 12)
        RETURNING id
      `,
                    [centro]
               );

               await client.query(
                    `
        INSERT INTO cart_item (cart_id, variant_id, quantity) VALUES
        (1, $1, 2),
        (1, $2, 1)
      `,
                    [variants[0].id, legacy[0].id]
               );

               logger.info('Inserted assignments, legacy variant and demo cart');
          });

          logger.info('Database seeding completed successfully');
     } catch (error) {
          logger.error({ error }, 'Seeding failed');
          throw error;
     } finally {
          await closePool();
     }
}

if (require.main === module) {
     seedDatabase().catch((err) => {
          logger.fatal({ err }, 'Seed error');
          process.exit(1);
     });
}

export { seedDatabase };
