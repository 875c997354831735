import { promises as fs } from 'fs';
import { join } from 'path';
import { closePool, withTransaction } from './client';
import { logger } from '../utils/logger';

export const MIGRATIONS_DIR = join(__dirname, 'migrations');

export async function listMigrations(dir: string = MIGRATIONS_DIR): Promise<string[]> {
     const files = await fs.readdir(dir);
     return files.filter((f) => f.endsWith('.sql')).sort();
}

// Every file is written with IF NOT EXISTS, so re-running is safe
async function runMigrations(): Promise<void> {
     try {
          const sqlFiles = await listMigrations();

          logger.info({ count: sqlFiles.length }, 'Running database migrations');

          for (const file of sqlFiles) {
               const sql = await fs.readFile(join(MIGRATIONS_DIR, file), 'utf-8');

               logger.info({ file }, 'Executing migration');
               await withTransaction((client) => client.query(sql));
               logger.info({ file }, 'Migration completed');
          }

          logger.info('All migrations completed successfully');
     } catch (error) {
          logger.error({ error }, 'Migration failed');
          throw error;
     } finally {
          await closePool();
     }
}

if (require.main === module) {
     runMigrations().catch((err) => {
          logger.fatal({ err }, 'Migration error');
          process.exit(1);
     });
}

export { runMigrations };
