import { promises as fs } from 'fs';
import { join } from 'path';
import { Pool } from 'pg';
import { pool, withTransaction } from './client';
import { logger } from '../utils/logger';

const MIGRATIONS_DIR = join(__dirname, 'migrations');

/**
 * Applies pending .sql files in name order. Each file runs in its own
 * transaction and is recorded in schema_migrations once it succeeds.
 */
export async function applyMigrations(db: Pool = pool, migrationsDir: string = MIGRATIONS_DIR): Promise<string[]> {
     await db.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        name        TEXT        PRIMARY KEY,
        applied_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

     const { rows } = await db.query<{ name: string }>('SELECT name FROM schema_migrations');
     const applied = new Set(rows.map((row) => row.name));

     const files = await fs.readdir(migrationsDir);
     const pending = files.filter((f) => f.endsWith('.sql') && !applied.has(f)).sort();

     logger.info({ pending: pending.length, applied: applied.size }, 'Running database migrations');

     for (const file of pending) {
          const sql = await fs.readFile(join(migrationsDir, file), 'utf-8');

          logger.info({ file }, 'Executing migration');
          await withTransaction(async (client) => {
               await client.query(sql);
               await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
          }, db);
          logger.info({ file }, 'Migration completed');
     }

     return pending;
}

async function runMigrations() {
     try {
          await applyMigrations();
          logger.info('All migrations completed successfully');
     } catch (error) {
          logger.error({ error }, 'Migration failed');
          throw error;
     } finally {
          await pool.end();
     }
}

// Run if executed directly
if (require.main === module) {
     runMigrations().catch((err) => {
          console.error('Migration error:', err);
          process.exit(1);
     });
}

export { runMigrations };
