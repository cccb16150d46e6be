import { promises as fs } from 'fs';
import { join } from 'path';
import { pool } from './client';
import { StockLedger } from '../services/stock-ledger';
import { PgLedgerStore } from '../stores/pg-ledger-store';
import { logger } from '../utils/logger';

export interface SeedStockEntry {
     productId: number;
     locationId: number;
     onHand: number;
     reserved: number;
     lastCheckedAt?: string;
}

const SEED_ACTOR = 'seed';

function isSeedStockEntry(value: unknown): value is SeedStockEntry {
     if (typeof value !== 'object' || value === null) return false;
     const candidate: Record<string, unknown> = { ...value };
     return (
          typeof candidate.productId === 'number' &&
          typeof candidate.locationId === 'number' &&
          typeof candidate.onHand === 'number' &&
          typeof candidate.reserved === 'number' &&
          (candidate.lastCheckedAt === undefined || typeof candidate.lastCheckedAt === 'string')
     );
}

export async function loadSeedEntries(
     filePath: string = join(__dirname, 'seeds', 'stock-entries.json')
): Promise<SeedStockEntry[]> {
     const parsed: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
     if (!Array.isArray(parsed)) {
          throw new Error(`Seed file ${filePath} must contain an array`);
     }

     return parsed.map((item, index) => {
          if (!isSeedStockEntry(item)) {
               throw new Error(`Seed file ${filePath} has an invalid entry at index ${index}`);
          }
          return item;
     });
}

/**
 * Provisions each entry through the ledger. Entries that already exist are
 * left as they are, so seeding twice is harmless.
 */
export async function seedStock(ledger: StockLedger, entries: SeedStockEntry[]): Promise<number> {
     for (const entry of entries) {
          await ledger.provision(
               entry.productId,
               entry.locationId,
               {
                    onHand: entry.onHand,
                    reserved: entry.reserved,
                    lastCheckedAt: entry.lastCheckedAt ? new Date(entry.lastCheckedAt) : undefined,
               },
               SEED_ACTOR
          );
     }
     return entries.length;
}

async function seedDatabase() {
     try {
          logger.info('Seeding database with sample stock');

          const entries = await loadSeedEntries();
          const count = await seedStock(new StockLedger(new PgLedgerStore(pool)), entries);

          logger.info({ count }, 'Database seeding completed successfully');
     } catch (error) {
          logger.error({ error }, 'Seeding failed');
          throw error;
     } finally {
          await pool.end();
     }
}

// Run if executed directly
if (require.main === module) {
     seedDatabase().catch((err) => {
          console.error('Seed error:', err);
          process.exit(1);
     });
}

export { seedDatabase };
