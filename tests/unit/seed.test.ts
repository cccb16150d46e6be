import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadSeedEntries, seedStock } from '@stockflow/shared/src/db/seed';
import { StockLedger } from '@stockflow/shared/src/services/stock-ledger';
import { MemoryLedgerStore } from '@stockflow/shared/src/stores/memory-ledger-store';
import { RecordingPublisher } from '../helpers/testUtils';

describe('Seed data', () => {
     it('should load the bundled stock entries', async () => {
          const entries = await loadSeedEntries();

          expect(entries).toHaveLength(20);
          expect(entries[0]).toEqual({
               productId: 1,
               locationId: 1,
               onHand: 150,
               reserved: 25,
               lastCheckedAt: '2025-05-01',
          });
     });

     it('should reject a file with a malformed entry', async () => {
          const dir = await fs.mkdtemp(join(tmpdir(), 'stockflow-seed-'));
          const file = join(dir, 'entries.json');
          await fs.writeFile(file, JSON.stringify([{ productId: 1, locationId: 'A', onHand: 1, reserved: 0 }]));

          try {
               await expect(loadSeedEntries(file)).rejects.toThrow(
                    `Seed file ${file} has an invalid entry at index 0`
               );
          } finally {
               await fs.rm(dir, { recursive: true, force: true });
          }
     });

     it('should provision every entry through the ledger and be repeatable', async () => {
          const ledger = new StockLedger(new MemoryLedgerStore(), new RecordingPublisher());
          const entries = await loadSeedEntries();

          expect(await seedStock(ledger, entries)).toBe(20);
          await seedStock(ledger, entries);

          const level = await ledger.get(1, 1);
          expect(level).toMatchObject({ onHand: 150, reserved: 25, initialOnHand: 150, version: 1 });
          expect(level.lastCheckedAt).toEqual(new Date('2025-05-01'));
          expect(await ledger.listForProduct(7)).toHaveLength(2);
     });
});
