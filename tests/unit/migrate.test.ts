import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Pool, PoolClient } from 'pg';
import { applyMigrations } from '@stockflow/shared/src/db/migrate';

function createMockPool(applied: string[]) {
     const clientQuery = jest.fn().mockResolvedValue({ rows: [] });
     const poolQuery = jest
          .fn()
          .mockResolvedValueOnce({ rows: [] })
          .mockResolvedValueOnce({ rows: applied.map((name) => ({ name })) });

     const client = { query: clientQuery, release: jest.fn() } as unknown as PoolClient;
     const db = {
          connect: jest.fn().mockResolvedValue(client),
          query: poolQuery,
     } as unknown as Pool;

     return { db, clientQuery };
}

describe('applyMigrations', () => {
     let dir: string;

     beforeEach(async () => {
          dir = await fs.mkdtemp(join(tmpdir(), 'stockflow-migrations-'));
          await fs.writeFile(join(dir, '002_second.sql'), 'SELECT 2;');
          await fs.writeFile(join(dir, '001_first.sql'), 'SELECT 1;');
          await fs.writeFile(join(dir, 'README.txt'), 'not a migration');
     });

     afterEach(async () => {
          await fs.rm(dir, { recursive: true, force: true });
     });

     it('should apply pending files in name order and record them', async () => {
          const { db, clientQuery } = createMockPool([]);

          const applied = await applyMigrations(db, dir);

          expect(applied).toEqual(['001_first.sql', '002_second.sql']);
          expect(clientQuery.mock.calls).toEqual([
               ['BEGIN'],
               ['SELECT 1;'],
               ['INSERT INTO schema_migrations (name) VALUES ($1)', ['001_first.sql']],
               ['COMMIT'],
               ['BEGIN'],
               ['SELECT 2;'],
               ['INSERT INTO schema_migrations (name) VALUES ($1)', ['002_second.sql']],
               ['COMMIT'],
          ]);
     });

     it('should skip files already recorded', async () => {
          const { db } = createMockPool(['001_first.sql']);

          expect(await applyMigrations(db, dir)).toEqual(['002_second.sql']);
     });
});
