import { Pool, PoolClient } from 'pg';
import { checkConnection, withConnection, withTransaction } from '@stockflow/shared/src/db/client';

function createMockPool() {
     const client = {
          query: jest.fn().mockResolvedValue({ rows: [] }),
          release: jest.fn(),
     } as unknown as jest.Mocked<PoolClient>;

     const db = {
          connect: jest.fn().mockResolvedValue(client),
     } as unknown as jest.Mocked<Pool>;

     return { db, client };
}

describe('Database Client', () => {
     describe('checkConnection', () => {
          it('should return true when the database answers', async () => {
               const { db, client } = createMockPool();

               const result = await checkConnection(db);

               expect(result).toBe(true);
               expect(client.query).toHaveBeenCalledWith('SELECT 1');
               expect(client.release).toHaveBeenCalledTimes(1);
          });

          it('should return false when connecting fails', async () => {
               const { db } = createMockPool();
               db.connect.mockRejectedValueOnce(new Error('Connection failed') as never);

               const result = await checkConnection(db);
               expect(result).toBe(false);
          });
     });

     describe('withTransaction', () => {
          it('should execute function within a transaction and commit', async () => {
               const { db, client } = createMockPool();
               const mockFn = jest.fn().mockResolvedValue('success');

               const result = await withTransaction(mockFn, db);

               expect(result).toBe('success');
               expect(mockFn).toHaveBeenCalledWith(client);
               expect(client.query.mock.calls.map((call) => call[0])).toEqual(['BEGIN', 'COMMIT']);
               expect(client.release).toHaveBeenCalledTimes(1);
          });

          it('should rollback transaction on error', async () => {
               const { db, client } = createMockPool();
               const mockFn = jest.fn().mockRejectedValue(new Error('Transaction failed'));

               await expect(withTransaction(mockFn, db)).rejects.toThrow('Transaction failed');

               expect(client.query.mock.calls.map((call) => call[0])).toEqual(['BEGIN', 'ROLLBACK']);
               expect(client.release).toHaveBeenCalledTimes(1);
          });
     });

     describe('withConnection', () => {
          it('should release the client after the callback', async () => {
               const { db, client } = createMockPool();

               const result = await withConnection(async (c) => {
                    expect(c).toBe(client);
                    return 42;
               }, db);

               expect(result).toBe(42);
               expect(client.query).not.toHaveBeenCalled();
               expect(client.release).toHaveBeenCalledTimes(1);
          });

          it('should release the client when the callback throws', async () => {
               const { db, client } = createMockPool();

               await expect(
                    withConnection(async () => {
                         throw new Error('Fail');
                    }, db)
               ).rejects.toThrow('Fail');

               expect(client.release).toHaveBeenCalledTimes(1);
          });
     });
});
