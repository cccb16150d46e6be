// Global teardown - the pool is created on import and never connects in tests
export default async function globalTeardown() {
     const { pool } = await import('./services/shared/src/db/client');
     await pool.end();
}
