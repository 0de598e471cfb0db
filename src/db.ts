import pkg from 'pg';
const { Pool } = pkg;

export type DatabasePool = InstanceType<typeof Pool>;

export function createPool(connectionString: string): DatabasePool {
  const pool = new Pool({ connectionString });
  pool.on('error', (error) => {
    console.error('[db] idle client error', error);
  });
  return pool;
}

export async function waitForDb(pool: Pick<DatabasePool, 'query'>, retries = 10, delayMs = 3000) {
  let attempt = 0;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    try {
      await pool.query('SELECT 1');
      return;
    } catch (err) {
      attempt += 1;
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[db] connection attempt ${attempt} failed (${message}).`);
      if (attempt >= retries) {
        throw err;
      }
    }
    await new Promise((resolve) => setTimeout(resolve, delayMs));
  }
}
