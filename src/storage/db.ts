import { Pool } from 'pg';

let pool: Pool | null = null;

export function getPool(databaseUrl: string): Pool {
  if (!pool) {
    pool = new Pool({ connectionString: databaseUrl });
  }
  return pool;
}

export async function disconnectPool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
