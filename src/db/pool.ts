import { Pool } from "pg";
import { env } from "../config";

let _pool: Pool | undefined;

export function getPool(): Pool {
  if (_pool) return _pool;
  if (!env.DATABASE_URL) throw new Error("Missing env var: DATABASE_URL");
  _pool = new Pool({ connectionString: env.DATABASE_URL });
  return _pool;
}

export async function closePool(): Promise<void> {
  if (!_pool) return;
  const pool = _pool;
  _pool = undefined;
  await pool.end();
}
