import { Pool, QueryResult, QueryResultRow } from 'pg';

let pool: Pool | null = null;

/** The pool is created on first use so modules can be imported without a database. */
export function getPool(): Pool {
  if (pool) return pool;
  if (!process.env.DATABASE_URL) {
    throw new Error('DATABASE_URL must be set before starting the API');
  }
  pool = new Pool({ connectionString: process.env.DATABASE_URL });
  return pool;
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  return getPool().query<T>(text, params);
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = null;
  await current.end();
}
