import { query } from '../db';

/** Tenants that hold stock or reservations. There is no tenant table of our own. */
export async function listInventoryTenants(): Promise<string[]> {
  const result = await query<{ tenant_id: string }>(
    `SELECT tenant_id FROM stock_positions
      UNION
     SELECT tenant_id FROM reservations
     ORDER BY tenant_id`
  );
  return result.rows.map((row) => row.tenant_id);
}
