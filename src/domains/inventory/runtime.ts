import { getPool } from '../../db';
import { getLedgerPolicy } from '../../config/ledgerPolicy';
import { createInventoryContext, type InventoryContext } from './context';
import { PgInventoryStore } from './internal/pgInventoryStore';

let context: InventoryContext | null = null;

/** Process-wide context for the API and jobs, backed by the shared pool. */
export function getInventoryContext(): InventoryContext {
  if (!context) {
    const ledger = getLedgerPolicy();
    context = createInventoryContext(new PgInventoryStore(getPool(), ledger.positionLockTimeoutMs), { ledger });
  }
  return context;
}
