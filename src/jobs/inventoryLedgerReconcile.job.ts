import type { InventoryContext } from '../domains/inventory/context';
import { getInventoryContext } from '../domains/inventory/runtime';
import { runLedgerReconcile, type LedgerReconcileSummary } from '../services/inventoryLedgerReconcile.service';
import { listInventoryTenants } from './tenants';

export type LedgerReconcileJobOptions = {
  ctx?: InventoryContext;
  tenantIds?: string[];
  listTenants?: () => Promise<string[]>;
  /** `strict` fails the run when any position disagrees with its movement log. */
  mode?: 'report' | 'strict';
};

export async function runInventoryLedgerReconcile(
  options: LedgerReconcileJobOptions = {}
): Promise<LedgerReconcileSummary[]> {
  const ctx = options.ctx ?? getInventoryContext();
  const mode = options.mode ?? 'report';
  const tenantIds = options.tenantIds ?? (await (options.listTenants ?? listInventoryTenants)());
  const summaries: LedgerReconcileSummary[] = [];

  for (const tenantId of tenantIds) {
    const summary = await runLedgerReconcile(ctx, tenantId);
    summaries.push(summary);
    console.log(`   ${tenantId}: ${summary.positionCount} positions, ${summary.mismatchCount} mismatches`);
  }

  const mismatched = summaries.filter((summary) => summary.mismatchCount > 0);
  if (mode === 'strict' && mismatched.length > 0) {
    throw new Error('LEDGER_RECONCILE_STRICT_FAILED', {
      cause: mismatched.map((summary) => ({ tenantId: summary.tenantId, mismatchCount: summary.mismatchCount }))
    });
  }
  return summaries;
}
