import { getBackorderPolicy, type BackorderPolicy } from '../../config/backorderPolicy';
import { getLedgerPolicy, type LedgerPolicy } from '../../config/ledgerPolicy';
import { retryWithBackoff } from '../../lib/timeouts';
import { INVENTORY_EVENT, emitInventoryEvent } from '../../observability/inventory.events';
import { isTransientInventoryError } from './errors';
import type { InventoryClient, InventoryStore } from './store';

/**
 * Everything a ledger or reservation operation needs besides its arguments.
 * Services receive it explicitly; nothing here is process-global.
 */
export type InventoryContext = {
  store: InventoryStore;
  ledger: LedgerPolicy;
  backorders: BackorderPolicy;
  now: () => Date;
};

export function createInventoryContext(
  store: InventoryStore,
  overrides: Partial<Omit<InventoryContext, 'store'>> = {}
): InventoryContext {
  return {
    store,
    ledger: overrides.ledger ?? getLedgerPolicy(),
    backorders: overrides.backorders ?? getBackorderPolicy(),
    now: overrides.now ?? (() => new Date())
  };
}

/** One transaction, retried while the position lock cannot be taken in time. */
export function runInventoryTransaction<T>(
  ctx: InventoryContext,
  label: string,
  handler: (client: InventoryClient) => Promise<T>
): Promise<T> {
  return retryWithBackoff(() => ctx.store.withTransaction(handler), {
    attempts: ctx.ledger.lockRetryAttempts,
    baseMs: ctx.ledger.lockRetryBaseMs,
    shouldRetry: isTransientInventoryError,
    onRetry: (attempt, delayMs) => emitInventoryEvent(INVENTORY_EVENT.LOCK_RETRY, { label, attempt, delayMs })
  });
}
