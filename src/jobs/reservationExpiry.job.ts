import type { InventoryContext } from '../domains/inventory/context';
import { getInventoryContext } from '../domains/inventory/runtime';
import {
  runReservationExpirySweep,
  runReservationNotificationSweep,
  type ExpirySweepResult,
  type NotificationSweepResult
} from '../services/reservations/expiry.service';
import { listInventoryTenants } from './tenants';

export type ReservationSweepSummary = {
  tenantId: string;
  expiry: ExpirySweepResult;
  notifications: NotificationSweepResult;
};

export type ReservationSweepJobOptions = {
  ctx?: InventoryContext;
  tenantIds?: string[];
  listTenants?: () => Promise<string[]>;
};

/**
 * Expires overdue reservations, then sends due expiry notices, tenant by
 * tenant. A tenant whose sweep throws does not stop the others.
 */
export async function runReservationExpiryJob(
  options: ReservationSweepJobOptions = {}
): Promise<ReservationSweepSummary[]> {
  const ctx = options.ctx ?? getInventoryContext();
  const tenantIds = options.tenantIds ?? (await (options.listTenants ?? listInventoryTenants)());
  const summaries: ReservationSweepSummary[] = [];
  const failures: { tenantId: string; error: unknown }[] = [];

  for (const tenantId of tenantIds) {
    try {
      const expiry = await runReservationExpirySweep(ctx, tenantId);
      const notifications = await runReservationNotificationSweep(ctx, tenantId);
      summaries.push({ tenantId, expiry, notifications });
      if (expiry.expired + expiry.cancelled + notifications.notified > 0) {
        console.log(
          `   ${tenantId}: ${expiry.cancelled} cancelled, ${expiry.expired} expired, ` +
            `${expiry.releasedAllocations} allocations released, ${notifications.notified} notified`
        );
      }
    } catch (error) {
      console.error(`   ${tenantId}: reservation sweep failed`, error);
      failures.push({ tenantId, error });
    }
  }

  if (failures.length > 0) {
    throw new Error(`Reservation sweep failed for ${failures.length} tenant(s)`, { cause: failures });
  }
  return summaries;
}
