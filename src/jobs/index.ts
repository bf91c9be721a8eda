import { getJobSchedules } from '../config/schedulerStartup';
import { runInventoryLedgerReconcile } from './inventoryLedgerReconcile.job';
import { runReservationExpiryJob } from './reservationExpiry.job';
import { registerJob } from './scheduler';

export function registerInventoryJobs(env: NodeJS.ProcessEnv = process.env): void {
  const schedules = getJobSchedules(env);
  registerJob('reservation-expiry', schedules.reservationExpiry, async () => {
    await runReservationExpiryJob();
  });
  registerJob('inventory-ledger-reconcile', schedules.ledgerReconcile, async () => {
    await runInventoryLedgerReconcile();
  });
}
