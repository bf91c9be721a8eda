import { INVENTORY_EVENT, emitInventoryEvent, errorMessage } from '../../observability/inventory.events';
import { runInventoryTransaction, type InventoryContext } from '../../domains/inventory/context';
import { enqueueReservationExpiring } from '../../domains/inventory/outbox';
import type { Reservation } from '../../domains/inventory/types';
import {
  lockReservationOrThrow,
  markReservationCancelled,
  refreshReservationState,
  releaseReservationAllocations
} from './core.service';
import { OPEN_RESERVATION_STATUSES, isOpenReservation } from './status';

const HOUR_MS = 60 * 60 * 1000;

export type ExpirySweepResult = {
  cancelled: number;
  expired: number;
  releasedAllocations: number;
  failed: number;
};

type ExpiryOutcome = 'cancelled' | 'expired' | 'skipped';

/** Re-checks a due reservation under its lock; a concurrent sweep that got there first wins. */
async function expireOne(ctx: InventoryContext, tenantId: string, reservationId: string): Promise<ExpiryOutcome> {
  return runInventoryTransaction(ctx, 'reservation_expiry', async (client) => {
    const now = ctx.now();
    const reservation = await lockReservationOrThrow(client, tenantId, reservationId);
    if (!isOpenReservation(reservation.status) || reservation.expiresAt.getTime() >= now.getTime()) {
      return 'skipped';
    }
    if (reservation.autoReleaseOnExpiry) {
      await markReservationCancelled(client, ctx, reservation, 'EXPIRED');
      return 'cancelled';
    }
    const previousStatus = reservation.status;
    reservation.status = 'EXPIRED';
    reservation.expiredAt = now;
    await refreshReservationState(client, ctx, reservation, { previousStatus });
    return 'expired';
  });
}

async function releaseSafely(
  ctx: InventoryContext,
  tenantId: string,
  reservation: Pick<Reservation, 'id' | 'cancellationReason'>,
  result: ExpirySweepResult
) {
  try {
    const released = await releaseReservationAllocations(
      ctx,
      tenantId,
      reservation.id,
      reservation.cancellationReason ?? 'EXPIRED'
    );
    result.releasedAllocations += released.length;
  } catch (error) {
    result.failed += 1;
    emitInventoryEvent(
      INVENTORY_EVENT.RESERVATION_SWEEP_FAILED,
      { tenantId, reservationId: reservation.id, sweep: 'release', message: errorMessage(error) },
      console.error
    );
  }
}

/**
 * Cancels (auto-release) or expires every open reservation past its expiry,
 * then finishes any release a previous cancellation left behind. One
 * reservation failing does not stop the sweep.
 */
export async function runReservationExpirySweep(ctx: InventoryContext, tenantId: string): Promise<ExpirySweepResult> {
  const result: ExpirySweepResult = { cancelled: 0, expired: 0, releasedAllocations: 0, failed: 0 };
  const due = await ctx.store.withTransaction((client) =>
    client.listReservations(tenantId, { statuses: OPEN_RESERVATION_STATUSES, expiresBefore: ctx.now() })
  );

  for (const reservation of due) {
    let outcome: ExpiryOutcome;
    try {
      outcome = await expireOne(ctx, tenantId, reservation.id);
    } catch (error) {
      result.failed += 1;
      emitInventoryEvent(
        INVENTORY_EVENT.RESERVATION_SWEEP_FAILED,
        { tenantId, reservationId: reservation.id, sweep: 'expiry', message: errorMessage(error) },
        console.error
      );
      continue;
    }
    if (outcome === 'expired') result.expired += 1;
    if (outcome === 'cancelled') {
      result.cancelled += 1;
      await releaseSafely(ctx, tenantId, { id: reservation.id, cancellationReason: 'EXPIRED' }, result);
    }
  }

  const interrupted = await ctx.store.withTransaction((client) =>
    client.listReservations(tenantId, { statuses: ['CANCELLED'], withActiveAllocations: true })
  );
  for (const reservation of interrupted) {
    await releaseSafely(ctx, tenantId, reservation, result);
  }
  return result;
}

export function notificationDueAt(reservation: Reservation): Date {
  return new Date(reservation.expiresAt.getTime() - reservation.notificationLeadTimeHours * HOUR_MS);
}

export function isNotificationDue(reservation: Reservation, now: Date): boolean {
  if (!reservation.sendExpiryNotifications || !isOpenReservation(reservation.status)) return false;
  const dueAt = notificationDueAt(reservation);
  if (now.getTime() < dueAt.getTime()) return false;
  return reservation.lastNotificationSentAt === null || reservation.lastNotificationSentAt.getTime() < dueAt.getTime();
}

export type NotificationSweepResult = {
  notified: number;
  failed: number;
};

/** Enqueues one expiring notice per reservation and expiry date. */
export async function runReservationNotificationSweep(
  ctx: InventoryContext,
  tenantId: string
): Promise<NotificationSweepResult> {
  const result: NotificationSweepResult = { notified: 0, failed: 0 };
  const candidates = await ctx.store.withTransaction((client) =>
    client.listReservations(tenantId, { statuses: OPEN_RESERVATION_STATUSES, sendExpiryNotifications: true })
  );

  for (const candidate of candidates) {
    if (!isNotificationDue(candidate, ctx.now())) continue;
    try {
      const sent = await runInventoryTransaction(ctx, 'reservation_notification', async (client) => {
        const now = ctx.now();
        const reservation = await lockReservationOrThrow(client, tenantId, candidate.id);
        if (!isNotificationDue(reservation, now)) return false;
        await enqueueReservationExpiring(client, reservation, notificationDueAt(reservation));
        reservation.lastNotificationSentAt = now;
        reservation.updatedAt = now;
        await client.updateReservation(reservation);
        return true;
      });
      if (sent) result.notified += 1;
    } catch (error) {
      result.failed += 1;
      emitInventoryEvent(
        INVENTORY_EVENT.RESERVATION_SWEEP_FAILED,
        { tenantId, reservationId: candidate.id, sweep: 'notification', message: errorMessage(error) },
        console.error
      );
    }
  }
  return result;
}
