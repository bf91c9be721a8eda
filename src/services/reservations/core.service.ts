import { v4 as uuidv4 } from 'uuid';
import { EPSILON, roundQuantity } from '../../lib/numbers';
import { runInventoryTransaction, type InventoryContext } from '../../domains/inventory/context';
import { InventoryError } from '../../domains/inventory/errors';
import { requirePositiveQuantity } from '../../domains/inventory/internal/buckets';
import { enqueueReservationChanged } from '../../domains/inventory/outbox';
import type { InventoryClient, ReservationFilter } from '../../domains/inventory/store';
import type {
  Allocation,
  DocumentRef,
  FulfillmentStrategy,
  Reservation,
  ReservationItem,
  ReservationPriority,
  ReservationStatus,
  ReservationType
} from '../../domains/inventory/types';
import { postCommitment } from '../stockLedger.service';
import { recomputeItem, recomputeReservation, settleAllocation } from './status';

export type ReservationItemInput = {
  productId: string;
  variantId?: string | null;
  quantity: number;
  preferredWarehouseId?: string | null;
  preferredLocationId?: string | null;
  preferredBatchId?: string | null;
  qualityGradeRequired?: string | null;
  minShelfLifeDays?: number | null;
  manualPositionIds?: string[];
};

export type CreateReservationInput = {
  reservationType: ReservationType;
  priority?: ReservationPriority;
  strategy?: FulfillmentStrategy;
  warehouseId?: string | null;
  sourceDocument?: DocumentRef | null;
  requiredAt?: Date;
  expiresAt: Date;
  autoReleaseOnExpiry?: boolean;
  autoAllocate?: boolean;
  partialFulfillmentAllowed?: boolean;
  sendExpiryNotifications?: boolean;
  notificationLeadTimeHours?: number;
  notes?: string | null;
  items: ReservationItemInput[];
};

export type ReservationDetail = {
  reservation: Reservation;
  items: ReservationItem[];
  allocations: Allocation[];
};

export async function lockReservationOrThrow(client: InventoryClient, tenantId: string, reservationId: string) {
  const reservation = await client.lockReservation(tenantId, reservationId);
  if (!reservation) {
    throw new InventoryError('RESERVATION_NOT_FOUND', { reservationId });
  }
  return reservation;
}

export async function loadItemOrThrow(client: InventoryClient, tenantId: string, itemId: string) {
  const item = await client.getReservationItem(tenantId, itemId);
  if (!item) {
    throw new InventoryError('RESERVATION_ITEM_NOT_FOUND', { itemId });
  }
  return item;
}

/**
 * Re-derives every item and the reservation from current allocations and
 * persists them. The reservation row must be locked by the caller.
 */
export async function refreshReservationState(
  client: InventoryClient,
  ctx: InventoryContext,
  reservation: Reservation,
  options: { reopenExpired?: boolean; previousStatus?: ReservationStatus } = {}
): Promise<ReservationDetail> {
  const { scales } = ctx.ledger;
  const now = ctx.now();
  const previousStatus = options.previousStatus ?? reservation.status;
  const items = await client.listReservationItems(reservation.tenantId, reservation.id);
  const allocations = await client.listAllocations(reservation.tenantId, { reservationId: reservation.id });
  for (const item of items) {
    recomputeItem(item, allocations, now, scales);
    await client.updateReservationItem(item);
  }
  recomputeReservation(reservation, items, now, scales, options);
  await client.updateReservation(reservation);
  if (reservation.status !== previousStatus) {
    await enqueueReservationChanged(client, reservation, previousStatus);
  }
  return { reservation, items, allocations };
}

export async function createReservation(
  ctx: InventoryContext,
  tenantId: string,
  input: CreateReservationInput
): Promise<ReservationDetail> {
  const { scales } = ctx.ledger;
  const now = ctx.now();
  const requiredAt = input.requiredAt ?? now;
  if (input.items.length === 0) {
    throw new InventoryError('RESERVATION_INVALID', { reason: 'NO_ITEMS' });
  }
  if (input.expiresAt.getTime() <= requiredAt.getTime() || input.expiresAt.getTime() <= now.getTime()) {
    throw new InventoryError('RESERVATION_EXPIRY_INVALID', {
      expiresAt: input.expiresAt.toISOString(),
      requiredAt: requiredAt.toISOString()
    });
  }
  const leadHours = input.notificationLeadTimeHours ?? 24;
  if (!Number.isInteger(leadHours) || leadHours < 0) {
    throw new InventoryError('RESERVATION_INVALID', { notificationLeadTimeHours: leadHours });
  }

  const reservation: Reservation = {
    id: uuidv4(),
    tenantId,
    reservationType: input.reservationType,
    priority: input.priority ?? 'NORMAL',
    strategy: input.strategy ?? 'FIFO',
    status: 'PENDING',
    warehouseId: input.warehouseId ?? null,
    sourceDocument: input.sourceDocument ?? null,
    requiredAt,
    expiresAt: input.expiresAt,
    autoReleaseOnExpiry: input.autoReleaseOnExpiry ?? true,
    autoAllocate: input.autoAllocate ?? false,
    partialFulfillmentAllowed: input.partialFulfillmentAllowed ?? true,
    sendExpiryNotifications: input.sendExpiryNotifications ?? true,
    notificationLeadTimeHours: leadHours,
    lastNotificationSentAt: null,
    escalationRequired: false,
    escalatedTo: null,
    escalationReason: null,
    escalatedAt: null,
    reservedValue: 0,
    fulfilledValue: 0,
    cancellationReason: null,
    cancelledAt: null,
    expiredAt: null,
    fulfilledAt: null,
    notes: input.notes ?? null,
    createdAt: now,
    updatedAt: now
  };

  const items: ReservationItem[] = input.items.map((line, index) => {
    if (line.minShelfLifeDays != null && (!Number.isInteger(line.minShelfLifeDays) || line.minShelfLifeDays < 0)) {
      throw new InventoryError('RESERVATION_INVALID', { lineNumber: index + 1, minShelfLifeDays: line.minShelfLifeDays });
    }
    return {
      id: uuidv4(),
      tenantId,
      reservationId: reservation.id,
      lineNumber: index + 1,
      productId: line.productId,
      variantId: line.variantId ?? null,
      quantityRequested: requirePositiveQuantity(line.quantity, scales),
      quantityReserved: 0,
      quantityAllocated: 0,
      quantityPicked: 0,
      quantityFulfilled: 0,
      quantityBackordered: 0,
      preferredWarehouseId: line.preferredWarehouseId ?? null,
      preferredLocationId: line.preferredLocationId ?? null,
      preferredBatchId: line.preferredBatchId ?? null,
      qualityGradeRequired: line.qualityGradeRequired ?? null,
      minShelfLifeDays: line.minShelfLifeDays ?? null,
      manualPositionIds: line.manualPositionIds ?? [],
      status: 'REQUESTED',
      reservedValue: 0,
      fulfilledValue: 0,
      allocatedAt: null,
      fulfilledAt: null,
      createdAt: now,
      updatedAt: now
    };
  });

  return ctx.store.withTransaction(async (client) => {
    await client.insertReservation(reservation);
    for (const item of items) {
      await client.insertReservationItem(item);
    }
    return { reservation, items, allocations: [] };
  });
}

export async function getReservation(
  ctx: InventoryContext,
  tenantId: string,
  reservationId: string
): Promise<ReservationDetail> {
  return ctx.store.withTransaction(async (client) => {
    const reservation = await client.getReservation(tenantId, reservationId);
    if (!reservation) {
      throw new InventoryError('RESERVATION_NOT_FOUND', { reservationId });
    }
    return {
      reservation,
      items: await client.listReservationItems(tenantId, reservationId),
      allocations: await client.listAllocations(tenantId, { reservationId })
    };
  });
}

export async function listReservations(
  ctx: InventoryContext,
  tenantId: string,
  filter: Pick<ReservationFilter, 'statuses' | 'reservationType' | 'limit'>
): Promise<Reservation[]> {
  return ctx.store.withTransaction((client) => client.listReservations(tenantId, filter));
}

export type ReleasedAllocation = {
  allocationId: string;
  positionId: string;
  quantityReleased: number;
  unreleasedPicked: number;
};

/**
 * Returns held reserved and allocated quantity of one allocation to available
 * stock. Picked quantity stays on the position until it is unpicked.
 */
async function releaseAllocation(
  ctx: InventoryContext,
  tenantId: string,
  reservationId: string,
  allocationId: string,
  reason: string
): Promise<ReleasedAllocation | null> {
  const { scales } = ctx.ledger;
  return runInventoryTransaction(ctx, 'release_allocation', async (client) => {
    const reservation = await lockReservationOrThrow(client, tenantId, reservationId);
    const [allocation] = (await client.listAllocations(tenantId, { reservationId })).filter(
      (row) => row.id === allocationId && row.status === 'ACTIVE'
    );
    if (!allocation) return null;

    const document: DocumentRef = { documentType: 'RESERVATION_ITEM', documentId: allocation.reservationItemId };
    const toRelease = roundQuantity(allocation.quantityHeldReserved + allocation.quantityHeldAllocated, scales);
    if (allocation.quantityHeldAllocated > EPSILON) {
      await postCommitment(client, ctx, tenantId, allocation.positionId, 'DEALLOCATE', {
        quantity: allocation.quantityHeldAllocated,
        reason,
        document
      });
    }
    if (toRelease > EPSILON) {
      await postCommitment(client, ctx, tenantId, allocation.positionId, 'RELEASE', {
        quantity: toRelease,
        reason,
        document
      });
    }
    const unreleasedPicked = allocation.quantityHeldPicked;
    allocation.quantityReleased = roundQuantity(allocation.quantityReleased + toRelease, scales);
    allocation.quantityHeldReserved = 0;
    allocation.quantityHeldAllocated = 0;
    settleAllocation(allocation, scales);
    if (allocation.status === 'ACTIVE') {
      // Only picked stock is left; it stays on the position until returned or shipped elsewhere.
      allocation.status = 'PICKED_UNRELEASED';
    }
    allocation.updatedAt = ctx.now();
    await client.updateAllocation(allocation);
    await refreshReservationState(client, ctx, reservation);
    return {
      allocationId: allocation.id,
      positionId: allocation.positionId,
      quantityReleased: toRelease,
      unreleasedPicked
    };
  });
}

/** Releases every ACTIVE allocation of a reservation, one position per transaction. */
export async function releaseReservationAllocations(
  ctx: InventoryContext,
  tenantId: string,
  reservationId: string,
  reason: string
): Promise<ReleasedAllocation[]> {
  const active = await ctx.store.withTransaction((client) =>
    client.listAllocations(tenantId, { reservationId, status: 'ACTIVE' })
  );
  const released: ReleasedAllocation[] = [];
  for (const allocation of active) {
    const result = await releaseAllocation(ctx, tenantId, reservationId, allocation.id, reason);
    if (result) released.push(result);
  }
  return released;
}

export type CancelResult = ReservationDetail & {
  released: ReleasedAllocation[];
};

export async function markReservationCancelled(
  client: InventoryClient,
  ctx: InventoryContext,
  reservation: Reservation,
  reason: string
): Promise<void> {
  const now = ctx.now();
  const previousStatus = reservation.status;
  reservation.status = 'CANCELLED';
  reservation.cancellationReason = reason;
  reservation.cancelledAt = now;
  reservation.updatedAt = now;
  for (const item of await client.listReservationItems(reservation.tenantId, reservation.id)) {
    if (item.status === 'FULFILLED') continue;
    item.status = 'CANCELLED';
    item.updatedAt = now;
    await client.updateReservationItem(item);
  }
  await client.updateReservation(reservation);
  await enqueueReservationChanged(client, reservation, previousStatus);
}

export async function cancelReservation(
  ctx: InventoryContext,
  tenantId: string,
  reservationId: string,
  input: { reason: string }
): Promise<CancelResult> {
  await runInventoryTransaction(ctx, 'cancel_reservation', async (client) => {
    const reservation = await lockReservationOrThrow(client, tenantId, reservationId);
    if (reservation.status === 'FULFILLED' || reservation.status === 'CANCELLED') {
      throw new InventoryError('RESERVATION_INVALID_STATE', { reservationId, status: reservation.status });
    }
    await markReservationCancelled(client, ctx, reservation, input.reason);
  });
  const released = await releaseReservationAllocations(ctx, tenantId, reservationId, input.reason);
  const detail = await getReservation(ctx, tenantId, reservationId);
  return { ...detail, released };
}

const EXTENDABLE_STATUSES: ReservationStatus[] = ['PENDING', 'ACTIVE', 'PARTIAL_FULFILLED', 'EXPIRED'];

export async function extendExpiry(
  ctx: InventoryContext,
  tenantId: string,
  reservationId: string,
  input: { expiresAt: Date; reason: string }
): Promise<ReservationDetail> {
  return runInventoryTransaction(ctx, 'extend_expiry', async (client) => {
    const now = ctx.now();
    const reservation = await lockReservationOrThrow(client, tenantId, reservationId);
    if (!EXTENDABLE_STATUSES.includes(reservation.status)) {
      throw new InventoryError('RESERVATION_INVALID_STATE', { reservationId, status: reservation.status });
    }
    if (
      input.expiresAt.getTime() <= reservation.expiresAt.getTime() ||
      input.expiresAt.getTime() <= now.getTime()
    ) {
      throw new InventoryError('RESERVATION_EXPIRY_INVALID', {
        reservationId,
        expiresAt: reservation.expiresAt.toISOString(),
        requested: input.expiresAt.toISOString()
      });
    }
    const previousStatus = reservation.status;
    const wasExpired = reservation.status === 'EXPIRED';
    reservation.notes = [reservation.notes, `Expiry extended to ${input.expiresAt.toISOString()}: ${input.reason}`]
      .filter((line): line is string => Boolean(line))
      .join('\n');
    reservation.expiresAt = input.expiresAt;
    if (wasExpired) {
      reservation.expiredAt = null;
    }
    return refreshReservationState(client, ctx, reservation, { reopenExpired: wasExpired, previousStatus });
  });
}

export async function escalateReservation(
  ctx: InventoryContext,
  tenantId: string,
  reservationId: string,
  input: { escalatedTo: string; reason: string }
): Promise<Reservation> {
  return runInventoryTransaction(ctx, 'escalate', async (client) => {
    const now = ctx.now();
    const reservation = await lockReservationOrThrow(client, tenantId, reservationId);
    reservation.escalationRequired = true;
    reservation.escalatedTo = input.escalatedTo;
    reservation.escalationReason = input.reason;
    reservation.escalatedAt = now;
    reservation.updatedAt = now;
    await client.updateReservation(reservation);
    return reservation;
  });
}
