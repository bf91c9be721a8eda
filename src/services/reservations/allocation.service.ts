import { v4 as uuidv4 } from 'uuid';
import { EPSILON, roundQuantity, roundUnitCost } from '../../lib/numbers';
import { INVENTORY_EVENT, emitInventoryEvent, errorMessage } from '../../observability/inventory.events';
import { runInventoryTransaction, type InventoryContext } from '../../domains/inventory/context';
import { InventoryError, isInventoryError } from '../../domains/inventory/errors';
import type { InventoryClient } from '../../domains/inventory/store';
import type { Allocation, DocumentRef, Reservation, ReservationItem } from '../../domains/inventory/types';
import { postCommitment } from '../stockLedger.service';
import {
  getReservation,
  loadItemOrThrow,
  lockReservationOrThrow,
  refreshReservationState,
  type ReservationDetail
} from './core.service';
import { committedToItem, isOpenReservation, settleAllocation } from './status';
import { criteriaForItem, selectCandidates } from './strategies';

export type AllocateReservationOptions = {
  /** Take reserved stock through to allocated. Defaults to the reservation's autoAllocate flag. */
  commit?: boolean;
  signal?: AbortSignal;
  /** Position order for MANUAL items that carry none of their own. */
  manualPositionIds?: string[];
};

type WalkStep = {
  allocationId: string;
  positionId: string;
  itemId: string;
  reserved: number;
  allocated: number;
  promoted: number;
};

function itemDocument(itemId: string): DocumentRef {
  return { documentType: 'RESERVATION_ITEM', documentId: itemId };
}

function throwIfAborted(signal: AbortSignal | undefined, reservationId: string) {
  if (signal?.aborted) {
    throw new InventoryError('ALLOCATION_ABORTED', { reservationId }, { cause: signal.reason });
  }
}

async function lockOpenReservation(client: InventoryClient, tenantId: string, reservationId: string) {
  const reservation = await lockReservationOrThrow(client, tenantId, reservationId);
  if (!isOpenReservation(reservation.status)) {
    throw new InventoryError('RESERVATION_INVALID_STATE', { reservationId, status: reservation.status });
  }
  return reservation;
}

function newAllocation(reservation: Reservation, item: ReservationItem, positionId: string, unitCost: number, now: Date) {
  const allocation: Allocation = {
    id: uuidv4(),
    tenantId: reservation.tenantId,
    reservationId: reservation.id,
    reservationItemId: item.id,
    positionId,
    quantityAllocated: 0,
    quantityHeldReserved: 0,
    quantityHeldAllocated: 0,
    quantityHeldPicked: 0,
    quantityFulfilled: 0,
    quantityReleased: 0,
    quantityRemaining: 0,
    unitCost,
    fulfilledCost: 0,
    status: 'ACTIVE',
    createdAt: now,
    updatedAt: now
  };
  return allocation;
}

/** Moves an item's reserved-stage holdings to allocated, one position per transaction. */
async function promoteHeldReserved(
  ctx: InventoryContext,
  tenantId: string,
  reservationId: string,
  itemId: string,
  steps: WalkStep[]
) {
  const { scales } = ctx.ledger;
  const held = await ctx.store.withTransaction((client) =>
    client.listAllocations(tenantId, { reservationItemId: itemId, status: 'ACTIVE' })
  );
  for (const candidate of held) {
    if (candidate.quantityHeldReserved <= EPSILON) continue;
    const step = await runInventoryTransaction(ctx, 'promote_allocation', async (client) => {
      const reservation = await lockOpenReservation(client, tenantId, reservationId);
      const [allocation] = (await client.listAllocations(tenantId, { reservationItemId: itemId, status: 'ACTIVE' })).filter(
        (row) => row.id === candidate.id
      );
      if (!allocation || allocation.quantityHeldReserved <= EPSILON) return null;
      const quantity = allocation.quantityHeldReserved;
      await postCommitment(client, ctx, tenantId, allocation.positionId, 'ALLOCATE', {
        quantity,
        reason: 'RESERVATION_COMMIT',
        document: itemDocument(itemId)
      });
      allocation.quantityHeldReserved = 0;
      allocation.quantityHeldAllocated = roundQuantity(allocation.quantityHeldAllocated + quantity, scales);
      allocation.updatedAt = ctx.now();
      await client.updateAllocation(settleAllocation(allocation, scales));
      await refreshReservationState(client, ctx, reservation);
      return {
        allocationId: allocation.id,
        positionId: allocation.positionId,
        itemId,
        reserved: 0,
        allocated: 0,
        promoted: quantity
      };
    });
    if (step) steps.push(step);
  }
}

/**
 * One step of the walk: under the reservation lock and then the position lock,
 * takes min(remaining demand, available) from a single candidate position.
 */
async function allocateFromPosition(
  ctx: InventoryContext,
  tenantId: string,
  reservationId: string,
  itemId: string,
  positionId: string,
  commit: boolean
): Promise<WalkStep | null> {
  const { scales } = ctx.ledger;
  return runInventoryTransaction(ctx, 'allocate_step', async (client) => {
    const reservation = await lockOpenReservation(client, tenantId, reservationId);
    const item = await loadItemOrThrow(client, tenantId, itemId);
    const itemAllocations = await client.listAllocations(tenantId, { reservationItemId: itemId });
    const demand = roundQuantity(item.quantityRequested - committedToItem(itemAllocations, scales), scales);
    if (demand <= EPSILON) return null;

    const position = await client.lockPosition(tenantId, positionId);
    if (!position || !position.isActive || position.isDeleted) return null;
    const quantity = roundQuantity(Math.min(demand, position.available), scales);
    if (quantity <= EPSILON) return null;

    const document = itemDocument(itemId);
    await postCommitment(client, ctx, tenantId, positionId, 'RESERVE', { quantity, reason: 'RESERVATION', document });
    if (commit) {
      await postCommitment(client, ctx, tenantId, positionId, 'ALLOCATE', {
        quantity,
        reason: 'RESERVATION_COMMIT',
        document
      });
    }

    const now = ctx.now();
    const existing = itemAllocations.find((row) => row.positionId === positionId && row.status === 'ACTIVE');
    const allocation = existing ?? newAllocation(reservation, item, positionId, position.averageCost, now);
    const before = allocation.quantityAllocated;
    allocation.quantityAllocated = roundQuantity(before + quantity, scales);
    if (existing) {
      allocation.unitCost = roundUnitCost(
        (before * allocation.unitCost + quantity * position.averageCost) / allocation.quantityAllocated,
        scales
      );
    }
    if (commit) {
      allocation.quantityHeldAllocated = roundQuantity(allocation.quantityHeldAllocated + quantity, scales);
    } else {
      allocation.quantityHeldReserved = roundQuantity(allocation.quantityHeldReserved + quantity, scales);
    }
    allocation.updatedAt = now;
    settleAllocation(allocation, scales);
    if (existing) {
      await client.updateAllocation(allocation);
    } else {
      await client.insertAllocation(allocation);
    }
    await refreshReservationState(client, ctx, reservation);
    return {
      allocationId: allocation.id,
      positionId,
      itemId,
      reserved: commit ? 0 : quantity,
      allocated: commit ? quantity : 0,
      promoted: 0
    };
  });
}

async function markBackordered(ctx: InventoryContext, tenantId: string, reservationId: string, itemId: string) {
  const { scales } = ctx.ledger;
  return runInventoryTransaction(ctx, 'backorder', async (client) => {
    const reservation = await lockOpenReservation(client, tenantId, reservationId);
    const item = await loadItemOrThrow(client, tenantId, itemId);
    const allocations = await client.listAllocations(tenantId, { reservationItemId: itemId });
    item.quantityBackordered = Math.max(
      0,
      roundQuantity(item.quantityRequested - committedToItem(allocations, scales), scales)
    );
    await client.updateReservationItem(item);
    await refreshReservationState(client, ctx, reservation);
  });
}

/** Undoes one walk step. Quantities already moved on by someone else are left alone. */
async function undoStep(ctx: InventoryContext, tenantId: string, reservationId: string, step: WalkStep) {
  const { scales } = ctx.ledger;
  await runInventoryTransaction(ctx, 'allocation_compensation', async (client) => {
    const reservation = await lockReservationOrThrow(client, tenantId, reservationId);
    const [allocation] = (await client.listAllocations(tenantId, { reservationItemId: step.itemId })).filter(
      (row) => row.id === step.allocationId && row.status === 'ACTIVE'
    );
    if (!allocation) return;
    const document = itemDocument(step.itemId);
    const reason = 'ALLOCATION_COMPENSATION';

    if (step.promoted > 0) {
      const quantity = Math.min(step.promoted, allocation.quantityHeldAllocated);
      if (quantity > EPSILON) {
        await postCommitment(client, ctx, tenantId, step.positionId, 'DEALLOCATE', { quantity, reason, document });
        allocation.quantityHeldAllocated = roundQuantity(allocation.quantityHeldAllocated - quantity, scales);
        allocation.quantityHeldReserved = roundQuantity(allocation.quantityHeldReserved + quantity, scales);
      }
    }

    const allocated = Math.min(step.allocated, allocation.quantityHeldAllocated);
    if (allocated > EPSILON) {
      await postCommitment(client, ctx, tenantId, step.positionId, 'DEALLOCATE', { quantity: allocated, reason, document });
      allocation.quantityHeldAllocated = roundQuantity(allocation.quantityHeldAllocated - allocated, scales);
      allocation.quantityHeldReserved = roundQuantity(allocation.quantityHeldReserved + allocated, scales);
    }
    const released = roundQuantity(
      Math.min(step.reserved + allocated, allocation.quantityHeldReserved),
      scales
    );
    if (released > EPSILON) {
      await postCommitment(client, ctx, tenantId, step.positionId, 'RELEASE', { quantity: released, reason, document });
      allocation.quantityHeldReserved = roundQuantity(allocation.quantityHeldReserved - released, scales);
      allocation.quantityAllocated = roundQuantity(allocation.quantityAllocated - released, scales);
    }
    allocation.updatedAt = ctx.now();
    await client.updateAllocation(settleAllocation(allocation, scales));
    await refreshReservationState(client, ctx, reservation);
  });
}

async function compensate(
  ctx: InventoryContext,
  tenantId: string,
  reservationId: string,
  steps: WalkStep[],
  cause: unknown
) {
  const failures: string[] = [];
  for (const step of [...steps].reverse()) {
    try {
      await undoStep(ctx, tenantId, reservationId, step);
    } catch (error) {
      failures.push(step.positionId);
      emitInventoryEvent(
        INVENTORY_EVENT.ALLOCATION_COMPENSATION_FAILED,
        { tenantId, reservationId, positionId: step.positionId, message: errorMessage(error) },
        console.error
      );
    }
  }
  emitInventoryEvent(INVENTORY_EVENT.ALLOCATION_COMPENSATED, {
    tenantId,
    reservationId,
    reason: errorMessage(cause),
    positions: new Set(steps.map((step) => step.positionId)).size
  });
  if (failures.length > 0) {
    throw new InventoryError('ALLOCATION_COMPENSATION_FAILED', { reservationId, positionIds: failures }, { cause });
  }
}

/**
 * Walks candidate positions for every open item of a reservation in strategy
 * order. Each step is its own transaction; when the walk cannot finish (no
 * stock and no backorder allowed, abort, or any failure) the steps taken by
 * this call are undone before the error is raised.
 */
export async function allocateReservation(
  ctx: InventoryContext,
  tenantId: string,
  reservationId: string,
  options: AllocateReservationOptions = {}
): Promise<ReservationDetail> {
  const { scales } = ctx.ledger;
  const { reservation, items } = await getReservation(ctx, tenantId, reservationId);
  if (!isOpenReservation(reservation.status)) {
    throw new InventoryError('RESERVATION_INVALID_STATE', { reservationId, status: reservation.status });
  }
  const commit = options.commit ?? reservation.autoAllocate;
  const steps: WalkStep[] = [];

  try {
    for (const item of items) {
      if (item.status === 'CANCELLED' || item.status === 'FULFILLED') continue;
      throwIfAborted(options.signal, reservationId);
      if (commit) {
        await promoteHeldReserved(ctx, tenantId, reservationId, item.id, steps);
      }

      let demand = roundQuantity(item.quantityRequested - item.quantityAllocated, scales);
      if (demand > EPSILON) {
        const positions = await ctx.store.withTransaction((client) =>
          client.listPositions(tenantId, { productId: item.productId, variantId: item.variantId, activeOnly: true })
        );
        const manualIds = item.manualPositionIds.length > 0 ? item.manualPositionIds : options.manualPositionIds;
        const candidates = selectCandidates(
          positions,
          criteriaForItem(item, reservation.warehouseId, ctx.now()),
          reservation.strategy,
          manualIds
        );
        for (const candidate of candidates) {
          throwIfAborted(options.signal, reservationId);
          const step = await allocateFromPosition(ctx, tenantId, reservationId, item.id, candidate.id, commit);
          if (!step) continue;
          steps.push(step);
          demand = roundQuantity(demand - step.reserved - step.allocated, scales);
          if (demand <= EPSILON) break;
        }
      }

      if (demand > EPSILON) {
        if (reservation.partialFulfillmentAllowed && ctx.backorders.enableBackorders) {
          await markBackordered(ctx, tenantId, reservationId, item.id);
        } else {
          throw new InventoryError('INSUFFICIENT_AVAILABLE', {
            reservationId,
            itemId: item.id,
            requested: item.quantityRequested,
            committed: roundQuantity(item.quantityRequested - demand, scales)
          });
        }
      }
    }
  } catch (error) {
    if (steps.length > 0) {
      await compensate(ctx, tenantId, reservationId, steps, error);
    }
    if (options.signal?.aborted && !isInventoryError(error, 'ALLOCATION_ABORTED')) {
      throw new InventoryError('ALLOCATION_ABORTED', { reservationId }, { cause: error });
    }
    throw error;
  }

  return getReservation(ctx, tenantId, reservationId);
}
