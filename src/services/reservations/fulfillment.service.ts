import { EPSILON, roundMoney, roundQuantity, sumBy } from '../../lib/numbers';
import { runInventoryTransaction, type InventoryContext } from '../../domains/inventory/context';
import { InventoryError } from '../../domains/inventory/errors';
import { requirePositiveQuantity } from '../../domains/inventory/internal/buckets';
import type { InventoryClient } from '../../domains/inventory/store';
import type { Allocation, DocumentRef } from '../../domains/inventory/types';
import { postCommitment, postShipment } from '../stockLedger.service';
import { loadItemOrThrow, lockReservationOrThrow, refreshReservationState, type ReservationDetail } from './core.service';
import { isOpenReservation, settleAllocation } from './status';

export type ShippedLine = {
  allocationId: string;
  positionId: string;
  movementId: string;
  quantity: number;
  totalCost: number;
};

export type FulfillResult = {
  detail: ReservationDetail;
  shipped: ShippedLine[];
  totalCost: number;
};

/** Locks the owning reservation, then returns the item's ACTIVE allocations in position order. */
async function lockItemAllocations(client: InventoryClient, tenantId: string, itemId: string) {
  const found = await loadItemOrThrow(client, tenantId, itemId);
  const reservation = await lockReservationOrThrow(client, tenantId, found.reservationId);
  if (!isOpenReservation(reservation.status)) {
    throw new InventoryError('RESERVATION_INVALID_STATE', { reservationId: reservation.id, status: reservation.status });
  }
  const item = await loadItemOrThrow(client, tenantId, itemId);
  if (item.status === 'CANCELLED') {
    throw new InventoryError('RESERVATION_INVALID_STATE', { itemId, status: item.status });
  }
  const allocations = (await client.listAllocations(tenantId, { reservationItemId: itemId, status: 'ACTIVE' })).sort(
    (a, b) => (a.positionId < b.positionId ? -1 : a.positionId > b.positionId ? 1 : 0)
  );
  return { reservation, item, allocations };
}

function itemDocument(itemId: string): DocumentRef {
  return { documentType: 'RESERVATION_ITEM', documentId: itemId };
}

/** Quantity an allocation can still ship: reserved, allocated and picked holdings. */
function shippableHeld(allocation: Allocation): number {
  return allocation.quantityHeldReserved + allocation.quantityHeldAllocated + allocation.quantityHeldPicked;
}

/** reserved → allocated for what the allocated holding lacks. */
async function commitFromAllocation(
  client: InventoryClient,
  ctx: InventoryContext,
  allocation: Allocation,
  quantity: number
) {
  const { scales } = ctx.ledger;
  const short = roundQuantity(quantity - allocation.quantityHeldAllocated, scales);
  if (short <= EPSILON) return;
  await postCommitment(client, ctx, allocation.tenantId, allocation.positionId, 'ALLOCATE', {
    quantity: short,
    reason: 'RESERVATION_COMMIT',
    document: itemDocument(allocation.reservationItemId)
  });
  allocation.quantityHeldReserved = roundQuantity(allocation.quantityHeldReserved - short, scales);
  allocation.quantityHeldAllocated = roundQuantity(allocation.quantityHeldAllocated + short, scales);
}

async function pickFromAllocation(
  client: InventoryClient,
  ctx: InventoryContext,
  allocation: Allocation,
  quantity: number
) {
  const { scales } = ctx.ledger;
  await commitFromAllocation(client, ctx, allocation, quantity);
  await postCommitment(client, ctx, allocation.tenantId, allocation.positionId, 'PICK', {
    quantity,
    reason: 'RESERVATION_PICK',
    document: itemDocument(allocation.reservationItemId)
  });
  allocation.quantityHeldAllocated = roundQuantity(allocation.quantityHeldAllocated - quantity, scales);
  allocation.quantityHeldPicked = roundQuantity(allocation.quantityHeldPicked + quantity, scales);
  allocation.updatedAt = ctx.now();
}

/**
 * Picks across an item's allocations, in position order. Quantity still only
 * reserved is allocated on the way.
 */
export async function pickItem(
  ctx: InventoryContext,
  tenantId: string,
  itemId: string,
  input: { quantity: number }
): Promise<ReservationDetail> {
  const { scales } = ctx.ledger;
  const quantity = requirePositiveQuantity(input.quantity, scales);
  return runInventoryTransaction(ctx, 'pick_item', async (client) => {
    const { reservation, allocations } = await lockItemAllocations(client, tenantId, itemId);
    const pickable = roundQuantity(
      sumBy(allocations, (a) => a.quantityHeldReserved + a.quantityHeldAllocated),
      scales
    );
    if (quantity > pickable + EPSILON) {
      throw new InventoryError('INSUFFICIENT_ALLOCATED', { itemId, requested: quantity, allocated: pickable });
    }
    let remaining = quantity;
    for (const allocation of allocations) {
      if (remaining <= EPSILON) break;
      const take = roundQuantity(
        Math.min(remaining, allocation.quantityHeldReserved + allocation.quantityHeldAllocated),
        scales
      );
      if (take <= EPSILON) continue;
      await pickFromAllocation(client, ctx, allocation, take);
      await client.updateAllocation(settleAllocation(allocation, scales));
      remaining = roundQuantity(remaining - take, scales);
    }
    return refreshReservationState(client, ctx, reservation);
  });
}

/**
 * Ships up to `quantity` for an item. Each allocation ships what it has
 * picked, first allocating and picking from its other holdings when that is short.
 */
export async function fulfillItem(
  ctx: InventoryContext,
  tenantId: string,
  itemId: string,
  input: { quantity: number }
): Promise<FulfillResult> {
  const { scales } = ctx.ledger;
  const quantity = requirePositiveQuantity(input.quantity, scales);
  return runInventoryTransaction(ctx, 'fulfill_item', async (client) => {
    const { reservation, allocations } = await lockItemAllocations(client, tenantId, itemId);
    const shippable = roundQuantity(sumBy(allocations, shippableHeld), scales);
    if (quantity > shippable + EPSILON) {
      throw new InventoryError('INSUFFICIENT_ALLOCATED', { itemId, requested: quantity, allocated: shippable });
    }

    const shipped: ShippedLine[] = [];
    let remaining = quantity;
    for (const allocation of allocations) {
      if (remaining <= EPSILON) break;
      const take = roundQuantity(Math.min(remaining, shippableHeld(allocation)), scales);
      if (take <= EPSILON) continue;
      const shortPicked = roundQuantity(take - allocation.quantityHeldPicked, scales);
      if (shortPicked > EPSILON) {
        await pickFromAllocation(client, ctx, allocation, shortPicked);
      }
      const result = await postShipment(client, ctx, tenantId, allocation.positionId, {
        quantity: take,
        reason: 'RESERVATION_FULFILLMENT',
        document: itemDocument(itemId)
      });
      allocation.quantityHeldPicked = roundQuantity(allocation.quantityHeldPicked - take, scales);
      allocation.quantityFulfilled = roundQuantity(allocation.quantityFulfilled + take, scales);
      allocation.fulfilledCost = roundMoney(allocation.fulfilledCost + result.totalCost, scales);
      allocation.updatedAt = ctx.now();
      await client.updateAllocation(settleAllocation(allocation, scales));
      shipped.push({
        allocationId: allocation.id,
        positionId: allocation.positionId,
        movementId: result.movement.id,
        quantity: take,
        totalCost: result.totalCost
      });
      remaining = roundQuantity(remaining - take, scales);
    }

    const detail = await refreshReservationState(client, ctx, reservation);
    return {
      detail,
      shipped,
      totalCost: roundMoney(sumBy(shipped, (line) => line.totalCost), scales)
    };
  });
}
