import { EPSILON, roundMoney, roundQuantity, sumBy, type NumericScales } from '../../lib/numbers';
import type {
  Allocation,
  Reservation,
  ReservationItem,
  ReservationItemStatus,
  ReservationStatus
} from '../../domains/inventory/types';

export const OPEN_RESERVATION_STATUSES: ReservationStatus[] = ['PENDING', 'ACTIVE', 'PARTIAL_FULFILLED'];

export function isOpenReservation(status: ReservationStatus): boolean {
  return OPEN_RESERVATION_STATUSES.includes(status);
}

export function heldQuantity(allocation: Allocation): number {
  return allocation.quantityHeldReserved + allocation.quantityHeldAllocated + allocation.quantityHeldPicked;
}

/** Recomputes the derived fields of an allocation after its held quantities changed. */
export function settleAllocation(allocation: Allocation, scales?: NumericScales): Allocation {
  allocation.quantityRemaining = roundQuantity(heldQuantity(allocation), scales);
  if (allocation.status === 'ACTIVE' && allocation.quantityRemaining <= EPSILON) {
    allocation.status = allocation.quantityFulfilled > EPSILON ? 'FULFILLED' : 'RELEASED';
  }
  return allocation;
}

/** Quantity the item still holds or has shipped, net of releases. */
export function committedToItem(allocations: Allocation[], scales?: NumericScales): number {
  return roundQuantity(
    sumBy(allocations, (allocation) => allocation.quantityAllocated - allocation.quantityReleased),
    scales
  );
}

export function deriveItemStatus(item: ReservationItem, allocations: Allocation[]): ReservationItemStatus {
  if (item.status === 'CANCELLED') return 'CANCELLED';
  if (item.quantityFulfilled + EPSILON >= item.quantityRequested) return 'FULFILLED';
  if (item.quantityFulfilled > EPSILON) return 'PARTIAL_FULFILLED';
  if (item.quantityBackordered > EPSILON) return 'BACKORDERED';
  const active = allocations.filter((allocation) => allocation.status === 'ACTIVE');
  if (sumBy(active, heldQuantity) > EPSILON) {
    return active.some((allocation) => allocation.quantityHeldReserved > EPSILON) ? 'RESERVED' : 'ALLOCATED';
  }
  return 'REQUESTED';
}

/**
 * Rebuilds an item's quantities from its allocations, then its status.
 * Backorders shrink as later allocations cover the demand.
 */
export function recomputeItem(
  item: ReservationItem,
  allocations: Allocation[],
  now: Date,
  scales?: NumericScales
): ReservationItem {
  const own = allocations.filter((allocation) => allocation.reservationItemId === item.id);
  item.quantityAllocated = committedToItem(own, scales);
  item.quantityReserved = roundQuantity(sumBy(own, (a) => a.quantityHeldReserved), scales);
  item.quantityPicked = roundQuantity(sumBy(own, (a) => a.quantityHeldPicked), scales);
  item.quantityFulfilled = roundQuantity(sumBy(own, (a) => a.quantityFulfilled), scales);
  const uncovered = Math.max(0, roundQuantity(item.quantityRequested - item.quantityAllocated, scales));
  item.quantityBackordered = Math.min(item.quantityBackordered, uncovered);
  item.reservedValue = roundMoney(
    sumBy(own, (a) => roundMoney(a.quantityRemaining * a.unitCost, scales)),
    scales
  );
  item.fulfilledValue = roundMoney(sumBy(own, (a) => a.fulfilledCost), scales);

  item.status = deriveItemStatus(item, own);
  if (item.allocatedAt === null && item.quantityAllocated > EPSILON) {
    item.allocatedAt = now;
  }
  if (item.status === 'FULFILLED' && item.fulfilledAt === null) {
    item.fulfilledAt = now;
  }
  item.updatedAt = now;
  return item;
}

export function deriveReservationStatus(items: ReservationItem[]): ReservationStatus {
  const live = items.filter((item) => item.status !== 'CANCELLED');
  if (live.length > 0 && live.every((item) => item.status === 'FULFILLED')) return 'FULFILLED';
  if (live.some((item) => item.status === 'FULFILLED' || item.status === 'PARTIAL_FULFILLED')) {
    return 'PARTIAL_FULFILLED';
  }
  if (live.some((item) => item.status === 'RESERVED' || item.status === 'ALLOCATED' || item.status === 'BACKORDERED')) {
    return 'ACTIVE';
  }
  return 'PENDING';
}

/**
 * Applies the item-derived status. CANCELLED and EXPIRED are terminal here;
 * only an expiry extension re-derives an EXPIRED reservation.
 */
export function recomputeReservation(
  reservation: Reservation,
  items: ReservationItem[],
  now: Date,
  scales?: NumericScales,
  options: { reopenExpired?: boolean } = {}
): Reservation {
  reservation.reservedValue = roundMoney(sumBy(items, (item) => item.reservedValue), scales);
  reservation.fulfilledValue = roundMoney(sumBy(items, (item) => item.fulfilledValue), scales);
  reservation.updatedAt = now;
  if (reservation.status === 'CANCELLED') return reservation;
  if (reservation.status === 'EXPIRED' && !options.reopenExpired) return reservation;

  reservation.status = deriveReservationStatus(items);
  if (reservation.status === 'FULFILLED' && reservation.fulfilledAt === null) {
    reservation.fulfilledAt = now;
  }
  return reservation;
}
