import { describe, expect, it } from 'vitest';
import type { Allocation, ReservationItem, ReservationItemStatus } from '../../domains/inventory/types';
import { START } from '../../testing/fixtures';
import { committedToItem, deriveItemStatus, deriveReservationStatus, recomputeItem, settleAllocation } from './status';

function allocation(overrides: Partial<Allocation> = {}): Allocation {
  return {
    id: 'alloc-1',
    tenantId: 'tenant-a',
    reservationId: 'res-1',
    reservationItemId: 'item-1',
    positionId: 'pos-1',
    quantityAllocated: 0,
    quantityHeldReserved: 0,
    quantityHeldAllocated: 0,
    quantityHeldPicked: 0,
    quantityFulfilled: 0,
    quantityReleased: 0,
    quantityRemaining: 0,
    unitCost: 5,
    fulfilledCost: 0,
    status: 'ACTIVE',
    createdAt: START,
    updatedAt: START,
    ...overrides
  };
}

function item(overrides: Partial<ReservationItem> = {}): ReservationItem {
  return {
    id: 'item-1',
    tenantId: 'tenant-a',
    reservationId: 'res-1',
    lineNumber: 1,
    productId: 'sku-1',
    variantId: null,
    quantityRequested: 10,
    quantityReserved: 0,
    quantityAllocated: 0,
    quantityPicked: 0,
    quantityFulfilled: 0,
    quantityBackordered: 0,
    preferredWarehouseId: null,
    preferredLocationId: null,
    preferredBatchId: null,
    qualityGradeRequired: null,
    minShelfLifeDays: null,
    manualPositionIds: [],
    status: 'REQUESTED',
    reservedValue: 0,
    fulfilledValue: 0,
    allocatedAt: null,
    fulfilledAt: null,
    createdAt: START,
    updatedAt: START,
    ...overrides
  };
}

describe('settleAllocation', () => {
  it('closes an allocation once nothing is held', () => {
    expect(settleAllocation(allocation({ quantityFulfilled: 4 })).status).toBe('FULFILLED');
    expect(settleAllocation(allocation({ quantityReleased: 4 })).status).toBe('RELEASED');
    const held = settleAllocation(allocation({ quantityHeldReserved: 2, quantityHeldPicked: 1 }));
    expect(held).toMatchObject({ status: 'ACTIVE', quantityRemaining: 3 });
  });
});

describe('committedToItem', () => {
  it('nets releases out of allocated quantity', () => {
    expect(
      committedToItem([
        allocation({ quantityAllocated: 6, quantityReleased: 2 }),
        allocation({ quantityAllocated: 3 })
      ])
    ).toBe(7);
  });
});

describe('deriveItemStatus', () => {
  it('prefers fulfillment over holdings', () => {
    expect(deriveItemStatus(item({ quantityFulfilled: 10 }), [])).toBe('FULFILLED');
    expect(deriveItemStatus(item({ quantityFulfilled: 3, quantityBackordered: 2 }), [])).toBe('PARTIAL_FULFILLED');
    expect(deriveItemStatus(item({ quantityBackordered: 2 }), [])).toBe('BACKORDERED');
  });

  it('reports RESERVED while any holding has not been allocated', () => {
    expect(deriveItemStatus(item(), [allocation({ quantityHeldReserved: 1, quantityHeldAllocated: 4 })])).toBe(
      'RESERVED'
    );
    expect(deriveItemStatus(item(), [allocation({ quantityHeldAllocated: 4 })])).toBe('ALLOCATED');
    expect(deriveItemStatus(item(), [allocation({ quantityHeldAllocated: 4, status: 'RELEASED' })])).toBe(
      'REQUESTED'
    );
  });
});

describe('recomputeItem', () => {
  it('shrinks the backorder as allocations cover demand', () => {
    const recomputed = recomputeItem(
      item({ quantityBackordered: 6 }),
      [allocation({ quantityAllocated: 7, quantityHeldReserved: 7, quantityRemaining: 7 })],
      START
    );
    expect(recomputed).toMatchObject({
      quantityAllocated: 7,
      quantityReserved: 7,
      quantityBackordered: 3,
      reservedValue: 35,
      status: 'BACKORDERED',
      allocatedAt: START
    });
  });
});

describe('deriveReservationStatus', () => {
  const withStatus = (...statuses: ReservationItemStatus[]) =>
    statuses.map((status, index) => item({ id: `item-${index}`, status }));

  it('derives from the live items', () => {
    expect(deriveReservationStatus(withStatus('FULFILLED', 'CANCELLED'))).toBe('FULFILLED');
    expect(deriveReservationStatus(withStatus('FULFILLED', 'RESERVED'))).toBe('PARTIAL_FULFILLED');
    expect(deriveReservationStatus(withStatus('REQUESTED', 'BACKORDERED'))).toBe('ACTIVE');
    expect(deriveReservationStatus(withStatus('REQUESTED'))).toBe('PENDING');
    expect(deriveReservationStatus(withStatus('CANCELLED'))).toBe('PENDING');
  });
});
