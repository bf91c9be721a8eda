import { describe, expect, it } from 'vitest';
import type { MovementType, StockMovement } from '../types';
import {
  EMPTY_BUCKETS,
  applyMovementType,
  applyReversal,
  conservationGap,
  diffBuckets,
  replayMovements,
  requirePositiveQuantity
} from './buckets';

const at = new Date('2026-03-02T10:00:00.000Z');

function movement(sequence: number, movementType: MovementType, quantity: number, extra: Partial<StockMovement> = {}): StockMovement {
  return {
    id: `m-${sequence}`,
    tenantId: 'tenant-a',
    positionId: 'p-1',
    sequence,
    movementType,
    status: 'CONFIRMED',
    quantity,
    unitCost: 0,
    totalCost: 0,
    onHandBefore: 0,
    onHandAfter: 0,
    referenceId: null,
    document: null,
    reason: null,
    isReversal: movementType === 'REVERSAL',
    reversedMovementId: null,
    occurredAt: at,
    createdAt: at,
    ...extra
  };
}

describe('applyMovementType', () => {
  it('walks stock through the commitment stages and keeps on-hand conserved', () => {
    let buckets = applyMovementType(EMPTY_BUCKETS, 'RECEIVE', 10);
    buckets = applyMovementType(buckets, 'RESERVE', 4);
    buckets = applyMovementType(buckets, 'ALLOCATE', 3);
    buckets = applyMovementType(buckets, 'PICK', 2);
    buckets = applyMovementType(buckets, 'SHIP', 2);

    expect(buckets).toEqual({ onHand: 8, available: 6, reserved: 1, allocated: 1, picked: 0, shipped: 2 });
    expect(conservationGap(buckets)).toBe(0);
  });

  it('names the bucket the quantity was drawn from', () => {
    const buckets = applyMovementType(EMPTY_BUCKETS, 'RECEIVE', 5);
    expect(() => applyMovementType(buckets, 'RESERVE', 6)).toThrow('INSUFFICIENT_AVAILABLE');
    expect(() => applyMovementType(buckets, 'RELEASE', 1)).toThrow('INSUFFICIENT_RESERVED');
    expect(() => applyMovementType(buckets, 'PICK', 1)).toThrow('INSUFFICIENT_ALLOCATED');
    expect(() => applyMovementType(buckets, 'SHIP', 1)).toThrow('INSUFFICIENT_PICKED');
  });
});

describe('applyReversal', () => {
  it('returns a reversed shipment to available stock', () => {
    const shipped = { onHand: 6, available: 6, reserved: 0, allocated: 0, picked: 0, shipped: 4 };
    expect(applyReversal(shipped, 'SHIP', 4)).toEqual({
      onHand: 10,
      available: 10,
      reserved: 0,
      allocated: 0,
      picked: 0,
      shipped: 0
    });
  });

  it('refuses commitment movements', () => {
    expect(() => applyReversal(EMPTY_BUCKETS, 'RESERVE', 1)).toThrow('MOVEMENT_NOT_REVERSIBLE');
  });
});

describe('replayMovements', () => {
  it('applies reversals against their original and skips cancelled movements', () => {
    const buckets = replayMovements([
      movement(3, 'REVERSAL', 2, { reversedMovementId: 'm-2' }),
      movement(1, 'RECEIVE', 10),
      movement(2, 'ADJUST_OUT', -2),
      movement(4, 'RESERVE', 3, { status: 'CANCELLED' }),
      movement(5, 'RESERVE', 1)
    ]);
    expect(buckets).toEqual({ onHand: 10, available: 9, reserved: 1, allocated: 0, picked: 0, shipped: 0 });
  });

  it('fails when a reversal points at a movement outside the log', () => {
    expect(() => replayMovements([movement(1, 'REVERSAL', -1, { reversedMovementId: 'missing' })])).toThrow(
      'MOVEMENT_NOT_FOUND'
    );
  });
});

describe('diffBuckets', () => {
  it('lists only the buckets that differ', () => {
    const expected = { ...EMPTY_BUCKETS, onHand: 5, available: 5 };
    const actual = { ...EMPTY_BUCKETS, onHand: 5, available: 4 };
    expect(diffBuckets(expected, actual)).toEqual([{ bucket: 'available', expected: 5, actual: 4 }]);
  });
});

describe('requirePositiveQuantity', () => {
  it('rounds to the quantity scale and rejects what rounds to zero', () => {
    expect(requirePositiveQuantity(1.0004)).toBe(1);
    expect(() => requirePositiveQuantity(0.0004)).toThrow('INVALID_QUANTITY');
    expect(() => requirePositiveQuantity(Number.NaN)).toThrow('INVALID_QUANTITY');
  });
});
