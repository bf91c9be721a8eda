import { EPSILON, roundQuantity, type NumericScales } from '../../../lib/numbers';
import { InventoryError, type InventoryErrorCode } from '../errors';
import type { BucketName, BucketState, MovementType, StockMovement } from '../types';

type BucketDelta = Partial<Record<BucketName, 1 | -1>>;

type ForwardMovementType = Exclude<MovementType, 'REVERSAL'>;

export const MOVEMENT_EFFECTS: Record<ForwardMovementType, BucketDelta> = {
  RECEIVE: { onHand: 1, available: 1 },
  ADJUST_IN: { onHand: 1, available: 1 },
  TRANSFER_IN: { onHand: 1, available: 1 },
  ADJUST_OUT: { onHand: -1, available: -1 },
  TRANSFER_OUT: { onHand: -1, available: -1 },
  RESERVE: { available: -1, reserved: 1 },
  RELEASE: { reserved: -1, available: 1 },
  ALLOCATE: { reserved: -1, allocated: 1 },
  DEALLOCATE: { allocated: -1, reserved: 1 },
  PICK: { allocated: -1, picked: 1 },
  UNPICK: { picked: -1, allocated: 1 },
  SHIP: { picked: -1, onHand: -1, shipped: 1 }
};

// Effect of a REVERSAL, keyed by the type of the movement being reversed.
// A reversed shipment comes back as available stock, not as picked stock.
export const REVERSAL_EFFECTS: Partial<Record<ForwardMovementType, BucketDelta>> = {
  RECEIVE: { onHand: -1, available: -1 },
  ADJUST_IN: { onHand: -1, available: -1 },
  TRANSFER_IN: { onHand: -1, available: -1 },
  ADJUST_OUT: { onHand: 1, available: 1 },
  TRANSFER_OUT: { onHand: 1, available: 1 },
  SHIP: { onHand: 1, available: 1, shipped: -1 }
};

const MOVEMENT_SIGNS: Record<ForwardMovementType, 1 | -1> = {
  RECEIVE: 1,
  ADJUST_IN: 1,
  TRANSFER_IN: 1,
  ADJUST_OUT: -1,
  TRANSFER_OUT: -1,
  SHIP: -1,
  RESERVE: 1,
  RELEASE: -1,
  ALLOCATE: 1,
  DEALLOCATE: -1,
  PICK: 1,
  UNPICK: -1
};

// Checked in this order so the error names the bucket the caller drew from.
const SOURCE_BUCKETS: Array<[BucketName, InventoryErrorCode]> = [
  ['available', 'INSUFFICIENT_AVAILABLE'],
  ['reserved', 'INSUFFICIENT_RESERVED'],
  ['allocated', 'INSUFFICIENT_ALLOCATED'],
  ['picked', 'INSUFFICIENT_PICKED'],
  ['onHand', 'INSUFFICIENT_AVAILABLE'],
  ['shipped', 'INSUFFICIENT_PICKED']
];

export const BUCKET_NAMES: BucketName[] = ['onHand', 'available', 'reserved', 'allocated', 'picked', 'shipped'];

export const EMPTY_BUCKETS: BucketState = {
  onHand: 0,
  available: 0,
  reserved: 0,
  allocated: 0,
  picked: 0,
  shipped: 0
};

export function pickBuckets(source: BucketState): BucketState {
  return {
    onHand: source.onHand,
    available: source.available,
    reserved: source.reserved,
    allocated: source.allocated,
    picked: source.picked,
    shipped: source.shipped
  };
}

export function signedQuantity(movementType: ForwardMovementType, quantity: number): number {
  return MOVEMENT_SIGNS[movementType] * Math.abs(quantity);
}

export function isReversible(movementType: MovementType): movementType is ForwardMovementType {
  return movementType !== 'REVERSAL' && REVERSAL_EFFECTS[movementType] !== undefined;
}

/**
 * Applies a bucket effect scaled by `quantity`, refusing to take any bucket below zero.
 */
export function applyBucketEffect(
  buckets: BucketState,
  effect: BucketDelta,
  quantity: number,
  scales?: NumericScales
): BucketState {
  const next = pickBuckets(buckets);
  for (const [bucket, code] of SOURCE_BUCKETS) {
    const direction = effect[bucket];
    if (direction === undefined) continue;
    const value = roundQuantity(buckets[bucket] + direction * quantity, scales);
    if (value < -EPSILON) {
      throw new InventoryError(code, { bucket, requested: quantity, [bucket]: buckets[bucket] });
    }
    next[bucket] = Math.max(0, value);
  }
  return next;
}

export function applyMovementType(
  buckets: BucketState,
  movementType: ForwardMovementType,
  quantity: number,
  scales?: NumericScales
): BucketState {
  return applyBucketEffect(buckets, MOVEMENT_EFFECTS[movementType], quantity, scales);
}

export function applyReversal(
  buckets: BucketState,
  originalType: MovementType,
  quantity: number,
  scales?: NumericScales
): BucketState {
  if (!isReversible(originalType)) {
    throw new InventoryError('MOVEMENT_NOT_REVERSIBLE', { movementType: originalType });
  }
  const effect = REVERSAL_EFFECTS[originalType];
  if (!effect) {
    throw new InventoryError('MOVEMENT_NOT_REVERSIBLE', { movementType: originalType });
  }
  return applyBucketEffect(buckets, effect, quantity, scales);
}

export function committedQuantity(buckets: BucketState): number {
  return buckets.reserved + buckets.allocated + buckets.picked;
}

export function conservationGap(buckets: BucketState, scales?: NumericScales): number {
  return roundQuantity(buckets.onHand - buckets.available - committedQuantity(buckets), scales);
}

/**
 * Rebuilds the on-hand buckets of one position from its movement log.
 * Movements must belong to a single position; they are applied in sequence order.
 */
export function replayMovements(movements: StockMovement[], scales?: NumericScales): BucketState {
  const ordered = [...movements].sort((a, b) => a.sequence - b.sequence);
  const byId = new Map(ordered.map((movement) => [movement.id, movement]));
  let buckets = { ...EMPTY_BUCKETS };
  for (const movement of ordered) {
    if (movement.status === 'CANCELLED') continue;
    const quantity = Math.abs(movement.quantity);
    if (movement.movementType === 'REVERSAL') {
      const original = movement.reversedMovementId ? byId.get(movement.reversedMovementId) : undefined;
      if (!original) {
        throw new InventoryError('MOVEMENT_NOT_FOUND', {
          movementId: movement.reversedMovementId,
          reversalId: movement.id
        });
      }
      buckets = applyReversal(buckets, original.movementType, quantity, scales);
    } else {
      buckets = applyMovementType(buckets, movement.movementType, quantity, scales);
    }
  }
  return buckets;
}

export function diffBuckets(expected: BucketState, actual: BucketState, scales?: NumericScales) {
  const mismatches: Array<{ bucket: BucketName; expected: number; actual: number }> = [];
  for (const bucket of BUCKET_NAMES) {
    if (Math.abs(roundQuantity(expected[bucket] - actual[bucket], scales)) > EPSILON) {
      mismatches.push({ bucket, expected: expected[bucket], actual: actual[bucket] });
    }
  }
  return mismatches;
}

export function requirePositiveQuantity(value: number, scales?: NumericScales): number {
  if (!Number.isFinite(value)) {
    throw new InventoryError('INVALID_QUANTITY', { quantity: value });
  }
  const quantity = roundQuantity(value, scales);
  if (quantity <= EPSILON) {
    throw new InventoryError('INVALID_QUANTITY', { quantity: value });
  }
  return quantity;
}
