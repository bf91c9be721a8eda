import { v4 as uuidv4 } from 'uuid';
import { EPSILON } from '../../../lib/numbers';
import { InventoryError } from '../errors';
import { enqueueStockMovementPosted } from '../outbox';
import type { InventoryClient } from '../store';
import type { DocumentRef, MovementType, StockMovement, StockPosition } from '../types';

export type AppendMovementInput = {
  id?: string;
  movementType: MovementType;
  quantity: number;
  unitCost?: number;
  totalCost?: number;
  onHandBefore: number;
  onHandAfter: number;
  referenceId?: string | null;
  document?: DocumentRef | null;
  reason?: string | null;
  reversedMovementId?: string | null;
  occurredAt: Date;
};

/**
 * Writes the next movement of a locked position and advances its sequence.
 * The caller persists the position afterwards in the same transaction.
 */
export async function appendMovement(
  client: InventoryClient,
  position: StockPosition,
  input: AppendMovementInput
): Promise<StockMovement> {
  const sequence = position.lastMovementSeq + 1;
  const movement: StockMovement = {
    id: input.id ?? uuidv4(),
    tenantId: position.tenantId,
    positionId: position.id,
    sequence,
    movementType: input.movementType,
    status: 'CONFIRMED',
    quantity: input.quantity,
    unitCost: input.unitCost ?? 0,
    totalCost: input.totalCost ?? 0,
    onHandBefore: input.onHandBefore,
    onHandAfter: input.onHandAfter,
    referenceId: input.referenceId ?? null,
    document: input.document ?? null,
    reason: input.reason ?? null,
    isReversal: input.movementType === 'REVERSAL',
    reversedMovementId: input.reversedMovementId ?? null,
    occurredAt: input.occurredAt,
    createdAt: input.occurredAt
  };
  await client.insertMovement(movement);
  position.lastMovementSeq = sequence;
  position.lastMovementAt = input.occurredAt;
  position.updatedAt = input.occurredAt;
  await enqueueStockMovementPosted(client, movement);
  return movement;
}

/**
 * Looks up an earlier movement carrying the same reference.
 * Returns it when `matches` accepts it; a conflicting repeat is rejected.
 */
export async function findReplayedMovement(
  client: InventoryClient,
  position: StockPosition,
  movementType: MovementType,
  referenceId: string | null | undefined,
  matches: (existing: StockMovement) => boolean
): Promise<StockMovement | null> {
  if (!referenceId) return null;
  const existing = await client.findMovementByReference(position.tenantId, position.id, movementType, referenceId);
  if (!existing) return null;
  if (!matches(existing)) {
    throw new InventoryError('DUPLICATE_MOVEMENT_REFERENCE', {
      referenceId,
      movementType,
      existingMovementId: existing.id
    });
  }
  return existing;
}

export function sameQuantity(existing: StockMovement, quantity: number): boolean {
  return Math.abs(Math.abs(existing.quantity) - Math.abs(quantity)) <= EPSILON;
}
