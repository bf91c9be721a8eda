import { roundMoney, roundQuantity } from '../lib/numbers';
import { runInventoryTransaction, type InventoryContext } from '../domains/inventory/context';
import { InventoryError } from '../domains/inventory/errors';
import { applyReversal, isReversible, pickBuckets } from '../domains/inventory/internal/buckets';
import { appendMovement } from '../domains/inventory/internal/ledgerWriter';
import { getVisiblePosition } from '../domains/inventory/internal/positions';
import {
  refreshPositionValue,
  restoreConsumedLayers,
  retireLayersOfMovement
} from '../domains/inventory/internal/valuation';
import type { InventoryClient } from '../domains/inventory/store';
import type { DocumentRef, StockMovement, StockPosition } from '../domains/inventory/types';

const HOUR_MS = 60 * 60 * 1000;

const INBOUND_TYPES = new Set(['RECEIVE', 'ADJUST_IN', 'TRANSFER_IN']);

export type ReverseMovementInput = {
  reason: string;
  referenceId?: string | null;
};

export type ReverseMovementResult = {
  position: StockPosition;
  reversal: StockMovement;
  original: StockMovement;
};

type ReversalOptions = ReverseMovementInput & {
  // Compensation of an engine-initiated movement is not bound by the user-facing window.
  enforceWindow: boolean;
};

async function loadMovement(client: InventoryClient, tenantId: string, movementId: string) {
  const movement = await client.getMovement(tenantId, movementId);
  if (!movement) {
    throw new InventoryError('MOVEMENT_NOT_FOUND', { movementId });
  }
  return movement;
}

export async function postReversal(
  client: InventoryClient,
  ctx: InventoryContext,
  tenantId: string,
  movementId: string,
  options: ReversalOptions
): Promise<ReverseMovementResult> {
  const { scales } = ctx.ledger;
  const now = ctx.now();
  const candidate = await loadMovement(client, tenantId, movementId);
  const position = await client.lockPosition(tenantId, candidate.positionId);
  if (!position || position.isDeleted) {
    throw new InventoryError('POSITION_NOT_FOUND', { positionId: candidate.positionId });
  }
  // Movement status only changes under the position lock; re-read it now that we hold it.
  const original = await loadMovement(client, tenantId, movementId);

  if (original.isReversal) {
    throw new InventoryError('MOVEMENT_IS_REVERSAL', { movementId });
  }
  if (original.status === 'REVERSED') {
    throw new InventoryError('ALREADY_REVERSED', { movementId });
  }
  if (original.status !== 'CONFIRMED') {
    throw new InventoryError('MOVEMENT_NOT_CONFIRMED', { movementId, status: original.status });
  }
  if (await client.findReversalOf(tenantId, movementId)) {
    throw new InventoryError('ALREADY_REVERSED', { movementId });
  }
  if (!isReversible(original.movementType)) {
    throw new InventoryError('MOVEMENT_NOT_REVERSIBLE', { movementId, movementType: original.movementType });
  }
  const ageMs = now.getTime() - original.occurredAt.getTime();
  if (options.enforceWindow && ageMs > ctx.ledger.reversalWindowHours * HOUR_MS) {
    throw new InventoryError('REVERSAL_WINDOW_EXPIRED', {
      movementId,
      occurredAt: original.occurredAt.toISOString(),
      windowHours: ctx.ledger.reversalWindowHours
    });
  }

  const quantity = Math.abs(original.quantity);
  const onHandBefore = position.onHand;
  const buckets = applyReversal(pickBuckets(position), original.movementType, quantity, scales);

  const reversal = await appendMovement(client, position, {
    movementType: 'REVERSAL',
    quantity: -original.quantity,
    unitCost: original.unitCost,
    totalCost: original.totalCost,
    onHandBefore,
    onHandAfter: buckets.onHand,
    referenceId: options.referenceId ?? null,
    document: original.document,
    reason: options.reason,
    reversedMovementId: original.id,
    occurredAt: now
  });

  if (INBOUND_TYPES.has(original.movementType)) {
    await retireLayersOfMovement(client, tenantId, original.id, reversal.id, now, scales);
    if (buckets.onHand > 0) {
      const remainingValue = onHandBefore * position.averageCost - quantity * original.unitCost;
      position.averageCost = Math.max(0, roundMoney(remainingValue / buckets.onHand, scales));
    }
  } else {
    await restoreConsumedLayers(client, tenantId, original.id, reversal.id, now, scales);
    if (buckets.onHand > 0) {
      const restoredValue = onHandBefore * position.averageCost + quantity * original.unitCost;
      position.averageCost = roundMoney(restoredValue / buckets.onHand, scales);
    }
  }

  await client.updateMovementStatus(tenantId, original.id, 'REVERSED');
  Object.assign(position, buckets);
  refreshPositionValue(position, scales);
  await client.updatePosition(position);

  return { position, reversal, original: { ...original, status: 'REVERSED' } };
}

/**
 * Undoes a confirmed RECEIVE, ADJUST_*, TRANSFER_* or SHIP movement within the
 * reversal window by posting a REVERSAL with the inverse effect.
 */
export async function reverseMovement(
  ctx: InventoryContext,
  tenantId: string,
  movementId: string,
  input: ReverseMovementInput
): Promise<ReverseMovementResult> {
  return runInventoryTransaction(ctx, 'reverseMovement', (client) =>
    postReversal(client, ctx, tenantId, movementId, { ...input, enforceWindow: true })
  );
}

export async function getMovement(ctx: InventoryContext, tenantId: string, movementId: string) {
  return ctx.store.withTransaction((client) => loadMovement(client, tenantId, movementId));
}

export type HistoryWindow = {
  from?: Date;
  to?: Date;
};

export async function getPositionHistory(
  ctx: InventoryContext,
  tenantId: string,
  positionId: string,
  window: HistoryWindow = {}
): Promise<StockMovement[]> {
  return ctx.store.withTransaction(async (client) => {
    await getVisiblePosition(client, tenantId, positionId);
    return client.listMovements(tenantId, { positionId, from: window.from, to: window.to });
  });
}

export async function getRelatedMovements(
  ctx: InventoryContext,
  tenantId: string,
  movementId: string
): Promise<StockMovement[]> {
  return ctx.store.withTransaction(async (client) => {
    const movement = await loadMovement(client, tenantId, movementId);
    if (!movement.document) return [];
    const rows = await client.listMovements(tenantId, { document: movement.document });
    return rows.filter((row) => row.id !== movement.id);
  });
}

export type FulfillmentChainEntry = {
  positionId: string;
  movements: StockMovement[];
  netOnHandChange: number;
};

export async function getFulfillmentChain(
  ctx: InventoryContext,
  tenantId: string,
  document: DocumentRef
): Promise<FulfillmentChainEntry[]> {
  const { scales } = ctx.ledger;
  const movements = await ctx.store.withTransaction((client) => client.listMovements(tenantId, { document }));
  const chain = new Map<string, FulfillmentChainEntry>();
  for (const movement of movements) {
    let entry = chain.get(movement.positionId);
    if (!entry) {
      entry = { positionId: movement.positionId, movements: [], netOnHandChange: 0 };
      chain.set(movement.positionId, entry);
    }
    entry.movements.push(movement);
    if (movement.status !== 'CANCELLED') {
      entry.netOnHandChange = roundQuantity(
        entry.netOnHandChange + movement.onHandAfter - movement.onHandBefore,
        scales
      );
    }
  }
  for (const entry of chain.values()) {
    entry.movements.sort((a, b) => a.sequence - b.sequence);
  }
  return [...chain.values()];
}
