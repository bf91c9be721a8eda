import { v4 as uuidv4 } from 'uuid';
import {
  EPSILON,
  isPositive,
  roundMoney,
  roundQuantity,
  roundUnitCost,
  sumBy,
  type NumericScales
} from '../lib/numbers';
import { INVENTORY_EVENT, emitInventoryEvent, errorMessage } from '../observability/inventory.events';
import { runInventoryTransaction, type InventoryContext } from '../domains/inventory/context';
import { InventoryError } from '../domains/inventory/errors';
import {
  applyMovementType,
  committedQuantity,
  pickBuckets,
  requirePositiveQuantity,
  signedQuantity
} from '../domains/inventory/internal/buckets';
import { appendMovement, findReplayedMovement, sameQuantity } from '../domains/inventory/internal/ledgerWriter';
import {
  ensurePositionAndLock,
  getVisiblePosition,
  lockActivePosition,
  serializePositionKey,
  type PositionAttributes
} from '../domains/inventory/internal/positions';
import {
  consumeLayers,
  createLayer,
  refreshPositionValue,
  weightedAverageCost,
  type LayerSlice
} from '../domains/inventory/internal/valuation';
import type { InventoryClient } from '../domains/inventory/store';
import type {
  DocumentRef,
  MovementType,
  PositionKey,
  StockMovement,
  StockPosition,
  ValuationLayer
} from '../domains/inventory/types';
import { postReversal } from './stockMovements.service';

export type CommitmentMovementType = Extract<
  MovementType,
  'RESERVE' | 'RELEASE' | 'ALLOCATE' | 'DEALLOCATE' | 'PICK' | 'UNPICK'
>;

export type MovementInput = {
  quantity: number;
  reason?: string | null;
  referenceId?: string | null;
  document?: DocumentRef | null;
};

export type LedgerResult = {
  position: StockPosition;
  movement: StockMovement;
  duplicate: boolean;
};

export type ShipResult = LedgerResult & {
  totalCost: number;
  unitCost: number;
  consumptions: LayerSlice[];
};

async function slicesOfMovement(
  client: InventoryClient,
  tenantId: string,
  movement: StockMovement,
  scales?: NumericScales
) {
  const consumptions = await client.listConsumptions(tenantId, { movementId: movement.id });
  const slices: LayerSlice[] = [];
  for (const consumption of consumptions) {
    const layer = await client.getLayer(tenantId, consumption.layerId);
    if (!layer) continue;
    slices.push({
      layerId: layer.id,
      quantity: consumption.quantity,
      baseUnitCost: layer.unitCost,
      landedCostPerUnit: roundUnitCost(consumption.unitCost - layer.unitCost, scales),
      unitCost: consumption.unitCost,
      totalCost: consumption.totalCost,
      receivedAt: layer.receivedAt
    });
  }
  return slices;
}

/**
 * Moves quantity between commitment buckets of one locked position.
 * Runs inside the caller's transaction so the reservation engine can combine
 * ledger steps with its own writes.
 */
export async function postCommitment(
  client: InventoryClient,
  ctx: InventoryContext,
  tenantId: string,
  positionId: string,
  movementType: CommitmentMovementType,
  input: MovementInput
): Promise<LedgerResult> {
  const { scales } = ctx.ledger;
  const quantity = requirePositiveQuantity(input.quantity, scales);
  const position = await lockActivePosition(client, tenantId, positionId);

  const replayed = await findReplayedMovement(client, position, movementType, input.referenceId, (existing) =>
    sameQuantity(existing, quantity)
  );
  if (replayed) {
    return { position, movement: replayed, duplicate: true };
  }

  const buckets = applyMovementType(pickBuckets(position), movementType, quantity, scales);
  const movement = await appendMovement(client, position, {
    movementType,
    quantity: signedQuantity(movementType, quantity),
    unitCost: position.averageCost,
    totalCost: roundMoney(quantity * position.averageCost, scales),
    onHandBefore: position.onHand,
    onHandAfter: buckets.onHand,
    referenceId: input.referenceId,
    document: input.document,
    reason: input.reason,
    occurredAt: ctx.now()
  });
  Object.assign(position, buckets);
  await client.updatePosition(position);
  return { position, movement, duplicate: false };
}

function commitment(movementType: CommitmentMovementType) {
  return (ctx: InventoryContext, tenantId: string, positionId: string, input: MovementInput) =>
    runInventoryTransaction(ctx, movementType.toLowerCase(), (client) =>
      postCommitment(client, ctx, tenantId, positionId, movementType, input)
    );
}

/** available → reserved */
export const reserveStock = commitment('RESERVE');
/** reserved → available */
export const releaseStock = commitment('RELEASE');
/** reserved → allocated */
export const allocateStock = commitment('ALLOCATE');
/** allocated → reserved */
export const deallocateStock = commitment('DEALLOCATE');
/** allocated → picked */
export const pickStock = commitment('PICK');
/** picked → allocated */
export const unpickStock = commitment('UNPICK');

export async function postShipment(
  client: InventoryClient,
  ctx: InventoryContext,
  tenantId: string,
  positionId: string,
  input: MovementInput
): Promise<ShipResult> {
  const { scales } = ctx.ledger;
  const quantity = requirePositiveQuantity(input.quantity, scales);
  const position = await lockActivePosition(client, tenantId, positionId);

  const replayed = await findReplayedMovement(client, position, 'SHIP', input.referenceId, (existing) =>
    sameQuantity(existing, quantity)
  );
  if (replayed) {
    return {
      position,
      movement: replayed,
      duplicate: true,
      totalCost: replayed.totalCost,
      unitCost: replayed.unitCost,
      consumptions: await slicesOfMovement(client, tenantId, replayed, scales)
    };
  }

  const buckets = applyMovementType(pickBuckets(position), 'SHIP', quantity, scales);
  const now = ctx.now();
  const movementId = uuidv4();
  const cost = await consumeLayers(client, position, quantity, movementId, now, scales);
  const movement = await appendMovement(client, position, {
    id: movementId,
    movementType: 'SHIP',
    quantity: signedQuantity('SHIP', quantity),
    unitCost: cost.unitCost,
    totalCost: cost.totalCost,
    onHandBefore: position.onHand,
    onHandAfter: buckets.onHand,
    referenceId: input.referenceId,
    document: input.document,
    reason: input.reason,
    occurredAt: now
  });
  Object.assign(position, buckets);
  refreshPositionValue(position, scales);
  await client.updatePosition(position);
  return {
    position,
    movement,
    duplicate: false,
    totalCost: cost.totalCost,
    unitCost: cost.unitCost,
    consumptions: cost.slices
  };
}

/** picked → shipped; takes the cost of goods from the position's valuation layers. */
export async function shipStock(
  ctx: InventoryContext,
  tenantId: string,
  positionId: string,
  input: MovementInput
): Promise<ShipResult> {
  return runInventoryTransaction(ctx, 'ship', (client) => postShipment(client, ctx, tenantId, positionId, input));
}

export type ReceiveStockInput = PositionKey &
  PositionAttributes & {
    quantity: number;
    unitCost: number;
    landedCostPerUnit?: number;
    receivedAt?: Date;
    reason?: string | null;
    referenceId?: string | null;
    document?: DocumentRef | null;
  };

export type ReceiveResult = LedgerResult & {
  positionId: string;
  created: boolean;
  newAverageCost: number;
  layer: ValuationLayer | null;
};

export async function receiveStock(
  ctx: InventoryContext,
  tenantId: string,
  input: ReceiveStockInput
): Promise<ReceiveResult> {
  const { scales } = ctx.ledger;
  const quantity = requirePositiveQuantity(input.quantity, scales);
  if (!Number.isFinite(input.unitCost) || input.unitCost < 0) {
    throw new InventoryError('INVALID_QUANTITY', { unitCost: input.unitCost });
  }
  const unitCost = roundUnitCost(input.unitCost, scales);

  return runInventoryTransaction(ctx, 'receive', async (client) => {
    const now = ctx.now();
    const { position, created } = await ensurePositionAndLock(
      client,
      tenantId,
      input,
      ctx.ledger.defaultValuationMethod,
      input,
      now
    );

    const replayed = await findReplayedMovement(
      client,
      position,
      'RECEIVE',
      input.referenceId,
      (existing) => sameQuantity(existing, quantity) && Math.abs(existing.unitCost - unitCost) <= EPSILON
    );
    if (replayed) {
      const [layer] = await client.listLayers(tenantId, { movementId: replayed.id });
      return {
        position,
        movement: replayed,
        duplicate: true,
        positionId: position.id,
        created: false,
        newAverageCost: position.averageCost,
        layer: layer ?? null
      };
    }

    const receivedAt = input.receivedAt ?? now;
    const buckets = applyMovementType(pickBuckets(position), 'RECEIVE', quantity, scales);
    const newAverageCost = weightedAverageCost(position.onHand, position.averageCost, quantity, unitCost, scales);
    const movement = await appendMovement(client, position, {
      movementType: 'RECEIVE',
      quantity,
      unitCost,
      totalCost: roundMoney(quantity * unitCost, scales),
      onHandBefore: position.onHand,
      onHandAfter: buckets.onHand,
      referenceId: input.referenceId,
      document: input.document,
      reason: input.reason,
      occurredAt: now
    });
    const layer = await createLayer(
      client,
      position,
      {
        quantity,
        unitCost,
        landedCostPerUnit: input.landedCostPerUnit,
        movementId: movement.id,
        document: input.document ?? null,
        receivedAt
      },
      scales
    );

    Object.assign(position, buckets);
    position.unitCost = unitCost;
    position.averageCost = newAverageCost;
    position.firstReceivedAt = position.firstReceivedAt ?? receivedAt;
    position.lastReceivedAt = receivedAt;
    refreshPositionValue(position, scales);
    await client.updatePosition(position);

    return { position, movement, duplicate: false, positionId: position.id, created, newAverageCost, layer };
  });
}

export type AdjustStockInput = {
  newOnHand: number;
  reason: string;
  referenceId?: string | null;
  document?: DocumentRef | null;
};

export type AdjustResult = {
  position: StockPosition;
  movement: StockMovement | null;
  delta: number;
  duplicate: boolean;
  layer: ValuationLayer | null;
  consumptions: LayerSlice[];
};

/**
 * Sets on-hand to a counted value. The difference posts as ADJUST_IN or
 * ADJUST_OUT; quantities committed to reservations cannot be adjusted away.
 */
export async function adjustStock(
  ctx: InventoryContext,
  tenantId: string,
  positionId: string,
  input: AdjustStockInput
): Promise<AdjustResult> {
  const { scales } = ctx.ledger;
  if (!Number.isFinite(input.newOnHand) || input.newOnHand < 0) {
    throw new InventoryError('INVALID_QUANTITY', { newOnHand: input.newOnHand });
  }
  const newOnHand = roundQuantity(input.newOnHand, scales);

  return runInventoryTransaction(ctx, 'adjust', async (client) => {
    const position = await lockActivePosition(client, tenantId, positionId);

    for (const movementType of ['ADJUST_IN', 'ADJUST_OUT'] as const) {
      const replayed = await findReplayedMovement(
        client,
        position,
        movementType,
        input.referenceId,
        (existing) => Math.abs(existing.onHandAfter - newOnHand) <= EPSILON
      );
      if (replayed) {
        return {
          position,
          movement: replayed,
          delta: roundQuantity(replayed.onHandAfter - replayed.onHandBefore, scales),
          duplicate: true,
          layer: null,
          consumptions: []
        };
      }
    }

    const delta = roundQuantity(newOnHand - position.onHand, scales);
    if (Math.abs(delta) <= EPSILON) {
      return { position, movement: null, delta: 0, duplicate: false, layer: null, consumptions: [] };
    }
    const committed = roundQuantity(committedQuantity(position), scales);
    if (newOnHand + EPSILON < committed) {
      throw new InventoryError('ADJUSTMENT_BELOW_COMMITTED', { newOnHand, committed });
    }

    const now = ctx.now();
    const quantity = Math.abs(delta);
    if (delta > 0) {
      const unitCost = position.averageCost > 0 ? position.averageCost : position.standardCost;
      const buckets = applyMovementType(pickBuckets(position), 'ADJUST_IN', quantity, scales);
      const movement = await appendMovement(client, position, {
        movementType: 'ADJUST_IN',
        quantity,
        unitCost,
        totalCost: roundMoney(quantity * unitCost, scales),
        onHandBefore: position.onHand,
        onHandAfter: buckets.onHand,
        referenceId: input.referenceId,
        document: input.document,
        reason: input.reason,
        occurredAt: now
      });
      const layer = await createLayer(
        client,
        position,
        { quantity, unitCost, movementId: movement.id, document: input.document ?? null, receivedAt: now },
        scales
      );
      position.averageCost = weightedAverageCost(position.onHand, position.averageCost, quantity, unitCost, scales);
      Object.assign(position, buckets);
      refreshPositionValue(position, scales);
      await client.updatePosition(position);
      return { position, movement, delta, duplicate: false, layer, consumptions: [] };
    }

    const buckets = applyMovementType(pickBuckets(position), 'ADJUST_OUT', quantity, scales);
    const movementId = uuidv4();
    const cost = await consumeLayers(client, position, quantity, movementId, now, scales);
    const movement = await appendMovement(client, position, {
      id: movementId,
      movementType: 'ADJUST_OUT',
      quantity: -quantity,
      unitCost: cost.unitCost,
      totalCost: cost.totalCost,
      onHandBefore: position.onHand,
      onHandAfter: buckets.onHand,
      referenceId: input.referenceId,
      document: input.document,
      reason: input.reason,
      occurredAt: now
    });
    Object.assign(position, buckets);
    refreshPositionValue(position, scales);
    await client.updatePosition(position);
    return { position, movement, delta, duplicate: false, layer: null, consumptions: cost.slices };
  });
}

export type TransferStockInput = {
  fromPositionId: string;
  to: PositionKey & PositionAttributes;
  quantity: number;
  reason?: string | null;
  referenceId?: string | null;
  document?: DocumentRef | null;
};

export type TransferResult = {
  source: StockPosition;
  destination: StockPosition;
  outbound: StockMovement;
  inbound: StockMovement;
  layers: ValuationLayer[];
  totalCost: number;
  duplicate: boolean;
};

/**
 * Moves available stock between positions with its cost layers.
 * The outbound and inbound legs commit separately; a failed inbound leg
 * reverses the outbound one before the error is raised.
 */
export async function transferStock(
  ctx: InventoryContext,
  tenantId: string,
  input: TransferStockInput
): Promise<TransferResult> {
  const { scales } = ctx.ledger;
  const quantity = requirePositiveQuantity(input.quantity, scales);

  const out = await runInventoryTransaction(ctx, 'transfer_out', async (client) => {
    const source = await lockActivePosition(client, tenantId, input.fromPositionId);
    if (source.positionKey === serializePositionKey(input.to)) {
      throw new InventoryError('TRANSFER_SAME_POSITION', { positionId: source.id });
    }
    const replayed = await findReplayedMovement(client, source, 'TRANSFER_OUT', input.referenceId, (existing) =>
      sameQuantity(existing, quantity)
    );
    if (replayed) {
      return {
        source,
        movement: replayed,
        duplicate: true,
        slices: await slicesOfMovement(client, tenantId, replayed, scales)
      };
    }

    const buckets = applyMovementType(pickBuckets(source), 'TRANSFER_OUT', quantity, scales);
    const now = ctx.now();
    const movementId = uuidv4();
    const cost = await consumeLayers(client, source, quantity, movementId, now, scales);
    const movement = await appendMovement(client, source, {
      id: movementId,
      movementType: 'TRANSFER_OUT',
      quantity: -quantity,
      unitCost: cost.unitCost,
      totalCost: cost.totalCost,
      onHandBefore: source.onHand,
      onHandAfter: buckets.onHand,
      referenceId: input.referenceId,
      document: input.document,
      reason: input.reason,
      occurredAt: now
    });
    Object.assign(source, buckets);
    refreshPositionValue(source, scales);
    await client.updatePosition(source);
    return { source, movement, duplicate: false, slices: cost.slices };
  });

  try {
    return await runInventoryTransaction(ctx, 'transfer_in', async (client) => {
      const now = ctx.now();
      const { position: destination } = await ensurePositionAndLock(
        client,
        tenantId,
        input.to,
        ctx.ledger.defaultValuationMethod,
        input.to,
        now
      );
      const replayed = await findReplayedMovement(
        client,
        destination,
        'TRANSFER_IN',
        input.referenceId,
        (existing) => sameQuantity(existing, quantity)
      );
      if (replayed) {
        return {
          source: out.source,
          destination,
          outbound: out.movement,
          inbound: replayed,
          layers: await client.listLayers(tenantId, { movementId: replayed.id }),
          totalCost: replayed.totalCost,
          duplicate: out.duplicate
        };
      }

      const totalCost = roundMoney(sumBy(out.slices, (slice) => slice.totalCost), scales);
      const baseCost = roundUnitCost(sumBy(out.slices, (slice) => slice.quantity * slice.baseUnitCost) / quantity, scales);
      const buckets = applyMovementType(pickBuckets(destination), 'TRANSFER_IN', quantity, scales);
      const newAverageCost = weightedAverageCost(destination.onHand, destination.averageCost, quantity, baseCost, scales);
      const inbound = await appendMovement(client, destination, {
        movementType: 'TRANSFER_IN',
        quantity,
        unitCost: roundUnitCost(totalCost / quantity, scales),
        totalCost,
        onHandBefore: destination.onHand,
        onHandAfter: buckets.onHand,
        referenceId: input.referenceId,
        document: input.document,
        reason: input.reason,
        occurredAt: now
      });
      const layers: ValuationLayer[] = [];
      for (const slice of out.slices) {
        if (!isPositive(slice.quantity)) continue;
        layers.push(
          await createLayer(
            client,
            destination,
            {
              quantity: slice.quantity,
              unitCost: slice.baseUnitCost,
              landedCostPerUnit: slice.landedCostPerUnit,
              movementId: inbound.id,
              document: input.document ?? null,
              receivedAt: slice.receivedAt
            },
            scales
          )
        );
      }

      Object.assign(destination, buckets);
      destination.averageCost = newAverageCost;
      destination.unitCost = baseCost;
      destination.firstReceivedAt = destination.firstReceivedAt ?? now;
      destination.lastReceivedAt = now;
      refreshPositionValue(destination, scales);
      await client.updatePosition(destination);
      return {
        source: out.source,
        destination,
        outbound: out.movement,
        inbound,
        layers,
        totalCost,
        duplicate: false
      };
    });
  } catch (error) {
    if (!out.duplicate) {
      await compensateTransferOut(ctx, tenantId, out.movement, error);
    }
    throw error;
  }
}

async function compensateTransferOut(
  ctx: InventoryContext,
  tenantId: string,
  outbound: StockMovement,
  cause: unknown
): Promise<void> {
  try {
    await runInventoryTransaction(ctx, 'transfer_compensation', (client) =>
      postReversal(client, ctx, tenantId, outbound.id, {
        reason: 'TRANSFER_COMPENSATION',
        enforceWindow: false
      })
    );
    emitInventoryEvent(INVENTORY_EVENT.TRANSFER_COMPENSATED, {
      tenantId,
      sourcePositionId: outbound.positionId,
      movementId: outbound.id,
      message: errorMessage(cause)
    });
  } catch (compensationError) {
    emitInventoryEvent(
      INVENTORY_EVENT.TRANSFER_COMPENSATION_FAILED,
      {
        tenantId,
        sourcePositionId: outbound.positionId,
        movementId: outbound.id,
        message: errorMessage(compensationError)
      },
      console.error
    );
  }
}

export type PipelineInput = {
  incoming?: number;
  inTransit?: number;
};

/** Records expected and in-transit quantities; on-hand is untouched. */
export async function setPipelineQuantities(
  ctx: InventoryContext,
  tenantId: string,
  positionId: string,
  input: PipelineInput
): Promise<StockPosition> {
  const { scales } = ctx.ledger;
  for (const value of [input.incoming, input.inTransit]) {
    if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
      throw new InventoryError('INVALID_QUANTITY', { incoming: input.incoming, inTransit: input.inTransit });
    }
  }
  return runInventoryTransaction(ctx, 'pipeline', async (client) => {
    const position = await lockActivePosition(client, tenantId, positionId);
    if (input.incoming !== undefined) position.incoming = roundQuantity(input.incoming, scales);
    if (input.inTransit !== undefined) position.inTransit = roundQuantity(input.inTransit, scales);
    position.updatedAt = ctx.now();
    await client.updatePosition(position);
    return position;
  });
}

export async function provisionPosition(
  ctx: InventoryContext,
  tenantId: string,
  input: PositionKey & PositionAttributes
): Promise<{ position: StockPosition; created: boolean }> {
  return runInventoryTransaction(ctx, 'provision', (client) =>
    ensurePositionAndLock(client, tenantId, input, ctx.ledger.defaultValuationMethod, input, ctx.now())
  );
}

function assertEmpty(position: StockPosition) {
  const held = position.onHand + position.available + committedQuantity(position);
  if (Math.abs(held) > EPSILON) {
    throw new InventoryError('POSITION_NOT_EMPTY', {
      positionId: position.id,
      onHand: position.onHand,
      reserved: position.reserved,
      allocated: position.allocated,
      picked: position.picked
    });
  }
}

export async function deactivatePosition(
  ctx: InventoryContext,
  tenantId: string,
  positionId: string
): Promise<StockPosition> {
  return runInventoryTransaction(ctx, 'deactivate', async (client) => {
    const position = await client.lockPosition(tenantId, positionId);
    if (!position || position.isDeleted) {
      throw new InventoryError('POSITION_NOT_FOUND', { positionId });
    }
    assertEmpty(position);
    position.isActive = false;
    position.updatedAt = ctx.now();
    await client.updatePosition(position);
    return position;
  });
}

export async function softDeletePosition(
  ctx: InventoryContext,
  tenantId: string,
  positionId: string
): Promise<StockPosition> {
  return runInventoryTransaction(ctx, 'soft_delete', async (client) => {
    const position = await client.lockPosition(tenantId, positionId);
    if (!position || position.isDeleted) {
      throw new InventoryError('POSITION_NOT_FOUND', { positionId });
    }
    assertEmpty(position);
    position.isActive = false;
    position.isDeleted = true;
    position.updatedAt = ctx.now();
    await client.updatePosition(position);
    return position;
  });
}

export async function getPosition(ctx: InventoryContext, tenantId: string, positionId: string) {
  return ctx.store.withTransaction((client) => getVisiblePosition(client, tenantId, positionId));
}

export type AvailabilityQuery = {
  productId: string;
  warehouseId: string;
  variantId?: string | null;
};

export type AvailabilitySummary = {
  productId: string;
  warehouseId: string;
  variantId: string | null;
  available: number;
  onHand: number;
  reserved: number;
  allocated: number;
  picked: number;
  incoming: number;
  inTransit: number;
  positions: number;
};

export async function getAvailableQuantity(
  ctx: InventoryContext,
  tenantId: string,
  queryInput: AvailabilityQuery
): Promise<AvailabilitySummary> {
  const { scales } = ctx.ledger;
  const positions = await ctx.store.withTransaction((client) =>
    client.listPositions(tenantId, {
      productId: queryInput.productId,
      warehouseId: queryInput.warehouseId,
      variantId: queryInput.variantId,
      activeOnly: true
    })
  );
  const total = (pick: (position: StockPosition) => number) => roundQuantity(sumBy(positions, pick), scales);
  return {
    productId: queryInput.productId,
    warehouseId: queryInput.warehouseId,
    variantId: queryInput.variantId ?? null,
    available: total((p) => p.available),
    onHand: total((p) => p.onHand),
    reserved: total((p) => p.reserved),
    allocated: total((p) => p.allocated),
    picked: total((p) => p.picked),
    incoming: total((p) => p.incoming),
    inTransit: total((p) => p.inTransit),
    positions: positions.length
  };
}
