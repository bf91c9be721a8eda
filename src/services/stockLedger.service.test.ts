import { afterEach, describe, expect, it, vi } from 'vitest';
import { InventoryError } from '../domains/inventory/errors';
import { HOUR_MS, TENANT, createTestEnv, keyOf, stageForShipment } from '../testing/fixtures';
import {
  adjustStock,
  allocateStock,
  deactivatePosition,
  deallocateStock,
  getAvailableQuantity,
  getPosition,
  pickStock,
  receiveStock,
  releaseStock,
  reserveStock,
  setPipelineQuantities,
  shipStock,
  softDeletePosition,
  transferStock,
  unpickStock
} from './stockLedger.service';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('receiveStock', () => {
  it('creates the position on first receipt and keeps a weighted average cost', async () => {
    const { ctx, clock } = createTestEnv();
    const first = await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 5 });
    clock.advance(HOUR_MS);
    const second = await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 7 });

    expect(first.created).toBe(true);
    expect(second.created).toBe(false);
    expect(second.positionId).toBe(first.positionId);
    expect(second.position.onHand).toBe(20);
    expect(second.position.available).toBe(20);
    expect(second.newAverageCost).toBe(6);
    expect(second.position.totalValue).toBe(120);
    expect(second.layer?.quantityRemaining).toBe(10);
  });

  it('returns the original movement when a reference is replayed', async () => {
    const { ctx, store } = createTestEnv();
    const input = { ...keyOf(), quantity: 10, unitCost: 5, referenceId: 'rcpt-1' };
    const first = await receiveStock(ctx, TENANT, input);
    const again = await receiveStock(ctx, TENANT, input);

    expect(again.duplicate).toBe(true);
    expect(again.movement.id).toBe(first.movement.id);
    expect(again.position.onHand).toBe(10);
    expect(store.movements()).toHaveLength(1);
  });

  it('rejects a replayed reference with a different quantity', async () => {
    const { ctx } = createTestEnv();
    await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 5, referenceId: 'rcpt-1' });
    await expect(
      receiveStock(ctx, TENANT, { ...keyOf(), quantity: 12, unitCost: 5, referenceId: 'rcpt-1' })
    ).rejects.toThrow('DUPLICATE_MOVEMENT_REFERENCE');
  });

  it('rejects non-positive quantities and negative cost', async () => {
    const { ctx } = createTestEnv();
    await expect(receiveStock(ctx, TENANT, { ...keyOf(), quantity: 0, unitCost: 5 })).rejects.toThrow(
      'INVALID_QUANTITY'
    );
    await expect(receiveStock(ctx, TENANT, { ...keyOf(), quantity: 1, unitCost: -1 })).rejects.toThrow(
      'INVALID_QUANTITY'
    );
  });
});

describe('commitment movements', () => {
  it('restores available and reserved after a reserve and its release', async () => {
    const { ctx, store } = createTestEnv();
    const { positionId } = await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 5 });

    await reserveStock(ctx, TENANT, positionId, { quantity: 4 });
    const { position } = await releaseStock(ctx, TENANT, positionId, { quantity: 4 });

    expect(position).toMatchObject({ onHand: 10, available: 10, reserved: 0 });
    const commitments = store
      .movements()
      .filter((movement) => movement.movementType === 'RESERVE' || movement.movementType === 'RELEASE');
    expect(commitments.map((movement) => movement.quantity)).toEqual([4, -4]);
  });

  it('steps back through unpick and deallocate', async () => {
    const { ctx } = createTestEnv();
    const { positionId } = await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 5 });
    await reserveStock(ctx, TENANT, positionId, { quantity: 5 });
    await allocateStock(ctx, TENANT, positionId, { quantity: 5 });
    await pickStock(ctx, TENANT, positionId, { quantity: 3 });

    await unpickStock(ctx, TENANT, positionId, { quantity: 2 });
    const { position } = await deallocateStock(ctx, TENANT, positionId, { quantity: 4 });

    expect(position).toMatchObject({ onHand: 10, available: 5, reserved: 4, allocated: 0, picked: 1 });
    await expect(unpickStock(ctx, TENANT, positionId, { quantity: 2 })).rejects.toThrow('INSUFFICIENT_PICKED');
    await expect(deallocateStock(ctx, TENANT, positionId, { quantity: 1 })).rejects.toThrow(
      'INSUFFICIENT_ALLOCATED'
    );
  });

  it('replays a reserve with the same reference once', async () => {
    const { ctx, store } = createTestEnv();
    const { positionId } = await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 5 });

    const first = await reserveStock(ctx, TENANT, positionId, { quantity: 4, referenceId: 'hold-1' });
    const again = await reserveStock(ctx, TENANT, positionId, { quantity: 4, referenceId: 'hold-1' });

    expect(first.duplicate).toBe(false);
    expect(again.duplicate).toBe(true);
    expect(again.movement.id).toBe(first.movement.id);
    expect(again.position.reserved).toBe(4);
    expect(store.movements().filter((movement) => movement.movementType === 'RESERVE')).toHaveLength(1);
    await expect(
      reserveStock(ctx, TENANT, positionId, { quantity: 5, referenceId: 'hold-1' })
    ).rejects.toThrow('DUPLICATE_MOVEMENT_REFERENCE');
  });
});

describe('shipStock', () => {
  it('costs a FIFO shipment from the oldest layers first', async () => {
    const { ctx, clock } = createTestEnv();
    const { positionId } = await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 5 });
    clock.advance(HOUR_MS);
    await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 7 });
    await stageForShipment(ctx, positionId, 15);

    const shipped = await shipStock(ctx, TENANT, positionId, { quantity: 15 });

    expect(shipped.totalCost).toBe(85);
    expect(shipped.unitCost).toBe(5.6667);
    expect(shipped.consumptions.map((slice) => [slice.quantity, slice.unitCost])).toEqual([
      [10, 5],
      [5, 7]
    ]);
    expect(shipped.position.onHand).toBe(5);
    expect(shipped.position.picked).toBe(0);
    expect(shipped.position.shipped).toBe(15);
    expect(shipped.position.averageCost).toBe(6);
    expect(shipped.position.totalValue).toBe(30);
  });

  it('costs a LIFO shipment from the newest layers first', async () => {
    const { ctx, clock } = createTestEnv();
    const { positionId } = await receiveStock(ctx, TENANT, {
      ...keyOf(),
      valuationMethod: 'LIFO',
      quantity: 10,
      unitCost: 5
    });
    clock.advance(HOUR_MS);
    await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 7 });
    await stageForShipment(ctx, positionId, 15);

    const shipped = await shipStock(ctx, TENANT, positionId, { quantity: 15 });

    expect(shipped.totalCost).toBe(95);
    expect(shipped.unitCost).toBe(6.3333);
  });

  it('refuses to ship stock that was never picked', async () => {
    const { ctx } = createTestEnv();
    const { positionId } = await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 5 });
    await expect(shipStock(ctx, TENANT, positionId, { quantity: 1 })).rejects.toThrow('INSUFFICIENT_PICKED');
  });

  it('fails the shipment and leaves the ledger untouched when layers do not cover it', async () => {
    const { ctx, store } = createTestEnv();
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { positionId } = await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 5 });
    await stageForShipment(ctx, positionId, 5);
    await store.withTransaction(async (client) => {
      const [layer] = await client.listLayers(TENANT, { positionId });
      layer.quantityRemaining = 2;
      await client.updateLayer(layer);
    });

    const failure = await shipStock(ctx, TENANT, positionId, { quantity: 5 }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(InventoryError);
    expect(failure).toMatchObject({ code: 'VALUATION_INTEGRITY', details: { requested: 5, layerQuantity: 2 } });
    expect(errors).toHaveBeenCalledWith(
      'INVENTORY_VALUATION_INTEGRITY_FAILED',
      expect.objectContaining({ positionId, requested: 5, layerQuantity: 2 })
    );
    expect(store.movements()).toHaveLength(4);
    const position = await getPosition(ctx, TENANT, positionId);
    expect(position.picked).toBe(5);
    expect(position.onHand).toBe(10);
  });
});

describe('adjustStock', () => {
  it('posts the counted difference in either direction', async () => {
    const { ctx } = createTestEnv();
    const { positionId } = await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 5 });

    const up = await adjustStock(ctx, TENANT, positionId, { newOnHand: 12, reason: 'cycle count' });
    expect(up.movement?.movementType).toBe('ADJUST_IN');
    expect(up.delta).toBe(2);
    expect(up.layer?.quantityReceived).toBe(2);
    expect(up.position.averageCost).toBe(5);

    const down = await adjustStock(ctx, TENANT, positionId, { newOnHand: 9, reason: 'damaged' });
    expect(down.movement?.movementType).toBe('ADJUST_OUT');
    expect(down.movement?.quantity).toBe(-3);
    expect(down.movement?.totalCost).toBe(15);
    expect(down.position.onHand).toBe(9);
    expect(down.position.available).toBe(9);
  });

  it('does nothing when the count matches', async () => {
    const { ctx, store } = createTestEnv();
    const { positionId } = await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 5 });
    const result = await adjustStock(ctx, TENANT, positionId, { newOnHand: 10, reason: 'cycle count' });
    expect(result.movement).toBeNull();
    expect(result.delta).toBe(0);
    expect(store.movements()).toHaveLength(1);
  });

  it('refuses to count below what reservations hold', async () => {
    const { ctx } = createTestEnv();
    const { positionId } = await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 5 });
    await reserveStock(ctx, TENANT, positionId, { quantity: 8 });
    await expect(adjustStock(ctx, TENANT, positionId, { newOnHand: 5, reason: 'shrink' })).rejects.toThrow(
      'ADJUSTMENT_BELOW_COMMITTED'
    );
  });
});

describe('transferStock', () => {
  it('moves quantity and its cost layers to the destination', async () => {
    const { ctx, clock } = createTestEnv();
    const received = await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 5 });
    clock.advance(2 * HOUR_MS);

    const result = await transferStock(ctx, TENANT, {
      fromPositionId: received.positionId,
      to: keyOf({ warehouseId: 'wh-2' }),
      quantity: 4
    });

    expect(result.source.onHand).toBe(6);
    expect(result.destination.onHand).toBe(4);
    expect(result.destination.averageCost).toBe(5);
    expect(result.totalCost).toBe(20);
    expect(result.layers).toHaveLength(1);
    expect(result.layers[0].receivedAt).toEqual(received.layer?.receivedAt);
    expect(result.inbound.movementType).toBe('TRANSFER_IN');
    expect(result.outbound.movementType).toBe('TRANSFER_OUT');
  });

  it('reverses the outbound leg when the inbound leg fails', async () => {
    const { ctx, store } = createTestEnv();
    const warnings = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { positionId } = await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 5 });
    store.beforeWrite = (operation) => {
      if (operation === 'insertPositionIfAbsent') throw new Error('destination unavailable');
    };

    await expect(
      transferStock(ctx, TENANT, { fromPositionId: positionId, to: keyOf({ warehouseId: 'wh-2' }), quantity: 4 })
    ).rejects.toThrow('destination unavailable');

    store.beforeWrite = undefined;
    const source = await getPosition(ctx, TENANT, positionId);
    expect(source.onHand).toBe(10);
    expect(source.available).toBe(10);
    expect(source.averageCost).toBe(5);
    expect(store.movements().map((movement) => [movement.movementType, movement.status])).toEqual([
      ['RECEIVE', 'CONFIRMED'],
      ['TRANSFER_OUT', 'REVERSED'],
      ['REVERSAL', 'CONFIRMED']
    ]);
    expect(warnings).toHaveBeenCalledWith(
      'INVENTORY_TRANSFER_COMPENSATED',
      expect.objectContaining({ sourcePositionId: positionId, message: 'destination unavailable' })
    );
  });

  it('rejects a transfer onto the same position', async () => {
    const { ctx } = createTestEnv();
    const { positionId } = await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 5 });
    await expect(
      transferStock(ctx, TENANT, { fromPositionId: positionId, to: keyOf(), quantity: 1 })
    ).rejects.toThrow('TRANSFER_SAME_POSITION');
  });
});

describe('position lifecycle', () => {
  it('records pipeline quantities without touching on-hand', async () => {
    const { ctx } = createTestEnv();
    const { positionId } = await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 5 });
    const position = await setPipelineQuantities(ctx, TENANT, positionId, { incoming: 5 });
    expect(position.incoming).toBe(5);
    expect(position.inTransit).toBe(0);
    expect(position.onHand).toBe(10);
  });

  it('only deactivates an empty position', async () => {
    const { ctx } = createTestEnv();
    const { positionId } = await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 5 });
    await expect(deactivatePosition(ctx, TENANT, positionId)).rejects.toThrow('POSITION_NOT_EMPTY');

    await adjustStock(ctx, TENANT, positionId, { newOnHand: 0, reason: 'write-off' });
    const inactive = await deactivatePosition(ctx, TENANT, positionId);
    expect(inactive.isActive).toBe(false);
    await expect(reserveStock(ctx, TENANT, positionId, { quantity: 1 })).rejects.toThrow('POSITION_INACTIVE');

    await softDeletePosition(ctx, TENANT, positionId);
    await expect(getPosition(ctx, TENANT, positionId)).rejects.toThrow('POSITION_NOT_FOUND');
  });

  it('sums availability across active positions of a product', async () => {
    const { ctx } = createTestEnv();
    const first = await receiveStock(ctx, TENANT, { ...keyOf({ locationId: 'loc-1' }), quantity: 10, unitCost: 5 });
    await receiveStock(ctx, TENANT, { ...keyOf({ locationId: 'loc-2' }), quantity: 4, unitCost: 5 });
    await reserveStock(ctx, TENANT, first.positionId, { quantity: 3 });

    const summary = await getAvailableQuantity(ctx, TENANT, { productId: 'sku-1', warehouseId: 'wh-1' });
    expect(summary).toMatchObject({ onHand: 14, available: 11, reserved: 3, positions: 2 });
  });

  it('retries a transaction that could not take the position lock', async () => {
    const { ctx, store } = createTestEnv({ LOCK_RETRY_BASE_MS: '0' });
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { positionId } = await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 5 });
    let failures = 0;
    store.beforeWrite = (operation) => {
      if (operation === 'insertMovement' && failures === 0) {
        failures += 1;
        throw new InventoryError('POSITION_LOCK_TIMEOUT', { positionId });
      }
    };

    const result = await reserveStock(ctx, TENANT, positionId, { quantity: 2 });
    expect(failures).toBe(1);
    expect(result.position.reserved).toBe(2);
    expect(store.movements()).toHaveLength(2);
  });
});
