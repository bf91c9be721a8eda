import { describe, expect, it } from 'vitest';
import { HOUR_MS, TENANT, createTestEnv, keyOf, stageForShipment } from '../testing/fixtures';
import {
  allocateDocumentCost,
  allocateLandedCosts,
  getValuationSnapshot,
  splitByWeight
} from './costLayers.service';
import { receiveStock, shipStock } from './stockLedger.service';

const purchaseOrder = { documentType: 'PURCHASE_ORDER' as const, documentId: 'po-7' };

describe('allocateLandedCosts', () => {
  it('raises the cost of what is left in the layer', async () => {
    const { ctx } = createTestEnv();
    const received = await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 5 });
    const layerId = received.layer?.id ?? '';

    const layer = await allocateLandedCosts(ctx, TENANT, layerId, { freight: 20, duty: 5 });
    expect(layer.landedCostPerUnit).toBe(2.5);
    expect(layer.totalLandedCost).toBe(25);
    expect(layer.freightCost).toBe(20);
    expect(layer.dutyCost).toBe(5);

    await stageForShipment(ctx, received.positionId, 4);
    const shipped = await shipStock(ctx, TENANT, received.positionId, { quantity: 4 });
    expect(shipped.unitCost).toBe(7.5);
    expect(shipped.totalCost).toBe(30);

    const snapshot = await getValuationSnapshot(ctx, TENANT, received.positionId);
    expect(snapshot.layerQuantity).toBe(6);
    expect(snapshot.layerValue).toBe(45);
    expect(snapshot.averageCost).toBe(5);
    expect(snapshot.totalValue).toBe(30);
  });

  it('rejects empty or negative components', async () => {
    const { ctx } = createTestEnv();
    const received = await receiveStock(ctx, TENANT, { ...keyOf(), quantity: 10, unitCost: 5 });
    const layerId = received.layer?.id ?? '';
    await expect(allocateLandedCosts(ctx, TENANT, layerId, {})).rejects.toThrow('LANDED_COST_INVALID');
    await expect(allocateLandedCosts(ctx, TENANT, layerId, { freight: 10, duty: -1 })).rejects.toThrow(
      'LANDED_COST_INVALID'
    );
  });

  it('reports an unknown layer', async () => {
    const { ctx } = createTestEnv();
    await expect(
      allocateLandedCosts(ctx, TENANT, '5b0e7a1c-0000-4000-8000-000000000000', { freight: 1 })
    ).rejects.toThrow('LAYER_NOT_FOUND');
  });
});

describe('allocateDocumentCost', () => {
  async function receiveTwoLines() {
    const env = createTestEnv();
    await receiveStock(env.ctx, TENANT, {
      ...keyOf({ locationId: 'loc-1' }),
      quantity: 10,
      unitCost: 2,
      document: purchaseOrder
    });
    env.clock.advance(HOUR_MS);
    await receiveStock(env.ctx, TENANT, {
      ...keyOf({ locationId: 'loc-2' }),
      quantity: 30,
      unitCost: 4,
      document: purchaseOrder
    });
    return env;
  }

  it('splits by received quantity', async () => {
    const { ctx } = await receiveTwoLines();
    const shares = await allocateDocumentCost(ctx, TENANT, {
      document: purchaseOrder,
      amount: 100,
      costType: 'FREIGHT',
      method: 'QUANTITY'
    });
    expect(shares.map((share) => [share.amount, share.landedCostPerUnit])).toEqual([
      [25, 2.5],
      [75, 2.5]
    ]);
  });

  it('splits by received value', async () => {
    const { ctx } = await receiveTwoLines();
    const shares = await allocateDocumentCost(ctx, TENANT, {
      document: purchaseOrder,
      amount: 100,
      costType: 'DUTY',
      method: 'VALUE'
    });
    expect(shares.map((share) => [share.amount, share.landedCostPerUnit])).toEqual([
      [14.29, 1.429],
      [85.71, 2.857]
    ]);
  });

  it('needs at least one layer from the document', async () => {
    const { ctx } = createTestEnv();
    await expect(
      allocateDocumentCost(ctx, TENANT, { document: purchaseOrder, amount: 10, costType: 'OTHER', method: 'EQUAL' })
    ).rejects.toThrow('COST_ALLOCATION_NO_LAYERS');
  });
});

describe('splitByWeight', () => {
  it('gives the rounding remainder to the last share', () => {
    expect(splitByWeight(10, [1, 1, 1])).toEqual([3.33, 3.33, 3.34]);
  });

  it('returns nothing without a positive total weight', () => {
    expect(splitByWeight(10, [])).toEqual([]);
    expect(splitByWeight(10, [0, 0])).toEqual([]);
  });
});
