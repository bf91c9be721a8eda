import { roundMoney, roundQuantity, roundUnitCost, sumBy, type NumericScales } from '../lib/numbers';
import { runInventoryTransaction, type InventoryContext } from '../domains/inventory/context';
import { InventoryError } from '../domains/inventory/errors';
import { getVisiblePosition } from '../domains/inventory/internal/positions';
import { effectiveUnitCost, orderLayersForConsumption } from '../domains/inventory/internal/valuation';
import type { InventoryClient } from '../domains/inventory/store';
import type { DocumentRef, ValuationLayer, ValuationMethod } from '../domains/inventory/types';

/**
 * Valuation layer reads and landed-cost allocation.
 *
 * Layers are written by the ledger (receipts, positive adjustments, transfer
 * arrivals) and consumed by outbound movements. Landed cost raises the cost of
 * whatever remains in a layer; quantities already consumed keep the cost they
 * left with, and the position's average cost is not restated.
 */

export const LANDED_COST_TYPES = ['FREIGHT', 'DUTY', 'HANDLING', 'OTHER'] as const;
export type LandedCostType = (typeof LANDED_COST_TYPES)[number];

export const COST_ALLOCATION_METHODS = ['QUANTITY', 'VALUE', 'EQUAL'] as const;
export type CostAllocationMethod = (typeof COST_ALLOCATION_METHODS)[number];

export type LandedCostInput = {
  freight?: number;
  duty?: number;
  handling?: number;
  other?: number;
};

export type ValuationSnapshot = {
  positionId: string;
  valuationMethod: ValuationMethod;
  onHand: number;
  unitCost: number;
  averageCost: number;
  standardCost: number;
  totalValue: number;
  layerQuantity: number;
  layerValue: number;
  layers: ValuationLayer[];
};

export async function getValuationSnapshot(
  ctx: InventoryContext,
  tenantId: string,
  positionId: string
): Promise<ValuationSnapshot> {
  const { scales } = ctx.ledger;
  return ctx.store.withTransaction(async (client) => {
    const position = await getVisiblePosition(client, tenantId, positionId);
    const open = await client.listLayers(tenantId, { positionId, openOnly: true });
    const layers = orderLayersForConsumption(open, position.valuationMethod);
    return {
      positionId,
      valuationMethod: position.valuationMethod,
      onHand: position.onHand,
      unitCost: position.unitCost,
      averageCost: position.averageCost,
      standardCost: position.standardCost,
      totalValue: position.totalValue,
      layerQuantity: roundQuantity(sumBy(layers, (layer) => layer.quantityRemaining), scales),
      layerValue: roundMoney(
        sumBy(layers, (layer) => roundMoney(layer.quantityRemaining * effectiveUnitCost(layer, scales), scales)),
        scales
      ),
      layers
    };
  });
}

function normalizeComponents(input: LandedCostInput, scales: NumericScales) {
  const components = {
    freight: input.freight ?? 0,
    duty: input.duty ?? 0,
    handling: input.handling ?? 0,
    other: input.other ?? 0
  };
  for (const [name, value] of Object.entries(components)) {
    if (!Number.isFinite(value) || value < 0) {
      throw new InventoryError('LANDED_COST_INVALID', { component: name, value });
    }
  }
  const rounded = {
    freight: roundMoney(components.freight, scales),
    duty: roundMoney(components.duty, scales),
    handling: roundMoney(components.handling, scales),
    other: roundMoney(components.other, scales)
  };
  const total = roundMoney(rounded.freight + rounded.duty + rounded.handling + rounded.other, scales);
  if (total <= 0) {
    throw new InventoryError('LANDED_COST_INVALID', { total });
  }
  return { ...rounded, total };
}

async function applyLandedCost(
  client: InventoryClient,
  ctx: InventoryContext,
  layer: ValuationLayer,
  components: ReturnType<typeof normalizeComponents>
): Promise<ValuationLayer> {
  const { scales } = ctx.ledger;
  if (layer.quantityReceived <= 0) {
    throw new InventoryError('LANDED_COST_INVALID', { layerId: layer.id, quantityReceived: layer.quantityReceived });
  }
  const perUnit = roundUnitCost(components.total / layer.quantityReceived, scales);
  layer.landedCostPerUnit = roundUnitCost(layer.landedCostPerUnit + perUnit, scales);
  layer.freightCost = roundMoney(layer.freightCost + components.freight, scales);
  layer.dutyCost = roundMoney(layer.dutyCost + components.duty, scales);
  layer.handlingCost = roundMoney(layer.handlingCost + components.handling, scales);
  layer.otherCost = roundMoney(layer.otherCost + components.other, scales);
  layer.totalLandedCost = roundMoney(layer.totalLandedCost + components.total, scales);
  layer.updatedAt = ctx.now();
  await client.updateLayer(layer);
  return layer;
}

async function lockLayerPosition(client: InventoryClient, tenantId: string, layerId: string) {
  const layer = await client.getLayer(tenantId, layerId);
  if (!layer) {
    throw new InventoryError('LAYER_NOT_FOUND', { layerId });
  }
  // Layer quantities move under the position lock; take it before touching the layer.
  await client.lockPosition(tenantId, layer.positionId);
  const locked = await client.getLayer(tenantId, layerId);
  if (!locked) {
    throw new InventoryError('LAYER_NOT_FOUND', { layerId });
  }
  return locked;
}

export async function allocateLandedCosts(
  ctx: InventoryContext,
  tenantId: string,
  layerId: string,
  input: LandedCostInput
): Promise<ValuationLayer> {
  const components = normalizeComponents(input, ctx.ledger.scales);
  return runInventoryTransaction(ctx, 'landed_cost', async (client) => {
    const layer = await lockLayerPosition(client, tenantId, layerId);
    return applyLandedCost(client, ctx, layer, components);
  });
}

export type DocumentCostInput = {
  document: DocumentRef;
  amount: number;
  costType: LandedCostType;
  method: CostAllocationMethod;
};

export type DocumentCostShare = {
  layerId: string;
  positionId: string;
  amount: number;
  landedCostPerUnit: number;
};

function allocationWeight(layer: ValuationLayer, method: CostAllocationMethod): number {
  if (method === 'QUANTITY') return layer.quantityReceived;
  if (method === 'VALUE') return layer.quantityReceived * layer.unitCost;
  return 1;
}

function componentsFor(costType: LandedCostType, amount: number): LandedCostInput {
  switch (costType) {
    case 'FREIGHT':
      return { freight: amount };
    case 'DUTY':
      return { duty: amount };
    case 'HANDLING':
      return { handling: amount };
    default:
      return { other: amount };
  }
}

/** Splits `amount` by weight; the last share absorbs the rounding remainder. */
export function splitByWeight(amount: number, weights: number[], scales?: NumericScales): number[] {
  const totalWeight = sumBy(weights, (weight) => weight);
  if (weights.length === 0 || totalWeight <= 0) return [];
  const shares: number[] = [];
  let assigned = 0;
  weights.forEach((weight, index) => {
    if (index === weights.length - 1) {
      shares.push(roundMoney(amount - assigned, scales));
      return;
    }
    const share = roundMoney((amount * weight) / totalWeight, scales);
    shares.push(share);
    assigned = roundMoney(assigned + share, scales);
  });
  return shares;
}

/**
 * Distributes a document-level cost (freight on a purchase order, duty on an
 * import) over every layer that document created.
 */
export async function allocateDocumentCost(
  ctx: InventoryContext,
  tenantId: string,
  input: DocumentCostInput
): Promise<DocumentCostShare[]> {
  const { scales } = ctx.ledger;
  if (!Number.isFinite(input.amount) || roundMoney(input.amount, scales) <= 0) {
    throw new InventoryError('LANDED_COST_INVALID', { amount: input.amount });
  }
  const amount = roundMoney(input.amount, scales);

  return runInventoryTransaction(ctx, 'document_cost', async (client) => {
    const found = await client.listLayers(tenantId, { document: input.document });
    if (found.length === 0) {
      throw new InventoryError('COST_ALLOCATION_NO_LAYERS', { ...input.document });
    }
    const positionIds = [...new Set(found.map((layer) => layer.positionId))].sort();
    for (const positionId of positionIds) {
      await client.lockPosition(tenantId, positionId);
    }
    const layers = await client.listLayers(tenantId, { document: input.document });
    const shares = splitByWeight(
      amount,
      layers.map((layer) => allocationWeight(layer, input.method)),
      scales
    );
    if (shares.length === 0) {
      throw new InventoryError('LANDED_COST_INVALID', { method: input.method, reason: 'zero allocation base' });
    }

    const results: DocumentCostShare[] = [];
    for (const [index, layer] of layers.entries()) {
      const share = shares[index] ?? 0;
      if (share <= 0) continue;
      const updated = await applyLandedCost(client, ctx, layer, normalizeComponents(componentsFor(input.costType, share), scales));
      results.push({
        layerId: updated.id,
        positionId: updated.positionId,
        amount: share,
        landedCostPerUnit: updated.landedCostPerUnit
      });
    }
    return results;
  });
}
