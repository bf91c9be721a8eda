import { v4 as uuidv4 } from 'uuid';
import {
  EPSILON,
  isPositive,
  roundMoney,
  roundQuantity,
  roundUnitCost,
  sumBy,
  type NumericScales
} from '../../../lib/numbers';
import { INVENTORY_EVENT, emitInventoryEvent } from '../../../observability/inventory.events';
import { InventoryError } from '../errors';
import type { InventoryClient } from '../store';
import type { DocumentRef, StockPosition, ValuationLayer, ValuationMethod } from '../types';

export type CreateLayerInput = {
  quantity: number;
  unitCost: number;
  landedCostPerUnit?: number;
  movementId: string;
  document: DocumentRef | null;
  receivedAt: Date;
};

/** One slice taken from a layer; `unitCost` includes landed cost. */
export type LayerSlice = {
  layerId: string;
  quantity: number;
  baseUnitCost: number;
  landedCostPerUnit: number;
  unitCost: number;
  totalCost: number;
  receivedAt: Date;
};

export type ConsumeLayersResult = {
  totalCost: number;
  unitCost: number;
  slices: LayerSlice[];
};

export function effectiveUnitCost(
  layer: Pick<ValuationLayer, 'unitCost' | 'landedCostPerUnit'>,
  scales?: NumericScales
): number {
  return roundUnitCost(layer.unitCost + layer.landedCostPerUnit, scales);
}

export function orderLayersForConsumption(layers: ValuationLayer[], method: ValuationMethod): ValuationLayer[] {
  const direction = method === 'LIFO' ? -1 : 1;
  return [...layers].sort((a, b) => {
    const byDate = a.receivedAt.getTime() - b.receivedAt.getTime();
    if (byDate !== 0) return byDate * direction;
    return (a.sequence - b.sequence) * direction;
  });
}

export function weightedAverageCost(
  onHand: number,
  averageCost: number,
  quantity: number,
  unitCost: number,
  scales?: NumericScales
): number {
  const total = roundQuantity(onHand + quantity, scales);
  if (!isPositive(total)) return roundMoney(unitCost, scales);
  return roundMoney((onHand * averageCost + quantity * unitCost) / total, scales);
}

export async function createLayer(
  client: InventoryClient,
  position: StockPosition,
  input: CreateLayerInput,
  scales?: NumericScales
): Promise<ValuationLayer> {
  const sequence = position.lastLayerSeq + 1;
  const landedCostPerUnit = roundUnitCost(input.landedCostPerUnit ?? 0, scales);
  const layer: ValuationLayer = {
    id: uuidv4(),
    tenantId: position.tenantId,
    positionId: position.id,
    sequence,
    method: position.valuationMethod,
    receivedAt: input.receivedAt,
    quantityReceived: input.quantity,
    quantityConsumed: 0,
    quantityRemaining: input.quantity,
    unitCost: roundUnitCost(input.unitCost, scales),
    landedCostPerUnit,
    totalLandedCost: roundMoney(landedCostPerUnit * input.quantity, scales),
    freightCost: 0,
    dutyCost: 0,
    handlingCost: 0,
    otherCost: 0,
    isFullyConsumed: false,
    fullyConsumedAt: null,
    movementId: input.movementId,
    document: input.document,
    createdAt: input.receivedAt,
    updatedAt: input.receivedAt
  };
  await client.insertLayer(layer);
  position.lastLayerSeq = sequence;
  return layer;
}

/**
 * Takes `quantity` out of the position's open layers in FIFO or LIFO order and
 * records one consumption per layer touched. The position must be locked.
 */
export async function consumeLayers(
  client: InventoryClient,
  position: StockPosition,
  quantity: number,
  movementId: string,
  consumedAt: Date,
  scales?: NumericScales
): Promise<ConsumeLayersResult> {
  const open = await client.listLayers(position.tenantId, { positionId: position.id, openOnly: true });
  const layerQuantity = roundQuantity(sumBy(open, (layer) => layer.quantityRemaining), scales);
  if (layerQuantity + EPSILON < quantity) {
    emitInventoryEvent(
      INVENTORY_EVENT.VALUATION_INTEGRITY_FAILED,
      { tenantId: position.tenantId, positionId: position.id, requested: quantity, layerQuantity },
      console.error
    );
    throw new InventoryError('VALUATION_INTEGRITY', {
      positionId: position.id,
      requested: quantity,
      layerQuantity
    });
  }

  let remaining = quantity;
  const slices: LayerSlice[] = [];
  for (const layer of orderLayersForConsumption(open, position.valuationMethod)) {
    if (!isPositive(remaining)) break;
    const take = roundQuantity(Math.min(layer.quantityRemaining, remaining), scales);
    if (!isPositive(take)) continue;
    const unitCost = effectiveUnitCost(layer, scales);
    const totalCost = roundMoney(take * unitCost, scales);

    layer.quantityRemaining = roundQuantity(layer.quantityRemaining - take, scales);
    layer.quantityConsumed = roundQuantity(layer.quantityConsumed + take, scales);
    if (!isPositive(layer.quantityRemaining)) {
      layer.quantityRemaining = 0;
      layer.isFullyConsumed = true;
      layer.fullyConsumedAt = consumedAt;
    }
    layer.updatedAt = consumedAt;
    await client.updateLayer(layer);
    await client.insertConsumption({
      id: uuidv4(),
      tenantId: position.tenantId,
      layerId: layer.id,
      movementId,
      positionId: position.id,
      quantity: take,
      unitCost,
      totalCost,
      consumedAt
    });

    slices.push({
      layerId: layer.id,
      quantity: take,
      baseUnitCost: layer.unitCost,
      landedCostPerUnit: layer.landedCostPerUnit,
      unitCost,
      totalCost,
      receivedAt: layer.receivedAt
    });
    remaining = roundQuantity(remaining - take, scales);
  }

  const totalCost = roundMoney(sumBy(slices, (slice) => slice.totalCost), scales);
  return {
    totalCost,
    unitCost: quantity > 0 ? roundUnitCost(totalCost / quantity, scales) : 0,
    slices
  };
}

/**
 * Puts back what `originalMovementId` consumed, writing negative consumptions
 * against `reversalMovementId`. Returns the restored cost.
 */
export async function restoreConsumedLayers(
  client: InventoryClient,
  tenantId: string,
  originalMovementId: string,
  reversalMovementId: string,
  restoredAt: Date,
  scales?: NumericScales
): Promise<number> {
  const consumptions = await client.listConsumptions(tenantId, { movementId: originalMovementId });
  let restoredCost = 0;
  for (const consumption of consumptions) {
    if (consumption.quantity <= 0) continue;
    const layer = await client.getLayer(tenantId, consumption.layerId);
    if (!layer) {
      throw new InventoryError('LAYER_NOT_FOUND', { layerId: consumption.layerId });
    }
    layer.quantityRemaining = roundQuantity(layer.quantityRemaining + consumption.quantity, scales);
    layer.quantityConsumed = roundQuantity(layer.quantityConsumed - consumption.quantity, scales);
    layer.isFullyConsumed = false;
    layer.fullyConsumedAt = null;
    layer.updatedAt = restoredAt;
    await client.updateLayer(layer);
    await client.insertConsumption({
      id: uuidv4(),
      tenantId,
      layerId: layer.id,
      movementId: reversalMovementId,
      positionId: consumption.positionId,
      quantity: -consumption.quantity,
      unitCost: consumption.unitCost,
      totalCost: -consumption.totalCost,
      consumedAt: restoredAt
    });
    restoredCost += consumption.totalCost;
  }
  return roundMoney(restoredCost, scales);
}

/**
 * Empties the layers an inbound movement created (a transfer arrival has one per
 * source slice). Only untouched layers can be retired; once stock from any of
 * them has left, the inbound movement stays.
 */
export async function retireLayersOfMovement(
  client: InventoryClient,
  tenantId: string,
  originalMovementId: string,
  reversalMovementId: string,
  retiredAt: Date,
  scales?: NumericScales
): Promise<ValuationLayer[]> {
  const layers = await client.listLayers(tenantId, { movementId: originalMovementId });
  const drawn = layers.find(
    (layer) =>
      layer.quantityConsumed > EPSILON || Math.abs(layer.quantityRemaining - layer.quantityReceived) > EPSILON
  );
  if (drawn) {
    throw new InventoryError('MOVEMENT_NOT_REVERSIBLE', {
      movementId: originalMovementId,
      layerId: drawn.id,
      quantityConsumed: drawn.quantityConsumed
    });
  }

  for (const layer of layers) {
    const unitCost = effectiveUnitCost(layer, scales);
    await client.insertConsumption({
      id: uuidv4(),
      tenantId,
      layerId: layer.id,
      movementId: reversalMovementId,
      positionId: layer.positionId,
      quantity: layer.quantityRemaining,
      unitCost,
      totalCost: roundMoney(layer.quantityRemaining * unitCost, scales),
      consumedAt: retiredAt
    });
    layer.quantityConsumed = layer.quantityReceived;
    layer.quantityRemaining = 0;
    layer.isFullyConsumed = true;
    layer.fullyConsumedAt = retiredAt;
    layer.updatedAt = retiredAt;
    await client.updateLayer(layer);
  }
  return layers;
}

export function refreshPositionValue(position: StockPosition, scales?: NumericScales): void {
  position.totalValue = roundMoney(position.onHand * position.averageCost, scales);
}
