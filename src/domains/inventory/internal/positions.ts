import { v4 as uuidv4 } from 'uuid';
import { InventoryError } from '../errors';
import type { InventoryClient } from '../store';
import type { PositionKey, StockPosition, ValuationMethod } from '../types';

export type PositionAttributes = {
  valuationMethod?: ValuationMethod;
  standardCost?: number;
  qualityGrade?: string | null;
  expiryDate?: Date | null;
  locationDistance?: number | null;
};

export function serializePositionKey(key: PositionKey): string {
  return [key.productId, key.variantId ?? '', key.warehouseId, key.locationId ?? '', key.batchId ?? ''].join('|');
}

export function buildPosition(
  tenantId: string,
  key: PositionKey,
  defaultMethod: ValuationMethod,
  attributes: PositionAttributes,
  now: Date
): StockPosition {
  return {
    id: uuidv4(),
    tenantId,
    positionKey: serializePositionKey(key),
    productId: key.productId,
    variantId: key.variantId,
    warehouseId: key.warehouseId,
    locationId: key.locationId,
    batchId: key.batchId,
    onHand: 0,
    available: 0,
    reserved: 0,
    allocated: 0,
    picked: 0,
    shipped: 0,
    incoming: 0,
    inTransit: 0,
    unitCost: 0,
    averageCost: 0,
    standardCost: attributes.standardCost ?? 0,
    totalValue: 0,
    valuationMethod: attributes.valuationMethod ?? defaultMethod,
    qualityGrade: attributes.qualityGrade ?? null,
    expiryDate: attributes.expiryDate ?? null,
    locationDistance: attributes.locationDistance ?? null,
    firstReceivedAt: null,
    lastReceivedAt: null,
    lastMovementAt: null,
    lastMovementSeq: 0,
    lastLayerSeq: 0,
    isActive: true,
    isDeleted: false,
    createdAt: now,
    updatedAt: now
  };
}

/**
 * Finds or creates the position for `key` and returns it locked.
 * Concurrent creators race on the unique key; the loser locks the winner's row.
 */
export async function ensurePositionAndLock(
  client: InventoryClient,
  tenantId: string,
  key: PositionKey,
  defaultMethod: ValuationMethod,
  attributes: PositionAttributes,
  now: Date
): Promise<{ position: StockPosition; created: boolean }> {
  const positionKey = serializePositionKey(key);
  const existing = await client.findPositionByKey(tenantId, positionKey);
  let created = false;
  if (!existing) {
    created = await client.insertPositionIfAbsent(buildPosition(tenantId, key, defaultMethod, attributes, now));
  }
  const row = existing ?? (await client.findPositionByKey(tenantId, positionKey));
  if (!row) {
    throw new InventoryError('POSITION_NOT_FOUND', { positionKey });
  }
  const position = await lockActivePosition(client, tenantId, row.id);
  return { position, created };
}

export async function lockActivePosition(
  client: InventoryClient,
  tenantId: string,
  positionId: string
): Promise<StockPosition> {
  const position = await client.lockPosition(tenantId, positionId);
  if (!position || position.isDeleted) {
    throw new InventoryError('POSITION_NOT_FOUND', { positionId });
  }
  if (!position.isActive) {
    throw new InventoryError('POSITION_INACTIVE', { positionId });
  }
  return position;
}

export async function getVisiblePosition(
  client: InventoryClient,
  tenantId: string,
  positionId: string
): Promise<StockPosition> {
  const position = await client.getPosition(tenantId, positionId);
  if (!position || position.isDeleted) {
    throw new InventoryError('POSITION_NOT_FOUND', { positionId });
  }
  return position;
}
