import { getBackorderPolicy } from '../config/backorderPolicy';
import { getLedgerPolicy } from '../config/ledgerPolicy';
import { createInventoryContext, type InventoryContext } from '../domains/inventory/context';
import type { PositionKey } from '../domains/inventory/types';
import type { CreateReservationInput } from '../services/reservations/core.service';
import { allocateStock, pickStock, receiveStock, reserveStock } from '../services/stockLedger.service';
import { MemoryInventoryStore } from './memoryInventoryStore';

export const TENANT = 'tenant-a';
export const HOUR_MS = 60 * 60 * 1000;
export const START = new Date('2026-03-02T10:00:00.000Z');

export type TestClock = {
  now: () => Date;
  set: (date: Date) => void;
  advance: (ms: number) => void;
};

export type TestEnv = {
  store: MemoryInventoryStore;
  ctx: InventoryContext;
  clock: TestClock;
};

export function createTestEnv(env: NodeJS.ProcessEnv = {}): TestEnv {
  const store = new MemoryInventoryStore();
  let current = START.getTime();
  const clock: TestClock = {
    now: () => new Date(current),
    set: (date) => {
      current = date.getTime();
    },
    advance: (ms) => {
      current += ms;
    }
  };
  const ctx = createInventoryContext(store, {
    ledger: getLedgerPolicy(env),
    backorders: getBackorderPolicy(env),
    now: clock.now
  });
  return { store, ctx, clock };
}

export function keyOf(overrides: Partial<PositionKey> = {}): PositionKey {
  return {
    productId: 'sku-1',
    variantId: null,
    warehouseId: 'wh-1',
    locationId: null,
    batchId: null,
    ...overrides
  };
}

/** available → reserved → allocated → picked on one position. */
export async function stageForShipment(ctx: InventoryContext, positionId: string, quantity: number) {
  await reserveStock(ctx, TENANT, positionId, { quantity });
  await allocateStock(ctx, TENANT, positionId, { quantity });
  return pickStock(ctx, TENANT, positionId, { quantity });
}

/** loc-1: 10 @ 5 received at START; loc-2: 10 @ 6 received an hour later. */
export async function stockTwoLocations(env: TestEnv) {
  const first = await receiveStock(env.ctx, TENANT, { ...keyOf({ locationId: 'loc-1' }), quantity: 10, unitCost: 5 });
  env.clock.advance(HOUR_MS);
  const second = await receiveStock(env.ctx, TENANT, { ...keyOf({ locationId: 'loc-2' }), quantity: 10, unitCost: 6 });
  return { loc1: first.positionId, loc2: second.positionId };
}

export function reservationInput(
  env: TestEnv,
  quantity: number,
  overrides: Partial<CreateReservationInput> = {}
): CreateReservationInput {
  return {
    reservationType: 'SALES_ORDER',
    expiresAt: new Date(env.clock.now().getTime() + 48 * HOUR_MS),
    items: [{ productId: 'sku-1', quantity }],
    ...overrides
  };
}
