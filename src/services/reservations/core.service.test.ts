import { describe, expect, it } from 'vitest';
import { HOUR_MS, START, TENANT, createTestEnv, reservationInput, stockTwoLocations } from '../../testing/fixtures';
import { getPosition } from '../stockLedger.service';
import { allocateReservation } from './allocation.service';
import {
  cancelReservation,
  createReservation,
  escalateReservation,
  extendExpiry,
  getReservation,
  listReservations
} from './core.service';
import { runReservationExpirySweep } from './expiry.service';
import { pickItem } from './fulfillment.service';

describe('createReservation', () => {
  it('applies defaults and numbers the lines', async () => {
    const env = createTestEnv();
    const { reservation, items } = await createReservation(env.ctx, TENANT, {
      ...reservationInput(env, 4),
      items: [
        { productId: 'sku-1', quantity: 4 },
        { productId: 'sku-2', quantity: 1.5 }
      ]
    });

    expect(reservation).toMatchObject({
      status: 'PENDING',
      priority: 'NORMAL',
      strategy: 'FIFO',
      autoReleaseOnExpiry: true,
      autoAllocate: false,
      partialFulfillmentAllowed: true,
      notificationLeadTimeHours: 24,
      requiredAt: START
    });
    expect(items.map((item) => [item.lineNumber, item.productId, item.status])).toEqual([
      [1, 'sku-1', 'REQUESTED'],
      [2, 'sku-2', 'REQUESTED']
    ]);
  });

  it('rejects a reservation without lines', async () => {
    const env = createTestEnv();
    await expect(createReservation(env.ctx, TENANT, { ...reservationInput(env, 1), items: [] })).rejects.toThrow(
      'RESERVATION_INVALID'
    );
  });

  it('rejects an expiry that is not after the required date', async () => {
    const env = createTestEnv();
    await expect(
      createReservation(env.ctx, TENANT, {
        ...reservationInput(env, 1),
        requiredAt: new Date(START.getTime() + 10 * HOUR_MS),
        expiresAt: new Date(START.getTime() + 5 * HOUR_MS)
      })
    ).rejects.toThrow('RESERVATION_EXPIRY_INVALID');
  });
});

describe('cancelReservation', () => {
  it('releases every allocation back to available stock', async () => {
    const env = createTestEnv();
    const { loc1, loc2 } = await stockTwoLocations(env);
    const { reservation } = await createReservation(env.ctx, TENANT, reservationInput(env, 15));
    await allocateReservation(env.ctx, TENANT, reservation.id);

    const result = await cancelReservation(env.ctx, TENANT, reservation.id, { reason: 'customer cancelled' });

    expect(result.reservation).toMatchObject({ status: 'CANCELLED', cancellationReason: 'customer cancelled' });
    expect(result.items[0].status).toBe('CANCELLED');
    expect(result.released.map((line) => [line.positionId, line.quantityReleased])).toEqual([
      [loc1, 10],
      [loc2, 5]
    ]);
    expect(result.allocations.every((allocation) => allocation.status === 'RELEASED')).toBe(true);
    expect(await getPosition(env.ctx, TENANT, loc1)).toMatchObject({ available: 10, reserved: 0 });
    expect(await getPosition(env.ctx, TENANT, loc2)).toMatchObject({ available: 10, reserved: 0 });
    expect(
      env.store.outboxEvents().filter((event) => event.eventType === 'inventory.reservation.changed').at(-1)?.payload
    ).toEqual({ reservationId: reservation.id, previousStatus: 'ACTIVE', status: 'CANCELLED' });
  });

  it('leaves picked stock on the position and reports it', async () => {
    const env = createTestEnv();
    const { loc1 } = await stockTwoLocations(env);
    const { reservation, items } = await createReservation(env.ctx, TENANT, reservationInput(env, 8));
    await allocateReservation(env.ctx, TENANT, reservation.id, { commit: true });
    await pickItem(env.ctx, TENANT, items[0].id, { quantity: 3 });

    const result = await cancelReservation(env.ctx, TENANT, reservation.id, { reason: 'order changed' });

    expect(result.released).toEqual([
      expect.objectContaining({ positionId: loc1, quantityReleased: 5, unreleasedPicked: 3 })
    ]);
    expect(result.allocations.map((allocation) => [allocation.status, allocation.quantityHeldPicked])).toEqual([
      ['PICKED_UNRELEASED', 3]
    ]);
    expect(env.store.allocations().filter((allocation) => allocation.status === 'ACTIVE')).toEqual([]);
    expect(await getPosition(env.ctx, TENANT, loc1)).toMatchObject({
      available: 7,
      reserved: 0,
      allocated: 0,
      picked: 3
    });
  });

  it('cancels once', async () => {
    const env = createTestEnv();
    const { reservation } = await createReservation(env.ctx, TENANT, reservationInput(env, 1));
    await cancelReservation(env.ctx, TENANT, reservation.id, { reason: 'duplicate' });
    await expect(cancelReservation(env.ctx, TENANT, reservation.id, { reason: 'again' })).rejects.toThrow(
      'RESERVATION_INVALID_STATE'
    );
  });
});

describe('extendExpiry', () => {
  it('requires a later expiry', async () => {
    const env = createTestEnv();
    const { reservation } = await createReservation(env.ctx, TENANT, reservationInput(env, 1));
    await expect(
      extendExpiry(env.ctx, TENANT, reservation.id, { expiresAt: new Date(START.getTime() + HOUR_MS), reason: 'x' })
    ).rejects.toThrow('RESERVATION_EXPIRY_INVALID');
  });

  it('reopens an expired reservation with its allocations', async () => {
    const env = createTestEnv();
    await stockTwoLocations(env);
    const { reservation } = await createReservation(
      env.ctx,
      TENANT,
      reservationInput(env, 4, {
        autoReleaseOnExpiry: false,
        expiresAt: new Date(env.clock.now().getTime() + 2 * HOUR_MS)
      })
    );
    await allocateReservation(env.ctx, TENANT, reservation.id);
    env.clock.advance(3 * HOUR_MS);
    await runReservationExpirySweep(env.ctx, TENANT);
    expect((await getReservation(env.ctx, TENANT, reservation.id)).reservation.status).toBe('EXPIRED');

    const newExpiry = new Date(env.clock.now().getTime() + 24 * HOUR_MS);
    const detail = await extendExpiry(env.ctx, TENANT, reservation.id, { expiresAt: newExpiry, reason: 'customer asked' });

    expect(detail.reservation).toMatchObject({ status: 'ACTIVE', expiredAt: null, expiresAt: newExpiry });
    expect(detail.reservation.notes).toBe(`Expiry extended to ${newExpiry.toISOString()}: customer asked`);
  });
});

describe('escalateReservation', () => {
  it('flags the reservation for follow-up', async () => {
    const env = createTestEnv();
    const { reservation } = await createReservation(env.ctx, TENANT, reservationInput(env, 1));
    const escalated = await escalateReservation(env.ctx, TENANT, reservation.id, {
      escalatedTo: 'planner-on-duty',
      reason: 'short stock'
    });
    expect(escalated).toMatchObject({
      escalationRequired: true,
      escalatedTo: 'planner-on-duty',
      escalationReason: 'short stock',
      escalatedAt: START
    });
  });
});

describe('listReservations', () => {
  it('returns higher priorities first', async () => {
    const env = createTestEnv();
    const low = await createReservation(env.ctx, TENANT, reservationInput(env, 1, { priority: 'LOW' }));
    const high = await createReservation(env.ctx, TENANT, reservationInput(env, 1, { priority: 'HIGH' }));
    const cancelled = await createReservation(env.ctx, TENANT, reservationInput(env, 1, { priority: 'URGENT' }));
    await cancelReservation(env.ctx, TENANT, cancelled.reservation.id, { reason: 'duplicate' });

    const rows = await listReservations(env.ctx, TENANT, { statuses: ['PENDING'] });

    expect(rows.map((row) => row.id)).toEqual([high.reservation.id, low.reservation.id]);
  });
});
