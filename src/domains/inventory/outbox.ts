import type { InventoryClient } from './store';
import type { Reservation, ReservationStatus, StockMovement } from './types';

export async function enqueueStockMovementPosted(client: InventoryClient, movement: StockMovement) {
  await client.enqueueOutboxEvent({
    tenantId: movement.tenantId,
    aggregateType: 'stock_movement',
    aggregateId: movement.id,
    eventType: 'inventory.movement.posted',
    payload: {
      movementId: movement.id,
      positionId: movement.positionId,
      movementType: movement.movementType,
      quantity: movement.quantity,
      sequence: movement.sequence
    }
  });
}

export async function enqueueReservationChanged(
  client: InventoryClient,
  reservation: Reservation,
  previousStatus: ReservationStatus
) {
  await client.enqueueOutboxEvent({
    tenantId: reservation.tenantId,
    aggregateType: 'reservation',
    aggregateId: `${reservation.id}:${reservation.status}:${reservation.updatedAt.toISOString()}`,
    eventType: 'inventory.reservation.changed',
    payload: { reservationId: reservation.id, previousStatus, status: reservation.status }
  });
}

export async function enqueueReservationExpiring(client: InventoryClient, reservation: Reservation, dueAt: Date) {
  await client.enqueueOutboxEvent({
    tenantId: reservation.tenantId,
    aggregateType: 'reservation',
    aggregateId: `${reservation.id}:${reservation.expiresAt.toISOString()}`,
    eventType: 'inventory.reservation.expiring',
    payload: {
      reservationId: reservation.id,
      expiresAt: reservation.expiresAt.toISOString(),
      notificationDueAt: dueAt.toISOString(),
      priority: reservation.priority
    }
  });
}
