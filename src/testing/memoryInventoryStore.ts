import { EPSILON } from '../lib/numbers';
import type {
  AllocationFilter,
  ConsumptionFilter,
  InventoryClient,
  InventoryStore,
  LayerFilter,
  MovementFilter,
  PositionFilter,
  ReservationFilter
} from '../domains/inventory/store';
import {
  PRIORITY_SCORES,
  type Allocation,
  type DocumentRef,
  type LayerConsumption,
  type MovementStatus,
  type MovementType,
  type OutboxEventInput,
  type Reservation,
  type ReservationItem,
  type StockMovement,
  type StockPosition,
  type ValuationLayer
} from '../domains/inventory/types';

type MemoryState = {
  positions: Map<string, StockPosition>;
  movements: Map<string, StockMovement>;
  layers: Map<string, ValuationLayer>;
  consumptions: LayerConsumption[];
  reservations: Map<string, Reservation>;
  items: Map<string, ReservationItem>;
  allocations: Map<string, Allocation>;
  outbox: OutboxEventInput[];
};

function emptyState(): MemoryState {
  return {
    positions: new Map(),
    movements: new Map(),
    layers: new Map(),
    consumptions: [],
    reservations: new Map(),
    items: new Map(),
    allocations: new Map(),
    outbox: []
  };
}

function sameDocument(a: DocumentRef | null, b: DocumentRef): boolean {
  return a !== null && a.documentType === b.documentType && a.documentId === b.documentId;
}

function owned<T extends { tenantId: string }>(row: T | undefined, tenantId: string): T | null {
  if (!row || row.tenantId !== tenantId) return null;
  return structuredClone(row);
}

export type WriteHook = (operation: keyof InventoryClient, record: unknown) => void;

class MemoryInventoryClient implements InventoryClient {
  constructor(
    private readonly state: MemoryState,
    private readonly beforeWrite: WriteHook | undefined
  ) {}

  private write(operation: keyof InventoryClient, record: unknown) {
    this.beforeWrite?.(operation, record);
  }

  async getPosition(tenantId: string, id: string) {
    return owned(this.state.positions.get(id), tenantId);
  }

  async lockPosition(tenantId: string, id: string) {
    return this.getPosition(tenantId, id);
  }

  async findPositionByKey(tenantId: string, positionKey: string) {
    for (const position of this.state.positions.values()) {
      if (position.tenantId === tenantId && position.positionKey === positionKey) {
        return structuredClone(position);
      }
    }
    return null;
  }

  async insertPositionIfAbsent(position: StockPosition) {
    this.write('insertPositionIfAbsent', position);
    if (await this.findPositionByKey(position.tenantId, position.positionKey)) return false;
    this.state.positions.set(position.id, structuredClone(position));
    return true;
  }

  async updatePosition(position: StockPosition) {
    this.write('updatePosition', position);
    this.state.positions.set(position.id, structuredClone(position));
  }

  async listPositions(tenantId: string, filter: PositionFilter) {
    return [...this.state.positions.values()]
      .filter(
        (position) =>
          position.tenantId === tenantId &&
          !position.isDeleted &&
          (filter.productId === undefined || position.productId === filter.productId) &&
          (filter.variantId === undefined || position.variantId === filter.variantId) &&
          (filter.warehouseId === undefined || position.warehouseId === filter.warehouseId) &&
          (!filter.activeOnly || position.isActive)
      )
      .sort((a, b) => a.positionKey.localeCompare(b.positionKey))
      .map((position) => structuredClone(position));
  }

  async insertMovement(movement: StockMovement) {
    this.write('insertMovement', movement);
    this.state.movements.set(movement.id, structuredClone(movement));
  }

  async getMovement(tenantId: string, id: string) {
    return owned(this.state.movements.get(id), tenantId);
  }

  async updateMovementStatus(tenantId: string, id: string, status: MovementStatus) {
    this.write('updateMovementStatus', { id, status });
    const movement = this.state.movements.get(id);
    if (movement && movement.tenantId === tenantId) {
      movement.status = status;
    }
  }

  async findMovementByReference(tenantId: string, positionId: string, movementType: MovementType, referenceId: string) {
    for (const movement of this.state.movements.values()) {
      if (
        movement.tenantId === tenantId &&
        movement.positionId === positionId &&
        movement.movementType === movementType &&
        movement.referenceId === referenceId
      ) {
        return structuredClone(movement);
      }
    }
    return null;
  }

  async findReversalOf(tenantId: string, movementId: string) {
    for (const movement of this.state.movements.values()) {
      if (movement.tenantId === tenantId && movement.reversedMovementId === movementId) {
        return structuredClone(movement);
      }
    }
    return null;
  }

  async listMovements(tenantId: string, filter: MovementFilter) {
    const { document } = filter;
    return [...this.state.movements.values()]
      .filter(
        (movement) =>
          movement.tenantId === tenantId &&
          (filter.positionId === undefined || movement.positionId === filter.positionId) &&
          (document === undefined || sameDocument(movement.document, document)) &&
          (filter.from === undefined || movement.occurredAt.getTime() >= filter.from.getTime()) &&
          (filter.to === undefined || movement.occurredAt.getTime() <= filter.to.getTime())
      )
      .sort((a, b) => a.positionId.localeCompare(b.positionId) || a.sequence - b.sequence)
      .map((movement) => structuredClone(movement));
  }

  async insertLayer(layer: ValuationLayer) {
    this.write('insertLayer', layer);
    this.state.layers.set(layer.id, structuredClone(layer));
  }

  async getLayer(tenantId: string, id: string) {
    return owned(this.state.layers.get(id), tenantId);
  }

  async updateLayer(layer: ValuationLayer) {
    this.write('updateLayer', layer);
    this.state.layers.set(layer.id, structuredClone(layer));
  }

  async listLayers(tenantId: string, filter: LayerFilter) {
    const { document } = filter;
    return [...this.state.layers.values()]
      .filter(
        (layer) =>
          layer.tenantId === tenantId &&
          (filter.positionId === undefined || layer.positionId === filter.positionId) &&
          (filter.movementId === undefined || layer.movementId === filter.movementId) &&
          (document === undefined || sameDocument(layer.document, document)) &&
          (!filter.openOnly || layer.quantityRemaining > EPSILON)
      )
      .sort((a, b) => a.receivedAt.getTime() - b.receivedAt.getTime() || a.sequence - b.sequence)
      .map((layer) => structuredClone(layer));
  }

  async insertConsumption(consumption: LayerConsumption) {
    this.write('insertConsumption', consumption);
    this.state.consumptions.push(structuredClone(consumption));
  }

  async listConsumptions(tenantId: string, filter: ConsumptionFilter) {
    return this.state.consumptions
      .filter(
        (row) =>
          row.tenantId === tenantId &&
          (filter.movementId === undefined || row.movementId === filter.movementId) &&
          (filter.layerId === undefined || row.layerId === filter.layerId)
      )
      .map((row) => structuredClone(row));
  }

  async insertReservation(reservation: Reservation) {
    this.write('insertReservation', reservation);
    this.state.reservations.set(reservation.id, structuredClone(reservation));
  }

  async getReservation(tenantId: string, id: string) {
    return owned(this.state.reservations.get(id), tenantId);
  }

  async lockReservation(tenantId: string, id: string) {
    return this.getReservation(tenantId, id);
  }

  async updateReservation(reservation: Reservation) {
    this.write('updateReservation', reservation);
    this.state.reservations.set(reservation.id, structuredClone(reservation));
  }

  async listReservations(tenantId: string, filter: ReservationFilter) {
    const rows = [...this.state.reservations.values()]
      .filter(
        (reservation) =>
          reservation.tenantId === tenantId &&
          (filter.statuses === undefined || filter.statuses.includes(reservation.status)) &&
          (filter.reservationType === undefined || reservation.reservationType === filter.reservationType) &&
          (filter.expiresBefore === undefined || reservation.expiresAt.getTime() < filter.expiresBefore.getTime()) &&
          (filter.sendExpiryNotifications === undefined ||
            reservation.sendExpiryNotifications === filter.sendExpiryNotifications) &&
          (!filter.withActiveAllocations || this.hasActiveAllocation(reservation.id))
      )
      .sort(
        (a, b) =>
          PRIORITY_SCORES[b.priority] - PRIORITY_SCORES[a.priority] || a.expiresAt.getTime() - b.expiresAt.getTime()
      );
    return rows.slice(0, filter.limit ?? rows.length).map((reservation) => structuredClone(reservation));
  }

  private hasActiveAllocation(reservationId: string) {
    for (const allocation of this.state.allocations.values()) {
      if (allocation.reservationId === reservationId && allocation.status === 'ACTIVE') return true;
    }
    return false;
  }

  async insertReservationItem(item: ReservationItem) {
    this.write('insertReservationItem', item);
    this.state.items.set(item.id, structuredClone(item));
  }

  async getReservationItem(tenantId: string, id: string) {
    return owned(this.state.items.get(id), tenantId);
  }

  async updateReservationItem(item: ReservationItem) {
    this.write('updateReservationItem', item);
    this.state.items.set(item.id, structuredClone(item));
  }

  async listReservationItems(tenantId: string, reservationId: string) {
    return [...this.state.items.values()]
      .filter((item) => item.tenantId === tenantId && item.reservationId === reservationId)
      .sort((a, b) => a.lineNumber - b.lineNumber)
      .map((item) => structuredClone(item));
  }

  async insertAllocation(allocation: Allocation) {
    this.write('insertAllocation', allocation);
    this.state.allocations.set(allocation.id, structuredClone(allocation));
  }

  async updateAllocation(allocation: Allocation) {
    this.write('updateAllocation', allocation);
    this.state.allocations.set(allocation.id, structuredClone(allocation));
  }

  async listAllocations(tenantId: string, filter: AllocationFilter) {
    return [...this.state.allocations.values()]
      .filter(
        (allocation) =>
          allocation.tenantId === tenantId &&
          (filter.reservationId === undefined || allocation.reservationId === filter.reservationId) &&
          (filter.reservationItemId === undefined || allocation.reservationItemId === filter.reservationItemId) &&
          (filter.positionId === undefined || allocation.positionId === filter.positionId) &&
          (filter.status === undefined || allocation.status === filter.status)
      )
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((allocation) => structuredClone(allocation));
  }

  async enqueueOutboxEvent(event: OutboxEventInput) {
    this.write('enqueueOutboxEvent', event);
    const exists = this.state.outbox.some(
      (row) =>
        row.tenantId === event.tenantId &&
        row.aggregateType === event.aggregateType &&
        row.aggregateId === event.aggregateId &&
        row.eventType === event.eventType
    );
    if (!exists) this.state.outbox.push(structuredClone(event));
  }
}

/**
 * In-process store for tests. Transactions run one at a time against a copy
 * of the state that replaces it on commit and is dropped on throw.
 */
export class MemoryInventoryStore implements InventoryStore {
  private state = emptyState();
  private tail: Promise<void> = Promise.resolve();

  /** Called before every write; throw from it to fail a transaction at a chosen step. */
  beforeWrite: WriteHook | undefined;

  async withTransaction<T>(handler: (client: InventoryClient) => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const turn = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => turn);
    await previous;
    try {
      const working = structuredClone(this.state);
      const result = await handler(new MemoryInventoryClient(working, this.beforeWrite));
      this.state = working;
      return result;
    } finally {
      release();
    }
  }

  positions(): StockPosition[] {
    return [...this.state.positions.values()].map((row) => structuredClone(row));
  }

  movements(): StockMovement[] {
    return [...this.state.movements.values()]
      .sort((a, b) => a.positionId.localeCompare(b.positionId) || a.sequence - b.sequence)
      .map((row) => structuredClone(row));
  }

  layers(): ValuationLayer[] {
    return [...this.state.layers.values()].map((row) => structuredClone(row));
  }

  consumptions(): LayerConsumption[] {
    return this.state.consumptions.map((row) => structuredClone(row));
  }

  allocations(): Allocation[] {
    return [...this.state.allocations.values()].map((row) => structuredClone(row));
  }

  outboxEvents(): OutboxEventInput[] {
    return this.state.outbox.map((row) => structuredClone(row));
  }
}
