import type {
  Allocation,
  AllocationStatus,
  DocumentRef,
  LayerConsumption,
  MovementStatus,
  MovementType,
  OutboxEventInput,
  Reservation,
  ReservationItem,
  ReservationStatus,
  ReservationType,
  StockMovement,
  StockPosition,
  ValuationLayer
} from './types';

export type PositionFilter = {
  productId?: string;
  variantId?: string | null;
  warehouseId?: string;
  activeOnly?: boolean;
};

export type MovementFilter = {
  positionId?: string;
  document?: DocumentRef;
  from?: Date;
  to?: Date;
};

export type LayerFilter = {
  positionId?: string;
  movementId?: string;
  document?: DocumentRef;
  openOnly?: boolean;
};

export type ConsumptionFilter = {
  movementId?: string;
  layerId?: string;
};

export type ReservationFilter = {
  statuses?: ReservationStatus[];
  reservationType?: ReservationType;
  expiresBefore?: Date;
  withActiveAllocations?: boolean;
  sendExpiryNotifications?: boolean;
  limit?: number;
};

export type AllocationFilter = {
  reservationId?: string;
  reservationItemId?: string;
  positionId?: string;
  status?: AllocationStatus;
};

/**
 * Tenant-scoped data access used inside a single transaction.
 * `lock*` functions hold a row lock until the transaction ends; every
 * other read sees the transaction's own writes.
 */
export interface InventoryClient {
  getPosition(tenantId: string, id: string): Promise<StockPosition | null>;
  lockPosition(tenantId: string, id: string): Promise<StockPosition | null>;
  findPositionByKey(tenantId: string, positionKey: string): Promise<StockPosition | null>;
  /** Inserts unless a position with the same key exists; returns whether a row was written. */
  insertPositionIfAbsent(position: StockPosition): Promise<boolean>;
  updatePosition(position: StockPosition): Promise<void>;
  listPositions(tenantId: string, filter: PositionFilter): Promise<StockPosition[]>;

  insertMovement(movement: StockMovement): Promise<void>;
  getMovement(tenantId: string, id: string): Promise<StockMovement | null>;
  updateMovementStatus(tenantId: string, id: string, status: MovementStatus): Promise<void>;
  findMovementByReference(
    tenantId: string,
    positionId: string,
    movementType: MovementType,
    referenceId: string
  ): Promise<StockMovement | null>;
  findReversalOf(tenantId: string, movementId: string): Promise<StockMovement | null>;
  /** Ordered by position, then sequence. */
  listMovements(tenantId: string, filter: MovementFilter): Promise<StockMovement[]>;

  insertLayer(layer: ValuationLayer): Promise<void>;
  getLayer(tenantId: string, id: string): Promise<ValuationLayer | null>;
  updateLayer(layer: ValuationLayer): Promise<void>;
  /** Ordered by received date, then sequence. */
  listLayers(tenantId: string, filter: LayerFilter): Promise<ValuationLayer[]>;
  insertConsumption(consumption: LayerConsumption): Promise<void>;
  listConsumptions(tenantId: string, filter: ConsumptionFilter): Promise<LayerConsumption[]>;

  insertReservation(reservation: Reservation): Promise<void>;
  getReservation(tenantId: string, id: string): Promise<Reservation | null>;
  lockReservation(tenantId: string, id: string): Promise<Reservation | null>;
  updateReservation(reservation: Reservation): Promise<void>;
  /** Ordered by priority score desc, then expiry asc. */
  listReservations(tenantId: string, filter: ReservationFilter): Promise<Reservation[]>;

  insertReservationItem(item: ReservationItem): Promise<void>;
  getReservationItem(tenantId: string, id: string): Promise<ReservationItem | null>;
  updateReservationItem(item: ReservationItem): Promise<void>;
  /** Ordered by line number. */
  listReservationItems(tenantId: string, reservationId: string): Promise<ReservationItem[]>;

  insertAllocation(allocation: Allocation): Promise<void>;
  updateAllocation(allocation: Allocation): Promise<void>;
  /** Ordered by creation time. */
  listAllocations(tenantId: string, filter: AllocationFilter): Promise<Allocation[]>;

  enqueueOutboxEvent(event: OutboxEventInput): Promise<void>;
}

export interface InventoryStore {
  withTransaction<T>(handler: (client: InventoryClient) => Promise<T>): Promise<T>;
}
