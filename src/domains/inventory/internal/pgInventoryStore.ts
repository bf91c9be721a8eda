import type { Pool, PoolClient, QueryResultRow } from 'pg';
import { isLockFailure } from '../../../lib/pgErrors';
import { enqueueOutboxEvent } from '../../../outbox/outbox.service';
import { InventoryError } from '../errors';
import type {
  AllocationFilter,
  ConsumptionFilter,
  InventoryClient,
  InventoryStore,
  LayerFilter,
  MovementFilter,
  PositionFilter,
  ReservationFilter
} from '../store';
import {
  PRIORITY_SCORES,
  RESERVATION_PRIORITIES,
  type Allocation,
  type LayerConsumption,
  type MovementStatus,
  type MovementType,
  type OutboxEventInput,
  type Reservation,
  type ReservationItem,
  type StockMovement,
  type StockPosition,
  type ValuationLayer
} from '../types';
import {
  mapAllocation,
  mapConsumption,
  mapLayer,
  mapMovement,
  mapPosition,
  mapReservation,
  mapReservationItem,
  type AllocationRow,
  type LayerConsumptionRow,
  type ReservationItemRow,
  type ReservationRow,
  type StockMovementRow,
  type StockPositionRow,
  type ValuationLayerRow
} from './mappers';

const PRIORITY_SCORE_SQL = `CASE priority ${RESERVATION_PRIORITIES.map(
  (priority) => `WHEN '${priority}' THEN ${PRIORITY_SCORES[priority]}`
).join(' ')} ELSE 0 END`;

/** Collects positional parameters while a WHERE clause is assembled. */
class Clauses {
  readonly params: unknown[] = [];
  readonly parts: string[] = [];

  constructor(tenantId: string) {
    this.add('tenant_id = $?', tenantId);
  }

  add(sql: string, value: unknown) {
    this.params.push(value);
    this.parts.push(sql.replace('$?', `$${this.params.length}`));
  }

  raw(sql: string) {
    this.parts.push(sql);
  }

  where() {
    return `WHERE ${this.parts.join(' AND ')}`;
  }
}

const POSITION_COLUMNS = [
  'id',
  'tenant_id',
  'position_key',
  'product_id',
  'variant_id',
  'warehouse_id',
  'location_id',
  'batch_id',
  'on_hand',
  'available',
  'reserved',
  'allocated',
  'picked',
  'shipped',
  'incoming',
  'in_transit',
  'unit_cost',
  'average_cost',
  'standard_cost',
  'total_value',
  'valuation_method',
  'quality_grade',
  'expiry_date',
  'location_distance',
  'first_received_at',
  'last_received_at',
  'last_movement_at',
  'last_movement_seq',
  'last_layer_seq',
  'is_active',
  'is_deleted',
  'created_at',
  'updated_at'
];

function positionValues(p: StockPosition): unknown[] {
  return [
    p.id,
    p.tenantId,
    p.positionKey,
    p.productId,
    p.variantId,
    p.warehouseId,
    p.locationId,
    p.batchId,
    p.onHand,
    p.available,
    p.reserved,
    p.allocated,
    p.picked,
    p.shipped,
    p.incoming,
    p.inTransit,
    p.unitCost,
    p.averageCost,
    p.standardCost,
    p.totalValue,
    p.valuationMethod,
    p.qualityGrade,
    p.expiryDate,
    p.locationDistance,
    p.firstReceivedAt,
    p.lastReceivedAt,
    p.lastMovementAt,
    p.lastMovementSeq,
    p.lastLayerSeq,
    p.isActive,
    p.isDeleted,
    p.createdAt,
    p.updatedAt
  ];
}

function placeholders(count: number, offset = 0) {
  return Array.from({ length: count }, (_, index) => `$${index + 1 + offset}`).join(', ');
}

/** `col = $n` for every column after the first two (id, tenant_id). */
function assignments(columns: string[]) {
  return columns
    .slice(2)
    .map((column, index) => `${column} = $${index + 3}`)
    .join(', ');
}

const LAYER_COLUMNS = [
  'id',
  'tenant_id',
  'position_id',
  'sequence',
  'method',
  'received_at',
  'quantity_received',
  'quantity_consumed',
  'quantity_remaining',
  'unit_cost',
  'landed_cost_per_unit',
  'total_landed_cost',
  'freight_cost',
  'duty_cost',
  'handling_cost',
  'other_cost',
  'is_fully_consumed',
  'fully_consumed_at',
  'movement_id',
  'document_type',
  'document_id',
  'created_at',
  'updated_at'
];

function layerValues(l: ValuationLayer): unknown[] {
  return [
    l.id,
    l.tenantId,
    l.positionId,
    l.sequence,
    l.method,
    l.receivedAt,
    l.quantityReceived,
    l.quantityConsumed,
    l.quantityRemaining,
    l.unitCost,
    l.landedCostPerUnit,
    l.totalLandedCost,
    l.freightCost,
    l.dutyCost,
    l.handlingCost,
    l.otherCost,
    l.isFullyConsumed,
    l.fullyConsumedAt,
    l.movementId,
    l.document?.documentType ?? null,
    l.document?.documentId ?? null,
    l.createdAt,
    l.updatedAt
  ];
}

const RESERVATION_COLUMNS = [
  'id',
  'tenant_id',
  'reservation_type',
  'priority',
  'strategy',
  'status',
  'warehouse_id',
  'source_document_type',
  'source_document_id',
  'required_at',
  'expires_at',
  'auto_release_on_expiry',
  'auto_allocate',
  'partial_fulfillment_allowed',
  'send_expiry_notifications',
  'notification_lead_time_hours',
  'last_notification_sent_at',
  'escalation_required',
  'escalated_to',
  'escalation_reason',
  'escalated_at',
  'reserved_value',
  'fulfilled_value',
  'cancellation_reason',
  'cancelled_at',
  'expired_at',
  'fulfilled_at',
  'notes',
  'created_at',
  'updated_at'
];

function reservationValues(r: Reservation): unknown[] {
  return [
    r.id,
    r.tenantId,
    r.reservationType,
    r.priority,
    r.strategy,
    r.status,
    r.warehouseId,
    r.sourceDocument?.documentType ?? null,
    r.sourceDocument?.documentId ?? null,
    r.requiredAt,
    r.expiresAt,
    r.autoReleaseOnExpiry,
    r.autoAllocate,
    r.partialFulfillmentAllowed,
    r.sendExpiryNotifications,
    r.notificationLeadTimeHours,
    r.lastNotificationSentAt,
    r.escalationRequired,
    r.escalatedTo,
    r.escalationReason,
    r.escalatedAt,
    r.reservedValue,
    r.fulfilledValue,
    r.cancellationReason,
    r.cancelledAt,
    r.expiredAt,
    r.fulfilledAt,
    r.notes,
    r.createdAt,
    r.updatedAt
  ];
}

const ITEM_COLUMNS = [
  'id',
  'tenant_id',
  'reservation_id',
  'line_number',
  'product_id',
  'variant_id',
  'quantity_requested',
  'quantity_reserved',
  'quantity_allocated',
  'quantity_picked',
  'quantity_fulfilled',
  'quantity_backordered',
  'preferred_warehouse_id',
  'preferred_location_id',
  'preferred_batch_id',
  'quality_grade_required',
  'min_shelf_life_days',
  'manual_position_ids',
  'status',
  'reserved_value',
  'fulfilled_value',
  'allocated_at',
  'fulfilled_at',
  'created_at',
  'updated_at'
];

function itemValues(i: ReservationItem): unknown[] {
  return [
    i.id,
    i.tenantId,
    i.reservationId,
    i.lineNumber,
    i.productId,
    i.variantId,
    i.quantityRequested,
    i.quantityReserved,
    i.quantityAllocated,
    i.quantityPicked,
    i.quantityFulfilled,
    i.quantityBackordered,
    i.preferredWarehouseId,
    i.preferredLocationId,
    i.preferredBatchId,
    i.qualityGradeRequired,
    i.minShelfLifeDays,
    i.manualPositionIds,
    i.status,
    i.reservedValue,
    i.fulfilledValue,
    i.allocatedAt,
    i.fulfilledAt,
    i.createdAt,
    i.updatedAt
  ];
}

const ALLOCATION_COLUMNS = [
  'id',
  'tenant_id',
  'reservation_id',
  'reservation_item_id',
  'position_id',
  'quantity_allocated',
  'quantity_held_reserved',
  'quantity_held_allocated',
  'quantity_held_picked',
  'quantity_fulfilled',
  'quantity_released',
  'quantity_remaining',
  'unit_cost',
  'fulfilled_cost',
  'status',
  'created_at',
  'updated_at'
];

function allocationValues(a: Allocation): unknown[] {
  return [
    a.id,
    a.tenantId,
    a.reservationId,
    a.reservationItemId,
    a.positionId,
    a.quantityAllocated,
    a.quantityHeldReserved,
    a.quantityHeldAllocated,
    a.quantityHeldPicked,
    a.quantityFulfilled,
    a.quantityReleased,
    a.quantityRemaining,
    a.unitCost,
    a.fulfilledCost,
    a.status,
    a.createdAt,
    a.updatedAt
  ];
}

class PgInventoryClient implements InventoryClient {
  constructor(private readonly client: PoolClient) {}

  private async one<T extends QueryResultRow, R>(sql: string, params: unknown[], map: (row: T) => R): Promise<R | null> {
    const res = await this.client.query<T>(sql, params);
    return res.rows[0] ? map(res.rows[0]) : null;
  }

  private async many<T extends QueryResultRow, R>(sql: string, params: unknown[], map: (row: T) => R): Promise<R[]> {
    const res = await this.client.query<T>(sql, params);
    return res.rows.map(map);
  }

  getPosition(tenantId: string, id: string) {
    return this.one<StockPositionRow, StockPosition>(
      'SELECT * FROM stock_positions WHERE tenant_id = $1 AND id = $2',
      [tenantId, id],
      mapPosition
    );
  }

  lockPosition(tenantId: string, id: string) {
    return this.one<StockPositionRow, StockPosition>(
      'SELECT * FROM stock_positions WHERE tenant_id = $1 AND id = $2 FOR UPDATE',
      [tenantId, id],
      mapPosition
    );
  }

  findPositionByKey(tenantId: string, positionKey: string) {
    return this.one<StockPositionRow, StockPosition>(
      'SELECT * FROM stock_positions WHERE tenant_id = $1 AND position_key = $2',
      [tenantId, positionKey],
      mapPosition
    );
  }

  async insertPositionIfAbsent(position: StockPosition) {
    const res = await this.client.query(
      `INSERT INTO stock_positions (${POSITION_COLUMNS.join(', ')})
       VALUES (${placeholders(POSITION_COLUMNS.length)})
       ON CONFLICT (tenant_id, position_key) DO NOTHING`,
      positionValues(position)
    );
    return (res.rowCount ?? 0) > 0;
  }

  async updatePosition(position: StockPosition) {
    await this.client.query(
      `UPDATE stock_positions SET ${assignments(POSITION_COLUMNS)} WHERE id = $1 AND tenant_id = $2`,
      positionValues(position)
    );
  }

  listPositions(tenantId: string, filter: PositionFilter) {
    const clauses = new Clauses(tenantId);
    clauses.raw('is_deleted = false');
    if (filter.productId !== undefined) clauses.add('product_id = $?', filter.productId);
    if (filter.variantId === null) clauses.raw('variant_id IS NULL');
    else if (filter.variantId !== undefined) clauses.add('variant_id = $?', filter.variantId);
    if (filter.warehouseId !== undefined) clauses.add('warehouse_id = $?', filter.warehouseId);
    if (filter.activeOnly) clauses.raw('is_active = true');
    return this.many<StockPositionRow, StockPosition>(
      `SELECT * FROM stock_positions ${clauses.where()} ORDER BY position_key`,
      clauses.params,
      mapPosition
    );
  }

  async insertMovement(m: StockMovement) {
    await this.client.query(
      `INSERT INTO stock_movements (
         id, tenant_id, position_id, sequence, movement_type, status, quantity, unit_cost, total_cost,
         on_hand_before, on_hand_after, reference_id, document_type, document_id, reason,
         is_reversal, reversed_movement_id, occurred_at, created_at
       ) VALUES (${placeholders(19)})`,
      [
        m.id,
        m.tenantId,
        m.positionId,
        m.sequence,
        m.movementType,
        m.status,
        m.quantity,
        m.unitCost,
        m.totalCost,
        m.onHandBefore,
        m.onHandAfter,
        m.referenceId,
        m.document?.documentType ?? null,
        m.document?.documentId ?? null,
        m.reason,
        m.isReversal,
        m.reversedMovementId,
        m.occurredAt,
        m.createdAt
      ]
    );
  }

  getMovement(tenantId: string, id: string) {
    return this.one<StockMovementRow, StockMovement>(
      'SELECT * FROM stock_movements WHERE tenant_id = $1 AND id = $2',
      [tenantId, id],
      mapMovement
    );
  }

  async updateMovementStatus(tenantId: string, id: string, status: MovementStatus) {
    await this.client.query('UPDATE stock_movements SET status = $3 WHERE tenant_id = $1 AND id = $2', [
      tenantId,
      id,
      status
    ]);
  }

  findMovementByReference(tenantId: string, positionId: string, movementType: MovementType, referenceId: string) {
    return this.one<StockMovementRow, StockMovement>(
      `SELECT * FROM stock_movements
        WHERE tenant_id = $1 AND position_id = $2 AND movement_type = $3 AND reference_id = $4`,
      [tenantId, positionId, movementType, referenceId],
      mapMovement
    );
  }

  findReversalOf(tenantId: string, movementId: string) {
    return this.one<StockMovementRow, StockMovement>(
      `SELECT * FROM stock_movements
        WHERE tenant_id = $1 AND reversed_movement_id = $2 AND status <> 'CANCELLED'
        LIMIT 1`,
      [tenantId, movementId],
      mapMovement
    );
  }

  listMovements(tenantId: string, filter: MovementFilter) {
    const clauses = new Clauses(tenantId);
    if (filter.positionId !== undefined) clauses.add('position_id = $?', filter.positionId);
    if (filter.document) {
      clauses.add('document_type = $?', filter.document.documentType);
      clauses.add('document_id = $?', filter.document.documentId);
    }
    if (filter.from) clauses.add('occurred_at >= $?', filter.from);
    if (filter.to) clauses.add('occurred_at <= $?', filter.to);
    return this.many<StockMovementRow, StockMovement>(
      `SELECT * FROM stock_movements ${clauses.where()} ORDER BY position_id, sequence`,
      clauses.params,
      mapMovement
    );
  }

  async insertLayer(layer: ValuationLayer) {
    await this.client.query(
      `INSERT INTO valuation_layers (${LAYER_COLUMNS.join(', ')}) VALUES (${placeholders(LAYER_COLUMNS.length)})`,
      layerValues(layer)
    );
  }

  getLayer(tenantId: string, id: string) {
    return this.one<ValuationLayerRow, ValuationLayer>(
      'SELECT * FROM valuation_layers WHERE tenant_id = $1 AND id = $2',
      [tenantId, id],
      mapLayer
    );
  }

  async updateLayer(layer: ValuationLayer) {
    await this.client.query(
      `UPDATE valuation_layers SET ${assignments(LAYER_COLUMNS)} WHERE id = $1 AND tenant_id = $2`,
      layerValues(layer)
    );
  }

  listLayers(tenantId: string, filter: LayerFilter) {
    const clauses = new Clauses(tenantId);
    if (filter.positionId !== undefined) clauses.add('position_id = $?', filter.positionId);
    if (filter.movementId !== undefined) clauses.add('movement_id = $?', filter.movementId);
    if (filter.document) {
      clauses.add('document_type = $?', filter.document.documentType);
      clauses.add('document_id = $?', filter.document.documentId);
    }
    if (filter.openOnly) clauses.raw('quantity_remaining > 0');
    return this.many<ValuationLayerRow, ValuationLayer>(
      `SELECT * FROM valuation_layers ${clauses.where()} ORDER BY received_at, sequence`,
      clauses.params,
      mapLayer
    );
  }

  async insertConsumption(c: LayerConsumption) {
    await this.client.query(
      `INSERT INTO valuation_layer_consumptions (
         id, tenant_id, layer_id, movement_id, position_id, quantity, unit_cost, total_cost, consumed_at
       ) VALUES (${placeholders(9)})`,
      [c.id, c.tenantId, c.layerId, c.movementId, c.positionId, c.quantity, c.unitCost, c.totalCost, c.consumedAt]
    );
  }

  listConsumptions(tenantId: string, filter: ConsumptionFilter) {
    const clauses = new Clauses(tenantId);
    if (filter.movementId !== undefined) clauses.add('movement_id = $?', filter.movementId);
    if (filter.layerId !== undefined) clauses.add('layer_id = $?', filter.layerId);
    return this.many<LayerConsumptionRow, LayerConsumption>(
      `SELECT * FROM valuation_layer_consumptions ${clauses.where()} ORDER BY consumed_at, id`,
      clauses.params,
      mapConsumption
    );
  }

  async insertReservation(reservation: Reservation) {
    await this.client.query(
      `INSERT INTO reservations (${RESERVATION_COLUMNS.join(', ')})
       VALUES (${placeholders(RESERVATION_COLUMNS.length)})`,
      reservationValues(reservation)
    );
  }

  getReservation(tenantId: string, id: string) {
    return this.one<ReservationRow, Reservation>(
      'SELECT * FROM reservations WHERE tenant_id = $1 AND id = $2',
      [tenantId, id],
      mapReservation
    );
  }

  lockReservation(tenantId: string, id: string) {
    return this.one<ReservationRow, Reservation>(
      'SELECT * FROM reservations WHERE tenant_id = $1 AND id = $2 FOR UPDATE',
      [tenantId, id],
      mapReservation
    );
  }

  async updateReservation(reservation: Reservation) {
    await this.client.query(
      `UPDATE reservations SET ${assignments(RESERVATION_COLUMNS)} WHERE id = $1 AND tenant_id = $2`,
      reservationValues(reservation)
    );
  }

  listReservations(tenantId: string, filter: ReservationFilter) {
    const clauses = new Clauses(tenantId);
    if (filter.statuses !== undefined) clauses.add('status = ANY($?)', filter.statuses);
    if (filter.reservationType !== undefined) clauses.add('reservation_type = $?', filter.reservationType);
    if (filter.expiresBefore !== undefined) clauses.add('expires_at < $?', filter.expiresBefore);
    if (filter.sendExpiryNotifications !== undefined) {
      clauses.add('send_expiry_notifications = $?', filter.sendExpiryNotifications);
    }
    if (filter.withActiveAllocations) {
      clauses.raw(
        `EXISTS (SELECT 1 FROM reservation_allocations a
                  WHERE a.tenant_id = reservations.tenant_id
                    AND a.reservation_id = reservations.id
                    AND a.status = 'ACTIVE')`
      );
    }
    let limit = '';
    if (filter.limit !== undefined) {
      clauses.params.push(filter.limit);
      limit = `LIMIT $${clauses.params.length}`;
    }
    return this.many<ReservationRow, Reservation>(
      `SELECT * FROM reservations ${clauses.where()}
        ORDER BY ${PRIORITY_SCORE_SQL} DESC, expires_at ASC ${limit}`,
      clauses.params,
      mapReservation
    );
  }

  async insertReservationItem(item: ReservationItem) {
    await this.client.query(
      `INSERT INTO reservation_items (${ITEM_COLUMNS.join(', ')}) VALUES (${placeholders(ITEM_COLUMNS.length)})`,
      itemValues(item)
    );
  }

  getReservationItem(tenantId: string, id: string) {
    return this.one<ReservationItemRow, ReservationItem>(
      'SELECT * FROM reservation_items WHERE tenant_id = $1 AND id = $2',
      [tenantId, id],
      mapReservationItem
    );
  }

  async updateReservationItem(item: ReservationItem) {
    await this.client.query(
      `UPDATE reservation_items SET ${assignments(ITEM_COLUMNS)} WHERE id = $1 AND tenant_id = $2`,
      itemValues(item)
    );
  }

  listReservationItems(tenantId: string, reservationId: string) {
    return this.many<ReservationItemRow, ReservationItem>(
      'SELECT * FROM reservation_items WHERE tenant_id = $1 AND reservation_id = $2 ORDER BY line_number',
      [tenantId, reservationId],
      mapReservationItem
    );
  }

  async insertAllocation(allocation: Allocation) {
    await this.client.query(
      `INSERT INTO reservation_allocations (${ALLOCATION_COLUMNS.join(', ')})
       VALUES (${placeholders(ALLOCATION_COLUMNS.length)})`,
      allocationValues(allocation)
    );
  }

  async updateAllocation(allocation: Allocation) {
    await this.client.query(
      `UPDATE reservation_allocations SET ${assignments(ALLOCATION_COLUMNS)} WHERE id = $1 AND tenant_id = $2`,
      allocationValues(allocation)
    );
  }

  listAllocations(tenantId: string, filter: AllocationFilter) {
    const clauses = new Clauses(tenantId);
    if (filter.reservationId !== undefined) clauses.add('reservation_id = $?', filter.reservationId);
    if (filter.reservationItemId !== undefined) clauses.add('reservation_item_id = $?', filter.reservationItemId);
    if (filter.positionId !== undefined) clauses.add('position_id = $?', filter.positionId);
    if (filter.status !== undefined) clauses.add('status = $?', filter.status);
    return this.many<AllocationRow, Allocation>(
      `SELECT * FROM reservation_allocations ${clauses.where()} ORDER BY created_at, id`,
      clauses.params,
      mapAllocation
    );
  }

  async enqueueOutboxEvent(event: OutboxEventInput) {
    await enqueueOutboxEvent(this.client, event);
  }
}

/**
 * Postgres-backed store. Every transaction sets `lock_timeout`; a lock wait
 * that runs out, or a deadlock, surfaces as POSITION_LOCK_TIMEOUT.
 */
export class PgInventoryStore implements InventoryStore {
  constructor(
    private readonly pool: Pool,
    private readonly lockTimeoutMs: number
  ) {}

  async withTransaction<T>(handler: (client: InventoryClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await client.query("SELECT set_config('lock_timeout', $1, true)", [`${this.lockTimeoutMs}ms`]);
      const result = await handler(new PgInventoryClient(client));
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK');
      if (isLockFailure(err)) {
        throw new InventoryError('POSITION_LOCK_TIMEOUT', { lockTimeoutMs: this.lockTimeoutMs }, { cause: err });
      }
      throw err;
    } finally {
      client.release();
    }
  }
}
