import { toNumber } from '../../../lib/numbers';
import {
  DOCUMENT_TYPES,
  type Allocation,
  type AllocationStatus,
  type DocumentRef,
  type DocumentType,
  type FulfillmentStrategy,
  type LayerConsumption,
  type MovementStatus,
  type MovementType,
  type Reservation,
  type ReservationItem,
  type ReservationItemStatus,
  type ReservationPriority,
  type ReservationStatus,
  type ReservationType,
  type StockMovement,
  type StockPosition,
  type ValuationLayer,
  type ValuationMethod
} from '../types';

// pg returns NUMERIC and BIGINT as strings.
type Numeric = string | number;

export type StockPositionRow = {
  id: string;
  tenant_id: string;
  position_key: string;
  product_id: string;
  variant_id: string | null;
  warehouse_id: string;
  location_id: string | null;
  batch_id: string | null;
  on_hand: Numeric;
  available: Numeric;
  reserved: Numeric;
  allocated: Numeric;
  picked: Numeric;
  shipped: Numeric;
  incoming: Numeric;
  in_transit: Numeric;
  unit_cost: Numeric;
  average_cost: Numeric;
  standard_cost: Numeric;
  total_value: Numeric;
  valuation_method: ValuationMethod;
  quality_grade: string | null;
  expiry_date: Date | null;
  location_distance: Numeric | null;
  first_received_at: Date | null;
  last_received_at: Date | null;
  last_movement_at: Date | null;
  last_movement_seq: Numeric;
  last_layer_seq: Numeric;
  is_active: boolean;
  is_deleted: boolean;
  created_at: Date;
  updated_at: Date;
};

export type StockMovementRow = {
  id: string;
  tenant_id: string;
  position_id: string;
  sequence: Numeric;
  movement_type: MovementType;
  status: MovementStatus;
  quantity: Numeric;
  unit_cost: Numeric;
  total_cost: Numeric;
  on_hand_before: Numeric;
  on_hand_after: Numeric;
  reference_id: string | null;
  document_type: string | null;
  document_id: string | null;
  reason: string | null;
  is_reversal: boolean;
  reversed_movement_id: string | null;
  occurred_at: Date;
  created_at: Date;
};

export type ValuationLayerRow = {
  id: string;
  tenant_id: string;
  position_id: string;
  sequence: Numeric;
  method: ValuationMethod;
  received_at: Date;
  quantity_received: Numeric;
  quantity_consumed: Numeric;
  quantity_remaining: Numeric;
  unit_cost: Numeric;
  landed_cost_per_unit: Numeric;
  total_landed_cost: Numeric;
  freight_cost: Numeric;
  duty_cost: Numeric;
  handling_cost: Numeric;
  other_cost: Numeric;
  is_fully_consumed: boolean;
  fully_consumed_at: Date | null;
  movement_id: string | null;
  document_type: string | null;
  document_id: string | null;
  created_at: Date;
  updated_at: Date;
};

export type LayerConsumptionRow = {
  id: string;
  tenant_id: string;
  layer_id: string;
  movement_id: string;
  position_id: string;
  quantity: Numeric;
  unit_cost: Numeric;
  total_cost: Numeric;
  consumed_at: Date;
};

export type ReservationRow = {
  id: string;
  tenant_id: string;
  reservation_type: ReservationType;
  priority: ReservationPriority;
  strategy: FulfillmentStrategy;
  status: ReservationStatus;
  warehouse_id: string | null;
  source_document_type: string | null;
  source_document_id: string | null;
  required_at: Date;
  expires_at: Date;
  auto_release_on_expiry: boolean;
  auto_allocate: boolean;
  partial_fulfillment_allowed: boolean;
  send_expiry_notifications: boolean;
  notification_lead_time_hours: Numeric;
  last_notification_sent_at: Date | null;
  escalation_required: boolean;
  escalated_to: string | null;
  escalation_reason: string | null;
  escalated_at: Date | null;
  reserved_value: Numeric;
  fulfilled_value: Numeric;
  cancellation_reason: string | null;
  cancelled_at: Date | null;
  expired_at: Date | null;
  fulfilled_at: Date | null;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
};

export type ReservationItemRow = {
  id: string;
  tenant_id: string;
  reservation_id: string;
  line_number: Numeric;
  product_id: string;
  variant_id: string | null;
  quantity_requested: Numeric;
  quantity_reserved: Numeric;
  quantity_allocated: Numeric;
  quantity_picked: Numeric;
  quantity_fulfilled: Numeric;
  quantity_backordered: Numeric;
  preferred_warehouse_id: string | null;
  preferred_location_id: string | null;
  preferred_batch_id: string | null;
  quality_grade_required: string | null;
  min_shelf_life_days: Numeric | null;
  manual_position_ids: string[] | null;
  status: ReservationItemStatus;
  reserved_value: Numeric;
  fulfilled_value: Numeric;
  allocated_at: Date | null;
  fulfilled_at: Date | null;
  created_at: Date;
  updated_at: Date;
};

export type AllocationRow = {
  id: string;
  tenant_id: string;
  reservation_id: string;
  reservation_item_id: string;
  position_id: string;
  quantity_allocated: Numeric;
  quantity_held_reserved: Numeric;
  quantity_held_allocated: Numeric;
  quantity_held_picked: Numeric;
  quantity_fulfilled: Numeric;
  quantity_released: Numeric;
  quantity_remaining: Numeric;
  unit_cost: Numeric;
  fulfilled_cost: Numeric;
  status: AllocationStatus;
  created_at: Date;
  updated_at: Date;
};

function isDocumentType(value: string): value is DocumentType {
  return DOCUMENT_TYPES.some((type) => type === value);
}

function mapDocument(type: string | null, id: string | null): DocumentRef | null {
  if (!type || !id || !isDocumentType(type)) return null;
  return { documentType: type, documentId: id };
}

function nullableNumber(value: Numeric | null): number | null {
  return value === null ? null : toNumber(value);
}

export function mapPosition(row: StockPositionRow): StockPosition {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    positionKey: row.position_key,
    productId: row.product_id,
    variantId: row.variant_id,
    warehouseId: row.warehouse_id,
    locationId: row.location_id,
    batchId: row.batch_id,
    onHand: toNumber(row.on_hand),
    available: toNumber(row.available),
    reserved: toNumber(row.reserved),
    allocated: toNumber(row.allocated),
    picked: toNumber(row.picked),
    shipped: toNumber(row.shipped),
    incoming: toNumber(row.incoming),
    inTransit: toNumber(row.in_transit),
    unitCost: toNumber(row.unit_cost),
    averageCost: toNumber(row.average_cost),
    standardCost: toNumber(row.standard_cost),
    totalValue: toNumber(row.total_value),
    valuationMethod: row.valuation_method,
    qualityGrade: row.quality_grade,
    expiryDate: row.expiry_date,
    locationDistance: nullableNumber(row.location_distance),
    firstReceivedAt: row.first_received_at,
    lastReceivedAt: row.last_received_at,
    lastMovementAt: row.last_movement_at,
    lastMovementSeq: toNumber(row.last_movement_seq),
    lastLayerSeq: toNumber(row.last_layer_seq),
    isActive: row.is_active,
    isDeleted: row.is_deleted,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

export function mapMovement(row: StockMovementRow): StockMovement {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    positionId: row.position_id,
    sequence: toNumber(row.sequence),
    movementType: row.movement_type,
    status: row.status,
    quantity: toNumber(row.quantity),
    unitCost: toNumber(row.unit_cost),
    totalCost: toNumber(row.total_cost),
    onHandBefore: toNumber(row.on_hand_before),
    onHandAfter: toNumber(row.on_hand_after),
    referenceId: row.reference_id,
    document: mapDocument(row.document_type, row.document_id),
    reason: row.reason,
    isReversal: row.is_reversal,
    reversedMovementId: row.reversed_movement_id,
    occurredAt: row.occurred_at,
    createdAt: row.created_at
  };
}

export function mapLayer(row: ValuationLayerRow): ValuationLayer {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    positionId: row.position_id,
    sequence: toNumber(row.sequence),
    method: row.method,
    receivedAt: row.received_at,
    quantityReceived: toNumber(row.quantity_received),
    quantityConsumed: toNumber(row.quantity_consumed),
    quantityRemaining: toNumber(row.quantity_remaining),
    unitCost: toNumber(row.unit_cost),
    landedCostPerUnit: toNumber(row.landed_cost_per_unit),
    totalLandedCost: toNumber(row.total_landed_cost),
    freightCost: toNumber(row.freight_cost),
    dutyCost: toNumber(row.duty_cost),
    handlingCost: toNumber(row.handling_cost),
    otherCost: toNumber(row.other_cost),
    isFullyConsumed: row.is_fully_consumed,
    fullyConsumedAt: row.fully_consumed_at,
    movementId: row.movement_id,
    document: mapDocument(row.document_type, row.document_id),
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

export function mapConsumption(row: LayerConsumptionRow): LayerConsumption {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    layerId: row.layer_id,
    movementId: row.movement_id,
    positionId: row.position_id,
    quantity: toNumber(row.quantity),
    unitCost: toNumber(row.unit_cost),
    totalCost: toNumber(row.total_cost),
    consumedAt: row.consumed_at
  };
}

export function mapReservation(row: ReservationRow): Reservation {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    reservationType: row.reservation_type,
    priority: row.priority,
    strategy: row.strategy,
    status: row.status,
    warehouseId: row.warehouse_id,
    sourceDocument: mapDocument(row.source_document_type, row.source_document_id),
    requiredAt: row.required_at,
    expiresAt: row.expires_at,
    autoReleaseOnExpiry: row.auto_release_on_expiry,
    autoAllocate: row.auto_allocate,
    partialFulfillmentAllowed: row.partial_fulfillment_allowed,
    sendExpiryNotifications: row.send_expiry_notifications,
    notificationLeadTimeHours: toNumber(row.notification_lead_time_hours),
    lastNotificationSentAt: row.last_notification_sent_at,
    escalationRequired: row.escalation_required,
    escalatedTo: row.escalated_to,
    escalationReason: row.escalation_reason,
    escalatedAt: row.escalated_at,
    reservedValue: toNumber(row.reserved_value),
    fulfilledValue: toNumber(row.fulfilled_value),
    cancellationReason: row.cancellation_reason,
    cancelledAt: row.cancelled_at,
    expiredAt: row.expired_at,
    fulfilledAt: row.fulfilled_at,
    notes: row.notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

export function mapReservationItem(row: ReservationItemRow): ReservationItem {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    reservationId: row.reservation_id,
    lineNumber: toNumber(row.line_number),
    productId: row.product_id,
    variantId: row.variant_id,
    quantityRequested: toNumber(row.quantity_requested),
    quantityReserved: toNumber(row.quantity_reserved),
    quantityAllocated: toNumber(row.quantity_allocated),
    quantityPicked: toNumber(row.quantity_picked),
    quantityFulfilled: toNumber(row.quantity_fulfilled),
    quantityBackordered: toNumber(row.quantity_backordered),
    preferredWarehouseId: row.preferred_warehouse_id,
    preferredLocationId: row.preferred_location_id,
    preferredBatchId: row.preferred_batch_id,
    qualityGradeRequired: row.quality_grade_required,
    minShelfLifeDays: nullableNumber(row.min_shelf_life_days),
    manualPositionIds: row.manual_position_ids ?? [],
    status: row.status,
    reservedValue: toNumber(row.reserved_value),
    fulfilledValue: toNumber(row.fulfilled_value),
    allocatedAt: row.allocated_at,
    fulfilledAt: row.fulfilled_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

export function mapAllocation(row: AllocationRow): Allocation {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    reservationId: row.reservation_id,
    reservationItemId: row.reservation_item_id,
    positionId: row.position_id,
    quantityAllocated: toNumber(row.quantity_allocated),
    quantityHeldReserved: toNumber(row.quantity_held_reserved),
    quantityHeldAllocated: toNumber(row.quantity_held_allocated),
    quantityHeldPicked: toNumber(row.quantity_held_picked),
    quantityFulfilled: toNumber(row.quantity_fulfilled),
    quantityReleased: toNumber(row.quantity_released),
    quantityRemaining: toNumber(row.quantity_remaining),
    unitCost: toNumber(row.unit_cost),
    fulfilledCost: toNumber(row.fulfilled_cost),
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}
