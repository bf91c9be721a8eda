export type ValuationMethod = 'FIFO' | 'LIFO';

export const DOCUMENT_TYPES = [
  'PURCHASE_ORDER',
  'SALES_ORDER',
  'TRANSFER_ORDER',
  'WORK_ORDER',
  'ADJUSTMENT',
  'CYCLE_COUNT',
  'RESERVATION_ITEM',
  'RETURN',
  'OTHER'
] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

/**
 * Lookup key for a business document owned by another subsystem.
 * Carries no ownership; callers resolve it against their own store.
 */
export type DocumentRef = {
  documentType: DocumentType;
  documentId: string;
};

export type PositionKey = {
  productId: string;
  variantId: string | null;
  warehouseId: string;
  locationId: string | null;
  batchId: string | null;
};

export type BucketName = 'onHand' | 'available' | 'reserved' | 'allocated' | 'picked' | 'shipped';

export type BucketState = Record<BucketName, number>;

export type StockPosition = PositionKey &
  BucketState & {
    id: string;
    tenantId: string;
    positionKey: string;
    incoming: number;
    inTransit: number;
    unitCost: number;
    averageCost: number;
    standardCost: number;
    totalValue: number;
    valuationMethod: ValuationMethod;
    qualityGrade: string | null;
    expiryDate: Date | null;
    locationDistance: number | null;
    firstReceivedAt: Date | null;
    lastReceivedAt: Date | null;
    lastMovementAt: Date | null;
    lastMovementSeq: number;
    lastLayerSeq: number;
    isActive: boolean;
    isDeleted: boolean;
    createdAt: Date;
    updatedAt: Date;
  };

export const MOVEMENT_TYPES = [
  'RECEIVE',
  'SHIP',
  'RESERVE',
  'RELEASE',
  'ALLOCATE',
  'DEALLOCATE',
  'PICK',
  'UNPICK',
  'ADJUST_IN',
  'ADJUST_OUT',
  'TRANSFER_IN',
  'TRANSFER_OUT',
  'REVERSAL'
] as const;

export type MovementType = (typeof MOVEMENT_TYPES)[number];

export type MovementStatus = 'CONFIRMED' | 'CANCELLED' | 'REVERSED';

export type StockMovement = {
  id: string;
  tenantId: string;
  positionId: string;
  sequence: number;
  movementType: MovementType;
  status: MovementStatus;
  quantity: number;
  unitCost: number;
  totalCost: number;
  onHandBefore: number;
  onHandAfter: number;
  referenceId: string | null;
  document: DocumentRef | null;
  reason: string | null;
  isReversal: boolean;
  reversedMovementId: string | null;
  occurredAt: Date;
  createdAt: Date;
};

export type ValuationLayer = {
  id: string;
  tenantId: string;
  positionId: string;
  sequence: number;
  method: ValuationMethod;
  receivedAt: Date;
  quantityReceived: number;
  quantityConsumed: number;
  quantityRemaining: number;
  unitCost: number;
  landedCostPerUnit: number;
  totalLandedCost: number;
  freightCost: number;
  dutyCost: number;
  handlingCost: number;
  otherCost: number;
  isFullyConsumed: boolean;
  fullyConsumedAt: Date | null;
  movementId: string | null;
  document: DocumentRef | null;
  createdAt: Date;
  updatedAt: Date;
};

export type LayerConsumption = {
  id: string;
  tenantId: string;
  layerId: string;
  movementId: string;
  positionId: string;
  quantity: number;
  unitCost: number;
  totalCost: number;
  consumedAt: Date;
};

export const RESERVATION_TYPES = [
  'SALES_ORDER',
  'WORK_ORDER',
  'TRANSFER_ORDER',
  'SERVICE_ORDER',
  'SAMPLE_REQUEST',
  'QUALITY_HOLD',
  'CUSTOMER_HOLD',
  'MANUAL',
  'OTHER'
] as const;

export type ReservationType = (typeof RESERVATION_TYPES)[number];

export const RESERVATION_PRIORITIES = ['LOW', 'NORMAL', 'HIGH', 'URGENT', 'CRITICAL', 'EMERGENCY'] as const;

export type ReservationPriority = (typeof RESERVATION_PRIORITIES)[number];

export const PRIORITY_SCORES: Record<ReservationPriority, number> = {
  LOW: 200,
  NORMAL: 400,
  HIGH: 600,
  URGENT: 800,
  CRITICAL: 900,
  EMERGENCY: 1000
};

export const FULFILLMENT_STRATEGIES = [
  'FIFO',
  'LIFO',
  'FEFO',
  'NEAREST',
  'CHEAPEST',
  'HIGHEST_QUALITY',
  'MANUAL'
] as const;

export type FulfillmentStrategy = (typeof FULFILLMENT_STRATEGIES)[number];

export const RESERVATION_STATUSES = [
  'PENDING',
  'ACTIVE',
  'PARTIAL_FULFILLED',
  'FULFILLED',
  'EXPIRED',
  'CANCELLED'
] as const;

export type ReservationStatus = (typeof RESERVATION_STATUSES)[number];

export type ReservationItemStatus =
  | 'REQUESTED'
  | 'RESERVED'
  | 'ALLOCATED'
  | 'PARTIAL_FULFILLED'
  | 'FULFILLED'
  | 'BACKORDERED'
  | 'CANCELLED';

export type Reservation = {
  id: string;
  tenantId: string;
  reservationType: ReservationType;
  priority: ReservationPriority;
  strategy: FulfillmentStrategy;
  status: ReservationStatus;
  warehouseId: string | null;
  sourceDocument: DocumentRef | null;
  requiredAt: Date;
  expiresAt: Date;
  autoReleaseOnExpiry: boolean;
  autoAllocate: boolean;
  partialFulfillmentAllowed: boolean;
  sendExpiryNotifications: boolean;
  notificationLeadTimeHours: number;
  lastNotificationSentAt: Date | null;
  escalationRequired: boolean;
  escalatedTo: string | null;
  escalationReason: string | null;
  escalatedAt: Date | null;
  reservedValue: number;
  fulfilledValue: number;
  cancellationReason: string | null;
  cancelledAt: Date | null;
  expiredAt: Date | null;
  fulfilledAt: Date | null;
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export type ReservationItem = {
  id: string;
  tenantId: string;
  reservationId: string;
  lineNumber: number;
  productId: string;
  variantId: string | null;
  quantityRequested: number;
  quantityReserved: number;
  quantityAllocated: number;
  quantityPicked: number;
  quantityFulfilled: number;
  quantityBackordered: number;
  preferredWarehouseId: string | null;
  preferredLocationId: string | null;
  preferredBatchId: string | null;
  qualityGradeRequired: string | null;
  minShelfLifeDays: number | null;
  manualPositionIds: string[];
  status: ReservationItemStatus;
  reservedValue: number;
  fulfilledValue: number;
  allocatedAt: Date | null;
  fulfilledAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
};

/** PICKED_UNRELEASED: released by a cancellation while picked stock still sits on the position. */
export type AllocationStatus = 'ACTIVE' | 'FULFILLED' | 'RELEASED' | 'PICKED_UNRELEASED';

export type Allocation = {
  id: string;
  tenantId: string;
  reservationId: string;
  reservationItemId: string;
  positionId: string;
  quantityAllocated: number;
  quantityHeldReserved: number;
  quantityHeldAllocated: number;
  quantityHeldPicked: number;
  quantityFulfilled: number;
  quantityReleased: number;
  quantityRemaining: number;
  unitCost: number;
  fulfilledCost: number;
  status: AllocationStatus;
  createdAt: Date;
  updatedAt: Date;
};

export type OutboxEventInput = {
  tenantId: string;
  aggregateType: string;
  aggregateId: string;
  eventType: string;
  payload?: Record<string, unknown>;
};
