import { getRequestContext } from '../lib/requestContext';

export const INVENTORY_EVENT = {
  VALUATION_INTEGRITY_FAILED: 'INVENTORY_VALUATION_INTEGRITY_FAILED',
  LOCK_RETRY: 'INVENTORY_POSITION_LOCK_RETRY',
  ALLOCATION_COMPENSATED: 'RESERVATION_ALLOCATION_COMPENSATED',
  ALLOCATION_COMPENSATION_FAILED: 'RESERVATION_ALLOCATION_COMPENSATION_FAILED',
  TRANSFER_COMPENSATED: 'INVENTORY_TRANSFER_COMPENSATED',
  TRANSFER_COMPENSATION_FAILED: 'INVENTORY_TRANSFER_COMPENSATION_FAILED',
  RESERVATION_SWEEP_FAILED: 'RESERVATION_SWEEP_ITEM_FAILED',
  LEDGER_MISMATCH: 'INVENTORY_LEDGER_MISMATCH'
} as const;

export type InventoryEventName = (typeof INVENTORY_EVENT)[keyof typeof INVENTORY_EVENT];

export type InventoryEventPayloadMap = {
  [INVENTORY_EVENT.VALUATION_INTEGRITY_FAILED]: {
    tenantId: string;
    positionId: string;
    requested: number;
    layerQuantity: number;
  };
  [INVENTORY_EVENT.LOCK_RETRY]: {
    label: string;
    attempt: number;
    delayMs: number;
  };
  [INVENTORY_EVENT.ALLOCATION_COMPENSATED]: {
    tenantId: string;
    reservationId: string;
    reason: string;
    positions: number;
  };
  [INVENTORY_EVENT.ALLOCATION_COMPENSATION_FAILED]: {
    tenantId: string;
    reservationId: string;
    positionId: string;
    message: string;
  };
  [INVENTORY_EVENT.TRANSFER_COMPENSATED]: {
    tenantId: string;
    sourcePositionId: string;
    movementId: string;
    message: string;
  };
  [INVENTORY_EVENT.TRANSFER_COMPENSATION_FAILED]: {
    tenantId: string;
    sourcePositionId: string;
    movementId: string;
    message: string;
  };
  [INVENTORY_EVENT.RESERVATION_SWEEP_FAILED]: {
    tenantId: string;
    reservationId: string;
    sweep: 'expiry' | 'notification' | 'release';
    message: string;
  };
  [INVENTORY_EVENT.LEDGER_MISMATCH]: {
    tenantId: string;
    positionId: string;
    mismatches: Array<{ bucket: string; expected: number; actual: number }>;
  };
};

export function emitInventoryEvent<T extends InventoryEventName>(
  event: T,
  payload: InventoryEventPayloadMap[T],
  logger: (eventName: string, payload: unknown) => void = console.warn
): void {
  const requestId = getRequestContext()?.requestId;
  logger(event, requestId ? { ...payload, requestId } : payload);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
