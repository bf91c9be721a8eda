export const INVENTORY_ERROR_CODES = [
  'INVALID_QUANTITY',
  'INSUFFICIENT_AVAILABLE',
  'INSUFFICIENT_RESERVED',
  'INSUFFICIENT_ALLOCATED',
  'INSUFFICIENT_PICKED',
  'DUPLICATE_MOVEMENT_REFERENCE',
  'POSITION_LOCK_TIMEOUT',
  'VALUATION_INTEGRITY',
  'REVERSAL_WINDOW_EXPIRED',
  'ALREADY_REVERSED',
  'POSITION_NOT_FOUND',
  'POSITION_INACTIVE',
  'POSITION_NOT_EMPTY',
  'ADJUSTMENT_BELOW_COMMITTED',
  'MOVEMENT_NOT_FOUND',
  'MOVEMENT_NOT_CONFIRMED',
  'MOVEMENT_IS_REVERSAL',
  'MOVEMENT_NOT_REVERSIBLE',
  'TRANSFER_SAME_POSITION',
  'LAYER_NOT_FOUND',
  'LANDED_COST_INVALID',
  'COST_ALLOCATION_NO_LAYERS',
  'RESERVATION_NOT_FOUND',
  'RESERVATION_ITEM_NOT_FOUND',
  'RESERVATION_INVALID',
  'RESERVATION_INVALID_STATE',
  'RESERVATION_EXPIRY_INVALID',
  'ALLOCATION_ABORTED',
  'ALLOCATION_COMPENSATION_FAILED'
] as const;

export type InventoryErrorCode = (typeof INVENTORY_ERROR_CODES)[number];

/**
 * Typed failure raised by ledger, valuation and reservation operations.
 * `message` is the code so route error maps can key on it.
 */
export class InventoryError extends Error {
  readonly code: InventoryErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: InventoryErrorCode, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(code, options);
    this.name = 'InventoryError';
    this.code = code;
    this.details = details;
  }
}

export function isInventoryError(error: unknown, code?: InventoryErrorCode): error is InventoryError {
  if (!(error instanceof InventoryError)) return false;
  return code === undefined || error.code === code;
}

export function isTransientInventoryError(error: unknown): boolean {
  return isInventoryError(error, 'POSITION_LOCK_TIMEOUT');
}
