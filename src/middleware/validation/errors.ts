import type { Request, Response, NextFunction } from 'express';
import { INVENTORY_ERROR_CODES, isInventoryError, type InventoryErrorCode } from '../../domains/inventory/errors';

export type ErrorResponse = { status: number; body: Record<string, unknown> };

export type ErrorHandlerMap = Record<string, (error: Error) => ErrorResponse>;

/**
 * Wraps an async route handler. Errors whose message appears in `errorMap`
 * become the mapped response; anything else is a logged 500.
 */
export function asyncErrorHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
  errorMap: ErrorHandlerMap = inventoryErrorMap
) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      await handler(req, res, next);
    } catch (error: unknown) {
      if (error instanceof Error && errorMap[error.message]) {
        const mapped = errorMap[error.message](error);
        res.locals.errorCode = error.message;
        if (mapped.status >= 500) {
          console.error(error);
        }
        return res.status(mapped.status).json(mapped.body);
      }

      console.error(error);
      return res.status(500).json({
        error: 'An internal server error occurred.',
        ...(process.env.NODE_ENV === 'development' && error instanceof Error && { details: error.message })
      });
    }
  };
}

export function createErrorResponse(status: number, message: string, details?: Record<string, unknown>): ErrorResponse {
  return { status, body: { error: message, ...(details && { details }) } };
}

const INVENTORY_ERROR_STATUS: Record<InventoryErrorCode, number> = {
  INVALID_QUANTITY: 400,
  INSUFFICIENT_AVAILABLE: 409,
  INSUFFICIENT_RESERVED: 409,
  INSUFFICIENT_ALLOCATED: 409,
  INSUFFICIENT_PICKED: 409,
  DUPLICATE_MOVEMENT_REFERENCE: 409,
  POSITION_LOCK_TIMEOUT: 503,
  VALUATION_INTEGRITY: 500,
  REVERSAL_WINDOW_EXPIRED: 409,
  ALREADY_REVERSED: 409,
  POSITION_NOT_FOUND: 404,
  POSITION_INACTIVE: 409,
  POSITION_NOT_EMPTY: 409,
  ADJUSTMENT_BELOW_COMMITTED: 409,
  MOVEMENT_NOT_FOUND: 404,
  MOVEMENT_NOT_CONFIRMED: 409,
  MOVEMENT_IS_REVERSAL: 409,
  MOVEMENT_NOT_REVERSIBLE: 409,
  TRANSFER_SAME_POSITION: 400,
  LAYER_NOT_FOUND: 404,
  LANDED_COST_INVALID: 400,
  COST_ALLOCATION_NO_LAYERS: 409,
  RESERVATION_NOT_FOUND: 404,
  RESERVATION_ITEM_NOT_FOUND: 404,
  RESERVATION_INVALID: 400,
  RESERVATION_INVALID_STATE: 409,
  RESERVATION_EXPIRY_INVALID: 400,
  ALLOCATION_ABORTED: 503,
  ALLOCATION_COMPENSATION_FAILED: 500
};

function inventoryErrorResponse(code: InventoryErrorCode) {
  return (error: Error): ErrorResponse => ({
    status: INVENTORY_ERROR_STATUS[code],
    body: { error: code, ...(isInventoryError(error) && { details: error.details }) }
  });
}

/** Every inventory error code, keyed by the message the error carries. */
export const inventoryErrorMap: ErrorHandlerMap = Object.fromEntries(
  INVENTORY_ERROR_CODES.map((code) => [code, inventoryErrorResponse(code)])
);
