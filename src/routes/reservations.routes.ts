import { Router } from 'express';
import { getInventoryContext } from '../domains/inventory/runtime';
import { deadlineSignal } from '../lib/timeouts';
import { tenantOf } from '../middleware/auth.middleware';
import { asyncErrorHandler, parseOrReject, validateUuidParam } from '../middleware/validation';
import {
  allocateSchema,
  cancelSchema,
  escalateSchema,
  extendSchema,
  itemQuantitySchema,
  reservationListQuerySchema,
  reservationSchema
} from '../schemas/reservations.schema';
import { allocateReservation } from '../services/reservations/allocation.service';
import {
  cancelReservation,
  createReservation,
  escalateReservation,
  extendExpiry,
  getReservation,
  listReservations
} from '../services/reservations/core.service';
import { fulfillItem, pickItem } from '../services/reservations/fulfillment.service';

const router = Router();

router.post(
  '/reservations',
  asyncErrorHandler(async (req, res) => {
    const parsed = parseOrReject(reservationSchema, req.body, res);
    if (!parsed.ok) return;
    const detail = await createReservation(getInventoryContext(), tenantOf(req), parsed.data);
    return res.status(201).json({ data: detail });
  })
);

router.get(
  '/reservations',
  asyncErrorHandler(async (req, res) => {
    const parsed = parseOrReject(reservationListQuerySchema, req.query, res, 'query');
    if (!parsed.ok) return;
    const reservations = await listReservations(getInventoryContext(), tenantOf(req), {
      statuses: parsed.data.status,
      reservationType: parsed.data.reservationType,
      limit: parsed.data.limit
    });
    return res.json({ data: reservations });
  })
);

router.get(
  '/reservations/:id',
  validateUuidParam('id'),
  asyncErrorHandler(async (req, res) => {
    const detail = await getReservation(getInventoryContext(), tenantOf(req), req.params.id);
    return res.json({ data: detail });
  })
);

router.post(
  '/reservations/:id/allocate',
  validateUuidParam('id'),
  asyncErrorHandler(async (req, res) => {
    const parsed = parseOrReject(allocateSchema, req.body ?? {}, res);
    if (!parsed.ok) return;
    const ctx = getInventoryContext();
    const deadline = deadlineSignal(ctx.backorders.allocationTimeoutMs, 'reservation allocation');
    try {
      const detail = await allocateReservation(ctx, tenantOf(req), req.params.id, {
        ...parsed.data,
        signal: deadline.signal
      });
      return res.json({ data: detail });
    } finally {
      deadline.clear();
    }
  })
);

router.post(
  '/reservations/:id/cancel',
  validateUuidParam('id'),
  asyncErrorHandler(async (req, res) => {
    const parsed = parseOrReject(cancelSchema, req.body, res);
    if (!parsed.ok) return;
    const result = await cancelReservation(getInventoryContext(), tenantOf(req), req.params.id, parsed.data);
    return res.json({ data: result });
  })
);

router.post(
  '/reservations/:id/extend',
  validateUuidParam('id'),
  asyncErrorHandler(async (req, res) => {
    const parsed = parseOrReject(extendSchema, req.body, res);
    if (!parsed.ok) return;
    const reservation = await extendExpiry(getInventoryContext(), tenantOf(req), req.params.id, parsed.data);
    return res.json({ data: reservation });
  })
);

router.post(
  '/reservations/:id/escalate',
  validateUuidParam('id'),
  asyncErrorHandler(async (req, res) => {
    const parsed = parseOrReject(escalateSchema, req.body, res);
    if (!parsed.ok) return;
    const reservation = await escalateReservation(getInventoryContext(), tenantOf(req), req.params.id, parsed.data);
    return res.json({ data: reservation });
  })
);

router.post(
  '/reservation-items/:id/pick',
  validateUuidParam('id'),
  asyncErrorHandler(async (req, res) => {
    const parsed = parseOrReject(itemQuantitySchema, req.body, res);
    if (!parsed.ok) return;
    const detail = await pickItem(getInventoryContext(), tenantOf(req), req.params.id, parsed.data);
    return res.json({ data: detail });
  })
);

router.post(
  '/reservation-items/:id/fulfill',
  validateUuidParam('id'),
  asyncErrorHandler(async (req, res) => {
    const parsed = parseOrReject(itemQuantitySchema, req.body, res);
    if (!parsed.ok) return;
    const result = await fulfillItem(getInventoryContext(), tenantOf(req), req.params.id, parsed.data);
    return res.json({ data: result });
  })
);

export default router;
