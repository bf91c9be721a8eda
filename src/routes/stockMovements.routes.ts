import { Router } from 'express';
import { getInventoryContext } from '../domains/inventory/runtime';
import { tenantOf } from '../middleware/auth.middleware';
import { asyncErrorHandler, parseOrReject, validateUuidParam } from '../middleware/validation';
import { documentQuerySchema, historyQuerySchema, reverseSchema } from '../schemas/stock.schema';
import {
  getFulfillmentChain,
  getMovement,
  getPositionHistory,
  getRelatedMovements,
  reverseMovement
} from '../services/stockMovements.service';

const router = Router();

router.get(
  '/stock/positions/:id/movements',
  validateUuidParam('id'),
  asyncErrorHandler(async (req, res) => {
    const parsed = parseOrReject(historyQuerySchema, req.query, res, 'query');
    if (!parsed.ok) return;
    const movements = await getPositionHistory(getInventoryContext(), tenantOf(req), req.params.id, parsed.data);
    return res.json({ data: movements });
  })
);

// Movements recorded against one business document, grouped by position.
router.get(
  '/stock-movements',
  asyncErrorHandler(async (req, res) => {
    const parsed = parseOrReject(documentQuerySchema, req.query, res, 'query');
    if (!parsed.ok) return;
    const chain = await getFulfillmentChain(getInventoryContext(), tenantOf(req), parsed.data);
    return res.json({ data: chain });
  })
);

router.get(
  '/stock-movements/:id',
  validateUuidParam('id'),
  asyncErrorHandler(async (req, res) => {
    const movement = await getMovement(getInventoryContext(), tenantOf(req), req.params.id);
    return res.json({ data: movement });
  })
);

router.get(
  '/stock-movements/:id/related',
  validateUuidParam('id'),
  asyncErrorHandler(async (req, res) => {
    const movements = await getRelatedMovements(getInventoryContext(), tenantOf(req), req.params.id);
    return res.json({ data: movements });
  })
);

router.post(
  '/stock-movements/:id/reverse',
  validateUuidParam('id'),
  asyncErrorHandler(async (req, res) => {
    const parsed = parseOrReject(reverseSchema, req.body, res);
    if (!parsed.ok) return;
    const result = await reverseMovement(getInventoryContext(), tenantOf(req), req.params.id, parsed.data);
    return res.status(201).json(result);
  })
);

export default router;
