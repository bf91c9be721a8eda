import { Router } from 'express';
import { getInventoryContext } from '../domains/inventory/runtime';
import { tenantOf } from '../middleware/auth.middleware';
import { asyncErrorHandler, parseOrReject, validateUuidParam } from '../middleware/validation';
import {
  adjustSchema,
  availabilityQuerySchema,
  movementSchema,
  pipelineSchema,
  positionSchema,
  receiptSchema,
  transferSchema
} from '../schemas/stock.schema';
import {
  adjustStock,
  allocateStock,
  deactivatePosition,
  deallocateStock,
  getAvailableQuantity,
  getPosition,
  pickStock,
  provisionPosition,
  receiveStock,
  releaseStock,
  reserveStock,
  setPipelineQuantities,
  shipStock,
  softDeletePosition,
  transferStock,
  unpickStock
} from '../services/stockLedger.service';

const router = Router();

router.post(
  '/stock/receipts',
  asyncErrorHandler(async (req, res) => {
    const parsed = parseOrReject(receiptSchema, req.body, res);
    if (!parsed.ok) return;
    const result = await receiveStock(getInventoryContext(), tenantOf(req), parsed.data);
    return res.status(result.duplicate ? 200 : 201).json(result);
  })
);

router.post(
  '/stock/positions',
  asyncErrorHandler(async (req, res) => {
    const parsed = parseOrReject(positionSchema, req.body, res);
    if (!parsed.ok) return;
    const result = await provisionPosition(getInventoryContext(), tenantOf(req), parsed.data);
    return res.status(result.created ? 201 : 200).json(result);
  })
);

router.get(
  '/stock/positions/:id',
  validateUuidParam('id'),
  asyncErrorHandler(async (req, res) => {
    const position = await getPosition(getInventoryContext(), tenantOf(req), req.params.id);
    return res.json({ data: position });
  })
);

const commitments: Record<string, typeof reserveStock> = {
  reserve: reserveStock,
  release: releaseStock,
  allocate: allocateStock,
  deallocate: deallocateStock,
  pick: pickStock,
  unpick: unpickStock,
  ship: shipStock
};

for (const [action, post] of Object.entries(commitments)) {
  router.post(
    `/stock/positions/:id/${action}`,
    validateUuidParam('id'),
    asyncErrorHandler(async (req, res) => {
      const parsed = parseOrReject(movementSchema, req.body, res);
      if (!parsed.ok) return;
      const result = await post(getInventoryContext(), tenantOf(req), req.params.id, parsed.data);
      return res.status(result.duplicate ? 200 : 201).json(result);
    })
  );
}

router.post(
  '/stock/positions/:id/adjust',
  validateUuidParam('id'),
  asyncErrorHandler(async (req, res) => {
    const parsed = parseOrReject(adjustSchema, req.body, res);
    if (!parsed.ok) return;
    const result = await adjustStock(getInventoryContext(), tenantOf(req), req.params.id, parsed.data);
    return res.status(result.movement && !result.duplicate ? 201 : 200).json(result);
  })
);

router.post(
  '/stock/positions/:id/pipeline',
  validateUuidParam('id'),
  asyncErrorHandler(async (req, res) => {
    const parsed = parseOrReject(pipelineSchema, req.body, res);
    if (!parsed.ok) return;
    const position = await setPipelineQuantities(getInventoryContext(), tenantOf(req), req.params.id, parsed.data);
    return res.json({ data: position });
  })
);

router.post(
  '/stock/positions/:id/deactivate',
  validateUuidParam('id'),
  asyncErrorHandler(async (req, res) => {
    const position = await deactivatePosition(getInventoryContext(), tenantOf(req), req.params.id);
    return res.json({ data: position });
  })
);

router.delete(
  '/stock/positions/:id',
  validateUuidParam('id'),
  asyncErrorHandler(async (req, res) => {
    await softDeletePosition(getInventoryContext(), tenantOf(req), req.params.id);
    return res.status(204).send();
  })
);

router.post(
  '/stock/transfers',
  asyncErrorHandler(async (req, res) => {
    const parsed = parseOrReject(transferSchema, req.body, res);
    if (!parsed.ok) return;
    const result = await transferStock(getInventoryContext(), tenantOf(req), parsed.data);
    return res.status(result.duplicate ? 200 : 201).json(result);
  })
);

router.get(
  '/stock/availability',
  asyncErrorHandler(async (req, res) => {
    const parsed = parseOrReject(availabilityQuerySchema, req.query, res, 'query');
    if (!parsed.ok) return;
    const summary = await getAvailableQuantity(getInventoryContext(), tenantOf(req), parsed.data);
    return res.json({ data: summary });
  })
);

export default router;
