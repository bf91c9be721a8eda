import { Router } from 'express';
import { getInventoryContext } from '../domains/inventory/runtime';
import { tenantOf } from '../middleware/auth.middleware';
import { asyncErrorHandler, parseOrReject, validateUuidParam } from '../middleware/validation';
import { documentCostSchema, landedCostSchema } from '../schemas/valuation.schema';
import { allocateDocumentCost, allocateLandedCosts, getValuationSnapshot } from '../services/costLayers.service';
import { reconcilePosition } from '../services/inventoryLedgerReconcile.service';

const router = Router();

router.get(
  '/stock/positions/:id/valuation',
  validateUuidParam('id'),
  asyncErrorHandler(async (req, res) => {
    const snapshot = await getValuationSnapshot(getInventoryContext(), tenantOf(req), req.params.id);
    return res.json({ data: snapshot });
  })
);

router.get(
  '/stock/positions/:id/reconcile',
  validateUuidParam('id'),
  asyncErrorHandler(async (req, res) => {
    const report = await reconcilePosition(getInventoryContext(), tenantOf(req), req.params.id);
    return res.json({ data: report });
  })
);

router.post(
  '/valuation-layers/:id/landed-costs',
  validateUuidParam('id'),
  asyncErrorHandler(async (req, res) => {
    const parsed = parseOrReject(landedCostSchema, req.body, res);
    if (!parsed.ok) return;
    const layer = await allocateLandedCosts(getInventoryContext(), tenantOf(req), req.params.id, parsed.data);
    return res.json({ data: layer });
  })
);

router.post(
  '/valuation-layers/document-costs',
  asyncErrorHandler(async (req, res) => {
    const parsed = parseOrReject(documentCostSchema, req.body, res);
    if (!parsed.ok) return;
    const shares = await allocateDocumentCost(getInventoryContext(), tenantOf(req), parsed.data);
    return res.json({ data: shares });
  })
);

export default router;
