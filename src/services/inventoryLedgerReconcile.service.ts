import { EPSILON, roundQuantity, sumBy } from '../lib/numbers';
import { INVENTORY_EVENT, emitInventoryEvent, errorMessage } from '../observability/inventory.events';
import type { InventoryContext } from '../domains/inventory/context';
import { diffBuckets, pickBuckets, replayMovements } from '../domains/inventory/internal/buckets';
import { getVisiblePosition } from '../domains/inventory/internal/positions';
import type { BucketName } from '../domains/inventory/types';

export type BucketMismatch = {
  bucket: BucketName | 'layerRemaining';
  expected: number;
  actual: number;
};

export type PositionReconcileReport = {
  positionId: string;
  movementCount: number;
  mismatches: BucketMismatch[];
  replayError: string | null;
};

/**
 * Replays a position's movement log from zero and compares the result with
 * the stored buckets, then compares open layer quantity with on-hand.
 */
export async function reconcilePosition(
  ctx: InventoryContext,
  tenantId: string,
  positionId: string
): Promise<PositionReconcileReport> {
  const { scales } = ctx.ledger;
  const report = await ctx.store.withTransaction(async (client) => {
    const position = await getVisiblePosition(client, tenantId, positionId);
    const movements = await client.listMovements(tenantId, { positionId });
    const layers = await client.listLayers(tenantId, { positionId, openOnly: true });
    const mismatches: BucketMismatch[] = [];
    let replayError: string | null = null;

    try {
      mismatches.push(...diffBuckets(replayMovements(movements, scales), pickBuckets(position), scales));
    } catch (error) {
      replayError = errorMessage(error);
    }

    const layerRemaining = roundQuantity(sumBy(layers, (layer) => layer.quantityRemaining), scales);
    if (Math.abs(layerRemaining - position.onHand) > EPSILON) {
      mismatches.push({ bucket: 'layerRemaining', expected: position.onHand, actual: layerRemaining });
    }
    return { positionId, movementCount: movements.length, mismatches, replayError };
  });

  if (report.mismatches.length > 0 || report.replayError) {
    emitInventoryEvent(INVENTORY_EVENT.LEDGER_MISMATCH, {
      tenantId,
      positionId,
      mismatches: report.mismatches
    });
  }
  return report;
}

export type LedgerReconcileSummary = {
  tenantId: string;
  positionCount: number;
  mismatchCount: number;
  reports: PositionReconcileReport[];
};

/** Reconciles every live position of a tenant; only positions with findings are returned. */
export async function runLedgerReconcile(ctx: InventoryContext, tenantId: string): Promise<LedgerReconcileSummary> {
  const positions = await ctx.store.withTransaction((client) => client.listPositions(tenantId, {}));
  const reports: PositionReconcileReport[] = [];
  for (const position of positions) {
    const report = await reconcilePosition(ctx, tenantId, position.id);
    if (report.mismatches.length > 0 || report.replayError) {
      reports.push(report);
    }
  }
  return {
    tenantId,
    positionCount: positions.length,
    mismatchCount: reports.length,
    reports
  };
}
