import type { FulfillmentStrategy, ReservationItem, StockPosition } from '../../domains/inventory/types';

const DAY_MS = 24 * 60 * 60 * 1000;

export type CandidateCriteria = {
  productId: string;
  variantId: string | null;
  warehouseId: string | null;
  locationId: string | null;
  batchId: string | null;
  qualityGrade: string | null;
  minShelfLifeDays: number | null;
  now: Date;
};

export function criteriaForItem(
  item: ReservationItem,
  reservationWarehouseId: string | null,
  now: Date
): CandidateCriteria {
  return {
    productId: item.productId,
    variantId: item.variantId,
    warehouseId: item.preferredWarehouseId ?? reservationWarehouseId,
    locationId: item.preferredLocationId,
    batchId: item.preferredBatchId,
    qualityGrade: item.qualityGradeRequired,
    minShelfLifeDays: item.minShelfLifeDays,
    now
  };
}

export function isCandidate(position: StockPosition, criteria: CandidateCriteria): boolean {
  if (!position.isActive || position.isDeleted) return false;
  if (position.available <= 0) return false;
  if (position.productId !== criteria.productId || position.variantId !== criteria.variantId) return false;
  if (criteria.warehouseId !== null && position.warehouseId !== criteria.warehouseId) return false;
  if (criteria.locationId !== null && position.locationId !== criteria.locationId) return false;
  if (criteria.batchId !== null && position.batchId !== criteria.batchId) return false;
  if (criteria.qualityGrade !== null && position.qualityGrade !== criteria.qualityGrade) return false;
  if (position.expiryDate !== null) {
    const earliest = criteria.now.getTime() + (criteria.minShelfLifeDays ?? 0) * DAY_MS;
    if (position.expiryDate.getTime() < earliest) return false;
  }
  return true;
}

type Comparator = (a: StockPosition, b: StockPosition) => number;

function nullsLast<T>(pick: (position: StockPosition) => T | null, compare: (a: T, b: T) => number): Comparator {
  return (a, b) => {
    const left = pick(a);
    const right = pick(b);
    if (left === null && right === null) return 0;
    if (left === null) return 1;
    if (right === null) return -1;
    return compare(left, right);
  };
}

const byTime = (a: Date, b: Date) => a.getTime() - b.getTime();
const byNumber = (a: number, b: number) => a - b;
const byText = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

const STRATEGY_ORDER: Record<Exclude<FulfillmentStrategy, 'MANUAL'>, Comparator> = {
  FIFO: nullsLast((p) => p.firstReceivedAt, byTime),
  LIFO: nullsLast((p) => p.lastReceivedAt, (a, b) => byTime(b, a)),
  FEFO: nullsLast((p) => p.expiryDate, byTime),
  NEAREST: nullsLast((p) => p.locationDistance, byNumber),
  CHEAPEST: (a, b) => byNumber(a.averageCost, b.averageCost),
  // Grades sort lexicographically: 'A' is the best grade.
  HIGHEST_QUALITY: nullsLast((p) => p.qualityGrade, byText)
};

/**
 * Orders candidate positions for an allocation walk. MANUAL keeps the
 * caller's order and drops positions it does not name; every other strategy
 * breaks ties on the position key.
 */
export function orderCandidates(
  positions: StockPosition[],
  strategy: FulfillmentStrategy,
  manualPositionIds: string[] = []
): StockPosition[] {
  if (strategy === 'MANUAL') {
    const byId = new Map(positions.map((position) => [position.id, position]));
    return manualPositionIds.flatMap((id) => {
      const position = byId.get(id);
      return position ? [position] : [];
    });
  }
  const compare = STRATEGY_ORDER[strategy];
  return [...positions].sort((a, b) => compare(a, b) || byText(a.positionKey, b.positionKey));
}

export function selectCandidates(
  positions: StockPosition[],
  criteria: CandidateCriteria,
  strategy: FulfillmentStrategy,
  manualPositionIds: string[] = []
): StockPosition[] {
  return orderCandidates(
    positions.filter((position) => isCandidate(position, criteria)),
    strategy,
    manualPositionIds
  );
}
