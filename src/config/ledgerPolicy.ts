import type { NumericScales } from '../lib/numbers';
import type { ValuationMethod } from '../domains/inventory/types';

export type LedgerPolicy = {
  scales: NumericScales;
  defaultValuationMethod: ValuationMethod;
  reversalWindowHours: number;
  positionLockTimeoutMs: number;
  lockRetryAttempts: number;
  lockRetryBaseMs: number;
};

function parseInteger(value: string | undefined, fallback: number, min = 0): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) return fallback;
  return parsed;
}

function parseValuationMethod(value: string | undefined, fallback: ValuationMethod): ValuationMethod {
  const normalized = value?.trim().toUpperCase();
  if (normalized === 'FIFO' || normalized === 'LIFO') return normalized;
  return fallback;
}

export function getLedgerPolicy(env: NodeJS.ProcessEnv = process.env): LedgerPolicy {
  return {
    scales: {
      quantity: parseInteger(env.QUANTITY_SCALE, 3, 3),
      money: parseInteger(env.MONEY_SCALE, 2, 2),
      unitCost: parseInteger(env.UNIT_COST_SCALE, 4, 2)
    },
    defaultValuationMethod: parseValuationMethod(env.DEFAULT_VALUATION_METHOD, 'FIFO'),
    reversalWindowHours: parseInteger(env.MOVEMENT_REVERSAL_WINDOW_HOURS, 24, 0),
    positionLockTimeoutMs: parseInteger(env.POSITION_LOCK_TIMEOUT_MS, 2000, 1),
    lockRetryAttempts: parseInteger(env.LOCK_RETRY_ATTEMPTS, 3, 1),
    lockRetryBaseMs: parseInteger(env.LOCK_RETRY_BASE_MS, 50, 0)
  };
}
