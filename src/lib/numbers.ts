/**
 * Converts common numeric-like inputs into a number.
 *
 * - number => itself
 * - string => parseFloat (NaN => 0); pg returns NUMERIC columns as strings
 * - null/undefined => 0
 * - other => Number(value) (NaN => 0)
 */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string') {
    const parsed = parseFloat(value);
    return Number.isNaN(parsed) ? 0 : parsed;
  }
  if (value === null || value === undefined) {
    return 0;
  }
  const num = Number(value);
  return Number.isNaN(num) ? 0 : num;
}

export const EPSILON = 1e-9;

export type NumericScales = {
  quantity: number;
  money: number;
  unitCost: number;
};

export const DEFAULT_SCALES: NumericScales = {
  quantity: 3,
  money: 2,
  unitCost: 4
};

/**
 * Rounds half-up (away from zero) to `scale` fractional digits.
 *
 * Shifting through the exponent notation keeps values such as 1.005 from
 * being rounded down by their binary representation.
 */
export function roundHalfUp(value: number, scale: number): number {
  if (!Number.isFinite(value)) {
    throw new Error('NUMERIC_NOT_FINITE');
  }
  const sign = value < 0 ? -1 : 1;
  const magnitude = Math.abs(value);
  const text = String(magnitude);
  let rounded: number;
  if (text.includes('e')) {
    const factor = 10 ** scale;
    rounded = Math.round(magnitude * factor) / factor;
  } else {
    rounded = Number(`${Math.round(Number(`${text}e${scale}`))}e-${scale}`);
  }
  const result = sign * rounded;
  return result === 0 ? 0 : result;
}

export function roundQuantity(value: number, scales: NumericScales = DEFAULT_SCALES): number {
  return roundHalfUp(value, scales.quantity);
}

export function roundMoney(value: number, scales: NumericScales = DEFAULT_SCALES): number {
  return roundHalfUp(value, scales.money);
}

export function roundUnitCost(value: number, scales: NumericScales = DEFAULT_SCALES): number {
  return roundHalfUp(value, scales.unitCost);
}

export function isPositive(value: number): boolean {
  return value > EPSILON;
}

/** a >= b within tolerance */
export function gte(a: number, b: number): boolean {
  return a - b >= -EPSILON;
}

export function sumBy<T>(rows: T[], pick: (row: T) => number): number {
  return rows.reduce((total, row) => total + pick(row), 0);
}
