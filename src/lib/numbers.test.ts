import { describe, expect, it } from 'vitest';
import { gte, roundHalfUp, roundMoney, roundQuantity, roundUnitCost, toNumber } from './numbers';

describe('roundHalfUp', () => {
  it('rounds ties away from zero', () => {
    expect(roundHalfUp(2.5, 0)).toBe(3);
    expect(roundHalfUp(-2.5, 0)).toBe(-3);
    expect(roundHalfUp(0.125, 2)).toBe(0.13);
  });

  it('is not thrown off by binary representation', () => {
    expect(roundHalfUp(1.005, 2)).toBe(1.01);
    expect(roundQuantity(0.1 + 0.2)).toBe(0.3);
  });

  it('handles values printed in exponent notation', () => {
    expect(roundHalfUp(1e-7, 3)).toBe(0);
  });

  it('rejects non-finite input', () => {
    expect(() => roundHalfUp(Number.POSITIVE_INFINITY, 2)).toThrow('NUMERIC_NOT_FINITE');
  });

  it('applies the configured scales', () => {
    expect(roundQuantity(1.23456)).toBe(1.235);
    expect(roundMoney(5.666666)).toBe(5.67);
    expect(roundUnitCost(5.666666)).toBe(5.6667);
    expect(roundMoney(1.2345, { quantity: 3, money: 3, unitCost: 4 })).toBe(1.235);
  });
});

describe('toNumber', () => {
  it('parses pg numeric strings', () => {
    expect(toNumber('12.50')).toBe(12.5);
    expect(toNumber('abc')).toBe(0);
    expect(toNumber(null)).toBe(0);
    expect(toNumber(7)).toBe(7);
  });
});

describe('gte', () => {
  it('compares within tolerance', () => {
    expect(gte(1, 1 + 1e-12)).toBe(true);
    expect(gte(1, 1.001)).toBe(false);
  });
});
