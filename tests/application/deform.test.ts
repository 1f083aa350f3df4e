import { describe, it, expect } from 'vitest';
import { deformKwargs, deformToBus } from '../../src/application/index.js';

describe('deformKwargs', () => {
  it('converts values into wire-safe form', () => {
    const kwargs = deformKwargs({
      placed_at: new Date('2026-01-02T03:04:05.000Z'),
      total_cents: 1999n,
      tags: new Set(['gift', 'express']),
      lines: new Map<string, number>([['sku-1', 2]]),
      coupon: undefined,
      ratio: Number.NaN,
      nested: { items: [1, null, new Date('2026-01-02T00:00:00.000Z')] },
    });

    expect(kwargs).toEqual({
      placed_at: '2026-01-02T03:04:05.000Z',
      total_cents: '1999',
      tags: ['gift', 'express'],
      lines: { 'sku-1': 2 },
      coupon: null,
      ratio: null,
      nested: { items: [1, null, '2026-01-02T00:00:00.000Z'] },
    });
  });

  it('keeps key order', () => {
    expect(Object.keys(deformKwargs({ b: 1, a: 2, c: 3 }))).toEqual(['b', 'a', 'c']);
  });
});

describe('deformToBus', () => {
  it('uses toJSON() when present', () => {
    expect(deformToBus({ toJSON: () => ({ amount: 5 }) })).toEqual({ amount: 5 });
  });

  it('stringifies values with no JSON form', () => {
    expect(deformToBus(Symbol('token'))).toBe('Symbol(token)');
  });

  it('leaves primitives alone', () => {
    expect(deformToBus('text')).toBe('text');
    expect(deformToBus(false)).toBe(false);
    expect(deformToBus(12.5)).toBe(12.5);
    expect(deformToBus(Number.POSITIVE_INFINITY)).toBeNull();
  });
});
