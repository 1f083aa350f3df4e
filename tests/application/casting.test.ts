import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { castToSignature } from '../../src/application/index.js';
import { fakeLogger } from '../helpers.js';

describe('castToSignature', () => {
  it('passes kwargs through when there is no parameter schema', () => {
    const kwargs = { order_id: '42' };
    expect(castToSignature(kwargs, undefined, fakeLogger())).toBe(kwargs);
  });

  it('casts kwargs with the parameter schema', () => {
    const parameters = z.object({ order_id: z.coerce.number(), placed_at: z.coerce.date() });
    const cast = castToSignature({ order_id: '42', placed_at: '2026-01-02T03:04:05.000Z' }, parameters, fakeLogger());
    expect(cast).toEqual({ order_id: 42, placed_at: new Date('2026-01-02T03:04:05.000Z') });
  });

  it('returns the raw kwargs and warns when casting fails', () => {
    const log = fakeLogger();
    const kwargs = { order_id: 'not-a-number' };
    const cast = castToSignature(kwargs, z.object({ order_id: z.number() }), log);

    expect(cast).toBe(kwargs);
    expect(log.warn).toHaveBeenCalledWith(
      { issues: ['order_id: Expected number, received string'] },
      'Could not cast event arguments to listener parameters, passing them through unchanged',
    );
  });
});
