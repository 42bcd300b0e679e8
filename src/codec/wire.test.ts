import { describe, expect, it } from 'vitest';

import { compact, encodeJsonBody, joinList, toQueryString } from './wire.js';

describe('wire', () => {
  it('skips undefined query params and comma-joins lists in order', () => {
    const query = toQueryString({
      inputMint: 'mintA',
      slippageBps: undefined,
      dexes: ['Orca', 'Meteora DLMM'],
      amount: 5n,
      onlyDirectRoutes: true
    });

    expect(query).toBe('inputMint=mintA&dexes=Orca%2CMeteora+DLMM&amount=5&onlyDirectRoutes=true');
  });

  it('encodes an empty param set as an empty string', () => {
    expect(toQueryString({ a: undefined })).toBe('');
  });

  it('joins lists with commas', () => {
    expect(joinList(['a', 'b', 'c'])).toBe('a,b,c');
  });

  it('compacts undefined members recursively but keeps null', () => {
    const out = compact({ a: 1, b: undefined, c: { d: undefined, e: null }, f: [{ g: undefined, h: 'x' }] });

    expect(out).toEqual({ a: 1, c: { e: null }, f: [{ h: 'x' }] });
    expect(JSON.stringify(out)).toBe('{"a":1,"c":{"e":null},"f":[{"h":"x"}]}');
  });

  it('encodes JSON bodies without absent fields', () => {
    expect(encodeJsonBody({ maker: 'm', orders: undefined, computeUnitPrice: 'auto' })).toBe(
      '{"maker":"m","computeUnitPrice":"auto"}'
    );
  });
});
