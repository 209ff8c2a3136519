import { describe, expect, it } from 'vitest';
import { splitFee } from '../ledger/fees';

describe('splitFee', () => {
  it('takes basis points of the gross and floors the fee', () => {
    expect(splitFee(100n, 250)).toEqual({ fee: 2n, net: 98n });
    expect(splitFee(10_000n, 250)).toEqual({ fee: 250n, net: 9_750n });
    expect(splitFee(39n, 250)).toEqual({ fee: 0n, net: 39n });
  });

  it('returns the whole amount as net when the rate is zero', () => {
    expect(splitFee(1_234n, 0)).toEqual({ fee: 0n, net: 1_234n });
  });

  it('handles a zero gross', () => {
    expect(splitFee(0n, 1_000)).toEqual({ fee: 0n, net: 0n });
  });

  it('rejects negative amounts and out-of-range rates', () => {
    expect(() => splitFee(-1n, 250)).toThrow('invalid-parameters');
    expect(() => splitFee(100n, -1)).toThrow('invalid-parameters');
    expect(() => splitFee(100n, 10_001)).toThrow('invalid-parameters');
    expect(() => splitFee(100n, 2.5)).toThrow('invalid-parameters');
  });
});
