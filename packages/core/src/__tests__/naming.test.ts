/**
 * Tests for qubit and register naming
 */

import { describe, it, expect } from 'vitest';
import { QubitNameResolutionError } from '../errors';
import { defaultQubitNames, registerRanges, resolveQubit, totalBits } from '../naming';

describe('resolveQubit', () => {
  it('uses the default register', () => {
    expect(resolveQubit(3)).toBe('q[3]');
  });

  it('uses a custom register name', () => {
    expect(resolveQubit(1, undefined, 'qr')).toBe('qr[1]');
  });

  it('uses the name map verbatim', () => {
    const names = new Map([[0, 'alice']]);
    expect(resolveQubit(0, names)).toBe('alice');
  });

  it('fails for indices missing from the name map', () => {
    const names = new Map([[0, 'alice']]);
    expect(() => resolveQubit(1, names)).toThrow(QubitNameResolutionError);
    expect(() => resolveQubit(1, names)).toThrow('Qubit 1 is not in the supplied qubit name map');
  });
});

describe('defaultQubitNames', () => {
  it('builds a total map', () => {
    expect([...defaultQubitNames(2, 'r')]).toEqual([
      [0, 'r[0]'],
      [1, 'r[1]'],
    ]);
  });
});

describe('Register Ranges', () => {
  const lengths = new Map([
    ['a', 1],
    ['b', 2],
  ]);

  it('assigns contiguous ranges in declaration order', () => {
    const ranges = registerRanges(lengths);
    expect(ranges.get('a')).toEqual({ start: 0, end: 1 });
    expect(ranges.get('b')).toEqual({ start: 1, end: 3 });
  });

  it('sums register lengths', () => {
    expect(totalBits(lengths)).toBe(3);
    expect(totalBits(new Map())).toBe(0);
  });
});
