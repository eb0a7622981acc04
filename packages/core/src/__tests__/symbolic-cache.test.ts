/**
 * Tests for the symbolic-parameter cache
 */

import { describe, it, expect } from 'vitest';
import { Calculator } from '../calculator';
import { SymbolicParameterError } from '../errors';
import { SymbolicCache, fnv1a } from '../symbolic-cache';

describe('fnv1a', () => {
  it('hashes to 8 hex digits', () => {
    expect(fnv1a('')).toBe('811c9dc5');
    expect(fnv1a('a')).toBe('e40c292c');
  });
});

describe('SymbolicCache', () => {
  it('derives tokens from the expression', () => {
    const cache = new SymbolicCache();
    const token = cache.stage('theta');
    expect(token).toBe(`sym_${fnv1a('theta')}`);
    expect(token).toMatch(/^sym_[0-9a-f]{8}$/);
  });

  it('stages equal expressions once', () => {
    const cache = new SymbolicCache();
    const first = cache.stage('2 * theta');
    const second = cache.stage('2*theta');

    expect(second).toBe(first);
    expect(cache.size).toBe(1);
    expect(cache.resolve(first)).toBe('2 * theta');
  });

  it('shares tokens between a number and its text', () => {
    const cache = new SymbolicCache();
    expect(cache.stage(0.5)).toBe(cache.stage('0.5'));
  });

  it('lists entries in staging order', () => {
    const cache = new SymbolicCache();
    const a = cache.stage('alpha');
    const b = cache.stage('beta');
    expect(cache.entries()).toEqual([
      [a, 'alpha'],
      [b, 'beta'],
    ]);
    expect(cache.has(a)).toBe(true);
    expect(cache.has('sym_00000000')).toBe(false);
  });

  it('fails on unknown tokens', () => {
    expect(() => new SymbolicCache().resolve('sym_00000000')).toThrow(
      'Cannot evaluate "sym_00000000": unknown placeholder token'
    );
  });

  it('binds and substitutes values', () => {
    const cache = new SymbolicCache();
    const full = cache.stage('theta');
    const half = cache.stage('theta/2');
    const calculator = new Calculator({ theta: 1 });
    const values = cache.bind((value) => calculator.parseGet(value));

    expect(values.get(full)).toBe(1);
    expect(values.get(half)).toBe(0.5);
    expect(cache.substitute(`rx(${full}) q[0];\nrz(${half}) q[1];`, values)).toBe(
      'rx(1.0) q[0];\nrz(0.5) q[1];'
    );
  });

  it('leaves tokens inside longer identifiers alone', () => {
    const cache = new SymbolicCache();
    const token = cache.stage('theta');
    const values = new Map([[token, 0.5]]);
    expect(cache.substitute(`rx(${token}) q_${token};\nh ${token}x;`, values)).toBe(
      `rx(0.5) q_${token};\nh ${token}x;`
    );
  });

  it('fails to substitute tokens without a value', () => {
    const cache = new SymbolicCache();
    const token = cache.stage('theta');
    expect(() => cache.substitute(`rx(${token}) q[0];`, new Map())).toThrow(SymbolicParameterError);
  });
});
