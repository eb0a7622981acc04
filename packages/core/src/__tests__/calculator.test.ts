/**
 * Tests for the symbolic calculator
 */

import { describe, it, expect } from 'vitest';
import { Calculator, isSymbolic } from '../calculator';
import { SymbolicParameterError } from '../errors';

describe('isSymbolic', () => {
  it('treats numbers and numeric strings as plain', () => {
    expect(isSymbolic(1)).toBe(false);
    expect(isSymbolic('1.5')).toBe(false);
    expect(isSymbolic(' 2e-3 ')).toBe(false);
  });

  it('treats names and expressions as symbolic', () => {
    expect(isSymbolic('theta')).toBe(true);
    expect(isSymbolic('2*pi')).toBe(true);
  });
});

describe('Evaluation', () => {
  const calculator = new Calculator();

  it('passes numbers through', () => {
    expect(calculator.parseGet(1.5)).toBe(1.5);
  });

  it('respects operator precedence', () => {
    expect(calculator.parseGet('1 + 2 * 3')).toBe(7);
    expect(calculator.parseGet('(1 + 2) * 3')).toBe(9);
    expect(calculator.parseGet('8 / 2 / 2')).toBe(2);
    expect(calculator.parseGet('5 - 3 - 1')).toBe(1);
  });

  it('evaluates powers right to left', () => {
    expect(calculator.parseGet('2^3^2')).toBe(512);
    expect(calculator.parseGet('2**3')).toBe(8);
    expect(calculator.parseGet('-2^2')).toBe(-4);
    expect(calculator.parseGet('2^-1')).toBe(0.5);
  });

  it('knows pi and e', () => {
    expect(calculator.parseGet('pi')).toBe(Math.PI);
    expect(calculator.parseGet('pi/2')).toBe(Math.PI / 2);
    expect(calculator.parseGet('e')).toBe(Math.E);
  });

  it('calls functions', () => {
    expect(calculator.parseGet('sqrt(4)')).toBe(2);
    expect(calculator.parseGet('max(1, 3, 2)')).toBe(3);
    expect(calculator.parseGet('atan2(1, 1)')).toBeCloseTo(Math.PI / 4);
    expect(calculator.parseGet('cos(0) + sin(0)')).toBe(1);
  });
});

describe('Variables', () => {
  it('evaluates expressions over variables', () => {
    const calculator = new Calculator({ theta: 0.25 });
    expect(calculator.parseGet('theta*4')).toBe(1);
  });

  it('lets variables shadow constants', () => {
    expect(new Calculator().set('pi', 3).parseGet('pi')).toBe(3);
  });

  it('gets and checks variables', () => {
    const calculator = new Calculator().set('x', 2);
    expect(calculator.get('x')).toBe(2);
    expect(calculator.has('x')).toBe(true);
    expect(calculator.has('y')).toBe(false);
    expect(() => calculator.get('y')).toThrow('Cannot evaluate "y": variable y is not set');
  });
});

describe('Errors', () => {
  const calculator = new Calculator();

  it('rejects unset variables', () => {
    expect(() => calculator.parseGet('y + 1')).toThrow(SymbolicParameterError);
    expect(() => calculator.parseGet('y + 1')).toThrow('variable y is not set');
    expect(() => calculator.parseGet('toString')).toThrow('variable toString is not set');
  });

  it('rejects malformed expressions', () => {
    expect(() => calculator.parseGet('')).toThrow('Cannot evaluate "": empty expression');
    expect(() => calculator.parseGet('1 +')).toThrow('unexpected end of expression');
    expect(() => calculator.parseGet('(1')).toThrow('expected ")"');
    expect(() => calculator.parseGet('1 2')).toThrow('unexpected "2"');
    expect(() => calculator.parseGet('1 $')).toThrow('unexpected "$" at 2');
  });

  it('rejects unknown functions', () => {
    expect(() => calculator.parseGet('foo(1)')).toThrow('unknown function foo');
  });
});
