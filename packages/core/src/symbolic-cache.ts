/**
 * Symbolic-Parameter Cache
 *
 * In symbolic translation mode every parametrized rotation angle is staged
 * here and replaced by a placeholder token in the emitted QASM. The token
 * can later be swapped for a number without translating the circuit again.
 */

import { SymbolicParameterError } from './errors';
import { formatFloat } from './gates';
import { createLogger } from './logger';
import type { CalculatorFloat } from './operations';

const log = createLogger('symbolic-cache');

const TOKEN_PREFIX = 'sym_';
const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * Canonical text of a parameter value; identical values share a key
 */
function canonical(value: CalculatorFloat): string {
  return typeof value === 'number' ? formatFloat(value) : value.replace(/\s+/g, '');
}

/**
 * 32-bit FNV-1a hash of a string, as 8 hex digits
 */
export function fnv1a(text: string): string {
  let hash = FNV_OFFSET;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return (hash >>> 0).toString(16).padStart(8, '0');
}

/**
 * Placeholder token → original parameter value
 */
export class SymbolicCache {
  private byToken: Map<string, CalculatorFloat> = new Map();
  private byKey: Map<string, string> = new Map();

  /**
   * Number of staged values
   */
  get size(): number {
    return this.byToken.size;
  }

  /**
   * Stage a value and return its placeholder token.
   *
   * Staging the same value again returns the same token and adds nothing.
   * A hash collision with a different value moves on to the next suffix.
   */
  stage(value: CalculatorFloat): string {
    const key = canonical(value);
    const existing = this.byKey.get(key);
    if (existing !== undefined) {
      return existing;
    }

    const base = `${TOKEN_PREFIX}${fnv1a(key)}`;
    let token = base;
    for (let probe = 1; this.byToken.has(token); probe++) {
      token = `${base}_${probe}`;
    }

    this.byToken.set(token, value);
    this.byKey.set(key, token);
    log('staged %s as %s', key, token);
    return token;
  }

  /**
   * Original value behind a token
   */
  resolve(token: string): CalculatorFloat {
    const value = this.byToken.get(token);
    if (value === undefined) {
      throw new SymbolicParameterError(token, 'unknown placeholder token');
    }
    return value;
  }

  /**
   * Check if a string is a staged token
   */
  has(token: string): boolean {
    return this.byToken.has(token);
  }

  /**
   * All staged entries in staging order
   */
  entries(): [string, CalculatorFloat][] {
    return [...this.byToken.entries()];
  }

  /**
   * Evaluate every staged value, e.g. with `calculator.parseGet`
   */
  bind(evaluate: (value: CalculatorFloat) => number): Map<string, number> {
    const bound = new Map<string, number>();
    for (const [token, value] of this.byToken) {
      bound.set(token, evaluate(value));
    }
    return bound;
  }

  /**
   * Replace placeholder tokens in QASM text with numbers.
   * Every token present in the text must have a value.
   */
  substitute(text: string, values: ReadonlyMap<string, number>): string {
    const pattern = new RegExp(`\\b${TOKEN_PREFIX}[0-9a-f]{8}(?:_\\d+)?\\b`, 'g');
    return text.replace(pattern, (token) => {
      const value = values.get(token);
      if (value === undefined) {
        throw new SymbolicParameterError(token, 'no value supplied for placeholder');
      }
      return formatFloat(value);
    });
  }
}
