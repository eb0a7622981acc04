/**
 * Symbolic Calculator
 *
 * Evaluates the symbolic parameter expressions carried by operations,
 * e.g. `"2*theta + pi/4"`, against a table of named variables.
 *
 * Grammar:
 *   expr    := term (('+' | '-') term)*
 *   term    := unary (('*' | '/') unary)*
 *   unary   := ('+' | '-') unary | power
 *   power   := primary ('^' unary)?
 *   primary := number | name | name '(' expr (',' expr)* ')' | '(' expr ')'
 */

import { SymbolicParameterError } from './errors';
import type { CalculatorFloat } from './operations';

const CONSTANTS: Readonly<Record<string, number>> = {
  pi: Math.PI,
  e: Math.E,
};

const FUNCTIONS: Readonly<Record<string, (...args: number[]) => number>> = {
  sin: Math.sin,
  cos: Math.cos,
  tan: Math.tan,
  asin: Math.asin,
  acos: Math.acos,
  atan: Math.atan,
  exp: Math.exp,
  log: Math.log,
  ln: Math.log,
  sqrt: Math.sqrt,
  abs: Math.abs,
  sign: Math.sign,
  atan2: Math.atan2,
  max: Math.max,
  min: Math.min,
};

const NUMBER_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

type Token =
  | { kind: 'number'; value: number }
  | { kind: 'name'; value: string }
  | { kind: 'op'; value: string };

/**
 * Check whether a parameter needs evaluating, i.e. is not a plain number
 */
export function isSymbolic(value: CalculatorFloat): value is string {
  return typeof value === 'string' && !NUMBER_LITERAL.test(value.trim());
}

/**
 * Calculator holding named variables
 */
export class Calculator {
  private variables: Map<string, number> = new Map();

  constructor(variables?: Readonly<Record<string, number>>) {
    if (variables) {
      for (const [name, value] of Object.entries(variables)) {
        this.set(name, value);
      }
    }
  }

  /**
   * Set a variable
   */
  set(name: string, value: number): this {
    this.variables.set(name, value);
    return this;
  }

  /**
   * Get a variable
   */
  get(name: string): number {
    const value = this.variables.get(name);
    if (value === undefined) {
      throw new SymbolicParameterError(name, `variable ${name} is not set`);
    }
    return value;
  }

  /**
   * Check if a variable is set
   */
  has(name: string): boolean {
    return this.variables.has(name);
  }

  /**
   * Evaluate a numeric value or symbolic expression to a number
   */
  parseGet(expression: CalculatorFloat): number {
    if (typeof expression === 'number') {
      return expression;
    }
    const tokens = tokenize(expression);
    const parser = new Parser(expression, tokens, (name) => this.lookup(expression, name));
    return parser.parse();
  }

  private lookup(expression: string, name: string): number {
    const value = this.variables.get(name);
    if (value !== undefined) {
      return value;
    }
    if (Object.hasOwn(CONSTANTS, name)) {
      return CONSTANTS[name];
    }
    throw new SymbolicParameterError(expression, `variable ${name} is not set`);
  }
}

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < expression.length) {
    const ch = expression[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (/[\d.]/.test(ch)) {
      const match = /^(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/.exec(expression.slice(i));
      if (!match) {
        throw new SymbolicParameterError(expression, `unexpected "${ch}" at ${i}`);
      }
      tokens.push({ kind: 'number', value: Number(match[0]) });
      i += match[0].length;
      continue;
    }
    if (/[A-Za-z_]/.test(ch)) {
      const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(expression.slice(i));
      if (!match) {
        throw new SymbolicParameterError(expression, `unexpected "${ch}" at ${i}`);
      }
      tokens.push({ kind: 'name', value: match[0] });
      i += match[0].length;
      continue;
    }
    if ('+-*/^(),'.includes(ch)) {
      // `**` is accepted as power
      if (ch === '*' && expression[i + 1] === '*') {
        tokens.push({ kind: 'op', value: '^' });
        i += 2;
        continue;
      }
      tokens.push({ kind: 'op', value: ch });
      i++;
      continue;
    }
    throw new SymbolicParameterError(expression, `unexpected "${ch}" at ${i}`);
  }
  return tokens;
}

class Parser {
  private position = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[],
    private readonly lookup: (name: string) => number
  ) {}

  parse(): number {
    if (this.tokens.length === 0) {
      throw new SymbolicParameterError(this.source, 'empty expression');
    }
    const value = this.expression();
    const rest = this.peek();
    if (rest) {
      throw new SymbolicParameterError(this.source, `unexpected "${rest.value}"`);
    }
    return value;
  }

  private expression(): number {
    let value = this.term();
    for (;;) {
      if (this.acceptOp('+')) {
        value += this.term();
      } else if (this.acceptOp('-')) {
        value -= this.term();
      } else {
        return value;
      }
    }
  }

  private term(): number {
    let value = this.unary();
    for (;;) {
      if (this.acceptOp('*')) {
        value *= this.unary();
      } else if (this.acceptOp('/')) {
        value /= this.unary();
      } else {
        return value;
      }
    }
  }

  private unary(): number {
    if (this.acceptOp('-')) {
      return -this.unary();
    }
    if (this.acceptOp('+')) {
      return this.unary();
    }
    return this.power();
  }

  private power(): number {
    const base = this.primary();
    if (this.acceptOp('^')) {
      return Math.pow(base, this.unary());
    }
    return base;
  }

  private primary(): number {
    const token = this.next();
    if (token.kind === 'number') {
      return token.value;
    }
    if (token.kind === 'name') {
      if (this.acceptOp('(')) {
        return this.call(token.value);
      }
      return this.lookup(token.value);
    }
    if (token.value === '(') {
      const value = this.expression();
      this.expectOp(')');
      return value;
    }
    throw new SymbolicParameterError(this.source, `unexpected "${token.value}"`);
  }

  private call(name: string): number {
    const fn = Object.hasOwn(FUNCTIONS, name) ? FUNCTIONS[name] : undefined;
    if (!fn) {
      throw new SymbolicParameterError(this.source, `unknown function ${name}`);
    }
    const args = [this.expression()];
    while (this.acceptOp(',')) {
      args.push(this.expression());
    }
    this.expectOp(')');
    return fn(...args);
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private next(): Token {
    const token = this.tokens[this.position];
    if (!token) {
      throw new SymbolicParameterError(this.source, 'unexpected end of expression');
    }
    this.position++;
    return token;
  }

  private acceptOp(op: string): boolean {
    const token = this.peek();
    if (token && token.kind === 'op' && token.value === op) {
      this.position++;
      return true;
    }
    return false;
  }

  private expectOp(op: string): void {
    if (!this.acceptOp(op)) {
      throw new SymbolicParameterError(this.source, `expected "${op}"`);
    }
  }
}
