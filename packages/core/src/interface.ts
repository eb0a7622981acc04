/**
 * Circuit translation.
 *
 * Folds a circuit into terminated QASM lines, and composes the lines into a
 * complete OpenQASM 2.0 program.
 */

import { isSymbolic } from './calculator';
import { translateOperation, translateTableGate, type TranslateOptions } from './gates';
import { createLogger } from './logger';
import { DEFAULT_QUBIT_REGISTER } from './naming';
import { isDefinition, type Operation } from './operations';
import { SymbolicCache } from './symbolic-cache';

const log = createLogger('interface');

export const QASM_HEADER = 'OPENQASM 2.0;';
export const QASM_INCLUDE = 'include "qelib1.inc";';

export interface CallCircuitOptions extends TranslateOptions {
  /**
   * Replace parametrized rotation angles with placeholder tokens
   * Default: false
   */
  symbolic?: boolean;

  /**
   * Cache receiving the placeholders in symbolic mode
   * Default: a new cache
   */
  symbolicCache?: SymbolicCache;
}

/**
 * Translated circuit
 */
export interface CircuitTranslation {
  /** `creg` declarations, in declaration order */
  declarations: string[];
  /** One terminated line per emitted instruction, in circuit order */
  lines: string[];
  /** Placeholder cache, set in symbolic mode */
  symbolicCache?: SymbolicCache;
}

export interface ComposeOptions {
  /**
   * Name of the qubit register
   * Default: 'q'
   */
  qubitRegisterName?: string;

  /**
   * Size of the qubit register
   */
  numberQubits: number;
}

function terminate(line: string): string {
  return `${line};`;
}

/**
 * Translate one operation into terminated lines
 */
export function callOperation(op: Operation, options: TranslateOptions = {}): string[] {
  return translateOperation(op, options).map(terminate);
}

/**
 * Translate every operation of a circuit, keeping circuit order.
 *
 * In symbolic mode a rotation whose angle is an expression is staged in the
 * symbolic cache and rendered with the placeholder token as its angle.
 */
export function callCircuit(
  circuit: Iterable<Operation>,
  options: CallCircuitOptions = {}
): CircuitTranslation {
  const { symbolic = false, symbolicCache, ...translateOptions } = options;
  const cache = symbolic ? symbolicCache ?? new SymbolicCache() : undefined;
  const declarations: string[] = [];
  const lines: string[] = [];

  for (const op of circuit) {
    if (isDefinition(op)) {
      declarations.push(...callOperation(op, translateOptions));
      continue;
    }
    if (
      cache &&
      (op.type === 'RotateX' || op.type === 'RotateY' || op.type === 'RotateZ') &&
      isSymbolic(op.theta)
    ) {
      const token = cache.stage(op.theta);
      const line = translateTableGate(
        { ...op, theta: token },
        { ...translateOptions, placeholders: cache }
      );
      lines.push(terminate(line));
      continue;
    }
    lines.push(...callOperation(op, translateOptions));
  }

  log(
    'translated %d declarations and %d lines%s',
    declarations.length,
    lines.length,
    cache ? ` with ${cache.size} placeholders` : ''
  );
  return { declarations, lines, symbolicCache: cache };
}

/**
 * Assemble the full program: header, include, qubit register, classical
 * registers and instructions, one per line.
 */
export function composeQasm(translation: CircuitTranslation, options: ComposeOptions): string {
  const register = options.qubitRegisterName ?? DEFAULT_QUBIT_REGISTER;
  const program = [
    QASM_HEADER,
    QASM_INCLUDE,
    `qreg ${register}[${options.numberQubits}];`,
    ...translation.declarations,
    ...translation.lines,
  ];
  return `${program.join('\n')}\n`;
}
