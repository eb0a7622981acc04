/**
 * Qubit and classical register naming.
 */

import { QubitNameResolutionError } from './errors';

/**
 * Custom textual identifiers for qubit indices
 */
export type QubitNameMap = ReadonlyMap<number, string>;

/**
 * Bit-register lengths in declaration order
 */
export type RegisterLengths = ReadonlyMap<string, number>;

/**
 * Half-open bit range `[start, end)` of a register
 */
export interface BitRange {
  start: number;
  end: number;
}

export const DEFAULT_QUBIT_REGISTER = 'q';

/**
 * Textual identifier of a qubit.
 *
 * Without a name map the qubit is `<registerName>[<index>]`. With one, the
 * index must be present in it.
 */
export function resolveQubit(
  index: number,
  names?: QubitNameMap,
  registerName: string = DEFAULT_QUBIT_REGISTER
): string {
  if (!names) {
    return `${registerName}[${index}]`;
  }
  const name = names.get(index);
  if (name === undefined) {
    throw new QubitNameResolutionError(index);
  }
  return name;
}

/**
 * Build a total name map for `numberQubits` qubits of a register
 */
export function defaultQubitNames(
  numberQubits: number,
  registerName: string = DEFAULT_QUBIT_REGISTER
): Map<number, string> {
  const names = new Map<number, string>();
  for (let i = 0; i < numberQubits; i++) {
    names.set(i, `${registerName}[${i}]`);
  }
  return names;
}

/**
 * Contiguous bit range of every register, first-declared register first
 */
export function registerRanges(lengths: RegisterLengths): Map<string, BitRange> {
  const ranges = new Map<string, BitRange>();
  let start = 0;
  for (const [name, length] of lengths) {
    ranges.set(name, { start, end: start + length });
    start += length;
  }
  return ranges;
}

/**
 * Total number of bits over all registers
 */
export function totalBits(lengths: RegisterLengths): number {
  let total = 0;
  for (const length of lengths.values()) {
    total += length;
  }
  return total;
}
