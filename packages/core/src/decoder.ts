/**
 * Shot/Count Decoder
 *
 * Turns raw simulator outcomes into per-register, per-shot boolean vectors.
 *
 * An outcome is the concatenation of all bit registers with the
 * last-declared register on the left, e.g. registers `a[1]`, `b[2]` give
 * `"b1b0a0"`. Outcomes that separate registers with whitespace
 * (`"b1b0 a0"`) are split on it and the groups reversed back into
 * declaration order.
 *
 * Within a register, characters map to booleans in string order unless
 * `reverseBits` is set.
 */

import { DecodeShapeMismatchError } from './errors';
import { createLogger } from './logger';
import { totalBits, type RegisterLengths } from './naming';
import { emptyRegisters, type DecodedRegisters } from './registers';

const log = createLogger('decoder');

/**
 * Raw simulator output: one outcome per shot, or a histogram
 */
export type RawOutcomes =
  | { mode: 'shots'; outcomes: readonly string[] }
  | { mode: 'counts'; counts: Readonly<Record<string, number>> | ReadonlyMap<string, number> };

export interface DecodeOptions {
  /**
   * Reverse each register's characters, for simulators that print the
   * highest bit first
   * Default: false
   */
  reverseBits?: boolean;
}

function toBits(segment: string, reverseBits: boolean): boolean[] {
  const chars = [...segment];
  if (reverseBits) {
    chars.reverse();
  }
  return chars.map((c) => c === '1');
}

/**
 * Split one outcome into its registers, in declaration order
 */
export function splitOutcome(
  outcome: string,
  lengths: RegisterLengths,
  options: DecodeOptions = {}
): Map<string, boolean[]> {
  const reverseBits = options.reverseBits ?? false;
  const names = [...lengths.keys()];
  const expected = totalBits(lengths);
  const trimmed = outcome.trim();
  const segments = new Map<string, string>();

  if (/\s/.test(trimmed)) {
    const groups = trimmed.split(/\s+/).reverse();
    const actual = groups.reduce((sum, g) => sum + g.length, 0);
    if (groups.length !== names.length) {
      throw new DecodeShapeMismatchError(outcome, expected, actual);
    }
    names.forEach((name, i) => {
      if (groups[i].length !== lengths.get(name)) {
        throw new DecodeShapeMismatchError(outcome, expected, actual);
      }
      segments.set(name, groups[i]);
    });
  } else {
    if (trimmed.length !== expected) {
      throw new DecodeShapeMismatchError(outcome, expected, trimmed.length);
    }
    let position = 0;
    for (const name of [...names].reverse()) {
      const length = lengths.get(name) ?? 0;
      segments.set(name, trimmed.slice(position, position + length));
      position += length;
    }
  }

  const result = new Map<string, boolean[]>();
  for (const name of names) {
    result.set(name, toBits(segments.get(name) ?? '', reverseBits));
  }
  return result;
}

function isMap(
  counts: Readonly<Record<string, number>> | ReadonlyMap<string, number>
): counts is ReadonlyMap<string, number> {
  return counts instanceof Map;
}

function countEntries(
  counts: Readonly<Record<string, number>> | ReadonlyMap<string, number>
): [string, number][] {
  return isMap(counts) ? [...counts.entries()] : Object.entries(counts);
}

/**
 * Decode raw outcomes into bit registers.
 *
 * Every register of `lengths` gets one vector per shot, in input order.
 * Counts given as a plain object follow its property order, which lists
 * integer-like keys such as `"10"` first and ascending; pass a `Map` to
 * keep the insertion order. Float and complex registers are not produced
 * here.
 */
export function decode(
  raw: RawOutcomes,
  lengths: RegisterLengths,
  options: DecodeOptions = {}
): DecodedRegisters {
  const registers = emptyRegisters();
  for (const name of lengths.keys()) {
    registers.bit[name] = [];
  }

  const append = (outcome: string, times: number): void => {
    const split = splitOutcome(outcome, lengths, options);
    for (let i = 0; i < times; i++) {
      for (const [name, bits] of split) {
        registers.bit[name].push([...bits]);
      }
    }
  };

  if (raw.mode === 'shots') {
    for (const outcome of raw.outcomes) {
      append(outcome, 1);
    }
    log('decoded %d shots into %d registers', raw.outcomes.length, lengths.size);
  } else {
    let shots = 0;
    for (const [outcome, count] of countEntries(raw.counts)) {
      if (!Number.isInteger(count) || count < 0) {
        throw new RangeError(`Count for "${outcome}" must be a non-negative integer, got ${count}`);
      }
      append(outcome, count);
      shots += count;
    }
    log('decoded %d counted shots into %d registers', shots, lengths.size);
  }

  return registers;
}

/**
 * Decode a per-shot outcome list
 */
export function decodeShots(
  outcomes: readonly string[],
  lengths: RegisterLengths,
  options?: DecodeOptions
): DecodedRegisters {
  return decode({ mode: 'shots', outcomes }, lengths, options);
}

/**
 * Decode an outcome → count histogram
 */
export function decodeCounts(
  counts: Readonly<Record<string, number>> | ReadonlyMap<string, number>,
  lengths: RegisterLengths,
  options?: DecodeOptions
): DecodedRegisters {
  return decode({ mode: 'counts', counts }, lengths, options);
}
