/**
 * Classical register declarations and decoded register values.
 */

import type { Complex } from './complex';
import type { RegisterLengths } from './naming';
import type { Definition, DefinitionType, Operation } from './operations';
import { isDefinition } from './operations';

/**
 * Element kind of a classical register
 */
export type RegisterKind = 'bit' | 'float' | 'complex' | 'usize';

/**
 * A declared classical register
 */
export interface RegisterDeclaration {
  name: string;
  length: number;
  kind: RegisterKind;
  isOutput: boolean;
}

/**
 * Per-shot register values, one map per element kind
 */
export interface DecodedRegisters {
  bit: Record<string, boolean[][]>;
  float: Record<string, number[][]>;
  complex: Record<string, Complex[][]>;
}

const KIND_BY_DEFINITION: Readonly<Record<DefinitionType, RegisterKind>> = {
  DefinitionBit: 'bit',
  DefinitionFloat: 'float',
  DefinitionComplex: 'complex',
  DefinitionUsize: 'usize',
};

/**
 * Declaration described by a definition operation
 */
export function toDeclaration(definition: Definition): RegisterDeclaration {
  return {
    name: definition.name,
    length: definition.length,
    kind: KIND_BY_DEFINITION[definition.type],
    isOutput: definition.isOutput,
  };
}

/**
 * All register declarations of a circuit in declaration order
 */
export function collectDeclarations(circuit: Iterable<Operation>): RegisterDeclaration[] {
  const declarations: RegisterDeclaration[] = [];
  for (const op of circuit) {
    if (isDefinition(op)) {
      declarations.push(toDeclaration(op));
    }
  }
  return declarations;
}

/**
 * Name → length map of the given declarations, in declaration order.
 * Optionally restricted to some element kinds.
 */
export function registerLengths(
  declarations: readonly RegisterDeclaration[],
  kinds?: readonly RegisterKind[]
): Map<string, number> {
  const lengths = new Map<string, number>();
  for (const declaration of declarations) {
    if (!kinds || kinds.includes(declaration.kind)) {
      lengths.set(declaration.name, declaration.length);
    }
  }
  return lengths;
}

function registerRecord<T>(): Record<string, T> {
  // No prototype: any register name, `__proto__` included, is an own key
  return Object.create(null);
}

/**
 * Fresh, empty decoded registers
 */
export function emptyRegisters(): DecodedRegisters {
  return {
    bit: registerRecord<boolean[][]>(),
    float: registerRecord<number[][]>(),
    complex: registerRecord<Complex[][]>(),
  };
}

export type { RegisterLengths };
