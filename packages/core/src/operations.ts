/**
 * Operation Model
 *
 * The instruction set understood by the translator and the classifier.
 * Every operation is a plain object discriminated by `type`; its qubit and
 * parameter slots are fixed by that type.
 */

import type { Complex } from './complex';

// ============================================================================
// Parameter Values
// ============================================================================

/**
 * A numeric value or a symbolic expression such as `"2*theta"`
 */
export type CalculatorFloat = number | string;

// ============================================================================
// Operation Type Definitions
// ============================================================================

/**
 * Rotation gate types (one angle parameter)
 */
export type RotationGateType = 'RotateX' | 'RotateY' | 'RotateZ';

/**
 * Fixed single-qubit gate types (no parameters)
 */
export type FixedSingleQubitGateType =
  | 'Hadamard'
  | 'PauliX'
  | 'PauliY'
  | 'PauliZ'
  | 'SGate'
  | 'TGate'
  | 'SqrtPauliX';

/**
 * Two-qubit gate types
 */
export type TwoQubitGateType =
  | 'CNOT'
  | 'ControlledPauliY'
  | 'ControlledPauliZ'
  | 'MolmerSorensenXX';

/**
 * Classical register definition types
 */
export type DefinitionType =
  | 'DefinitionBit'
  | 'DefinitionFloat'
  | 'DefinitionComplex'
  | 'DefinitionUsize';

/**
 * Gate types rendered straight from the translation table
 */
export type TableGateType =
  | RotationGateType
  | FixedSingleQubitGateType
  | TwoQubitGateType;

// ============================================================================
// Operation Definitions
// ============================================================================

/**
 * Rotation around a Bloch-sphere axis
 */
export interface RotationGate {
  type: RotationGateType;
  qubit: number;
  theta: CalculatorFloat;
}

/**
 * Single-qubit gate without parameters
 */
export interface FixedSingleQubitGate {
  type: FixedSingleQubitGateType;
  qubit: number;
}

/**
 * Two-qubit gate
 */
export interface TwoQubitGate {
  type: TwoQubitGateType;
  control: number;
  target: number;
}

/**
 * Generic single-qubit unitary given by the first column (alpha, beta)
 */
export interface GenericSingleQubitGate {
  type: 'SingleQubitGate';
  qubit: number;
  alphaR: CalculatorFloat;
  alphaI: CalculatorFloat;
  betaR: CalculatorFloat;
  betaI: CalculatorFloat;
  globalPhase: CalculatorFloat;
}

/**
 * Measurement of one qubit into one bit of a readout register
 */
export interface MeasureQubit {
  type: 'MeasureQubit';
  qubit: number;
  readout: string;
  readoutIndex: number;
}

/**
 * Measurement of all qubits repeated `numberMeasurements` times.
 * `qubitMapping` maps qubit index to readout bit index.
 */
export interface PragmaRepeatedMeasurement {
  type: 'PragmaRepeatedMeasurement';
  readout: string;
  numberMeasurements: number;
  qubitMapping?: Readonly<Record<number, number>>;
}

/**
 * Classical register declaration
 */
export interface Definition {
  type: DefinitionType;
  name: string;
  length: number;
  isOutput: boolean;
}

/**
 * Number of shots for the per-qubit measurements of a readout
 */
export interface PragmaSetNumberOfMeasurements {
  type: 'PragmaSetNumberOfMeasurements';
  readout: string;
  numberMeasurements: number;
}

/**
 * Request the final state vector into a complex readout register
 */
export interface PragmaGetStateVector {
  type: 'PragmaGetStateVector';
  readout: string;
}

/**
 * Request the final density matrix into a complex readout register
 */
export interface PragmaGetDensityMatrix {
  type: 'PragmaGetDensityMatrix';
  readout: string;
}

/**
 * Initial state vector handed to the simulator
 */
export interface PragmaSetStateVector {
  type: 'PragmaSetStateVector';
  statevector: Complex[];
}

/**
 * Assign a value to a symbolic variable
 */
export interface InputSymbolic {
  type: 'InputSymbolic';
  name: string;
  input: number;
}

/**
 * An operation the QASM backend has no rule for
 */
export interface OpaqueOperation {
  type: 'Opaque';
  name: string;
  qubits: number[];
}

/**
 * Union type for all operations
 */
export type Operation =
  | RotationGate
  | FixedSingleQubitGate
  | TwoQubitGate
  | GenericSingleQubitGate
  | MeasureQubit
  | PragmaRepeatedMeasurement
  | Definition
  | PragmaSetNumberOfMeasurements
  | PragmaGetStateVector
  | PragmaGetDensityMatrix
  | PragmaSetStateVector
  | InputSymbolic
  | OpaqueOperation;

export type OperationType = Operation['type'];

/**
 * Operations rendered from the translation table
 */
export type TableGate = RotationGate | FixedSingleQubitGate | TwoQubitGate;

// ============================================================================
// Capability Tags
// ============================================================================

const GATE = ['Operation', 'GateOperation'] as const;
const SINGLE = [...GATE, 'SingleQubitGateOperation'] as const;
const TWO = [...GATE, 'TwoQubitGateOperation'] as const;
const PRAGMA = ['Operation', 'PragmaOperation'] as const;
const MEASUREMENT = ['Operation', 'Measurement'] as const;
const DEFINITION = ['Operation', 'Definition'] as const;

const OPERATION_TAGS: { readonly [K in OperationType]: readonly string[] } = {
  RotateX: [...SINGLE, 'Rotation', 'RotateX'],
  RotateY: [...SINGLE, 'Rotation', 'RotateY'],
  RotateZ: [...SINGLE, 'Rotation', 'RotateZ'],
  Hadamard: [...SINGLE, 'Hadamard'],
  PauliX: [...SINGLE, 'PauliX'],
  PauliY: [...SINGLE, 'PauliY'],
  PauliZ: [...SINGLE, 'PauliZ'],
  SGate: [...SINGLE, 'SGate'],
  TGate: [...SINGLE, 'TGate'],
  SqrtPauliX: [...SINGLE, 'SqrtPauliX'],
  SingleQubitGate: [...SINGLE, 'SingleQubitGate'],
  CNOT: [...TWO, 'CNOT'],
  ControlledPauliY: [...TWO, 'ControlledPauliY'],
  ControlledPauliZ: [...TWO, 'ControlledPauliZ'],
  MolmerSorensenXX: [...TWO, 'MolmerSorensenXX'],
  MeasureQubit: [...MEASUREMENT, 'MeasureQubit'],
  PragmaRepeatedMeasurement: [
    ...PRAGMA,
    'Measurement',
    'PragmaRepeatedMeasurement',
  ],
  DefinitionBit: [...DEFINITION, 'DefinitionBit'],
  DefinitionFloat: [...DEFINITION, 'DefinitionFloat'],
  DefinitionComplex: [...DEFINITION, 'DefinitionComplex'],
  DefinitionUsize: [...DEFINITION, 'DefinitionUsize'],
  PragmaSetNumberOfMeasurements: [
    ...PRAGMA,
    'Measurement',
    'PragmaSetNumberOfMeasurements',
  ],
  PragmaGetStateVector: [...PRAGMA, 'Measurement', 'PragmaGetStateVector'],
  PragmaGetDensityMatrix: [...PRAGMA, 'Measurement', 'PragmaGetDensityMatrix'],
  PragmaSetStateVector: [...PRAGMA, 'PragmaSetStateVector'],
  InputSymbolic: ['Operation', 'Definition', 'InputSymbolic'],
  Opaque: ['Operation'],
};

/**
 * Capability tags of an operation, most general first
 */
export function operationTags(op: Operation): readonly string[] {
  return OPERATION_TAGS[op.type];
}

/**
 * Check whether an operation carries a tag
 */
export function hasTag(op: Operation, tag: string): boolean {
  return OPERATION_TAGS[op.type].includes(tag);
}

/**
 * Type guard for classical register definitions
 */
export function isDefinition(op: Operation): op is Definition {
  return (
    op.type === 'DefinitionBit' ||
    op.type === 'DefinitionFloat' ||
    op.type === 'DefinitionComplex' ||
    op.type === 'DefinitionUsize'
  );
}

/**
 * Qubits an operation acts on. Whole-register operations return an empty list.
 */
export function operationQubits(op: Operation): number[] {
  switch (op.type) {
    case 'CNOT':
    case 'ControlledPauliY':
    case 'ControlledPauliZ':
    case 'MolmerSorensenXX':
      return [op.control, op.target];
    case 'PragmaRepeatedMeasurement':
      return op.qubitMapping
        ? Object.keys(op.qubitMapping).map((key) => Number(key))
        : [];
    case 'Opaque':
      return [...op.qubits];
    default:
      return 'qubit' in op ? [op.qubit] : [];
  }
}
