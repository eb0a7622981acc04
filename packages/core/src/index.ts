/**
 * @qasm-bridge/core
 *
 * Translates quantum circuits into OpenQASM 2.0, reads such programs back
 * into circuits, and decodes the shot outcomes of QASM simulators into
 * classical registers.
 *
 * @example
 * ```typescript
 * import { Circuit, QasmBackend, decodeShots } from '@qasm-bridge/core';
 *
 * const bell = new Circuit()
 *   .defineBit('ro', 2)
 *   .hadamard(0)
 *   .cnot(0, 1)
 *   .repeatedMeasurement('ro', 10);
 *
 * const qasm = new QasmBackend().circuitToQasmString(bell);
 * // OPENQASM 2.0;
 * // include "qelib1.inc";
 * // qreg q[2];
 * // creg ro[2];
 * // h q[0];
 * // cx q[0],q[1];
 * // measure q -> ro;
 *
 * const registers = decodeShots(['00', '11'], new Map([['ro', 2]]));
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Circuits
// ============================================================================

export { Circuit } from './circuit';
export type { CircuitStats } from './circuit';

export { operationTags, hasTag, isDefinition, operationQubits } from './operations';
export type {
  CalculatorFloat,
  Operation,
  OperationType,
  RotationGate,
  RotationGateType,
  FixedSingleQubitGate,
  FixedSingleQubitGateType,
  TwoQubitGate,
  TwoQubitGateType,
  GenericSingleQubitGate,
  MeasureQubit,
  PragmaRepeatedMeasurement,
  Definition,
  DefinitionType,
  PragmaSetNumberOfMeasurements,
  PragmaGetStateVector,
  PragmaGetDensityMatrix,
  PragmaSetStateVector,
  InputSymbolic,
  OpaqueOperation,
  TableGate,
  TableGateType,
} from './operations';

// ============================================================================
// Complex Number Utilities
// ============================================================================

export {
  complex,
  magnitude,
  magnitudeSquared,
  phase,
  conjugate,
  equals,
  norm,
  flatten,
  ZERO,
  ONE,
} from './complex';
export type { Complex } from './complex';

// ============================================================================
// Translation
// ============================================================================

export {
  GATE_TABLE,
  formatFloat,
  resolveParameter,
  renderInstruction,
  translateOperation,
  translateTableGate,
  translateSingleQubitGate,
  translateMeasureQubit,
  translateRepeatedMeasurement,
  translateDefinition,
} from './gates';
export type { GateRule, ParameterResolver, TranslateOptions } from './gates';

export { eulerAngles } from './decomposition';
export type { EulerAngles } from './decomposition';

export { resolveQubit, defaultQubitNames, registerRanges, totalBits, DEFAULT_QUBIT_REGISTER } from './naming';
export type { QubitNameMap, RegisterLengths, BitRange } from './naming';

export { callOperation, callCircuit, composeQasm, QASM_HEADER, QASM_INCLUDE } from './interface';
export type { CallCircuitOptions, CircuitTranslation, ComposeOptions } from './interface';

export { parseQasm, stringToCircuit, fileToCircuit } from './parser';
export type { ParsedQasm } from './parser';

export { Calculator, isSymbolic } from './calculator';
export { SymbolicCache, fnv1a } from './symbolic-cache';

// ============================================================================
// Classification & Decoding
// ============================================================================

export { classify, validateMetadata } from './classifier';
export type {
  ClassifiedCircuit,
  ClassifyOptions,
  MeasurementMetadata,
  RepeatedMeasurementInfo,
  MeasureQubitInfo,
  NumberOfMeasurementsInfo,
} from './classifier';

export { collectDeclarations, registerLengths, toDeclaration, emptyRegisters } from './registers';
export type { RegisterKind, RegisterDeclaration, DecodedRegisters } from './registers';

export { decode, decodeShots, decodeCounts, splitOutcome } from './decoder';
export type { RawOutcomes, DecodeOptions } from './decoder';

// ============================================================================
// Backends
// ============================================================================

export { QasmBackend } from './qasm-backend';
export type { QasmBackendOptions, QasmRunOptions, QasmProgram } from './qasm-backend';

export { SimulatorBackend, shotCount, DEFAULT_ALLOWED_SIMULATORS } from './simulator-backend';
export type {
  Simulator,
  SimulatorRequest,
  SimulatorResult,
  SimulatorBackendOptions,
  MeasurementCircuits,
} from './simulator-backend';

// ============================================================================
// Errors & Logging
// ============================================================================

export {
  QasmBridgeError,
  UnsupportedOperationError,
  QubitNameResolutionError,
  ValidationError,
  DecodeShapeMismatchError,
  SymbolicParameterError,
  FileExistsError,
  QasmParseError,
  SimulatorError,
} from './errors';
export type { ValidationFailure } from './errors';

export { createLogger } from './logger';
export type { Logger } from './logger';

// ============================================================================
// Version Info
// ============================================================================

export const VERSION = '0.1.0';
