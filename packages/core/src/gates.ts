/**
 * Gate Translation Table
 *
 * Static association between operation type and QASM mnemonic plus the
 * ordered qubit and parameter slots that make up its arguments, and the
 * per-operation translation built on top of it.
 */

import { isSymbolic } from './calculator';
import { complex } from './complex';
import { eulerAngles } from './decomposition';
import { SymbolicParameterError, UnsupportedOperationError } from './errors';
import { resolveQubit, type QubitNameMap } from './naming';
import type {
  CalculatorFloat,
  Definition,
  GenericSingleQubitGate,
  MeasureQubit,
  Operation,
  PragmaRepeatedMeasurement,
  TableGate,
  TableGateType,
} from './operations';

// ============================================================================
// Table
// ============================================================================

type QubitSlot = 'qubit' | 'control' | 'target';
type ParameterSlot = 'theta';

type SlotsOf<T, V> = {
  [K in keyof T]-?: T[K] extends V ? K : never;
}[keyof T];

/**
 * Translation rule for one table gate
 */
export interface GateRule {
  mnemonic: string;
  qubits: readonly QubitSlot[];
  parameters: readonly ParameterSlot[];
  /** Literal arguments appended after the parameters */
  constants?: readonly string[];
}

type GateOf<K extends TableGateType> = TableGate extends infer G
  ? G extends { type: infer T }
    ? K extends T
      ? G
      : never
    : never
  : never;

// Slots a rule may name are the ones its operation actually carries
type CheckedGateRule<T> = GateRule & {
  qubits: readonly Extract<SlotsOf<T, number>, QubitSlot>[];
  parameters: readonly Extract<SlotsOf<T, CalculatorFloat>, ParameterSlot>[];
};

type GateTable = {
  readonly [K in TableGateType]: CheckedGateRule<GateOf<K>>;
};

export const GATE_TABLE = {
  RotateX: { mnemonic: 'rx', qubits: ['qubit'], parameters: ['theta'] },
  RotateY: { mnemonic: 'ry', qubits: ['qubit'], parameters: ['theta'] },
  RotateZ: { mnemonic: 'rz', qubits: ['qubit'], parameters: ['theta'] },
  Hadamard: { mnemonic: 'h', qubits: ['qubit'], parameters: [] },
  PauliX: { mnemonic: 'x', qubits: ['qubit'], parameters: [] },
  PauliY: { mnemonic: 'y', qubits: ['qubit'], parameters: [] },
  PauliZ: { mnemonic: 'z', qubits: ['qubit'], parameters: [] },
  SGate: { mnemonic: 's', qubits: ['qubit'], parameters: [] },
  TGate: { mnemonic: 't', qubits: ['qubit'], parameters: [] },
  SqrtPauliX: {
    mnemonic: 'rx',
    qubits: ['qubit'],
    parameters: [],
    constants: ['pi/2'],
  },
  CNOT: { mnemonic: 'cx', qubits: ['control', 'target'], parameters: [] },
  ControlledPauliY: { mnemonic: 'cy', qubits: ['control', 'target'], parameters: [] },
  ControlledPauliZ: { mnemonic: 'cz', qubits: ['control', 'target'], parameters: [] },
  MolmerSorensenXX: {
    mnemonic: 'rxx',
    qubits: ['control', 'target'],
    parameters: [],
    constants: ['pi/2'],
  },
} as const satisfies GateTable;

// ============================================================================
// Options
// ============================================================================

/**
 * Evaluates a parameter expression to a number
 */
export type ParameterResolver = (value: CalculatorFloat) => number;

/**
 * Options for translating single operations
 */
export interface TranslateOptions {
  /**
   * Custom qubit identifiers. Default: `<qubitRegisterName>[<index>]`
   */
  qubitNames?: QubitNameMap;

  /**
   * Name of the qubit register
   * Default: 'q'
   */
  qubitRegisterName?: string;

  /**
   * Evaluates every parameter before formatting. Without one, parameters
   * must be numeric.
   */
  resolver?: ParameterResolver;

  /**
   * Placeholder tokens rendered verbatim instead of being resolved
   */
  placeholders?: { has(token: string): boolean };
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Format a float with full double precision, always with a decimal point
 * or exponent: `0` → `0.0`, `-0` → `-0.0`, `0.1` → `0.1`.
 */
export function formatFloat(value: number): string {
  if (Object.is(value, -0)) {
    return '-0.0';
  }
  const text = String(value);
  if (Number.isFinite(value) && !/[.e]/.test(text)) {
    return `${text}.0`;
  }
  return text;
}

/**
 * Evaluate a parameter to a number, through the resolver when one is set
 */
export function resolveParameter(value: CalculatorFloat, resolver?: ParameterResolver): number {
  if (resolver) {
    return resolver(value);
  }
  if (typeof value === 'number') {
    return value;
  }
  if (!isSymbolic(value)) {
    return Number(value);
  }
  throw new SymbolicParameterError(value, 'no calculator supplied to resolve it');
}

function renderParameter(value: CalculatorFloat, options: TranslateOptions): string {
  if (typeof value === 'string' && options.placeholders?.has(value)) {
    return value;
  }
  return formatFloat(resolveParameter(value, options.resolver));
}

function qubitName(index: number, options: TranslateOptions): string {
  return resolveQubit(index, options.qubitNames, options.qubitRegisterName);
}

/**
 * Render `<mnemonic>(<p>,<p>) <q>,<q>`; the parameter group is omitted when empty
 */
export function renderInstruction(
  mnemonic: string,
  parameters: readonly string[],
  qubits: readonly string[]
): string {
  const head = parameters.length > 0 ? `${mnemonic}(${parameters.join(',')})` : mnemonic;
  return `${head} ${qubits.join(',')}`;
}

// ============================================================================
// Translation
// ============================================================================

function qubitSlot(op: TableGate, slot: QubitSlot): number {
  if (slot === 'qubit' && 'qubit' in op) return op.qubit;
  if (slot === 'control' && 'control' in op) return op.control;
  if (slot === 'target' && 'target' in op) return op.target;
  throw new UnsupportedOperationError(op.type, `missing qubit slot ${slot}`);
}

function parameterSlot(op: TableGate, slot: ParameterSlot): CalculatorFloat {
  if (slot === 'theta' && 'theta' in op) return op.theta;
  throw new UnsupportedOperationError(op.type, `missing parameter slot ${slot}`);
}

/**
 * Translate a gate from the static table
 */
export function translateTableGate(op: TableGate, options: TranslateOptions = {}): string {
  const rule: GateRule = GATE_TABLE[op.type];
  const parameters = rule.parameters.map((slot) =>
    renderParameter(parameterSlot(op, slot), options)
  );
  parameters.push(...(rule.constants ?? []));
  const qubits = rule.qubits.map((slot) => qubitName(qubitSlot(op, slot), options));
  return renderInstruction(rule.mnemonic, parameters, qubits);
}

/**
 * Translate a generic single-qubit gate into `u3(theta,phi,lambda) <qubit>`
 */
export function translateSingleQubitGate(
  op: GenericSingleQubitGate,
  options: TranslateOptions = {}
): string {
  const evaluate = (value: CalculatorFloat): number => resolveParameter(value, options.resolver);
  const alpha = complex(evaluate(op.alphaR), evaluate(op.alphaI));
  const beta = complex(evaluate(op.betaR), evaluate(op.betaI));
  const { theta, phi, lambda } = eulerAngles(alpha, beta);
  return renderInstruction(
    'u3',
    [formatFloat(theta), formatFloat(phi), formatFloat(lambda)],
    [qubitName(op.qubit, options)]
  );
}

/**
 * Translate a single-qubit measurement
 */
export function translateMeasureQubit(op: MeasureQubit, options: TranslateOptions = {}): string {
  return `measure ${qubitName(op.qubit, options)} -> ${op.readout}[${op.readoutIndex}]`;
}

/**
 * Translate a repeated measurement.
 *
 * With a qubit mapping, one line per mapped qubit in ascending qubit order.
 * Without one, custom qubit names are measured one by one into the bit of
 * their index, and the default register as a whole. Lines are unterminated.
 */
export function translateRepeatedMeasurement(
  op: PragmaRepeatedMeasurement,
  options: TranslateOptions = {}
): string[] {
  if (!op.qubitMapping) {
    if (options.qubitNames) {
      return [...options.qubitNames.entries()]
        .sort((a, b) => a[0] - b[0])
        .map(([index, name]) => `measure ${name} -> ${op.readout}[${index}]`);
    }
    return [`measure ${options.qubitRegisterName ?? 'q'} -> ${op.readout}`];
  }
  return Object.entries(op.qubitMapping)
    .map(([qubit, bit]) => [Number(qubit), bit] as const)
    .sort((a, b) => a[0] - b[0])
    .map(([qubit, bit]) => `measure ${qubitName(qubit, options)} -> ${op.readout}[${bit}]`);
}

/**
 * Translate a classical register definition
 */
export function translateDefinition(op: Definition): string {
  return `creg ${op.name}[${op.length}]`;
}

/**
 * Translate one operation into unterminated QASM lines.
 *
 * `InputSymbolic` yields no line. Metadata-only pragmas must be removed by
 * the classifier first and fail here like any other unsupported operation.
 */
export function translateOperation(op: Operation, options: TranslateOptions = {}): string[] {
  switch (op.type) {
    case 'RotateX':
    case 'RotateY':
    case 'RotateZ':
    case 'Hadamard':
    case 'PauliX':
    case 'PauliY':
    case 'PauliZ':
    case 'SGate':
    case 'TGate':
    case 'SqrtPauliX':
    case 'CNOT':
    case 'ControlledPauliY':
    case 'ControlledPauliZ':
    case 'MolmerSorensenXX':
      return [translateTableGate(op, options)];
    case 'SingleQubitGate':
      return [translateSingleQubitGate(op, options)];
    case 'MeasureQubit':
      return [translateMeasureQubit(op, options)];
    case 'PragmaRepeatedMeasurement':
      return translateRepeatedMeasurement(op, options);
    case 'DefinitionBit':
    case 'DefinitionFloat':
    case 'DefinitionComplex':
    case 'DefinitionUsize':
      return [translateDefinition(op)];
    case 'InputSymbolic':
      return [];
    case 'PragmaSetNumberOfMeasurements':
    case 'PragmaGetStateVector':
    case 'PragmaGetDensityMatrix':
    case 'PragmaSetStateVector':
      throw new UnsupportedOperationError(op.type, 'metadata-only pragma');
    case 'Opaque':
      throw new UnsupportedOperationError(op.name);
    default: {
      const unreachable: never = op;
      throw new UnsupportedOperationError(String(unreachable));
    }
  }
}
