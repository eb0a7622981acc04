/**
 * Circuit Builder
 *
 * Provides a declarative way to build the ordered operation sequence that
 * the QASM translator and the simulator backend consume. Circuits are
 * restartable iterables and can be combined.
 */

import type { Complex } from './complex';
import {
  hasTag,
  isDefinition,
  operationQubits,
  type CalculatorFloat,
  type Definition,
  type Operation,
  type TwoQubitGateType,
} from './operations';

// ============================================================================
// Circuit Statistics
// ============================================================================

/**
 * Statistics about a circuit
 */
export interface CircuitStats {
  numQubits: number;
  totalOperations: number;
  singleQubitGates: number;
  twoQubitGates: number;
  measurements: number;
  definitions: number;
  pragmas: number;
  operationBreakdown: Record<string, number>;
}

// ============================================================================
// Circuit Class
// ============================================================================

/**
 * Quantum Circuit Builder
 *
 * Build reusable circuits with a fluent API.
 *
 * @example
 * ```typescript
 * const bell = new Circuit()
 *   .defineBit('ro', 2)
 *   .hadamard(0)
 *   .cnot(0, 1)
 *   .repeatedMeasurement('ro', 100);
 * ```
 */
export class Circuit implements Iterable<Operation> {
  private _operations: Operation[] = [];
  private _name?: string;

  /**
   * Create a new circuit
   * @param name Optional name for the circuit
   */
  constructor(name?: string) {
    this._name = name;
  }

  // =========================================================================
  // Properties
  // =========================================================================

  /**
   * Circuit name
   */
  get name(): string | undefined {
    return this._name;
  }

  /**
   * All operations in insertion order
   */
  get operations(): readonly Operation[] {
    return this._operations;
  }

  /**
   * Number of operations in the circuit
   */
  get length(): number {
    return this._operations.length;
  }

  [Symbol.iterator](): Iterator<Operation> {
    return this._operations[Symbol.iterator]();
  }

  // =========================================================================
  // Generic Insertion
  // =========================================================================

  /**
   * Append any operation
   */
  add(operation: Operation): this {
    for (const q of operationQubits(operation)) {
      this.validateQubit(q);
    }
    this._operations.push(operation);
    return this;
  }

  // =========================================================================
  // Single-Qubit Gates
  // =========================================================================

  /**
   * Hadamard gate
   */
  hadamard(qubit: number): this {
    return this.add({ type: 'Hadamard', qubit });
  }

  /**
   * Pauli-X gate
   */
  pauliX(qubit: number): this {
    return this.add({ type: 'PauliX', qubit });
  }

  /**
   * Pauli-Y gate
   */
  pauliY(qubit: number): this {
    return this.add({ type: 'PauliY', qubit });
  }

  /**
   * Pauli-Z gate
   */
  pauliZ(qubit: number): this {
    return this.add({ type: 'PauliZ', qubit });
  }

  /**
   * S gate (sqrt Z)
   */
  sGate(qubit: number): this {
    return this.add({ type: 'SGate', qubit });
  }

  /**
   * T gate (sqrt S)
   */
  tGate(qubit: number): this {
    return this.add({ type: 'TGate', qubit });
  }

  /**
   * Square root of Pauli-X
   */
  sqrtPauliX(qubit: number): this {
    return this.add({ type: 'SqrtPauliX', qubit });
  }

  // =========================================================================
  // Rotations
  // =========================================================================

  /**
   * Rotation around X-axis
   */
  rotateX(qubit: number, theta: CalculatorFloat): this {
    return this.add({ type: 'RotateX', qubit, theta });
  }

  /**
   * Rotation around Y-axis
   */
  rotateY(qubit: number, theta: CalculatorFloat): this {
    return this.add({ type: 'RotateY', qubit, theta });
  }

  /**
   * Rotation around Z-axis
   */
  rotateZ(qubit: number, theta: CalculatorFloat): this {
    return this.add({ type: 'RotateZ', qubit, theta });
  }

  /**
   * General single-qubit unitary from its first column (alpha, beta)
   */
  singleQubitGate(
    qubit: number,
    alphaR: CalculatorFloat,
    alphaI: CalculatorFloat,
    betaR: CalculatorFloat,
    betaI: CalculatorFloat,
    globalPhase: CalculatorFloat = 0
  ): this {
    return this.add({
      type: 'SingleQubitGate',
      qubit,
      alphaR,
      alphaI,
      betaR,
      betaI,
      globalPhase,
    });
  }

  // =========================================================================
  // Two-Qubit Gates
  // =========================================================================

  /**
   * Controlled-NOT gate
   */
  cnot(control: number, target: number): this {
    return this.twoQubit('CNOT', control, target);
  }

  /**
   * Controlled Pauli-Y gate
   */
  controlledPauliY(control: number, target: number): this {
    return this.twoQubit('ControlledPauliY', control, target);
  }

  /**
   * Controlled Pauli-Z gate
   */
  controlledPauliZ(control: number, target: number): this {
    return this.twoQubit('ControlledPauliZ', control, target);
  }

  /**
   * Molmer-Sorensen XX gate (fixed pi/2 interaction)
   */
  molmerSorensenXX(control: number, target: number): this {
    return this.twoQubit('MolmerSorensenXX', control, target);
  }

  // =========================================================================
  // Measurement
  // =========================================================================

  /**
   * Measure a qubit into one bit of a readout register
   */
  measureQubit(qubit: number, readout: string, readoutIndex: number): this {
    return this.add({ type: 'MeasureQubit', qubit, readout, readoutIndex });
  }

  /**
   * Measure all qubits, repeated `numberMeasurements` times
   */
  repeatedMeasurement(
    readout: string,
    numberMeasurements: number,
    qubitMapping?: Readonly<Record<number, number>>
  ): this {
    this.validateCount(numberMeasurements);
    return this.add({
      type: 'PragmaRepeatedMeasurement',
      readout,
      numberMeasurements,
      qubitMapping,
    });
  }

  // =========================================================================
  // Classical Registers
  // =========================================================================

  /**
   * Declare a bit register
   */
  defineBit(name: string, length: number, isOutput: boolean = true): this {
    return this.define('DefinitionBit', name, length, isOutput);
  }

  /**
   * Declare a float register
   */
  defineFloat(name: string, length: number, isOutput: boolean = true): this {
    return this.define('DefinitionFloat', name, length, isOutput);
  }

  /**
   * Declare a complex register
   */
  defineComplex(name: string, length: number, isOutput: boolean = true): this {
    return this.define('DefinitionComplex', name, length, isOutput);
  }

  /**
   * Declare an unsigned integer register
   */
  defineUsize(name: string, length: number, isOutput: boolean = true): this {
    return this.define('DefinitionUsize', name, length, isOutput);
  }

  // =========================================================================
  // Pragmas
  // =========================================================================

  /**
   * Set the shot count for the per-qubit measurements of a readout
   */
  setNumberOfMeasurements(readout: string, numberMeasurements: number): this {
    this.validateCount(numberMeasurements);
    return this.add({
      type: 'PragmaSetNumberOfMeasurements',
      readout,
      numberMeasurements,
    });
  }

  /**
   * Request the final state vector
   */
  getStateVector(readout: string): this {
    return this.add({ type: 'PragmaGetStateVector', readout });
  }

  /**
   * Request the final density matrix
   */
  getDensityMatrix(readout: string): this {
    return this.add({ type: 'PragmaGetDensityMatrix', readout });
  }

  /**
   * Start the simulation from the given state vector
   */
  setStateVector(statevector: Complex[]): this {
    return this.add({
      type: 'PragmaSetStateVector',
      statevector: statevector.map((c) => ({ real: c.real, imag: c.imag })),
    });
  }

  /**
   * Assign a value to a symbolic variable
   */
  inputSymbolic(name: string, input: number): this {
    return this.add({ type: 'InputSymbolic', name, input });
  }

  // =========================================================================
  // Circuit Composition
  // =========================================================================

  /**
   * Append another circuit to this one
   */
  append(other: Iterable<Operation>): this {
    for (const op of other) {
      this.add(op);
    }
    return this;
  }

  /**
   * New circuit holding this circuit's operations followed by `other`'s
   */
  concat(other: Circuit): Circuit {
    return new Circuit(this._name).append(this).append(other);
  }

  // =========================================================================
  // Queries
  // =========================================================================

  /**
   * Operations carrying the given capability tag
   */
  filterByTag(tag: string): Operation[] {
    return this._operations.filter((op) => hasTag(op, tag));
  }

  /**
   * Classical register definitions in declaration order
   */
  definitions(): Definition[] {
    return this._operations.filter(isDefinition);
  }

  /**
   * One more than the highest qubit index used, or 0 for no qubits
   */
  numberOfQubits(): number {
    let highest = -1;
    for (const op of this._operations) {
      for (const q of operationQubits(op)) {
        highest = Math.max(highest, q);
      }
    }
    return highest + 1;
  }

  /**
   * Get circuit statistics
   */
  getStats(): CircuitStats {
    const operationBreakdown: Record<string, number> = {};
    let singleQubitGates = 0;
    let twoQubitGates = 0;
    let measurements = 0;
    let definitions = 0;
    let pragmas = 0;

    for (const op of this._operations) {
      operationBreakdown[op.type] = (operationBreakdown[op.type] || 0) + 1;

      if (hasTag(op, 'SingleQubitGateOperation')) {
        singleQubitGates++;
      } else if (hasTag(op, 'TwoQubitGateOperation')) {
        twoQubitGates++;
      } else if (isDefinition(op)) {
        definitions++;
      }

      if (op.type === 'MeasureQubit' || op.type === 'PragmaRepeatedMeasurement') {
        measurements++;
      }
      if (hasTag(op, 'PragmaOperation')) {
        pragmas++;
      }
    }

    return {
      numQubits: this.numberOfQubits(),
      totalOperations: this._operations.length,
      singleQubitGates,
      twoQubitGates,
      measurements,
      definitions,
      pragmas,
      operationBreakdown,
    };
  }

  // =========================================================================
  // Serialization
  // =========================================================================

  /**
   * Convert circuit to JSON
   */
  toJSON(): { name?: string; operations: Operation[] } {
    return {
      name: this._name,
      operations: [...this._operations],
    };
  }

  /**
   * Create circuit from JSON
   */
  static fromJSON(json: { name?: string; operations: Operation[] }): Circuit {
    return new Circuit(json.name).append(json.operations);
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private twoQubit(type: TwoQubitGateType, control: number, target: number): this {
    if (control === target) {
      throw new Error('Control and target must be different qubits');
    }
    return this.add({ type, control, target });
  }

  private define(
    type: Definition['type'],
    name: string,
    length: number,
    isOutput: boolean
  ): this {
    if (!Number.isInteger(length) || length < 1) {
      throw new Error(`Register ${name} must have a positive length, got ${length}`);
    }
    if (this.definitions().some((d) => d.name === name)) {
      throw new Error(`Register ${name} is already defined`);
    }
    return this.add({ type, name, length, isOutput });
  }

  private validateQubit(qubit: number): void {
    if (!Number.isInteger(qubit) || qubit < 0) {
      throw new Error(`Qubit ${qubit} must be a non-negative integer`);
    }
  }

  private validateCount(count: number): void {
    if (!Number.isInteger(count) || count < 1) {
      throw new Error(`Number of measurements must be a positive integer, got ${count}`);
    }
  }
}
