/**
 * Instruction Classifier & Validator
 *
 * Splits a circuit into the operations that become QASM instructions and
 * the metadata the simulator backend needs (shot counts, readouts,
 * state-vector / density-matrix requests, the initial state).
 */

import { Circuit } from './circuit';
import type { Complex } from './complex';
import { ValidationError } from './errors';
import { createLogger } from './logger';
import type { Operation } from './operations';

const log = createLogger('classifier');

/**
 * A repeated measurement of all qubits
 */
export interface RepeatedMeasurementInfo {
  readout: string;
  numberMeasurements: number;
  qubitMapping?: Readonly<Record<number, number>>;
}

/**
 * A single-qubit measurement
 */
export interface MeasureQubitInfo {
  qubit: number;
  readout: string;
  readoutIndex: number;
}

/**
 * A shot count set for a readout
 */
export interface NumberOfMeasurementsInfo {
  readout: string;
  numberMeasurements: number;
}

/**
 * Everything recorded while classifying a circuit
 */
export interface MeasurementMetadata {
  repeatedMeasurements: RepeatedMeasurementInfo[];
  measureQubits: MeasureQubitInfo[];
  numberOfMeasurements: NumberOfMeasurementsInfo[];
  getStateVector: boolean;
  getDensityMatrix: boolean;
  /** Readout register of the last state-vector request */
  stateVectorReadout?: string;
  /** Readout register of the last density-matrix request */
  densityMatrixReadout?: string;
  /** Values assigned by `InputSymbolic` operations */
  symbolicInputs: Record<string, number>;
}

/**
 * Result of classifying a circuit
 */
export interface ClassifiedCircuit {
  /** Operations to translate, in their original order */
  circuit: Circuit;
  metadata: MeasurementMetadata;
  /** Payload of the last `PragmaSetStateVector`, if any */
  initialStateVector?: Complex[];
}

export interface ClassifyOptions {
  /**
   * Reject circuits without a measurement or state / density request
   * Default: true
   */
  requireOutput?: boolean;
}

function emptyMetadata(): MeasurementMetadata {
  return {
    repeatedMeasurements: [],
    measureQubits: [],
    numberOfMeasurements: [],
    getStateVector: false,
    getDensityMatrix: false,
    symbolicInputs: {},
  };
}

/**
 * Classify a circuit in one left-to-right pass and validate the result.
 *
 * @throws ValidationError on mixed measurement kinds, on both state-vector
 * and density-matrix requests, or (with `requireOutput`) when the circuit
 * has no retrievable output
 */
export function classify(
  circuit: Iterable<Operation>,
  options: ClassifyOptions = {}
): ClassifiedCircuit {
  const emittable = new Circuit(circuit instanceof Circuit ? circuit.name : undefined);
  const metadata = emptyMetadata();
  let initialStateVector: Complex[] | undefined;
  let total = 0;

  for (const op of circuit) {
    total++;
    switch (op.type) {
      case 'PragmaSetStateVector':
        initialStateVector = op.statevector.map((c) => ({ real: c.real, imag: c.imag }));
        break;
      case 'PragmaRepeatedMeasurement':
        metadata.repeatedMeasurements.push({
          readout: op.readout,
          numberMeasurements: op.numberMeasurements,
          qubitMapping: op.qubitMapping,
        });
        emittable.add(op);
        break;
      case 'MeasureQubit':
        metadata.measureQubits.push({
          qubit: op.qubit,
          readout: op.readout,
          readoutIndex: op.readoutIndex,
        });
        emittable.add(op);
        break;
      case 'PragmaSetNumberOfMeasurements':
        metadata.numberOfMeasurements.push({
          readout: op.readout,
          numberMeasurements: op.numberMeasurements,
        });
        break;
      case 'PragmaGetStateVector':
        metadata.getStateVector = true;
        metadata.stateVectorReadout = op.readout;
        break;
      case 'PragmaGetDensityMatrix':
        metadata.getDensityMatrix = true;
        metadata.densityMatrixReadout = op.readout;
        break;
      case 'InputSymbolic':
        metadata.symbolicInputs[op.name] = op.input;
        emittable.add(op);
        break;
      default:
        emittable.add(op);
    }
  }

  validateMetadata(metadata, options.requireOutput ?? true);
  log('classified %d operations, %d emittable', total, emittable.length);

  return { circuit: emittable, metadata, initialStateVector };
}

/**
 * Check the post-pass invariants of classified metadata
 */
export function validateMetadata(metadata: MeasurementMetadata, requireOutput: boolean = true): void {
  const hasRepeated = metadata.repeatedMeasurements.length > 0;
  const hasMeasureQubit = metadata.measureQubits.length > 0;

  if (hasRepeated && hasMeasureQubit) {
    throw new ValidationError(
      'mixed-measurements',
      'Only one type of measurement operation allowed: PragmaRepeatedMeasurement or MeasureQubit'
    );
  }
  if (metadata.getStateVector && metadata.getDensityMatrix) {
    throw new ValidationError(
      'conflicting-state-pragmas',
      'PragmaGetStateVector and PragmaGetDensityMatrix cannot be used together'
    );
  }
  if (
    requireOutput &&
    !hasRepeated &&
    !hasMeasureQubit &&
    !metadata.getStateVector &&
    !metadata.getDensityMatrix
  ) {
    throw new ValidationError(
      'no-output',
      'The circuit does not contain measurement operations or state requests'
    );
  }
}
