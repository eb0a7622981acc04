/**
 * Simulator Backend
 *
 * Runs circuits on an external simulator that accepts OpenQASM 2.0: the
 * circuit is classified and validated, translated, handed to the
 * simulator, and the raw outcomes are decoded into output registers.
 */

import type { Circuit } from './circuit';
import { classify, type MeasurementMetadata } from './classifier';
import { flatten, type Complex } from './complex';
import { decode, type DecodeOptions } from './decoder';
import { SimulatorError } from './errors';
import { createLogger } from './logger';
import type { Operation } from './operations';
import { QasmBackend } from './qasm-backend';
import {
  collectDeclarations,
  emptyRegisters,
  registerLengths,
  type DecodedRegisters,
} from './registers';

const log = createLogger('simulator-backend');

export const DEFAULT_ALLOWED_SIMULATORS: readonly string[] = ['aer_simulator'];

/**
 * What the simulator is asked to run
 */
export interface SimulatorRequest {
  qasm: string;
  shots: number;
  /** Initial state set by `PragmaSetStateVector` */
  initialStateVector?: Complex[];
}

/**
 * Raw simulator output. Measured circuits return `memory` (one outcome per
 * shot) or `counts`.
 */
export interface SimulatorResult {
  memory?: string[];
  counts?: Record<string, number>;
  statevector?: Complex[];
  densityMatrix?: Complex[][];
}

/**
 * External simulator consuming QASM text
 */
export interface Simulator {
  readonly name: string;
  run(request: SimulatorRequest): Promise<SimulatorResult>;
}

/**
 * Circuits of one measurement, each run after the constant circuit
 */
export interface MeasurementCircuits {
  constantCircuit?: Circuit;
  circuits: readonly Circuit[];
}

/**
 * Options for the simulator backend
 */
export interface SimulatorBackendOptions {
  /**
   * Simulator names accepted by the backend
   * Default: ['aer_simulator']
   */
  allowedSimulators?: readonly string[];

  /**
   * Name of the qubit register
   * Default: 'q'
   */
  qubitRegisterName?: string;

  /**
   * Values for the symbolic variables of the circuits
   */
  substitutions?: Readonly<Record<string, number>>;

  /**
   * Decoder settings
   */
  decode?: DecodeOptions;
}

/**
 * Number of shots a classified circuit asks for
 */
export function shotCount(metadata: MeasurementMetadata): number {
  if (metadata.getStateVector || metadata.getDensityMatrix) {
    return 1;
  }
  const repeated = metadata.repeatedMeasurements.map((m) => m.numberMeasurements);
  if (repeated.length > 0) {
    return Math.max(...repeated);
  }
  const counted = metadata.numberOfMeasurements.map((m) => m.numberMeasurements);
  return counted.length > 0 ? Math.max(...counted) : 1;
}

/**
 * Backend running circuits on an injected simulator
 */
export class SimulatorBackend {
  readonly simulator: Simulator;
  private qasmBackend: QasmBackend;
  private decodeOptions: DecodeOptions;

  constructor(simulator: Simulator, options: SimulatorBackendOptions = {}) {
    const allowed = options.allowedSimulators ?? DEFAULT_ALLOWED_SIMULATORS;
    if (!allowed.includes(simulator.name)) {
      throw new SimulatorError(
        `Input a simulator from the following allowed list: ${allowed.join(', ')}`
      );
    }
    this.simulator = simulator;
    this.qasmBackend = new QasmBackend({
      qubitRegisterName: options.qubitRegisterName,
      substitutions: options.substitutions,
    });
    this.decodeOptions = { ...options.decode };
  }

  /**
   * Run a circuit and return its output registers.
   *
   * @throws ValidationError before running when the circuit is invalid
   * @throws SimulatorError when the simulator fails or returns too little
   */
  async runCircuit(circuit: Iterable<Operation>): Promise<DecodedRegisters> {
    const operations = [...circuit];
    const classified = classify(operations);
    const { metadata } = classified;
    const declarations = collectDeclarations(classified.circuit);
    const qasm = this.qasmBackend.circuitToQasmString(classified.circuit);
    const shots = shotCount(metadata);

    log('running %d shots on %s', shots, this.simulator.name);
    let result: SimulatorResult;
    try {
      result = await this.simulator.run({
        qasm,
        shots,
        initialStateVector: classified.initialStateVector,
      });
    } catch (error) {
      throw new SimulatorError(
        `Simulator ${this.simulator.name} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    const output = emptyRegisters();
    const measured =
      metadata.repeatedMeasurements.length > 0 || metadata.measureQubits.length > 0;
    const decoded = measured ? this.decodeResult(result, registerLengths(declarations)) : undefined;

    for (const declaration of declarations) {
      if (!declaration.isOutput) continue;
      switch (declaration.kind) {
        case 'bit':
          output.bit[declaration.name] = decoded?.bit[declaration.name] ?? [];
          break;
        case 'float':
          output.float[declaration.name] = [];
          break;
        case 'complex':
          output.complex[declaration.name] = [];
          break;
        case 'usize':
          break;
      }
    }

    if (metadata.getStateVector) {
      if (!result.statevector) {
        throw new SimulatorError('The simulator returned no state vector');
      }
      output.complex[metadata.stateVectorReadout ?? 'statevector'] = [result.statevector];
    }
    if (metadata.getDensityMatrix) {
      if (!result.densityMatrix) {
        throw new SimulatorError('The simulator returned no density matrix');
      }
      output.complex[metadata.densityMatrixReadout ?? 'density_matrix'] = [
        flatten(result.densityMatrix),
      ];
    }

    return output;
  }

  /**
   * Run every circuit of a measurement and merge the output registers.
   * Later circuits overwrite registers of the same name.
   */
  async runMeasurementRegisters(measurement: MeasurementCircuits): Promise<DecodedRegisters> {
    const output = emptyRegisters();

    for (const circuit of measurement.circuits) {
      const runCircuit = measurement.constantCircuit
        ? measurement.constantCircuit.concat(circuit)
        : circuit;
      const registers = await this.runCircuit(runCircuit);
      Object.assign(output.bit, registers.bit);
      Object.assign(output.float, registers.float);
      Object.assign(output.complex, registers.complex);
    }

    return output;
  }

  private decodeResult(
    result: SimulatorResult,
    lengths: ReadonlyMap<string, number>
  ): DecodedRegisters {
    if (result.memory) {
      return decode({ mode: 'shots', outcomes: result.memory }, lengths, this.decodeOptions);
    }
    if (result.counts) {
      return decode({ mode: 'counts', counts: result.counts }, lengths, this.decodeOptions);
    }
    throw new SimulatorError('The simulator returned neither memory nor counts');
  }
}
