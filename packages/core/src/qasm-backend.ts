/**
 * QASM Backend
 *
 * Produces OpenQASM 2.0 text from a circuit, as a string or as a `.qasm`
 * file that any QASM-capable platform can import.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Calculator } from './calculator';
import { classify } from './classifier';
import { FileExistsError } from './errors';
import { callCircuit, composeQasm, type CircuitTranslation } from './interface';
import { createLogger } from './logger';
import type { QubitNameMap } from './naming';
import type { Operation } from './operations';
import type { SymbolicCache } from './symbolic-cache';

const log = createLogger('qasm-backend');

/**
 * Options for the QASM backend
 */
export interface QasmBackendOptions {
  /**
   * Name of the qubit register
   * Default: 'q'
   */
  qubitRegisterName?: string;

  /**
   * Size of the qubit register
   * Default: one more than the highest qubit index used (at least 1)
   */
  numberQubits?: number;

  /**
   * Custom qubit identifiers, used verbatim in instructions
   * Default: `<qubitRegisterName>[<index>]`
   */
  qubitNames?: QubitNameMap;

  /**
   * Values for the symbolic variables of the circuit
   */
  substitutions?: Readonly<Record<string, number>>;
}

export interface QasmRunOptions {
  /**
   * Emit placeholder tokens for symbolic rotation angles
   * Default: false
   */
  symbolic?: boolean;
}

/**
 * Program produced for one circuit
 */
export interface QasmProgram {
  qasm: string;
  numberQubits: number;
  translation: CircuitTranslation;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Backend turning circuits into OpenQASM 2.0
 *
 * @example
 * ```typescript
 * const backend = new QasmBackend();
 * const qasm = backend.circuitToQasmString(
 *   new Circuit().defineBit('ro', 2).hadamard(0).cnot(0, 1).repeatedMeasurement('ro', 10)
 * );
 * ```
 */
export class QasmBackend {
  readonly name = 'qasm';
  private options: QasmBackendOptions;
  private _symbolicCache?: SymbolicCache;

  constructor(options: QasmBackendOptions = {}) {
    this.options = { ...options };
  }

  /**
   * Name of the qubit register
   */
  get qubitRegisterName(): string {
    return this.options.qubitRegisterName ?? 'q';
  }

  /**
   * Placeholder cache of the last symbolic translation
   */
  get symbolicCache(): SymbolicCache | undefined {
    return this._symbolicCache;
  }

  /**
   * Translate a circuit into a complete program.
   *
   * Metadata-only pragmas are removed first; a circuit without measurements
   * is still translated.
   */
  translate(circuit: Iterable<Operation>, runOptions: QasmRunOptions = {}): QasmProgram {
    const { circuit: emittable, metadata } = classify(circuit, { requireOutput: false });

    const calculator = new Calculator(metadata.symbolicInputs);
    for (const [name, value] of Object.entries(this.options.substitutions ?? {})) {
      calculator.set(name, value);
    }

    const translation = callCircuit(emittable, {
      qubitNames: this.options.qubitNames,
      qubitRegisterName: this.qubitRegisterName,
      resolver: (value) => calculator.parseGet(value),
      symbolic: runOptions.symbolic,
    });
    if (translation.symbolicCache) {
      this._symbolicCache = translation.symbolicCache;
    }

    const numberQubits =
      this.options.numberQubits ?? Math.max(1, emittable.numberOfQubits());
    const qasm = composeQasm(translation, {
      qubitRegisterName: this.qubitRegisterName,
      numberQubits,
    });
    return { qasm, numberQubits, translation };
  }

  /**
   * Translate a circuit into program lines, without line breaks
   */
  circuitToQasmLines(circuit: Iterable<Operation>, runOptions?: QasmRunOptions): string[] {
    return this.translate(circuit, runOptions).qasm.trimEnd().split('\n');
  }

  /**
   * Translate a circuit into QASM text
   */
  circuitToQasmString(circuit: Iterable<Operation>, runOptions?: QasmRunOptions): string {
    return this.translate(circuit, runOptions).qasm;
  }

  /**
   * Translate a circuit and write it to `<folderName>/<filename>.qasm`.
   *
   * @returns the path written
   * @throws FileExistsError if the file exists and `overwrite` is false
   */
  async circuitToQasmFile(
    circuit: Iterable<Operation>,
    folderName: string,
    filename: string,
    overwrite: boolean = false,
    runOptions?: QasmRunOptions
  ): Promise<string> {
    const qasm = this.circuitToQasmString(circuit, runOptions);
    const path = join(folderName, `${filename}.qasm`);

    await mkdir(folderName, { recursive: true });
    try {
      await writeFile(path, qasm, { encoding: 'utf8', flag: overwrite ? 'w' : 'wx' });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        throw new FileExistsError(path);
      }
      throw error;
    }

    log('wrote %s', path);
    return path;
  }
}
