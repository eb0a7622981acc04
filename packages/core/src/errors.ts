/**
 * Error types raised by the translator, classifier and decoder.
 *
 * Every failure the core detects is surfaced as one of these named
 * conditions. None of them is retried internally.
 */

/**
 * Base class for all qasm-bridge errors
 */
export class QasmBridgeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'QasmBridgeError';
  }
}

/**
 * An operation with no translation rule reached the translator
 */
export class UnsupportedOperationError extends QasmBridgeError {
  readonly operation: string;

  constructor(operation: string, detail?: string) {
    super(
      detail
        ? `Operation ${operation} not in QASM backend: ${detail}`
        : `Operation ${operation} not in QASM backend`
    );
    this.name = 'UnsupportedOperationError';
    this.operation = operation;
  }
}

/**
 * A qubit index is missing from a supplied qubit name map
 */
export class QubitNameResolutionError extends QasmBridgeError {
  readonly qubit: number;

  constructor(qubit: number) {
    super(`Qubit ${qubit} is not in the supplied qubit name map`);
    this.name = 'QubitNameResolutionError';
    this.qubit = qubit;
  }
}

/**
 * Reasons a classified circuit can be rejected
 */
export type ValidationFailure =
  | 'mixed-measurements'
  | 'conflicting-state-pragmas'
  | 'no-output';

/**
 * A circuit violates a classifier invariant
 */
export class ValidationError extends QasmBridgeError {
  readonly reason: ValidationFailure;

  constructor(reason: ValidationFailure, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.reason = reason;
  }
}

/**
 * A raw outcome does not match the declared register lengths
 */
export class DecodeShapeMismatchError extends QasmBridgeError {
  readonly outcome: string;
  readonly expectedLength: number;
  readonly actualLength: number;

  constructor(outcome: string, expectedLength: number, actualLength: number) {
    super(
      `Outcome "${outcome}" has ${actualLength} bits but the registers declare ${expectedLength}`
    );
    this.name = 'DecodeShapeMismatchError';
    this.outcome = outcome;
    this.expectedLength = expectedLength;
    this.actualLength = actualLength;
  }
}

/**
 * A symbolic parameter could not be parsed or evaluated
 */
export class SymbolicParameterError extends QasmBridgeError {
  readonly expression: string;

  constructor(expression: string, detail: string) {
    super(`Cannot evaluate "${expression}": ${detail}`);
    this.name = 'SymbolicParameterError';
    this.expression = expression;
  }
}

/**
 * QASM source text that cannot be read back into a circuit
 */
export class QasmParseError extends QasmBridgeError {
  readonly line: number;

  constructor(line: number, detail: string) {
    super(`Line ${line}: ${detail}`);
    this.name = 'QasmParseError';
    this.line = line;
  }
}

/**
 * Output file already exists and overwriting was not requested
 */
export class FileExistsError extends QasmBridgeError {
  readonly path: string;

  constructor(path: string) {
    super(`File ${path} already exists, aborting. Use overwrite to replace it`);
    this.name = 'FileExistsError';
    this.path = path;
  }
}

/**
 * The injected simulator was rejected or failed to run
 */
export class SimulatorError extends QasmBridgeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SimulatorError';
  }
}
