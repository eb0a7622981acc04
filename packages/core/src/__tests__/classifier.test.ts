/**
 * Tests for circuit classification and validation
 */

import { describe, it, expect } from 'vitest';
import { Circuit } from '../circuit';
import { classify } from '../classifier';
import { complex } from '../complex';
import { ValidationError, type ValidationFailure } from '../errors';
import type { Operation } from '../operations';

function failureOf(circuit: Circuit): ValidationFailure | undefined {
  try {
    classify(circuit);
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.reason;
    }
    throw error;
  }
  return undefined;
}

describe('classify', () => {
  it('keeps repeated measurements and records them', () => {
    const circuit = new Circuit('bell')
      .defineBit('ro', 2)
      .hadamard(0)
      .cnot(0, 1)
      .repeatedMeasurement('ro', 10);
    const { circuit: emittable, metadata } = classify(circuit);

    expect(emittable.name).toBe('bell');
    expect(emittable.operations).toEqual(circuit.operations);
    expect(metadata.repeatedMeasurements).toEqual([{ readout: 'ro', numberMeasurements: 10 }]);
    expect(metadata.measureQubits).toEqual([]);
  });

  it('drops shot-count pragmas and keeps measured qubits', () => {
    const circuit = new Circuit()
      .defineBit('ro', 1)
      .pauliX(0)
      .measureQubit(0, 'ro', 0)
      .setNumberOfMeasurements('ro', 20);
    const { circuit: emittable, metadata } = classify(circuit);

    expect(emittable.operations.map((op) => op.type)).toEqual([
      'DefinitionBit',
      'PauliX',
      'MeasureQubit',
    ]);
    expect(metadata.measureQubits).toEqual([{ qubit: 0, readout: 'ro', readoutIndex: 0 }]);
    expect(metadata.numberOfMeasurements).toEqual([{ readout: 'ro', numberMeasurements: 20 }]);
  });

  it('captures state requests and the initial state', () => {
    const circuit = new Circuit()
      .defineComplex('sv', 2)
      .setStateVector([complex(0, 0), complex(1, 0)])
      .hadamard(0)
      .getStateVector('sv');
    const classified = classify(circuit);

    expect(classified.circuit.operations.map((op) => op.type)).toEqual([
      'DefinitionComplex',
      'Hadamard',
    ]);
    expect(classified.metadata.getStateVector).toBe(true);
    expect(classified.metadata.stateVectorReadout).toBe('sv');
    expect(classified.initialStateVector).toEqual([
      { real: 0, imag: 0 },
      { real: 1, imag: 0 },
    ]);
  });

  it('records symbolic inputs and keeps them in order', () => {
    const circuit = new Circuit()
      .inputSymbolic('theta', 0.5)
      .rotateX(0, 'theta')
      .getDensityMatrix('dm');
    const { circuit: emittable, metadata } = classify(circuit);

    expect(metadata.symbolicInputs).toEqual({ theta: 0.5 });
    expect(metadata.getDensityMatrix).toBe(true);
    expect(metadata.densityMatrixReadout).toBe('dm');
    expect(emittable.operations.map((op) => op.type)).toEqual(['InputSymbolic', 'RotateX']);
  });

  it('accepts plain iterables', () => {
    const operations: Operation[] = [
      { type: 'Hadamard', qubit: 0 },
      { type: 'PragmaGetStateVector', readout: 'sv' },
    ];
    const { circuit } = classify(operations);
    expect(circuit.name).toBeUndefined();
    expect(circuit.length).toBe(1);
  });
});

describe('Validation', () => {
  it('rejects mixed measurement kinds', () => {
    const circuit = new Circuit()
      .defineBit('ro', 2)
      .measureQubit(0, 'ro', 0)
      .repeatedMeasurement('ro', 10);
    expect(failureOf(circuit)).toBe('mixed-measurements');
    expect(() => classify(circuit)).toThrow(
      'Only one type of measurement operation allowed: PragmaRepeatedMeasurement or MeasureQubit'
    );
  });

  it('rejects state vector and density matrix together', () => {
    const circuit = new Circuit().hadamard(0).getStateVector('sv').getDensityMatrix('dm');
    expect(failureOf(circuit)).toBe('conflicting-state-pragmas');
  });

  it('rejects circuits without output', () => {
    const circuit = new Circuit().hadamard(0);
    expect(failureOf(circuit)).toBe('no-output');
    expect(() => classify(circuit)).toThrow(
      'The circuit does not contain measurement operations or state requests'
    );
  });

  it('accepts circuits without output when output is optional', () => {
    const { circuit } = classify(new Circuit().hadamard(0), { requireOutput: false });
    expect(circuit.length).toBe(1);
  });

  it('still rejects mixed measurements when output is optional', () => {
    const circuit = new Circuit().measureQubit(0, 'ro', 0).repeatedMeasurement('ro', 1);
    expect(() => classify(circuit, { requireOutput: false })).toThrow(ValidationError);
  });
});
