/**
 * Tests for per-operation QASM translation
 */

import { describe, it, expect } from 'vitest';
import { Calculator } from '../calculator';
import { QubitNameResolutionError, SymbolicParameterError, UnsupportedOperationError } from '../errors';
import {
  GATE_TABLE,
  formatFloat,
  renderInstruction,
  translateOperation,
  translateSingleQubitGate,
} from '../gates';
import type { Operation } from '../operations';

describe('formatFloat', () => {
  it('always renders a decimal point', () => {
    expect(formatFloat(0)).toBe('0.0');
    expect(formatFloat(1)).toBe('1.0');
    expect(formatFloat(-2)).toBe('-2.0');
  });

  it('keeps the sign of negative zero', () => {
    expect(formatFloat(-0)).toBe('-0.0');
  });

  it('renders full double precision', () => {
    expect(formatFloat(0.1)).toBe('0.1');
    expect(formatFloat(Math.PI / 2)).toBe('1.5707963267948966');
  });

  it('leaves exponents and non-finite values alone', () => {
    expect(formatFloat(1e21)).toBe('1e+21');
    expect(formatFloat(Number.NaN)).toBe('NaN');
  });
});

describe('renderInstruction', () => {
  it('omits an empty parameter group', () => {
    expect(renderInstruction('h', [], ['q[0]'])).toBe('h q[0]');
    expect(renderInstruction('u3', ['a', 'b'], ['q[0]'])).toBe('u3(a,b) q[0]');
  });
});

describe('Table Gates', () => {
  it('maps operation types to mnemonics', () => {
    expect(GATE_TABLE.CNOT.mnemonic).toBe('cx');
    expect(GATE_TABLE.SqrtPauliX.constants).toEqual(['pi/2']);
  });

  it('translates rotations', () => {
    expect(translateOperation({ type: 'RotateX', qubit: 0, theta: 0.1 })).toEqual(['rx(0.1) q[0]']);
    expect(translateOperation({ type: 'RotateY', qubit: 1, theta: -0.5 })).toEqual([
      'ry(-0.5) q[1]',
    ]);
    expect(translateOperation({ type: 'RotateZ', qubit: 0, theta: 1 })).toEqual(['rz(1.0) q[0]']);
  });

  it('translates fixed single-qubit gates', () => {
    expect(translateOperation({ type: 'Hadamard', qubit: 2 })).toEqual(['h q[2]']);
    expect(translateOperation({ type: 'PauliX', qubit: 0 })).toEqual(['x q[0]']);
    expect(translateOperation({ type: 'PauliY', qubit: 0 })).toEqual(['y q[0]']);
    expect(translateOperation({ type: 'PauliZ', qubit: 0 })).toEqual(['z q[0]']);
    expect(translateOperation({ type: 'SGate', qubit: 0 })).toEqual(['s q[0]']);
    expect(translateOperation({ type: 'TGate', qubit: 0 })).toEqual(['t q[0]']);
    expect(translateOperation({ type: 'SqrtPauliX', qubit: 0 })).toEqual(['rx(pi/2) q[0]']);
  });

  it('translates two-qubit gates with control first', () => {
    expect(translateOperation({ type: 'CNOT', control: 0, target: 1 })).toEqual(['cx q[0],q[1]']);
    expect(translateOperation({ type: 'ControlledPauliY', control: 1, target: 0 })).toEqual([
      'cy q[1],q[0]',
    ]);
    expect(translateOperation({ type: 'ControlledPauliZ', control: 0, target: 2 })).toEqual([
      'cz q[0],q[2]',
    ]);
    expect(translateOperation({ type: 'MolmerSorensenXX', control: 0, target: 1 })).toEqual([
      'rxx(pi/2) q[0],q[1]',
    ]);
  });

  it('uses a custom register name', () => {
    expect(translateOperation({ type: 'Hadamard', qubit: 0 }, { qubitRegisterName: 'qr' })).toEqual([
      'h qr[0]',
    ]);
  });

  it('uses custom qubit names', () => {
    const qubitNames = new Map([
      [0, 'alice'],
      [1, 'bob'],
    ]);
    expect(translateOperation({ type: 'CNOT', control: 0, target: 1 }, { qubitNames })).toEqual([
      'cx alice,bob',
    ]);
    expect(() =>
      translateOperation({ type: 'CNOT', control: 0, target: 2 }, { qubitNames })
    ).toThrow(QubitNameResolutionError);
  });
});

describe('Symbolic Parameters', () => {
  it('accepts numeric strings without a calculator', () => {
    expect(translateOperation({ type: 'RotateX', qubit: 0, theta: '0.5' })).toEqual([
      'rx(0.5) q[0]',
    ]);
  });

  it('fails on expressions without a calculator', () => {
    const op: Operation = { type: 'RotateX', qubit: 0, theta: 'theta' };
    expect(() => translateOperation(op)).toThrow(SymbolicParameterError);
    expect(() => translateOperation(op)).toThrow(
      'Cannot evaluate "theta": no calculator supplied to resolve it'
    );
  });

  it('evaluates expressions through the resolver', () => {
    const calculator = new Calculator({ theta: 0.5 });
    expect(
      translateOperation(
        { type: 'RotateZ', qubit: 0, theta: 'theta*2' },
        { resolver: (value) => calculator.parseGet(value) }
      )
    ).toEqual(['rz(1.0) q[0]']);
  });
});

describe('Generic Single-Qubit Gate', () => {
  it('translates the identity to zero angles', () => {
    expect(
      translateSingleQubitGate({
        type: 'SingleQubitGate',
        qubit: 0,
        alphaR: 1,
        alphaI: 0,
        betaR: 0,
        betaI: 0,
        globalPhase: 0,
      })
    ).toBe('u3(0.0,0.0,0.0) q[0]');
  });

  it('translates a bit flip', () => {
    expect(
      translateOperation({
        type: 'SingleQubitGate',
        qubit: 1,
        alphaR: 0,
        alphaI: 0,
        betaR: 1,
        betaI: 0,
        globalPhase: 0,
      })
    ).toEqual(['u3(3.141592653589793,0.0,0.0) q[1]']);
  });
});

describe('Measurements and Definitions', () => {
  it('translates single-qubit measurements', () => {
    expect(
      translateOperation({ type: 'MeasureQubit', qubit: 0, readout: 'ro', readoutIndex: 1 })
    ).toEqual(['measure q[0] -> ro[1]']);
  });

  it('translates repeated measurements of the whole register', () => {
    const op: Operation = { type: 'PragmaRepeatedMeasurement', readout: 'ro', numberMeasurements: 10 };
    expect(translateOperation(op)).toEqual(['measure q -> ro']);
    expect(translateOperation(op, { qubitRegisterName: 'qr' })).toEqual(['measure qr -> ro']);
  });

  it('measures custom-named qubits one by one', () => {
    const op: Operation = { type: 'PragmaRepeatedMeasurement', readout: 'ro', numberMeasurements: 10 };
    const qubitNames = new Map([
      [1, 'b'],
      [0, 'a'],
    ]);
    expect(translateOperation(op, { qubitNames })).toEqual([
      'measure a -> ro[0]',
      'measure b -> ro[1]',
    ]);
  });

  it('translates mapped repeated measurements in qubit order', () => {
    expect(
      translateOperation({
        type: 'PragmaRepeatedMeasurement',
        readout: 'ro',
        numberMeasurements: 10,
        qubitMapping: { 2: 0, 0: 1 },
      })
    ).toEqual(['measure q[0] -> ro[1]', 'measure q[2] -> ro[0]']);
  });

  it('declares every register kind as creg', () => {
    expect(
      translateOperation({ type: 'DefinitionBit', name: 'ro', length: 2, isOutput: true })
    ).toEqual(['creg ro[2]']);
    expect(
      translateOperation({ type: 'DefinitionFloat', name: 'f', length: 3, isOutput: true })
    ).toEqual(['creg f[3]']);
  });

  it('emits nothing for symbolic inputs', () => {
    expect(translateOperation({ type: 'InputSymbolic', name: 'theta', input: 1 })).toEqual([]);
  });
});

describe('Unsupported Operations', () => {
  it('rejects metadata-only pragmas', () => {
    expect(() => translateOperation({ type: 'PragmaGetStateVector', readout: 'sv' })).toThrow(
      'Operation PragmaGetStateVector not in QASM backend: metadata-only pragma'
    );
  });

  it('rejects opaque operations by name', () => {
    const op: Operation = { type: 'Opaque', name: 'Toffoli', qubits: [0, 1, 2] };
    expect(() => translateOperation(op)).toThrow(UnsupportedOperationError);
    expect(() => translateOperation(op)).toThrow('Operation Toffoli not in QASM backend');
  });
});
