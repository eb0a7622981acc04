/**
 * QASM Parser
 *
 * Reads OpenQASM 2.0 text back into a circuit. Gate statements are matched
 * against the translation table in reverse, so everything the translator
 * emits for table gates, `u3`, `measure` and `creg` parses again.
 *
 * Parameters are evaluated with `pi` and the calculator's functions.
 * Expressions with free variables (and placeholder tokens) are kept as
 * symbolic strings.
 */

import { readFile } from 'node:fs/promises';
import { Calculator } from './calculator';
import { Circuit } from './circuit';
import { QasmParseError, SymbolicParameterError } from './errors';
import { GATE_TABLE, type GateRule } from './gates';
import { createLogger } from './logger';
import type { CalculatorFloat, TableGate, TableGateType } from './operations';

const log = createLogger('parser');

/**
 * Result of parsing a QASM program
 */
export interface ParsedQasm {
  circuit: Circuit;
  /** Total size of all declared qubit registers */
  numberQubits: number;
}

interface Statement {
  text: string;
  line: number;
}

interface QubitRegister {
  offset: number;
  size: number;
}

const IDENTIFIER = '[A-Za-z_][A-Za-z0-9_]*';
const VERSION = /^OPENQASM\s+(\S+)$/;
const INCLUDE = /^include\s+"[^"]*"$/;
const DECLARATION = new RegExp(`^(qreg|creg)\\s+(${IDENTIFIER})\\s*\\[\\s*(\\d+)\\s*\\]$`);
const MEASURE = /^measure\s+(.+?)\s*->\s*(.+)$/;
const GATE = new RegExp(`^(${IDENTIFIER})\\s*(?:\\((.*)\\))?\\s+([^()]+)$`);
const INDEXED = new RegExp(`^(${IDENTIFIER})\\s*\\[\\s*(\\d+)\\s*\\]$`);
const BARE = new RegExp(`^${IDENTIFIER}$`);

// ============================================================================
// Reverse Table
// ============================================================================

function isTableGateType(key: string): key is TableGateType {
  return Object.hasOwn(GATE_TABLE, key);
}

const RULES_BY_MNEMONIC = new Map<string, [TableGateType, GateRule][]>();
for (const key of Object.keys(GATE_TABLE)) {
  if (!isTableGateType(key)) continue;
  const rule: GateRule = GATE_TABLE[key];
  const rules = RULES_BY_MNEMONIC.get(rule.mnemonic) ?? [];
  // Rules with literal arguments are tried first
  if (rule.constants) {
    rules.unshift([key, rule]);
  } else {
    rules.push([key, rule]);
  }
  RULES_BY_MNEMONIC.set(rule.mnemonic, rules);
}

function matchRule(
  mnemonic: string,
  parameters: readonly string[],
  qubitCount: number
): [TableGateType, GateRule] | undefined {
  return RULES_BY_MNEMONIC.get(mnemonic)?.find(([, rule]) => {
    const constants = rule.constants ?? [];
    if (rule.qubits.length !== qubitCount) return false;
    if (parameters.length !== rule.parameters.length + constants.length) return false;
    const literals = parameters.slice(rule.parameters.length).map((p) => p.replace(/\s+/g, ''));
    return constants.every((constant, i) => literals[i] === constant);
  });
}

function buildGate(
  type: TableGateType,
  qubits: readonly number[],
  parameters: readonly CalculatorFloat[]
): TableGate {
  switch (type) {
    case 'RotateX':
    case 'RotateY':
    case 'RotateZ':
      return { type, qubit: qubits[0], theta: parameters[0] };
    case 'CNOT':
    case 'ControlledPauliY':
    case 'ControlledPauliZ':
    case 'MolmerSorensenXX':
      return { type, control: qubits[0], target: qubits[1] };
    default:
      return { type, qubit: qubits[0] };
  }
}

// ============================================================================
// Statements
// ============================================================================

// Split on commas outside parentheses
function splitArguments(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';
  for (const ch of text) {
    if (ch === ',' && depth === 0) {
      parts.push(current.trim());
      current = '';
      continue;
    }
    if (ch === '(') depth++;
    if (ch === ')') depth--;
    current += ch;
  }
  parts.push(current.trim());
  return parts;
}

function countNewlines(text: string): number {
  return text.split('\n').length - 1;
}

function* splitStatements(source: string): Generator<Statement> {
  const stripped = source
    .split('\n')
    .map((line) => line.replace(/\/\/.*$/, ''))
    .join('\n');
  const parts = stripped.split(';');

  let line = 1;
  for (const [i, part] of parts.entries()) {
    const leading = part.length - part.trimStart().length;
    const start = line + countNewlines(part.slice(0, leading));
    line += countNewlines(part);
    const text = part.trim().replace(/\s+/g, ' ');
    if (!text) continue;
    if (i === parts.length - 1) {
      throw new QasmParseError(start, `missing ";" after "${text}"`);
    }
    yield { text, line: start };
  }
}

// ============================================================================
// Parser
// ============================================================================

class QasmParser {
  private circuit = new Circuit();
  private calculator = new Calculator();
  private qubitRegisters = new Map<string, QubitRegister>();
  private bitRegisters = new Map<string, number>();
  private numberQubits = 0;
  private sawVersion = false;

  parse(source: string): ParsedQasm {
    for (const statement of splitStatements(source)) {
      this.statement(statement);
    }
    if (!this.sawVersion) {
      throw new QasmParseError(1, 'missing "OPENQASM 2.0" header');
    }
    log('parsed %d operations on %d qubits', this.circuit.length, this.numberQubits);
    return { circuit: this.circuit, numberQubits: this.numberQubits };
  }

  private statement({ text, line }: Statement): void {
    const version = VERSION.exec(text);
    if (version) {
      if (this.sawVersion) {
        throw new QasmParseError(line, 'duplicate version header');
      }
      if (version[1] !== '2.0') {
        throw new QasmParseError(line, `unsupported OpenQASM version ${version[1]}`);
      }
      this.sawVersion = true;
      return;
    }
    if (!this.sawVersion) {
      throw new QasmParseError(line, 'missing "OPENQASM 2.0" header');
    }
    if (INCLUDE.test(text) || text === 'barrier' || text.startsWith('barrier ')) {
      return;
    }

    const declaration = DECLARATION.exec(text);
    if (declaration) {
      this.declare(declaration[1], declaration[2], Number(declaration[3]), line);
      return;
    }

    const measure = MEASURE.exec(text);
    if (measure) {
      this.measure(measure[1], measure[2], line);
      return;
    }

    const gate = GATE.exec(text);
    if (gate) {
      if (gate[1] === 'gate' || gate[1] === 'opaque') {
        throw new QasmParseError(line, 'custom gate definitions are not supported');
      }
      const parameters = gate[2] === undefined ? [] : splitArguments(gate[2]);
      const qubits = gate[3].split(',').map((q) => this.qubit(q.trim(), line));
      this.gate(gate[1], parameters, qubits, line);
      return;
    }

    throw new QasmParseError(line, `cannot parse "${text}"`);
  }

  private declare(kind: string, name: string, size: number, line: number): void {
    if (this.qubitRegisters.has(name) || this.bitRegisters.has(name)) {
      throw new QasmParseError(line, `register ${name} is declared twice`);
    }
    if (size < 1) {
      throw new QasmParseError(line, `register ${name} must have a positive size`);
    }
    if (kind === 'qreg') {
      this.qubitRegisters.set(name, { offset: this.numberQubits, size });
      this.numberQubits += size;
    } else {
      this.bitRegisters.set(name, size);
      this.circuit.defineBit(name, size);
    }
  }

  private qubit(argument: string, line: number): number {
    const indexed = INDEXED.exec(argument);
    if (!indexed) {
      throw new QasmParseError(line, `expected an indexed qubit, got "${argument}"`);
    }
    const register = this.qubitRegisters.get(indexed[1]);
    if (!register) {
      throw new QasmParseError(line, `unknown qubit register ${indexed[1]}`);
    }
    const index = Number(indexed[2]);
    if (index >= register.size) {
      throw new QasmParseError(line, `qubit ${argument} is outside ${indexed[1]}[${register.size}]`);
    }
    return register.offset + index;
  }

  private bit(argument: string, line: number): [string, number] {
    const indexed = INDEXED.exec(argument);
    if (!indexed) {
      throw new QasmParseError(line, `expected an indexed bit, got "${argument}"`);
    }
    const size = this.bitRegisters.get(indexed[1]);
    if (size === undefined) {
      throw new QasmParseError(line, `unknown classical register ${indexed[1]}`);
    }
    const index = Number(indexed[2]);
    if (index >= size) {
      throw new QasmParseError(line, `bit ${argument} is outside ${indexed[1]}[${size}]`);
    }
    return [indexed[1], index];
  }

  private measure(source: string, target: string, line: number): void {
    if (BARE.test(source) && BARE.test(target)) {
      if (!this.qubitRegisters.has(source)) {
        throw new QasmParseError(line, `unknown qubit register ${source}`);
      }
      if (!this.bitRegisters.has(target)) {
        throw new QasmParseError(line, `unknown classical register ${target}`);
      }
      this.circuit.repeatedMeasurement(target, 1);
      return;
    }
    const qubit = this.qubit(source, line);
    const [readout, readoutIndex] = this.bit(target, line);
    this.circuit.measureQubit(qubit, readout, readoutIndex);
  }

  private gate(mnemonic: string, parameters: string[], qubits: number[], line: number): void {
    if (mnemonic === 'u3') {
      if (parameters.length !== 3 || qubits.length !== 1) {
        throw new QasmParseError(line, 'u3 takes three parameters and one qubit');
      }
      const [theta, phi, lambda] = parameters.map((p) => this.numeric(p, line));
      this.u3(qubits[0], theta, phi, lambda);
      return;
    }

    if (new Set(qubits).size !== qubits.length) {
      throw new QasmParseError(line, `${mnemonic} acts on the same qubit twice`);
    }
    const match = matchRule(mnemonic, parameters, qubits.length);
    if (!match) {
      throw new QasmParseError(
        line,
        `unknown gate ${mnemonic} with ${parameters.length} parameters on ${qubits.length} qubits`
      );
    }
    const [type, rule] = match;
    const values = parameters.slice(0, rule.parameters.length).map((p) => this.parameter(p, line));
    this.circuit.add(buildGate(type, qubits, values));
  }

  // First column of U3(theta, phi, lambda) up to a global phase
  private u3(qubit: number, theta: number, phi: number, lambda: number): void {
    const sum = (phi + lambda) / 2;
    const difference = (phi - lambda) / 2;
    const cos = Math.cos(theta / 2);
    const sin = Math.sin(theta / 2);
    this.circuit.singleQubitGate(
      qubit,
      Math.cos(sum) * cos,
      0 - Math.sin(sum) * cos,
      Math.cos(difference) * sin,
      Math.sin(difference) * sin
    );
  }

  private parameter(text: string, line: number): CalculatorFloat {
    try {
      return this.calculator.parseGet(text);
    } catch (error) {
      if (error instanceof SymbolicParameterError && /[A-Za-z_]/.test(text)) {
        return text;
      }
      throw new QasmParseError(line, `invalid parameter "${text}"`);
    }
  }

  private numeric(text: string, line: number): number {
    const value = this.parameter(text, line);
    if (typeof value !== 'number') {
      throw new QasmParseError(line, `parameter "${text}" must be numeric`);
    }
    return value;
  }
}

/**
 * Parse QASM text into a circuit together with its qubit count
 *
 * @throws QasmParseError on the first statement that cannot be read
 */
export function parseQasm(source: string): ParsedQasm {
  return new QasmParser().parse(source);
}

/**
 * Parse QASM text into a circuit
 */
export function stringToCircuit(source: string): Circuit {
  return parseQasm(source).circuit;
}

/**
 * Read a `.qasm` file into a circuit
 */
export async function fileToCircuit(path: string): Promise<Circuit> {
  const source = await readFile(path, 'utf8');
  log('read %s', path);
  return stringToCircuit(source);
}
