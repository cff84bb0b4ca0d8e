// WASM Code Generator using Binaryen
// Generates circuit-specific WASM with every truth table baked in

import binaryen from 'binaryen';
import type { Circuit } from '../circuit/circuit.js';
import type { Gate } from '../circuit/gate.js';
import { ArityMismatchError } from '../circuit/errors.js';
import type { Bit, SignatureInput, SignatureValue } from '../types/circuit.js';

export interface CompiledCircuit {
  wasmModule: WebAssembly.Module;
  memory: WebAssembly.Memory;
  wireCount: number;
  evaluate: (input: SignatureInput) => SignatureValue;
}

export interface CompileOptions {
  // Run Binaryen's optimizer over the generated module
  optimize: boolean;

  // Log gate counts and binary size
  verbose: boolean;
}

const DEFAULT_OPTIONS: CompileOptions = {
  optimize: true,
  verbose: false,
};

// A truth table of 2^5 entries is the largest that fits one i32 constant
export const MAX_COMPILED_ARITY = 5;

const WIRE_BYTES = 4;
const PAGE_BYTES = 65536;

/**
 * Compile a circuit's current gate order to WASM.
 *
 * The generated module:
 * - Keeps one i32 wire per gate in linear memory, at 4 * position
 * - Evaluates computed gates in position order
 * - Looks up each result in the gate's truth table, held as a constant
 *
 * The result is a snapshot: later changes to the circuit, including a new
 * signature, are not reflected.
 */
export function compileToWasm(
  circuit: Circuit,
  options: Partial<CompileOptions> = {}
): CompiledCircuit {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const gates = [...circuit.gates];

  for (const g of gates) {
    if (g.isComputed() && g.operation.arity() > MAX_COMPILED_ARITY) {
      throw new ArityMismatchError(
        `Gate at position ${g.position} arity exceeds compiled limit`,
        MAX_COMPILED_ARITY,
        g.operation.arity()
      );
    }
  }

  const mod = new binaryen.Module();

  // Import memory (shared with JS)
  mod.addMemoryImport('0', 'env', 'memory');

  generateEvaluateFunction(mod, gates);

  if (opts.optimize) {
    mod.optimize();
  }

  if (!mod.validate()) {
    mod.dispose();
    throw new Error('Generated WASM module is invalid');
  }

  const binary = mod.emitBinary();
  mod.dispose();

  const pages = Math.max(1, Math.ceil((gates.length * WIRE_BYTES) / PAGE_BYTES));
  const memory = new WebAssembly.Memory({ initial: pages, maximum: pages * 2 });
  const wasmModule = new WebAssembly.Module(new Uint8Array(binary));
  const wasmInstance = new WebAssembly.Instance(wasmModule, {
    env: { memory },
  });

  const run = wasmInstance.exports.evaluate;
  if (typeof run !== 'function') {
    throw new Error('Generated WASM module does not export evaluate');
  }

  const view = new Int32Array(memory.buffer);
  const inputPositions = gates.filter((g) => !g.isComputed()).map((g) => g.position);
  const outputPositions = gates
    .filter((g) => g.isOutput && g.outputs.length === 0)
    .map((g) => g.position);
  const signature = circuit.signature;

  if (opts.verbose) {
    console.log(
      `Compiled ${gates.length} gates (${inputPositions.length} inputs, ` +
        `${outputPositions.length} outputs) to ${binary.length} bytes`
    );
  }

  return {
    wasmModule,
    memory,
    wireCount: gates.length,
    evaluate: (input: SignatureInput): SignatureValue => {
      const bits = signature.input(input);
      if (bits.length !== inputPositions.length) {
        throw new ArityMismatchError('Input bit count', inputPositions.length, bits.length);
      }

      inputPositions.forEach((position, i) => {
        view[position] = bits[i];
      });
      run();

      const output: Bit[] = outputPositions.map((position) => (view[position] === 1 ? 1 : 0));
      return signature.output(output);
    },
  };
}

function generateEvaluateFunction(mod: binaryen.Module, gates: Gate[]): void {
  const body: binaryen.ExpressionRef[] = [];

  for (const g of gates) {
    if (!g.isComputed()) continue;
    body.push(
      mod.i32.store(0, 4, mod.i32.const(g.position * WIRE_BYTES), generateGateValue(mod, g))
    );
  }

  mod.addFunction(
    'evaluate',
    binaryen.none,
    binaryen.none,
    [],
    body.length > 0 ? mod.block(null, body) : mod.nop()
  );
  mod.addFunctionExport('evaluate', 'evaluate');
}

/**
 * (table >> index) & 1, where index packs the input wires big-endian.
 */
function generateGateValue(mod: binaryen.Module, g: Gate): binaryen.ExpressionRef {
  const table = g.operation.table;

  if (g.inputs.length === 0) {
    return mod.i32.const(table[0]);
  }

  // Bit i of the mask is table entry i; entry 31 lands on the sign bit
  const mask = table.reduce<number>((m, bit, i) => m | (bit << i), 0);

  let index = readWire(mod, g.inputs[0]);
  for (const ig of g.inputs.slice(1)) {
    index = mod.i32.or(mod.i32.shl(index, mod.i32.const(1)), readWire(mod, ig));
  }

  return mod.i32.and(mod.i32.shr_u(mod.i32.const(mask), index), mod.i32.const(1));
}

function readWire(mod: binaryen.Module, g: Gate): binaryen.ExpressionRef {
  return mod.i32.load(0, 4, mod.i32.const(g.position * WIRE_BYTES));
}
