import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  Circuit,
  Signature,
  Operation,
  op,
  compileToWasm,
  ArityMismatchError,
} from '../src/index.js';

const ALL_PAIRS = [
  [0, 0],
  [0, 1],
  [1, 0],
  [1, 1],
];

const ALL_TRIPLES = [0, 1, 2, 3, 4, 5, 6, 7].map((n) => [(n >> 2) & 1, (n >> 1) & 1, n & 1]);

function buildAnd(signature?: Signature) {
  const c = new Circuit(signature);
  const a = c.addGate(op.id, [], { isInput: true });
  const b = c.addGate(op.id, [], { isInput: true });
  const and = c.addGate(op.and, [a, b]);
  c.addGate(op.id, [and], { isOutput: true });
  return c;
}

function buildFullAdder() {
  const c = new Circuit();
  const a = c.addGate(op.id, [], { isInput: true });
  const b = c.addGate(op.id, [], { isInput: true });
  const cin = c.addGate(op.id, [], { isInput: true });
  const s1 = c.addGate(op.xor, [a, b]);
  const sum = c.addGate(op.xor, [s1, cin]);
  const c1 = c.addGate(op.and, [a, b]);
  const c2 = c.addGate(op.and, [s1, cin]);
  const cout = c.addGate(op.or, [c1, c2]);
  c.addGate(op.nand, [a, b]);
  c.addGate(op.id, [sum], { isOutput: true });
  c.addGate(op.id, [cout], { isOutput: true });
  return c;
}

// Parity of n inputs as a single gate
function buildWideParity(width: number) {
  const table: number[] = [];
  for (let i = 0; i < 2 ** width; i++) {
    let ones = 0;
    for (let v = i; v > 0; v >>= 1) ones += v & 1;
    table.push(ones % 2);
  }

  const c = new Circuit();
  const inputs = Array.from({ length: width }, () => c.addGate(op.id, [], { isInput: true }));
  const parity = c.addGate(Operation.fromTable(table), inputs);
  c.addGate(op.id, [parity], { isOutput: true });
  return c;
}

describe('WASM Compiler', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should compile an AND circuit', () => {
    const compiled = compileToWasm(buildAnd());

    expect(compiled.wireCount).toBe(4);
    expect(compiled.evaluate([0, 0])).toEqual([0]);
    expect(compiled.evaluate([0, 1])).toEqual([0]);
    expect(compiled.evaluate([1, 0])).toEqual([0]);
    expect(compiled.evaluate([1, 1])).toEqual([1]);
  });

  it('should match the interpreter before and after pruning', () => {
    const c = buildFullAdder();
    const unpruned = compileToWasm(c);
    const expected = ALL_TRIPLES.map((bits) => c.evaluate(bits));

    c.pruneAndTopologicallySortStable();
    const pruned = compileToWasm(c, { optimize: false });

    expect(ALL_TRIPLES.map((bits) => unpruned.evaluate(bits))).toEqual(expected);
    expect(ALL_TRIPLES.map((bits) => pruned.evaluate(bits))).toEqual(expected);
    expect(pruned.wireCount).toBe(10);
  });

  it('should compile constants', () => {
    const c = new Circuit();
    const a = c.addGate(op.id, [], { isInput: true });
    const t = c.addGate(op.nt);
    const x = c.addGate(op.xor, [a, t]);
    c.addGate(op.id, [x], { isOutput: true });

    const compiled = compileToWasm(c);
    expect(compiled.evaluate([0])).toEqual([1]);
    expect(compiled.evaluate([1])).toEqual([0]);
  });

  it('should compile constants that feed outputs directly', () => {
    const c = new Circuit();
    const t = c.addGate(op.nt);
    const f = c.addGate(op.nf);
    c.addGate(op.id, [t], { isOutput: true });
    c.addGate(op.id, [f], { isOutput: true });

    expect(c.evaluate([])).toEqual([1, 0]);
    expect(compileToWasm(c).evaluate([])).toEqual([1, 0]);
  });

  it('should match the interpreter with a dead gate ahead of the inputs', () => {
    const c = new Circuit();
    const t = c.addGate(op.nt);
    const a = c.addGate(op.id, [], { isInput: true });
    const b = c.addGate(op.id, [], { isInput: true });
    c.addGate(op.nand, [t, a]);
    const or = c.addGate(op.or, [a, b]);
    c.addGate(op.id, [or], { isOutput: true });

    const expected = ALL_PAIRS.map((bits) => c.evaluate(bits));
    expect(expected).toEqual([[0], [1], [1], [1]]);
    expect(ALL_PAIRS.map((bits) => compileToWasm(c).evaluate(bits))).toEqual(expected);

    c.pruneAndTopologicallySortStable();
    expect(c.count()).toBe(4);
    expect(ALL_PAIRS.map((bits) => compileToWasm(c).evaluate(bits))).toEqual(expected);
  });

  it('should allocate one page of memory for a small circuit', () => {
    const compiled = compileToWasm(buildAnd());
    expect(compiled.memory.buffer.byteLength).toBe(65536);
  });

  it('should handle a five-input table that sets the sign bit', () => {
    const compiled = compileToWasm(buildWideParity(5));

    expect(compiled.evaluate([1, 1, 1, 1, 1])).toEqual([1]);
    expect(compiled.evaluate([1, 0, 0, 0, 0])).toEqual([1]);
    expect(compiled.evaluate([1, 1, 0, 0, 0])).toEqual([0]);
    expect(compiled.evaluate([0, 0, 0, 0, 0])).toEqual([0]);
  });

  it('should reject gates wider than one i32 table', () => {
    expect(() => compileToWasm(buildWideParity(6))).toThrow(ArityMismatchError);
  });

  it('should format values through the signature', () => {
    const compiled = compileToWasm(buildAnd(new Signature([2], [1])));
    expect(compiled.evaluate([[1, 1]])).toEqual([[1]]);
  });

  it('should keep the signature it was compiled with', () => {
    const c = buildAnd();
    const compiled = compileToWasm(c);
    c.signature = new Signature([2], [1]);

    expect(compiled.evaluate([1, 1])).toEqual([1]);
  });

  it('should reject the wrong number of input bits', () => {
    const compiled = compileToWasm(buildAnd());
    expect(() => compiled.evaluate([1])).toThrow('Input bit count: expected 2, got 1');
  });

  it('should compile a circuit with no gates', () => {
    const compiled = compileToWasm(new Circuit());
    expect(compiled.evaluate([])).toEqual([]);
  });

  it('should log a summary when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    compileToWasm(buildAnd(), { verbose: true });

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(/^Compiled 4 gates \(2 inputs, 1 outputs\) to \d+ bytes$/);
  });
});
