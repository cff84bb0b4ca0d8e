// Gate collection: an ordered list of gates, either a whole circuit or a
// slice of one

import { Operation, isIdentity } from '../operation/operation.js';
import { type Bit, type GateRoles, type LegibleGate, isBit } from '../types/circuit.js';
import { Gate } from './gate.js';
import { ArityMismatchError, ShapeError } from './errors.js';

export type ImmutableGate = [Operation, ...(number | null)[]];

export interface PruneResult {
  before: number;
  after: number;
}

export class GateCollection implements Iterable<Gate> {
  private gates: Gate[];

  /**
   * A collection may start out holding gates built elsewhere, such as a
   * slice of a circuit. Their positions are left as they are; only gates
   * added here (or reordered by pruning) get positions from this collection.
   */
  constructor(gates: Iterable<Gate> = []) {
    this.gates = [...gates];
  }

  /**
   * Mark a gate and every gate it transitively reads from. Gates that are
   * already marked are not revisited.
   */
  static mark(gate: Gate): void {
    const stack: Gate[] = [gate];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || current.visited) continue;
      current.visited = true;
      stack.push(...current.inputs);
    }
  }

  /**
   * Append a new gate. Validation happens in the Gate constructor, before
   * the collection or any input gate is touched.
   */
  addGate(
    operation: Operation,
    inputs: readonly Gate[] = [],
    roles: Partial<GateRoles> = {}
  ): Gate {
    const gate = new Gate(operation, inputs, roles);
    gate.position = this.gates.length;
    this.gates.push(gate);
    return gate;
  }

  get length(): number {
    return this.gates.length;
  }

  at(index: number): Gate | undefined {
    return this.gates[index];
  }

  [Symbol.iterator](): Iterator<Gate> {
    return this.gates[Symbol.iterator]();
  }

  /**
   * Input slots that are not fed from inside the collection, in gate order.
   * A slot reading a gate outside the collection yields that gate; each
   * slot of a gate without inputs yields null.
   */
  inputs(): (Gate | null)[] {
    const members = new Set(this.gates);
    const slots: (Gate | null)[] = [];

    for (const g of this.gates) {
      if (g.inputs.length === 0) {
        for (let i = 0; i < g.operation.arity(); i++) {
          slots.push(null);
        }
        continue;
      }
      for (const ig of g.inputs) {
        if (!members.has(ig)) slots.push(ig);
      }
    }

    return slots;
  }

  /**
   * Consumers outside the collection, once per edge leaving it.
   */
  outputs(): Gate[] {
    const members = new Set(this.gates);
    const consumers: Gate[] = [];
    for (const g of this.gates) {
      for (const og of g.outputs) {
        if (!members.has(og)) consumers.push(og);
      }
    }
    return consumers;
  }

  /**
   * Gates with no inputs, or with an input outside the collection.
   */
  sources(): Gate[] {
    const members = new Set(this.gates);
    return this.gates.filter(
      (g) => g.inputs.length === 0 || g.inputs.some((ig) => !members.has(ig))
    );
  }

  /**
   * Gates that no member of the collection reads from.
   */
  sinks(): Gate[] {
    const read = new Set<Gate>();
    for (const g of this.gates) {
      for (const input of g.inputs) {
        read.add(input);
      }
    }
    return this.gates.filter((g) => !read.has(g));
  }

  /**
   * Evaluate the bare collection. Every open input slot (see `inputs`)
   * takes the next bit of the input; the result holds the value of every
   * gate with no consumer in the collection.
   */
  evaluate(bits: Iterable<number>): Bit[] {
    const input: Bit[] = [];
    for (const value of bits) {
      if (!isBit(value)) {
        throw new ShapeError('Each bit must be represented by 0 or 1');
      }
      input.push(value);
    }
    const expected = this.inputs().length;
    if (input.length !== expected) {
      throw new ArityMismatchError('Collection input bit count', expected, input.length);
    }

    const members = new Set(this.gates);
    const wire = new Map<Gate, Bit>();
    let cursor = 0;
    const next = (): Bit => input[cursor++];

    for (const g of this.gates) {
      let args: Bit[];
      if (g.inputs.length === 0) {
        args = Array.from({ length: g.operation.arity() }, next);
      } else {
        args = g.inputs.map((ig) => {
          if (!members.has(ig)) return next();
          const value = wire.get(ig);
          if (value === undefined) {
            throw new Error('Gate input appears after the gate that reads it');
          }
          return value;
        });
      }
      wire.set(g, g.operation.apply(...args));
    }

    const result: Bit[] = [];
    for (const g of this.gates) {
      const value = wire.get(g);
      if (value !== undefined && g.outputs.every((og) => !members.has(og))) {
        result.push(value);
      }
    }
    return result;
  }

  /**
   * Truth table of a collection with exactly one result bit, over every
   * assignment of its open input slots in big-endian order.
   */
  toOperation(): Operation {
    const members = new Set(this.gates);
    const results = this.gates.filter((g) => g.outputs.every((og) => !members.has(og))).length;
    if (results !== 1) {
      throw new ArityMismatchError('Collection result count', 1, results);
    }

    const width = this.inputs().length;
    const table: Bit[] = [];
    for (let assignment = 0; assignment < 2 ** width; assignment++) {
      const bits: Bit[] = [];
      for (let i = width - 1; i >= 0; i--) {
        bits.push(Math.floor(assignment / 2 ** i) % 2 === 1 ? 1 : 0);
      }
      table.push(...this.evaluate(bits));
    }

    return Operation.fromTable(table);
  }

  /**
   * Canonical dump: for each gate, its operation name followed by the
   * indices of its inputs in this collection (null for an input outside it).
   */
  toLegible(): LegibleGate[] {
    const index = this.indices();
    return this.gates.map((g): LegibleGate => [
      g.operation.name(),
      ...g.inputs.map((ig) => index.get(ig) ?? null),
    ]);
  }

  toImmutable(): ImmutableGate[] {
    const index = this.indices();
    return this.gates.map((g): ImmutableGate => [
      g.operation,
      ...g.inputs.map((ig) => index.get(ig) ?? null),
    ]);
  }

  private indices(): Map<Gate, number> {
    return new Map(this.gates.map((g, i) => [g, i]));
  }

  /**
   * Remove gates that no output gate depends on and reorder the rest into
   * three blocks: inputs, interior gates, outputs. Each block keeps the
   * relative order its members had before. Survivors take their new
   * positions from this collection.
   */
  pruneAndTopologicallySortStable(): PruneResult {
    const before = this.gates.length;

    const outputGates = this.gates.filter(
      (g) => g.isOutput && g.outputs.length === 0 && isIdentity(g.operation)
    );

    for (const g of this.gates) {
      g.visited = false;
    }
    for (const g of outputGates) {
      GateCollection.mark(g);
    }

    const sorted: Gate[] = [];

    // Inputs
    for (const g of this.gates) {
      if (g.isInput && g.inputs.length === 0) {
        sorted.push(g);
      }
    }

    // Interior gates some output depends on
    for (const g of this.gates) {
      if (
        g.isComputed() &&
        g.outputs.length > 0 &&
        !g.isInput &&
        !g.isOutput &&
        g.visited
      ) {
        sorted.push(g);
      }
    }

    // Outputs, which are sinks from here on
    for (const g of outputGates) {
      g.retainOutputs(() => false);
      sorted.push(g);
    }

    const survivors = new Set(sorted);
    sorted.forEach((g, position) => {
      g.position = position;
      g.retainOutputs((og) => survivors.has(og));
    });
    this.gates = sorted;

    return { before, after: sorted.length };
  }
}
