// Circuit: a gate collection together with the signature that formats its
// input and output vectors

import { Operation } from '../operation/operation.js';
import type { Bit, BitVector, GateRoles, SignatureInput, SignatureValue } from '../types/circuit.js';
import { type Gate, checkRoles } from './gate.js';
import { GateCollection } from './gates.js';
import { Signature, partition } from './signature.js';
import { ArityMismatchError } from './errors.js';

export interface PruneOptions {
  // Log gate counts before and after pruning
  verbose: boolean;
}

const DEFAULT_PRUNE_OPTIONS: PruneOptions = {
  verbose: false,
};

export type GatePredicate = (gate: Gate) => boolean;

const everyGate: GatePredicate = () => true;

/**
 * A circuit is built gate by gate, optionally pruned and sorted once, then
 * evaluated as often as needed.
 *
 * ```ts
 * const c = new Circuit();
 * const a = c.addGate(op.id, [], { isInput: true });
 * const b = c.addGate(op.id, [], { isInput: true });
 * const and = c.addGate(op.and, [a, b]);
 * c.addGate(op.id, [and], { isOutput: true });
 * c.evaluate([1, 1]); // [1]
 * ```
 */
export class Circuit {
  readonly gates: GateCollection = new GateCollection();
  signature: Signature;

  constructor(signature: Signature = new Signature()) {
    this.signature = signature;
  }

  /**
   * Add a gate. Non-input gates must name exactly as many inputs as their
   * operation's arity; input gates take none.
   */
  addGate(
    operation: Operation,
    inputs?: readonly Gate[],
    roles: Partial<GateRoles> = {}
  ): Gate {
    checkRoles(operation, roles);

    if (roles.isInput) {
      if (inputs !== undefined && inputs.length > 0) {
        throw new ArityMismatchError('Input gate input count', 0, inputs.length);
      }
    } else {
      const given = inputs?.length ?? 0;
      if (given !== operation.arity()) {
        throw new ArityMismatchError(
          `Gate ${operation.name()} input count`,
          operation.arity(),
          given
        );
      }
    }

    return this.gates.addGate(operation, inputs, roles);
  }

  count(predicate: GatePredicate = everyGate): number {
    let total = 0;
    for (const g of this.gates) {
      if (predicate(g)) total++;
    }
    return total;
  }

  /**
   * Longest path through the circuit, counting only gates that satisfy the
   * predicate. Relies on every gate appearing after its inputs.
   */
  depth(predicate: GatePredicate = everyGate): number {
    const depths = new Map<Gate, number>();
    let deepest = 0;

    for (const g of this.gates) {
      let inputDepth = 0;
      for (const ig of g.inputs) {
        inputDepth = Math.max(inputDepth, depths.get(ig) ?? 0);
      }
      const d = (predicate(g) ? 1 : 0) + inputDepth;
      depths.set(g, d);
      deepest = Math.max(deepest, d);
    }

    return deepest;
  }

  /**
   * Remove interior gates that no output depends on, then order the gates
   * as inputs, interior gates, outputs. Relative order within each group is
   * kept, so input and output indices are unaffected.
   */
  pruneAndTopologicallySortStable(options: Partial<PruneOptions> = {}): void {
    const opts = { ...DEFAULT_PRUNE_OPTIONS, ...options };
    const { before, after } = this.gates.pruneAndTopologicallySortStable();

    if (opts.verbose) {
      console.log(`Pruned ${before - after} gates (${before} -> ${after})`);
    }
  }

  /**
   * Evaluate the circuit. The input and result are flat bit vectors unless
   * the signature defines groups.
   */
  evaluate(input: SignatureInput): SignatureValue {
    return this.signature.output(this.evaluateFlat(this.signature.input(input)));
  }

  /**
   * Truth table of a circuit with exactly one output, over all assignments
   * of its inputs in big-endian order.
   */
  toOperation(): Operation {
    const outputs = this.count((g) => g.isOutput);
    if (outputs !== 1) {
      throw new ArityMismatchError('Output gate count', 1, outputs);
    }

    const width = this.count((g) => !g.isComputed());
    const format = this.signature.inputFormat;
    const table: Bit[] = [];

    for (let assignment = 0; assignment < 2 ** width; assignment++) {
      const bits: Bit[] = [];
      for (let i = width - 1; i >= 0; i--) {
        bits.push(Math.floor(assignment / 2 ** i) % 2 === 1 ? 1 : 0);
      }
      const flat = this.signature.input(format === null ? bits : partition(bits, format));
      table.push(...this.evaluateFlat(flat));
    }

    return Operation.fromTable(table);
  }

  /**
   * Evaluate on a flat vector with one bit per input gate, returning one
   * bit per output gate. Both follow position order.
   */
  private evaluateFlat(input: readonly Bit[]): BitVector {
    const inputs = this.count((g) => !g.isComputed());
    if (input.length !== inputs) {
      throw new ArityMismatchError('Input bit count', inputs, input.length);
    }

    const wire: Bit[] = new Array<Bit>(this.gates.length).fill(0);
    let next = 0;

    for (const g of this.gates) {
      if (g.isComputed()) {
        wire[g.position] = g.operation.apply(...g.inputs.map((ig) => wire[ig.position]));
      } else {
        wire[g.position] = input[next++];
      }
    }

    const output: BitVector = [];
    for (const g of this.gates) {
      if (g.isOutput && g.outputs.length === 0) {
        output.push(wire[g.position]);
      }
    }
    return output;
  }
}
