// Gate: a single node of a circuit's gate graph

import { Operation, isIdentity } from '../operation/operation.js';
import type { GateRoles } from '../types/circuit.js';
import {
  RoleViolationError,
  DanglingOutputReuseError,
  ArityMismatchError,
} from './errors.js';

/**
 * Resolve a gate's roles, rejecting combinations no gate may have.
 */
export function checkRoles(operation: Operation, roles: Partial<GateRoles>): GateRoles {
  const isInput = roles.isInput ?? false;
  const isOutput = roles.isOutput ?? false;

  if (isInput && !isIdentity(operation)) {
    throw new RoleViolationError('Input gates must use the identity operation');
  }
  if (isOutput && !isIdentity(operation)) {
    throw new RoleViolationError('Output gates must use the identity operation');
  }
  if (isInput && isOutput) {
    throw new RoleViolationError('A gate cannot be both an input and an output');
  }

  return { isInput, isOutput };
}

/**
 * A gate applies one operation to the values of its input gates.
 *
 * Inputs are fixed at construction and always refer to gates built earlier,
 * so a graph of gates can never contain a cycle. Outputs are derived: each
 * new gate registers itself with its inputs.
 */
export class Gate {
  readonly operation: Operation;
  readonly inputs: readonly Gate[];
  private readonly consumers: Gate[] = [];
  readonly isInput: boolean;
  readonly isOutput: boolean;

  // Index in the owning collection, reassigned whenever it is reordered
  position: number = -1;

  // Scratch flag for reachability marking; only meaningful during one pass
  visited: boolean = false;

  constructor(
    operation: Operation,
    inputs: readonly Gate[] = [],
    roles: Partial<GateRoles> = {}
  ) {
    const { isInput, isOutput } = checkRoles(operation, roles);

    for (const input of inputs) {
      if (input.isOutput) {
        throw new DanglingOutputReuseError(input.position);
      }
    }

    if (inputs.length !== 0 && inputs.length !== operation.arity()) {
      throw new ArityMismatchError(
        `Gate ${operation.name()} input count`,
        operation.arity(),
        inputs.length
      );
    }

    this.operation = operation;
    this.inputs = [...inputs];
    this.isInput = isInput;
    this.isOutput = isOutput;

    for (const input of this.inputs) {
      input.addOutput(this);
    }
  }

  get outputs(): readonly Gate[] {
    return this.consumers;
  }

  /**
   * Record a consumer of this gate's value. Adding the same gate twice has
   * no effect.
   */
  addOutput(gate: Gate): void {
    if (!this.consumers.includes(gate)) {
      this.consumers.push(gate);
    }
  }

  /**
   * Drop consumers that fail the predicate, keeping the rest in order.
   */
  retainOutputs(keep: (gate: Gate) => boolean): void {
    const kept = this.consumers.filter(keep);
    this.consumers.splice(0, this.consumers.length, ...kept);
  }

  /**
   * True if the gate computes a value from its inputs (or is a constant),
   * false if its value is supplied from outside.
   */
  isComputed(): boolean {
    return this.inputs.length > 0 || this.operation.arity() === 0;
  }
}
