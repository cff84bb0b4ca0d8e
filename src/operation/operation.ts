// Boolean operations represented by their truth tables
//
// Entry i of a table is the result for the argument list whose big-endian
// binary value is i, so the first argument is the most significant bit.

import { type Bit, isBit } from '../types/circuit.js';
import { ArityMismatchError, ShapeError } from '../circuit/errors.js';

// Table key -> catalog name
const catalogNames = new Map<string, string>();

function tableKey(bits: readonly Bit[]): string {
  return bits.join('');
}

export class Operation {
  private readonly bits: readonly Bit[];
  private readonly size: number;

  private constructor(bits: readonly Bit[], size: number) {
    this.bits = bits;
    this.size = size;
  }

  /**
   * Build an operation from a truth table of length 2^arity.
   */
  static fromTable(table: readonly number[]): Operation {
    const bits: Bit[] = [];
    for (const entry of table) {
      if (!isBit(entry)) {
        throw new ShapeError(`Truth table entries must be 0 or 1, got ${entry}`);
      }
      bits.push(entry);
    }

    const size = Math.log2(bits.length);
    if (!Number.isInteger(size)) {
      throw new ShapeError(`Truth table length must be a power of two, got ${bits.length}`);
    }

    return new Operation(bits, size);
  }

  get table(): Bit[] {
    return [...this.bits];
  }

  arity(): number {
    return this.size;
  }

  apply(...args: number[]): Bit {
    if (args.length !== this.size) {
      throw new ArityMismatchError(`Operation ${this.name()} argument count`, this.size, args.length);
    }

    let index = 0;
    for (const arg of args) {
      if (!isBit(arg)) {
        throw new ShapeError(`Operation arguments must be 0 or 1, got ${arg}`);
      }
      index = index * 2 + arg;
    }
    return this.bits[index];
  }

  name(): string {
    const key = tableKey(this.bits);
    return catalogNames.get(key) ?? key;
  }

  equals(other: Operation): boolean {
    return tableKey(this.bits) === tableKey(other.bits);
  }

  toString(): string {
    return this.name();
  }
}

function define(name: string, table: Bit[]): Operation {
  catalogNames.set(tableKey(table), name);
  return Operation.fromTable(table);
}

/**
 * Named operations of arity 0, 1 and 2.
 */
export const op = {
  // Nullary
  nf: define('nf', [0]),
  nt: define('nt', [1]),

  // Unary
  uf: define('uf', [0, 0]),
  id: define('id', [0, 1]),
  not: define('not', [1, 0]),
  ut: define('ut', [1, 1]),

  // Binary
  bf: define('bf', [0, 0, 0, 0]),
  and: define('and', [0, 0, 0, 1]),
  nimp: define('nimp', [0, 0, 1, 0]),
  fst: define('fst', [0, 0, 1, 1]),
  nif: define('nif', [0, 1, 0, 0]),
  snd: define('snd', [0, 1, 0, 1]),
  xor: define('xor', [0, 1, 1, 0]),
  or: define('or', [0, 1, 1, 1]),
  nor: define('nor', [1, 0, 0, 0]),
  xnor: define('xnor', [1, 0, 0, 1]),
  nsnd: define('nsnd', [1, 0, 1, 0]),
  if: define('if', [1, 0, 1, 1]),
  nfst: define('nfst', [1, 1, 0, 0]),
  imp: define('imp', [1, 1, 0, 1]),
  nand: define('nand', [1, 1, 1, 0]),
  bt: define('bt', [1, 1, 1, 1]),
};

export const nullary: Operation[] = [op.nf, op.nt];
export const unary: Operation[] = [op.uf, op.id, op.not, op.ut];
export const binary: Operation[] = [
  op.bf, op.and, op.nimp, op.fst, op.nif, op.snd, op.xor, op.or,
  op.nor, op.xnor, op.nsnd, op.if, op.nfst, op.imp, op.nand, op.bt,
];

export function isNullary(operation: Operation): boolean {
  return operation.arity() === 0;
}

export function isIdentity(operation: Operation): boolean {
  return operation.equals(op.id);
}
