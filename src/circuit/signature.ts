// Signature: converts between flat bit vectors and grouped ones

import {
  type Bit,
  type BitVector,
  type GroupedBitVector,
  type SignatureInput,
  type SignatureValue,
  isBit,
} from '../types/circuit.js';
import { ArityMismatchError, ShapeError } from './errors.js';

export type Format = readonly number[];

/**
 * Split a flat list into consecutive groups of the given lengths.
 */
export function partition<T>(items: readonly T[], lengths: Format): T[][] {
  const total = lengths.reduce((sum, n) => sum + n, 0);
  if (total !== items.length) {
    throw new ArityMismatchError('Bit count for format', total, items.length);
  }

  const groups: T[][] = [];
  let offset = 0;
  for (const length of lengths) {
    groups.push(items.slice(offset, offset + length));
    offset += length;
  }
  return groups;
}

function checkFormat(format: Format | null, side: string): Format | null {
  if (format === null) return null;
  if (!format.every((n) => Number.isInteger(n) && n >= 0)) {
    throw new ShapeError(`Signature ${side} format must be a list of non-negative integers`);
  }
  return [...format];
}

function toBits(values: readonly number[]): BitVector {
  const bits: BitVector = [];
  for (const value of values) {
    if (!isBit(value)) {
      throw new ShapeError(`Each bit must be represented by 0 or 1, got ${value}`);
    }
    bits.push(value);
  }
  return bits;
}

export class Signature {
  readonly inputFormat: Format | null;
  readonly outputFormat: Format | null;

  /**
   * A missing format means the values on that side are flat bit vectors.
   */
  constructor(inputFormat: Format | null = null, outputFormat: Format | null = null) {
    this.inputFormat = checkFormat(inputFormat, 'input');
    this.outputFormat = checkFormat(outputFormat, 'output');
  }

  /**
   * Flatten an input value, checking it against the input format.
   */
  input(value: SignatureInput): BitVector {
    if (this.inputFormat === null) {
      const flat: number[] = [];
      for (const entry of value) {
        if (typeof entry !== 'number') {
          throw new ShapeError('Input must be a flat list of bits');
        }
        flat.push(entry);
      }
      return toBits(flat);
    }

    const format = this.inputFormat;
    const groups: (readonly number[])[] = [];
    for (const entry of value) {
      if (typeof entry === 'number') {
        throw new ShapeError('Input must be a list of bit lists');
      }
      groups.push(entry);
    }
    if (groups.length !== format.length) {
      throw new ArityMismatchError('Input group count', format.length, groups.length);
    }

    const bits: BitVector = [];
    for (let i = 0; i < groups.length; i++) {
      const entry = groups[i];
      if (entry.length !== format[i]) {
        throw new ArityMismatchError(`Input group ${i} length`, format[i], entry.length);
      }
      bits.push(...toBits(entry));
    }
    return bits;
  }

  /**
   * Group a flat output vector per the output format.
   */
  output(bits: readonly Bit[]): SignatureValue {
    if (this.outputFormat === null) {
      return [...bits];
    }
    const grouped: GroupedBitVector = partition(bits, this.outputFormat);
    return grouped;
  }
}
