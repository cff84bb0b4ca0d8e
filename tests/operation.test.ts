import { describe, it, expect } from 'vitest';
import {
  Operation,
  op,
  nullary,
  unary,
  binary,
  isNullary,
  isIdentity,
  ArityMismatchError,
  ShapeError,
} from '../src/index.js';

describe('Operation', () => {
  describe('catalog', () => {
    it('should apply binary operations with the first argument as the high bit', () => {
      expect(op.and.apply(1, 1)).toBe(1);
      expect(op.and.apply(1, 0)).toBe(0);
      expect(op.imp.apply(1, 0)).toBe(0);
      expect(op.imp.apply(0, 1)).toBe(1);
      expect(op.nimp.apply(1, 0)).toBe(1);
      expect(op.if.apply(0, 1)).toBe(0);
      expect(op.fst.apply(1, 0)).toBe(1);
      expect(op.snd.apply(1, 0)).toBe(0);
    });

    it('should apply unary and nullary operations', () => {
      expect(op.id.apply(1)).toBe(1);
      expect(op.not.apply(1)).toBe(0);
      expect(op.nt.apply()).toBe(1);
      expect(op.nf.apply()).toBe(0);
    });

    it('should report arity from the table length', () => {
      expect(op.nt.arity()).toBe(0);
      expect(op.not.arity()).toBe(1);
      expect(op.xor.arity()).toBe(2);
    });

    it('should group operations by arity', () => {
      expect(nullary).toHaveLength(2);
      expect(unary).toHaveLength(4);
      expect(binary).toHaveLength(16);
      expect(new Set(binary.map((o) => o.table.join(''))).size).toBe(16);
      expect(binary.every((o) => o.arity() === 2)).toBe(true);
    });

    it('should classify nullary and identity operations', () => {
      expect(isNullary(op.nf)).toBe(true);
      expect(isNullary(op.id)).toBe(false);
      expect(isIdentity(op.id)).toBe(true);
      expect(isIdentity(op.snd)).toBe(false);
    });
  });

  describe('fromTable', () => {
    it('should take the catalog name of a matching table', () => {
      const xor = Operation.fromTable([0, 1, 1, 0]);
      expect(xor.name()).toBe('xor');
      expect(xor.equals(op.xor)).toBe(true);
      expect(String(xor)).toBe('xor');
    });

    it('should name other tables by their bits', () => {
      const parity = Operation.fromTable([0, 1, 1, 0, 1, 0, 0, 1]);
      expect(parity.name()).toBe('01101001');
      expect(parity.arity()).toBe(3);
      expect(parity.apply(1, 1, 1)).toBe(1);
      expect(parity.apply(1, 0, 0)).toBe(1);
      expect(parity.apply(0, 0, 1)).toBe(1);
      expect(parity.apply(0, 1, 1)).toBe(0);
    });

    it('should reject tables whose length is not a power of two', () => {
      expect(() => Operation.fromTable([0, 1, 1])).toThrow(ShapeError);
      expect(() => Operation.fromTable([])).toThrow(ShapeError);
    });

    it('should reject entries that are not bits', () => {
      expect(() => Operation.fromTable([0, 2])).toThrow(ShapeError);
    });
  });

  describe('apply', () => {
    it('should reject the wrong number of arguments', () => {
      expect(() => op.and.apply(1)).toThrow(ArityMismatchError);
      expect(() => op.and.apply(1)).toThrow('Operation and argument count: expected 2, got 1');
    });

    it('should reject arguments that are not bits', () => {
      expect(() => op.and.apply(1, 2)).toThrow(ShapeError);
    });
  });

  it('should compare by table', () => {
    expect(Operation.fromTable([0, 0, 0, 1]).equals(op.and)).toBe(true);
    expect(op.and.equals(op.or)).toBe(false);
    expect(op.id.equals(op.snd)).toBe(false);
  });

  it('should hand out a copy of its table', () => {
    const table = op.and.table;
    table[0] = 1;
    expect(op.and.apply(0, 0)).toBe(0);
  });
});
