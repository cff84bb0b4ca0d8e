// Error types raised while building or evaluating circuits

export class CircuitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CircuitError';
  }
}

/**
 * A gate was designated as a circuit input or output but its operation is
 * not the identity.
 */
export class RoleViolationError extends CircuitError {
  constructor(message: string) {
    super(message);
    this.name = 'RoleViolationError';
  }
}

/**
 * An output gate was used as the input of another gate.
 */
export class DanglingOutputReuseError extends CircuitError {
  constructor(public position: number) {
    super(`Output gate at position ${position} cannot be used as a gate input`);
    this.name = 'DanglingOutputReuseError';
  }
}

/**
 * A count of inputs or bits does not match what the operation or signature
 * expects.
 */
export class ArityMismatchError extends CircuitError {
  constructor(message: string, public expected: number, public actual: number) {
    super(`${message}: expected ${expected}, got ${actual}`);
    this.name = 'ArityMismatchError';
  }
}

export class ShapeError extends CircuitError {
  constructor(message: string) {
    super(message);
    this.name = 'ShapeError';
  }
}
