// Shared types for gate graphs and their bit-vector interfaces

export type Bit = 0 | 1;

// A flat bit vector, or one grouped per a signature's format
export type BitVector = Bit[];
export type GroupedBitVector = Bit[][];
export type SignatureValue = BitVector | GroupedBitVector;

// Accepted on input: callers may hand in plain number arrays, which are
// checked bit by bit before use
export type SignatureInput = readonly number[] | readonly (readonly number[])[];

export interface GateRoles {
  isInput: boolean;   // Takes its value from the circuit's input vector
  isOutput: boolean;  // Contributes to the circuit's output vector
}

// Diagnostic dump entry: operation name followed by input indices, null
// for an input outside the dumped collection
export type LegibleGate = [string, ...(number | null)[]];

export function isBit(value: unknown): value is Bit {
  return value === 0 || value === 1;
}
