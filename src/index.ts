// circuit-dag - gate graphs for boolean circuits
// Build, prune, sort and evaluate DAGs of fixed-arity boolean gates

// Bits and bit vectors
export {
  isBit,
  type Bit,
  type BitVector,
  type GroupedBitVector,
  type SignatureValue,
  type SignatureInput,
  type GateRoles,
  type LegibleGate,
} from './types/circuit.js';

// Operations
export {
  Operation,
  op,
  nullary,
  unary,
  binary,
  isNullary,
  isIdentity,
} from './operation/index.js';

// Gate graph
export {
  Gate,
  GateCollection,
  Signature,
  partition,
  Circuit,
  levelize,
  getStats,
  type PruneResult,
  type ImmutableGate,
  type Format,
  type PruneOptions,
  type GatePredicate,
  type CircuitStats,
} from './circuit/index.js';

// Errors
export {
  CircuitError,
  RoleViolationError,
  DanglingOutputReuseError,
  ArityMismatchError,
  ShapeError,
} from './circuit/index.js';

// WASM compilation
export {
  compileToWasm,
  MAX_COMPILED_ARITY,
  type CompiledCircuit,
  type CompileOptions,
} from './compiler/index.js';
