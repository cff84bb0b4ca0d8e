export { Gate } from './gate.js';
export { GateCollection, type PruneResult, type ImmutableGate } from './gates.js';
export { Signature, partition, type Format } from './signature.js';
export { Circuit, type PruneOptions, type GatePredicate } from './circuit.js';
export { levelize, getStats, type CircuitStats } from './stats.js';
export {
  CircuitError,
  RoleViolationError,
  DanglingOutputReuseError,
  ArityMismatchError,
  ShapeError,
} from './errors.js';
