export {
  compileToWasm,
  MAX_COMPILED_ARITY,
  type CompiledCircuit,
  type CompileOptions,
} from './wasm-compiler.js';
