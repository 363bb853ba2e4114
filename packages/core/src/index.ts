// src/index.ts
// Main entry point for @tickflow/core

// Step, parameter and wiring types
export * from './types.js';

// Errors
export * from './errors.js';

// Type registry
export {
  SignalType,
  type AnySignalType,
  NumberType,
  IntegerType,
  BooleanType,
  StringType,
  VectorType,
  TYPE_ALIASES,
  registerType,
  getType,
  isRegisteredType,
  getRegisteredTypes,
} from './type-registry.js';

// Signals and ports
export { Signal, type AnySignal, isSignalOf } from './signal.js';
export { Input, Output, type InputPort, type OutputPort } from './ports.js';

// Blocks
export { BaseBlock, type Block } from './block.js';

// Builder and runtime
export { SimulationBuilder } from './builder.js';
export { Simulation, type SimulationInit } from './simulation.js';
export { DiGraph, toDot, type SignalEdge, type SignalGraph, type SortResult } from './graph.js';

// Configuration and parameters
export { loadConfig, type TickflowConfig, type LoadConfigOptions } from './config.js';
export { ParameterStore, mergeParams } from './parameters.js';
export { formatIssues } from './utils.js';

// Numeric helpers
export { forwardEuler, rungeKutta4, type Derivative, type OdeSolver } from './numeric/ode.js';

export const VERSION = '0.1.0';
