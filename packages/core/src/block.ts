// src/block.ts
// Block contract and the base class concrete blocks extend

import { SimulationError } from './errors.js';
import { hasOwn } from './utils.js';
import { Input, Output, type InputPort, type OutputPort } from './ports.js';
import type { SignalType } from './type-registry.js';
import type { StepInfo, StepResult } from './types.js';

// ============ Block Contract ============

/**
 * A computational unit of the simulation. The builder and the runtime only
 * ever talk to blocks through this interface.
 */
export interface Block {
  /** Stable identity; the graph node key. */
  name(): string;
  inputPorts(): Readonly<Record<string, InputPort>>;
  outputPorts(): Readonly<Record<string, OutputPort>>;
  /**
   * Number of steps the output may lag the input. A block with a delay does
   * not depend combinationally on this step's input, which breaks feedback
   * loops.
   */
  delay(): number;
  /** Read inputs, write outputs. Throws to abort the current step. */
  step(info: StepInfo): StepResult;
}

// ============ Base Block ============

/**
 * Abstract base for blocks. Subclasses declare ports through `input`,
 * `inputArray` and `output` in their constructor and implement `step`.
 */
export abstract class BaseBlock implements Block {
  private readonly _inputs: Record<string, InputPort> = {};
  private readonly _outputs: Record<string, OutputPort> = {};

  constructor(private readonly blockName: string) {
    if (blockName.length === 0) {
      throw new SimulationError('Block name must be a non-empty string');
    }
  }

  name(): string {
    return this.blockName;
  }

  inputPorts(): Readonly<Record<string, InputPort>> {
    return this._inputs;
  }

  outputPorts(): Readonly<Record<string, OutputPort>> {
    return this._outputs;
  }

  delay(): number {
    return 0;
  }

  abstract step(info: StepInfo): StepResult;

  protected input<T>(name: string, type: SignalType<T>): Input<T> {
    this.assertFreePortName(name);
    const port = new Input<T>(name, type);
    this._inputs[name] = port;
    return port;
  }

  /** Declare `prefix1 … prefixN`, all of the same type. */
  protected inputArray<T>(prefix: string, type: SignalType<T>, count: number): Input<T>[] {
    const ports: Input<T>[] = [];
    for (let i = 1; i <= count; i++) {
      ports.push(this.input(`${prefix}${i}`, type));
    }
    return ports;
  }

  protected output<T>(name: string, type: SignalType<T>): Output<T> {
    this.assertFreePortName(name);
    const port = new Output<T>(name, type);
    this._outputs[name] = port;
    return port;
  }

  private assertFreePortName(name: string): void {
    if (hasOwn(this._inputs, name) || hasOwn(this._outputs, name)) {
      throw new SimulationError(`Duplicate port name '${name}' in block '${this.blockName}'`);
    }
  }
}
