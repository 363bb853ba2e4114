// src/producers/generator-block.ts

import { BaseBlock, StepResult, type Output, type SignalType, type StepInfo } from '@tickflow/core';

export type GeneratorFn<T> = (info: StepInfo) => T;

/**
 * Writes `fn(info)` every step: time-dependent sources, test inputs.
 */
export class Generator<T> extends BaseBlock {
  readonly y: Output<T>;

  constructor(
    name: string,
    type: SignalType<T>,
    private readonly fn: GeneratorFn<T>
  ) {
    super(name);
    this.y = this.output('y', type);
  }

  step(info: StepInfo): StepResult {
    this.y.set(this.fn(info));
    return StepResult.CONTINUE;
  }
}
