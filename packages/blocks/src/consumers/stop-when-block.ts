// src/consumers/stop-when-block.ts

import { BaseBlock, StepResult, type Input, type SignalType, type StepInfo } from '@tickflow/core';

export type StopPredicate<T> = (value: T, info: StepInfo) => boolean;

/**
 * Requests a stop once `predicate` holds for its input.
 */
export class StopWhen<T> extends BaseBlock {
  readonly u: Input<T>;

  constructor(
    name: string,
    type: SignalType<T>,
    private readonly predicate: StopPredicate<T>
  ) {
    super(name);
    this.u = this.input('u', type);
  }

  step(info: StepInfo): StepResult {
    return this.predicate(this.u.get(), info) ? StepResult.STOP : StepResult.CONTINUE;
  }
}
