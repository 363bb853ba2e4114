// src/consumers/recorder-block.ts

import { BaseBlock, StepResult, type Input, type SignalType, type StepInfo } from '@tickflow/core';

export interface Sample<T> {
  k: number;
  t: number;
  value: T;
}

/**
 * Keeps every value of its input, with the step it was observed at.
 */
export class Recorder<T> extends BaseBlock {
  readonly u: Input<T>;
  private readonly _samples: Sample<T>[] = [];

  constructor(name: string, type: SignalType<T>) {
    super(name);
    this.u = this.input('u', type);
  }

  get samples(): readonly Sample<T>[] {
    return this._samples;
  }

  get values(): T[] {
    return this._samples.map((s) => s.value);
  }

  clear(): void {
    this._samples.length = 0;
  }

  step(info: StepInfo): StepResult {
    this._samples.push({ k: info.k, t: info.t, value: this.u.get() });
    return StepResult.CONTINUE;
  }
}
