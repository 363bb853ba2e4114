// src/math/delay-block.ts

import {
  BaseBlock,
  INITIAL_STEP,
  ParameterError,
  StepResult,
  type Input,
  type Output,
  type ParameterStore,
  type SignalType,
  type StepInfo,
} from '@tickflow/core';
import { z } from 'zod';

export interface DelayParams<T> {
  initialValues: T[];
}

const DelayParamsSchema = z.object({ initialValues: z.array(z.unknown()).min(1) });

/**
 * Outputs its input `initialValues.length` steps late. The first outputs are
 * the initial values, in order.
 *
 * The delay lets the block sit on a feedback loop: it reads its input before
 * the producer has run in the current step, i.e. the value of the previous
 * step.
 */
export class Delay<T> extends BaseBlock {
  readonly u: Input<T>;
  readonly y: Output<T>;

  private readonly buffer: T[];
  private index = 0;

  constructor(name: string, type: SignalType<T>, params: DelayParams<T>) {
    super(name);
    if (params.initialValues.length === 0) {
      throw new ParameterError(name, 'Delay needs at least one initial value');
    }
    this.buffer = [...params.initialValues];
    this.u = this.input('u', type);
    this.y = this.output('y', type);
  }

  static fromStore<T>(
    name: string,
    type: SignalType<T>,
    store: ParameterStore,
    defaults: DelayParams<T>
  ): Delay<T> {
    const raw = store.getBlockParams(name, DelayParamsSchema, defaults);
    const initialValues: T[] = [];
    for (const [i, value] of raw.initialValues.entries()) {
      const checked = type.validate(value);
      if (!checked.success) {
        throw new ParameterError(`${store.systemName}.blocks.${name}.initialValues.${i}`, checked.error);
      }
      initialValues.push(checked.value);
    }
    return new Delay(name, type, { initialValues });
  }

  delay(): number {
    return this.buffer.length;
  }

  step(info: StepInfo): StepResult {
    const n = this.buffer.length;

    // Slot index-1 was emitted last step; refill it with last step's input.
    if (info.k > INITIAL_STEP) {
      this.buffer[(this.index + n - 1) % n] = this.u.get();
    }

    this.y.set(this.buffer[this.index]);
    this.index = (this.index + 1) % n;

    return StepResult.CONTINUE;
  }
}
