// src/producers/constant-block.ts

import {
  BaseBlock,
  ParameterError,
  StepResult,
  type Output,
  type ParameterStore,
  type SignalType,
} from '@tickflow/core';
import { z } from 'zod';

export interface ConstantParams<T> {
  c: T;
}

const ConstantParamsSchema = z.object({ c: z.unknown() });

/**
 * Writes the same value every step.
 */
export class Constant<T> extends BaseBlock {
  readonly y: Output<T>;

  constructor(
    name: string,
    type: SignalType<T>,
    readonly params: ConstantParams<T>
  ) {
    super(name);
    this.y = this.output('y', type);
  }

  static fromStore<T>(
    name: string,
    type: SignalType<T>,
    store: ParameterStore,
    defaults: ConstantParams<T>
  ): Constant<T> {
    const raw = store.getBlockParams(name, ConstantParamsSchema, defaults);
    const c = type.validate(raw.c);
    if (!c.success) {
      throw new ParameterError(`${store.systemName}.blocks.${name}.c`, c.error);
    }
    return new Constant(name, type, { c: c.value });
  }

  step(): StepResult {
    this.y.set(this.params.c);
    return StepResult.CONTINUE;
  }
}
