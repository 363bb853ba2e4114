// src/math/add-block.ts

import {
  BaseBlock,
  NumberType,
  ParameterError,
  StepResult,
  formatIssues,
  type Input,
  type Output,
  type ParameterStore,
  type SignalType,
} from '@tickflow/core';
import { z } from 'zod';

export const AddParamsSchema = z.object({
  gains: z.array(z.number()).min(1),
});

export type AddParams = z.infer<typeof AddParamsSchema>;

/**
 * Weighted sum: `y = gains[0]·u1 + … + gains[N-1]·uN`, one input per gain.
 */
export class Add extends BaseBlock {
  readonly u: Input<number>[];
  readonly y: Output<number>;
  readonly params: AddParams;

  constructor(name: string, params: AddParams, type: SignalType<number> = NumberType) {
    super(name);
    const parsed = AddParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw new ParameterError(name, formatIssues(parsed.error));
    }
    this.params = parsed.data;
    this.u = this.inputArray('u', type, parsed.data.gains.length);
    this.y = this.output('y', type);
  }

  /** Unit gains on `n` inputs. */
  static sum(name: string, n: number, type: SignalType<number> = NumberType): Add {
    return new Add(name, { gains: new Array<number>(n).fill(1) }, type);
  }

  static fromStore(
    name: string,
    store: ParameterStore,
    defaults: AddParams,
    type: SignalType<number> = NumberType
  ): Add {
    return new Add(name, store.getBlockParams(name, AddParamsSchema, defaults), type);
  }

  step(): StepResult {
    const { gains } = this.params;
    let sum = 0;
    for (let i = 0; i < this.u.length; i++) {
      sum += this.u[i].get() * (gains[i] ?? 0);
    }
    this.y.set(sum);
    return StepResult.CONTINUE;
  }
}
