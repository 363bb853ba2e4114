// src/siso/pid-block.ts

import {
  BaseBlock,
  NumberType,
  StepResult,
  type Input,
  type Output,
  type ParameterStore,
  type StepInfo,
} from '@tickflow/core';
import { z } from 'zod';

export const PIDParamsSchema = z.object({
  kp: z.number().default(0),
  ki: z.number().default(0),
  kd: z.number().default(0),
  /** Initial value of the integral. */
  acc0: z.number().default(0),
});

export type PIDParams = z.infer<typeof PIDParamsSchema>;
export type PIDParamsInput = z.input<typeof PIDParamsSchema>;

/**
 * PID controller on the error signal `u`.
 */
export class PID extends BaseBlock {
  readonly u: Input<number>;
  readonly y: Output<number>;
  readonly params: PIDParams;

  private acc: number;
  private lastErr = 0;

  constructor(name: string, params: PIDParamsInput = {}) {
    super(name);
    this.params = PIDParamsSchema.parse(params);
    this.acc = this.params.acc0;
    this.u = this.input('u', NumberType);
    this.y = this.output('y', NumberType);
  }

  static fromStore(name: string, store: ParameterStore, defaults: PIDParamsInput = {}): PID {
    return new PID(name, store.getBlockParams(name, PIDParamsSchema, defaults));
  }

  step(info: StepInfo): StepResult {
    const { kp, ki, kd } = this.params;
    const err = this.u.get();
    const der = (err - this.lastErr) / info.dt;
    const int = this.acc + err * info.dt;

    this.y.set(kp * err + kd * der + ki * int);

    this.lastErr = err;
    this.acc = int;

    return StepResult.CONTINUE;
  }
}
