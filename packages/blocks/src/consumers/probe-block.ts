// src/consumers/probe-block.ts

import {
  BaseBlock,
  StepResult,
  type Input,
  type SignalType,
  type SimulationBuilder,
  type StepInfo,
} from '@tickflow/core';

export type ProbeFn<T> = (signal: string, value: T | undefined, info: StepInfo) => void;

/**
 * Hands its input to a callback every step. The value is `undefined` while
 * the signal has not been written.
 */
export class Probe<T> extends BaseBlock {
  readonly u: Input<T>;

  constructor(
    name: string,
    type: SignalType<T>,
    private readonly fn: ProbeFn<T>
  ) {
    super(name);
    this.u = this.input('u', type);
  }

  step(info: StepInfo): StepResult {
    this.fn(this.u.signalName, this.u.tryGet(), info);
    return StepResult.CONTINUE;
  }
}

let probeCounter = 0;

/**
 * Attach a probe to `signal` under a generated block name, which is returned.
 */
export function addProbe<T>(
  builder: SimulationBuilder,
  signal: string,
  type: SignalType<T>,
  fn: ProbeFn<T>
): string {
  let name: string;
  do {
    probeCounter++;
    name = `probe${signal.replace(/[^A-Za-z0-9]+/g, '_')}_${probeCounter}`;
  } while (builder.hasBlock(name));

  builder.addBlock(new Probe(name, type, fn), { u: signal });
  return name;
}
