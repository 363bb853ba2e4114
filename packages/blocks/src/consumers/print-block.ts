// src/consumers/print-block.ts

import { BaseBlock, StepResult, type Input, type SignalType, type StepInfo } from '@tickflow/core';

export type PrintSink = (line: string) => void;

function formatValue(value: unknown): string {
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

/**
 * Logs its input every step as `t: <t> <block>-><signal> = <value>`.
 */
export class Print<T> extends BaseBlock {
  readonly u: Input<T>;

  constructor(
    name: string,
    type: SignalType<T>,
    private readonly sink: PrintSink = (line) => console.log(line)
  ) {
    super(name);
    this.u = this.input('u', type);
  }

  step(info: StepInfo): StepResult {
    this.sink(`t: ${info.t.toFixed(2)} ${this.name()}->${this.u.signalName} = ${formatValue(this.u.get())}`);
    return StepResult.CONTINUE;
  }
}
