// src/simulation.ts
// Runtime: ordered blocks plus step/time state

import type { Block } from './block.js';
import { SimulationError } from './errors.js';
import { toDot, type SignalGraph } from './graph.js';
import type { AnySignal } from './signal.js';
import type { SignalType } from './type-registry.js';
import {
  initialStepInfo,
  StepResult,
  type SimulationParameters,
  type StepInfo,
} from './types.js';

export interface SimulationInit {
  name: string;
  /** Blocks in execution order. */
  blocks: Block[];
  signals: Map<string, AnySignal>;
  params: SimulationParameters;
  schedulingGraph: SignalGraph;
  diagnosticGraph: SignalGraph;
}

/**
 * A built block network. Each `step` runs every block once, producers before
 * their zero-delay consumers, then advances `k` and `t`.
 */
export class Simulation {
  readonly name: string;
  readonly params: Readonly<SimulationParameters>;
  /** Edges that constrain the execution order. */
  readonly schedulingGraph: SignalGraph;
  /** Every producer/consumer edge, delayed or not. Never used for ordering. */
  readonly diagnosticGraph: SignalGraph;

  private readonly blocks: readonly Block[];
  private readonly signals: ReadonlyMap<string, AnySignal>;
  private _stepInfo: StepInfo;

  constructor(init: SimulationInit) {
    this.name = init.name;
    this.blocks = init.blocks;
    this.signals = init.signals;
    this.params = init.params;
    this.schedulingGraph = init.schedulingGraph;
    this.diagnosticGraph = init.diagnosticGraph;
    this._stepInfo = initialStepInfo(init.params.dt);
  }

  // ============ Stepping ============

  /**
   * Execute one step. A block returning `Stop` does not cut the step short:
   * the remaining blocks still run. A block that throws aborts the step, and
   * the error reaches the caller as thrown; `k` and `t` are then left as they
   * were.
   */
  step(): StepResult {
    const info = this._stepInfo;
    let stop = false;

    for (const block of this.blocks) {
      if (block.step(info) === StepResult.STOP) {
        stop = true;
      }
    }

    this._stepInfo = { k: info.k + 1, t: info.t + info.dt, dt: info.dt };

    const { maxIter } = this.params;
    if (stop || (maxIter > 0 && this._stepInfo.k > maxIter)) {
      return StepResult.STOP;
    }
    return StepResult.CONTINUE;
  }

  /**
   * Step until a `Stop` result, or until `limit` steps ran. Returns the number
   * of steps executed.
   */
  run(limit = Infinity): number {
    let steps = 0;
    while (steps < limit) {
      steps++;
      if (this.step() === StepResult.STOP) break;
    }
    return steps;
  }

  // ============ State ============

  /** Timing of the next step to execute. */
  get stepInfo(): StepInfo {
    return this._stepInfo;
  }

  get executionOrder(): string[] {
    return this.blocks.map((b) => b.name());
  }

  get signalNames(): string[] {
    return [...this.signals.keys()];
  }

  /**
   * Current value of a signal, checked against `type`. Undefined until the
   * producer has written it.
   */
  readSignal<T>(name: string, type: SignalType<T>): T | undefined {
    const signal = this.signals.get(name);
    if (!signal) {
      throw new SimulationError(`No signal named '${name}' in simulation '${this.name}'`, 'UnknownSignal');
    }
    return signal.get(type);
  }

  /** DOT rendering of the diagnostic graph. */
  toDot(): string {
    return toDot(this.diagnosticGraph, this.name);
  }
}
