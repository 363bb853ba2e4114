import { describe, expect, test } from 'vitest';
import {
  CycleDetectedError,
  NumberType,
  SimulationBuilder,
  StepResult,
  type Simulation,
} from '../../src/index.js';
import { ConstBlock, ScriptedBlock, SinkBlock, SumBlock, UnitDelayBlock } from '../fixtures/blocks.js';

function accumulator(): { sim: Simulation; sink: SinkBlock<number> } {
  const sink = new SinkBlock('sink', NumberType);
  const sim = new SimulationBuilder()
    .addBlock(sink, { u: 'sum' })
    .addBlock(new SumBlock('add'), { u1: 'one', u2: 'feedback' }, { y: 'sum' })
    .addBlock(new UnitDelayBlock('delay', 0), { u: 'sum' }, { y: 'feedback' })
    .addBlock(new ConstBlock('one', NumberType, 1), {}, { y: 'one' })
    .build('accumulator', { dt: 0.1, maxIter: 10 });
  return { sim, sink };
}

describe('block networks', () => {
  test('adds two constants', () => {
    const sim = new SimulationBuilder()
      .addBlock(new ConstBlock('c1', NumberType, 3), {}, { y: 'c1' })
      .addBlock(new ConstBlock('c2', NumberType, 4), {}, { y: 'c2' })
      .addBlock(new SumBlock('add'), { u1: 'c1', u2: 'c2' }, { y: 'sum' })
      .build('sum', { dt: 1 });

    expect(sim.step()).toBe(StepResult.CONTINUE);
    expect(sim.readSignal('sum', NumberType)).toBe(7);
  });

  test('accumulates through a delayed feedback loop', () => {
    const { sim, sink } = accumulator();

    expect(sim.run()).toBe(10);
    expect(sink.seen).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
  });

  test('rejects the same loop without the delay', () => {
    const builder = new SimulationBuilder()
      .addBlock(new ConstBlock('one', NumberType, 1), {}, { y: 'one' })
      .addBlock(new SumBlock('add'), { u1: 'one', u2: 'sum' }, { y: 'sum' });

    expect(() => builder.build('loop', { dt: 1 })).toThrow(new CycleDetectedError('add'));
  });

  test('runs exactly maxIter steps', () => {
    const log: string[] = [];
    const sim = new SimulationBuilder().addBlock(new ScriptedBlock('tick', log)).build('five', { dt: 0.2, maxIter: 5 });

    expect(sim.run()).toBe(5);
    expect(log).toEqual(['tick@1', 'tick@2', 'tick@3', 'tick@4', 'tick@5']);
    expect(sim.stepInfo.k).toBe(6);
  });

  test('orders every producer before its zero-delay consumers', () => {
    const sim = new SimulationBuilder()
      .addBlock(new SinkBlock('out', NumberType), { u: 'total' })
      .addBlock(new SumBlock('total', 3), { u1: 'ab', u2: 'bc', u3: 'held' }, { y: 'total' })
      .addBlock(new SumBlock('ab'), { u1: 'a', u2: 'b' }, { y: 'ab' })
      .addBlock(new SumBlock('bc'), { u1: 'b', u2: 'c' }, { y: 'bc' })
      .addBlock(new UnitDelayBlock('held'), { u: 'total' }, { y: 'held' })
      .addBlock(new ConstBlock('c', NumberType, 3), {}, { y: 'c' })
      .addBlock(new ConstBlock('b', NumberType, 2), {}, { y: 'b' })
      .addBlock(new ConstBlock('a', NumberType, 1), {}, { y: 'a' })
      .build('diamond', { dt: 1 });

    const position = new Map(sim.executionOrder.map((name, i) => [name, i]));
    for (const edge of sim.schedulingGraph.edges) {
      expect(position.get(edge.from)).toBeLessThan(position.get(edge.to) ?? -1);
    }
    expect(sim.executionOrder[0]).toBe('held');

    sim.step();
    sim.step();
    // total = (1 + 2) + (2 + 3) + previous total
    expect(sim.readSignal('total', NumberType)).toBe(16);
  });

  test('identical networks produce identical traces', () => {
    const first = accumulator();
    const second = accumulator();
    first.sim.run();
    second.sim.run();

    expect(first.sim.executionOrder).toEqual(second.sim.executionOrder);
    expect(first.sink.seen).toEqual(second.sink.seen);
  });

  test('chained delays each lag by one step', () => {
    const sink = new SinkBlock('sink', NumberType);
    let counter = 0;
    const sim = new SimulationBuilder()
      .addBlock(
        new ScriptedBlock('ticker', [], () => {
          counter++;
          return StepResult.CONTINUE;
        })
      )
      .addBlock(new SumBlock('count'), { u1: 'one', u2: 'prev' }, { y: 'count' })
      .addBlock(new ConstBlock('one', NumberType, 1), {}, { y: 'one' })
      .addBlock(new UnitDelayBlock('d1', 0), { u: 'count' }, { y: 'prev' })
      .addBlock(new UnitDelayBlock('d2', -1), { u: 'prev' }, { y: 'prev2' })
      .addBlock(sink, { u: 'prev2' })
      .build('chain', { dt: 1, maxIter: 4 });

    expect(sim.executionOrder.indexOf('d2')).toBeLessThan(sim.executionOrder.indexOf('d1'));
    sim.run();
    expect(counter).toBe(4);
    expect(sink.seen).toEqual([-1, 0, 1, 2]);
  });
});
