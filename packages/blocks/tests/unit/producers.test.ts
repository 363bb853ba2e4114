import {
  NumberType,
  ParameterError,
  ParameterStore,
  SimulationBuilder,
  StringType,
  VectorType,
} from '@tickflow/core';
import { describe, expect, test } from 'vitest';
import { Constant, Generator, Recorder } from '../../src/index.js';

describe('Constant', () => {
  test('writes its value every step', () => {
    const recorder = new Recorder('rec', StringType);
    const sim = new SimulationBuilder()
      .addBlock(new Constant('mode', StringType, { c: 'auto' }), {}, { y: 'mode' })
      .addBlock(recorder, { u: 'mode' })
      .build('constant', { dt: 1, maxIter: 3 });

    sim.run();

    expect(recorder.values).toEqual(['auto', 'auto', 'auto']);
  });

  test('readers cannot change a vector value', () => {
    const constant = new Constant('offsets', VectorType, { c: [1, 2] });
    const recorder = new Recorder('rec', VectorType);
    const sim = new SimulationBuilder()
      .addBlock(constant, {}, { y: 'offsets' })
      .addBlock(recorder, { u: 'offsets' })
      .build('vector', { dt: 1 });

    sim.step();
    recorder.values[0].push(99);
    sim.step();

    expect(constant.params.c).toEqual([1, 2]);
    expect(recorder.values).toEqual([
      [1, 2, 99],
      [1, 2],
    ]);
    expect(sim.readSignal('offsets', VectorType)).toEqual([1, 2]);
  });

  test('reads its value from a parameter store', () => {
    const store = new ParameterStore('plant', { plant: { blocks: { setpoint: { c: 2.5 } } } });

    expect(Constant.fromStore('setpoint', NumberType, store, { c: 1 }).params.c).toBe(2.5);
    expect(Constant.fromStore('other', NumberType, store, { c: 1 }).params.c).toBe(1);
  });

  test('rejects a stored value of the wrong type', () => {
    const store = new ParameterStore('plant', { plant: { blocks: { setpoint: { c: 'high' } } } });

    try {
      Constant.fromStore('setpoint', NumberType, store, { c: 1 });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ParameterError);
      if (e instanceof ParameterError) {
        expect(e.key).toBe('plant.blocks.setpoint.c');
      }
    }
  });
});

describe('Generator', () => {
  test('writes a function of the step timing', () => {
    const recorder = new Recorder('rec', NumberType);
    const sim = new SimulationBuilder()
      .addBlock(new Generator('ramp', NumberType, ({ k }) => 10 * k), {}, { y: 'ramp' })
      .addBlock(recorder, { u: 'ramp' })
      .build('generator', { dt: 0.5, maxIter: 4 });

    sim.run();

    expect(recorder.values).toEqual([10, 20, 30, 40]);
    expect(recorder.samples.map((s) => s.t)).toEqual([0, 0.5, 1, 1.5]);
  });
});
