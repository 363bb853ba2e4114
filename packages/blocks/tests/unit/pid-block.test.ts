import { NumberType, ParameterStore, SimulationBuilder } from '@tickflow/core';
import { describe, expect, test } from 'vitest';
import { Constant, PID, Recorder, type PIDParamsInput } from '../../src/index.js';

function respond(params: PIDParamsInput, error: number, steps: number): number[] {
  const recorder = new Recorder('rec', NumberType);
  new SimulationBuilder()
    .addBlock(new Constant('err', NumberType, { c: error }), {}, { y: 'err' })
    .addBlock(new PID('pid', params), { u: 'err' }, { y: 'cmd' })
    .addBlock(recorder, { u: 'cmd' })
    .build('pid', { dt: 0.5, maxIter: steps })
    .run();
  return recorder.values;
}

describe('PID', () => {
  test('defaults every gain to zero', () => {
    expect(new PID('pid').params).toEqual({ kp: 0, ki: 0, kd: 0, acc0: 0 });
    expect(respond({}, 3, 2)).toEqual([0, 0]);
  });

  test('proportional term', () => {
    expect(respond({ kp: 2 }, 3, 3)).toEqual([6, 6, 6]);
  });

  test('integral term starts from acc0', () => {
    expect(respond({ ki: 1, acc0: 10 }, 2, 3)).toEqual([11, 12, 13]);
  });

  test('derivative term sees the jump from zero on the first step', () => {
    expect(respond({ kd: 1 }, 2, 3)).toEqual([4, 0, 0]);
  });

  test('sums the three terms', () => {
    expect(respond({ kp: 1, ki: 1, kd: 1 }, 2, 3)).toEqual([7, 4, 5]);
  });

  test('reads gains from a parameter store', () => {
    const store = new ParameterStore('plant', { plant: { blocks: { speed: { kp: 3 } } } });

    expect(PID.fromStore('speed', store, { ki: 0.5 }).params).toEqual({ kp: 3, ki: 0.5, kd: 0, acc0: 0 });
  });
});
