import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { z } from 'zod';
import {
  NumberType,
  ParameterError,
  ParameterStore,
  SimulationBuilder,
  SimulationError,
  mergeParams,
} from '../../src/index.js';
import { ConstBlock } from '../fixtures/blocks.js';

const GainSchema = z.object({ k: z.number(), offset: z.number() });

describe('mergeParams', () => {
  test('merges nested objects key by key', () => {
    expect(mergeParams({ a: 1, nested: { x: 1, y: 2 } }, { nested: { y: 3 }, b: 4 })).toEqual({
      a: 1,
      nested: { x: 1, y: 3 },
      b: 4,
    });
  });

  test('replaces arrays and scalars', () => {
    expect(mergeParams({ list: [1, 2, 3] }, { list: [9] })).toEqual({ list: [9] });
    expect(mergeParams(1, 'x')).toBe('x');
    expect(mergeParams({ a: 1 }, undefined)).toEqual({ a: 1 });
  });
});

describe('ParameterStore', () => {
  test('persisted values override block defaults', () => {
    const store = new ParameterStore('plant', { plant: { blocks: { gain: { k: 2 } } } });

    expect(store.getBlockParams('gain', GainSchema, { k: 1, offset: 5 })).toEqual({ k: 2, offset: 5 });
    expect(store.getBlockParams('other', GainSchema, { k: 1, offset: 5 })).toEqual({ k: 1, offset: 5 });
  });

  test('looks up block names containing dots verbatim', () => {
    const store = new ParameterStore('plant', { plant: { blocks: { 'motor.gain': { k: 7 } } } });

    expect(store.getBlockParams('motor.gain', GainSchema, { k: 1, offset: 0 })).toEqual({ k: 7, offset: 0 });
  });

  test('rejects persisted values that fail the schema', () => {
    const store = new ParameterStore('plant', { plant: { blocks: { gain: { k: 'fast' } } } });

    try {
      store.getBlockParams('gain', GainSchema, { k: 1, offset: 0 });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ParameterError);
      if (e instanceof ParameterError) {
        expect(e.key).toBe('plant.blocks.gain');
        expect(e.message).toMatch(/^Invalid parameters for 'plant\.blocks\.gain': k: /);
      }
    }
  });

  test('fills system parameters with their defaults', () => {
    const store = new ParameterStore('plant', { plant: { params: { dt: 0.1 } } });

    expect(store.getSystemParams({ dt: 0.01 })).toEqual({ dt: 0.1, maxIter: 0 });
  });

  test('snapshots the effective values of every lookup', () => {
    const store = new ParameterStore('plant', { plant: { params: { maxIter: 10 }, blocks: { gain: { k: 2 } } } });
    store.getSystemParams({ dt: 0.5 });
    store.getBlockParams('gain', GainSchema, { k: 1, offset: 3 });

    expect(store.snapshot()).toEqual({
      plant: {
        params: { dt: 0.5, maxIter: 10 },
        blocks: { gain: { k: 2, offset: 3 } },
      },
    });
  });

  test('builds with the stored simulation parameters', () => {
    const store = new ParameterStore('plant', { plant: { params: { maxIter: 3 } } });
    const sim = new SimulationBuilder()
      .addBlock(new ConstBlock('c', NumberType, 1), {}, { y: 'x' })
      .buildFromStore('plant', store, { dt: 0.1 });

    expect(sim.params).toEqual({ dt: 0.1, maxIter: 3 });
    expect(sim.run()).toBe(3);
  });

  test('save needs a backing file', () => {
    expect(() => new ParameterStore('plant').save()).toThrow(SimulationError);
  });

  describe('with a file', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tickflow-params-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    test('a missing file yields an empty store', () => {
      const store = ParameterStore.load(path.join(dir, 'absent.json'), 'plant');
      expect(store.getBlockParams('gain', GainSchema, { k: 1, offset: 0 })).toEqual({ k: 1, offset: 0 });
    });

    test('round-trips effective values through save and load', () => {
      const file = path.join(dir, 'params.json');
      const first = ParameterStore.load(file, 'plant');
      first.getSystemParams({ dt: 0.02 });
      first.getBlockParams('gain', GainSchema, { k: 4, offset: 1 });
      first.save();

      expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual({
        plant: { params: { dt: 0.02, maxIter: 0 }, blocks: { gain: { k: 4, offset: 1 } } },
      });

      const second = ParameterStore.load(file, 'plant');
      expect(second.getBlockParams('gain', GainSchema, { k: 0, offset: 0 })).toEqual({ k: 4, offset: 1 });
    });

    test('rejects malformed files', () => {
      const broken = path.join(dir, 'broken.json');
      fs.writeFileSync(broken, '{ "plant": ', 'utf-8');
      expect(() => ParameterStore.load(broken, 'plant')).toThrow(ParameterError);

      const list = path.join(dir, 'list.json');
      fs.writeFileSync(list, '[1, 2]', 'utf-8');
      expect(() => ParameterStore.load(list, 'plant')).toThrow('the file must contain a JSON object');
    });
  });
});
