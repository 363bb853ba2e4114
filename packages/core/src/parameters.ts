// src/parameters.ts
// Parameter store: persisted overrides merged over block defaults

import * as fs from 'fs';
import { z } from 'zod';

import { ParameterError, SimulationError } from './errors.js';
import { formatIssues, hasOwn } from './utils.js';
import { SimulationParametersSchema, type SimulationParameters, type SimulationParametersInput } from './types.js';

type ParamTree = Record<string, unknown>;

const ParamTreeSchema = z.record(z.unknown());

function isRecord(value: unknown): value is ParamTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge `override` over `base`. Nested objects merge key by key; anything
 * else in `override` replaces the base value.
 */
export function mergeParams(base: unknown, override: unknown): unknown {
  if (override === undefined) return base;
  if (!isRecord(base) || !isRecord(override)) return override;

  const merged: ParamTree = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergeParams(base[key], value);
  }
  return merged;
}

/**
 * Parameters for one simulation, keyed as `<system>.params` and
 * `<system>.blocks.<block>`. Every lookup records the effective values, so
 * `save` writes back a complete, editable file.
 */
export class ParameterStore {
  private readonly overrides: ParamTree;
  private systemParams: SimulationParameters | undefined;
  private readonly blockParams = new Map<string, unknown>();

  constructor(
    readonly systemName: string,
    overrides: ParamTree = {},
    readonly file?: string
  ) {
    this.overrides = overrides;
  }

  /**
   * Open a store backed by a JSON file. A missing file means no overrides.
   */
  static load(file: string, systemName: string): ParameterStore {
    if (!fs.existsSync(file)) {
      return new ParameterStore(systemName, {}, file);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      throw new ParameterError(file, error.message);
    }

    const parsed = ParamTreeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ParameterError(file, 'the file must contain a JSON object');
    }
    return new ParameterStore(systemName, parsed.data, file);
  }

  /** Simulation parameters (`dt`, `maxIter`) for this system. */
  getSystemParams(defaults: SimulationParametersInput): SimulationParameters {
    const params = this.resolve(['params'], SimulationParametersSchema, defaults);
    this.systemParams = params;
    return params;
  }

  /** Parameters of one block: persisted values over `defaults`. */
  getBlockParams<S extends z.ZodTypeAny>(blockName: string, schema: S, defaults: z.input<S>): z.output<S> {
    const params = this.resolve(['blocks', blockName], schema, defaults);
    this.blockParams.set(blockName, params);
    return params;
  }

  /** Effective values of every lookup so far. */
  snapshot(): ParamTree {
    const system: ParamTree = {};
    if (this.systemParams !== undefined) {
      system.params = this.systemParams;
    }
    system.blocks = Object.fromEntries(this.blockParams);
    return { [this.systemName]: system };
  }

  /** Write the snapshot back to the backing file. */
  save(): void {
    if (this.file === undefined) {
      throw new SimulationError(`Parameter store '${this.systemName}' has no backing file`);
    }
    fs.writeFileSync(this.file, `${JSON.stringify(this.snapshot(), null, 2)}\n`, 'utf-8');
  }

  private resolve<S extends z.ZodTypeAny>(path: string[], schema: S, defaults: z.input<S>): z.output<S> {
    const override = this.lookup(path);
    const parsed = schema.safeParse(mergeParams(defaults, override));
    if (!parsed.success) {
      throw new ParameterError([this.systemName, ...path].join('.'), formatIssues(parsed.error));
    }
    return parsed.data;
  }

  private lookup(path: string[]): unknown {
    let node: unknown = this.overrides;
    for (const key of [this.systemName, ...path]) {
      if (!isRecord(node) || !hasOwn(node, key)) return undefined;
      node = node[key];
    }
    return node;
  }
}
