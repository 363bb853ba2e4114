// src/types.ts
// Core type definitions: step bookkeeping, simulation parameters, build options

import { z } from 'zod';

// ============ Step Types ============

export enum StepResult {
  CONTINUE = 'continue',
  STOP = 'stop',
}

/**
 * Timing of the step being executed. `k` is 1 on the first step.
 */
export interface StepInfo {
  readonly k: number;
  readonly t: number;
  readonly dt: number;
}

export const INITIAL_STEP = 1;

export function initialStepInfo(dt: number): StepInfo {
  return { k: INITIAL_STEP, t: 0, dt };
}

// ============ Simulation Parameters ============

export const SimulationParametersSchema = z.object({
  dt: z.number().positive(),
  /** 0 for unlimited */
  maxIter: z.number().int().nonnegative().default(0),
});

export type SimulationParameters = z.infer<typeof SimulationParametersSchema>;
export type SimulationParametersInput = z.input<typeof SimulationParametersSchema>;

// ============ Build Options ============

export interface BuildOptions {
  /** Check every value written to an output against its signal type's schema. */
  validateSignals?: boolean;
  /** Log the diagnostic graph and the execution order on build. */
  debug?: boolean;
}

// ============ Wiring ============

/** Port name -> signal name. */
export type PortConnections = Readonly<Record<string, string>>;
