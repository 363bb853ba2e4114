// src/config.ts
// Environment configuration (.env via dotenv, validated with zod)

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';

import { ParameterError } from './errors.js';
import type { BuildOptions, SimulationParameters } from './types.js';

const booleanFlag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no', ''])
  .default('')
  .transform((v) => v === '1' || v === 'true' || v === 'yes');

const EnvSchema = z.object({
  TICKFLOW_DT: z.coerce.number().positive().default(0.01),
  TICKFLOW_MAX_ITER: z.coerce.number().int().nonnegative().default(0),
  TICKFLOW_VALIDATE_SIGNALS: booleanFlag,
  TICKFLOW_DEBUG: booleanFlag,
});

export interface TickflowConfig {
  /** Default simulation parameters. */
  parameters: SimulationParameters;
  buildOptions: Required<BuildOptions>;
}

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>;
  /** Defaults to `<cwd>/.env`. */
  dotenvPath?: string;
}

/**
 * Load configuration from a `.env` file, when present, and the environment;
 * variables already set win over the file. Without `options.env` the file is
 * loaded into `process.env`; with it, the file is only read, and
 * `process.env` is left untouched.
 */
export function loadConfig(options: LoadConfigOptions = {}): TickflowConfig {
  const dotenvPath = options.dotenvPath ?? path.resolve(process.cwd(), '.env');
  const hasDotenv = fs.existsSync(dotenvPath);

  let env: Record<string, string | undefined>;
  if (options.env) {
    const fromFile = hasDotenv ? dotenv.parse(fs.readFileSync(dotenvPath)) : {};
    env = { ...fromFile, ...options.env };
  } else {
    if (hasDotenv) {
      dotenv.config({ path: dotenvPath });
    }
    env = process.env;
  }
  const parsed = EnvSchema.safeParse({
    TICKFLOW_DT: env.TICKFLOW_DT,
    TICKFLOW_MAX_ITER: env.TICKFLOW_MAX_ITER,
    TICKFLOW_VALIDATE_SIGNALS: env.TICKFLOW_VALIDATE_SIGNALS?.toLowerCase(),
    TICKFLOW_DEBUG: env.TICKFLOW_DEBUG?.toLowerCase(),
  });
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ParameterError('environment', detail);
  }

  return {
    parameters: { dt: parsed.data.TICKFLOW_DT, maxIter: parsed.data.TICKFLOW_MAX_ITER },
    buildOptions: {
      validateSignals: parsed.data.TICKFLOW_VALIDATE_SIGNALS,
      debug: parsed.data.TICKFLOW_DEBUG,
    },
  };
}
