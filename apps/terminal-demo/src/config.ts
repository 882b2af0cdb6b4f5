import { z } from 'zod';
import {
  DEFAULT_BPM,
  DEFAULT_CANVAS_HEIGHT,
  DEFAULT_CANVAS_WIDTH,
  DEFAULT_LAYER_COUNT,
} from '@beatgrid/protocol';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  BEATGRID_WIDTH: z.coerce.number().int().min(20).default(DEFAULT_CANVAS_WIDTH),
  BEATGRID_HEIGHT: z.coerce.number().int().min(12).default(DEFAULT_CANVAS_HEIGHT),
  BEATGRID_LAYERS: z.coerce.number().int().min(4).default(DEFAULT_LAYER_COUNT),
  BEATGRID_BPM: z.coerce.number().positive().max(6000).default(DEFAULT_BPM),
  BEATGRID_SEED: z
    .string()
    .regex(/^\d+$/, 'must be a non-negative integer')
    .default('1')
    .transform((value) => BigInt(value)),
  BEATGRID_DEBUG: flag,
});

export interface DemoConfig {
  width: number;
  height: number;
  layers: number;
  bpm: number;
  seed: bigint;
  debug: boolean;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Read the demo settings from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DemoConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    width: values.BEATGRID_WIDTH,
    height: values.BEATGRID_HEIGHT,
    layers: values.BEATGRID_LAYERS,
    bpm: values.BEATGRID_BPM,
    seed: values.BEATGRID_SEED,
    debug: values.BEATGRID_DEBUG,
  };
}
