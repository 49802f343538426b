/**
 * @file config.ts
 * @description Host configuration for the frame resizer, read from the environment.
 *
 * @external-interactions
 * - `RESAMPLE_ENABLE_GPU`, `RESAMPLE_MAINTAIN_ASPECT`: 'true' / 'false' / '1' / '0'.
 * - `RESAMPLE_MAX_FRAME_DIMENSION`, `RESAMPLE_GPU_TIMEOUT_MS`: positive integers.
 * - `RESAMPLE_NEAREST_SCALE_THRESHOLD`, `RESAMPLE_TRANSPARENT_ALPHA_THRESHOLD`: numbers.
 *
 * @pitfalls
 * - The GPU is off by default under CI (`CI`, `GITHUB_ACTIONS`, `GITLAB_CI`), where
 *   adapters are usually missing. Set `RESAMPLE_ENABLE_GPU=true` to force it.
 */
import { z } from 'zod';
import {
  DEFAULT_GPU_TIMEOUT_MS,
  DEFAULT_MAX_FRAME_DIMENSION,
  NEAREST_SCALE_THRESHOLD,
  TRANSPARENT_ALPHA_THRESHOLD
} from '../constants';
import { ResampleThresholdsSchema } from '../kernel/schemas';

export type Env = Record<string, string | undefined>;

const BooleanFlag = z.enum(['true', 'false', '1', '0']).transform(v => v === 'true' || v === '1');

export const ResizeConfigSchema = z.object({
  enableGpu: z.boolean(),
  maintainAspect: z.boolean().default(true),
  maxFrameDimension: z.number().int().positive().default(DEFAULT_MAX_FRAME_DIMENSION),
  gpuTimeoutMs: z.number().int().positive().default(DEFAULT_GPU_TIMEOUT_MS),
  thresholds: ResampleThresholdsSchema.default({})
});

export type ResizeConfig = z.output<typeof ResizeConfigSchema>;
export type ResizeConfigInput = z.input<typeof ResizeConfigSchema>;

export const isCiEnvironment = (env: Env): boolean =>
  env.CI === 'true' || env.GITHUB_ACTIONS !== undefined || env.GITLAB_CI !== undefined;

const parseFlag = (env: Env, key: string): boolean | undefined => {
  const raw = env[key];
  if (raw === undefined || raw === '') return undefined;
  const result = BooleanFlag.safeParse(raw.toLowerCase());
  if (!result.success) throw new Error(`Config Error: ${key} must be true/false/1/0, got '${raw}'`);
  return result.data;
};

const parseNumber = (env: Env, key: string): number | undefined => {
  const raw = env[key];
  if (raw === undefined || raw === '') return undefined;
  const result = z.coerce.number().safeParse(raw);
  if (!result.success) throw new Error(`Config Error: ${key} must be a number, got '${raw}'`);
  return result.data;
};

export function resolveResizeConfig(input: ResizeConfigInput): ResizeConfig {
  const result = ResizeConfigSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Config Error: ${details}`);
  }
  return result.data;
}

/**
 * Builds the frame resizer config from environment variables over the defaults.
 */
export function loadResizeConfig(env: Env = process.env): ResizeConfig {
  return resolveResizeConfig({
    enableGpu: parseFlag(env, 'RESAMPLE_ENABLE_GPU') ?? !isCiEnvironment(env),
    maintainAspect: parseFlag(env, 'RESAMPLE_MAINTAIN_ASPECT'),
    maxFrameDimension: parseNumber(env, 'RESAMPLE_MAX_FRAME_DIMENSION'),
    gpuTimeoutMs: parseNumber(env, 'RESAMPLE_GPU_TIMEOUT_MS'),
    thresholds: {
      nearestScaleThreshold: parseNumber(env, 'RESAMPLE_NEAREST_SCALE_THRESHOLD') ?? NEAREST_SCALE_THRESHOLD,
      transparentAlphaThreshold: parseNumber(env, 'RESAMPLE_TRANSPARENT_ALPHA_THRESHOLD') ?? TRANSPARENT_ALPHA_THRESHOLD
    }
  });
}
