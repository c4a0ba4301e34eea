import dotenv from 'dotenv';
import { z } from 'zod';

import type { EngineOptions } from './models/types.js';

dotenv.config();

const envSchema = z
  .object({
    NODE_ENV: z.string().default('development'),
    PORT: z.coerce.number().int().positive().default(4000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    QUALITY_MIN: z.coerce.number().default(0),
    QUALITY_MAX: z.coerce.number().default(1),
    FIT_MIN: z.coerce.number().default(0),
    FIT_MAX: z.coerce.number().default(1),
    CRITERIA_SCALE: z.coerce.number().positive().default(10),
    STRICT_MARKET_FIT: z
      .enum(['true', 'false'])
      .default('true')
      .transform((value) => value === 'true')
  })
  .refine((env) => env.QUALITY_MIN <= env.QUALITY_MAX, { message: 'QUALITY_MIN must not exceed QUALITY_MAX' })
  .refine((env) => env.FIT_MIN <= env.FIT_MAX, { message: 'FIT_MIN must not exceed FIT_MAX' });

export type AppConfig = {
  port: number;
  logLevel: string;
  criteriaScale: number;
  engine: EngineOptions;
};

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL ?? (parsed.NODE_ENV === 'test' ? 'silent' : 'info'),
    criteriaScale: parsed.CRITERIA_SCALE,
    engine: {
      quality: { min: parsed.QUALITY_MIN, max: parsed.QUALITY_MAX },
      fit: { min: parsed.FIT_MIN, max: parsed.FIT_MAX },
      strictMarketFit: parsed.STRICT_MARKET_FIT
    }
  } satisfies AppConfig;
}

export const config = loadConfig(process.env);
