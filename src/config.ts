/**
 * Environment configuration, loaded from .env and validated once at startup
 */

import * as dotenv from 'dotenv';
import { join, resolve } from 'path';
import { z } from 'zod';

dotenv.config();

// Blank values (`TEMPERATURE=`) take the default
const blankAsUnset = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const EnvSchema = z.object({
  GEMINI_API_KEY: z.string().trim().optional(),
  GEMINI_MODEL: z.preprocess(blankAsUnset, z.string().min(1).default('gemini-2.5-flash')),
  TEMPERATURE: z.preprocess(blankAsUnset, z.coerce.number().min(0).max(2).default(0.2)),
  API_PORT: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(8000)),
  CROP_DATA_PATH: z.preprocess(blankAsUnset, z.string().min(1).default(join('data', 'agri.csv'))),
  RAIN_DATA_PATH: z.preprocess(blankAsUnset, z.string().min(1).default(join('data', 'rain.csv'))),
  SOIL_DATA_PATH: z.preprocess(blankAsUnset, z.string().min(1).default(join('data', 'soil.csv'))),
  MODEL_TIMEOUT_MS: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(120_000)),
  RETRY_MAX_ATTEMPTS: z.preprocess(blankAsUnset, z.coerce.number().int().min(1).default(3)),
  RETRY_BASE_DELAY_MS: z.preprocess(blankAsUnset, z.coerce.number().int().min(0).default(1000)),
});

export interface AppConfig {
  apiKey?: string;
  model: string;
  temperature: number;
  port: number;
  sources: {
    crop: string;
    rainfall: string;
    soil: string;
  };
  modelTimeoutMs: number;
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);

  return {
    // An empty key counts as unset
    apiKey: parsed.GEMINI_API_KEY || undefined,
    model: parsed.GEMINI_MODEL,
    temperature: parsed.TEMPERATURE,
    port: parsed.API_PORT,
    sources: {
      crop: resolve(process.cwd(), parsed.CROP_DATA_PATH),
      rainfall: resolve(process.cwd(), parsed.RAIN_DATA_PATH),
      soil: resolve(process.cwd(), parsed.SOIL_DATA_PATH),
    },
    modelTimeoutMs: parsed.MODEL_TIMEOUT_MS,
    retry: {
      maxAttempts: parsed.RETRY_MAX_ATTEMPTS,
      baseDelayMs: parsed.RETRY_BASE_DELAY_MS,
    },
  };
}
