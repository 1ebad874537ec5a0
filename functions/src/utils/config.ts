import { z } from 'zod';
import { ConfigurationError } from './errors';

const envSchema = z.object({
  OPENWEATHER_API_KEY: z.string().min(1).optional(),
  OPENWEATHER_BASE_URL: z.string().url().default('https://api.openweathermap.org/data/2.5'),
  WEATHER_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  TRAINING_SEED: z.coerce.number().int().default(42),
  SAMPLES_PER_CROP: z.coerce.number().int().min(20).default(1000),
  FOREST_TREES: z.coerce.number().int().positive().default(100)
});

export type AppConfig = {
  openWeatherApiKey?: string;
  openWeatherBaseUrl: string;
  weatherTimeoutMs: number;
  trainingSeed: number;
  samplesPerCrop: number;
  forestTrees: number;
};

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse({
    OPENWEATHER_API_KEY: env.OPENWEATHER_API_KEY || undefined,
    OPENWEATHER_BASE_URL: env.OPENWEATHER_BASE_URL || undefined,
    WEATHER_TIMEOUT_MS: env.WEATHER_TIMEOUT_MS || undefined,
    TRAINING_SEED: env.TRAINING_SEED || undefined,
    SAMPLES_PER_CROP: env.SAMPLES_PER_CROP || undefined,
    FOREST_TREES: env.FOREST_TREES || undefined
  });
  if (!result.success) {
    throw new ConfigurationError([...new Set(result.error.issues.map((issue) => issue.path.join('.')))]);
  }
  const parsed = result.data;
  return {
    openWeatherApiKey: parsed.OPENWEATHER_API_KEY,
    openWeatherBaseUrl: parsed.OPENWEATHER_BASE_URL,
    weatherTimeoutMs: parsed.WEATHER_TIMEOUT_MS,
    trainingSeed: parsed.TRAINING_SEED,
    samplesPerCrop: parsed.SAMPLES_PER_CROP,
    forestTrees: parsed.FOREST_TREES
  };
}
