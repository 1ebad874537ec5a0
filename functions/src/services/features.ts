import { z } from 'zod';
import { FeatureVector } from './crops';
import { numeric, numericWithDefault, parseWith } from '../utils/validation';

/** Substituted for any weather reading the caller or the weather supplier cannot provide. */
export const FALLBACK_WEATHER = Object.freeze({
  temperature: 22.0,
  rainfall: 800,
  humidity: 65.0,
  pressure: 1013,
  description: 'unavailable'
});

const soilFeatures = {
  phLevel: numeric(z.number().min(0).max(14)),
  organicMatter: numeric(z.number().min(0).max(100)),
  nitrogen: numeric(z.number().min(0)),
  phosphorus: numeric(z.number().min(0)),
  potassium: numeric(z.number().min(0))
};

const temperature = () => z.number().min(-60).max(70);
const rainfall = () => z.number().min(0);
const humidity = () => z.number().min(0).max(100);

export const featureVectorSchema = z.object({
  ...soilFeatures,
  temperature: numericWithDefault(temperature(), FALLBACK_WEATHER.temperature),
  rainfall: numericWithDefault(rainfall(), FALLBACK_WEATHER.rainfall),
  humidity: numericWithDefault(humidity(), FALLBACK_WEATHER.humidity)
});

export const trainingRowSchema = z.object({
  ...soilFeatures,
  temperature: numeric(temperature()),
  rainfall: numeric(rainfall()),
  humidity: numeric(humidity()),
  yieldTonsPerHa: numeric(z.number().min(0))
});

export function parseFeatureVector(input: unknown): FeatureVector {
  return parseWith(featureVectorSchema, input, 'feature vector');
}
