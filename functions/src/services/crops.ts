import { z } from 'zod';
import rawProfiles from '../data/crop_profiles.json';
import { UnsupportedCropError } from '../utils/errors';

export const CROP_TYPES = ['Wheat', 'Corn', 'Rice', 'Soybeans'] as const;
export type CropType = (typeof CROP_TYPES)[number];

export const GROWTH_STAGES = ['Seedling', 'Vegetative', 'Flowering', 'Maturity'] as const;
export type GrowthStage = (typeof GROWTH_STAGES)[number];

export const PRIORITIES = ['Low', 'Medium', 'High'] as const;
export type Priority = (typeof PRIORITIES)[number];

export const FEATURE_NAMES = [
  'phLevel',
  'organicMatter',
  'nitrogen',
  'phosphorus',
  'potassium',
  'temperature',
  'rainfall',
  'humidity'
] as const;
export type FeatureName = (typeof FEATURE_NAMES)[number];
export type FeatureVector = Record<FeatureName, number>;

const range = z.tuple([z.number(), z.number()]).refine(([lo, hi]) => lo <= hi, 'range must be ascending');
export type Range = [number, number];

const nutrientTriple = z.object({ n: z.number(), p2o5: z.number(), k2o: z.number() });
export type NutrientTriple = z.infer<typeof nutrientTriple>;

const stageList = z.object({
  Seedling: z.array(z.string()),
  Vegetative: z.array(z.string()),
  Flowering: z.array(z.string()),
  Maturity: z.array(z.string())
});

const cropProfileSchema = z.object({
  generation: z.object({
    phLevel: range,
    organicMatter: range,
    nitrogen: range,
    phosphorus: range,
    potassium: range,
    temperature: range,
    rainfall: range,
    humidity: range
  }),
  baseYield: z.number().positive(),
  yieldVariance: z.number().nonnegative(),
  optimal: z.object({
    phLevel: z.number(),
    nitrogen: z.number().positive(),
    phosphorus: z.number().positive(),
    potassium: z.number().positive(),
    temperature: z.number(),
    rainfall: z.number().positive(),
    humidity: z.number()
  }),
  soilPreferences: z.object({
    ph: range,
    nitrogen: range,
    phosphorus: range,
    potassium: range
  }),
  nutrientsPerTon: nutrientTriple,
  stageSplit: z.object({
    prePlant: nutrientTriple,
    earlyGrowth: nutrientTriple,
    midGrowth: nutrientTriple,
    lateGrowth: nutrientTriple
  }),
  growthStages: z.array(z.enum(GROWTH_STAGES)),
  growingSeason: z.object({ start: z.string(), end: z.string() }),
  waterNeeds: z.enum(['Low', 'Medium', 'Medium-High', 'High', 'Very High']),
  fertilizerSchedule: stageList,
  commonPests: z.array(z.string()).min(2),
  optimalConditions: z.object({
    temperature: range,
    humidity: range,
    soilPh: range
  }),
  harvestChecklist: z.array(z.string()),
  managementAdvice: z.array(z.string())
});

export type CropProfile = z.infer<typeof cropProfileSchema>;
export type WaterNeeds = CropProfile['waterNeeds'];

const CROP_PROFILES: Readonly<Record<CropType, CropProfile>> = Object.freeze(
  z
    .object({
      Wheat: cropProfileSchema,
      Corn: cropProfileSchema,
      Rice: cropProfileSchema,
      Soybeans: cropProfileSchema
    })
    .parse(rawProfiles)
);

export function isCropType(value: unknown): value is CropType {
  return CROP_TYPES.some((crop) => crop === value);
}

export function parseCropType(value: unknown): CropType {
  if (!isCropType(value)) throw new UnsupportedCropError(String(value));
  return value;
}

export function getCropProfile(cropType: CropType): CropProfile {
  return CROP_PROFILES[cropType];
}

export function featureVectorToArray(features: FeatureVector): number[] {
  return FEATURE_NAMES.map((name) => features[name]);
}

/** Feature vector sitting on the crop's optimum, with organic matter at the middle of its range. */
export function optimalFeatureVector(cropType: CropType): FeatureVector {
  const { optimal, generation } = getCropProfile(cropType);
  const [omLow, omHigh] = generation.organicMatter;
  return {
    phLevel: optimal.phLevel,
    organicMatter: (omLow + omHigh) / 2,
    nitrogen: optimal.nitrogen,
    phosphorus: optimal.phosphorus,
    potassium: optimal.potassium,
    temperature: optimal.temperature,
    rainfall: optimal.rainfall,
    humidity: optimal.humidity
  };
}
