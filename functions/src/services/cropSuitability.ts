import { CropType, NutrientTriple, Range, getCropProfile } from './crops';
import { SoilValues, scoreAgainstRange } from './soilAnalyzer';
import { InvalidFeatureError } from '../utils/errors';

const PREFERENCE_PARAMETERS = ['ph', 'nitrogen', 'phosphorus', 'potassium'] as const;
export type PreferenceParameter = (typeof PREFERENCE_PARAMETERS)[number];

export type SuitabilityStatus = 'Optimal' | 'Suboptimal' | 'Poor';

export type ParameterSuitability = {
  score: number;
  current: number;
  optimalRange: Range;
  status: SuitabilityStatus;
};

export type LimitingFactor = {
  parameter: PreferenceParameter;
  current: number;
  neededRange: Range;
  score: number;
};

export type CropSuitability = {
  crop: CropType;
  overallSuitability: number;
  parameterSuitability: Partial<Record<PreferenceParameter, ParameterSuitability>>;
  limitingFactors: LimitingFactor[];
  recommendations: string[];
};

export type NutrientAmounts = { nitrogen: number; phosphorus: number; potassium: number };

export type ScheduleStage = 'prePlant' | 'earlyGrowth' | 'midGrowth' | 'lateGrowth';
export type StageApplication = { N: number; P2O5: number; K2O: number; timing: string };

export type FertilizerCost = {
  nitrogenCost: number;
  phosphorusCost: number;
  potassiumCost: number;
  totalCost: number;
  costPerHectare: number;
  currency: 'USD';
};

export type FertilizerPlan = {
  cropType: CropType;
  targetYield: number;
  totalNutrientsNeeded: NutrientAmounts;
  soilAvailable: NutrientAmounts;
  fertilizerNeeded: NutrientAmounts;
  applicationSchedule: Record<ScheduleStage, StageApplication>;
  estimatedCost: FertilizerCost;
};

const LIMITING_SCORE = 70;

// Soil test defaults (ppm) when a nutrient was not measured.
const DEFAULT_SOIL_NUTRIENTS = { nitrogen: 25, phosphorus: 20, potassium: 150 };
const P_TO_P2O5 = 2.29;
const K_TO_K2O = 1.2;
const AVAILABILITY = { nitrogen: 0.5, phosphorus: 0.3, potassium: 0.8 };
export const PRICE_PER_KG = { nitrogen: 1.2, phosphorus: 1.5, potassium: 0.8 };

const STAGE_TIMING: Readonly<Record<ScheduleStage, string>> = {
  prePlant: 'Before planting or at planting',
  earlyGrowth: '2-4 weeks after emergence',
  midGrowth: '6-8 weeks after emergence',
  lateGrowth: 'Before reproductive stage'
};

const round = (value: number, digits: number) => Number(value.toFixed(digits));

function statusFor(score: number): SuitabilityStatus {
  if (score === 100) return 'Optimal';
  return score > LIMITING_SCORE ? 'Suboptimal' : 'Poor';
}

function limitingFactorAdvice(factor: LimitingFactor, crop: CropType): string {
  const [min, max] = factor.neededRange;
  const low = factor.current < min;
  switch (factor.parameter) {
    case 'ph':
      return low
        ? `Apply lime to raise pH to ${min}-${max} range for ${crop}`
        : `Apply sulfur to lower pH to ${min}-${max} range for ${crop}`;
    case 'nitrogen':
      return low
        ? `Apply nitrogen fertilizer to reach ${min}-${max} ppm for ${crop}`
        : `Reduce nitrogen applications - current levels exceed ${crop} requirements`;
    case 'phosphorus':
    case 'potassium':
      return low
        ? `Apply ${factor.parameter} fertilizer to reach ${min}-${max} ppm for ${crop}`
        : `Reduce ${factor.parameter} applications for ${crop}`;
  }
}

export function analyzeCropSuitability(soil: SoilValues, cropType: CropType): CropSuitability {
  const profile = getCropProfile(cropType);
  const parameterSuitability: CropSuitability['parameterSuitability'] = {};
  const limitingFactors: LimitingFactor[] = [];
  let total = 0;
  let count = 0;

  for (const parameter of PREFERENCE_PARAMETERS) {
    const current = soil[parameter];
    if (current === undefined) continue;
    const range = profile.soilPreferences[parameter];
    const score = scoreAgainstRange(current, range);
    parameterSuitability[parameter] = { score, current, optimalRange: range, status: statusFor(score) };
    if (score < LIMITING_SCORE) limitingFactors.push({ parameter, current, neededRange: range, score });
    total += score;
    count += 1;
  }

  const overallSuitability = count ? Math.round(total / count) : 0;

  const recommendations: string[] = [];
  if (overallSuitability >= 85) {
    recommendations.push(`Soil conditions are excellent for ${cropType} production`);
    recommendations.push('Maintain current soil management practices');
  } else if (overallSuitability >= LIMITING_SCORE) {
    recommendations.push(`Soil conditions are good for ${cropType} with minor adjustments needed`);
  } else {
    recommendations.push(`Soil requires significant improvements for optimal ${cropType} production`);
  }
  for (const factor of limitingFactors) recommendations.push(limitingFactorAdvice(factor, cropType));
  recommendations.push(...profile.managementAdvice);

  return { crop: cropType, overallSuitability, parameterSuitability, limitingFactors, recommendations };
}

function splitByStage(split: NutrientTriple, needed: NutrientAmounts, timing: string): StageApplication {
  return {
    N: round(needed.nitrogen * split.n, 1),
    P2O5: round(needed.phosphorus * split.p2o5, 1),
    K2O: round(needed.potassium * split.k2o, 1),
    timing
  };
}

export function estimateFertilizerCost(needed: NutrientAmounts): FertilizerCost {
  const nitrogen = needed.nitrogen * PRICE_PER_KG.nitrogen;
  const phosphorus = needed.phosphorus * PRICE_PER_KG.phosphorus;
  const potassium = needed.potassium * PRICE_PER_KG.potassium;
  const total = round(nitrogen + phosphorus + potassium, 2);
  return {
    nitrogenCost: round(nitrogen, 2),
    phosphorusCost: round(phosphorus, 2),
    potassiumCost: round(potassium, 2),
    totalCost: total,
    costPerHectare: total,
    currency: 'USD'
  };
}

/**
 * Fertilizer (kg/ha of N, P2O5, K2O) still needed to reach `targetYield` t/ha
 * after crediting the plant-available share of what the soil already holds.
 */
export function generateFertilizerPlan(soil: SoilValues, cropType: CropType, targetYield: number): FertilizerPlan {
  if (!Number.isFinite(targetYield) || targetYield < 0) {
    throw new InvalidFeatureError(`Invalid target yield: ${targetYield}`, ['targetYield']);
  }
  const { nutrientsPerTon, stageSplit } = getCropProfile(cropType);

  const totalNutrientsNeeded: NutrientAmounts = {
    nitrogen: nutrientsPerTon.n * targetYield,
    phosphorus: nutrientsPerTon.p2o5 * targetYield,
    potassium: nutrientsPerTon.k2o * targetYield
  };
  const soilAvailable: NutrientAmounts = {
    nitrogen: soil.nitrogen ?? DEFAULT_SOIL_NUTRIENTS.nitrogen,
    phosphorus: (soil.phosphorus ?? DEFAULT_SOIL_NUTRIENTS.phosphorus) * P_TO_P2O5,
    potassium: (soil.potassium ?? DEFAULT_SOIL_NUTRIENTS.potassium) * K_TO_K2O
  };
  const exact: NutrientAmounts = {
    nitrogen: Math.max(0, totalNutrientsNeeded.nitrogen - soilAvailable.nitrogen * AVAILABILITY.nitrogen),
    phosphorus: Math.max(0, totalNutrientsNeeded.phosphorus - soilAvailable.phosphorus * AVAILABILITY.phosphorus),
    potassium: Math.max(0, totalNutrientsNeeded.potassium - soilAvailable.potassium * AVAILABILITY.potassium)
  };

  return {
    cropType,
    targetYield,
    totalNutrientsNeeded,
    soilAvailable,
    fertilizerNeeded: {
      nitrogen: round(exact.nitrogen, 1),
      phosphorus: round(exact.phosphorus, 1),
      potassium: round(exact.potassium, 1)
    },
    applicationSchedule: {
      prePlant: splitByStage(stageSplit.prePlant, exact, STAGE_TIMING.prePlant),
      earlyGrowth: splitByStage(stageSplit.earlyGrowth, exact, STAGE_TIMING.earlyGrowth),
      midGrowth: splitByStage(stageSplit.midGrowth, exact, STAGE_TIMING.midGrowth),
      lateGrowth: splitByStage(stageSplit.lateGrowth, exact, STAGE_TIMING.lateGrowth)
    },
    estimatedCost: estimateFertilizerCost(exact)
  };
}
