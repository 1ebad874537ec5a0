import { FEATURE_NAMES, FeatureName, FeatureVector, Range, featureVectorToArray, parseCropType } from './crops';
import { parseFeatureVector } from './features';
import { TrainedYieldModel, YieldModelStore } from './modelStore';
import { predictForest } from './model/randomForest';
import { scaleRow } from './model/scaler';
import { InvalidFeatureError } from '../utils/errors';
import { RandomSource, uniform } from '../utils/random';

export type RiskLevel = 'Low' | 'Medium' | 'High';

export type FeatureImportance = { factor: string; importance: number };

export type PredictionRequest = {
  cropType: string;
  features: Readonly<Record<string, unknown>>;
  farmArea?: number;
};

export type PredictionResult = {
  cropType: string;
  yieldPerHa: number;
  totalYield: number;
  confidence: number;
  riskLevel: RiskLevel;
  riskFactors: string;
  featureImportance: FeatureImportance[];
};

export type RiskAssessment = {
  level: RiskLevel;
  score: number;
  factors: string[];
};

export type PredictOptions = {
  /** Source for the model-uncertainty draw; defaults to Math.random. */
  random?: RandomSource;
};

// Global agronomic optima used for confidence, independent of crop.
export const CONFIDENCE_RANGES: Readonly<Record<FeatureName, Range>> = {
  phLevel: [6.0, 7.0],
  organicMatter: [2.5, 5.0],
  nitrogen: [20, 50],
  phosphorus: [15, 40],
  potassium: [100, 250],
  temperature: [15, 30],
  rainfall: [500, 1500],
  humidity: [50, 80]
};

export const MIN_CONFIDENCE = 0.3;
export const MAX_CONFIDENCE = 0.95;

const FEATURE_LABELS: Readonly<Record<FeatureName, string>> = {
  phLevel: 'Ph Level',
  organicMatter: 'Organic Matter',
  nitrogen: 'Nitrogen',
  phosphorus: 'Phosphorus',
  potassium: 'Potassium',
  temperature: 'Temperature',
  rainfall: 'Rainfall',
  humidity: 'Humidity'
};

type RiskBand = { when: (value: number) => boolean; points: number; factor: string };
type RiskCheck = { feature: FeatureName; bands: RiskBand[] };

// Within a check the first matching band wins; checks are independent.
const RISK_CHECKS: readonly RiskCheck[] = [
  {
    feature: 'phLevel',
    bands: [
      { when: (v) => v < 5.5 || v > 8.0, points: 2, factor: 'Extreme pH levels may affect nutrient availability' },
      { when: (v) => v < 6.0 || v > 7.5, points: 1, factor: 'Suboptimal pH levels may reduce yield' }
    ]
  },
  {
    feature: 'temperature',
    bands: [
      { when: (v) => v < 10 || v > 35, points: 2, factor: 'Extreme temperatures may stress crops' },
      { when: (v) => v < 15 || v > 30, points: 1, factor: 'Temperature outside optimal range' }
    ]
  },
  {
    feature: 'rainfall',
    bands: [
      { when: (v) => v < 300, points: 2, factor: 'Insufficient rainfall may require additional irrigation' },
      { when: (v) => v > 2000, points: 2, factor: 'Excessive rainfall may cause waterlogging' },
      { when: (v) => v < 500 || v > 1500, points: 1, factor: 'Rainfall outside optimal range' }
    ]
  },
  {
    feature: 'humidity',
    bands: [
      { when: (v) => v < 35 || v > 95, points: 2, factor: 'Extreme humidity may cause moisture stress or disease' },
      { when: (v) => v < 45 || v > 90, points: 1, factor: 'Humidity outside optimal range' }
    ]
  },
  {
    feature: 'nitrogen',
    bands: [{ when: (v) => v < 15, points: 1, factor: 'Low nitrogen levels may limit growth' }]
  },
  {
    feature: 'phosphorus',
    bands: [{ when: (v) => v < 10, points: 1, factor: 'Low phosphorus levels may affect root development' }]
  },
  {
    feature: 'potassium',
    bands: [{ when: (v) => v < 80, points: 1, factor: 'Low potassium levels may reduce disease resistance' }]
  }
];

export const NO_RISK_FACTORS = 'No significant risk factors identified';

/**
 * Mean closeness of each input to its global optimal range, minus a random
 * uncertainty draw in [0.05, 0.15]. Not deterministic unless `random` is.
 */
export function calculateConfidence(features: FeatureVector, random: RandomSource = Math.random): number {
  let score = 0;
  for (const name of FEATURE_NAMES) {
    const [min, max] = CONFIDENCE_RANGES[name];
    const value = features[name];
    if (value >= min && value <= max) {
      score += 1;
    } else {
      const distance = value < min ? (min - value) / min : (value - max) / max;
      score += Math.max(0, 1 - distance);
    }
  }
  const base = score / FEATURE_NAMES.length;
  const uncertainty = uniform(random, 0.05, 0.15);
  return Math.min(MAX_CONFIDENCE, Math.max(MIN_CONFIDENCE, base - uncertainty));
}

export function assessRiskFactors(features: FeatureVector): RiskAssessment {
  const factors: string[] = [];
  let score = 0;
  for (const check of RISK_CHECKS) {
    const band = check.bands.find((b) => b.when(features[check.feature]));
    if (band) {
      factors.push(band.factor);
      score += band.points;
    }
  }
  const level: RiskLevel = score >= 4 ? 'High' : score >= 2 ? 'Medium' : 'Low';
  return { level, score, factors };
}

export function getFeatureImportance(model: TrainedYieldModel): FeatureImportance[] {
  return FEATURE_NAMES.map((name, i) => ({
    factor: FEATURE_LABELS[name],
    importance: model.forest.featureImportances[i] ?? 0
  })).sort((a, b) => b.importance - a.importance);
}

export function predictYield(
  store: YieldModelStore,
  request: PredictionRequest,
  options: PredictOptions = {}
): PredictionResult {
  const cropType = parseCropType(request.cropType);
  const features = parseFeatureVector(request.features);
  const farmArea = request.farmArea ?? 1;
  if (!Number.isFinite(farmArea) || farmArea < 0) {
    throw new InvalidFeatureError(`Invalid farm area: ${farmArea}`, ['farmArea']);
  }

  // Read once: a concurrent retrain swaps the whole model, never part of it.
  const model = store.getModel(cropType);
  const scaled = scaleRow(model.scaler, featureVectorToArray(features));
  const yieldPerHa = Math.max(0, predictForest(model.forest, scaled));

  const risk = assessRiskFactors(features);
  return {
    cropType,
    yieldPerHa,
    totalYield: Math.max(0, yieldPerHa * farmArea),
    confidence: calculateConfidence(features, options.random),
    riskLevel: risk.level,
    riskFactors: risk.factors.length ? risk.factors.join('; ') : NO_RISK_FACTORS,
    featureImportance: getFeatureImportance(model)
  };
}
