import {
  CROP_TYPES,
  CropType,
  FEATURE_NAMES,
  FeatureName,
  FeatureVector,
  getCropProfile
} from './crops';
import { RandomSource, gamma, normal, seededRandom, uniform } from '../utils/random';

export type TrainingRow = FeatureVector & {
  cropType: CropType;
  yieldTonsPerHa: number;
};

export type GeneratorOptions = {
  seed?: number;
  samplesPerCrop?: number;
  crops?: readonly CropType[];
};

export const DEFAULT_SEED = 42;
export const DEFAULT_SAMPLES_PER_CROP = 1000;

type Bounded = FeatureName | 'yieldTonsPerHa';
const BOUNDED_COLUMNS: readonly Bounded[] = [...FEATURE_NAMES, 'yieldTonsPerHa'];

export const GLOBAL_BOUNDS: Readonly<Record<Bounded, [number, number]>> = {
  phLevel: [4.0, 9.0],
  organicMatter: [0.5, 10.0],
  nitrogen: [5, 100],
  phosphorus: [5, 100],
  potassium: [50, 500],
  temperature: [5, 45],
  rainfall: [200, 3000],
  humidity: [20, 100],
  yieldTonsPerHa: [0.5, 15.0]
};

const clip = (value: number, [lo, hi]: readonly [number, number]) => Math.min(hi, Math.max(lo, value));

const round = (value: number, digits: number) => {
  const factor = Math.pow(10, digits);
  return Math.round(value * factor) / factor;
};

/**
 * Noise-free yield in t/ha for one set of conditions. Each factor is 1.0 at
 * the crop optimum and floored so a single bad parameter cannot zero the crop;
 * nutrients follow Liebig's law of the minimum.
 */
export function calculateRealisticYield(cropType: CropType, features: FeatureVector): number {
  const { baseYield, optimal } = getCropProfile(cropType);
  const { phLevel, organicMatter, nitrogen, phosphorus, potassium, temperature, rainfall, humidity } = features;

  const phEffect = Math.max(0.3, 1 - Math.abs(phLevel - optimal.phLevel) * 0.15);
  const omEffect = Math.min(1.3, 0.8 + organicMatter / 10);

  const nEffect = Math.min(1, nitrogen / optimal.nitrogen);
  const pEffect = Math.min(1, phosphorus / optimal.phosphorus);
  const kEffect = Math.min(1, potassium / optimal.potassium);
  const nutrientEffect = Math.max(0.2, Math.min(nEffect, pEffect, kEffect));

  const tempEffect = Math.max(0.4, 1 - Math.abs(temperature - optimal.temperature) * 0.03);

  let rainEffect =
    rainfall < optimal.rainfall
      ? rainfall / optimal.rainfall
      : 1 - ((rainfall - optimal.rainfall) / optimal.rainfall) * 0.3;
  rainEffect = Math.max(0.3, Math.min(1.2, rainEffect));

  const humidityEffect = Math.max(0.7, 1 - Math.abs(humidity - optimal.humidity) * 0.01);

  let yieldPerHa =
    baseYield * phEffect * omEffect * nutrientEffect * tempEffect * rainEffect * humidityEffect;

  // heat stress
  if (temperature > optimal.temperature + 5 && humidity < optimal.humidity - 10) {
    yieldPerHa *= 0.85;
  }
  // synergy
  if (phEffect > 0.9 && nutrientEffect > 0.9 && tempEffect > 0.9 && rainEffect > 0.9) {
    yieldPerHa *= 1.1;
  }
  return yieldPerHa;
}

export function generateCropData(cropType: CropType, samples: number, random: RandomSource): TrainingRow[] {
  const { generation: g, yieldVariance } = getCropProfile(cropType);
  const rows: TrainingRow[] = [];

  for (let i = 0; i < samples; i++) {
    const phLevel = uniform(random, g.phLevel[0], g.phLevel[1]);
    const organicMatter = Math.min(gamma(random, 2, 1.5) + g.organicMatter[0], g.organicMatter[1]);
    const nitrogen = clip(gamma(random, 3, g.nitrogen[1] / 6), g.nitrogen);
    const phosphorus = clip(gamma(random, 2.5, g.phosphorus[1] / 5), g.phosphorus);
    const potassium = clip(gamma(random, 4, g.potassium[1] / 8), g.potassium);

    const temperature = clip(
      normal(random, (g.temperature[0] + g.temperature[1]) / 2, (g.temperature[1] - g.temperature[0]) / 6),
      g.temperature
    );
    const rainfall = clip(gamma(random, 2, g.rainfall[1] / 4), g.rainfall);
    const humidity = clip(
      normal(random, (g.humidity[0] + g.humidity[1]) / 2, (g.humidity[1] - g.humidity[0]) / 6),
      g.humidity
    );

    const features: FeatureVector = {
      phLevel,
      organicMatter,
      nitrogen,
      phosphorus,
      potassium,
      temperature,
      rainfall,
      humidity
    };
    let yieldPerHa = calculateRealisticYield(cropType, features);
    yieldPerHa += normal(random, 0, yieldVariance * 0.2);
    yieldPerHa = Math.max(0.5, yieldPerHa);

    rows.push({
      cropType,
      phLevel: round(phLevel, 2),
      organicMatter: round(organicMatter, 2),
      nitrogen: round(nitrogen, 1),
      phosphorus: round(phosphorus, 1),
      potassium: round(potassium, 1),
      temperature: round(temperature, 1),
      rainfall: round(rainfall, 0),
      humidity: round(humidity, 1),
      yieldTonsPerHa: round(yieldPerHa, 2)
    });
  }
  return rows;
}

export function median(values: readonly number[]): number {
  if (!values.length) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * Per crop: nitrogen rises with organic matter, humidity falls with heat and
 * potassium drifts with rainfall. Everything is re-clipped to GLOBAL_BOUNDS.
 */
export function applyRealisticCorrelations(rows: readonly TrainingRow[], random: RandomSource): TrainingRow[] {
  const out = rows.map((row) => ({ ...row }));

  for (const crop of CROP_TYPES) {
    const cropRows = out.filter((row) => row.cropType === crop);
    if (!cropRows.length) continue;

    const omMedian = median(cropRows.map((row) => row.organicMatter));
    const tempMedian = median(cropRows.map((row) => row.temperature));
    const rainMedian = median(cropRows.map((row) => row.rainfall));
    const highOm = cropRows.filter((row) => row.organicMatter > omMedian);
    const highTemp = cropRows.filter((row) => row.temperature > tempMedian);
    const highRain = cropRows.filter((row) => row.rainfall > rainMedian);

    for (const row of highOm) row.nitrogen = round(row.nitrogen * uniform(random, 1.05, 1.2), 1);
    for (const row of highTemp) row.humidity = round(row.humidity * uniform(random, 0.85, 0.95), 1);
    for (const row of highRain) row.potassium = round(row.potassium * uniform(random, 0.9, 1.1), 1);
  }

  for (const row of out) {
    for (const key of BOUNDED_COLUMNS) {
      row[key] = clip(row[key], GLOBAL_BOUNDS[key]);
    }
  }
  return out;
}

export function generateTrainingTable(
  cropType: CropType,
  samples: number,
  options: { seed?: number } = {}
): TrainingRow[] {
  const random = seededRandom(options.seed ?? DEFAULT_SEED);
  return applyRealisticCorrelations(generateCropData(cropType, samples, random), random);
}

export function getAgriculturalData(options: GeneratorOptions = {}): TrainingRow[] {
  const random = seededRandom(options.seed ?? DEFAULT_SEED);
  const samples = options.samplesPerCrop ?? DEFAULT_SAMPLES_PER_CROP;
  const rows: TrainingRow[] = [];
  for (const crop of options.crops ?? CROP_TYPES) {
    rows.push(...generateCropData(crop, samples, random));
  }
  return applyRealisticCorrelations(rows, random);
}

const BASE_YIELDS: Record<CropType, number> = { Wheat: 3.4, Corn: 5.9, Rice: 4.6, Soybeans: 2.8 };
const ANNUAL_TRENDS: Record<CropType, number> = { Wheat: 0.02, Corn: 0.015, Rice: 0.01, Soybeans: 0.025 };

export const REGIONS = ['North America', 'Europe', 'Asia', 'South America', 'Africa', 'Oceania'] as const;
export type Region = (typeof REGIONS)[number];

const REGIONAL_FACTORS: Record<Region, Record<CropType, number>> = {
  'North America': { Wheat: 1.2, Corn: 1.4, Rice: 1.1, Soybeans: 1.3 },
  Europe: { Wheat: 1.3, Corn: 1.0, Rice: 1.2, Soybeans: 1.1 },
  Asia: { Wheat: 0.9, Corn: 0.8, Rice: 1.0, Soybeans: 0.9 },
  'South America': { Wheat: 1.0, Corn: 1.1, Rice: 0.9, Soybeans: 1.2 },
  Africa: { Wheat: 0.7, Corn: 0.6, Rice: 0.8, Soybeans: 0.7 },
  Oceania: { Wheat: 1.1, Corn: 1.2, Rice: 1.3, Soybeans: 1.0 }
};

const SUITABILITY_LABELS = ['Excellent', 'Good', 'Fair', 'Poor'] as const;

export type HistoricalYield = {
  year: number;
  crop: CropType;
  yieldTonsPerHa: number;
  areaHarvestedMillionHa: number;
  productionMillionTons: number;
};

export type RegionalYield = {
  region: Region;
  crop: CropType;
  avgYieldTonsPerHa: number;
  climateSuitability: (typeof SUITABILITY_LABELS)[number];
  technologyAdoption: number;
};

export function getHistoricalYieldData(seed = DEFAULT_SEED): HistoricalYield[] {
  const random = seededRandom(seed);
  const out: HistoricalYield[] = [];
  for (const crop of CROP_TYPES) {
    const base = BASE_YIELDS[crop];
    for (let i = 0; i < 10; i++) {
      let yieldPerHa = base * Math.pow(1 + ANNUAL_TRENDS[crop], i);
      yieldPerHa += normal(random, 0, base * 0.1);
      yieldPerHa = Math.max(base * 0.5, yieldPerHa);
      out.push({
        year: 2015 + i,
        crop,
        yieldTonsPerHa: round(yieldPerHa, 2),
        areaHarvestedMillionHa: round(uniform(random, 50, 200), 1),
        productionMillionTons: round(yieldPerHa * uniform(random, 50, 200), 1)
      });
    }
  }
  return out;
}

export function getRegionalYieldData(seed = DEFAULT_SEED): RegionalYield[] {
  const random = seededRandom(seed);
  const out: RegionalYield[] = [];
  for (const region of REGIONS) {
    for (const crop of CROP_TYPES) {
      const expected = BASE_YIELDS[crop] * REGIONAL_FACTORS[region][crop];
      const yieldPerHa = Math.max(0.5, expected + normal(random, 0, expected * 0.05));
      out.push({
        region,
        crop,
        avgYieldTonsPerHa: round(yieldPerHa, 2),
        climateSuitability: SUITABILITY_LABELS[Math.floor(random() * SUITABILITY_LABELS.length)],
        technologyAdoption: round(uniform(random, 0.3, 0.9), 2)
      });
    }
  }
  return out;
}
