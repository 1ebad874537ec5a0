import { z } from 'zod';
import { Range } from './crops';
import { InvalidFeatureError } from '../utils/errors';
import { optionalNumeric, parseWith } from '../utils/validation';

export const SOIL_PARAMETERS = [
  'ph',
  'organicMatter',
  'nitrogen',
  'phosphorus',
  'potassium',
  'calcium',
  'magnesium'
] as const;
export type SoilParameter = (typeof SOIL_PARAMETERS)[number];
export type SoilValues = Partial<Record<SoilParameter, number>>;

export const SOIL_OPTIMAL_RANGES: Readonly<Record<SoilParameter, Range>> = {
  ph: [6.0, 7.0],
  organicMatter: [2.5, 5.0],
  nitrogen: [20, 50],
  phosphorus: [15, 40],
  potassium: [100, 250],
  calcium: [1000, 2500],
  magnesium: [75, 200]
};

export type Severity = 'High' | 'Medium';
export type SoilRating = 'Very Poor' | 'Poor' | 'Fair' | 'Good' | 'Excellent';
export type RecommendationTier = 'immediate' | 'shortTerm' | 'longTerm';
export type SoilRecommendations = Record<RecommendationTier, string[]>;

export type Deficiency = { parameter: SoilParameter; current: number; optimalMin: number; severity: Severity };
export type Excess = { parameter: SoilParameter; current: number; optimalMax: number; severity: Severity };

export type SoilAnalysis = {
  overallScore: number;
  rating: SoilRating;
  parameterScores: Partial<Record<SoilParameter, number>>;
  deficiencies: Deficiency[];
  excesses: Excess[];
  recommendations: SoilRecommendations;
};

const optionalNonNegative = () => optionalNumeric(z.number().min(0));

export const soilValuesSchema = z.object({
  ph: optionalNumeric(z.number().min(0).max(14)),
  organicMatter: optionalNumeric(z.number().min(0).max(100)),
  nitrogen: optionalNonNegative(),
  phosphorus: optionalNonNegative(),
  potassium: optionalNonNegative(),
  calcium: optionalNonNegative(),
  magnesium: optionalNonNegative()
});

export function parseSoilValues(input: unknown): SoilValues {
  return parseWith(soilValuesSchema, input, 'soil values');
}

/** 100 inside the range, falling linearly with the relative distance outside it, floored at 0. */
export function scoreAgainstRange(value: number, [min, max]: Range): number {
  if (value >= min && value <= max) return 100;
  if (value < min) return Math.max(0, 100 - ((min - value) / min) * 100);
  return Math.max(0, 100 - ((value - max) / max) * 100);
}

export function ratingForScore(score: number): SoilRating {
  if (score >= 85) return 'Excellent';
  if (score >= 75) return 'Good';
  if (score >= 60) return 'Fair';
  if (score >= 40) return 'Poor';
  return 'Very Poor';
}

type RuleContext = { soil: SoilValues; overallScore: number };

export type SoilRule = {
  id: string;
  when: (ctx: RuleContext) => boolean;
  actions: ReadonlyArray<{ tier: RecommendationTier; message: (ctx: RuleContext) => string }>;
};

const below = (key: SoilParameter, limit: number) => ({ soil }: RuleContext) =>
  soil[key] !== undefined && (soil[key] ?? 0) < limit;
const above = (key: SoilParameter, limit: number) => ({ soil }: RuleContext) =>
  soil[key] !== undefined && (soil[key] ?? 0) > limit;
const text = (message: string) => () => message;

function caMgRatio(soil: SoilValues): number | undefined {
  const { calcium, magnesium } = soil;
  if (calcium === undefined || magnesium === undefined || calcium <= 0 || magnesium <= 0) return undefined;
  return calcium / magnesium;
}

function nutrientRules(nutrient: 'nitrogen' | 'phosphorus' | 'potassium'): SoilRule[] {
  const [min, max] = SOIL_OPTIMAL_RANGES[nutrient];
  const deficitPercent = (soil: SoilValues) => ((min - (soil[nutrient] ?? min)) / min) * 100;
  return [
    {
      id: `${nutrient}-severe-deficiency`,
      when: (ctx) => below(nutrient, min)(ctx) && deficitPercent(ctx.soil) > 50,
      actions: [{ tier: 'immediate', message: text(`Apply ${nutrient} fertilizer - severe deficiency detected`) }]
    },
    {
      id: `${nutrient}-deficiency`,
      when: (ctx) => below(nutrient, min)(ctx) && deficitPercent(ctx.soil) <= 50,
      actions: [{ tier: 'shortTerm', message: text(`Increase ${nutrient} levels through targeted fertilization`) }]
    },
    {
      id: `${nutrient}-excess`,
      when: above(nutrient, max * 1.5),
      actions: [{ tier: 'immediate', message: text(`Reduce ${nutrient} applications - excess levels detected`) }]
    }
  ];
}

/** Evaluated top to bottom; each matching rule appends its actions to their tiers. */
export const SOIL_RULES: readonly SoilRule[] = [
  {
    id: 'ph-acidic',
    when: below('ph', 6.0),
    actions: [
      { tier: 'immediate', message: ({ soil }) => `Apply lime to raise pH from ${soil.ph} to 6.0-7.0 range` },
      { tier: 'shortTerm', message: text('Retest pH after 3-4 months to monitor lime effectiveness') }
    ]
  },
  {
    id: 'ph-alkaline',
    when: above('ph', 8.0),
    actions: [
      { tier: 'immediate', message: ({ soil }) => `Apply sulfur or organic matter to lower pH from ${soil.ph}` },
      { tier: 'shortTerm', message: text('Consider using acidifying fertilizers') }
    ]
  },
  {
    id: 'organic-matter-low',
    when: below('organicMatter', 2.5),
    actions: [
      { tier: 'immediate', message: text('Add compost or well-rotted manure to increase organic matter') },
      { tier: 'longTerm', message: text('Implement cover cropping to build long-term organic matter') }
    ]
  },
  {
    id: 'organic-matter-high',
    when: above('organicMatter', 6.0),
    actions: [{ tier: 'shortTerm', message: text('Monitor drainage as high organic matter can retain excess water') }]
  },
  ...nutrientRules('nitrogen'),
  ...nutrientRules('phosphorus'),
  ...nutrientRules('potassium'),
  {
    id: 'calcium-low',
    when: below('calcium', 1000),
    actions: [{ tier: 'shortTerm', message: text('Apply gypsum or lime to increase calcium levels') }]
  },
  {
    id: 'magnesium-low',
    when: below('magnesium', 75),
    actions: [{ tier: 'shortTerm', message: text('Apply Epsom salt or dolomitic lime for magnesium') }]
  },
  {
    id: 'ca-mg-ratio-low',
    when: ({ soil }) => (caMgRatio(soil) ?? 3) < 3,
    actions: [
      { tier: 'shortTerm', message: text('Calcium to magnesium ratio is low - consider calcium applications') }
    ]
  },
  {
    id: 'ca-mg-ratio-high',
    when: ({ soil }) => (caMgRatio(soil) ?? 10) > 10,
    actions: [
      { tier: 'shortTerm', message: text('Calcium to magnesium ratio is high - consider magnesium applications') }
    ]
  },
  {
    id: 'poor-overall',
    when: ({ overallScore }) => overallScore < 60,
    actions: [
      { tier: 'immediate', message: text('Conduct comprehensive soil remediation program') },
      { tier: 'longTerm', message: text('Implement regular soil testing schedule (every 2-3 years)') }
    ]
  },
  {
    id: 'baseline-practices',
    when: () => true,
    actions: [
      { tier: 'longTerm', message: text('Maintain crop rotation to preserve soil health') },
      { tier: 'longTerm', message: text('Consider precision agriculture techniques for optimal nutrient management') },
      { tier: 'longTerm', message: text('Implement sustainable farming practices to build long-term soil fertility') }
    ]
  }
];

export function generateSoilRecommendations(
  soil: SoilValues,
  overallScore: number,
  rules: readonly SoilRule[] = SOIL_RULES
): SoilRecommendations {
  const out: SoilRecommendations = { immediate: [], shortTerm: [], longTerm: [] };
  const ctx: RuleContext = { soil, overallScore };
  for (const rule of rules) {
    if (!rule.when(ctx)) continue;
    for (const action of rule.actions) out[action.tier].push(action.message(ctx));
  }
  return out;
}

export function analyzeSoilHealth(soil: SoilValues): SoilAnalysis {
  const parameterScores: Partial<Record<SoilParameter, number>> = {};
  const deficiencies: Deficiency[] = [];
  const excesses: Excess[] = [];
  let total = 0;
  let count = 0;

  for (const parameter of SOIL_PARAMETERS) {
    const value = soil[parameter];
    if (value === undefined) continue;
    const [min, max] = SOIL_OPTIMAL_RANGES[parameter];
    const score = scoreAgainstRange(value, SOIL_OPTIMAL_RANGES[parameter]);
    const severity: Severity = score < 50 ? 'High' : 'Medium';
    if (value < min) deficiencies.push({ parameter, current: value, optimalMin: min, severity });
    else if (value > max) excesses.push({ parameter, current: value, optimalMax: max, severity });

    parameterScores[parameter] = score;
    total += score;
    count += 1;
  }

  if (!count) {
    throw new InvalidFeatureError(`No recognised soil parameters; expected one of ${SOIL_PARAMETERS.join(', ')}`);
  }

  const overallScore = Math.round(total / count);
  return {
    overallScore,
    rating: ratingForScore(overallScore),
    parameterScores,
    deficiencies,
    excesses,
    recommendations: generateSoilRecommendations(soil, overallScore)
  };
}
