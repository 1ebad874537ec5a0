import { z } from 'zod';
import rawGuidance from '../data/stage_guidance.json';
import {
  CropType,
  GROWTH_STAGES,
  GrowthStage,
  PRIORITIES,
  Priority,
  WaterNeeds,
  getCropProfile,
  parseCropType
} from './crops';
import { blankToUndefined, optionalText, parseWith } from '../utils/validation';

export type Recommendation = {
  action: string;
  timing: string;
  priority: Priority;
  reason: string;
  details: string[];
};

export type RecommendationSet = {
  cropType: CropType;
  growthStage: GrowthStage;
  region: string;
  irrigation: Recommendation;
  fertilization: Recommendation;
  pestControl: Recommendation;
  harvesting: Recommendation;
};

export const WEEKDAYS = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'] as const;
export type Weekday = (typeof WEEKDAYS)[number];
export type WeeklySchedule = Record<Weekday, string[]>;

const priority = z.enum(PRIORITIES);
const byStage = <T extends z.ZodTypeAny>(schema: T) =>
  z.object({ Seedling: schema, Vegetative: schema, Flowering: schema, Maturity: schema });

const guidanceSchema = z.object({
  irrigation: byStage(z.object({ action: z.string(), timing: z.string(), priority, reason: z.string() })),
  irrigationSeasons: z.object({
    summer: z.array(z.string()),
    winter: z.array(z.string()),
    default: z.array(z.string())
  }),
  fertilization: byStage(z.object({ timing: z.string(), priority, details: z.array(z.string()) })),
  pestControl: byStage(z.array(z.string())),
  harvestNotReady: z.array(z.string()),
  harvestGeneral: z.array(z.string()),
  weeklyTasks: byStage(z.array(z.string()).min(1))
});

const GUIDANCE = guidanceSchema.parse(rawGuidance);

const DATE_ONLY = /^\d{4}-(0[1-9]|1[0-2])-(0[1-9]|[12]\d|3[01])$/;

// A bare calendar day keeps the month it names; anything else is read in local time.
const calendarMonth = z.union([
  z
    .string()
    .trim()
    .regex(DATE_ONLY)
    .transform((value) => Number(value.slice(5, 7))),
  z
    .union([z.date(), z.string(), z.number()])
    .pipe(z.coerce.date())
    .transform((date) => date.getMonth() + 1)
]);

export const recommendationRequestSchema = z.object({
  cropType: z.string(),
  growthStage: z.enum(GROWTH_STAGES),
  date: z.preprocess(blankToUndefined, calendarMonth.optional()),
  region: optionalText()
});

export type RecommendationRequest = {
  cropType: string;
  growthStage: string;
  date?: Date | string;
  region?: string;
};

type Season = keyof typeof GUIDANCE.irrigationSeasons;

function seasonFor(month: number): Season {
  if (month >= 6 && month <= 8) return 'summer';
  if (month === 12 || month <= 2) return 'winter';
  return 'default';
}

export function pestPressureFor(month: number): Priority {
  if (month >= 5 && month <= 9) return 'High';
  if (month === 3 || month === 4 || month === 10) return 'Medium';
  return 'Low';
}

type IrrigationAdjustment = { note: string; from: Priority; to: Priority };

const WATER_NEED_ADJUSTMENTS: Partial<Record<WaterNeeds, IrrigationAdjustment>> = {
  'Very High': { note: ' - This crop requires abundant water', from: 'Low', to: 'Medium' },
  Low: { note: ' - This crop is drought tolerant', from: 'High', to: 'Medium' }
};

function irrigationAdvice(crop: CropType, stage: GrowthStage, month: number): Recommendation {
  const base = GUIDANCE.irrigation[stage];
  const adjustment = WATER_NEED_ADJUSTMENTS[getCropProfile(crop).waterNeeds];
  return {
    action: adjustment ? base.action + adjustment.note : base.action,
    timing: base.timing,
    priority: adjustment && base.priority === adjustment.from ? adjustment.to : base.priority,
    reason: base.reason,
    details: [...GUIDANCE.irrigationSeasons[seasonFor(month)]]
  };
}

function fertilizationAdvice(crop: CropType, stage: GrowthStage): Recommendation {
  const stageGuide = GUIDANCE.fertilization[stage];
  const fertilizers = getCropProfile(crop).fertilizerSchedule[stage];
  return {
    action: `Apply ${fertilizers.join(', ')} suitable for ${stage.toLowerCase()} stage`,
    timing: stageGuide.timing,
    priority: stageGuide.priority,
    reason: `${stage} stage requires specific nutrients for optimal development`,
    details: [...stageGuide.details]
  };
}

function pestControlAdvice(crop: CropType, stage: GrowthStage, month: number): Recommendation {
  const { commonPests } = getCropProfile(crop);
  const pressure = pestPressureFor(month);
  return {
    action: `Monitor for ${commonPests.slice(0, 2).join(', ')} and other common pests`,
    timing: 'Weekly scouting recommended during growing season',
    priority: pressure,
    reason: `Seasonal pest pressure is ${pressure.toLowerCase()} for this time of year`,
    details: [...GUIDANCE.pestControl[stage], `Common pests for ${crop}: ${commonPests.join(', ')}`]
  };
}

function harvestingAdvice(crop: CropType, stage: GrowthStage): Recommendation {
  if (stage !== 'Maturity') {
    return {
      action: 'Continue monitoring crop development - not ready for harvest',
      timing: 'Harvesting typically begins when crop reaches maturity stage',
      priority: 'Low',
      reason: `Crop is currently in ${stage.toLowerCase()} stage`,
      details: [...GUIDANCE.harvestNotReady]
    };
  }
  return {
    action: 'Crop is approaching harvest readiness - begin harvest preparations',
    timing: 'Monitor daily for optimal harvest window',
    priority: 'High',
    reason: 'Proper timing is critical for maximizing yield and quality',
    details: [...getCropProfile(crop).harvestChecklist, ...GUIDANCE.harvestGeneral]
  };
}

/**
 * Stage and season driven guidance. Only the month of `date` matters; it
 * defaults to the current month.
 */
export function generateRecommendations(request: RecommendationRequest): RecommendationSet {
  const parsed = parseWith(recommendationRequestSchema, request, 'recommendation request');
  const cropType = parseCropType(parsed.cropType);
  const { growthStage } = parsed;
  const month = parsed.date ?? new Date().getMonth() + 1;

  return {
    cropType,
    growthStage,
    region: parsed.region ?? 'Unknown',
    irrigation: irrigationAdvice(cropType, growthStage, month),
    fertilization: fertilizationAdvice(cropType, growthStage),
    pestControl: pestControlAdvice(cropType, growthStage, month),
    harvesting: harvestingAdvice(cropType, growthStage)
  };
}

export function generateWeeklySchedule(cropType: CropType, growthStage: GrowthStage): WeeklySchedule {
  const schedule: WeeklySchedule = {
    Monday: [],
    Tuesday: [],
    Wednesday: [],
    Thursday: [],
    Friday: [],
    Saturday: [],
    Sunday: []
  };
  GUIDANCE.weeklyTasks[growthStage].forEach((task, i) => {
    schedule[WEEKDAYS[i % WEEKDAYS.length]].push(task);
  });

  // Paddy rice is flooded through establishment.
  if (cropType === 'Rice' && (growthStage === 'Seedling' || growthStage === 'Vegetative')) {
    schedule.Monday.push('Check water level in paddy fields');
    schedule.Friday.push('Monitor water quality and algae growth');
  }
  return schedule;
}
