import { logger } from 'firebase-functions';
import { z } from 'zod';
import { CROP_TYPES, CropType, featureVectorToArray } from './crops';
import { DEFAULT_SAMPLES_PER_CROP, DEFAULT_SEED, TrainingRow, getAgriculturalData } from './dataGenerator';
import { trainingRowSchema } from './features';
import { meanAbsoluteError, r2Score } from './model/metrics';
import { DEFAULT_FOREST_OPTIONS, ForestOptions, RandomForest, fitRandomForest, predictForest } from './model/randomForest';
import { StandardScaler, fitStandardScaler, scaleRow } from './model/scaler';
import { getConfig } from '../utils/config';
import { InvalidFeatureError, ModelNotReadyError } from '../utils/errors';
import { seededRandom, shuffle } from '../utils/random';
import { parseWith } from '../utils/validation';

export type ModelMetrics = {
  mae: number;
  r2: number;
  trainSize: number;
  testSize: number;
  trainedAt: string;
};

export type TrainedYieldModel = Readonly<{
  cropType: CropType;
  scaler: StandardScaler;
  forest: RandomForest;
  metrics: ModelMetrics;
}>;

export type TrainingOptions = Partial<ForestOptions> & {
  testSize?: number;
};

export type StoreOptions = {
  seed?: number;
  samplesPerCrop?: number;
  training?: TrainingOptions;
};

const MIN_TRAINING_ROWS = 10;

const round = (value: number, digits = 4) => Number(value.toFixed(digits));

export function trainYieldModel(
  cropType: CropType,
  rows: readonly TrainingRow[],
  options: TrainingOptions = {}
): TrainedYieldModel {
  if (rows.length < MIN_TRAINING_ROWS) {
    throw new InvalidFeatureError(
      `At least ${MIN_TRAINING_ROWS} training rows are required for ${cropType} (got ${rows.length})`
    );
  }
  const { testSize = 0.2, ...forestOptions } = options;
  const seed = forestOptions.seed ?? DEFAULT_FOREST_OPTIONS.seed;

  const order = shuffle(
    rows.map((_, i) => i),
    seededRandom(seed)
  );
  const testCount = Math.ceil(rows.length * testSize);
  const testIdx = order.slice(0, testCount);
  const trainIdx = order.slice(testCount);

  const features = rows.map((row) => featureVectorToArray(row));
  const targets = rows.map((row) => row.yieldTonsPerHa);

  const scaler = fitStandardScaler(trainIdx.map((i) => features[i]));
  const X = trainIdx.map((i) => scaleRow(scaler, features[i]));
  const y = trainIdx.map((i) => targets[i]);
  const forest = fitRandomForest(X, y, { ...forestOptions, seed });

  const actual = testIdx.map((i) => targets[i]);
  const predicted = testIdx.map((i) => predictForest(forest, scaleRow(scaler, features[i])));

  return Object.freeze({
    cropType,
    scaler: Object.freeze(scaler),
    forest: Object.freeze(forest),
    metrics: Object.freeze({
      mae: round(meanAbsoluteError(actual, predicted)),
      r2: round(r2Score(actual, predicted)),
      trainSize: trainIdx.length,
      testSize: testIdx.length,
      trainedAt: new Date().toISOString()
    })
  });
}

/** Accepts raw rows (e.g. from a request body) and validates every column. */
export function parseTrainingRows(cropType: CropType, input: unknown): TrainingRow[] {
  const rows = parseWith(z.array(trainingRowSchema), input, `${cropType} training rows`);
  return rows.map((row) => ({ ...row, cropType }));
}

/**
 * Holds one trained scaler + forest pair per crop. The map is never mutated:
 * `retrain` builds a complete replacement and swaps the reference, so a
 * reader always sees a whole pair.
 */
export class YieldModelStore {
  private models: ReadonlyMap<CropType, TrainedYieldModel> = new Map();

  constructor(private readonly options: StoreOptions = {}) {}

  isReady(): boolean {
    return CROP_TYPES.every((crop) => this.models.has(crop));
  }

  /** Trains only the crops without a model, so earlier retrains survive. */
  initialize(): void {
    const missing = CROP_TYPES.filter((crop) => !this.models.has(crop));
    if (!missing.length) return;
    const data = getAgriculturalData({
      seed: this.options.seed ?? DEFAULT_SEED,
      samplesPerCrop: this.options.samplesPerCrop ?? DEFAULT_SAMPLES_PER_CROP
    });
    const next = new Map(this.models);
    for (const crop of missing) {
      next.set(crop, this.train(crop, data.filter((row) => row.cropType === crop)));
    }
    this.models = next;
  }

  getModel(cropType: CropType): TrainedYieldModel {
    const model = this.models.get(cropType);
    if (!model) throw new ModelNotReadyError(cropType);
    return model;
  }

  getPerformance(cropType: CropType): ModelMetrics {
    return this.getModel(cropType).metrics;
  }

  retrain(cropType: CropType, rows: readonly TrainingRow[]): ModelMetrics {
    const model = this.train(cropType, rows);
    const next = new Map(this.models);
    next.set(cropType, model);
    this.models = next;
    logger.debug('Swapped yield model', { cropType, trainedAt: model.metrics.trainedAt });
    return model.metrics;
  }

  private train(cropType: CropType, rows: readonly TrainingRow[]): TrainedYieldModel {
    const started = Date.now();
    const model = trainYieldModel(cropType, rows, this.options.training);
    logger.info('Trained yield model', {
      cropType,
      rows: rows.length,
      mae: model.metrics.mae,
      r2: model.metrics.r2,
      durationMs: Date.now() - started
    });
    return model;
  }
}

let store: YieldModelStore | undefined;

export function getYieldModelStore(): YieldModelStore {
  if (!store) {
    const config = getConfig();
    store = new YieldModelStore({
      seed: config.trainingSeed,
      samplesPerCrop: config.samplesPerCrop,
      training: { nEstimators: config.forestTrees, seed: config.trainingSeed }
    });
  }
  store.initialize();
  return store;
}
