import { FeatureName, FeatureVector, optimalFeatureVector } from '../services/crops';
import { parseFeatureVector } from '../services/features';
import { YieldModelStore } from '../services/modelStore';
import {
  MAX_CONFIDENCE,
  MIN_CONFIDENCE,
  NO_RISK_FACTORS,
  assessRiskFactors,
  calculateConfidence,
  predictYield
} from '../services/yieldPredictor';
import { InvalidFeatureError, ModelNotReadyError, UnsupportedCropError } from '../utils/errors';
import { seededRandom, uniform } from '../utils/random';

const inRange: FeatureVector = {
  phLevel: 6.5,
  organicMatter: 3,
  nitrogen: 30,
  phosphorus: 20,
  potassium: 150,
  temperature: 20,
  rainfall: 800,
  humidity: 60
};

describe('calculateConfidence', () => {
  it('subtracts the uncertainty draw from the closeness score', () => {
    expect(calculateConfidence(inRange, () => 0.5)).toBeCloseTo(0.9, 10);
    expect(calculateConfidence(inRange, () => 0)).toBeCloseTo(MAX_CONFIDENCE, 10);
  });

  it('floors hopeless conditions', () => {
    const hopeless: FeatureVector = {
      phLevel: 14,
      organicMatter: 100,
      nitrogen: 1000,
      phosphorus: 1000,
      potassium: 10000,
      temperature: -60,
      rainfall: 0,
      humidity: 0
    };
    expect(calculateConfidence(hopeless, () => 0.5)).toBe(MIN_CONFIDENCE);
  });

  it('stays within bounds over many random draws', () => {
    const random = seededRandom(123);
    for (let i = 0; i < 1000; i++) {
      const features: FeatureVector = {
        phLevel: uniform(random, 0, 14),
        organicMatter: uniform(random, 0, 20),
        nitrogen: uniform(random, 0, 200),
        phosphorus: uniform(random, 0, 200),
        potassium: uniform(random, 0, 800),
        temperature: uniform(random, -20, 50),
        rainfall: uniform(random, 0, 4000),
        humidity: uniform(random, 0, 100)
      };
      const confidence = calculateConfidence(features);
      expect(confidence).toBeGreaterThanOrEqual(MIN_CONFIDENCE);
      expect(confidence).toBeLessThanOrEqual(MAX_CONFIDENCE);
    }
  });
});

describe('assessRiskFactors', () => {
  it('finds nothing at the wheat optimum', () => {
    expect(assessRiskFactors(optimalFeatureVector('Wheat'))).toEqual({ level: 'Low', score: 0, factors: [] });
  });

  it('flags hot, dry rice as high risk', () => {
    const risk = assessRiskFactors({ ...optimalFeatureVector('Rice'), temperature: 40, humidity: 30 });
    expect(risk.level).toBe('High');
    expect(risk.score).toBe(5);
    expect(risk.factors).toEqual([
      'Suboptimal pH levels may reduce yield',
      'Extreme temperatures may stress crops',
      'Extreme humidity may cause moisture stress or disease'
    ]);
  });

  it('scores rainfall extremes separately', () => {
    expect(assessRiskFactors({ ...inRange, rainfall: 250 }).factors).toEqual([
      'Insufficient rainfall may require additional irrigation'
    ]);
    expect(assessRiskFactors({ ...inRange, rainfall: 2500 }).score).toBe(2);
    expect(assessRiskFactors({ ...inRange, rainfall: 1600 }).level).toBe('Low');
  });

  const AWAY_FROM_OPTIMUM: ReadonlyArray<[FeatureName, number[]]> = [
    ['phLevel', [6.5, 5.9, 5.4, 4.0]],
    ['phLevel', [6.5, 7.6, 8.1, 9.0]],
    ['temperature', [20, 16, 14, 9, 0, -20]],
    ['temperature', [20, 31, 36, 45]],
    ['rainfall', [800, 450, 250, 0]],
    ['rainfall', [800, 1600, 2100, 3000]],
    ['humidity', [60, 44, 34, 0]],
    ['humidity', [60, 91, 96, 100]],
    ['nitrogen', [30, 14, 0]],
    ['phosphorus', [20, 9, 0]],
    ['potassium', [150, 79, 0]]
  ];

  it.each(AWAY_FROM_OPTIMUM)('never lowers the score as %s moves through %j', (feature, values) => {
    const scores = values.map((value) => assessRiskFactors({ ...inRange, [feature]: value }).score);
    expect(scores[0]).toBe(0);
    expect(scores[scores.length - 1]).toBeGreaterThan(0);
    for (let i = 1; i < scores.length; i++) {
      expect(scores[i]).toBeGreaterThanOrEqual(scores[i - 1]);
    }
  });

  it('adds a point per depleted nutrient', () => {
    const depleted = { ...inRange, nitrogen: 10, phosphorus: 5, potassium: 50 };
    expect(assessRiskFactors(depleted)).toMatchObject({ level: 'Medium', score: 3 });
  });
});

describe('parseFeatureVector', () => {
  it('fills missing weather with the fallback readings', () => {
    const parsed = parseFeatureVector({ phLevel: 6.5, organicMatter: 3, nitrogen: 30, phosphorus: 20, potassium: 150 });
    expect(parsed).toMatchObject({ temperature: 22, rainfall: 800, humidity: 65 });
  });

  it('treats blank form fields as missing', () => {
    const parsed = parseFeatureVector({
      phLevel: '6.5',
      organicMatter: '3',
      nitrogen: '30',
      phosphorus: '20',
      potassium: '150',
      temperature: ''
    });
    expect(parsed.phLevel).toBe(6.5);
    expect(parsed.temperature).toBe(22);
  });

  it('names the missing field', () => {
    try {
      parseFeatureVector({ organicMatter: 3, nitrogen: 30, phosphorus: 20, potassium: 150 });
      throw new Error('expected a validation error');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidFeatureError);
      if (err instanceof InvalidFeatureError) expect(err.fields).toEqual(['phLevel']);
    }
  });
});

describe('predictYield', () => {
  const store = new YieldModelStore({ samplesPerCrop: 150, training: { nEstimators: 10 } });

  beforeAll(() => {
    store.initialize();
  });

  it('predicts for a healthy wheat field', () => {
    const result = predictYield(
      store,
      { cropType: 'Wheat', features: optimalFeatureVector('Wheat'), farmArea: 2 },
      { random: () => 0.5 }
    );
    expect(result.cropType).toBe('Wheat');
    expect(result.yieldPerHa).toBeGreaterThan(0);
    expect(result.totalYield).toBeCloseTo(result.yieldPerHa * 2, 10);
    expect(result.confidence).toBeCloseTo(0.9, 10);
    expect(result.riskLevel).toBe('Low');
    expect(result.riskFactors).toBe(NO_RISK_FACTORS);

    expect(result.featureImportance).toHaveLength(8);
    const importances = result.featureImportance.map((f) => f.importance);
    expect(importances).toEqual([...importances].sort((a, b) => b - a));
    expect(importances.reduce((sum, v) => sum + v, 0)).toBeCloseTo(1, 6);
  });

  it('defaults the farm area to one hectare', () => {
    const result = predictYield(store, { cropType: 'Corn', features: optimalFeatureVector('Corn') });
    expect(result.totalYield).toBe(result.yieldPerHa);
  });

  it('joins risk factors for display', () => {
    const result = predictYield(store, {
      cropType: 'Rice',
      features: { ...optimalFeatureVector('Rice'), temperature: 40, humidity: 30 }
    });
    expect(result.riskLevel).toBe('High');
    expect(result.riskFactors).toBe(
      'Suboptimal pH levels may reduce yield; Extreme temperatures may stress crops; ' +
        'Extreme humidity may cause moisture stress or disease'
    );
  });

  it('rejects unknown crops', () => {
    expect(() => predictYield(store, { cropType: 'Barley', features: inRange })).toThrow(UnsupportedCropError);
  });

  it('rejects a negative farm area', () => {
    expect(() => predictYield(store, { cropType: 'Wheat', features: inRange, farmArea: -1 })).toThrow(
      InvalidFeatureError
    );
  });

  it('needs a trained model', () => {
    expect(() => predictYield(new YieldModelStore(), { cropType: 'Soybeans', features: inRange })).toThrow(
      ModelNotReadyError
    );
  });
});
