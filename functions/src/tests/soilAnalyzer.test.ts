import { analyzeSoilHealth, parseSoilValues, scoreAgainstRange } from '../services/soilAnalyzer';
import { InvalidFeatureError } from '../utils/errors';

const BASELINE_PRACTICES = [
  'Maintain crop rotation to preserve soil health',
  'Consider precision agriculture techniques for optimal nutrient management',
  'Implement sustainable farming practices to build long-term soil fertility'
];

describe('scoreAgainstRange', () => {
  it('scores inside, below and above the range', () => {
    expect(scoreAgainstRange(30, [20, 50])).toBe(100);
    expect(scoreAgainstRange(10, [20, 50])).toBe(50);
    expect(scoreAgainstRange(75, [20, 50])).toBe(50);
    expect(scoreAgainstRange(200, [20, 50])).toBe(0);
  });

  it('never rises as a value moves further below the range', () => {
    const scores = [20, 15, 10, 5, 0].map((n) => scoreAgainstRange(n, [20, 50]));
    for (let i = 1; i < scores.length; i++) expect(scores[i]).toBeLessThanOrEqual(scores[i - 1]);
  });

  it('never rises as a value moves further above the range', () => {
    const scores = [50, 55, 75, 99, 100, 150].map((n) => scoreAgainstRange(n, [20, 50]));
    expect([scores[0], scores[2], scores[4], scores[5]]).toEqual([100, 50, 0, 0]);
    for (let i = 1; i < scores.length; i++) expect(scores[i]).toBeLessThanOrEqual(scores[i - 1]);
  });
});

describe('analyzeSoilHealth', () => {
  it('rates a balanced soil as excellent', () => {
    const result = analyzeSoilHealth({
      ph: 6.5,
      organicMatter: 3.0,
      nitrogen: 25,
      phosphorus: 20,
      potassium: 150,
      calcium: 1200,
      magnesium: 120
    });
    expect(result.overallScore).toBe(100);
    expect(result.rating).toBe('Excellent');
    expect(result.deficiencies).toEqual([]);
    expect(result.excesses).toEqual([]);
    expect(result.recommendations).toEqual({ immediate: [], shortTerm: [], longTerm: BASELINE_PRACTICES });
  });

  it('averages only the parameters provided', () => {
    const result = analyzeSoilHealth({ ph: 6.5, nitrogen: 10 });
    expect(result.parameterScores).toEqual({ ph: 100, nitrogen: 50 });
    expect(result.overallScore).toBe(75);
    expect(result.rating).toBe('Good');
  });

  it('recommends lime for acidic soil', () => {
    const result = analyzeSoilHealth({ ph: 5.0 });
    expect(result.deficiencies).toEqual([{ parameter: 'ph', current: 5, optimalMin: 6, severity: 'Medium' }]);
    expect(result.recommendations.immediate).toEqual(['Apply lime to raise pH from 5 to 6.0-7.0 range']);
    expect(result.recommendations.shortTerm).toEqual(['Retest pH after 3-4 months to monitor lime effectiveness']);
  });

  it('separates severe from mild nutrient deficits', () => {
    const severe = analyzeSoilHealth({ nitrogen: 8 });
    expect(severe.deficiencies[0].severity).toBe('High');
    expect(severe.recommendations.immediate).toEqual([
      'Apply nitrogen fertilizer - severe deficiency detected',
      'Conduct comprehensive soil remediation program'
    ]);

    const mild = analyzeSoilHealth({ nitrogen: 15 });
    expect(mild.recommendations.immediate).toEqual([]);
    expect(mild.recommendations.shortTerm).toEqual(['Increase nitrogen levels through targeted fertilization']);
  });

  it('flags excess potassium', () => {
    const result = analyzeSoilHealth({ ph: 6.5, nitrogen: 30, potassium: 400 });
    expect(result.overallScore).toBe(80);
    expect(result.excesses).toEqual([{ parameter: 'potassium', current: 400, optimalMax: 250, severity: 'High' }]);
    expect(result.recommendations.immediate).toEqual(['Reduce potassium applications - excess levels detected']);
  });

  it('checks the calcium to magnesium ratio', () => {
    const result = analyzeSoilHealth({ calcium: 1200, magnesium: 500 });
    expect(result.recommendations.shortTerm).toEqual([
      'Calcium to magnesium ratio is low - consider calcium applications'
    ]);
  });

  it('calls for remediation when the soil is poor overall', () => {
    const result = analyzeSoilHealth({ ph: 3, organicMatter: 0.5 });
    expect(result.overallScore).toBe(35);
    expect(result.rating).toBe('Very Poor');
    expect(result.recommendations.immediate).toEqual([
      'Apply lime to raise pH from 3 to 6.0-7.0 range',
      'Add compost or well-rotted manure to increase organic matter',
      'Conduct comprehensive soil remediation program'
    ]);
  });

  it('needs at least one parameter', () => {
    expect(() => analyzeSoilHealth({})).toThrow(InvalidFeatureError);
  });
});

describe('parseSoilValues', () => {
  it('reads form strings and drops blanks and unknown keys', () => {
    expect(parseSoilValues({ ph: '6.2', nitrogen: '', sulfur: 12 })).toEqual({ ph: 6.2 });
  });

  it('rejects an impossible pH', () => {
    expect(() => parseSoilValues({ ph: 15 })).toThrow(InvalidFeatureError);
  });
});
