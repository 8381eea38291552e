import { formulaConfidence, lengthBoost, sourceBoost, topSimilarityScore } from '@/services/confidence/formula';
import { passage, testConfig } from './helpers/fakes';

const calc = testConfig().config.confidenceCalculation;
const policy = calc.formulaPolicy;

function passagesWith(similarities: number[]) {
  return similarities.map((similarity, i) => passage({ id: `p${i}`, similarity }));
}

describe('formulaConfidence', () => {
  it('scores zero passages as exactly 0 with a reason', () => {
    const result = formulaConfidence({ query: 'q', response: 'x'.repeat(500), passages: [] }, calc);

    expect(result.score).toBe(0);
    expect(result.method).toBe('formula');
    expect(result.breakdown.reason).toBe('no_context_documents');
    expect(result.breakdown.responseLength).toBe(500);
  });

  it('scores zero passages as 0 under non-default weights too', () => {
    const custom = testConfig({
      confidenceCalculation: { formulaWeights: { similarity: 0.2, sourceQuality: 0.3, responseLength: 0.5 } },
    }).config.confidenceCalculation;

    expect(formulaConfidence({ query: 'q', response: 'x'.repeat(300), passages: [] }, custom).score).toBe(0);
  });

  it('combines three passages with default weights', () => {
    const result = formulaConfidence(
      { query: 'q', response: 'a'.repeat(250), passages: passagesWith([0.9, 0.8, 0.76]) },
      calc,
    );

    expect(result.breakdown.similarityScore).toBeCloseTo(0.856, 10);
    expect(result.breakdown.sourceBoost).toBe(1);
    expect(result.breakdown.lengthBoost).toBe(1);
    expect(result.breakdown.highQualitySourceCount).toBe(3);
    expect(result.score).toBeCloseTo(0.8848, 10);
  });

  it('ranks passages by similarity before weighting', () => {
    const result = formulaConfidence(
      { query: 'q', response: 'a'.repeat(250), passages: passagesWith([0.76, 0.9, 0.8]) },
      calc,
    );

    expect(result.score).toBeCloseTo(0.8848, 10);
  });

  it('uses the two-passage weights and partial length boost', () => {
    const result = formulaConfidence(
      { query: 'q', response: 'a'.repeat(150), passages: passagesWith([0.8, 0.6]) },
      calc,
    );

    expect(result.breakdown.similarityScore).toBeCloseTo(0.74, 10);
    expect(result.breakdown.sourceBoost).toBe(0.3);
    expect(result.breakdown.lengthBoost).toBe(0.5);
    expect(result.score).toBeCloseTo(0.672, 10);
  });

  it('uses a single similarity as is', () => {
    const result = formulaConfidence({ query: 'q', response: 'short', passages: passagesWith([0.5]) }, calc);

    expect(result.breakdown.similarityScore).toBe(0.5);
    expect(result.score).toBeCloseTo(0.4, 10);
  });

  it('applies configured weights', () => {
    const custom = testConfig({
      confidenceCalculation: { formulaWeights: { similarity: 0.6, sourceQuality: 0.2, responseLength: 0.2 } },
    }).config.confidenceCalculation;

    const result = formulaConfidence(
      { query: 'q', response: 'a'.repeat(250), passages: passagesWith([0.9, 0.8, 0.76]) },
      custom,
    );

    expect(result.score).toBeCloseTo(0.9136, 10);
    expect(result.breakdown.weights).toEqual({ similarity: 0.6, sourceQuality: 0.2, responseLength: 0.2 });
  });

  it('never decreases as the top similarity rises', () => {
    let previous = -1;
    for (let top = 0.5; top <= 1.0001; top += 0.05) {
      const score = formulaConfidence(
        { query: 'q', response: 'a'.repeat(120), passages: passagesWith([Math.min(top, 1), 0.4, 0.3]) },
        calc,
      ).score;
      expect(score).toBeGreaterThanOrEqual(previous);
      previous = score;
    }
  });
});

describe('formula parts', () => {
  it('maps high-quality source counts to boosts', () => {
    expect([0, 1, 2, 3, 7].map((n) => sourceBoost(n, policy))).toEqual([0, 0.3, 0.6, 1, 1]);
  });

  it('counts only similarities strictly above the quality bar', () => {
    const result = formulaConfidence({ query: 'q', response: '', passages: passagesWith([0.75, 0.76]) }, calc);
    expect(result.breakdown.highQualitySourceCount).toBe(1);
  });

  it('boosts length at 100 and 200 characters', () => {
    expect(lengthBoost(99, policy)).toBe(0);
    expect(lengthBoost(100, policy)).toBe(0.5);
    expect(lengthBoost(199, policy)).toBe(0.5);
    expect(lengthBoost(200, policy)).toBe(1);
  });

  it('returns 0 similarity for no values', () => {
    expect(topSimilarityScore([], policy)).toBe(0);
  });
});
