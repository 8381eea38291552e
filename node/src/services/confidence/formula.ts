// Deterministic confidence from retrieval quality and answer length. No external calls.
import type { ConfidenceCalculationConfig, FormulaPolicy } from '@/config/agent-config';
import type { FormulaBreakdown, RetrievedPassage } from '@/types/core';

export interface ScoringInput {
  query: string;
  response: string;
  passages: RetrievedPassage[];
}

export interface FormulaResult {
  score: number;
  method: 'formula';
  breakdown: FormulaBreakdown;
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/** Weighted mean of the (up to) three best similarities. */
export function topSimilarityScore(similarities: number[], policy: FormulaPolicy): number {
  const top = [...similarities].sort((a, b) => b - a).slice(0, 3);
  if (top.length >= 3) {
    const [w1, w2, w3] = policy.topWeightsThree;
    return top[0] * w1 + top[1] * w2 + top[2] * w3;
  }
  if (top.length === 2) {
    const [w1, w2] = policy.topWeightsTwo;
    return top[0] * w1 + top[1] * w2;
  }
  return top[0] ?? 0;
}

export function sourceBoost(highQualityCount: number, policy: FormulaPolicy): number {
  const index = Math.min(highQualityCount, policy.sourceBoosts.length - 1);
  return policy.sourceBoosts[index];
}

export function lengthBoost(responseLength: number, policy: FormulaPolicy): number {
  if (responseLength >= policy.fullLengthChars) return 1;
  if (responseLength >= policy.partialLengthChars) return policy.partialLengthBoost;
  return 0;
}

export function formulaConfidence(input: ScoringInput, calc: ConfidenceCalculationConfig): FormulaResult {
  const { formulaWeights: weights, formulaPolicy: policy } = calc;
  const responseLength = input.response.length;
  const weightInfo = {
    similarity: weights.similarity,
    sourceQuality: weights.sourceQuality,
    responseLength: weights.responseLength,
  };

  if (input.passages.length === 0) {
    return {
      score: 0,
      method: 'formula',
      breakdown: {
        kind: 'formula',
        reason: 'no_context_documents',
        similarityScore: 0,
        sourceBoost: 0,
        lengthBoost: 0,
        highQualitySourceCount: 0,
        responseLength,
        weights: weightInfo,
      },
    };
  }

  const similarities = input.passages.map((p) => p.similarity);
  const similarityScore = topSimilarityScore(similarities, policy);
  const highQualitySourceCount = similarities.filter((s) => s > policy.highQualitySimilarity).length;
  const srcBoost = sourceBoost(highQualitySourceCount, policy);
  const lenBoost = lengthBoost(responseLength, policy);

  const score = clampUnit(
    similarityScore * weights.similarity + srcBoost * weights.sourceQuality + lenBoost * weights.responseLength,
  );

  return {
    score,
    method: 'formula',
    breakdown: {
      kind: 'formula',
      similarityScore,
      sourceBoost: srcBoost,
      lengthBoost: lenBoost,
      highQualitySourceCount,
      responseLength,
      weights: weightInfo,
    },
  };
}
