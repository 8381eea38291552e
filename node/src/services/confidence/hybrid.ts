import type { AgentConfigData } from '@/config/agent-config';
import type { ConfidenceResult } from '@/types/core';
import type { ModelRouter } from '@/services/model-router';
import { BUILT_IN_PROMPTS, type PromptCatalog } from '@/services/prompt-catalog';
import { logger } from '@/services/logger';
import { formulaConfidence, type ScoringInput } from './formula';
import { llmConfidence } from './llm-judge';

export const HYBRID_FALLBACK_NOTE = 'LLM unavailable, used formula-only';

/**
 * Weighted formula + judge score. The judge call is started before the formula is
 * computed so the two overlap. If the judge degraded, the formula score is reported alone.
 */
export async function hybridConfidence(
  input: ScoringInput,
  router: ModelRouter,
  config: AgentConfigData,
  signal?: AbortSignal,
  prompts: PromptCatalog = BUILT_IN_PROMPTS,
): Promise<ConfidenceResult> {
  const pendingJudge = llmConfidence(input, router, config, signal, prompts);
  const formula = formulaConfidence(input, config.confidenceCalculation);
  const judged = await pendingJudge;

  if (judged.method !== 'llm') {
    logger.warn('confidence:hybrid_degraded', { formulaScore: formula.score });
    return {
      score: formula.score,
      method: 'hybrid_fallback_formula',
      breakdown: { kind: 'hybrid_fallback', formulaDetails: formula.breakdown, hybridNote: HYBRID_FALLBACK_NOTE },
    };
  }

  const { formulaWeight, llmWeight } = config.confidenceCalculation.hybridSettings;
  const score = Math.min(1, formula.score * formulaWeight + judged.score * llmWeight);
  logger.info('confidence:hybrid', { score, formulaScore: formula.score, llmScore: judged.score });
  return {
    score,
    method: 'hybrid',
    breakdown: {
      kind: 'hybrid',
      formulaScore: formula.score,
      llmScore: judged.score,
      formulaWeight,
      llmWeight,
      formulaDetails: formula.breakdown,
      llmDetails: judged.breakdown,
    },
  };
}
