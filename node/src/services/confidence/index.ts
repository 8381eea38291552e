// Confidence scoring entry point: strategy chosen by configuration, never throws for scoring failures.
import type { AgentConfigData } from '@/config/agent-config';
import type { ConfidenceMethodSetting, ConfidenceResult } from '@/types/core';
import type { ModelRouter } from '@/services/model-router';
import { BUILT_IN_PROMPTS, type PromptCatalog } from '@/services/prompt-catalog';
import { logger } from '@/services/logger';
import { errorMessage, throwIfAborted } from '@/utils/errors';
import { formulaConfidence, type ScoringInput } from './formula';
import { hybridConfidence } from './hybrid';
import { llmConfidence } from './llm-judge';

export type { ScoringInput } from './formula';

type Strategy = (
  input: ScoringInput,
  router: ModelRouter,
  config: AgentConfigData,
  signal: AbortSignal | undefined,
  prompts: PromptCatalog,
) => Promise<ConfidenceResult>;

const STRATEGIES: Record<ConfidenceMethodSetting, Strategy> = {
  formula: async (input, _router, config) => formulaConfidence(input, config.confidenceCalculation),
  llm: llmConfidence,
  hybrid: hybridConfidence,
};

export function errorConfidence(message: string): ConfidenceResult {
  return { score: 0, method: 'error', breakdown: { kind: 'error', error: message } };
}

export async function scoreConfidence(
  input: ScoringInput,
  router: ModelRouter,
  config: AgentConfigData,
  signal?: AbortSignal,
  prompts: PromptCatalog = BUILT_IN_PROMPTS,
): Promise<ConfidenceResult> {
  const method = config.confidenceCalculation.method;
  try {
    const result = await STRATEGIES[method](input, router, config, signal, prompts);
    logger.info('confidence:scored', { configured: method, method: result.method, score: result.score });
    return result;
  } catch (err) {
    throwIfAborted(signal);
    const message = errorMessage(err);
    logger.error('confidence:failed', { method, error: message });
    return errorConfidence(message);
  }
}
