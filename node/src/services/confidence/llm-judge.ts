// Model-judged confidence: one bounded, timeout-limited call; any failure degrades to the formula.
import type { AgentConfigData } from '@/config/agent-config';
import type { LlmBreakdown } from '@/types/core';
import type { ModelRouter } from '@/services/model-router';
import { BUILT_IN_PROMPTS, PROMPTS, type PromptCatalog } from '@/services/prompt-catalog';
import { CONFIDENCE_JUDGE_SYSTEM_PROMPT, buildConfidenceJudgePrompt } from '@/services/prompt-templates';
import { stripCodeFences } from '@/services/safe-parse-json';
import { logger } from '@/services/logger';
import { errorMessage, throwIfAborted, withTimeout } from '@/utils/errors';
import { formulaConfidence, type FormulaResult, type ScoringInput } from './formula';

const CONTEXT_CHARS = 1000;
const QUERY_CHARS = 500;
const RESPONSE_CHARS = 500;
const JUDGED_PASSAGES = 3;

const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export interface LlmResult {
  score: number;
  method: 'llm';
  breakdown: LlmBreakdown;
}

/** Bare number or a JSON object carrying `confidence_score`; clamped to [0,1]. Throws otherwise. */
export function parseJudgeReply(raw: string): number {
  const content = stripCodeFences(raw);
  let value: number;
  if (content.startsWith('{')) {
    const parsed: unknown = JSON.parse(content);
    const field =
      typeof parsed === 'object' && parsed !== null && 'confidence_score' in parsed
        ? parsed.confidence_score
        : undefined;
    value = typeof field === 'number' ? field : typeof field === 'string' ? Number(field) : NaN;
  } else if (NUMBER_PATTERN.test(content)) {
    value = Number(content);
  } else {
    throw new Error(`unparseable confidence reply '${content.slice(0, 100)}'`);
  }
  if (!Number.isFinite(value)) throw new Error(`confidence reply is not a number '${content.slice(0, 100)}'`);
  return Math.min(1, Math.max(0, value));
}

export function buildJudgeInput(input: ScoringInput): { query: string; context: string; response: string } {
  return {
    query: input.query.slice(0, QUERY_CHARS),
    context: input.passages
      .slice(0, JUDGED_PASSAGES)
      .map((p) => p.content)
      .join('\n\n')
      .slice(0, CONTEXT_CHARS),
    response: input.response.slice(0, RESPONSE_CHARS),
  };
}

export async function llmConfidence(
  input: ScoringInput,
  router: ModelRouter,
  config: AgentConfigData,
  signal?: AbortSignal,
  prompts: PromptCatalog = BUILT_IN_PROMPTS,
): Promise<LlmResult | FormulaResult> {
  const settings = config.confidenceCalculation.llmSettings;
  const judgeInput = buildJudgeInput(input);
  const fallbackPrompt = buildConfidenceJudgePrompt(judgeInput);
  const prompt = await prompts.render(PROMPTS.confidenceJudge, judgeInput, fallbackPrompt, signal);
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const completion = await withTimeout(
      router.run('confidence', CONFIDENCE_JUDGE_SYSTEM_PROMPT, prompt.text, config, controller.signal),
      settings.timeoutMs,
      'confidence judge',
      controller,
    );
    const score = parseJudgeReply(completion.text);
    logger.info('confidence:llm', { score, model: settings.model, promptVersion: prompt.version });
    return {
      score,
      method: 'llm',
      breakdown: {
        kind: 'llm',
        llmProvider: settings.provider,
        llmModel: settings.model,
        llmRawResponse: completion.text.trim(),
        promptVersion: prompt.version,
      },
    };
  } catch (err) {
    throwIfAborted(signal);
    const reason = errorMessage(err);
    logger.warn('confidence:llm_fallback', { error: reason });
    const fallback = formulaConfidence(input, config.confidenceCalculation);
    return { ...fallback, breakdown: { ...fallback.breakdown, fallbackReason: reason } };
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }
}
