// node/src/services/response-generator.ts: answer generation over the assembled context
import type { AgentConfigData } from '@/config/agent-config';
import type { ConversationMessage, Province } from '@/types/core';
import type { ModelRouter } from './model-router';
import { BUILT_IN_PROMPTS, PROMPTS, type PromptCatalog, type PromptVersions } from './prompt-catalog';
import {
  buildGenerationSystemPrompt,
  buildGenerationUserPrompt,
  generationPromptVariables,
  jurisdictionClause,
} from './prompt-templates';
import { logger } from './logger';
import { errorMessage, throwIfAborted } from '@/utils/errors';

export const GENERATION_ERROR_RESPONSE = 'I apologize, but I encountered an error generating a response.';

export interface GenerateOutcome {
  response: string;
  tokensUsed: number;
  error?: string;
  promptVersions: PromptVersions;
}

export async function generateResponse(params: {
  query: string;
  contextText: string;
  history: ConversationMessage[];
  province?: Province;
  router: ModelRouter;
  config: AgentConfigData;
  signal?: AbortSignal;
  prompts?: PromptCatalog;
}): Promise<GenerateOutcome> {
  const { prompts = BUILT_IN_PROMPTS, province, signal } = params;
  const promptInput = { query: params.query, contextText: params.contextText, history: params.history };
  const [storedSystem, user] = await Promise.all([
    prompts.render(PROMPTS.generationSystem, {}, buildGenerationSystemPrompt(province), signal),
    prompts.render(
      PROMPTS.generationUser,
      generationPromptVariables(promptInput),
      buildGenerationUserPrompt(promptInput),
      signal,
    ),
  ]);
  // A stored system prompt is province-neutral; the jurisdiction clause is appended to it.
  const system =
    storedSystem.version !== null && province ? storedSystem.text + jurisdictionClause(province) : storedSystem.text;
  const promptVersions: PromptVersions = {
    [PROMPTS.generationSystem.name]: storedSystem.version,
    [PROMPTS.generationUser.name]: user.version,
  };

  try {
    const completion = await params.router.run('generation', system, user.text, params.config, signal);
    const tokensUsed = completion.usage?.totalTokens ?? 0;
    logger.info('generation:done', {
      chars: completion.text.length,
      tokensUsed,
      historyMessages: params.history.length,
      province: province ?? null,
    });
    return { response: completion.text, tokensUsed, promptVersions };
  } catch (err) {
    throwIfAborted(signal);
    const message = errorMessage(err);
    logger.error('generation:failed', { error: message });
    return {
      response: GENERATION_ERROR_RESPONSE,
      tokensUsed: 0,
      error: `Response generation error: ${message}`,
      promptVersions,
    };
  }
}
