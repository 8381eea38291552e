// node/src/services/model-router.ts: central routing per task type
import type { AgentConfigData } from '@/config/agent-config';

export interface CompletionParams {
  model: string;
  temperature: number;
  maxTokens: number;
  topP?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  /** Bounds this one call; on expiry the request is cancelled. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface Completion {
  text: string;
  usage?: { totalTokens: number };
}

/** The text-generation backend: one system + user prompt in, text out. */
export interface LanguageModelGateway {
  complete(system: string, user: string, params: CompletionParams): Promise<Completion>;
}

export type ModelTask = 'analysis' | 'generation' | 'tool_selection' | 'confidence';

const TOOL_SELECTION_MAX_TOKENS = 300;

/** Maps each pipeline task to gateway parameters from the active agent configuration. */
export class ModelRouter {
  constructor(private readonly gateway: LanguageModelGateway) {}

  paramsFor(task: ModelTask, config: AgentConfigData, signal?: AbortSignal): CompletionParams {
    const model = config.modelSettings;
    switch (task) {
      case 'analysis':
        return {
          model: model.model,
          temperature: config.analysisSettings.temperature,
          maxTokens: config.analysisSettings.maxTokens,
          signal,
        };
      case 'tool_selection':
        return { model: model.model, temperature: 0, maxTokens: TOOL_SELECTION_MAX_TOKENS, signal };
      case 'confidence': {
        const judge = config.confidenceCalculation.llmSettings;
        return {
          model: judge.model,
          temperature: judge.temperature,
          maxTokens: judge.maxTokens,
          timeoutMs: judge.timeoutMs,
          signal,
        };
      }
      case 'generation':
        return {
          model: model.model,
          temperature: model.temperature,
          maxTokens: model.maxTokens,
          topP: model.topP,
          frequencyPenalty: model.frequencyPenalty,
          presencePenalty: model.presencePenalty,
          signal,
        };
    }
  }

  async run(
    task: ModelTask,
    system: string,
    user: string,
    config: AgentConfigData,
    signal?: AbortSignal,
  ): Promise<Completion> {
    return this.gateway.complete(system, user, this.paramsFor(task, config, signal));
  }
}
