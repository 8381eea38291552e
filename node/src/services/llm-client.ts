// node/src/services/llm-client.ts: OpenAI implementation of LanguageModelGateway
import OpenAI from 'openai';
import { appConfig } from '@/config/app.config';
import { logger } from './logger';
import type { Completion, CompletionParams, LanguageModelGateway } from './model-router';
import { withTimeout } from '@/utils/errors';

let client: OpenAI | null = null;

export function getOpenAiClient(): OpenAI {
  if (!client) {
    const apiKey = appConfig.openai.apiKey;
    if (!apiKey) {
      throw new Error('Missing OPENAI_API_KEY. Set it in .env or pass it when starting the server.');
    }
    client = new OpenAI({ apiKey });
  }
  return client;
}

export class OpenAiGateway implements LanguageModelGateway {
  constructor(private readonly getClient: () => OpenAI = getOpenAiClient) {}

  async complete(system: string, user: string, params: CompletionParams): Promise<Completion> {
    // Own controller so a timeout cancels only this call, while caller aborts still propagate.
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    params.signal?.addEventListener('abort', onAbort, { once: true });
    if (params.signal?.aborted) controller.abort();

    const started = Date.now();
    try {
      const request = this.getClient().chat.completions.create(
        {
          model: params.model,
          messages: [
            { role: 'system', content: system },
            { role: 'user', content: user },
          ],
          temperature: params.temperature,
          max_tokens: params.maxTokens,
          top_p: params.topP,
          frequency_penalty: params.frequencyPenalty,
          presence_penalty: params.presencePenalty,
        },
        { signal: controller.signal, maxRetries: params.timeoutMs ? 0 : undefined },
      );
      const res =
        params.timeoutMs !== undefined
          ? await withTimeout(request, params.timeoutMs, `completion ${params.model}`, controller)
          : await request;

      const text = res.choices[0]?.message?.content ?? '';
      logger.debug('llm:completion', {
        model: params.model,
        ms: Date.now() - started,
        totalTokens: res.usage?.total_tokens,
      });
      return {
        text,
        usage: res.usage ? { totalTokens: res.usage.total_tokens } : undefined,
      };
    } finally {
      params.signal?.removeEventListener('abort', onAbort);
    }
  }
}
