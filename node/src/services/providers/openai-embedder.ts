import type OpenAI from 'openai';
import { getOpenAiClient } from '@/services/llm-client';
import type { Embedder } from './retrieval-types';

export class OpenAiEmbedder implements Embedder {
  constructor(
    private readonly model: string,
    private readonly dimensions: number,
    private readonly getClient: () => OpenAI = getOpenAiClient,
  ) {}

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const res = await this.getClient().embeddings.create(
      { model: this.model, input: text, dimensions: this.dimensions },
      { signal },
    );
    const vector = res.data[0]?.embedding;
    if (!vector) throw new Error('Embedding response contained no vector');
    return vector;
  }
}
