// Shared retrieval types for the knowledge-base search layer
import type { Province, RetrievedPassage } from '@/types/core';

export type Embedding = number[];

export interface Embedder {
  embed(text: string, signal?: AbortSignal): Promise<Embedding>;
}

export interface RetrievalRequest {
  queryText: string;
  queryEmbedding: Embedding;
  /** Minimum similarity in [0,1]. */
  threshold: number;
  limit: number;
  province?: Province;
  signal?: AbortSignal;
}

/** Ranked passages, most similar first. Implementations may throw; the caller degrades to no context. */
export interface ContextRetriever {
  search(request: RetrievalRequest): Promise<RetrievedPassage[]>;
}
