// Hybrid retriever: vector + keyword matching done in Postgres by the `hybrid_search` function.
import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { RetrievedPassage } from '@/types/core';
import type { ContextRetriever, RetrievalRequest } from './retrieval-types';
import { logger } from '@/services/logger';

const hybridRowSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  content: z.string().default(''),
  source: z.string().nullish(),
  similarity: z.number().nullish(),
  title: z.string().nullish(),
  document_title: z.string().nullish(),
  document_filename: z.string().nullish(),
  timestamp: z.string().nullish(),
  doc_timestamp: z.string().nullish(),
  metadata: z.record(z.unknown()).nullish(),
});

type HybridRow = z.infer<typeof hybridRowSchema>;

function clampSimilarity(value: number | null | undefined): number {
  if (value == null || !Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function rowToPassage(row: HybridRow): RetrievedPassage {
  return {
    id: row.id != null ? String(row.id) : undefined,
    content: row.content,
    source: row.source ?? 'unknown',
    similarity: clampSimilarity(row.similarity),
    title: row.title ?? undefined,
    documentTitle: row.document_title ?? undefined,
    documentFilename: row.document_filename ?? undefined,
    timestamp: row.timestamp ?? row.doc_timestamp ?? undefined,
    metadata: row.metadata ?? {},
  };
}

export class SupabaseHybridRetriever implements ContextRetriever {
  constructor(private readonly client: () => SupabaseClient) {}

  async search(request: RetrievalRequest): Promise<RetrievedPassage[]> {
    let rpc = this.client().rpc('hybrid_search', {
      query_embedding: request.queryEmbedding,
      query_text: request.queryText,
      match_threshold: request.threshold,
      match_count: request.limit,
      filter_province: request.province ?? null,
    });
    if (request.signal) rpc = rpc.abortSignal(request.signal);

    const { data, error } = await rpc;
    if (error) throw new Error(`hybrid_search failed: ${error.message}`);

    const rows: unknown[] = Array.isArray(data) ? data : [];
    const passages: RetrievedPassage[] = [];
    for (const raw of rows) {
      const parsed = hybridRowSchema.safeParse(raw);
      if (parsed.success) {
        passages.push(rowToPassage(parsed.data));
      } else {
        logger.warn('retrieval:row_skipped', { issues: parsed.error.errors.length });
      }
    }
    passages.sort((a, b) => b.similarity - a.similarity);

    logger.info('retrieval:hybrid_search', {
      results: passages.length,
      threshold: request.threshold,
      limit: request.limit,
      province: request.province ?? null,
    });
    return passages;
  }
}
