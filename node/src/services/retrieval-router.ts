// src/services/retrieval-router.ts: branch selection after analysis, and the retrieval stage
import type { SearchSettings } from '@/config/agent-config';
import type { Province, RetrievedPassage, ToolResult } from '@/types/core';
import type { QueryAnalysisResult, RoutingDecision } from '@/types/query-analysis';
import type { ContextRetriever, Embedder } from './providers/retrieval-types';
import { logger } from '@/services/logger';
import { errorMessage, throwIfAborted } from '@/utils/errors';

export type PipelineBranch = 'tools' | 'retrieval' | 'generation';

/**
 * Pure mapping from the analyzer's routing decision to the next stage.
 * direct_escalation still goes on to generation; escalating is the decision stage's job.
 */
export function routeAfterAnalysis(routing: RoutingDecision | undefined): PipelineBranch {
  switch (routing) {
    case 'tool_invocation':
      return 'tools';
    case 'direct_escalation':
      return 'generation';
    default:
      return 'retrieval';
  }
}

export interface RetrievalParams {
  threshold: number;
  limit: number;
}

/**
 * With an analysis, the limit is its suggested count and the threshold is
 * min(min(suggested, cap), configured). Without one, configured defaults.
 */
export function deriveRetrievalParams(
  analysis: QueryAnalysisResult | undefined,
  search: SearchSettings,
): RetrievalParams {
  if (!analysis) {
    return { threshold: search.similarityThreshold, limit: search.maxResults };
  }
  const capped = Math.min(analysis.suggestedSimilarityThreshold, search.suggestedThresholdCap);
  return {
    threshold: Math.min(capped, search.similarityThreshold),
    limit: analysis.suggestedDocCount,
  };
}

/** Text handed to generation; passages and tool outputs share one layout. */
export function formatContextText(passages: RetrievedPassage[], toolResults: ToolResult[] = []): string {
  const entries = [
    ...toolResults.filter((t) => t.success).map((t) => `Tool: ${t.toolName}\n${t.result}`),
    ...passages.map((p) => `Source: ${p.source}\n${p.content}`),
  ];
  return entries.join('\n\n');
}

export interface RetrieveOutcome {
  passages: RetrievedPassage[];
  params: RetrievalParams;
  error?: string;
}

/** Backend failures degrade to an empty passage list; caller cancellation propagates. */
export async function retrieveContext(params: {
  query: string;
  province?: Province;
  analysis?: QueryAnalysisResult;
  search: SearchSettings;
  embedder: Embedder;
  retriever: ContextRetriever;
  signal?: AbortSignal;
}): Promise<RetrieveOutcome> {
  const retrievalParams = deriveRetrievalParams(params.analysis, params.search);
  if (!params.province) {
    logger.warn('retrieval:no_province', { query: params.query.slice(0, 50) });
  }

  try {
    const queryEmbedding = await params.embedder.embed(params.query, params.signal);
    const passages = await params.retriever.search({
      queryText: params.query,
      queryEmbedding,
      threshold: retrievalParams.threshold,
      limit: retrievalParams.limit,
      province: params.province,
      signal: params.signal,
    });
    logger.info('retrieval:done', {
      results: passages.length,
      threshold: retrievalParams.threshold,
      limit: retrievalParams.limit,
    });
    return { passages, params: retrievalParams };
  } catch (err) {
    throwIfAborted(params.signal);
    const message = errorMessage(err);
    logger.error('retrieval:failed', { error: message });
    return { passages: [], params: retrievalParams, error: `Context retrieval error: ${message}` };
  }
}
