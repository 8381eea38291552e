// src/services/query-understanding.ts
// One low-temperature model call classifies intent/complexity, extracts entities and proposes
// retrieval parameters and a routing decision. Any failure yields a fixed fallback analysis.
import { z } from 'zod';
import type { AgentConfigData } from '@/config/agent-config';
import {
  ENTITY_TYPES,
  QUERY_COMPLEXITIES,
  QUERY_INTENTS,
  ROUTING_DECISIONS,
  type ExtractedEntity,
  type QueryAnalysisResult,
  type RoutingDecision,
} from '@/types/query-analysis';
import type { ModelRouter } from './model-router';
import { BUILT_IN_PROMPTS, PROMPTS, type PromptCatalog, type PromptVersions } from './prompt-catalog';
import { ANALYSIS_SYSTEM_PROMPT, analysisPromptVariables, buildAnalysisPrompt } from './prompt-templates';
import { safeParseJson } from './safe-parse-json';
import { logger } from '@/services/logger';
import { errorMessage, throwIfAborted } from '@/utils/errors';

const STRING_ENTITY_CONFIDENCE = 0.7;
const CATEGORY_ENTITY_CONFIDENCE = 0.8;

/** Older prompt revisions answered `routing_decision` with these values. */
const LEGACY_ROUTING: Record<string, RoutingDecision> = {
  retrieval: 'standard_rag',
  tools: 'tool_invocation',
  direct: 'cached_response',
};

const lowercase = (v: unknown) => (typeof v === 'string' ? v.trim().toLowerCase() : v);
const unit = z.number().min(0).max(1);

const entityObjectSchema = z.object({
  text: z.string().min(1),
  type: z.preprocess(lowercase, z.enum(ENTITY_TYPES)),
  confidence: unit,
  metadata: z.record(z.unknown()).default({}),
});

const analysisReplySchema = z.object({
  intent: z.preprocess(lowercase, z.enum(QUERY_INTENTS)),
  intent_confidence: unit.default(0.8),
  complexity: z.preprocess(lowercase, z.enum(QUERY_COMPLEXITIES)),
  complexity_score: unit.default(0.5),
  entities: z.unknown().optional(),
  routing: z.preprocess(lowercase, z.enum(ROUTING_DECISIONS)).optional(),
  routing_decision: z.string().optional(),
  routing_confidence: unit.default(0.8),
  requires_recent_context: z.boolean().default(false),
  requires_multiple_sources: z.boolean().default(false),
  suggested_doc_count: z
    .number()
    .default(5)
    .transform((n) => Math.min(20, Math.max(1, Math.round(n)))),
  suggested_similarity_threshold: unit.default(0.45),
  requires_tools: z.boolean().default(false),
  suggested_tools: z.array(z.string()).default([]),
  key_concepts: z.array(z.string()).default([]),
  query_topics: z.array(z.string()).default([]),
  analysis_reasoning: z.string().default(''),
});

/**
 * Normalizes the three entity shapes models have produced:
 * a list of entity objects, a flat list of strings, or a map of category to strings.
 * Items that are neither strings nor objects are skipped; an object entity that fails validation throws.
 */
export function normalizeEntities(raw: unknown): ExtractedEntity[] {
  if (raw == null) return [];

  if (Array.isArray(raw)) {
    const entities: ExtractedEntity[] = [];
    for (const item of raw) {
      if (typeof item === 'string') {
        entities.push({ text: item, type: 'concept', confidence: STRING_ENTITY_CONFIDENCE, metadata: {} });
      } else if (typeof item === 'object' && item !== null && !Array.isArray(item)) {
        entities.push(entityObjectSchema.parse(item));
      }
    }
    return entities;
  }

  if (typeof raw === 'object') {
    const entities: ExtractedEntity[] = [];
    for (const [category, values] of Object.entries(raw)) {
      if (!Array.isArray(values)) continue;
      const type = category.toLowerCase().includes('product') ? 'product' : 'concept';
      for (const text of values) {
        if (typeof text !== 'string') continue;
        entities.push({ text, type, confidence: CATEGORY_ENTITY_CONFIDENCE, metadata: { category } });
      }
    }
    return entities;
  }

  return [];
}

function resolveRouting(routing: RoutingDecision | undefined, legacy: string | undefined): RoutingDecision {
  if (routing) return routing;
  if (legacy) return LEGACY_ROUTING[legacy.trim().toLowerCase()] ?? 'standard_rag';
  return 'standard_rag';
}

/** Parses a model reply into an analysis; throws on anything that is not a usable analysis. */
export function parseAnalysisReply(query: string, raw: string, analysisTimeMs: number): QueryAnalysisResult {
  const json = safeParseJson(raw, 'query-analysis');
  if (!json) throw new Error('analysis reply is not a JSON object');

  const reply = analysisReplySchema.parse(json);
  return {
    originalQuery: query,
    intent: reply.intent,
    intentConfidence: reply.intent_confidence,
    complexity: reply.complexity,
    complexityScore: reply.complexity_score,
    entities: normalizeEntities(reply.entities),
    routing: resolveRouting(reply.routing, reply.routing_decision),
    routingConfidence: reply.routing_confidence,
    requiresRecentContext: reply.requires_recent_context,
    requiresMultipleSources: reply.requires_multiple_sources,
    suggestedDocCount: reply.suggested_doc_count,
    suggestedSimilarityThreshold: reply.suggested_similarity_threshold,
    requiresTools: reply.requires_tools,
    suggestedTools: reply.suggested_tools,
    keyConcepts: reply.key_concepts,
    queryTopics: reply.query_topics,
    analysisReasoning: reply.analysis_reasoning,
    analysisTimeMs,
  };
}

export function fallbackAnalysis(query: string, reason: string): QueryAnalysisResult {
  return {
    originalQuery: query,
    intent: 'unknown',
    intentConfidence: 0,
    complexity: 'moderate',
    complexityScore: 0.5,
    entities: [],
    routing: 'standard_rag',
    routingConfidence: 0.5,
    requiresRecentContext: false,
    requiresMultipleSources: true,
    suggestedDocCount: 5,
    suggestedSimilarityThreshold: 0.7,
    requiresTools: false,
    suggestedTools: [],
    keyConcepts: [],
    queryTopics: [],
    analysisReasoning: `Fallback analysis due to error: ${reason}`,
    analysisTimeMs: 0,
  };
}

export interface AnalyzeOutcome {
  analysis: QueryAnalysisResult;
  /** Set when the fallback analysis was used. */
  error?: string;
  promptVersions: PromptVersions;
}

/** Never throws for model or parse failures; only caller cancellation propagates. */
export async function analyzeQuery(
  query: string,
  router: ModelRouter,
  config: AgentConfigData,
  signal?: AbortSignal,
  prompts: PromptCatalog = BUILT_IN_PROMPTS,
): Promise<AnalyzeOutcome> {
  const started = Date.now();
  const [system, user] = await Promise.all([
    prompts.render(PROMPTS.analysisSystem, {}, ANALYSIS_SYSTEM_PROMPT, signal),
    prompts.render(PROMPTS.analysisUser, analysisPromptVariables(query), buildAnalysisPrompt(query), signal),
  ]);
  const promptVersions: PromptVersions = {
    [PROMPTS.analysisSystem.name]: system.version,
    [PROMPTS.analysisUser.name]: user.version,
  };

  try {
    const completion = await router.run('analysis', system.text, user.text, config, signal);
    const analysis = parseAnalysisReply(query, completion.text, Date.now() - started);

    logger.info('query-analysis:done', {
      intent: analysis.intent,
      complexity: analysis.complexity,
      routing: analysis.routing,
      entities: analysis.entities.length,
      ms: analysis.analysisTimeMs,
    });
    return { analysis, promptVersions };
  } catch (err) {
    throwIfAborted(signal);
    const reason = err instanceof z.ZodError ? err.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ') : errorMessage(err);
    logger.warn('query-analysis:fallback', { error: reason });
    return {
      analysis: fallbackAnalysis(query, reason),
      error: `Query analysis error (using fallback): ${reason}`,
      promptVersions,
    };
  }
}
