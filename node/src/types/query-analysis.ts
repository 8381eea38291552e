// src/types/query-analysis.ts: intent/complexity/entity model produced by query understanding

export const QUERY_INTENTS = [
  'factual',
  'procedural',
  'troubleshooting',
  'comparison',
  'definition',
  'conceptual',
  'navigational',
  'transactional',
  'unknown',
] as const;
export type QueryIntent = (typeof QUERY_INTENTS)[number];

export const QUERY_COMPLEXITIES = ['simple', 'moderate', 'complex', 'very_complex'] as const;
export type QueryComplexity = (typeof QUERY_COMPLEXITIES)[number];

export const ROUTING_DECISIONS = [
  'standard_rag',
  'tool_invocation',
  'multi_step_reasoning',
  'direct_escalation',
  'cached_response',
] as const;
export type RoutingDecision = (typeof ROUTING_DECISIONS)[number];

/** Entity categories the analyzer is asked to extract for employment-standards questions. */
export const ENTITY_TYPES = [
  'product',
  'concept',
  'legislation',
  'jurisdiction',
  'employment_type',
  'leave_type',
  'organization',
  'amount',
  'date',
  'duration',
] as const;
export type EntityType = (typeof ENTITY_TYPES)[number];

export interface ExtractedEntity {
  text: string;
  type: EntityType;
  /** Extraction confidence in [0,1]. */
  confidence: number;
  metadata: Record<string, unknown>;
}

export interface QueryAnalysisResult {
  originalQuery: string;

  intent: QueryIntent;
  intentConfidence: number;

  complexity: QueryComplexity;
  complexityScore: number;

  entities: ExtractedEntity[];

  routing: RoutingDecision;
  routingConfidence: number;

  requiresRecentContext: boolean;
  requiresMultipleSources: boolean;
  /** Suggested retrieval limit, 1 to 20. */
  suggestedDocCount: number;
  suggestedSimilarityThreshold: number;

  requiresTools: boolean;
  suggestedTools: string[];

  keyConcepts: string[];
  queryTopics: string[];

  analysisReasoning: string;
  analysisTimeMs: number;
}
