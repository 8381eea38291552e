// src/types/core.ts
import type { QueryAnalysisResult } from './query-analysis';

/** Canadian provinces with indexed employment-standards material. */
export type Province = 'MB' | 'ON' | 'SK' | 'AB' | 'BC';

export const PROVINCE_NAMES: Record<Province, string> = {
  MB: 'Manitoba',
  ON: 'Ontario',
  SK: 'Saskatchewan',
  AB: 'Alberta',
  BC: 'British Columbia',
};

export function isProvince(value: unknown): value is Province {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(PROVINCE_NAMES, value);
}

/** One message of the session, oldest first when carried in a list. */
export interface ConversationMessage {
  role: 'user' | 'assistant';
  content: string;
}

/** A retrieved chunk of previously ingested document text. */
export interface RetrievedPassage {
  id?: string;
  content: string;
  /** Source type of the chunk (e.g. "document", "web_page"). */
  source: string;
  /** Per-query similarity in [0,1]. */
  similarity: number;
  /** Chunk title, usually "<filename> (chunk N/M)". */
  title?: string;
  documentTitle?: string;
  documentFilename?: string;
  timestamp?: string;
  metadata: Record<string, unknown>;
}

export interface ToolResult {
  toolName: string;
  toolArgs: Record<string, unknown>;
  result: string;
  success: boolean;
  error?: string;
}

/** Ranked, deduplicated source shown next to an answer. */
export interface Citation {
  /** Relevant excerpt of the passage. */
  content: string;
  /** Display name of the source document. */
  source: string;
  timestamp?: string;
  metadata: Record<string, unknown>;
  similarityScore: number;
}

export type ConfidenceMethodSetting = 'formula' | 'llm' | 'hybrid';
export type ConfidenceMethod = 'formula' | 'llm' | 'hybrid' | 'hybrid_fallback_formula' | 'error';

export interface FormulaBreakdown {
  kind: 'formula';
  /** Set when there was nothing to score (e.g. "no_context_documents"). */
  reason?: string;
  similarityScore: number;
  sourceBoost: number;
  lengthBoost: number;
  highQualitySourceCount: number;
  responseLength: number;
  weights: { similarity: number; sourceQuality: number; responseLength: number };
  /** Why the LLM-judged strategy degraded to this result, if it did. */
  fallbackReason?: string;
}

export interface LlmBreakdown {
  kind: 'llm';
  llmProvider: string;
  llmModel: string;
  llmRawResponse: string;
  /** Version of the stored judge prompt; null when the built-in prompt was used. */
  promptVersion: number | null;
}

export interface HybridBreakdown {
  kind: 'hybrid';
  formulaScore: number;
  llmScore: number;
  formulaWeight: number;
  llmWeight: number;
  formulaDetails: FormulaBreakdown;
  llmDetails: LlmBreakdown;
}

export interface HybridFallbackBreakdown {
  kind: 'hybrid_fallback';
  formulaDetails: FormulaBreakdown;
  hybridNote: string;
}

export interface ErrorBreakdown {
  kind: 'error';
  error: string;
}

export type ConfidenceBreakdown =
  | FormulaBreakdown
  | LlmBreakdown
  | HybridBreakdown
  | HybridFallbackBreakdown
  | ErrorBreakdown;

export interface ConfidenceResult {
  score: number;
  method: ConfidenceMethod;
  breakdown: ConfidenceBreakdown;
}

export type StageName =
  | 'analyze_query'
  | 'invoke_tools'
  | 'retrieve_context'
  | 'generate_response'
  | 'calculate_confidence'
  | 'decision'
  | 'format_output';

export interface StageFailure {
  stage: StageName;
  message: string;
}

/**
 * Per-request accumulator. Created by the orchestrator, filled stage by stage,
 * discarded once the result has been returned.
 */
export interface PipelineState {
  readonly query: string;
  province?: Province;
  userId?: string;
  sessionId: string;
  conversationHistory: ConversationMessage[];

  queryAnalysis?: QueryAnalysisResult;

  toolResults: ToolResult[];
  toolInvocationError?: string;

  contextDocuments: RetrievedPassage[];
  contextText: string;

  response?: string;
  tokensUsed: number;

  confidenceScore?: number;
  confidenceMethod?: ConfidenceMethod;
  confidenceBreakdown?: ConfidenceBreakdown;

  escalated?: boolean;
  escalationReason?: string;

  sources: Citation[];

  /** Stored prompt version per prompt name; null where the built-in prompt was used. */
  promptVersions: Record<string, number | null>;

  /** Last non-fatal error recorded by any stage. */
  error?: string;
  stageFailure?: StageFailure;
}

/** Partial update returned by a stage; `query` is never rewritten. */
export type PipelineUpdate = Partial<Omit<PipelineState, 'query'>>;

export interface QueryRequest {
  query: string;
  province?: Province;
  sessionId: string;
  userId?: string;
  conversationHistory?: ConversationMessage[];
  signal?: AbortSignal;
}

export interface PipelineResult {
  response: string;
  confidenceScore: number;
  confidenceMethod: ConfidenceMethod;
  escalated: boolean;
  escalationReason: string | null;
  sources: Citation[];
  tokensUsed: number;
  /** Observability: not part of the minimal contract. */
  debug: {
    queryAnalysis?: QueryAnalysisResult;
    contextDocuments: RetrievedPassage[];
    toolResults: ToolResult[];
    confidenceBreakdown?: ConfidenceBreakdown;
    promptVersions: Record<string, number | null>;
    error?: string;
    traceId: string;
    stages: Array<{ name: string; durationMs: number; error?: string }>;
  };
}
