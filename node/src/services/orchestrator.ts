// src/services/orchestrator.ts: the query pipeline as an ordered list of stages
//
// analyze_query → (invoke_tools | retrieve_context | nothing) → generate_response
//   → calculate_confidence → decision → format_output
//
// Each stage returns a partial update that is merged into the request's state. A stage
// that throws is recorded as the pipeline's failure: later content stages are skipped and
// the closing stages (confidence, decision, formatting) still run so the result always
// carries a score and an escalation verdict.
import type { AgentConfig } from '@/config/agent-config';
import type { AppConfig } from '@/config/app.config';
import { loadStageConfig, type ConfigProvider } from '@/config/config-provider';
import type {
  PipelineResult,
  PipelineState,
  PipelineUpdate,
  QueryRequest,
  StageFailure,
  StageName,
} from '@/types/core';
import { errorConfidence, scoreConfidence } from './confidence';
import { decideEscalation } from './escalation-decision';
import { logger } from './logger';
import type { ModelRouter } from './model-router';
import type { ContextRetriever, Embedder } from './providers/retrieval-types';
import { analyzeQuery } from './query-understanding';
import { QueryProcessingTrace } from './query-processing-trace';
import { GENERATION_ERROR_RESPONSE, generateResponse } from './response-generator';
import { formatContextText, retrieveContext, routeAfterAnalysis } from './retrieval-router';
import { formatSources } from './source-attribution';
import { invokeTools, type ToolRegistry } from './tool-invoker';
import type { PromptCatalog, PromptVersions } from './prompt-catalog';
import { PipelineAbortedError, errorMessage, throwIfAborted } from '@/utils/errors';

export interface OrchestratorDeps {
  router: ModelRouter;
  embedder: Embedder;
  retriever: ContextRetriever;
  tools: ToolRegistry;
  configProvider: ConfigProvider;
  prompts: PromptCatalog;
  /** Process configuration used to build the fallback agent configuration. */
  appConfig: AppConfig;
}

interface StageContext {
  deps: OrchestratorDeps;
  config: AgentConfig;
  signal?: AbortSignal;
}

interface Stage {
  name: StageName;
  /** Closing stages run even after an earlier stage failed. */
  closing: boolean;
  when?: (state: PipelineState) => boolean;
  run: (state: PipelineState, ctx: StageContext) => Promise<PipelineUpdate>;
  /** Safe update applied when this stage itself throws. */
  recover?: (failure: StageFailure) => PipelineUpdate;
}

export function failureReason(failure: StageFailure): string {
  return `Pipeline failure in ${failure.stage}: ${failure.message}`;
}

function errorField(error: string | undefined): PipelineUpdate {
  return error ? { error } : {};
}

function withVersions(state: PipelineState, used: PromptVersions): PipelineUpdate {
  return { promptVersions: { ...state.promptVersions, ...used } };
}

const analyzeStage: Stage = {
  name: 'analyze_query',
  closing: false,
  async run(state, { deps, config, signal }) {
    const outcome = await analyzeQuery(state.query, deps.router, config.config, signal, deps.prompts);
    return {
      queryAnalysis: outcome.analysis,
      ...withVersions(state, outcome.promptVersions),
      ...errorField(outcome.error),
    };
  },
};

const toolStage: Stage = {
  name: 'invoke_tools',
  closing: false,
  when: (state) => routeAfterAnalysis(state.queryAnalysis?.routing) === 'tools',
  async run(state, { deps, config, signal }) {
    const outcome = await invokeTools({
      query: state.query,
      registry: deps.tools,
      router: deps.router,
      config: config.config,
      signal,
      prompts: deps.prompts,
    });
    return {
      toolResults: outcome.toolResults,
      ...withVersions(state, outcome.promptVersions),
      contextText: formatContextText(state.contextDocuments, outcome.toolResults),
      ...(outcome.error ? { toolInvocationError: outcome.error } : {}),
    };
  },
};

const retrievalStage: Stage = {
  name: 'retrieve_context',
  closing: false,
  when: (state) => routeAfterAnalysis(state.queryAnalysis?.routing) === 'retrieval',
  async run(state, { deps, config, signal }) {
    const outcome = await retrieveContext({
      query: state.query,
      province: state.province,
      analysis: state.queryAnalysis,
      search: config.config.searchSettings,
      embedder: deps.embedder,
      retriever: deps.retriever,
      signal,
    });
    return {
      contextDocuments: outcome.passages,
      contextText: formatContextText(outcome.passages, state.toolResults),
      ...errorField(outcome.error),
    };
  },
};

const generationStage: Stage = {
  name: 'generate_response',
  closing: false,
  async run(state, { deps, config, signal }) {
    const outcome = await generateResponse({
      query: state.query,
      contextText: state.contextText,
      history: state.conversationHistory,
      province: state.province,
      router: deps.router,
      config: config.config,
      signal,
      prompts: deps.prompts,
    });
    return {
      response: outcome.response,
      tokensUsed: outcome.tokensUsed,
      ...withVersions(state, outcome.promptVersions),
      ...errorField(outcome.error),
    };
  },
};

const confidenceStage: Stage = {
  name: 'calculate_confidence',
  closing: true,
  async run(state, { deps, config, signal }) {
    const result = state.stageFailure
      ? errorConfidence(failureReason(state.stageFailure))
      : await scoreConfidence(
          { query: state.query, response: state.response ?? '', passages: state.contextDocuments },
          deps.router,
          config.config,
          signal,
          deps.prompts,
        );
    return {
      confidenceScore: result.score,
      confidenceMethod: result.method,
      confidenceBreakdown: result.breakdown,
    };
  },
  recover: (failure) => {
    const result = errorConfidence(failure.message);
    return { confidenceScore: result.score, confidenceMethod: result.method, confidenceBreakdown: result.breakdown };
  },
};

const decisionStage: Stage = {
  name: 'decision',
  closing: true,
  async run(state, { config }) {
    if (state.stageFailure) {
      return { escalated: true, escalationReason: failureReason(state.stageFailure) };
    }
    const decision = decideEscalation(state.confidenceScore, config.config.confidenceThresholds.escalation);
    return { escalated: decision.escalated, escalationReason: decision.reason };
  },
  recover: (failure) => ({ escalated: true, escalationReason: failureReason(failure) }),
};

const formatStage: Stage = {
  name: 'format_output',
  closing: true,
  async run(state, { config }) {
    return { sources: formatSources(state.contextDocuments, state.query, config.config.outputSettings) };
  },
  recover: () => ({ sources: [] }),
};

export const PIPELINE_STAGES: readonly Stage[] = [
  analyzeStage,
  toolStage,
  retrievalStage,
  generationStage,
  confidenceStage,
  decisionStage,
  formatStage,
];

export function createInitialState(request: QueryRequest): PipelineState {
  return {
    query: request.query,
    province: request.province,
    userId: request.userId,
    sessionId: request.sessionId,
    conversationHistory: request.conversationHistory ?? [],
    toolResults: [],
    contextDocuments: [],
    contextText: '',
    tokensUsed: 0,
    sources: [],
    promptVersions: {},
  };
}

function isAbort(err: unknown, signal?: AbortSignal): boolean {
  return err instanceof PipelineAbortedError || signal?.aborted === true;
}

/**
 * Runs one request through every stage. Resolves with a complete result for any
 * stage failure; rejects only with PipelineAbortedError when the caller aborts.
 */
export async function runPipeline(request: QueryRequest, deps: OrchestratorDeps): Promise<PipelineResult> {
  const { signal } = request;
  const trace = new QueryProcessingTrace(request.sessionId);
  let state = createInitialState(request);

  logger.info('pipeline:start', {
    traceId: trace.traceId,
    sessionId: request.sessionId,
    province: request.province ?? null,
    historyMessages: state.conversationHistory.length,
  });

  for (const stage of PIPELINE_STAGES) {
    throwIfAborted(signal);
    if (state.stageFailure && !stage.closing) continue;
    if (stage.when && !stage.when(state)) continue;

    const started = Date.now();
    try {
      const config = await loadStageConfig(deps.configProvider, deps.appConfig, signal);
      const update = await stage.run(state, { deps, config, signal });
      state = { ...state, ...update };
      trace.record(stage.name, started, update.error);
    } catch (err) {
      if (isAbort(err, signal)) {
        logger.warn('pipeline:aborted', { traceId: trace.traceId, stage: stage.name });
        throw err instanceof PipelineAbortedError ? err : new PipelineAbortedError();
      }
      const failure: StageFailure = { stage: stage.name, message: errorMessage(err) };
      logger.error('pipeline:stage_failed', { traceId: trace.traceId, ...failure });
      state = {
        ...state,
        ...(stage.recover ? stage.recover(failure) : {}),
        stageFailure: state.stageFailure ?? failure,
        error: failureReason(failure),
      };
      trace.record(stage.name, started, failure.message);
    }
  }
  throwIfAborted(signal);
  const elapsedMs = trace.finish();

  const confidenceScore = state.confidenceScore ?? 0;
  const escalated = state.escalated ?? true;
  logger.info('pipeline:done', {
    traceId: trace.traceId,
    confidenceScore,
    method: state.confidenceMethod ?? 'error',
    escalated,
    sources: state.sources.length,
    ms: elapsedMs,
  });

  return {
    response: state.response ?? GENERATION_ERROR_RESPONSE,
    confidenceScore,
    confidenceMethod: state.confidenceMethod ?? 'error',
    escalated,
    escalationReason: state.escalationReason ?? (escalated && state.escalated === undefined ? 'Decision not reached' : null),
    sources: state.sources,
    tokensUsed: state.tokensUsed,
    debug: {
      queryAnalysis: state.queryAnalysis,
      contextDocuments: state.contextDocuments,
      toolResults: state.toolResults,
      confidenceBreakdown: state.confidenceBreakdown,
      promptVersions: state.promptVersions,
      error: state.error,
      traceId: trace.traceId,
      stages: trace.timings(),
    },
  };
}
