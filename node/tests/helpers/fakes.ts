import { parseAgentConfig, type AgentConfig } from '@/config/agent-config';
import type { Completion, CompletionParams, LanguageModelGateway } from '@/services/model-router';
import type { PromptProvider, PromptRef, StoredPrompt } from '@/services/prompt-catalog';
import type { ContextRetriever, Embedder, RetrievalRequest } from '@/services/providers/retrieval-types';
import type { RetrievedPassage } from '@/types/core';

export interface RecordedCall {
  system: string;
  user: string;
  params: CompletionParams;
}

type Reply = string | Completion | Error | ((call: RecordedCall) => Promise<Completion>);

/**
 * Gateway that answers by matching the system prompt. Each rule's reply is a string,
 * a completion, an error to throw, or a function for custom behaviour.
 */
export class ScriptedGateway implements LanguageModelGateway {
  readonly calls: RecordedCall[] = [];
  private readonly rules: Array<{ match: RegExp; reply: Reply }> = [];

  on(match: RegExp, reply: Reply): this {
    this.rules.push({ match, reply });
    return this;
  }

  async complete(system: string, user: string, params: CompletionParams): Promise<Completion> {
    const call = { system, user, params };
    this.calls.push(call);
    const rule = this.rules.find((r) => r.match.test(system));
    if (!rule) throw new Error(`no scripted reply for system prompt: ${system.slice(0, 40)}`);
    const { reply } = rule;
    if (typeof reply === 'string') return { text: reply };
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'function') return reply(call);
    return reply;
  }

  callsMatching(match: RegExp): RecordedCall[] {
    return this.calls.filter((c) => match.test(c.system));
  }
}

/** Never resolves on its own; rejects when the call's signal aborts. */
export function hangingReply(call: RecordedCall): Promise<Completion> {
  return new Promise((_, reject) => {
    call.params.signal?.addEventListener('abort', () => reject(new Error('request aborted')), { once: true });
  });
}

export class StaticRetriever implements ContextRetriever {
  readonly requests: RetrievalRequest[] = [];

  constructor(private readonly result: RetrievedPassage[] | Error) {}

  async search(request: RetrievalRequest): Promise<RetrievedPassage[]> {
    this.requests.push(request);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

export class FixedEmbedder implements Embedder {
  readonly inputs: string[] = [];

  async embed(text: string): Promise<number[]> {
    this.inputs.push(text);
    return [0.1, 0.2, 0.3];
  }
}

/** Serves stored prompts by name and type; an Error makes every lookup fail. */
export class StaticPromptProvider implements PromptProvider {
  readonly lookups: PromptRef[] = [];

  constructor(private readonly stored: StoredPrompt[] | Error) {}

  async getActivePrompt(ref: PromptRef): Promise<StoredPrompt | null> {
    this.lookups.push(ref);
    if (this.stored instanceof Error) throw this.stored;
    return this.stored.find((p) => p.name === ref.name && p.promptType === ref.promptType) ?? null;
  }
}

export function storedPrompt(ref: PromptRef, content: string, version = 2): StoredPrompt {
  return { id: `prompt-${ref.name}-v${version}`, name: ref.name, promptType: ref.promptType, version, content };
}

export function passage(overrides: Partial<RetrievedPassage> = {}): RetrievedPassage {
  return {
    content: 'Employees are entitled to two weeks of vacation after one year of employment.',
    source: 'document',
    similarity: 0.8,
    metadata: {},
    ...overrides,
  };
}

export function testConfig(config: Record<string, unknown> = {}): AgentConfig {
  return parseAgentConfig({ name: 'test_config', version: 1, environment: 'all', config });
}

export const ANALYSIS_SYSTEM = /query analyzer/;
export const TOOL_SYSTEM = /choose tools/;
export const GENERATION_SYSTEM = /Employment Standards HR Assistant/;
export const JUDGE_SYSTEM = /confidence evaluator/;

export function analysisReply(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    intent: 'factual',
    intent_confidence: 0.9,
    complexity: 'simple',
    complexity_score: 0.2,
    entities: [],
    routing: 'standard_rag',
    routing_confidence: 0.9,
    requires_recent_context: false,
    requires_multiple_sources: false,
    suggested_doc_count: 4,
    suggested_similarity_threshold: 0.6,
    requires_tools: false,
    suggested_tools: [],
    key_concepts: ['vacation'],
    query_topics: ['leave'],
    analysis_reasoning: 'Direct factual question',
    ...overrides,
  });
}
