// node/src/services/prompt-catalog.ts: versioned prompts managed in the database, built-in text as fallback
//
// Each model call site asks the catalog for its prompt by name and type. A stored, active
// prompt is filled with the call's variables; a missing prompt, a lookup failure or a
// template that names an unknown variable falls back to the built-in text. The version
// of the prompt actually used (null for built-in) is reported back for the breakdowns.
import { ConfigCache } from './config-cache';
import { logger } from './logger';
import { errorMessage, throwIfAborted } from '@/utils/errors';

export interface PromptRef {
  name: string;
  promptType: string;
}

export const PROMPTS = {
  analysisSystem: { name: 'query_analysis_system', promptType: 'query_analysis_system' },
  analysisUser: { name: 'query_analysis_user', promptType: 'analysis' },
  toolSystem: { name: 'tool_invocation_system', promptType: 'tool_invocation' },
  generationSystem: { name: 'main_system_prompt', promptType: 'system' },
  generationUser: { name: 'retrieval_context_prompt', promptType: 'retrieval' },
  confidenceJudge: { name: 'confidence_evaluation_prompt', promptType: 'confidence' },
} as const satisfies Record<string, PromptRef>;

export interface StoredPrompt {
  id: string;
  name: string;
  promptType: string;
  version: number;
  content: string;
}

export interface PromptProvider {
  /** Active version of a prompt, or null when none is published. */
  getActivePrompt(ref: PromptRef, signal?: AbortSignal): Promise<StoredPrompt | null>;
}

export interface RenderedPrompt {
  text: string;
  /** Version of the stored prompt used; null when the built-in text was used. */
  version: number | null;
}

/** Prompt versions used by one request, keyed by prompt name. */
export type PromptVersions = Record<string, number | null>;

const PLACEHOLDER = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Fills `{name}` placeholders. `{{` and `}}` are literal braces, and braces around anything
 * other than a bare name (JSON examples in a prompt) are left alone. Throws on a name
 * that has no value.
 */
export function fillTemplate(template: string, variables: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER, (match: string, name: string | undefined) => {
    if (name === undefined) return match === '{{' ? '{' : '}';
    const value = variables[name];
    if (value === undefined) throw new Error(`missing template variable '${name}'`);
    return value;
  });
}

export class PromptCatalog {
  constructor(
    private readonly provider: PromptProvider | null,
    private readonly cache: ConfigCache<StoredPrompt> | null = null,
  ) {}

  async render(
    ref: PromptRef,
    variables: Readonly<Record<string, string>>,
    fallback: string,
    signal?: AbortSignal,
  ): Promise<RenderedPrompt> {
    if (!this.provider) return { text: fallback, version: null };

    try {
      const stored = await this.lookup(this.provider, ref, signal);
      if (!stored) {
        logger.debug('prompts:fallback', { name: ref.name, reason: 'not_found' });
        return { text: fallback, version: null };
      }
      const text = fillTemplate(stored.content, variables);
      logger.debug('prompts:rendered', { name: ref.name, version: stored.version });
      return { text, version: stored.version };
    } catch (err) {
      throwIfAborted(signal);
      logger.warn('prompts:fallback', { name: ref.name, error: errorMessage(err) });
      return { text: fallback, version: null };
    }
  }

  invalidate(): void {
    this.cache?.invalidate();
  }

  private async lookup(provider: PromptProvider, ref: PromptRef, signal?: AbortSignal): Promise<StoredPrompt | null> {
    const key = `${ref.name}:${ref.promptType}`;
    const cached = this.cache?.get(key);
    if (cached) return cached;

    const stored = await provider.getActivePrompt(ref, signal);
    if (stored) this.cache?.set(key, stored);
    return stored;
  }
}

/** Catalog without a store: every call site uses its built-in prompt. */
export const BUILT_IN_PROMPTS = new PromptCatalog(null);
