// node/src/services/tool-invoker.ts: built-in tools and the tool-invocation stage
import { Parser } from 'expr-eval';
import { z } from 'zod';
import type { AgentConfigData, ToolConfig } from '@/config/agent-config';
import type { ToolResult } from '@/types/core';
import type { ModelRouter } from './model-router';
import type { WebSearchClient } from './providers/web/perplexity-web';
import { BUILT_IN_PROMPTS, PROMPTS, type PromptCatalog, type PromptVersions } from './prompt-catalog';
import { TOOL_SELECTION_SYSTEM_PROMPT, buildToolSelectionPrompt } from './prompt-templates';
import { safeParseJson } from './safe-parse-json';
import { logger } from './logger';
import { errorMessage, throwIfAborted, withTimeout } from '@/utils/errors';

const DEFAULT_TOOL_TIMEOUT_MS = 5000;

export interface ToolRunContext {
  signal?: AbortSignal;
  /** From `toolConfigs[<name>].maxResults`, for tools that return lists. */
  maxResults?: number;
}

export interface Tool {
  name: string;
  description: string;
  /** Short argument description shown to the model. */
  argumentsHint: string;
  /** Validates its own arguments; throws on bad input or failure. */
  execute(args: Record<string, unknown>, context?: ToolRunContext): Promise<string>;
}

// Numbers and arithmetic only: no identifiers reach the parser, so no variables,
// member access, function calls or assignments can be evaluated.
const ARITHMETIC_ONLY = /^[0-9.+\-*/%^()\s]+$/;
const MAX_EXPRESSION_LENGTH = 200;

const mathParser = new Parser({
  allowMemberAccess: false,
  operators: {
    assignment: false,
    comparison: false,
    concatenate: false,
    conditional: false,
    in: false,
    logical: false,
  },
});
const calculatorArgs = z.object({
  expression: z
    .string()
    .min(1)
    .max(MAX_EXPRESSION_LENGTH)
    .regex(ARITHMETIC_ONLY, 'Only numbers and + - * / % ^ ( ) are allowed'),
});

export const calculatorTool: Tool = {
  name: 'calculator',
  description: 'Evaluates an arithmetic expression, e.g. pay or hour calculations.',
  argumentsHint: '{"expression": "40 * 15.5 * 1.5"}',
  async execute(args) {
    const { expression } = calculatorArgs.parse(args);
    const result = mathParser.evaluate(expression, {});
    if (!Number.isFinite(result)) throw new Error('Division by zero or non-finite result');
    return String(result);
  },
};

const currentTimeArgs = z.object({ timezone: z.string().min(1).default('UTC') });

function formatInZone(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? '00';
  return `${get('year')}-${get('month')}-${get('day')} ${get('hour')}:${get('minute')}:${get('second')}`;
}

export function createCurrentTimeTool(now: () => Date = () => new Date()): Tool {
  return {
    name: 'current_time',
    description: 'Current date and time in an IANA time zone (e.g. America/Winnipeg).',
    argumentsHint: '{"timezone": "America/Toronto"}',
    async execute(args) {
      const { timezone } = currentTimeArgs.parse(args);
      return `${formatInZone(now(), timezone)} ${timezone}`;
    },
  };
}

const webSearchArgs = z.object({ query: z.string().min(1).max(400) });
const DEFAULT_WEB_RESULTS = 5;

/** Answer plus numbered sources, for questions the indexed documents do not cover. */
export function createWebSearchTool(client: WebSearchClient): Tool {
  return {
    name: 'web_search',
    description: 'Searches the web for current information not found in the employment-standards documents.',
    argumentsHint: '{"query": "Manitoba minimum wage October 2024"}',
    async execute(args, context) {
      const { query } = webSearchArgs.parse(args);
      const answer = await client.search(query, context?.maxResults ?? DEFAULT_WEB_RESULTS, context?.signal);
      const sources = answer.hits.map((hit, i) => `[${i + 1}] ${hit.title ?? hit.url} (${hit.url})`);
      const lines = [answer.summary || 'No answer found.'];
      if (sources.length > 0) lines.push('Sources:', ...sources);
      return lines.join('\n');
    },
  };
}

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  constructor(tools: Tool[] = [calculatorTool, createCurrentTimeTool()]) {
    for (const tool of tools) this.tools.set(tool.name, tool);
  }

  register(tool: Tool): void {
    this.tools.set(tool.name, tool);
  }

  /** Registered tools that the configuration enables, in configuration order. */
  enabled(names: string[]): Tool[] {
    return names.flatMap((name) => {
      const tool = this.tools.get(name);
      return tool ? [tool] : [];
    });
  }
}

const toolSelectionSchema = z.object({
  tool_calls: z
    .array(
      z.object({
        tool: z.string(),
        arguments: z.record(z.unknown()).default({}),
      }),
    )
    .default([]),
});

export interface InvokeToolsOutcome {
  toolResults: ToolResult[];
  error?: string;
  promptVersions: PromptVersions;
}

async function runTool(
  tool: Tool | undefined,
  name: string,
  args: Record<string, unknown>,
  settings: ToolConfig | undefined,
  signal?: AbortSignal,
): Promise<ToolResult> {
  const timeoutMs = settings?.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
  try {
    if (!tool) throw new Error(`Tool '${name}' not found`);
    const run = tool.execute(args, { signal, maxResults: settings?.maxResults });
    const result = await withTimeout(run, timeoutMs, `tool ${name}`);
    logger.info('tools:executed', { tool: name });
    return { toolName: name, toolArgs: args, result, success: true };
  } catch (err) {
    throwIfAborted(signal);
    const message = errorMessage(err);
    logger.warn('tools:failed', { tool: name, error: message });
    return {
      toolName: name,
      toolArgs: args,
      result: `Tool execution error: ${message}`,
      success: false,
      error: message,
    };
  }
}

/**
 * Asks the model which enabled tools to call, then runs them in order.
 * Selection failures are recorded, not thrown; a failing tool yields an unsuccessful result.
 */
export async function invokeTools(params: {
  query: string;
  registry: ToolRegistry;
  router: ModelRouter;
  config: AgentConfigData;
  signal?: AbortSignal;
  prompts?: PromptCatalog;
}): Promise<InvokeToolsOutcome> {
  const { registry, config, signal, prompts = BUILT_IN_PROMPTS } = params;
  const available = registry.enabled(config.toolRegistry.enabledTools);
  if (available.length === 0) {
    logger.warn('tools:none_available');
    return { toolResults: [], error: 'No tools available', promptVersions: {} };
  }

  const system = await prompts.render(PROMPTS.toolSystem, {}, TOOL_SELECTION_SYSTEM_PROMPT, signal);
  const promptVersions: PromptVersions = { [PROMPTS.toolSystem.name]: system.version };
  try {
    const prompt = buildToolSelectionPrompt(
      params.query,
      available.map((t) => ({ name: t.name, description: t.description, arguments: t.argumentsHint })),
    );
    const completion = await params.router.run('tool_selection', system.text, prompt, config, signal);
    const json = safeParseJson(completion.text, 'tool-selection');
    if (!json) throw new Error('tool selection reply is not a JSON object');
    const { tool_calls: calls } = toolSelectionSchema.parse(json);

    logger.info('tools:selected', { calls: calls.map((c) => c.tool) });
    const byName = new Map(available.map((t) => [t.name, t]));
    const toolResults: ToolResult[] = [];
    for (const call of calls) {
      throwIfAborted(signal);
      const settings = config.toolRegistry.toolConfigs[call.tool];
      toolResults.push(await runTool(byName.get(call.tool), call.tool, call.arguments, settings, signal));
    }
    return { toolResults, promptVersions };
  } catch (err) {
    throwIfAborted(signal);
    const message = errorMessage(err);
    logger.error('tools:invocation_failed', { error: message });
    return { toolResults: [], error: `Tool invocation error: ${message}`, promptVersions };
  }
}
