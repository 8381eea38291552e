import axios, { type InternalAxiosRequestConfig } from 'axios';
import {
  PerplexityWebSearch,
  type WebSearchAnswer,
  type WebSearchClient,
} from '@/services/providers/web/perplexity-web';
import {
  calculatorTool,
  createCurrentTimeTool,
  createWebSearchTool,
  invokeTools,
  ToolRegistry,
  type Tool,
} from '@/services/tool-invoker';
import { ModelRouter } from '@/services/model-router';
import { ScriptedGateway, TOOL_SYSTEM, testConfig } from './helpers/fakes';

const config = testConfig().config;

function selection(calls: Array<{ tool: string; arguments?: Record<string, unknown> }>): string {
  return JSON.stringify({ tool_calls: calls });
}

async function invokeWith(reply: string, registry = new ToolRegistry(), agentConfig = config) {
  const gateway = new ScriptedGateway().on(TOOL_SYSTEM, reply);
  const outcome = await invokeTools({ query: 'overtime for 40 hours', registry, router: new ModelRouter(gateway), config: agentConfig });
  return { gateway, ...outcome };
}

describe('invokeTools', () => {
  it('runs the selected calculator call', async () => {
    const { toolResults, error, gateway } = await invokeWith(
      selection([{ tool: 'calculator', arguments: { expression: '40 * 15.5 * 1.5' } }]),
    );

    expect(error).toBeUndefined();
    expect(toolResults).toEqual([
      { toolName: 'calculator', toolArgs: { expression: '40 * 15.5 * 1.5' }, result: '930', success: true },
    ]);
    expect(gateway.calls[0].params.temperature).toBe(0);
    expect(gateway.calls[0].params.maxTokens).toBe(300);
    expect(gateway.calls[0].user).toContain('calculator');
  });

  it('records an unknown tool as an unsuccessful result', async () => {
    const { toolResults } = await invokeWith(selection([{ tool: 'weather' }]));

    expect(toolResults).toEqual([
      {
        toolName: 'weather',
        toolArgs: {},
        result: "Tool execution error: Tool 'weather' not found",
        success: false,
        error: "Tool 'weather' not found",
      },
    ]);
  });

  it('records a failing tool and keeps running the rest', async () => {
    const { toolResults } = await invokeWith(
      selection([
        { tool: 'calculator', arguments: { expression: '1 / 0' } },
        { tool: 'calculator', arguments: { expression: '2 + 3' } },
      ]),
    );

    expect(toolResults.map((r) => [r.success, r.result])).toEqual([
      [false, 'Tool execution error: Division by zero or non-finite result'],
      [true, '5'],
    ]);
  });

  it('times out a slow tool using its configured limit', async () => {
    const slow: Tool = {
      name: 'slow',
      description: 'never answers',
      argumentsHint: '{}',
      execute: () => new Promise<string>(() => undefined),
    };
    const agentConfig = testConfig({
      toolRegistry: { enabledTools: ['slow'], toolConfigs: { slow: { timeoutMs: 100 } } },
    }).config;

    const { toolResults } = await invokeWith(selection([{ tool: 'slow' }]), new ToolRegistry([slow]), agentConfig);

    expect(toolResults[0].success).toBe(false);
    expect(toolResults[0].error).toBe('tool slow timed out after 100ms');
  });

  it('reports when no tools are enabled without calling the model', async () => {
    const agentConfig = testConfig({ toolRegistry: { enabledTools: [] } }).config;
    const { toolResults, error, gateway } = await invokeWith(selection([]), new ToolRegistry(), agentConfig);

    expect(toolResults).toEqual([]);
    expect(error).toBe('No tools available');
    expect(gateway.calls).toHaveLength(0);
  });

  it('records a selection reply that is not JSON', async () => {
    const { toolResults, error } = await invokeWith('use the calculator');

    expect(toolResults).toEqual([]);
    expect(error).toBe('Tool invocation error: tool selection reply is not a JSON object');
  });

  it('accepts an empty selection', async () => {
    const { toolResults, error } = await invokeWith(selection([]));
    expect(toolResults).toEqual([]);
    expect(error).toBeUndefined();
  });
});

describe('built-in tools', () => {
  it('rejects a calculator call without an expression', async () => {
    await expect(calculatorTool.execute({})).rejects.toThrow();
  });

  it('evaluates plain arithmetic', async () => {
    expect(await calculatorTool.execute({ expression: '(40 * 1.5) ^ 2 % 7' })).toBe('2');
  });

  it.each(['constructor.constructor("return process")()', 'x = 5', 'sqrt(16)', '1 == 1 ? 2 : 3'])(
    'refuses anything but numbers and arithmetic operators: %s',
    async (expression) => {
      await expect(calculatorTool.execute({ expression })).rejects.toThrow(
        'Only numbers and + - * / % ^ ( ) are allowed',
      );
    },
  );

  it('formats the current time in the requested zone', async () => {
    const tool = createCurrentTimeTool(() => new Date('2024-03-15T12:30:45Z'));

    expect(await tool.execute({})).toBe('2024-03-15 12:30:45 UTC');
    expect(await tool.execute({ timezone: 'America/Winnipeg' })).toBe('2024-03-15 07:30:45 America/Winnipeg');
  });

  it('lists enabled tools in configuration order', () => {
    const registry = new ToolRegistry();
    expect(registry.enabled(['current_time', 'missing', 'calculator']).map((t) => t.name)).toEqual([
      'current_time',
      'calculator',
    ]);
  });
});

class RecordingSearch implements WebSearchClient {
  readonly calls: Array<{ query: string; maxResults: number }> = [];

  constructor(private readonly answer: WebSearchAnswer) {}

  async search(query: string, maxResults: number): Promise<WebSearchAnswer> {
    this.calls.push({ query, maxResults });
    return this.answer;
  }
}

describe('web search tool', () => {
  it('returns the answer followed by numbered sources', async () => {
    const client = new RecordingSearch({
      summary: 'The Manitoba minimum wage is $15.80.',
      hits: [{ url: 'https://a.example', title: 'Minimum wage' }, { url: 'https://b.example' }],
    });

    const result = await createWebSearchTool(client).execute({ query: 'Manitoba minimum wage' }, { maxResults: 3 });

    expect(result).toBe(
      'The Manitoba minimum wage is $15.80.\nSources:\n' +
        '[1] Minimum wage (https://a.example)\n[2] https://b.example (https://b.example)',
    );
    expect(client.calls).toEqual([{ query: 'Manitoba minimum wage', maxResults: 3 }]);
  });

  it('says so when the search finds nothing', async () => {
    const tool = createWebSearchTool(new RecordingSearch({ summary: '', hits: [] }));
    expect(await tool.execute({ query: 'anything' })).toBe('No answer found.');
  });

  it('takes its result limit from the tool configuration', async () => {
    const client = new RecordingSearch({ summary: 'ok', hits: [] });
    const agentConfig = testConfig({
      toolRegistry: { enabledTools: ['web_search'], toolConfigs: { web_search: { maxResults: 2 } } },
    }).config;

    const { toolResults } = await invokeWith(
      selection([{ tool: 'web_search', arguments: { query: 'Saskatchewan statutory holidays' } }]),
      new ToolRegistry([createWebSearchTool(client)]),
      agentConfig,
    );

    expect(toolResults[0]).toMatchObject({ toolName: 'web_search', success: true, result: 'ok' });
    expect(client.calls).toEqual([{ query: 'Saskatchewan statutory holidays', maxResults: 2 }]);
  });
});

describe('PerplexityWebSearch', () => {
  it('posts the query and keeps well-formed search results up to the limit', async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const http = axios.create({
      adapter: async (request) => {
        requests.push(request);
        return {
          data: {
            choices: [{ message: { content: ' Fifteen dollars eighty. ' } }],
            search_results: [
              { url: 'https://gov.example/wage', title: 'Minimum wage', date: null },
              { title: 'no address' },
              { url: 'https://gov.example/b', title: 'B' },
              { url: 'https://gov.example/c' },
            ],
          },
          status: 200,
          statusText: 'OK',
          headers: {},
          config: request,
        };
      },
    });

    const answer = await new PerplexityWebSearch('test-secret', 'sonar', http).search('Manitoba minimum wage', 2);

    expect(answer).toEqual({
      summary: 'Fifteen dollars eighty.',
      hits: [
        { url: 'https://gov.example/wage', title: 'Minimum wage' },
        { url: 'https://gov.example/b', title: 'B' },
      ],
    });
    expect(requests[0].url).toBe('https://api.perplexity.ai/chat/completions');
    expect(requests[0].headers.get('Authorization')).toBe('Bearer test-secret');
    const body: unknown = JSON.parse(String(requests[0].data));
    expect(body).toMatchObject({
      model: 'sonar',
      messages: [{ role: 'system' }, { role: 'user', content: 'Manitoba minimum wage' }],
    });
  });
});
