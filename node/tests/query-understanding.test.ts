import { analyzeQuery, normalizeEntities, parseAnalysisReply } from '@/services/query-understanding';
import { ModelRouter } from '@/services/model-router';
import { PipelineAbortedError } from '@/utils/errors';
import { ANALYSIS_SYSTEM, ScriptedGateway, analysisReply, testConfig } from './helpers/fakes';

const config = testConfig().config;
const QUERY = 'How much vacation pay am I owed in Manitoba?';

async function analyzeWith(reply: string | Error) {
  const gateway = new ScriptedGateway().on(ANALYSIS_SYSTEM, reply);
  const outcome = await analyzeQuery(QUERY, new ModelRouter(gateway), config);
  return { gateway, ...outcome };
}

describe('analyzeQuery', () => {
  it('parses a fenced JSON reply', async () => {
    const { analysis, error, gateway } = await analyzeWith('```json\n' + analysisReply() + '\n```');

    expect(error).toBeUndefined();
    expect(analysis.originalQuery).toBe(QUERY);
    expect(analysis.intent).toBe('factual');
    expect(analysis.complexity).toBe('simple');
    expect(analysis.routing).toBe('standard_rag');
    expect(analysis.suggestedDocCount).toBe(4);
    expect(analysis.suggestedSimilarityThreshold).toBe(0.6);
    expect(analysis.keyConcepts).toEqual(['vacation']);
    expect(gateway.calls[0].params.temperature).toBe(0.3);
    expect(gateway.calls[0].params.maxTokens).toBe(1000);
    expect(gateway.calls[0].user).toContain(QUERY);
  });

  it('normalizes enum casing', async () => {
    const { analysis } = await analyzeWith(analysisReply({ intent: 'Procedural', complexity: 'COMPLEX' }));
    expect(analysis.intent).toBe('procedural');
    expect(analysis.complexity).toBe('complex');
  });

  it('fills defaults for optional fields', async () => {
    const { analysis } = await analyzeWith(JSON.stringify({ intent: 'definition', complexity: 'moderate' }));

    expect(analysis.intentConfidence).toBe(0.8);
    expect(analysis.complexityScore).toBe(0.5);
    expect(analysis.routingConfidence).toBe(0.8);
    expect(analysis.suggestedDocCount).toBe(5);
    expect(analysis.suggestedSimilarityThreshold).toBe(0.45);
    expect(analysis.routing).toBe('standard_rag');
    expect(analysis.entities).toEqual([]);
  });

  it('clamps and rounds the suggested document count', async () => {
    expect((await analyzeWith(analysisReply({ suggested_doc_count: 37.6 }))).analysis.suggestedDocCount).toBe(20);
    expect((await analyzeWith(analysisReply({ suggested_doc_count: 0.2 }))).analysis.suggestedDocCount).toBe(1);
    expect((await analyzeWith(analysisReply({ suggested_doc_count: 6.5 }))).analysis.suggestedDocCount).toBe(7);
  });

  it('maps the legacy routing field', async () => {
    const tools = await analyzeWith(analysisReply({ routing: undefined, routing_decision: 'tools' }));
    expect(tools.analysis.routing).toBe('tool_invocation');

    const unknown = await analyzeWith(analysisReply({ routing: undefined, routing_decision: 'somewhere' }));
    expect(unknown.analysis.routing).toBe('standard_rag');
  });

  it('falls back when the reply is not JSON', async () => {
    const { analysis, error } = await analyzeWith('I think this is about vacation.');

    expect(error).toBe('Query analysis error (using fallback): analysis reply is not a JSON object');
    expect(analysis).toEqual({
      originalQuery: QUERY,
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
      analysisReasoning: 'Fallback analysis due to error: analysis reply is not a JSON object',
      analysisTimeMs: 0,
    });
  });

  it('falls back when the model call fails', async () => {
    const { analysis, error } = await analyzeWith(new Error('model down'));
    expect(error).toBe('Query analysis error (using fallback): model down');
    expect(analysis.intent).toBe('unknown');
  });

  it('falls back when a required field is missing', async () => {
    const { analysis, error } = await analyzeWith(JSON.stringify({ complexity: 'simple' }));
    expect(analysis.intent).toBe('unknown');
    expect(error).toMatch(/^Query analysis error \(using fallback\): intent: /);
  });

  it('falls back on an invalid entity object', async () => {
    const { analysis, error } = await analyzeWith(
      analysisReply({ entities: [{ text: 'x', type: 'weird', confidence: 0.5 }] }),
    );
    expect(analysis.intent).toBe('unknown');
    expect(error).toMatch(/^Query analysis error \(using fallback\): type: Invalid enum value/);
  });

  it('propagates caller cancellation', async () => {
    const controller = new AbortController();
    controller.abort();
    const gateway = new ScriptedGateway().on(ANALYSIS_SYSTEM, new Error('request aborted'));

    await expect(analyzeQuery(QUERY, new ModelRouter(gateway), config, controller.signal)).rejects.toBeInstanceOf(
      PipelineAbortedError,
    );
  });
});

describe('normalizeEntities', () => {
  it('reads a list of strings as concepts', () => {
    expect(normalizeEntities(['vacation pay'])).toEqual([
      { text: 'vacation pay', type: 'concept', confidence: 0.7, metadata: {} },
    ]);
  });

  it('reads a category map', () => {
    expect(normalizeEntities({ products: ['Payroll Pro'], topics: ['overtime', 42] })).toEqual([
      { text: 'Payroll Pro', type: 'product', confidence: 0.8, metadata: { category: 'products' } },
      { text: 'overtime', type: 'concept', confidence: 0.8, metadata: { category: 'topics' } },
    ]);
  });

  it('validates entity objects', () => {
    expect(normalizeEntities([{ text: 'Ontario', type: 'JURISDICTION', confidence: 0.9 }])).toEqual([
      { text: 'Ontario', type: 'jurisdiction', confidence: 0.9, metadata: {} },
    ]);
    expect(() => normalizeEntities([{ text: 'Ontario', type: 'jurisdiction', confidence: 2 }])).toThrow();
  });

  it('skips list items that are neither strings nor objects', () => {
    expect(normalizeEntities(['vacation', null, 5, ['nested'], true])).toEqual([
      { text: 'vacation', type: 'concept', confidence: 0.7, metadata: {} },
    ]);
  });

  it('keeps the model analysis when the entity list holds stray values', async () => {
    const { analysis, error } = await analyzeWith(
      analysisReply({ intent: 'procedural', routing: 'tool_invocation', entities: ['overtime', null, 3] }),
    );

    expect(error).toBeUndefined();
    expect(analysis.intent).toBe('procedural');
    expect(analysis.routing).toBe('tool_invocation');
    expect(analysis.entities).toEqual([{ text: 'overtime', type: 'concept', confidence: 0.7, metadata: {} }]);
  });

  it('returns nothing for missing or scalar values', () => {
    expect(normalizeEntities(undefined)).toEqual([]);
    expect(normalizeEntities('Ontario')).toEqual([]);
  });
});

describe('parseAnalysisReply', () => {
  it('records the elapsed time it is given', () => {
    expect(parseAnalysisReply('q', analysisReply(), 42).analysisTimeMs).toBe(42);
  });
});
