// src/services/pipeline-deps.ts: process-wide pipeline dependencies, built once at start-up
import { appConfig } from '@/config/app.config';
import type { AgentConfig } from '@/config/agent-config';
import { CachedConfigProvider, FileConfigProvider, type ConfigProvider } from '@/config/config-provider';
import type { OrchestratorDeps } from '@/services/orchestrator';
import { SupabaseChatHistoryStore, type ChatHistoryStore, type HistoryWindow } from './chat-history';
import { ConfigCache } from './config-cache';
import { supabaseAdmin } from './database';
import { OpenAiGateway } from './llm-client';
import { ModelRouter } from './model-router';
import { OpenAiEmbedder } from './providers/openai-embedder';
import { SupabaseConfigProvider } from './providers/supabase-config-provider';
import { SupabaseHybridRetriever } from './providers/supabase-hybrid-retriever';
import { PromptCatalog, type StoredPrompt } from './prompt-catalog';
import { SupabasePromptProvider } from './providers/supabase-prompt-provider';
import { PerplexityWebSearch } from './providers/web/perplexity-web';
import { ToolRegistry, calculatorTool, createCurrentTimeTool, createWebSearchTool, type Tool } from './tool-invoker';
import { logger } from './logger';

export interface ServiceDeps {
  pipeline: OrchestratorDeps;
  /** Same provider the pipeline reads through; exposed for cache invalidation. */
  config: CachedConfigProvider;
  history: ChatHistoryStore;
  /** Bounds conversation history sent with a request. */
  historyWindow: HistoryWindow;
}

let cachedDeps: ServiceDeps | null = null;

function sourceProvider(): ConfigProvider {
  if (appConfig.agent.configPath) {
    logger.info('config:source', { kind: 'file', path: appConfig.agent.configPath });
    return new FileConfigProvider(appConfig.agent.configPath);
  }
  logger.info('config:source', { kind: 'supabase', name: appConfig.agent.configName });
  return new SupabaseConfigProvider(supabaseAdmin, appConfig.agent.configName, appConfig.environment);
}

/** Web search joins the built-in tools only when an API key is configured. */
function builtInTools(): Tool[] {
  const tools = [calculatorTool, createCurrentTimeTool()];
  if (appConfig.perplexity.apiKey) {
    tools.push(createWebSearchTool(new PerplexityWebSearch(appConfig.perplexity.apiKey, appConfig.perplexity.model)));
  } else {
    logger.warn('tools:web_search_unavailable', { reason: 'PERPLEXITY_API_KEY not set' });
  }
  return tools;
}

export function getPipelineDeps(): ServiceDeps {
  if (cachedDeps) return cachedDeps;

  const config = new CachedConfigProvider(
    sourceProvider(),
    new ConfigCache<AgentConfig>(appConfig.agent.configCacheTtlSeconds),
    `${appConfig.agent.configName}:${appConfig.environment}`,
  );

  cachedDeps = {
    pipeline: {
      router: new ModelRouter(new OpenAiGateway()),
      embedder: new OpenAiEmbedder(appConfig.openai.embeddingModel, appConfig.openai.embeddingDimensions),
      retriever: new SupabaseHybridRetriever(supabaseAdmin),
      tools: new ToolRegistry(builtInTools()),
      configProvider: config,
      prompts: new PromptCatalog(
        new SupabasePromptProvider(supabaseAdmin),
        new ConfigCache<StoredPrompt>(appConfig.agent.configCacheTtlSeconds),
      ),
      appConfig,
    },
    config,
    history: new SupabaseChatHistoryStore(supabaseAdmin, appConfig.conversationHistory),
    historyWindow: appConfig.conversationHistory,
  };
  return cachedDeps;
}
