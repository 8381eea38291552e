/** Process configuration, read once from the environment. */
import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

const envSchema = z.object({
  port: z.coerce.number().int().positive().default(4000),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  environment: z.enum(['development', 'uat', 'production']).default('development'),
  corsOrigin: z.string().default('http://localhost:3000'),

  openai: z.object({
    apiKey: z.string().default(''),
    model: z.string().default('gpt-4'),
    embeddingModel: z.string().default('text-embedding-3-small'),
    embeddingDimensions: z.coerce.number().int().positive().default(1536),
  }),

  perplexity: z.object({
    apiKey: z.string().optional(),
    model: z.string().default('sonar'),
  }),

  supabase: z.object({
    url: z.string().default(''),
    serviceRoleKey: z.string().default(''),
  }),

  vector: z.object({
    similarityThreshold: z.coerce.number().min(0).max(1).default(0.45),
    maxResults: z.coerce.number().int().min(1).max(50).default(15),
  }),

  agent: z.object({
    confidenceThreshold: z.coerce.number().min(0).max(1).default(0.95),
    configName: z.string().default('default_agent_config'),
    configPath: z.string().optional(),
    configCacheTtlSeconds: z.coerce.number().int().min(0).default(300),
  }),

  conversationHistory: z.object({
    maxMessages: z.coerce.number().int().min(0).default(20),
    maxTokens: z.coerce.number().int().min(0).default(4000),
  }),
});

export type AppConfig = z.infer<typeof envSchema>;

function emptyToUndefined(value: string | undefined): string | undefined {
  return value != null && value.trim() !== '' ? value : undefined;
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return envSchema.parse({
    port: emptyToUndefined(env.PORT),
    nodeEnv: emptyToUndefined(env.NODE_ENV),
    environment: emptyToUndefined(env.APP_ENVIRONMENT),
    corsOrigin: emptyToUndefined(env.CORS_ORIGIN),
    openai: {
      apiKey: emptyToUndefined(env.OPENAI_API_KEY),
      model: emptyToUndefined(env.OPENAI_MODEL),
      embeddingModel: emptyToUndefined(env.OPENAI_EMBEDDING_MODEL),
      embeddingDimensions: emptyToUndefined(env.OPENAI_EMBEDDING_DIMENSIONS),
    },
    perplexity: {
      apiKey: emptyToUndefined(env.PERPLEXITY_API_KEY),
      model: emptyToUndefined(env.PERPLEXITY_MODEL),
    },
    supabase: {
      url: emptyToUndefined(env.SUPABASE_URL),
      serviceRoleKey: emptyToUndefined(env.SUPABASE_SERVICE_ROLE_KEY),
    },
    vector: {
      similarityThreshold: emptyToUndefined(env.VECTOR_SIMILARITY_THRESHOLD),
      maxResults: emptyToUndefined(env.VECTOR_MAX_RESULTS),
    },
    agent: {
      confidenceThreshold: emptyToUndefined(env.AGENT_CONFIDENCE_THRESHOLD),
      configName: emptyToUndefined(env.AGENT_CONFIG_NAME),
      configPath: emptyToUndefined(env.AGENT_CONFIG_PATH),
      configCacheTtlSeconds: emptyToUndefined(env.CONFIG_CACHE_TTL_SECONDS),
    },
    conversationHistory: {
      maxMessages: emptyToUndefined(env.CONVERSATION_HISTORY_MAX_MESSAGES),
      maxTokens: emptyToUndefined(env.CONVERSATION_HISTORY_MAX_TOKENS),
    },
  });
}

export const appConfig: AppConfig = loadAppConfig();
