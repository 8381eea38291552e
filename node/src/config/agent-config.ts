/**
 * Agent configuration: thresholds, model/search settings, tool registry and the
 * confidence-calculation policy. Validated once when a record is loaded; the
 * pipeline never re-validates or normalizes weights at scoring time.
 */
import { z } from 'zod';
import type { AppConfig } from './app.config';
import { ConfigValidationError } from '@/utils/errors';

const WEIGHT_TOLERANCE = 0.01;

const unit = () => z.number().min(0).max(1);

export const confidenceThresholdsSchema = z.object({
  escalation: unit().default(0.95),
  high: unit().default(0.85),
  medium: unit().default(0.7),
  low: unit().default(0.5),
});

export const modelSettingsSchema = z.object({
  provider: z.enum(['openai']).default('openai'),
  model: z.string().min(1).default('gpt-4'),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().min(1).max(4096).default(1000),
  topP: unit().default(1),
  frequencyPenalty: z.number().min(-2).max(2).default(0),
  presencePenalty: z.number().min(-2).max(2).default(0),
});

export const analysisSettingsSchema = z.object({
  temperature: z.number().min(0).max(2).default(0.3),
  maxTokens: z.number().int().min(1).max(4096).default(1000),
});

export const searchSettingsSchema = z.object({
  similarityThreshold: unit().default(0.7),
  maxResults: z.number().int().min(1).max(50).default(5),
  useHybridSearch: z.boolean().default(true),
  /** Upper bound applied to the analyzer's suggested threshold before it is used. */
  suggestedThresholdCap: unit().default(0.5),
});

export const toolConfigSchema = z.object({
  timeoutMs: z.number().int().min(100).default(5000),
  maxResults: z.number().int().min(1).optional(),
});

export const toolRegistrySchema = z.object({
  enabledTools: z.array(z.string()).default(['calculator', 'current_time']),
  toolConfigs: z.record(toolConfigSchema).default({}),
});

export const formulaWeightsSchema = z
  .object({
    similarity: unit().default(0.8),
    sourceQuality: unit().default(0.1),
    responseLength: unit().default(0.1),
  })
  .superRefine((w, ctx) => {
    const total = w.similarity + w.sourceQuality + w.responseLength;
    if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          `Formula weights must sum to 1.0 (got ${total.toFixed(2)}). ` +
          `similarity=${w.similarity}, sourceQuality=${w.sourceQuality}, responseLength=${w.responseLength}`,
      });
    }
  });

export const hybridSettingsSchema = z
  .object({
    formulaWeight: unit().default(0.6),
    llmWeight: unit().default(0.4),
  })
  .superRefine((w, ctx) => {
    const total = w.formulaWeight + w.llmWeight;
    if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          `Hybrid weights must sum to 1.0 (got ${total.toFixed(2)}). ` +
          `formulaWeight=${w.formulaWeight}, llmWeight=${w.llmWeight}`,
      });
    }
  });

export const llmConfidenceSettingsSchema = z.object({
  provider: z.enum(['openai']).default('openai'),
  model: z.string().min(1).default('gpt-4o-mini'),
  temperature: z.number().min(0).max(2).default(0.1),
  maxTokens: z.number().int().min(10).max(500).default(100),
  timeoutMs: z.number().int().min(1).max(10_000).default(2000),
});

/** Tuned scoring constants of the formula strategy. */
export const formulaPolicySchema = z.object({
  topWeightsThree: z.tuple([unit(), unit(), unit()]).default([0.6, 0.3, 0.1]),
  topWeightsTwo: z.tuple([unit(), unit()]).default([0.7, 0.3]),
  highQualitySimilarity: unit().default(0.75),
  /** Boost for 0, 1, 2 and 3+ high-quality sources. */
  sourceBoosts: z.tuple([unit(), unit(), unit(), unit()]).default([0, 0.3, 0.6, 1]),
  fullLengthChars: z.number().int().min(0).default(200),
  partialLengthChars: z.number().int().min(0).default(100),
  partialLengthBoost: unit().default(0.5),
});

export const confidenceCalculationSchema = z.object({
  method: z.enum(['formula', 'llm', 'hybrid']).default('formula'),
  formulaWeights: formulaWeightsSchema.default({}),
  hybridSettings: hybridSettingsSchema.default({}),
  llmSettings: llmConfidenceSettingsSchema.default({}),
  formulaPolicy: formulaPolicySchema.default({}),
});

export const outputSettingsSchema = z.object({
  excerptMaxLength: z.number().int().min(20).default(300),
  /** A boundary cut is taken only if it keeps more than this share of the excerpt. */
  excerptBoundaryRatio: unit().default(0.7),
});

export const agentConfigDataSchema = z.object({
  confidenceThresholds: confidenceThresholdsSchema.default({}),
  modelSettings: modelSettingsSchema.default({}),
  analysisSettings: analysisSettingsSchema.default({}),
  searchSettings: searchSettingsSchema.default({}),
  toolRegistry: toolRegistrySchema.default({}),
  confidenceCalculation: confidenceCalculationSchema.default({}),
  outputSettings: outputSettingsSchema.default({}),
});

export const agentConfigSchema = z.object({
  name: z.string().default('default_agent_config'),
  version: z.number().int().min(0).default(0),
  environment: z.enum(['development', 'uat', 'production', 'all']).default('all'),
  config: agentConfigDataSchema.default({}),
});

export type AgentConfigData = z.infer<typeof agentConfigDataSchema>;
export type AgentConfig = z.infer<typeof agentConfigSchema>;
export type SearchSettings = z.infer<typeof searchSettingsSchema>;
export type ModelSettings = z.infer<typeof modelSettingsSchema>;
export type ConfidenceCalculationConfig = z.infer<typeof confidenceCalculationSchema>;
export type FormulaWeights = z.infer<typeof formulaWeightsSchema>;
export type FormulaPolicy = z.infer<typeof formulaPolicySchema>;
export type HybridSettings = z.infer<typeof hybridSettingsSchema>;
export type LlmConfidenceSettings = z.infer<typeof llmConfidenceSettingsSchema>;
export type OutputSettings = z.infer<typeof outputSettingsSchema>;
export type ToolRegistrySettings = z.infer<typeof toolRegistrySchema>;
export type ToolConfig = z.infer<typeof toolConfigSchema>;

/**
 * Parses a raw agent-config record. Throws ConfigValidationError listing every
 * violated field; invalid weights are rejected, never rescaled.
 */
export function parseAgentConfig(raw: unknown): AgentConfig {
  const result = agentConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map((e) => ({
      path: e.path.join('.') || 'root',
      message: e.message,
    }));
    throw new ConfigValidationError(
      `Invalid agent configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
      issues,
    );
  }
  return result.data;
}

/** Configuration used when no active record can be loaded. */
export function buildFallbackAgentConfig(app: AppConfig): AgentConfig {
  return parseAgentConfig({
    name: 'fallback',
    version: 0,
    environment: 'all',
    config: {
      confidenceThresholds: { escalation: app.agent.confidenceThreshold },
      modelSettings: { model: app.openai.model },
      searchSettings: {
        similarityThreshold: app.vector.similarityThreshold,
        maxResults: app.vector.maxResults,
      },
    },
  });
}
