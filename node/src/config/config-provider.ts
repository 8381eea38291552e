// node/src/config/config-provider.ts: where the active agent configuration comes from
import { promises as fs } from 'fs';
import { buildFallbackAgentConfig, parseAgentConfig, type AgentConfig } from './agent-config';
import type { AppConfig } from './app.config';
import { ConfigCache } from '@/services/config-cache';
import { logger } from '@/services/logger';
import { errorMessage, throwIfAborted } from '@/utils/errors';

export interface ConfigProvider {
  /** Active configuration, or null when none is published. */
  getActiveConfig(signal?: AbortSignal): Promise<AgentConfig | null>;
}

/** In-memory configuration; used for tests and fixed deployments. */
export class StaticConfigProvider implements ConfigProvider {
  private readonly config: AgentConfig | null;

  constructor(raw: unknown) {
    this.config = raw === null ? null : parseAgentConfig(raw);
  }

  async getActiveConfig(): Promise<AgentConfig | null> {
    return this.config;
  }
}

/** Reads a JSON record from disk on every call; wrap it in CachedConfigProvider. */
export class FileConfigProvider implements ConfigProvider {
  constructor(private readonly filePath: string) {}

  async getActiveConfig(signal?: AbortSignal): Promise<AgentConfig | null> {
    const text = await fs.readFile(this.filePath, { encoding: 'utf8', signal });
    const raw: unknown = JSON.parse(text);
    return parseAgentConfig(raw);
  }
}

export class CachedConfigProvider implements ConfigProvider {
  private readonly cacheKey: string;

  constructor(
    private readonly inner: ConfigProvider,
    private readonly cache: ConfigCache<AgentConfig>,
    cacheKey = 'active',
  ) {
    this.cacheKey = cacheKey;
  }

  async getActiveConfig(signal?: AbortSignal): Promise<AgentConfig | null> {
    const cached = this.cache.get(this.cacheKey);
    if (cached) return cached;

    const config = await this.inner.getActiveConfig(signal);
    if (config) {
      this.cache.set(this.cacheKey, config);
      logger.debug('config:loaded', { name: config.name, version: config.version });
    }
    return config;
  }

  invalidate(): void {
    this.cache.invalidate(this.cacheKey);
  }
}

/**
 * Configuration for one stage. Provider failures and missing records degrade to the
 * process-level fallback; cancellation is rethrown.
 */
export async function loadStageConfig(
  provider: ConfigProvider,
  fallback: AppConfig,
  signal?: AbortSignal,
): Promise<AgentConfig> {
  try {
    const config = await provider.getActiveConfig(signal);
    if (config) return config;
    logger.warn('config:no_active_record', { using: 'fallback' });
  } catch (err) {
    throwIfAborted(signal);
    logger.warn('config:load_failed', { error: errorMessage(err), using: 'fallback' });
  }
  return buildFallbackAgentConfig(fallback);
}
