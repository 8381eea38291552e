// Active agent configuration stored in the `agent_configs` table (JSONB, snake_case keys).
import type { SupabaseClient } from '@supabase/supabase-js';
import { parseAgentConfig, type AgentConfig } from '@/config/agent-config';
import type { ConfigProvider } from '@/config/config-provider';
import { logger } from '@/services/logger';

/** Keys whose children are user-chosen names (tool names), not schema fields. */
const OPAQUE_KEYS = new Set(['toolConfigs']);

function toCamel(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase());
}

export function camelizeKeys(value: unknown, keepKeys = false): unknown {
  if (Array.isArray(value)) return value.map((v) => camelizeKeys(v));
  if (typeof value !== 'object' || value === null) return value;
  const out: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    const name = keepKeys ? key : toCamel(key);
    out[name] = camelizeKeys(child, OPAQUE_KEYS.has(name));
  }
  return out;
}

export class SupabaseConfigProvider implements ConfigProvider {
  constructor(
    private readonly client: () => SupabaseClient,
    private readonly configName: string,
    private readonly environment: string,
  ) {}

  async getActiveConfig(signal?: AbortSignal): Promise<AgentConfig | null> {
    let request = this.client().rpc('get_active_config', {
      config_name: this.configName,
      config_environment: this.environment,
    });
    if (signal) request = request.abortSignal(signal);

    const { data, error } = await request;
    if (error) throw new Error(`get_active_config failed: ${error.message}`);

    const rows: unknown[] = Array.isArray(data) ? data : [];
    if (rows.length === 0) {
      logger.warn('config:not_found', { name: this.configName, environment: this.environment });
      return null;
    }
    return parseAgentConfig(camelizeKeys(rows[0]));
  }
}
