// Active prompt versions from the `prompts` table through RPC `get_active_prompt`.
import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { PromptProvider, PromptRef, StoredPrompt } from '@/services/prompt-catalog';

const promptRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  prompt_type: z.string(),
  version: z.number().int(),
  content: z.string().min(1),
});

export class SupabasePromptProvider implements PromptProvider {
  constructor(private readonly client: () => SupabaseClient) {}

  async getActivePrompt(ref: PromptRef, signal?: AbortSignal): Promise<StoredPrompt | null> {
    let request = this.client().rpc('get_active_prompt', {
      prompt_name: ref.name,
      prompt_type_filter: ref.promptType,
    });
    if (signal) request = request.abortSignal(signal);

    const { data, error } = await request;
    if (error) throw new Error(`get_active_prompt failed: ${error.message}`);

    const rows: unknown[] = Array.isArray(data) ? data : [];
    if (rows.length === 0) return null;

    const row = promptRowSchema.parse(rows[0]);
    return { id: row.id, name: row.name, promptType: row.prompt_type, version: row.version, content: row.content };
  }
}
