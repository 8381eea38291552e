// node/src/services/chat-history.ts: per-session conversation memory
import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { Citation, ConversationMessage, Province } from '@/types/core';
import { logger } from './logger';

/** Rough size estimate for English text. */
const CHARS_PER_TOKEN = 4;

export interface HistoryWindow {
  maxMessages: number;
  maxTokens: number;
}

export interface ExchangeRecord {
  sessionId: string;
  userId?: string;
  province?: Province;
  query: string;
  response: string;
  confidenceScore: number;
  escalated: boolean;
  sources: Citation[];
}

export interface ChatHistoryStore {
  /** Newest messages that fit the window, oldest first. */
  loadConversation(sessionId: string, signal?: AbortSignal): Promise<ConversationMessage[]>;
  saveExchange(record: ExchangeRecord): Promise<void>;
}

/**
 * Takes messages (oldest first) and keeps the newest ones whose estimated
 * token total fits the budget. Stops at the first message that does not fit.
 */
export function selectHistoryWindow(messages: ConversationMessage[], window: HistoryWindow): ConversationMessage[] {
  const recent = window.maxMessages > 0 ? messages.slice(-window.maxMessages) : [];
  const selected: ConversationMessage[] = [];
  let totalTokens = 0;
  for (let i = recent.length - 1; i >= 0; i--) {
    const tokens = Math.floor(recent[i].content.length / CHARS_PER_TOKEN);
    if (totalTokens + tokens > window.maxTokens) break;
    selected.unshift(recent[i]);
    totalTokens += tokens;
  }
  return selected;
}

const messageRowSchema = z.object({
  role: z.string(),
  content: z.string(),
});

function isConversationMessage(row: { role: string; content: string }): row is ConversationMessage {
  return row.role === 'user' || row.role === 'assistant';
}

export class SupabaseChatHistoryStore implements ChatHistoryStore {
  constructor(
    private readonly client: () => SupabaseClient,
    private readonly window: HistoryWindow,
  ) {}

  async loadConversation(sessionId: string, signal?: AbortSignal): Promise<ConversationMessage[]> {
    let query = this.client()
      .from('chat_messages')
      .select('role, content, created_at')
      .eq('session_id', sessionId)
      .order('created_at', { ascending: false })
      .limit(this.window.maxMessages);
    if (signal) query = query.abortSignal(signal);

    const { data, error } = await query;
    if (error) throw new Error(`chat history load failed: ${error.message}`);

    const rows: unknown[] = Array.isArray(data) ? data : [];
    const messages = rows
      .map((row) => messageRowSchema.safeParse(row))
      .flatMap((parsed) => (parsed.success && isConversationMessage(parsed.data) ? [parsed.data] : []))
      .map((m) => ({ role: m.role, content: m.content }))
      .reverse();

    const selected = selectHistoryWindow(messages, this.window);
    logger.info('chat-history:loaded', { sessionId, available: messages.length, selected: selected.length });
    return selected;
  }

  async saveExchange(record: ExchangeRecord): Promise<void> {
    const base = {
      session_id: record.sessionId,
      user_id: record.userId ?? null,
      province: record.province ?? null,
    };
    const { error } = await this.client()
      .from('chat_messages')
      .insert([
        { ...base, role: 'user', content: record.query, confidence: null, escalated: false, metadata: {} },
        {
          ...base,
          role: 'assistant',
          content: record.response,
          confidence: record.confidenceScore,
          escalated: record.escalated,
          metadata: { sources: record.sources },
        },
      ]);
    if (error) throw new Error(`chat history save failed: ${error.message}`);
    logger.debug('chat-history:saved', { sessionId: record.sessionId, escalated: record.escalated });
  }
}
