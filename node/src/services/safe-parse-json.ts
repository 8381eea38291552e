/**
 * Shared JSON parse that strips markdown fences and normalizes quotes.
 * Used by query analysis, tool selection and the confidence judge.
 */
import { logger } from '@/services/logger';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stripCodeFences(raw: string): string {
  const txt = raw.trim();
  if (!txt.startsWith('```')) return txt;
  const firstNewline = txt.indexOf('\n');
  const lastFence = txt.lastIndexOf('```');
  if (firstNewline !== -1 && lastFence > firstNewline) {
    return txt.slice(firstNewline + 1, lastFence).trim();
  }
  return txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
}

/**
 * Returns the parsed object, or null when the text is not a JSON object
 * (callers decide their own fallback).
 */
export function safeParseJson(raw: string, context: string): Record<string, unknown> | null {
  const txt = stripCodeFences(raw);

  try {
    const parsed: unknown = JSON.parse(txt);
    if (isRecord(parsed)) return parsed;
    logger.warn('safeParseJson:non_object', { context, raw: txt.slice(0, 300) });
    return null;
  } catch {
    // Models sometimes answer {'key': 'value'}
    try {
      const parsed: unknown = JSON.parse(txt.replace(/'/g, '"'));
      if (isRecord(parsed)) return parsed;
    } catch (retryErr) {
      logger.debug('safeParseJson:quote_retry_failed', {
        context,
        error: retryErr instanceof Error ? retryErr.message : String(retryErr),
      });
    }
    logger.warn('safeParseJson:parse_error', {
      context,
      error: 'Invalid JSON after stripping fences',
      raw: txt.slice(0, 300),
    });
    return null;
  }
}
