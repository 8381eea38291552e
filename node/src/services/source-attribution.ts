// node/src/services/source-attribution.ts: retrieved passages to ranked, deduplicated citations
import type { OutputSettings } from '@/config/agent-config';
import type { Citation, RetrievedPassage } from '@/types/core';
import stopWordList from '@/data/excerpt-stop-words.json';
import { keepBestPerKey } from './dedup-utils';

const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);
const UPLOAD_ARTIFACT_PREFIX = 'tmp';
const GENERIC_UPLOAD_NAME = 'Uploaded Document';
const SHORT_ID_LENGTH = 8;

function stripExtension(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot === -1 ? name : name.slice(0, dot);
}

function capitalizeWord(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/** Upper-cases the first letter of every alphabetic run, lower-cases the rest. */
function titleCase(text: string): string {
  return text.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_, sep: string, ch: string) => sep + ch.toUpperCase());
}

function documentName(passage: RetrievedPassage): string | undefined {
  const explicit = passage.documentTitle || passage.documentFilename;
  if (explicit) return explicit;
  if (passage.title) {
    const base = passage.title.split(' (chunk')[0];
    return base || undefined;
  }
  return undefined;
}

/**
 * Human-readable source name: document title or filename, else the chunk title without
 * its "(chunk N/M)" suffix; extension stripped, underscores spaced, words capitalized.
 * Temporary-upload names fall back to `metadata.original_file` or a generic label;
 * passages with no name at all use their source type plus a short id.
 */
export function deriveDisplayName(passage: RetrievedPassage): string {
  const name = documentName(passage);
  if (name) {
    let display = stripExtension(name).replace(/_/g, ' ');
    if (display.toLowerCase().startsWith(UPLOAD_ARTIFACT_PREFIX)) {
      const original = passage.metadata.original_file;
      display =
        typeof original === 'string' && original
          ? stripExtension(original).replace(/_/g, ' ')
          : GENERIC_UPLOAD_NAME;
    }
    return display.split(/\s+/).filter(Boolean).map(capitalizeWord).join(' ');
  }

  const label = titleCase((passage.source || 'unknown').replace(/_/g, ' '));
  return passage.id ? `${label} (${passage.id.slice(0, SHORT_ID_LENGTH)})` : label;
}

function prefix(content: string, maxLength: number): string {
  return content.length > maxLength ? `${content.slice(0, maxLength)}...` : content;
}

export function queryKeywords(query: string): string[] {
  const words = query.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? [];
  return Array.from(new Set(words)).filter((w) => !STOP_WORDS.has(w));
}

/**
 * The passage sentence that best matches the query's content words (scored by the summed
 * length of the keywords it contains), with one sentence either side, cut to maxLength.
 * Without a usable query or match, the passage prefix is returned.
 */
export function extractRelevantExcerpt(
  content: string,
  query: string,
  maxLength: number,
  boundaryRatio = 0.7,
): string {
  if (!content || !query) return prefix(content, maxLength);

  const keywords = queryKeywords(query);
  if (keywords.length === 0) return prefix(content, maxLength);

  const sentences = content.split(/(?<=[.!?])\s+/);
  let bestIndex = -1;
  let bestScore = 0;
  sentences.forEach((sentence, i) => {
    const lower = sentence.toLowerCase();
    const score = keywords.reduce((sum, w) => (lower.includes(w) ? sum + w.length : sum), 0);
    if (score > bestScore) {
      bestScore = score;
      bestIndex = i;
    }
  });
  if (bestIndex === -1) return prefix(content, maxLength);

  const excerpt = sentences.slice(Math.max(0, bestIndex - 1), bestIndex + 2).join(' ');
  if (excerpt.length <= maxLength) return excerpt;

  const truncated = excerpt.slice(0, maxLength);
  const lastEnd = Math.max(truncated.lastIndexOf('.'), truncated.lastIndexOf('!'), truncated.lastIndexOf('?'));
  return lastEnd > maxLength * boundaryRatio ? `${truncated.slice(0, lastEnd + 1)}...` : `${truncated}...`;
}

/** One citation per display name (highest similarity wins, ties keep the first), most similar first. */
export function formatSources(
  passages: RetrievedPassage[],
  query: string,
  settings: OutputSettings,
): Citation[] {
  const citations = passages.map((p): Citation => ({
    content: extractRelevantExcerpt(p.content, query, settings.excerptMaxLength, settings.excerptBoundaryRatio),
    source: deriveDisplayName(p),
    timestamp: p.timestamp,
    metadata: p.metadata,
    similarityScore: p.similarity,
  }));

  return keepBestPerKey(citations, (c) => c.source, (c) => c.similarityScore)
    .sort((a, b) => b.similarityScore - a.similarityScore);
}
