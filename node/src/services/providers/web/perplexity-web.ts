// src/services/providers/web/perplexity-web.ts
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';

const PPLX_API_URL = 'https://api.perplexity.ai/chat/completions';
const SEARCH_SYSTEM_PROMPT =
  'You are a concise search assistant. Answer factually from current Canadian government and legal sources.';

export interface WebSearchHit {
  url: string;
  title?: string;
  snippet?: string;
  date?: string;
}

export interface WebSearchAnswer {
  summary: string;
  hits: WebSearchHit[];
}

export interface WebSearchClient {
  search(query: string, maxResults: number, signal?: AbortSignal): Promise<WebSearchAnswer>;
}

const searchResultSchema = z.object({
  url: z.string(),
  title: z.string().optional(),
  snippet: z.string().optional(),
  date: z.string().nullish(),
});

const completionSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullish() }) })).default([]),
  search_results: z.array(z.unknown()).default([]),
});

/** Web answers with their search results from Perplexity's `sonar` models. */
export class PerplexityWebSearch implements WebSearchClient {
  constructor(
    private readonly apiKey: string,
    private readonly model = 'sonar',
    private readonly http: AxiosInstance = axios.create(),
  ) {}

  async search(query: string, maxResults: number, signal?: AbortSignal): Promise<WebSearchAnswer> {
    const { data } = await this.http.post<unknown>(
      PPLX_API_URL,
      {
        model: this.model,
        messages: [
          { role: 'system', content: SEARCH_SYSTEM_PROMPT },
          { role: 'user', content: query },
        ],
        max_tokens: 1024,
        temperature: 0,
      },
      {
        headers: { Authorization: `Bearer ${this.apiKey}`, 'Content-Type': 'application/json' },
        signal,
      },
    );

    const body = completionSchema.parse(data);
    const hits = body.search_results
      .flatMap((raw) => {
        const parsed = searchResultSchema.safeParse(raw);
        return parsed.success && parsed.data.url ? [parsed.data] : [];
      })
      .slice(0, maxResults)
      .map((r) => ({ url: r.url, title: r.title, snippet: r.snippet, date: r.date ?? undefined }));

    return { summary: (body.choices[0]?.message.content ?? '').trim(), hits };
  }
}
