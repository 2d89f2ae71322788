import { z } from 'zod';
import type { CourseSearch, CourseSearchResult } from './types.js';

const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';

const tavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().default(''),
        url: z.string().default(''),
        content: z.string().default(''),
      }),
    )
    .default([]),
});

export interface TavilyCourseSearchOptions {
  apiKey: string;
  maxResults?: number;
  searchDepth?: 'basic' | 'advanced';
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class TavilySearchError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`Tavily search failed with status ${status}`);
    this.name = 'TavilySearchError';
    this.status = status;
    this.body = body;
  }
}

export class TavilyCourseSearch implements CourseSearch {
  private readonly apiKey: string;
  private readonly maxResults: number;
  private readonly searchDepth: 'basic' | 'advanced';
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: TavilyCourseSearchOptions) {
    this.apiKey = options.apiKey;
    this.maxResults = options.maxResults ?? 3;
    this.searchDepth = options.searchDepth ?? 'advanced';
    this.timeoutMs = options.timeoutMs ?? 20_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async search(query: string): Promise<CourseSearchResult[]> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(TAVILY_SEARCH_URL, {
        method: 'POST',
        signal: controller.signal,
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          query,
          max_results: this.maxResults,
          search_depth: this.searchDepth,
          include_answer: true,
          include_raw_content: false,
        }),
      });

      if (!response.ok) {
        throw new TavilySearchError(response.status, await response.text());
      }

      const payload: unknown = await response.json();
      return tavilyResponseSchema.parse(payload).results.slice(0, this.maxResults);
    } finally {
      clearTimeout(timeout);
    }
  }
}
