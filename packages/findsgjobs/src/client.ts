import { unwrapSearchResponse } from './envelope.js';
import type { FindSGJobsSearchParams, SearchResultItem } from './types.js';

const DEFAULT_BASE_URL = 'https://www.findsgjobs.com';
const SEARCH_PATH = '/apis/job/searchable';

export const DEFAULT_CURRENCY_ID = 1275916990;
export const DEFAULT_INTERVAL_ID = 1898;
export const DEFAULT_PER_PAGE = 20;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface FindSGJobsClientOptions {
  baseUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  fetchImpl?: typeof fetch;
}

export class FindSGJobsHttpError extends Error {
  readonly status: number;
  readonly body: string;
  readonly retryAfterMs?: number;

  constructor(status: number, body: string, retryAfterMs?: number) {
    super(`FindSGJobs request failed with status ${status}`);
    this.name = 'FindSGJobsHttpError';
    this.status = status;
    this.body = body;
    this.retryAfterMs = retryAfterMs;
  }
}

function joinIds(values: readonly number[] | undefined): string | undefined {
  if (!values || values.length === 0) return undefined;
  return values.join(',');
}

export function buildSearchQuery(params: FindSGJobsSearchParams = {}): URLSearchParams {
  const entries: Array<[string, string | number | undefined]> = [
    ['page', params.page ?? 1],
    ['per_page_count', params.perPage ?? DEFAULT_PER_PAGE],
    ['keywords', params.keywords || undefined],
    ['EmploymentType', joinIds(params.employmentTypes)],
    ['JobCategory', joinIds(params.jobCategories)],
    ['MinimumEducationLevel', joinIds(params.minEducationLevels)],
    ['MinimumYearsofExperience', joinIds(params.minYearsOfExperience)],
    ['id_Job_NearestMRTStation', joinIds(params.mrtStations)],
    ['Position', params.position],
    ['id_Job_Currency', params.currency ?? DEFAULT_CURRENCY_ID],
    ['id_Job_Salary', params.minSalary],
    ['id_Job_MaxSalary', params.maxSalary],
    ['id_Job_Interval', params.interval ?? DEFAULT_INTERVAL_ID],
    ['sort_field', params.sortField ?? 'activation_date'],
    ['sort_direction', params.sortDirection ?? 'desc'],
  ];

  const query = new URLSearchParams();
  for (const [key, value] of entries) {
    if (value !== undefined) {
      query.set(key, String(value));
    }
  }

  return query;
}

export class FindSGJobsClient {
  private readonly baseUrl: string;
  private readonly userAgent?: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FindSGJobsClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxRetries = options.maxRetries ?? 2;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 500;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Raw response body of the searchable endpoint.
   */
  async searchRaw(params: FindSGJobsSearchParams = {}): Promise<unknown> {
    return this.request(`${SEARCH_PATH}?${buildSearchQuery(params).toString()}`);
  }

  async search(params: FindSGJobsSearchParams = {}): Promise<SearchResultItem[]> {
    return unwrapSearchResponse(await this.searchRaw(params));
  }

  private async request(path: string): Promise<unknown> {
    let attempt = 0;
    while (true) {
      try {
        return await this.requestOnce(path);
      } catch (error) {
        if (attempt >= this.maxRetries || !this.isRetryable(error)) {
          throw error;
        }

        await sleep(this.getRetryDelayMs(error, attempt));
        attempt += 1;
      }
    }
  }

  private async requestOnce(path: string): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: 'GET',
        signal: controller.signal,
        headers: this.buildHeaders(),
      });

      if (!response.ok) {
        const body = await response.text();
        throw new FindSGJobsHttpError(response.status, body, this.parseRetryAfter(response.headers.get('retry-after')));
      }

      const payload: unknown = await response.json();
      return payload;
    } finally {
      clearTimeout(timeout);
    }
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.userAgent) {
      headers['User-Agent'] = this.userAgent;
    }

    return headers;
  }

  private parseRetryAfter(value: string | null): number | undefined {
    if (!value) return undefined;

    const seconds = Number(value);
    if (!Number.isFinite(seconds) || seconds < 0) {
      return undefined;
    }

    return Math.round(seconds * 1000);
  }

  private isRetryable(error: unknown): boolean {
    if (error instanceof FindSGJobsHttpError) {
      return error.status === 429 || error.status >= 500;
    }

    return error instanceof Error;
  }

  private getRetryDelayMs(error: unknown, attempt: number): number {
    if (error instanceof FindSGJobsHttpError && error.retryAfterMs !== undefined) {
      return error.retryAfterMs;
    }

    const jitter = Math.floor(Math.random() * (this.retryBaseDelayMs / 2));
    return this.retryBaseDelayMs * 2 ** attempt + jitter;
  }
}
