import type { FetchSettings } from './config.js';
import type { Queues } from './queues.js';

const FETCH_ATTEMPTS = 3;
const FETCH_BACKOFF_MS = 5000;

export interface SchedulerResult {
  scheduledKeywords: string[];
  bootstrapped: number;
  errors: Array<{ keyword: string; error: string }>;
}

export function keywordSlug(keyword: string): string {
  return keyword.toLowerCase().replaceAll(/[^a-z0-9]+/g, '-').replaceAll(/^-|-$/g, '') || 'all';
}

function bootstrapKey(date: Date): string {
  return date.toISOString().slice(0, 10).replaceAll('-', '');
}

const retryPolicy = {
  attempts: FETCH_ATTEMPTS,
  backoff: {
    type: 'exponential',
    delay: FETCH_BACKOFF_MS,
  },
  removeOnComplete: true,
  removeOnFail: 1000,
} as const;

/**
 * One repeatable fetch per keyword. A keyword that fails to schedule is
 * reported and does not stop the others.
 */
export async function scheduleFetchJobs(
  queues: Queues,
  settings: Pick<FetchSettings, 'keywords' | 'cron' | 'pages' | 'perPage' | 'bootstrapNow'>,
): Promise<SchedulerResult> {
  const result: SchedulerResult = { scheduledKeywords: [], bootstrapped: 0, errors: [] };
  const key = bootstrapKey(new Date());

  for (const keyword of settings.keywords) {
    const slug = keywordSlug(keyword);
    const data = { keywords: keyword, pages: settings.pages, perPage: settings.perPage };

    try {
      await queues.fetchQueue.add('jobs-fetch', data, {
        jobId: `jobs-fetch-${slug}`,
        repeat: {
          pattern: settings.cron,
        },
        ...retryPolicy,
      });
      result.scheduledKeywords.push(keyword);

      if (settings.bootstrapNow) {
        await queues.fetchQueue.add('jobs-fetch-bootstrap', data, {
          jobId: `jobs-fetch-bootstrap-${slug}-${key}`,
          ...retryPolicy,
        });
        result.bootstrapped += 1;
      }
    } catch (error) {
      result.errors.push({ keyword, error: error instanceof Error ? error.message : String(error) });
    }
  }

  return result;
}
