import type { Database } from '@jobfit/db';
import type { FindSGJobsClient } from '@jobfit/findsgjobs';
import { toJobRecord } from '@jobfit/findsgjobs';
import { storeJobs } from '@jobfit/job-store';
import type { JobRecord } from '@jobfit/matching';
import type { Job } from 'bullmq';
import type { Logger } from 'pino';
import type { FetchJobData } from '../queues.js';

export interface FetchJobsDeps {
  client: Pick<FindSGJobsClient, 'search'>;
  db: Database;
  logger: Logger;
  defaultPages: number;
  defaultPerPage: number;
}

export interface FetchJobsResult {
  keywords: string;
  pagesFetched: number;
  received: number;
  documents: number;
  upserted: number;
  removed: number;
}

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? Math.floor(value) : fallback;
}

/**
 * Fetch up to `pages` result pages for one keyword and store every posting.
 * Paging stops at the first empty page.
 */
export async function handleFetchJobsJob(job: Job<FetchJobData>, deps: FetchJobsDeps): Promise<FetchJobsResult> {
  const { keywords } = job.data;
  const pages = positiveOr(job.data.pages, deps.defaultPages);
  const perPage = positiveOr(job.data.perPage, deps.defaultPerPage);

  const records: JobRecord[] = [];
  let pagesFetched = 0;

  for (let page = 1; page <= pages; page += 1) {
    const items = await deps.client.search({ keywords, page, perPage });
    pagesFetched += 1;
    deps.logger.debug({ event: 'fetch_page', keywords, page, items: items.length }, 'Fetched result page');

    if (items.length === 0) {
      break;
    }

    for (const item of items) {
      records.push(toJobRecord(item));
    }
  }

  const stored = await storeJobs(records, deps.db);

  return {
    keywords,
    pagesFetched,
    received: records.length,
    documents: stored.documents,
    upserted: stored.upserted,
    removed: stored.removed,
  };
}
