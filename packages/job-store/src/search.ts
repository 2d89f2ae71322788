import type { Database } from '@jobfit/db';
import { storedJobs } from '@jobfit/db';
import { ilike, or } from 'drizzle-orm';

export const DEFAULT_SEARCH_LIMIT = 50;

export interface StoredJobHit {
  jobId: string;
  title: string;
  company: string;
  location: string;
  salary: string;
  url: string;
}

export interface SearchStoredJobsOptions {
  limit?: number;
}

function escapeLikePattern(term: string): string {
  return term.replace(/[\\%_]/g, '\\$&');
}

/**
 * Case-insensitive substring search over title, company and document text.
 * One hit per posting, in the order rows come back.
 */
export async function searchStoredJobs(
  keyword: string,
  db: Database,
  options: SearchStoredJobsOptions = {},
): Promise<StoredJobHit[]> {
  const term = keyword.trim();
  if (!term) return [];

  const limit = options.limit !== undefined && options.limit > 0 ? Math.floor(options.limit) : DEFAULT_SEARCH_LIMIT;
  const pattern = `%${escapeLikePattern(term)}%`;

  const rows = await db
    .selectDistinct({
      jobId: storedJobs.jobId,
      title: storedJobs.title,
      company: storedJobs.company,
      location: storedJobs.location,
      salary: storedJobs.salary,
      url: storedJobs.url,
    })
    .from(storedJobs)
    .where(or(ilike(storedJobs.title, pattern), ilike(storedJobs.company, pattern), ilike(storedJobs.document, pattern)))
    .limit(limit);

  const seen = new Set<string>();
  const hits: StoredJobHit[] = [];
  for (const row of rows) {
    if (!row.jobId || seen.has(row.jobId)) continue;
    seen.add(row.jobId);
    hits.push(row);
  }

  return hits;
}
