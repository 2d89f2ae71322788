import './env.js';
import { parseArgs } from 'node:util';
import { closeDatabase, createDatabase } from '@jobfit/db';
import { FindSGJobsClient, filterSummaries, toJobSummaries } from '@jobfit/findsgjobs';
import { searchStoredJobs } from '@jobfit/job-store';
import { readRequiredEnv } from '../apps/worker/src/config.js';

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    live: { type: 'boolean', default: false },
    company: { type: 'string' },
    'min-salary': { type: 'string' },
    mrt: { type: 'string' },
    'employment-type': { type: 'string' },
    education: { type: 'string' },
    limit: { type: 'string' },
  },
});

function optionalNumber(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : undefined;
}

async function searchLive(keywords: string): Promise<void> {
  const client = new FindSGJobsClient();
  const items = await client.search({ keywords, page: 1, perPage: 50 });
  const summaries = toJobSummaries(items);
  const filtered = filterSummaries(summaries, {
    company: values.company,
    minSalary: optionalNumber(values['min-salary']),
    nearestMrt: values.mrt,
    employmentType: values['employment-type'],
    education: values.education,
  });

  console.log(`Fetched ${summaries.length} jobs (displaying ${filtered.length} after filters).`);
  for (const summary of filtered) {
    console.log(`- [${summary.jobId}] ${summary.title} @ ${summary.company || 'Unknown'} ${summary.salaryRange}`.trimEnd());
  }
}

async function searchStored(keyword: string): Promise<void> {
  const db = createDatabase(readRequiredEnv(process.env, 'DATABASE_URL'));

  try {
    const hits = await searchStoredJobs(keyword, db, { limit: optionalNumber(values.limit) });
    if (hits.length === 0) {
      console.log(`No stored jobs match "${keyword}".`);
      return;
    }

    for (const hit of hits) {
      console.log(`- [${hit.jobId}] ${hit.title} @ ${hit.company || 'Unknown'} ${hit.location}`.trimEnd());
    }
  } finally {
    await closeDatabase(db);
  }
}

async function main(): Promise<void> {
  const keyword = positionals.join(' ').trim() || 'support';
  await (values.live ? searchLive(keyword) : searchStored(keyword));
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
