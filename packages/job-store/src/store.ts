import type { Database } from '@jobfit/db';
import { storedJobs } from '@jobfit/db';
import type { JobRecord } from '@jobfit/matching';
import { inArray, sql } from 'drizzle-orm';
import { toStoredDocuments } from './documents.js';

const UPSERT_BATCH_SIZE = 500;

export interface StoreJobsResult {
  jobs: number;
  documents: number;
  upserted: number;
  /** Rows deleted because their posting was stored again. */
  removed: number;
}

/**
 * Replace the stored chunks of every posting in `jobs`: existing rows with
 * the same job id are deleted, then the new chunks are upserted by document
 * id, all in one transaction.
 */
export async function storeJobs(jobs: readonly JobRecord[], db: Database): Promise<StoreJobsResult> {
  if (jobs.length === 0) {
    return { jobs: 0, documents: 0, upserted: 0, removed: 0 };
  }

  const documents = toStoredDocuments(jobs);
  const jobIds = [...new Set(documents.map((document) => document.jobId))];

  return db.transaction(async (tx) => {
    let removed = 0;
    for (let start = 0; start < jobIds.length; start += UPSERT_BATCH_SIZE) {
      const deleted = await tx
        .delete(storedJobs)
        .where(inArray(storedJobs.jobId, jobIds.slice(start, start + UPSERT_BATCH_SIZE)))
        .returning({ id: storedJobs.id });
      removed += deleted.length;
    }

    let upserted = 0;
    for (let start = 0; start < documents.length; start += UPSERT_BATCH_SIZE) {
      const batch = documents.slice(start, start + UPSERT_BATCH_SIZE);

      await tx
        .insert(storedJobs)
        .values(batch)
        .onConflictDoUpdate({
          target: storedJobs.id,
          set: {
            jobId: sql.raw(`excluded.job_id`),
            title: sql.raw(`excluded.title`),
            company: sql.raw(`excluded.company`),
            location: sql.raw(`excluded.location`),
            salary: sql.raw(`excluded.salary`),
            url: sql.raw(`excluded.url`),
            document: sql.raw(`excluded.document`),
            updatedAt: sql`now()`,
          },
        });

      upserted += batch.length;
    }

    return { jobs: jobs.length, documents: documents.length, upserted, removed };
  });
}
