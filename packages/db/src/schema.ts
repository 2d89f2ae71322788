import { index, pgTable, text, timestamp, varchar } from 'drizzle-orm/pg-core';

/**
 * One searchable chunk of a fetched posting. A posting spans one or more rows
 * sharing `job_id`; `id` is `<jobId>-chunk<chunk>`.
 */
export const storedJobs = pgTable(
  'stored_jobs',
  {
    id: varchar({ length: 255 }).primaryKey(),
    jobId: varchar('job_id', { length: 255 }).notNull(),
    title: text().default('').notNull(),
    company: text().default('').notNull(),
    location: text().default('').notNull(),
    salary: text().default('').notNull(),
    url: text().default('').notNull(),
    document: text().default('').notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (t) => [index('idx_stored_jobs_job_id').on(t.jobId)],
);

export type StoredJobRow = typeof storedJobs.$inferSelect;
export type NewStoredJobRow = typeof storedJobs.$inferInsert;
