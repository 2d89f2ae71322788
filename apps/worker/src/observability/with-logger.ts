import type { Job } from 'bullmq';
import type { Logger } from 'pino';
import { withTrace, type TraceableData } from './trace.js';

export interface SerializedError {
  name?: string;
  message: string;
  stack?: string;
}

export function serializeError(error: unknown): SerializedError {
  return error instanceof Error
    ? { name: error.name, message: error.message, stack: error.stack }
    : { message: String(error) };
}

export interface WithLoggerOptions<TData extends TraceableData, TResult> {
  logger: Logger;
  queue: string;
  job: Job<TData>;
  /** Extra fields bound to every line logged for the job. */
  context?: (job: Job<TData>) => Record<string, unknown>;
  /** Fields added to `job_completed` from the handler's result. */
  summary?: (result: TResult) => Record<string, unknown>;
  run: (logger: Logger) => Promise<TResult>;
}

/**
 * Runs a job handler with a child logger bound to the queue, job id, attempt
 * and trace id, and logs `job_started`, then `job_completed` or `job_failed`.
 * A failure is rethrown so BullMQ schedules the retry.
 */
export async function withLogger<TData extends TraceableData, TResult>({
  logger,
  queue,
  job,
  context,
  summary,
  run,
}: WithLoggerOptions<TData, TResult>): Promise<TResult> {
  const jobLogger = logger.child({
    queue,
    jobName: job.name,
    jobId: String(job.id ?? 'unknown'),
    attempt: job.attemptsMade + 1,
    maxAttempts: job.opts.attempts ?? 1,
    traceId: withTrace(job),
    ...context?.(job),
  });

  const startedAt = Date.now();
  const waitMs = job.timestamp > 0 ? Math.max(0, startedAt - job.timestamp) : undefined;
  jobLogger.info({ event: 'job_started', waitMs }, 'Job started');

  let result: TResult;
  try {
    result = await run(jobLogger);
  } catch (error) {
    jobLogger.error({ event: 'job_failed', durationMs: Date.now() - startedAt, error: serializeError(error) }, 'Job failed');
    throw error;
  }

  jobLogger.info({ event: 'job_completed', durationMs: Date.now() - startedAt, ...summary?.(result) }, 'Job completed');
  return result;
}
