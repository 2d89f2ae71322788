import { randomUUID } from 'node:crypto';
import type { Job } from 'bullmq';

export interface TraceableData {
  traceId?: string;
}

export function ensureTraceId(traceId?: string): string {
  if (traceId && traceId.trim().length > 0) {
    return traceId;
  }

  return randomUUID();
}

/**
 * Trace id for the job, generated and written back into its data when absent.
 */
export function withTrace<TData extends TraceableData>(job: Job<TData>): string {
  const traceId = ensureTraceId(job.data.traceId);
  job.data.traceId = traceId;
  return traceId;
}
