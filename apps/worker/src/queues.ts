import { Queue } from 'bullmq';
import type { Redis as IORedis } from 'ioredis';

export const FETCH_QUEUE = 'jobs.fetch';

export interface FetchJobData {
  keywords: string;
  pages?: number;
  perPage?: number;
  traceId?: string;
}

export interface Queues {
  fetchQueue: Queue<FetchJobData>;
}

export function createQueues(connection: IORedis): Queues {
  return {
    fetchQueue: new Queue<FetchJobData>(FETCH_QUEUE, { connection }),
  };
}

export async function closeQueues(queues: Queues): Promise<void> {
  await Promise.allSettled([queues.fetchQueue.close()]);
}
