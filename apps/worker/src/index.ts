import { closeDatabase, createDatabase, type Database } from '@jobfit/db';
import { FindSGJobsClient } from '@jobfit/findsgjobs';
import type { Job } from 'bullmq';
import { Worker } from 'bullmq';
import { loadWorkerConfig } from './config.js';
import { handleFetchJobsJob } from './jobs/fetch-jobs.js';
import { createLogger } from './observability/logger.js';
import { withLogger } from './observability/with-logger.js';
import { closeQueues, createQueues, FETCH_QUEUE, type FetchJobData, type Queues } from './queues.js';
import { createRedisConnection } from './redis.js';
import { scheduleFetchJobs } from './scheduler.js';

interface RuntimeState {
  db: Database | null;
  redis: ReturnType<typeof createRedisConnection> | null;
  queues: Queues | null;
  workers: Worker[];
}

const runtimeState: RuntimeState = {
  db: null,
  redis: null,
  queues: null,
  workers: [],
};

async function cleanupRuntimeState(state: RuntimeState): Promise<void> {
  await Promise.allSettled(state.workers.map((worker) => worker.close()));

  if (state.queues) {
    await closeQueues(state.queues);
  }

  if (state.redis) {
    await Promise.allSettled([state.redis.quit()]);
  }

  if (state.db) {
    await Promise.allSettled([closeDatabase(state.db)]);
  }
}

async function run(): Promise<void> {
  const logger = createLogger();
  const config = loadWorkerConfig();

  const db = createDatabase(config.databaseUrl);
  runtimeState.db = db;

  const redis = createRedisConnection(config.redisUrl);
  runtimeState.redis = redis;
  const queues = createQueues(redis);
  runtimeState.queues = queues;

  const client = new FindSGJobsClient({
    timeoutMs: config.findsgjobs.timeoutMs,
    maxRetries: config.findsgjobs.maxRetries,
  });

  const fetchWorker = new Worker<FetchJobData>(
    FETCH_QUEUE,
    (job: Job<FetchJobData>) =>
      withLogger({
        logger,
        queue: FETCH_QUEUE,
        job,
        context: (current) => ({ keywords: current.data.keywords }),
        summary: (result) => ({
          pagesFetched: result.pagesFetched,
          received: result.received,
          documents: result.documents,
          upserted: result.upserted,
          removed: result.removed,
        }),
        run: (jobLogger) =>
          handleFetchJobsJob(job, {
            client,
            db,
            logger: jobLogger,
            defaultPages: config.fetch.pages,
            defaultPerPage: config.fetch.perPage,
          }),
      }),
    { connection: redis, concurrency: 1 },
  );
  runtimeState.workers.push(fetchWorker);

  fetchWorker.on('error', (error) => {
    logger.error({ event: 'worker_runtime_error', queue: fetchWorker.name, error }, 'Worker runtime error');
  });

  const schedulerResult = await scheduleFetchJobs(queues, config.fetch);
  if (schedulerResult.errors.length === 0) {
    logger.info(
      {
        event: 'scheduler_configured',
        keywords: schedulerResult.scheduledKeywords,
        bootstrapped: schedulerResult.bootstrapped,
        cron: config.fetch.cron,
      },
      'Scheduler configured',
    );
  } else {
    logger.warn(
      {
        event: 'scheduler_partially_configured',
        keywords: schedulerResult.scheduledKeywords,
        errors: schedulerResult.errors,
        cron: config.fetch.cron,
      },
      'Scheduler partially configured: some keywords failed to schedule',
    );
  }

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    logger.info({ event: 'shutdown_requested', signal }, 'Shutdown requested');
    await cleanupRuntimeState(runtimeState);
    logger.info({ event: 'shutdown_completed', signal }, 'Shutdown completed');
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  logger.info({ event: 'worker_started', redisUrl: config.redisUrl }, 'Worker started');
}

run().catch(async (error: unknown) => {
  await cleanupRuntimeState(runtimeState);
  createLogger().error({ event: 'worker_fatal_error', error }, 'Worker fatal error');
  process.exit(1);
});
