import './env.js';
import { DEFAULT_REDIS_URL, readListEnv } from '../apps/worker/src/config.js';
import { closeQueues, createQueues } from '../apps/worker/src/queues.js';
import { createRedisConnection } from '../apps/worker/src/redis.js';

async function main(): Promise<void> {
  const requested = process.argv.slice(2);
  const keywords = requested.length > 0 ? requested : readListEnv(process.env, 'FETCH_KEYWORDS', ['support']);
  const redis = createRedisConnection(process.env.REDIS_URL?.trim() || DEFAULT_REDIS_URL, {
    connectionName: 'jobfit-enqueue',
  });
  const queues = createQueues(redis);

  try {
    for (const [index, keyword] of keywords.entries()) {
      const stamp = Date.now();
      await queues.fetchQueue.add(
        'jobs-fetch',
        {
          keywords: keyword,
          traceId: `manual-${stamp}`,
        },
        {
          jobId: `manual-jobs-fetch-${stamp}-${index}`,
          attempts: 1,
          removeOnComplete: true,
          removeOnFail: 1000,
        },
      );

      console.log(`queued jobs.fetch for "${keyword}"`);
    }
  } finally {
    await closeQueues(queues);
    await redis.quit();
  }

  console.log('manual jobs.fetch enqueue complete');
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
