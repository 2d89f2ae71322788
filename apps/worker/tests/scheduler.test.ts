import { describe, expect, it, vi } from 'vitest';
import type { Queues } from '../src/queues.js';
import { keywordSlug, scheduleFetchJobs } from '../src/scheduler.js';
import { stub } from './test-helpers.js';

function createQueuesMock(add = vi.fn().mockResolvedValue(undefined)) {
  const queues: Queues = {
    fetchQueue: stub<Queues['fetchQueue']>({ add }),
  };

  return { queues, add };
}

const settings = {
  keywords: ['support'],
  cron: '0 */6 * * *',
  pages: 3,
  perPage: 50,
  bootstrapNow: false,
};

describe('keywordSlug', () => {
  it('lowercases and dashes the keyword', () => {
    expect(keywordSlug('Customer  Support!')).toBe('customer-support');
  });

  it('uses a placeholder for keywords without letters or digits', () => {
    expect(keywordSlug('***')).toBe('all');
  });
});

describe('scheduleFetchJobs', () => {
  it('adds one repeatable job per keyword', async () => {
    const { queues, add } = createQueuesMock();

    const result = await scheduleFetchJobs(queues, { ...settings, keywords: ['support', 'Data Entry'] });

    expect(result).toEqual({ scheduledKeywords: ['support', 'Data Entry'], bootstrapped: 0, errors: [] });
    expect(add).toHaveBeenCalledTimes(2);
    expect(add).toHaveBeenNthCalledWith(
      2,
      'jobs-fetch',
      { keywords: 'Data Entry', pages: 3, perPage: 50 },
      expect.objectContaining({
        jobId: 'jobs-fetch-data-entry',
        repeat: { pattern: '0 */6 * * *' },
        attempts: 3,
      }),
    );
  });

  it('adds a one-off run per keyword when bootstrapping', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-04T10:00:00Z'));

    try {
      const { queues, add } = createQueuesMock();

      const result = await scheduleFetchJobs(queues, { ...settings, bootstrapNow: true });

      expect(result.bootstrapped).toBe(1);
      expect(add).toHaveBeenNthCalledWith(
        2,
        'jobs-fetch-bootstrap',
        { keywords: 'support', pages: 3, perPage: 50 },
        expect.objectContaining({ jobId: 'jobs-fetch-bootstrap-support-20260304' }),
      );
    } finally {
      vi.useRealTimers();
    }
  });

  it('keeps scheduling after a keyword fails', async () => {
    const add = vi.fn().mockRejectedValueOnce(new Error('redis down')).mockResolvedValue(undefined);
    const { queues } = createQueuesMock(add);

    const result = await scheduleFetchJobs(queues, { ...settings, keywords: ['support', 'driver'] });

    expect(result.scheduledKeywords).toEqual(['driver']);
    expect(result.errors).toEqual([{ keyword: 'support', error: 'redis down' }]);
  });
});
