import { describe, expect, it, vi } from 'vitest';
import { TavilyCourseSearch, TavilySearchError } from '../src/tavily.js';

function result(index: number) {
  return { title: `Course ${index}`, url: `https://example.com/${index}`, content: `About ${index}`, score: 0.5 };
}

describe('TavilyCourseSearch', () => {
  it('posts the query and keeps at most three results', async () => {
    const fetchMock = vi.fn(
      async () => new Response(JSON.stringify({ results: [result(1), result(2), result(3), result(4)] }), { status: 200 }),
    );
    const search = new TavilyCourseSearch({ apiKey: 'test-secret', fetchImpl: fetchMock as unknown as typeof fetch });

    const results = await search.search('excel courses');

    expect(results.map((item) => item.title)).toEqual(['Course 1', 'Course 2', 'Course 3']);
    expect(results[0]).toEqual({ title: 'Course 1', url: 'https://example.com/1', content: 'About 1' });

    const call = fetchMock.mock.calls.at(0) as unknown[] | undefined;
    expect(call?.[0]).toBe('https://api.tavily.com/search');
    const init = call?.[1] as { method?: string; headers?: Record<string, string>; body?: string } | undefined;
    expect(init?.method).toBe('POST');
    expect(init?.headers?.Authorization).toBe('Bearer test-secret');
    expect(JSON.parse(init?.body ?? '{}')).toEqual({
      query: 'excel courses',
      max_results: 3,
      search_depth: 'advanced',
      include_answer: true,
      include_raw_content: false,
    });
  });

  it('treats a missing result list as empty', async () => {
    const fetchMock = vi.fn(async () => new Response(JSON.stringify({ answer: 'none' }), { status: 200 }));
    const search = new TavilyCourseSearch({ apiKey: 'test-secret', fetchImpl: fetchMock as unknown as typeof fetch });

    await expect(search.search('anything')).resolves.toEqual([]);
  });

  it('throws TavilySearchError on a failed response', async () => {
    const fetchMock = vi.fn(async () => new Response('unauthorized', { status: 401 }));
    const search = new TavilyCourseSearch({ apiKey: 'test-secret', fetchImpl: fetchMock as unknown as typeof fetch });

    const error = await search.search('anything').catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(TavilySearchError);
    expect(error).toMatchObject({ status: 401, body: 'unauthorized' });
  });
});
