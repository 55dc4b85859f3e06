import { AxiosError } from 'axios';
import { describe, expect, it } from 'vitest';
import { APIResponseError, APITimeoutError } from '../../lib/errors';
import {
  formatResults,
  NO_RESULTS,
  searchWithBackoff,
  TavilySearchProvider,
  type SearchProvider,
  type SearchResult,
} from '../../lib/search';
import { fakeHttp, httpError } from '../fixtures/http';

const RESULTS: SearchResult[] = [
  { title: 'Acme beats estimates', url: 'https://news.example.com/1', snippet: 'Revenue up 12%.' },
  { title: 'Acme guidance', url: 'https://news.example.com/2', snippet: 'Outlook raised.' },
];

function scripted(...steps: Array<SearchResult[] | Error>): SearchProvider & { queries: string[] } {
  const queries: string[] = [];
  return {
    name: 'scripted',
    queries,
    async search(query) {
      queries.push(query);
      const step = steps.shift() ?? [];
      if (step instanceof Error) throw step;
      return step;
    },
  };
}

function recordingSleep() {
  const waits: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    waits.push(ms);
  };
  return { waits, sleep };
}

describe('formatResults', () => {
  it('formats title, url and snippet blocks', () => {
    expect(formatResults(RESULTS)).toBe(
      'Acme beats estimates - https://news.example.com/1\nRevenue up 12%.\n\n' +
        'Acme guidance - https://news.example.com/2\nOutlook raised.'
    );
  });

  it('respects the limit and reports an empty result set', () => {
    expect(formatResults(RESULTS, 1)).toBe('Acme beats estimates - https://news.example.com/1\nRevenue up 12%.');
    expect(formatResults([])).toBe(NO_RESULTS);
  });
});

describe('searchWithBackoff', () => {
  it('waits before the first attempt', async () => {
    const { waits, sleep } = recordingSleep();
    const outcome = await searchWithBackoff(scripted(RESULTS), 'ACME earnings', { sleep });

    expect(waits).toEqual([800]);
    expect(outcome).toEqual({ success: true, text: formatResults(RESULTS), results: RESULTS });
  });

  it('retries after a failure with the next delay', async () => {
    const { waits, sleep } = recordingSleep();
    const provider = scripted(new Error('rate limited'), RESULTS);

    const outcome = await searchWithBackoff(provider, 'ACME earnings', { sleep });

    expect(waits).toEqual([800, 1600]);
    expect(outcome.success).toBe(true);
    expect(provider.queries).toEqual(['ACME earnings', 'ACME earnings']);
  });

  it('gives up with the last error after every delay is used', async () => {
    const { sleep } = recordingSleep();
    const outcome = await searchWithBackoff(scripted(new Error('first'), new Error('second')), 'ACME', { sleep });

    expect(outcome).toEqual({ success: false, error: 'Search temporarily unavailable: second' });
  });

  it('reports when no attempt was made', async () => {
    const outcome = await searchWithBackoff(scripted(RESULTS), 'ACME', { delaysMs: [] });

    expect(outcome).toEqual({ success: false, error: 'Search temporarily unavailable: no attempts made' });
  });
});

describe('TavilySearchProvider', () => {
  it('posts the query and maps results', async () => {
    const http = fakeHttp({
      '/search': () => ({
        results: [{ title: 'Acme beats estimates', url: 'https://news.example.com/1', content: 'Revenue up 12%.' }],
      }),
    });
    const tavily = new TavilySearchProvider({ apiKey: 'test-secret', client: http.client });

    const results = await tavily.search('ACME earnings', 3);

    expect(results).toEqual([RESULTS[0]]);
    expect(http.requests[0]).toMatchObject({
      method: 'POST',
      url: '/search',
      body: { api_key: 'test-secret', query: 'ACME earnings', max_results: 3 },
    });
  });

  it('maps failures to rating engine errors', async () => {
    const failing = fakeHttp({
      '/search': (config) => {
        throw httpError(config, 401);
      },
    });
    await expect(
      new TavilySearchProvider({ apiKey: 'test-secret', client: failing.client }).search('ACME', 3)
    ).rejects.toBeInstanceOf(APIResponseError);

    const slow = fakeHttp({
      '/search': (config) => {
        throw new AxiosError('timeout of 15000ms exceeded', 'ECONNABORTED', config);
      },
    });
    await expect(
      new TavilySearchProvider({ apiKey: 'test-secret', client: slow.client }).search('ACME', 3)
    ).rejects.toBeInstanceOf(APITimeoutError);
  });
});
