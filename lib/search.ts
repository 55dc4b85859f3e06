/**
 * Web search collaborator
 *
 * News lookups behind StockAnalyzer.searchNews. Providers implement
 * SearchProvider; searchWithBackoff adds the fixed pre-attempt delays and
 * the plain-text formatting the agents consume.
 */

import axios, { type AxiosInstance } from 'axios';
import { APIRateLimitError, APIResponseError, APITimeoutError } from './errors';
import { createTimer, logProviderCall, warn } from './logger';
import { describeError, sleep } from './utils';

export interface SearchResult {
  title: string;
  url: string;
  snippet: string;
}

export interface SearchProvider {
  readonly name: string;
  search(query: string, maxResults: number): Promise<SearchResult[]>;
}

export type SearchOutcome =
  | { success: true; text: string; results: SearchResult[] }
  | { success: false; error: string };

export interface SearchOptions {
  /** Wait before each attempt, one attempt per entry */
  delaysMs?: number[];
  maxResults?: number;
  /** Results included in the formatted text */
  limit?: number;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_SEARCH_DELAYS_MS = [800, 1600];
export const NO_RESULTS = 'No results found.';

export function formatResults(results: SearchResult[], limit: number = 3): string {
  const lines = results.slice(0, limit).map((item) => `${item.title} - ${item.url}\n${item.snippet}`);
  return lines.length > 0 ? lines.join('\n\n') : NO_RESULTS;
}

export async function searchWithBackoff(
  provider: SearchProvider,
  query: string,
  options: SearchOptions = {}
): Promise<SearchOutcome> {
  const delays = options.delaysMs ?? DEFAULT_SEARCH_DELAYS_MS;
  const wait = options.sleep ?? sleep;
  const maxResults = options.maxResults ?? 5;
  let lastError: unknown = null;

  for (const [attempt, delay] of delays.entries()) {
    await wait(delay);
    try {
      const results = await provider.search(query, maxResults);
      return { success: true, text: formatResults(results, options.limit), results };
    } catch (err) {
      lastError = err;
      warn('Search attempt failed', { provider: provider.name, attempt: attempt + 1, reason: describeError(err) });
    }
  }

  return {
    success: false,
    error: `Search temporarily unavailable: ${lastError === null ? 'no attempts made' : describeError(lastError)}`,
  };
}

export interface TavilyConfig {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  client?: AxiosInstance;
}

interface TavilyResponse {
  results?: Array<{ title?: string; url?: string; content?: string }>;
}

const TAVILY = 'Tavily';

export class TavilySearchProvider implements SearchProvider {
  readonly name = 'tavily';

  private readonly client: AxiosInstance;
  private readonly timeoutMs: number;

  constructor(private readonly config: TavilyConfig) {
    this.timeoutMs = config.timeoutMs ?? 15000;
    this.client =
      config.client ??
      axios.create({
        baseURL: config.baseUrl ?? 'https://api.tavily.com',
        timeout: this.timeoutMs,
      });
  }

  async search(query: string, maxResults: number): Promise<SearchResult[]> {
    const timer = createTimer('Tavily search', { query });

    try {
      const response = await this.client.post<TavilyResponse>('/search', {
        api_key: this.config.apiKey,
        query,
        max_results: maxResults,
      });
      logProviderCall(TAVILY, 'search', timer.elapsed(), true, { results: response.data.results?.length ?? 0 });

      return (response.data.results ?? []).map((item) => ({
        title: item.title ?? '',
        url: item.url ?? '',
        snippet: item.content ?? '',
      }));
    } catch (error) {
      logProviderCall(TAVILY, 'search', timer.elapsed(), false, { reason: describeError(error) });

      if (axios.isAxiosError(error)) {
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
          throw new APITimeoutError(TAVILY, this.timeoutMs);
        }
        if (error.response?.status === 429) {
          throw new APIRateLimitError(TAVILY);
        }
        throw new APIResponseError(TAVILY, error.response?.status ?? 0, error.message);
      }
      throw error;
    }
  }
}
