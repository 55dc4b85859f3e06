import { AxiosError } from 'axios';
import { describe, expect, it } from 'vitest';
import { APIRateLimitError, APIResponseError, APITimeoutError, DataNotFoundError } from '../../lib/errors';
import {
  FMPMarketDataProvider,
  recommendationKey,
  recommendationMean,
  toStatementSeries,
} from '../../lib/market-data/fmp-provider';
import { RequestThrottler } from '../../lib/rate-limiter';
import { fakeHttp, httpError, type Route } from '../fixtures/http';

function provider(routes: Record<string, Route>) {
  const http = fakeHttp(routes);
  const fmp = new FMPMarketDataProvider({
    apiKey: 'test-secret',
    client: http.client,
    throttler: new RequestThrottler({ minIntervalMs: 0 }),
    now: () => new Date('2024-03-01T00:00:00Z'),
  });
  return { fmp, requests: http.requests };
}

const QUOTE = {
  symbol: 'ACME',
  name: 'Acme Corp',
  price: 190.5,
  marketCap: 3_000_000_000,
  pe: 30,
  eps: 6.35,
  yearHigh: 200,
  yearLow: 150,
  priceAvg50: 185,
  priceAvg200: 180,
  volume: 50_000_000,
  avgVolume: 60_000_000,
};

describe('FMPMarketDataProvider.getSnapshot', () => {
  it('merges quote, profile, ratios, recommendations and price targets', async () => {
    const { fmp, requests } = provider({
      '/v3/quote/ACME': () => [QUOTE],
      '/v3/profile/ACME': () => [
        {
          companyName: 'Acme Corporation',
          currency: 'USD',
          sector: 'Technology',
          industry: 'Consumer Electronics',
          country: 'US',
          beta: 1.2,
          fullTimeEmployees: '161000',
        },
      ],
      '/v3/ratios/ACME': () => [{ debtEquityRatio: 1.5, currentRatio: 0.9, quickRatio: 0.8 }],
      '/v3/analyst-stock-recommendations/ACME': () => [
        {
          analystRatingsStrongBuy: 10,
          analystRatingsbuy: 20,
          analystRatingsHold: 10,
          analystRatingsSell: 0,
          analystRatingsStrongSell: 0,
        },
      ],
      '/v4/price-target-consensus': () => [{ targetHigh: 250, targetLow: 160, targetMedian: 210 }],
    });

    const snapshot = await fmp.getSnapshot('ACME');

    expect(snapshot).toMatchObject({
      symbol: 'ACME',
      short_name: 'Acme Corp',
      currency: 'USD',
      current_price: 190.5,
      market_cap: 3_000_000_000,
      trailing_pe: 30,
      sector: 'Technology',
      full_time_employees: 161000,
      beta: 1.2,
      debt_to_equity: 1.5,
      current_ratio: 0.9,
      quick_ratio: 0.8,
      recommendation_mean: 2,
      recommendation_key: 'buy',
      number_of_analyst_opinions: 40,
      target_median_price: 210,
      volume: 50_000_000,
      average_volume: 60_000_000,
    });
    expect(requests[0].params).toEqual({ apikey: 'test-secret' });
    expect(requests.find((r) => r.url === '/v4/price-target-consensus')?.params).toEqual({
      symbol: 'ACME',
      apikey: 'test-secret',
    });
  });

  it('leaves out optional sections that fail', async () => {
    const { fmp } = provider({ '/v3/quote/ACME': () => [QUOTE] });

    const snapshot = await fmp.getSnapshot('ACME');

    expect(snapshot.current_price).toBe(190.5);
    expect(snapshot.sector).toBeUndefined();
    expect(snapshot.debt_to_equity).toBeUndefined();
    expect(snapshot.recommendation_mean).toBeUndefined();
  });

  it('throws DataNotFoundError for an empty quote', async () => {
    const { fmp } = provider({ '/v3/quote/NOPE': () => [] });

    await expect(fmp.getSnapshot('NOPE')).rejects.toThrow(DataNotFoundError);
  });
});

describe('FMPMarketDataProvider.getPriceHistory', () => {
  it('returns closes newest first over the lookback window', async () => {
    const { fmp, requests } = provider({
      '/v3/historical-price-full/ACME': () => ({
        symbol: 'ACME',
        historical: [
          { date: '2024-02-27', close: 101 },
          { date: '2024-02-29', close: 103 },
          { date: '2024-02-28', close: 102 },
          { date: '2024-02-26' },
        ],
      }),
    });

    const prices = await fmp.getPriceHistory('ACME', 10);

    expect(prices).toEqual([103, 102, 101]);
    expect(requests[0].params).toEqual({ from: '2024-02-20', to: '2024-03-01', apikey: 'test-secret' });
  });

  it('returns an empty series when there is no history', async () => {
    const { fmp } = provider({ '/v3/historical-price-full/ACME': () => ({}) });

    await expect(fmp.getPriceHistory('ACME', 10)).resolves.toEqual([]);
  });
});

describe('FMPMarketDataProvider.getStatements', () => {
  it('maps annual statements onto line items, latest first', async () => {
    const { fmp, requests } = provider({
      '/v3/income-statement/ACME': () => [
        { date: '2022-12-31', revenue: 900, netIncome: 80 },
        { date: '2023-12-31', revenue: 1000, netIncome: 100, ebitda: 200 },
      ],
      '/v3/balance-sheet-statement/ACME': () => [],
      '/v3/cash-flow-statement/ACME': () => [{ date: '2023-12-31', operatingCashFlow: '150' }],
    });

    const statements = await fmp.getStatements('ACME');

    expect(statements.income).toEqual({
      'Total Revenue': [1000, 900],
      'Net Income': [100, 80],
      EBITDA: [200, null],
    });
    expect(statements.balance).toEqual({});
    expect(statements.cashflow).toEqual({ 'Operating Cash Flow': [150] });
    expect(requests[0].params).toEqual({ period: 'annual', limit: 4, apikey: 'test-secret' });
  });
});

describe('FMPMarketDataProvider errors', () => {
  it('maps error responses to APIResponseError', async () => {
    const { fmp } = provider({
      '/v3/quote/ACME': (config) => {
        throw httpError(config, 500);
      },
    });

    const failure = fmp.getSnapshot('ACME');
    await expect(failure).rejects.toBeInstanceOf(APIResponseError);
    await expect(failure).rejects.toMatchObject({ code: 'API_SERVER_ERROR', statusCode: 500, kind: 'provider' });
  });

  it('maps 429 responses to APIRateLimitError with the retry delay', async () => {
    const { fmp } = provider({
      '/v3/quote/ACME': (config) => {
        throw new AxiosError('Request failed with status code 429', AxiosError.ERR_BAD_REQUEST, config, null, {
          data: {},
          status: 429,
          statusText: 'Too Many Requests',
          headers: { 'retry-after': '30' },
          config,
        });
      },
    });

    const failure = fmp.getSnapshot('ACME');
    await expect(failure).rejects.toBeInstanceOf(APIRateLimitError);
    await expect(failure).rejects.toMatchObject({
      code: 'RATE_LIMIT',
      userMessage: 'Too many requests to Financial Modeling Prep. Please wait 30 seconds before trying again.',
    });
  });

  it('maps timeouts to APITimeoutError', async () => {
    const { fmp } = provider({
      '/v3/quote/ACME': (config) => {
        throw new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED', config);
      },
    });

    await expect(fmp.getSnapshot('ACME')).rejects.toBeInstanceOf(APITimeoutError);
  });

  it('reports network failures with the operation name', async () => {
    const { fmp } = provider({
      '/v3/historical-price-full/ACME': (config) => {
        throw new AxiosError('Network Error', AxiosError.ERR_NETWORK, config);
      },
    });

    await expect(fmp.getPriceHistory('ACME', 10)).rejects.toThrow(
      'Financial Modeling Prep API error (0): network error during getHistoricalPrices: Network Error'
    );
  });
});

describe('FMP mapping helpers', () => {
  it('keeps only fields some row reports', () => {
    expect(
      toStatementSeries([{ date: '2023-12-31', revenue: 'n/a' }, { date: '2024-12-31', revenue: 5 }], {
        revenue: 'Total Revenue',
        netIncome: 'Net Income',
      })
    ).toEqual({ 'Total Revenue': [5, null] });
  });

  it('averages analyst votes on the 1-5 scale', () => {
    expect(recommendationMean({ analystRatingsStrongBuy: 1, analystRatingsStrongSell: 1 })).toEqual({
      mean: 3,
      count: 2,
    });
    expect(recommendationMean({})).toBeNull();
  });

  it('names the consensus', () => {
    expect(recommendationKey(1.5)).toBe('strong_buy');
    expect(recommendationKey(2)).toBe('buy');
    expect(recommendationKey(3.5)).toBe('hold');
    expect(recommendationKey(4)).toBe('sell');
    expect(recommendationKey(4.6)).toBe('strong_sell');
  });
});
