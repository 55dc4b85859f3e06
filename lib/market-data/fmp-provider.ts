/**
 * Financial Modeling Prep market data provider
 *
 * Implements MarketDataProvider over the FMP REST API:
 * - Snapshot: quote + profile, plus ratios, analyst recommendations and
 *   price-target consensus when those endpoints answer
 * - Price history: daily closes, newest first
 * - Statements: annual income, balance sheet and cash flow, mapped onto
 *   the named line items the analyzers look up
 *
 * Every request goes through a RequestThrottler.
 *
 * Documentation: https://site.financialmodelingprep.com/developer/docs
 */

import axios, { type AxiosInstance } from 'axios';
import { APIRateLimitError, APIResponseError, APITimeoutError, DataNotFoundError } from '../errors';
import { createTimer, logProviderCall, warn } from '../logger';
import { RequestThrottler } from '../rate-limiter';
import { describeError } from '../utils';
import { safeNumber } from '../validators';
import type { FinancialStatements, MarketDataProvider, PriceSeries, Snapshot, StatementSeries } from './types';

const SERVICE = 'Financial Modeling Prep';
const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_FMP_BASE_URL = 'https://financialmodelingprep.com/api';
export const DEFAULT_FMP_TIMEOUT_MS = 30000;

export interface FMPProviderConfig {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Annual statements to request per kind */
  statementLimit?: number;
  throttler?: RequestThrottler;
  /** Pre-built HTTP client; baseUrl and timeoutMs are ignored when given */
  client?: AxiosInstance;
  now?: () => Date;
}

interface FMPQuote {
  symbol?: string;
  name?: string;
  price?: number;
  marketCap?: number;
  pe?: number;
  eps?: number;
  yearHigh?: number;
  yearLow?: number;
  priceAvg50?: number;
  priceAvg200?: number;
  volume?: number;
  avgVolume?: number;
}

interface FMPProfile {
  companyName?: string;
  currency?: string;
  sector?: string;
  industry?: string;
  country?: string;
  beta?: number;
  fullTimeEmployees?: string | number;
}

interface FMPRatios {
  debtEquityRatio?: number;
  currentRatio?: number;
  quickRatio?: number;
}

interface FMPAnalystRecommendation {
  analystRatingsStrongBuy?: number;
  analystRatingsbuy?: number;
  analystRatingsHold?: number;
  analystRatingsSell?: number;
  analystRatingsStrongSell?: number;
}

interface FMPPriceTarget {
  targetHigh?: number;
  targetLow?: number;
  targetMedian?: number;
}

interface FMPHistoricalPrice {
  date?: string;
  close?: number;
}

interface FMPStatementRow {
  date?: string;
  [field: string]: unknown;
}

/**
 * FMP field -> line item row name
 */
const INCOME_FIELDS: Record<string, string> = {
  revenue: 'Total Revenue',
  grossProfit: 'Gross Profit',
  operatingIncome: 'Operating Income',
  netIncome: 'Net Income',
  ebitda: 'EBITDA',
};

const BALANCE_FIELDS: Record<string, string> = {
  totalDebt: 'Total Debt',
  totalStockholdersEquity: 'Stockholders Equity',
  totalAssets: 'Total Assets',
  totalLiabilities: 'Total Liabilities',
  totalCurrentAssets: 'Current Assets',
  totalCurrentLiabilities: 'Current Liabilities',
};

const CASHFLOW_FIELDS: Record<string, string> = {
  operatingCashFlow: 'Operating Cash Flow',
  capitalExpenditure: 'Capital Expenditure',
  freeCashFlow: 'Free Cash Flow',
};

function byDateDescending<T extends { date?: string }>(a: T, b: T): number {
  return (b.date ?? '').localeCompare(a.date ?? '');
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Rows (newest first) -> line item series
 */
export function toStatementSeries(rows: FMPStatementRow[], fields: Record<string, string>): StatementSeries {
  const sorted = [...rows].sort(byDateDescending);
  const series: Record<string, Array<number | null>> = {};

  for (const [field, lineItem] of Object.entries(fields)) {
    if (!sorted.some((row) => field in row)) continue;
    series[lineItem] = sorted.map((row) => safeNumber(row[field]) ?? null);
  }

  return series;
}

/**
 * Mean rating on the 1 (strong buy) - 5 (strong sell) scale
 */
export function recommendationMean(rec: FMPAnalystRecommendation): { mean: number; count: number } | null {
  const weights: Array<[number | undefined, number]> = [
    [rec.analystRatingsStrongBuy, 1],
    [rec.analystRatingsbuy, 2],
    [rec.analystRatingsHold, 3],
    [rec.analystRatingsSell, 4],
    [rec.analystRatingsStrongSell, 5],
  ];

  let count = 0;
  let weighted = 0;
  for (const [votes, weight] of weights) {
    const n = safeNumber(votes) ?? 0;
    count += n;
    weighted += n * weight;
  }

  return count > 0 ? { mean: weighted / count, count } : null;
}

export function recommendationKey(mean: number): string {
  if (mean <= 1.5) return 'strong_buy';
  if (mean <= 2.5) return 'buy';
  if (mean <= 3.5) return 'hold';
  if (mean <= 4.5) return 'sell';
  return 'strong_sell';
}

export class FMPMarketDataProvider implements MarketDataProvider {
  readonly name = 'fmp';

  private readonly client: AxiosInstance;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly statementLimit: number;
  private readonly throttler: RequestThrottler;
  private readonly now: () => Date;

  constructor(config: FMPProviderConfig) {
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_FMP_TIMEOUT_MS;
    this.statementLimit = config.statementLimit ?? 4;
    this.throttler = config.throttler ?? new RequestThrottler();
    this.now = config.now ?? (() => new Date());

    this.client =
      config.client ??
      axios.create({
        baseURL: config.baseUrl ?? DEFAULT_FMP_BASE_URL,
        timeout: this.timeoutMs,
      });
  }

  /**
   * @throws DataNotFoundError if the quote is empty
   */
  async getSnapshot(symbol: string): Promise<Snapshot> {
    const quotes = await this.request<FMPQuote[]>('getQuote', symbol, `/v3/quote/${symbol}`);
    const quote = Array.isArray(quotes) ? quotes[0] : undefined;
    if (!quote) {
      throw new DataNotFoundError(symbol, 'quote data');
    }

    const snapshot: Snapshot = {
      symbol: quote.symbol ?? symbol,
      short_name: quote.name,
      current_price: safeNumber(quote.price),
      market_cap: safeNumber(quote.marketCap),
      trailing_pe: safeNumber(quote.pe),
      trailing_eps: safeNumber(quote.eps),
      fifty_two_week_high: safeNumber(quote.yearHigh),
      fifty_two_week_low: safeNumber(quote.yearLow),
      fifty_day_average: safeNumber(quote.priceAvg50),
      two_hundred_day_average: safeNumber(quote.priceAvg200),
      volume: safeNumber(quote.volume),
      average_volume: safeNumber(quote.avgVolume),
    };

    const [profile, ratios, recommendation, target] = await Promise.all([
      this.optional(symbol, 'profile', () => this.firstRow<FMPProfile>('getProfile', symbol, `/v3/profile/${symbol}`)),
      this.optional(symbol, 'ratios', () =>
        this.firstRow<FMPRatios>('getRatios', symbol, `/v3/ratios/${symbol}`, { limit: 1 })
      ),
      this.optional(symbol, 'analyst recommendations', () =>
        this.firstRow<FMPAnalystRecommendation>(
          'getAnalystRecommendations',
          symbol,
          `/v3/analyst-stock-recommendations/${symbol}`
        )
      ),
      this.optional(symbol, 'price target consensus', () =>
        this.firstRow<FMPPriceTarget>('getPriceTargetConsensus', symbol, '/v4/price-target-consensus', { symbol })
      ),
    ]);

    if (profile) {
      snapshot.short_name = snapshot.short_name ?? profile.companyName;
      snapshot.currency = profile.currency;
      snapshot.sector = profile.sector;
      snapshot.industry = profile.industry;
      snapshot.country = profile.country;
      snapshot.beta = safeNumber(profile.beta);
      snapshot.full_time_employees = safeNumber(profile.fullTimeEmployees);
    }

    if (ratios) {
      snapshot.debt_to_equity = safeNumber(ratios.debtEquityRatio);
      snapshot.current_ratio = safeNumber(ratios.currentRatio);
      snapshot.quick_ratio = safeNumber(ratios.quickRatio);
    }

    const consensus = recommendation ? recommendationMean(recommendation) : null;
    if (consensus) {
      snapshot.recommendation_mean = consensus.mean;
      snapshot.recommendation_key = recommendationKey(consensus.mean);
      snapshot.number_of_analyst_opinions = consensus.count;
    }

    if (target) {
      snapshot.target_high_price = safeNumber(target.targetHigh);
      snapshot.target_low_price = safeNumber(target.targetLow);
      snapshot.target_median_price = safeNumber(target.targetMedian);
    }

    return snapshot;
  }

  async getPriceHistory(symbol: string, lookbackDays: number): Promise<PriceSeries> {
    const to = this.now();
    const from = new Date(to.getTime() - lookbackDays * DAY_MS);

    const response = await this.request<{ historical?: FMPHistoricalPrice[] }>(
      'getHistoricalPrices',
      symbol,
      `/v3/historical-price-full/${symbol}`,
      { from: formatDate(from), to: formatDate(to) }
    );

    const rows = response?.historical ?? [];
    return [...rows]
      .sort(byDateDescending)
      .map((row) => safeNumber(row.close))
      .filter((close): close is number => close !== undefined);
  }

  async getStatements(symbol: string): Promise<FinancialStatements> {
    const params = { period: 'annual', limit: this.statementLimit };
    const [income, balance, cashflow] = await Promise.all([
      this.rows('getIncomeStatement', symbol, `/v3/income-statement/${symbol}`, params),
      this.rows('getBalanceSheet', symbol, `/v3/balance-sheet-statement/${symbol}`, params),
      this.rows('getCashFlowStatement', symbol, `/v3/cash-flow-statement/${symbol}`, params),
    ]);

    return {
      income: toStatementSeries(income, INCOME_FIELDS),
      balance: toStatementSeries(balance, BALANCE_FIELDS),
      cashflow: toStatementSeries(cashflow, CASHFLOW_FIELDS),
    };
  }

  private async rows(
    operation: string,
    symbol: string,
    path: string,
    params: Record<string, string | number>
  ): Promise<FMPStatementRow[]> {
    const data = await this.request<FMPStatementRow[]>(operation, symbol, path, params);
    return Array.isArray(data) ? data : [];
  }

  private async firstRow<T>(
    operation: string,
    symbol: string,
    path: string,
    params: Record<string, string | number> = {}
  ): Promise<T | null> {
    const data = await this.request<T[]>(operation, symbol, path, params);
    return Array.isArray(data) && data.length > 0 ? data[0] : null;
  }

  /**
   * Optional snapshot sections: a failure is logged and the section left out
   */
  private async optional<T>(symbol: string, section: string, load: () => Promise<T | null>): Promise<T | null> {
    try {
      return await load();
    } catch (err) {
      warn(`FMP ${section} unavailable, continuing without it`, { symbol, reason: describeError(err) });
      return null;
    }
  }

  private async request<T>(
    operation: string,
    symbol: string,
    path: string,
    params: Record<string, string | number> = {}
  ): Promise<T> {
    const timer = createTimer(`FMP ${operation}`, { symbol });

    try {
      const response = await this.throttler.schedule(() =>
        this.client.get<T>(path, { params: { ...params, apikey: this.apiKey } })
      );
      logProviderCall('FMP', operation, timer.elapsed(), true, { symbol });
      return response.data;
    } catch (error) {
      logProviderCall('FMP', operation, timer.elapsed(), false, { symbol, reason: describeError(error) });
      this.handleError(error, operation);
    }
  }

  /**
   * Convert axios errors to rating engine errors
   */
  private handleError(error: unknown, operation: string): never {
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        throw new APITimeoutError(SERVICE, this.timeoutMs);
      }

      if (error.response?.status === 429) {
        throw new APIRateLimitError(SERVICE, safeNumber(error.response.headers['retry-after']));
      }

      if (error.response) {
        throw new APIResponseError(SERVICE, error.response.status, error.message);
      }

      throw new APIResponseError(SERVICE, 0, `network error during ${operation}: ${error.message}`);
    }

    throw error;
  }
}
