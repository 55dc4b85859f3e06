/**
 * Stock Analyzer
 *
 * The boundary the agent and API layers call. Every operation takes a symbol
 * and resolves to an AnalysisOutcome; nothing here throws to the caller.
 *
 * Per request:
 * 1. Validate and upper-case the ticker
 * 2. Resolve the symbol once (snapshot fetch + fallback candidates)
 * 3. Load prices and statements at most once, on demand
 * 4. Run the calculators on the resolved symbol's data
 */

import type { AxiosInstance } from 'axios';
import type { AppConfig } from '../config/app-config';
import { analyzeEarningsQuality, type EarningsQuality } from './analysis/earnings-quality';
import { scoreEsgRisk, type EsgRiskFactors } from './analysis/esg-risk';
import { calculateFundamentals, type FundamentalSummary } from './analysis/fundamental';
import { fail, runAnalysis, succeed, type AnalysisOutcome } from './analysis/outcome';
import { scoreSentiment, type MarketSentiment } from './analysis/sentiment';
import { analyzeTechnicals, type TechnicalIndicators } from './analysis/technical';
import { AnalysisFailedError, PriceUnavailableError, getErrorCode, getErrorKind, getUserMessage } from './errors';
import {
  buildTradingStrategy,
  deriveIntradayLevels,
  type IntradayOptions,
  type IntradayRecommendation,
  type RsiRegime,
  type TradingStrategy,
} from './intraday';
import { createTimer, debug, logAnalysisComplete, logAnalysisFailed, logAnalysisStart, logDataQuality } from './logger';
import { CachedMarketDataProvider } from './market-data/cache';
import { FMPMarketDataProvider } from './market-data/fmp-provider';
import { resolveSymbol, suffixFallback, type ResolvedSymbol } from './market-data/symbol-resolver';
import type {
  FinancialStatements,
  MarketDataProvider,
  PriceSeries,
  Snapshot,
  StatementSeries,
  SymbolFallbackStrategy,
} from './market-data/types';
import { RequestThrottler } from './rate-limiter';
import {
  TavilySearchProvider,
  searchWithBackoff,
  type SearchOptions,
  type SearchOutcome,
  type SearchProvider,
} from './search';
import { calculateCompositeScore, type CompositeScore } from './scoring';
import { resolveCurrentPrice, validateMarketData, validateTicker, type DataQualityReport } from './validators';

export const DEFAULT_PRICE_LOOKBACK_DAYS = 400;

export const INTRADAY_DISCLAIMER =
  'This analysis is for educational purposes only. Always do your own research and consider consulting a financial advisor before making trading decisions.';

export interface StockAnalyzerOptions {
  priceLookbackDays?: number;
  symbolFallback?: SymbolFallbackStrategy;
  intraday?: IntradayOptions;
  /** News lookups; searchNews reports "not configured" without one */
  search?: SearchProvider;
  searchOptions?: SearchOptions;
  now?: () => Date;
}

export const SEARCH_NOT_CONFIGURED = 'News search is not configured. Set TAVILY_API_KEY to enable it.';

export interface CurrentPrice {
  current_price: number;
  currency: string | null;
  source: 'quote' | 'latest_close';
}

export interface CompanyInfo {
  name: string | null;
  symbol: string;
  current_price: number | null;
  currency: string | null;
  market_cap: number | null;
  sector: string | null;
  industry: string | null;
  country: string | null;
  eps: number | null;
  pe_ratio: number | null;
  fifty_two_week_low: number | null;
  fifty_two_week_high: number | null;
  fifty_day_average: number | null;
  two_hundred_day_average: number | null;
  employees: number | null;
  free_cashflow: number | null;
  operating_cashflow: number | null;
  ebitda: number | null;
}

export interface DetailedAnalysis {
  fundamentals: AnalysisOutcome<FundamentalSummary>;
  earnings_quality: AnalysisOutcome<EarningsQuality>;
  technical_indicators: AnalysisOutcome<TechnicalIndicators>;
  market_sentiment: AnalysisOutcome<MarketSentiment>;
  esg_risk_factors: AnalysisOutcome<EsgRiskFactors>;
}

export interface ComprehensiveAnalysis extends CompositeScore {
  requested_symbol: string;
  analyzed_at: string;
  data_quality: DataQualityReport;
  detailed_analysis: DetailedAnalysis;
}

export interface IntradayAnalysis {
  requested_symbol: string;
  analyzed_at: string;
  currency: string | null;
  current_price: number;
  intraday_levels: {
    entry_price: number;
    exit_price: number;
    stop_loss: number;
  };
  risk_analysis: {
    risk_amount: number;
    reward_amount: number;
    risk_reward_ratio: number;
    recommendation: IntradayRecommendation;
    recommendation_detail: string;
  };
  regime: RsiRegime;
  adjustments: string[];
  technical_indicators: AnalysisOutcome<TechnicalIndicators>;
  market_sentiment: AnalysisOutcome<MarketSentiment>;
  trading_strategy: TradingStrategy;
  disclaimer: string;
}

async function settle<T>(promise: Promise<T>): Promise<T | Error> {
  try {
    return await promise;
  } catch (err) {
    return err instanceof Error ? err : new Error(String(err));
  }
}

function unwrap<T>(value: T | Error): T {
  if (value instanceof Error) {
    throw value;
  }
  return value;
}

function orNull<T>(value: T | Error): T | null {
  return value instanceof Error ? null : value;
}

/**
 * First fetch error that is not plain missing data; an outage outranks PRICE_UNAVAILABLE
 */
function providerFailure(...results: unknown[]): Error | null {
  for (const result of results) {
    if (result instanceof Error && getErrorKind(result) !== 'insufficient_data') {
      return result;
    }
  }
  return null;
}

/**
 * Data for one request, each kind fetched at most once
 */
class RequestData {
  private prices: Promise<PriceSeries | Error> | null = null;
  private statements: Promise<FinancialStatements | Error> | null = null;

  constructor(
    private readonly provider: MarketDataProvider,
    readonly resolved: ResolvedSymbol,
    private readonly lookbackDays: number
  ) {}

  get symbol(): string {
    return this.resolved.symbol;
  }

  getSnapshot(): Snapshot | Error {
    return this.resolved.snapshot;
  }

  getPrices(): Promise<PriceSeries | Error> {
    if (!this.prices) {
      this.prices = settle(this.provider.getPriceHistory(this.symbol, this.lookbackDays));
    }
    return this.prices;
  }

  getStatements(): Promise<FinancialStatements | Error> {
    if (!this.statements) {
      this.statements = settle(this.provider.getStatements(this.symbol));
    }
    return this.statements;
  }
}

export class StockAnalyzer {
  private readonly priceLookbackDays: number;
  private readonly symbolFallback: SymbolFallbackStrategy;
  private readonly intradayOptions: IntradayOptions;
  private readonly search: SearchProvider | null;
  private readonly searchOptions: SearchOptions;
  private readonly now: () => Date;

  constructor(
    private readonly provider: MarketDataProvider,
    options: StockAnalyzerOptions = {}
  ) {
    this.priceLookbackDays = options.priceLookbackDays ?? DEFAULT_PRICE_LOOKBACK_DAYS;
    this.symbolFallback = options.symbolFallback ?? suffixFallback('.NS');
    this.intradayOptions = options.intraday ?? {};
    this.search = options.search ?? null;
    this.searchOptions = options.searchOptions ?? {};
    this.now = options.now ?? (() => new Date());
  }

  getCurrentPrice(symbol: string): Promise<AnalysisOutcome<CurrentPrice>> {
    return this.withRequest<CurrentPrice>(symbol, async (data) => {
      const snapshotResult = data.getSnapshot();
      const snapshot = orNull(snapshotResult);
      const quoted = resolveCurrentPrice(snapshot, null);
      if (quoted !== null) {
        return succeed<CurrentPrice>(data.symbol, {
          current_price: quoted,
          currency: snapshot?.currency ?? null,
          source: 'quote',
        });
      }

      const pricesResult = await data.getPrices();
      const latestClose = resolveCurrentPrice(null, orNull(pricesResult));
      if (latestClose === null) {
        const outage = providerFailure(snapshotResult, pricesResult);
        return fail<CurrentPrice>(data.symbol, outage ?? new PriceUnavailableError(data.symbol));
      }
      return succeed<CurrentPrice>(data.symbol, {
        current_price: latestClose,
        currency: snapshot?.currency ?? null,
        source: 'latest_close',
      });
    });
  }

  getCompanyInfo(symbol: string): Promise<AnalysisOutcome<CompanyInfo>> {
    return this.withRequest<CompanyInfo>(symbol, (data) =>
      runAnalysis(data.symbol, () => {
        const snapshot = unwrap(data.getSnapshot());
        return {
          name: snapshot.short_name ?? null,
          symbol: snapshot.symbol ?? data.symbol,
          current_price: snapshot.current_price ?? null,
          currency: snapshot.currency ?? null,
          market_cap: snapshot.market_cap ?? null,
          sector: snapshot.sector ?? null,
          industry: snapshot.industry ?? null,
          country: snapshot.country ?? null,
          eps: snapshot.trailing_eps ?? null,
          pe_ratio: snapshot.trailing_pe ?? null,
          fifty_two_week_low: snapshot.fifty_two_week_low ?? null,
          fifty_two_week_high: snapshot.fifty_two_week_high ?? null,
          fifty_day_average: snapshot.fifty_day_average ?? null,
          two_hundred_day_average: snapshot.two_hundred_day_average ?? null,
          employees: snapshot.full_time_employees ?? null,
          free_cashflow: snapshot.free_cashflow ?? null,
          operating_cashflow: snapshot.operating_cashflow ?? null,
          ebitda: snapshot.ebitda ?? null,
        };
      })
    );
  }

  getIncomeStatements(symbol: string): Promise<AnalysisOutcome<StatementSeries>> {
    return this.statement(symbol, 'income');
  }

  getBalanceSheet(symbol: string): Promise<AnalysisOutcome<StatementSeries>> {
    return this.statement(symbol, 'balance');
  }

  getCashflowStatements(symbol: string): Promise<AnalysisOutcome<StatementSeries>> {
    return this.statement(symbol, 'cashflow');
  }

  getFundamentalSummary(symbol: string): Promise<AnalysisOutcome<FundamentalSummary>> {
    return this.withRequest<FundamentalSummary>(symbol, (data) => this.fundamentals(data));
  }

  analyzeEarningsQuality(symbol: string): Promise<AnalysisOutcome<EarningsQuality>> {
    return this.withRequest<EarningsQuality>(symbol, (data) => this.earningsQuality(data));
  }

  getTechnicalIndicators(symbol: string): Promise<AnalysisOutcome<TechnicalIndicators>> {
    return this.withRequest<TechnicalIndicators>(symbol, (data) => this.technicals(data));
  }

  getMarketSentiment(symbol: string): Promise<AnalysisOutcome<MarketSentiment>> {
    return this.withRequest<MarketSentiment>(symbol, (data) => this.sentiment(data));
  }

  getEsgRiskFactors(symbol: string): Promise<AnalysisOutcome<EsgRiskFactors>> {
    return this.withRequest<EsgRiskFactors>(symbol, (data) => this.esgRisk(data));
  }

  /**
   * All five analyses on one resolved symbol, combined into the 0-100 rating.
   * Fails only when every sub-analysis failed.
   */
  getComprehensiveAnalysis(symbol: string): Promise<AnalysisOutcome<ComprehensiveAnalysis>> {
    return this.withRequest<ComprehensiveAnalysis>(symbol, async (data) => {
      const timer = createTimer('Comprehensive analysis', { symbol: data.symbol });
      logAnalysisStart(data.symbol, 'Comprehensive analysis', { requested: data.resolved.requested });

      const [fundamentals, earnings, technical] = await Promise.all([
        this.fundamentals(data),
        this.earningsQuality(data),
        this.technicals(data),
      ]);
      const detailed: DetailedAnalysis = {
        fundamentals,
        earnings_quality: earnings,
        technical_indicators: technical,
        market_sentiment: this.sentiment(data),
        esg_risk_factors: this.esgRisk(data),
      };

      const outcomes = [
        detailed.fundamentals,
        detailed.earnings_quality,
        detailed.technical_indicators,
        detailed.market_sentiment,
        detailed.esg_risk_factors,
      ];
      const failures = outcomes.flatMap((outcome) => (outcome.success ? [] : [outcome.error]));
      if (failures.length === outcomes.length) {
        const error = new AnalysisFailedError(data.symbol, failures);
        timer.end(false, { failures: failures.length });
        logAnalysisFailed(data.symbol, error.code, { failures: failures.map((failure) => failure.code) });
        return fail<ComprehensiveAnalysis>(data.symbol, error);
      }

      const dataQuality = validateMarketData({
        symbol: data.symbol,
        snapshot: data.getSnapshot(),
        prices: await data.getPrices(),
        statements: await data.getStatements(),
      });
      logDataQuality(data.symbol, dataQuality);

      const composite = calculateCompositeScore(detailed);
      const duration = timer.end(true, { failures: failures.length });
      logAnalysisComplete(data.symbol, duration, composite);

      return succeed<ComprehensiveAnalysis>(data.symbol, {
        ...composite,
        requested_symbol: data.resolved.requested,
        analyzed_at: this.now().toISOString(),
        data_quality: dataQuality,
        detailed_analysis: detailed,
      });
    });
  }

  /**
   * Entry, exit and stop-loss levels for the session.
   * A missing current price fails with PRICE_UNAVAILABLE, or with the provider
   * error when an outage caused it; failed technical or sentiment inputs only
   * switch off their adjustments.
   */
  getIntradayAnalysis(symbol: string): Promise<AnalysisOutcome<IntradayAnalysis>> {
    return this.withRequest<IntradayAnalysis>(symbol, async (data) => {
      const technical = await this.technicals(data);
      const sentiment = this.sentiment(data);
      const snapshotResult = data.getSnapshot();
      const pricesResult = await data.getPrices();
      const snapshot = orNull(snapshotResult);
      const currentPrice = resolveCurrentPrice(snapshot, orNull(pricesResult));
      const outage = currentPrice === null ? providerFailure(snapshotResult, pricesResult) : null;
      if (outage) {
        return fail<IntradayAnalysis>(data.symbol, outage);
      }

      return runAnalysis(data.symbol, () => {
        const indicators = technical.success ? technical.data : null;
        const levels = deriveIntradayLevels(
          {
            symbol: data.symbol,
            current_price: currentPrice,
            rsi: indicators?.rsi ?? null,
            price_3m_momentum: indicators?.price_3m_momentum ?? null,
            sentiment_score: sentiment.success ? sentiment.data.sentiment_score : null,
          },
          this.intradayOptions
        );
        const currency = snapshot?.currency ?? null;

        debug('Intraday levels derived', {
          symbol: data.symbol,
          regime: levels.regime,
          ratio: levels.risk_reward_ratio,
        });

        return {
          requested_symbol: data.resolved.requested,
          analyzed_at: this.now().toISOString(),
          currency,
          current_price: levels.current_price,
          intraday_levels: {
            entry_price: levels.entry_price,
            exit_price: levels.exit_price,
            stop_loss: levels.stop_loss,
          },
          risk_analysis: {
            risk_amount: levels.risk_amount,
            reward_amount: levels.reward_amount,
            risk_reward_ratio: levels.risk_reward_ratio,
            recommendation: levels.recommendation,
            recommendation_detail: levels.recommendation_detail,
          },
          regime: levels.regime,
          adjustments: levels.adjustments,
          technical_indicators: technical,
          market_sentiment: sentiment,
          trading_strategy: buildTradingStrategy(levels, currency ?? undefined),
          disclaimer: INTRADAY_DISCLAIMER,
        };
      });
    });
  }

  /**
   * Recent news for a ticker, formatted for display. Search failures come
   * back as an unsuccessful outcome rather than a rejection.
   */
  async searchNews(symbol: string): Promise<SearchOutcome> {
    if (!this.search) {
      return { success: false, error: SEARCH_NOT_CONFIGURED };
    }

    let ticker: string;
    try {
      ticker = validateTicker(symbol);
    } catch (err) {
      return { success: false, error: getUserMessage(err) };
    }
    return searchWithBackoff(this.search, `${ticker} stock news`, this.searchOptions);
  }

  private async fundamentals(data: RequestData): Promise<AnalysisOutcome<FundamentalSummary>> {
    const statements = await data.getStatements();
    const snapshot: Snapshot = orNull(data.getSnapshot()) ?? {};
    return runAnalysis(data.symbol, () => calculateFundamentals(unwrap(statements), snapshot));
  }

  private async earningsQuality(data: RequestData): Promise<AnalysisOutcome<EarningsQuality>> {
    const statements = await data.getStatements();
    return runAnalysis(data.symbol, () => analyzeEarningsQuality(unwrap(statements), data.symbol));
  }

  private async technicals(data: RequestData): Promise<AnalysisOutcome<TechnicalIndicators>> {
    const prices = await data.getPrices();
    return runAnalysis(data.symbol, () => analyzeTechnicals(unwrap(prices), data.symbol));
  }

  private sentiment(data: RequestData): AnalysisOutcome<MarketSentiment> {
    const snapshot = data.getSnapshot();
    if (snapshot instanceof Error) {
      return fail<MarketSentiment>(data.symbol, snapshot);
    }
    return succeed(data.symbol, scoreSentiment(snapshot));
  }

  private esgRisk(data: RequestData): AnalysisOutcome<EsgRiskFactors> {
    const snapshot = data.getSnapshot();
    if (snapshot instanceof Error) {
      return fail<EsgRiskFactors>(data.symbol, snapshot);
    }
    return succeed(data.symbol, scoreEsgRisk(snapshot));
  }

  private statement(symbol: string, kind: keyof FinancialStatements): Promise<AnalysisOutcome<StatementSeries>> {
    return this.withRequest<StatementSeries>(symbol, async (data) => {
      const statements = await data.getStatements();
      return runAnalysis(data.symbol, () => unwrap(statements)[kind]);
    });
  }

  /**
   * Validate, resolve and run; anything thrown becomes a failure outcome
   */
  private async withRequest<T>(
    input: string,
    analyze: (data: RequestData) => AnalysisOutcome<T> | Promise<AnalysisOutcome<T>>
  ): Promise<AnalysisOutcome<T>> {
    let symbol = typeof input === 'string' ? input.trim() : String(input);
    try {
      symbol = validateTicker(input);
      const resolved = await resolveSymbol(this.provider, symbol, this.symbolFallback);
      symbol = resolved.symbol;
      const outcome = await analyze(new RequestData(this.provider, resolved, this.priceLookbackDays));
      if (!outcome.success) {
        debug('Analysis returned a failure', { symbol, code: outcome.error.code, kind: outcome.error.kind });
      }
      return outcome;
    } catch (err) {
      debug('Analysis request failed', { symbol, code: getErrorCode(err) });
      return fail<T>(symbol, err);
    }
  }
}

export interface StockAnalyzerClients {
  /** HTTP client for Tavily; a default axios instance when omitted */
  searchClient?: AxiosInstance;
}

/**
 * Analyzer over FMP with throttling and caching, from runtime configuration.
 * News search is wired up only when a Tavily key is configured.
 */
export function createStockAnalyzer(config: AppConfig, clients: StockAnalyzerClients = {}): StockAnalyzer {
  const throttler = new RequestThrottler({ minIntervalMs: config.minRequestIntervalMs });
  const fmp = new FMPMarketDataProvider({
    apiKey: config.fmp.apiKey,
    baseUrl: config.fmp.baseUrl,
    timeoutMs: config.fmp.timeoutMs,
    throttler,
  });
  const provider = new CachedMarketDataProvider(fmp, {
    ttlSeconds: config.cacheTtlSeconds,
    maxEntries: config.cacheMaxEntries,
  });
  const search = config.tavilyApiKey
    ? new TavilySearchProvider({ apiKey: config.tavilyApiKey, client: clients.searchClient })
    : undefined;
  const { sentimentDivisor, sentimentPositive, sentimentNegative } = config.intraday;

  return new StockAnalyzer(provider, {
    priceLookbackDays: config.priceLookbackDays,
    symbolFallback: suffixFallback(config.symbolFallbackSuffix),
    intraday: {
      sentimentScale: (score) => score / sentimentDivisor,
      sentimentPositiveThreshold: sentimentPositive,
      sentimentNegativeThreshold: sentimentNegative,
    },
    search,
  });
}
