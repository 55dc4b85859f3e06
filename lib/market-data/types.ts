/**
 * Market Data Types
 *
 * The narrow capability interface the scoring pipeline depends on,
 * plus the shapes it exchanges. Providers map their own payloads onto these.
 */

/**
 * Closing prices, index 0 = most recent close
 */
export type PriceSeries = readonly number[];

/**
 * Line item name -> values per period, period 0 = latest reported.
 * Items the provider does not report are absent keys, not zeros.
 */
export type StatementSeries = Readonly<Record<string, ReadonlyArray<number | null>>>;

export interface FinancialStatements {
  income: StatementSeries;
  balance: StatementSeries;
  cashflow: StatementSeries;
}

/**
 * Point-in-time company snapshot. Any field may be absent.
 */
export interface Snapshot {
  symbol?: string;
  short_name?: string;
  currency?: string;
  current_price?: number;
  market_cap?: number;
  sector?: string;
  industry?: string;
  country?: string;
  full_time_employees?: number;

  trailing_pe?: number;
  trailing_eps?: number;
  fifty_two_week_high?: number;
  fifty_two_week_low?: number;
  fifty_day_average?: number;
  two_hundred_day_average?: number;

  beta?: number;
  debt_to_equity?: number;
  current_ratio?: number;
  quick_ratio?: number;

  operating_cashflow?: number;
  free_cashflow?: number;
  ebitda?: number;

  /** 1 = strong buy ... 5 = strong sell */
  recommendation_mean?: number;
  recommendation_key?: string;
  number_of_analyst_opinions?: number;
  target_high_price?: number;
  target_low_price?: number;
  target_median_price?: number;

  volume?: number;
  average_volume?: number;

  audit_risk?: number;
  board_risk?: number;
  compensation_risk?: number;
  shareholder_rights_risk?: number;
  overall_risk?: number;
}

/**
 * Kinds of data fetched from a provider; used as cache key prefixes
 */
export type MarketDataKind = 'prices' | 'statements' | 'snapshot';

export interface MarketDataProvider {
  readonly name: string;

  /**
   * Closing prices over the last `lookbackDays` calendar days, newest first
   */
  getPriceHistory(symbol: string, lookbackDays: number): Promise<PriceSeries>;

  getStatements(symbol: string): Promise<FinancialStatements>;

  getSnapshot(symbol: string): Promise<Snapshot>;
}

/**
 * Alternative symbols to try, in order, when the requested one has no data
 */
export type SymbolFallbackStrategy = (symbol: string) => string[];

/**
 * Everything one analysis request fetched, per data kind.
 * A kind that failed to load carries the error instead.
 */
export interface MarketDataBundle {
  symbol: string;
  snapshot: Snapshot | Error;
  prices: PriceSeries | Error;
  statements: FinancialStatements | Error;
}
