/**
 * Centralized Scoring Configuration
 *
 * Every threshold and point award used by the calculators lives here,
 * grouped by the analysis that consumes it.
 */

export class ScoringConfig {
  // =========================================================================
  // INDICATOR WINDOWS
  // Standard 14-period RSI (Wilder, 1978) and 12-26-9 MACD (Appel, 1979)
  // =========================================================================

  static readonly RSI_PERIOD = 14;
  static readonly MACD_FAST_SPAN = 12;
  static readonly MACD_SLOW_SPAN = 26;
  static readonly MACD_SIGNAL_SPAN = 9;

  /** 63 trading days ~ 3 months */
  static readonly MOMENTUM_3M_POINTS = 63;

  /** 252 trading days ~ 12 months */
  static readonly MOMENTUM_12M_POINTS = 252;

  /** Assumed annual benchmark return for relative strength */
  static readonly BENCHMARK_ANNUAL_RETURN = 0.1;

  // =========================================================================
  // TECHNICAL SCORE BANDS
  // =========================================================================

  static readonly RSI_OVERSOLD = 30;
  static readonly RSI_OVERBOUGHT = 70;

  static readonly TECH_POINTS_RSI_NEUTRAL = 10;
  static readonly TECH_POINTS_RSI_OVERSOLD = 15;
  static readonly TECH_POINTS_RSI_OVERBOUGHT = 5;
  static readonly TECH_POINTS_MOMENTUM_3M = 10;
  static readonly TECH_POINTS_MOMENTUM_12M = 10;
  static readonly TECH_POINTS_MACD_BULLISH = 5;

  // =========================================================================
  // FUNDAMENTAL SCORE
  // =========================================================================

  /** Revenue CAGR looks back at most this many periods */
  static readonly REVENUE_CAGR_MAX_PERIODS = 3;

  /** Revenue CAGR needs at least this many revenue periods */
  static readonly REVENUE_CAGR_MIN_SERIES = 3;

  static readonly NET_MARGIN_HEALTHY = 0.1;
  static readonly NET_MARGIN_THIN = 0.05;
  static readonly EBITDA_MARGIN_HEALTHY = 0.15;
  static readonly ROE_HEALTHY = 0.15;
  static readonly DEBT_TO_EQUITY_ACCEPTABLE = 1.0;
  static readonly DEBT_TO_EQUITY_HIGH = 2.0;

  static readonly FUND_POINTS_REVENUE_CAGR = 15;
  static readonly FUND_POINTS_NET_MARGIN = 15;
  static readonly FUND_POINTS_EBITDA_MARGIN = 10;
  static readonly FUND_POINTS_ROE = 15;
  static readonly FUND_POINTS_FREE_CASH_FLOW = 15;
  static readonly FUND_POINTS_DEBT_TO_EQUITY = 15;
  static readonly FUND_PENALTY = 10;

  // =========================================================================
  // EARNINGS QUALITY
  // =========================================================================

  /** Periods averaged for accruals quality */
  static readonly ACCRUALS_PERIODS = 3;

  /** Net income periods needed for persistence and predictability */
  static readonly PERSISTENCE_MIN_PERIODS = 4;

  /** Newest values echoed back in the result */
  static readonly EARNINGS_SERIES_ECHO = 5;

  static readonly ACCRUALS_EXCELLENT = 1.2;
  static readonly ACCRUALS_GOOD = 0.8;
  static readonly ACCRUALS_MODERATE = 0.5;
  static readonly PERSISTENCE_HIGH = 0.7;
  static readonly PERSISTENCE_MODERATE = 0.5;
  static readonly PERSISTENCE_LOW = 0.3;

  // =========================================================================
  // SENTIMENT
  // Analyst recommendation mean: 1 = strong buy ... 5 = strong sell
  // =========================================================================

  static readonly ANALYST_STRONG_BUY = 2.0;
  static readonly ANALYST_BUY = 2.5;
  static readonly ANALYST_HOLD = 3.0;
  static readonly ANALYST_SELL = 3.5;
  static readonly UPSIDE_HIGH = 0.2;
  static readonly UPSIDE_MODERATE = 0.1;
  static readonly DOWNSIDE_RISK = -0.1;
  static readonly VOLUME_SURGE_RATIO = 1.5;

  // =========================================================================
  // ESG AND RISK
  // =========================================================================

  static readonly ESG_NEGATIVE_SECTOR_KEYWORDS: readonly string[] = ['energy', 'oil', 'gas'];
  static readonly ESG_POSITIVE_SECTOR_KEYWORDS: readonly string[] = ['technology', 'software'];
  static readonly LARGE_EMPLOYER = 10_000;
  static readonly AUDIT_RISK_LOW = 0.1;
  static readonly AUDIT_RISK_HIGH = 0.3;
  static readonly BETA_HIGH = 1.5;
  static readonly BETA_LOW = 0.8;
  static readonly RISK_DEBT_TO_EQUITY_HIGH = 1.0;
  static readonly RISK_DEBT_TO_EQUITY_LOW = 0.3;
  static readonly CURRENT_RATIO_LOW = 1.0;
  static readonly CURRENT_RATIO_HIGH = 2.0;

  // =========================================================================
  // COMPOSITE BUDGETS
  // Four categories of 25 points each
  // =========================================================================

  static readonly CATEGORY_BUDGET = 25;
  static readonly FUNDAMENTAL_SCALE = 0.25;
  static readonly TECHNICAL_BUDGET = 15;
  static readonly TECHNICAL_SCALE = 0.75;
  static readonly SENTIMENT_BUDGET = 10;
  static readonly SENTIMENT_SCALE = 0.67;
  static readonly ESG_BUDGET = 15;
  static readonly ESG_OFFSET = 10;
  static readonly ESG_SCALE = 0.75;
  static readonly RISK_BUDGET = 10;
  static readonly RISK_OFFSET = 10;
  static readonly RISK_SCALE = 0.5;

  static readonly BAND_EXCELLENT = 80;
  static readonly BAND_GOOD = 65;
  static readonly BAND_FAIR = 50;
  static readonly BAND_POOR = 35;

  // =========================================================================
  // INTRADAY LEVELS
  // Multipliers of the current price per RSI regime
  // =========================================================================

  static readonly OVERSOLD_ENTRY = 0.995;
  static readonly OVERSOLD_EXIT = 1.02;
  static readonly OVERSOLD_STOP = 0.985;
  static readonly OVERBOUGHT_ENTRY = 1.005;
  static readonly OVERBOUGHT_EXIT = 0.98;
  static readonly OVERBOUGHT_STOP = 1.015;
  static readonly NEUTRAL_ENTRY = 0.998;
  static readonly NEUTRAL_EXIT = 1.015;
  static readonly NEUTRAL_STOP = 0.99;

  /** +/-5% 3-month momentum triggers the trend override */
  static readonly INTRADAY_MOMENTUM_THRESHOLD = 0.05;
  static readonly UPTREND_ENTRY = 0.997;
  static readonly UPTREND_EXIT = 1.025;
  static readonly DOWNTREND_ENTRY = 1.003;
  static readonly DOWNTREND_EXIT = 0.975;

  static readonly INTRADAY_SENTIMENT_POSITIVE = 0.6;
  static readonly INTRADAY_SENTIMENT_NEGATIVE = 0.4;
  static readonly SENTIMENT_POSITIVE_EXIT = 1.02;
  static readonly SENTIMENT_NEGATIVE_STOP = 0.99;

  static readonly RR_STRONG_BUY = 2;
  static readonly RR_BUY = 1.5;
  static readonly RR_HOLD = 1;
}
