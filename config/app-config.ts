/**
 * Runtime configuration
 *
 * Read from environment variables (scripts load .env through dotenv first).
 * Only FMP_API_KEY is required; everything else has a default.
 */

import { ValidationError } from '../lib/errors';
import { LogLevel, parseLogLevel } from '../lib/logger';
import { DEFAULT_CACHE_MAX_ENTRIES } from '../lib/market-data/cache';
import { ScoringConfig } from './scoring-config';

export interface AppConfig {
  fmp: {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
  };
  /** Calendar days of daily closes to fetch; 400 leaves room for 252 trading days */
  priceLookbackDays: number;
  /** Appended to a symbol that returns no data; empty disables the fallback */
  symbolFallbackSuffix: string;
  cacheTtlSeconds: number;
  /** Per data kind; least recently used entries go first */
  cacheMaxEntries: number;
  minRequestIntervalMs: number;
  /** Enables news search; null leaves it off */
  tavilyApiKey: string | null;
  logLevel: LogLevel;
  intraday: {
    /** Intraday sentiment input = sentiment score / divisor */
    sentimentDivisor: number;
    sentimentPositive: number;
    sentimentNegative: number;
  };
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

function readNumber(
  env: Env,
  key: string,
  fallback: number,
  { min, integer = false }: { min?: number; integer?: boolean } = {}
): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(key, `expected a number, got "${raw}"`);
  }
  if (integer && !Number.isInteger(value)) {
    throw new ValidationError(key, `expected an integer, got "${raw}"`);
  }
  if (min !== undefined && value < min) {
    throw new ValidationError(key, `must be at least ${min}`);
  }
  return value;
}

/**
 * @throws ValidationError when FMP_API_KEY is missing or a value does not parse
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  const apiKey = env.FMP_API_KEY?.trim();
  if (!apiKey) {
    throw new ValidationError('FMP_API_KEY', 'is required');
  }

  const rawLogLevel = env.LOG_LEVEL?.trim();
  const logLevel = parseLogLevel(rawLogLevel);
  if (rawLogLevel && !logLevel) {
    throw new ValidationError('LOG_LEVEL', `expected one of ${Object.values(LogLevel).join(', ')}`);
  }

  const sentimentDivisor = readNumber(env, 'INTRADAY_SENTIMENT_DIVISOR', 1);
  if (sentimentDivisor === 0) {
    throw new ValidationError('INTRADAY_SENTIMENT_DIVISOR', 'must not be 0');
  }

  return {
    fmp: {
      apiKey,
      baseUrl: readString(env, 'FMP_BASE_URL', 'https://financialmodelingprep.com/api'),
      timeoutMs: readNumber(env, 'FMP_TIMEOUT_MS', 30000, { min: 1, integer: true }),
    },
    priceLookbackDays: readNumber(env, 'PRICE_LOOKBACK_DAYS', 400, { min: 1, integer: true }),
    symbolFallbackSuffix: env.SYMBOL_FALLBACK_SUFFIX?.trim() ?? '.NS',
    cacheTtlSeconds: readNumber(env, 'MARKET_DATA_CACHE_TTL_SECONDS', 300, { min: 0 }),
    cacheMaxEntries: readNumber(env, 'MARKET_DATA_CACHE_MAX_ENTRIES', DEFAULT_CACHE_MAX_ENTRIES, {
      min: 1,
      integer: true,
    }),
    minRequestIntervalMs: readNumber(env, 'MIN_REQUEST_INTERVAL_MS', 200, { min: 0 }),
    tavilyApiKey: env.TAVILY_API_KEY?.trim() || null,
    logLevel: logLevel ?? LogLevel.INFO,
    intraday: {
      sentimentDivisor,
      sentimentPositive: readNumber(
        env,
        'INTRADAY_SENTIMENT_POSITIVE',
        ScoringConfig.INTRADAY_SENTIMENT_POSITIVE
      ),
      sentimentNegative: readNumber(
        env,
        'INTRADAY_SENTIMENT_NEGATIVE',
        ScoringConfig.INTRADAY_SENTIMENT_NEGATIVE
      ),
    },
  };
}
