/**
 * Structured logging for the rating engine
 *
 * One JSON object per line. When the context names a `symbol` it is lifted
 * to the top of the entry so a run can be filtered by ticker. Keys listed in
 * `redactKeys` are masked at any depth, matched case-insensitively (FMP puts
 * the key in an `apikey` query parameter).
 */

import { StockRatingError } from './errors';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  symbol?: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    kind?: string;
    stack?: string;
  };
}

/** Receives each serialized entry */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerConfig {
  minLevel: LogLevel;
  includeStackTrace: boolean;
  redactKeys: string[];
  sink: LogSink;
}

export const consoleSink: LogSink = (level, line) => {
  if (level === LogLevel.ERROR) {
    console.error(line);
  } else if (level === LogLevel.WARN) {
    console.warn(line);
  } else {
    console.log(line);
  }
};

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: LogLevel.INFO,
  includeStackTrace: true,
  redactKeys: ['apiKey', 'api_key', 'password', 'secret', 'token'],
  sink: consoleSink,
};

const REDACTED = '[REDACTED]';

let config: LoggerConfig = DEFAULT_CONFIG;
let redactSet: ReadonlySet<string> = toKeySet(DEFAULT_CONFIG.redactKeys);

function toKeySet(keys: string[]): ReadonlySet<string> {
  return new Set(keys.map((key) => key.toLowerCase()));
}

export function configureLogger(overrides: Partial<LoggerConfig>): void {
  config = { ...config, ...overrides };
  redactSet = toKeySet(config.redactKeys);
}

export function resetLogger(): void {
  configureLogger(DEFAULT_CONFIG);
}

/**
 * Parse a LOG_LEVEL value, undefined when it names no level
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return LEVEL_ORDER.find((level) => level === normalized);
}

function isPlainObject(value: unknown): value is LogContext {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

function redact(context: LogContext): LogContext {
  const result: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    if (redactSet.has(key.toLowerCase())) {
      result[key] = REDACTED;
    } else if (isPlainObject(value)) {
      result[key] = redact(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function serializeError(err: Error): NonNullable<LogEntry['error']> {
  return {
    name: err.name,
    message: err.message,
    ...(err instanceof StockRatingError && { code: err.code, kind: err.kind }),
    ...(config.includeStackTrace && err.stack ? { stack: err.stack } : {}),
  };
}

export function log(level: LogLevel, message: string, context?: LogContext, err?: Error): void {
  if (LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(config.minLevel)) {
    return;
  }

  const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
  if (context) {
    const { symbol, ...rest } = redact(context);
    if (typeof symbol === 'string') {
      entry.symbol = symbol;
    } else if (symbol !== undefined) {
      rest.symbol = symbol;
    }
    if (Object.keys(rest).length > 0) {
      entry.context = rest;
    }
  }
  if (err) {
    entry.error = serializeError(err);
  }

  config.sink(level, JSON.stringify(entry));
}

export function debug(message: string, context?: LogContext): void {
  log(LogLevel.DEBUG, message, context);
}

export function info(message: string, context?: LogContext): void {
  log(LogLevel.INFO, message, context);
}

export function warn(message: string, context?: LogContext, err?: Error): void {
  log(LogLevel.WARN, message, context, err);
}

export function error(message: string, context?: LogContext, err?: Error): void {
  log(LogLevel.ERROR, message, context, err);
}

/**
 * One request to a market-data or search provider
 */
export function logProviderCall(
  provider: string,
  operation: string,
  durationMs: number,
  success: boolean,
  context?: LogContext
): void {
  log(success ? LogLevel.DEBUG : LogLevel.WARN, `${provider} ${operation} ${success ? 'ok' : 'failed'}`, {
    provider,
    operation,
    durationMs,
    ...context,
  });
}

export function logAnalysisStart(symbol: string, operation: string, context?: LogContext): void {
  info(`${operation} started`, { symbol, operation, ...context });
}

export function logAnalysisComplete(
  symbol: string,
  durationMs: number,
  rating: { total_score: number; band: string },
  context?: LogContext
): void {
  info('Rating computed', { symbol, durationMs, totalScore: rating.total_score, band: rating.band, ...context });
}

export function logAnalysisFailed(symbol: string, errorCode: string, context?: LogContext, err?: Error): void {
  error('Rating failed', { symbol, errorCode, ...context }, err);
}

export function logDataQuality(
  symbol: string,
  report: { dataCompleteness: number; grade: string; missingFields: string[]; canProceed: boolean }
): void {
  log(report.canProceed ? LogLevel.INFO : LogLevel.WARN, 'Data quality checked', {
    symbol,
    completeness: report.dataCompleteness,
    grade: report.grade,
    missing: report.missingFields,
  });
}

/**
 * Measures one operation; `end` logs the outcome
 */
export class Timer {
  private readonly startedAt = Date.now();

  constructor(
    private readonly operation: string,
    private readonly context: LogContext = {}
  ) {}

  elapsed(): number {
    return Date.now() - this.startedAt;
  }

  end(success: boolean = true, extra?: LogContext): number {
    const durationMs = this.elapsed();
    log(success ? LogLevel.DEBUG : LogLevel.WARN, `${this.operation} ${success ? 'finished' : 'failed'}`, {
      ...this.context,
      ...extra,
      durationMs,
    });
    return durationMs;
  }
}

export function createTimer(operation: string, context?: LogContext): Timer {
  return new Timer(operation, context);
}
