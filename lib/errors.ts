/**
 * Custom Error Classes for the Stock Rating Engine
 *
 * Provides user-friendly error messages and structured error codes
 * for every failure scenario in the scoring pipeline.
 *
 * Error Hierarchy:
 * - StockRatingError (base class)
 *   - APITimeoutError
 *   - APIRateLimitError
 *   - APIResponseError
 *   - DataNotFoundError
 *   - InvalidTickerError
 *   - ValidationError
 *   - PriceUnavailableError
 *   - AnalysisFailedError
 */

/**
 * Broad failure category used by the analyzer boundary to tell
 * "not enough data" apart from "the provider failed".
 */
export type ErrorKind = 'insufficient_data' | 'provider' | 'invalid_input' | 'unexpected';

/**
 * Base error class for all rating engine errors
 *
 * Provides standardized error structure with:
 * - Developer message (for logs)
 * - User message (for display by the API/agent layer)
 * - Error code (for debugging/monitoring)
 * - HTTP status code (for API responses)
 */
export class StockRatingError extends Error {
  constructor(
    message: string,
    public code: string,
    public userMessage: string,
    public statusCode: number = 500,
    public kind: ErrorKind = 'unexpected'
  ) {
    super(message);
    this.name = this.constructor.name;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Format error for JSON response
   */
  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.userMessage,
      statusCode: this.statusCode,
    };
  }
}

/**
 * API Timeout Error
 *
 * Thrown when a market-data or search call exceeds its timeout.
 */
export class APITimeoutError extends StockRatingError {
  constructor(service: string, timeout: number) {
    super(
      `${service} API timeout after ${timeout}ms`,
      'API_TIMEOUT',
      `${service} is responding slowly right now. Try again in a couple of minutes.`,
      504,
      'provider'
    );
  }
}

/**
 * API Rate Limit Error
 *
 * Thrown when an external API rate limit is exceeded.
 */
export class APIRateLimitError extends StockRatingError {
  constructor(service: string, retryAfter?: number) {
    const retryMessage = retryAfter
      ? ` Please wait ${retryAfter} seconds before trying again.`
      : ' Please wait a moment and try again.';

    super(
      `${service} API rate limit exceeded`,
      'RATE_LIMIT',
      `Too many requests to ${service}.${retryMessage}`,
      429,
      'provider'
    );
  }
}

/**
 * Data Not Found Error
 *
 * Thrown when required data is completely missing for a ticker.
 * Common causes: invalid ticker, delisted stock, provider data gap
 */
export class DataNotFoundError extends StockRatingError {
  constructor(ticker: string, dataType: string) {
    super(
      `${dataType} not found for ${ticker}`,
      'DATA_NOT_FOUND',
      `No ${dataType} available for ${ticker}. It may be a smaller listing with limited coverage.`,
      404,
      'insufficient_data'
    );
  }
}

/**
 * Invalid Ticker Error
 *
 * Thrown when a ticker symbol fails validation.
 */
export class InvalidTickerError extends StockRatingError {
  constructor(ticker: string, reason?: string) {
    const details = reason ? ` (${reason})` : '';
    super(
      `Invalid ticker symbol: ${ticker}${details}`,
      'INVALID_TICKER',
      `Can't find "${ticker}". Double-check the ticker symbol (for example NVDA or TCS.NS).`,
      400,
      'invalid_input'
    );
  }
}

/**
 * Validation Error
 *
 * Thrown when input or configuration validation fails.
 */
export class ValidationError extends StockRatingError {
  constructor(field: string, issue: string) {
    super(
      `Validation failed for ${field}: ${issue}`,
      'VALIDATION_ERROR',
      `Invalid ${field}: ${issue}`,
      400,
      'invalid_input'
    );
  }
}

/**
 * Price Unavailable Error
 *
 * Intraday levels are anchored on the current price; without it
 * there is nothing to derive.
 */
export class PriceUnavailableError extends StockRatingError {
  constructor(ticker: string) {
    super(
      `Could not determine current stock price for ${ticker}`,
      'PRICE_UNAVAILABLE',
      `Could not determine the current price of ${ticker}, so no intraday levels can be derived.`,
      400,
      'insufficient_data'
    );
  }
}

/**
 * Analysis Failed Error
 *
 * Raised by the comprehensive analysis when every sub-analysis failed,
 * so there is nothing left to score. Takes the kind shared by all the
 * failures, or "provider" when any of them came from the provider.
 */
export class AnalysisFailedError extends StockRatingError {
  constructor(ticker: string, failures: Array<{ kind: ErrorKind; message: string }>) {
    const kinds = new Set(failures.map((failure) => failure.kind));
    let kind: ErrorKind = 'provider';
    if (kinds.size === 1) {
      kind = failures[0].kind;
    } else if (!kinds.has('provider')) {
      kind = 'insufficient_data';
    }

    super(
      `All analyses failed for ${ticker}: ${failures.map((failure) => failure.message).join('; ')}`,
      'ANALYSIS_FAILED',
      `Could not analyze ${ticker}: none of the underlying data could be loaded.`,
      kind === 'provider' ? 502 : 422,
      kind
    );
  }
}

/**
 * API Response Error
 *
 * Thrown when an external API returns an error response.
 */
export class APIResponseError extends StockRatingError {
  constructor(service: string, status: number, message: string) {
    let userMessage: string;
    let code: string;

    switch (status) {
      case 400:
        code = 'API_BAD_REQUEST';
        userMessage = `${service} rejected the request. The ticker or parameters may be invalid.`;
        break;
      case 401:
        code = 'API_UNAUTHORIZED';
        userMessage = `${service} authentication failed. Check the configured API key.`;
        break;
      case 403:
        code = 'API_FORBIDDEN';
        userMessage = `${service} access denied. The subscription may not cover this endpoint.`;
        break;
      case 404:
        code = 'API_NOT_FOUND';
        userMessage = `${service} could not find the requested data. The ticker may not exist or may be delisted.`;
        break;
      case 429:
        code = 'API_RATE_LIMIT';
        userMessage = `${service} rate limit exceeded. Please wait and try again.`;
        break;
      case 500:
      case 502:
      case 503:
        code = 'API_SERVER_ERROR';
        userMessage = `${service} is experiencing technical difficulties. Please try again later.`;
        break;
      default:
        code = 'API_ERROR';
        userMessage = `${service} returned an error. Please try again.`;
    }

    super(`${service} API error (${status}): ${message}`, code, userMessage, status, 'provider');
  }
}

/**
 * Check if an error is a rating engine error
 */
export function isStockRatingError(error: unknown): error is StockRatingError {
  return error instanceof StockRatingError;
}

/**
 * Get user-friendly error message from any error
 */
export function getUserMessage(error: unknown): string {
  if (isStockRatingError(error)) {
    return error.userMessage;
  }

  if (error instanceof Error) {
    return 'An unexpected error occurred. Please try again or contact support if the problem persists.';
  }

  return 'An unknown error occurred. Please try again.';
}

/**
 * Get error code from any error
 */
export function getErrorCode(error: unknown): string {
  if (isStockRatingError(error)) {
    return error.code;
  }

  return 'UNKNOWN_ERROR';
}

/**
 * Get error kind from any error
 */
export function getErrorKind(error: unknown): ErrorKind {
  if (isStockRatingError(error)) {
    return error.kind;
  }

  return 'unexpected';
}

/**
 * Get HTTP status code from any error
 */
export function getStatusCode(error: unknown): number {
  if (isStockRatingError(error)) {
    return error.statusCode;
  }

  return 500;
}

/**
 * Unexpected errors are the ones we did not raise ourselves
 */
export function isUnexpectedError(error: unknown): boolean {
  return !isStockRatingError(error);
}
