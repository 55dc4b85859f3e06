/**
 * Utility Functions for the Stock Rating Engine
 *
 * Common utilities for error formatting, waiting and number handling.
 */

import { getErrorCode, getUserMessage, isUnexpectedError } from './errors';

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Format error for API response
 */
export function formatErrorResponse(
  error: unknown,
  ticker?: string
): {
  success: false;
  error: {
    code: string;
    message: string;
    ticker?: string;
    timestamp: string;
    isUnexpected?: boolean;
  };
} {
  return {
    success: false,
    error: {
      code: getErrorCode(error),
      message: getUserMessage(error),
      ...(ticker && { ticker }),
      timestamp: new Date().toISOString(),
      isUnexpected: isUnexpectedError(error),
    },
  };
}

/**
 * Clamp number between min and max
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Round number to specified decimal places
 */
export function round(value: number, decimals: number = 2): number {
  const multiplier = Math.pow(10, decimals);
  return Math.round(value * multiplier) / multiplier;
}

/**
 * Describe any thrown value in one line
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
