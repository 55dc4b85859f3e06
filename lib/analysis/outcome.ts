/**
 * Analysis outcomes
 *
 * Every analyzer operation resolves to one of these instead of throwing, so
 * the caller can tell "not enough data" apart from "the provider failed".
 */

import { getErrorCode, getErrorKind, type ErrorKind } from '../errors';
import { describeError } from '../utils';

export interface AnalysisFailure {
  code: string;
  kind: ErrorKind;
  message: string;
}

export type AnalysisOutcome<T> =
  | { success: true; symbol: string; data: T }
  | { success: false; symbol: string; error: AnalysisFailure };

export function succeed<T>(symbol: string, data: T): AnalysisOutcome<T> {
  return { success: true, symbol, data };
}

export function fail<T>(symbol: string, error: unknown): AnalysisOutcome<T> {
  return {
    success: false,
    symbol,
    error: {
      code: getErrorCode(error),
      kind: getErrorKind(error),
      message: describeError(error),
    },
  };
}

/**
 * Run a computation and capture anything it throws as a failure outcome
 */
export async function runAnalysis<T>(
  symbol: string,
  compute: () => T | Promise<T>
): Promise<AnalysisOutcome<T>> {
  try {
    return succeed(symbol, await compute());
  } catch (error) {
    return fail<T>(symbol, error);
  }
}

/**
 * Data of a successful outcome, or null
 */
export function dataOf<T>(outcome: AnalysisOutcome<T> | null | undefined): T | null {
  return outcome && outcome.success ? outcome.data : null;
}
