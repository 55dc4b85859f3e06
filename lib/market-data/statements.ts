/**
 * Statement line items and lookups over StatementSeries.
 *
 * Providers name rows differently, so every lookup takes an ordered list of
 * candidate row names and uses the first row that yields a value.
 */

import type { StatementSeries } from './types';

export const LINE_ITEMS = {
  revenue: ['Total Revenue', 'Revenue'],
  netIncome: ['Net Income', 'Net Income Common Stockholders'],
  ebitda: ['EBITDA', 'Ebitda', 'Normalized EBITDA'],
  grossProfit: ['Gross Profit'],
  operatingIncome: ['Operating Income'],

  totalDebt: ['Total Debt', 'Short Long Term Debt', 'Long Term Debt'],
  totalEquity: [
    'Stockholders Equity',
    'Total Stockholder Equity',
    'Total Equity Gross Minority Interest',
  ],
  totalAssets: ['Total Assets'],
  totalLiabilities: ['Total Liabilities', 'Total Liabilities Net Minority Interest', 'Total Liab'],
  currentAssets: ['Current Assets', 'Total Current Assets'],
  currentLiabilities: ['Current Liabilities', 'Total Current Liabilities'],

  operatingCashFlow: [
    'Operating Cash Flow',
    'Total Cash From Operating Activities',
    'Cash Flow From Continuing Operating Activities',
  ],
  capitalExpenditure: ['Capital Expenditure', 'Capital Expenditures'],
  freeCashFlow: ['Free Cash Flow'],
} as const satisfies Record<string, readonly string[]>;

export type LineItem = keyof typeof LINE_ITEMS;

function isNumber(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Latest non-null value of the first candidate row that has one
 */
export function pickLatest(series: StatementSeries, item: LineItem): number | null {
  for (const name of LINE_ITEMS[item]) {
    const row = series[name];
    if (!row) continue;
    for (const value of row) {
      if (isNumber(value)) return value;
    }
  }
  return null;
}

/**
 * Non-null values of the first candidate row present, newest first.
 * Null when no candidate row exists at all.
 */
export function getRowSeries(series: StatementSeries, item: LineItem): number[] | null {
  for (const name of LINE_ITEMS[item]) {
    const row = series[name];
    if (!row) continue;
    return row.filter(isNumber);
  }
  return null;
}

/**
 * True when no row carries a single value
 */
export function isEmptyStatement(series: StatementSeries): boolean {
  return Object.values(series).every((row) => !row.some(isNumber));
}
