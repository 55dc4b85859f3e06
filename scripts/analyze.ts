#!/usr/bin/env ts-node
/**
 * Analyze a stock from the command line
 *
 * Prints the comprehensive 0-100 rating (or the intraday levels) as JSON;
 * --news prints recent headlines instead (needs TAVILY_API_KEY).
 *
 * Usage:
 *   npm run analyze -- NVDA
 *   npx ts-node scripts/analyze.ts TCS --intraday
 *   npx ts-node scripts/analyze.ts NVDA --news
 *
 * Environment Variables (read from .env):
 *   FMP_API_KEY - Financial Modeling Prep API key (required)
 *   See .env.example for the optional settings
 */

import * as dotenv from 'dotenv';
import { loadAppConfig } from '../config/app-config';
import { getErrorCode, getUserMessage } from '../lib/errors';
import { configureLogger, error } from '../lib/logger';
import { createStockAnalyzer } from '../lib/stock-analyzer';

dotenv.config();

function usage(): never {
  console.error('Usage: ts-node scripts/analyze.ts <SYMBOL> [--intraday | --news]');
  process.exit(2);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const intraday = args.includes('--intraday');
  const news = args.includes('--news');
  const symbol = args.find((arg) => !arg.startsWith('--'));
  if (!symbol) usage();

  const config = loadAppConfig();
  configureLogger({ minLevel: config.logLevel });

  const analyzer = createStockAnalyzer(config);
  if (news) {
    const outcome = await analyzer.searchNews(symbol);
    console.log(outcome.success ? outcome.text : outcome.error);
    return outcome.success ? 0 : 1;
  }

  const outcome = intraday
    ? await analyzer.getIntradayAnalysis(symbol)
    : await analyzer.getComprehensiveAnalysis(symbol);

  console.log(JSON.stringify(outcome, null, 2));
  return outcome.success ? 0 : 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    error('Analysis script failed', { code: getErrorCode(err) }, err instanceof Error ? err : undefined);
    console.error(getUserMessage(err));
    process.exitCode = 1;
  });
