/**
 * Symbol resolution
 *
 * Runs once per request, before any calculator: the requested symbol's
 * snapshot is fetched, and when it comes back empty or not found each
 * fallback candidate is tried in order. Every calculator then works on the
 * symbol chosen here.
 */

import { DataNotFoundError } from '../errors';
import { debug, info } from '../logger';
import type { MarketDataProvider, Snapshot, SymbolFallbackStrategy } from './types';

export interface ResolvedSymbol {
  requested: string;
  symbol: string;
  /** The snapshot fetched while resolving, or the error that fetch raised */
  snapshot: Snapshot | Error;
  usedFallback: boolean;
}

/**
 * Try `symbol + suffix` unless the symbol already carries it
 */
export function suffixFallback(suffix: string): SymbolFallbackStrategy {
  return (symbol) => (suffix && !symbol.endsWith(suffix) ? [`${symbol}${suffix}`] : []);
}

export const noFallback: SymbolFallbackStrategy = () => [];

/**
 * A snapshot is usable when it carries a price
 */
export function isUsableSnapshot(snapshot: Snapshot): boolean {
  return snapshot.current_price !== undefined;
}

async function fetchSnapshot(provider: MarketDataProvider, symbol: string): Promise<Snapshot | Error> {
  try {
    return await provider.getSnapshot(symbol);
  } catch (err) {
    return err instanceof Error ? err : new Error(String(err));
  }
}

function needsFallback(result: Snapshot | Error): boolean {
  if (result instanceof DataNotFoundError) return true;
  if (result instanceof Error) return false;
  return !isUsableSnapshot(result);
}

export async function resolveSymbol(
  provider: MarketDataProvider,
  requested: string,
  fallback: SymbolFallbackStrategy
): Promise<ResolvedSymbol> {
  const primary = await fetchSnapshot(provider, requested);
  if (!needsFallback(primary)) {
    return { requested, symbol: requested, snapshot: primary, usedFallback: false };
  }

  for (const candidate of fallback(requested)) {
    debug('Trying fallback symbol', { requested, candidate });
    const result = await fetchSnapshot(provider, candidate);
    if (!(result instanceof Error) && isUsableSnapshot(result)) {
      info('Resolved symbol through fallback', { requested, symbol: candidate });
      return { requested, symbol: candidate, snapshot: result, usedFallback: true };
    }
  }

  return { requested, symbol: requested, snapshot: primary, usedFallback: false };
}
