/**
 * TTL cache in front of a MarketDataProvider
 *
 * Entries are keyed by data kind and symbol (plus lookback for prices).
 * Concurrent misses for the same key share one request, and failed
 * fetches are never stored. A TTL of 0 passes every call straight through.
 *
 * Each write sweeps expired entries from its store, and each store keeps at
 * most `maxEntries`, dropping the least recently used first.
 */

import { debug } from '../logger';
import type { FinancialStatements, MarketDataKind, MarketDataProvider, PriceSeries, Snapshot } from './types';

export const DEFAULT_CACHE_MAX_ENTRIES = 500;

export interface CacheOptions {
  ttlSeconds: number;
  /** Per data kind */
  maxEntries?: number;
  now?: () => number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
  evictions: number;
}

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

class CacheStore<T> {
  readonly entries = new Map<string, CacheEntry<T>>();
  readonly inFlight = new Map<string, Promise<T>>();
}

export class CachedMarketDataProvider implements MarketDataProvider {
  readonly name: string;

  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly prices = new CacheStore<PriceSeries>();
  private readonly statements = new CacheStore<FinancialStatements>();
  private readonly snapshots = new CacheStore<Snapshot>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(
    private readonly inner: MarketDataProvider,
    options: CacheOptions
  ) {
    this.name = `cached(${inner.name})`;
    this.ttlMs = Math.max(0, options.ttlSeconds) * 1000;
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_CACHE_MAX_ENTRIES);
    this.now = options.now ?? Date.now;
  }

  getPriceHistory(symbol: string, lookbackDays: number): Promise<PriceSeries> {
    return this.lookup('prices', this.prices, `${symbol}:${lookbackDays}`, () =>
      this.inner.getPriceHistory(symbol, lookbackDays)
    );
  }

  getStatements(symbol: string): Promise<FinancialStatements> {
    return this.lookup('statements', this.statements, symbol, () => this.inner.getStatements(symbol));
  }

  getSnapshot(symbol: string): Promise<Snapshot> {
    return this.lookup('snapshot', this.snapshots, symbol, () => this.inner.getSnapshot(symbol));
  }

  clear(): void {
    for (const store of [this.prices, this.statements, this.snapshots]) {
      store.entries.clear();
    }
  }

  getStats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.prices.entries.size + this.statements.entries.size + this.snapshots.entries.size,
      evictions: this.evictions,
    };
  }

  private lookup<T>(kind: MarketDataKind, store: CacheStore<T>, key: string, fetch: () => Promise<T>): Promise<T> {
    if (this.ttlMs === 0) {
      return fetch();
    }

    const cached = store.entries.get(key);
    if (cached) {
      if (cached.expiresAt > this.now()) {
        this.hits++;
        // re-insert so Map order tracks recency
        store.entries.delete(key);
        store.entries.set(key, cached);
        debug('Market data cache hit', { kind, key });
        return Promise.resolve(cached.value);
      }
      store.entries.delete(key);
    }

    const pending = store.inFlight.get(key);
    if (pending) {
      this.hits++;
      return pending;
    }

    this.misses++;
    const request = fetch()
      .then((value) => {
        this.remember(kind, store, key, value);
        return value;
      })
      .finally(() => {
        store.inFlight.delete(key);
      });
    store.inFlight.set(key, request);
    return request;
  }

  private remember<T>(kind: MarketDataKind, store: CacheStore<T>, key: string, value: T): void {
    const now = this.now();
    let evicted = 0;
    for (const [entryKey, entry] of store.entries) {
      if (entry.expiresAt <= now) {
        store.entries.delete(entryKey);
        evicted++;
      }
    }

    store.entries.delete(key);
    store.entries.set(key, { value, expiresAt: now + this.ttlMs });

    for (const oldest of store.entries.keys()) {
      if (store.entries.size <= this.maxEntries) break;
      store.entries.delete(oldest);
      evicted++;
    }

    if (evicted > 0) {
      this.evictions += evicted;
      debug('Market data cache evicted entries', { kind, evicted, size: store.entries.size });
    }
  }
}
