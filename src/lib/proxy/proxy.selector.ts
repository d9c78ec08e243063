/**
 * Proxy Selector
 * Turns the pool into a bounded candidate list and probes until one works
 */

import { errorMessage } from '../errors';
import { HealthResult, ProxyRecord } from './proxy.types';

export interface PoolSource {
  getPool(): readonly ProxyRecord[];
  fetch(): Promise<readonly ProxyRecord[]>;
}

export interface HealthProbe {
  test(record: ProxyRecord, timeout?: number): Promise<HealthResult>;
}

export interface SelectorOptions {
  checkTimeout?: number;
  maxAttempts?: number;
  random?: () => number;
}

export interface FindWorkingOptions {
  maxAttempts?: number;
  signal?: AbortSignal;
}

/**
 * Favorites in the pool if there are any, otherwise the pool by ascending latency,
 * truncated to maxAttempts. Records without a latency sort last.
 */
export function buildCandidates(pool: readonly ProxyRecord[], maxAttempts: number): ProxyRecord[] {
  const favorites = pool.filter(record => record.isFavorite);
  const candidates = favorites.length > 0
    ? favorites
    : [...pool].sort((a, b) => (a.latencyMs ?? Infinity) - (b.latencyMs ?? Infinity));
  return candidates.slice(0, Math.max(0, maxAttempts));
}

/**
 * Fisher-Yates shuffle returning a new array
 */
export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

export class ProxySelector {
  private readonly checkTimeout: number;
  private readonly maxAttempts: number;
  private readonly random: () => number;

  constructor(
    private readonly pool: PoolSource,
    private readonly healthChecker: HealthProbe,
    options: SelectorOptions = {}
  ) {
    this.checkTimeout = options.checkTimeout ?? 5000;
    this.maxAttempts = options.maxAttempts ?? 15;
    this.random = options.random ?? Math.random;
  }

  /**
   * First-fit search. Returns null when nothing works; the caller owns the retry policy.
   */
  async findWorking(options: FindWorkingOptions = {}): Promise<ProxyRecord | null> {
    const { signal } = options;
    let pool = this.pool.getPool();

    if (pool.length === 0) {
      console.warn('⚠️  No proxies available! Fetching new proxies...');
      try {
        pool = await this.pool.fetch();
      } catch (error: unknown) {
        console.error('❌ Proxy fetch error:', errorMessage(error));
        return null;
      }
    }

    // Shuffle spreads load across repeated calls at the cost of latency order
    const candidates = shuffle(buildCandidates(pool, options.maxAttempts ?? this.maxAttempts), this.random);

    for (const candidate of candidates) {
      if (signal?.aborted) {
        return null;
      }

      console.log(`🔎 Testing ${candidate.host}:${candidate.port} (${candidate.protocol.toUpperCase()})`);
      const result = await this.healthChecker.test(candidate, this.checkTimeout);

      if (result.working) {
        console.log(`✅ Found working proxy: ${result.observedIp ?? 'unknown IP'} | Latency: ${result.latencyMs ?? 'N/A'}ms`);
        return Object.freeze({
          ...candidate,
          latencyMs: result.latencyMs ?? candidate.latencyMs,
          observedIp: result.observedIp,
          lastChecked: Date.now(),
        });
      }
    }

    console.warn('❌ No working proxies found in batch');
    return null;
  }
}
