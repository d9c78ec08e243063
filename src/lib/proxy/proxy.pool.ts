/**
 * Proxy Pool Manager
 * Fetches, filters and dedupes records from the active source into the working pool
 */

import * as fs from 'fs/promises';
import { SourceFetchError, errorMessage } from '../errors';
import { IStore, StoreKeys, saveJson } from '../store';
import { RotatorState } from '../state';
import { FavoritesSet } from './proxy.favorites';
import { getRandomUserAgent } from './proxy.headers';
import { RawRecord, parseApiResponse, parseProxyFile } from './proxy.sources';
import {
  PoolCacheEntry,
  PoolExportFormat,
  PoolFilter,
  ProxyRecord,
  ProxySource,
  SourceType,
  proxyKey,
  proxyUrl,
} from './proxy.types';

export interface PoolManagerOptions {
  store: IStore;
  state: RotatorState;
  favorites: FavoritesSet;
  filter: () => PoolFilter;
  initialSource: ProxySource;
  fetchTimeout?: number;
  fetchImpl?: typeof fetch;
  readFile?: (path: string) => Promise<string>;
  now?: () => Date;
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Timestamp in YYYYMMDD_HHmm form used for cache keys
 */
export function formatCacheStamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(date.getHours())}${pad(date.getMinutes())}`;
}

export class PoolManager {
  private source: ProxySource;
  private readonly fetchTimeout: number;
  private readonly fetchImpl: typeof fetch;
  private readonly readFile: (path: string) => Promise<string>;
  private readonly now: () => Date;

  constructor(private readonly options: PoolManagerOptions) {
    this.source = options.initialSource;
    this.fetchTimeout = options.fetchTimeout ?? 30000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.readFile = options.readFile ?? (path => fs.readFile(path, 'utf-8'));
    this.now = options.now ?? (() => new Date());
  }

  getSource(): ProxySource {
    return this.source;
  }

  /**
   * Switch the active source. The in-memory pool is discarded.
   */
  setSource(source: ProxySource): void {
    this.source = source;
    this.options.state.clearPool();
  }

  getPool(): readonly ProxyRecord[] {
    return this.options.state.getPool();
  }

  /**
   * Fetch the pool from a source (the active one by default) and replace the working pool.
   * On SourceFetchError or SchemaError the existing pool is left untouched.
   */
  async fetch(source: ProxySource = this.source): Promise<readonly ProxyRecord[]> {
    let raw: RawRecord[] = [];

    switch (source.type) {
      case SourceType.ONLINE_API:
        console.log(`🌐 Fetching proxies from ${source.url}`);
        raw = await this.fetchOnline(source.url);
        break;
      case SourceType.CUSTOM_FILE:
        console.log(`📄 Loading proxies from ${source.path}`);
        raw = await this.fetchFile(source.path);
        break;
      case SourceType.TOR_NETWORK:
        // Tor egress is synthesized by the Tor controller, not drawn from a pool
        this.options.state.setPool([]);
        return [];
    }

    const pool = this.buildPool(raw);
    this.options.state.setPool(pool);
    console.log(`✅ Loaded ${pool.length} filtered proxies`);

    await this.cache(source, pool);
    return pool;
  }

  /**
   * Dedupe by host:port and tag favorites
   */
  private buildPool(raw: RawRecord[]): ProxyRecord[] {
    const seen = new Set<string>();
    const pool: ProxyRecord[] = [];

    for (const record of raw) {
      const key = proxyKey(record);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      pool.push(Object.freeze({
        ...record,
        isFavorite: this.options.favorites.has(record.host),
      }));
    }

    return pool;
  }

  private async fetchOnline(url: string): Promise<RawRecord[]> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.fetchTimeout);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          'User-Agent': getRandomUserAgent(),
          'Accept': 'application/json',
        },
        signal: controller.signal,
      });
    } catch (error: unknown) {
      const message = controller.signal.aborted
        ? `Proxy source timed out after ${this.fetchTimeout}ms`
        : `Proxy source request failed: ${errorMessage(error)}`;
      throw new SourceFetchError(message, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      throw new SourceFetchError(`Proxy source returned HTTP ${response.status}`, { statusCode: response.status });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error: unknown) {
      throw new SourceFetchError('Proxy source returned a body that is not JSON', { cause: error });
    }

    return parseApiResponse(body, this.options.filter());
  }

  private async fetchFile(path: string): Promise<RawRecord[]> {
    let content: string;
    try {
      content = await this.readFile(path);
    } catch (error: unknown) {
      throw new SourceFetchError(`Cannot read proxy file ${path}: ${errorMessage(error)}`, { cause: error });
    }
    return parseProxyFile(content, this.options.filter());
  }

  /**
   * Persist a timestamped copy of the fetched pool
   */
  private async cache(source: ProxySource, records: ProxyRecord[]): Promise<void> {
    const fetchedAt = this.now();
    const key = `${StoreKeys.POOL_CACHE_PREFIX}/proxies_${formatCacheStamp(fetchedAt)}`;
    const entry: PoolCacheEntry = { fetchedAt: fetchedAt.toISOString(), source, records };

    try {
      await saveJson(this.options.store, key, entry);
      console.log(`💾 Proxies cached to ${key}`);
    } catch (error: unknown) {
      console.warn(`⚠️  Failed to cache proxies: ${errorMessage(error)}`);
    }
  }

  /**
   * Render the pool for export and save it through the store
   */
  async exportPool(format: PoolExportFormat = 'json'): Promise<string> {
    const pool = this.getPool();
    const key = `${StoreKeys.EXPORT_PREFIX}/proxies_${formatCacheStamp(this.now())}_${format}`;
    const content = format === 'txt'
      ? pool.map(proxyUrl).join('\n') + (pool.length > 0 ? '\n' : '')
      : JSON.stringify(pool, null, 2);

    await this.options.store.save(key, Buffer.from(content, 'utf-8'));
    console.log(`📤 Exported ${pool.length} proxies to ${key}`);
    return key;
  }
}
