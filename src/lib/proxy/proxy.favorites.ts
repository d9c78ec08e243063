/**
 * Favorites
 * Persisted set of favorite proxies, unique by host
 */

import { z } from 'zod';
import { ProxyProtocol, ProxyRecord } from './proxy.types';
import { IStore, StoreKeys, loadJson, saveJson } from '../store';

export interface FavoriteEntry {
  host: string;
  port: number;
  protocol: ProxyProtocol;
  country?: string;
  addedAt: string;
}

const favoriteEntrySchema = z.object({
  host: z.string().min(1),
  port: z.number().int(),
  protocol: z.nativeEnum(ProxyProtocol),
  country: z.string().optional(),
  addedAt: z.string(),
});

export class FavoritesSet {
  private entries: FavoriteEntry[] = [];

  constructor(private readonly store: IStore) {}

  async load(): Promise<FavoriteEntry[]> {
    const stored = await loadJson(this.store, StoreKeys.FAVORITES);
    const parsed = z.array(favoriteEntrySchema).safeParse(stored ?? []);
    if (parsed.success) {
      this.entries = parsed.data;
      console.log(`✅ Loaded ${this.entries.length} favorites`);
    } else {
      console.warn('⚠️  Error loading favorites, starting empty');
      this.entries = [];
    }
    return this.list();
  }

  list(): FavoriteEntry[] {
    return this.entries.map(entry => ({ ...entry }));
  }

  has(host: string): boolean {
    return this.entries.some(entry => entry.host === host);
  }

  size(): number {
    return this.entries.length;
  }

  /**
   * Add a record; returns false when the host is already a favorite
   */
  async add(record: ProxyRecord): Promise<boolean> {
    if (this.has(record.host)) {
      return false;
    }

    this.entries.push({
      host: record.host,
      port: record.port,
      protocol: record.protocol,
      country: record.country,
      addedAt: new Date().toISOString(),
    });
    await this.save();
    console.log(`🌟 Added ${record.host} to favorites`);
    return true;
  }

  async remove(host: string): Promise<boolean> {
    const before = this.entries.length;
    this.entries = this.entries.filter(entry => entry.host !== host);
    if (this.entries.length === before) {
      return false;
    }
    await this.save();
    console.log(`🗑️  Removed ${host} from favorites`);
    return true;
  }

  async save(): Promise<void> {
    await saveJson(this.store, StoreKeys.FAVORITES, this.entries);
  }
}
