/**
 * Rotation History
 * Most-recent-first list of applied proxies, capped at a maximum length
 */

import { z } from 'zod';
import { ProxyProtocol, ProxyRecord } from './proxy.types';
import { IStore, StoreKeys, loadJson, saveJson } from '../store';

export interface HistoryEntry {
  host: string;
  port: number;
  protocol: ProxyProtocol;
  country?: string;
  observedIp?: string;
  latencyMs?: number;
  appliedAt: string;
}

const historyEntrySchema = z.object({
  host: z.string(),
  port: z.number().int(),
  protocol: z.nativeEnum(ProxyProtocol),
  country: z.string().optional(),
  observedIp: z.string().optional(),
  latencyMs: z.number().optional(),
  appliedAt: z.string(),
});

export class RotationHistory {
  private entries: HistoryEntry[] = [];

  constructor(
    private readonly store: IStore,
    private maxEntries: number = 50
  ) {}

  async load(): Promise<HistoryEntry[]> {
    const stored = await loadJson(this.store, StoreKeys.HISTORY);
    const parsed = z.array(historyEntrySchema).safeParse(stored ?? []);
    this.entries = parsed.success ? parsed.data.slice(0, this.maxEntries) : [];
    return this.list();
  }

  list(): HistoryEntry[] {
    return this.entries.map(entry => ({ ...entry }));
  }

  setMaxEntries(maxEntries: number): void {
    this.maxEntries = maxEntries;
    this.entries = this.entries.slice(0, maxEntries);
  }

  /**
   * Build the next history without committing it, so a failed save leaves it untouched
   */
  prepend(record: ProxyRecord, appliedAt: Date = new Date()): HistoryEntry[] {
    const entry: HistoryEntry = {
      host: record.host,
      port: record.port,
      protocol: record.protocol,
      country: record.country,
      observedIp: record.observedIp,
      latencyMs: record.latencyMs,
      appliedAt: appliedAt.toISOString(),
    };
    return [entry, ...this.entries].slice(0, this.maxEntries);
  }

  async commit(entries: HistoryEntry[]): Promise<void> {
    await saveJson(this.store, StoreKeys.HISTORY, entries);
    this.entries = entries;
  }

  async add(record: ProxyRecord): Promise<void> {
    await this.commit(this.prepend(record));
  }

  async save(): Promise<void> {
    await saveJson(this.store, StoreKeys.HISTORY, this.entries);
  }
}
