/**
 * In-memory Store
 */

import { IStore } from './store.types';

export class MemoryStore implements IStore {
  private entries: Map<string, Buffer> = new Map();

  async load(key: string): Promise<Buffer | null> {
    const data = this.entries.get(key);
    return data ? Buffer.from(data) : null;
  }

  async save(key: string, data: Buffer): Promise<void> {
    this.entries.set(key, Buffer.from(data));
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  clear(): void {
    this.entries.clear();
  }
}
