/**
 * File-based Store
 * One file per key under the storage directory
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { IStore, FileStoreConfig } from './store.types';

function hasCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

export class FileStore implements IStore {
  private config: FileStoreConfig;

  constructor(config: Partial<FileStoreConfig> = {}) {
    this.config = {
      storagePath: config.storagePath || path.join(process.cwd(), 'storage'),
      extension: config.extension ?? '.json',
    };
  }

  /**
   * Get file path for a key. Slash-separated keys become subdirectories.
   */
  getFilePath(key: string): string {
    const segments = key
      .split('/')
      .filter(Boolean)
      .map(segment => segment.replace(/[^a-zA-Z0-9._-]/g, '_'))
      // "." and ".." would escape the storage directory
      .map(segment => (/^\.+$/.test(segment) ? segment.replace(/\./g, '_') : segment));
    if (segments.length === 0) {
      throw new Error(`Invalid store key: "${key}"`);
    }
    const last = segments.pop();
    return path.join(this.config.storagePath, ...segments, `${last}${this.config.extension}`);
  }

  async load(key: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(this.getFilePath(key));
    } catch (error: unknown) {
      if (hasCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }
  }

  async save(key: string, data: Buffer): Promise<void> {
    const filePath = this.getFilePath(key);
    await fs.mkdir(path.dirname(filePath), { recursive: true });

    // Write atomically using temporary file then rename
    const tempPath = `${filePath}.tmp`;
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, filePath);
  }
}
