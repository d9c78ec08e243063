/**
 * Store Types
 * Byte-oriented key-value persistence used by the rotator core
 */

export interface IStore {
  load(key: string): Promise<Buffer | null>;
  save(key: string, data: Buffer): Promise<void>;
}

export interface FileStoreConfig {
  storagePath: string;
  extension: string;
}

/**
 * Well-known keys
 */
export const StoreKeys = {
  FAVORITES: 'favorites',
  HISTORY: 'history',
  STATE: 'state',
  CONFIG: 'config',
  POOL_CACHE_PREFIX: 'pool-cache',
  EXPORT_PREFIX: 'exports',
} as const;

/**
 * Load and parse a stored JSON value. A missing key and unparseable contents both
 * yield null, so every loader falls back the same way.
 */
export async function loadJson(store: IStore, key: string): Promise<unknown> {
  const data = await store.load(key);
  if (!data) {
    return null;
  }

  try {
    return JSON.parse(data.toString('utf-8'));
  } catch (error: unknown) {
    if (!(error instanceof SyntaxError)) {
      throw error;
    }
    console.warn(`⚠️  Stored ${key} is not valid JSON, ignoring it: ${error.message}`);
    return null;
  }
}

export async function saveJson(store: IStore, key: string, value: unknown): Promise<void> {
  await store.save(key, Buffer.from(JSON.stringify(value, null, 2), 'utf-8'));
}
