/**
 * Store Tests
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { FileStore, MemoryStore, loadJson, saveJson } from '..';

describe('FileStore', () => {
  let dir: string;
  let store: FileStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'store-'));
    store = new FileStore({ storagePath: dir });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should return null for a missing key', async () => {
    expect(await store.load('favorites')).toBeNull();
  });

  it('should round-trip bytes', async () => {
    await store.save('state', Buffer.from('{"a":1}'));

    expect((await store.load('state'))?.toString('utf-8')).toBe('{"a":1}');
    expect(await fs.readdir(dir)).toEqual(['state.json']);
  });

  it('should map slash-separated keys to subdirectories', async () => {
    await store.save('pool-cache/proxies_20240115_0905', Buffer.from('[]'));

    expect(await fs.readFile(path.join(dir, 'pool-cache', 'proxies_20240115_0905.json'), 'utf-8')).toBe('[]');
  });

  it('should sanitize key segments', () => {
    expect(store.getFilePath('../odd key')).toBe(path.join(dir, '__', 'odd_key.json'));
    expect(() => store.getFilePath('/')).toThrow('Invalid store key');
  });
});

describe('MemoryStore', () => {
  it('should keep copies of saved buffers', async () => {
    const store = new MemoryStore();
    const data = Buffer.from('abc');

    await store.save('history', data);
    data.write('x');

    expect((await store.load('history'))?.toString('utf-8')).toBe('abc');
    expect(store.keys()).toEqual(['history']);
  });
});

describe('JSON helpers', () => {
  it('should save pretty JSON and load it back', async () => {
    const store = new MemoryStore();

    await saveJson(store, 'config', { max_latency: 500 });

    expect((await store.load('config'))?.toString('utf-8')).toBe('{\n  "max_latency": 500\n}');
    expect(await loadJson(store, 'config')).toEqual({ max_latency: 500 });
    expect(await loadJson(store, 'missing')).toBeNull();
  });

  it('should treat unparseable contents as missing', async () => {
    const store = new MemoryStore();
    await store.save('state', Buffer.from('{not json', 'utf-8'));

    expect(await loadJson(store, 'state')).toBeNull();
  });
});
