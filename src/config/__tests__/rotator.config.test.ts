/**
 * Rotator Configuration Tests
 */

import { ZodError } from 'zod';
import { ConfigManager, DEFAULT_CONFIG, fromStoredConfig, toStoredConfig } from '../rotator.config';
import { SchemaError } from '../../lib/errors';
import { ProxyProtocol } from '../../lib/proxy';
import { MemoryStore, loadJson, saveJson } from '../../lib/store';

describe('stored configuration', () => {
  it('should use snake_case keys', () => {
    expect(toStoredConfig(DEFAULT_CONFIG)).toMatchObject({
      max_latency: 2000,
      single_host_mode: true,
      max_history: 50,
      rotation_interval: 300,
      rotation_duration: 3600,
      protocol_preference: ['http', 'socks5', 'socks4', 'https'],
    });
  });

  it('should merge present keys over the defaults', () => {
    const config = fromStoredConfig({ max_latency: 800, protocol_preference: ['socks5'], unknown_key: true });

    expect(config.maxLatency).toBe(800);
    expect(config.protocolPreference).toEqual([ProxyProtocol.SOCKS5]);
    expect(config.maxHistory).toBe(50);
  });

  it('should reject a wrongly typed key', () => {
    expect(() => fromStoredConfig({ max_latency: 'fast' })).toThrow(ZodError);
  });
});

describe('ConfigManager', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  it('should write the defaults on first load', async () => {
    const manager = new ConfigManager(store);

    expect(await manager.load()).toEqual(DEFAULT_CONFIG);
    expect(await loadJson(store, 'config')).toEqual(toStoredConfig(DEFAULT_CONFIG));
  });

  it('should load stored values', async () => {
    await saveJson(store, 'config', { single_host_mode: false, favorite_countries: ['NL'] });
    const manager = new ConfigManager(store);

    const config = await manager.load();

    expect(config.singleHostMode).toBe(false);
    expect(config.favoriteCountries).toEqual(['NL']);
  });

  it('should keep the defaults when the stored config is invalid', async () => {
    await saveJson(store, 'config', { max_history: -1 });
    const manager = new ConfigManager(store);

    expect(await manager.load()).toEqual(DEFAULT_CONFIG);
  });

  it('should fall back to the defaults when the stored file is corrupt', async () => {
    await store.save('config', Buffer.from('{not json', 'utf-8'));
    const manager = new ConfigManager(store);

    expect(await manager.load()).toEqual(DEFAULT_CONFIG);
    expect(await loadJson(store, 'config')).toEqual(toStoredConfig(DEFAULT_CONFIG));
  });

  it('should persist updates', async () => {
    const manager = new ConfigManager(store);

    await manager.update({ maxLatency: 750 });

    expect(await loadJson(store, 'config')).toMatchObject({ max_latency: 750 });
    expect(manager.get().maxLatency).toBe(750);
  });

  it('should reject updates the stored schema would not load', async () => {
    const manager = new ConfigManager(store);
    await manager.update({ maxLatency: 750 });

    await expect(manager.update({ maxHistory: 0 })).rejects.toThrow(SchemaError);
    await expect(manager.update({ rotationInterval: -1 })).rejects.toThrow('rotation_interval');

    expect(manager.get().maxHistory).toBe(50);
    expect(manager.get().rotationInterval).toBe(300);
    expect(await loadJson(store, 'config')).toMatchObject({ max_latency: 750, max_history: 50, rotation_interval: 300 });
  });
});
