/**
 * Favorites & History Tests
 */

import { MemoryStore, loadJson, saveJson } from '../../store';
import { FavoritesSet, ProxyProtocol, RotationHistory } from '..';
import { makeRecord } from '../../../__tests__/helpers/fixtures';

describe('FavoritesSet', () => {
  let store: MemoryStore;
  let favorites: FavoritesSet;

  beforeEach(() => {
    store = new MemoryStore();
    favorites = new FavoritesSet(store);
  });

  it('should add a host once', async () => {
    expect(await favorites.add(makeRecord())).toBe(true);
    expect(await favorites.add(makeRecord({ port: 9090 }))).toBe(false);

    expect(favorites.size()).toBe(1);
    expect(favorites.has('10.0.0.1')).toBe(true);
  });

  it('should persist additions and removals', async () => {
    await favorites.add(makeRecord());
    await favorites.add(makeRecord({ host: '10.0.0.9', protocol: ProxyProtocol.SOCKS5 }));
    await favorites.remove('10.0.0.1');

    const reloaded = new FavoritesSet(store);
    const entries = await reloaded.load();

    expect(entries.map(entry => entry.host)).toEqual(['10.0.0.9']);
    expect(entries[0].protocol).toBe(ProxyProtocol.SOCKS5);
  });

  it('should report removal of an unknown host', async () => {
    expect(await favorites.remove('192.0.2.1')).toBe(false);
  });

  it('should start empty when the stored list is invalid', async () => {
    await saveJson(store, 'favorites', [{ host: 42 }]);

    expect(await favorites.load()).toEqual([]);
  });

  it('should start empty when the stored file is corrupt', async () => {
    await store.save('favorites', Buffer.from('{not json', 'utf-8'));

    expect(await favorites.load()).toEqual([]);
    expect(favorites.size()).toBe(0);
  });
});

describe('RotationHistory', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  it('should keep the most recent entry first', async () => {
    const history = new RotationHistory(store);

    await history.add(makeRecord({ host: '10.0.0.1' }));
    await history.add(makeRecord({ host: '10.0.0.2' }));

    expect(history.list().map(entry => entry.host)).toEqual(['10.0.0.2', '10.0.0.1']);
  });

  it('should cap the history at the maximum length', async () => {
    const history = new RotationHistory(store, 3);

    for (let i = 1; i <= 5; i++) {
      await history.add(makeRecord({ host: `10.0.0.${i}` }));
    }

    expect(history.list().map(entry => entry.host)).toEqual(['10.0.0.5', '10.0.0.4', '10.0.0.3']);
    expect(await loadJson(store, 'history')).toHaveLength(3);
  });

  it('should not change the list until a prepared history is committed', async () => {
    const history = new RotationHistory(store);

    const next = history.prepend(makeRecord(), new Date('2024-01-15T09:05:00.000Z'));

    expect(history.list()).toEqual([]);
    expect(next).toEqual([{
      host: '10.0.0.1',
      port: 8080,
      protocol: ProxyProtocol.HTTP,
      country: 'US',
      observedIp: undefined,
      latencyMs: 100,
      appliedAt: '2024-01-15T09:05:00.000Z',
    }]);
  });

  it('should truncate a loaded history to the cap', async () => {
    const writer = new RotationHistory(store, 10);
    for (let i = 1; i <= 4; i++) {
      await writer.add(makeRecord({ host: `10.0.0.${i}` }));
    }

    const reader = new RotationHistory(store, 2);
    const entries = await reader.load();

    expect(entries.map(entry => entry.host)).toEqual(['10.0.0.4', '10.0.0.3']);
  });

  it('should start empty when the stored file is corrupt', async () => {
    await store.save('history', Buffer.from('[{"host":', 'utf-8'));

    expect(await new RotationHistory(store).load()).toEqual([]);
  });
});
