/**
 * Rotator Service
 * Wires the pool, selector, apply engine, scheduler, Tor controller and relay
 * around one shared state
 */

import { ConfigManager, DEFAULT_CONFIG, RotatorConfig } from '../../config/rotator.config';
import { ApplyEngine, ApplySettings } from '../../lib/egress';
import { errorMessage } from '../../lib/errors';
import {
  FavoriteEntry,
  FavoritesSet,
  HistoryEntry,
  PoolExportFormat,
  PoolFilter,
  PoolManager,
  ProxyRecord,
  ProxySelector,
  ProxySource,
  RotationHistory,
  SourceType,
} from '../../lib/proxy';
import { renderConnectionInstructions } from '../relay/relay.render';
import { RelayServer } from '../relay/relay.server';
import { RotationCycle, RotationScheduler, SchedulerEvent } from '../../lib/rotation';
import { RotatorSnapshot, RotatorState } from '../../lib/state';
import { TorController } from '../../lib/tor';
import { BatchHealthProbe, RotatorServiceOptions, SpeedTestResult } from './rotator.types';

export class RotatorService implements RotationCycle {
  readonly state: RotatorState;
  readonly config: ConfigManager;
  readonly favorites: FavoritesSet;
  readonly history: RotationHistory;
  readonly pool: PoolManager;
  readonly selector: ProxySelector;
  readonly applyEngine: ApplyEngine;
  readonly scheduler: RotationScheduler;
  readonly tor: TorController;
  readonly relay: RelayServer;
  private readonly healthChecker: BatchHealthProbe;

  constructor(options: RotatorServiceOptions) {
    const initialConfig = options.initialConfig ?? DEFAULT_CONFIG;

    this.state = new RotatorState(initialConfig.rotationInterval);
    this.config = new ConfigManager(options.store, initialConfig);
    this.favorites = new FavoritesSet(options.store);
    this.history = new RotationHistory(options.store, initialConfig.maxHistory);
    this.healthChecker = options.healthChecker;

    this.pool = new PoolManager({
      store: options.store,
      state: this.state,
      favorites: this.favorites,
      filter: () => this.poolFilter(),
      initialSource: options.initialSource ?? { type: SourceType.ONLINE_API, url: initialConfig.apiUrl },
      fetchTimeout: options.fetchTimeout,
      fetchImpl: options.fetchImpl,
      readFile: options.readFile,
    });

    this.selector = new ProxySelector(this.pool, this.healthChecker, options.selector);
    this.relay = new RelayServer(this.state, options.relay);

    this.applyEngine = new ApplyEngine({
      configurator: options.configurator,
      history: this.history,
      state: this.state,
      store: options.store,
      settings: () => this.applySettings(),
      relayAddress: () => this.relay.address(),
    });

    this.scheduler = new RotationScheduler(this, this.state, options.scheduler);
    this.scheduler.on(SchedulerEvent.ROTATED, (record: ProxyRecord) => this.showConnectionInstructions(record));

    this.tor = new TorController({
      config: options.tor,
      state: this.state,
      healthChecker: this.healthChecker,
      launcher: options.torLauncher,
      joinTimeoutMs: options.scheduler?.joinTimeoutMs,
    });
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Load persisted data, start the relay in single-host mode and auto-start rotation
   */
  async initialize(): Promise<void> {
    const config = await this.config.load();
    this.history.setMaxEntries(config.maxHistory);
    await this.favorites.load();
    await this.history.load();
    await this.applyEngine.restoreState();

    const source = this.pool.getSource();
    if (source.type === SourceType.ONLINE_API && source.url !== config.apiUrl) {
      this.pool.setSource({ type: SourceType.ONLINE_API, url: config.apiUrl });
    }

    if (config.singleHostMode) {
      await this.relay.start();
    }

    if (config.autoStart) {
      console.log('🚀 Starting auto-rotation as per configuration...');
      this.startRotation();
    }
  }

  /**
   * Stop every background unit, then flush state, favorites, history and config
   */
  async shutdown(): Promise<void> {
    const steps: Array<[string, () => Promise<unknown>]> = [
      ['stop rotation', () => this.scheduler.stop()],
      ['stop Tor rotation', () => this.tor.stopRotation()],
      ['stop Tor', () => this.tor.stopProcess()],
      ['stop relay', () => this.relay.stop()],
      ['save state', () => this.applyEngine.persistState()],
      ['save favorites', () => this.favorites.save()],
      ['save history', () => this.history.save()],
      ['save config', () => this.config.save()],
    ];

    for (const [name, step] of steps) {
      try {
        await step();
      } catch (error: unknown) {
        console.error(`❌ Shutdown failed to ${name}:`, errorMessage(error));
      }
    }
    console.log('💾 Application state saved');
  }

  snapshot(): RotatorSnapshot {
    return this.state.snapshot();
  }

  // ============================================================================
  // Pool
  // ============================================================================

  fetchProxies(): Promise<readonly ProxyRecord[]> {
    return this.pool.fetch();
  }

  setSource(source: ProxySource): void {
    this.pool.setSource(source);
    console.log(`🔀 Proxy source set to ${source.type}`);
  }

  getSource(): ProxySource {
    return this.pool.getSource();
  }

  exportPool(format: PoolExportFormat = 'json'): Promise<string> {
    return this.pool.exportPool(format);
  }

  /**
   * Probe up to `limit` pool records concurrently, working ones first by latency
   */
  async speedTest(limit: number = 10): Promise<SpeedTestResult[]> {
    const records = this.pool.getPool().slice(0, Math.max(0, limit));
    const results = await this.healthChecker.testBatch(records);

    return records
      .map((record, index) => ({ record, result: results[index] }))
      .sort((a, b) => {
        if (a.result.working !== b.result.working) {
          return a.result.working ? -1 : 1;
        }
        return (a.result.latencyMs ?? Infinity) - (b.result.latencyMs ?? Infinity);
      });
  }

  // ============================================================================
  // Rotation
  // ============================================================================

  /**
   * One rotation cycle: pick an egress record and apply it.
   * Resolves null when nothing working was found or the signal fired first.
   */
  async rotate(signal?: AbortSignal): Promise<ProxyRecord | null> {
    const record = this.pool.getSource().type === SourceType.TOR_NETWORK
      ? await this.nextTorRecord()
      : await this.selector.findWorking({ signal });

    if (!record || signal?.aborted) {
      return null;
    }

    const applied = await this.applyEngine.apply(record, signal);
    return applied ? record : null;
  }

  /**
   * Manual rotation. ApplyError and Tor errors reach the caller.
   */
  async rotateNow(): Promise<ProxyRecord | null> {
    const record = await this.rotate();
    if (record) {
      this.showConnectionInstructions(record);
    }
    return record;
  }

  startRotation(intervalSeconds?: number, durationSeconds?: number): boolean {
    const config = this.config.get();
    const interval = intervalSeconds ?? config.rotationInterval;
    if (interval <= 0) {
      console.warn('⚠️  Rotation interval must be positive');
      return false;
    }

    const started = this.scheduler.start(interval, durationSeconds ?? config.rotationDuration);
    if (!started) {
      console.warn('⚠️  Rotation is already running');
    }
    return started;
  }

  async stopRotation(): Promise<boolean> {
    const stopped = await this.scheduler.stop();
    if (!stopped) {
      console.warn('⚠️  No active rotation');
    }
    return stopped;
  }

  getCurrentProxy(): ProxyRecord | undefined {
    return this.state.getCurrentProxy();
  }

  clearSettings(): Promise<void> {
    return this.applyEngine.clear();
  }

  // ============================================================================
  // Configuration
  // ============================================================================

  /**
   * Flip single-host mode, start or stop the relay to match and re-point the
   * current proxy at the new address
   */
  async toggleSingleHostMode(): Promise<boolean> {
    const config = await this.config.update({ singleHostMode: !this.config.get().singleHostMode });
    console.log(`🔀 Single Host Mode: ${config.singleHostMode ? 'ENABLED' : 'DISABLED'}`);

    if (config.singleHostMode) {
      await this.relay.start();
    } else {
      await this.relay.stop();
    }

    const current = this.state.getCurrentProxy();
    if (current) {
      await this.applyEngine.apply(current);
    }
    return config.singleHostMode;
  }

  async updateConfig(changes: Partial<RotatorConfig>): Promise<RotatorConfig> {
    const config = await this.config.update(changes);
    this.history.setMaxEntries(config.maxHistory);

    const source = this.pool.getSource();
    if (changes.apiUrl !== undefined && source.type === SourceType.ONLINE_API && source.url !== config.apiUrl) {
      this.pool.setSource({ type: SourceType.ONLINE_API, url: config.apiUrl });
    }
    return config;
  }

  // ============================================================================
  // Favorites & history
  // ============================================================================

  /**
   * Add the given record, or the current proxy, to favorites
   */
  async addFavorite(record: ProxyRecord | undefined = this.state.getCurrentProxy()): Promise<boolean> {
    if (!record) {
      console.warn('⚠️  No active proxy to add');
      return false;
    }
    return this.favorites.add(record);
  }

  removeFavorite(host: string): Promise<boolean> {
    return this.favorites.remove(host);
  }

  listFavorites(): FavoriteEntry[] {
    return this.favorites.list();
  }

  listHistory(): HistoryEntry[] {
    return this.history.list();
  }

  // ============================================================================
  // Tor
  // ============================================================================

  startTor(): Promise<void> {
    return this.tor.startProcess();
  }

  async stopTor(): Promise<void> {
    await this.tor.stopRotation();
    await this.tor.stopProcess();
  }

  startTorRotation(intervalSeconds: number = this.config.get().rotationInterval): boolean {
    return this.tor.startRotation(intervalSeconds);
  }

  stopTorRotation(): Promise<boolean> {
    return this.tor.stopRotation();
  }

  /**
   * Fresh circuit, then the local SOCKS record with the exit IP it reports
   */
  private async nextTorRecord(): Promise<ProxyRecord | null> {
    if (!this.state.getTor().processRunning) {
      console.warn('⚠️  Tor is not running; start it before rotating through Tor');
      return null;
    }

    await this.tor.renewCircuit();
    const record = this.tor.egressRecord();
    const result = await this.healthChecker.test(record);
    if (!result.working) {
      console.warn(`⚠️  Tor egress check failed: ${result.failure?.message ?? 'unknown error'}`);
      return null;
    }

    return Object.freeze({
      ...record,
      latencyMs: result.latencyMs,
      observedIp: result.observedIp,
      lastChecked: Date.now(),
    });
  }

  private showConnectionInstructions(record: ProxyRecord): void {
    console.log(renderConnectionInstructions(this.applyEngine.resolveAddress(record), record).join('\n'));
  }

  private poolFilter(): PoolFilter {
    const config = this.config.get();
    return {
      maxLatency: config.maxLatency,
      protocolPreference: config.protocolPreference,
      favoriteCountries: config.favoriteCountries,
    };
  }

  private applySettings(): ApplySettings {
    const config = this.config.get();
    return {
      singleHostMode: config.singleHostMode,
      killSwitch: config.killSwitch,
      dnsProtection: config.dnsProtection,
      torIntegration: config.torIntegration,
      proxyChain: config.proxyChain,
    };
  }
}
