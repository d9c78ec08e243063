/**
 * Apply Engine
 * Commits a chosen record as the current egress point
 */

import { EventEmitter } from 'events';
import { z } from 'zod';
import { ApplyError, errorMessage } from '../errors';
import { ProxyProtocol, ProxyRecord, RotationHistory } from '../proxy';
import { IStore, StoreKeys, loadJson, saveJson } from '../store';
import { PersistedState, RotatorState } from '../state';
import { EgressAddress, EgressConfigurator, EgressSignal, formatEgressUrl } from './egress.types';

const persistedStateSchema = z.object({
  currentProxy: z.object({
    host: z.string().min(1),
    port: z.number().int(),
    protocol: z.nativeEnum(ProxyProtocol),
    country: z.string().optional(),
    latencyMs: z.number().optional(),
    lastChecked: z.number().optional(),
    isFavorite: z.boolean().default(false),
    observedIp: z.string().optional(),
  }).optional(),
});

export interface ApplySettings {
  singleHostMode: boolean;
  killSwitch: boolean;
  dnsProtection: boolean;
  torIntegration: boolean;
  proxyChain: readonly string[];
}

export interface ApplyEngineOptions {
  configurator: EgressConfigurator;
  history: RotationHistory;
  state: RotatorState;
  store: IStore;
  settings: () => ApplySettings;
  relayAddress: () => { host: string; port: number };
}

export class ApplyEngine extends EventEmitter {
  constructor(private readonly options: ApplyEngineOptions) {
    super();
  }

  /**
   * Address downstream clients are pointed at. In single-host mode this is always
   * the relay, so rotation stays invisible to them.
   */
  resolveAddress(record: ProxyRecord): EgressAddress {
    if (this.options.settings().singleHostMode) {
      const relay = this.options.relayAddress();
      return { scheme: 'http', host: relay.host, port: relay.port };
    }
    return { scheme: record.protocol, host: record.host, port: record.port };
  }

  /**
   * Apply a record. Resolves false, without side effects, when the signal was aborted
   * before the exclusive section started.
   */
  apply(record: ProxyRecord, signal?: AbortSignal): Promise<boolean> {
    return this.options.state.runExclusive(async () => {
      if (signal?.aborted) {
        return false;
      }

      const address = this.resolveAddress(record);
      try {
        await this.options.configurator.apply(address);
      } catch (error: unknown) {
        throw new ApplyError(`Failed to set egress configuration: ${errorMessage(error)}`, error);
      }

      // History is committed last: its in-memory list only changes once its save succeeds
      const history = this.options.history.prepend(record);
      try {
        await this.writeState(record);
        await this.options.history.commit(history);
      } catch (error: unknown) {
        await this.revert();
        throw new ApplyError(`Failed to persist rotation state: ${errorMessage(error)}`, error);
      }

      this.options.state.setCurrentProxy(record);
      console.log(`🔒 Proxy set: ${formatEgressUrl(address)} | IP: ${record.observedIp ?? 'unknown'}`);

      this.emit(EgressSignal.APPLIED, record, address);
      this.emitToggles(record);
      return true;
    });
  }

  /**
   * Remove egress configuration and forget the current proxy
   */
  clear(): Promise<void> {
    return this.options.state.runExclusive(async () => {
      try {
        await this.options.configurator.clear();
        await this.writeState(undefined);
      } catch (error: unknown) {
        throw new ApplyError(`Failed to clear egress configuration: ${errorMessage(error)}`, error);
      }
      this.options.state.setCurrentProxy(undefined);
      console.log('🔌 Cleared all proxy settings');
      this.emit(EgressSignal.CLEARED);
    });
  }

  /**
   * Reload the last applied record from the store. The egress configuration itself is
   * not touched; a missing or unreadable state leaves no current proxy.
   */
  async restoreState(): Promise<ProxyRecord | undefined> {
    const stored = await loadJson(this.options.store, StoreKeys.STATE);
    if (stored === null) {
      return undefined;
    }

    const parsed = persistedStateSchema.safeParse(stored);
    if (!parsed.success) {
      console.warn('⚠️  Error loading state, starting without a current proxy');
      return undefined;
    }

    const { currentProxy } = parsed.data;
    await this.options.state.runExclusive(() => this.options.state.setCurrentProxy(currentProxy));
    if (currentProxy) {
      console.log(`✅ Restored proxy ${currentProxy.host}:${currentProxy.port}`);
    }
    return this.options.state.getCurrentProxy();
  }

  /**
   * Flush the current state to the store
   */
  persistState(): Promise<void> {
    return this.options.state.runExclusive(() => this.writeState(this.options.state.getCurrentProxy()));
  }

  /**
   * Point the egress configuration and the stored state back at the current proxy
   * after a failed commit
   */
  private async revert(): Promise<void> {
    const previous = this.options.state.getCurrentProxy();
    try {
      if (previous) {
        await this.options.configurator.apply(this.resolveAddress(previous));
      } else {
        await this.options.configurator.clear();
      }
      await this.writeState(previous);
    } catch (error: unknown) {
      console.error('❌ Failed to restore the previous egress configuration:', errorMessage(error));
    }
  }

  private async writeState(currentProxy: ProxyRecord | undefined): Promise<void> {
    const state: PersistedState = {
      currentProxy,
      intervalSeconds: this.options.state.getRotation().intervalSeconds,
      savedAt: new Date().toISOString(),
    };
    await saveJson(this.options.store, StoreKeys.STATE, state);
  }

  private emitToggles(record: ProxyRecord): void {
    const settings = this.options.settings();
    if (settings.proxyChain.length > 0) {
      this.emit(EgressSignal.PROXY_CHAIN, settings.proxyChain, record);
    }
    if (settings.dnsProtection) {
      this.emit(EgressSignal.DNS_PROTECTION, record);
    }
    if (settings.killSwitch) {
      this.emit(EgressSignal.KILL_SWITCH, record);
    }
    if (settings.torIntegration) {
      this.emit(EgressSignal.TOR_INTEGRATION, record);
    }
  }
}
