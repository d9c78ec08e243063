/**
 * Rotator Configuration
 * Runtime options persisted through the Store under the "config" key
 */

import { z } from 'zod';
import { env } from './env';
import { SchemaError } from '../lib/errors';
import { ProxyProtocol } from '../lib/proxy/proxy.types';
import { IStore, StoreKeys, loadJson, saveJson } from '../lib/store';

export interface RotatorConfig {
  apiUrl: string;
  maxLatency: number;
  protocolPreference: ProxyProtocol[];
  favoriteCountries: string[];
  singleHostMode: boolean;
  maxHistory: number;
  killSwitch: boolean;
  dnsProtection: boolean;
  torIntegration: boolean;
  proxyChain: string[];
  rotationInterval: number;
  rotationDuration: number;
  autoStart: boolean;
}

export const DEFAULT_CONFIG: RotatorConfig = {
  apiUrl: env.PROXY_API_URL,
  maxLatency: 2000,
  protocolPreference: [ProxyProtocol.HTTP, ProxyProtocol.SOCKS5, ProxyProtocol.SOCKS4, ProxyProtocol.HTTPS],
  favoriteCountries: [],
  singleHostMode: true,
  maxHistory: 50,
  killSwitch: false,
  dnsProtection: true,
  torIntegration: false,
  proxyChain: [],
  rotationInterval: 300,
  rotationDuration: 3600,
  autoStart: false,
};

// Stored form uses snake_case keys; unknown keys from older files are ignored
const storedConfigSchema = z.object({
  api_url: z.string().url(),
  max_latency: z.number().int().nonnegative(),
  protocol_preference: z.array(z.nativeEnum(ProxyProtocol)).min(1),
  favorite_countries: z.array(z.string()),
  single_host_mode: z.boolean(),
  max_history: z.number().int().positive(),
  kill_switch: z.boolean(),
  dns_protection: z.boolean(),
  tor_integration: z.boolean(),
  proxy_chain: z.array(z.string()),
  rotation_interval: z.number().int().positive(),
  rotation_duration: z.number().int(),
  auto_start: z.boolean(),
}).partial();

type StoredConfig = z.infer<typeof storedConfigSchema>;

export function toStoredConfig(config: RotatorConfig): Required<StoredConfig> {
  return {
    api_url: config.apiUrl,
    max_latency: config.maxLatency,
    protocol_preference: config.protocolPreference,
    favorite_countries: config.favoriteCountries,
    single_host_mode: config.singleHostMode,
    max_history: config.maxHistory,
    kill_switch: config.killSwitch,
    dns_protection: config.dnsProtection,
    tor_integration: config.torIntegration,
    proxy_chain: config.proxyChain,
    rotation_interval: config.rotationInterval,
    rotation_duration: config.rotationDuration,
    auto_start: config.autoStart,
  };
}

/**
 * Merge a stored config object over the defaults.
 * Throws a ZodError when a present key has the wrong shape.
 */
export function fromStoredConfig(value: unknown, defaults: RotatorConfig = DEFAULT_CONFIG): RotatorConfig {
  const stored = storedConfigSchema.parse(value);
  return {
    apiUrl: stored.api_url ?? defaults.apiUrl,
    maxLatency: stored.max_latency ?? defaults.maxLatency,
    protocolPreference: stored.protocol_preference ?? [...defaults.protocolPreference],
    favoriteCountries: stored.favorite_countries ?? [...defaults.favoriteCountries],
    singleHostMode: stored.single_host_mode ?? defaults.singleHostMode,
    maxHistory: stored.max_history ?? defaults.maxHistory,
    killSwitch: stored.kill_switch ?? defaults.killSwitch,
    dnsProtection: stored.dns_protection ?? defaults.dnsProtection,
    torIntegration: stored.tor_integration ?? defaults.torIntegration,
    proxyChain: stored.proxy_chain ?? [...defaults.proxyChain],
    rotationInterval: stored.rotation_interval ?? defaults.rotationInterval,
    rotationDuration: stored.rotation_duration ?? defaults.rotationDuration,
    autoStart: stored.auto_start ?? defaults.autoStart,
  };
}

/**
 * Holds the live configuration and persists changes
 */
export class ConfigManager {
  private config: RotatorConfig;

  constructor(private readonly store: IStore, initial: RotatorConfig = DEFAULT_CONFIG) {
    this.config = { ...initial };
  }

  get(): Readonly<RotatorConfig> {
    return this.config;
  }

  /**
   * Load from the store, writing defaults when nothing is stored yet
   */
  async load(): Promise<RotatorConfig> {
    const stored = await loadJson(this.store, StoreKeys.CONFIG);
    if (stored === null) {
      await this.save();
      return this.config;
    }

    try {
      this.config = fromStoredConfig(stored, this.config);
      console.log('✅ Loaded configuration');
    } catch (error: unknown) {
      console.warn('⚠️  Stored configuration is invalid, using defaults:', error instanceof Error ? error.message : error);
    }
    return this.config;
  }

  /**
   * Merge and persist changes. A result the stored schema would reject on the next
   * load throws SchemaError and leaves the live configuration unchanged.
   */
  async update(changes: Partial<RotatorConfig>): Promise<RotatorConfig> {
    const next = { ...this.config, ...changes };
    const checked = storedConfigSchema.safeParse(toStoredConfig(next));
    if (!checked.success) {
      const issues = checked.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new SchemaError(`Invalid configuration: ${issues}`, checked.error);
    }

    this.config = next;
    await this.save();
    return this.config;
  }

  async save(): Promise<void> {
    await saveJson(this.store, StoreKeys.CONFIG, toStoredConfig(this.config));
  }
}
