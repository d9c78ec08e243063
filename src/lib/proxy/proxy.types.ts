/**
 * Proxy Types
 * Type definitions for the proxy pool, sources and health checks
 */

import { HealthCheckFailure } from '../errors';

/**
 * Proxy protocol enumeration
 */
export enum ProxyProtocol {
  HTTP = 'http',
  HTTPS = 'https',
  SOCKS4 = 'socks4',
  SOCKS5 = 'socks5',
}

export const PROXY_PROTOCOLS: readonly ProxyProtocol[] = [
  ProxyProtocol.HTTP,
  ProxyProtocol.HTTPS,
  ProxyProtocol.SOCKS4,
  ProxyProtocol.SOCKS5,
];

export function isProxyProtocol(value: string): value is ProxyProtocol {
  return PROXY_PROTOCOLS.some(protocol => protocol === value);
}

/**
 * Normalized egress point. Never mutated in place: a health check
 * produces a new record.
 */
export interface ProxyRecord {
  readonly host: string;
  readonly port: number;
  readonly protocol: ProxyProtocol;
  readonly country?: string;
  readonly latencyMs?: number;
  readonly lastChecked?: number;
  readonly isFavorite: boolean;
  readonly observedIp?: string;
}

/**
 * Source type enumeration
 */
export enum SourceType {
  ONLINE_API = 'online_api',
  TOR_NETWORK = 'tor_network',
  CUSTOM_FILE = 'custom_file',
}

export interface OnlineApiSource {
  type: SourceType.ONLINE_API;
  url: string;
}

export interface TorNetworkSource {
  type: SourceType.TOR_NETWORK;
}

export interface CustomFileSource {
  type: SourceType.CUSTOM_FILE;
  path: string;
}

export type ProxySource = OnlineApiSource | TorNetworkSource | CustomFileSource;

/**
 * Filters applied to every fetched record
 */
export interface PoolFilter {
  maxLatency: number;
  protocolPreference: readonly ProxyProtocol[];
  favoriteCountries: readonly string[];
}

/**
 * Proxy health check result
 */
export interface HealthResult {
  working: boolean;
  observedIp?: string;
  latencyMs?: number;
  failure?: HealthCheckFailure;
}

/**
 * Pool snapshot persisted after each successful fetch
 */
export interface PoolCacheEntry {
  fetchedAt: string;
  source: ProxySource;
  records: ProxyRecord[];
}

export type PoolExportFormat = 'json' | 'txt';

/**
 * Identity key of a record: host:port
 */
export function proxyKey(record: Pick<ProxyRecord, 'host' | 'port'>): string {
  return `${record.host}:${record.port}`;
}

export function proxyUrl(record: Pick<ProxyRecord, 'host' | 'port' | 'protocol'>): string {
  return `${record.protocol}://${record.host}:${record.port}`;
}

/**
 * Default port used when a source omits it
 */
export function defaultPort(protocol: ProxyProtocol): number {
  switch (protocol) {
    case ProxyProtocol.HTTPS:
      return 443;
    case ProxyProtocol.SOCKS4:
    case ProxyProtocol.SOCKS5:
      return 1080;
    default:
      return 80;
  }
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port > 0 && port <= 65535;
}
