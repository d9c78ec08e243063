/**
 * Test Fixtures
 * Reusable test data
 */

import { DEFAULT_CONFIG, RotatorConfig } from '../../config/rotator.config';
import { PoolFilter, ProxyProtocol, ProxyRecord } from '../../lib/proxy';
import { TorConfig } from '../../lib/tor';

export const testFilter: PoolFilter = {
  maxLatency: 2000,
  protocolPreference: [ProxyProtocol.HTTP, ProxyProtocol.SOCKS5, ProxyProtocol.SOCKS4, ProxyProtocol.HTTPS],
  favoriteCountries: [],
};

export function makeRecord(overrides: Partial<ProxyRecord> = {}): ProxyRecord {
  return {
    host: '10.0.0.1',
    port: 8080,
    protocol: ProxyProtocol.HTTP,
    country: 'US',
    latencyMs: 100,
    isFavorite: false,
    ...overrides,
  };
}

/**
 * geonode-style response body
 */
export const testApiBody = {
  data: [
    { ip: '10.0.0.1', port: '8080', country: 'US', latency: 120.4, protocols: ['http'], lastChecked: 1700000000 },
    { ip: '10.0.0.2', port: '1080', country: 'DE', latency: 450.6, protocols: ['socks4', 'socks5'] },
    { ip: '10.0.0.3', port: '3128', country: 'FR', latency: 2500, protocols: ['http'] },
    { ip: '10.0.0.4', port: '8443', country: 'JP', latency: 80, protocols: ['ftp'] },
    { ip: '10.0.0.1', port: '8080', country: 'US', latency: 130, protocols: ['http'] },
    { port: '9999', latency: 10, protocols: ['http'] },
  ],
};

export const testProxyFile = [
  '# office proxies',
  '',
  '10.1.0.1:8080:http',
  '10.1.0.2:1080:socks5',
  '10.1.0.3',
  '{"host": "10.1.0.4", "port": 3128, "country": "NL", "latencyMs": 42.7}',
  'not a proxy:abc',
  '{broken json',
].join('\n');

export const testConfig: RotatorConfig = {
  ...DEFAULT_CONFIG,
  apiUrl: 'http://proxy-source.test/api',
  singleHostMode: false,
};

export const testTorConfig: TorConfig = {
  executable: 'tor',
  socksPort: 9050,
  controlHost: '127.0.0.1',
  controlPort: 9051,
  installCommand: 'install-tor',
  startupGraceMs: 5,
  stopGraceMs: 5,
  controlTimeoutMs: 1000,
};
