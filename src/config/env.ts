import dotenv from 'dotenv';
import * as os from 'os';
import * as path from 'path';

dotenv.config();

function expandHome(filePath: string): string {
  return filePath.startsWith('~') ? path.join(os.homedir(), filePath.slice(1)) : filePath;
}

export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Relay (fixed local endpoint)
  RELAY_HOST: process.env.RELAY_HOST || '0.0.0.0',
  RELAY_PORT: parseInt(process.env.RELAY_PORT || '8080', 10),
  ADVERTISED_HOST: process.env.ADVERTISED_HOST || undefined, // LAN address when unset

  // Persistence
  STORE_PATH: process.env.STORE_PATH || path.join(process.cwd(), 'storage'),
  PROXY_DIRECTIVE_FILE: expandHome(process.env.PROXY_DIRECTIVE_FILE || '~/.curlrc'),

  // Pool & health checks
  PROXY_API_URL: process.env.PROXY_API_URL ||
    'https://proxylist.geonode.com/api/proxy-list?limit=500&page=1&sort_by=lastChecked&sort_type=desc',
  IP_CHECK_URL: process.env.IP_CHECK_URL || 'http://icanhazip.com',
  SOURCE_FETCH_TIMEOUT: parseInt(process.env.SOURCE_FETCH_TIMEOUT || '30000', 10), // 30 seconds
  HEALTH_CHECK_TIMEOUT: parseInt(process.env.HEALTH_CHECK_TIMEOUT || '3000', 10), // standalone probe
  SELECTOR_CHECK_TIMEOUT: parseInt(process.env.SELECTOR_CHECK_TIMEOUT || '5000', 10), // probe driven by selector
  SELECTOR_MAX_ATTEMPTS: parseInt(process.env.SELECTOR_MAX_ATTEMPTS || '15', 10),

  // Rotation
  ROTATION_RETRY_DELAY: parseInt(process.env.ROTATION_RETRY_DELAY || '30000', 10), // 30 seconds
  ROTATION_JOIN_TIMEOUT: parseInt(process.env.ROTATION_JOIN_TIMEOUT || '2000', 10),

  // Tor
  TOR_EXECUTABLE: process.env.TOR_EXECUTABLE || 'tor',
  TOR_SOCKS_PORT: parseInt(process.env.TOR_SOCKS_PORT || '9050', 10),
  TOR_CONTROL_HOST: process.env.TOR_CONTROL_HOST || '127.0.0.1',
  TOR_CONTROL_PORT: parseInt(process.env.TOR_CONTROL_PORT || '9051', 10),
  TOR_CONTROL_PASSWORD: process.env.TOR_CONTROL_PASSWORD || undefined,
  TOR_INSTALL_COMMAND: process.env.TOR_INSTALL_COMMAND || 'pkg install -y tor',
  TOR_STARTUP_GRACE: parseInt(process.env.TOR_STARTUP_GRACE || '5000', 10),
  TOR_STOP_GRACE: parseInt(process.env.TOR_STOP_GRACE || '2000', 10),
  TOR_CONTROL_TIMEOUT: parseInt(process.env.TOR_CONTROL_TIMEOUT || '10000', 10),
} as const;

export default env;
