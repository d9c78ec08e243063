/**
 * Interactive Menu
 * Numbered console menu driving the rotator service
 */

import { errorMessage } from '../lib/errors';
import { ProxyRecord, ProxySource, SourceType } from '../lib/proxy';
import { formatDuration, parseDuration } from '../lib/rotation';
import { RotatorService } from '../modules/rotator';

/**
 * Line source for the menu. Resolves null once input has ended.
 */
export interface Prompt {
  question(text: string): Promise<string | null>;
}

export interface MenuOption {
  key: string;
  label: string;
}

export const MENU_OPTIONS: readonly MenuOption[] = [
  { key: '1', label: '🌐 Fetch new proxies' },
  { key: '2', label: '🔄 Set random proxy' },
  { key: '3', label: '⏱  Start rotation' },
  { key: '4', label: '⏹  Stop rotation' },
  { key: '5', label: 'ℹ️  Show current proxy' },
  { key: '6', label: '⭐ Favorites' },
  { key: '7', label: '🕰  History' },
  { key: '8', label: '📤 Export proxies' },
  { key: '9', label: '🚀 Speed test' },
  { key: '10', label: '🔀 Toggle single-host' },
  { key: '11', label: '🧅 Start Tor' },
  { key: '12', label: '🧅 Stop Tor' },
  { key: '13', label: '🔁 Tor circuit rotation' },
  { key: '14', label: '🔀 Change proxy source' },
  { key: '15', label: '🔌 Clear settings' },
  { key: '16', label: '🚪 Exit' },
];

export function renderMenu(): string {
  const rule = '='.repeat(30);
  return [rule, 'MAIN MENU', rule, ...MENU_OPTIONS.map(option => `${option.key}. ${option.label}`)].join('\n');
}

export function describeProxy(record: ProxyRecord): string[] {
  return [
    `🔌 Current Proxy: ${record.host}:${record.port}`,
    `📡 Protocol: ${record.protocol.toUpperCase()}`,
    `🌍 Location: ${record.country ?? 'N/A'}`,
    `📶 Your IP: ${record.observedIp ?? 'N/A'}`,
    `⏱  Latency: ${record.latencyMs !== undefined ? `${record.latencyMs}ms` : 'N/A'}`,
  ];
}

export class RotatorMenu {
  constructor(
    private readonly service: RotatorService,
    private readonly prompt: Prompt
  ) {}

  /**
   * Show the menu until the user exits or input ends
   */
  async run(): Promise<void> {
    for (;;) {
      console.log(`\n${renderMenu()}`);
      const answer = await this.prompt.question('\n🔍 Select option: ');
      if (answer === null || !(await this.handle(answer.trim()))) {
        return;
      }
    }
  }

  /**
   * Execute one menu choice. Resolves false when the menu should close.
   * Operation errors are reported and the menu continues.
   */
  async handle(choice: string): Promise<boolean> {
    try {
      return await this.dispatch(choice);
    } catch (error: unknown) {
      console.error('❌ Operation failed:', errorMessage(error));
      return true;
    }
  }

  private async dispatch(choice: string): Promise<boolean> {
    switch (choice) {
      case '1': {
        const pool = await this.service.fetchProxies();
        console.log(`🌟 ${pool.length} proxies available`);
        break;
      }
      case '2': {
        const record = await this.service.rotateNow();
        if (record) {
          describeProxy(record).forEach(line => console.log(line));
        } else {
          console.warn('⚠️  No working proxy found');
        }
        break;
      }
      case '3': {
        const interval = parseDuration((await this.ask('⏱  Rotation interval (e.g., 30s, 5m, 2h) [5m]: ')).trim() || '5m');
        const duration = parseDuration((await this.ask('⏳ Duration (0=infinite, e.g., 1h, 30m) [1h]: ')).trim() || '1h');
        this.service.startRotation(interval, duration);
        break;
      }
      case '4':
        await this.service.stopRotation();
        break;
      case '5':
        this.showCurrent();
        break;
      case '6':
        await this.favoritesMenu();
        break;
      case '7':
        this.showHistory();
        break;
      case '8': {
        const format = (await this.ask('📤 Format (json/txt) [json]: ')).trim() === 'txt' ? 'txt' : 'json';
        await this.service.exportPool(format);
        break;
      }
      case '9':
        await this.speedTest();
        break;
      case '10':
        await this.service.toggleSingleHostMode();
        break;
      case '11':
        await this.service.startTor();
        break;
      case '12':
        await this.service.stopTor();
        break;
      case '13':
        await this.torRotation();
        break;
      case '14':
        await this.changeSource();
        break;
      case '15':
        await this.service.clearSettings();
        break;
      case '16':
        return false;
      default:
        console.warn('⚠️  Unknown option');
    }
    return true;
  }

  private async ask(text: string): Promise<string> {
    return (await this.prompt.question(text)) ?? '';
  }

  private showCurrent(): void {
    const current = this.service.getCurrentProxy();
    if (!current) {
      console.log('❌ No active proxy');
      return;
    }

    describeProxy(current).forEach(line => console.log(line));
    const config = this.service.config.get();
    if (config.singleHostMode) {
      const { host, port } = this.service.relay.address();
      console.log(`💡 Single-Host Mode: ACTIVE (fixed endpoint ${host}:${port})`);
    }
    const rotation = this.service.snapshot().rotation;
    if (rotation.active) {
      console.log(`🔄 Rotating every ${formatDuration(rotation.intervalSeconds)}`);
    }
  }

  private showHistory(): void {
    const history = this.service.listHistory();
    if (history.length === 0) {
      console.log('🕰  No rotation history yet');
      return;
    }
    history.forEach((entry, index) => {
      console.log(`${index + 1}. ${entry.host}:${entry.port} (${entry.protocol.toUpperCase()}) ${entry.country ?? 'N/A'} at ${entry.appliedAt}`);
    });
  }

  private async favoritesMenu(): Promise<void> {
    const favorites = this.service.listFavorites();
    favorites.forEach((entry, index) => {
      console.log(`${index + 1}. ${entry.host}:${entry.port} (${entry.protocol.toUpperCase()}) ${entry.country ?? 'N/A'}`);
    });
    if (favorites.length === 0) {
      console.log('⭐ No favorites yet');
    }

    const action = (await this.ask('⭐ [a]dd current, [r]emove, enter to go back: ')).trim().toLowerCase();
    if (action === 'a') {
      await this.service.addFavorite();
    } else if (action === 'r') {
      const host = (await this.ask('Host to remove: ')).trim();
      if (!(await this.service.removeFavorite(host))) {
        console.warn(`⚠️  ${host} is not a favorite`);
      }
    }
  }

  private async speedTest(): Promise<void> {
    console.log('🚀 Testing proxies...');
    const results = await this.service.speedTest();
    if (results.length === 0) {
      console.warn('⚠️  No proxies! Fetch first');
      return;
    }
    for (const { record, result } of results) {
      const outcome = result.working ? `${result.latencyMs ?? 'N/A'}ms` : `failed (${result.failure?.message ?? 'unknown'})`;
      console.log(`${record.host}:${record.port} ${record.protocol.toUpperCase()} ${outcome}`);
    }
  }

  private async torRotation(): Promise<void> {
    if (this.service.tor.isRotating()) {
      await this.service.stopTorRotation();
      console.log('⏹  Tor circuit rotation stopped');
      return;
    }
    const interval = parseDuration((await this.ask('⏱  Circuit interval [5m]: ')).trim() || '5m');
    if (!this.service.startTorRotation(interval)) {
      return;
    }
    console.log(`🔁 Renewing Tor circuit every ${formatDuration(interval)}`);
  }

  private async changeSource(): Promise<void> {
    const answer = (await this.ask('Source: [1] online API, [2] Tor, [3] custom file: ')).trim();
    let source: ProxySource | undefined;
    if (answer === '1') {
      source = { type: SourceType.ONLINE_API, url: this.service.config.get().apiUrl };
    } else if (answer === '2') {
      source = { type: SourceType.TOR_NETWORK };
    } else if (answer === '3') {
      const path = (await this.ask('Proxy file path: ')).trim();
      if (path) {
        source = { type: SourceType.CUSTOM_FILE, path };
      }
    }

    if (source) {
      this.service.setSource(source);
    } else {
      console.warn('⚠️  Source unchanged');
    }
  }
}
