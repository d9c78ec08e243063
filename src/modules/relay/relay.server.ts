/**
 * Relay Server
 * Stable local listener serving the status page
 */

import { createServer, Server } from 'http';
import { createApp } from '../../app';
import { RotationStateReader } from '../../lib/state';
import { detectLanAddress } from './relay.network';

export interface RelayServerConfig {
  host: string;
  port: number;
  /** Defaults to the LAN address of this host */
  advertisedHost?: string;
}

export class RelayServer {
  private server?: Server;
  private boundPort?: number;
  private readonly advertisedHost: string;

  constructor(
    private readonly reader: RotationStateReader,
    private readonly config: RelayServerConfig
  ) {
    this.advertisedHost = config.advertisedHost ?? detectLanAddress();
  }

  isRunning(): boolean {
    return this.server !== undefined;
  }

  /**
   * Address advertised to downstream clients
   */
  address(): { host: string; port: number } {
    return { host: this.advertisedHost, port: this.boundPort ?? this.config.port };
  }

  /**
   * Start listening. Returns false when already running.
   */
  async start(): Promise<boolean> {
    if (this.server) {
      return false;
    }

    const app = createApp({ reader: this.reader, endpoint: () => this.address() });
    const server = createServer(app);

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    const bound = server.address();
    this.boundPort = typeof bound === 'object' && bound !== null ? bound.port : this.config.port;
    this.server = server;
    console.log(`✅ Local proxy endpoint running at ${this.advertisedHost}:${this.boundPort}`);
    return true;
  }

  async stop(): Promise<boolean> {
    const server = this.server;
    if (!server) {
      return false;
    }

    this.server = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
    console.log('🛑 Local proxy endpoint stopped');
    return true;
  }
}
