#!/usr/bin/env node
/**
 * Entry Point
 * Builds the rotator from the environment, then runs the interactive menu
 */

import * as readline from 'readline/promises';
import { env } from './config/env';
import { Prompt, RotatorMenu } from './cli/menu';
import { EnvEgressConfigurator } from './lib/egress';
import { ProxyHealthChecker } from './lib/proxy';
import { FileStore } from './lib/store';
import { RotatorService } from './modules/rotator';

export const createRotatorService = (): RotatorService => new RotatorService({
  store: new FileStore({ storagePath: env.STORE_PATH }),
  configurator: new EnvEgressConfigurator({ directiveFile: env.PROXY_DIRECTIVE_FILE }),
  healthChecker: new ProxyHealthChecker(env.IP_CHECK_URL, env.HEALTH_CHECK_TIMEOUT),
  relay: {
    host: env.RELAY_HOST,
    port: env.RELAY_PORT,
    advertisedHost: env.ADVERTISED_HOST,
  },
  tor: {
    executable: env.TOR_EXECUTABLE,
    socksPort: env.TOR_SOCKS_PORT,
    controlHost: env.TOR_CONTROL_HOST,
    controlPort: env.TOR_CONTROL_PORT,
    controlPassword: env.TOR_CONTROL_PASSWORD,
    installCommand: env.TOR_INSTALL_COMMAND,
    startupGraceMs: env.TOR_STARTUP_GRACE,
    stopGraceMs: env.TOR_STOP_GRACE,
    controlTimeoutMs: env.TOR_CONTROL_TIMEOUT,
  },
  scheduler: {
    retryDelayMs: env.ROTATION_RETRY_DELAY,
    joinTimeoutMs: env.ROTATION_JOIN_TIMEOUT,
  },
  selector: {
    checkTimeout: env.SELECTOR_CHECK_TIMEOUT,
    maxAttempts: env.SELECTOR_MAX_ATTEMPTS,
  },
  fetchTimeout: env.SOURCE_FETCH_TIMEOUT,
});

/**
 * Console prompt that resolves null once stdin ends or the interface is closed
 */
const createConsolePrompt = (rl: readline.Interface): Prompt => {
  let isClosed = false;
  const closed = new Promise<null>(resolve => rl.once('close', () => {
    isClosed = true;
    resolve(null);
  }));
  return {
    question: text => (isClosed ? closed : Promise.race([rl.question(text), closed])),
  };
};

const startRotator = async (): Promise<void> => {
  const service = createRotatorService();
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  let shutdownPromise: Promise<void> | undefined;
  const shutdown = (reason: string): Promise<void> => {
    if (!shutdownPromise) {
      console.log(`\n${reason}: shutting down`);
      rl.close();
      shutdownPromise = service.shutdown();
    }
    return shutdownPromise;
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    shutdown(`${signal} signal received`)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  try {
    await service.initialize();

    console.log('');
    console.log('🚀 ═══════════════════════════════════════════════════════');
    console.log('🚀 Egress Rotator is running');
    console.log(`🚀 Environment: ${env.NODE_ENV}`);
    const relay = service.relay.address();
    console.log(`🚀 Relay: http://${relay.host}:${relay.port}/`);
    console.log(`🚀 Storage: ${env.STORE_PATH}`);
    console.log('🚀 ═══════════════════════════════════════════════════════');

    await new RotatorMenu(service, createConsolePrompt(rl)).run();
  } catch (error: unknown) {
    console.error('Rotator stopped with an error:', error);
  }

  await shutdown('Exit requested');
  console.log('🔌 Exiting Egress Rotator');
  process.exit(0);
};

if (require.main === module) {
  startRotator().catch((error: unknown) => {
    console.error('Failed to start rotator:', error);
    process.exit(1);
  });
}
