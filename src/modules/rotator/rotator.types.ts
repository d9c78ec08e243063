/**
 * Rotator Service Types
 */

import { RotatorConfig } from '../../config/rotator.config';
import { EgressConfigurator } from '../../lib/egress';
import { HealthProbe, HealthResult, ProxyRecord, ProxySource, SelectorOptions } from '../../lib/proxy';
import { RelayServerConfig } from '../relay/relay.server';
import { RotationSchedulerConfig } from '../../lib/rotation';
import { IStore } from '../../lib/store';
import { TorConfig, TorProcessLauncher } from '../../lib/tor';

/**
 * Health checker able to probe several records at once (speed test)
 */
export interface BatchHealthProbe extends HealthProbe {
  testBatch(records: readonly ProxyRecord[], timeout?: number, concurrency?: number): Promise<HealthResult[]>;
}

export interface RotatorServiceOptions {
  store: IStore;
  configurator: EgressConfigurator;
  healthChecker: BatchHealthProbe;
  relay: RelayServerConfig;
  tor: TorConfig;
  torLauncher?: TorProcessLauncher;
  scheduler?: Partial<RotationSchedulerConfig>;
  selector?: SelectorOptions;
  initialConfig?: RotatorConfig;
  initialSource?: ProxySource;
  fetchTimeout?: number;
  fetchImpl?: typeof fetch;
  readFile?: (path: string) => Promise<string>;
}

export interface SpeedTestResult {
  record: ProxyRecord;
  result: HealthResult;
}
