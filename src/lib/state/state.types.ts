/**
 * State Types
 */

import { ProxyRecord } from '../proxy/proxy.types';

export interface RotationState {
  active: boolean;
  intervalSeconds: number;
  endTime?: number;
  currentProxy?: ProxyRecord;
}

export interface TorState {
  processRunning: boolean;
  processId?: number;
  rotationActive: boolean;
  rotationIntervalSeconds: number;
}

export interface RotatorSnapshot {
  readonly rotation: Readonly<RotationState>;
  readonly tor: Readonly<TorState>;
  readonly poolSize: number;
}

/**
 * Read-only view handed to the relay server
 */
export interface RotationStateReader {
  snapshot(): RotatorSnapshot;
}

/**
 * Shape persisted under the "state" store key
 */
export interface PersistedState {
  currentProxy?: ProxyRecord;
  intervalSeconds: number;
  savedAt: string;
}
