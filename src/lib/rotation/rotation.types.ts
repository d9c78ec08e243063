/**
 * Rotation Scheduler Types
 */

import { ProxyRecord } from '../proxy/proxy.types';

export enum SchedulerStatus {
  IDLE = 'idle',
  RUNNING = 'running',
  STOPPED = 'stopped',
}

export enum SchedulerEvent {
  STARTED = 'started',
  ROTATED = 'rotated',
  RETRY = 'retry',
  COMPLETED = 'completed',
  STOPPED = 'stopped',
}

/**
 * One Selector + ApplyEngine pass. Resolves null when nothing was applied.
 */
export interface RotationCycle {
  rotate(signal: AbortSignal): Promise<ProxyRecord | null>;
}

export interface RotationSchedulerConfig {
  retryDelayMs: number;
  joinTimeoutMs: number;
}
