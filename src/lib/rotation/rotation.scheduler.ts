/**
 * Rotation Scheduler
 * Interval-driven, optionally time-boxed background rotation.
 * Idle -> Running -> Stopped; Stopped is terminal until start() is called again.
 */

import { EventEmitter } from 'events';
import { SchedulerRetryableFailure, errorMessage } from '../errors';
import { ProxyRecord } from '../proxy/proxy.types';
import { RotatorState } from '../state';
import { formatDuration, sleep } from './rotation.utils';
import {
  RotationCycle,
  RotationSchedulerConfig,
  SchedulerEvent,
  SchedulerStatus,
} from './rotation.types';

export class RotationScheduler extends EventEmitter {
  private status: SchedulerStatus = SchedulerStatus.IDLE;
  private controller?: AbortController;
  private loop?: Promise<void>;
  private config: RotationSchedulerConfig;

  constructor(
    private readonly cycle: RotationCycle,
    private readonly state: RotatorState,
    config?: Partial<RotationSchedulerConfig>
  ) {
    super();
    this.config = {
      retryDelayMs: config?.retryDelayMs ?? 30000,
      joinTimeoutMs: config?.joinTimeoutMs ?? 2000,
    };
  }

  getStatus(): SchedulerStatus {
    return this.status;
  }

  isRunning(): boolean {
    return this.status === SchedulerStatus.RUNNING;
  }

  /**
   * Start rotating. durationSeconds <= 0 runs until stop() is called.
   * Returns false when already running.
   */
  start(intervalSeconds: number, durationSeconds: number): boolean {
    if (this.status === SchedulerStatus.RUNNING) {
      return false;
    }

    const endTime = durationSeconds > 0 ? Date.now() + durationSeconds * 1000 : undefined;
    const controller = new AbortController();

    this.controller = controller;
    this.status = SchedulerStatus.RUNNING;
    this.state.markRotationStarted(intervalSeconds, endTime);

    if (endTime === undefined) {
      console.log('♾️  Rotation started: runs indefinitely until manually stopped');
      console.log(`   Rotation interval: ${formatDuration(intervalSeconds)}`);
    } else {
      console.log(`⏱  Rotation started: ${formatDuration(intervalSeconds)} intervals for ${formatDuration(durationSeconds)}`);
    }

    this.emit(SchedulerEvent.STARTED, { intervalSeconds, endTime });
    this.loop = this.run(intervalSeconds, endTime, controller);
    return true;
  }

  /**
   * Cooperative stop: abort the token, then wait for the loop, bounded by the join timeout.
   * Returns false when not running.
   */
  async stop(): Promise<boolean> {
    if (this.status !== SchedulerStatus.RUNNING || !this.controller) {
      return false;
    }

    const controller = this.controller;
    const loop = this.loop;
    controller.abort();

    if (loop) {
      const joinController = new AbortController();
      await Promise.race([loop, sleep(this.config.joinTimeoutMs, joinController.signal)]);
      joinController.abort();
    }

    this.finish(controller);
    console.log('⏹  Proxy rotation stopped');
    this.emit(SchedulerEvent.STOPPED);
    return true;
  }

  private async run(intervalSeconds: number, endTime: number | undefined, controller: AbortController): Promise<void> {
    const { signal } = controller;

    try {
      while (!signal.aborted && (endTime === undefined || Date.now() < endTime)) {
        console.log('\n🔄 Rotating IP address...');

        let applied: ProxyRecord | null = null;
        let cycleError: unknown;
        try {
          applied = await this.cycle.rotate(signal);
        } catch (error: unknown) {
          cycleError = error;
        }

        if (signal.aborted) {
          break;
        }

        if (applied) {
          console.log(`⏱  Next rotation in ${formatDuration(intervalSeconds)}`);
          this.emit(SchedulerEvent.ROTATED, applied);
          await sleep(this.boundedDelay(intervalSeconds * 1000, endTime), signal);
          continue;
        }

        const failure = new SchedulerRetryableFailure(
          cycleError !== undefined
            ? `Rotation failed: ${errorMessage(cycleError)}`
            : 'Rotation failed: no working proxy found',
          this.config.retryDelayMs,
          cycleError
        );
        console.warn(`⚠️  ${failure.message}, retrying in ${formatDuration(Math.round(this.config.retryDelayMs / 1000))}`);
        this.emit(SchedulerEvent.RETRY, failure);
        await sleep(this.config.retryDelayMs, signal);
      }
    } finally {
      if (!signal.aborted && this.controller === controller) {
        this.finish(controller);
        console.log('\n⏹  Rotation schedule completed');
        this.emit(SchedulerEvent.COMPLETED);
      }
    }
  }

  /**
   * Clamp a sleep so a bounded schedule ends promptly at its end time
   */
  private boundedDelay(delayMs: number, endTime: number | undefined): number {
    if (endTime === undefined) {
      return delayMs;
    }
    return Math.min(delayMs, Math.max(0, endTime - Date.now()));
  }

  private finish(controller: AbortController): void {
    if (this.controller !== controller) {
      return;
    }
    this.status = SchedulerStatus.STOPPED;
    this.controller = undefined;
    this.loop = undefined;
    this.state.markRotationStopped();
  }
}
