/**
 * Shared Rotator State
 * The only holder of the pool, the current proxy and the rotation/Tor flags.
 * Reads return frozen copies; compound updates run under runExclusive().
 */

import { ProxyRecord } from '../proxy/proxy.types';
import { RotationState, TorState, RotatorSnapshot, RotationStateReader } from './state.types';

export class RotatorState implements RotationStateReader {
  private pool: readonly ProxyRecord[] = [];
  private rotation: RotationState;
  private tor: TorState = {
    processRunning: false,
    rotationActive: false,
    rotationIntervalSeconds: 0,
  };
  private tail: Promise<void> = Promise.resolve();

  constructor(intervalSeconds: number = 300) {
    this.rotation = { active: false, intervalSeconds };
  }

  /**
   * Run fn once every previously queued exclusive section has settled
   */
  runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const result = this.tail.then(() => fn());
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  snapshot(): RotatorSnapshot {
    return Object.freeze({
      rotation: Object.freeze({ ...this.rotation }),
      tor: Object.freeze({ ...this.tor }),
      poolSize: this.pool.length,
    });
  }

  getPool(): readonly ProxyRecord[] {
    return this.pool;
  }

  setPool(records: readonly ProxyRecord[]): void {
    this.pool = Object.freeze([...records]);
  }

  clearPool(): void {
    this.pool = Object.freeze([]);
  }

  getCurrentProxy(): ProxyRecord | undefined {
    return this.rotation.currentProxy;
  }

  setCurrentProxy(record: ProxyRecord | undefined): void {
    this.rotation = { ...this.rotation, currentProxy: record ? Object.freeze({ ...record }) : undefined };
  }

  getRotation(): Readonly<RotationState> {
    return { ...this.rotation };
  }

  markRotationStarted(intervalSeconds: number, endTime?: number): void {
    this.rotation = { ...this.rotation, active: true, intervalSeconds, endTime };
  }

  markRotationStopped(): void {
    this.rotation = { ...this.rotation, active: false, endTime: undefined };
  }

  getTor(): Readonly<TorState> {
    return { ...this.tor };
  }

  updateTor(changes: Partial<TorState>): void {
    this.tor = { ...this.tor, ...changes };
  }
}
