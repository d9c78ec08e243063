/**
 * Tor Controller
 * Owns the Tor subprocess and an independent circuit-rotation loop.
 * Stopped -> Starting -> Running -> Stopped
 */

import { TorStartError, errorMessage } from '../errors';
import { HealthProbe, ProxyProtocol, ProxyRecord } from '../proxy';
import { RotatorState } from '../state';
import { sleep } from '../rotation/rotation.utils';
import { renewCircuit } from './tor.control';
import { childProcessLauncher } from './tor.process';
import { TorConfig, TorProcessHandle, TorProcessLauncher, TorStatus } from './tor.types';

export interface TorControllerOptions {
  config: TorConfig;
  state: RotatorState;
  healthChecker: HealthProbe;
  launcher?: TorProcessLauncher;
  probeTimeout?: number;
  /** Upper bound on waiting for an in-flight renewal when rotation stops */
  joinTimeoutMs?: number;
}

export class TorController {
  private status: TorStatus = TorStatus.STOPPED;
  private process?: TorProcessHandle;
  private rotationController?: AbortController;
  private rotationLoop?: Promise<void>;
  private readonly config: TorConfig;
  private readonly launcher: TorProcessLauncher;

  constructor(private readonly options: TorControllerOptions) {
    this.config = options.config;
    this.launcher = options.launcher ?? childProcessLauncher;
  }

  getStatus(): TorStatus {
    return this.status;
  }

  isRotating(): boolean {
    return this.rotationController !== undefined;
  }

  /**
   * Egress record pointing at the local Tor SOCKS port
   */
  egressRecord(): ProxyRecord {
    return Object.freeze({
      host: '127.0.0.1',
      port: this.config.socksPort,
      protocol: ProxyProtocol.SOCKS5,
      country: 'TOR',
      isFavorite: false,
    });
  }

  /**
   * Launch Tor, installing it first when missing. A process still alive after the
   * grace period is the only readiness signal.
   */
  async startProcess(): Promise<void> {
    if (this.status === TorStatus.RUNNING && this.process?.isAlive()) {
      return;
    }
    if (this.status === TorStatus.STARTING) {
      throw new TorStartError('Tor is already starting');
    }

    this.status = TorStatus.STARTING;
    let handle: TorProcessHandle;
    try {
      if (!(await this.launcher.isInstalled(this.config.executable))) {
        await this.launcher.install(this.config.installCommand);
      }

      console.log('🧅 Starting Tor...');
      handle = this.launcher.launch(this.config.executable, [
        '--SocksPort', String(this.config.socksPort),
        '--ControlPort', String(this.config.controlPort),
      ]);
      this.process = handle;

      await sleep(this.config.startupGraceMs);
      if (!handle.isAlive()) {
        throw new TorStartError('Tor exited during startup');
      }
    } catch (error: unknown) {
      this.status = TorStatus.STOPPED;
      this.process = undefined;
      this.options.state.updateTor({ processRunning: false, processId: undefined });
      if (error instanceof TorStartError) {
        throw error;
      }
      throw new TorStartError(`Failed to start Tor: ${errorMessage(error)}`, error);
    }

    this.status = TorStatus.RUNNING;
    this.options.state.updateTor({ processRunning: true, processId: handle.pid });
    console.log(`✅ Tor running (pid ${handle.pid ?? 'unknown'}), SOCKS on ${this.config.socksPort}`);
  }

  /**
   * Terminate gracefully, then force-kill. Safe to call when nothing is running.
   */
  async stopProcess(): Promise<void> {
    const handle = this.process;
    this.process = undefined;
    this.status = TorStatus.STOPPED;
    this.options.state.updateTor({ processRunning: false, processId: undefined });

    if (!handle || !handle.isAlive()) {
      return;
    }

    handle.kill('SIGTERM');
    if (!(await handle.waitForExit(this.config.stopGraceMs))) {
      console.warn('⚠️  Tor did not exit in time, killing');
      handle.kill('SIGKILL');
      await handle.waitForExit(this.config.stopGraceMs);
    }
    console.log('🛑 Tor stopped');
  }

  /**
   * AUTHENTICATE + signal NEWNYM over the control port
   */
  async renewCircuit(): Promise<void> {
    await renewCircuit({
      host: this.config.controlHost,
      port: this.config.controlPort,
      password: this.config.controlPassword,
      timeoutMs: this.config.controlTimeoutMs,
    });
    console.log('🔁 Tor circuit renewed');
  }

  /**
   * Start the circuit-rotation loop. Returns false when it is already running
   * or the interval is not positive.
   */
  startRotation(intervalSeconds: number): boolean {
    if (!(intervalSeconds > 0)) {
      console.warn('⚠️  Tor rotation interval must be positive');
      return false;
    }
    if (this.rotationController) {
      return false;
    }

    const controller = new AbortController();
    this.rotationController = controller;
    this.options.state.updateTor({ rotationActive: true, rotationIntervalSeconds: intervalSeconds });
    this.rotationLoop = this.runRotation(intervalSeconds, controller.signal);
    return true;
  }

  async stopRotation(): Promise<boolean> {
    const controller = this.rotationController;
    if (!controller) {
      return false;
    }

    controller.abort();
    if (this.rotationLoop) {
      const joinController = new AbortController();
      await Promise.race([this.rotationLoop, sleep(this.options.joinTimeoutMs ?? 2000, joinController.signal)]);
      joinController.abort();
    }
    this.rotationController = undefined;
    this.rotationLoop = undefined;
    this.options.state.updateTor({ rotationActive: false });
    return true;
  }

  private async runRotation(intervalSeconds: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.renewCircuit();
        await this.probeEgress();
      } catch (error: unknown) {
        // Auth/signal failures abort only this renewal
        console.error('❌ Tor circuit renewal failed:', errorMessage(error));
      }

      await sleep(intervalSeconds * 1000, signal);
    }
  }

  /**
   * Best-effort check of the new exit IP through the SOCKS port
   */
  private async probeEgress(): Promise<void> {
    const result = await this.options.healthChecker.test(this.egressRecord(), this.options.probeTimeout);
    if (result.working) {
      console.log(`🧅 New Tor exit IP: ${result.observedIp ?? 'unknown'}`);
    } else {
      console.warn(`⚠️  Could not verify Tor exit IP: ${result.failure?.message ?? 'unknown error'}`);
    }
  }
}
